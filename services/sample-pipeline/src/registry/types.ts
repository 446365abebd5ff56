export type DedupRecord = {
  generatorName: string;
  paramHash: string;
  sampleId: string;
};

export type InsertOutcome = 'inserted' | 'conflict';

/**
 * Shared keyed store holding at most one record per
 * `(generatorName, paramHash)`. Backends signal transient back-pressure
 * with `RegistryThrottledError`.
 */
export interface DedupRegistry {
  readonly kind: string;
  /** Atomic insert-if-absent; `'conflict'` when a record already holds the key. */
  insertIfAbsent(record: DedupRecord): Promise<InsertOutcome>;
  findOwner(generatorName: string, paramHash: string): Promise<string | null>;
  close?(): Promise<void>;
}
