import type { DedupRecord, DedupRegistry, InsertOutcome } from './types';

function recordKey(generatorName: string, paramHash: string): string {
  return JSON.stringify([generatorName, paramHash]);
}

/** Process-local registry used in inline mode and by tests. */
export class InMemoryDedupRegistry implements DedupRegistry {
  readonly kind = 'memory';
  private readonly records = new Map<string, DedupRecord>();

  async insertIfAbsent(record: DedupRecord): Promise<InsertOutcome> {
    const key = recordKey(record.generatorName, record.paramHash);
    if (this.records.has(key)) {
      return 'conflict';
    }
    this.records.set(key, { ...record });
    return 'inserted';
  }

  async findOwner(generatorName: string, paramHash: string): Promise<string | null> {
    return this.records.get(recordKey(generatorName, paramHash))?.sampleId ?? null;
  }

  list(): DedupRecord[] {
    return Array.from(this.records.values(), (record) => ({ ...record }));
  }

  get size(): number {
    return this.records.size;
  }
}
