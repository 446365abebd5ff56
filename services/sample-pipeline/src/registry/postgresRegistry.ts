import { RegistryThrottledError } from '../errors';
import { quoteIdentifier, type SqlExecutor } from '../db/client';
import type { DedupRecord, DedupRegistry, InsertOutcome } from './types';

// serialization_failure, deadlock_detected, too_many_connections,
// lock_not_available, cannot_connect_now
const THROTTLE_SQLSTATES = new Set(['40001', '40P01', '53300', '55P03', '57P03']);

export function isThrottleError(err: unknown): boolean {
  if (!err || typeof err !== 'object') {
    return false;
  }
  if ('code' in err && typeof err.code === 'string' && THROTTLE_SQLSTATES.has(err.code)) {
    return true;
  }
  return err instanceof Error && err.message.includes('timeout exceeded when trying to connect');
}

export class PostgresDedupRegistry implements DedupRegistry {
  readonly kind = 'postgres';
  private readonly table: string;

  constructor(
    private readonly execute: SqlExecutor,
    schema: string,
    private readonly onClose?: () => Promise<void>
  ) {
    this.table = `${quoteIdentifier(schema)}.sample_dedup_records`;
  }

  async insertIfAbsent(record: DedupRecord): Promise<InsertOutcome> {
    const { rows } = await this.run(
      `INSERT INTO ${this.table} (generator_name, param_hash, sample_id)
       VALUES ($1, $2, $3)
       ON CONFLICT (generator_name, param_hash) DO NOTHING
       RETURNING sample_id`,
      [record.generatorName, record.paramHash, record.sampleId]
    );
    return rows.length > 0 ? 'inserted' : 'conflict';
  }

  async findOwner(generatorName: string, paramHash: string): Promise<string | null> {
    const { rows } = await this.run(
      `SELECT sample_id FROM ${this.table} WHERE generator_name = $1 AND param_hash = $2`,
      [generatorName, paramHash]
    );
    const owner = rows[0]?.sample_id;
    return typeof owner === 'string' ? owner : null;
  }

  async close(): Promise<void> {
    await this.onClose?.();
  }

  private async run(text: string, values: unknown[]): Promise<{ rows: Record<string, unknown>[] }> {
    try {
      return await this.execute(text, values);
    } catch (err) {
      if (isThrottleError(err)) {
        throw new RegistryThrottledError(
          `postgres registry throttled: ${err instanceof Error ? err.message : String(err)}`,
          { cause: err }
        );
      }
      throw err;
    }
  }
}
