import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import type { SqlExecutor, SqlRow } from '../src/db/client';
import { runMigrations } from '../src/db/migrations';
import { RegistryThrottledError } from '../src/errors';
import { PostgresDedupRegistry, isThrottleError } from '../src/registry/postgresRegistry';

type Query = { text: string; values?: unknown[] };

class PgError extends Error {
  constructor(message: string, readonly code: string) {
    super(message);
  }
}

/** Answers the handful of statements the registry issues against an in-memory table. */
function createFakeExecutor(queries: Query[] = []): { execute: SqlExecutor; failNext(err: Error): void } {
  const rows = new Map<string, string>();
  const migrationIds = new Set<string>();
  let pendingFailure: Error | null = null;

  const execute: SqlExecutor = async (text, values = []) => {
    queries.push({ text, values });
    if (pendingFailure) {
      const err = pendingFailure;
      pendingFailure = null;
      throw err;
    }
    const normalized = text.replace(/\s+/g, ' ').trim();
    const key = JSON.stringify([values[0], values[1]]);
    if (normalized.startsWith('INSERT INTO') && normalized.includes('sample_dedup_records')) {
      if (rows.has(key)) {
        return { rows: [] };
      }
      rows.set(key, String(values[2]));
      return { rows: [{ sample_id: String(values[2]) }] };
    }
    if (normalized.startsWith('SELECT sample_id')) {
      const owner = rows.get(key);
      const result: SqlRow[] = owner === undefined ? [] : [{ sample_id: owner }];
      return { rows: result };
    }
    if (normalized.startsWith('SELECT id FROM')) {
      return { rows: Array.from(migrationIds, (id) => ({ id })) };
    }
    if (normalized.startsWith('INSERT INTO') && normalized.includes('schema_migrations')) {
      migrationIds.add(String(values[0]));
    }
    return { rows: [] };
  };

  return {
    execute,
    failNext(err) {
      pendingFailure = err;
    }
  };
}

describe('PostgresDedupRegistry', () => {
  it('inserts once and reports conflicts afterwards', async () => {
    const queries: Query[] = [];
    const { execute } = createFakeExecutor(queries);
    const registry = new PostgresDedupRegistry(execute, 'sample_pipeline');
    const record = { generatorName: 'shapes', paramHash: 'h1', sampleId: '10' };

    assert.equal(await registry.insertIfAbsent(record), 'inserted');
    assert.equal(await registry.insertIfAbsent({ ...record, sampleId: '11' }), 'conflict');
    assert.equal(await registry.findOwner('shapes', 'h1'), '10');
    assert.equal(await registry.findOwner('shapes', 'h2'), null);
    assert.match(queries[0].text, /INSERT INTO "sample_pipeline"\.sample_dedup_records/);
    assert.match(queries[0].text, /ON CONFLICT \(generator_name, param_hash\) DO NOTHING/);
    assert.deepEqual(queries[0].values, ['shapes', 'h1', '10']);
  });

  it('maps throttling SQLSTATEs to RegistryThrottledError', async () => {
    const fake = createFakeExecutor();
    const registry = new PostgresDedupRegistry(fake.execute, 'sample_pipeline');
    fake.failNext(new PgError('sorry, too many clients already', '53300'));

    await assert.rejects(
      registry.insertIfAbsent({ generatorName: 'shapes', paramHash: 'h1', sampleId: '1' }),
      (err: unknown) => err instanceof RegistryThrottledError && err.cause instanceof PgError
    );
  });

  it('rethrows other database errors unchanged', async () => {
    const fake = createFakeExecutor();
    const registry = new PostgresDedupRegistry(fake.execute, 'sample_pipeline');
    const failure = new PgError('relation does not exist', '42P01');
    fake.failNext(failure);

    await assert.rejects(registry.findOwner('shapes', 'h1'), (err: unknown) => err === failure);
  });

  it('invokes the close hook', async () => {
    let closed = false;
    const registry = new PostgresDedupRegistry(createFakeExecutor().execute, 'sample_pipeline', async () => {
      closed = true;
    });
    await registry.close();
    assert.equal(closed, true);
  });
});

describe('isThrottleError', () => {
  it('recognises contention codes and pool connect timeouts', () => {
    assert.equal(isThrottleError(new PgError('deadlock detected', '40P01')), true);
    assert.equal(isThrottleError(new Error('timeout exceeded when trying to connect')), true);
    assert.equal(isThrottleError(new PgError('duplicate key value', '23505')), false);
    assert.equal(isThrottleError('40001'), false);
  });
});

describe('runMigrations', () => {
  it('applies pending migrations once', async () => {
    const queries: Query[] = [];
    const { execute } = createFakeExecutor(queries);

    assert.deepEqual(await runMigrations(execute, 'sample_pipeline'), ['001_sample_dedup_records']);
    assert.deepEqual(await runMigrations(execute, 'sample_pipeline'), []);
    assert.equal(queries[0].text, 'CREATE SCHEMA IF NOT EXISTS "sample_pipeline"');
    assert.equal(
      queries.filter((query) => query.text.includes('CREATE TABLE IF NOT EXISTS "sample_pipeline".sample_dedup_records'))
        .length,
      1
    );
  });
});
