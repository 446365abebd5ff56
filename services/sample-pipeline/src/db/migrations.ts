import { quoteIdentifier, type SqlExecutor } from './client';

interface Migration {
  id: string;
  statements: (schema: string) => string[];
}

const MIGRATION_TABLE = 'sample_pipeline_schema_migrations';

const migrations: Migration[] = [
  {
    id: '001_sample_dedup_records',
    statements: (schema) => [
      `CREATE TABLE IF NOT EXISTS ${schema}.sample_dedup_records (
         generator_name TEXT NOT NULL,
         param_hash TEXT NOT NULL,
         sample_id TEXT NOT NULL,
         created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
         PRIMARY KEY (generator_name, param_hash)
       );`,
      `CREATE INDEX IF NOT EXISTS idx_sample_dedup_records_sample
         ON ${schema}.sample_dedup_records(generator_name, sample_id);`
    ]
  }
];

export async function runMigrations(execute: SqlExecutor, schemaName: string): Promise<string[]> {
  const schema = quoteIdentifier(schemaName);
  await execute(`CREATE SCHEMA IF NOT EXISTS ${schema}`);
  await execute(
    `CREATE TABLE IF NOT EXISTS ${schema}.${MIGRATION_TABLE} (
       id TEXT PRIMARY KEY,
       applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
     )`
  );

  const { rows } = await execute(`SELECT id FROM ${schema}.${MIGRATION_TABLE}`);
  const applied = new Set(rows.map((row) => String(row.id)));
  const newlyApplied: string[] = [];

  for (const migration of migrations) {
    if (applied.has(migration.id)) {
      continue;
    }
    for (const statement of migration.statements(schema)) {
      await execute(statement);
    }
    await execute(`INSERT INTO ${schema}.${MIGRATION_TABLE} (id) VALUES ($1) ON CONFLICT (id) DO NOTHING`, [
      migration.id
    ]);
    newlyApplied.push(migration.id);
  }

  return newlyApplied;
}
