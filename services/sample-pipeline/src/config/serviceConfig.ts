import os from 'node:os';
import { z } from 'zod';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type RegistryMode = 'postgres' | 'memory' | 'disabled';

export const DEFAULT_ARTIFACT_EXTENSIONS = [
  '.png',
  '.jpg',
  '.jpeg',
  '.gif',
  '.webp',
  '.bmp',
  '.mp4',
  '.webm',
  '.mov',
  '.avi',
  '.txt'
];

const configSchema = z.object({
  logLevel: z.enum(['debug', 'info', 'warn', 'error']),
  metricsEnabled: z.boolean(),
  metricsServer: z.object({
    host: z.string().min(1),
    port: z.number().int().min(0).max(65535)
  }),
  generator: z.object({
    generatorsPath: z.string().min(1),
    command: z.string().min(1),
    entry: z.string().min(1)
  }),
  scratchRoot: z.string().min(1),
  samples: z.object({
    domainTaskSuffix: z.string().min(1),
    artifactExtensions: z.array(z.string().regex(/^\.[a-z0-9]+$/)).min(1)
  }),
  storage: z.object({
    bucket: z.string().min(1),
    prefix: z.string(),
    region: z.string().min(1),
    endpoint: z.string().min(1).optional(),
    forcePathStyle: z.boolean(),
    accessKeyId: z.string().min(1).optional(),
    secretAccessKey: z.string().min(1).optional()
  }),
  registry: z.object({
    mode: z.enum(['postgres', 'memory', 'disabled']),
    databaseUrl: z.string().min(1).optional(),
    schema: z.string().min(1),
    maxConnections: z.number().int().positive()
  }),
  dedup: z.object({
    maxRounds: z.number().int().nonnegative(),
    throttleRetries: z.number().int().positive(),
    backoffBaseMs: z.number().int().nonnegative()
  }),
  queue: z.object({
    redisUrl: z.string().min(1),
    inline: z.boolean(),
    name: z.string().min(1),
    attempts: z.number().int().positive(),
    concurrency: z.number().int().positive(),
    keyPrefix: z.string().min(1)
  })
});

export type ServiceConfig = z.infer<typeof configSchema>;

let cachedConfig: ServiceConfig | null = null;

function parseNumber(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['0', 'false', 'no', 'off'].includes(normalized)) {
    return false;
  }
  return fallback;
}

function optionalString(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function resolveLogLevel(value: string | undefined): LogLevel {
  const normalized = (value || 'info').trim().toLowerCase();
  switch (normalized) {
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
      return normalized;
    default:
      return 'info';
  }
}

function resolveRegistryMode(value: string | undefined, databaseUrl: string | undefined): RegistryMode {
  const normalized = (value ?? '').trim().toLowerCase();
  switch (normalized) {
    case 'postgres':
    case 'memory':
    case 'disabled':
      return normalized;
    default:
      return databaseUrl ? 'postgres' : 'disabled';
  }
}

function parseExtensions(value: string | undefined): string[] {
  if (!value) {
    return DEFAULT_ARTIFACT_EXTENSIONS;
  }
  const entries = value
    .split(',')
    .map((entry) => entry.trim().toLowerCase())
    .filter((entry) => entry.length > 0)
    .map((entry) => (entry.startsWith('.') ? entry : `.${entry}`));
  return entries.length > 0 ? Array.from(new Set(entries)) : DEFAULT_ARTIFACT_EXTENSIONS;
}

function normalizePrefix(value: string): string {
  return value.trim().replace(/^\/+/, '').replace(/\/+$/, '');
}

export function loadServiceConfig(): ServiceConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const env = process.env;
  const logLevel = resolveLogLevel(env.SAMPLE_PIPELINE_LOG_LEVEL);
  const metricsEnabled = parseBoolean(env.SAMPLE_PIPELINE_METRICS_ENABLED, true);
  const metricsPort = parseNumber(env.SAMPLE_PIPELINE_METRICS_PORT, 9464);
  const databaseUrl = optionalString(env.SAMPLE_PIPELINE_DATABASE_URL || env.DATABASE_URL);
  const registryMode = resolveRegistryMode(env.SAMPLE_PIPELINE_REGISTRY, databaseUrl);
  if (registryMode === 'postgres' && !databaseUrl) {
    throw new Error('Set SAMPLE_PIPELINE_DATABASE_URL or DATABASE_URL to use the postgres dedup registry');
  }
  const redisUrl = (env.SAMPLE_PIPELINE_REDIS_URL || env.REDIS_URL || 'redis://127.0.0.1:6379').trim();
  const maxConnections = parseNumber(env.SAMPLE_PIPELINE_PGPOOL_MAX, 5);
  const maxRounds = parseNumber(env.SAMPLE_PIPELINE_DEDUP_MAX_ROUNDS, 3);
  const throttleRetries = parseNumber(env.SAMPLE_PIPELINE_DEDUP_THROTTLE_RETRIES, 3);
  const backoffBaseMs = parseNumber(env.SAMPLE_PIPELINE_DEDUP_BACKOFF_BASE_MS, 1000);
  const queueAttempts = parseNumber(env.SAMPLE_PIPELINE_QUEUE_ATTEMPTS, 3);
  const queueConcurrency = parseNumber(env.SAMPLE_PIPELINE_QUEUE_CONCURRENCY, 1);

  const candidateConfig: ServiceConfig = {
    logLevel,
    metricsEnabled,
    metricsServer: {
      host: env.SAMPLE_PIPELINE_METRICS_HOST || '0.0.0.0',
      port: metricsPort >= 0 && metricsPort <= 65535 ? Math.floor(metricsPort) : 9464
    },
    generator: {
      generatorsPath: env.SAMPLE_PIPELINE_GENERATORS_PATH || '/opt/generators',
      command: env.SAMPLE_PIPELINE_GENERATOR_COMMAND || 'python3',
      entry: env.SAMPLE_PIPELINE_GENERATOR_ENTRY || 'examples/generate.py'
    },
    scratchRoot: env.SAMPLE_PIPELINE_SCRATCH_ROOT || os.tmpdir(),
    samples: {
      domainTaskSuffix: env.SAMPLE_PIPELINE_DOMAIN_TASK_SUFFIX || '_task',
      artifactExtensions: parseExtensions(env.SAMPLE_PIPELINE_ARTIFACT_EXTENSIONS)
    },
    storage: {
      bucket: env.SAMPLE_PIPELINE_OUTPUT_BUCKET || env.OUTPUT_BUCKET || 'vm-dataset-test',
      prefix: normalizePrefix(env.SAMPLE_PIPELINE_OUTPUT_PREFIX ?? 'data/v1'),
      region: env.SAMPLE_PIPELINE_AWS_REGION || env.AWS_REGION || 'us-east-2',
      endpoint: optionalString(env.SAMPLE_PIPELINE_S3_ENDPOINT),
      forcePathStyle: parseBoolean(env.SAMPLE_PIPELINE_S3_FORCE_PATH_STYLE, false),
      accessKeyId: optionalString(env.SAMPLE_PIPELINE_S3_ACCESS_KEY_ID),
      secretAccessKey: optionalString(env.SAMPLE_PIPELINE_S3_SECRET_ACCESS_KEY)
    },
    registry: {
      mode: registryMode,
      databaseUrl,
      schema: env.SAMPLE_PIPELINE_PG_SCHEMA || 'sample_pipeline',
      maxConnections: maxConnections > 0 ? maxConnections : 1
    },
    dedup: {
      maxRounds: maxRounds >= 0 ? Math.floor(maxRounds) : 3,
      throttleRetries: throttleRetries > 0 ? Math.floor(throttleRetries) : 3,
      backoffBaseMs: backoffBaseMs >= 0 ? Math.floor(backoffBaseMs) : 1000
    },
    queue: {
      redisUrl,
      inline: redisUrl === 'inline',
      name: env.SAMPLE_PIPELINE_QUEUE_NAME || 'sample_pipeline_tasks',
      attempts: queueAttempts > 0 ? Math.floor(queueAttempts) : 3,
      concurrency: queueConcurrency > 0 ? Math.floor(queueConcurrency) : 1,
      keyPrefix: env.SAMPLE_PIPELINE_REDIS_KEY_PREFIX || 'sample-pipeline'
    }
  };

  cachedConfig = configSchema.parse(candidateConfig);
  return cachedConfig;
}

export function resetCachedServiceConfig(): void {
  cachedConfig = null;
}
