import test from 'node:test';
import assert from 'node:assert/strict';
import { loadServiceConfig, resetCachedServiceConfig, DEFAULT_ARTIFACT_EXTENSIONS } from '../src/config/serviceConfig';

type EnvOverrides = Record<string, string | undefined>;

const CLEARED_ENV: EnvOverrides = {
  SAMPLE_PIPELINE_DATABASE_URL: undefined,
  DATABASE_URL: undefined,
  SAMPLE_PIPELINE_REGISTRY: undefined,
  SAMPLE_PIPELINE_REDIS_URL: undefined,
  REDIS_URL: undefined,
  SAMPLE_PIPELINE_OUTPUT_BUCKET: undefined,
  OUTPUT_BUCKET: undefined,
  SAMPLE_PIPELINE_AWS_REGION: undefined,
  AWS_REGION: undefined,
  SAMPLE_PIPELINE_OUTPUT_PREFIX: undefined,
  SAMPLE_PIPELINE_ARTIFACT_EXTENSIONS: undefined,
  SAMPLE_PIPELINE_DEDUP_MAX_ROUNDS: undefined,
  SAMPLE_PIPELINE_DEDUP_THROTTLE_RETRIES: undefined,
  SAMPLE_PIPELINE_DEDUP_BACKOFF_BASE_MS: undefined,
  SAMPLE_PIPELINE_LOG_LEVEL: undefined,
  SAMPLE_PIPELINE_METRICS_HOST: undefined,
  SAMPLE_PIPELINE_METRICS_PORT: undefined
};

function withEnv<T>(overrides: EnvOverrides, fn: () => T): T {
  const previous: Record<string, string | undefined> = {};
  for (const [key, value] of Object.entries({ ...CLEARED_ENV, ...overrides })) {
    previous[key] = process.env[key];
    if (value === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }
  try {
    resetCachedServiceConfig();
    return fn();
  } finally {
    for (const [key, value] of Object.entries(previous)) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
    resetCachedServiceConfig();
  }
}

test('uses defaults when nothing is configured', () => {
  withEnv({}, () => {
    const config = loadServiceConfig();
    assert.equal(config.logLevel, 'info');
    assert.equal(config.storage.bucket, 'vm-dataset-test');
    assert.equal(config.storage.prefix, 'data/v1');
    assert.equal(config.storage.region, 'us-east-2');
    assert.equal(config.registry.mode, 'disabled');
    assert.deepEqual(config.dedup, { maxRounds: 3, throttleRetries: 3, backoffBaseMs: 1000 });
    assert.equal(config.queue.redisUrl, 'redis://127.0.0.1:6379');
    assert.equal(config.queue.inline, false);
    assert.deepEqual(config.samples.artifactExtensions, DEFAULT_ARTIFACT_EXTENSIONS);
    assert.deepEqual(config.metricsServer, { host: '0.0.0.0', port: 9464 });
  });
});

test('builds configuration from env overrides', () => {
  withEnv(
    {
      SAMPLE_PIPELINE_LOG_LEVEL: 'DEBUG',
      OUTPUT_BUCKET: 'fallback-bucket',
      SAMPLE_PIPELINE_OUTPUT_BUCKET: 'primary-bucket',
      SAMPLE_PIPELINE_OUTPUT_PREFIX: '/datasets/v2/',
      SAMPLE_PIPELINE_ARTIFACT_EXTENSIONS: 'PNG, .mp4,png',
      DATABASE_URL: 'postgres://registry-db',
      SAMPLE_PIPELINE_DEDUP_MAX_ROUNDS: '5',
      SAMPLE_PIPELINE_DEDUP_BACKOFF_BASE_MS: 'not-a-number',
      SAMPLE_PIPELINE_REDIS_URL: 'inline',
      SAMPLE_PIPELINE_METRICS_HOST: '127.0.0.1',
      SAMPLE_PIPELINE_METRICS_PORT: '70000'
    },
    () => {
      const config = loadServiceConfig();
      assert.equal(config.logLevel, 'debug');
      assert.equal(config.storage.bucket, 'primary-bucket');
      assert.equal(config.storage.prefix, 'datasets/v2');
      assert.deepEqual(config.samples.artifactExtensions, ['.png', '.mp4']);
      assert.equal(config.registry.mode, 'postgres');
      assert.equal(config.registry.databaseUrl, 'postgres://registry-db');
      assert.equal(config.dedup.maxRounds, 5);
      assert.equal(config.dedup.backoffBaseMs, 1000);
      assert.equal(config.queue.inline, true);
      assert.deepEqual(config.metricsServer, { host: '127.0.0.1', port: 9464 });
    }
  );
});

test('caches configuration until reset', () => {
  withEnv({ SAMPLE_PIPELINE_REGISTRY: 'memory' }, () => {
    const first = loadServiceConfig();
    process.env.SAMPLE_PIPELINE_REGISTRY = 'disabled';
    assert.equal(loadServiceConfig(), first);
    resetCachedServiceConfig();
    assert.equal(loadServiceConfig().registry.mode, 'disabled');
  });
});

test('rejects the postgres registry without a database url', () => {
  withEnv({ SAMPLE_PIPELINE_REGISTRY: 'postgres' }, () => {
    assert.throws(() => loadServiceConfig(), /DATABASE_URL/);
  });
});
