import { Registry } from 'prom-client';
import type { ServiceConfig } from '../config/serviceConfig';
import { createPostgresHandle } from '../db/client';
import { runMigrations } from '../db/migrations';
import { GeneratorRunner } from '../generator/runner';
import { logger as rootLogger, setLogLevel } from '../observability/logger';
import { createPipelineMetrics, type PipelineMetrics } from '../observability/metrics';
import { InMemoryDedupRegistry } from '../registry/memoryRegistry';
import { PostgresDedupRegistry } from '../registry/postgresRegistry';
import type { DedupRegistry } from '../registry/types';
import { SampleLocator } from '../samples/locator';
import { createS3Client, createS3ObjectStore } from '../storage/objectStore';
import { SampleUploader } from '../storage/uploader';
import { TaskProcessor } from './processor';

export type Pipeline = {
  processor: TaskProcessor;
  metrics: PipelineMetrics;
  metricsRegistry: Registry;
  registry: DedupRegistry | null;
  close(): Promise<void>;
};

async function createDedupRegistry(config: ServiceConfig): Promise<DedupRegistry | null> {
  switch (config.registry.mode) {
    case 'postgres': {
      const handle = createPostgresHandle(config.registry);
      const applied = await runMigrations(handle.execute, config.registry.schema);
      if (applied.length > 0) {
        rootLogger.info('Applied registry migrations', { component: 'bootstrap', migrations: applied });
      }
      return new PostgresDedupRegistry(handle.execute, config.registry.schema, () => handle.close());
    }
    case 'memory':
      return new InMemoryDedupRegistry();
    case 'disabled':
      return null;
  }
}

/** Wires the production collaborators described by `config`. */
export async function createPipeline(config: ServiceConfig): Promise<Pipeline> {
  setLogLevel(config.logLevel);
  const metricsRegistry = new Registry();
  const metrics = createPipelineMetrics({ enabled: config.metricsEnabled, registry: metricsRegistry });
  const registry = await createDedupRegistry(config);
  rootLogger.info('Dedup registry selected', { component: 'bootstrap', registry: registry?.kind ?? 'disabled' });
  const s3 = createS3Client(config.storage);

  const processor = new TaskProcessor({
    settings: {
      scratchRoot: config.scratchRoot,
      defaultBucket: config.storage.bucket,
      maxRounds: config.dedup.maxRounds,
      throttleRetries: config.dedup.throttleRetries,
      backoffBaseMs: config.dedup.backoffBaseMs
    },
    generator: new GeneratorRunner({ ...config.generator, logger: rootLogger }),
    locator: new SampleLocator({ ...config.samples, logger: rootLogger }),
    uploader: new SampleUploader({ store: createS3ObjectStore(s3), prefix: config.storage.prefix, logger: rootLogger }),
    registry,
    metrics,
    logger: rootLogger
  });

  return {
    processor,
    metrics,
    metricsRegistry,
    registry,
    async close() {
      s3.destroy();
      await registry?.close?.();
    }
  };
}
