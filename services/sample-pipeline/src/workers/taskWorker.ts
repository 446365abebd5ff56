import { Worker } from 'bullmq';
import { loadServiceConfig } from '../config/serviceConfig';
import { logger as rootLogger } from '../observability/logger';
import { createMetricsServer } from '../observability/metricsServer';
import { createPipeline } from '../pipeline/bootstrap';
import { createRedisConnection, runTaskJob, TaskQueue } from '../queue';
import type { TaskMessage, TaskResult } from '../tasks/types';

const log = rootLogger.child({ component: 'task-worker' });

async function main(): Promise<void> {
  const config = loadServiceConfig();
  if (config.queue.inline) {
    log.info('Inline queue mode active; worker not started');
    return;
  }

  const pipeline = await createPipeline(config);
  const queue = new TaskQueue({ queue: config.queue, backoffBaseMs: config.dedup.backoffBaseMs, metrics: pipeline.metrics });
  const connection = createRedisConnection(config.queue.redisUrl, log);
  const metricsServer = createMetricsServer({ registry: pipeline.metricsRegistry, enabled: config.metricsEnabled });
  const metricsAddress = await metricsServer.listen({ host: config.metricsServer.host, port: config.metricsServer.port });
  log.info('Metrics endpoint listening', { address: `${metricsAddress}/metrics` });

  const worker = new Worker<TaskMessage, TaskResult>(
    config.queue.name,
    async (job) => runTaskJob(job.data, pipeline.processor),
    {
      connection,
      concurrency: config.queue.concurrency,
      prefix: `${config.queue.keyPrefix}:bull`
    }
  );

  worker.on('completed', (job) => {
    log.info('Task job completed', {
      jobId: job.id,
      generator: job.returnvalue.generator,
      samplesUploaded: job.returnvalue.samples_uploaded
    });
    void queue.refreshQueueDepth();
  });

  worker.on('failed', (job, err) => {
    const attemptsAllowed = job?.opts.attempts ?? 1;
    log.error('Task job failed', {
      jobId: job?.id,
      generator: job?.data.type ?? null,
      attemptsMade: job?.attemptsMade ?? null,
      deadLettered: job ? job.attemptsMade >= attemptsAllowed : null,
      error: err.message
    });
    void queue.refreshQueueDepth();
  });

  worker.on('error', (err) => {
    log.error('Worker error', { error: err });
  });

  log.info('Worker running', { queue: config.queue.name, concurrency: config.queue.concurrency });

  const shutdown = async (signal: NodeJS.Signals) => {
    log.info('Shutting down', { signal });
    await worker.close();
    await queue.close();
    await connection.quit();
    await metricsServer.close();
    await pipeline.close();
    process.exit(0);
  };

  process.on('SIGINT', (signal) => {
    void shutdown(signal);
  });
  process.on('SIGTERM', (signal) => {
    void shutdown(signal);
  });
}

main().catch((err) => {
  log.error('Fatal error', { error: err });
  process.exit(1);
});
