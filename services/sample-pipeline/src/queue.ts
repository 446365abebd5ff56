import { Queue, UnrecoverableError } from 'bullmq';
import IORedis, { type Redis } from 'ioredis';
import type { ServiceConfig } from './config/serviceConfig';
import type { FailedTaskJob } from './deadLetters/redrive';
import { PipelineError } from './errors';
import { logger as rootLogger, type Logger } from './observability/logger';
import type { PipelineMetrics, QueueCounts } from './observability/metrics';
import type { TaskProcessor } from './pipeline/processor';
import { parseTaskMessage, type TaskMessage, type TaskResult } from './tasks/types';

export type EnqueueResult =
  | { mode: 'inline'; jobId: string; result: TaskResult }
  | { mode: 'queued'; jobId: string };

export interface TaskQueueOptions {
  queue: ServiceConfig['queue'];
  backoffBaseMs: number;
  metrics: PipelineMetrics;
  /** Runs tasks in process when the queue is inline. */
  processor?: TaskProcessor;
  logger?: Logger;
}

/**
 * Runs one job payload. Invalid payloads are unrecoverable so BullMQ moves
 * them straight to the failed set; any other failure is thrown for retry.
 */
export async function runTaskJob(data: unknown, processor: TaskProcessor): Promise<TaskResult> {
  let task: TaskMessage;
  try {
    task = parseTaskMessage(data);
  } catch (err) {
    if (err instanceof PipelineError) {
      throw new UnrecoverableError(err.message);
    }
    throw err;
  }

  const outcome = await processor.process(task);
  if (!outcome.ok) {
    throw outcome.error;
  }
  return outcome.result;
}

export function createRedisConnection(redisUrl: string, log: Logger): Redis {
  const connection = new IORedis(redisUrl, {
    maxRetriesPerRequest: null
  });
  connection.on('error', (err) => {
    log.error('Redis connection error', { error: err });
  });
  return connection;
}

export class TaskQueue {
  private readonly options: TaskQueueOptions;
  private readonly logger: Logger;
  private connection: Redis | null = null;
  private queue: Queue<TaskMessage> | null = null;

  constructor(options: TaskQueueOptions) {
    this.options = options;
    this.logger = (options.logger ?? rootLogger).child({ component: 'task-queue' });
  }

  get inline(): boolean {
    return this.options.queue.inline;
  }

  private ensureQueue(): Queue<TaskMessage> {
    if (this.queue) {
      return this.queue;
    }
    this.connection = createRedisConnection(this.options.queue.redisUrl, this.logger);
    this.queue = new Queue<TaskMessage>(this.options.queue.name, {
      connection: this.connection,
      prefix: `${this.options.queue.keyPrefix}:bull`
    });
    return this.queue;
  }

  async enqueue(payload: unknown): Promise<EnqueueResult> {
    const task = parseTaskMessage(payload);

    if (this.inline) {
      if (!this.options.processor) {
        throw new Error('Inline task queue requires a processor');
      }
      const result = await runTaskJob(task, this.options.processor);
      return { mode: 'inline', jobId: `inline:${Date.now()}`, result };
    }

    const queue = this.ensureQueue();
    const job = await queue.add(task.type, task, {
      attempts: this.options.queue.attempts,
      backoff: { type: 'exponential', delay: this.options.backoffBaseMs },
      removeOnComplete: true,
      removeOnFail: false
    });
    this.logger.info('Enqueued task', { jobId: job.id, generator: task.type, numSamples: task.num_samples });
    await this.refreshQueueDepth();
    return { mode: 'queued', jobId: String(job.id) };
  }

  async getFailedJobs(start: number, end: number): Promise<FailedTaskJob[]> {
    if (this.inline) {
      throw new Error('Failed jobs are only kept by a Redis-backed queue');
    }
    return this.ensureQueue().getFailed(start, end);
  }

  async refreshQueueDepth(): Promise<void> {
    const counts: QueueCounts = {};
    if (this.inline) {
      this.options.metrics.recordQueueDepth(counts);
      return;
    }
    try {
      const jobCounts = await this.ensureQueue().getJobCounts('waiting', 'active', 'completed', 'failed', 'delayed', 'paused');
      Object.assign(counts, jobCounts);
    } catch (err) {
      this.logger.warn('Failed to fetch job counts', { error: err });
    }
    this.options.metrics.recordQueueDepth(counts);
  }

  async close(): Promise<void> {
    if (this.queue) {
      await this.queue.close();
      this.queue = null;
    }
    if (this.connection) {
      await this.connection.quit();
      this.connection = null;
    }
  }
}
