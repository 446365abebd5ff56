import { Counter, Gauge, Histogram, type Registry } from 'prom-client';

type QueueState = 'waiting' | 'active' | 'completed' | 'failed' | 'delayed' | 'paused';
export type TaskOutcomeLabel = 'success' | 'failure';

export type QueueCounts = Partial<Record<QueueState, number>>;

export interface DedupMetricsInput {
  generator: string;
  duplicatesFound: number;
  retryRounds: number;
  skipped: number;
}

/** Fire-and-forget telemetry sink used by the pipeline. */
export interface PipelineMetrics {
  readonly enabled: boolean;
  recordTaskResult(generator: string, outcome: TaskOutcomeLabel): void;
  observeTaskDuration(generator: string, outcome: TaskOutcomeLabel, seconds: number): void;
  recordSamplesUploaded(generator: string, count: number): void;
  recordDedup(input: DedupMetricsInput): void;
  recordQueueDepth(counts: QueueCounts): void;
}

export interface PipelineMetricsOptions {
  enabled: boolean;
  registry?: Registry | null;
  prefix?: string;
}

const DEFAULT_PREFIX = 'sample_pipeline_';
const DURATION_BUCKETS = [1, 5, 15, 30, 60, 120, 300, 600, 900];
const QUEUE_STATES: QueueState[] = ['waiting', 'active', 'completed', 'failed', 'delayed', 'paused'];

export function createPipelineMetrics(options: PipelineMetricsOptions): PipelineMetrics {
  const prefix = options.prefix ?? DEFAULT_PREFIX;
  const registers = options.enabled && options.registry ? [options.registry] : undefined;

  const counter = (name: string, help: string, labelNames: string[]) =>
    options.enabled ? new Counter({ name: `${prefix}${name}`, help, labelNames, registers }) : null;

  const tasks = counter('tasks_total', 'Task outcomes grouped by generator and result', ['generator', 'outcome']);
  const samplesUploaded = counter('samples_uploaded_total', 'Samples transferred to bulk storage', ['generator']);
  const duplicatesFound = counter(
    'dedup_duplicates_found_total',
    'Samples whose param hash was already owned by another sample',
    ['generator']
  );
  const retryRounds = counter('dedup_retry_rounds_total', 'Batch regeneration rounds issued', ['generator']);
  const skipped = counter('dedup_skipped_total', 'Samples dropped after exhausting regeneration', ['generator']);

  const taskDuration = options.enabled
    ? new Histogram({
        name: `${prefix}task_duration_seconds`,
        help: 'Task processing duration in seconds grouped by generator and outcome',
        labelNames: ['generator', 'outcome'],
        buckets: DURATION_BUCKETS,
        registers
      })
    : null;

  const queueDepth = options.enabled
    ? new Gauge({
        name: `${prefix}queue_depth`,
        help: 'Task queue depth grouped by BullMQ state',
        labelNames: ['state'],
        registers
      })
    : null;

  return {
    enabled: options.enabled,
    recordTaskResult(generator, outcome) {
      tasks?.labels(generator, outcome).inc();
    },
    observeTaskDuration(generator, outcome, seconds) {
      taskDuration?.labels(generator, outcome).observe(seconds);
    },
    recordSamplesUploaded(generator, count) {
      samplesUploaded?.labels(generator).inc(count);
    },
    recordDedup(input) {
      duplicatesFound?.labels(input.generator).inc(input.duplicatesFound);
      retryRounds?.labels(input.generator).inc(input.retryRounds);
      skipped?.labels(input.generator).inc(input.skipped);
    },
    recordQueueDepth(counts) {
      if (!queueDepth) {
        return;
      }
      for (const state of QUEUE_STATES) {
        queueDepth.labels(state).set(counts[state] ?? 0);
      }
    }
  };
}

export function createNoopMetrics(): PipelineMetrics {
  return createPipelineMetrics({ enabled: false });
}
