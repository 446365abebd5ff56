export { loadServiceConfig, resetCachedServiceConfig, type ServiceConfig } from './config/serviceConfig';
export { PipelineError, RegistryThrottledError, isPipelineError, type PipelineErrorCode } from './errors';
export { createLogger, logger, setLogLevel, setLogSink, type Logger } from './observability/logger';
export { createNoopMetrics, createPipelineMetrics, type PipelineMetrics } from './observability/metrics';
export {
  parseTaskMessage,
  type DedupStats,
  type OutputFormat,
  type TaskMessage,
  type TaskMessageInput,
  type TaskOutcome,
  type TaskResult
} from './tasks/types';
export { SampleLocator, compareSampleNames } from './samples/locator';
export { GeneratorRunner, type GenerationRequest, type SampleGenerator } from './generator/runner';
export type { DedupRecord, DedupRegistry, InsertOutcome } from './registry/types';
export { InMemoryDedupRegistry } from './registry/memoryRegistry';
export { PostgresDedupRegistry, isThrottleError } from './registry/postgresRegistry';
export { runMigrations } from './db/migrations';
export { DedupChecker } from './dedup/checker';
export { RegenerationCoordinator, type DedupResult } from './dedup/regeneration';
export { SampleUploader, type UploadSamplesInput, type UploadSamplesResult } from './storage/uploader';
export { createS3Client, createS3ObjectStore, type ObjectStore, type PutObjectInput } from './storage/objectStore';
export { TaskProcessor, type TaskProcessorDependencies, type TaskProcessorSettings } from './pipeline/processor';
export { extractTaskMessages, handleInvocation, type InvocationResult } from './pipeline/handler';
export { createPipeline, type Pipeline } from './pipeline/bootstrap';
export { TaskQueue, runTaskJob, type EnqueueResult } from './queue';
export { reseedDeadLetters, type ReseedOptions, type ReseedSummary } from './deadLetters/reseed';
export {
  redriveFailedJobs,
  type FailedJobSource,
  type FailedTaskJob,
  type RedriveOptions,
  type RedriveSummary
} from './deadLetters/redrive';
export { createMetricsServer, type MetricsServerOptions } from './observability/metricsServer';
