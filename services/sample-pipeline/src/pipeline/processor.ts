import { promises as fs } from 'node:fs';
import path from 'node:path';
import { PipelineError, toPipelineError } from '../errors';
import { DedupChecker } from '../dedup/checker';
import { RegenerationCoordinator } from '../dedup/regeneration';
import type { SampleGenerator } from '../generator/runner';
import type { Logger } from '../observability/logger';
import type { PipelineMetrics } from '../observability/metrics';
import type { DedupRegistry } from '../registry/types';
import type { Sleep } from '../retries/backoff';
import type { SampleLocator } from '../samples/locator';
import type { SampleUploader } from '../storage/uploader';
import {
  freezeTaskResult,
  randomSeed,
  type SeededTaskMessage,
  type TaskMessage,
  type TaskOutcome,
  type TaskResult
} from '../tasks/types';

export interface TaskProcessorSettings {
  scratchRoot: string;
  defaultBucket: string;
  maxRounds: number;
  throttleRetries: number;
  backoffBaseMs: number;
}

export interface TaskProcessorDependencies {
  settings: TaskProcessorSettings;
  generator: SampleGenerator;
  locator: SampleLocator;
  uploader: SampleUploader;
  /** `null` disables dedup even for tasks that request it. */
  registry: DedupRegistry | null;
  metrics: PipelineMetrics;
  logger: Logger;
  random?: () => number;
  sleep?: Sleep;
  processId?: number;
}

/**
 * Runs one task end to end. Failures come back as `{ ok: false }`; nothing
 * here retries a failed task, that is left to the invocation layer.
 */
export class TaskProcessor {
  private readonly deps: TaskProcessorDependencies;
  private readonly logger: Logger;
  private readonly coordinator: RegenerationCoordinator | null;
  private readonly random: () => number;
  private readonly processId: number;

  constructor(deps: TaskProcessorDependencies) {
    this.deps = deps;
    this.logger = deps.logger.child({ component: 'processor' });
    this.random = deps.random ?? Math.random;
    this.processId = deps.processId ?? process.pid;
    this.coordinator = deps.registry
      ? new RegenerationCoordinator({
          checker: new DedupChecker({
            registry: deps.registry,
            logger: deps.logger,
            maxThrottleRetries: deps.settings.throttleRetries,
            backoffBaseMs: deps.settings.backoffBaseMs,
            sleep: deps.sleep
          }),
          generator: deps.generator,
          locator: deps.locator,
          metrics: deps.metrics,
          logger: deps.logger,
          scratchRoot: deps.settings.scratchRoot,
          maxRounds: deps.settings.maxRounds,
          random: this.random,
          processId: this.processId
        })
      : null;
  }

  async process(task: TaskMessage): Promise<TaskOutcome> {
    const seeded = this.withSeed(task);
    const startedAt = process.hrtime.bigint();
    const elapsedSeconds = () => Number(process.hrtime.bigint() - startedAt) / 1e9;

    try {
      const result = await this.processSamples(seeded);
      this.deps.metrics.observeTaskDuration(task.type, 'success', elapsedSeconds());
      this.deps.metrics.recordTaskResult(task.type, 'success');
      this.deps.metrics.recordSamplesUploaded(task.type, result.samples_uploaded);
      return { ok: true, result };
    } catch (err) {
      const error = toPipelineError(err);
      this.deps.metrics.observeTaskDuration(task.type, 'failure', elapsedSeconds());
      this.deps.metrics.recordTaskResult(task.type, 'failure');
      this.logger.error('Task failed', { generator: task.type, code: error.code, error: error.message });
      return { ok: false, error };
    }
  }

  private withSeed(task: TaskMessage): SeededTaskMessage {
    if (task.seed !== undefined && task.seed !== null) {
      return Object.freeze({ ...task, seed: task.seed });
    }
    const seed = randomSeed(this.random);
    this.logger.info('No seed provided, using random seed', { generator: task.type, seed });
    return Object.freeze({ ...task, seed });
  }

  private async processSamples(task: SeededTaskMessage): Promise<TaskResult> {
    const bucket = task.output_bucket ?? this.deps.settings.defaultBucket;
    // unique per invocation: a worker runs several jobs under one pid
    const outputDir = await fs.mkdtemp(
      path.join(this.deps.settings.scratchRoot, `output_${task.type}_${this.processId}_`)
    );

    try {
      await this.deps.generator.run({ type: task.type, numSamples: task.num_samples, seed: task.seed }, outputDir);

      const questionsDir = await this.deps.locator.findQuestionsDirectory(outputDir);
      this.logger.info('Using questions directory', { questionsDir });

      const sampleIds: string[] = [];
      const tarFiles: string[] = [];
      let foundAnyTaskDir = false;
      let nextIndex = task.start_index;

      // ids stay unique across domain-task directories of one task
      for (const domainTaskDir of await this.deps.locator.findDomainTaskDirectories(questionsDir)) {
        let renamed = await this.deps.locator.renameSamples(domainTaskDir, nextIndex);
        if (renamed.length === 0) {
          continue;
        }
        foundAnyTaskDir = true;
        nextIndex += renamed.length;

        if (task.dedup) {
          renamed = await this.dedup(domainTaskDir, renamed, task);
          if (renamed.length === 0) {
            this.logger.warn('All samples were duplicates, skipping upload', { domainTaskDir });
            continue;
          }
        }

        const batch = await this.deps.uploader.uploadSamples({
          domainTaskDir,
          sampleIds: renamed,
          taskType: task.type,
          outputFormat: task.output_format,
          bucket
        });
        sampleIds.push(...batch.uploaded.map((sample) => sample.sample_id));
        if (batch.tarFile) {
          tarFiles.push(batch.tarFile);
        }
      }

      if (!foundAnyTaskDir) {
        throw new PipelineError(`No task directories with samples found in ${questionsDir}`, 'NOT_FOUND', {
          questionsDir
        });
      }

      this.logger.info('Task complete', { generator: task.type, samplesUploaded: sampleIds.length });
      return freezeTaskResult({ generator: task.type, sample_ids: sampleIds, tar_files: tarFiles });
    } finally {
      await fs.rm(outputDir, { recursive: true, force: true });
    }
  }

  private async dedup(domainTaskDir: string, sampleIds: string[], task: SeededTaskMessage): Promise<string[]> {
    if (!this.coordinator) {
      this.logger.warn('No dedup registry configured, skipping dedup', { generator: task.type });
      return sampleIds;
    }
    this.logger.info('Dedup enabled, checking samples', { count: sampleIds.length });
    const { uniqueIds, stats } = await this.coordinator.dedupSamples(domainTaskDir, sampleIds, task);
    this.logger.info('Dedup finished', { unique: uniqueIds.length, total: sampleIds.length, ...stats });
    return uniqueIds;
  }
}
