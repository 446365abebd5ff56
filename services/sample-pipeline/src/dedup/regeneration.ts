import { promises as fs } from 'node:fs';
import path from 'node:path';
import { describeError } from '../errors';
import type { SampleGenerator } from '../generator/runner';
import type { Logger } from '../observability/logger';
import type { PipelineMetrics } from '../observability/metrics';
import type { SampleLocator } from '../samples/locator';
import { randomSeed, type DedupStats, type TaskMessage } from '../tasks/types';
import type { DedupChecker } from './checker';
import { readParamHash } from './paramHash';

export interface RegenerationCoordinatorOptions {
  checker: DedupChecker;
  generator: SampleGenerator;
  locator: SampleLocator;
  metrics: PipelineMetrics;
  logger: Logger;
  scratchRoot: string;
  maxRounds?: number;
  random?: () => number;
  processId?: number;
}

export type DedupResult = {
  uniqueIds: string[];
  stats: DedupStats;
};

const DEFAULT_MAX_ROUNDS = 3;

async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

function byNumericId(left: string, right: string): number {
  return Number(left) - Number(right);
}

/**
 * Checks a batch of freshly renamed samples against the dedup registry and
 * replaces duplicates with regenerated content, a bounded number of times.
 *
 * Regenerated directories are paired with duplicate ids by position, which
 * assumes the generator emits samples in a stable order.
 */
export class RegenerationCoordinator {
  private readonly options: RegenerationCoordinatorOptions;
  private readonly logger: Logger;
  private readonly maxRounds: number;
  private readonly random: () => number;
  private readonly processId: number;

  constructor(options: RegenerationCoordinatorOptions) {
    this.options = options;
    this.logger = options.logger.child({ component: 'regeneration' });
    this.maxRounds = Math.max(0, options.maxRounds ?? DEFAULT_MAX_ROUNDS);
    this.random = options.random ?? Math.random;
    this.processId = options.processId ?? process.pid;
  }

  async dedupSamples(domainTaskDir: string, sampleIds: readonly string[], task: TaskMessage): Promise<DedupResult> {
    const uniqueIds: string[] = [];
    let pending = [...sampleIds];
    let duplicatesFound = 0;
    let retryRounds = 0;

    for (let round = 0; round <= this.maxRounds; round += 1) {
      const duplicates: string[] = [];

      for (const sampleId of pending) {
        const sampleDir = path.join(domainTaskDir, sampleId);
        if (!(await pathExists(sampleDir))) {
          this.logger.warn('Sample directory missing, skipping', { sampleId });
          duplicatesFound += 1;
          continue;
        }

        const paramHash = await readParamHash(sampleDir);
        if (!paramHash) {
          this.logger.warn('No param hash, skipping dedup check', { sampleId });
          uniqueIds.push(sampleId);
          continue;
        }

        if (await this.options.checker.checkAndRegister(task.type, paramHash, sampleId)) {
          this.logger.debug('Dedup ok', { sampleId, paramHash });
          uniqueIds.push(sampleId);
        } else {
          this.logger.warn('Duplicate sample', { sampleId, paramHash });
          duplicates.push(sampleId);
          duplicatesFound += 1;
        }
      }

      if (duplicates.length === 0) {
        break;
      }

      if (round === this.maxRounds) {
        this.logger.warn('Dropping samples after exhausting regeneration rounds', {
          sampleIds: duplicates,
          rounds: this.maxRounds
        });
        await this.removeSamples(domainTaskDir, duplicates);
        break;
      }

      retryRounds += 1;
      this.logger.info('Batch regenerating duplicates', { round: round + 1, count: duplicates.length });
      pending = await this.batchRegenerate(duplicates, domainTaskDir, task);
      if (pending.length === 0) {
        break;
      }
    }

    const stats: DedupStats = {
      duplicatesFound,
      retryRounds,
      skipped: sampleIds.length - uniqueIds.length
    };
    this.options.metrics.recordDedup({ generator: task.type, ...stats });

    return { uniqueIds: uniqueIds.sort(byNumericId), stats };
  }

  /**
   * Regenerates `duplicateIds.length` samples in one generator call and moves
   * them into the duplicate slots. A failed or empty call is retried with a
   * new seed. Resolves the ids that received new content; slots left without
   * a counterpart, or every slot when all attempts fail, are removed.
   */
  async batchRegenerate(duplicateIds: readonly string[], domainTaskDir: string, task: TaskMessage): Promise<string[]> {
    const count = duplicateIds.length;
    const attempts = Math.max(1, this.maxRounds);

    for (let attempt = 0; attempt < attempts; attempt += 1) {
      const seed = randomSeed(this.random);
      const retryOutputDir = await fs.mkdtemp(
        path.join(this.options.scratchRoot, `dedup_retry_${task.type}_${this.processId}_${seed}_`)
      );
      this.logger.info('Regenerating samples', { count, seed, attempt: attempt + 1, maxAttempts: attempts });

      try {
        await this.options.generator.run({ type: task.type, numSamples: count, seed }, retryOutputDir);
        const generated = await this.options.locator.collectGeneratedSamples(retryOutputDir);
        if (generated.length === 0) {
          this.logger.warn('Regeneration produced no samples, retrying with a new seed', { seed });
          continue;
        }

        const replaced: string[] = [];
        for (const [index, sampleId] of duplicateIds.entries()) {
          const targetDir = path.join(domainTaskDir, sampleId);
          await fs.rm(targetDir, { recursive: true, force: true });
          const replacement = generated[index];
          if (replacement) {
            await fs.rename(replacement, targetDir);
            replaced.push(sampleId);
          } else {
            this.logger.warn('Not enough regenerated samples, dropping slot', {
              sampleId,
              generated: generated.length
            });
          }
        }
        return replaced;
      } catch (err) {
        this.logger.warn('Regeneration attempt failed', { attempt: attempt + 1, error: describeError(err) });
      } finally {
        await fs.rm(retryOutputDir, { recursive: true, force: true });
      }
    }

    this.logger.warn('Regeneration failed, dropping samples', { count, attempts });
    await this.removeSamples(domainTaskDir, duplicateIds);
    return [];
  }

  private async removeSamples(domainTaskDir: string, sampleIds: readonly string[]): Promise<void> {
    for (const sampleId of sampleIds) {
      await fs.rm(path.join(domainTaskDir, sampleId), { recursive: true, force: true });
    }
  }
}
