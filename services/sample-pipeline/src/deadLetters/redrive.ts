import { describeError } from '../errors';
import { MAX_SEED, type TaskMessage } from '../tasks/types';
import { drawSeed, resolveSeedBounds } from './reseed';

/** The part of a BullMQ job the redrive needs. */
export interface FailedTaskJob {
  readonly id?: string;
  readonly data: TaskMessage;
  updateData(data: TaskMessage): Promise<void>;
  retry(): Promise<void>;
}

export interface FailedJobSource {
  /** `end` is inclusive, as in BullMQ's range queries. */
  getFailedJobs(start: number, end: number): Promise<FailedTaskJob[]>;
}

export type RedriveOptions = {
  seedMin?: number;
  seedMax?: number;
  limit?: number;
  dryRun?: boolean;
  random?: () => number;
};

export type RedriveJobOutcome =
  | { jobId: string; status: 'redriven'; oldSeed: number | null; newSeed: number }
  | { jobId: string; status: 'failed'; reason: string };

export type RedriveSummary = {
  total: number;
  redriven: number;
  failed: number;
  jobs: RedriveJobOutcome[];
};

const DEFAULT_LIMIT = 100;

/**
 * Gives failed queue jobs fresh seeds and moves them back to waiting. A job
 * that cannot be updated or retried is reported and the rest still run.
 */
export async function redriveFailedJobs(source: FailedJobSource, options: RedriveOptions = {}): Promise<RedriveSummary> {
  const { seedMin, seedMax } = resolveSeedBounds(options.seedMin, options.seedMax);
  if (seedMax > MAX_SEED) {
    throw new Error(`seed-max must not exceed ${MAX_SEED}`);
  }
  const limit = options.limit ?? DEFAULT_LIMIT;
  if (!Number.isInteger(limit) || limit < 1) {
    throw new Error('limit must be a positive integer');
  }
  const random = options.random ?? Math.random;

  const failedJobs = await source.getFailedJobs(0, limit - 1);
  const jobs: RedriveJobOutcome[] = [];
  for (const job of failedJobs) {
    const jobId = job.id ?? 'unknown';
    const oldSeed = job.data.seed ?? null;
    const newSeed = drawSeed(seedMin, seedMax, random);
    if (options.dryRun) {
      jobs.push({ jobId, status: 'redriven', oldSeed, newSeed });
      continue;
    }
    try {
      await job.updateData({ ...job.data, seed: newSeed });
      await job.retry();
      jobs.push({ jobId, status: 'redriven', oldSeed, newSeed });
    } catch (err) {
      jobs.push({ jobId, status: 'failed', reason: describeError(err) });
    }
  }

  const redriven = jobs.filter((outcome) => outcome.status === 'redriven').length;
  return { total: jobs.length, redriven, failed: jobs.length - redriven, jobs };
}
