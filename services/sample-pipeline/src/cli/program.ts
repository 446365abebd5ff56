import { Command, InvalidArgumentError } from 'commander';
import { loadServiceConfig } from '../config/serviceConfig';
import { redriveFailedJobs, type FailedJobSource } from '../deadLetters/redrive';
import { reseedDeadLetters } from '../deadLetters/reseed';
import { createNoopMetrics } from '../observability/metrics';
import { createPipeline } from '../pipeline/bootstrap';
import { TaskQueue, type EnqueueResult } from '../queue';

type Output = (line: string) => void;

export type Submitter = {
  enqueue(payload: unknown): Promise<EnqueueResult>;
  close(): Promise<void>;
};

export type FailedJobConnection = FailedJobSource & {
  close(): Promise<void>;
};

type CliDependencies = {
  submitterFactory?: () => Promise<Submitter>;
  failedJobsFactory?: () => Promise<FailedJobConnection>;
  random?: () => number;
  output?: Output;
};

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError(`expected an integer, got "${value}"`);
  }
  return parsed;
}

async function createSubmitter(): Promise<Submitter> {
  const config = loadServiceConfig();
  const pipeline = config.queue.inline ? await createPipeline(config) : null;
  const queue = new TaskQueue({
    queue: config.queue,
    backoffBaseMs: config.dedup.backoffBaseMs,
    metrics: pipeline?.metrics ?? createNoopMetrics(),
    processor: pipeline?.processor
  });
  return {
    enqueue: (payload) => queue.enqueue(payload),
    async close() {
      await queue.close();
      await pipeline?.close();
    }
  };
}

async function connectFailedJobs(): Promise<FailedJobConnection> {
  const config = loadServiceConfig();
  if (config.queue.inline) {
    throw new Error('dead-letters:redrive needs a Redis-backed queue; SAMPLE_PIPELINE_REDIS_URL is inline');
  }
  const queue = new TaskQueue({
    queue: config.queue,
    backoffBaseMs: config.dedup.backoffBaseMs,
    metrics: createNoopMetrics()
  });
  return {
    getFailedJobs: (start, end) => queue.getFailedJobs(start, end),
    close: () => queue.close()
  };
}

type ReseedCommandOptions = {
  min: number;
  max: number;
  backup: boolean;
  dryRun?: boolean;
};

type RedriveCommandOptions = {
  min: number;
  max: number;
  limit: number;
  dryRun?: boolean;
};

type SubmitCommandOptions = {
  type: string;
  numSamples: number;
  startIndex: number;
  seed?: number;
  outputFormat: string;
  bucket?: string;
  dedup?: boolean;
};

export function createInterface(deps: CliDependencies = {}): Command {
  const output: Output = deps.output ?? ((line) => console.log(line));
  const submitterFactory = deps.submitterFactory ?? createSubmitter;
  const failedJobsFactory = deps.failedJobsFactory ?? connectFailedJobs;

  const program = new Command();
  program.name('sample-pipeline').description('Operator tooling for the sample pipeline');

  program
    .command('dead-letters:reseed')
    .description('Give dead-lettered task messages fresh seeds before redriving them')
    .argument('<dir>', 'Directory containing dead-lettered message JSON files')
    .option('--min <seed>', 'Minimum seed value', parseInteger, 1)
    .option('--max <seed>', 'Maximum seed value', parseInteger, 100_000)
    .option('--no-backup', 'Do not write .bak copies before modifying files')
    .option('--dry-run', 'Preview changes without modifying files')
    .action(async (dir: string, options: ReseedCommandOptions) => {
      const summary = await reseedDeadLetters(dir, {
        seedMin: options.min,
        seedMax: options.max,
        backup: options.backup,
        dryRun: Boolean(options.dryRun),
        random: deps.random
      });
      for (const outcome of summary.files) {
        if (outcome.status === 'updated') {
          const verb = options.dryRun ? 'Would update' : 'Updated';
          output(`${verb} ${outcome.file}: seed ${String(outcome.oldSeed)} -> ${outcome.newSeed}`);
        } else {
          output(`Skipping ${outcome.file}: ${outcome.reason}`);
        }
      }
      output(`Total files processed: ${summary.total}`);
      output(`Files updated: ${summary.updated}`);
      output(`Files skipped: ${summary.skipped}`);
    });

  program
    .command('dead-letters:redrive')
    .description('Give failed queue jobs fresh seeds and move them back to waiting')
    .option('--min <seed>', 'Minimum seed value', parseInteger, 1)
    .option('--max <seed>', 'Maximum seed value', parseInteger, 100_000)
    .option('--limit <count>', 'Maximum number of failed jobs to redrive', parseInteger, 100)
    .option('--dry-run', 'Preview changes without touching the queue')
    .action(async (options: RedriveCommandOptions) => {
      const source = await failedJobsFactory();
      try {
        const summary = await redriveFailedJobs(source, {
          seedMin: options.min,
          seedMax: options.max,
          limit: options.limit,
          dryRun: Boolean(options.dryRun),
          random: deps.random
        });
        for (const outcome of summary.jobs) {
          if (outcome.status === 'redriven') {
            const verb = options.dryRun ? 'Would redrive' : 'Redrove';
            output(`${verb} job ${outcome.jobId}: seed ${String(outcome.oldSeed)} -> ${outcome.newSeed}`);
          } else {
            output(`Failed to redrive job ${outcome.jobId}: ${outcome.reason}`);
          }
        }
        output(`Failed jobs inspected: ${summary.total}`);
        output(`Jobs redriven: ${summary.redriven}`);
        output(`Jobs not redriven: ${summary.failed}`);
      } finally {
        await source.close();
      }
    });

  program
    .command('tasks:submit')
    .description('Validate a generation task and enqueue it')
    .requiredOption('--type <generator>', 'Generator type')
    .requiredOption('--num-samples <count>', 'Number of samples to generate', parseInteger)
    .option('--start-index <index>', 'First global sample id', parseInteger, 0)
    .option('--seed <seed>', 'Generator seed', parseInteger)
    .option('--output-format <format>', 'files or tar', 'files')
    .option('--bucket <bucket>', 'Override the output bucket')
    .option('--dedup', 'Check samples against the dedup registry')
    .action(async (options: SubmitCommandOptions) => {
      const submitter = await submitterFactory();
      try {
        const result = await submitter.enqueue({
          type: options.type,
          num_samples: options.numSamples,
          start_index: options.startIndex,
          seed: options.seed,
          output_format: options.outputFormat,
          output_bucket: options.bucket,
          dedup: Boolean(options.dedup)
        });
        output(JSON.stringify(result));
      } finally {
        await submitter.close();
      }
    });

  return program;
}
