import { z } from 'zod';
import { PipelineError } from '../errors';

export const MAX_SEED = 2 ** 31 - 1;

export const outputFormatSchema = z.enum(['files', 'tar']);

export type OutputFormat = z.infer<typeof outputFormatSchema>;

export const taskMessageSchema = z
  .object({
    type: z
      .string()
      .min(1)
      .regex(/^[A-Za-z0-9][A-Za-z0-9._-]*$/, 'generator type must be a single path segment'),
    num_samples: z.number().int().positive(),
    start_index: z.number().int().nonnegative().default(0),
    seed: z.number().int().positive().max(MAX_SEED).nullish(),
    output_format: outputFormatSchema.default('files'),
    output_bucket: z.string().min(1).nullish(),
    dedup: z.boolean().default(false)
  })
  .strict();

export type TaskMessage = Readonly<z.infer<typeof taskMessageSchema>>;

export type TaskMessageInput = z.input<typeof taskMessageSchema>;

export type SeededTaskMessage = TaskMessage & { readonly seed: number };

export type UploadedSample = {
  sample_id: string;
  files_uploaded: number;
};

export type TaskResult = Readonly<{
  generator: string;
  samples_uploaded: number;
  sample_ids: readonly string[];
  tar_files: readonly string[];
}>;

export type DedupStats = {
  duplicatesFound: number;
  retryRounds: number;
  skipped: number;
};

export type TaskOutcome = { ok: true; result: TaskResult } | { ok: false; error: PipelineError };

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const location = issue.path.length > 0 ? issue.path.join('.') : '<root>';
      return `${location}: ${issue.message}`;
    })
    .join('; ');
}

/** Validates an untrusted task payload; throws `VALIDATION_FAILED` before anything is touched. */
export function parseTaskMessage(payload: unknown): TaskMessage {
  const result = taskMessageSchema.safeParse(payload);
  if (!result.success) {
    throw new PipelineError(`Invalid task message: ${formatIssues(result.error)}`, 'VALIDATION_FAILED', {
      issues: result.error.issues.map((issue) => ({ path: issue.path, message: issue.message }))
    });
  }
  return Object.freeze(result.data);
}

export function randomSeed(random: () => number = Math.random): number {
  return 1 + Math.floor(random() * MAX_SEED);
}

export function freezeTaskResult(result: {
  generator: string;
  sample_ids: string[];
  tar_files: string[];
}): TaskResult {
  return Object.freeze({
    generator: result.generator,
    samples_uploaded: result.sample_ids.length,
    sample_ids: Object.freeze([...result.sample_ids]),
    tar_files: Object.freeze([...result.tar_files])
  });
}
