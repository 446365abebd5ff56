import { z } from 'zod';
import { PipelineError } from '../errors';
import { parseTaskMessage, type TaskMessage, type TaskResult } from '../tasks/types';
import type { TaskProcessor } from './processor';

const recordWithBodySchema = z.object({ body: z.string() }).passthrough();

export type InvocationResult = {
  status: 'ok';
  processed: number;
  results: TaskResult[];
};

function parseRecordBody(body: string, index: number): unknown {
  try {
    return JSON.parse(body);
  } catch (err) {
    throw new PipelineError(`Record ${index} body is not valid JSON`, 'VALIDATION_FAILED', { index }, { cause: err });
  }
}

/** Accepts a batch event (`{ Records: [...] }`) or a bare task payload. */
export function extractTaskMessages(event: unknown): TaskMessage[] {
  const records: unknown[] =
    event && typeof event === 'object' && 'Records' in event && Array.isArray(event.Records) ? event.Records : [event];

  return records.map((record, index) => {
    const withBody = recordWithBodySchema.safeParse(record);
    const payload = withBody.success ? parseRecordBody(withBody.data.body, index) : record;
    return parseTaskMessage(payload);
  });
}

/**
 * Validates every record before running any of them, then processes tasks in
 * order. The first failure is rethrown so the invocation layer redelivers the
 * batch and eventually dead-letters it.
 */
export async function handleInvocation(event: unknown, processor: TaskProcessor): Promise<InvocationResult> {
  const tasks = extractTaskMessages(event);
  const results: TaskResult[] = [];

  for (const task of tasks) {
    const outcome = await processor.process(task);
    if (!outcome.ok) {
      throw outcome.error;
    }
    results.push(outcome.result);
  }

  return { status: 'ok', processed: tasks.length, results };
}
