export type PipelineErrorCode =
  | 'VALIDATION_FAILED'
  | 'NOT_FOUND'
  | 'REGISTRY_UNAVAILABLE'
  | 'STORAGE_FAILED'
  | 'GENERATOR_FAILED'
  | 'INTERNAL';

/**
 * Failure of a task invocation. None of these are recovered inside the
 * pipeline except `GENERATOR_FAILED` during regeneration; the invocation
 * layer owns redelivery and dead-lettering.
 */
export class PipelineError extends Error {
  public readonly code: PipelineErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: PipelineErrorCode,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'PipelineError';
    this.code = code;
    this.details = details;
  }
}

/** Transient back-pressure signal raised by a registry backend. */
export class RegistryThrottledError extends Error {
  constructor(message = 'dedup registry throttled the request', options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RegistryThrottledError';
  }
}

export function isPipelineError(err: unknown): err is PipelineError {
  return err instanceof PipelineError;
}

export function toPipelineError(err: unknown): PipelineError {
  if (err instanceof PipelineError) {
    return err;
  }
  const message = err instanceof Error ? err.message : String(err);
  return new PipelineError(message, 'INTERNAL', undefined, { cause: err });
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function assertUnreachable(value: never): never {
  throw new Error(`Unhandled value: ${JSON.stringify(value)}`);
}
