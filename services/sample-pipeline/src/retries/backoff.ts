import { setTimeout as delay } from 'node:timers/promises';

export type BackoffOptions = {
  baseMs?: number;
  factor?: number;
  maxMs?: number;
};

const DEFAULT_BACKOFF: Required<BackoffOptions> = {
  baseMs: 1_000,
  factor: 2,
  maxMs: 60_000
};

/** Delay before retry `attempt` (0-based): `baseMs * factor^attempt`, capped at `maxMs`. */
export function computeExponentialBackoff(attempt: number, options: BackoffOptions = {}): number {
  const normalizedAttempt = Math.max(0, Math.floor(attempt));
  const {
    baseMs = DEFAULT_BACKOFF.baseMs,
    factor = DEFAULT_BACKOFF.factor,
    maxMs = DEFAULT_BACKOFF.maxMs
  } = options;

  const rawDelay = baseMs * Math.pow(factor, normalizedAttempt);
  if (!Number.isFinite(rawDelay)) {
    return maxMs;
  }
  return Math.round(Math.min(Math.max(rawDelay, 0), maxMs));
}

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = async (ms) => {
  await delay(ms);
};
