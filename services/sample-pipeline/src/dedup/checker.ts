import { PipelineError, RegistryThrottledError } from '../errors';
import type { Logger } from '../observability/logger';
import type { DedupRegistry } from '../registry/types';
import { computeExponentialBackoff, sleep as defaultSleep, type Sleep } from '../retries/backoff';

export interface DedupCheckerOptions {
  registry: DedupRegistry;
  logger: Logger;
  maxThrottleRetries?: number;
  backoffBaseMs?: number;
  sleep?: Sleep;
}

const DEFAULT_MAX_THROTTLE_RETRIES = 3;
const DEFAULT_BACKOFF_BASE_MS = 1_000;

export class DedupChecker {
  private readonly registry: DedupRegistry;
  private readonly logger: Logger;
  private readonly maxThrottleRetries: number;
  private readonly backoffBaseMs: number;
  private readonly sleep: Sleep;

  constructor(options: DedupCheckerOptions) {
    this.registry = options.registry;
    this.logger = options.logger.child({ component: 'dedup-checker' });
    this.maxThrottleRetries = Math.max(1, options.maxThrottleRetries ?? DEFAULT_MAX_THROTTLE_RETRIES);
    this.backoffBaseMs = options.backoffBaseMs ?? DEFAULT_BACKOFF_BASE_MS;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Claims `paramHash` for `sampleId`. Resolves `true` when the hash is newly
   * registered or already owned by the same sample id (redelivery), `false`
   * when another sample owns it.
   */
  async checkAndRegister(generatorName: string, paramHash: string, sampleId: string): Promise<boolean> {
    let lastError: RegistryThrottledError | null = null;

    for (let attempt = 0; attempt < this.maxThrottleRetries; attempt += 1) {
      try {
        const outcome = await this.registry.insertIfAbsent({ generatorName, paramHash, sampleId });
        if (outcome === 'inserted') {
          return true;
        }
        return await this.isOwnedBy(generatorName, paramHash, sampleId);
      } catch (err) {
        if (!(err instanceof RegistryThrottledError)) {
          throw err;
        }
        lastError = err;
        if (attempt + 1 >= this.maxThrottleRetries) {
          break;
        }
        const waitMs = computeExponentialBackoff(attempt, { baseMs: this.backoffBaseMs, maxMs: Number.MAX_SAFE_INTEGER });
        this.logger.warn('Dedup registry throttled, retrying', {
          waitMs,
          attempt: attempt + 1,
          maxAttempts: this.maxThrottleRetries
        });
        await this.sleep(waitMs);
      }
    }

    throw new PipelineError(
      `Dedup registry unavailable after ${this.maxThrottleRetries} attempts`,
      'REGISTRY_UNAVAILABLE',
      { generatorName, paramHash, sampleId },
      { cause: lastError }
    );
  }

  private async isOwnedBy(generatorName: string, paramHash: string, sampleId: string): Promise<boolean> {
    const owner = await this.registry.findOwner(generatorName, paramHash);
    if (owner === sampleId) {
      this.logger.info('Hash already registered by the same sample', { paramHash, sampleId });
      return true;
    }
    this.logger.info('Hash owned by another sample', { paramHash, sampleId, owner });
    return false;
  }
}
