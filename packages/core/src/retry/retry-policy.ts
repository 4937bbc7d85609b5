import { setTimeout as delay } from 'node:timers/promises';
import type { Logger } from 'pino';
import { isProviderError } from '../errors/index.js';

/**
 * Retry settings shared by every provider job: three retries, waiting between
 * five and fifteen seconds.
 * @public
 */
export const DEFAULT_RETRY_CONFIG = {
  maxRetries: 3,
  minWaitMs: 5000,
  maxWaitMs: 15000,
  backoffMultiplier: 2,
  jitter: 0,
} as const;

export interface RetryPolicyConfig {
  /** Retries after the first attempt */
  maxRetries?: number;
  minWaitMs?: number;
  maxWaitMs?: number;
  backoffMultiplier?: number;
  /** Fraction of the wait added or removed at random, e.g. 0.25 */
  jitter?: number;
  /** Replaces the timer, mainly for tests */
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

export interface RetryContext {
  /** Zero-based attempt number */
  attempt: number;
  description: string;
}

/**
 * Bounded exponential backoff for calls to credential backends.
 *
 * An attempt is repeated when it throws a retryable error or when its result
 * satisfies `shouldRetry`. After `maxRetries` retries the last result is
 * returned (or the last error rethrown) so the caller can classify it.
 * @example
 * ```typescript
 * const policy = new RetryPolicy({ logger });
 * const response = await policy.execute(
 *   () => fetch(url),
 *   (res) => res.status >= 429,
 *   'create token',
 * );
 * ```
 * @public
 */
export class RetryPolicy {
  private readonly config: Required<Omit<RetryPolicyConfig, 'logger' | 'sleep'>>;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger?: Logger;

  public constructor(config: RetryPolicyConfig = {}) {
    this.config = {
      maxRetries: config.maxRetries ?? DEFAULT_RETRY_CONFIG.maxRetries,
      minWaitMs: config.minWaitMs ?? DEFAULT_RETRY_CONFIG.minWaitMs,
      maxWaitMs: config.maxWaitMs ?? DEFAULT_RETRY_CONFIG.maxWaitMs,
      backoffMultiplier: config.backoffMultiplier ?? DEFAULT_RETRY_CONFIG.backoffMultiplier,
      jitter: config.jitter ?? DEFAULT_RETRY_CONFIG.jitter,
    };
    this.sleep = config.sleep ?? ((ms: number) => delay(ms).then(() => undefined));
    this.logger = config.logger;
  }

  public get maxRetries(): number {
    return this.config.maxRetries;
  }

  /**
   * Wait before the given retry (1-based), clamped to `[minWaitMs, maxWaitMs]`.
   */
  public delayFor(retry: number): number {
    const { minWaitMs, maxWaitMs, backoffMultiplier, jitter } = this.config;
    const baseDelay = Math.min(
      minWaitMs * Math.pow(backoffMultiplier, Math.max(0, retry - 1)),
      maxWaitMs,
    );

    const jitterAmount = baseDelay * jitter;
    const offset = (Math.random() - 0.5) * 2 * jitterAmount;

    return Math.min(maxWaitMs, Math.max(minWaitMs, Math.round(baseDelay + offset)));
  }

  /**
   * Runs `operation` until it yields a result `shouldRetry` accepts, throws a
   * non-retryable error, or the retries run out.
   * @param operation - Attempt to run; receives the retry context
   * @param shouldRetry - Classifies a successful result as transient
   * @param description - Used in log lines
   */
  public async execute<T>(
    operation: (context: RetryContext) => Promise<T>,
    shouldRetry: (result: T) => boolean = () => false,
    description = 'backend call',
  ): Promise<T> {
    for (let attempt = 0; ; attempt++) {
      const context: RetryContext = { attempt, description };
      const isLastAttempt = attempt >= this.config.maxRetries;

      let result: T;
      try {
        result = await operation(context);
      } catch (error) {
        if (isLastAttempt || !RetryPolicy.isRetryableError(error)) {
          throw error;
        }
        await this.wait(attempt + 1, description, { error: String(error) });
        continue;
      }

      if (isLastAttempt || !shouldRetry(result)) {
        return result;
      }
      await this.wait(attempt + 1, description, {});
    }
  }

  /**
   * Thrown values are transport failures unless a ProviderError says otherwise.
   */
  public static isRetryableError(error: unknown): boolean {
    return isProviderError(error) ? error.retryable : true;
  }

  private async wait(
    retry: number,
    description: string,
    details: Record<string, unknown>,
  ): Promise<void> {
    const delayMs = this.delayFor(retry);
    this.logger?.warn(
      { ...details, retry, maxRetries: this.config.maxRetries, delayMs },
      `retrying ${description}`,
    );
    await this.sleep(delayMs);
  }
}
