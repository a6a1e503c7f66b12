import { logger } from '../utils/logger';
import { ThrottleError, errorMessage } from '../utils/errors';
import type { ClockPort } from './ports/clock.port';

/**
 * RetryService
 *
 * Deterministic exponential backoff for throttled remote calls:
 * the wait before retry N is 2^N * backoffBaseSeconds.
 */

export interface RetryOptions {
  // Total attempts including the first
  maxAttempts: number;
  backoffBaseSeconds: number;
  retryCondition?: (error: unknown) => boolean;
}

export function isThrottleError(error: unknown): error is ThrottleError {
  return error instanceof ThrottleError;
}

export class RetryService {
  constructor(
    private readonly clock: ClockPort,
    private readonly defaults: RetryOptions
  ) {}

  static backoffMs(retryCount: number, backoffBaseSeconds: number): number {
    return Math.pow(2, retryCount) * backoffBaseSeconds * 1000;
  }

  get maxAttempts(): number {
    return this.defaults.maxAttempts;
  }

  delayFor(retryCount: number): number {
    return RetryService.backoffMs(retryCount, this.defaults.backoffBaseSeconds);
  }

  async wait(retryCount: number): Promise<number> {
    const delay = this.delayFor(retryCount);
    await this.clock.sleep(delay);
    return delay;
  }

  /**
   * Retries `operation` while `retryCondition` (default: throttling) holds.
   * A server supplied Retry-After longer than the backoff wins.
   */
  async withRetry<T>(
    operation: () => Promise<T>,
    operationName: string,
    options: Partial<RetryOptions> = {}
  ): Promise<T> {
    const config: RetryOptions = { ...this.defaults, ...options };
    const shouldRetry = config.retryCondition ?? isThrottleError;

    for (let attempt = 1; ; attempt++) {
      try {
        return await operation();
      } catch (error) {
        if (attempt >= config.maxAttempts || !shouldRetry(error)) {
          throw error;
        }
        const backoff = RetryService.backoffMs(attempt, config.backoffBaseSeconds);
        const retryAfter = isThrottleError(error) ? error.retryAfterMs ?? 0 : 0;
        const delay = Math.max(backoff, retryAfter);
        logger.warn(`Retrying "${operationName}" in ${delay}ms (attempt ${attempt + 1}/${config.maxAttempts})`, {
          error: errorMessage(error),
          attempt: attempt + 1,
          delay,
        });
        await this.clock.sleep(delay);
      }
    }
  }
}
