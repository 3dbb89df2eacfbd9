/**
 * Bounded retry with a fixed backoff. Injected into the stages that look up
 * UI labels so every call site retries the same way.
 */

import type { Clock } from './clock';

export interface RetryPolicyOptions {
  maxAttempts: number;
  backoffMs: number;
}

export interface RetryAttempt {
  attempt: number;   // 1-based
  remaining: number;
}

export class RetryPolicy {
  readonly maxAttempts: number;
  readonly backoffMs: number;

  constructor(options: RetryPolicyOptions, private readonly clock: Clock) {
    if (!Number.isInteger(options.maxAttempts) || options.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be a positive integer, got ${options.maxAttempts}`);
    }
    if (options.backoffMs < 0) {
      throw new RangeError(`backoffMs must not be negative, got ${options.backoffMs}`);
    }
    this.maxAttempts = options.maxAttempts;
    this.backoffMs = options.backoffMs;
  }

  /**
   * Run `fn` until it returns a value other than null, or attempts run out.
   * Returns null when every attempt came back empty. Thrown errors are not
   * retried; they propagate immediately.
   */
  async until<T>(
    fn: (attempt: RetryAttempt) => Promise<T | null>
  ): Promise<T | null> {
    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      const result = await fn({ attempt, remaining: this.maxAttempts - attempt });
      if (result !== null) {
        return result;
      }
      if (attempt < this.maxAttempts) {
        await this.clock.sleep(this.backoffMs);
      }
    }
    return null;
  }
}
