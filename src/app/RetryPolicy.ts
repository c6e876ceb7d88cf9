import type { LoggerPort } from "../ports/sys/LoggerPort";
import { ModelUnavailableError, RetryExhaustedError, describeError } from "../shared/errors";

export interface RetryOptions {
  maxRetries?: number;
  baseDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  isRetryable?: (err: unknown) => boolean;
}

export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_BASE_DELAY_MS = 2000;

const realSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Fixed-count retry with jittered delay: after a retryable failure it waits
 * `baseDelayMs * (1 + random())` before the next attempt. Errors that are
 * not retryable propagate immediately.
 */
export class RetryPolicy {
  readonly maxRetries: number;
  readonly baseDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;
  private readonly isRetryable: (err: unknown) => boolean;

  constructor(options: RetryOptions = {}) {
    this.maxRetries = Math.max(1, Math.floor(options.maxRetries ?? DEFAULT_MAX_RETRIES));
    this.baseDelayMs = Math.max(0, options.baseDelayMs ?? DEFAULT_BASE_DELAY_MS);
    this.sleep = options.sleep ?? realSleep;
    this.random = options.random ?? Math.random;
    this.isRetryable = options.isRetryable ?? ((err) => err instanceof ModelUnavailableError);
  }

  delayFor(): number {
    return this.baseDelayMs * (1 + this.random());
  }

  async run<T>(label: string, task: () => Promise<T>, logger?: LoggerPort): Promise<T> {
    let lastError: unknown;
    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      try {
        return await task();
      } catch (err) {
        if (!this.isRetryable(err)) throw err;
        lastError = err;
        logger?.warn(`${label} failed (attempt ${attempt}/${this.maxRetries}): ${describeError(err)}`);
        if (attempt < this.maxRetries) {
          const delay = this.delayFor();
          logger?.info(`Retrying ${label} in ${(delay / 1000).toFixed(2)} seconds...`);
          await this.sleep(delay);
        }
      }
    }
    throw new RetryExhaustedError(this.maxRetries, lastError);
  }
}
