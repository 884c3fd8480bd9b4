import { setTimeout as delay } from "node:timers/promises";

/**
 * Retry policy applied by {@link executeWithRetry}. `backoff(attempt)` returns
 * the delay to wait after the given (1-based) failed attempt.
 */
export interface RetryPolicy {
  readonly maxAttempts: number;
  backoff(attempt: number): number;
}

export interface ExponentialBackoffOptions {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
}

/**
 * Builds the exponential policy `min(maxDelay, baseDelay * 2^(attempt - 1))`,
 * i.e. 1s, 2s, 4s, 8s, 10s, … with the default settings.
 */
export function createExponentialPolicy(options: ExponentialBackoffOptions): RetryPolicy {
  if (!Number.isInteger(options.maxAttempts) || options.maxAttempts < 1) {
    throw new TypeError("maxAttempts must be a positive integer");
  }
  if (options.baseDelayMs < 0 || options.maxDelayMs < options.baseDelayMs) {
    throw new TypeError("delays must satisfy 0 <= baseDelayMs <= maxDelayMs");
  }
  return {
    maxAttempts: options.maxAttempts,
    backoff(attempt: number): number {
      const exponent = Math.max(0, attempt - 1);
      return Math.min(options.maxDelayMs, options.baseDelayMs * 2 ** exponent);
    },
  };
}

/** Details handed to {@link RetryHooks.onRetry} before each wait. */
export interface RetryNotice {
  readonly attempt: number;
  readonly delayMs: number;
  readonly error: unknown;
}

export interface RetryHooks {
  /** Decides whether the failure deserves another attempt. Defaults to always. */
  readonly shouldRetry?: (error: unknown, attempt: number) => boolean;
  readonly onRetry?: (notice: RetryNotice) => void;
  readonly sleep?: (ms: number) => Promise<void>;
}

/** Raised once every attempt failed or a failure was not retriable. */
export class RetryExhaustedError extends Error {
  public readonly code = "E-RETRY-EXHAUSTED";
  public readonly attempts: number;

  constructor(attempts: number, cause: unknown) {
    super(`operation failed after ${attempts} attempt(s)`, { cause });
    this.name = "RetryExhaustedError";
    this.attempts = attempts;
  }
}

/**
 * Runs {@link operation} until it succeeds, the policy is exhausted or the
 * failure is not retriable. The last failure is attached as `cause` of the
 * thrown {@link RetryExhaustedError}.
 */
export async function executeWithRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  hooks: RetryHooks = {},
): Promise<T> {
  const sleep = hooks.sleep ?? ((ms: number) => delay(ms));
  let attempt = 0;
  while (true) {
    attempt += 1;
    try {
      return await operation(attempt);
    } catch (error) {
      const retriable = hooks.shouldRetry ? hooks.shouldRetry(error, attempt) : true;
      if (!retriable || attempt >= policy.maxAttempts) {
        throw new RetryExhaustedError(attempt, error);
      }
      const delayMs = policy.backoff(attempt);
      hooks.onRetry?.({ attempt, delayMs, error });
      if (delayMs > 0) {
        await sleep(delayMs);
      }
    }
  }
}
