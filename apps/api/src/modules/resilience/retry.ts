import type { Clock } from "../../lib/clock.js";
import { abortReason, GatewayError, isRetryable, toGatewayError } from "../../lib/errors.js";

export interface BackoffOptions {
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface RetryOptions extends BackoffOptions {
  maxRetries: number;
  clock: Clock;
  signal?: AbortSignal | undefined;
  /** Epoch ms; a backoff that would end past it fails the call with Timeout. */
  deadline?: number | undefined;
  random?: (() => number) | undefined;
  /** Errors that must surface immediately even when their code is retryable. */
  isTerminal?: ((error: GatewayError) => boolean) | undefined;
}

/**
 * `min(base × 2^retry, max)` shifted by up to ±50% of base.
 * `retry` is 0 for the first retry.
 */
export function backoffDelay(
  retry: number,
  options: BackoffOptions,
  random: () => number = Math.random,
): number {
  const exponential = Math.min(
    options.baseDelayMs * 2 ** retry,
    options.maxDelayMs,
  );
  const jitter = (random() * 2 - 1) * options.baseDelayMs * 0.5;
  return Math.max(0, Math.round(exponential + jitter));
}

/** The provider's Retry-After hint wins when it asks for a longer pause. */
export function retryDelay(
  error: GatewayError,
  retry: number,
  options: BackoffOptions,
  random?: () => number,
): number {
  const delay = backoffDelay(retry, options, random);
  return error.retryAfterMs !== undefined
    ? Math.max(delay, error.retryAfterMs)
    : delay;
}

/**
 * Runs `fn` until it succeeds, fails with a non-retryable code, or has been
 * attempted `maxRetries + 1` times. The last error is surfaced unchanged.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (raw) {
      const error = toGatewayError(raw);
      if (
        !isRetryable(error.code) ||
        attempt > options.maxRetries ||
        options.isTerminal?.(error)
      ) {
        throw error;
      }

      const delay = retryDelay(error, attempt - 1, options, options.random);
      if (
        options.deadline !== undefined &&
        options.clock.now() + delay >= options.deadline
      ) {
        throw new GatewayError(
          "Timeout",
          `Call budget exhausted after ${attempt} attempt(s); last error: ${error.message}`,
          { details: { attempts: attempt, lastCode: error.code }, cause: error },
        );
      }

      try {
        await options.clock.sleep(delay, options.signal);
      } catch (sleepErr) {
        if (options.signal?.aborted) throw abortReason(options.signal);
        throw toGatewayError(sleepErr);
      }
    }
  }
}
