import { setTimeout as sleep } from "node:timers/promises";
import { Result } from "better-result";
import { DEFAULT_RETRY_OPTIONS, type RetryOptions } from "./types.js";

/**
 * Calculates delay with exponential backoff and optional jitter.
 */
export function calculateDelay(attempt: number, options: RetryOptions): number {
  const exponentialDelay =
    options.initialDelayMs * Math.pow(options.backoffMultiplier, attempt - 1);
  const cappedDelay = Math.min(exponentialDelay, options.maxDelayMs);

  if (options.jitter) {
    const jitterFactor = 0.5 * Math.random();
    return Math.floor(cappedDelay * (1 + jitterFactor));
  }

  return cappedDelay;
}

/**
 * Executes a function with retry logic using exponential backoff.
 *
 * The last failed Result is returned once attempts run out or `retryOn`
 * rejects the error.
 *
 * @example
 * ```ts
 * const ready = await withRetry(
 *   () => handle.runCommand("smcroutectl -I smcroute-r1 show").then(requireZeroExit),
 *   { maxAttempts: 20, initialDelayMs: 50 }
 * );
 * ```
 */
export async function withRetry<T, E>(
  fn: () => Promise<Result<T, E>>,
  options: Partial<RetryOptions> = {}
): Promise<Result<T, E>> {
  const config: RetryOptions = { ...DEFAULT_RETRY_OPTIONS, ...options };
  const attempts = Math.max(1, config.maxAttempts);

  for (let attempt = 1; ; attempt++) {
    const result = await fn();

    if (result.isOk()) {
      return result;
    }

    if (attempt >= attempts || (config.retryOn && !config.retryOn(result.error))) {
      return result;
    }

    const delay = calculateDelay(attempt, config);
    config.onRetry?.(attempt, delay, result.error);
    await sleep(delay);
  }
}
