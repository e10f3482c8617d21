/**
 * Configuration options for retry logic
 */
export interface RetryOptions {
  /** Maximum number of attempts, the first included (default: 10) */
  maxAttempts: number;
  /** Delay in milliseconds before the first retry (default: 100) */
  initialDelayMs: number;
  /** Upper bound on any single delay (default: 1000) */
  maxDelayMs: number;
  /** Multiplier for exponential backoff (default: 2) */
  backoffMultiplier: number;
  /** Add up to 50% random jitter to each delay (default: false) */
  jitter: boolean;
  /** Decide whether a failed attempt is worth another try */
  retryOn?: (error: unknown) => boolean;
  /** Called before sleeping ahead of the next attempt */
  onRetry?: (attempt: number, delayMs: number, error: unknown) => void;
}

/**
 * Defaults tuned for waiting on a freshly spawned local daemon.
 */
export const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxAttempts: 10,
  initialDelayMs: 100,
  maxDelayMs: 1000,
  backoffMultiplier: 2,
  jitter: false,
};
