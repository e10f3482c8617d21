// Types
export type { RetryOptions } from "./types.js";
export { DEFAULT_RETRY_OPTIONS } from "./types.js";

// Retry utilities
export { withRetry, calculateDelay } from "./retry.js";

// Serialization
export { Mutex } from "./mutex.js";
