/**
 * Barrel re-export for utility modules.
 */

// Retry utility
export { retry, calculateDelay } from "./retry.js";
export type { RetryPolicy } from "./retry.js";

// Error mapping utility
export { mapGrpcError, parseRetryAfter, statusName } from "./error-mapping.js";
