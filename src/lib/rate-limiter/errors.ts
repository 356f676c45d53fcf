/**
 * Errors raised by the rate limiter itself.
 *
 * These are local failures. Callers going through the exchange client never
 * see them directly: the error mapper turns them into `RATE_LIMIT_EXCEEDED`.
 */

/**
 * Error thrown when a request cannot be admitted within the allowed wait.
 */
export class RateLimitExceededError extends Error {
  constructor(
    message: string,
    public readonly category: string,
    /** Estimated wait until the request would fit, or null when it never will */
    public readonly waitTimeMs: number | null,
  ) {
    super(message);
    this.name = "RateLimitExceededError";
  }
}

/**
 * Error thrown for waiters still queued when the limiter is closed.
 */
export class RateLimiterClosedError extends Error {
  constructor(message = "Rate limiter is closed") {
    super(message);
    this.name = "RateLimiterClosedError";
  }
}
