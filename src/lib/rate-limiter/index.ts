/**
 * Rate limiter module exports.
 */

export {
  createRateLimiter,
  DEFAULT_MAX_WAIT_MS,
  type AcquireOptions,
  type ExhaustionPolicy,
  type RateLimiter,
  type RateLimiterConfig,
  type UnknownCategoryPolicy,
} from "./sliding-window";

export { RateLimitExceededError, RateLimiterClosedError } from "./errors";

export {
  parseRateLimitRules,
  perSecondRules,
  RATE_LIMIT_CATEGORIES,
  rateLimitRuleSchema,
  type DefaultRateLimitCategory,
  type RateLimitRule,
} from "./rules";

export { getRetryAfterHeader, parseRetryAfterMs } from "./retry-after";
