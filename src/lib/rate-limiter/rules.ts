/**
 * Rate limit rule definitions and validation.
 */

import * as v from "valibot";

/** Categories the exchange client assigns to its operations */
export type DefaultRateLimitCategory = "market-data" | "account" | "orders";

export const RATE_LIMIT_CATEGORIES = ["market-data", "account", "orders"] as const;

export const rateLimitRuleSchema = v.object({
  category: v.pipe(v.string(), v.minLength(1)),
  maxRequests: v.pipe(v.number(), v.integer(), v.minValue(1)),
  windowMs: v.pipe(v.number(), v.finite(), v.gtValue(0)),
});

export type RateLimitRule = v.InferOutput<typeof rateLimitRuleSchema>;

/**
 * Validates a rule set: every rule well-formed, one rule per category.
 *
 * @throws ValiError for a malformed rule, Error for a duplicated category
 */
export const parseRateLimitRules = (rules: readonly unknown[]): RateLimitRule[] => {
  const parsed = v.parse(v.array(rateLimitRuleSchema), rules);
  const seen = new Set<string>();

  for (const rule of parsed) {
    if (seen.has(rule.category)) {
      throw new Error(`Duplicate rate limit rule for category "${rule.category}"`);
    }
    seen.add(rule.category);
  }

  return parsed;
};

/**
 * Builds the three default categories from per-second request budgets.
 *
 * @example
 * ```typescript
 * perSecondRules({ "market-data": 20, account: 10, orders: 10 });
 * ```
 */
export const perSecondRules = (
  budgets: Record<DefaultRateLimitCategory, number>,
): RateLimitRule[] =>
  RATE_LIMIT_CATEGORIES.map((category) => ({
    category,
    maxRequests: budgets[category],
    windowMs: 1000,
  }));
