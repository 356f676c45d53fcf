/**
 * Per-category sliding-window rate limiter with FIFO waiters.
 *
 * Each category keeps a log of recent grants. A request of weight `w` is
 * admitted when the weights granted during the last `windowMs` plus `w` stay
 * within `maxRequests`. Requests that do not fit either wait in a per-category
 * queue (served strictly in arrival order) or fail, depending on policy.
 *
 * All bookkeeping runs synchronously between awaits, so concurrent callers on
 * the event loop can never double-spend a category's budget.
 */

import type { Logger } from "@/lib/logger";

import { RateLimitExceededError, RateLimiterClosedError } from "./errors";
import { type RateLimitRule, parseRateLimitRules } from "./rules";

/** What happens to a request that does not fit the current window */
export type ExhaustionPolicy = "wait" | "fail";

/** What happens to a request for a category without a rule */
export type UnknownCategoryPolicy = "allow" | "deny";

export interface RateLimiterConfig {
  /** One rule per category */
  rules: readonly RateLimitRule[];
  /** Wait for capacity (default) or fail immediately */
  onExhausted?: ExhaustionPolicy;
  /** Longest wait accepted under the "wait" policy (default: 30s) */
  maxWaitMs?: number;
  /** Admit unconfigured categories without counting (default) or reject them */
  unknownCategory?: UnknownCategoryPolicy;
  /** Logger for wait events */
  logger?: Pick<Logger, "debug">;
}

export interface AcquireOptions {
  /** Budget units consumed by the request (default: 1) */
  weight?: number;
  /** Aborting removes a queued request without consuming budget */
  signal?: AbortSignal;
}

export interface RateLimiter {
  /** Resolves once the request is admitted; may wait according to policy */
  acquire: (category: string, options?: AcquireOptions) => Promise<void>;
  /** Admits the request only if it fits right now */
  tryAcquire: (category: string, weight?: number) => boolean;
  /** Remaining budget in the current window */
  getAvailable: (category: string) => number;
  /** Projected wait for a request of `weight` queued now */
  getWaitTimeMs: (category: string, weight?: number) => number;
  /** Number of queued requests */
  getPendingCount: (category: string) => number;
  /** Whether a rule exists for the category */
  hasRule: (category: string) => boolean;
  /** Rejects queued requests and refuses new ones */
  close: () => void;
}

export const DEFAULT_MAX_WAIT_MS = 30_000;

interface Grant {
  at: number;
  weight: number;
}

interface Waiter {
  weight: number;
  resolve: () => void;
  reject: (reason: unknown) => void;
  detach: () => void;
}

interface CategoryState {
  rule: RateLimitRule;
  grants: Grant[];
  waiters: Waiter[];
  timer: ReturnType<typeof setTimeout> | undefined;
}

const sumWeights = (grants: readonly Grant[]): number =>
  grants.reduce((total, grant) => total + grant.weight, 0);

/**
 * Earliest time at or after `from` when `weight` fits, given `grants`
 * (ordered by time). Infinity when the weight exceeds the rule itself.
 */
const earliestSlot = (
  rule: RateLimitRule,
  grants: readonly Grant[],
  weight: number,
  from: number,
): number => {
  const active = grants.filter((grant) => grant.at + rule.windowMs > from);
  let used = sumWeights(active);

  if (used + weight <= rule.maxRequests) {
    return from;
  }

  for (const grant of active) {
    used -= grant.weight;
    if (used + weight <= rule.maxRequests) {
      return grant.at + rule.windowMs;
    }
  }

  return Number.POSITIVE_INFINITY;
};

/**
 * Creates a sliding-window rate limiter.
 *
 * @example
 * ```typescript
 * const limiter = createRateLimiter({
 *   rules: [{ category: "market-data", maxRequests: 2, windowMs: 1000 }],
 *   onExhausted: "wait",
 *   maxWaitMs: 1000,
 * });
 *
 * await limiter.acquire("market-data");
 * ```
 */
export const createRateLimiter = (config: RateLimiterConfig): RateLimiter => {
  const {
    onExhausted = "wait",
    maxWaitMs = DEFAULT_MAX_WAIT_MS,
    unknownCategory = "allow",
    logger,
  } = config;

  const states = new Map<string, CategoryState>();
  for (const rule of parseRateLimitRules(config.rules)) {
    states.set(rule.category, { rule, grants: [], waiters: [], timer: undefined });
  }

  let closed = false;

  const prune = (state: CategoryState, now: number): void => {
    const { windowMs } = state.rule;
    const firstActive = state.grants.findIndex((grant) => grant.at + windowMs > now);
    if (firstActive === -1) {
      state.grants = [];
    } else if (firstActive > 0) {
      state.grants = state.grants.slice(firstActive);
    }
  };

  const record = (state: CategoryState, weight: number, now: number): void => {
    state.grants.push({ at: now, weight });
  };

  const fitsNow = (state: CategoryState, weight: number): boolean =>
    sumWeights(state.grants) + weight <= state.rule.maxRequests;

  /**
   * Wait for a request joining the back of the queue: replays the queued
   * requests in order, then places this one.
   */
  const projectWaitMs = (state: CategoryState, weight: number, now: number): number => {
    const simulated = [...state.grants];
    let cursor = now;

    for (const waiter of state.waiters) {
      cursor = earliestSlot(state.rule, simulated, waiter.weight, cursor);
      simulated.push({ at: cursor, weight: waiter.weight });
    }

    return earliestSlot(state.rule, simulated, weight, cursor) - now;
  };

  const clearTimer = (state: CategoryState): void => {
    if (state.timer !== undefined) {
      clearTimeout(state.timer);
      state.timer = undefined;
    }
  };

  /**
   * Admits queued requests from the head while they fit, then schedules a
   * wake-up for when the head will fit.
   */
  const drain = (state: CategoryState): void => {
    clearTimer(state);
    const now = Date.now();
    prune(state, now);

    for (let head = state.waiters[0]; head !== undefined; head = state.waiters[0]) {
      const slot = earliestSlot(state.rule, state.grants, head.weight, now);
      if (slot > now) {
        state.timer = setTimeout(() => {
          state.timer = undefined;
          drain(state);
        }, slot - now);
        return;
      }

      state.waiters.shift();
      record(state, head.weight, now);
      head.detach();
      head.resolve();
    }
  };

  const acquire = (category: string, options: AcquireOptions = {}): Promise<void> => {
    const { weight = 1, signal } = options;

    if (closed) {
      return Promise.reject(new RateLimiterClosedError());
    }
    if (!Number.isFinite(weight) || weight <= 0) {
      return Promise.reject(new RangeError(`Invalid rate limit weight: ${weight}`));
    }
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }

    const state = states.get(category);
    if (!state) {
      if (unknownCategory === "allow") {
        return Promise.resolve();
      }
      return Promise.reject(
        new RateLimitExceededError(
          `No rate limit rule for category "${category}"`,
          category,
          null,
        ),
      );
    }

    if (weight > state.rule.maxRequests) {
      return Promise.reject(
        new RateLimitExceededError(
          `Weight ${weight} exceeds the ${state.rule.maxRequests} request budget of "${category}"`,
          category,
          null,
        ),
      );
    }

    const now = Date.now();
    prune(state, now);

    if (state.waiters.length === 0 && fitsNow(state, weight)) {
      record(state, weight, now);
      return Promise.resolve();
    }

    const waitTimeMs = projectWaitMs(state, weight, now);
    if (onExhausted === "fail" || waitTimeMs > maxWaitMs) {
      return Promise.reject(
        new RateLimitExceededError(
          `Rate limit exceeded for "${category}" (retry in ${waitTimeMs}ms)`,
          category,
          waitTimeMs,
        ),
      );
    }

    logger?.debug("Rate limit wait", {
      category,
      weight,
      waitTimeMs,
      queued: state.waiters.length,
    });

    return new Promise<void>((resolve, reject) => {
      const waiter: Waiter = { weight, resolve, reject, detach: () => {} };

      if (signal) {
        const onAbort = (): void => {
          const index = state.waiters.indexOf(waiter);
          if (index !== -1) {
            state.waiters.splice(index, 1);
          }
          reject(signal.reason);
          // Requests behind the cancelled one may fit now
          drain(state);
        };
        signal.addEventListener("abort", onAbort, { once: true });
        waiter.detach = () => signal.removeEventListener("abort", onAbort);
      }

      state.waiters.push(waiter);
      drain(state);
    });
  };

  const tryAcquire = (category: string, weight = 1): boolean => {
    if (closed || !Number.isFinite(weight) || weight <= 0) {
      return false;
    }

    const state = states.get(category);
    if (!state) {
      return unknownCategory === "allow";
    }

    const now = Date.now();
    prune(state, now);

    // Queued requests keep their turn
    if (state.waiters.length > 0 || !fitsNow(state, weight)) {
      return false;
    }

    record(state, weight, now);
    return true;
  };

  const getAvailable = (category: string): number => {
    const state = states.get(category);
    if (!state) {
      return unknownCategory === "allow" ? Number.POSITIVE_INFINITY : 0;
    }
    prune(state, Date.now());
    return Math.max(0, state.rule.maxRequests - sumWeights(state.grants));
  };

  const getWaitTimeMs = (category: string, weight = 1): number => {
    const state = states.get(category);
    if (!state) {
      return unknownCategory === "allow" ? 0 : Number.POSITIVE_INFINITY;
    }
    const now = Date.now();
    prune(state, now);
    return projectWaitMs(state, weight, now);
  };

  const getPendingCount = (category: string): number => states.get(category)?.waiters.length ?? 0;

  const hasRule = (category: string): boolean => states.has(category);

  const close = (): void => {
    if (closed) {
      return;
    }
    closed = true;

    for (const state of states.values()) {
      clearTimer(state);
      const waiters = state.waiters;
      state.waiters = [];
      for (const waiter of waiters) {
        waiter.detach();
        waiter.reject(new RateLimiterClosedError());
      }
    }
  };

  return {
    acquire,
    tryAcquire,
    getAvailable,
    getWaitTimeMs,
    getPendingCount,
    hasRule,
    close,
  };
};
