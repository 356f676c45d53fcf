import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { RateLimitExceededError, RateLimiterClosedError } from "./errors";
import { createRateLimiter } from "./sliding-window";

const START = new Date("2026-01-01T00:00:00.000Z").getTime();

const rule = (maxRequests: number, windowMs = 1000) => ({
  category: "market-data",
  maxRequests,
  windowMs,
});

describe("createRateLimiter", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(START);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe("tryAcquire", () => {
    it("should admit up to maxRequests within the window", () => {
      const limiter = createRateLimiter({ rules: [rule(3)] });

      expect(limiter.tryAcquire("market-data")).toBe(true);
      expect(limiter.tryAcquire("market-data")).toBe(true);
      expect(limiter.tryAcquire("market-data")).toBe(true);
      expect(limiter.tryAcquire("market-data")).toBe(false);
      expect(limiter.getAvailable("market-data")).toBe(0);
    });

    it("should free budget once the window has passed", () => {
      const limiter = createRateLimiter({ rules: [rule(3)] });
      for (let i = 0; i < 3; i++) {
        limiter.tryAcquire("market-data");
      }

      vi.advanceTimersByTime(999);
      expect(limiter.tryAcquire("market-data")).toBe(false);

      vi.advanceTimersByTime(1);
      expect(limiter.getAvailable("market-data")).toBe(3);
      expect(limiter.tryAcquire("market-data")).toBe(true);
    });

    it("should slide the window per grant rather than reset it", () => {
      const limiter = createRateLimiter({ rules: [rule(2)] });

      expect(limiter.tryAcquire("market-data")).toBe(true); // t=0
      vi.advanceTimersByTime(500);
      expect(limiter.tryAcquire("market-data")).toBe(true); // t=500

      vi.advanceTimersByTime(500); // t=1000, first grant expired
      expect(limiter.tryAcquire("market-data")).toBe(true);
      expect(limiter.tryAcquire("market-data")).toBe(false);

      vi.advanceTimersByTime(500); // t=1500, second grant expired
      expect(limiter.tryAcquire("market-data")).toBe(true);
    });

    it("should count weights against the budget", () => {
      const limiter = createRateLimiter({ rules: [rule(10)] });

      expect(limiter.tryAcquire("market-data", 7)).toBe(true);
      expect(limiter.tryAcquire("market-data", 4)).toBe(false);
      expect(limiter.tryAcquire("market-data", 3)).toBe(true);
      expect(limiter.getAvailable("market-data")).toBe(0);
    });

    it("should reject non-positive weights", () => {
      const limiter = createRateLimiter({ rules: [rule(3)] });

      expect(limiter.tryAcquire("market-data", 0)).toBe(false);
      expect(limiter.tryAcquire("market-data", -1)).toBe(false);
      expect(limiter.getAvailable("market-data")).toBe(3);
    });
  });

  describe("acquire with wait policy", () => {
    it("should resolve immediately while budget remains", async () => {
      const limiter = createRateLimiter({ rules: [rule(2)] });

      await limiter.acquire("market-data");
      await limiter.acquire("market-data");

      expect(limiter.getAvailable("market-data")).toBe(0);
    });

    it("should suspend the caller until the window rolls over", async () => {
      const limiter = createRateLimiter({ rules: [rule(2)] });
      await limiter.acquire("market-data");
      await limiter.acquire("market-data");

      let admitted = false;
      const third = limiter.acquire("market-data").then(() => {
        admitted = true;
      });

      expect(limiter.getPendingCount("market-data")).toBe(1);

      await vi.advanceTimersByTimeAsync(999);
      expect(admitted).toBe(false);

      await vi.advanceTimersByTimeAsync(1);
      await third;
      expect(admitted).toBe(true);
      expect(limiter.getPendingCount("market-data")).toBe(0);
    });

    it("should fail when the projected wait exceeds maxWaitMs", async () => {
      const limiter = createRateLimiter({ rules: [rule(2)], maxWaitMs: 500 });
      await limiter.acquire("market-data");
      await limiter.acquire("market-data");

      const error = await limiter.acquire("market-data").catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RateLimitExceededError);
      if (error instanceof RateLimitExceededError) {
        expect(error.category).toBe("market-data");
        expect(error.waitTimeMs).toBe(1000);
      }
      expect(limiter.getPendingCount("market-data")).toBe(0);
    });

    it("should serve waiters in arrival order", async () => {
      const limiter = createRateLimiter({ rules: [rule(1)] });
      await limiter.acquire("market-data");

      const order: string[] = [];
      const b = limiter.acquire("market-data").then(() => order.push("b"));
      const c = limiter.acquire("market-data").then(() => order.push("c"));

      await vi.advanceTimersByTimeAsync(1000);
      expect(order).toEqual(["b"]);

      await vi.advanceTimersByTimeAsync(1000);
      expect(order).toEqual(["b", "c"]);
      await Promise.all([b, c]);
    });

    it("should not let a lighter request overtake a queued heavier one", async () => {
      const limiter = createRateLimiter({ rules: [rule(3)] });
      await limiter.acquire("market-data", { weight: 2 });

      const order: string[] = [];
      const heavy = limiter.acquire("market-data", { weight: 2 }).then(() => order.push("heavy"));
      // Would fit on its own (2 + 1 <= 3) but must queue behind `heavy`
      const light = limiter.acquire("market-data", { weight: 1 }).then(() => order.push("light"));

      expect(limiter.tryAcquire("market-data", 1)).toBe(false);

      await vi.advanceTimersByTimeAsync(999);
      expect(order).toEqual([]);

      // Both fit in the fresh window and are released together, in order
      await vi.advanceTimersByTimeAsync(1);
      expect(order).toEqual(["heavy", "light"]);
      await Promise.all([heavy, light]);
    });

    it("should never grant more than the budget within one window", async () => {
      const limiter = createRateLimiter({ rules: [rule(3)] });
      const grantedAt: number[] = [];

      const callers = Array.from({ length: 10 }, () =>
        limiter.acquire("market-data").then(() => {
          grantedAt.push(Date.now() - START);
        }),
      );

      await vi.advanceTimersByTimeAsync(5000);
      await Promise.all(callers);

      expect(grantedAt).toEqual([0, 0, 0, 1000, 1000, 1000, 2000, 2000, 2000, 3000]);
      for (const t of grantedAt) {
        const inWindow = grantedAt.filter((other) => other >= t && other < t + 1000);
        expect(inWindow.length).toBeLessThanOrEqual(3);
      }
    });

    it("should project waits across the queue", async () => {
      const limiter = createRateLimiter({ rules: [rule(1)] });
      await limiter.acquire("market-data");
      const queued = limiter.acquire("market-data");

      expect(limiter.getWaitTimeMs("market-data")).toBe(2000);

      await vi.advanceTimersByTimeAsync(1000);
      await queued;
      expect(limiter.getWaitTimeMs("market-data")).toBe(1000);
    });
  });

  describe("randomized schedule", () => {
    // Deterministic PRNG so failures reproduce from the seed
    const seededRandom = (seed: number): (() => number) => {
      let state = seed;
      return () => {
        state = (state + 0x6d2b79f5) | 0;
        let t = Math.imul(state ^ (state >>> 15), 1 | state);
        t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
      };
    };

    it.each([1, 7, 42, 2026])(
      "should keep every window within budget for seed %i",
      async (seed) => {
        const random = seededRandom(seed);
        const maxRequests = 5;
        const windowMs = 1000;
        const requests = 60;
        const limiter = createRateLimiter({
          rules: [rule(maxRequests, windowMs)],
          maxWaitMs: Number.POSITIVE_INFINITY,
        });
        const grants: Array<{ at: number; weight: number }> = [];
        const outcomes: Promise<void>[] = [];
        const aborts: Array<() => void> = [];
        let cancelled = 0;

        for (let i = 0; i < requests; i++) {
          const weight = 1 + Math.floor(random() * 3);
          const controller = new AbortController();
          const reason = new Error(`cancelled ${i}`);
          outcomes.push(
            limiter.acquire("market-data", { weight, signal: controller.signal }).then(
              () => {
                grants.push({ at: Date.now() - START, weight });
              },
              (error: unknown) => {
                expect(error).toBe(reason);
                cancelled++;
              },
            ),
          );
          if (random() < 0.2) {
            aborts.push(() => controller.abort(reason));
          }

          await vi.advanceTimersByTimeAsync(Math.floor(random() * 250));
          if (random() < 0.5) {
            aborts.shift()?.();
          }
        }
        for (const abort of aborts) {
          abort();
        }
        await vi.advanceTimersByTimeAsync(120_000);
        await Promise.all(outcomes);

        expect(grants.length + cancelled).toBe(requests);
        expect(limiter.getPendingCount("market-data")).toBe(0);
        for (const { at } of grants) {
          const used = grants
            .filter((grant) => grant.at >= at && grant.at < at + windowMs)
            .reduce((sum, grant) => sum + grant.weight, 0);
          expect(used).toBeLessThanOrEqual(maxRequests);
        }
      },
    );
  });

  describe("acquire with fail policy", () => {
    it("should reject immediately with a retry hint", async () => {
      const limiter = createRateLimiter({ rules: [rule(2)], onExhausted: "fail" });
      await limiter.acquire("market-data");

      vi.advanceTimersByTime(300);
      await limiter.acquire("market-data");

      const error = await limiter.acquire("market-data").catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RateLimitExceededError);
      if (error instanceof RateLimitExceededError) {
        expect(error.waitTimeMs).toBe(700);
      }
    });
  });

  describe("cancellation", () => {
    it("should reject an already aborted request without consuming budget", async () => {
      const limiter = createRateLimiter({ rules: [rule(2)] });
      const controller = new AbortController();
      const reason = new Error("cancelled");
      controller.abort(reason);

      await expect(limiter.acquire("market-data", { signal: controller.signal })).rejects.toBe(
        reason,
      );
      expect(limiter.getAvailable("market-data")).toBe(2);
    });

    it("should not let a cancelled waiter consume budget", async () => {
      const limiter = createRateLimiter({ rules: [rule(2)] });
      await limiter.acquire("market-data");
      await limiter.acquire("market-data");

      const controller = new AbortController();
      const reason = new Error("cancelled");
      const cancelled = limiter
        .acquire("market-data", { signal: controller.signal })
        .catch((e: unknown) => e);
      const kept = limiter.acquire("market-data");

      controller.abort(reason);
      expect(await cancelled).toBe(reason);
      expect(limiter.getPendingCount("market-data")).toBe(1);

      await vi.advanceTimersByTimeAsync(1000);
      await kept;

      expect(limiter.getAvailable("market-data")).toBe(1);
    });

    it("should release followers that fit once the head is cancelled", async () => {
      const limiter = createRateLimiter({ rules: [rule(3)] });
      await limiter.acquire("market-data", { weight: 2 });

      const controller = new AbortController();
      const heavy = limiter
        .acquire("market-data", { weight: 2, signal: controller.signal })
        .catch((e: unknown) => e);
      let lightAdmitted = false;
      const light = limiter.acquire("market-data", { weight: 1 }).then(() => {
        lightAdmitted = true;
      });

      controller.abort(new Error("cancelled"));
      await heavy;
      await light;

      expect(lightAdmitted).toBe(true);
      expect(limiter.getAvailable("market-data")).toBe(0);
    });

    it("should ignore aborts after the request was admitted", async () => {
      const limiter = createRateLimiter({ rules: [rule(1)] });
      const controller = new AbortController();

      await limiter.acquire("market-data", { signal: controller.signal });
      controller.abort(new Error("late"));

      expect(limiter.getAvailable("market-data")).toBe(0);
    });
  });

  describe("unconfigured categories", () => {
    it("should admit them without counting by default", async () => {
      const limiter = createRateLimiter({ rules: [rule(1)] });

      await limiter.acquire("orders");
      await limiter.acquire("orders");

      expect(limiter.tryAcquire("orders")).toBe(true);
      expect(limiter.getAvailable("orders")).toBe(Number.POSITIVE_INFINITY);
      expect(limiter.hasRule("orders")).toBe(false);
    });

    it("should reject them when configured to deny", async () => {
      const limiter = createRateLimiter({ rules: [rule(1)], unknownCategory: "deny" });

      const error = await limiter.acquire("orders").catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RateLimitExceededError);
      if (error instanceof RateLimitExceededError) {
        expect(error.category).toBe("orders");
        expect(error.waitTimeMs).toBeNull();
      }
      expect(limiter.tryAcquire("orders")).toBe(false);
    });
  });

  it("should reject a weight larger than the whole budget", async () => {
    const limiter = createRateLimiter({ rules: [rule(5)] });

    const error = await limiter.acquire("market-data", { weight: 6 }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RateLimitExceededError);
    if (error instanceof RateLimitExceededError) {
      expect(error.waitTimeMs).toBeNull();
    }
  });

  it("should reject invalid weights", async () => {
    const limiter = createRateLimiter({ rules: [rule(5)] });

    await expect(limiter.acquire("market-data", { weight: 0 })).rejects.toThrow(RangeError);
  });

  describe("close", () => {
    it("should reject queued waiters and refuse new requests", async () => {
      const limiter = createRateLimiter({ rules: [rule(1)] });
      await limiter.acquire("market-data");
      const queued = limiter.acquire("market-data").catch((e: unknown) => e);

      limiter.close();

      expect(await queued).toBeInstanceOf(RateLimiterClosedError);
      await expect(limiter.acquire("market-data")).rejects.toThrow(RateLimiterClosedError);
      expect(limiter.tryAcquire("market-data")).toBe(false);
      expect(limiter.getPendingCount("market-data")).toBe(0);
    });

    it("should be idempotent", () => {
      const limiter = createRateLimiter({ rules: [rule(1)] });

      limiter.close();
      expect(() => limiter.close()).not.toThrow();
    });
  });

  describe("configuration", () => {
    it("should reject duplicate categories", () => {
      expect(() => createRateLimiter({ rules: [rule(1), rule(2)] })).toThrow(
        'Duplicate rate limit rule for category "market-data"',
      );
    });

    it("should reject malformed rules", () => {
      expect(() =>
        createRateLimiter({ rules: [{ category: "orders", maxRequests: 0, windowMs: 1000 }] }),
      ).toThrow();
      expect(() =>
        createRateLimiter({ rules: [{ category: "orders", maxRequests: 1, windowMs: 0 }] }),
      ).toThrow();
    });

    it("should log waits through the provided logger", async () => {
      const logger = { debug: vi.fn() };
      const limiter = createRateLimiter({ rules: [rule(1)], logger });
      await limiter.acquire("market-data");

      const queued = limiter.acquire("market-data");

      expect(logger.debug).toHaveBeenCalledWith("Rate limit wait", {
        category: "market-data",
        weight: 1,
        waitTimeMs: 1000,
        queued: 0,
      });
      await vi.advanceTimersByTimeAsync(1000);
      await queued;
    });
  });
});
