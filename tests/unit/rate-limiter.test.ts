import { describe, it, expect } from "vitest";
import { RateLimiter } from "../../lib/core/rate-limiter";
import { ExtractionError } from "../../lib/core/errors";

function connectionReset() {
    return Object.assign(new Error("socket hang up"), { code: "ECONNRESET" });
}

function recordingSleep() {
    const sleeps: number[] = [];
    return {
        sleeps,
        sleep: async (ms: number) => {
            sleeps.push(ms);
        },
    };
}

describe("RateLimiter", () => {
    it("should retry retryable failures and return the eventual value", async () => {
        const { sleeps, sleep } = recordingSleep();
        const limiter = new RateLimiter(
            { delayMs: 0, maxRetries: 3, maxConcurrent: 1, baseBackoffMs: 100, maxBackoffMs: 1000 },
            { sleep, random: () => 0.5 }
        );

        let calls = 0;
        const value = await limiter.execute(async () => {
            calls++;
            if (calls < 3) {
                throw connectionReset();
            }
            return "ok";
        });

        expect(value).toBe("ok");
        expect(calls).toBe(3);
        expect(sleeps).toEqual([50, 100]);
    });

    it("should give up after maxRetries", async () => {
        const { sleep } = recordingSleep();
        const limiter = new RateLimiter({ delayMs: 0, maxRetries: 2, maxConcurrent: 1 }, { sleep, random: () => 0 });

        let calls = 0;
        const run = limiter.execute(async () => {
            calls++;
            throw connectionReset();
        }, "flaky");

        await expect(run).rejects.toMatchObject({ code: "TRANSIENT", message: "flaky: socket hang up" });
        expect(calls).toBe(3);
    });

    it("should not retry errors that are not retryable", async () => {
        const { sleeps, sleep } = recordingSleep();
        const limiter = new RateLimiter({ delayMs: 0, maxRetries: 3, maxConcurrent: 1 }, { sleep });

        let calls = 0;
        const run = limiter.execute(async () => {
            calls++;
            throw new Error("bad request");
        });

        await expect(run).rejects.toBeInstanceOf(ExtractionError);
        expect(calls).toBe(1);
        expect(sleeps).toEqual([]);
    });

    it("should cap exponential backoff", () => {
        const limiter = new RateLimiter(
            { delayMs: 0, maxRetries: 5, maxConcurrent: 1, baseBackoffMs: 500, maxBackoffMs: 1000 },
            { random: () => 0.999 }
        );

        expect(limiter.backoffFor(1)).toBe(499);
        expect(limiter.backoffFor(2)).toBe(999);
        expect(limiter.backoffFor(5)).toBe(999);
    });

    it("should respect maxConcurrent", async () => {
        const limiter = new RateLimiter({ delayMs: 0, maxRetries: 0, maxConcurrent: 2 });

        let inFlight = 0;
        let maxSeenInFlight = 0;
        const task = async () => {
            inFlight++;
            maxSeenInFlight = Math.max(maxSeenInFlight, inFlight);
            await new Promise((resolve) => setTimeout(resolve, 20));
            inFlight--;
        };

        await Promise.all(Array.from({ length: 5 }, () => limiter.execute(task)));

        expect(maxSeenInFlight).toBe(2);
        expect(limiter.inFlight).toBe(0);
    });
});
