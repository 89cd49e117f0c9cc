/**
 * Rate Limiter
 *
 * Wraps every outbound model call with three guarantees:
 *
 * 1. **Concurrency cap** - at most `maxConcurrent` calls are in flight.
 * 2. **Spacing** - two call starts are at least `delayMs` apart.
 * 3. **Retry** - retryable failures (429, 5xx, timeouts, connection resets)
 *    are retried with exponential backoff and full jitter, up to
 *    `maxRetries` extra attempts. Anything else fails immediately.
 *
 * @module rate-limiter
 */

import { DEFAULT_RATE_LIMIT, RateLimitConfig } from "./types";
import { wrapError } from "./errors";
import { createLogger } from "./logger";

const logger = createLogger("rate-limiter");

export interface RateLimiterOptions {
    /** Source of randomness for jitter, in [0, 1). */
    random?: () => number;
    /** Sleep implementation. */
    sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export class RateLimiter {
    private readonly config: Required<RateLimitConfig>;
    private readonly random: () => number;
    private readonly sleep: (ms: number) => Promise<void>;

    private active = 0;
    private readonly waiting: Array<() => void> = [];
    private nextStartAt = 0;

    constructor(config: Partial<RateLimitConfig> = {}, options: RateLimiterOptions = {}) {
        const merged = { ...DEFAULT_RATE_LIMIT, ...config };
        this.config = {
            delayMs: merged.delayMs,
            maxRetries: merged.maxRetries,
            maxConcurrent: Math.max(1, merged.maxConcurrent),
            baseBackoffMs: merged.baseBackoffMs ?? 500,
            maxBackoffMs: merged.maxBackoffMs ?? 8000,
        };
        this.random = options.random ?? Math.random;
        this.sleep = options.sleep ?? defaultSleep;
    }

    /**
     * Run `task` under the limiter. Resolves with the task's value or rejects
     * with the last error, wrapped as an `ExtractionError`.
     */
    async execute<T>(task: () => Promise<T>, label = "task"): Promise<T> {
        await this.acquire();
        try {
            return await this.runWithRetry(task, label);
        } finally {
            this.release();
        }
    }

    /**
     * Backoff before retry number `attempt` (1-based): a random value in
     * `[0, min(maxBackoff, base * 2^(attempt-1)))`.
     */
    backoffFor(attempt: number): number {
        const ceiling = Math.min(this.config.maxBackoffMs, this.config.baseBackoffMs * 2 ** (attempt - 1));
        return Math.floor(this.random() * ceiling);
    }

    get inFlight(): number {
        return this.active;
    }

    private async runWithRetry<T>(task: () => Promise<T>, label: string): Promise<T> {
        for (let attempt = 0; ; attempt++) {
            await this.waitForSlot();
            try {
                return await task();
            } catch (error) {
                const wrapped = wrapError(error, label);
                if (!wrapped.retryable || attempt >= this.config.maxRetries) {
                    if (wrapped.retryable) {
                        logger.warn(`Retries exhausted`, { label, attempts: attempt + 1, code: wrapped.code });
                    }
                    throw wrapped;
                }

                const wait = this.backoffFor(attempt + 1);
                logger.warn(`Retrying after failure`, {
                    label,
                    attempt: attempt + 1,
                    maxRetries: this.config.maxRetries,
                    code: wrapped.code,
                    backoffMs: wait,
                });
                await this.sleep(wait);
            }
        }
    }

    private async waitForSlot(): Promise<void> {
        const now = Date.now();
        const startAt = Math.max(now, this.nextStartAt);
        this.nextStartAt = startAt + this.config.delayMs;
        if (startAt > now) {
            await this.sleep(startAt - now);
        }
    }

    private acquire(): Promise<void> {
        if (this.active < this.config.maxConcurrent) {
            this.active++;
            return Promise.resolve();
        }
        return new Promise((resolve) => {
            this.waiting.push(() => {
                this.active++;
                resolve();
            });
        });
    }

    private release(): void {
        this.active--;
        const next = this.waiting.shift();
        if (next) {
            next();
        }
    }
}
