/**
 * Shared types for the extraction layer.
 *
 * @module types
 */

import { ZodTypeAny } from "zod";

/**
 * Pacing and retry policy for outbound model calls.
 */
export interface RateLimitConfig {
    /** Minimum spacing between two call starts, in milliseconds. */
    delayMs: number;

    /** Retries after the first attempt (0 disables retrying). */
    maxRetries: number;

    /** Calls allowed in flight at the same time. */
    maxConcurrent: number;

    /** First backoff step; doubles on every retry. Defaults to 500ms. */
    baseBackoffMs?: number;

    /** Upper bound for a single backoff sleep. Defaults to 8s. */
    maxBackoffMs?: number;
}

/**
 * Conservative defaults sized for the Gemini free tier (10 RPM).
 */
export const DEFAULT_RATE_LIMIT: RateLimitConfig = {
    delayMs: 1000,
    maxRetries: 3,
    maxConcurrent: 2,
    baseBackoffMs: 500,
    maxBackoffMs: 8000,
};

/**
 * Describes one structured-extraction task: what to ask the model and which
 * shape the answer must have.
 */
export interface ExtractorConfig<T extends ZodTypeAny> {
    name: string;
    description: string;
    schema: T;
    buildPrompt: (text: string) => string;
    rateLimit?: Partial<RateLimitConfig>;
}

/** Per-million-token prices for one model, in USD. */
export interface ModelPricing {
    input: number;
    output: number;
}

export type PricingTable = Record<string, ModelPricing>;

/**
 * Metadata for a single model call.
 */
export interface ResponseUsage {
    model: string;
    inputTokens: number;
    outputTokens: number;
    costUsd: number;
    responseTimeMs: number;
}

/**
 * Running totals across every call made for one session.
 */
export interface SessionUsage {
    totalApiCalls: number;
    totalInputTokens: number;
    totalOutputTokens: number;
    totalCostUsd: number;
    totalResponseTimeMs: number;
    sessionStartTime: string;
    lastCallTime: string | null;
}
