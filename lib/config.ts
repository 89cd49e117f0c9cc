/**
 * Application configuration, read once from the environment.
 *
 * `.env` is loaded by dotenv and the result is validated with zod, so a typo
 * in `PORT` fails at startup instead of at the first request.
 *
 * @module config
 */

import dotenv from "dotenv";
import { z } from "zod";
import { ConfigError } from "./core/errors";
import { DEFAULT_RATE_LIMIT, PricingTable, RateLimitConfig } from "./core/types";
import { LogLevel } from "./core/logger";

/**
 * Default per-million-token prices in USD. Override with `MODEL_PRICING`
 * (JSON of the same shape).
 */
export const DEFAULT_PRICING: PricingTable = {
    "gemini-2.5-flash": { input: 0.3, output: 2.5 },
    "gemini-2.5-pro": { input: 1.25, output: 10 },
    "gemini-2.0-flash": { input: 0.1, output: 0.4 },
};

const pricingSchema = z.record(
    z.string(),
    z.object({ input: z.number().nonnegative(), output: z.number().nonnegative() })
);

const envSchema = z.object({
    GEMINI_API_KEY: z.string().optional(),
    EXTRACTION_MODEL: z.string().min(1).default("gemini-2.5-flash"),
    EXTRACTION_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.1),
    EXTRACTION_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
    EXTRACTION_MAX_RETRIES: z.coerce.number().int().min(0).default(DEFAULT_RATE_LIMIT.maxRetries),
    EXTRACTION_DELAY_MS: z.coerce.number().int().min(0).default(DEFAULT_RATE_LIMIT.delayMs),
    EXTRACTION_MAX_CONCURRENT: z.coerce.number().int().positive().default(DEFAULT_RATE_LIMIT.maxConcurrent),
    MODEL_PRICING: z.string().optional(),
    HOST: z.string().min(1).default("0.0.0.0"),
    PORT: z.coerce.number().int().min(0).max(65535).default(8000),
    CORS_ORIGINS: z.string().default("*"),
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
    PUBLIC_BASE_URL: z.string().url().optional(),
});

export interface AppConfig {
    apiVersion: string;
    extraction: {
        apiKey?: string;
        model: string;
        temperature: number;
        timeoutMs: number;
        rateLimit: Partial<RateLimitConfig>;
        pricing: PricingTable;
    };
    server: {
        host: string;
        port: number;
        corsOrigins: string[] | "*";
        publicBaseUrl: string;
    };
    logLevel: LogLevel;
}

export const API_VERSION = "1.0.0";

function parsePricing(raw: string | undefined): PricingTable {
    if (!raw) {
        return DEFAULT_PRICING;
    }
    let json: unknown;
    try {
        json = JSON.parse(raw);
    } catch {
        throw new ConfigError("MODEL_PRICING is not valid JSON");
    }
    const parsed = pricingSchema.safeParse(json);
    if (!parsed.success) {
        throw new ConfigError(`MODEL_PRICING is invalid: ${parsed.error.issues[0]?.message ?? "unknown issue"}`);
    }
    return { ...DEFAULT_PRICING, ...parsed.data };
}

/**
 * Build the configuration from an environment map (default: `process.env`).
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
        throw new ConfigError(`Invalid environment: ${issues.join("; ")}`);
    }
    const e = parsed.data;

    const origins = e.CORS_ORIGINS.trim();

    return {
        apiVersion: API_VERSION,
        extraction: {
            apiKey: e.GEMINI_API_KEY || undefined,
            model: e.EXTRACTION_MODEL,
            temperature: e.EXTRACTION_TEMPERATURE,
            timeoutMs: e.EXTRACTION_TIMEOUT_MS,
            rateLimit: {
                maxRetries: e.EXTRACTION_MAX_RETRIES,
                delayMs: e.EXTRACTION_DELAY_MS,
                maxConcurrent: e.EXTRACTION_MAX_CONCURRENT,
            },
            pricing: parsePricing(e.MODEL_PRICING),
        },
        server: {
            host: e.HOST,
            port: e.PORT,
            corsOrigins: origins === "*" ? "*" : origins.split(",").map((origin) => origin.trim()).filter(Boolean),
            publicBaseUrl: e.PUBLIC_BASE_URL ?? `http://localhost:${e.PORT}`,
        },
        logLevel: e.LOG_LEVEL,
    };
}

/**
 * Load `.env` into `process.env`, then parse it.
 */
export function loadConfigFromEnv(): AppConfig {
    dotenv.config();
    return loadConfig(process.env);
}
