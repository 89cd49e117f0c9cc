/**
 * Extraction Gateway
 *
 * ## The Boundary Pattern
 *
 * The conversation layer never talks to a model SDK directly. It depends on
 * the `ExtractionGateway` interface, which turns one user message into an
 * `ExtractionResult` plus usage metadata. Implementations are picked when the
 * application is wired together:
 *
 * - `ModelExtractionGateway` - production, Gemini through the Vercel AI SDK
 * - a scripted in-memory gateway in the test helpers
 *
 * ## Failure Contract
 *
 * `extract()` does not reject. Timeouts, provider errors and off-schema
 * answers are retried where that makes sense (see `RateLimiter`) and
 * otherwise logged; the caller then receives an empty extraction, which the
 * merger treats as "nothing new this turn".
 *
 * @module extraction-gateway
 */

import { generateObject } from "ai";
import { createGoogleGenerativeAI } from "@ai-sdk/google";
import { invoiceExtractor, InvoiceFields, InvoiceFieldsSchema } from "../extractors/invoice";
import { ExtractionResult, INVOICE_FIELDS } from "../invoice/types";
import { ExtractorConfig, PricingTable, RateLimitConfig, ResponseUsage } from "./types";
import { RateLimiter } from "./rate-limiter";
import { ApiKeyError, wrapError } from "./errors";
import { calculateCost, emptyResponseUsage } from "./usage";
import { createLogger } from "./logger";

const logger = createLogger("extraction-gateway");

export interface GatewayResult {
    fields: ExtractionResult;
    usage: ResponseUsage;
}

export interface ExtractionGateway {
    /** Human-readable identifier, reported by the health endpoint. */
    readonly name: string;
    extract(userText: string): Promise<GatewayResult>;
}

/**
 * Configuration options for the model-backed gateway.
 */
export interface ModelExtractionGatewayOptions {
    /**
     * Gemini API key.
     * Defaults to `GEMINI_API_KEY` environment variable.
     */
    apiKey?: string;

    /** Model to use (default: "gemini-2.5-flash"). */
    model?: string;

    /**
     * Temperature for generation (default: 0.1).
     * Low temperature keeps field extraction deterministic.
     */
    temperature?: number;

    /** Abort a single model call after this many milliseconds (default: 30000). */
    timeoutMs?: number;

    /** Per-million-token prices used for cost metadata. */
    pricing?: PricingTable;

    /** Overrides for pacing and retry. */
    rateLimit?: Partial<RateLimitConfig>;

    /** Extractor definition; defaults to the invoice field extractor. */
    extractor?: ExtractorConfig<typeof InvoiceFieldsSchema>;
}

function compact(fields: InvoiceFields): ExtractionResult {
    const result: ExtractionResult = {};
    for (const field of INVOICE_FIELDS) {
        const value = fields[field];
        if (value !== null && value !== undefined) {
            result[field] = value;
        }
    }
    return result;
}

function tokenCount(value: number | undefined): number {
    return value !== undefined && Number.isFinite(value) ? value : 0;
}

/**
 * Production gateway backed by Gemini.
 *
 * @example
 * ```typescript
 * const gateway = createGateway({ model: "gemini-2.5-flash" });
 * const { fields } = await gateway.extract("Bill Acme $500 due net 30");
 * // { customer_name: "Acme", total_amount: 500, due_date: "net 30" }
 * ```
 */
export class ModelExtractionGateway implements ExtractionGateway {
    readonly name: string;

    private google: ReturnType<typeof createGoogleGenerativeAI>;
    private model: string;
    private temperature: number;
    private timeoutMs: number;
    private pricing: PricingTable;
    private extractor: ExtractorConfig<typeof InvoiceFieldsSchema>;
    private rateLimiter: RateLimiter;

    constructor(options: ModelExtractionGatewayOptions = {}) {
        const apiKey = options.apiKey || process.env.GEMINI_API_KEY;

        if (!apiKey) {
            throw new ApiKeyError(
                "GEMINI_API_KEY is required. Set it in your environment or pass it to the constructor."
            );
        }

        this.google = createGoogleGenerativeAI({ apiKey });
        this.model = options.model || "gemini-2.5-flash";
        this.temperature = options.temperature ?? 0.1;
        this.timeoutMs = options.timeoutMs ?? 30_000;
        this.pricing = options.pricing ?? {};
        this.extractor = options.extractor ?? invoiceExtractor;
        this.rateLimiter = new RateLimiter({ ...this.extractor.rateLimit, ...options.rateLimit });
        this.name = `gemini:${this.model}`;
    }

    /**
     * Extract invoice fields from one message. Resolves with an empty
     * extraction when the call ultimately fails.
     */
    async extract(userText: string): Promise<GatewayResult> {
        const startTime = Date.now();

        try {
            const result = await this.rateLimiter.execute(
                () => this.callModel(userText),
                `Extraction "${this.extractor.name}"`
            );

            const inputTokens = tokenCount(result.usage.promptTokens);
            const outputTokens = tokenCount(result.usage.completionTokens);
            const usage: ResponseUsage = {
                model: this.model,
                inputTokens,
                outputTokens,
                costUsd: calculateCost(this.pricing, this.model, inputTokens, outputTokens),
                responseTimeMs: Date.now() - startTime,
            };
            const fields = compact(result.object);

            logger.info(`Extraction complete`, {
                fields: Object.keys(fields).length,
                inputTokens,
                outputTokens,
                responseTimeMs: usage.responseTimeMs,
            });

            return { fields, usage };
        } catch (error) {
            const exError = wrapError(error);
            logger.error(`Extraction failed, continuing with empty result`, {
                error: exError.message,
                errorCode: exError.code,
            });
            return { fields: {}, usage: emptyResponseUsage(this.model, Date.now() - startTime) };
        }
    }

    private callModel(userText: string) {
        // Retries are owned by the rate limiter, not by the SDK.
        return generateObject({
            model: this.google(this.model),
            schema: this.extractor.schema,
            prompt: this.extractor.buildPrompt(userText),
            temperature: this.temperature,
            maxRetries: 0,
            abortSignal: AbortSignal.timeout(this.timeoutMs),
        });
    }
}

/**
 * Factory function for the production gateway.
 */
export function createGateway(options?: ModelExtractionGatewayOptions): ModelExtractionGateway {
    return new ModelExtractionGateway(options);
}
