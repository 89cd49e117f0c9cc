import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { generateObject } from "ai";
import { createGateway } from "../../lib/core/extraction-gateway";
import { ApiKeyError } from "../../lib/core/errors";
import { setLogLevel } from "../../lib/core/logger";

// Mock the model call, keep the SDK's error classes
vi.mock("ai", async (importOriginal) => {
    const actual = await importOriginal<typeof import("ai")>();
    return { ...actual, generateObject: vi.fn() };
});

const PRICING = { "test-model": { input: 1, output: 2 } };

function modelAnswer(object: Record<string, unknown>) {
    return {
        object,
        finishReason: "stop",
        usage: { promptTokens: 1000, completionTokens: 200, totalTokens: 1200 },
    } as unknown as Awaited<ReturnType<typeof generateObject>>;
}

describe("ModelExtractionGateway", () => {
    beforeEach(() => {
        vi.clearAllMocks();
        setLogLevel("silent");
    });

    afterEach(() => {
        setLogLevel("info");
        vi.unstubAllEnvs();
    });

    it("should return the non-null fields and usage metadata", async () => {
        const mockFn = vi.mocked(generateObject);
        mockFn.mockResolvedValue(
            modelAnswer({
                customer_name: "Acme Corp",
                customer_email: null,
                invoice_description: null,
                total_amount: 500,
                due_date: "net 30",
            })
        );

        const gateway = createGateway({ apiKey: "test-key", model: "test-model", pricing: PRICING });
        const result = await gateway.extract("Bill Acme Corp $500, net 30");

        expect(result.fields).toEqual({ customer_name: "Acme Corp", total_amount: 500, due_date: "net 30" });
        expect(result.usage.model).toBe("test-model");
        expect(result.usage.inputTokens).toBe(1000);
        expect(result.usage.outputTokens).toBe(200);
        expect(result.usage.costUsd).toBeCloseTo(0.0014);
        expect(gateway.name).toBe("gemini:test-model");
    });

    it("should leave retries to the rate limiter and include the message in the prompt", async () => {
        const mockFn = vi.mocked(generateObject);
        mockFn.mockResolvedValue(modelAnswer({}));

        const gateway = createGateway({ apiKey: "test-key", temperature: 0.2 });
        await gateway.extract("Invoice Globex for consulting");

        expect(mockFn).toHaveBeenCalledTimes(1);
        expect(mockFn).toHaveBeenCalledWith(expect.objectContaining({ maxRetries: 0, temperature: 0.2 }));
        const options = mockFn.mock.calls[0]?.[0];
        expect(options?.prompt).toContain('"Invoice Globex for consulting"');
    });

    it("should return an empty extraction when the call fails", async () => {
        const mockFn = vi.mocked(generateObject);
        mockFn.mockRejectedValue(new Error("model exploded"));

        const gateway = createGateway({ apiKey: "test-key", model: "test-model" });
        const result = await gateway.extract("anything");

        expect(result.fields).toEqual({});
        expect(result.usage.inputTokens).toBe(0);
        expect(result.usage.model).toBe("test-model");
        expect(mockFn).toHaveBeenCalledTimes(1);
    });

    it("should retry a transient failure", async () => {
        const mockFn = vi.mocked(generateObject);
        mockFn
            .mockRejectedValueOnce(Object.assign(new Error("socket hang up"), { code: "ECONNRESET" }))
            .mockResolvedValueOnce(modelAnswer({ customer_name: "Initech" }));

        const gateway = createGateway({
            apiKey: "test-key",
            rateLimit: { delayMs: 0, baseBackoffMs: 1, maxRetries: 2 },
        });
        const result = await gateway.extract("Initech");

        expect(result.fields).toEqual({ customer_name: "Initech" });
        expect(mockFn).toHaveBeenCalledTimes(2);
    });

    it("should return an empty extraction once retries run out", async () => {
        const mockFn = vi.mocked(generateObject);
        mockFn.mockRejectedValue(Object.assign(new Error("socket hang up"), { code: "ECONNRESET" }));

        const gateway = createGateway({
            apiKey: "test-key",
            model: "test-model",
            rateLimit: { delayMs: 0, baseBackoffMs: 1, maxRetries: 1 },
        });
        const result = await gateway.extract("Initech");

        expect(result.fields).toEqual({});
        expect(result.usage.inputTokens).toBe(0);
        expect(mockFn).toHaveBeenCalledTimes(2);
    });

    it("should require an API key", () => {
        vi.stubEnv("GEMINI_API_KEY", "");
        expect(() => createGateway()).toThrow(ApiKeyError);
    });
});
