/**
 * Token usage and cost accounting.
 *
 * Prices are per million tokens and come from configuration, never from a
 * module-level table, so tests and deployments can price models differently.
 *
 * @module usage
 */

import { PricingTable, ResponseUsage, SessionUsage } from "./types";

export function calculateCost(pricing: PricingTable, model: string, inputTokens: number, outputTokens: number): number {
    const price = pricing[model];
    if (!price) {
        return 0;
    }
    return (inputTokens / 1_000_000) * price.input + (outputTokens / 1_000_000) * price.output;
}

export function emptyResponseUsage(model = "", responseTimeMs = 0): ResponseUsage {
    return { model, inputTokens: 0, outputTokens: 0, costUsd: 0, responseTimeMs };
}

export function createSessionUsage(now: Date = new Date()): SessionUsage {
    return {
        totalApiCalls: 0,
        totalInputTokens: 0,
        totalOutputTokens: 0,
        totalCostUsd: 0,
        totalResponseTimeMs: 0,
        sessionStartTime: now.toISOString(),
        lastCallTime: null,
    };
}

/**
 * Fold one call's usage into the session totals. Returns a new object.
 */
export function accumulateUsage(session: SessionUsage, call: ResponseUsage, now: Date = new Date()): SessionUsage {
    return {
        ...session,
        totalApiCalls: session.totalApiCalls + 1,
        totalInputTokens: session.totalInputTokens + call.inputTokens,
        totalOutputTokens: session.totalOutputTokens + call.outputTokens,
        totalCostUsd: session.totalCostUsd + call.costUsd,
        totalResponseTimeMs: session.totalResponseTimeMs + call.responseTimeMs,
        lastCallTime: now.toISOString(),
    };
}

export function formatResponseUsage(usage: ResponseUsage): string {
    return [
        "LAST RESPONSE",
        `  Model:         ${usage.model || "n/a"}`,
        `  Response time: ${usage.responseTimeMs}ms`,
        `  Input tokens:  ${usage.inputTokens.toLocaleString("en-US")}`,
        `  Output tokens: ${usage.outputTokens.toLocaleString("en-US")}`,
        `  Cost (USD):    $${usage.costUsd.toFixed(6)}`,
    ].join("\n");
}

export function formatSessionUsage(usage: SessionUsage): string {
    if (usage.totalApiCalls === 0) {
        return "SESSION USAGE\n  No API calls made yet";
    }

    const totalTokens = usage.totalInputTokens + usage.totalOutputTokens;
    const calls = usage.totalApiCalls;

    return [
        "SESSION USAGE",
        `  API calls:             ${calls}`,
        `  Input tokens:          ${usage.totalInputTokens.toLocaleString("en-US")}`,
        `  Output tokens:         ${usage.totalOutputTokens.toLocaleString("en-US")}`,
        `  Total tokens:          ${totalTokens.toLocaleString("en-US")}`,
        `  Total cost (USD):      $${usage.totalCostUsd.toFixed(6)}`,
        `  Avg cost per call:     $${(usage.totalCostUsd / calls).toFixed(6)}`,
        `  Avg response time:     ${Math.round(usage.totalResponseTimeMs / calls)}ms`,
        `  Session started:       ${usage.sessionStartTime}`,
        `  Last call:             ${usage.lastCallTime ?? "none"}`,
    ].join("\n");
}
