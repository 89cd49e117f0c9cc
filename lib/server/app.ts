/**
 * HTTP surface of the assistant.
 *
 * | Method | Path                        | Handler                          |
 * |--------|-----------------------------|----------------------------------|
 * | POST   | `/conversation`             | `orchestrator.handleTurn`        |
 * | POST   | `/invoice/approve`          | `orchestrator.approve`           |
 * | GET    | `/invoice/:invoiceId`       | `orchestrator.getInvoice`        |
 * | GET    | `/session/:sessionId`       | `orchestrator.getSessionInfo`    |
 * | POST   | `/session/:sessionId/reset` | `orchestrator.resetSession`      |
 * | GET    | `/health`                   | status, version, extractor name  |
 *
 * Errors answer `{ error, message, details? }`: zod failures and bad JSON
 * with 400, workflow errors with their own status, anything else with 500.
 *
 * @module app
 */
import express, { ErrorRequestHandler, NextFunction, Request, Response } from "express";
import cors from "cors";
import { ZodError } from "zod";
import { createLogger } from "../core/logger";
import { ConversationOrchestrator, ApprovalRequest } from "../conversation/orchestrator";
import { WorkflowError } from "../conversation/errors";
import {
    ApprovalRequestBody,
    approvalRequestSchema,
    conversationRequestSchema,
    invoiceParamsSchema,
    sessionParamsSchema,
} from "./schemas";

const logger = createLogger("http");

export interface AppOptions {
    orchestrator: ConversationOrchestrator;
    version: string;
    corsOrigins?: string[] | "*";
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

// express 4 does not forward rejected promises to the error handler
const route = (handler: AsyncHandler) => (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
};

function toApprovalRequest(body: ApprovalRequestBody): ApprovalRequest {
    if (body.action === "approve") {
        return { sessionId: body.sessionId, action: "approve" };
    }
    return { sessionId: body.sessionId, action: "edit", fieldUpdates: body.fieldUpdates };
}

const errorHandler: ErrorRequestHandler = (err: unknown, req, res, _next) => {
    if (err instanceof ZodError) {
        res.status(400).json({ error: "validation_error", message: "Invalid request", details: err.flatten() });
        return;
    }
    if (err instanceof WorkflowError) {
        res.status(err.status).json({ error: err.code, message: err.message, details: err.details });
        return;
    }
    if (err instanceof SyntaxError) {
        res.status(400).json({ error: "invalid_json", message: "Request body is not valid JSON" });
        return;
    }

    const message = err instanceof Error ? err.message : String(err);
    logger.error(`Unhandled error`, { method: req.method, path: req.path, error: message });
    res.status(500).json({ error: "internal_error", message: `Internal error: ${message}` });
};

export function createApp({ orchestrator, version, corsOrigins = "*" }: AppOptions) {
    const app = express();
    app.use(cors({ origin: corsOrigins === "*" ? "*" : corsOrigins }));
    app.use(express.json({ limit: "1mb" }));

    app.post("/conversation", route(async (req, res) => {
        const body = conversationRequestSchema.parse(req.body ?? {});
        const result = await orchestrator.handleTurn(body);
        res.json({ success: true, ...result });
    }));

    app.post("/invoice/approve", route(async (req, res) => {
        const body = approvalRequestSchema.parse(req.body ?? {});
        const result = await orchestrator.approve(toApprovalRequest(body));
        res.json(result);
    }));

    app.get("/invoice/:invoiceId", route(async (req, res) => {
        const { invoiceId } = invoiceParamsSchema.parse(req.params);
        res.json(await orchestrator.getInvoice(invoiceId));
    }));

    app.get("/session/:sessionId", route(async (req, res) => {
        const { sessionId } = sessionParamsSchema.parse(req.params);
        res.json(await orchestrator.getSessionInfo(sessionId));
    }));

    app.post("/session/:sessionId/reset", route(async (req, res) => {
        const { sessionId } = sessionParamsSchema.parse(req.params);
        res.json(await orchestrator.resetSession(sessionId));
    }));

    app.get("/health", (_req, res) => {
        res.json({
            status: "healthy",
            timestamp: new Date().toISOString(),
            version,
            extractor: orchestrator.extractorName,
        });
    });

    app.use((req, res) => {
        res.status(404).json({ error: "not_found", message: `No route for ${req.method} ${req.path}` });
    });

    app.use(errorHandler);

    return app;
}
