/**
 * Workflow errors raised by the conversation layer. Each carries the HTTP
 * status the API should answer with.
 */

export class WorkflowError extends Error {
    readonly code: string;
    readonly status: number;
    readonly details?: Record<string, unknown>;

    constructor(message: string, code: string, status: number, details?: Record<string, unknown>) {
        super(message);
        this.name = "WorkflowError";
        this.code = code;
        this.status = status;
        this.details = details;
    }
}

export class SessionNotFoundError extends WorkflowError {
    constructor(sessionId: string) {
        super(`Session ${sessionId} not found`, "session_not_found", 404, { sessionId });
        this.name = "SessionNotFoundError";
    }
}

export class InvoiceNotFoundError extends WorkflowError {
    constructor(invoiceId: string) {
        super(`Invoice ${invoiceId} not found`, "invoice_not_found", 404, { invoiceId });
        this.name = "InvoiceNotFoundError";
    }
}

export class InvoiceIncompleteError extends WorkflowError {
    constructor(missing: string[]) {
        super(`Invoice incomplete. Missing: ${missing.join(", ")}`, "invoice_incomplete", 400, { missingFields: missing });
        this.name = "InvoiceIncompleteError";
    }
}

export class UnsupportedActionError extends WorkflowError {
    constructor(action: string) {
        super(`Unsupported action: ${action}`, "unsupported_action", 400, { action });
        this.name = "UnsupportedActionError";
    }
}
