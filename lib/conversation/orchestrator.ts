/**
 * Conversation Orchestrator
 *
 * Drives one invoice from free text to creation:
 *
 * ```
 *   collecting --(all five fields merged)--> ready --(APPROVE)--> created
 *        ^                                                          |
 *        +------------------------(reset)---------------------------+
 * ```
 *
 * Every turn is one of:
 * - `APPROVE` - create the invoice when ready, otherwise say what is missing
 * - `EDIT ...` - prompt for the new value (field-targeted edits go through
 *   `approve({ action: "edit" })`)
 * - anything else - extract fields from the message and merge them
 *
 * All work for one session runs under `SessionStore.withSession`, so turns
 * for the same session never interleave.
 *
 * @module orchestrator
 */

import { ExtractionGateway } from "../core/extraction-gateway";
import { ResponseUsage, SessionUsage } from "../core/types";
import { accumulateUsage } from "../core/usage";
import { createLogger } from "../core/logger";
import { applyFieldUpdates, invoiceStatus, isComplete, mergeExtraction, missingFields } from "../invoice/field-merger";
import { invoicePreview, InvoicePreview, missingFieldsMessage } from "../invoice/messages";
import { ExtractionResult, InvoiceField, InvoiceRecord, InvoiceStatus, Notice } from "../invoice/types";
import { CreatedInvoice, InvoiceRepository } from "./invoice-repository";
import { Session, SessionStore } from "./session-store";
import { InvoiceIncompleteError, InvoiceNotFoundError, SessionNotFoundError, UnsupportedActionError } from "./errors";

const logger = createLogger("orchestrator");

export type TurnAction =
    | "collecting_information"
    | "ready_for_approval"
    | "invoice_created"
    | "approval_blocked"
    | "edit_request"
    | "invoice_already_created";

export interface TurnResponse {
    sessionId: string;
    action: TurnAction;
    message: string;
    invoiceStatus: InvoiceStatus;
    missingFields: InvoiceField[];
    record: InvoiceRecord;
    notices: Notice[];
    /** Raw fields the model returned for this turn. */
    extracted?: ExtractionResult;
    preview?: InvoicePreview;
    invoice?: CreatedInvoice;
    /** Usage of this turn's model call, when one was made. */
    usage?: ResponseUsage;
    sessionUsage: SessionUsage;
}

export interface TurnRequest {
    userInput: string;
    sessionId?: string;
    userId?: string;
}

export type ApprovalRequest =
    | { sessionId: string; action: "approve" }
    | { sessionId: string; action: "edit"; fieldUpdates?: ExtractionResult };

export interface ApprovalResult {
    success: true;
    message: string;
    invoiceStatus: InvoiceStatus;
    missingFields: InvoiceField[];
    invoice?: CreatedInvoice;
    updatedFields?: InvoiceField[];
    notices?: Notice[];
}

export interface SessionInfo {
    sessionId: string;
    userId?: string;
    createdAt: string;
    updatedAt: string;
    invoiceStatus: InvoiceStatus;
    missingFields: InvoiceField[];
    record: InvoiceRecord;
    usage: SessionUsage;
    invoice?: CreatedInvoice;
}

export interface ConversationOrchestratorDeps {
    gateway: ExtractionGateway;
    sessions: SessionStore;
    invoices: InvoiceRepository;
    /** Clock used for date normalization and usage timestamps. */
    now?: () => Date;
}

export const EDIT_PROMPT = "Please provide the new information for the field you want to edit.";

export class ConversationOrchestrator {
    private readonly gateway: ExtractionGateway;
    private readonly sessions: SessionStore;
    private readonly invoices: InvoiceRepository;
    private readonly now: () => Date;

    constructor(deps: ConversationOrchestratorDeps) {
        this.gateway = deps.gateway;
        this.sessions = deps.sessions;
        this.invoices = deps.invoices;
        this.now = deps.now ?? (() => new Date());
    }

    get extractorName(): string {
        return this.gateway.name;
    }

    /**
     * Handle one user message. Without a `sessionId` a new session is opened.
     */
    async handleTurn(request: TurnRequest): Promise<TurnResponse> {
        const sessionId = request.sessionId ?? (await this.sessions.create(request.userId)).id;
        return this.sessions.withSession(sessionId, (session) => this.processTurn(session, request.userInput));
    }

    /**
     * Explicit approval or field edit, outside of the chat flow.
     */
    async approve(request: ApprovalRequest): Promise<ApprovalResult> {
        return this.sessions.withSession(request.sessionId, async (session) => {
            if (request.action === "approve") {
                if (!isComplete(session.record)) {
                    throw new InvoiceIncompleteError(missingFields(session.record));
                }
                const updated = await this.createInvoice(session);
                return {
                    success: true,
                    message: `Invoice ${updated.invoice.invoiceNumber} created successfully!`,
                    invoiceStatus: updated.session.status,
                    missingFields: [],
                    invoice: updated.invoice,
                };
            }

            if (request.action === "edit" && request.fieldUpdates && Object.keys(request.fieldUpdates).length > 0) {
                const outcome = applyFieldUpdates(session.record, request.fieldUpdates, this.now());
                const status = invoiceStatus(outcome.record);
                await this.sessions.save({ ...session, record: outcome.record, status });

                logger.info(`Fields edited`, { sessionId: session.id, fields: outcome.applied });
                return {
                    success: true,
                    message: "Invoice fields updated successfully",
                    invoiceStatus: status,
                    missingFields: missingFields(outcome.record),
                    updatedFields: outcome.applied,
                    notices: outcome.notices,
                };
            }

            throw new UnsupportedActionError(request.action);
        });
    }

    async getSessionInfo(sessionId: string): Promise<SessionInfo> {
        const session = await this.sessions.get(sessionId);
        if (!session) {
            throw new SessionNotFoundError(sessionId);
        }
        return {
            sessionId: session.id,
            userId: session.userId,
            createdAt: session.createdAt,
            updatedAt: session.updatedAt,
            invoiceStatus: session.status,
            missingFields: missingFields(session.record),
            record: session.record,
            usage: session.usage,
            invoice: session.invoice,
        };
    }

    async getInvoice(invoiceId: string): Promise<CreatedInvoice> {
        const invoice = await this.invoices.get(invoiceId);
        if (!invoice) {
            throw new InvoiceNotFoundError(invoiceId);
        }
        return invoice;
    }

    /**
     * Start a new invoice in the same session. Usage totals are kept.
     */
    async resetSession(sessionId: string): Promise<{ success: true; message: string; sessionId: string }> {
        return this.sessions.withSession(sessionId, async (session) => {
            await this.sessions.save({ ...session, record: {}, status: "collecting", invoice: undefined });
            logger.info(`Session reset`, { sessionId });
            return { success: true, message: "Session reset successfully", sessionId };
        });
    }

    private async processTurn(session: Session, userInput: string): Promise<TurnResponse> {
        const command = userInput.trim().toUpperCase();

        if (command === "APPROVE") {
            return this.approveFromChat(session);
        }
        if (command.startsWith("EDIT")) {
            return this.respond(session, "edit_request", EDIT_PROMPT);
        }
        if (session.status === "created") {
            return this.alreadyCreated(session);
        }

        const { fields, usage } = await this.gateway.extract(userInput);
        const outcome = mergeExtraction(session.record, fields, this.now());
        const status = invoiceStatus(outcome.record);
        const updated: Session = {
            ...session,
            record: outcome.record,
            status,
            usage: accumulateUsage(session.usage, usage, this.now()),
        };
        await this.sessions.save(updated);

        logger.debug(`Turn merged`, {
            sessionId: session.id,
            applied: outcome.applied,
            notices: outcome.notices.length,
            status,
        });

        const noticeLines = outcome.notices.map((notice) => notice.message);
        const missing = missingFields(outcome.record);

        if (status === "ready") {
            return {
                ...this.respond(updated, "ready_for_approval", [...noticeLines, missingFieldsMessage([])].join("\n")),
                notices: outcome.notices,
                extracted: fields,
                preview: invoicePreview(outcome.record),
                usage,
            };
        }

        return {
            ...this.respond(updated, "collecting_information", [...noticeLines, missingFieldsMessage(missing)].join("\n")),
            notices: outcome.notices,
            extracted: fields,
            usage,
        };
    }

    private async approveFromChat(session: Session): Promise<TurnResponse> {
        if (session.status === "created") {
            return this.alreadyCreated(session);
        }
        if (!isComplete(session.record)) {
            const message = `The invoice is not ready yet. ${missingFieldsMessage(missingFields(session.record))}`;
            return this.respond(session, "approval_blocked", message);
        }

        const { session: updated, invoice } = await this.createInvoice(session);
        return {
            ...this.respond(
                updated,
                "invoice_created",
                `Invoice ${invoice.invoiceNumber} created successfully! It is ready to be sent to ${invoice.customerName}.`
            ),
            invoice,
        };
    }

    private async createInvoice(session: Session): Promise<{ session: Session; invoice: CreatedInvoice }> {
        const invoice = await this.invoices.create(session.record, session.userId);
        const updated: Session = { ...session, record: {}, status: "created", invoice };
        await this.sessions.save(updated);
        return { session: updated, invoice };
    }

    private alreadyCreated(session: Session): TurnResponse {
        const number = session.invoice?.invoiceNumber ?? "for this session";
        return {
            ...this.respond(
                session,
                "invoice_already_created",
                `Invoice ${number} has already been created. Reset the session to start a new invoice.`
            ),
            invoice: session.invoice,
        };
    }

    private respond(session: Session, action: TurnAction, message: string): TurnResponse {
        return {
            sessionId: session.id,
            action,
            message,
            invoiceStatus: session.status,
            missingFields: missingFields(session.record),
            record: session.record,
            notices: [],
            sessionUsage: session.usage,
        };
    }
}
