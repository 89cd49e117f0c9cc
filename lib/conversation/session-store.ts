/**
 * Session Store
 *
 * Owns the mapping from session id to the invoice being collected.
 *
 * ## Serialised access
 *
 * A turn reads the record, awaits the model, then writes the merged record
 * back. Two overlapping requests for the same session would otherwise both
 * merge onto the same stale record and one turn would be lost. `withSession`
 * chains work per session id so each callback sees the previous one's
 * result. Different sessions never wait on each other.
 *
 * @module session-store
 */

import { randomUUID } from "node:crypto";
import { createSessionUsage } from "../core/usage";
import { SessionUsage } from "../core/types";
import { InvoiceRecord, InvoiceStatus } from "../invoice/types";
import { CreatedInvoice } from "./invoice-repository";
import { SessionNotFoundError } from "./errors";

export interface Session {
    id: string;
    userId?: string;
    record: InvoiceRecord;
    status: InvoiceStatus;
    usage: SessionUsage;
    createdAt: string;
    updatedAt: string;
    /** Last invoice created from this session. */
    invoice?: CreatedInvoice;
}

export interface SessionStore {
    create(userId?: string): Promise<Session>;
    get(sessionId: string): Promise<Session | undefined>;
    save(session: Session): Promise<void>;
    /**
     * Run `work` with exclusive access to the session. Rejects with
     * `SessionNotFoundError` for unknown ids.
     */
    withSession<T>(sessionId: string, work: (session: Session) => Promise<T>): Promise<T>;
}

export function newSession(id: string, userId?: string, now: Date = new Date()): Session {
    return {
        id,
        userId,
        record: {},
        status: "collecting",
        usage: createSessionUsage(now),
        createdAt: now.toISOString(),
        updatedAt: now.toISOString(),
    };
}

export class InMemorySessionStore implements SessionStore {
    private sessions = new Map<string, Session>();
    private tails = new Map<string, Promise<unknown>>();

    constructor(private readonly generateId: () => string = randomUUID) {}

    async create(userId?: string): Promise<Session> {
        const session = newSession(this.generateId(), userId);
        this.sessions.set(session.id, session);
        return session;
    }

    async get(sessionId: string): Promise<Session | undefined> {
        return this.sessions.get(sessionId);
    }

    async save(session: Session): Promise<void> {
        this.sessions.set(session.id, { ...session, updatedAt: new Date().toISOString() });
    }

    async withSession<T>(sessionId: string, work: (session: Session) => Promise<T>): Promise<T> {
        const previous = this.tails.get(sessionId) ?? Promise.resolve();

        // Only ordering matters here; the earlier caller already received its own rejection.
        const run = previous
            .catch(() => undefined)
            .then(async () => {
                const session = this.sessions.get(sessionId);
                if (!session) {
                    throw new SessionNotFoundError(sessionId);
                }
                return work(session);
            });

        this.tails.set(sessionId, run);
        try {
            return await run;
        } finally {
            if (this.tails.get(sessionId) === run) {
                this.tails.delete(sessionId);
            }
        }
    }
}
