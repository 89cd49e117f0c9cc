/**
 * Invoice creation is stubbed: invoices live in memory and the preview/PDF
 * links only point at where a real renderer would serve them.
 */

import { randomUUID } from "node:crypto";
import { createLogger } from "../core/logger";
import { InvoiceRecord } from "../invoice/types";

const logger = createLogger("invoice-repository");

export interface CreatedInvoice {
    invoiceId: string;
    invoiceNumber: string;
    customerName: string;
    customerEmail: string;
    description: string;
    amount: number;
    dueDate: string;
    status: "pending";
    createdAt: string;
    previewUrl: string;
    pdfUrl: string;
}

export interface InvoiceRepository {
    create(record: InvoiceRecord, userId?: string): Promise<CreatedInvoice>;
    get(invoiceId: string): Promise<CreatedInvoice | undefined>;
}

export interface InMemoryInvoiceRepositoryOptions {
    /** Base for preview and PDF links (default: "http://localhost:8000"). */
    publicBaseUrl?: string;
    /** First invoice number handed out (default: 1000). */
    firstNumber?: number;
    generateId?: () => string;
}

export function formatInvoiceNumber(counter: number): string {
    return `INV-${String(counter).padStart(6, "0")}`;
}

export class InMemoryInvoiceRepository implements InvoiceRepository {
    private invoices = new Map<string, CreatedInvoice>();
    private counter: number;
    private readonly baseUrl: string;
    private readonly generateId: () => string;

    constructor(options: InMemoryInvoiceRepositoryOptions = {}) {
        this.counter = options.firstNumber ?? 1000;
        this.baseUrl = (options.publicBaseUrl ?? "http://localhost:8000").replace(/\/+$/, "");
        this.generateId = options.generateId ?? randomUUID;
    }

    async create(record: InvoiceRecord, userId?: string): Promise<CreatedInvoice> {
        const invoiceId = this.generateId();
        const invoice: CreatedInvoice = {
            invoiceId,
            invoiceNumber: formatInvoiceNumber(this.counter++),
            customerName: record.customer_name ?? "",
            customerEmail: record.customer_email ?? "",
            description: record.invoice_description ?? "",
            amount: record.total_amount ?? 0,
            dueDate: record.due_date ?? "",
            status: "pending",
            createdAt: new Date().toISOString(),
            previewUrl: `${this.baseUrl}/invoice/${invoiceId}/preview`,
            pdfUrl: `${this.baseUrl}/invoice/${invoiceId}/pdf`,
        };

        this.invoices.set(invoiceId, invoice);
        logger.info(`Invoice created`, {
            invoiceNumber: invoice.invoiceNumber,
            customerEmail: invoice.customerEmail,
            userId,
        });
        return invoice;
    }

    async get(invoiceId: string): Promise<CreatedInvoice | undefined> {
        return this.invoices.get(invoiceId);
    }

    get size(): number {
        return this.invoices.size;
    }
}
