/**
 * Invoice field names are fixed literals shared by the extractor schema,
 * the merger, the HTTP layer and tests. Their order here is the order in
 * which missing fields are reported.
 */
export const INVOICE_FIELDS = [
    "customer_name",
    "customer_email",
    "invoice_description",
    "total_amount",
    "due_date",
] as const;

export type InvoiceField = (typeof INVOICE_FIELDS)[number];

export interface InvoiceRecord {
    customer_name?: string;
    customer_email?: string;
    invoice_description?: string;
    total_amount?: number;
    /** Calendar date, `YYYY-MM-DD`. */
    due_date?: string;
}

/** Raw values guessed from one user turn. Missing or null means "not mentioned". */
export type ExtractionResult = Partial<Record<InvoiceField, string | number | null>>;

export type InvoiceStatus = "collecting" | "ready" | "created";

export type NoticeKind = "unparseable_date" | "invalid_value";

export interface Notice {
    field: InvoiceField;
    kind: NoticeKind;
    message: string;
}

export interface MergeOutcome {
    record: InvoiceRecord;
    /** Fields written by this merge, in field order. */
    applied: InvoiceField[];
    notices: Notice[];
}
