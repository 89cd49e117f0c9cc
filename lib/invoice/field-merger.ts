/**
 * Field Merger
 *
 * Applies one turn's extraction onto the invoice being collected.
 *
 * ## Merge policy: first write wins
 *
 * A field that already holds a value is never replaced by a later
 * extraction. A user who mentions a second email in passing does not
 * silently change the recipient. Corrections go through the explicit edit
 * path (`applyFieldUpdates`), which overwrites.
 *
 * ## Per-field handling
 *
 * | Field                 | Transform              | Rejected when                   |
 * |-----------------------|------------------------|---------------------------------|
 * | `customer_name`       | trim                   | not a non-empty string          |
 * | `customer_email`      | trim                   | not `local@domain.tld`          |
 * | `invoice_description` | `formatDescription`    | not a non-empty string          |
 * | `total_amount`        | number, 2 decimals     | not a number, or rounds to <= 0 |
 * | `due_date`            | `normalizeDate`        | phrase cannot be read as a date |
 *
 * A rejected field produces a `Notice` and is left untouched; the other
 * fields of the same extraction still apply. Nothing in here throws.
 *
 * @module field-merger
 */

import { z } from "zod";
import { normalizeDate } from "./date-normalizer";
import { formatDescription } from "./description-formatter";
import {
    ExtractionResult,
    INVOICE_FIELDS,
    InvoiceField,
    InvoiceRecord,
    InvoiceStatus,
    MergeOutcome,
    Notice,
} from "./types";

const EMAIL_PATTERN = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;

const nameSchema = z.string().trim().min(1, "Customer name cannot be empty");

const emailSchema = z.string().trim().regex(EMAIL_PATTERN, "Invalid email format");

const descriptionSchema = z.string().trim().min(1, "Description cannot be empty");

const amountSchema = z
    .union([z.number(), z.string().trim().min(1)])
    .pipe(z.coerce.number({ invalid_type_error: "Amount must be a number" }))
    .refine((amount) => Number.isFinite(amount), "Amount must be a number")
    .transform((amount) => Math.round(amount * 100) / 100)
    .pipe(z.number().positive("Amount must be greater than 0"));

type FieldResult<K extends InvoiceField> =
    | { ok: true; value: NonNullable<InvoiceRecord[K]> }
    | { ok: false; notice: Notice };

function fromSchema<K extends InvoiceField>(
    field: K,
    schema: z.ZodType<NonNullable<InvoiceRecord[K]>, z.ZodTypeDef, unknown>,
    raw: unknown
): FieldResult<K> {
    const parsed = schema.safeParse(raw);
    if (parsed.success) {
        return { ok: true, value: parsed.data };
    }
    const reason = parsed.error.issues[0]?.message ?? "Invalid value";
    return {
        ok: false,
        notice: { field, kind: "invalid_value", message: `Validation error for ${field}: ${reason}` },
    };
}

function resolveField<K extends InvoiceField>(field: K, raw: string | number, now: Date): FieldResult<K>;
function resolveField(field: InvoiceField, raw: string | number, now: Date): FieldResult<InvoiceField> {
    switch (field) {
        case "customer_name":
            return fromSchema(field, nameSchema, raw);
        case "customer_email":
            return fromSchema(field, emailSchema, raw);
        case "invoice_description": {
            const checked = fromSchema(field, descriptionSchema, raw);
            return checked.ok ? { ok: true, value: formatDescription(checked.value) } : checked;
        }
        case "total_amount":
            return fromSchema(field, amountSchema, raw);
        case "due_date": {
            const date = normalizeDate(raw, now);
            if (date === null) {
                return {
                    ok: false,
                    notice: {
                        field,
                        kind: "unparseable_date",
                        message: `Could not parse date '${raw}'. Please provide a clearer date format.`,
                    },
                };
            }
            return { ok: true, value: date };
        }
    }
}

export function hasValue(record: InvoiceRecord, field: InvoiceField): boolean {
    const value = record[field];
    if (typeof value === "number") {
        return value !== 0 && !Number.isNaN(value);
    }
    return value !== undefined && value !== "";
}

function setField<K extends InvoiceField>(record: InvoiceRecord, field: K, value: NonNullable<InvoiceRecord[K]>): void {
    record[field] = value;
}

function applyValues(
    record: InvoiceRecord,
    values: ExtractionResult,
    overwrite: boolean,
    now: Date
): MergeOutcome {
    const next: InvoiceRecord = { ...record };
    const applied: InvoiceField[] = [];
    const notices: Notice[] = [];

    for (const field of INVOICE_FIELDS) {
        const raw = values[field];
        if (raw === undefined || raw === null) {
            continue;
        }
        if (!overwrite && hasValue(next, field)) {
            continue;
        }

        const result = resolveField(field, raw, now);
        if (result.ok) {
            setField(next, field, result.value);
            applied.push(field);
        } else {
            notices.push(result.notice);
        }
    }

    return { record: next, applied, notices };
}

/**
 * Merge an extraction under first-write-wins. The input record is not
 * modified. An empty extraction returns an equal record and no notices.
 */
export function mergeExtraction(record: InvoiceRecord, extraction: ExtractionResult, now: Date = new Date()): MergeOutcome {
    return applyValues(record, extraction, false, now);
}

/**
 * Explicit edit: same transforms and validation as a merge, but filled
 * fields are replaced.
 */
export function applyFieldUpdates(record: InvoiceRecord, updates: ExtractionResult, now: Date = new Date()): MergeOutcome {
    return applyValues(record, updates, true, now);
}

export function missingFields(record: InvoiceRecord): InvoiceField[] {
    return INVOICE_FIELDS.filter((field) => !hasValue(record, field));
}

export function isComplete(record: InvoiceRecord): boolean {
    return missingFields(record).length === 0;
}

export function invoiceStatus(record: InvoiceRecord): InvoiceStatus {
    return isComplete(record) ? "ready" : "collecting";
}
