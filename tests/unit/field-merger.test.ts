/**
 * Unit tests for the invoice field merger
 */

import { describe, it, expect } from "vitest";
import {
    applyFieldUpdates,
    hasValue,
    invoiceStatus,
    isComplete,
    mergeExtraction,
    missingFields,
} from "../../lib/invoice/field-merger";
import { InvoiceRecord } from "../../lib/invoice/types";

const NOW = new Date(2025, 0, 1, 12, 0);

const COMPLETE: InvoiceRecord = {
    customer_name: "Acme Corp",
    customer_email: "billing@acme.test",
    invoice_description: "Website redesign",
    total_amount: 1200,
    due_date: "2025-01-31",
};

describe("mergeExtraction", () => {
    it("should apply every field of a full extraction with its transform", () => {
        const outcome = mergeExtraction(
            {},
            {
                customer_name: "  Acme Corp ",
                customer_email: "Billing@Acme.test ",
                invoice_description: "Web development, Logo design",
                total_amount: 1500.456,
                due_date: "net 30",
            },
            NOW
        );

        expect(outcome.record).toEqual({
            customer_name: "Acme Corp",
            customer_email: "Billing@Acme.test",
            invoice_description: "1. Web development\n2. Logo design",
            total_amount: 1500.46,
            due_date: "2025-01-31",
        });
        expect(outcome.applied).toEqual([
            "customer_name",
            "customer_email",
            "invoice_description",
            "total_amount",
            "due_date",
        ]);
        expect(outcome.notices).toEqual([]);
    });

    it("should never overwrite a filled field", () => {
        const outcome = mergeExtraction(
            { customer_name: "Acme Corp", total_amount: 100 },
            { customer_name: "Globex", total_amount: 999, customer_email: "ap@globex.test" },
            NOW
        );

        expect(outcome.record).toEqual({
            customer_name: "Acme Corp",
            total_amount: 100,
            customer_email: "ap@globex.test",
        });
        expect(outcome.applied).toEqual(["customer_email"]);
    });

    it("should reject an invalid email but still apply the other fields", () => {
        const outcome = mergeExtraction({}, { customer_email: "not-an-email", customer_name: "Jane Doe" }, NOW);

        expect(outcome.record).toEqual({ customer_name: "Jane Doe" });
        expect(outcome.record.customer_email).toBeUndefined();
        expect(outcome.notices).toEqual([
            {
                field: "customer_email",
                kind: "invalid_value",
                message: "Validation error for customer_email: Invalid email format",
            },
        ]);
    });

    it("should reject non-positive amounts", () => {
        const outcome = mergeExtraction({}, { total_amount: -5 }, NOW);

        expect(outcome.record).toEqual({});
        expect(outcome.notices).toEqual([
            {
                field: "total_amount",
                kind: "invalid_value",
                message: "Validation error for total_amount: Amount must be greater than 0",
            },
        ]);
        expect(mergeExtraction({}, { total_amount: 0 }, NOW).notices).toHaveLength(1);
    });

    it("should reject an amount that rounds to zero", () => {
        const outcome = mergeExtraction({}, { total_amount: 0.004 }, NOW);

        expect(outcome.record).toEqual({});
        expect(outcome.applied).toEqual([]);
        expect(outcome.notices).toEqual([
            {
                field: "total_amount",
                kind: "invalid_value",
                message: "Validation error for total_amount: Amount must be greater than 0",
            },
        ]);
        expect(mergeExtraction({}, { total_amount: 0.005 }, NOW).record).toEqual({ total_amount: 0.01 });
    });

    it("should keep the email as given apart from surrounding whitespace", () => {
        const outcome = mergeExtraction({}, { customer_email: " Bob@Acme.COM" }, NOW);

        expect(outcome.record).toEqual({ customer_email: "Bob@Acme.COM" });
    });

    it("should accept numeric strings and reject other text for amounts", () => {
        expect(mergeExtraction({}, { total_amount: "250" }, NOW).record).toEqual({ total_amount: 250 });

        const rejected = mergeExtraction({}, { total_amount: "$500" }, NOW);
        expect(rejected.record).toEqual({});
        expect(rejected.notices[0]?.field).toBe("total_amount");
        expect(rejected.notices[0]?.kind).toBe("invalid_value");
    });

    it("should leave the due date empty and report when it cannot be parsed", () => {
        const outcome = mergeExtraction({}, { due_date: "not a date", customer_name: "Acme" }, NOW);

        expect(outcome.record).toEqual({ customer_name: "Acme" });
        expect(outcome.notices).toEqual([
            {
                field: "due_date",
                kind: "unparseable_date",
                message: "Could not parse date 'not a date'. Please provide a clearer date format.",
            },
        ]);
    });

    it("should reject a blank customer name", () => {
        const outcome = mergeExtraction({}, { customer_name: "   " }, NOW);

        expect(outcome.record).toEqual({});
        expect(outcome.notices[0]?.message).toBe("Validation error for customer_name: Customer name cannot be empty");
    });

    it("should treat an empty extraction as nothing new", () => {
        const record: InvoiceRecord = { customer_name: "Acme" };
        const outcome = mergeExtraction(record, {}, NOW);

        expect(outcome.record).toEqual(record);
        expect(outcome.applied).toEqual([]);
        expect(outcome.notices).toEqual([]);
    });

    it("should ignore null values", () => {
        const outcome = mergeExtraction({}, { customer_name: null, due_date: null }, NOW);

        expect(outcome.record).toEqual({});
        expect(outcome.notices).toEqual([]);
    });

    it("should not modify the input record", () => {
        const record: InvoiceRecord = { customer_name: "Acme" };
        mergeExtraction(record, { customer_email: "a@acme.test" }, NOW);

        expect(record).toEqual({ customer_name: "Acme" });
    });

    it("should let a field be filled after an earlier rejection", () => {
        const first = mergeExtraction({}, { customer_email: "broken@" }, NOW);
        const second = mergeExtraction(first.record, { customer_email: "fixed@acme.test" }, NOW);

        expect(second.record.customer_email).toBe("fixed@acme.test");
    });
});

describe("applyFieldUpdates", () => {
    it("should overwrite filled fields", () => {
        const outcome = applyFieldUpdates(COMPLETE, { total_amount: 900, due_date: "tomorrow" }, NOW);

        expect(outcome.record).toEqual({ ...COMPLETE, total_amount: 900, due_date: "2025-01-02" });
        expect(outcome.applied).toEqual(["total_amount", "due_date"]);
    });

    it("should keep the old value when the update is invalid", () => {
        const outcome = applyFieldUpdates(COMPLETE, { customer_email: "nope" }, NOW);

        expect(outcome.record).toEqual(COMPLETE);
        expect(outcome.notices).toHaveLength(1);
    });
});

describe("missingFields", () => {
    it("should list all five fields for an empty record, in fixed order", () => {
        expect(missingFields({})).toEqual([
            "customer_name",
            "customer_email",
            "invoice_description",
            "total_amount",
            "due_date",
        ]);
    });

    it("should keep the fixed order whatever order fields were filled in", () => {
        const dueFirst = mergeExtraction({}, { due_date: "net 30" }, NOW).record;
        const thenName = mergeExtraction(dueFirst, { customer_name: "Acme" }, NOW).record;

        const nameFirst = mergeExtraction({}, { customer_name: "Acme" }, NOW).record;
        const thenDue = mergeExtraction(nameFirst, { due_date: "net 30" }, NOW).record;

        const expected = ["customer_email", "invoice_description", "total_amount"];
        expect(missingFields(thenName)).toEqual(expected);
        expect(missingFields(thenDue)).toEqual(expected);
    });
});

describe("isComplete / invoiceStatus", () => {
    it("should report ready only when all fields are present", () => {
        expect(isComplete(COMPLETE)).toBe(true);
        expect(invoiceStatus(COMPLETE)).toBe("ready");

        const { due_date: _dropped, ...partial } = COMPLETE;
        expect(isComplete(partial)).toBe(false);
        expect(invoiceStatus(partial)).toBe("collecting");
    });

    it("should treat empty strings and zero amounts as missing", () => {
        expect(hasValue({ customer_name: "" }, "customer_name")).toBe(false);
        expect(hasValue({ total_amount: 0 }, "total_amount")).toBe(false);
        expect(hasValue({ total_amount: 1 }, "total_amount")).toBe(true);
    });
});
