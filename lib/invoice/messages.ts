import { InvoiceField, InvoiceRecord } from "./types";

export const FIELD_LABELS: Record<InvoiceField, string> = {
    customer_name: "customer name",
    customer_email: "customer email address",
    invoice_description: "description of services/products",
    total_amount: "total amount",
    due_date: "due date (e.g., '30 days', 'April 12', 'next week', 'net 30')",
};

/**
 * Ask for what is still missing. One field gets its own sentence, two are
 * joined with "and", three or more become a list ending in ", and".
 */
export function missingFieldsMessage(missing: readonly InvoiceField[]): string {
    const labels = missing.map((field) => FIELD_LABELS[field]);

    if (labels.length === 0) {
        return "All information collected. Please review and approve the invoice.";
    }
    if (labels.length === 1) {
        return `I need the ${labels[0]} to complete your invoice. Could you please provide this information?`;
    }
    if (labels.length === 2) {
        return `I need the ${labels[0]} and ${labels[1]} to complete your invoice.`;
    }
    const head = labels.slice(0, -1).join(", ");
    return `I need the following information: ${head}, and ${labels[labels.length - 1]}.`;
}

export interface InvoicePreview {
    customerName: string;
    customerEmail: string;
    description: string;
    amount: number;
    dueDate: string;
}

export function invoicePreview(record: InvoiceRecord): InvoicePreview {
    return {
        customerName: record.customer_name ?? "",
        customerEmail: record.customer_email ?? "",
        description: record.invoice_description ?? "",
        amount: record.total_amount ?? 0,
        dueDate: record.due_date ?? "",
    };
}

export function renderPreview(record: InvoiceRecord): string {
    const preview = invoicePreview(record);
    const description = preview.description.includes("\n")
        ? "\n" + preview.description.split("\n").map((line) => `    ${line}`).join("\n")
        : preview.description;

    return [
        "INVOICE PREVIEW",
        "",
        "Customer",
        `  Name: ${preview.customerName}`,
        `  Email: ${preview.customerEmail}`,
        "",
        "Details",
        `  Description: ${description}`,
        `  Amount: $${preview.amount.toFixed(2)}`,
        `  Due Date: ${preview.dueDate}`,
        "",
        "Reply with:",
        `  "APPROVE" to create the invoice`,
        `  "EDIT [field]" to modify a specific field (e.g., "EDIT amount")`,
    ].join("\n");
}
