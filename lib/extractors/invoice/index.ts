/**
 * Invoice Field Extractor
 *
 * Pulls the five invoice fields out of a single conversational turn:
 * - Customer name and email
 * - Description of the services or products
 * - Total amount
 * - Due date, **as the user phrased it**
 */

import { z } from "zod";
import { ExtractorConfig } from "../../core/types";

/**
 * Every field is nullable: most turns mention only some of them.
 *
 * ## Design Decision: Raw Date Text
 *
 * The model is asked for the due date exactly as written ("net 30",
 * "April 12th") instead of a computed calendar date. Date arithmetic happens
 * in `normalizeDate`, which is deterministic and knows today's date.
 */
export const InvoiceFieldsSchema = z.object({
    customer_name: z.string().nullable().describe("Name of the customer being invoiced"),
    customer_email: z.string().nullable().describe("Email address of the customer"),
    invoice_description: z
        .string()
        .nullable()
        .describe("All services or products mentioned, keeping every item of a list"),
    total_amount: z.number().nullable().describe("Total amount as a plain number, without currency symbols"),
    due_date: z.string().nullable().describe("Due date text exactly as the user wrote it"),
});

export type InvoiceFields = z.infer<typeof InvoiceFieldsSchema>;

export function buildPrompt(text: string): string {
    return `You are an expert at extracting invoice information from conversational text.

Analyze the user's message and extract any invoice-related information:
- customer_name: The customer being invoiced
- customer_email: The customer's email address
- invoice_description: The services or products being billed
- total_amount: The total amount as a number
- due_date: When payment is due

IMPORTANT:
- For amounts, extract only the numeric value ("$500" -> 500, "$1,234.56" -> 1234.56)
- For dates, return the raw text as the user wrote it ("30 days", "April 12 2025", "next week", "net 30")
- Do NOT convert dates to YYYY-MM-DD
- For descriptions, capture ALL items mentioned, including lists separated by commas, semicolons or line breaks
- Use null for anything that is not clearly stated

USER MESSAGE:
"${text}"`;
}

/**
 * Invoice field extractor configuration
 */
export const invoiceExtractor: ExtractorConfig<typeof InvoiceFieldsSchema> = {
    name: "invoice-fields",
    description: "Extract invoice fields from one conversational turn",
    schema: InvoiceFieldsSchema,
    buildPrompt,
};

export default invoiceExtractor;
