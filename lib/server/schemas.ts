import { z } from "zod";

const optionalId = z.string().trim().min(1).optional();

const nullableText = z.union([z.string(), z.null()]).optional();

export const conversationRequestSchema = z.object({
    userInput: z.string().trim().min(1, "userInput is required"),
    sessionId: optionalId,
    userId: optionalId,
});

/** Field keys are the fixed invoice field names; anything else is rejected. */
export const fieldUpdatesSchema = z
    .object({
        customer_name: nullableText,
        customer_email: nullableText,
        invoice_description: nullableText,
        total_amount: z.union([z.number(), z.string(), z.null()]).optional(),
        due_date: nullableText,
    })
    .strict();

export const approvalRequestSchema = z.object({
    sessionId: z.string().trim().min(1, "sessionId is required"),
    action: z.enum(["approve", "edit"]).default("approve"),
    fieldUpdates: fieldUpdatesSchema.optional(),
});

export const sessionParamsSchema = z.object({
    sessionId: z.string().trim().min(1),
});

export const invoiceParamsSchema = z.object({
    invoiceId: z.string().trim().min(1),
});

export type ApprovalRequestBody = z.infer<typeof approvalRequestSchema>;
