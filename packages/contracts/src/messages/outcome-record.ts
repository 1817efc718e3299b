import { z } from "zod";

export const AbandonReasonSchema = z.enum([
  "non-retryable-status",
  "attempts-exhausted",
  "overflow",
  "shutdown"
]);

const OutcomeRecordBaseSchema = z.object({
  envelopeId: z.string().min(1),
  topic: z.string().min(1),
  receivedAt: z.string().datetime(),
  recordedAt: z.string().datetime(),
  attempt: z.number().int().nonnegative()
});

export const DeliveredRecordSchema = OutcomeRecordBaseSchema.extend({
  kind: z.literal("delivered"),
  statusCode: z.number().int()
});

/**
 * Dead-letter record. `body` is the exact request body the sink would have received,
 * so an operator can replay it by hand.
 */
export const DeadLetterRecordSchema = OutcomeRecordBaseSchema.extend({
  kind: z.literal("abandoned"),
  reason: AbandonReasonSchema,
  statusCode: z.number().int().optional(),
  lastError: z.string().optional(),
  responseSnippet: z.string().optional(),
  body: z.string()
});

export const PendingRetryRecordSchema = OutcomeRecordBaseSchema.extend({
  kind: z.literal("pending-retry"),
  lastError: z.string().optional(),
  body: z.string()
});

export const OutcomeRecordSchema = z.discriminatedUnion("kind", [
  DeliveredRecordSchema,
  DeadLetterRecordSchema,
  PendingRetryRecordSchema
]);

export type AbandonReason = z.infer<typeof AbandonReasonSchema>;
export type DeliveredRecord = z.infer<typeof DeliveredRecordSchema>;
export type DeadLetterRecord = z.infer<typeof DeadLetterRecordSchema>;
export type PendingRetryRecord = z.infer<typeof PendingRetryRecordSchema>;
export type OutcomeRecord = z.infer<typeof OutcomeRecordSchema>;
