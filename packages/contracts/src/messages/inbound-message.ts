import { z } from "zod";

export const QosSchema = z.union([z.literal(0), z.literal(1), z.literal(2)]);

export const InboundMessageSchema = z.object({
  topic: z.string().min(1),
  payload: z.instanceof(Uint8Array),
  qos: QosSchema.default(0),
  receivedAt: z.date()
});

export type Qos = z.infer<typeof QosSchema>;
export type InboundMessage = z.infer<typeof InboundMessageSchema>;
