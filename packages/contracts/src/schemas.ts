import { z } from "zod";

export const HealthStatusSchema = z.enum(["ok", "degraded"]);

export const HealthResponseSchema = z.object({
  status: HealthStatusSchema,
  subscription: z.enum(["connected", "disconnected"]),
  timestamp: z.string().datetime()
});

export const EnvelopeStateSchema = z.enum([
  "Queued",
  "InFlight",
  "RetryScheduled",
  "Delivered",
  "Abandoned"
]);

export const OverflowPolicySchema = z.enum(["block", "drop-oldest"]);

export const MetricsSnapshotSchema = z.object({
  arrivals: z.number().int().nonnegative(),
  drops: z.number().int().nonnegative(),
  deliveries: z.number().int().nonnegative(),
  abandonments: z.number().int().nonnegative(),
  retries: z.number().int().nonnegative(),
  inFlight: z.number().int().nonnegative(),
  scheduled: z.number().int().nonnegative(),
  queued: z.number().int().nonnegative(),
  startedAt: z.string().datetime()
});

export type HealthResponse = z.infer<typeof HealthResponseSchema>;
export type EnvelopeState = z.infer<typeof EnvelopeStateSchema>;
export type OverflowPolicy = z.infer<typeof OverflowPolicySchema>;
export type MetricsSnapshot = z.infer<typeof MetricsSnapshotSchema>;
