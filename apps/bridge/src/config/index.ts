import { OverflowPolicySchema, QosSchema } from "@mqtt-relay/contracts";
import { z } from "zod";

const BooleanStringSchema = z
  .string()
  .toLowerCase()
  .pipe(z.enum(["true", "false"]))
  .transform((value) => value === "true");

const CsvStringSchema = z.string().transform((value) =>
  value
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0)
);

/** A concrete status code (`429`) or a whole class (`5xx`). */
export const StatusMatcherSchema = z
  .string()
  .regex(/^([1-5]xx|[1-5]\d\d)$/, "must be a status code such as 429 or a class such as 5xx");

const JsonHeadersSchema = z.string().transform((value, ctx) => {
  try {
    const parsed: unknown = JSON.parse(value);
    return z.record(z.string()).parse(parsed);
  } catch (error) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message:
        error instanceof Error
          ? `SINK_HEADERS_JSON must be a JSON object of strings (${error.message})`
          : "SINK_HEADERS_JSON must be a JSON object of strings"
    });
    return z.NEVER;
  }
});

const HttpUrlSchema = z
  .string()
  .url()
  .refine(
    (value) => URL.canParse(value) && /^https?:$/.test(new URL(value).protocol),
    "must be an http(s) URL"
  );

export const ShutdownPolicySchema = z.enum(["abandon", "report-pending"]);

export const BridgeConfigSchema = z
  .object({
    nodeEnv: z.enum(["development", "test", "production"]).default("development"),
    logLevel: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
    mqttBroker: z.string().min(1).default("localhost"),
    mqttPort: z.number().int().min(1).max(65535).default(1883),
    mqttTopic: z.string().min(1).default("data/sensor"),
    mqttQos: QosSchema.default(1),
    mqttUsername: z.string().min(1).optional(),
    mqttPassword: z.string().min(1).optional(),
    mqttClientId: z.string().min(1).default("mqtt-rest-bridge"),
    sinkUrl: HttpUrlSchema,
    sinkHeaders: JsonHeadersSchema.default("{}"),
    queueCapacity: z.number().int().positive().default(1000),
    overflowPolicy: OverflowPolicySchema.default("block"),
    maxAttempts: z.number().int().positive().default(5),
    backoffBaseMs: z.number().int().nonnegative().default(500),
    backoffMultiplier: z.number().min(1).default(2),
    backoffMaxMs: z.number().int().nonnegative().default(30_000),
    backoffJitter: BooleanStringSchema.default("true"),
    requestTimeoutMs: z.number().int().positive().default(10_000),
    retryableStatuses: CsvStringSchema.pipe(z.array(StatusMatcherSchema)).default("429,5xx"),
    deliveryWorkers: z.number().int().positive().default(1),
    retryWorkers: z.number().int().positive().default(1),
    shutdownPolicy: ShutdownPolicySchema.default("abandon"),
    deadLetterFile: z.string().min(1).optional(),
    statusHost: z.string().min(1).default("0.0.0.0"),
    statusPort: z.number().int().min(0).max(65535).optional()
  })
  .refine((config) => config.backoffMaxMs >= config.backoffBaseMs, {
    message: "BACKOFF_MAX_MS must not be lower than BACKOFF_BASE_MS",
    path: ["backoffMaxMs"]
  });

export type BridgeConfig = z.infer<typeof BridgeConfigSchema>;
export type ShutdownPolicy = z.infer<typeof ShutdownPolicySchema>;

function normalizeOptionalString(value: string | undefined): string | undefined {
  const normalized = value?.trim();
  return normalized && normalized.length > 0 ? normalized : undefined;
}

function optionalNumber(value: string | undefined): number | undefined {
  const normalized = normalizeOptionalString(value);
  return normalized === undefined ? undefined : Number(normalized);
}

/**
 * Reads the bridge configuration from the environment. Throws a `ZodError` naming
 * every invalid variable; the process must not start on a bad configuration.
 */
export function loadBridgeConfig(env: NodeJS.ProcessEnv = process.env): BridgeConfig {
  return BridgeConfigSchema.parse({
    nodeEnv: normalizeOptionalString(env.NODE_ENV),
    logLevel: normalizeOptionalString(env.LOG_LEVEL),
    mqttBroker: normalizeOptionalString(env.MQTT_BROKER),
    mqttPort: optionalNumber(env.MQTT_PORT),
    mqttTopic: normalizeOptionalString(env.MQTT_TOPIC),
    mqttQos: optionalNumber(env.MQTT_QOS),
    mqttUsername: normalizeOptionalString(env.MQTT_USERNAME),
    mqttPassword: normalizeOptionalString(env.MQTT_PASSWORD),
    mqttClientId: normalizeOptionalString(env.MQTT_CLIENT_ID),
    sinkUrl: normalizeOptionalString(env.SINK_URL),
    sinkHeaders: normalizeOptionalString(env.SINK_HEADERS_JSON),
    queueCapacity: optionalNumber(env.QUEUE_CAPACITY),
    overflowPolicy: normalizeOptionalString(env.OVERFLOW_POLICY),
    maxAttempts: optionalNumber(env.MAX_ATTEMPTS),
    backoffBaseMs: optionalNumber(env.BACKOFF_BASE_MS),
    backoffMultiplier: optionalNumber(env.BACKOFF_MULTIPLIER),
    backoffMaxMs: optionalNumber(env.BACKOFF_MAX_MS),
    backoffJitter: normalizeOptionalString(env.BACKOFF_JITTER),
    requestTimeoutMs: optionalNumber(env.REQUEST_TIMEOUT_MS),
    retryableStatuses: normalizeOptionalString(env.RETRYABLE_STATUSES),
    deliveryWorkers: optionalNumber(env.DELIVERY_WORKERS),
    retryWorkers: optionalNumber(env.RETRY_WORKERS),
    shutdownPolicy: normalizeOptionalString(env.SHUTDOWN_POLICY),
    deadLetterFile: normalizeOptionalString(env.DEAD_LETTER_FILE),
    statusHost: normalizeOptionalString(env.STATUS_HOST),
    statusPort: optionalNumber(env.STATUS_PORT)
  });
}
