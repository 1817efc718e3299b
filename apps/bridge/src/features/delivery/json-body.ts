import { isLosslessNumber, isSafeNumber, LosslessNumber, parse, stringify } from "lossless-json";

/** Numbers a double cannot hold exactly stay as their original digits. */
export type JsonValue =
  | null
  | boolean
  | number
  | LosslessNumber
  | string
  | JsonValue[]
  | JsonObject;
export type JsonObject = { [key: string]: JsonValue };

export interface EnvelopeMetadata {
  topic: string;
  receivedAt: Date;
}

const utf8 = new TextDecoder("utf-8", { fatal: true });

function isJsonObject(value: JsonValue): value is JsonObject {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    !isLosslessNumber(value)
  );
}

function isJsonValue(value: unknown): value is JsonValue {
  if (
    value === null ||
    typeof value === "boolean" ||
    typeof value === "number" ||
    typeof value === "string" ||
    isLosslessNumber(value)
  ) {
    return true;
  }
  if (Array.isArray(value)) {
    return value.every(isJsonValue);
  }
  return typeof value === "object" && Object.values(value).every(isJsonValue);
}

function parseNumber(digits: string): number | LosslessNumber {
  return isSafeNumber(digits) ? Number(digits) : new LosslessNumber(digits);
}

function decodeUtf8(payload: Uint8Array): string | null {
  try {
    return utf8.decode(payload);
  } catch {
    return null;
  }
}

function parseJson(text: string): JsonValue | undefined {
  try {
    const parsed = parse(text, null, parseNumber);
    return isJsonValue(parsed) ? parsed : undefined;
  } catch {
    return undefined;
  }
}

/**
 * Converts a raw payload into the JSON document delivered to the sink.
 *
 * - a JSON object is used as is;
 * - any other JSON value is wrapped as `{ "value": ... }`;
 * - text that is not JSON is wrapped as `{ "raw": text }`;
 * - bytes that are not UTF-8 become `{ "raw": base64, "rawEncoding": "base64" }`.
 *
 * Integers beyond 2^53 and other numbers a double would round keep their digits.
 *
 * Never throws, and depends on nothing but the payload bytes.
 */
export function toJsonBody(payload: Uint8Array): JsonObject {
  const text = decodeUtf8(payload);
  if (text === null) {
    return { raw: Buffer.from(payload).toString("base64"), rawEncoding: "base64" };
  }

  const parsed = parseJson(text);
  if (parsed === undefined) {
    return { raw: text };
  }

  return isJsonObject(parsed) ? parsed : { value: parsed };
}

/**
 * Serializes the request body: the payload document plus `topic` and `receivedAt`.
 * Metadata overwrites payload keys of the same name.
 */
export function buildRequestBody(jsonBody: JsonObject, metadata: EnvelopeMetadata): string {
  const body = stringify({
    ...jsonBody,
    topic: metadata.topic,
    receivedAt: metadata.receivedAt.toISOString()
  });
  if (body === undefined) {
    throw new TypeError("Request body did not serialize to JSON");
  }
  return body;
}
