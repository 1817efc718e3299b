import { randomUUID } from "node:crypto";
import type { EnvelopeState, Qos } from "@mqtt-relay/contracts";
import { InvalidTransitionError } from "./errors.js";
import { buildRequestBody, toJsonBody, type JsonObject } from "./json-body.js";

export interface EnvelopeInit {
  topic: string;
  payload: Uint8Array;
  qos: Qos;
  receivedAt: Date;
  id?: string;
}

const TRANSITIONS: Record<EnvelopeState, readonly EnvelopeState[]> = {
  Queued: ["InFlight", "Abandoned"],
  InFlight: ["Delivered", "RetryScheduled", "Abandoned"],
  RetryScheduled: ["InFlight", "Abandoned"],
  Delivered: [],
  Abandoned: []
};

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

/**
 * One message moving through the pipeline. Everything derived from the payload is
 * computed once here; retries resend `body` byte for byte. Only `state`, `attempt`
 * and `lastError` change, and only through the methods below.
 */
export class Envelope {
  readonly id: string;
  readonly topic: string;
  readonly qos: Qos;
  readonly jsonBody: Readonly<JsonObject>;
  readonly body: string;

  private readonly payloadBytes: Uint8Array;
  private readonly receivedAtMs: number;
  private currentState: EnvelopeState = "Queued";
  private failedAttempts = 0;
  private lastFailure: string | undefined;

  constructor(init: EnvelopeInit) {
    this.id = init.id ?? randomUUID();
    this.topic = init.topic;
    this.qos = init.qos;
    this.payloadBytes = Uint8Array.from(init.payload);
    this.receivedAtMs = init.receivedAt.getTime();
    this.jsonBody = deepFreeze(toJsonBody(this.payloadBytes));
    this.body = buildRequestBody(this.jsonBody, {
      topic: this.topic,
      receivedAt: this.receivedAt
    });
  }

  get payload(): Uint8Array {
    return this.payloadBytes.slice();
  }

  get receivedAt(): Date {
    return new Date(this.receivedAtMs);
  }

  get state(): EnvelopeState {
    return this.currentState;
  }

  /** Number of attempts that failed with a retryable error. */
  get attempt(): number {
    return this.failedAttempts;
  }

  get lastError(): string | undefined {
    return this.lastFailure;
  }

  transition(next: EnvelopeState): void {
    if (!TRANSITIONS[this.currentState].includes(next)) {
      throw new InvalidTransitionError(this.id, this.currentState, next);
    }
    this.currentState = next;
  }

  recordFailedAttempt(error: string): number {
    if (this.currentState !== "InFlight") {
      throw new InvalidTransitionError(this.id, this.currentState, "RetryScheduled");
    }
    this.failedAttempts += 1;
    this.lastFailure = error;
    return this.failedAttempts;
  }
}
