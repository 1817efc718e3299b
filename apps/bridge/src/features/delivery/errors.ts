import type { EnvelopeState } from "@mqtt-relay/contracts";

export class QueueClosedError extends Error {
  constructor(message = "Queue is closed") {
    super(message);
    this.name = "QueueClosedError";
  }
}

export class InvalidTransitionError extends Error {
  readonly from: EnvelopeState;
  readonly to: EnvelopeState;

  constructor(envelopeId: string, from: EnvelopeState, to: EnvelopeState) {
    super(`Envelope ${envelopeId} cannot move from ${from} to ${to}`);
    this.name = "InvalidTransitionError";
    this.from = from;
    this.to = to;
  }
}
