import type { AbandonReason, OutcomeRecord } from "@mqtt-relay/contracts";
import type { ShutdownPolicy } from "../../config/index.js";
import type { LoggerLike } from "../../logger.js";
import type { Envelope } from "./envelope.js";
import type { PipelineMetrics } from "./metrics.js";
import type { OutcomeSink } from "./outcome-sink.js";

export interface AbandonDetails {
  reason: AbandonReason;
  statusCode?: number;
  lastError?: string;
  responseSnippet?: string;
}

export interface OutcomeReporterDependencies {
  sink: OutcomeSink;
  metrics: PipelineMetrics;
  logger: LoggerLike;
  shutdownPolicy: ShutdownPolicy;
  now?: () => Date;
}

/**
 * Moves envelopes into their terminal state and reports them. This is the only place
 * outcomes reach the sink; a failing sink is logged and never propagates into a worker.
 */
export class OutcomeReporter {
  private readonly now: () => Date;

  constructor(private readonly deps: OutcomeReporterDependencies) {
    this.now = deps.now ?? (() => new Date());
  }

  async delivered(envelope: Envelope, statusCode: number): Promise<void> {
    envelope.transition("Delivered");
    this.deps.metrics.increment("deliveries");
    await this.emit({ kind: "delivered", ...this.baseRecord(envelope), statusCode });
  }

  async abandoned(envelope: Envelope, details: AbandonDetails): Promise<void> {
    envelope.transition("Abandoned");
    this.deps.metrics.increment("abandonments");
    await this.emit({
      kind: "abandoned",
      ...this.baseRecord(envelope),
      ...details,
      body: envelope.body
    });
  }

  /** Reports an envelope cut short by shutdown according to the configured policy. */
  async shutdown(envelope: Envelope): Promise<void> {
    const lastError = envelope.lastError === undefined ? {} : { lastError: envelope.lastError };

    if (this.deps.shutdownPolicy === "abandon") {
      await this.abandoned(envelope, { reason: "shutdown", ...lastError });
      return;
    }

    await this.emit({
      kind: "pending-retry",
      ...this.baseRecord(envelope),
      ...lastError,
      body: envelope.body
    });
  }

  private baseRecord(envelope: Envelope) {
    return {
      envelopeId: envelope.id,
      topic: envelope.topic,
      receivedAt: envelope.receivedAt.toISOString(),
      recordedAt: this.now().toISOString(),
      attempt: envelope.attempt
    };
  }

  private async emit(record: OutcomeRecord): Promise<void> {
    try {
      await this.deps.sink.record(record);
    } catch (error) {
      this.deps.logger.error(
        { err: error, envelopeId: record.envelopeId, kind: record.kind },
        "Failed to record delivery outcome"
      );
    }
  }
}
