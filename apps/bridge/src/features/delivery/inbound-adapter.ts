import { InboundMessageSchema } from "@mqtt-relay/contracts";
import type { LoggerLike } from "../../logger.js";
import type { BoundedQueue } from "./bounded-queue.js";
import { Envelope } from "./envelope.js";
import { QueueClosedError } from "./errors.js";
import type { PipelineMetrics } from "./metrics.js";
import type { OutcomeReporter } from "./outcome-reporter.js";

export type RejectReason = "paused" | "stopped" | "invalid";

export type EnqueueResult =
  | { status: "enqueued"; envelope: Envelope }
  | { status: "dropped-oldest"; envelope: Envelope; evicted: Envelope }
  | { status: "rejected"; reason: RejectReason };

export interface InboundAdapterDependencies {
  queue: BoundedQueue<Envelope>;
  metrics: PipelineMetrics;
  reporter: OutcomeReporter;
  logger: LoggerLike;
}

/**
 * Turns subscription events into queued envelopes. Does no network I/O; under the
 * `block` policy the returned promise stays pending until the queue has room.
 */
export class InboundAdapter {
  private paused = false;
  private stopped = false;
  private readonly pending = new Set<Promise<EnqueueResult>>();

  constructor(private readonly deps: InboundAdapterDependencies) {}

  get isPaused(): boolean {
    return this.paused;
  }

  get isStopped(): boolean {
    return this.stopped;
  }

  pause(): void {
    this.paused = true;
  }

  resume(): void {
    this.paused = false;
  }

  stop(): void {
    this.stopped = true;
  }

  onMessage(
    topic: string,
    payload: Uint8Array,
    qos: number,
    receivedAt: Date = new Date()
  ): Promise<EnqueueResult> {
    const admission: Promise<EnqueueResult> = this.admit(topic, payload, qos, receivedAt).finally(
      () => {
        this.pending.delete(admission);
      }
    );
    this.pending.add(admission);
    return admission;
  }

  /** Resolves once every `onMessage` call made so far has settled. */
  async whenIdle(): Promise<void> {
    await Promise.allSettled([...this.pending]);
  }

  private async admit(
    topic: string,
    payload: Uint8Array,
    qos: number,
    receivedAt: Date
  ): Promise<EnqueueResult> {
    if (this.stopped) {
      return { status: "rejected", reason: "stopped" };
    }
    if (this.paused) {
      this.deps.logger.warn({ topic }, "Subscription paused; rejecting message");
      return { status: "rejected", reason: "paused" };
    }

    const parsed = InboundMessageSchema.safeParse({ topic, payload, qos, receivedAt });
    if (!parsed.success) {
      this.deps.logger.warn(
        { topic, issues: parsed.error.issues.map((issue) => issue.message) },
        "Rejected invalid inbound message"
      );
      return { status: "rejected", reason: "invalid" };
    }

    const envelope = new Envelope(parsed.data);
    this.deps.metrics.increment("arrivals");
    this.deps.logger.debug({ envelopeId: envelope.id, topic }, "Received message");

    try {
      const pushed = await this.deps.queue.push(envelope);
      if (pushed.status === "enqueued") {
        return { status: "enqueued", envelope };
      }

      const { evicted } = pushed;
      this.deps.metrics.increment("drops");
      this.deps.logger.warn(
        { envelopeId: evicted.id, topic: evicted.topic, capacity: this.deps.queue.capacity },
        "Queue full; dropped oldest message"
      );
      await this.deps.reporter.abandoned(evicted, { reason: "overflow" });
      return { status: "dropped-oldest", envelope, evicted };
    } catch (error) {
      if (!(error instanceof QueueClosedError)) {
        throw error;
      }
      await this.deps.reporter.shutdown(envelope);
      return { status: "rejected", reason: "stopped" };
    }
  }
}
