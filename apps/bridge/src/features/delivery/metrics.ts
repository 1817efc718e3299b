import type { MetricsSnapshot } from "@mqtt-relay/contracts";

export type PipelineCounter = "arrivals" | "drops" | "deliveries" | "abandonments" | "retries";

type Counters = Record<PipelineCounter, number>;

function emptyCounters(): Counters {
  return { arrivals: 0, drops: 0, deliveries: 0, abandonments: 0, retries: 0 };
}

/**
 * Counters owned by one pipeline instance. Updates run synchronously on the event
 * loop, so each one is atomic with respect to the workers.
 */
export class PipelineMetrics {
  private readonly counters: Counters = emptyCounters();
  private readonly startedAt: Date;
  private inFlightCount = 0;

  constructor(now: () => Date = () => new Date()) {
    this.startedAt = now();
  }

  increment(counter: PipelineCounter, by = 1): void {
    this.counters[counter] += by;
  }

  attemptStarted(): void {
    this.inFlightCount += 1;
  }

  attemptFinished(): void {
    this.inFlightCount = Math.max(0, this.inFlightCount - 1);
  }

  get(counter: PipelineCounter): number {
    return this.counters[counter];
  }

  get inFlight(): number {
    return this.inFlightCount;
  }

  snapshot(gauges: { queued: number; scheduled: number }): MetricsSnapshot {
    return {
      ...this.counters,
      inFlight: this.inFlightCount,
      scheduled: gauges.scheduled,
      queued: gauges.queued,
      startedAt: this.startedAt.toISOString()
    };
  }
}
