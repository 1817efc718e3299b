import { MetricsSnapshotSchema } from "@mqtt-relay/contracts";
import { manualClock } from "@mqtt-relay/testkit";
import { describe, expect, it } from "vitest";
import { PipelineMetrics } from "./metrics.js";

describe("PipelineMetrics", () => {
  it("counts events and reports gauges in the snapshot", () => {
    const clock = manualClock("2026-02-25T00:00:00.000Z");
    const metrics = new PipelineMetrics(clock.now);

    metrics.increment("arrivals");
    metrics.increment("arrivals");
    metrics.increment("drops");
    metrics.increment("retries", 3);
    metrics.attemptStarted();

    const snapshot = metrics.snapshot({ queued: 4, scheduled: 2 });

    expect(snapshot).toEqual({
      arrivals: 2,
      drops: 1,
      deliveries: 0,
      abandonments: 0,
      retries: 3,
      inFlight: 1,
      scheduled: 2,
      queued: 4,
      startedAt: "2026-02-25T00:00:00.000Z"
    });
    expect(MetricsSnapshotSchema.parse(snapshot)).toEqual(snapshot);
  });

  it("never lets the in-flight gauge go negative", () => {
    const metrics = new PipelineMetrics();
    metrics.attemptFinished();
    expect(metrics.inFlight).toBe(0);
  });

  it("keeps the window start fixed at construction", () => {
    const clock = manualClock("2026-02-25T00:00:00.000Z");
    const metrics = new PipelineMetrics(clock.now);

    clock.advance(60_000);
    metrics.increment("deliveries");

    const snapshot = metrics.snapshot({ queued: 0, scheduled: 0 });
    expect(snapshot.startedAt).toBe("2026-02-25T00:00:00.000Z");
    expect(snapshot.deliveries).toBe(1);
  });
});
