import {
  HealthResponseSchema,
  MetricsSnapshotSchema,
  type HealthResponse,
  type MetricsSnapshot
} from "@mqtt-relay/contracts";
import type { Express } from "express";

export interface StatusRouteDependencies {
  now: () => Date;
  isSubscribed: () => boolean;
  isStopping: () => boolean;
  snapshot: () => MetricsSnapshot;
}

export function registerStatusRoutes(app: Express, deps: StatusRouteDependencies): void {
  app.get("/health", (_req, res) => {
    const subscribed = deps.isSubscribed();
    const healthy = subscribed && !deps.isStopping();
    const body: HealthResponse = HealthResponseSchema.parse({
      status: healthy ? "ok" : "degraded",
      subscription: subscribed ? "connected" : "disconnected",
      timestamp: deps.now().toISOString()
    });

    res.status(healthy ? 200 : 503).json(body);
  });

  app.get("/v1/metrics", (_req, res) => {
    res.status(200).json(MetricsSnapshotSchema.parse(deps.snapshot()));
  });
}
