import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  createFactory,
  createPublishPacketFixture,
  createScriptedFetch,
  FakeMqttClient,
  fixedClock,
  flushAsync,
  type SinkResponseFixture
} from "@mqtt-relay/testkit";
import request from "supertest";
import { afterEach, describe, expect, it, vi } from "vitest";
import { buildBridgeApp, type BridgeApp } from "./app.js";
import { loadBridgeConfig, type BridgeConfig } from "./config/index.js";
import { InMemoryOutcomeSink } from "./features/delivery/index.js";

const TEST_LOGGER = {
  error: vi.fn(),
  warn: vi.fn(),
  info: vi.fn(),
  debug: vi.fn()
};

const buildConfig = createFactory<BridgeConfig>(
  loadBridgeConfig({
    SINK_URL: "http://sink.test/ingest",
    SINK_HEADERS_JSON: '{"authorization":"Bearer test-token"}',
    LOG_LEVEL: "silent",
    BACKOFF_JITTER: "false"
  })
);

describe("bridge app", () => {
  const bridges: BridgeApp[] = [];
  const directories: string[] = [];

  function createBridge(
    overrides: Parameters<typeof buildConfig>[0] = {},
    script: SinkResponseFixture[] = [{ status: 200 }],
    withOutcomeSink = true
  ) {
    const client = new FakeMqttClient();
    const sink = createScriptedFetch(script);
    const outcomes = new InMemoryOutcomeSink();
    const bridge = buildBridgeApp({
      config: buildConfig(overrides),
      logger: TEST_LOGGER,
      fetch: sink.fetch,
      mqttClient: client,
      now: fixedClock("2026-02-25T00:00:00.000Z"),
      ...(withOutcomeSink ? { outcomeSink: outcomes } : {})
    });
    bridges.push(bridge);
    return { bridge, client, sink, outcomes };
  }

  afterEach(async () => {
    for (const bridge of bridges.splice(0)) {
      await bridge.close();
    }
    for (const directory of directories.splice(0)) {
      await rm(directory, { recursive: true, force: true });
    }
    vi.clearAllMocks();
  });

  it("reports degraded health until the broker connection is up", async () => {
    const { bridge, client } = createBridge();

    const before = await request(bridge.app).get("/health");
    expect(before.status).toBe(503);
    expect(before.body).toEqual({
      status: "degraded",
      subscription: "disconnected",
      timestamp: "2026-02-25T00:00:00.000Z"
    });

    await bridge.start();
    client.emitConnect();
    await flushAsync();

    const after = await request(bridge.app).get("/health");
    expect(after.status).toBe(200);
    expect(after.body).toEqual({
      status: "ok",
      subscription: "connected",
      timestamp: "2026-02-25T00:00:00.000Z"
    });
    expect(after.headers["x-powered-by"]).toBeUndefined();
  });

  it("relays a published message to the sink and counts it", async () => {
    const { bridge, client, sink, outcomes } = createBridge();
    await bridge.start();
    client.emitConnect();

    await client.deliver(createPublishPacketFixture());
    await flushAsync(20);

    expect(sink.calls).toHaveLength(1);
    expect(sink.calls[0]?.headers).toMatchObject({
      authorization: "Bearer test-token",
      "content-type": "application/json"
    });
    expect(sink.bodies()).toEqual([
      { t: 25.4, topic: "data/sensor", receivedAt: "2026-02-25T00:00:00.000Z" }
    ]);
    expect(outcomes.ofKind("delivered")).toHaveLength(1);

    const metrics = await request(bridge.app).get("/v1/metrics");
    expect(metrics.status).toBe(200);
    expect(metrics.body).toEqual({
      arrivals: 1,
      drops: 0,
      deliveries: 1,
      abandonments: 0,
      retries: 0,
      inFlight: 0,
      scheduled: 0,
      queued: 0,
      startedAt: "2026-02-25T00:00:00.000Z"
    });
  });

  it("returns JSON for unknown routes", async () => {
    const { bridge } = createBridge();

    const response = await request(bridge.app).get("/does-not-exist");

    expect(response.status).toBe(404);
    expect(response.body).toEqual({
      code: "NOT_FOUND",
      message: "Route not found"
    });
  });

  it("serves status only when a port is configured", async () => {
    const { bridge: quiet } = createBridge();
    await quiet.start();
    expect(quiet.server.listening).toBe(false);

    const { bridge, client } = createBridge({ statusHost: "127.0.0.1", statusPort: 0 });
    await bridge.start();
    expect(bridge.server.listening).toBe(true);

    await bridge.close();
    expect(bridge.server.listening).toBe(false);
    expect(client.ended).toBe(true);
    expect(bridge.pipeline.isStopping).toBe(true);
  });

  it("writes dead letters to the configured file", async () => {
    const directory = await mkdtemp(join(tmpdir(), "bridge-"));
    directories.push(directory);
    const deadLetterFile = join(directory, "dead-letters.ndjson");
    const { bridge, client } = createBridge(
      { deadLetterFile },
      [{ status: 400, body: { error: "rejected" } }],
      false
    );
    await bridge.start();
    client.emitConnect();

    await client.deliver(createPublishPacketFixture());
    await flushAsync(20);
    await bridge.close();

    const lines = (await readFile(deadLetterFile, "utf8")).trimEnd().split("\n");
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? "{}")).toMatchObject({
      kind: "abandoned",
      reason: "non-retryable-status",
      statusCode: 400,
      attempt: 0,
      topic: "data/sensor"
    });
    expect(TEST_LOGGER.error).toHaveBeenCalledWith(
      expect.objectContaining({ reason: "non-retryable-status", statusCode: 400 }),
      "Abandoned message"
    );
  });
});
