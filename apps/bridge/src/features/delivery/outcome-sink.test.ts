import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { OutcomeRecordSchema, type OutcomeRecord } from "@mqtt-relay/contracts";
import { afterEach, describe, expect, it, vi } from "vitest";
import {
  CompositeOutcomeSink,
  FileOutcomeSink,
  InMemoryOutcomeSink,
  LoggingOutcomeSink,
  type OutcomeSink
} from "./outcome-sink.js";

const base = {
  envelopeId: "env-1",
  topic: "data/sensor",
  receivedAt: "2026-02-25T00:00:00.000Z",
  recordedAt: "2026-02-25T00:00:01.000Z",
  attempt: 0
};

const delivered: OutcomeRecord = { ...base, kind: "delivered", statusCode: 200 };
const abandoned: OutcomeRecord = {
  ...base,
  envelopeId: "env-2",
  kind: "abandoned",
  reason: "attempts-exhausted",
  attempt: 5,
  statusCode: 503,
  lastError: "HTTP 503",
  body: '{"t":1}'
};
const pending: OutcomeRecord = {
  ...base,
  envelopeId: "env-3",
  kind: "pending-retry",
  body: '{"t":2}'
};

describe("FileOutcomeSink", () => {
  const directories: string[] = [];

  afterEach(async () => {
    for (const directory of directories.splice(0)) {
      await rm(directory, { recursive: true, force: true });
    }
  });

  it("appends abandoned and pending records as NDJSON and skips deliveries", async () => {
    const directory = await mkdtemp(join(tmpdir(), "outcomes-"));
    directories.push(directory);
    const filePath = join(directory, "nested", "dead-letters.ndjson");
    const sink = new FileOutcomeSink(filePath);

    await Promise.all([sink.record(abandoned), sink.record(delivered), sink.record(pending)]);

    const lines = (await readFile(filePath, "utf8")).trimEnd().split("\n");
    expect(lines).toHaveLength(2);
    expect(lines.map((line) => OutcomeRecordSchema.parse(JSON.parse(line)))).toEqual([
      abandoned,
      pending
    ]);
  });
});

describe("LoggingOutcomeSink", () => {
  it("logs dead letters at error level", async () => {
    const logger = { error: vi.fn(), warn: vi.fn(), info: vi.fn(), debug: vi.fn() };
    const sink = new LoggingOutcomeSink(logger);

    await sink.record(abandoned);
    await sink.record(delivered);
    await sink.record(pending);

    expect(logger.error).toHaveBeenCalledWith(
      {
        envelopeId: "env-2",
        topic: "data/sensor",
        attempt: 5,
        reason: "attempts-exhausted",
        statusCode: 503,
        lastError: "HTTP 503"
      },
      "Abandoned message"
    );
    expect(logger.info).toHaveBeenCalledWith(
      expect.objectContaining({ envelopeId: "env-1", statusCode: 200 }),
      "Delivered message"
    );
    expect(logger.warn).toHaveBeenCalledWith(
      expect.objectContaining({ envelopeId: "env-3" }),
      "Message left pending retry at shutdown"
    );
  });
});

describe("CompositeOutcomeSink", () => {
  it("fans out to every sink", async () => {
    const first = new InMemoryOutcomeSink();
    const second = new InMemoryOutcomeSink();

    await new CompositeOutcomeSink([first, second]).record(abandoned);

    expect(first.records).toEqual([abandoned]);
    expect(second.records).toEqual([abandoned]);
  });

  it("still reaches healthy sinks when one fails", async () => {
    const healthy = new InMemoryOutcomeSink();
    const broken: OutcomeSink = { record: () => Promise.reject(new Error("disk full")) };

    await expect(new CompositeOutcomeSink([broken, healthy]).record(pending)).rejects.toThrow(
      "1 outcome sink(s) failed"
    );
    expect(healthy.records).toEqual([pending]);
  });
});
