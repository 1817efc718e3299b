import { appendFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import type { OutcomeRecord } from "@mqtt-relay/contracts";
import type { LoggerLike } from "../../logger.js";

export interface OutcomeSink {
  record(outcome: OutcomeRecord): Promise<void>;
}

export class InMemoryOutcomeSink implements OutcomeSink {
  readonly records: OutcomeRecord[] = [];

  async record(outcome: OutcomeRecord): Promise<void> {
    this.records.push(outcome);
  }

  ofKind<K extends OutcomeRecord["kind"]>(kind: K): Array<Extract<OutcomeRecord, { kind: K }>> {
    return this.records.filter(
      (record): record is Extract<OutcomeRecord, { kind: K }> => record.kind === kind
    );
  }
}

export class LoggingOutcomeSink implements OutcomeSink {
  constructor(private readonly logger: LoggerLike) {}

  async record(outcome: OutcomeRecord): Promise<void> {
    switch (outcome.kind) {
      case "delivered":
        this.logger.info(
          {
            envelopeId: outcome.envelopeId,
            topic: outcome.topic,
            attempt: outcome.attempt,
            statusCode: outcome.statusCode
          },
          "Delivered message"
        );
        return;
      case "abandoned":
        this.logger.error(
          {
            envelopeId: outcome.envelopeId,
            topic: outcome.topic,
            attempt: outcome.attempt,
            reason: outcome.reason,
            statusCode: outcome.statusCode,
            lastError: outcome.lastError
          },
          "Abandoned message"
        );
        return;
      case "pending-retry":
        this.logger.warn(
          {
            envelopeId: outcome.envelopeId,
            topic: outcome.topic,
            attempt: outcome.attempt,
            lastError: outcome.lastError
          },
          "Message left pending retry at shutdown"
        );
        return;
    }
  }
}

/**
 * Appends dead-letter and pending-retry records to an NDJSON file, one record per
 * line. Delivered records are not written. Appends are serialized.
 */
export class FileOutcomeSink implements OutcomeSink {
  private tail: Promise<void> = Promise.resolve();
  private directoryReady: Promise<unknown> | undefined;

  constructor(private readonly filePath: string) {}

  record(outcome: OutcomeRecord): Promise<void> {
    if (outcome.kind === "delivered") {
      return Promise.resolve();
    }

    const write = this.tail.then(() => this.append(`${JSON.stringify(outcome)}\n`));
    this.tail = write.catch(() => undefined);
    return write;
  }

  private async append(line: string): Promise<void> {
    this.directoryReady ??= mkdir(dirname(this.filePath), { recursive: true });
    await this.directoryReady;
    await appendFile(this.filePath, line, "utf8");
  }
}

export class CompositeOutcomeSink implements OutcomeSink {
  private readonly sinks: readonly OutcomeSink[];

  constructor(sinks: readonly OutcomeSink[]) {
    this.sinks = sinks;
  }

  async record(outcome: OutcomeRecord): Promise<void> {
    const results = await Promise.allSettled(this.sinks.map((sink) => sink.record(outcome)));
    const failures = results.flatMap((result): unknown[] =>
      result.status === "rejected" ? [result.reason] : []
    );

    if (failures.length > 0) {
      throw new AggregateError(failures, `${failures.length} outcome sink(s) failed`);
    }
  }
}
