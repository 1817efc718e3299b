import { getErrorMessage, type LoggerLike } from "../../logger.js";
import type { BoundedQueue } from "./bounded-queue.js";
import type { Envelope } from "./envelope.js";
import type { AttemptResult, DeliverySink } from "./http-sink.js";
import type { PipelineMetrics } from "./metrics.js";
import type { OutcomeReporter } from "./outcome-reporter.js";
import type { RetryPolicy } from "./retry-policy.js";
import type { RetryScheduler } from "./retry-scheduler.js";

export interface DeliveryWorkerDependencies {
  queue: BoundedQueue<Envelope>;
  sink: DeliverySink;
  policy: RetryPolicy;
  scheduler: RetryScheduler<Envelope>;
  reporter: OutcomeReporter;
  metrics: PipelineMetrics;
  logger: LoggerLike;
  isStopping: () => boolean;
}

function describeFailure(result: AttemptResult): string {
  return result.kind === "response" ? `HTTP ${result.status}` : result.message;
}

function responseDetails(result: AttemptResult) {
  if (result.kind !== "response") {
    return {};
  }
  return result.bodySnippet === undefined
    ? { statusCode: result.status }
    : { statusCode: result.status, responseSnippet: result.bodySnippet };
}

export class DeliveryWorker {
  constructor(
    readonly id: string,
    private readonly deps: DeliveryWorkerDependencies
  ) {}

  /** Pops and delivers until the queue is closed and empty. */
  async run(): Promise<void> {
    for (;;) {
      const envelope = await this.deps.queue.pop();
      if (!envelope) {
        this.deps.logger.debug({ workerId: this.id }, "Delivery worker stopped");
        return;
      }
      await this.attempt(envelope);
    }
  }

  /**
   * One delivery attempt for a `Queued` or `RetryScheduled` envelope. Backoff is handed
   * to the retry scheduler, so this resolves as soon as the attempt is settled.
   */
  async attempt(envelope: Envelope): Promise<void> {
    envelope.transition("InFlight");
    this.deps.metrics.attemptStarted();

    let result: AttemptResult;
    try {
      result = await this.deps.sink.send({ body: envelope.body, requestId: envelope.id });
    } catch (error) {
      result = { kind: "transport-error", reason: "network", message: getErrorMessage(error) };
    } finally {
      this.deps.metrics.attemptFinished();
    }

    await this.settle(envelope, result);
  }

  private async settle(envelope: Envelope, result: AttemptResult): Promise<void> {
    const { policy, reporter, logger } = this.deps;
    const verdict = policy.classify(result);

    if (verdict === "success" && result.kind === "response") {
      await reporter.delivered(envelope, result.status);
      return;
    }

    if (verdict === "permanent") {
      await reporter.abandoned(envelope, {
        reason: "non-retryable-status",
        lastError: describeFailure(result),
        ...responseDetails(result)
      });
      return;
    }

    const lastError = describeFailure(result);
    const attempt = envelope.recordFailedAttempt(lastError);

    if (policy.isExhausted(attempt)) {
      await reporter.abandoned(envelope, {
        reason: "attempts-exhausted",
        lastError,
        ...responseDetails(result)
      });
      return;
    }

    envelope.transition("RetryScheduled");

    if (this.deps.isStopping()) {
      await reporter.shutdown(envelope);
      return;
    }

    const delayMs = policy.delayFor(attempt);
    this.deps.metrics.increment("retries");
    this.deps.scheduler.schedule(envelope, delayMs);
    logger.warn(
      { workerId: this.id, envelopeId: envelope.id, attempt, delayMs, error: lastError },
      "Delivery failed; retry scheduled"
    );
  }
}
