import type { MetricsSnapshot, OverflowPolicy } from "@mqtt-relay/contracts";
import type { ShutdownPolicy } from "../../config/index.js";
import type { LoggerLike } from "../../logger.js";
import { BoundedQueue } from "./bounded-queue.js";
import { DeliveryWorker } from "./delivery-worker.js";
import type { Envelope } from "./envelope.js";
import type { DeliverySink } from "./http-sink.js";
import { InboundAdapter } from "./inbound-adapter.js";
import { PipelineMetrics } from "./metrics.js";
import { OutcomeReporter } from "./outcome-reporter.js";
import type { OutcomeSink } from "./outcome-sink.js";
import { RetryPolicy, type RetryPolicyOptions } from "./retry-policy.js";
import { RetryScheduler } from "./retry-scheduler.js";

export interface DeliveryPipelineOptions {
  queueCapacity: number;
  overflowPolicy: OverflowPolicy;
  deliveryWorkers: number;
  /** Lanes that run due retries; caps concurrent retry POSTs. */
  retryWorkers: number;
  shutdownPolicy: ShutdownPolicy;
  retry: Omit<RetryPolicyOptions, "random">;
}

export interface DeliveryPipelineDependencies {
  sink: DeliverySink;
  outcomeSink: OutcomeSink;
  logger: LoggerLike;
  now?: () => Date;
  random?: () => number;
}

/**
 * Inbound adapter, bounded queue, worker loops and retry scheduler wired together.
 * Messages enter through `adapter.onMessage`; every envelope ends up reported to the
 * outcome sink exactly once, including the ones cut short by `shutdown()`.
 *
 * Due retries wait in their own queue for one of `retryWorkers` lanes, so at most
 * `deliveryWorkers + retryWorkers` requests are open against the sink.
 */
export class DeliveryPipeline {
  readonly metrics: PipelineMetrics;
  readonly adapter: InboundAdapter;

  private readonly queue: BoundedQueue<Envelope>;
  private readonly dueRetries: BoundedQueue<Envelope>;
  private readonly scheduler: RetryScheduler<Envelope>;
  private readonly reporter: OutcomeReporter;
  private readonly workers: DeliveryWorker[];
  private readonly logger: LoggerLike;
  private loops: Array<Promise<void>> = [];
  private stopping = false;
  private shutdownTask: Promise<void> | undefined;

  constructor(
    private readonly options: DeliveryPipelineOptions,
    deps: DeliveryPipelineDependencies
  ) {
    const now = deps.now ?? (() => new Date());
    this.logger = deps.logger;
    this.metrics = new PipelineMetrics(now);
    this.queue = new BoundedQueue<Envelope>(options.queueCapacity, options.overflowPolicy);
    // Holds at most what the scheduler released, so it never fills.
    this.dueRetries = new BoundedQueue<Envelope>(Number.MAX_SAFE_INTEGER);
    this.scheduler = new RetryScheduler<Envelope>(
      (envelope) => this.dispatchRetry(envelope),
      () => now().getTime()
    );
    this.reporter = new OutcomeReporter({
      sink: deps.outcomeSink,
      metrics: this.metrics,
      logger: deps.logger,
      shutdownPolicy: options.shutdownPolicy,
      now
    });
    this.adapter = new InboundAdapter({
      queue: this.queue,
      metrics: this.metrics,
      reporter: this.reporter,
      logger: deps.logger
    });

    const workerDeps = {
      queue: this.queue,
      sink: deps.sink,
      policy: new RetryPolicy(
        deps.random === undefined ? options.retry : { ...options.retry, random: deps.random }
      ),
      scheduler: this.scheduler,
      reporter: this.reporter,
      metrics: this.metrics,
      logger: deps.logger,
      isStopping: () => this.stopping
    };
    this.workers = [
      ...Array.from(
        { length: options.deliveryWorkers },
        (_, index) => new DeliveryWorker(`worker-${index + 1}`, workerDeps)
      ),
      ...Array.from(
        { length: options.retryWorkers },
        (_, index) =>
          new DeliveryWorker(`retry-${index + 1}`, { ...workerDeps, queue: this.dueRetries })
      )
    ];
  }

  get isStopping(): boolean {
    return this.stopping;
  }

  start(): void {
    if (this.loops.length > 0 || this.stopping) {
      return;
    }

    this.loops = this.workers.map((worker) =>
      worker.run().catch((error: unknown) => {
        this.logger.error({ err: error, workerId: worker.id }, "Delivery worker crashed");
      })
    );
    this.logger.info(
      {
        deliveryWorkers: this.options.deliveryWorkers,
        retryWorkers: this.options.retryWorkers,
        queueCapacity: this.options.queueCapacity,
        overflowPolicy: this.options.overflowPolicy
      },
      "Delivery pipeline started"
    );
  }

  snapshot(): MetricsSnapshot {
    return this.metrics.snapshot({
      queued: this.queue.size,
      scheduled: this.scheduler.size + this.dueRetries.size
    });
  }

  /**
   * Stops admission, lets in-flight requests finish and reports everything still queued
   * or waiting on a backoff according to the shutdown policy. Safe to call repeatedly.
   */
  shutdown(): Promise<void> {
    this.shutdownTask ??= this.stop();
    return this.shutdownTask;
  }

  private async stop(): Promise<void> {
    this.stopping = true;
    const blockedProducers = this.queue.blockedProducers;
    this.adapter.stop();
    this.queue.close();
    const queued = this.queue.drain();
    const scheduled = this.scheduler.cancelAll();
    this.dueRetries.close();
    const due = this.dueRetries.drain();

    this.logger.info(
      {
        queued: queued.length,
        blockedProducers,
        scheduled: scheduled.length + due.length,
        inFlight: this.metrics.inFlight,
        shutdownPolicy: this.options.shutdownPolicy
      },
      "Stopping delivery pipeline"
    );

    for (const envelope of [...queued, ...due]) {
      await this.reporter.shutdown(envelope);
    }
    for (const { item } of scheduled) {
      await this.reporter.shutdown(item);
    }

    await this.adapter.whenIdle();
    await Promise.all(this.loops);
    this.logger.info(this.snapshot(), "Delivery pipeline stopped");
  }

  private dispatchRetry(envelope: Envelope): void {
    this.dueRetries.push(envelope).catch((error: unknown) => {
      this.logger.error({ err: error, envelopeId: envelope.id }, "Failed to queue due retry");
    });
  }
}
