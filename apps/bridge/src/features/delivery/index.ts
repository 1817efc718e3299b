export { BoundedQueue, type PushResult } from "./bounded-queue.js";
export { DeliveryWorker } from "./delivery-worker.js";
export { Envelope, type EnvelopeInit } from "./envelope.js";
export { InvalidTransitionError, QueueClosedError } from "./errors.js";
export { HttpSink, type AttemptResult, type DeliverySink, type SinkRequest } from "./http-sink.js";
export { InboundAdapter, type EnqueueResult, type RejectReason } from "./inbound-adapter.js";
export { PipelineMetrics } from "./metrics.js";
export { OutcomeReporter } from "./outcome-reporter.js";
export {
  CompositeOutcomeSink,
  FileOutcomeSink,
  InMemoryOutcomeSink,
  LoggingOutcomeSink,
  type OutcomeSink
} from "./outcome-sink.js";
export {
  DeliveryPipeline,
  type DeliveryPipelineDependencies,
  type DeliveryPipelineOptions
} from "./pipeline.js";
export { RetryPolicy, type RetryPolicyOptions } from "./retry-policy.js";
export { RetryScheduler } from "./retry-scheduler.js";
