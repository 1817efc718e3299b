import type { OverflowPolicy } from "@mqtt-relay/contracts";
import { QueueClosedError } from "./errors.js";

export type PushResult<T> = { status: "enqueued" } | { status: "dropped-oldest"; evicted: T };

interface WaitingProducer<T> {
  item: T;
  resolve: (result: PushResult<T>) => void;
  reject: (error: Error) => void;
}

/**
 * Fixed-capacity FIFO between a producer and the delivery workers that pop from it.
 *
 * When full, `push` either waits for a `pop` (`block`, producers admitted in arrival
 * order) or evicts the oldest item (`drop-oldest`). `pop` waits while empty and
 * resolves `undefined` once the queue is closed and drained.
 */
export class BoundedQueue<T extends object> {
  private readonly items: T[] = [];
  private readonly consumers: Array<(item: T | undefined) => void> = [];
  private readonly producers: Array<WaitingProducer<T>> = [];
  private closed = false;

  constructor(
    readonly capacity: number,
    readonly policy: OverflowPolicy = "block"
  ) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer (received: ${capacity})`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  get blockedProducers(): number {
    return this.producers.length;
  }

  push(item: T): Promise<PushResult<T>> {
    if (this.closed) {
      return Promise.reject(new QueueClosedError());
    }

    const consumer = this.consumers.shift();
    if (consumer) {
      consumer(item);
      return Promise.resolve({ status: "enqueued" });
    }

    if (this.items.length < this.capacity) {
      this.items.push(item);
      return Promise.resolve({ status: "enqueued" });
    }

    if (this.policy === "drop-oldest") {
      const evicted = this.items.shift();
      this.items.push(item);
      return Promise.resolve(
        evicted === undefined ? { status: "enqueued" } : { status: "dropped-oldest", evicted }
      );
    }

    return new Promise((resolve, reject) => {
      this.producers.push({ item, resolve, reject });
    });
  }

  pop(): Promise<T | undefined> {
    const item = this.items.shift();
    if (item !== undefined) {
      this.admitWaitingProducer();
      return Promise.resolve(item);
    }

    if (this.closed) {
      return Promise.resolve(undefined);
    }

    return new Promise((resolve) => {
      this.consumers.push(resolve);
    });
  }

  /**
   * Stops the queue: waiting consumers resolve `undefined`, blocked producers reject
   * with `QueueClosedError`. Items already queued stay until popped or drained.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;

    for (const consumer of this.consumers.splice(0)) {
      consumer(undefined);
    }
    for (const producer of this.producers.splice(0)) {
      producer.reject(new QueueClosedError());
    }
  }

  drain(): T[] {
    return this.items.splice(0);
  }

  private admitWaitingProducer(): void {
    const producer = this.producers.shift();
    if (!producer) {
      return;
    }
    this.items.push(producer.item);
    producer.resolve({ status: "enqueued" });
  }
}
