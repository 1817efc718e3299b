export interface ScheduledRetry<T> {
  item: T;
  dueAt: number;
}

interface Entry<T> extends ScheduledRetry<T> {
  timer: ReturnType<typeof setTimeout>;
}

/**
 * Holds items waiting out their backoff. Each item gets its own timer; when it fires
 * the item is handed to `onDue`. Nothing here blocks a worker.
 */
export class RetryScheduler<T extends object> {
  private readonly entries = new Map<T, Entry<T>>();
  private closed = false;

  constructor(
    private readonly onDue: (item: T) => void,
    private readonly now: () => number = Date.now
  ) {}

  get size(): number {
    return this.entries.size;
  }

  schedule(item: T, delayMs: number): void {
    if (this.closed) {
      throw new Error("Retry scheduler is closed");
    }
    if (this.entries.has(item)) {
      throw new Error("Item already has a pending retry");
    }

    const timer = setTimeout(() => {
      this.entries.delete(item);
      this.onDue(item);
    }, delayMs);

    this.entries.set(item, { item, dueAt: this.now() + delayMs, timer });
  }

  /** Stops accepting work and returns every pending item, earliest due first. */
  cancelAll(): Array<ScheduledRetry<T>> {
    this.closed = true;
    const cancelled = [...this.entries.values()].sort((left, right) => left.dueAt - right.dueAt);
    for (const entry of cancelled) {
      clearTimeout(entry.timer);
    }
    this.entries.clear();
    return cancelled.map(({ item, dueAt }) => ({ item, dueAt }));
  }
}
