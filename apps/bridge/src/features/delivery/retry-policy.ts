import type { AttemptResult } from "./http-sink.js";

export type AttemptClass = "success" | "retryable" | "permanent";

export interface RetryPolicyOptions {
  maxAttempts: number;
  baseDelayMs: number;
  multiplier: number;
  maxDelayMs: number;
  jitter: boolean;
  /** Status codes (`"429"`) or classes (`"5xx"`) treated as transient. */
  retryableStatuses: readonly string[];
  random?: () => number;
}

function matchesStatus(status: number, matcher: string): boolean {
  if (/^[1-5]xx$/.test(matcher)) {
    return Math.floor(status / 100) === Number(matcher[0]);
  }
  return String(status) === matcher;
}

export class RetryPolicy {
  readonly maxAttempts: number;
  private readonly random: () => number;

  constructor(private readonly options: RetryPolicyOptions) {
    if (!Number.isInteger(options.maxAttempts) || options.maxAttempts < 1) {
      throw new RangeError(
        `maxAttempts must be a positive integer (received: ${options.maxAttempts})`
      );
    }
    if (options.multiplier < 1) {
      throw new RangeError(
        `Backoff multiplier must be at least 1 (received: ${options.multiplier})`
      );
    }
    this.maxAttempts = options.maxAttempts;
    this.random = options.random ?? Math.random;
  }

  classify(result: AttemptResult): AttemptClass {
    if (result.kind === "transport-error") {
      return "retryable";
    }
    if (result.status >= 200 && result.status < 300) {
      return "success";
    }
    return this.options.retryableStatuses.some((matcher) => matchesStatus(result.status, matcher))
      ? "retryable"
      : "permanent";
  }

  isExhausted(attempt: number): boolean {
    return attempt >= this.maxAttempts;
  }

  /**
   * Backoff before retry number `attempt` (1-based): `base * multiplier^(attempt-1)`
   * capped at the max delay. With jitter the value is drawn from the interval between
   * the previous nominal delay and this one, so successive delays never shrink.
   */
  delayFor(attempt: number): number {
    const nominal = this.nominalDelay(attempt);
    if (!this.options.jitter) {
      return nominal;
    }

    const lower = Math.min(nominal, this.nominalDelay(attempt - 1));
    return Math.floor(lower + this.random() * (nominal - lower));
  }

  private nominalDelay(attempt: number): number {
    const { baseDelayMs, multiplier, maxDelayMs } = this.options;
    return Math.min(maxDelayMs, Math.round(baseDelayMs * multiplier ** (attempt - 1)));
  }
}
