import { getErrorMessage } from "../../logger.js";

export type AttemptResult =
  | { kind: "response"; status: number; bodySnippet?: string }
  | { kind: "transport-error"; reason: "timeout" | "network"; message: string };

export interface SinkRequest {
  body: string;
  requestId: string;
}

export interface DeliverySink {
  send(request: SinkRequest): Promise<AttemptResult>;
}

export interface HttpSinkOptions {
  url: string;
  timeoutMs: number;
  headers?: Record<string, string>;
  fetch?: typeof globalThis.fetch;
  snippetLength?: number;
}

const DEFAULT_SNIPPET_LENGTH = 512;

/**
 * POSTs request bodies to the configured endpoint. Never throws: a timeout or a
 * connection failure comes back as a `transport-error` result.
 */
export class HttpSink implements DeliverySink {
  private readonly fetchFn: typeof globalThis.fetch;
  private readonly snippetLength: number;

  constructor(private readonly options: HttpSinkOptions) {
    this.fetchFn = options.fetch ?? globalThis.fetch;
    this.snippetLength = options.snippetLength ?? DEFAULT_SNIPPET_LENGTH;
  }

  async send(request: SinkRequest): Promise<AttemptResult> {
    const headers = new Headers(this.options.headers);
    headers.set("content-type", "application/json");
    headers.set("x-request-id", request.requestId);

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.options.timeoutMs);

    try {
      const response = await this.fetchFn(this.options.url, {
        method: "POST",
        headers,
        body: request.body,
        signal: controller.signal
      });
      const text = await response.text();
      const bodySnippet = text.slice(0, this.snippetLength);

      return bodySnippet.length > 0
        ? { kind: "response", status: response.status, bodySnippet }
        : { kind: "response", status: response.status };
    } catch (error) {
      if (timedOut) {
        return {
          kind: "transport-error",
          reason: "timeout",
          message: `Request timed out after ${this.options.timeoutMs}ms`
        };
      }
      return { kind: "transport-error", reason: "network", message: getErrorMessage(error) };
    } finally {
      clearTimeout(timer);
    }
  }
}
