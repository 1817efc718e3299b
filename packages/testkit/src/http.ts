type FetchInput = Parameters<typeof globalThis.fetch>[0];
type FetchInit = Parameters<typeof globalThis.fetch>[1];

export type SinkResponseFixture =
  | {
      status?: number;
      body?: unknown;
      headers?: Record<string, string>;
    }
  | {
      networkError: string;
    }
  | {
      hang: true;
    };

export interface RecordedSinkCall {
  url: string;
  method: string;
  headers: Record<string, string>;
  body: string;
  at: number;
}

export interface ScriptedFetchFixture {
  fetch: typeof globalThis.fetch;
  calls: RecordedSinkCall[];
  bodies(): unknown[];
}

function normalizeInput(input: FetchInput) {
  if (typeof input === "string") {
    return input;
  }
  if (input instanceof URL) {
    return input.toString();
  }
  return input.url;
}

function buildJsonResponse({
  status = 200,
  body = {},
  headers = {}
}: {
  status?: number;
  body?: unknown;
  headers?: Record<string, string>;
}) {
  return new Response(JSON.stringify(body), {
    status,
    headers: {
      "content-type": "application/json",
      ...headers
    }
  });
}

function waitForAbort(signal: AbortSignal | null | undefined): Promise<never> {
  return new Promise((_resolve, reject) => {
    if (!signal) {
      return;
    }
    if (signal.aborted) {
      reject(new Error("The operation was aborted"));
      return;
    }
    signal.addEventListener("abort", () => reject(new Error("The operation was aborted")), {
      once: true
    });
  });
}

/**
 * A `fetch` stand-in for the HTTP sink. Each call consumes the next scripted response;
 * once the script runs out the last entry repeats.
 */
export function createScriptedFetch(
  script: SinkResponseFixture[],
  fallbackFixture: SinkResponseFixture = { status: 200, body: { ok: true } }
): ScriptedFetchFixture {
  const calls: RecordedSinkCall[] = [];

  const fetchFixture: typeof globalThis.fetch = async (input: FetchInput, init?: FetchInit) => {
    const index = calls.length;
    calls.push({
      url: normalizeInput(input),
      method: init?.method ?? "GET",
      headers: Object.fromEntries(new Headers(init?.headers).entries()),
      body: typeof init?.body === "string" ? init.body : "",
      at: Date.now()
    });

    const entry = script[index] ?? script[script.length - 1] ?? fallbackFixture;

    if ("networkError" in entry) {
      throw new TypeError(entry.networkError);
    }
    if ("hang" in entry) {
      return waitForAbort(init?.signal);
    }

    return buildJsonResponse(entry);
  };

  return {
    fetch: fetchFixture,
    calls,
    bodies: () => calls.map((call): unknown => JSON.parse(call.body))
  };
}
