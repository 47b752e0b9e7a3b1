import type { GraphqlEnvelope } from "./payloads";

/**
 * What came back for one request. A body that is not JSON is kept as text.
 */
export type GraphqlResponse =
  | { status: number; kind: "json"; body: unknown }
  | { status: number; kind: "text"; body: string };

export type GraphqlTransport = (envelope: GraphqlEnvelope) => Promise<GraphqlResponse>;

export type FetchTransportOptions = {
  endpoint: string;
  headers?: Record<string, string>;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
};

/**
 * POSTs envelopes as JSON. Network errors and timeouts reject.
 */
export function createFetchTransport(options: FetchTransportOptions): GraphqlTransport {
  const fetchImpl = options.fetchImpl ?? fetch;

  return async (envelope) => {
    const resp = await fetchImpl(options.endpoint, {
      method: "POST",
      headers: {
        ...options.headers,
        "Content-Type": "application/json",
      },
      body: JSON.stringify(envelope),
      signal: AbortSignal.timeout(options.timeoutMs),
    });

    const text = await resp.text();
    try {
      const body: unknown = JSON.parse(text);
      return { status: resp.status, kind: "json", body };
    } catch {
      return { status: resp.status, kind: "text", body: text };
    }
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function messageOf(error: unknown): string {
  if (isRecord(error)) {
    const message = typeof error.message === "string" ? error.message : JSON.stringify(error);
    return typeof error.field === "string" ? `${error.field}: ${message}` : message;
  }
  return String(error);
}

/**
 * Error messages carried by a response: HTTP status, top-level GraphQL errors,
 * and the `errors`/`message` of each mutation result. Empty means success.
 */
export function responseErrors(response: GraphqlResponse): string[] {
  const errors: string[] = [];
  if (response.status < 200 || response.status >= 300) {
    const detail = response.kind === "text" ? response.body : JSON.stringify(response.body);
    errors.push(`HTTP ${response.status}: ${detail}`);
  }
  if (response.kind === "text" || !isRecord(response.body)) {
    return errors;
  }

  const { errors: topLevel, data } = response.body;
  if (Array.isArray(topLevel)) {
    errors.push(...topLevel.map(messageOf));
  }
  if (isRecord(data)) {
    for (const result of Object.values(data)) {
      if (!isRecord(result)) {
        continue;
      }
      if (Array.isArray(result.errors)) {
        errors.push(...result.errors.map(messageOf));
      }
      if (typeof result.message === "string" && result.message) {
        errors.push(result.message);
      }
    }
  }
  return errors;
}
