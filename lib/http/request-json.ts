import { HttpStatusError, MalformedResponse, TransientNetworkFailure } from "@/lib/resilience/errors";

export type JsonRequest = {
  url: URL | string;
  method?: "GET" | "POST" | "PUT";
  headers?: Record<string, string>;
  body?: unknown;
  signal?: AbortSignal;
  /** Short name used in error messages and logs, e.g. `qdrant:search`. */
  endpoint: string;
  /** Resolve a 404 as `{ status: 404, payload: null }` instead of throwing. */
  allowNotFound?: boolean;
};

export type JsonResponse = {
  status: number;
  payload: unknown;
};

export function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

/**
 * One HTTP round trip with failures mapped onto the resilience taxonomy:
 * transport errors become `TransientNetworkFailure`, non-2xx statuses
 * `HttpStatusError`, unparseable bodies `MalformedResponse`. An aborted
 * signal re-throws its own reason.
 */
export async function requestJson(input: JsonRequest): Promise<JsonResponse> {
  let response: Response;
  try {
    response = await fetch(input.url, {
      method: input.method ?? "POST",
      headers: {
        Accept: "application/json",
        ...(input.body === undefined ? {} : { "Content-Type": "application/json" }),
        ...input.headers,
      },
      body: input.body === undefined ? undefined : JSON.stringify(input.body),
      signal: input.signal,
    });
  } catch (error) {
    if (input.signal?.aborted) throw input.signal.reason;
    const message = error instanceof Error ? error.message : String(error);
    throw new TransientNetworkFailure(`${input.endpoint} request failed: ${message}`, {
      endpoint: input.endpoint,
      cause: error,
    });
  }

  if (response.status === 404 && input.allowNotFound) {
    return { status: 404, payload: null };
  }
  if (!response.ok) {
    throw new HttpStatusError(`${input.endpoint} HTTP ${response.status}`, {
      status: response.status,
      endpoint: input.endpoint,
    });
  }

  const raw = await response.text();
  if (!raw.trim()) {
    return { status: response.status, payload: null };
  }
  try {
    return { status: response.status, payload: JSON.parse(raw) };
  } catch {
    throw new MalformedResponse(`${input.endpoint} returned a non-JSON body`, input.endpoint);
  }
}
