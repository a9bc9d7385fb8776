import { APIConnectionError, APIConnectionTimeoutError } from "openai";

export type FailureKind = "connection" | "timeout" | "http_status" | "malformed" | "aborted" | "other";

export class TransientNetworkFailure extends Error {
  readonly endpoint?: string;

  constructor(message: string, input?: { endpoint?: string; cause?: unknown }) {
    super(message, input?.cause === undefined ? undefined : { cause: input.cause });
    this.name = "TransientNetworkFailure";
    this.endpoint = input?.endpoint;
  }
}

export class TimeoutExceeded extends Error {
  readonly resource: string;
  readonly durationMs: number;

  constructor(resource: string, durationMs: number) {
    super(`${resource} timed out after ${durationMs}ms`);
    this.name = "TimeoutExceeded";
    this.resource = resource;
    this.durationMs = durationMs;
  }
}

export class CircuitOpen extends Error {
  readonly resource: string;
  readonly retryAfterMs: number;

  constructor(resource: string, retryAfterMs: number) {
    super(`circuit for ${resource} is open`);
    this.name = "CircuitOpen";
    this.resource = resource;
    this.retryAfterMs = retryAfterMs;
  }
}

export class RetriesExhausted extends Error {
  readonly resource: string;
  readonly attempts: number;
  readonly lastError: unknown;

  constructor(resource: string, attempts: number, lastError: unknown) {
    const reason = lastError instanceof Error ? lastError.message : String(lastError);
    super(`${resource} failed after ${attempts} attempts: ${reason}`);
    this.name = "RetriesExhausted";
    this.resource = resource;
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

export class MalformedResponse extends Error {
  readonly endpoint?: string;

  constructor(message: string, endpoint?: string) {
    super(message);
    this.name = "MalformedResponse";
    this.endpoint = endpoint;
  }
}

export class HttpStatusError extends Error {
  readonly status: number;
  readonly endpoint?: string;

  constructor(message: string, input: { status: number; endpoint?: string }) {
    super(message);
    this.name = "HttpStatusError";
    this.status = input.status;
    this.endpoint = input.endpoint;
  }
}

/** Raised when the caller cancels; never counted against a circuit. */
export class OperationAborted extends Error {
  readonly resource: string;

  constructor(resource: string) {
    super(`${resource} call was cancelled`);
    this.name = "OperationAborted";
    this.resource = resource;
  }
}

const CONNECTION_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EPIPE",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "UND_ERR_SOCKET",
  "UND_ERR_CONNECT_TIMEOUT",
]);

const TIMEOUT_CODES = new Set(["ETIMEDOUT", "ESOCKETTIMEDOUT", "UND_ERR_HEADERS_TIMEOUT", "UND_ERR_BODY_TIMEOUT"]);

function readCode(value: unknown): string | undefined {
  if (!value || typeof value !== "object" || !("code" in value)) return undefined;
  return typeof value.code === "string" ? value.code : undefined;
}

function readStatus(value: unknown): number | undefined {
  if (!value || typeof value !== "object") return undefined;
  if ("status" in value && typeof value.status === "number") return value.status;
  if (!("$metadata" in value)) return undefined;
  const metadata = value.$metadata;
  if (!metadata || typeof metadata !== "object") return undefined;
  return "httpStatusCode" in metadata && typeof metadata.httpStatusCode === "number"
    ? metadata.httpStatusCode
    : undefined;
}

/**
 * Maps anything thrown by fetch, the AWS SDK, the OpenAI SDK or our own
 * clients onto the failure kinds the retry allow-list speaks.
 */
export function classifyFailure(error: unknown): FailureKind {
  if (error instanceof OperationAborted) return "aborted";
  if (error instanceof TimeoutExceeded) return "timeout";
  if (error instanceof TransientNetworkFailure) return "connection";
  if (error instanceof MalformedResponse || error instanceof SyntaxError) return "malformed";
  if (error instanceof HttpStatusError) return "http_status";
  if (error instanceof CircuitOpen || error instanceof RetriesExhausted) return "other";
  if (!(error instanceof Error)) return "other";

  const code = readCode(error) ?? readCode(error.cause);
  if (code && TIMEOUT_CODES.has(code)) return "timeout";
  if (code && CONNECTION_CODES.has(code)) return "connection";

  // openai SDK errors keep `name === "Error"`; the timeout class extends the connection one.
  if (error instanceof APIConnectionTimeoutError) return "timeout";
  if (error instanceof APIConnectionError) return "connection";

  switch (error.name) {
    case "TimeoutError":
      return "timeout";
    case "AbortError":
      return "aborted";
    default:
      break;
  }

  if (error instanceof TypeError && /fetch failed|network/i.test(error.message)) return "connection";
  if (readStatus(error) !== undefined) return "http_status";
  return "other";
}
