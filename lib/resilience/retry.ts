import { createLogger, errorMessage } from "@/lib/logger";
import { classifyFailure, RetriesExhausted, type FailureKind } from "@/lib/resilience/errors";

export type RetryPolicy = {
  maxAttempts: number;
  baseWaitMs: number;
  maxWaitMs: number;
  multiplier: number;
  retryOn: readonly FailureKind[];
  /** Re-raise the last error as-is (default) instead of `RetriesExhausted`. */
  unwrapOnExhaustion: boolean;
};

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const DEFAULT_RETRY_ON: readonly FailureKind[] = ["connection", "timeout"];

const log = createLogger("retry");

export const abortableSleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, Math.max(0, ms));
    signal?.addEventListener("abort", onAbort, { once: true });
  });

/** Blocks the thread; only the synchronous operation shape uses this. */
export function blockingSleep(ms: number): void {
  if (ms <= 0) return;
  Atomics.wait(new Int32Array(new SharedArrayBuffer(4)), 0, 0, ms);
}

/**
 * Wait after the `retryIndex`-th failed attempt (0-based):
 * `min(multiplier^retryIndex * baseWait, maxWait)`, never below `baseWait`.
 */
export function backoffDelayMs(policy: Pick<RetryPolicy, "baseWaitMs" | "maxWaitMs" | "multiplier">, retryIndex: number): number {
  const exponential = Math.pow(policy.multiplier, Math.max(0, retryIndex)) * policy.baseWaitMs;
  const floor = Math.min(policy.baseWaitMs, policy.maxWaitMs);
  return Math.max(floor, Math.min(exponential, policy.maxWaitMs));
}

export function isRetryable(policy: Pick<RetryPolicy, "retryOn">, error: unknown): boolean {
  return policy.retryOn.includes(classifyFailure(error));
}

function exhausted(resource: string, policy: RetryPolicy, attempts: number, error: unknown): unknown {
  if (attempts <= 1 || policy.unwrapOnExhaustion) return error;
  return new RetriesExhausted(resource, attempts, error);
}

export async function retryAsync<T>(input: {
  resource: string;
  policy: RetryPolicy;
  signal: AbortSignal;
  sleep: Sleep;
  attempt: (signal: AbortSignal) => Promise<T>;
}): Promise<T> {
  const maxAttempts = Math.max(1, Math.floor(input.policy.maxAttempts));
  let attempt = 0;

  while (true) {
    attempt += 1;
    try {
      return await input.attempt(input.signal);
    } catch (error) {
      if (input.signal.aborted) throw input.signal.reason;
      if (!isRetryable(input.policy, error)) throw error;
      if (attempt >= maxAttempts) {
        log.error("retries exhausted", { resource: input.resource, attempts: attempt, error: errorMessage(error) });
        throw exhausted(input.resource, input.policy, attempt, error);
      }

      const delayMs = backoffDelayMs(input.policy, attempt - 1);
      log.warn("retrying after transient failure", {
        resource: input.resource,
        attempt,
        delayMs,
        error: errorMessage(error),
      });
      await input.sleep(delayMs, input.signal);
    }
  }
}

export function retrySync<T>(input: {
  resource: string;
  policy: RetryPolicy;
  deadline: () => void;
  sleep: (ms: number) => void;
  attempt: () => T;
}): T {
  const maxAttempts = Math.max(1, Math.floor(input.policy.maxAttempts));
  let attempt = 0;

  while (true) {
    attempt += 1;
    try {
      return input.attempt();
    } catch (error) {
      if (!isRetryable(input.policy, error)) throw error;
      if (attempt >= maxAttempts) {
        log.error("retries exhausted", { resource: input.resource, attempts: attempt, error: errorMessage(error) });
        throw exhausted(input.resource, input.policy, attempt, error);
      }

      const delayMs = backoffDelayMs(input.policy, attempt - 1);
      log.warn("retrying after transient failure", {
        resource: input.resource,
        attempt,
        delayMs,
        error: errorMessage(error),
      });
      input.deadline();
      input.sleep(delayMs);
      input.deadline();
    }
  }
}
