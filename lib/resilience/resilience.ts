import { createLogger } from "@/lib/logger";
import { CircuitBreaker, CircuitRegistry, systemClock, type CircuitPermit, type Clock } from "@/lib/resilience/circuit-breaker";
import { classifyFailure, OperationAborted, TimeoutExceeded, type FailureKind } from "@/lib/resilience/errors";
import {
  abortableSleep,
  blockingSleep,
  DEFAULT_RETRY_ON,
  retryAsync,
  retrySync,
  type RetryPolicy,
  type Sleep,
} from "@/lib/resilience/retry";
import {
  isResourceClass,
  loadRuntimeConfig,
  type ResiliencePreset,
  type ResourceClass,
} from "@/lib/runtime-config";

/** A plain blocking function. */
export type SyncOperation<A extends unknown[], R> = {
  kind: "sync";
  run: (...args: A) => R;
};

/** One awaited result; `signal` is the cancellation channel to forward to the transport. */
export type AsyncOperation<A extends unknown[], R> = {
  kind: "async";
  run: (signal: AbortSignal, ...args: A) => Promise<R>;
};

/** A sequence of chunks, e.g. a token stream. */
export type StreamOperation<A extends unknown[], T> = {
  kind: "stream";
  run: (signal: AbortSignal, ...args: A) => AsyncIterable<T>;
};

export type ResilienceOverrides = Partial<ResiliencePreset> & {
  preset?: ResourceClass;
  retryOn?: readonly FailureKind[];
  unwrapOnExhaustion?: boolean;
  circuit?: boolean;
};

export type ResolvedSettings = ResiliencePreset & {
  presetClass: ResourceClass;
  retry: RetryPolicy;
  circuit: boolean;
};

export type CallOptions = {
  signal?: AbortSignal;
  overrides?: ResilienceOverrides;
};

const log = createLogger("resilience");

/** Rejects with `signal.reason` as soon as the signal aborts, even if `promise` never settles. */
export function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener("abort", onAbort, { once: true });
    }
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
}

/** Child controller for one call, aborted by the caller or by our own timer. */
class CallScope {
  private readonly controller = new AbortController();

  private readonly unlink: () => void;

  constructor(resource: string, parent?: AbortSignal) {
    const onParentAbort = () => this.abort(new OperationAborted(resource));
    if (parent?.aborted) {
      onParentAbort();
    } else {
      parent?.addEventListener("abort", onParentAbort, { once: true });
    }
    this.unlink = () => parent?.removeEventListener("abort", onParentAbort);
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  abort(reason: Error): void {
    if (!this.controller.signal.aborted) {
      this.controller.abort(reason);
    }
  }

  dispose(): void {
    this.unlink();
  }
}

function settlePermitOnError(permit: CircuitPermit | undefined, error: unknown): void {
  if (!permit) return;
  if (classifyFailure(error) === "aborted") {
    permit.release();
  } else {
    permit.failure();
  }
}

/**
 * Timeout -> circuit breaker -> retry -> operation, for each of the three
 * operation shapes. Streams skip the retry layer.
 */
export class Resilience {
  readonly registry: CircuitRegistry;

  private readonly presets: Record<ResourceClass, ResiliencePreset>;

  private readonly clock: Clock;

  private readonly sleep: Sleep;

  private readonly sleepSync: (ms: number) => void;

  constructor(input?: {
    registry?: CircuitRegistry;
    presets?: Record<ResourceClass, ResiliencePreset>;
    clock?: Clock;
    sleep?: Sleep;
    sleepSync?: (ms: number) => void;
  }) {
    this.clock = input?.clock ?? systemClock;
    this.registry = input?.registry ?? new CircuitRegistry(this.clock);
    this.presets = input?.presets ?? loadRuntimeConfig().presets;
    this.sleep = input?.sleep ?? abortableSleep;
    this.sleepSync = input?.sleepSync ?? blockingSleep;
  }

  /** `generation:classifier` resolves to the `generation` preset; unknown names fall back to `generic-http`. */
  resolve(resource: string, overrides?: ResilienceOverrides): ResolvedSettings {
    const head = resource.split(":")[0] ?? resource;
    const presetClass = overrides?.preset ?? (isResourceClass(head) ? head : "generic-http");
    const base = this.presets[presetClass];
    const merged: ResiliencePreset = {
      timeoutMs: overrides?.timeoutMs ?? base.timeoutMs,
      retryMaxAttempts: overrides?.retryMaxAttempts ?? base.retryMaxAttempts,
      retryBaseWaitMs: overrides?.retryBaseWaitMs ?? base.retryBaseWaitMs,
      retryMaxWaitMs: overrides?.retryMaxWaitMs ?? base.retryMaxWaitMs,
      retryMultiplier: overrides?.retryMultiplier ?? base.retryMultiplier,
      circuitFailMax: overrides?.circuitFailMax ?? base.circuitFailMax,
      circuitResetTimeoutMs: overrides?.circuitResetTimeoutMs ?? base.circuitResetTimeoutMs,
    };

    return {
      ...merged,
      presetClass,
      circuit: overrides?.circuit ?? true,
      retry: {
        maxAttempts: merged.retryMaxAttempts,
        baseWaitMs: merged.retryBaseWaitMs,
        maxWaitMs: merged.retryMaxWaitMs,
        multiplier: merged.retryMultiplier,
        retryOn: overrides?.retryOn ?? DEFAULT_RETRY_ON,
        unwrapOnExhaustion: overrides?.unwrapOnExhaustion ?? true,
      },
    };
  }

  /** Breaker settings are fixed by whichever call site creates the breaker first. */
  private breakerFor(resource: string, settings: ResolvedSettings): CircuitBreaker | undefined {
    if (!settings.circuit) return undefined;
    return this.registry.get(resource, {
      failMax: settings.circuitFailMax,
      resetTimeoutMs: settings.circuitResetTimeoutMs,
    });
  }

  wrap<A extends unknown[], R>(
    operation: SyncOperation<A, R>,
    resource: string,
    overrides?: ResilienceOverrides,
  ): SyncOperation<A, R>;
  wrap<A extends unknown[], R>(
    operation: AsyncOperation<A, R>,
    resource: string,
    overrides?: ResilienceOverrides,
  ): AsyncOperation<A, R>;
  wrap<A extends unknown[], T>(
    operation: StreamOperation<A, T>,
    resource: string,
    overrides?: ResilienceOverrides,
  ): StreamOperation<A, T>;
  wrap<A extends unknown[], R>(
    operation: SyncOperation<A, R> | AsyncOperation<A, R> | StreamOperation<A, R>,
    resource: string,
    overrides?: ResilienceOverrides,
  ): SyncOperation<A, R> | AsyncOperation<A, R> | StreamOperation<A, R> {
    switch (operation.kind) {
      case "sync": {
        const run = operation.run;
        return {
          kind: "sync",
          run: (...args: A) => this.executeSync(resource, this.resolve(resource, overrides), () => run(...args)),
        };
      }
      case "async": {
        const run = operation.run;
        return {
          kind: "async",
          run: (signal: AbortSignal, ...args: A) =>
            this.executeAsync(resource, this.resolve(resource, overrides), (inner) => run(inner, ...args), signal),
        };
      }
      case "stream": {
        const run = operation.run;
        return {
          kind: "stream",
          run: (signal: AbortSignal, ...args: A) =>
            this.executeStream(resource, this.resolve(resource, overrides), (inner) => run(inner, ...args), signal),
        };
      }
    }
  }

  call<R>(resource: string, fn: (signal: AbortSignal) => Promise<R>, options?: CallOptions): Promise<R> {
    return this.executeAsync(resource, this.resolve(resource, options?.overrides), fn, options?.signal);
  }

  stream<T>(resource: string, fn: (signal: AbortSignal) => AsyncIterable<T>, options?: CallOptions): AsyncGenerator<T> {
    return this.executeStream(resource, this.resolve(resource, options?.overrides), fn, options?.signal);
  }

  private async guardedAttempt<R>(
    breaker: CircuitBreaker | undefined,
    signal: AbortSignal,
    run: () => Promise<R>,
  ): Promise<R> {
    const permit = breaker?.acquire();
    try {
      const value = await raceAbort(run(), signal);
      permit?.success();
      return value;
    } catch (error) {
      settlePermitOnError(permit, error);
      throw error;
    }
  }

  private executeSync<R>(resource: string, settings: ResolvedSettings, run: () => R): R {
    const breaker = this.breakerFor(resource, settings);
    breaker?.rejectIfOpen();

    const startedAt = this.clock.now();
    const deadline = () => {
      if (this.clock.now() - startedAt > settings.timeoutMs) {
        throw new TimeoutExceeded(resource, settings.timeoutMs);
      }
    };

    const permit = breaker?.acquire();
    try {
      const value = retrySync({
        resource,
        policy: settings.retry,
        deadline,
        sleep: this.sleepSync,
        attempt: run,
      });
      deadline();
      permit?.success();
      return value;
    } catch (error) {
      settlePermitOnError(permit, error);
      throw error;
    }
  }

  private async executeAsync<R>(
    resource: string,
    settings: ResolvedSettings,
    attempt: (signal: AbortSignal) => Promise<R>,
    callerSignal?: AbortSignal,
  ): Promise<R> {
    const breaker = this.breakerFor(resource, settings);
    breaker?.rejectIfOpen();

    const scope = new CallScope(resource, callerSignal);
    const timer = setTimeout(() => scope.abort(new TimeoutExceeded(resource, settings.timeoutMs)), settings.timeoutMs);
    try {
      return await this.guardedAttempt(breaker, scope.signal, () =>
        retryAsync({
          resource,
          policy: settings.retry,
          signal: scope.signal,
          sleep: this.sleep,
          attempt,
        }),
      );
    } catch (error) {
      if (error instanceof TimeoutExceeded) {
        log.error("call timed out", { resource, timeoutMs: settings.timeoutMs });
      }
      throw error;
    } finally {
      clearTimeout(timer);
      scope.dispose();
    }
  }

  private async *executeStream<T>(
    resource: string,
    settings: ResolvedSettings,
    open: (signal: AbortSignal) => AsyncIterable<T>,
    callerSignal?: AbortSignal,
  ): AsyncGenerator<T> {
    const breaker = this.breakerFor(resource, settings);
    breaker?.rejectIfOpen();

    const scope = new CallScope(resource, callerSignal);
    const startedAt = this.clock.now();
    const timer = setTimeout(() => scope.abort(new TimeoutExceeded(resource, settings.timeoutMs)), settings.timeoutMs);
    let permit: CircuitPermit | undefined;
    let iterator: AsyncIterator<T> | undefined;
    let completed = false;
    let suspended = false;

    try {
      permit = breaker?.acquire();
      // A throwing opener still has to settle the permit and clear the timer.
      iterator = open(scope.signal)[Symbol.asyncIterator]();
      while (true) {
        const step = await raceAbort(iterator.next(), scope.signal);
        if (this.clock.now() - startedAt > settings.timeoutMs) {
          throw new TimeoutExceeded(resource, settings.timeoutMs);
        }
        if (step.done) break;
        suspended = true;
        yield step.value;
        suspended = false;
      }
      completed = true;
      permit?.success();
    } catch (error) {
      if (error instanceof TimeoutExceeded) {
        log.error("stream timed out", { resource, timeoutMs: settings.timeoutMs });
      }
      settlePermitOnError(permit, error);
      throw error;
    } finally {
      clearTimeout(timer);
      scope.dispose();
      if (!completed) {
        // Consumer stopped early: neither success nor failure.
        permit?.release();
        scope.abort(new OperationAborted(resource));
        if (suspended && iterator?.return) {
          await iterator.return();
        }
      }
    }
  }
}
