import { createLogger } from "@/lib/logger";
import { CircuitOpen } from "@/lib/resilience/errors";

export type CircuitState = "closed" | "open" | "half_open";

export type CircuitBreakerConfig = {
  failMax: number;
  resetTimeoutMs: number;
};

export type CircuitSnapshot = {
  name: string;
  state: CircuitState;
  failures: number;
  failMax: number;
  resetTimeoutMs: number;
  openedAt: number | null;
};

export type Clock = {
  now: () => number;
};

export const systemClock: Clock = {
  now: () => Date.now(),
};

/** Handed out by `acquire`; settle it exactly once with the call's outcome. */
export type CircuitPermit = {
  probe: boolean;
  success: () => void;
  failure: () => void;
  release: () => void;
};

const log = createLogger("circuit-breaker");

/**
 * Closed -> open after `failMax` consecutive failures; open rejects until
 * `resetTimeoutMs` passes; then one probe call runs in half-open and decides
 * between closed and a fresh open window.
 *
 * Every transition happens synchronously inside one method call, so
 * concurrent requests on the event loop never observe a torn update.
 */
export class CircuitBreaker {
  readonly name: string;

  private readonly config: CircuitBreakerConfig;

  private readonly clock: Clock;

  private state: CircuitState = "closed";

  private failures = 0;

  private openedAt: number | null = null;

  private probeInFlight = false;

  constructor(name: string, config: CircuitBreakerConfig, clock: Clock = systemClock) {
    this.name = name;
    this.config = {
      failMax: Math.max(1, Math.floor(config.failMax)),
      resetTimeoutMs: Math.max(0, config.resetTimeoutMs),
    };
    this.clock = clock;
  }

  get currentState(): CircuitState {
    if (this.state === "open" && this.resetWindowElapsed()) {
      return "half_open";
    }
    return this.state;
  }

  get failureCount(): number {
    return this.failures;
  }

  private resetWindowElapsed(): boolean {
    return this.openedAt !== null && this.clock.now() - this.openedAt >= this.config.resetTimeoutMs;
  }

  private retryAfterMs(): number {
    if (this.openedAt === null) return this.config.resetTimeoutMs;
    return Math.max(0, this.config.resetTimeoutMs - (this.clock.now() - this.openedAt));
  }

  private transition(next: CircuitState): void {
    if (this.state === next) return;
    log.info("circuit transition", { name: this.name, from: this.state, to: next, failures: this.failures });
    this.state = next;
  }

  private trip(): void {
    this.openedAt = this.clock.now();
    this.probeInFlight = false;
    this.transition("open");
  }

  /** Throws `CircuitOpen` without touching state when a call would be refused. */
  rejectIfOpen(): void {
    if (this.state === "open" && !this.resetWindowElapsed()) {
      throw new CircuitOpen(this.name, this.retryAfterMs());
    }
    if (this.state === "half_open" && this.probeInFlight) {
      throw new CircuitOpen(this.name, 0);
    }
  }

  acquire(): CircuitPermit {
    this.rejectIfOpen();

    let probe = false;
    if (this.state === "open" || this.state === "half_open") {
      this.transition("half_open");
      this.probeInFlight = true;
      probe = true;
    }

    let settled = false;
    const settle = (outcome: () => void) => () => {
      if (settled) return;
      settled = true;
      outcome();
    };

    return {
      probe,
      success: settle(() => this.onSuccess(probe)),
      failure: settle(() => this.onFailure(probe)),
      release: settle(() => {
        if (probe) this.probeInFlight = false;
      }),
    };
  }

  private onSuccess(probe: boolean): void {
    // A call that started before the trip cannot close an open circuit.
    if (this.state === "open" && !probe) return;
    this.failures = 0;
    this.openedAt = null;
    this.probeInFlight = false;
    this.transition("closed");
  }

  private onFailure(probe: boolean): void {
    this.failures += 1;
    if (probe || this.state === "half_open") {
      this.trip();
      return;
    }
    if (this.state === "closed" && this.failures >= this.config.failMax) {
      this.trip();
    }
  }

  close(): void {
    this.failures = 0;
    this.openedAt = null;
    this.probeInFlight = false;
    this.transition("closed");
  }

  snapshot(): CircuitSnapshot {
    return {
      name: this.name,
      state: this.currentState,
      failures: this.failures,
      failMax: this.config.failMax,
      resetTimeoutMs: this.config.resetTimeoutMs,
      openedAt: this.openedAt,
    };
  }
}

/**
 * Owns one breaker per resource name. Pass the same registry to every
 * `Resilience` that should share failure state; build a new one per test.
 */
export class CircuitRegistry {
  private readonly breakers = new Map<string, CircuitBreaker>();

  private readonly clock: Clock;

  constructor(clock: Clock = systemClock) {
    this.clock = clock;
  }

  get(name: string, config: CircuitBreakerConfig): CircuitBreaker {
    const existing = this.breakers.get(name);
    if (existing) return existing;

    const breaker = new CircuitBreaker(name, config, this.clock);
    this.breakers.set(name, breaker);
    log.debug("circuit created", { name, ...config });
    return breaker;
  }

  has(name: string): boolean {
    return this.breakers.has(name);
  }

  snapshot(): CircuitSnapshot[] {
    return [...this.breakers.values()].map((breaker) => breaker.snapshot());
  }

  reset(): void {
    for (const breaker of this.breakers.values()) {
      breaker.close();
    }
  }
}
