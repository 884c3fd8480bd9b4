/**
 * Circuit breaker guarding the results store. The breaker tracks consecutive
 * failures and exposes a deterministic closed → open → half-open state
 * machine. All state updates happen synchronously between two suspension
 * points, so concurrent callers sharing one instance observe atomic
 * increments and resets.
 */
export type CircuitBreakerState = "closed" | "open" | "half-open";

/** Snapshot describing the breaker internals for diagnostics and tests. */
export interface CircuitBreakerSnapshot {
  readonly state: CircuitBreakerState;
  readonly consecutiveFailures: number;
  readonly openedAt: number | null;
  readonly retryAt: number | null;
  readonly probeInFlight: boolean;
}

/** Ticket returned by {@link CircuitBreaker.tryAcquire}. */
export interface CircuitBreakerAttempt {
  readonly allowed: boolean;
  readonly state: CircuitBreakerState;
  readonly retryAt: number | null;
  succeed(): void;
  fail(): void;
}

export interface CircuitBreakerOptions {
  /** Consecutive failures required before the breaker opens. */
  readonly failMax: number;
  /** Time (ms) the breaker stays open before allowing a probe. */
  readonly resetTimeoutMs: number;
  /** Optional clock override used by tests. */
  readonly now?: () => number;
  /** Invoked on every state transition. */
  readonly onStateChange?: (from: CircuitBreakerState, to: CircuitBreakerState) => void;
}

/** Result of {@link CircuitBreaker.run}. */
export type GuardedResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly rejected: true; readonly retryAt: number | null }
  | { readonly ok: false; readonly rejected: false; readonly error: unknown };

function assertPositive(value: number, name: string): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new TypeError(`${name} must be a positive number`);
  }
}

function assertNonNegative(value: number, name: string): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new TypeError(`${name} must be a non-negative number`);
  }
}

const REJECTED_NOOP = (): void => {};

export class CircuitBreaker {
  private readonly failMax: number;
  private readonly resetTimeoutMs: number;
  private readonly now: () => number;
  private readonly onStateChange?: (from: CircuitBreakerState, to: CircuitBreakerState) => void;

  private state: CircuitBreakerState = "closed";
  private consecutiveFailures = 0;
  private openedAt: number | null = null;
  private retryAt: number | null = null;
  private probeInFlight = false;

  constructor(options: CircuitBreakerOptions) {
    assertPositive(options.failMax, "failMax");
    assertNonNegative(options.resetTimeoutMs, "resetTimeoutMs");
    this.failMax = Math.trunc(options.failMax);
    this.resetTimeoutMs = Math.trunc(options.resetTimeoutMs);
    this.now = options.now ?? (() => Date.now());
    this.onStateChange = options.onStateChange;
  }

  public getState(): CircuitBreakerState {
    this.refreshState(this.now());
    return this.state;
  }

  public snapshot(): CircuitBreakerSnapshot {
    return {
      state: this.state,
      consecutiveFailures: this.consecutiveFailures,
      openedAt: this.openedAt,
      retryAt: this.retryAt,
      probeInFlight: this.probeInFlight,
    };
  }

  /**
   * Attempts to reserve a slot. Callers must invoke either `succeed()` or
   * `fail()` on an allowed ticket once the guarded operation settles. While
   * half-open a single probe is admitted; concurrent callers are rejected.
   */
  public tryAcquire(now: number = this.now()): CircuitBreakerAttempt {
    this.refreshState(now);

    if (this.state === "open" || (this.state === "half-open" && this.probeInFlight)) {
      return { allowed: false, state: this.state, retryAt: this.retryAt, succeed: REJECTED_NOOP, fail: REJECTED_NOOP };
    }

    const origin = this.state;
    if (origin === "half-open") {
      this.probeInFlight = true;
    }
    let settled = false;
    const settle = (outcome: "success" | "failure") => {
      if (settled) {
        return;
      }
      settled = true;
      if (origin === "half-open") {
        this.probeInFlight = false;
      }
      if (outcome === "success") {
        this.recordSuccess();
      } else {
        this.recordFailure();
      }
    };
    return {
      allowed: true,
      state: origin,
      retryAt: this.retryAt,
      succeed: () => settle("success"),
      fail: () => settle("failure"),
    };
  }

  /**
   * Runs {@link operation} under the breaker. Rejections and failures are
   * returned as values so callers can report "not saved" without a try/catch.
   */
  public async run<T>(operation: () => Promise<T>): Promise<GuardedResult<T>> {
    const attempt = this.tryAcquire();
    if (!attempt.allowed) {
      return { ok: false, rejected: true, retryAt: attempt.retryAt };
    }
    try {
      const value = await operation();
      attempt.succeed();
      return { ok: true, value };
    } catch (error) {
      attempt.fail();
      return { ok: false, rejected: false, error };
    }
  }

  public recordSuccess(): void {
    this.consecutiveFailures = 0;
    if (this.state !== "closed") {
      this.transition("closed");
    }
    this.openedAt = null;
    this.retryAt = null;
  }

  public recordFailure(at: number = this.now()): void {
    if (this.state === "half-open") {
      this.open(at);
      return;
    }
    if (this.state === "open") {
      return;
    }
    this.consecutiveFailures += 1;
    if (this.consecutiveFailures >= this.failMax) {
      this.open(at);
    }
  }

  private refreshState(now: number): void {
    if (this.state === "open" && this.retryAt !== null && now >= this.retryAt) {
      this.probeInFlight = false;
      this.retryAt = null;
      this.transition("half-open");
    }
  }

  private open(at: number): void {
    this.openedAt = at;
    this.retryAt = at + this.resetTimeoutMs;
    this.probeInFlight = false;
    this.consecutiveFailures = Math.max(this.consecutiveFailures, this.failMax);
    this.transition("open");
  }

  private transition(next: CircuitBreakerState): void {
    const previous = this.state;
    this.state = next;
    if (previous !== next) {
      this.onStateChange?.(previous, next);
    }
  }
}
