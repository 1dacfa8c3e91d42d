import type { CircuitState } from "@wa-gateway/shared-types";
import type { Clock } from "../../lib/clock.js";
import { countsTowardBreaker, GatewayError } from "../../lib/errors.js";

export interface CircuitBreakerOptions {
  failureThreshold: number;
  failureWindowMs: number;
  coolDownMs: number;
}

export interface CircuitSnapshot {
  state: CircuitState;
  consecutiveFailures: number;
  retryAfterMs: number | null;
}

/**
 * Circuit breaker state machine, one per configuration.
 *
 * States:
 * - CLOSED: calls pass through; breaker-relevant failures are counted
 * - OPEN: `failureThreshold` consecutive failures inside `failureWindowMs`
 *   were seen; calls fail fast with CircuitOpen until `coolDownMs` elapses
 * - HALF_OPEN: a single probe is admitted; success closes, failure re-opens
 */
export class CircuitBreaker {
  private state: CircuitState = "CLOSED";
  /** Timestamps of the current run of consecutive relevant failures. */
  private failures: number[] = [];
  private openedAt = 0;
  private probeInFlight = false;

  constructor(
    private readonly name: string,
    private readonly options: CircuitBreakerOptions,
    private readonly clock: Clock,
  ) {}

  /**
   * Admits a call or throws CircuitOpen. In HALF_OPEN the first caller becomes
   * the probe and everyone else keeps failing fast until it reports back.
   *
   * @returns true when the caller holds the probe slot
   */
  admit(): boolean {
    const now = this.clock.now();
    if (this.state === "OPEN") {
      const elapsed = now - this.openedAt;
      if (elapsed < this.options.coolDownMs) {
        throw this.openError(this.options.coolDownMs - elapsed);
      }
      this.state = "HALF_OPEN";
      this.probeInFlight = false;
    }

    if (this.state === "HALF_OPEN") {
      if (this.probeInFlight) throw this.openError(this.options.coolDownMs);
      this.probeInFlight = true;
      return true;
    }
    return false;
  }

  /**
   * Frees the probe slot of an admitted call that never reached the provider
   * (throttled, out of budget or cancelled while waiting for a token).
   */
  releaseProbe(): void {
    this.probeInFlight = false;
  }

  recordSuccess(): void {
    this.state = "CLOSED";
    this.failures = [];
    this.probeInFlight = false;
  }

  /**
   * Only Transient, Timeout and RateLimited say something about provider
   * health. Other failures mean the provider answered, so they count as
   * success; a cancelled probe just frees the probe slot.
   */
  recordFailure(error: GatewayError): void {
    if (error.code === "Cancelled") {
      this.probeInFlight = false;
      return;
    }
    if (!countsTowardBreaker(error.code)) {
      this.recordSuccess();
      return;
    }

    const now = this.clock.now();
    if (this.state === "HALF_OPEN") {
      this.open(now);
      return;
    }

    this.failures = this.failures.filter(
      (at) => now - at < this.options.failureWindowMs,
    );
    this.failures.push(now);
    if (this.failures.length >= this.options.failureThreshold) {
      this.open(now);
    }
  }

  snapshot(): CircuitSnapshot {
    const now = this.clock.now();
    if (this.state === "OPEN") {
      const remaining = this.options.coolDownMs - (now - this.openedAt);
      if (remaining > 0) {
        return {
          state: "OPEN",
          consecutiveFailures: this.failures.length,
          retryAfterMs: remaining,
        };
      }
      return {
        state: "HALF_OPEN",
        consecutiveFailures: this.failures.length,
        retryAfterMs: null,
      };
    }
    return {
      state: this.state,
      consecutiveFailures: this.failures.length,
      retryAfterMs: null,
    };
  }

  private open(now: number): void {
    this.state = "OPEN";
    this.openedAt = now;
    this.probeInFlight = false;
  }

  private openError(retryAfterMs: number): GatewayError {
    return new GatewayError(
      "CircuitOpen",
      `Circuit for ${this.name} is open. Retry after ${retryAfterMs}ms`,
      { details: { configurationId: this.name }, retryAfterMs },
    );
  }
}
