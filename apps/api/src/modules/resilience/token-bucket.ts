import type { Clock } from "../../lib/clock.js";
import { GatewayError } from "../../lib/errors.js";

/**
 * Per-configuration token bucket: holds up to `capacity` tokens and refills at
 * `ratePerSecond`.
 *
 * A caller that finds no token reserves the next one (the balance goes
 * negative) and sleeps until it is due, so concurrent callers queue on the
 * bucket in arrival order without waiting on each other's results.
 */
export class TokenBucket {
  private tokens: number;
  private refilledAt: number;

  constructor(
    readonly capacity: number,
    readonly ratePerSecond: number,
    private readonly clock: Clock,
  ) {
    this.tokens = capacity;
    this.refilledAt = clock.now();
  }

  private refill(now: number): void {
    const elapsed = now - this.refilledAt;
    if (elapsed <= 0) return;
    this.tokens = Math.min(
      this.capacity,
      this.tokens + (elapsed * this.ratePerSecond) / 1000,
    );
    this.refilledAt = now;
  }

  /** Tokens available right now (never negative). */
  available(): number {
    this.refill(this.clock.now());
    return Math.max(0, this.tokens);
  }

  /**
   * Takes one token, waiting for it when none is free.
   *
   * @param deadline epoch ms after which the caller no longer wants the token
   * @returns how long the caller waited
   * @throws GatewayError RateLimited when the token would only be free after `deadline`
   */
  async acquire(deadline: number, signal?: AbortSignal): Promise<number> {
    signal?.throwIfAborted();
    const now = this.clock.now();
    this.refill(now);

    const waitMs =
      this.tokens >= 1
        ? 0
        : Math.ceil(((1 - this.tokens) / this.ratePerSecond) * 1000);

    if (now + waitMs > deadline) {
      throw new GatewayError(
        "RateLimited",
        `Rate limit reached; next slot in ${waitMs}ms exceeds the call budget`,
        { details: { local: true }, retryAfterMs: waitMs },
      );
    }

    this.tokens -= 1;
    if (waitMs === 0) return 0;

    try {
      await this.clock.sleep(waitMs, signal);
    } catch (err) {
      this.tokens += 1;
      throw err;
    }
    return waitMs;
  }
}
