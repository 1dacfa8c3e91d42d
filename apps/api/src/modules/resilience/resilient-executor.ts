import type { ProviderKind } from "@wa-gateway/shared-types";
import { systemClock, type Clock } from "../../lib/clock.js";
import {
  abortReason,
  GatewayError,
  toGatewayError,
} from "../../lib/errors.js";
import { moduleLogger } from "../../lib/logger.js";
import type { AuditRecorder } from "../audit/audit.recorder.js";
import type { ProviderCallContext } from "../providers/provider.interface.js";
import type { RateLimitPolicy } from "../providers/provider.registry.js";
import type { GatewayStore } from "../store/store.interface.js";
import { CircuitBreaker, type CircuitSnapshot } from "./circuit-breaker.js";
import { withRetry } from "./retry.js";
import { TokenBucket } from "./token-bucket.js";

const log = moduleLogger("resilience");

/** Who is calling, on behalf of which configuration, under which policy. */
export interface ExecutionContext {
  configurationId: string;
  provider: ProviderKind;
  policy: RateLimitPolicy;
  actorId: string;
  requestId?: string | null | undefined;
}

export interface ExecuteOptions {
  /** Overall budget across bucket waits, attempts and backoff. */
  timeoutMs?: number | undefined;
  signal?: AbortSignal | undefined;
  /** Media uploads get `mediaAttemptTimeoutMs` per attempt. */
  media?: boolean | undefined;
}

export interface ResilientExecutorDeps {
  store: GatewayStore;
  audit: AuditRecorder;
  clock?: Clock | undefined;
  random?: (() => number) | undefined;
  defaultTimeoutMs?: number | undefined;
}

interface Guard {
  bucket: TokenBucket;
  breaker: CircuitBreaker;
  policy: RateLimitPolicy;
}

const GUARD_KEYS: ReadonlyArray<keyof RateLimitPolicy> = [
  "ratePerSecond",
  "burst",
  "failureThreshold",
  "failureWindowMs",
  "coolDownMs",
];

/** A bucket-side RateLimited means the call never reached the provider. */
function isLocalThrottle(error: GatewayError): boolean {
  return error.code === "RateLimited" && error.details["local"] === true;
}

/**
 * Wraps every provider call: breaker → bucket → attempt (with its own timeout,
 * bounded by what is left of the overall budget) → retry with backoff.
 *
 * Buckets and breakers are kept per configuration, so configurations never
 * contend with each other; within one configuration sends and sync fetches
 * share the same bucket.
 */
export class ResilientExecutor {
  private readonly guards = new Map<string, Guard>();
  private readonly clock: Clock;
  private readonly defaultTimeoutMs: number;

  constructor(private readonly deps: ResilientExecutorDeps) {
    this.clock = deps.clock ?? systemClock;
    this.defaultTimeoutMs = deps.defaultTimeoutMs ?? 45_000;
  }

  async execute<T>(
    ctx: ExecutionContext,
    operation: string,
    fn: (call: ProviderCallContext) => Promise<T>,
    options: ExecuteOptions = {},
  ): Promise<T> {
    const { policy } = ctx;
    const { signal } = options;
    const deadline = this.clock.now() + (options.timeoutMs ?? this.defaultTimeoutMs);
    const attemptTimeoutMs = options.media
      ? policy.mediaAttemptTimeoutMs
      : policy.attemptTimeoutMs;
    const guard = this.guardFor(ctx.configurationId, policy);

    return withRetry(
      async (attempt) => {
        const startedAt = this.clock.now();
        let probe = false;
        let reachedProvider = false;
        try {
          if (signal?.aborted) throw abortReason(signal);
          probe = guard.breaker.admit();
          await this.acquire(guard.bucket, deadline, signal);

          const remaining = deadline - this.clock.now();
          if (remaining <= 0) {
            throw new GatewayError("Timeout", `${operation} exceeded its call budget`, {
              details: { operation },
            });
          }

          reachedProvider = true;
          const result = await this.attempt(
            fn,
            Math.min(attemptTimeoutMs, remaining),
            operation,
            signal,
          );
          guard.breaker.recordSuccess();
          await this.audit(ctx, operation, attempt, startedAt, null);
          return result;
        } catch (raw) {
          const error = toGatewayError(raw);
          if (reachedProvider) guard.breaker.recordFailure(error);
          else if (probe) guard.breaker.releaseProbe();
          await this.audit(ctx, operation, attempt, startedAt, error);
          if (error.code === "AuthError") await this.flagAttention(ctx, error);
          throw error;
        }
      },
      {
        maxRetries: policy.maxRetries,
        baseDelayMs: policy.baseDelayMs,
        maxDelayMs: policy.maxDelayMs,
        clock: this.clock,
        signal,
        deadline,
        random: this.deps.random,
        isTerminal: isLocalThrottle,
      },
    );
  }

  /** Breaker state for the health endpoint; CLOSED when the configuration was never called. */
  circuitSnapshot(configurationId: string): CircuitSnapshot {
    return (
      this.guards.get(configurationId)?.breaker.snapshot() ?? {
        state: "CLOSED",
        consecutiveFailures: 0,
        retryAfterMs: null,
      }
    );
  }

  /** A policy change (e.g. new overrides) replaces the bucket and breaker. */
  private guardFor(configurationId: string, policy: RateLimitPolicy): Guard {
    const existing = this.guards.get(configurationId);
    if (existing && GUARD_KEYS.every((key) => existing.policy[key] === policy[key])) {
      return existing;
    }
    if (existing) {
      log.info({ configurationId }, "rate-limit policy changed; guards rebuilt");
    }

    const guard: Guard = {
      policy,
      bucket: new TokenBucket(policy.burst, policy.ratePerSecond, this.clock),
      breaker: new CircuitBreaker(
        configurationId,
        {
          failureThreshold: policy.failureThreshold,
          failureWindowMs: policy.failureWindowMs,
          coolDownMs: policy.coolDownMs,
        },
        this.clock,
      ),
    };
    this.guards.set(configurationId, guard);
    return guard;
  }

  private async acquire(
    bucket: TokenBucket,
    deadline: number,
    signal: AbortSignal | undefined,
  ): Promise<void> {
    try {
      await bucket.acquire(deadline, signal);
    } catch (err) {
      if (signal?.aborted) throw abortReason(signal);
      throw err;
    }
  }

  /**
   * One provider call under its own AbortController. The controller aborts
   * with a Timeout reason when the attempt runs out of time and with the
   * caller's reason when the caller cancels; the call settles on abort even
   * if `fn` ignores its signal.
   */
  private async attempt<T>(
    fn: (call: ProviderCallContext) => Promise<T>,
    timeoutMs: number,
    operation: string,
    signal: AbortSignal | undefined,
  ): Promise<T> {
    const controller = new AbortController();
    const cancelTimer = this.clock.setTimer(timeoutMs, () => {
      controller.abort(
        new GatewayError("Timeout", `${operation} attempt timed out after ${timeoutMs}ms`, {
          details: { operation, timeoutMs },
        }),
      );
    });
    const onCallerAbort = (): void => {
      if (signal) controller.abort(abortReason(signal));
    };
    signal?.addEventListener("abort", onCallerAbort, { once: true });

    const aborted = new Promise<never>((_, reject) => {
      controller.signal.addEventListener(
        "abort",
        () => reject(abortReason(controller.signal)),
        { once: true },
      );
    });

    try {
      return await Promise.race([fn({ signal: controller.signal }), aborted]);
    } finally {
      cancelTimer();
      signal?.removeEventListener("abort", onCallerAbort);
    }
  }

  private async audit(
    ctx: ExecutionContext,
    operation: string,
    attempt: number,
    startedAt: number,
    error: GatewayError | null,
  ): Promise<void> {
    await this.deps.audit.record({
      configurationId: ctx.configurationId,
      provider: ctx.provider,
      operation,
      success: error === null,
      responseTimeMs: Math.max(0, this.clock.now() - startedAt),
      errorCode: error?.code ?? null,
      errorMessage: error?.message ?? null,
      attempt,
      actorId: ctx.actorId,
      requestId: ctx.requestId ?? null,
      timestamp: new Date(this.clock.now()).toISOString(),
    });
  }

  private async flagAttention(
    ctx: ExecutionContext,
    error: GatewayError,
  ): Promise<void> {
    log.warn(
      { configurationId: ctx.configurationId, provider: ctx.provider },
      "provider rejected credentials; configuration flagged for attention",
    );
    try {
      await this.deps.store.updateConfiguration(ctx.configurationId, {
        needsAttention: true,
        attentionReason: error.message,
      });
    } catch (err) {
      log.error({ err, configurationId: ctx.configurationId }, "failed to flag configuration");
    }
  }
}
