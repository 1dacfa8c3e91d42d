import { describe, it, expect, beforeEach, vi } from "vitest";
import { GatewayError } from "../../lib/errors.js";
import { FakeClock, SteppingClock } from "../../test/clock.js";
import { newConfiguration } from "../../test/fixtures.js";
import { AuditRecorder } from "../audit/audit.recorder.js";
import { DEFAULT_POLICY, type RateLimitPolicy } from "../providers/provider.registry.js";
import { MemoryGatewayStore } from "../store/memory.store.js";
import { ResilientExecutor, type ExecutionContext } from "./resilient-executor.js";

const SINCE = "2000-01-01T00:00:00.000Z";

describe("ResilientExecutor", () => {
  let clock: FakeClock;
  let store: MemoryGatewayStore;
  let executor: ResilientExecutor;
  let configurationId: string;

  beforeEach(async () => {
    clock = new FakeClock();
    store = new MemoryGatewayStore(() => new Date(clock.now()));
    executor = new ResilientExecutor({
      store,
      audit: new AuditRecorder(store),
      clock,
      random: () => 0.5,
    });
    configurationId = (await store.createConfiguration(newConfiguration())).id;
  });

  function context(policy: Partial<RateLimitPolicy> = {}): ExecutionContext {
    return {
      configurationId,
      provider: "whapi",
      policy: { ...DEFAULT_POLICY, ...policy },
      actorId: "user-1",
      requestId: "req-1",
    };
  }

  function failing(code: GatewayError["code"]) {
    return vi.fn(async () => {
      throw new GatewayError(code, `${code} from provider`);
    });
  }

  it("returns the result and audits one successful attempt", async () => {
    const result = await executor.execute(context(), "send_text", async () => "receipt");

    expect(result).toBe("receipt");
    const entries = await store.listAudit({ since: SINCE });
    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      configurationId,
      provider: "whapi",
      operation: "send_text",
      success: true,
      attempt: 1,
      actorId: "user-1",
      requestId: "req-1",
      errorCode: null,
    });
  });

  it("retries Transient failures and audits every attempt", async () => {
    const fn = failing("Transient");

    await expect(executor.execute(context(), "send_text", fn)).rejects.toMatchObject({
      code: "Transient",
    });

    expect(fn).toHaveBeenCalledTimes(DEFAULT_POLICY.maxRetries + 1);
    expect(clock.sleeps).toEqual([500, 1_000, 2_000]);
    const entries = await store.listAudit({ since: SINCE });
    expect(entries.map((e) => [e.attempt, e.errorCode])).toEqual([
      [1, "Transient"],
      [2, "Transient"],
      [3, "Transient"],
      [4, "Transient"],
    ]);
  });

  it("flags the configuration on AuthError without retrying", async () => {
    const fn = failing("AuthError");

    await expect(executor.execute(context(), "send_text", fn)).rejects.toMatchObject({
      code: "AuthError",
    });

    expect(fn).toHaveBeenCalledTimes(1);
    const configuration = await store.getConfiguration(configurationId);
    expect(configuration?.needsAttention).toBe(true);
    expect(configuration?.attentionReason).toBe("AuthError from provider");
  });

  it("opens the circuit after repeated failures and then fails fast", async () => {
    const fn = failing("Transient");
    const ctx = context({ maxRetries: 0 });

    for (let i = 0; i < DEFAULT_POLICY.failureThreshold; i++) {
      await expect(executor.execute(ctx, "fetch_contacts", fn)).rejects.toMatchObject({
        code: "Transient",
      });
    }
    await expect(executor.execute(ctx, "fetch_contacts", fn)).rejects.toMatchObject({
      code: "CircuitOpen",
      retryAfterMs: DEFAULT_POLICY.coolDownMs,
    });

    expect(fn).toHaveBeenCalledTimes(DEFAULT_POLICY.failureThreshold);
    expect(executor.circuitSnapshot(configurationId).state).toBe("OPEN");
    const entries = await store.listAudit({ since: SINCE });
    expect(entries.at(-1)?.errorCode).toBe("CircuitOpen");
  });

  it("aborts a hung attempt with Timeout", async () => {
    const fn = vi.fn((): Promise<string> => {
      clock.advance(1_000);
      return new Promise<string>(() => undefined);
    });

    await expect(
      executor.execute(context({ attemptTimeoutMs: 1_000, maxRetries: 0 }), "send_text", fn),
    ).rejects.toMatchObject({
      code: "Timeout",
      message: "send_text attempt timed out after 1000ms",
    });
  });

  it("hands the abort reason to the provider call", async () => {
    let seen: unknown;
    const fn = vi.fn(({ signal }: { signal: AbortSignal }): Promise<string> => {
      signal.addEventListener("abort", () => {
        seen = signal.reason;
      });
      clock.advance(60_000);
      return new Promise<string>(() => undefined);
    });

    await expect(
      executor.execute(context({ maxRetries: 0 }), "fetch_messages", fn),
    ).rejects.toMatchObject({ code: "Timeout" });
    expect(seen).toBeInstanceOf(GatewayError);
  });

  it("fails with Cancelled before calling the provider when the caller already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const fn = vi.fn(async () => "never");

    await expect(
      executor.execute(context(), "send_text", fn, { signal: controller.signal }),
    ).rejects.toMatchObject({ code: "Cancelled" });
    expect(fn).not.toHaveBeenCalled();
  });

  it("stops retrying when the overall budget runs out", async () => {
    const fn = failing("Transient");

    await expect(
      executor.execute(context(), "send_text", fn, { timeoutMs: 1_200 }),
    ).rejects.toMatchObject({ code: "Timeout" });
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("surfaces a bucket wait past the budget as RateLimited without calling the provider", async () => {
    const ctx = context({ burst: 1, ratePerSecond: 1 });
    const fn = vi.fn(async () => "ok");

    await executor.execute(ctx, "send_text", fn, { timeoutMs: 500 });
    await expect(
      executor.execute(ctx, "send_text", fn, { timeoutMs: 500 }),
    ).rejects.toMatchObject({ code: "RateLimited" });

    expect(fn).toHaveBeenCalledTimes(1);
    expect(executor.circuitSnapshot(configurationId).consecutiveFailures).toBe(0);
  });

  it("frees the half-open probe when the bucket throttles it before the provider call", async () => {
    const ctx = context({
      failureThreshold: 1,
      burst: 1,
      ratePerSecond: 0.001,
      maxRetries: 0,
    });
    await expect(
      executor.execute(ctx, "send_text", failing("Transient")),
    ).rejects.toMatchObject({ code: "Transient" });
    clock.advance(DEFAULT_POLICY.coolDownMs);

    await expect(
      executor.execute(ctx, "send_text", async () => "throttled", { timeoutMs: 100 }),
    ).rejects.toMatchObject({ code: "RateLimited" });
    expect(executor.circuitSnapshot(configurationId).state).toBe("HALF_OPEN");

    clock.advance(10_000_000);
    await expect(executor.execute(ctx, "send_text", async () => "ok")).resolves.toBe("ok");
    expect(executor.circuitSnapshot(configurationId).state).toBe("CLOSED");
  });

  it("keeps configurations independent", async () => {
    const fn = failing("Transient");

    for (let i = 0; i < DEFAULT_POLICY.failureThreshold; i++) {
      await executor
        .execute(context({ maxRetries: 0 }), "send_text", fn)
        .catch(() => undefined);
    }

    expect(executor.circuitSnapshot(configurationId).state).toBe("OPEN");
    expect(executor.circuitSnapshot("cfg-other").state).toBe("CLOSED");
  });
});

describe("ResilientExecutor under concurrent callers", () => {
  const flush = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

  it("keeps sends and fetches of one configuration within the shared bucket rate", async () => {
    const clock = new SteppingClock();
    const store = new MemoryGatewayStore(() => new Date(clock.now()));
    const executor = new ResilientExecutor({ store, audit: new AuditRecorder(store), clock });
    const { id } = await store.createConfiguration(newConfiguration());
    const policy: RateLimitPolicy = { ...DEFAULT_POLICY, burst: 2, ratePerSecond: 2 };
    const ctx: ExecutionContext = {
      configurationId: id,
      provider: "whapi",
      policy,
      actorId: "user-1",
    };
    const start = clock.now();
    const calledAt: number[] = [];
    const providerCall = async (): Promise<string> => {
      calledAt.push(clock.now() - start);
      return "ok";
    };

    const pending = Promise.all(
      Array.from({ length: 8 }, (_, i) =>
        executor.execute(ctx, i % 2 === 0 ? "send_text" : "fetch_contacts", providerCall),
      ),
    );
    for (let step = 0; step < 40; step++) {
      await flush();
      clock.advance(100);
    }
    await pending;

    expect(calledAt).toEqual([0, 0, 500, 1_000, 1_500, 2_000, 2_500, 3_000]);
    for (const windowMs of [500, 1_000, 2_000]) {
      const bound = Math.ceil((windowMs / 1_000) * policy.ratePerSecond) + policy.burst;
      for (const from of calledAt) {
        const inWindow = calledAt.filter((at) => at >= from && at < from + windowMs);
        expect(inWindow.length).toBeLessThanOrEqual(bound);
      }
    }
  });
});
