import { describe, it, expect, vi, beforeEach } from "vitest";
import { claimKey, releaseKey } from "./redis.js";

function makeMockRedis() {
  const store = new Map<string, string>();

  return {
    store,
    set: vi.fn(
      async (
        key: string,
        value: string,
        _px: string,
        _ttl: number,
        nx: string,
      ) => {
        if (nx === "NX" && store.has(key)) return null;
        store.set(key, value);
        return "OK";
      },
    ),
    del: vi.fn(async (...keys: string[]) => {
      let deleted = 0;
      for (const key of keys) {
        if (store.delete(key)) deleted++;
      }
      return deleted;
    }),
  };
}

type MockRedis = ReturnType<typeof makeMockRedis>;

describe("claimKey", () => {
  let redis: MockRedis;

  beforeEach(() => {
    redis = makeMockRedis();
  });

  it("issues SET with PX ttl and NX", async () => {
    await claimKey(redis as never, "webhook:cfg-1:evt-1", 5_000);
    expect(redis.set).toHaveBeenCalledWith(
      "webhook:cfg-1:evt-1",
      expect.any(String),
      "PX",
      5_000,
      "NX",
    );
  });

  it("returns true for the first claim and false for a duplicate", async () => {
    const first = await claimKey(redis as never, "webhook:cfg-1:evt-1", 5_000);
    const second = await claimKey(redis as never, "webhook:cfg-1:evt-1", 5_000);

    expect(first).toBe(true);
    expect(second).toBe(false);
  });

  it("lets exactly one of several concurrent claims win", async () => {
    const results = await Promise.all(
      Array.from({ length: 5 }, () =>
        claimKey(redis as never, "webhook:cfg-1:evt-2", 5_000),
      ),
    );
    expect(results.filter(Boolean)).toHaveLength(1);
  });
});

describe("releaseKey", () => {
  it("deletes the key so the event can be claimed again", async () => {
    const redis = makeMockRedis();
    await claimKey(redis as never, "webhook:cfg-1:evt-3", 5_000);

    await releaseKey(redis as never, "webhook:cfg-1:evt-3");

    expect(redis.del).toHaveBeenCalledWith("webhook:cfg-1:evt-3");
    expect(await claimKey(redis as never, "webhook:cfg-1:evt-3", 5_000)).toBe(
      true,
    );
  });
});
