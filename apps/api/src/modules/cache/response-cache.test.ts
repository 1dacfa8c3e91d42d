import { describe, it, expect, beforeEach, vi } from "vitest";
import { FakeClock } from "../../test/clock.js";
import type { Page, RemoteContact } from "../providers/provider.interface.js";
import { ResponseCache } from "./response-cache.js";

function page(...names: string[]): Page<RemoteContact> {
  return {
    items: names.map((name) => ({
      providerContactId: name,
      phone: "5511900000000",
      name,
      pushName: "",
      updatedAt: 0,
    })),
    nextCursor: null,
  };
}

describe("ResponseCache", () => {
  let clock: FakeClock;
  let cache: ResponseCache;

  beforeEach(() => {
    clock = new FakeClock();
    cache = new ResponseCache(clock);
  });

  it("serves a second read from cache", async () => {
    const loader = vi.fn(async () => page("Ana"));

    await cache.getOrLoad("cfg-1", "contacts", { cursor: null, limit: 10 }, loader);
    const second = await cache.getOrLoad(
      "cfg-1",
      "contacts",
      { limit: 10, cursor: null },
      loader,
    );

    expect(second.items[0]?.name).toBe("Ana");
    expect(loader).toHaveBeenCalledTimes(1);
  });

  it("reloads after the resource TTL", async () => {
    const loader = vi.fn(async () => page("Ana"));

    await cache.getOrLoad("cfg-1", "messages", {}, async () => ({ items: [], nextCursor: null }));
    await cache.getOrLoad("cfg-1", "contacts", {}, loader);
    clock.advance(300_000);

    expect(cache.size()).toBe(2);
    clock.advance(3_300_000);
    await cache.getOrLoad("cfg-1", "contacts", {}, loader);

    expect(loader).toHaveBeenCalledTimes(2);
    expect(cache.size()).toBe(1);
  });

  it("sweeps expired entries of other queries when it stores a new one", async () => {
    const loader = vi.fn(async () => page("Ana"));
    await cache.getOrLoad("cfg-1", "contacts", { cursor: "a" }, loader);
    await cache.getOrLoad("cfg-2", "contacts", { cursor: "a" }, loader);
    clock.advance(3_600_000);

    expect(cache.size()).toBe(2);
    await cache.getOrLoad("cfg-1", "contacts", { cursor: "b" }, loader);

    expect(cache.size()).toBe(1);
  });

  it("shares one in-flight load between concurrent readers", async () => {
    let release: (value: Page<RemoteContact>) => void = () => undefined;
    const loader = vi.fn(
      () =>
        new Promise<Page<RemoteContact>>((resolve) => {
          release = resolve;
        }),
    );

    const first = cache.getOrLoad("cfg-1", "contacts", {}, loader);
    const second = cache.getOrLoad("cfg-1", "contacts", {}, loader);
    release(page("Ana"));

    expect(await first).toEqual(await second);
    expect(loader).toHaveBeenCalledTimes(1);
  });

  it("does not store a load that started before an invalidation", async () => {
    let release: (value: Page<RemoteContact>) => void = () => undefined;
    const stale = cache.getOrLoad(
      "cfg-1",
      "contacts",
      {},
      () =>
        new Promise<Page<RemoteContact>>((resolve) => {
          release = resolve;
        }),
    );

    cache.invalidate("cfg-1", "contacts");
    release(page("Old"));
    await stale;

    const fresh = await cache.getOrLoad("cfg-1", "contacts", {}, async () => page("New"));
    expect(fresh.items[0]?.name).toBe("New");
  });

  it("invalidates only the given configuration and resource", async () => {
    const loader = vi.fn(async () => page("Ana"));
    await cache.getOrLoad("cfg-1", "contacts", {}, loader);
    await cache.getOrLoad("cfg-2", "contacts", {}, loader);

    cache.invalidate("cfg-1", "contacts");
    await cache.getOrLoad("cfg-1", "contacts", {}, loader);
    await cache.getOrLoad("cfg-2", "contacts", {}, loader);

    expect(loader).toHaveBeenCalledTimes(3);
  });

  it("does not cache failures", async () => {
    const loader = vi
      .fn<() => Promise<Page<RemoteContact>>>()
      .mockRejectedValueOnce(new Error("boom"))
      .mockResolvedValueOnce(page("Ana"));

    await expect(cache.getOrLoad("cfg-1", "contacts", {}, loader)).rejects.toThrow("boom");
    const value = await cache.getOrLoad("cfg-1", "contacts", {}, loader);

    expect(value.items).toHaveLength(1);
  });
});
