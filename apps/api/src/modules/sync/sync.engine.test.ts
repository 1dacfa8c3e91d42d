import { describe, it, expect, afterEach, beforeEach, vi } from "vitest";
import { GatewayError } from "../../lib/errors.js";
import { FakeClock } from "../../test/clock.js";
import { fakeProvider, registryFor } from "../../test/fake-provider.js";
import { newConfiguration } from "../../test/fixtures.js";
import { AuditRecorder } from "../audit/audit.recorder.js";
import { ResponseCache } from "../cache/response-cache.js";
import type {
  RemoteContact,
  RemoteMessage,
  WhatsAppProvider,
} from "../providers/provider.interface.js";
import { registerProviders } from "../providers/providers/index.js";
import { ResilientExecutor } from "../resilience/resilient-executor.js";
import { toContact } from "../store/entity.mappers.js";
import { MemoryGatewayStore } from "../store/memory.store.js";
import { SyncEngine } from "./sync.engine.js";

function remoteContact(n: number): RemoteContact {
  return {
    providerContactId: `551190000000${n}`,
    phone: `551190000000${n}`,
    name: `Contact ${n}`,
    pushName: "",
    updatedAt: 1_000,
  };
}

function remoteMessage(id: string, timestamp: number): RemoteMessage {
  return {
    providerMessageId: id,
    content: `text of ${id}`,
    type: "text",
    chatId: "5511900000001",
    fromMe: false,
    timestamp,
    senderId: "5511900000001",
    senderName: "Ana",
    status: "delivered",
  };
}

describe("SyncEngine", () => {
  let clock: FakeClock;
  let store: MemoryGatewayStore;
  let configurationId: string;

  beforeEach(async () => {
    clock = new FakeClock();
    store = new MemoryGatewayStore(() => new Date(clock.now()));
    configurationId = (await store.createConfiguration(newConfiguration())).id;
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  function engineFor(provider: WhatsAppProvider, registry = registryFor(provider)): SyncEngine {
    return new SyncEngine({
      store,
      registry,
      executor: new ResilientExecutor({
        store,
        audit: new AuditRecorder(store),
        clock,
        random: () => 0.5,
      }),
      cache: new ResponseCache(clock),
      clock,
    });
  }

  it("pulls every page of a first sync and marks the pass complete", async () => {
    const fetchContacts = vi
      .fn<WhatsAppProvider["fetchContacts"]>()
      .mockResolvedValueOnce({
        items: [remoteContact(1), remoteContact(2)],
        nextCursor: { value: "2", position: 2 },
      })
      .mockResolvedValueOnce({
        items: [remoteContact(3), remoteContact(4)],
        nextCursor: { value: "4", position: 4 },
      })
      .mockResolvedValueOnce({ items: [], nextCursor: null });
    const engine = engineFor(fakeProvider({ fetchContacts }));

    const result = await engine.run({
      configurationId,
      scope: "contacts",
      pageSize: 2,
      actorId: "user-1",
    });

    expect(fetchContacts.mock.calls.map(([cursor, size]) => [cursor, size])).toEqual([
      [null, 2],
      ["2", 2],
      ["4", 2],
    ]);
    for (const n of [1, 2, 3, 4]) {
      expect(await store.getContact(configurationId, `551190000000${n}`)).not.toBeNull();
    }
    expect(await store.getCursor(configurationId, "contacts")).toMatchObject({
      value: "",
      position: clock.now(),
    });
    expect(result).toMatchObject({ success: true, errorCount: 0, successCount: 4 });
    expect(result.resources).toEqual([
      {
        resource: "contacts",
        status: "success",
        created: 4,
        updated: 0,
        unchanged: 0,
        pages: 3,
        errorCount: 0,
        firstError: null,
        cursor: null,
      },
    ]);
    expect(await store.getLastSyncRun(configurationId)).toEqual(result);
  });

  it("pauses contacts at a page that changes nothing and resumes there next run", async () => {
    for (const n of [1, 2]) {
      await store.upsertContact(
        toContact(configurationId, remoteContact(n), "2026-01-01T00:00:00.000Z"),
      );
    }
    const fetchContacts = vi
      .fn<WhatsAppProvider["fetchContacts"]>()
      .mockResolvedValueOnce({
        items: [remoteContact(1), remoteContact(2)],
        nextCursor: { value: "2", position: 2 },
      })
      .mockResolvedValueOnce({ items: [remoteContact(3)], nextCursor: null })
      .mockResolvedValueOnce({ items: [], nextCursor: null });
    const engine = engineFor(fakeProvider({ fetchContacts }));

    const first = await engine.run({ configurationId, scope: "contacts", actorId: "user-1" });

    expect(fetchContacts).toHaveBeenCalledTimes(1);
    expect(first.resources[0]).toMatchObject({
      unchanged: 2,
      pages: 1,
      status: "success",
      cursor: "2",
    });

    const second = await engine.run({ configurationId, scope: "contacts", actorId: "user-1" });
    await engine.run({ configurationId, scope: "contacts", actorId: "user-1" });

    expect(second.resources[0]).toMatchObject({ created: 1, cursor: null });
    expect(fetchContacts.mock.calls.map(([cursor]) => cursor)).toEqual([null, "2", null]);
  });

  it("picks up remote edits to records synced by an earlier pass", async () => {
    const remote = [
      { id: "5511900000001", name: "Ana" },
      { id: "5511900000002", name: "Bruno" },
      { id: "5511900000003", name: "Carla" },
    ];
    vi.stubGlobal(
      "fetch",
      vi.fn(async (input: string | URL | Request) => {
        const url = new URL(String(input));
        const offset = Number(url.searchParams.get("offset"));
        const count = Number(url.searchParams.get("count"));
        return new Response(
          JSON.stringify({ contacts: remote.slice(offset, offset + count), total: remote.length }),
          { status: 200, headers: { "Content-Type": "application/json" } },
        );
      }),
    );
    const engine = engineFor(fakeProvider(), registerProviders());

    await engine.run({ configurationId, scope: "contacts", pageSize: 2, actorId: "user-1" });
    remote[0] = { id: "5511900000001", name: "Ana Renamed" };
    const second = await engine.run({
      configurationId,
      scope: "contacts",
      pageSize: 2,
      actorId: "user-1",
    });

    expect(second.resources[0]).toMatchObject({
      created: 0,
      updated: 1,
      unchanged: 2,
      pages: 2,
      cursor: null,
    });
    expect((await store.getContact(configurationId, "5511900000001"))?.name).toBe(
      "Ana Renamed",
    );
  });

  it("ends a message pass at the first fully known page so the next run starts at the newest", async () => {
    const fetchMessages = vi
      .fn<WhatsAppProvider["fetchMessages"]>()
      .mockResolvedValueOnce({
        items: [remoteMessage("m-1", 1_000)],
        nextCursor: { value: "1", position: 1 },
      })
      .mockResolvedValueOnce({ items: [], nextCursor: null })
      .mockResolvedValueOnce({
        items: [remoteMessage("m-2", 2_000), remoteMessage("m-1", 1_000)],
        nextCursor: { value: "2", position: 2 },
      })
      .mockResolvedValueOnce({
        items: [remoteMessage("m-1", 1_000)],
        nextCursor: { value: "3", position: 3 },
      })
      .mockResolvedValueOnce({ items: [], nextCursor: null });
    const engine = engineFor(fakeProvider({ fetchMessages }));

    await engine.run({ configurationId, scope: "messages", actorId: "user-1" });
    const second = await engine.run({ configurationId, scope: "messages", actorId: "user-1" });
    await engine.run({ configurationId, scope: "messages", actorId: "user-1" });

    expect(second.resources[0]).toMatchObject({
      created: 1,
      unchanged: 2,
      pages: 2,
      cursor: null,
    });
    expect(fetchMessages.mock.calls.map(([, cursor]) => cursor)).toEqual([
      null,
      "1",
      null,
      "2",
      null,
    ]);
  });

  it("keeps a failing resource from aborting the others", async () => {
    const provider = fakeProvider({
      fetchContacts: vi.fn(async () => {
        throw new GatewayError("InvalidRequest", "bad page");
      }),
      fetchGroups: vi.fn(async () => ({
        items: [
          {
            providerGroupId: "120363000000000001@g.us",
            wireId: "120363000000000001@g.us",
            name: "Team",
            description: "",
            inviteLink: null,
            updatedAt: 5_000,
          },
        ],
        nextCursor: null,
      })),
      fetchGroupMembers: vi.fn(async () => [
        {
          providerContactId: "5511900000001",
          phone: "5511900000001",
          name: "Ana",
          role: "admin" as const,
        },
      ]),
    });

    const result = await engineFor(provider).run({
      configurationId,
      scope: "all",
      actorId: "user-1",
    });

    expect(result.resources.map((r) => [r.resource, r.status])).toEqual([
      ["contacts", "failed"],
      ["groups", "success"],
      ["messages", "success"],
      ["members", "success"],
    ]);
    expect(result).toMatchObject({
      success: false,
      errorCount: 1,
      firstError: { code: "InvalidRequest", message: "bad page" },
    });
    expect(await store.listMemberships(configurationId, "120363000000000001@g.us")).toEqual([
      {
        configurationId,
        providerGroupId: "120363000000000001@g.us",
        providerContactId: "5511900000001",
        role: "admin",
      },
    ]);
    expect((await store.getContact(configurationId, "5511900000001"))?.name).toBe("Ana");
  });

  it("stops fetching once cancelled and keeps the committed page", async () => {
    const controller = new AbortController();
    const fetchContacts = vi.fn<WhatsAppProvider["fetchContacts"]>().mockResolvedValue({
      items: [remoteContact(1), remoteContact(2)],
      nextCursor: { value: "2", position: 2 },
    });
    const saveCursor = store.saveCursor.bind(store);
    vi.spyOn(store, "saveCursor").mockImplementation(async (cursor) => {
      const saved = await saveCursor(cursor);
      controller.abort();
      return saved;
    });
    const engine = engineFor(fakeProvider({ fetchContacts }));

    const result = await engine.run({
      configurationId,
      scope: "contacts",
      signal: controller.signal,
      actorId: "user-1",
    });

    expect(fetchContacts).toHaveBeenCalledTimes(1);
    expect(result.resources[0]).toMatchObject({ status: "cancelled", created: 2 });
    expect(result).toMatchObject({ success: false, errorCount: 0 });
    expect((await store.getCursor(configurationId, "contacts"))?.value).toBe("2");
  });

  it("rejects a page size outside 1..500", async () => {
    const engine = engineFor(fakeProvider());

    await expect(
      engine.run({ configurationId, scope: "contacts", pageSize: 501, actorId: "user-1" }),
    ).rejects.toMatchObject({ code: "InvalidRequest" });
  });
});
