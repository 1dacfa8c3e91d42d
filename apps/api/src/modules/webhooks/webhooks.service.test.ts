import { describe, it, expect, beforeEach, vi } from "vitest";
import { FakeClock } from "../../test/clock.js";
import { fakeProvider, registryFor } from "../../test/fake-provider.js";
import { newConfiguration } from "../../test/fixtures.js";
import { AuditRecorder } from "../audit/audit.recorder.js";
import { ResponseCache } from "../cache/response-cache.js";
import type {
  NormalizedWebhookEvent,
  RemoteMessage,
  WhatsAppProvider,
} from "../providers/provider.interface.js";
import { MemoryGatewayStore } from "../store/memory.store.js";
import { MemoryIdempotencyStore } from "./idempotency.store.js";
import { ingestWebhook, type IncomingWebhook, type WebhookDeps } from "./webhooks.service.js";

const SINCE = "2000-01-01T00:00:00.000Z";
const SENDER = "5511999990000@s.whatsapp.net";

const MESSAGE: RemoteMessage = {
  providerMessageId: "wamid-1",
  content: "hi",
  type: "text",
  chatId: SENDER,
  fromMe: false,
  timestamp: 1_700_000_000_000,
  senderId: SENDER,
  senderName: "Ana",
  status: "delivered",
};

const MESSAGE_EVENT: NormalizedWebhookEvent = {
  kind: "message",
  message: MESSAGE,
  groupName: null,
};

function incoming(
  overrides: Partial<IncomingWebhook> = {},
  envelope: Record<string, unknown> = {},
): IncomingWebhook {
  return {
    provider: "whapi",
    rawBody: Buffer.from(
      JSON.stringify({
        event_type: "messages",
        timestamp: 1_700_000_000,
        channel_id: "channel-1",
        event_id: "evt-1",
        data: {},
        ...envelope,
      }),
    ),
    headers: { "x-test-signature": "test-secret" },
    requestId: "req-1",
    ...overrides,
  };
}

describe("ingestWebhook", () => {
  let clock: FakeClock;
  let store: MemoryGatewayStore;
  let provider: WhatsAppProvider;
  let deps: WebhookDeps;
  let configurationId: string;

  beforeEach(async () => {
    clock = new FakeClock();
    store = new MemoryGatewayStore(() => new Date(clock.now()));
    provider = fakeProvider({ normalizeWebhook: vi.fn(() => [MESSAGE_EVENT]) });
    deps = {
      store,
      registry: registryFor(provider),
      idempotency: new MemoryIdempotencyStore(clock),
      audit: new AuditRecorder(store),
      cache: new ResponseCache(clock),
      clock,
      dedupTtlMs: 60_000,
    };
    configurationId = (await store.createConfiguration(newConfiguration())).id;
  });

  it("stores the message and introduces its sender", async () => {
    const result = await ingestWebhook(deps, incoming());

    expect(result).toEqual({ received: true, duplicate: false, events: 1 });
    expect(await store.getMessage(configurationId, "wamid-1")).toMatchObject({
      direction: "in",
      status: "delivered",
      senderId: SENDER,
    });
    expect(await store.getContact(configurationId, SENDER)).toMatchObject({
      phone: "5511999990000",
      name: "Ana",
      remoteUpdatedAt: 0,
    });
    const [entry] = await store.listAudit({ since: SINCE });
    expect(entry).toMatchObject({
      operation: "webhook",
      success: true,
      actorId: "system:webhook",
      requestId: "req-1",
      provider: "whapi",
      configurationId,
    });
  });

  it("treats a replayed event as a duplicate and writes nothing twice", async () => {
    const upsert = vi.spyOn(store, "upsertMessage");

    await ingestWebhook(deps, incoming());
    const replay = await ingestWebhook(deps, incoming());

    expect(replay).toEqual({ received: true, duplicate: true });
    expect(upsert).toHaveBeenCalledTimes(1);
    const entries = await store.listAudit({ since: SINCE });
    expect(entries[1]).toMatchObject({
      success: true,
      errorMessage: "duplicate event evt-1",
    });
  });

  it("lets exactly one of two simultaneous deliveries of an event through", async () => {
    const upsert = vi.spyOn(store, "upsertMessage");

    const results = await Promise.all([
      ingestWebhook(deps, incoming()),
      ingestWebhook(deps, incoming()),
    ]);

    expect(results.map((r) => r.duplicate).sort()).toEqual([false, true]);
    expect(upsert).toHaveBeenCalledTimes(1);
    expect(await store.countMessages(configurationId)).toBe(1);
  });

  it("rejects a forged signature without writing or claiming", async () => {
    await expect(
      ingestWebhook(deps, incoming({ headers: { "x-test-signature": "forged" } })),
    ).rejects.toMatchObject({ code: "InvalidSignature", message: "Invalid webhook signature" });

    expect(await store.countMessages(configurationId)).toBe(0);
    const [entry] = await store.listAudit({ since: SINCE });
    expect(entry).toMatchObject({ success: false, errorCode: "InvalidSignature" });

    await expect(ingestWebhook(deps, incoming())).resolves.toMatchObject({
      duplicate: false,
    });
  });

  it("releases the claim when delivery fails so a redelivery is processed", async () => {
    vi.spyOn(store, "upsertMessage").mockRejectedValueOnce(new Error("db down"));

    await expect(ingestWebhook(deps, incoming())).rejects.toMatchObject({
      code: "Internal",
    });
    const [failed] = await store.listAudit({ since: SINCE });
    expect(failed).toMatchObject({ success: false, errorCode: "Internal" });

    await expect(ingestWebhook(deps, incoming())).resolves.toEqual({
      received: true,
      duplicate: false,
      events: 1,
    });
  });

  it("answers NotFound when no active configuration owns the channel", async () => {
    await expect(
      ingestWebhook(deps, incoming({}, { channel_id: "channel-9" })),
    ).rejects.toMatchObject({
      code: "NotFound",
      message: "No active whapi configuration for channel channel-9",
    });
  });

  it("answers UnknownProvider for an unregistered URL segment", async () => {
    await expect(
      ingestWebhook(deps, incoming({ provider: "zapi" })),
    ).rejects.toMatchObject({ code: "UnknownProvider" });
  });

  it("rejects a body that is not JSON", async () => {
    await expect(
      ingestWebhook(deps, incoming({ rawBody: Buffer.from("not json") })),
    ).rejects.toMatchObject({ code: "InvalidRequest", message: "Webhook body is not valid JSON" });
  });

  it("only moves the status of messages that already exist", async () => {
    await ingestWebhook(deps, incoming());
    vi.mocked(provider.normalizeWebhook).mockReturnValue([
      { kind: "message-status", providerMessageId: "wamid-1", status: "read" },
      { kind: "message-status", providerMessageId: "wamid-unknown", status: "read" },
    ]);

    await ingestWebhook(deps, incoming({}, { event_id: "evt-2" }));

    expect((await store.getMessage(configurationId, "wamid-1"))?.status).toBe("read");
    expect(await store.getMessage(configurationId, "wamid-unknown")).toBeNull();
    expect(await store.countMessages(configurationId)).toBe(1);
  });

  it("creates the group and membership for a group message", async () => {
    vi.mocked(provider.normalizeWebhook).mockReturnValue([
      {
        kind: "message",
        message: { ...MESSAGE, chatId: "120363000000000001@g.us" },
        groupName: "Team",
      },
    ]);

    await ingestWebhook(deps, incoming());

    expect(await store.getGroup(configurationId, "120363000000000001@g.us")).toMatchObject({
      name: "Team",
      wireId: "120363000000000001@g.us",
    });
    expect(await store.listMemberships(configurationId, "120363000000000001@g.us")).toEqual([
      {
        configurationId,
        providerGroupId: "120363000000000001@g.us",
        providerContactId: SENDER,
        role: "member",
      },
    ]);
  });
});
