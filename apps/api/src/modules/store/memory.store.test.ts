import { describe, it, expect, beforeEach } from "vitest";
import type { Contact, Message } from "@wa-gateway/shared-types";
import { MemoryGatewayStore } from "./memory.store.js";
import type { NewConfiguration } from "./store.interface.js";

const NEW_CONFIG: NewConfiguration = {
  name: "Main line",
  provider: "whapi",
  token: "test-token",
  deviceId: null,
  accountSid: null,
  senderPhone: null,
  channelId: "channel-1",
  webhookSecret: "test-secret",
  active: true,
  allowedScopes: ["sales"],
  policyOverrides: null,
};

function contact(overrides: Partial<Contact> = {}): Contact {
  return {
    configurationId: "cfg-1",
    providerContactId: "5511999990000@s.whatsapp.net",
    phone: "5511999990000",
    name: "Ana",
    pushName: "Ana",
    active: true,
    remoteUpdatedAt: 1_000,
    syncedAt: "2026-01-01T00:00:00.000Z",
    ...overrides,
  };
}

function message(overrides: Partial<Message> = {}): Message {
  return {
    configurationId: "cfg-1",
    providerMessageId: "msg-1",
    content: "hello",
    type: "text",
    chatId: "5511999990000@s.whatsapp.net",
    direction: "in",
    status: "delivered",
    timestamp: 1_000,
    senderId: "5511999990000",
    syncedAt: "2026-01-01T00:00:00.000Z",
    ...overrides,
  };
}

describe("MemoryGatewayStore", () => {
  let store: MemoryGatewayStore;

  beforeEach(() => {
    store = new MemoryGatewayStore(() => new Date("2026-03-01T12:00:00.000Z"));
  });

  describe("configurations", () => {
    it("assigns id and timestamps and starts without attention flag", async () => {
      const created = await store.createConfiguration(NEW_CONFIG);

      expect(created.id).toEqual(expect.any(String));
      expect(created.createdAt).toBe("2026-03-01T12:00:00.000Z");
      expect(created.needsAttention).toBe(false);
      expect(created.attentionReason).toBeNull();
    });

    it("finds only active configurations by channel id", async () => {
      const created = await store.createConfiguration(NEW_CONFIG);
      await store.updateConfiguration(created.id, { active: false });

      expect(await store.findActiveByChannelId("channel-1")).toBeNull();
    });

    it("allows one active configuration per channel id", async () => {
      const first = await store.createConfiguration(NEW_CONFIG);

      await expect(store.createConfiguration(NEW_CONFIG)).rejects.toMatchObject({
        code: "ConfigurationConflict",
      });

      await store.updateConfiguration(first.id, { active: false });
      const second = await store.createConfiguration(NEW_CONFIG);
      await expect(
        store.updateConfiguration(first.id, { active: true }),
      ).rejects.toMatchObject({ code: "ConfigurationConflict" });
      expect(second.channelId).toBe("channel-1");
    });

    it("returns null when patching an unknown id", async () => {
      expect(await store.updateConfiguration("missing", { name: "x" })).toBeNull();
    });

    it("filters the listing by active flag", async () => {
      const a = await store.createConfiguration(NEW_CONFIG);
      await store.createConfiguration({ ...NEW_CONFIG, channelId: "channel-2" });
      await store.updateConfiguration(a.id, { active: false });

      expect(await store.listConfigurations({ active: true })).toHaveLength(1);
      expect(await store.listConfigurations()).toHaveLength(2);
    });
  });

  describe("last-write-wins upserts", () => {
    it("creates, then updates on a newer remote timestamp", async () => {
      expect(await store.upsertContact(contact())).toBe("created");
      expect(
        await store.upsertContact(contact({ name: "Ana B", remoteUpdatedAt: 2_000 })),
      ).toBe("updated");

      const saved = await store.getContact("cfg-1", "5511999990000@s.whatsapp.net");
      expect(saved?.name).toBe("Ana B");
    });

    it("lets the incoming record win a timestamp tie", async () => {
      await store.upsertContact(contact());
      expect(await store.upsertContact(contact({ name: "Remote" }))).toBe("updated");
    });

    it("reports an identical re-read as unchanged", async () => {
      await store.upsertContact(contact());
      expect(
        await store.upsertContact(contact({ syncedAt: "2026-04-01T00:00:00.000Z" })),
      ).toBe("unchanged");
    });

    it("keeps the stored record when the incoming one is older", async () => {
      await store.upsertMessage(message({ timestamp: 5_000, content: "new" }));
      expect(
        await store.upsertMessage(message({ timestamp: 4_000, content: "old" })),
      ).toBe("unchanged");

      expect((await store.getMessage("cfg-1", "msg-1"))?.content).toBe("new");
    });

    it("keeps one record per unique key", async () => {
      await store.upsertMessage(message());
      await store.upsertMessage(message());
      expect(await store.countMessages("cfg-1")).toBe(1);
    });
  });

  describe("updateMessageStatus", () => {
    it("never creates a message", async () => {
      expect(await store.updateMessageStatus("cfg-1", "ghost", "read")).toBe(false);
      expect(await store.countMessages("cfg-1")).toBe(0);
    });

    it("moves the status of an existing message", async () => {
      await store.upsertMessage(message());
      expect(await store.updateMessageStatus("cfg-1", "msg-1", "read")).toBe(true);
      expect((await store.getMessage("cfg-1", "msg-1"))?.status).toBe("read");
    });
  });

  describe("cursors", () => {
    it("never lowers the stored position", async () => {
      await store.saveCursor({
        configurationId: "cfg-1",
        resource: "contacts",
        value: "200",
        position: 200,
      });
      const result = await store.saveCursor({
        configurationId: "cfg-1",
        resource: "contacts",
        value: "100",
        position: 100,
      });

      expect(result.value).toBe("200");
      expect((await store.getCursor("cfg-1", "contacts"))?.position).toBe(200);
    });
  });

  describe("memberships", () => {
    it("replaces the set for one group and removes single members", async () => {
      await store.replaceMemberships("cfg-1", "g1", [
        { configurationId: "cfg-1", providerGroupId: "g1", providerContactId: "a", role: "admin" },
        { configurationId: "cfg-1", providerGroupId: "g1", providerContactId: "b", role: "member" },
      ]);
      await store.removeMembership("cfg-1", "g1", "a");

      const members = await store.listMemberships("cfg-1", "g1");
      expect(members.map((m) => m.providerContactId)).toEqual(["b"]);
    });

    it("does not duplicate a member added twice", async () => {
      const m = { configurationId: "cfg-1", providerGroupId: "g1", providerContactId: "a", role: "member" as const };
      await store.addMembership(m);
      await store.addMembership(m);
      expect(await store.listMemberships("cfg-1", "g1")).toHaveLength(1);
    });
  });

  describe("orphanConfigurationData", () => {
    it("flags contacts inactive without deleting them", async () => {
      await store.upsertContact(contact());
      await store.orphanConfigurationData("cfg-1");

      const saved = await store.getContact("cfg-1", "5511999990000@s.whatsapp.net");
      expect(saved?.active).toBe(false);
    });
  });

  describe("audit", () => {
    it("filters entries by time window and configuration", async () => {
      const base = {
        provider: "whapi" as const,
        operation: "sendText",
        success: true,
        responseTimeMs: 10,
        errorCode: null,
        errorMessage: null,
        attempt: 1,
        actorId: "user-1",
        requestId: null,
      };
      await store.appendAudit({ ...base, configurationId: "cfg-1", timestamp: "2026-02-01T00:00:00.000Z" });
      await store.appendAudit({ ...base, configurationId: "cfg-1" });
      await store.appendAudit({ ...base, configurationId: "cfg-2" });

      const entries = await store.listAudit({
        configurationId: "cfg-1",
        since: "2026-03-01T00:00:00.000Z",
      });
      expect(entries).toHaveLength(1);
      expect(entries[0]?.timestamp).toBe("2026-03-01T12:00:00.000Z");
    });
  });
});
