import { vi } from "vitest";
import type {
  WebhookEnvelope,
  WhatsAppProvider,
} from "../modules/providers/provider.interface.js";
import { ProviderRegistry } from "../modules/providers/provider.registry.js";

/** Provider whose every capability is a vi.fn; override what a test needs. */
export function fakeProvider(overrides: Partial<WhatsAppProvider> = {}): WhatsAppProvider {
  return {
    kind: "whapi",
    maxMediaBytes: 1024,
    signatureHeader: "x-test-signature",
    sendText: vi.fn(async () => ({
      providerMessageId: "msg-1",
      status: "sent" as const,
      timestamp: 1_700_000_000_000,
    })),
    sendMedia: vi.fn(async () => ({
      providerMessageId: "msg-2",
      status: "sent" as const,
      timestamp: 1_700_000_000_000,
    })),
    fetchContacts: vi.fn(async () => ({ items: [], nextCursor: null })),
    fetchGroups: vi.fn(async () => ({ items: [], nextCursor: null })),
    fetchMessages: vi.fn(async () => ({ items: [], nextCursor: null })),
    fetchGroupMembers: vi.fn(async () => []),
    createGroup: vi.fn(async (name: string) => ({
      providerGroupId: "120363000000000001@g.us",
      wireId: "120363000000000001@g.us",
      name,
      description: "",
      inviteLink: null,
      updatedAt: 0,
    })),
    removeMember: vi.fn(async () => ({ ok: true as const })),
    validateWebhookSignature: vi.fn(
      (_rawBody: Buffer, signature: string, secret: string) => signature === secret,
    ),
    webhookEventId: vi.fn((envelope: WebhookEnvelope) => envelope.event_id ?? "evt-derived"),
    normalizeWebhook: vi.fn(() => []),
    ...overrides,
  };
}

/** Registry answering every whapi configuration with `provider`. */
export function registryFor(provider: WhatsAppProvider): ProviderRegistry {
  const registry = new ProviderRegistry();
  registry.register("whapi", () => provider, { ratePerSecond: 1_000, burst: 1_000 });
  return registry;
}
