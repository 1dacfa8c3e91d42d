import type { ProviderKind } from "@wa-gateway/shared-types";
import type { Clock } from "../../lib/clock.js";
import { GatewayError, httpStatusFor, toGatewayError } from "../../lib/errors.js";
import { moduleLogger } from "../../lib/logger.js";
import type { AuditRecorder } from "../audit/audit.recorder.js";
import type { ResponseCache } from "../cache/response-cache.js";
import type {
  NormalizedWebhookEvent,
  RemoteMessage,
} from "../providers/provider.interface.js";
import type { ProviderRegistry } from "../providers/provider.registry.js";
import { toEpochMs } from "../providers/providers/common.js";
import {
  toContact,
  toGroup,
  toMembership,
  toMessage,
} from "../store/entity.mappers.js";
import type { GatewayStore } from "../store/store.interface.js";
import type { IdempotencyStore } from "./idempotency.store.js";
import { parseEnvelope } from "./webhooks.schema.js";

const log = moduleLogger("webhooks");

export const WEBHOOK_ACTOR = "system:webhook";

export interface WebhookDeps {
  store: GatewayStore;
  registry: ProviderRegistry;
  idempotency: IdempotencyStore;
  audit: AuditRecorder;
  cache: ResponseCache;
  clock: Clock;
  dedupTtlMs: number;
}

export interface IncomingWebhook {
  /** Raw `:provider` URL segment. */
  provider: string;
  rawBody: Buffer;
  headers: Record<string, string | string[] | undefined>;
  requestId: string | null;
}

export type WebhookResult =
  | { received: true; duplicate: true }
  | { received: true; duplicate: false; events: number };

type WebhookOutcome = "accepted" | "duplicate" | "rejected" | "failed";

interface Trail {
  configurationId: string | null;
  provider: ProviderKind | null;
  eventId: string | null;
}

/**
 * Received → SignatureChecked → Deduplicated → Normalized → Delivered.
 *
 * Every terminal outcome is audited under operation `webhook`. Once the event
 * id is claimed, any failure releases the claim so the provider's redelivery
 * is processed instead of being reported as a duplicate.
 *
 * @throws GatewayError UnknownProvider | InvalidRequest | NotFound | InvalidSignature | Internal
 */
export async function ingestWebhook(
  deps: WebhookDeps,
  incoming: IncomingWebhook,
): Promise<WebhookResult> {
  const startedAt = deps.clock.now();
  const trail: Trail = { configurationId: null, provider: null, eventId: null };

  const finish = (outcome: WebhookOutcome, error: GatewayError | null) =>
    recordOutcome(deps, incoming, trail, outcome, error, startedAt);

  let claimKey: string | null = null;
  try {
    const kind = deps.registry.kindOf(incoming.provider);
    trail.provider = kind;

    const envelope = parseEnvelope(incoming.rawBody);
    const configuration = await deps.store.findActiveByChannelId(envelope.channel_id);
    if (!configuration || configuration.provider !== kind) {
      throw new GatewayError(
        "NotFound",
        `No active ${kind} configuration for channel ${envelope.channel_id}`,
        { details: { provider: kind, channelId: envelope.channel_id } },
      );
    }
    trail.configurationId = configuration.id;

    const { provider } = deps.registry.resolve(configuration);
    const signature = headerValue(incoming.headers, provider.signatureHeader);
    if (
      !provider.validateWebhookSignature(
        incoming.rawBody,
        signature,
        configuration.webhookSecret,
      )
    ) {
      log.warn(
        {
          security: true,
          provider: kind,
          configurationId: configuration.id,
          requestId: incoming.requestId,
        },
        "webhook rejected: invalid signature",
      );
      throw new GatewayError("InvalidSignature", "Invalid webhook signature", {
        details: { provider: kind },
      });
    }

    const eventId = provider.webhookEventId(envelope);
    trail.eventId = eventId;
    const key = `webhook:${configuration.id}:${eventId}`;
    if (!(await deps.idempotency.claim(key, deps.dedupTtlMs))) {
      log.info({ configurationId: configuration.id, eventId }, "duplicate webhook ignored");
      await finish("duplicate", null);
      return { received: true, duplicate: true };
    }
    claimKey = key;

    const events = provider.normalizeWebhook(envelope);
    const receivedAt = toEpochMs(envelope.timestamp) || deps.clock.now();
    for (const event of events) {
      await deliver(deps, configuration.id, event, receivedAt);
    }

    log.info(
      { configurationId: configuration.id, eventId, events: events.length },
      "webhook delivered",
    );
    await finish("accepted", null);
    return { received: true, duplicate: false, events: events.length };
  } catch (raw) {
    const error = toGatewayError(raw);
    if (claimKey !== null) await release(deps.idempotency, claimKey);
    if (error.code === "Internal") {
      log.error({ err: raw, configurationId: trail.configurationId }, "webhook delivery failed");
    }
    await finish(httpStatusFor(error.code) < 500 ? "rejected" : "failed", error);
    throw error;
  }
}

function headerValue(
  headers: IncomingWebhook["headers"],
  name: string,
): string {
  const value = headers[name];
  if (Array.isArray(value)) return value[0] ?? "";
  return value ?? "";
}

async function release(idempotency: IdempotencyStore, key: string): Promise<void> {
  try {
    await idempotency.release(key);
  } catch (err) {
    log.error({ err, key }, "failed to release webhook claim");
  }
}

async function recordOutcome(
  deps: WebhookDeps,
  incoming: IncomingWebhook,
  trail: Trail,
  outcome: WebhookOutcome,
  error: GatewayError | null,
  startedAt: number,
): Promise<void> {
  let message: string | null = error?.message ?? null;
  if (outcome === "duplicate") message = `duplicate event ${trail.eventId ?? ""}`;

  await deps.audit.record({
    configurationId: trail.configurationId,
    provider: trail.provider,
    operation: "webhook",
    success: outcome === "accepted" || outcome === "duplicate",
    responseTimeMs: Math.max(0, deps.clock.now() - startedAt),
    errorCode: error?.code ?? null,
    errorMessage: message,
    attempt: 1,
    actorId: WEBHOOK_ACTOR,
    requestId: incoming.requestId,
    timestamp: new Date(deps.clock.now()).toISOString(),
  });
}

/** Writes one normalized event with the same unique keys the sync engine uses. */
async function deliver(
  deps: WebhookDeps,
  configurationId: string,
  event: NormalizedWebhookEvent,
  receivedAt: number,
): Promise<void> {
  const { store, cache } = deps;
  const syncedAt = new Date(deps.clock.now()).toISOString();

  switch (event.kind) {
    case "message": {
      await store.upsertMessage(toMessage(configurationId, event.message, syncedAt));
      await recordSender(deps, configurationId, event.message, event.groupName, syncedAt);
      cache.invalidate(configurationId, "messages");
      return;
    }
    case "message-status": {
      const found = await store.updateMessageStatus(
        configurationId,
        event.providerMessageId,
        event.status,
      );
      if (!found) {
        log.debug(
          { configurationId, providerMessageId: event.providerMessageId },
          "status for unknown message ignored",
        );
      }
      return;
    }
    case "message-removed": {
      await store.updateMessageStatus(configurationId, event.providerMessageId, "deleted");
      return;
    }
    case "contact": {
      await store.upsertContact(toContact(configurationId, event.contact, syncedAt, receivedAt));
      cache.invalidate(configurationId, "contacts");
      return;
    }
    case "group": {
      await store.upsertGroup(toGroup(configurationId, event.group, syncedAt, receivedAt));
      if (event.members !== null) {
        const groupId = event.group.providerGroupId;
        await store.replaceMemberships(
          configurationId,
          groupId,
          event.members.map((m) => toMembership(configurationId, groupId, m)),
        );
        cache.invalidate(configurationId, "members");
      }
      cache.invalidate(configurationId, "groups");
      return;
    }
  }
}

/**
 * Inbound messages introduce their sender: the contact is created when
 * unknown and, for group chats, the group and the membership as well.
 * Existing records are left to the sync engine.
 */
async function recordSender(
  deps: WebhookDeps,
  configurationId: string,
  message: RemoteMessage,
  groupName: string | null,
  syncedAt: string,
): Promise<void> {
  const { store, cache } = deps;
  const senderId = message.fromMe ? "" : message.senderId;

  if (senderId && !(await store.getContact(configurationId, senderId))) {
    await store.upsertContact(
      toContact(
        configurationId,
        {
          providerContactId: senderId,
          phone: senderId.split("@")[0]?.replace(/\D/g, "") ?? "",
          name: message.senderName,
          pushName: message.senderName,
          updatedAt: 0,
        },
        syncedAt,
      ),
    );
    cache.invalidate(configurationId, "contacts");
  }

  if (groupName === null) return;

  const groupId = message.chatId;
  if (!(await store.getGroup(configurationId, groupId))) {
    await store.upsertGroup(
      toGroup(
        configurationId,
        {
          providerGroupId: groupId,
          wireId: groupId,
          name: groupName,
          description: "",
          inviteLink: null,
          updatedAt: 0,
        },
        syncedAt,
      ),
    );
    cache.invalidate(configurationId, "groups");
  }

  if (!senderId) return;
  const members = await store.listMemberships(configurationId, groupId);
  if (!members.some((m) => m.providerContactId === senderId)) {
    await store.addMembership({
      configurationId,
      providerGroupId: groupId,
      providerContactId: senderId,
      role: "member",
    });
    cache.invalidate(configurationId, "members");
  }
}
