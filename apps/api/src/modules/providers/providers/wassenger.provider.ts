import { z } from "zod";
import type { MessageReceipt, MessageStatus } from "@wa-gateway/shared-types";
import { GatewayError } from "../../../lib/errors.js";
import { GROUP_SUFFIX } from "../../../lib/constants.js";
import type {
  Ack,
  NormalizedWebhookEvent,
  Page,
  ProviderCallContext,
  RemoteContact,
  RemoteGroup,
  RemoteGroupMember,
  RemoteMessage,
  SendMediaInput,
  WebhookEnvelope,
  WhatsAppProvider,
} from "../provider.interface.js";
import {
  assertMediaSize,
  contentEventId,
  hmacMatches,
  normalizeMessageKind,
  normalizeRecipient,
  toEpochMs,
} from "./common.js";
import { parseResponse, requestJson } from "./http.js";
import { mimeTypeFor } from "./media.js";

export const WASSENGER_BASE_URL = "https://api.wassenger.com/v1";

const Timestamp = z.union([z.string(), z.number()]).optional();

const WassengerContactSchema = z.object({
  wid: z.string(),
  phone: z.string().optional(),
  name: z.string().default(""),
  displayName: z.string().default(""),
  updatedAt: Timestamp,
});
type WassengerContact = z.infer<typeof WassengerContactSchema>;

const WassengerParticipantSchema = z.object({
  wid: z.string(),
  phone: z.string().optional(),
  name: z.string().default(""),
  isAdmin: z.boolean().default(false),
  isSuperAdmin: z.boolean().default(false),
});
type WassengerParticipant = z.infer<typeof WassengerParticipantSchema>;

const WassengerGroupSchema = z.object({
  wid: z.string(),
  name: z.string().default(""),
  description: z.string().default(""),
  inviteCode: z.string().optional(),
  lastUpdatedAt: Timestamp,
  createdAt: Timestamp,
  participants: z.array(WassengerParticipantSchema).optional(),
});
type WassengerGroup = z.infer<typeof WassengerGroupSchema>;

const WassengerMessageSchema = z.object({
  id: z.string(),
  type: z.string().default("text"),
  body: z.string().default(""),
  chat: z.object({ id: z.string(), name: z.string().optional() }).optional(),
  fromNumber: z.string().default(""),
  fromName: z.string().default(""),
  flow: z.enum(["inbound", "outbound"]).default("inbound"),
  date: Timestamp,
  timestamp: z.number().optional(),
  ack: z.string().optional(),
  media: z
    .object({ caption: z.string().optional(), filename: z.string().optional() })
    .optional(),
});
type WassengerMessage = z.infer<typeof WassengerMessageSchema>;

const SendResponseSchema = z.object({
  id: z.string(),
  deliveryStatus: z.string().optional(),
  status: z.string().optional(),
  createdAt: Timestamp,
});

const FileUploadSchema = z.union([
  z.array(z.object({ id: z.string() })).min(1),
  z.object({ id: z.string() }),
]);

const AckSchema = z.object({ id: z.string(), ack: z.string() });

const ACK_MAP: Record<string, MessageStatus> = {
  pending: "pending",
  queued: "pending",
  sent: "sent",
  server: "sent",
  delivered: "delivered",
  device: "delivered",
  read: "read",
  played: "read",
  failed: "failed",
  error: "failed",
  deleted: "deleted",
};

function mapAck(raw: string | undefined, fallback: MessageStatus): MessageStatus {
  return (raw && ACK_MAP[raw.toLowerCase()]) || fallback;
}

function toMs(value: string | number | undefined): number {
  if (value === undefined) return 0;
  if (typeof value === "number") return toEpochMs(value);
  const parsed = Date.parse(value);
  return Number.isNaN(parsed) ? 0 : parsed;
}

function digitsOf(id: string): string {
  return id.split("@")[0]?.replace(/\D/g, "") ?? "";
}

/** Sender numbers become contact wids so webhook and sync writes share a key. */
function contactWid(number: string): string {
  const digits = number.replace(/\D/g, "");
  return digits ? `${digits}@c.us` : "";
}

function parsePage(cursor: string | null): number {
  if (cursor === null) return 0;
  const page = Number.parseInt(cursor, 10);
  return Number.isFinite(page) && page >= 0 ? page : 0;
}

/** Page-index pagination: a full page means another one may follow. */
function indexPage<T>(items: T[], page: number, pageSize: number): Page<T> {
  const exhausted = items.length === 0 || items.length < pageSize;
  return {
    items,
    nextCursor: exhausted ? null : { value: String(page + 1), position: page + 1 },
  };
}

/**
 * Wassenger adapter.
 *
 * API reference: https://app.wassenger.com/docs
 * Auth: `Token` header. Every chat/group call is scoped to the configured device.
 * Webhook signature: `x-wassenger-signature`, hex HMAC-SHA256 of the raw body.
 */
export class WassengerProvider implements WhatsAppProvider {
  readonly kind = "wassenger" as const;
  readonly maxMediaBytes = 16 * 1024 * 1024;
  readonly signatureHeader = "x-wassenger-signature";

  constructor(
    private readonly token: string,
    private readonly deviceId: string,
    private readonly baseUrl: string = WASSENGER_BASE_URL,
  ) {}

  private headers(): Record<string, string> {
    return { Token: this.token };
  }

  private url(path: string, query?: Record<string, string | number>): string {
    const url = new URL(`${this.baseUrl}${path}`);
    for (const [key, value] of Object.entries(query ?? {})) {
      url.searchParams.set(key, String(value));
    }
    return url.toString();
  }

  /** `{ phone: "+5511…" }` for people, `{ group: "…@g.us" }` for groups. */
  private target(to: string): Record<string, string> {
    const recipient = normalizeRecipient(this.kind, to);
    return recipient.kind === "group"
      ? { group: recipient.wireId }
      : { phone: `+${recipient.digits}` };
  }

  private async postMessage(
    body: Record<string, unknown>,
    ctx: ProviderCallContext,
  ): Promise<MessageReceipt> {
    const payload = await requestJson(
      this.kind,
      {
        method: "POST",
        url: this.url("/messages"),
        headers: this.headers(),
        body: { ...body, device: this.deviceId },
        isSend: true,
      },
      ctx,
    );
    const sent = parseResponse(this.kind, SendResponseSchema, payload, "send");
    return {
      providerMessageId: sent.id,
      status: mapAck(sent.deliveryStatus ?? sent.status, "sent"),
      timestamp: toMs(sent.createdAt) || Date.now(),
    };
  }

  async sendText(
    to: string,
    body: string,
    ctx: ProviderCallContext,
  ): Promise<MessageReceipt> {
    return this.postMessage({ ...this.target(to), message: body }, ctx);
  }

  /** Uploads the file first, then references it by id in the message. */
  async sendMedia(
    input: SendMediaInput,
    ctx: ProviderCallContext,
  ): Promise<MessageReceipt> {
    assertMediaSize(this.kind, input, this.maxMediaBytes);
    const target = this.target(input.to);

    const form = new FormData();
    form.append(
      "file",
      new Blob([new Uint8Array(input.bytes)], { type: mimeTypeFor(input.filename, input.mediaType) }),
      input.filename,
    );
    const uploaded = parseResponse(
      this.kind,
      FileUploadSchema,
      await requestJson(
        this.kind,
        {
          method: "POST",
          url: this.url("/files"),
          headers: this.headers(),
          body: form,
          isSend: true,
        },
        ctx,
      ),
      "file upload",
    );
    const fileId = Array.isArray(uploaded) ? uploaded[0]?.id : uploaded.id;
    if (!fileId) {
      throw new GatewayError("Transient", "wassenger did not return a file id", {
        details: { provider: this.kind },
      });
    }

    return this.postMessage(
      { ...target, message: input.caption ?? "", media: { file: fileId } },
      ctx,
    );
  }

  async fetchContacts(
    cursor: string | null,
    pageSize: number,
    ctx: ProviderCallContext,
  ): Promise<Page<RemoteContact>> {
    const page = parsePage(cursor);
    const payload = await requestJson(
      this.kind,
      {
        method: "GET",
        url: this.url(`/chat/${this.deviceId}/contacts`, { page, size: pageSize }),
        headers: this.headers(),
      },
      ctx,
    );
    const items = parseResponse(this.kind, z.array(WassengerContactSchema), payload, "contacts");
    return indexPage(items.map(toRemoteContact), page, pageSize);
  }

  async fetchGroups(
    cursor: string | null,
    pageSize: number,
    ctx: ProviderCallContext,
  ): Promise<Page<RemoteGroup>> {
    const page = parsePage(cursor);
    const payload = await requestJson(
      this.kind,
      {
        method: "GET",
        url: this.url(`/devices/${this.deviceId}/groups`, { page, size: pageSize }),
        headers: this.headers(),
      },
      ctx,
    );
    const items = parseResponse(this.kind, z.array(WassengerGroupSchema), payload, "groups");
    return indexPage(items.map(toRemoteGroup), page, pageSize);
  }

  async fetchMessages(
    chatScope: string | null,
    cursor: string | null,
    pageSize: number,
    ctx: ProviderCallContext,
  ): Promise<Page<RemoteMessage>> {
    const page = parsePage(cursor);
    const path = chatScope
      ? `/chat/${this.deviceId}/chats/${encodeURIComponent(chatScope)}/messages`
      : `/chat/${this.deviceId}/messages`;
    const payload = await requestJson(
      this.kind,
      {
        method: "GET",
        url: this.url(path, { page, size: pageSize }),
        headers: this.headers(),
      },
      ctx,
    );
    const items = parseResponse(this.kind, z.array(WassengerMessageSchema), payload, "messages");
    return indexPage(items.map(toRemoteMessage), page, pageSize);
  }

  async fetchGroupMembers(
    groupId: string,
    ctx: ProviderCallContext,
  ): Promise<RemoteGroupMember[]> {
    const payload = await requestJson(
      this.kind,
      {
        method: "GET",
        url: this.url(
          `/chat/${this.deviceId}/chats/${encodeURIComponent(groupId)}/participants`,
        ),
        headers: this.headers(),
      },
      ctx,
    );
    const items = parseResponse(
      this.kind,
      z.array(WassengerParticipantSchema),
      payload,
      "participants",
    );
    return items.map(toMember);
  }

  async createGroup(
    name: string,
    participants: string[],
    ctx: ProviderCallContext,
  ): Promise<RemoteGroup> {
    const phones = participants.map((p) => {
      const recipient = normalizeRecipient(this.kind, p);
      return recipient.kind === "group" ? recipient.wireId : `+${recipient.digits}`;
    });
    const payload = await requestJson(
      this.kind,
      {
        method: "POST",
        url: this.url(`/devices/${this.deviceId}/groups`),
        headers: this.headers(),
        body: { name, participants: phones, description: "" },
        isSend: true,
      },
      ctx,
    );
    const created = parseResponse(this.kind, WassengerGroupSchema, payload, "group");
    return { ...toRemoteGroup(created), updatedAt: toMs(created.lastUpdatedAt) || Date.now() };
  }

  async removeMember(
    groupId: string,
    contactId: string,
    ctx: ProviderCallContext,
  ): Promise<Ack> {
    const recipient = normalizeRecipient(this.kind, contactId);
    const participant =
      recipient.kind === "group" ? recipient.wireId : `+${recipient.digits}`;
    await requestJson(
      this.kind,
      {
        method: "DELETE",
        url: this.url(
          `/devices/${this.deviceId}/groups/${encodeURIComponent(groupId)}/participants`,
        ),
        headers: this.headers(),
        body: { participants: [participant] },
      },
      ctx,
    );
    return { ok: true };
  }

  validateWebhookSignature(
    rawBody: Buffer,
    headerSignature: string,
    secret: string,
  ): boolean {
    return hmacMatches("sha256", "hex", rawBody, headerSignature, secret);
  }

  webhookEventId(envelope: WebhookEnvelope): string {
    if (envelope.event_id) return envelope.event_id;
    const ack = AckSchema.safeParse(envelope.data);
    if (ack.success) return `${envelope.event_type}:${ack.data.id}:${ack.data.ack}`;
    const message = WassengerMessageSchema.safeParse(envelope.data);
    if (message.success) return `${envelope.event_type}:${message.data.id}`;
    return contentEventId(envelope);
  }

  normalizeWebhook(envelope: WebhookEnvelope): NormalizedWebhookEvent[] {
    switch (envelope.event_type) {
      case "message:in:new":
      case "message:out:new": {
        const raw = this.parseEvent(WassengerMessageSchema, envelope);
        const message = toRemoteMessage(raw);
        const chatName = raw.chat?.name ?? "";
        return [
          {
            kind: "message",
            message,
            groupName: message.chatId.endsWith(GROUP_SUFFIX) ? chatName : null,
          },
        ];
      }
      case "message:in:ack":
      case "message:out:ack": {
        const ack = this.parseEvent(AckSchema, envelope);
        return [
          {
            kind: "message-status",
            providerMessageId: ack.id,
            status: mapAck(ack.ack, "sent"),
          },
        ];
      }
      case "message:delete": {
        const removed = this.parseEvent(z.object({ id: z.string() }), envelope);
        return [{ kind: "message-removed", providerMessageId: removed.id }];
      }
      case "contact:update":
        return [
          {
            kind: "contact",
            contact: toRemoteContact(this.parseEvent(WassengerContactSchema, envelope)),
          },
        ];
      case "group:update": {
        const group = this.parseEvent(WassengerGroupSchema, envelope);
        return [
          {
            kind: "group",
            group: toRemoteGroup(group),
            members: group.participants ? group.participants.map(toMember) : null,
          },
        ];
      }
      default:
        return [];
    }
  }

  private parseEvent<T extends z.ZodType>(
    schema: T,
    envelope: WebhookEnvelope,
  ): z.output<T> {
    const parsed = schema.safeParse(envelope.data);
    if (!parsed.success) {
      throw new GatewayError("InvalidRequest", "Malformed wassenger webhook data", {
        details: { provider: this.kind, event_type: envelope.event_type },
      });
    }
    return parsed.data;
  }
}

function toRemoteContact(contact: WassengerContact): RemoteContact {
  return {
    providerContactId: contact.wid,
    phone: contact.phone ? contact.phone.replace(/\D/g, "") : digitsOf(contact.wid),
    name: contact.name,
    pushName: contact.displayName,
    updatedAt: toMs(contact.updatedAt),
  };
}

function toRemoteGroup(group: WassengerGroup): RemoteGroup {
  return {
    providerGroupId: group.wid,
    wireId: group.wid.endsWith(GROUP_SUFFIX) ? group.wid : `${group.wid}${GROUP_SUFFIX}`,
    name: group.name,
    description: group.description,
    inviteLink: group.inviteCode ? `https://chat.whatsapp.com/${group.inviteCode}` : null,
    updatedAt: toMs(group.lastUpdatedAt ?? group.createdAt),
  };
}

function toMember(participant: WassengerParticipant): RemoteGroupMember {
  return {
    providerContactId: participant.wid,
    phone: participant.phone
      ? participant.phone.replace(/\D/g, "")
      : digitsOf(participant.wid),
    name: participant.name,
    role: participant.isAdmin || participant.isSuperAdmin ? "admin" : "member",
  };
}

function toRemoteMessage(message: WassengerMessage): RemoteMessage {
  const { type, content } = normalizeMessageKind(
    message.type,
    message.body,
    message.media?.caption ?? message.media?.filename ?? message.body,
  );
  const fromMe = message.flow === "outbound";
  return {
    providerMessageId: message.id,
    content,
    type,
    chatId: message.chat?.id ?? message.fromNumber,
    fromMe,
    timestamp: message.timestamp ? toEpochMs(message.timestamp) : toMs(message.date),
    senderId: contactWid(message.fromNumber),
    senderName: message.fromName,
    status: mapAck(message.ack, fromMe ? "sent" : "delivered"),
  };
}
