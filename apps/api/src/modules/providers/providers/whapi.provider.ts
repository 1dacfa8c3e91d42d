import { z } from "zod";
import type { MessageReceipt, MessageStatus } from "@wa-gateway/shared-types";
import { GatewayError } from "../../../lib/errors.js";
import { GROUP_SUFFIX } from "../../../lib/constants.js";
import { moduleLogger } from "../../../lib/logger.js";
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
import { toDataUrl } from "./media.js";

const log = moduleLogger("whapi");

export const WHAPI_BASE_URL = "https://gate.whapi.cloud";

const Caption = z.object({ caption: z.string().optional() }).optional();

const WhapiMessageSchema = z.object({
  id: z.string(),
  type: z.string().default("text"),
  chat_id: z.string(),
  from_me: z.boolean().default(false),
  timestamp: z.number().default(0),
  from: z.string().default(""),
  from_name: z.string().default(""),
  chat_name: z.string().optional(),
  status: z.string().optional(),
  text: z.object({ body: z.string().default("") }).optional(),
  image: Caption,
  video: Caption,
  audio: Caption,
  document: z
    .object({ caption: z.string().optional(), filename: z.string().optional() })
    .optional(),
});
type WhapiMessage = z.infer<typeof WhapiMessageSchema>;

const WhapiContactSchema = z.object({
  id: z.string(),
  name: z.string().default(""),
  pushname: z.string().default(""),
  phone: z.string().optional(),
});
type WhapiContact = z.infer<typeof WhapiContactSchema>;

const WhapiParticipantSchema = z.object({
  id: z.string(),
  name: z.string().default(""),
  rank: z.string().optional(),
  role: z.string().optional(),
});

const WhapiGroupSchema = z.object({
  id: z.string(),
  name: z.string().default(""),
  description: z.string().default(""),
  created_at: z.number().optional(),
  updated_at: z.number().optional(),
  participants: z.array(WhapiParticipantSchema).optional(),
});
type WhapiGroup = z.infer<typeof WhapiGroupSchema>;

const SendResponseSchema = z.object({
  sent: z.boolean().default(false),
  message: z
    .object({
      id: z.string(),
      timestamp: z.number().optional(),
      status: z.string().optional(),
    })
    .optional(),
});

const ContactsPageSchema = z.object({
  contacts: z.array(WhapiContactSchema).default([]),
  total: z.number().optional(),
});
const GroupsPageSchema = z.object({
  groups: z.array(WhapiGroupSchema).default([]),
  total: z.number().optional(),
});
const MessagesPageSchema = z.object({
  messages: z.array(WhapiMessageSchema).default([]),
  total: z.number().optional(),
});
const CreateGroupSchema = z.object({
  group_id: z.string().optional(),
  id: z.string().optional(),
  name: z.string().optional(),
});
const InviteSchema = z.object({ invite_code: z.string().optional() });

const WebhookDataSchema = z.object({
  messages: z.array(WhapiMessageSchema).optional(),
  statuses: z
    .array(z.object({ id: z.string(), status: z.string() }))
    .optional(),
  messages_removed: z.array(z.string()).optional(),
  contacts: z.array(WhapiContactSchema).optional(),
  groups: z.array(WhapiGroupSchema).optional(),
});

const STATUS_MAP: Record<string, MessageStatus> = {
  pending: "pending",
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

function mapStatus(raw: string | undefined, fallback: MessageStatus): MessageStatus {
  return (raw && STATUS_MAP[raw.toLowerCase()]) || fallback;
}

function digitsOf(id: string): string {
  return id.split("@")[0]?.replace(/\D/g, "") ?? "";
}

function toGroupWireId(id: string): string {
  return id.endsWith(GROUP_SUFFIX) ? id : `${id}${GROUP_SUFFIX}`;
}

/**
 * Offset pagination: the cursor value is the offset of the next page.
 * A short or empty page, or reaching `total`, ends the listing.
 */
function offsetPage<T>(
  items: T[],
  offset: number,
  pageSize: number,
  total: number | undefined,
): Page<T> {
  const next = offset + items.length;
  const exhausted =
    items.length === 0 ||
    items.length < pageSize ||
    (total !== undefined && next >= total);
  return {
    items,
    nextCursor: exhausted ? null : { value: String(next), position: next },
  };
}

function parseOffset(cursor: string | null): number {
  if (cursor === null) return 0;
  const offset = Number.parseInt(cursor, 10);
  return Number.isFinite(offset) && offset >= 0 ? offset : 0;
}

/**
 * WHAPI Cloud adapter.
 *
 * API reference: https://whapi.readme.io
 * Auth: `Authorization: Bearer <token>`
 * Webhook signature: `x-whapi-signature`, hex HMAC-SHA256 of the raw body.
 */
export class WhapiProvider implements WhatsAppProvider {
  readonly kind = "whapi" as const;
  readonly maxMediaBytes = 16 * 1024 * 1024;
  readonly signatureHeader = "x-whapi-signature";

  constructor(
    private readonly token: string,
    private readonly baseUrl: string = WHAPI_BASE_URL,
  ) {}

  private headers(): Record<string, string> {
    return { Authorization: `Bearer ${this.token}` };
  }

  private url(path: string, query?: Record<string, string | number>): string {
    const url = new URL(`${this.baseUrl}${path}`);
    for (const [key, value] of Object.entries(query ?? {})) {
      url.searchParams.set(key, String(value));
    }
    return url.toString();
  }

  private recipient(to: string): string {
    const recipient = normalizeRecipient(this.kind, to);
    return recipient.kind === "group" ? recipient.wireId : recipient.digits;
  }

  private toReceipt(payload: unknown): MessageReceipt {
    const body = parseResponse(this.kind, SendResponseSchema, payload, "send");
    if (!body.sent || !body.message) {
      throw new GatewayError("Transient", "whapi accepted the request but did not send", {
        details: { provider: this.kind },
      });
    }
    return {
      providerMessageId: body.message.id,
      status: mapStatus(body.message.status, "sent"),
      timestamp: body.message.timestamp
        ? toEpochMs(body.message.timestamp)
        : Date.now(),
    };
  }

  async sendText(
    to: string,
    body: string,
    ctx: ProviderCallContext,
  ): Promise<MessageReceipt> {
    const payload = await requestJson(
      this.kind,
      {
        method: "POST",
        url: this.url("/messages/text"),
        headers: this.headers(),
        body: { to: this.recipient(to), body },
        isSend: true,
      },
      ctx,
    );
    return this.toReceipt(payload);
  }

  async sendMedia(
    input: SendMediaInput,
    ctx: ProviderCallContext,
  ): Promise<MessageReceipt> {
    assertMediaSize(this.kind, input, this.maxMediaBytes);
    const query: Record<string, string> = { to: this.recipient(input.to) };
    if (input.caption) query["caption"] = input.caption;

    const payload = await requestJson(
      this.kind,
      {
        method: "POST",
        url: this.url(`/messages/media/${input.mediaType}`, query),
        headers: this.headers(),
        body: {
          media: toDataUrl(input.bytes, input.filename, input.mediaType),
          no_encode: false,
        },
        isSend: true,
      },
      ctx,
    );
    return this.toReceipt(payload);
  }

  async fetchContacts(
    cursor: string | null,
    pageSize: number,
    ctx: ProviderCallContext,
  ): Promise<Page<RemoteContact>> {
    const offset = parseOffset(cursor);
    const payload = await requestJson(
      this.kind,
      {
        method: "GET",
        url: this.url("/contacts", { count: pageSize, offset }),
        headers: this.headers(),
      },
      ctx,
    );
    const page = parseResponse(this.kind, ContactsPageSchema, payload, "contacts");
    return offsetPage(page.contacts.map(toRemoteContact), offset, pageSize, page.total);
  }

  async fetchGroups(
    cursor: string | null,
    pageSize: number,
    ctx: ProviderCallContext,
  ): Promise<Page<RemoteGroup>> {
    const offset = parseOffset(cursor);
    const payload = await requestJson(
      this.kind,
      {
        method: "GET",
        url: this.url("/groups", { count: pageSize, offset }),
        headers: this.headers(),
      },
      ctx,
    );
    const page = parseResponse(this.kind, GroupsPageSchema, payload, "groups");
    return offsetPage(page.groups.map(toRemoteGroup), offset, pageSize, page.total);
  }

  async fetchMessages(
    chatScope: string | null,
    cursor: string | null,
    pageSize: number,
    ctx: ProviderCallContext,
  ): Promise<Page<RemoteMessage>> {
    const offset = parseOffset(cursor);
    const path = chatScope
      ? `/chats/${encodeURIComponent(chatScope)}/messages`
      : "/messages/list";
    const payload = await requestJson(
      this.kind,
      {
        method: "GET",
        url: this.url(path, { count: pageSize, offset }),
        headers: this.headers(),
      },
      ctx,
    );
    const page = parseResponse(this.kind, MessagesPageSchema, payload, "messages");
    return offsetPage(page.messages.map(toRemoteMessage), offset, pageSize, page.total);
  }

  async fetchGroupMembers(
    groupId: string,
    ctx: ProviderCallContext,
  ): Promise<RemoteGroupMember[]> {
    const payload = await requestJson(
      this.kind,
      {
        method: "GET",
        url: this.url(`/groups/${encodeURIComponent(groupId)}`),
        headers: this.headers(),
      },
      ctx,
    );
    const group = parseResponse(this.kind, WhapiGroupSchema, payload, "group");
    return toMembers(group);
  }

  async createGroup(
    name: string,
    participants: string[],
    ctx: ProviderCallContext,
  ): Promise<RemoteGroup> {
    const payload = await requestJson(
      this.kind,
      {
        method: "POST",
        url: this.url("/groups"),
        headers: this.headers(),
        body: {
          subject: name,
          participants: participants.map((p) => this.recipient(p)),
        },
        isSend: true,
      },
      ctx,
    );
    const created = parseResponse(this.kind, CreateGroupSchema, payload, "group");
    const groupId = created.group_id ?? created.id;
    if (!groupId) {
      throw new GatewayError("Transient", "whapi did not return the new group id", {
        details: { provider: this.kind },
      });
    }

    return {
      providerGroupId: groupId,
      wireId: toGroupWireId(groupId),
      name: created.name ?? name,
      description: "",
      inviteLink: await this.inviteLink(groupId, ctx),
      updatedAt: Date.now(),
    };
  }

  /** The group exists even when the invite lookup fails; only aborts propagate. */
  private async inviteLink(
    groupId: string,
    ctx: ProviderCallContext,
  ): Promise<string | null> {
    try {
      const payload = await requestJson(
        this.kind,
        {
          method: "GET",
          url: this.url(`/groups/${encodeURIComponent(groupId)}/invite`),
          headers: this.headers(),
        },
        ctx,
      );
      const invite = parseResponse(this.kind, InviteSchema, payload, "invite");
      return invite.invite_code
        ? `https://chat.whatsapp.com/${invite.invite_code}`
        : null;
    } catch (err) {
      if (ctx.signal.aborted) throw err;
      log.warn({ err, groupId }, "invite link lookup failed");
      return null;
    }
  }

  async removeMember(
    groupId: string,
    contactId: string,
    ctx: ProviderCallContext,
  ): Promise<Ack> {
    await requestJson(
      this.kind,
      {
        method: "DELETE",
        url: this.url(`/groups/${encodeURIComponent(groupId)}/participants`),
        headers: this.headers(),
        body: { participants: [this.recipient(contactId)] },
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
    const data = WebhookDataSchema.safeParse(envelope.data);
    if (data.success) {
      const ids = [
        ...(data.data.messages ?? []).map((m) => m.id),
        ...(data.data.statuses ?? []).map((s) => `${s.id}:${s.status}`),
        ...(data.data.messages_removed ?? []).map((id) => `removed:${id}`),
      ];
      if (ids.length > 0) return `${envelope.event_type}:${ids.join(",")}`;
    }
    return contentEventId(envelope);
  }

  normalizeWebhook(envelope: WebhookEnvelope): NormalizedWebhookEvent[] {
    const parsed = WebhookDataSchema.safeParse(envelope.data);
    if (!parsed.success) {
      throw new GatewayError("InvalidRequest", "Malformed whapi webhook data", {
        details: { provider: this.kind, event_type: envelope.event_type },
      });
    }
    const data = parsed.data;

    switch (envelope.event_type) {
      case "messages":
        return (data.messages ?? []).map((m): NormalizedWebhookEvent => ({
          kind: "message",
          message: toRemoteMessage(m),
          groupName: m.chat_id.endsWith(GROUP_SUFFIX) ? (m.chat_name ?? "") : null,
        }));
      case "statuses":
        return (data.statuses ?? []).map((s): NormalizedWebhookEvent => ({
          kind: "message-status",
          providerMessageId: s.id,
          status: mapStatus(s.status, "sent"),
        }));
      case "messages_removed":
        return (data.messages_removed ?? []).map((id): NormalizedWebhookEvent => ({
          kind: "message-removed",
          providerMessageId: id,
        }));
      case "contacts":
        return (data.contacts ?? []).map((c): NormalizedWebhookEvent => ({
          kind: "contact",
          contact: toRemoteContact(c),
        }));
      case "groups":
        return (data.groups ?? []).map((g): NormalizedWebhookEvent => ({
          kind: "group",
          group: toRemoteGroup(g),
          members: g.participants ? toMembers(g) : null,
        }));
      default:
        return [];
    }
  }
}

function toRemoteContact(contact: WhapiContact): RemoteContact {
  return {
    providerContactId: contact.id,
    phone: contact.phone ? contact.phone.replace(/\D/g, "") : digitsOf(contact.id),
    name: contact.name,
    pushName: contact.pushname,
    updatedAt: 0,
  };
}

function toRemoteGroup(group: WhapiGroup): RemoteGroup {
  return {
    providerGroupId: group.id,
    wireId: toGroupWireId(group.id),
    name: group.name,
    description: group.description,
    inviteLink: null,
    updatedAt: toEpochMs(group.updated_at ?? group.created_at ?? 0),
  };
}

function toMembers(group: WhapiGroup): RemoteGroupMember[] {
  return (group.participants ?? []).map((p) => {
    const rank = (p.rank ?? p.role ?? "member").toLowerCase();
    return {
      providerContactId: p.id,
      phone: digitsOf(p.id),
      name: p.name,
      role: rank === "admin" || rank === "creator" || rank === "superadmin" ? "admin" : "member",
    };
  });
}

function toRemoteMessage(message: WhapiMessage): RemoteMessage {
  const caption =
    message.image?.caption ??
    message.video?.caption ??
    message.audio?.caption ??
    message.document?.caption ??
    message.document?.filename ??
    "";
  const { type, content } = normalizeMessageKind(
    message.type,
    message.text?.body ?? "",
    caption,
  );
  return {
    providerMessageId: message.id,
    content,
    type,
    chatId: message.chat_id,
    fromMe: message.from_me,
    timestamp: toEpochMs(message.timestamp),
    senderId: message.from,
    senderName: message.from_name,
    status: mapStatus(message.status, message.from_me ? "sent" : "delivered"),
  };
}
