import { z } from "zod";
import type { MessageReceipt, MessageStatus, MessageType } from "@wa-gateway/shared-types";
import { GatewayError } from "../../../lib/errors.js";
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
  normalizeRecipient,
  toEpochMs,
} from "./common.js";
import { parseResponse, requestJson } from "./http.js";

export const TWILIO_BASE_URL = "https://api.twilio.com/2010-04-01";

const TwilioMessageSchema = z.object({
  sid: z.string(),
  body: z.string().default(""),
  from: z.string().default(""),
  to: z.string().default(""),
  status: z.string().default("sent"),
  direction: z.string().default("inbound"),
  date_sent: z.string().nullable().optional(),
  date_created: z.string().nullable().optional(),
  num_media: z.string().default("0"),
});
type TwilioMessage = z.infer<typeof TwilioMessageSchema>;

const MessagesPageSchema = z.object({
  messages: z.array(TwilioMessageSchema).default([]),
  page: z.number().default(0),
  next_page_uri: z.string().nullable().optional(),
});

const InboundSchema = z.object({
  MessageSid: z.string(),
  Body: z.string().default(""),
  From: z.string(),
  To: z.string().default(""),
  ProfileName: z.string().default(""),
  NumMedia: z.string().default("0"),
  MediaContentType0: z.string().optional(),
});

const StatusCallbackSchema = z.object({
  MessageSid: z.string(),
  MessageStatus: z.string(),
});

const STATUS_MAP: Record<string, MessageStatus> = {
  accepted: "pending",
  queued: "pending",
  sending: "pending",
  sent: "sent",
  delivered: "delivered",
  read: "read",
  undelivered: "failed",
  failed: "failed",
  canceled: "failed",
};

function mapStatus(raw: string): MessageStatus {
  return STATUS_MAP[raw.toLowerCase()] ?? "sent";
}

function stripChannel(address: string): string {
  return address.replace(/^whatsapp:/, "").replace(/\D/g, "");
}

function mediaKind(contentType: string | undefined, numMedia: string): MessageType {
  if (Number(numMedia) <= 0 || !contentType) return "text";
  if (contentType.startsWith("image/")) return "image";
  if (contentType.startsWith("video/")) return "video";
  if (contentType.startsWith("audio/")) return "audio";
  return "document";
}

/** Cursor value is `<page>:<pageToken>`; position is the page number. */
function parseCursor(cursor: string | null): { page: number; token: string | null } {
  if (cursor === null) return { page: 0, token: null };
  const separator = cursor.indexOf(":");
  if (separator < 0) return { page: 0, token: null };
  const page = Number.parseInt(cursor.slice(0, separator), 10);
  const token = cursor.slice(separator + 1);
  return {
    page: Number.isFinite(page) && page >= 0 ? page : 0,
    token: token.length > 0 ? token : null,
  };
}

/**
 * Twilio WhatsApp adapter.
 *
 * Twilio exposes messaging only: contact and group listings are empty and
 * group management fails with UnsupportedOperation. Media must be served
 * from a public URL, so raw bytes cannot be sent either.
 *
 * Auth: HTTP Basic `accountSid:authToken`; requests are form-encoded.
 * Webhook signature: `x-twilio-signature`, base64 HMAC-SHA1 of the raw body.
 */
export class TwilioProvider implements WhatsAppProvider {
  readonly kind = "twilio" as const;
  readonly maxMediaBytes = 5 * 1024 * 1024;
  readonly signatureHeader = "x-twilio-signature";

  constructor(
    private readonly accountSid: string,
    private readonly authToken: string,
    private readonly senderPhone: string,
    private readonly baseUrl: string = TWILIO_BASE_URL,
  ) {}

  private headers(): Record<string, string> {
    const basic = Buffer.from(`${this.accountSid}:${this.authToken}`).toString("base64");
    return { Authorization: `Basic ${basic}` };
  }

  private messagesUrl(query?: Record<string, string | number>): string {
    const url = new URL(`${this.baseUrl}/Accounts/${this.accountSid}/Messages.json`);
    for (const [key, value] of Object.entries(query ?? {})) {
      url.searchParams.set(key, String(value));
    }
    return url.toString();
  }

  private unsupported(operation: string): GatewayError {
    return new GatewayError(
      "UnsupportedOperation",
      `twilio does not support ${operation}`,
      { details: { provider: this.kind, operation } },
    );
  }

  private address(to: string): string {
    const recipient = normalizeRecipient(this.kind, to);
    if (recipient.kind === "group") throw this.unsupported("group messaging");
    return `whatsapp:+${recipient.digits}`;
  }

  async sendText(
    to: string,
    body: string,
    ctx: ProviderCallContext,
  ): Promise<MessageReceipt> {
    const form = new URLSearchParams({
      From: `whatsapp:+${stripChannel(this.senderPhone)}`,
      To: this.address(to),
      Body: body,
    });
    const payload = await requestJson(
      this.kind,
      {
        method: "POST",
        url: this.messagesUrl(),
        headers: this.headers(),
        body: form,
        isSend: true,
      },
      ctx,
    );
    const sent = parseResponse(this.kind, TwilioMessageSchema, payload, "send");
    return {
      providerMessageId: sent.sid,
      status: mapStatus(sent.status),
      timestamp: parseDate(sent.date_created) || Date.now(),
    };
  }

  async sendMedia(
    input: SendMediaInput,
    _ctx: ProviderCallContext,
  ): Promise<MessageReceipt> {
    assertMediaSize(this.kind, input, this.maxMediaBytes);
    this.address(input.to);
    throw this.unsupported("binary media upload");
  }

  async fetchContacts(): Promise<Page<RemoteContact>> {
    return { items: [], nextCursor: null };
  }

  async fetchGroups(): Promise<Page<RemoteGroup>> {
    return { items: [], nextCursor: null };
  }

  async fetchMessages(
    chatScope: string | null,
    cursor: string | null,
    pageSize: number,
    ctx: ProviderCallContext,
  ): Promise<Page<RemoteMessage>> {
    const { page, token } = parseCursor(cursor);
    const query: Record<string, string | number> = { PageSize: pageSize, Page: page };
    if (token) query["PageToken"] = token;
    if (chatScope) query["To"] = this.address(chatScope);

    const payload = await requestJson(
      this.kind,
      { method: "GET", url: this.messagesUrl(query), headers: this.headers() },
      ctx,
    );
    const body = parseResponse(this.kind, MessagesPageSchema, payload, "messages");
    const items = body.messages.map(toRemoteMessage);

    let nextCursor: Page<RemoteMessage>["nextCursor"] = null;
    if (items.length > 0 && body.next_page_uri) {
      const nextUrl = new URL(body.next_page_uri, this.baseUrl);
      const nextToken = nextUrl.searchParams.get("PageToken") ?? "";
      const nextPage = body.page + 1;
      nextCursor = { value: `${nextPage}:${nextToken}`, position: nextPage };
    }
    return { items, nextCursor };
  }

  async fetchGroupMembers(): Promise<RemoteGroupMember[]> {
    return [];
  }

  async createGroup(): Promise<RemoteGroup> {
    throw this.unsupported("group creation");
  }

  async removeMember(): Promise<Ack> {
    throw this.unsupported("group member removal");
  }

  validateWebhookSignature(
    rawBody: Buffer,
    headerSignature: string,
    secret: string,
  ): boolean {
    return hmacMatches("sha1", "base64", rawBody, headerSignature, secret);
  }

  webhookEventId(envelope: WebhookEnvelope): string {
    if (envelope.event_id) return envelope.event_id;
    const status = StatusCallbackSchema.safeParse(envelope.data);
    if (status.success) {
      return `${envelope.event_type}:${status.data.MessageSid}:${status.data.MessageStatus}`;
    }
    const inbound = InboundSchema.safeParse(envelope.data);
    if (inbound.success) return `${envelope.event_type}:${inbound.data.MessageSid}`;
    return contentEventId(envelope);
  }

  normalizeWebhook(envelope: WebhookEnvelope): NormalizedWebhookEvent[] {
    switch (envelope.event_type) {
      case "message": {
        const parsed = InboundSchema.safeParse(envelope.data);
        if (!parsed.success) throw this.malformed(envelope);
        const inbound = parsed.data;
        const type = mediaKind(inbound.MediaContentType0, inbound.NumMedia);
        const sender = stripChannel(inbound.From);
        return [
          {
            kind: "message",
            groupName: null,
            message: {
              providerMessageId: inbound.MessageSid,
              content:
                inbound.Body ||
                (type === "text" ? "" : `${type.charAt(0).toUpperCase()}${type.slice(1)} message`),
              type,
              chatId: sender,
              fromMe: false,
              timestamp: toEpochMs(envelope.timestamp),
              senderId: sender,
              senderName: inbound.ProfileName,
              status: "delivered",
            },
          },
          {
            kind: "contact",
            contact: {
              providerContactId: sender,
              phone: sender,
              name: inbound.ProfileName,
              pushName: inbound.ProfileName,
              updatedAt: toEpochMs(envelope.timestamp),
            },
          },
        ];
      }
      case "status": {
        const parsed = StatusCallbackSchema.safeParse(envelope.data);
        if (!parsed.success) throw this.malformed(envelope);
        return [
          {
            kind: "message-status",
            providerMessageId: parsed.data.MessageSid,
            status: mapStatus(parsed.data.MessageStatus),
          },
        ];
      }
      default:
        return [];
    }
  }

  private malformed(envelope: WebhookEnvelope): GatewayError {
    return new GatewayError("InvalidRequest", "Malformed twilio webhook data", {
      details: { provider: this.kind, event_type: envelope.event_type },
    });
  }
}

function parseDate(value: string | null | undefined): number {
  if (!value) return 0;
  const parsed = Date.parse(value);
  return Number.isNaN(parsed) ? 0 : parsed;
}

function toRemoteMessage(message: TwilioMessage): RemoteMessage {
  const fromMe = message.direction.startsWith("outbound");
  const counterpart = stripChannel(fromMe ? message.to : message.from);
  const hasMedia = Number(message.num_media) > 0;
  return {
    providerMessageId: message.sid,
    content: message.body || (hasMedia ? "Media message" : ""),
    type: hasMedia && !message.body ? "document" : "text",
    chatId: counterpart,
    fromMe,
    timestamp: parseDate(message.date_sent) || parseDate(message.date_created),
    senderId: stripChannel(message.from),
    senderName: "",
    status: mapStatus(message.status),
  };
}
