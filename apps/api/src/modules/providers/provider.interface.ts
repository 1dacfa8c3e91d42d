import type {
  MediaType,
  MessageReceipt,
  MessageStatus,
  MessageType,
  ProviderKind,
} from "@wa-gateway/shared-types";

/**
 * Provider-agnostic WhatsApp capability contract.
 *
 *   provider.interface.ts  ←→  the contract every adapter implements
 *   provider.registry.ts   ←→  kind → factory + rate-limit policy
 *   providers/*.provider   ←→  one REST/webhook dialect each
 *
 * Adapters are stateless HTTP translators: they never persist anything and
 * every failure leaves them as a GatewayError with a taxonomy code.
 */

/** Per-attempt context handed in by the resilient executor. */
export interface ProviderCallContext {
  /** Aborts on attempt timeout (reason: Timeout) or caller cancel (reason: Cancelled). */
  signal: AbortSignal;
}

export interface PageCursor {
  /** Opaque provider token handed back on the next fetch. */
  value: string;
  /** Provider-native ordering key (offset, page index, epoch ms). */
  position: number;
}

export interface Page<T> {
  items: T[];
  nextCursor: PageCursor | null;
}

export interface RemoteContact {
  providerContactId: string;
  phone: string;
  name: string;
  pushName: string;
  /** Epoch ms; 0 when the provider exposes no change time. */
  updatedAt: number;
}

export interface RemoteGroupMember {
  providerContactId: string;
  phone: string;
  name: string;
  role: "admin" | "member";
}

export interface RemoteGroup {
  providerGroupId: string;
  /** Chat id ending in "@g.us". */
  wireId: string;
  name: string;
  description: string;
  inviteLink: string | null;
  updatedAt: number;
}

export interface RemoteMessage {
  providerMessageId: string;
  content: string;
  type: MessageType;
  chatId: string;
  fromMe: boolean;
  /** Epoch ms. */
  timestamp: number;
  senderId: string;
  senderName: string;
  status: MessageStatus;
}

export interface SendMediaInput {
  to: string;
  bytes: Buffer;
  filename: string;
  mediaType: MediaType;
  caption?: string | undefined;
}

export interface Ack {
  ok: true;
}

/** Event envelope every provider posts to the webhook route. */
export interface WebhookEnvelope {
  event_type: string;
  timestamp: number;
  channel_id: string;
  event_id?: string | undefined;
  data: unknown;
}

export type NormalizedWebhookEvent =
  | {
      kind: "message";
      message: RemoteMessage;
      /** Set for group chats so the group can be upserted alongside. */
      groupName: string | null;
    }
  | { kind: "message-status"; providerMessageId: string; status: MessageStatus }
  | { kind: "message-removed"; providerMessageId: string }
  | { kind: "contact"; contact: RemoteContact }
  | { kind: "group"; group: RemoteGroup; members: RemoteGroupMember[] | null };

export interface WhatsAppProvider {
  readonly kind: ProviderKind;
  /** Media larger than this is rejected before any network call. */
  readonly maxMediaBytes: number;
  /** Lower-case name of the header carrying the webhook signature. */
  readonly signatureHeader: string;

  sendText(to: string, body: string, ctx: ProviderCallContext): Promise<MessageReceipt>;
  sendMedia(input: SendMediaInput, ctx: ProviderCallContext): Promise<MessageReceipt>;

  fetchContacts(
    cursor: string | null,
    pageSize: number,
    ctx: ProviderCallContext,
  ): Promise<Page<RemoteContact>>;
  fetchGroups(
    cursor: string | null,
    pageSize: number,
    ctx: ProviderCallContext,
  ): Promise<Page<RemoteGroup>>;
  /** `chatScope` null lists messages across all chats. */
  fetchMessages(
    chatScope: string | null,
    cursor: string | null,
    pageSize: number,
    ctx: ProviderCallContext,
  ): Promise<Page<RemoteMessage>>;
  fetchGroupMembers(
    groupId: string,
    ctx: ProviderCallContext,
  ): Promise<RemoteGroupMember[]>;

  createGroup(
    name: string,
    participants: string[],
    ctx: ProviderCallContext,
  ): Promise<RemoteGroup>;
  removeMember(
    groupId: string,
    contactId: string,
    ctx: ProviderCallContext,
  ): Promise<Ack>;

  /** Constant-time HMAC comparison over the raw request body. */
  validateWebhookSignature(
    rawBody: Buffer,
    headerSignature: string,
    secret: string,
  ): boolean;
  /** Stable id used as the deduplication key. */
  webhookEventId(envelope: WebhookEnvelope): string;
  /** Unknown event types yield an empty list. */
  normalizeWebhook(envelope: WebhookEnvelope): NormalizedWebhookEvent[];
}
