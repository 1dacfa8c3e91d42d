import type {
  AuditStats,
  MediaType,
  MessageReceipt,
  MessageType,
} from "@wa-gateway/shared-types";
import { assertScope, type Caller } from "../../lib/caller.js";
import { systemClock, type Clock } from "../../lib/clock.js";
import { GatewayError, toGatewayError } from "../../lib/errors.js";
import { moduleLogger } from "../../lib/logger.js";
import type { AuditRecorder } from "../audit/audit.recorder.js";
import type { ResponseCache } from "../cache/response-cache.js";
import type {
  Ack,
  Page,
  RemoteContact,
  RemoteGroup,
  RemoteGroupMember,
  RemoteMessage,
  WhatsAppProvider,
} from "../providers/provider.interface.js";
import type { ProviderRegistry, RateLimitPolicy } from "../providers/provider.registry.js";
import { normalizeRecipient } from "../providers/providers/common.js";
import type {
  ExecutionContext,
  ResilientExecutor,
} from "../resilience/resilient-executor.js";
import { toGroup } from "../store/entity.mappers.js";
import type { Configuration, GatewayStore } from "../store/store.interface.js";

const log = moduleLogger("messaging");

export interface MessagingDeps {
  store: GatewayStore;
  registry: ProviderRegistry;
  executor: ResilientExecutor;
  cache: ResponseCache;
  audit: AuditRecorder;
  clock?: Clock | undefined;
}

/** A configuration the caller may use, with its adapter and effective policy. */
export interface Target {
  configuration: Configuration;
  provider: WhatsAppProvider;
  policy: RateLimitPolicy;
}

export interface SendMediaRequest {
  to: string;
  bytes: Buffer;
  filename: string;
  mediaType: MediaType;
  caption?: string | undefined;
}

export interface ListRequest {
  cursor: string | null;
  limit: number;
}

export interface MessagesRequest extends ListRequest {
  /** One chat's history; null lists across chats. */
  chatId: string | null;
}

/**
 * Outbound operations on one configuration.
 *
 * Every provider call goes through the resilient executor (and so is
 * audited per attempt). Successful writes invalidate the cached listings
 * they affect; sends are also recorded as outbound messages.
 */
export class MessagingService {
  private readonly clock: Clock;

  constructor(private readonly deps: MessagingDeps) {
    this.clock = deps.clock ?? systemClock;
  }

  /**
   * Loads the configuration, checks the caller's scope and builds the adapter.
   * Rejections happen before any network call and are audited under `operation`.
   *
   * @throws GatewayError NotFound | Forbidden | ConfigurationInactive | InvalidConfiguration | UnknownProvider
   */
  async target(caller: Caller, configurationId: string, operation: string): Promise<Target> {
    let configuration: Configuration | null = null;
    try {
      configuration = await this.deps.store.getConfiguration(configurationId);
      if (!configuration) {
        throw new GatewayError("NotFound", `Configuration ${configurationId} not found`, {
          details: { configurationId },
        });
      }
      assertScope(caller, configuration);
      const { provider, policy } = this.deps.registry.resolve(configuration);
      return { configuration, provider, policy };
    } catch (raw) {
      const error = toGatewayError(raw);
      await this.deps.audit.record({
        configurationId: configuration?.id ?? null,
        provider: configuration?.provider ?? null,
        operation,
        success: false,
        responseTimeMs: 0,
        errorCode: error.code,
        errorMessage: error.message,
        attempt: 1,
        actorId: caller.actorId,
        requestId: caller.requestId,
        timestamp: new Date(this.clock.now()).toISOString(),
      });
      throw error;
    }
  }

  async sendText(
    caller: Caller,
    target: Target,
    input: { to: string; body: string },
    signal?: AbortSignal,
  ): Promise<MessageReceipt> {
    const receipt = await this.deps.executor.execute(
      this.context(caller, target),
      "send_text",
      (call) => target.provider.sendText(input.to, input.body, call),
      { signal },
    );
    await this.recordOutbound(target, input.to, receipt, input.body, "text");
    return receipt;
  }

  async sendMedia(
    caller: Caller,
    target: Target,
    input: SendMediaRequest,
    signal?: AbortSignal,
  ): Promise<MessageReceipt> {
    const receipt = await this.deps.executor.execute(
      this.context(caller, target),
      "send_media",
      (call) => target.provider.sendMedia(input, call),
      { signal, media: true },
    );
    await this.recordOutbound(
      target,
      input.to,
      receipt,
      input.caption || input.filename,
      input.mediaType,
    );
    return receipt;
  }

  async createGroup(
    caller: Caller,
    target: Target,
    input: { name: string; participants: string[] },
    signal?: AbortSignal,
  ): Promise<RemoteGroup> {
    const group = await this.deps.executor.execute(
      this.context(caller, target),
      "create_group",
      (call) => target.provider.createGroup(input.name, input.participants, call),
      { signal },
    );

    const { id } = target.configuration;
    const now = this.clock.now();
    try {
      await this.deps.store.upsertGroup(
        toGroup(id, group, new Date(now).toISOString(), now),
      );
    } catch (err) {
      log.error({ err, configurationId: id }, "created group could not be stored");
    }
    this.deps.cache.invalidate(id, "groups");
    return group;
  }

  async removeMember(
    caller: Caller,
    target: Target,
    groupId: string,
    contactId: string,
    signal?: AbortSignal,
  ): Promise<Ack> {
    const ack = await this.deps.executor.execute(
      this.context(caller, target),
      "remove_member",
      (call) => target.provider.removeMember(groupId, contactId, call),
      { signal },
    );

    const { id } = target.configuration;
    try {
      await this.deps.store.removeMembership(id, groupId, contactId);
    } catch (err) {
      log.error({ err, configurationId: id, groupId }, "membership removal not stored");
    }
    this.deps.cache.invalidate(id, "members");
    this.deps.cache.invalidate(id, "groups");
    return ack;
  }

  /**
   * Cached provider listing. The load is shared between concurrent callers,
   * so it runs without any single caller's abort signal.
   */
  listContacts(caller: Caller, target: Target, query: ListRequest): Promise<Page<RemoteContact>> {
    return this.deps.cache.getOrLoad(
      target.configuration.id,
      "contacts",
      { cursor: query.cursor, limit: query.limit },
      () =>
        this.deps.executor.execute(this.context(caller, target), "fetch_contacts", (call) =>
          target.provider.fetchContacts(query.cursor, query.limit, call),
        ),
    );
  }

  listGroups(caller: Caller, target: Target, query: ListRequest): Promise<Page<RemoteGroup>> {
    return this.deps.cache.getOrLoad(
      target.configuration.id,
      "groups",
      { cursor: query.cursor, limit: query.limit },
      () =>
        this.deps.executor.execute(this.context(caller, target), "fetch_groups", (call) =>
          target.provider.fetchGroups(query.cursor, query.limit, call),
        ),
    );
  }

  listMessages(
    caller: Caller,
    target: Target,
    query: MessagesRequest,
  ): Promise<Page<RemoteMessage>> {
    return this.deps.cache.getOrLoad(
      target.configuration.id,
      "messages",
      { chatId: query.chatId, cursor: query.cursor, limit: query.limit },
      () =>
        this.deps.executor.execute(this.context(caller, target), "fetch_messages", (call) =>
          target.provider.fetchMessages(query.chatId, query.cursor, query.limit, call),
        ),
    );
  }

  listMembers(caller: Caller, target: Target, groupId: string): Promise<RemoteGroupMember[]> {
    return this.deps.cache.getOrLoad(target.configuration.id, "members", { groupId }, () =>
      this.deps.executor.execute(this.context(caller, target), "fetch_group_members", (call) =>
        target.provider.fetchGroupMembers(groupId, call),
      ),
    );
  }

  stats(target: Target, sinceHours: number): Promise<AuditStats> {
    const since = new Date(this.clock.now() - sinceHours * 3_600_000).toISOString();
    return this.deps.audit.stats({ configurationId: target.configuration.id, since });
  }

  private context(caller: Caller, target: Target): ExecutionContext {
    return {
      configurationId: target.configuration.id,
      provider: target.configuration.provider,
      policy: target.policy,
      actorId: caller.actorId,
      requestId: caller.requestId,
    };
  }

  /**
   * The provider accepted the message, so a failed write here is logged and
   * not surfaced: reporting it would invite the caller to send twice.
   */
  private async recordOutbound(
    target: Target,
    to: string,
    receipt: MessageReceipt,
    content: string,
    type: MessageType,
  ): Promise<void> {
    const { configuration } = target;
    const recipient = normalizeRecipient(configuration.provider, to);
    try {
      await this.deps.store.upsertMessage({
        configurationId: configuration.id,
        providerMessageId: receipt.providerMessageId,
        content,
        type,
        chatId: recipient.kind === "group" ? recipient.wireId : recipient.digits,
        direction: "out",
        status: receipt.status,
        timestamp: receipt.timestamp,
        senderId: configuration.senderPhone ?? configuration.channelId,
        syncedAt: new Date(this.clock.now()).toISOString(),
      });
    } catch (err) {
      log.error(
        { err, configurationId: configuration.id, providerMessageId: receipt.providerMessageId },
        "outbound message not stored",
      );
    }
    this.deps.cache.invalidate(configuration.id, "messages");
  }
}
