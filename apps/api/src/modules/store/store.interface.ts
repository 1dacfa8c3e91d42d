import type {
  Contact,
  ErrorCode,
  Group,
  GroupMembership,
  Message,
  MessageStatus,
  ProviderKind,
  SyncResource,
  SyncRunResult,
} from "@wa-gateway/shared-types";

/**
 * Storage collaborator boundary.
 *
 * The gateway never talks to a database directly; every module receives a
 * GatewayStore. Two implementations exist:
 *   memory.store.ts   ←→ tests and local runs without DATABASE_URL
 *   drizzle.store.ts  ←→ PostgreSQL via drizzle-orm
 */

export interface RateLimitPolicyOverrides {
  ratePerSecond?: number | undefined;
  burst?: number | undefined;
  maxRetries?: number | undefined;
  baseDelayMs?: number | undefined;
  failureThreshold?: number | undefined;
  coolDownMs?: number | undefined;
}

export interface Configuration {
  id: string;
  name: string;
  provider: ProviderKind;
  token: string;
  /** Wassenger device the account sends from. */
  deviceId: string | null;
  /** Twilio account SID; `token` then holds the auth token. */
  accountSid: string | null;
  /** Twilio sender in E.164, e.g. "+14155550100". */
  senderPhone: string | null;
  channelId: string;
  webhookSecret: string;
  active: boolean;
  /** Caller scopes allowed to use this account. Empty = any caller. */
  allowedScopes: string[];
  needsAttention: boolean;
  attentionReason: string | null;
  policyOverrides: RateLimitPolicyOverrides | null;
  createdAt: string;
  updatedAt: string;
}

export type NewConfiguration = Omit<
  Configuration,
  "id" | "createdAt" | "updatedAt" | "needsAttention" | "attentionReason"
>;

export type ConfigurationPatch = Partial<
  Omit<Configuration, "id" | "createdAt" | "updatedAt">
>;

export type UpsertOutcome = "created" | "updated" | "unchanged";

export interface SyncCursor {
  configurationId: string;
  resource: SyncResource;
  /** Provider cursor of the next page; empty once the pass reached the end. */
  value: string;
  /** Start of the pass in epoch ms (members: time of the last run); never decreases. */
  position: number;
  updatedAt: string;
}

export interface AuditLogEntry {
  id: string;
  configurationId: string | null;
  provider: ProviderKind | null;
  operation: string;
  success: boolean;
  responseTimeMs: number;
  errorCode: ErrorCode | null;
  errorMessage: string | null;
  attempt: number;
  actorId: string;
  requestId: string | null;
  timestamp: string;
}

export type NewAuditLogEntry = Omit<AuditLogEntry, "id" | "timestamp"> & {
  timestamp?: string | undefined;
};

export interface AuditQuery {
  configurationId?: string | undefined;
  provider?: ProviderKind | undefined;
  /** ISO timestamp, inclusive. */
  since: string;
}

export interface GatewayStore {
  // Configurations
  createConfiguration(input: NewConfiguration): Promise<Configuration>;
  updateConfiguration(
    id: string,
    patch: ConfigurationPatch,
  ): Promise<Configuration | null>;
  getConfiguration(id: string): Promise<Configuration | null>;
  findActiveByChannelId(channelId: string): Promise<Configuration | null>;
  listConfigurations(filter?: { active?: boolean }): Promise<Configuration[]>;
  /** Flags contacts and groups of the configuration inactive. Nothing is deleted. */
  orphanConfigurationData(configurationId: string): Promise<void>;

  // Entities: last-write-wins on the remote timestamp, ties favor the incoming
  // record. A tie with identical content is reported (and left) "unchanged".
  upsertContact(contact: Contact): Promise<UpsertOutcome>;
  upsertGroup(group: Group): Promise<UpsertOutcome>;
  upsertMessage(message: Message): Promise<UpsertOutcome>;
  updateMessageStatus(
    configurationId: string,
    providerMessageId: string,
    status: MessageStatus,
  ): Promise<boolean>;
  getContact(
    configurationId: string,
    providerContactId: string,
  ): Promise<Contact | null>;
  getGroup(
    configurationId: string,
    providerGroupId: string,
  ): Promise<Group | null>;
  getMessage(
    configurationId: string,
    providerMessageId: string,
  ): Promise<Message | null>;
  listGroups(configurationId: string): Promise<Group[]>;
  countMessages(configurationId: string): Promise<number>;

  // Membership
  addMembership(membership: GroupMembership): Promise<void>;
  removeMembership(
    configurationId: string,
    providerGroupId: string,
    providerContactId: string,
  ): Promise<void>;
  replaceMemberships(
    configurationId: string,
    providerGroupId: string,
    members: GroupMembership[],
  ): Promise<void>;
  listMemberships(
    configurationId: string,
    providerGroupId: string,
  ): Promise<GroupMembership[]>;

  // Sync bookkeeping
  getCursor(
    configurationId: string,
    resource: SyncResource,
  ): Promise<SyncCursor | null>;
  /** Ignores a cursor whose position is lower than the stored one. */
  saveCursor(
    cursor: Omit<SyncCursor, "updatedAt">,
  ): Promise<SyncCursor>;
  saveSyncRun(result: SyncRunResult): Promise<void>;
  getLastSyncRun(configurationId: string): Promise<SyncRunResult | null>;

  // Audit
  appendAudit(entry: NewAuditLogEntry): Promise<AuditLogEntry>;
  listAudit(query: AuditQuery): Promise<AuditLogEntry[]>;
}
