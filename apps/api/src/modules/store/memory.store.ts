import { randomUUID } from "node:crypto";
import type {
  Contact,
  Group,
  GroupMembership,
  Message,
  MessageStatus,
  SyncResource,
  SyncRunResult,
} from "@wa-gateway/shared-types";
import { GatewayError } from "../../lib/errors.js";
import type {
  AuditLogEntry,
  AuditQuery,
  Configuration,
  ConfigurationPatch,
  GatewayStore,
  NewAuditLogEntry,
  NewConfiguration,
  SyncCursor,
  UpsertOutcome,
} from "./store.interface.js";

function entityKey(configurationId: string, id: string): string {
  return `${configurationId}\u0000${id}`;
}

/**
 * Newer remote version replaces; an equal version replaces only when some
 * content field differs, so re-reading identical data reports "unchanged".
 */
function lastWriteWins<T>(
  map: Map<string, T>,
  key: string,
  incoming: T,
  remoteVersion: (record: T) => number,
  content: ReadonlyArray<keyof T>,
): UpsertOutcome {
  const existing = map.get(key);
  if (!existing) {
    map.set(key, incoming);
    return "created";
  }
  const incomingVersion = remoteVersion(incoming);
  const storedVersion = remoteVersion(existing);
  if (
    incomingVersion > storedVersion ||
    (incomingVersion === storedVersion &&
      content.some((field) => incoming[field] !== existing[field]))
  ) {
    map.set(key, incoming);
    return "updated";
  }
  return "unchanged";
}

const CONTACT_CONTENT: ReadonlyArray<keyof Contact> = ["phone", "name", "pushName", "active"];
const GROUP_CONTENT: ReadonlyArray<keyof Group> = [
  "wireId",
  "name",
  "description",
  "inviteLink",
  "active",
];
const MESSAGE_CONTENT: ReadonlyArray<keyof Message> = [
  "content",
  "type",
  "chatId",
  "direction",
  "status",
  "senderId",
];

/**
 * Map-backed GatewayStore. Used by the test suite and by local runs
 * without DATABASE_URL; state is lost on restart.
 */
export class MemoryGatewayStore implements GatewayStore {
  private readonly configurations = new Map<string, Configuration>();
  private readonly contacts = new Map<string, Contact>();
  private readonly groups = new Map<string, Group>();
  private readonly messages = new Map<string, Message>();
  /** Keyed by configurationId + providerGroupId. */
  private readonly memberships = new Map<string, GroupMembership[]>();
  private readonly cursors = new Map<string, SyncCursor>();
  private readonly syncRuns = new Map<string, SyncRunResult>();
  private readonly audit: AuditLogEntry[] = [];

  constructor(private readonly now: () => Date = () => new Date()) {}

  async createConfiguration(input: NewConfiguration): Promise<Configuration> {
    if (input.active) this.assertChannelFree(input.channelId, null);
    const timestamp = this.now().toISOString();
    const configuration: Configuration = {
      ...input,
      allowedScopes: [...input.allowedScopes],
      id: randomUUID(),
      needsAttention: false,
      attentionReason: null,
      createdAt: timestamp,
      updatedAt: timestamp,
    };
    this.configurations.set(configuration.id, configuration);
    return { ...configuration };
  }

  async updateConfiguration(
    id: string,
    patch: ConfigurationPatch,
  ): Promise<Configuration | null> {
    const existing = this.configurations.get(id);
    if (!existing) return null;

    const updated: Configuration = {
      ...existing,
      ...patch,
      id,
      createdAt: existing.createdAt,
      updatedAt: this.now().toISOString(),
    };
    if (updated.active) this.assertChannelFree(updated.channelId, id);
    this.configurations.set(id, updated);
    return { ...updated };
  }

  /** Mirrors the partial unique index on active channel ids. */
  private assertChannelFree(channelId: string, selfId: string | null): void {
    for (const other of this.configurations.values()) {
      if (other.id !== selfId && other.active && other.channelId === channelId) {
        throw new GatewayError(
          "ConfigurationConflict",
          `Another active configuration already uses channel ${channelId}`,
          { details: { channelId } },
        );
      }
    }
  }

  async getConfiguration(id: string): Promise<Configuration | null> {
    const found = this.configurations.get(id);
    return found ? { ...found } : null;
  }

  async findActiveByChannelId(
    channelId: string,
  ): Promise<Configuration | null> {
    for (const configuration of this.configurations.values()) {
      if (configuration.active && configuration.channelId === channelId) {
        return { ...configuration };
      }
    }
    return null;
  }

  async listConfigurations(
    filter: { active?: boolean } = {},
  ): Promise<Configuration[]> {
    return [...this.configurations.values()]
      .filter((c) => filter.active === undefined || c.active === filter.active)
      .map((c) => ({ ...c }));
  }

  async orphanConfigurationData(configurationId: string): Promise<void> {
    for (const [key, contact] of this.contacts) {
      if (contact.configurationId === configurationId) {
        this.contacts.set(key, { ...contact, active: false });
      }
    }
    for (const [key, group] of this.groups) {
      if (group.configurationId === configurationId) {
        this.groups.set(key, { ...group, active: false });
      }
    }
  }

  async upsertContact(contact: Contact): Promise<UpsertOutcome> {
    return lastWriteWins(
      this.contacts,
      entityKey(contact.configurationId, contact.providerContactId),
      { ...contact },
      (c) => c.remoteUpdatedAt,
      CONTACT_CONTENT,
    );
  }

  async upsertGroup(group: Group): Promise<UpsertOutcome> {
    return lastWriteWins(
      this.groups,
      entityKey(group.configurationId, group.providerGroupId),
      { ...group },
      (g) => g.remoteUpdatedAt,
      GROUP_CONTENT,
    );
  }

  async upsertMessage(message: Message): Promise<UpsertOutcome> {
    return lastWriteWins(
      this.messages,
      entityKey(message.configurationId, message.providerMessageId),
      { ...message },
      (m) => m.timestamp,
      MESSAGE_CONTENT,
    );
  }

  async updateMessageStatus(
    configurationId: string,
    providerMessageId: string,
    status: MessageStatus,
  ): Promise<boolean> {
    const key = entityKey(configurationId, providerMessageId);
    const existing = this.messages.get(key);
    if (!existing) return false;
    this.messages.set(key, { ...existing, status });
    return true;
  }

  async getContact(
    configurationId: string,
    providerContactId: string,
  ): Promise<Contact | null> {
    const found = this.contacts.get(
      entityKey(configurationId, providerContactId),
    );
    return found ? { ...found } : null;
  }

  async getGroup(
    configurationId: string,
    providerGroupId: string,
  ): Promise<Group | null> {
    const found = this.groups.get(entityKey(configurationId, providerGroupId));
    return found ? { ...found } : null;
  }

  async getMessage(
    configurationId: string,
    providerMessageId: string,
  ): Promise<Message | null> {
    const found = this.messages.get(
      entityKey(configurationId, providerMessageId),
    );
    return found ? { ...found } : null;
  }

  async listGroups(configurationId: string): Promise<Group[]> {
    return [...this.groups.values()]
      .filter((g) => g.configurationId === configurationId)
      .map((g) => ({ ...g }));
  }

  async countMessages(configurationId: string): Promise<number> {
    let count = 0;
    for (const message of this.messages.values()) {
      if (message.configurationId === configurationId) count++;
    }
    return count;
  }

  async addMembership(membership: GroupMembership): Promise<void> {
    const key = entityKey(
      membership.configurationId,
      membership.providerGroupId,
    );
    const members = (this.memberships.get(key) ?? []).filter(
      (m) => m.providerContactId !== membership.providerContactId,
    );
    members.push({ ...membership });
    this.memberships.set(key, members);
  }

  async removeMembership(
    configurationId: string,
    providerGroupId: string,
    providerContactId: string,
  ): Promise<void> {
    const key = entityKey(configurationId, providerGroupId);
    const members = this.memberships.get(key);
    if (!members) return;
    this.memberships.set(
      key,
      members.filter((m) => m.providerContactId !== providerContactId),
    );
  }

  async replaceMemberships(
    configurationId: string,
    providerGroupId: string,
    members: GroupMembership[],
  ): Promise<void> {
    this.memberships.set(
      entityKey(configurationId, providerGroupId),
      members.map((m) => ({ ...m })),
    );
  }

  async listMemberships(
    configurationId: string,
    providerGroupId: string,
  ): Promise<GroupMembership[]> {
    return (
      this.memberships.get(entityKey(configurationId, providerGroupId)) ?? []
    ).map((m) => ({ ...m }));
  }

  async getCursor(
    configurationId: string,
    resource: SyncResource,
  ): Promise<SyncCursor | null> {
    const found = this.cursors.get(entityKey(configurationId, resource));
    return found ? { ...found } : null;
  }

  async saveCursor(
    cursor: Omit<SyncCursor, "updatedAt">,
  ): Promise<SyncCursor> {
    const key = entityKey(cursor.configurationId, cursor.resource);
    const existing = this.cursors.get(key);
    if (existing && cursor.position < existing.position) {
      return { ...existing };
    }
    const saved: SyncCursor = {
      ...cursor,
      updatedAt: this.now().toISOString(),
    };
    this.cursors.set(key, saved);
    return { ...saved };
  }

  async saveSyncRun(result: SyncRunResult): Promise<void> {
    this.syncRuns.set(result.configurationId, structuredClone(result));
  }

  async getLastSyncRun(
    configurationId: string,
  ): Promise<SyncRunResult | null> {
    const found = this.syncRuns.get(configurationId);
    return found ? structuredClone(found) : null;
  }

  async appendAudit(entry: NewAuditLogEntry): Promise<AuditLogEntry> {
    const saved: AuditLogEntry = {
      ...entry,
      id: randomUUID(),
      timestamp: entry.timestamp ?? this.now().toISOString(),
    };
    this.audit.push(saved);
    return { ...saved };
  }

  async listAudit(query: AuditQuery): Promise<AuditLogEntry[]> {
    const since = Date.parse(query.since);
    return this.audit
      .filter(
        (e) =>
          Date.parse(e.timestamp) >= since &&
          (query.configurationId === undefined ||
            e.configurationId === query.configurationId) &&
          (query.provider === undefined || e.provider === query.provider),
      )
      .map((e) => ({ ...e }));
  }
}
