import { and, eq, gte, lte, sql, type SQL } from "drizzle-orm";
import type { AnyPgColumn } from "drizzle-orm/pg-core";
import type {
  Contact,
  Group,
  GroupMembership,
  Message,
  MessageStatus,
  SyncResource,
  SyncRunResult,
} from "@wa-gateway/shared-types";
import type { Database } from "../../lib/db.js";
import { GatewayError } from "../../lib/errors.js";
import {
  auditLog,
  configurations,
  contacts,
  groupMemberships,
  groups,
  messages,
  syncCursors,
  syncRuns,
} from "../../db/schema.js";
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

type ConfigurationRow = typeof configurations.$inferSelect;
type ContactRow = typeof contacts.$inferSelect;
type GroupRow = typeof groups.$inferSelect;
type MessageRow = typeof messages.$inferSelect;
type AuditRow = typeof auditLog.$inferSelect;
type CursorRow = typeof syncCursors.$inferSelect;

/** `xmax = 0` only holds for a row the statement inserted. */
const INSERTED = sql<boolean>`(xmax = 0)`;

function toOutcome(rows: Array<{ inserted: boolean }>): UpsertOutcome {
  const [row] = rows;
  if (!row) return "unchanged";
  return row.inserted ? "created" : "updated";
}

/**
 * ON CONFLICT guard: a newer remote version, or the same version with some
 * content column changed. Compared against the stored row.
 */
function supersedes(
  version: AnyPgColumn,
  incoming: number,
  content: Array<[AnyPgColumn, unknown]>,
): SQL {
  const differs = content.map(
    ([column, value]) => sql`${column} IS DISTINCT FROM ${value}`,
  );
  return sql`(${version} < ${incoming} OR (${version} = ${incoming} AND (${sql.join(differs, sql` OR `)})))`;
}

function mapConfiguration(row: ConfigurationRow): Configuration {
  return {
    ...row,
    createdAt: row.createdAt.toISOString(),
    updatedAt: row.updatedAt.toISOString(),
  };
}

function mapContact(row: ContactRow): Contact {
  return { ...row, syncedAt: row.syncedAt.toISOString() };
}

function mapGroup(row: GroupRow): Group {
  return { ...row, syncedAt: row.syncedAt.toISOString() };
}

function mapMessage(row: MessageRow): Message {
  return { ...row, syncedAt: row.syncedAt.toISOString() };
}

function mapCursor(row: CursorRow): SyncCursor {
  return { ...row, updatedAt: row.updatedAt.toISOString() };
}

function mapAudit(row: AuditRow): AuditLogEntry {
  return { ...row, timestamp: row.timestamp.toISOString() };
}

const UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

const ACTIVE_CHANNEL_KEY = "wa_configurations_active_channel_key";

/** node-postgres unique_violation on the one-active-configuration-per-channel index. */
function isActiveChannelConflict(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  const code: unknown = Reflect.get(err, "code");
  const constraint: unknown = Reflect.get(err, "constraint");
  return code === "23505" && constraint === ACTIVE_CHANNEL_KEY;
}

function channelConflict(channelId: string | undefined, cause: unknown): GatewayError {
  return new GatewayError(
    "ConfigurationConflict",
    `Another active configuration already uses channel ${channelId ?? ""}`,
    { details: { channelId }, cause },
  );
}

/**
 * PostgreSQL GatewayStore on drizzle-orm.
 *
 * Last-write-wins is enforced inside the INSERT … ON CONFLICT statement
 * (`setWhere` on the remote timestamp), so two concurrent writers of the
 * same key cannot interleave a read and a write.
 */
export class DrizzleGatewayStore implements GatewayStore {
  constructor(private readonly db: Database) {}

  async createConfiguration(input: NewConfiguration): Promise<Configuration> {
    let row: ConfigurationRow | undefined;
    try {
      [row] = await this.db.insert(configurations).values(input).returning();
    } catch (err) {
      if (isActiveChannelConflict(err)) throw channelConflict(input.channelId, err);
      throw err;
    }
    if (!row) throw new Error("Configuration insert returned no row");
    return mapConfiguration(row);
  }

  async updateConfiguration(
    id: string,
    patch: ConfigurationPatch,
  ): Promise<Configuration | null> {
    if (!UUID.test(id)) return null;
    let row: ConfigurationRow | undefined;
    try {
      [row] = await this.db
        .update(configurations)
        .set({ ...patch, updatedAt: new Date() })
        .where(eq(configurations.id, id))
        .returning();
    } catch (err) {
      if (isActiveChannelConflict(err)) throw channelConflict(patch.channelId, err);
      throw err;
    }
    return row ? mapConfiguration(row) : null;
  }

  /** Ids are uuids; anything else cannot exist and would fail the cast. */
  async getConfiguration(id: string): Promise<Configuration | null> {
    if (!UUID.test(id)) return null;
    const [row] = await this.db
      .select()
      .from(configurations)
      .where(eq(configurations.id, id));
    return row ? mapConfiguration(row) : null;
  }

  async findActiveByChannelId(
    channelId: string,
  ): Promise<Configuration | null> {
    const [row] = await this.db
      .select()
      .from(configurations)
      .where(
        and(
          eq(configurations.channelId, channelId),
          eq(configurations.active, true),
        ),
      )
      .limit(1);
    return row ? mapConfiguration(row) : null;
  }

  async listConfigurations(
    filter: { active?: boolean } = {},
  ): Promise<Configuration[]> {
    const rows =
      filter.active === undefined
        ? await this.db.select().from(configurations)
        : await this.db
            .select()
            .from(configurations)
            .where(eq(configurations.active, filter.active));
    return rows.map(mapConfiguration);
  }

  async orphanConfigurationData(configurationId: string): Promise<void> {
    await this.db.transaction(async (tx) => {
      await tx
        .update(contacts)
        .set({ active: false })
        .where(eq(contacts.configurationId, configurationId));
      await tx
        .update(groups)
        .set({ active: false })
        .where(eq(groups.configurationId, configurationId));
    });
  }

  async upsertContact(contact: Contact): Promise<UpsertOutcome> {
    const values = { ...contact, syncedAt: new Date(contact.syncedAt) };
    const rows = await this.db
      .insert(contacts)
      .values(values)
      .onConflictDoUpdate({
        target: [contacts.configurationId, contacts.providerContactId],
        set: values,
        setWhere: supersedes(contacts.remoteUpdatedAt, contact.remoteUpdatedAt, [
          [contacts.phone, contact.phone],
          [contacts.name, contact.name],
          [contacts.pushName, contact.pushName],
          [contacts.active, contact.active],
        ]),
      })
      .returning({ inserted: INSERTED });
    return toOutcome(rows);
  }

  async upsertGroup(group: Group): Promise<UpsertOutcome> {
    const values = { ...group, syncedAt: new Date(group.syncedAt) };
    const rows = await this.db
      .insert(groups)
      .values(values)
      .onConflictDoUpdate({
        target: [groups.configurationId, groups.providerGroupId],
        set: values,
        setWhere: supersedes(groups.remoteUpdatedAt, group.remoteUpdatedAt, [
          [groups.wireId, group.wireId],
          [groups.name, group.name],
          [groups.description, group.description],
          [groups.inviteLink, group.inviteLink],
          [groups.active, group.active],
        ]),
      })
      .returning({ inserted: INSERTED });
    return toOutcome(rows);
  }

  async upsertMessage(message: Message): Promise<UpsertOutcome> {
    const values = { ...message, syncedAt: new Date(message.syncedAt) };
    const rows = await this.db
      .insert(messages)
      .values(values)
      .onConflictDoUpdate({
        target: [messages.configurationId, messages.providerMessageId],
        set: values,
        setWhere: supersedes(messages.timestamp, message.timestamp, [
          [messages.content, message.content],
          [messages.type, message.type],
          [messages.chatId, message.chatId],
          [messages.direction, message.direction],
          [messages.status, message.status],
          [messages.senderId, message.senderId],
        ]),
      })
      .returning({ inserted: INSERTED });
    return toOutcome(rows);
  }

  async updateMessageStatus(
    configurationId: string,
    providerMessageId: string,
    status: MessageStatus,
  ): Promise<boolean> {
    const rows = await this.db
      .update(messages)
      .set({ status })
      .where(
        and(
          eq(messages.configurationId, configurationId),
          eq(messages.providerMessageId, providerMessageId),
        ),
      )
      .returning({ id: messages.providerMessageId });
    return rows.length > 0;
  }

  async getContact(
    configurationId: string,
    providerContactId: string,
  ): Promise<Contact | null> {
    const [row] = await this.db
      .select()
      .from(contacts)
      .where(
        and(
          eq(contacts.configurationId, configurationId),
          eq(contacts.providerContactId, providerContactId),
        ),
      );
    return row ? mapContact(row) : null;
  }

  async getGroup(
    configurationId: string,
    providerGroupId: string,
  ): Promise<Group | null> {
    const [row] = await this.db
      .select()
      .from(groups)
      .where(
        and(
          eq(groups.configurationId, configurationId),
          eq(groups.providerGroupId, providerGroupId),
        ),
      );
    return row ? mapGroup(row) : null;
  }

  async getMessage(
    configurationId: string,
    providerMessageId: string,
  ): Promise<Message | null> {
    const [row] = await this.db
      .select()
      .from(messages)
      .where(
        and(
          eq(messages.configurationId, configurationId),
          eq(messages.providerMessageId, providerMessageId),
        ),
      );
    return row ? mapMessage(row) : null;
  }

  async listGroups(configurationId: string): Promise<Group[]> {
    const rows = await this.db
      .select()
      .from(groups)
      .where(eq(groups.configurationId, configurationId));
    return rows.map(mapGroup);
  }

  async countMessages(configurationId: string): Promise<number> {
    const [row] = await this.db
      .select({ count: sql<number>`count(*)::int` })
      .from(messages)
      .where(eq(messages.configurationId, configurationId));
    return row?.count ?? 0;
  }

  async addMembership(membership: GroupMembership): Promise<void> {
    await this.db
      .insert(groupMemberships)
      .values(membership)
      .onConflictDoUpdate({
        target: [
          groupMemberships.configurationId,
          groupMemberships.providerGroupId,
          groupMemberships.providerContactId,
        ],
        set: { role: membership.role },
      });
  }

  async removeMembership(
    configurationId: string,
    providerGroupId: string,
    providerContactId: string,
  ): Promise<void> {
    await this.db
      .delete(groupMemberships)
      .where(
        and(
          eq(groupMemberships.configurationId, configurationId),
          eq(groupMemberships.providerGroupId, providerGroupId),
          eq(groupMemberships.providerContactId, providerContactId),
        ),
      );
  }

  async replaceMemberships(
    configurationId: string,
    providerGroupId: string,
    members: GroupMembership[],
  ): Promise<void> {
    await this.db.transaction(async (tx) => {
      await tx
        .delete(groupMemberships)
        .where(
          and(
            eq(groupMemberships.configurationId, configurationId),
            eq(groupMemberships.providerGroupId, providerGroupId),
          ),
        );
      if (members.length > 0) {
        await tx.insert(groupMemberships).values(members);
      }
    });
  }

  async listMemberships(
    configurationId: string,
    providerGroupId: string,
  ): Promise<GroupMembership[]> {
    return this.db
      .select()
      .from(groupMemberships)
      .where(
        and(
          eq(groupMemberships.configurationId, configurationId),
          eq(groupMemberships.providerGroupId, providerGroupId),
        ),
      );
  }

  async getCursor(
    configurationId: string,
    resource: SyncResource,
  ): Promise<SyncCursor | null> {
    const [row] = await this.db
      .select()
      .from(syncCursors)
      .where(
        and(
          eq(syncCursors.configurationId, configurationId),
          eq(syncCursors.resource, resource),
        ),
      );
    return row ? mapCursor(row) : null;
  }

  async saveCursor(
    cursor: Omit<SyncCursor, "updatedAt">,
  ): Promise<SyncCursor> {
    const updatedAt = new Date();
    const [row] = await this.db
      .insert(syncCursors)
      .values({ ...cursor, updatedAt })
      .onConflictDoUpdate({
        target: [syncCursors.configurationId, syncCursors.resource],
        set: { value: cursor.value, position: cursor.position, updatedAt },
        setWhere: lte(syncCursors.position, cursor.position),
      })
      .returning();
    if (row) return mapCursor(row);

    const current = await this.getCursor(cursor.configurationId, cursor.resource);
    if (!current) throw new Error("Cursor vanished during save");
    return current;
  }

  async saveSyncRun(result: SyncRunResult): Promise<void> {
    const finishedAt = new Date(result.finishedAt);
    await this.db
      .insert(syncRuns)
      .values({ configurationId: result.configurationId, result, finishedAt })
      .onConflictDoUpdate({
        target: syncRuns.configurationId,
        set: { result, finishedAt },
      });
  }

  async getLastSyncRun(
    configurationId: string,
  ): Promise<SyncRunResult | null> {
    const [row] = await this.db
      .select({ result: syncRuns.result })
      .from(syncRuns)
      .where(eq(syncRuns.configurationId, configurationId));
    return row?.result ?? null;
  }

  async appendAudit(entry: NewAuditLogEntry): Promise<AuditLogEntry> {
    const { timestamp, ...rest } = entry;
    const [row] = await this.db
      .insert(auditLog)
      .values({ ...rest, timestamp: timestamp ? new Date(timestamp) : new Date() })
      .returning();
    if (!row) throw new Error("Audit insert returned no row");
    return mapAudit(row);
  }

  async listAudit(query: AuditQuery): Promise<AuditLogEntry[]> {
    const conditions: SQL[] = [gte(auditLog.timestamp, new Date(query.since))];
    if (query.configurationId !== undefined) {
      conditions.push(eq(auditLog.configurationId, query.configurationId));
    }
    if (query.provider !== undefined) {
      conditions.push(eq(auditLog.provider, query.provider));
    }
    const rows = await this.db
      .select()
      .from(auditLog)
      .where(and(...conditions));
    return rows.map(mapAudit);
  }
}
