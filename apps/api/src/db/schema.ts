import {
  bigint,
  boolean,
  index,
  integer,
  jsonb,
  pgTable,
  primaryKey,
  text,
  timestamp,
  uniqueIndex,
  uuid,
  varchar,
} from "drizzle-orm/pg-core";
import { sql } from "drizzle-orm";
import type { SyncRunResult } from "@wa-gateway/shared-types";
import {
  ERROR_CODES,
  MESSAGE_STATUSES,
  MESSAGE_TYPES,
  PROVIDER_KINDS,
  SYNC_RESOURCES,
} from "../lib/constants.js";
import type { RateLimitPolicyOverrides } from "../modules/store/store.interface.js";

export const configurations = pgTable(
  "wa_configurations",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    name: varchar("name", { length: 255 }).notNull(),
    provider: varchar("provider", { length: 20, enum: PROVIDER_KINDS }).notNull(),
    token: text("token").notNull(),
    deviceId: varchar("device_id", { length: 255 }),
    accountSid: varchar("account_sid", { length: 64 }),
    senderPhone: varchar("sender_phone", { length: 32 }),
    channelId: varchar("channel_id", { length: 255 }).notNull(),
    webhookSecret: text("webhook_secret").notNull(),
    active: boolean("active").default(true).notNull(),
    allowedScopes: jsonb("allowed_scopes").$type<string[]>().notNull(),
    needsAttention: boolean("needs_attention").default(false).notNull(),
    attentionReason: text("attention_reason"),
    policyOverrides: jsonb("policy_overrides").$type<RateLimitPolicyOverrides>(),
    createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull(),
  },
  (t) => [
    index("wa_configurations_channel_idx").on(t.channelId),
    uniqueIndex("wa_configurations_active_channel_key")
      .on(t.channelId)
      .where(sql`active`),
  ],
);

export const contacts = pgTable(
  "wa_contacts",
  {
    configurationId: uuid("configuration_id")
      .notNull()
      .references(() => configurations.id),
    providerContactId: varchar("provider_contact_id", { length: 255 }).notNull(),
    phone: varchar("phone", { length: 32 }).notNull(),
    name: text("name").notNull(),
    pushName: text("push_name").notNull(),
    active: boolean("active").default(true).notNull(),
    remoteUpdatedAt: bigint("remote_updated_at", { mode: "number" }).notNull(),
    syncedAt: timestamp("synced_at", { withTimezone: true }).notNull(),
  },
  (t) => [primaryKey({ columns: [t.configurationId, t.providerContactId] })],
);

export const groups = pgTable(
  "wa_groups",
  {
    configurationId: uuid("configuration_id")
      .notNull()
      .references(() => configurations.id),
    providerGroupId: varchar("provider_group_id", { length: 255 }).notNull(),
    wireId: varchar("wire_id", { length: 255 }).notNull(),
    name: text("name").notNull(),
    description: text("description").notNull(),
    inviteLink: text("invite_link"),
    active: boolean("active").default(true).notNull(),
    remoteUpdatedAt: bigint("remote_updated_at", { mode: "number" }).notNull(),
    syncedAt: timestamp("synced_at", { withTimezone: true }).notNull(),
  },
  (t) => [primaryKey({ columns: [t.configurationId, t.providerGroupId] })],
);

export const groupMemberships = pgTable(
  "wa_group_memberships",
  {
    configurationId: uuid("configuration_id").notNull(),
    providerGroupId: varchar("provider_group_id", { length: 255 }).notNull(),
    providerContactId: varchar("provider_contact_id", { length: 255 }).notNull(),
    role: varchar("role", { length: 10, enum: ["admin", "member"] }).notNull(),
  },
  (t) => [
    primaryKey({
      columns: [t.configurationId, t.providerGroupId, t.providerContactId],
    }),
  ],
);

export const messages = pgTable(
  "wa_messages",
  {
    configurationId: uuid("configuration_id")
      .notNull()
      .references(() => configurations.id),
    providerMessageId: varchar("provider_message_id", { length: 255 }).notNull(),
    content: text("content").notNull(),
    type: varchar("type", { length: 20, enum: MESSAGE_TYPES }).notNull(),
    chatId: varchar("chat_id", { length: 255 }).notNull(),
    direction: varchar("direction", { length: 3, enum: ["in", "out"] }).notNull(),
    status: varchar("status", { length: 20, enum: MESSAGE_STATUSES }).notNull(),
    timestamp: bigint("timestamp", { mode: "number" }).notNull(),
    senderId: varchar("sender_id", { length: 255 }).notNull(),
    syncedAt: timestamp("synced_at", { withTimezone: true }).notNull(),
  },
  (t) => [
    primaryKey({ columns: [t.configurationId, t.providerMessageId] }),
    index("wa_messages_chat_idx").on(t.configurationId, t.chatId),
  ],
);

export const syncCursors = pgTable(
  "wa_sync_cursors",
  {
    configurationId: uuid("configuration_id").notNull(),
    resource: varchar("resource", { length: 20, enum: SYNC_RESOURCES }).notNull(),
    value: text("value").notNull(),
    position: bigint("position", { mode: "number" }).notNull(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).defaultNow().notNull(),
  },
  (t) => [uniqueIndex("wa_sync_cursors_key").on(t.configurationId, t.resource)],
);

export const syncRuns = pgTable("wa_sync_runs", {
  configurationId: uuid("configuration_id").primaryKey(),
  result: jsonb("result").$type<SyncRunResult>().notNull(),
  finishedAt: timestamp("finished_at", { withTimezone: true }).notNull(),
});

export const auditLog = pgTable(
  "wa_audit_log",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    configurationId: uuid("configuration_id"),
    provider: varchar("provider", { length: 20, enum: PROVIDER_KINDS }),
    operation: varchar("operation", { length: 50 }).notNull(),
    success: boolean("success").notNull(),
    responseTimeMs: integer("response_time_ms").notNull(),
    errorCode: varchar("error_code", { length: 40, enum: ERROR_CODES }),
    errorMessage: text("error_message"),
    attempt: integer("attempt").notNull(),
    actorId: varchar("actor_id", { length: 255 }).notNull(),
    requestId: varchar("request_id", { length: 255 }),
    timestamp: timestamp("timestamp", { withTimezone: true }).defaultNow().notNull(),
  },
  (t) => [index("wa_audit_log_config_ts_idx").on(t.configurationId, t.timestamp)],
);
