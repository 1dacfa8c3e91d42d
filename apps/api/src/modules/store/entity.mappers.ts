import type { Contact, Group, GroupMembership, Message } from "@wa-gateway/shared-types";
import type {
  RemoteContact,
  RemoteGroup,
  RemoteGroupMember,
  RemoteMessage,
} from "../providers/provider.interface.js";

/**
 * Remote DTO → stored record. Sync and webhook ingestion both go through
 * these, so a record written by either path carries the same unique key.
 */

export function toContact(
  configurationId: string,
  remote: RemoteContact,
  syncedAt: string,
  fallbackUpdatedAt = 0,
): Contact {
  return {
    configurationId,
    providerContactId: remote.providerContactId,
    phone: remote.phone,
    name: remote.name || remote.pushName || remote.phone,
    pushName: remote.pushName,
    active: true,
    remoteUpdatedAt: remote.updatedAt || fallbackUpdatedAt,
    syncedAt,
  };
}

export function toGroup(
  configurationId: string,
  remote: RemoteGroup,
  syncedAt: string,
  fallbackUpdatedAt = 0,
): Group {
  return {
    configurationId,
    providerGroupId: remote.providerGroupId,
    wireId: remote.wireId,
    name: remote.name || `Group ${remote.providerGroupId}`,
    description: remote.description,
    inviteLink: remote.inviteLink,
    active: true,
    remoteUpdatedAt: remote.updatedAt || fallbackUpdatedAt,
    syncedAt,
  };
}

export function toMessage(
  configurationId: string,
  remote: RemoteMessage,
  syncedAt: string,
): Message {
  return {
    configurationId,
    providerMessageId: remote.providerMessageId,
    content: remote.content,
    type: remote.type,
    chatId: remote.chatId,
    direction: remote.fromMe ? "out" : "in",
    status: remote.status,
    timestamp: remote.timestamp,
    senderId: remote.senderId,
    syncedAt,
  };
}

export function toMembership(
  configurationId: string,
  providerGroupId: string,
  member: RemoteGroupMember,
): GroupMembership {
  return {
    configurationId,
    providerGroupId,
    providerContactId: member.providerContactId,
    role: member.role,
  };
}

/** Members carry enough to seed a contact record. */
export function memberAsContact(member: RemoteGroupMember): RemoteContact {
  return {
    providerContactId: member.providerContactId,
    phone: member.phone,
    name: member.name,
    pushName: "",
    updatedAt: 0,
  };
}
