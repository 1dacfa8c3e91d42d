import type {
  ErrorCode,
  MediaType,
  MessageStatus,
  MessageType,
  ProviderKind,
  SyncResource,
  SyncScope,
} from "@wa-gateway/shared-types";

export const PROVIDER_KINDS = [
  "whapi",
  "wassenger",
  "twilio",
] as const satisfies readonly ProviderKind[];

export const MESSAGE_TYPES = [
  "text",
  "image",
  "video",
  "document",
  "audio",
] as const satisfies readonly MessageType[];

export const MEDIA_TYPES = [
  "image",
  "video",
  "document",
  "audio",
] as const satisfies readonly MediaType[];

export const MESSAGE_STATUSES = [
  "pending",
  "sent",
  "delivered",
  "read",
  "failed",
  "deleted",
] as const satisfies readonly MessageStatus[];

export const SYNC_RESOURCES = [
  "contacts",
  "groups",
  "messages",
  "members",
] as const satisfies readonly SyncResource[];

export const SYNC_SCOPES = [
  ...SYNC_RESOURCES,
  "all",
] as const satisfies readonly SyncScope[];

export const ERROR_CODES = [
  "AuthError",
  "RateLimited",
  "Transient",
  "Timeout",
  "InvalidRecipient",
  "PayloadTooLarge",
  "NotFound",
  "InvalidRequest",
  "UnsupportedOperation",
  "InvalidSignature",
  "CircuitOpen",
  "UnknownProvider",
  "ConfigurationInactive",
  "InvalidConfiguration",
  "ConfigurationConflict",
  "Unauthenticated",
  "Forbidden",
  "Cancelled",
  "Internal",
] as const satisfies readonly ErrorCode[];

/** WhatsApp wire-id suffix of group chats. */
export const GROUP_SUFFIX = "@g.us";

/** Phone numbers shorter than this (digits only) are rejected locally. */
export const MIN_PHONE_DIGITS = 10;

export const DEFAULT_PAGE_SIZE = 100;
export const MAX_PAGE_SIZE = 500;

export function isProviderKind(value: string): value is ProviderKind {
  return PROVIDER_KINDS.some((kind) => kind === value);
}
