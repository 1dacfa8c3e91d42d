export type ProviderKind = "whapi" | "wassenger" | "twilio";

export type ErrorCode =
  | "AuthError"
  | "RateLimited"
  | "Transient"
  | "Timeout"
  | "InvalidRecipient"
  | "PayloadTooLarge"
  | "NotFound"
  | "InvalidRequest"
  | "UnsupportedOperation"
  | "InvalidSignature"
  | "CircuitOpen"
  | "UnknownProvider"
  | "ConfigurationInactive"
  | "InvalidConfiguration"
  | "ConfigurationConflict"
  | "Unauthenticated"
  | "Forbidden"
  | "Cancelled"
  | "Internal";

export type MessageType = "text" | "image" | "video" | "document" | "audio";

export type MediaType = Exclude<MessageType, "text">;

export type MessageDirection = "in" | "out";

export type MessageStatus =
  | "pending"
  | "sent"
  | "delivered"
  | "read"
  | "failed"
  | "deleted";

export type SyncResource = "contacts" | "groups" | "messages" | "members";

export type SyncScope = SyncResource | "all";

export type CircuitState = "CLOSED" | "OPEN" | "HALF_OPEN";

export interface SuccessEnvelope<T> {
  success: true;
  data: T;
  meta: {
    provider: ProviderKind | null;
    response_time_ms: number;
  };
}

export interface FailureEnvelope {
  success: false;
  error: {
    code: ErrorCode;
    message: string;
    details: Record<string, unknown>;
  };
  meta: {
    provider: ProviderKind | null;
    request_id: string;
  };
}

export type ApiEnvelope<T> = SuccessEnvelope<T> | FailureEnvelope;

export interface MessageReceipt {
  providerMessageId: string;
  status: MessageStatus;
  /** Provider epoch milliseconds; falls back to the send time. */
  timestamp: number;
}

export interface Contact {
  configurationId: string;
  providerContactId: string;
  phone: string;
  name: string;
  pushName: string;
  active: boolean;
  /** Epoch ms of the provider-side change this record reflects. */
  remoteUpdatedAt: number;
  syncedAt: string;
}

export interface Group {
  configurationId: string;
  providerGroupId: string;
  wireId: string;
  name: string;
  description: string;
  inviteLink: string | null;
  active: boolean;
  remoteUpdatedAt: number;
  syncedAt: string;
}

export interface GroupMembership {
  configurationId: string;
  providerGroupId: string;
  providerContactId: string;
  role: "admin" | "member";
}

export interface Message {
  configurationId: string;
  providerMessageId: string;
  content: string;
  type: MessageType;
  chatId: string;
  direction: MessageDirection;
  status: MessageStatus;
  timestamp: number;
  senderId: string;
  syncedAt: string;
}

export type ResourceSyncStatus = "success" | "failed" | "cancelled";

export interface ResourceSyncOutcome {
  resource: SyncResource;
  status: ResourceSyncStatus;
  created: number;
  updated: number;
  unchanged: number;
  pages: number;
  errorCount: number;
  firstError: { code: ErrorCode; message: string } | null;
  cursor: string | null;
}

export interface SyncRunResult {
  configurationId: string;
  scope: SyncScope;
  success: boolean;
  startedAt: string;
  finishedAt: string;
  successCount: number;
  errorCount: number;
  firstError: { code: ErrorCode; message: string } | null;
  resources: ResourceSyncOutcome[];
}

export interface ConfigurationHealth {
  configurationId: string;
  name: string;
  provider: ProviderKind;
  active: boolean;
  needsAttention: boolean;
  circuit: {
    state: CircuitState;
    consecutiveFailures: number;
    retryAfterMs: number | null;
  };
  lastSync: {
    success: boolean;
    finishedAt: string;
    errorCount: number;
    firstError: { code: ErrorCode; message: string } | null;
  } | null;
}

export interface HealthReport {
  status: "ok" | "degraded";
  timestamp: string;
  configurations: ConfigurationHealth[];
}

export interface OperationStats {
  total: number;
  succeeded: number;
  failed: number;
}

export interface AuditStats extends OperationStats {
  /** Percentage 0..100; 0 when there were no calls. */
  successRate: number;
  avgResponseTimeMs: number;
  byOperation: Record<string, OperationStats>;
}
