import type { SyncScope } from "@wa-gateway/shared-types";

/**
 * Job names routed within the `sync` queue. The scheduler enqueues the
 * dispatch job; dispatch fans out one configuration job per active
 * Configuration.
 */
export const SYNC_JOB_NAMES = {
  DISPATCH_SYNC: "dispatch-sync",
  SYNC_CONFIGURATION: "sync-configuration",
} as const;

export type SyncJobName = (typeof SYNC_JOB_NAMES)[keyof typeof SYNC_JOB_NAMES];

export interface DispatchSyncPayload {
  /** Defaults to "all". */
  scope?: SyncScope | undefined;
}

export interface SyncConfigurationPayload {
  configurationId: string;
  scope: SyncScope;
  actorId: string;
  pageSize?: number | undefined;
}

export type SyncJobPayload = DispatchSyncPayload | SyncConfigurationPayload;
