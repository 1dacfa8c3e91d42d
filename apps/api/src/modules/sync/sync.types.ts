import type { SyncResource, SyncScope } from "@wa-gateway/shared-types";

/** Actor written to the audit log for scheduled runs. */
export const SYNC_ACTOR = "system:sync";

/** Members come after groups: participants are read for the local groups. */
export const RESOURCES_BY_SCOPE: Record<SyncScope, readonly SyncResource[]> = {
  contacts: ["contacts"],
  groups: ["groups"],
  messages: ["messages"],
  members: ["members"],
  all: ["contacts", "groups", "messages", "members"],
};

export interface SyncRunOptions {
  configurationId: string;
  scope: SyncScope;
  pageSize?: number | undefined;
  signal?: AbortSignal | undefined;
  actorId: string;
  requestId?: string | null | undefined;
}
