import type { Queue } from "bullmq";
import type { SyncRunResult } from "@wa-gateway/shared-types";
import type { GatewayStore } from "../../modules/store/store.interface.js";
import type { SyncEngine } from "../../modules/sync/sync.engine.js";
import { SYNC_ACTOR } from "../../modules/sync/sync.types.js";
import {
  SYNC_JOB_NAMES,
  type DispatchSyncPayload,
  type SyncConfigurationPayload,
  type SyncJobPayload,
} from "./sync-jobs.types.js";

/**
 * Minute-resolution key of a scheduler firing, e.g. `202603011215`.
 *
 * Per-configuration job ids embed it, so a dispatch that runs twice for the
 * same firing enqueues each configuration once. BullMQ rejects `:` in custom
 * ids, hence the compact form.
 */
export function getSlotKey(firedAt: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${firedAt.getUTCFullYear()}${pad(firedAt.getUTCMonth() + 1)}${pad(firedAt.getUTCDate())}` +
    `${pad(firedAt.getUTCHours())}${pad(firedAt.getUTCMinutes())}`
  );
}

export function syncJobId(configurationId: string, slotKey: string): string {
  return `sync-${configurationId}-${slotKey}`;
}

export interface DispatchDeps {
  store: Pick<GatewayStore, "listConfigurations">;
  queue: Pick<Queue<SyncJobPayload>, "addBulk">;
}

/** Enqueues one `sync-configuration` job per active configuration. */
export async function dispatchSync(
  deps: DispatchDeps,
  payload: DispatchSyncPayload,
  firedAt: Date,
): Promise<{ dispatched: number; slotKey: string }> {
  const slotKey = getSlotKey(firedAt);
  const configurations = await deps.store.listConfigurations({ active: true });
  if (configurations.length === 0) return { dispatched: 0, slotKey };

  const jobs = configurations.map((configuration) => ({
    name: SYNC_JOB_NAMES.SYNC_CONFIGURATION,
    data: {
      configurationId: configuration.id,
      scope: payload.scope ?? "all",
      actorId: SYNC_ACTOR,
    } satisfies SyncConfigurationPayload,
    opts: { jobId: syncJobId(configuration.id, slotKey) },
  }));
  await deps.queue.addBulk(jobs);

  return { dispatched: jobs.length, slotKey };
}

export interface ConfigurationSyncSummary {
  configurationId: string;
  success: boolean;
  successCount: number;
  errorCount: number;
}

/**
 * Runs one configuration. Per-resource failures are part of the result and do
 * not fail the job; only a run that cannot start throws (and is retried).
 */
export async function runConfigurationSync(
  engine: Pick<SyncEngine, "run">,
  payload: SyncConfigurationPayload,
): Promise<ConfigurationSyncSummary> {
  const result: SyncRunResult = await engine.run({
    configurationId: payload.configurationId,
    scope: payload.scope,
    pageSize: payload.pageSize,
    actorId: payload.actorId,
  });
  return {
    configurationId: result.configurationId,
    success: result.success,
    successCount: result.successCount,
    errorCount: result.errorCount,
  };
}
