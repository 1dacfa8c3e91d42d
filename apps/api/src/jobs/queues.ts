import { Queue, type ConnectionOptions } from "bullmq";
import type { SyncJobPayload } from "./sync/sync-jobs.types.js";

export const SYNC_QUEUE = "sync";

/**
 * Single queue for scheduled sync work (dispatch + per-configuration runs).
 *
 * Per-configuration jobs get 3 attempts with exponential backoff
 * (1m → 2m → 4m); the provider calls inside a run already retry on their
 * own, so a job retry only covers runs that could not start.
 */
export function createSyncQueue(connection: ConnectionOptions): Queue<SyncJobPayload> {
  return new Queue<SyncJobPayload>(SYNC_QUEUE, {
    connection,
    defaultJobOptions: {
      removeOnComplete: { count: 100 },
      removeOnFail: { count: 200 },
      attempts: 3,
      backoff: { type: "exponential", delay: 60_000 },
    },
  });
}
