import type { Redis } from "ioredis";
import type { Queue, Worker } from "bullmq";
import { moduleLogger } from "../lib/logger.js";
import type { GatewayStore } from "../modules/store/store.interface.js";
import type { SyncEngine } from "../modules/sync/sync.engine.js";
import { createSyncQueue } from "./queues.js";
import { SYNC_JOB_NAMES, type SyncJobPayload } from "./sync/sync-jobs.types.js";
import { startSyncWorker } from "./sync/sync.worker.js";

const log = moduleLogger("jobs");

/**
 * Stable id of the scheduler entry. BullMQ upserts it on every start, so
 * restarts never register a second copy of the same trigger.
 */
const SYNC_SCHEDULER_ID = "scheduled-sync-dispatch";

export interface JobsDeps {
  store: GatewayStore;
  engine: SyncEngine;
  /** Dedicated connection with `maxRetriesPerRequest: null`. */
  connection: Redis;
  /** Standard 5-field cron, UTC. */
  syncCron: string;
}

export interface JobsHandle {
  queue: Queue<SyncJobPayload>;
  close(): Promise<void>;
}

/**
 * Starts the sync worker and registers the scheduled dispatch.
 *
 * Scheduler registration is skipped under NODE_ENV=test so test runs never
 * leave repeatable entries behind.
 */
export async function registerJobs(deps: JobsDeps): Promise<JobsHandle> {
  const queue = createSyncQueue(deps.connection);
  const workers: Worker[] = [
    startSyncWorker({
      store: deps.store,
      engine: deps.engine,
      queue,
      connection: deps.connection,
    }),
  ];

  if (process.env["NODE_ENV"] !== "test") {
    await queue.upsertJobScheduler(
      SYNC_SCHEDULER_ID,
      { pattern: deps.syncCron },
      {
        name: SYNC_JOB_NAMES.DISPATCH_SYNC,
        data: { scope: "all" },
        opts: { attempts: 1 },
      },
    );
    log.info({ cron: deps.syncCron }, "scheduled sync registered");
  }

  return {
    queue,
    async close() {
      await Promise.all(workers.map((w) => w.close()));
      await queue.close();
      log.info("workers and queues closed");
    },
  };
}
