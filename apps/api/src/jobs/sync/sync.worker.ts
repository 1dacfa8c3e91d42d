import { Worker, type ConnectionOptions, type Job, type Queue } from "bullmq";
import { moduleLogger } from "../../lib/logger.js";
import type { GatewayStore } from "../../modules/store/store.interface.js";
import type { SyncEngine } from "../../modules/sync/sync.engine.js";
import { SYNC_QUEUE } from "../queues.js";
import { dispatchSync, runConfigurationSync } from "./sync-dispatch.js";
import {
  SYNC_JOB_NAMES,
  type DispatchSyncPayload,
  type SyncConfigurationPayload,
  type SyncJobPayload,
} from "./sync-jobs.types.js";

const log = moduleLogger("sync-worker");

export interface SyncWorkerDeps {
  store: GatewayStore;
  engine: SyncEngine;
  queue: Queue<SyncJobPayload>;
  connection: ConnectionOptions;
  /** Parallel configuration runs; each one is still bounded by its own bucket. */
  concurrency?: number | undefined;
}

function isConfigurationJob(
  job: Job<SyncJobPayload>,
): job is Job<SyncConfigurationPayload> {
  return job.name === SYNC_JOB_NAMES.SYNC_CONFIGURATION && "configurationId" in job.data;
}

function isDispatchJob(job: Job<SyncJobPayload>): job is Job<DispatchSyncPayload> {
  return job.name === SYNC_JOB_NAMES.DISPATCH_SYNC;
}

/**
 * Processes both job kinds of the `sync` queue:
 *   - dispatch-sync:      fans out one job per active configuration
 *   - sync-configuration: runs SyncEngine.run for that configuration
 */
export function startSyncWorker(deps: SyncWorkerDeps): Worker<SyncJobPayload> {
  const worker = new Worker<SyncJobPayload>(
    SYNC_QUEUE,
    async (job: Job<SyncJobPayload>) => {
      if (isDispatchJob(job)) {
        const firedAt = new Date(job.timestamp);
        const result = await dispatchSync(
          { store: deps.store, queue: deps.queue },
          job.data,
          firedAt,
        );
        await job.log(`[dispatch] enqueued ${result.dispatched} configuration syncs`);
        return result;
      }
      if (isConfigurationJob(job)) {
        return runConfigurationSync(deps.engine, job.data);
      }
      log.warn({ jobName: job.name, jobId: job.id }, "unknown sync job ignored");
      return undefined;
    },
    {
      connection: deps.connection,
      concurrency: deps.concurrency ?? 5,
    },
  );

  worker.on("completed", (job, result: unknown) => {
    log.info({ jobId: job.id, jobName: job.name, result }, "sync job completed");
  });

  worker.on("failed", (job, err) => {
    log.error(
      { jobId: job?.id, jobName: job?.name, attempts: job?.attemptsMade, err },
      "sync job failed",
    );
  });

  return worker;
}
