import { getEnv } from "./lib/env.js";
import { closeDatabase, getDatabase } from "./lib/db.js";
import { logger } from "./lib/logger.js";
import { createQueueConnection, getRedisClient } from "./lib/redis.js";
import { registerJobs } from "./jobs/index.js";
import { DrizzleGatewayStore } from "./modules/store/drizzle.store.js";
import { MemoryGatewayStore } from "./modules/store/memory.store.js";
import type { GatewayStore } from "./modules/store/store.interface.js";
import { RedisIdempotencyStore } from "./modules/webhooks/idempotency.store.js";
import { buildApp } from "./server.js";
import { createServices } from "./services.js";

async function start(): Promise<void> {
  const env = getEnv();

  let store: GatewayStore;
  if (env.DATABASE_URL) {
    store = new DrizzleGatewayStore(getDatabase(env.DATABASE_URL));
  } else {
    logger.warn("DATABASE_URL not set; using the in-memory store");
    store = new MemoryGatewayStore();
  }

  const redis = getRedisClient();
  const queueConnection = createQueueConnection();

  const services = createServices({
    store,
    idempotency: new RedisIdempotencyStore(redis),
    callTimeoutMs: env.DEFAULT_CALL_TIMEOUT_MS,
    syncPageSize: env.SYNC_PAGE_SIZE,
    webhookDedupTtlSeconds: env.WEBHOOK_DEDUP_TTL_SECONDS,
  });

  const jobs = await registerJobs({
    store,
    engine: services.sync,
    connection: queueConnection,
    syncCron: env.SYNC_CRON,
  });

  const app = await buildApp({
    services,
    jwtSecret: env.JWT_SECRET,
    allowedOrigins: env.ALLOWED_ORIGINS.split(",")
      .map((origin) => origin.trim())
      .filter(Boolean),
    redis,
    onClose: async () => {
      await jobs.close();
      queueConnection.disconnect();
      redis.disconnect();
      await closeDatabase();
    },
  });

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      app.log.info({ signal }, "shutting down");
      app.close().then(
        () => process.exit(0),
        (err: unknown) => {
          app.log.error({ err }, "shutdown failed");
          process.exit(1);
        },
      );
    });
  }

  try {
    await app.listen({ port: env.PORT, host: env.HOST });
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }
}

start().catch((err: unknown) => {
  logger.fatal({ err }, "startup failed");
  process.exit(1);
});
