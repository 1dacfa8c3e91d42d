import Fastify, { type FastifyBaseLogger, type FastifyInstance } from "fastify";
import fastifyCors from "@fastify/cors";
import fastifyRateLimit from "@fastify/rate-limit";
import type { Redis } from "ioredis";
import authPlugin from "./plugins/auth.plugin.js";
import sensiblePlugin from "./plugins/sensible.plugin.js";
import securityHeadersPlugin from "./plugins/security-headers.plugin.js";
import { logger } from "./lib/logger.js";
import { healthRoutes } from "./modules/health/health.routes.js";
import { protectedRoutes } from "./modules/protected.routes.js";
import { webhookRoutes } from "./modules/webhooks/webhooks.routes.js";
import type { GatewayServices } from "./services.js";

/** Base64 media bodies are about 4/3 of the decoded file. */
const BODY_LIMIT_BYTES = 24 * 1024 * 1024;

export interface AppOptions {
  services: GatewayServices;
  jwtSecret: string;
  /** Empty → any origin (development). */
  allowedOrigins?: string[] | undefined;
  /** Shared store for the inbound rate limiter; in-process when absent. */
  redis?: Redis | null | undefined;
  loggerInstance?: FastifyBaseLogger | undefined;
  /** Runs when the app closes (jobs, connections). */
  onClose?: (() => Promise<void>) | undefined;
}

/**
 * Assembles the HTTP surface. Everything lives under /integration:
 *
 *   GET  /integration/health               public
 *   POST /integration/webhook/:provider    HMAC-authenticated
 *   *    /integration/configurations/...   Bearer JWT
 */
export async function buildApp(options: AppOptions): Promise<FastifyInstance> {
  const loggerInstance: FastifyBaseLogger = options.loggerInstance ?? logger;
  const fastify = Fastify({
    loggerInstance,
    bodyLimit: BODY_LIMIT_BYTES,
  });

  fastify.decorate("services", options.services);

  await fastify.register(sensiblePlugin);
  await fastify.register(securityHeadersPlugin);

  const origins = options.allowedOrigins ?? [];
  await fastify.register(fastifyCors, {
    origin: origins.length > 0 ? origins : true,
  });

  await fastify.register(fastifyRateLimit, {
    ...(options.redis ? { redis: options.redis } : {}),
    max: 300,
    timeWindow: "1 minute",
  });

  await fastify.register(authPlugin, { secret: options.jwtSecret });

  await fastify.register(
    async (integration) => {
      await integration.register(healthRoutes);
      await integration.register(webhookRoutes, { prefix: "/webhook" });
      await integration.register(protectedRoutes);
    },
    { prefix: "/integration" },
  );

  const { onClose } = options;
  if (onClose) {
    fastify.addHook("onClose", async () => {
      await onClose();
    });
  }

  return fastify;
}
