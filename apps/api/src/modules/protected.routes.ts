import type { FastifyInstance } from "fastify";
import { configurationRoutes } from "./configurations/configurations.routes.js";
import { messagingRoutes } from "./messaging/messaging.routes.js";

/**
 * All routes registered inside this plugin are protected by
 * `verifyAccessToken` through a plugin-level `preHandler` hook, so a new
 * endpoint added here can never be left unauthenticated.
 *
 * A second hook copies the token's `sub` into `request.actorId`; that is the
 * identity written to every audit entry the request produces.
 *
 * Routes that also need a role chain `requireRole` on the route itself:
 *
 * ```ts
 * fastify.post('/', { preHandler: [fastify.requireRole('ADMIN')] }, handler)
 * ```
 *
 * Public routes (registered in server.ts, outside this plugin):
 *   - GET  /integration/health            → no credentials
 *   - POST /integration/webhook/:provider → HMAC over the raw body, not JWT
 */
export async function protectedRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.addHook("preHandler", fastify.verifyAccessToken);

  fastify.addHook("preHandler", async (request) => {
    request.actorId = request.user.sub;
  });

  await fastify.register(configurationRoutes, { prefix: "/configurations" });
  await fastify.register(messagingRoutes, { prefix: "/configurations" });
}
