import fp from "fastify-plugin";
import type { FastifyInstance } from "fastify";

/**
 * Response headers for a JSON-only integration API.
 *
 * Every response:
 *   - X-Content-Type-Options: nosniff
 *   - X-Frame-Options: DENY
 *   - Cache-Control: no-store        → envelopes may carry contact data
 *   - X-Request-Id                   → same id as `meta.request_id` and the logs
 *
 * Production only:
 *   - Strict-Transport-Security (TLS ends at the reverse proxy)
 */
async function securityHeadersPlugin(fastify: FastifyInstance): Promise<void> {
  fastify.addHook("onSend", async (request, reply) => {
    reply.header("X-Content-Type-Options", "nosniff");
    reply.header("X-Frame-Options", "DENY");
    reply.header("Cache-Control", "no-store");
    reply.header("X-Request-Id", request.id);

    if (process.env["NODE_ENV"] === "production") {
      reply.header("Strict-Transport-Security", "max-age=63072000; includeSubDomains");
    }
  });
}

export default fp(securityHeadersPlugin, {
  name: "security-headers",
  fastify: "5.x",
});
