import type { FastifyInstance } from "fastify";
import { GatewayError } from "../../lib/errors.js";
import { ingestWebhook } from "./webhooks.service.js";
import { WebhookParamsSchema } from "./webhooks.schema.js";

/**
 * webhookRoutes: public Fastify plugin
 *
 * Registers: POST /webhook/:provider (mounted under /integration)
 *
 * Registered outside the JWT-protected scope. The provider proves itself by
 * signing the raw body with the configuration's webhook secret, so the
 * `application/json` parser is replaced with a Buffer capture. The override
 * is scoped to this plugin; every other route keeps standard JSON parsing.
 *
 * Replies 200 `{ received, duplicate }` on accept or replay. Failures go
 * through the error handler as the failure envelope; a 500 makes the provider
 * redeliver.
 */
export async function webhookRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.addContentTypeParser(
    "application/json",
    { parseAs: "buffer" },
    (_req, body, done) => done(null, body),
  );

  fastify.post("/:provider", async (request, reply) => {
    const params = WebhookParamsSchema.safeParse(request.params);
    if (!params.success) {
      throw new GatewayError("InvalidRequest", "Missing provider segment");
    }
    if (!Buffer.isBuffer(request.body)) {
      throw new GatewayError("InvalidRequest", "Webhook body must be application/json");
    }

    const result = await ingestWebhook(fastify.services.webhooks, {
      provider: params.data.provider,
      rawBody: request.body,
      headers: request.headers,
      requestId: request.id,
    });

    return reply.status(200).send(result);
  });
}
