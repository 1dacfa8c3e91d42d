import type { FastifyInstance } from "fastify";
import { sendSuccess } from "../../lib/envelope.js";
import { buildHealthReport } from "./health.service.js";

/** GET /health: public, not rate limited. */
export async function healthRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.get("/health", { config: { rateLimit: false } }, async (_request, reply) => {
    const report = await buildHealthReport(fastify.services.health);
    return sendSuccess(reply, report);
  });
}
