import type { FastifyInstance } from "fastify";
import { sendSuccess } from "../../lib/envelope.js";
import { parseInput } from "../../lib/validation.js";
import { ConfigurationParamsSchema } from "../messaging/messaging.schema.js";
import {
  CreateConfigurationSchema,
  ListConfigurationsQuerySchema,
  UpdateConfigurationSchema,
  toConfigurationResponse,
} from "./configurations.schema.js";
import {
  createConfiguration,
  deactivateConfiguration,
  getConfigurationOrThrow,
  listConfigurations,
  updateConfiguration,
} from "./configurations.service.js";

/**
 * configurationRoutes: provider account administration (ADMIN only)
 *
 *   GET   /configurations
 *   GET   /configurations/:id
 *   POST  /configurations
 *   PATCH /configurations/:id
 *   POST  /configurations/:id/deactivate
 *
 * Tokens and webhook secrets are never echoed back in clear.
 */
export async function configurationRoutes(fastify: FastifyInstance): Promise<void> {
  const deps = fastify.services.configurations;
  const adminOnly = { preHandler: [fastify.requireRole("ADMIN")] };

  fastify.get("/", adminOnly, async (request, reply) => {
    const query = parseInput(ListConfigurationsQuerySchema, request.query, "query");
    const configurations = await listConfigurations(deps.store, { active: query.active });
    return sendSuccess(reply, configurations.map(toConfigurationResponse));
  });

  fastify.get("/:id", adminOnly, async (request, reply) => {
    const { id } = parseInput(ConfigurationParamsSchema, request.params, "params");
    const configuration = await getConfigurationOrThrow(deps.store, id);
    request.gatewayProvider = configuration.provider;
    return sendSuccess(reply, toConfigurationResponse(configuration));
  });

  fastify.post("/", adminOnly, async (request, reply) => {
    const input = parseInput(CreateConfigurationSchema, request.body);
    const created = await createConfiguration(deps, request.actorId, input);
    request.gatewayProvider = created.provider;
    return sendSuccess(reply, toConfigurationResponse(created), 201);
  });

  fastify.patch("/:id", adminOnly, async (request, reply) => {
    const { id } = parseInput(ConfigurationParamsSchema, request.params, "params");
    const input = parseInput(UpdateConfigurationSchema, request.body);
    const updated = await updateConfiguration(deps, request.actorId, id, input);
    request.gatewayProvider = updated.provider;
    return sendSuccess(reply, toConfigurationResponse(updated));
  });

  fastify.post("/:id/deactivate", adminOnly, async (request, reply) => {
    const { id } = parseInput(ConfigurationParamsSchema, request.params, "params");
    const deactivated = await deactivateConfiguration(deps, request.actorId, id);
    request.gatewayProvider = deactivated.provider;
    return sendSuccess(reply, toConfigurationResponse(deactivated));
  });
}
