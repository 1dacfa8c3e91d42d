import type { FastifyInstance, FastifyRequest } from "fastify";
import { callerOf, disconnectSignal, type Caller } from "../../lib/caller.js";
import { sendSuccess } from "../../lib/envelope.js";
import { parseInput } from "../../lib/validation.js";
import {
  ConfigurationParamsSchema,
  CreateGroupSchema,
  GroupParamsSchema,
  ListQuerySchema,
  MemberParamsSchema,
  MessagesQuerySchema,
  SendMediaSchema,
  SendTextSchema,
  StatsQuerySchema,
  SyncRequestSchema,
} from "./messaging.schema.js";
import type { Target } from "./messaging.service.js";

/**
 * messagingRoutes: per-configuration operations (JWT-protected)
 *
 * Registers under /configurations/:id:
 *   POST   /messages/text
 *   POST   /messages/media
 *   POST   /groups
 *   DELETE /groups/:groupId/members/:contactId
 *   POST   /sync
 *   GET    /contacts        (cached)
 *   GET    /groups          (cached)
 *   GET    /groups/:groupId/members (cached)
 *   GET    /messages        (cached, optional chatId)
 *   GET    /stats
 *
 * Every handler resolves the configuration first, so scope and credential
 * problems are reported before any provider call.
 */
export async function messagingRoutes(fastify: FastifyInstance): Promise<void> {
  const messaging = fastify.services.messaging;

  async function resolve(
    request: FastifyRequest,
    operation: string,
  ): Promise<{ caller: Caller; target: Target }> {
    const { id } = parseInput(ConfigurationParamsSchema, request.params, "params");
    const caller = callerOf(request);
    const target = await messaging.target(caller, id, operation);
    request.gatewayProvider = target.configuration.provider;
    return { caller, target };
  }

  fastify.post("/:id/messages/text", async (request, reply) => {
    const body = parseInput(SendTextSchema, request.body);
    const { caller, target } = await resolve(request, "send_text");
    const receipt = await messaging.sendText(caller, target, body, disconnectSignal(reply));
    return sendSuccess(reply, receipt, 201);
  });

  fastify.post("/:id/messages/media", async (request, reply) => {
    const body = parseInput(SendMediaSchema, request.body);
    const { caller, target } = await resolve(request, "send_media");
    const receipt = await messaging.sendMedia(
      caller,
      target,
      {
        to: body.to,
        bytes: Buffer.from(body.mediaBase64, "base64"),
        filename: body.filename,
        mediaType: body.mediaType,
        caption: body.caption,
      },
      disconnectSignal(reply),
    );
    return sendSuccess(reply, receipt, 201);
  });

  fastify.post("/:id/groups", async (request, reply) => {
    const body = parseInput(CreateGroupSchema, request.body);
    const { caller, target } = await resolve(request, "create_group");
    const group = await messaging.createGroup(caller, target, body, disconnectSignal(reply));
    return sendSuccess(reply, group, 201);
  });

  fastify.delete("/:id/groups/:groupId/members/:contactId", async (request, reply) => {
    const params = parseInput(MemberParamsSchema, request.params, "params");
    const { caller, target } = await resolve(request, "remove_member");
    const ack = await messaging.removeMember(
      caller,
      target,
      params.groupId,
      params.contactId,
      disconnectSignal(reply),
    );
    return sendSuccess(reply, ack);
  });

  fastify.post("/:id/sync", async (request, reply) => {
    const body = parseInput(SyncRequestSchema, request.body ?? {});
    const { caller, target } = await resolve(request, "sync");
    const result = await fastify.services.sync.run({
      configurationId: target.configuration.id,
      scope: body.scope,
      pageSize: body.pageSize,
      signal: disconnectSignal(reply),
      actorId: caller.actorId,
      requestId: caller.requestId,
    });
    return sendSuccess(reply, result);
  });

  fastify.get("/:id/contacts", async (request, reply) => {
    const query = parseInput(ListQuerySchema, request.query, "query");
    const { caller, target } = await resolve(request, "fetch_contacts");
    const page = await messaging.listContacts(caller, target, {
      cursor: query.cursor ?? null,
      limit: query.limit,
    });
    return sendSuccess(reply, page);
  });

  fastify.get("/:id/groups", async (request, reply) => {
    const query = parseInput(ListQuerySchema, request.query, "query");
    const { caller, target } = await resolve(request, "fetch_groups");
    const page = await messaging.listGroups(caller, target, {
      cursor: query.cursor ?? null,
      limit: query.limit,
    });
    return sendSuccess(reply, page);
  });

  fastify.get("/:id/groups/:groupId/members", async (request, reply) => {
    const { groupId } = parseInput(GroupParamsSchema, request.params, "params");
    const { caller, target } = await resolve(request, "fetch_group_members");
    return sendSuccess(reply, await messaging.listMembers(caller, target, groupId));
  });

  fastify.get("/:id/messages", async (request, reply) => {
    const query = parseInput(MessagesQuerySchema, request.query, "query");
    const { caller, target } = await resolve(request, "fetch_messages");
    const page = await messaging.listMessages(caller, target, {
      chatId: query.chatId ?? null,
      cursor: query.cursor ?? null,
      limit: query.limit,
    });
    return sendSuccess(reply, page);
  });

  fastify.get("/:id/stats", async (request, reply) => {
    const query = parseInput(StatsQuerySchema, request.query, "query");
    const { target } = await resolve(request, "stats");
    return sendSuccess(reply, await messaging.stats(target, query.sinceHours));
  });
}
