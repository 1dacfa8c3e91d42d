import type { FastifyReply, FastifyRequest } from "fastify";
import type { Configuration } from "../modules/store/store.interface.js";
import type { CallerRole } from "../types/fastify.js";
import { GatewayError } from "./errors.js";

/** The authenticated party on whose behalf a provider call is made. */
export interface Caller {
  actorId: string;
  role: CallerRole;
  scopes: string[];
  requestId: string | null;
}

export function callerOf(request: FastifyRequest): Caller {
  return {
    actorId: request.actorId,
    role: request.user.role,
    scopes: request.user.scopes,
    requestId: request.id,
  };
}

/**
 * A configuration with `allowedScopes` is only usable by callers holding one
 * of them; ADMIN callers and configurations without scopes are unrestricted.
 *
 * @throws GatewayError Forbidden
 */
export function assertScope(caller: Caller, configuration: Configuration): void {
  if (caller.role === "ADMIN" || configuration.allowedScopes.length === 0) return;
  if (caller.scopes.some((scope) => configuration.allowedScopes.includes(scope))) return;
  throw new GatewayError(
    "Forbidden",
    `Caller may not use configuration ${configuration.id}`,
    { details: { configurationId: configuration.id } },
  );
}

/** Aborts when the client goes away before the reply is written. */
export function disconnectSignal(reply: FastifyReply): AbortSignal {
  const controller = new AbortController();
  reply.raw.once("close", () => {
    if (!reply.raw.writableFinished) controller.abort();
  });
  return controller.signal;
}
