import type { ProviderKind } from "@wa-gateway/shared-types";
import type { GatewayServices } from "../services.js";

export type CallerRole = "ADMIN" | "OPERATOR";

/** Bearer token issued by the ERP; the gateway only verifies it. */
export interface AccessTokenPayload {
  sub: string;
  role: CallerRole;
  /** Owning scopes matched against `Configuration.allowedScopes`. */
  scopes: string[];
  type: "access";
}

declare module "@fastify/jwt" {
  interface FastifyJWT {
    payload: AccessTokenPayload;
    user: AccessTokenPayload;
  }
}

declare module "fastify" {
  interface FastifyInstance {
    services: GatewayServices;
    /**
     * Verifies the Bearer access token from the Authorization header.
     * Populates `request.user` on success; fails with Unauthenticated (401).
     */
    verifyAccessToken: (
      request: import("fastify").FastifyRequest,
      reply: import("fastify").FastifyReply,
    ) => Promise<void>;
    /**
     * Returns a preHandler that enforces a minimum role level.
     *
     * Role hierarchy: ADMIN > OPERATOR
     *
     * Must run after verifyAccessToken:
     * ```ts
     * preHandler: [fastify.requireRole('ADMIN')]
     * ```
     * Fails with Forbidden (403) if the caller's role is insufficient.
     */
    requireRole: (
      minimumRole: CallerRole,
    ) => (
      request: import("fastify").FastifyRequest,
      reply: import("fastify").FastifyReply,
    ) => Promise<void>;
  }

  interface FastifyRequest {
    /**
     * Populated by the `protectedRoutes` hook. Shorthand for `request.user.sub`,
     * written to audit entries.
     */
    actorId: string;
    /** Provider of the configuration a route acted on; reported in envelope meta. */
    gatewayProvider: ProviderKind | null;
  }
}
