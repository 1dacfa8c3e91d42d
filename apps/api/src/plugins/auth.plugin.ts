import fp from "fastify-plugin";
import fastifyJwt from "@fastify/jwt";
import type { FastifyInstance, FastifyRequest } from "fastify";
import { GatewayError } from "../lib/errors.js";
import type { CallerRole } from "../types/fastify.js";

const ROLE_HIERARCHY: Record<CallerRole, number> = {
  OPERATOR: 1,
  ADMIN: 2,
};

export interface AuthPluginOptions {
  /** HS256 secret shared with the ERP that issues the tokens. */
  secret: string;
}

async function authPlugin(
  fastify: FastifyInstance,
  options: AuthPluginOptions,
): Promise<void> {
  if (!options.secret) {
    throw new Error("Missing JWT secret. Check JWT_SECRET in your .env file.");
  }

  await fastify.register(fastifyJwt, {
    secret: options.secret,
    verify: { algorithms: ["HS256"] },
  });

  // ---------------------------------------------------------------------------
  // verifyAccessToken
  // Validates the Bearer token from the Authorization header.
  // ---------------------------------------------------------------------------
  fastify.decorate(
    "verifyAccessToken",
    async function (request: FastifyRequest): Promise<void> {
      let payload: Partial<Record<string, unknown>>;
      try {
        payload = await request.jwtVerify<Partial<Record<string, unknown>>>();
      } catch (err) {
        throw new GatewayError("Unauthenticated", "Missing or invalid access token.", {
          cause: err,
        });
      }

      const { type, sub, role, scopes } = payload;
      if (
        type !== "access" ||
        typeof sub !== "string" ||
        (role !== "ADMIN" && role !== "OPERATOR")
      ) {
        throw new GatewayError("Unauthenticated", "Invalid token type.");
      }

      request.user = {
        sub,
        role,
        scopes: Array.isArray(scopes)
          ? scopes.filter((s): s is string => typeof s === "string")
          : [],
        type: "access",
      };
    },
  );

  // ---------------------------------------------------------------------------
  // requireRole
  // Returns a preHandler that enforces a minimum role level.
  // ADMIN > OPERATOR: an ADMIN passes any OPERATOR check.
  // ---------------------------------------------------------------------------
  fastify.decorate(
    "requireRole",
    function (minimumRole: CallerRole) {
      return async function (request: FastifyRequest): Promise<void> {
        const userLevel = ROLE_HIERARCHY[request.user.role];
        const requiredLevel = ROLE_HIERARCHY[minimumRole];

        if (userLevel < requiredLevel) {
          throw new GatewayError("Forbidden", "Insufficient permissions.", {
            details: { requiredRole: minimumRole },
          });
        }
      };
    },
  );
}

export default fp(authPlugin, {
  name: "auth",
  fastify: "5.x",
});
