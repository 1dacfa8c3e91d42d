import fp from "fastify-plugin";
import type { FastifyError, FastifyInstance, FastifyRequest } from "fastify";
import { failureEnvelope, providerOf } from "../lib/envelope.js";
import { GatewayError, httpStatusFor } from "../lib/errors.js";

function hasStatusCode(error: unknown): error is FastifyError {
  return (
    error instanceof Error &&
    "statusCode" in error &&
    typeof error.statusCode === "number"
  );
}

/**
 * Maps anything a route throws onto the taxonomy. Framework errors keep
 * their meaning (body validation, oversized bodies, inbound rate limiting);
 * everything unrecognised becomes Internal with no message leak.
 */
function toEnvelopeError(error: unknown): GatewayError {
  if (error instanceof GatewayError) return error;
  if (hasStatusCode(error)) {
    const status = error.statusCode ?? 500;
    if (status === 413) {
      return new GatewayError("PayloadTooLarge", "Request body too large");
    }
    if (status === 429) {
      return new GatewayError("RateLimited", error.message);
    }
    if (status >= 400 && status < 500) {
      return new GatewayError("InvalidRequest", error.message);
    }
  }
  return new GatewayError("Internal", "An unexpected error occurred.", {
    cause: error,
  });
}

function providerFor(request: FastifyRequest, error: GatewayError) {
  return request.gatewayProvider ?? providerOf(error);
}

async function sensiblePlugin(fastify: FastifyInstance): Promise<void> {
  fastify.decorateRequest("gatewayProvider", null);

  fastify.setErrorHandler((unknownError, request, reply) => {
    const error = toEnvelopeError(unknownError);
    const statusCode = httpStatusFor(error.code);

    if (statusCode >= 500) {
      request.log.error({ err: unknownError, code: error.code }, "request failed");
    } else {
      request.log.info({ code: error.code, reason: error.message }, "request rejected");
    }

    if (error.retryAfterMs !== undefined) {
      reply.header("Retry-After", String(Math.ceil(error.retryAfterMs / 1000)));
    }
    return reply
      .status(statusCode)
      .send(failureEnvelope(error, providerFor(request, error), request.id));
  });

  fastify.setNotFoundHandler((request, reply) => {
    const error = new GatewayError("NotFound", "Route not found.");
    reply.status(404).send(failureEnvelope(error, null, request.id));
  });
}

export default fp(sensiblePlugin, {
  name: "sensible",
  fastify: "5.x",
});
