import type {
  FailureEnvelope,
  ProviderKind,
  SuccessEnvelope,
} from "@wa-gateway/shared-types";
import type { FastifyReply } from "fastify";
import { isProviderKind } from "./constants.js";
import type { GatewayError } from "./errors.js";

/**
 * Uniform response envelope.
 *
 *   success: { success: true, data, meta: { provider, response_time_ms } }
 *   failure: { success: false, error: { code, message, details }, meta: { provider, request_id } }
 */

export function successEnvelope<T>(
  data: T,
  provider: ProviderKind | null,
  responseTimeMs: number,
): SuccessEnvelope<T> {
  return {
    success: true,
    data,
    meta: { provider, response_time_ms: Math.max(0, Math.round(responseTimeMs)) },
  };
}

export function failureEnvelope(
  error: GatewayError,
  provider: ProviderKind | null,
  requestId: string,
): FailureEnvelope {
  return {
    success: false,
    error: { code: error.code, message: error.message, details: error.details },
    meta: { provider, request_id: requestId },
  };
}

/** Sends `data` in the success envelope, timed from the start of the request. */
export function sendSuccess<T>(
  reply: FastifyReply,
  data: T,
  status = 200,
): FastifyReply {
  return reply
    .status(status)
    .send(successEnvelope(data, reply.request.gatewayProvider, reply.elapsedTime));
}

/** The provider an error names in its details, if any. */
export function providerOf(error: GatewayError): ProviderKind | null {
  const value = error.details["provider"];
  return typeof value === "string" && isProviderKind(value) ? value : null;
}
