import { z } from "zod";
import { GatewayError } from "../../lib/errors.js";
import type { WebhookEnvelope } from "../providers/provider.interface.js";

export const WebhookEnvelopeSchema = z.object({
  event_type: z.string().min(1),
  timestamp: z.number().nonnegative(),
  channel_id: z.string().min(1),
  event_id: z.string().min(1).optional(),
  data: z.unknown(),
});

export const WebhookParamsSchema = z.object({
  provider: z.string().min(1),
});

/**
 * Decodes the raw body into an envelope.
 *
 * @throws GatewayError InvalidRequest on malformed JSON or shape
 */
export function parseEnvelope(rawBody: Buffer): WebhookEnvelope {
  let json: unknown;
  try {
    json = JSON.parse(rawBody.toString("utf8"));
  } catch (err) {
    throw new GatewayError("InvalidRequest", "Webhook body is not valid JSON", {
      cause: err,
    });
  }

  const parsed = WebhookEnvelopeSchema.safeParse(json);
  if (!parsed.success) {
    throw new GatewayError("InvalidRequest", "Malformed webhook envelope", {
      details: { issues: parsed.error.issues.map((i) => i.path.join(".")) },
    });
  }

  return {
    event_type: parsed.data.event_type,
    timestamp: parsed.data.timestamp,
    channel_id: parsed.data.channel_id,
    event_id: parsed.data.event_id,
    data: parsed.data.data,
  };
}
