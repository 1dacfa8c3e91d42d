import { createHash, createHmac, timingSafeEqual } from "node:crypto";
import type { MessageType, ProviderKind } from "@wa-gateway/shared-types";
import { GatewayError } from "../../../lib/errors.js";
import {
  GROUP_SUFFIX,
  MESSAGE_TYPES,
  MIN_PHONE_DIGITS,
} from "../../../lib/constants.js";
import type { SendMediaInput, WebhookEnvelope } from "../provider.interface.js";

export type Recipient =
  | { kind: "group"; wireId: string }
  | { kind: "phone"; digits: string };

/**
 * Group wire ids pass through untouched; anything else is reduced to its
 * digits ("+55 (11) 99999-0000" and "5511999990000@s.whatsapp.net" both
 * become "5511999990000").
 */
export function normalizeRecipient(
  provider: ProviderKind,
  to: string,
): Recipient {
  const trimmed = to.trim();
  if (trimmed.endsWith(GROUP_SUFFIX)) {
    return { kind: "group", wireId: trimmed };
  }
  const local = trimmed.includes("@") ? trimmed.slice(0, trimmed.indexOf("@")) : trimmed;
  const digits = local.replace(/\D/g, "");
  if (digits.length < MIN_PHONE_DIGITS) {
    throw new GatewayError(
      "InvalidRecipient",
      `Recipient "${to}" is not a valid phone number or group id`,
      { details: { provider, to } },
    );
  }
  return { kind: "phone", digits };
}

export function assertMediaSize(
  provider: ProviderKind,
  input: SendMediaInput,
  maxMediaBytes: number,
): void {
  if (input.bytes.byteLength > maxMediaBytes) {
    throw new GatewayError(
      "PayloadTooLarge",
      `${input.filename} is ${input.bytes.byteLength} bytes; ${provider} accepts at most ${maxMediaBytes}`,
      { details: { provider, size: input.bytes.byteLength, maxMediaBytes } },
    );
  }
}

/**
 * Recomputes the HMAC of the raw body and compares it to the header value
 * with timingSafeEqual. Length mismatch short-circuits to false.
 */
export function hmacMatches(
  algorithm: "sha256" | "sha1",
  encoding: "hex" | "base64",
  rawBody: Buffer,
  headerSignature: string,
  secret: string,
): boolean {
  if (!headerSignature || !secret) return false;
  const expected = Buffer.from(
    createHmac(algorithm, secret).update(rawBody).digest(encoding),
    "utf-8",
  );
  const received = Buffer.from(headerSignature.trim(), "utf-8");
  return (
    expected.length === received.length && timingSafeEqual(expected, received)
  );
}

/** Used when the envelope carries no `event_id` and the payload has no natural id. */
export function contentEventId(envelope: WebhookEnvelope): string {
  return createHash("sha256")
    .update(`${envelope.event_type}:${envelope.timestamp}:${JSON.stringify(envelope.data)}`)
    .digest("hex");
}

function isMessageType(value: string): value is MessageType {
  return MESSAGE_TYPES.some((type) => type === value);
}

function titleCase(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

/**
 * Collapses provider message kinds onto the five stored types.
 * Unsupported kinds (sticker, location, poll…) become text with a placeholder.
 */
export function normalizeMessageKind(
  rawType: string,
  text: string,
  caption: string,
): { type: MessageType; content: string } {
  const kind = rawType.toLowerCase();
  if (kind === "text" || kind === "chat") return { type: "text", content: text };
  if (isMessageType(kind)) {
    return { type: kind, content: caption || `${titleCase(kind)} message` };
  }
  return { type: "text", content: `${titleCase(kind || "unknown")} message` };
}

/** Provider timestamps arrive in seconds or milliseconds. */
export function toEpochMs(value: number): number {
  return value > 0 && value < 1e12 ? value * 1000 : value;
}

export function missingCredentials(
  provider: ProviderKind,
  fields: string[],
): GatewayError {
  return new GatewayError(
    "InvalidConfiguration",
    `${provider} configuration is missing: ${fields.join(", ")}`,
    { details: { provider, missing: fields } },
  );
}
