import type { ProviderKind } from "@wa-gateway/shared-types";
import type { z } from "zod";
import { GatewayError } from "../../../lib/errors.js";
import type { ProviderCallContext } from "../provider.interface.js";

export interface ProviderRequest {
  method: "GET" | "POST" | "DELETE";
  url: string;
  headers: Record<string, string>;
  /** Objects are sent as JSON; FormData and URLSearchParams as-is. */
  body?: Record<string, unknown> | unknown[] | FormData | URLSearchParams | undefined;
  /** Sends map 400/422 to InvalidRecipient, everything else to InvalidRequest. */
  isSend?: boolean | undefined;
}

/** Parses `Retry-After` given either as seconds or as an HTTP date. */
export function parseRetryAfter(
  header: string | null,
  now: number = Date.now(),
): number | undefined {
  if (!header) return undefined;
  const seconds = Number(header);
  if (Number.isFinite(seconds)) return Math.max(0, seconds * 1000);
  const date = Date.parse(header);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, date - now);
}

function encodeBody(
  body: ProviderRequest["body"],
  headers: Record<string, string>,
): { body: string | FormData | URLSearchParams | undefined; headers: Record<string, string> } {
  if (body === undefined) return { body: undefined, headers };
  if (body instanceof FormData || body instanceof URLSearchParams) {
    return { body, headers };
  }
  return {
    body: JSON.stringify(body),
    headers: { "Content-Type": "application/json", ...headers },
  };
}

function describe(payload: unknown): string {
  if (payload && typeof payload === "object") {
    if ("message" in payload && typeof payload.message === "string") {
      return payload.message;
    }
    if ("error" in payload && typeof payload.error === "string") {
      return payload.error;
    }
    if ("detail" in payload && typeof payload.detail === "string") {
      return payload.detail;
    }
  }
  return "no detail";
}

/**
 * Maps an HTTP failure status onto the error taxonomy.
 */
export function errorForStatus(
  provider: ProviderKind,
  status: number,
  payload: unknown,
  options: { isSend: boolean; retryAfterMs?: number | undefined },
): GatewayError {
  const detail = describe(payload);
  const details = { provider, status };
  const message = `${provider} responded ${status}: ${detail}`;

  if (status === 401 || status === 403) {
    return new GatewayError("AuthError", message, { details });
  }
  if (status === 429) {
    return new GatewayError("RateLimited", message, {
      details,
      retryAfterMs: options.retryAfterMs,
    });
  }
  if (status === 404) return new GatewayError("NotFound", message, { details });
  if (status === 413) {
    return new GatewayError("PayloadTooLarge", message, { details });
  }
  if (status === 400 || status === 422) {
    return new GatewayError(
      options.isSend ? "InvalidRecipient" : "InvalidRequest",
      message,
      { details },
    );
  }
  if (status >= 500) return new GatewayError("Transient", message, { details });
  return new GatewayError("InvalidRequest", message, { details });
}

function abortError(provider: ProviderKind, signal: AbortSignal): GatewayError {
  const reason: unknown = signal.reason;
  if (reason instanceof GatewayError) return reason;
  return new GatewayError("Cancelled", `${provider} call cancelled`, {
    details: { provider },
    cause: reason,
  });
}

/**
 * Issues one HTTP call and returns the decoded JSON body.
 * Network failures become Transient; aborts surface the signal's reason.
 */
export async function requestJson(
  provider: ProviderKind,
  request: ProviderRequest,
  ctx: ProviderCallContext,
): Promise<unknown> {
  if (ctx.signal.aborted) throw abortError(provider, ctx.signal);

  const encoded = encodeBody(request.body, request.headers);

  let response: Response;
  try {
    response = await fetch(request.url, {
      method: request.method,
      headers: { Accept: "application/json", ...encoded.headers },
      ...(encoded.body !== undefined ? { body: encoded.body } : {}),
      signal: ctx.signal,
    });
  } catch (networkErr) {
    if (ctx.signal.aborted) throw abortError(provider, ctx.signal);
    throw new GatewayError(
      "Transient",
      `${provider} network error: ${networkErr instanceof Error ? networkErr.message : "Unknown network failure"}`,
      { details: { provider }, cause: networkErr },
    );
  }

  const text = await response.text();
  let payload: unknown = {};
  if (text.length > 0) {
    try {
      payload = JSON.parse(text);
    } catch (parseErr) {
      if (response.ok) {
        throw new GatewayError(
          "Transient",
          `${provider} returned a non-JSON body`,
          { details: { provider, status: response.status }, cause: parseErr },
        );
      }
      payload = { message: text.slice(0, 200) };
    }
  }

  if (!response.ok) {
    throw errorForStatus(provider, response.status, payload, {
      isSend: request.isSend ?? false,
      retryAfterMs: parseRetryAfter(response.headers.get("retry-after")),
    });
  }

  return payload;
}

/** Validates a provider response body against the adapter's zod schema. */
export function parseResponse<T extends z.ZodType>(
  provider: ProviderKind,
  schema: T,
  payload: unknown,
  what: string,
): z.output<T> {
  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    throw new GatewayError(
      "Transient",
      `${provider} returned an unexpected ${what} payload`,
      {
        details: {
          provider,
          issues: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
        },
      },
    );
  }
  return parsed.data;
}
