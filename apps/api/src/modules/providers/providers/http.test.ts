import { describe, it, expect, afterEach, vi } from "vitest";
import { z } from "zod";
import { ctx, jsonResponse, stubFetch } from "../../../test/fetch.js";
import { GatewayError } from "../../../lib/errors.js";
import { errorForStatus, parseResponse, parseRetryAfter, requestJson } from "./http.js";

describe("parseRetryAfter", () => {
  it("reads delta seconds", () => {
    expect(parseRetryAfter("3")).toBe(3_000);
  });

  it("reads an HTTP date relative to now", () => {
    const now = Date.parse("2026-03-01T12:00:00.000Z");
    expect(parseRetryAfter("Sun, 01 Mar 2026 12:00:10 GMT", now)).toBe(10_000);
  });

  it("returns undefined for missing or unparseable values", () => {
    expect(parseRetryAfter(null)).toBeUndefined();
    expect(parseRetryAfter("soon")).toBeUndefined();
  });
});

describe("errorForStatus", () => {
  it("distinguishes send from non-send 400s", () => {
    expect(errorForStatus("whapi", 400, {}, { isSend: true }).code).toBe("InvalidRecipient");
    expect(errorForStatus("whapi", 400, {}, { isSend: false }).code).toBe("InvalidRequest");
  });

  it("falls back to InvalidRequest for other 4xx", () => {
    const err = errorForStatus("twilio", 409, { detail: "conflict" }, { isSend: false });

    expect(err.code).toBe("InvalidRequest");
    expect(err.message).toBe("twilio responded 409: conflict");
    expect(err.details).toEqual({ provider: "twilio", status: 409 });
  });
});

describe("requestJson", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("decodes an empty body as an empty object", async () => {
    stubFetch(() => new Response("", { status: 200 }));

    await expect(
      requestJson("whapi", { method: "GET", url: "https://example.test/x", headers: {} }, ctx()),
    ).resolves.toEqual({});
  });

  it("treats a non-JSON success body as Transient", async () => {
    stubFetch(() => new Response("<html>", { status: 200 }));

    await expect(
      requestJson("whapi", { method: "GET", url: "https://example.test/x", headers: {} }, ctx()),
    ).rejects.toMatchObject({ code: "Transient" });
  });

  it("keeps the text of a non-JSON error body in the message", async () => {
    stubFetch(() => new Response("gateway down", { status: 503 }));

    await expect(
      requestJson("whapi", { method: "GET", url: "https://example.test/x", headers: {} }, ctx()),
    ).rejects.toMatchObject({ code: "Transient", message: "whapi responded 503: gateway down" });
  });

  it("does not call fetch when the signal is already aborted", async () => {
    const spy = stubFetch(() => jsonResponse({}));
    const controller = new AbortController();
    controller.abort(new GatewayError("Timeout", "budget exhausted"));

    await expect(
      requestJson(
        "whapi",
        { method: "GET", url: "https://example.test/x", headers: {} },
        { signal: controller.signal },
      ),
    ).rejects.toMatchObject({ code: "Timeout" });
    expect(spy).not.toHaveBeenCalled();
  });
});

describe("parseResponse", () => {
  it("lists the failing paths in the error details", () => {
    try {
      parseResponse("whapi", z.object({ id: z.string() }), { id: 1 }, "send");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(GatewayError);
      expect(err).toMatchObject({
        code: "Transient",
        message: "whapi returned an unexpected send payload",
      });
    }
  });
});
