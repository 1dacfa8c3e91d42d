import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { buildTestGateway, type TestGateway } from "../../test/app.js";
import { fakeProvider } from "../../test/fake-provider.js";
import { newConfiguration } from "../../test/fixtures.js";

const BODY = JSON.stringify({
  event_type: "messages",
  timestamp: 1_700_000_000,
  channel_id: "channel-1",
  event_id: "evt-1",
  data: { anything: true },
});

describe("POST /integration/webhook/:provider", () => {
  let gateway: TestGateway;

  beforeEach(async () => {
    gateway = await buildTestGateway(
      fakeProvider({
        normalizeWebhook: vi.fn(() => [
          { kind: "message-removed" as const, providerMessageId: "wamid-1" },
        ]),
      }),
    );
    await gateway.store.createConfiguration(newConfiguration());
  });

  afterEach(async () => {
    await gateway.app.close();
  });

  function post(provider: string, signature: string, body = BODY) {
    return gateway.app.inject({
      method: "POST",
      url: `/integration/webhook/${provider}`,
      headers: { "content-type": "application/json", "x-test-signature": signature },
      payload: body,
    });
  }

  it("accepts a signed event and hands the raw bytes to the signature check", async () => {
    const res = await post("whapi", "test-secret");

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ received: true, duplicate: false, events: 1 });
    expect(gateway.provider.validateWebhookSignature).toHaveBeenCalledWith(
      Buffer.from(BODY),
      "test-secret",
      "test-secret",
    );
  });

  it("answers 200 with duplicate: true on redelivery", async () => {
    await post("whapi", "test-secret");
    const res = await post("whapi", "test-secret");

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ received: true, duplicate: true });
  });

  it("answers 401 in the failure envelope for a bad signature", async () => {
    const res = await post("whapi", "forged");

    expect(res.statusCode).toBe(401);
    expect(res.json()).toMatchObject({
      success: false,
      error: { code: "InvalidSignature", message: "Invalid webhook signature" },
      meta: { provider: "whapi", request_id: expect.any(String) },
    });
  });

  it("answers 404 for an unknown provider segment", async () => {
    const res = await post("zapi", "test-secret");

    expect(res.statusCode).toBe(404);
    expect(res.json()).toMatchObject({
      error: { code: "UnknownProvider" },
      meta: { provider: null },
    });
  });

  it("answers 400 for a malformed envelope", async () => {
    const res = await post("whapi", "test-secret", JSON.stringify({ event_type: "messages" }));

    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({
      error: { code: "InvalidRequest", message: "Malformed webhook envelope" },
    });
  });
});
