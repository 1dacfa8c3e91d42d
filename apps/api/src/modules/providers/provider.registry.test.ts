import { describe, it, expect } from "vitest";
import { GatewayError } from "../../lib/errors.js";
import { configuration } from "../../test/fixtures.js";
import { DEFAULT_POLICY, ProviderRegistry, mergePolicy } from "./provider.registry.js";
import { registerProviders } from "./providers/index.js";
import { TwilioProvider } from "./providers/twilio.provider.js";
import { WassengerProvider } from "./providers/wassenger.provider.js";
import { WhapiProvider } from "./providers/whapi.provider.js";

function errorOf(fn: () => unknown): GatewayError {
  try {
    fn();
  } catch (err) {
    if (err instanceof GatewayError) return err;
    throw err;
  }
  throw new Error("expected a GatewayError");
}

describe("ProviderRegistry", () => {
  const registry = registerProviders();

  it("lists every built-in provider", () => {
    expect(registry.list()).toEqual(["whapi", "wassenger", "twilio"]);
  });

  it("refuses to register a kind twice", () => {
    expect(() =>
      registry.register("whapi", () => new WhapiProvider("test-token")),
    ).toThrow('Provider "whapi" is already registered');
  });

  it("builds the adapter that matches the configuration", () => {
    expect(registry.resolve(configuration()).provider).toBeInstanceOf(WhapiProvider);
    expect(
      registry.resolve(configuration({ provider: "wassenger", deviceId: "device-1" }))
        .provider,
    ).toBeInstanceOf(WassengerProvider);
    expect(
      registry.resolve(
        configuration({
          provider: "twilio",
          accountSid: "AC-test",
          senderPhone: "+14155550100",
        }),
      ).provider,
    ).toBeInstanceOf(TwilioProvider);
  });

  it("fails with UnknownProvider for an unregistered kind", () => {
    const empty = new ProviderRegistry();

    const err = errorOf(() => empty.resolve(configuration()));

    expect(err.code).toBe("UnknownProvider");
    expect(err.message).toBe('Provider "whapi" is not registered. Available providers: []');
  });

  it("fails with ConfigurationInactive for a deactivated configuration", () => {
    const err = errorOf(() => registry.resolve(configuration({ active: false })));

    expect(err.code).toBe("ConfigurationInactive");
  });

  it("names the missing credentials", () => {
    const err = errorOf(() =>
      registry.resolve(configuration({ provider: "twilio", token: "" })),
    );

    expect(err.code).toBe("InvalidConfiguration");
    expect(err.details["missing"]).toEqual(["accountSid", "senderPhone", "token"]);
  });

  it("requires a device for wassenger", () => {
    const err = errorOf(() => registry.resolve(configuration({ provider: "wassenger" })));

    expect(err.code).toBe("InvalidConfiguration");
    expect(err.details["missing"]).toEqual(["deviceId"]);
  });

  it("merges provider defaults with configuration overrides", () => {
    const { policy } = registry.resolve(
      configuration({
        provider: "wassenger",
        deviceId: "device-1",
        policyOverrides: { burst: 3, maxRetries: undefined },
      }),
    );

    expect(policy).toEqual({ ...DEFAULT_POLICY, ratePerSecond: 5, burst: 3 });
  });

  it("reports the policy of inactive configurations", () => {
    expect(registry.policyFor(configuration({ active: false })).burst).toBe(20);
  });

  it("maps URL segments case-insensitively", () => {
    expect(registry.kindOf("Twilio")).toBe("twilio");
    expect(errorOf(() => registry.kindOf("zapi")).code).toBe("UnknownProvider");
  });
});

describe("mergePolicy", () => {
  it("keeps the base value for undefined overrides", () => {
    expect(mergePolicy(DEFAULT_POLICY, { coolDownMs: undefined })).toEqual(DEFAULT_POLICY);
  });
});
