import { ProviderRegistry } from "../provider.registry.js";
import { missingCredentials } from "./common.js";
import { TwilioProvider } from "./twilio.provider.js";
import { WassengerProvider } from "./wassenger.provider.js";
import { WhapiProvider } from "./whapi.provider.js";

/**
 * PROVIDER BOOTSTRAP
 *
 * Registers every supported provider kind with its factory and default
 * rate-limit policy.
 *
 * To add a new provider:
 *   1. Create `<provider>.provider.ts` implementing WhatsAppProvider
 *   2. Register it here with its credential checks and policy
 *   3. Add the kind to PROVIDER_KINDS in lib/constants.ts
 *
 * Called once during app bootstrap in server.ts.
 */
export function registerProviders(
  registry: ProviderRegistry = new ProviderRegistry(),
): ProviderRegistry {
  registry.register(
    "whapi",
    (configuration) => {
      if (!configuration.token) throw missingCredentials("whapi", ["token"]);
      return new WhapiProvider(configuration.token);
    },
    { ratePerSecond: 10, burst: 20 },
  );

  registry.register(
    "wassenger",
    (configuration) => {
      const { deviceId, token } = configuration;
      if (!deviceId || !token) {
        throw missingCredentials("wassenger", [
          ...(token ? [] : ["token"]),
          ...(deviceId ? [] : ["deviceId"]),
        ]);
      }
      return new WassengerProvider(token, deviceId);
    },
    { ratePerSecond: 5, burst: 10 },
  );

  registry.register(
    "twilio",
    (configuration) => {
      const { accountSid, senderPhone, token } = configuration;
      if (!accountSid || !senderPhone || !token) {
        throw missingCredentials("twilio", [
          ...(accountSid ? [] : ["accountSid"]),
          ...(senderPhone ? [] : ["senderPhone"]),
          ...(token ? [] : ["token"]),
        ]);
      }
      return new TwilioProvider(accountSid, token, senderPhone);
    },
    { ratePerSecond: 10, burst: 20 },
  );

  return registry;
}

export { ProviderRegistry } from "../provider.registry.js";
export type { RateLimitPolicy, ResolvedProvider } from "../provider.registry.js";
export type { WhatsAppProvider } from "../provider.interface.js";
