import type { Configuration, NewConfiguration } from "../modules/store/store.interface.js";

export function newConfiguration(
  overrides: Partial<NewConfiguration> = {},
): NewConfiguration {
  return {
    name: "Main line",
    provider: "whapi",
    token: "test-token",
    deviceId: null,
    accountSid: null,
    senderPhone: null,
    channelId: "channel-1",
    webhookSecret: "test-secret",
    active: true,
    allowedScopes: [],
    policyOverrides: null,
    ...overrides,
  };
}

export function configuration(overrides: Partial<Configuration> = {}): Configuration {
  return {
    id: "cfg-1",
    needsAttention: false,
    attentionReason: null,
    createdAt: "2026-01-01T00:00:00.000Z",
    updatedAt: "2026-01-01T00:00:00.000Z",
    ...newConfiguration(),
    ...overrides,
  };
}
