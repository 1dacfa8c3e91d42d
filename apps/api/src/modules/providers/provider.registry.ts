import type { ProviderKind } from "@wa-gateway/shared-types";
import { GatewayError } from "../../lib/errors.js";
import type { Configuration } from "../store/store.interface.js";
import type { WhatsAppProvider } from "./provider.interface.js";

export interface RateLimitPolicy {
  /** Token refill rate of the per-configuration bucket. */
  ratePerSecond: number;
  /** Bucket capacity. */
  burst: number;
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Breaker-relevant failures within `failureWindowMs` that open the circuit. */
  failureThreshold: number;
  failureWindowMs: number;
  coolDownMs: number;
  attemptTimeoutMs: number;
  mediaAttemptTimeoutMs: number;
}

export const DEFAULT_POLICY: RateLimitPolicy = {
  ratePerSecond: 10,
  burst: 20,
  maxRetries: 3,
  baseDelayMs: 500,
  maxDelayMs: 8_000,
  failureThreshold: 5,
  failureWindowMs: 60_000,
  coolDownMs: 30_000,
  attemptTimeoutMs: 30_000,
  mediaAttemptTimeoutMs: 60_000,
};

/** Builds an adapter from a configuration; throws InvalidConfiguration on missing credentials. */
export type ProviderFactory = (configuration: Configuration) => WhatsAppProvider;

interface RegistryEntry {
  factory: ProviderFactory;
  policy: RateLimitPolicy;
}

export interface ResolvedProvider {
  provider: WhatsAppProvider;
  policy: RateLimitPolicy;
}

type PolicyOverrides = { readonly [K in keyof RateLimitPolicy]?: number | undefined };

const POLICY_KEYS: ReadonlyArray<keyof RateLimitPolicy> = [
  "ratePerSecond",
  "burst",
  "maxRetries",
  "baseDelayMs",
  "maxDelayMs",
  "failureThreshold",
  "failureWindowMs",
  "coolDownMs",
  "attemptTimeoutMs",
  "mediaAttemptTimeoutMs",
];

/** Undefined override values leave the base value in place. */
export function mergePolicy(
  base: RateLimitPolicy,
  overrides: PolicyOverrides,
): RateLimitPolicy {
  const merged = { ...base };
  for (const key of POLICY_KEYS) {
    const value = overrides[key];
    if (value !== undefined) merged[key] = value;
  }
  return merged;
}

/**
 * Kind → adapter factory + default rate-limit policy.
 *
 * Usage:
 *   // Bootstrap (providers/index.ts)
 *   registry.register("whapi", (c) => new WhapiProvider(c.token), { ratePerSecond: 10 });
 *
 *   // Runtime
 *   const { provider, policy } = registry.resolve(configuration);
 *
 * Adapters are built per call and hold no state, so resolving is cheap and a
 * configuration change takes effect on the next call.
 */
export class ProviderRegistry {
  private readonly _byKind = new Map<ProviderKind, RegistryEntry>();

  /**
   * Registers a provider kind. Throws if the kind is already registered.
   */
  register(
    kind: ProviderKind,
    factory: ProviderFactory,
    policy: PolicyOverrides = {},
  ): void {
    if (this._byKind.has(kind)) {
      throw new Error(
        `Provider "${kind}" is already registered. Each provider kind must be unique.`,
      );
    }
    this._byKind.set(kind, {
      factory,
      policy: mergePolicy(DEFAULT_POLICY, policy),
    });
  }

  /**
   * Returns the adapter and the effective policy (provider defaults merged with
   * the configuration's overrides).
   *
   * @throws GatewayError UnknownProvider | ConfigurationInactive | InvalidConfiguration
   */
  resolve(configuration: Configuration): ResolvedProvider {
    const entry = this._byKind.get(configuration.provider);
    if (!entry) {
      throw new GatewayError(
        "UnknownProvider",
        `Provider "${configuration.provider}" is not registered. ` +
          `Available providers: [${this.list().join(", ")}]`,
        { details: { provider: configuration.provider } },
      );
    }
    if (!configuration.active) {
      throw new GatewayError(
        "ConfigurationInactive",
        `Configuration ${configuration.id} is deactivated`,
        { details: { configurationId: configuration.id } },
      );
    }

    return {
      provider: entry.factory(configuration),
      policy: this.policyFor(configuration),
    };
  }

  /** Effective policy without building an adapter; works for inactive configurations. */
  policyFor(configuration: Configuration): RateLimitPolicy {
    const base = this._byKind.get(configuration.provider)?.policy ?? DEFAULT_POLICY;
    return mergePolicy(base, configuration.policyOverrides ?? {});
  }

  /**
   * Maps a URL segment (e.g. `/webhook/:provider`) onto a registered kind.
   *
   * @throws GatewayError UnknownProvider
   */
  kindOf(name: string): ProviderKind {
    for (const registered of this._byKind.keys()) {
      if (registered === name.toLowerCase()) return registered;
    }
    throw new GatewayError(
      "UnknownProvider",
      `Provider "${name}" is not registered. ` +
        `Available providers: [${this.list().join(", ")}]`,
      { details: { provider: name } },
    );
  }

  list(): ProviderKind[] {
    return [...this._byKind.keys()];
  }
}
