import { systemClock, type Clock } from "../../lib/clock.js";
import { GatewayError, toGatewayError } from "../../lib/errors.js";
import { moduleLogger } from "../../lib/logger.js";
import type { AuditRecorder } from "../audit/audit.recorder.js";
import type { ResponseCache } from "../cache/response-cache.js";
import type { ProviderRegistry } from "../providers/provider.registry.js";
import type {
  Configuration,
  ConfigurationPatch,
  GatewayStore,
} from "../store/store.interface.js";
import type {
  CreateConfigurationInput,
  UpdateConfigurationInput,
} from "./configurations.schema.js";

const log = moduleLogger("configurations");

export interface ConfigurationDeps {
  store: GatewayStore;
  registry: ProviderRegistry;
  cache: ResponseCache;
  audit: AuditRecorder;
  clock?: Clock | undefined;
}

/** Fields whose change means a different provider account. */
const CREDENTIAL_FIELDS = [
  "token",
  "deviceId",
  "accountSid",
  "senderPhone",
] as const satisfies ReadonlyArray<keyof Configuration>;

/**
 * Builds the adapter for the configuration as if it were active, so missing
 * credentials are reported at write time rather than on the first send.
 *
 * @throws GatewayError UnknownProvider | InvalidConfiguration
 */
function assertUsable(registry: ProviderRegistry, configuration: Configuration): void {
  registry.resolve({ ...configuration, active: true });
}

async function audited<T>(
  deps: ConfigurationDeps,
  actorId: string,
  operation: string,
  configurationId: string | null,
  fn: () => Promise<T>,
): Promise<T> {
  const clock = deps.clock ?? systemClock;
  const startedAt = clock.now();
  let error: GatewayError | null = null;
  try {
    return await fn();
  } catch (err) {
    error = toGatewayError(err);
    throw error;
  } finally {
    await deps.audit.record({
      configurationId,
      provider: null,
      operation,
      success: error === null,
      responseTimeMs: Math.max(0, clock.now() - startedAt),
      errorCode: error?.code ?? null,
      errorMessage: error?.message ?? null,
      attempt: 1,
      actorId,
      requestId: null,
      timestamp: new Date(clock.now()).toISOString(),
    });
  }
}

export async function listConfigurations(
  store: GatewayStore,
  filter: { active?: boolean | undefined },
): Promise<Configuration[]> {
  return filter.active === undefined
    ? store.listConfigurations()
    : store.listConfigurations({ active: filter.active });
}

export async function getConfigurationOrThrow(
  store: GatewayStore,
  id: string,
): Promise<Configuration> {
  const configuration = await store.getConfiguration(id);
  if (!configuration) {
    throw new GatewayError("NotFound", `Configuration ${id} not found`, {
      details: { configurationId: id },
    });
  }
  return configuration;
}

/**
 * Creates an active configuration.
 *
 * @throws GatewayError InvalidConfiguration when the provider's credentials are incomplete
 * @throws GatewayError ConfigurationConflict when another active configuration owns the channel
 */
export async function createConfiguration(
  deps: ConfigurationDeps,
  actorId: string,
  input: CreateConfigurationInput,
): Promise<Configuration> {
  return audited(deps, actorId, "configuration_create", null, async () => {
    const now = new Date((deps.clock ?? systemClock).now()).toISOString();
    assertUsable(deps.registry, {
      ...input,
      id: "new",
      active: true,
      needsAttention: false,
      attentionReason: null,
      createdAt: now,
      updatedAt: now,
    });
    await assertChannelFree(deps.store, input.channelId, null);

    const created = await deps.store.createConfiguration({ ...input, active: true });
    log.info(
      { configurationId: created.id, provider: created.provider, actorId },
      "configuration created",
    );
    return created;
  });
}

/**
 * Applies a partial update. A credential change clears the attention flag
 * left by an earlier AuthError and drops cached listings of the old account.
 */
export async function updateConfiguration(
  deps: ConfigurationDeps,
  actorId: string,
  id: string,
  input: UpdateConfigurationInput,
): Promise<Configuration> {
  return audited(deps, actorId, "configuration_update", id, async () => {
    const existing = await getConfigurationOrThrow(deps.store, id);
    const patch = toPatch(input);
    const merged: Configuration = { ...existing, ...patch };

    assertUsable(deps.registry, merged);
    if (merged.active && merged.channelId !== existing.channelId) {
      await assertChannelFree(deps.store, merged.channelId, id);
    }

    const credentialsChanged = CREDENTIAL_FIELDS.some(
      (field) => merged[field] !== existing[field],
    );
    if (credentialsChanged) {
      patch.needsAttention = false;
      patch.attentionReason = null;
    }

    const updated = await deps.store.updateConfiguration(id, patch);
    if (!updated) {
      throw new GatewayError("NotFound", `Configuration ${id} not found`, {
        details: { configurationId: id },
      });
    }
    if (credentialsChanged) deps.cache.invalidateConfiguration(id);
    return updated;
  });
}

/**
 * Stops using the configuration. Its contacts and groups are flagged
 * inactive; messages, memberships and audit history stay.
 */
export async function deactivateConfiguration(
  deps: ConfigurationDeps,
  actorId: string,
  id: string,
): Promise<Configuration> {
  return audited(deps, actorId, "configuration_deactivate", id, async () => {
    const existing = await getConfigurationOrThrow(deps.store, id);
    if (!existing.active) return existing;

    const updated = await deps.store.updateConfiguration(id, { active: false });
    if (!updated) {
      throw new GatewayError("NotFound", `Configuration ${id} not found`, {
        details: { configurationId: id },
      });
    }
    await deps.store.orphanConfigurationData(id);
    deps.cache.invalidateConfiguration(id);
    log.info({ configurationId: id, actorId }, "configuration deactivated");
    return updated;
  });
}

async function assertChannelFree(
  store: GatewayStore,
  channelId: string,
  selfId: string | null,
): Promise<void> {
  const owner = await store.findActiveByChannelId(channelId);
  if (owner && owner.id !== selfId) {
    throw new GatewayError(
      "ConfigurationConflict",
      `Another active configuration already uses channel ${channelId}`,
      { details: { channelId, configurationId: owner.id } },
    );
  }
}

function toPatch(input: UpdateConfigurationInput): ConfigurationPatch {
  const patch: ConfigurationPatch = {};
  if (input.name !== undefined) patch.name = input.name;
  if (input.token !== undefined) patch.token = input.token;
  if (input.deviceId !== undefined) patch.deviceId = input.deviceId;
  if (input.accountSid !== undefined) patch.accountSid = input.accountSid;
  if (input.senderPhone !== undefined) patch.senderPhone = input.senderPhone;
  if (input.channelId !== undefined) patch.channelId = input.channelId;
  if (input.webhookSecret !== undefined) patch.webhookSecret = input.webhookSecret;
  if (input.allowedScopes !== undefined) patch.allowedScopes = input.allowedScopes;
  if (input.policyOverrides !== undefined) patch.policyOverrides = input.policyOverrides;
  return patch;
}
