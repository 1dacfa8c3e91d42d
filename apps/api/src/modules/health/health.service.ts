import type { ConfigurationHealth, HealthReport } from "@wa-gateway/shared-types";
import { systemClock, type Clock } from "../../lib/clock.js";
import type { ResilientExecutor } from "../resilience/resilient-executor.js";
import type { Configuration, GatewayStore } from "../store/store.interface.js";

export interface HealthDeps {
  store: GatewayStore;
  executor: ResilientExecutor;
  clock?: Clock | undefined;
}

function isDegraded(entry: ConfigurationHealth): boolean {
  return entry.active && (entry.needsAttention || entry.circuit.state !== "CLOSED");
}

async function healthOf(
  deps: HealthDeps,
  configuration: Configuration,
): Promise<ConfigurationHealth> {
  const lastRun = await deps.store.getLastSyncRun(configuration.id);
  return {
    configurationId: configuration.id,
    name: configuration.name,
    provider: configuration.provider,
    active: configuration.active,
    needsAttention: configuration.needsAttention,
    circuit: deps.executor.circuitSnapshot(configuration.id),
    lastSync: lastRun
      ? {
          success: lastRun.success,
          finishedAt: lastRun.finishedAt,
          errorCount: lastRun.errorCount,
          firstError: lastRun.firstError,
        }
      : null,
  };
}

/**
 * Breaker state and last sync outcome per configuration. "degraded" when
 * any active configuration has a circuit that is not CLOSED or was flagged
 * after a credential rejection.
 */
export async function buildHealthReport(deps: HealthDeps): Promise<HealthReport> {
  const configurations = await deps.store.listConfigurations();
  const entries = await Promise.all(configurations.map((c) => healthOf(deps, c)));
  return {
    status: entries.some(isDegraded) ? "degraded" : "ok",
    timestamp: new Date((deps.clock ?? systemClock).now()).toISOString(),
    configurations: entries,
  };
}
