import { systemClock, type Clock } from "./lib/clock.js";
import { AuditRecorder } from "./modules/audit/audit.recorder.js";
import { ResponseCache } from "./modules/cache/response-cache.js";
import type { ConfigurationDeps } from "./modules/configurations/configurations.service.js";
import type { HealthDeps } from "./modules/health/health.service.js";
import { MessagingService } from "./modules/messaging/messaging.service.js";
import type { ProviderRegistry } from "./modules/providers/provider.registry.js";
import { registerProviders } from "./modules/providers/providers/index.js";
import { ResilientExecutor } from "./modules/resilience/resilient-executor.js";
import type { GatewayStore } from "./modules/store/store.interface.js";
import { SyncEngine } from "./modules/sync/sync.engine.js";
import type { IdempotencyStore } from "./modules/webhooks/idempotency.store.js";
import type { WebhookDeps } from "./modules/webhooks/webhooks.service.js";

/**
 * Everything a route needs, built once per process and decorated onto the
 * Fastify instance as `fastify.services`.
 */
export interface GatewayServices {
  store: GatewayStore;
  registry: ProviderRegistry;
  cache: ResponseCache;
  audit: AuditRecorder;
  executor: ResilientExecutor;
  sync: SyncEngine;
  messaging: MessagingService;
  webhooks: WebhookDeps;
  configurations: ConfigurationDeps;
  health: HealthDeps;
}

export interface ServiceOptions {
  store: GatewayStore;
  idempotency: IdempotencyStore;
  /** Defaults to the three built-in adapters. */
  registry?: ProviderRegistry | undefined;
  clock?: Clock | undefined;
  /** Overall budget of one outbound call, including retries. */
  callTimeoutMs?: number | undefined;
  syncPageSize?: number | undefined;
  webhookDedupTtlSeconds?: number | undefined;
}

export function createServices(options: ServiceOptions): GatewayServices {
  const { store, idempotency } = options;
  const clock = options.clock ?? systemClock;
  const registry = options.registry ?? registerProviders();
  const cache = new ResponseCache(clock);
  const audit = new AuditRecorder(store);
  const executor = new ResilientExecutor({
    store,
    audit,
    clock,
    defaultTimeoutMs: options.callTimeoutMs,
  });

  return {
    store,
    registry,
    cache,
    audit,
    executor,
    sync: new SyncEngine({
      store,
      registry,
      executor,
      cache,
      clock,
      defaultPageSize: options.syncPageSize,
    }),
    messaging: new MessagingService({ store, registry, executor, cache, audit, clock }),
    webhooks: {
      store,
      registry,
      idempotency,
      audit,
      cache,
      clock,
      dedupTtlMs: (options.webhookDedupTtlSeconds ?? 24 * 60 * 60) * 1000,
    },
    configurations: { store, registry, cache, audit, clock },
    health: { store, executor, clock },
  };
}
