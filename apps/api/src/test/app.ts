import type { FastifyInstance } from "fastify";
import type { CallerRole } from "../types/fastify.js";
import type { WhatsAppProvider } from "../modules/providers/provider.interface.js";
import type { ProviderRegistry } from "../modules/providers/provider.registry.js";
import { MemoryGatewayStore } from "../modules/store/memory.store.js";
import { MemoryIdempotencyStore } from "../modules/webhooks/idempotency.store.js";
import { buildApp } from "../server.js";
import { createServices, type GatewayServices } from "../services.js";
import { FakeClock } from "./clock.js";
import { fakeProvider, registryFor } from "./fake-provider.js";

export const TEST_JWT_SECRET = "test-secret-test-secret";

export interface TestGateway {
  app: FastifyInstance;
  services: GatewayServices;
  store: MemoryGatewayStore;
  idempotency: MemoryIdempotencyStore;
  provider: WhatsAppProvider;
  clock: FakeClock;
}

/**
 * Full app on in-memory collaborators. Unless a registry is given, every
 * whapi configuration gets `provider`.
 */
export async function buildTestGateway(
  provider: WhatsAppProvider = fakeProvider(),
  registry: ProviderRegistry = registryFor(provider),
): Promise<TestGateway> {
  const clock = new FakeClock();
  const store = new MemoryGatewayStore(() => new Date(clock.now()));
  const idempotency = new MemoryIdempotencyStore(clock);
  const services = createServices({
    store,
    idempotency,
    registry,
    clock,
  });
  const app = await buildApp({ services, jwtSecret: TEST_JWT_SECRET });
  await app.ready();
  return { app, services, store, idempotency, provider, clock };
}

export function bearer(
  app: FastifyInstance,
  claims: { sub?: string; role?: CallerRole; scopes?: string[] } = {},
): { authorization: string } {
  const token = app.jwt.sign({
    sub: claims.sub ?? "erp-user-1",
    role: claims.role ?? "OPERATOR",
    scopes: claims.scopes ?? [],
    type: "access",
  });
  return { authorization: `Bearer ${token}` };
}
