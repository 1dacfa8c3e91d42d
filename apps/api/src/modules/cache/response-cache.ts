import { systemClock, type Clock } from "../../lib/clock.js";
import type {
  Page,
  RemoteContact,
  RemoteGroup,
  RemoteGroupMember,
  RemoteMessage,
} from "../providers/provider.interface.js";

/** What each cached resource holds. */
export interface CachedResources {
  contacts: Page<RemoteContact>;
  groups: Page<RemoteGroup>;
  members: RemoteGroupMember[];
  messages: Page<RemoteMessage>;
}

export type CacheResource = keyof CachedResources;

export type CacheQuery = Record<string, string | number | null>;

export const CACHE_TTL_SECONDS: Record<CacheResource, number> = {
  contacts: 3600,
  groups: 1800,
  members: 1800,
  messages: 300,
};

const CACHE_RESOURCES: readonly CacheResource[] = [
  "contacts",
  "groups",
  "members",
  "messages",
];

interface CacheEntry<T> {
  value: T;
  expiresAt: number;
}

type EntryMaps = { [R in CacheResource]: Map<string, CacheEntry<CachedResources[R]>> };
type InFlightMaps = { [R in CacheResource]: Map<string, Promise<CachedResources[R]>> };

/** Every write sweeps its resource, so one-off queries do not pile up. */
function pruneExpired<T>(entries: Map<string, CacheEntry<T>>, now: number): void {
  for (const [key, entry] of entries) {
    if (entry.expiresAt <= now) entries.delete(key);
  }
}

/** Key order does not matter: `{a, b}` and `{b, a}` share an entry. */
function querySignature(query: CacheQuery): string {
  return Object.keys(query)
    .sort()
    .map((key) => `${key}=${String(query[key])}`)
    .join("&");
}

/**
 * Read-through TTL cache in front of provider listings. Never authoritative.
 *
 * Keys are `configId:resource:querySignature`. Concurrent loads of one key
 * share a single in-flight promise. `invalidate` bumps a per-pair generation
 * so a load that started before it cannot write its stale result back.
 */
export class ResponseCache {
  private readonly entries: EntryMaps = {
    contacts: new Map(),
    groups: new Map(),
    members: new Map(),
    messages: new Map(),
  };
  private readonly inFlight: InFlightMaps = {
    contacts: new Map(),
    groups: new Map(),
    members: new Map(),
    messages: new Map(),
  };
  private readonly generations = new Map<string, number>();

  constructor(
    private readonly clock: Clock = systemClock,
    private readonly ttlSeconds: Record<CacheResource, number> = CACHE_TTL_SECONDS,
  ) {}

  async getOrLoad<R extends CacheResource>(
    configurationId: string,
    resource: R,
    query: CacheQuery,
    loader: () => Promise<CachedResources[R]>,
  ): Promise<CachedResources[R]> {
    const key = `${configurationId}:${resource}:${querySignature(query)}`;
    const entries: Map<string, CacheEntry<CachedResources[R]>> = this.entries[resource];
    const inFlight: Map<string, Promise<CachedResources[R]>> = this.inFlight[resource];

    const hit = entries.get(key);
    if (hit) {
      if (hit.expiresAt > this.clock.now()) return hit.value;
      entries.delete(key);
    }

    const pending = inFlight.get(key);
    if (pending) return pending;

    const pair = `${configurationId}:${resource}`;
    const generation = this.generations.get(pair) ?? 0;
    const load: Promise<CachedResources[R]> = (async () => {
      try {
        const value = await loader();
        if ((this.generations.get(pair) ?? 0) === generation) {
          const now = this.clock.now();
          pruneExpired(entries, now);
          entries.set(key, { value, expiresAt: now + this.ttlSeconds[resource] * 1000 });
        }
        return value;
      } finally {
        if (inFlight.get(key) === load) inFlight.delete(key);
      }
    })();
    inFlight.set(key, load);
    return load;
  }

  /** Drops every entry of the pair and orphans loads already running for it. */
  invalidate(configurationId: string, resource: CacheResource): void {
    const pair = `${configurationId}:${resource}`;
    this.generations.set(pair, (this.generations.get(pair) ?? 0) + 1);
    const prefix = `${pair}:`;
    for (const key of [...this.entries[resource].keys()]) {
      if (key.startsWith(prefix)) this.entries[resource].delete(key);
    }
    for (const key of [...this.inFlight[resource].keys()]) {
      if (key.startsWith(prefix)) this.inFlight[resource].delete(key);
    }
  }

  invalidateConfiguration(configurationId: string): void {
    for (const resource of CACHE_RESOURCES) this.invalidate(configurationId, resource);
  }

  /** Entries held across all resources, expired ones included until swept. */
  size(): number {
    return CACHE_RESOURCES.reduce((sum, resource) => sum + this.entries[resource].size, 0);
  }
}
