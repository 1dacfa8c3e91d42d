import type {
  ResourceSyncOutcome,
  SyncResource,
  SyncRunResult,
} from "@wa-gateway/shared-types";
import { systemClock, type Clock } from "../../lib/clock.js";
import { DEFAULT_PAGE_SIZE, MAX_PAGE_SIZE } from "../../lib/constants.js";
import { GatewayError, toGatewayError } from "../../lib/errors.js";
import { moduleLogger } from "../../lib/logger.js";
import type { ResponseCache } from "../cache/response-cache.js";
import type {
  Page,
  ProviderCallContext,
  RemoteGroupMember,
  WhatsAppProvider,
} from "../providers/provider.interface.js";
import type { ProviderRegistry } from "../providers/provider.registry.js";
import type {
  ExecutionContext,
  ResilientExecutor,
} from "../resilience/resilient-executor.js";
import {
  memberAsContact,
  toContact,
  toGroup,
  toMembership,
  toMessage,
} from "../store/entity.mappers.js";
import type { GatewayStore, UpsertOutcome } from "../store/store.interface.js";
import { RESOURCES_BY_SCOPE, type SyncRunOptions } from "./sync.types.js";

const log = moduleLogger("sync");

/** Stored cursor value of a pass that reached the end of its listing. */
const PASS_COMPLETE = "";

/** Listings ordered newest first; the others have no useful order. */
const NEWEST_FIRST: ReadonlySet<SyncResource> = new Set(["messages"]);

export interface SyncEngineDeps {
  store: GatewayStore;
  registry: ProviderRegistry;
  executor: ResilientExecutor;
  cache: ResponseCache;
  clock?: Clock | undefined;
  /** Used when a run names no page size (SYNC_PAGE_SIZE). */
  defaultPageSize?: number | undefined;
}

/** Everything one resource pass needs, fixed for the duration of a run. */
interface ResourcePass {
  configurationId: string;
  provider: WhatsAppProvider;
  call: ExecutionContext;
  pageSize: number;
  signal: AbortSignal | undefined;
  syncedAt: string;
}

function emptyOutcome(resource: SyncResource): ResourceSyncOutcome {
  return {
    resource,
    status: "success",
    created: 0,
    updated: 0,
    unchanged: 0,
    pages: 0,
    errorCount: 0,
    firstError: null,
    cursor: null,
  };
}

function tally(outcome: ResourceSyncOutcome, result: UpsertOutcome): void {
  outcome[result] += 1;
}

/**
 * Incremental pull of contacts, groups, messages and memberships.
 *
 * Per resource: load the cursor, fetch pages through the resilient executor,
 * upsert every item (last-write-wins), and only then advance the cursor.
 * Finished passes start over on the next run, so remote edits to records
 * already synced are picked up again.
 * A pass stops on the last page, an empty page, a page that changed nothing,
 * cancellation, or an error. Errors stay inside their resource; the other
 * resources still run. Cancellation never rolls back committed pages.
 */
export class SyncEngine {
  private readonly clock: Clock;

  constructor(private readonly deps: SyncEngineDeps) {
    this.clock = deps.clock ?? systemClock;
  }

  /**
   * @throws GatewayError InvalidRequest | NotFound | ConfigurationInactive | InvalidConfiguration | UnknownProvider
   */
  async run(options: SyncRunOptions): Promise<SyncRunResult> {
    const pageSize = options.pageSize ?? this.deps.defaultPageSize ?? DEFAULT_PAGE_SIZE;
    if (!Number.isInteger(pageSize) || pageSize < 1 || pageSize > MAX_PAGE_SIZE) {
      throw new GatewayError(
        "InvalidRequest",
        `pageSize must be an integer between 1 and ${MAX_PAGE_SIZE}`,
        { details: { pageSize } },
      );
    }

    const configuration = await this.deps.store.getConfiguration(options.configurationId);
    if (!configuration) {
      throw new GatewayError(
        "NotFound",
        `Configuration ${options.configurationId} not found`,
        { details: { configurationId: options.configurationId } },
      );
    }
    const { provider, policy } = this.deps.registry.resolve(configuration);

    const startedAt = new Date(this.clock.now()).toISOString();
    const pass: ResourcePass = {
      configurationId: configuration.id,
      provider,
      call: {
        configurationId: configuration.id,
        provider: configuration.provider,
        policy,
        actorId: options.actorId,
        requestId: options.requestId,
      },
      pageSize,
      signal: options.signal,
      syncedAt: startedAt,
    };

    log.info(
      { configurationId: configuration.id, scope: options.scope, pageSize },
      "sync started",
    );

    const resources: ResourceSyncOutcome[] = [];
    for (const resource of RESOURCES_BY_SCOPE[options.scope]) {
      resources.push(await this.syncResource(pass, resource));
    }

    const result: SyncRunResult = {
      configurationId: configuration.id,
      scope: options.scope,
      success: resources.every((r) => r.status === "success"),
      startedAt,
      finishedAt: new Date(this.clock.now()).toISOString(),
      successCount: resources.reduce(
        (sum, r) => sum + r.created + r.updated + r.unchanged,
        0,
      ),
      errorCount: resources.reduce((sum, r) => sum + r.errorCount, 0),
      firstError: resources.find((r) => r.firstError !== null)?.firstError ?? null,
      resources,
    };
    await this.deps.store.saveSyncRun(result);

    log.info(
      {
        configurationId: configuration.id,
        scope: options.scope,
        success: result.success,
        successCount: result.successCount,
        errorCount: result.errorCount,
      },
      "sync finished",
    );
    return result;
  }

  private async syncResource(
    pass: ResourcePass,
    resource: SyncResource,
  ): Promise<ResourceSyncOutcome> {
    const outcome = emptyOutcome(resource);
    const { configurationId, provider, pageSize, syncedAt } = pass;
    const { store } = this.deps;

    try {
      switch (resource) {
        case "contacts":
          await this.syncPages(
            pass,
            outcome,
            (cursor, call) => provider.fetchContacts(cursor, pageSize, call),
            (item) => store.upsertContact(toContact(configurationId, item, syncedAt)),
          );
          break;
        case "groups":
          await this.syncPages(
            pass,
            outcome,
            (cursor, call) => provider.fetchGroups(cursor, pageSize, call),
            (item) => store.upsertGroup(toGroup(configurationId, item, syncedAt)),
          );
          break;
        case "messages":
          await this.syncPages(
            pass,
            outcome,
            (cursor, call) => provider.fetchMessages(null, cursor, pageSize, call),
            (item) => store.upsertMessage(toMessage(configurationId, item, syncedAt)),
          );
          break;
        case "members":
          await this.syncMembers(pass, outcome);
          break;
      }
    } catch (raw) {
      const error = toGatewayError(raw);
      if (error.code === "Cancelled") {
        outcome.status = "cancelled";
      } else {
        outcome.status = "failed";
        outcome.errorCount += 1;
        outcome.firstError ??= { code: error.code, message: error.message };
        log.warn(
          { configurationId, resource, code: error.code, err: error },
          "resource sync failed",
        );
      }
    }

    if (outcome.created + outcome.updated > 0) {
      this.deps.cache.invalidate(configurationId, resource);
    }
    return outcome;
  }

  /**
   * One pass walks a listing from the top. The stored cursor holds the next
   * provider cursor while a pass is unfinished (error, cancellation, or a
   * plateau on an unordered listing) and is emptied when the pass reaches the
   * end, so the following run starts a new pass and sees earlier records
   * again. Its position is the pass start, which keeps it monotonic.
   */
  private async syncPages<T>(
    pass: ResourcePass,
    outcome: ResourceSyncOutcome,
    fetchPage: (cursor: string | null, call: ProviderCallContext) => Promise<Page<T>>,
    upsert: (item: T) => Promise<UpsertOutcome>,
  ): Promise<void> {
    const { store, executor } = this.deps;
    const resource = outcome.resource;
    const stored = await store.getCursor(pass.configurationId, resource);
    const resuming = stored !== null && stored.value !== PASS_COMPLETE;
    const passStartedAt = resuming ? stored.position : this.clock.now();
    let cursor = resuming ? stored.value : null;
    outcome.cursor = cursor;

    const checkpoint = async (next: string | null): Promise<void> => {
      await store.saveCursor({
        configurationId: pass.configurationId,
        resource,
        value: next ?? PASS_COMPLETE,
        position: passStartedAt,
      });
      cursor = next;
      outcome.cursor = next;
    };

    for (;;) {
      if (pass.signal?.aborted) {
        outcome.status = "cancelled";
        return;
      }

      const from = cursor;
      const page = await executor.execute(
        pass.call,
        `fetch_${resource}`,
        (call) => fetchPage(from, call),
        { signal: pass.signal },
      );
      outcome.pages += 1;
      if (page.items.length === 0) {
        await checkpoint(null);
        return;
      }

      let changed = 0;
      for (const item of page.items) {
        const result = await upsert(item);
        tally(outcome, result);
        if (result !== "unchanged") changed += 1;
      }

      // Below a fully known page of a newest-first listing everything is known.
      const plateau = changed === 0;
      const next =
        page.nextCursor === null || (plateau && NEWEST_FIRST.has(resource))
          ? null
          : page.nextCursor.value;
      await checkpoint(next);

      if (next === null || plateau) return;
    }
  }

  /**
   * Reads participants of every active local group and replaces each group's
   * membership set. Unknown participants are added as contacts; known ones
   * are left to the contacts pass. A group the provider no longer knows is
   * recorded and skipped.
   */
  private async syncMembers(
    pass: ResourcePass,
    outcome: ResourceSyncOutcome,
  ): Promise<void> {
    const { store } = this.deps;
    const { configurationId } = pass;
    const groups = (await store.listGroups(configurationId)).filter((g) => g.active);

    for (const group of groups) {
      if (pass.signal?.aborted) {
        outcome.status = "cancelled";
        return;
      }

      const members = await this.fetchMembers(pass, group.providerGroupId, outcome);
      if (members === null) continue;
      outcome.pages += 1;

      let contactsCreated = false;
      for (const member of members) {
        const known = await store.getContact(configurationId, member.providerContactId);
        if (known) {
          tally(outcome, "unchanged");
          continue;
        }
        tally(
          outcome,
          await store.upsertContact(
            toContact(configurationId, memberAsContact(member), pass.syncedAt),
          ),
        );
        contactsCreated = true;
      }
      await store.replaceMemberships(
        configurationId,
        group.providerGroupId,
        members.map((m) => toMembership(configurationId, group.providerGroupId, m)),
      );
      if (contactsCreated) this.deps.cache.invalidate(configurationId, "contacts");
    }

    const position = this.clock.now();
    const value = new Date(position).toISOString();
    await store.saveCursor({ configurationId, resource: "members", value, position });
    outcome.cursor = value;
  }

  /** Null when the provider no longer knows the group. */
  private async fetchMembers(
    pass: ResourcePass,
    groupId: string,
    outcome: ResourceSyncOutcome,
  ): Promise<RemoteGroupMember[] | null> {
    try {
      return await this.deps.executor.execute(
        pass.call,
        "fetch_group_members",
        (call) => pass.provider.fetchGroupMembers(groupId, call),
        { signal: pass.signal },
      );
    } catch (raw) {
      const error = toGatewayError(raw);
      if (error.code !== "NotFound") throw error;
      outcome.status = "failed";
      outcome.errorCount += 1;
      outcome.firstError ??= { code: error.code, message: error.message };
      return null;
    }
  }
}
