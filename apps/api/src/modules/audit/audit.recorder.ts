import type { AuditStats, OperationStats } from "@wa-gateway/shared-types";
import type { Logger } from "pino";
import { moduleLogger } from "../../lib/logger.js";
import type {
  AuditQuery,
  GatewayStore,
  NewAuditLogEntry,
} from "../store/store.interface.js";

/**
 * Append-only audit trail of provider calls and webhook outcomes.
 *
 * Recording never fails the caller: when the store rejects the write, the
 * entry goes to the `audit-fallback` logger instead.
 */
export class AuditRecorder {
  constructor(
    private readonly store: GatewayStore,
    private readonly fallback: Logger = moduleLogger("audit-fallback"),
  ) {}

  async record(entry: NewAuditLogEntry): Promise<void> {
    try {
      await this.store.appendAudit(entry);
    } catch (err) {
      this.fallback.error({ err, entry }, "audit write failed");
    }
  }

  async stats(query: AuditQuery): Promise<AuditStats> {
    const entries = await this.store.listAudit(query);

    const byOperation: Record<string, OperationStats> = {};
    let succeeded = 0;
    let totalTimeMs = 0;

    for (const entry of entries) {
      const bucket = byOperation[entry.operation] ?? {
        total: 0,
        succeeded: 0,
        failed: 0,
      };
      bucket.total += 1;
      if (entry.success) {
        bucket.succeeded += 1;
        succeeded += 1;
      } else {
        bucket.failed += 1;
      }
      byOperation[entry.operation] = bucket;
      totalTimeMs += entry.responseTimeMs;
    }

    const total = entries.length;
    return {
      total,
      succeeded,
      failed: total - succeeded,
      successRate: total > 0 ? Math.round((succeeded / total) * 10_000) / 100 : 0,
      avgResponseTimeMs: total > 0 ? Math.round(totalTimeMs / total) : 0,
      byOperation,
    };
  }
}
