import type Database from "better-sqlite3";
import type { PoolKey, QuotaNamespace, SlotAssignment, SlotStatus } from "../domain/slot";
import { guardStore } from "./storeGuard";

/**
 * Durable slot records consumed by the allocator.
 *
 * Every mutation is a single conditional write. `tryClaim` is the only
 * contention primitive: it must be an insert-if-absent against the store,
 * never a read followed by a write.
 */
export interface SlotStore {
  /** All records of a pool, including expired ones, ordered by ordinal then age. */
  readAll(key: PoolKey): SlotAssignment[];
  /** The pending or finished record held by a session in this namespace, if any. */
  findActiveBySession(namespace: QuotaNamespace, sessionId: string): SlotAssignment | undefined;
  /** Create a pending record for the ordinal unless it is occupied. False on conflict. */
  tryClaim(key: PoolKey, ordinal: number, sessionId: string): boolean;
  /** pending|finished → finished. Idempotent. */
  markFinished(key: PoolKey, ordinal: number, sessionId: string): boolean;
  /** pending → expired, only while the given session still owns the ordinal. */
  markExpired(key: PoolKey, ordinal: number, sessionId: string): boolean;
}

interface SlotAssignmentRow {
  quota_name: string;
  version: string;
  pool: string;
  ordinal: number;
  session_id: string;
  status: SlotStatus;
  created_at: number;
  updated_at: number;
}

type PoolParams = { quota: string; version: string; pool: string };
type SlotParams = PoolParams & { ordinal: number; session_id: string; timestamp: number };

export class SqliteSlotStore implements SlotStore {
  constructor(
    private readonly db: Database.Database,
    private readonly now: () => number = Date.now,
  ) {}

  readAll(key: PoolKey): SlotAssignment[] {
    return guardStore("readAll", () =>
      this.db
        .prepare<PoolParams, SlotAssignmentRow>(
          `SELECT * FROM slot_assignments
           WHERE quota_name = @quota AND version = @version AND pool = @pool
           ORDER BY ordinal ASC, id ASC`,
        )
        .all({ quota: key.quota, version: key.version, pool: key.pool })
        .map((row) => this.mapRow(row)),
    );
  }

  findActiveBySession(namespace: QuotaNamespace, sessionId: string): SlotAssignment | undefined {
    return guardStore("findActiveBySession", () => {
      const row = this.db
        .prepare<{ quota: string; version: string; session_id: string }, SlotAssignmentRow>(
          `SELECT * FROM slot_assignments
           WHERE quota_name = @quota AND version = @version AND session_id = @session_id
             AND status IN ('pending', 'finished')
           LIMIT 1`,
        )
        .get({ quota: namespace.quota, version: namespace.version, session_id: sessionId });

      return row ? this.mapRow(row) : undefined;
    });
  }

  tryClaim(key: PoolKey, ordinal: number, sessionId: string): boolean {
    return guardStore("tryClaim", () => {
      // Conflicts on either partial unique index (slot taken, or session already seated) are ignored
      const result = this.db
        .prepare<SlotParams>(
          `INSERT INTO slot_assignments (
            quota_name, version, pool, ordinal, session_id, status, created_at, updated_at
          ) VALUES (@quota, @version, @pool, @ordinal, @session_id, 'pending', @timestamp, @timestamp)
          ON CONFLICT DO NOTHING`,
        )
        .run(this.slotParams(key, ordinal, sessionId));

      return result.changes === 1;
    });
  }

  markFinished(key: PoolKey, ordinal: number, sessionId: string): boolean {
    return guardStore("markFinished", () => {
      const result = this.db
        .prepare<SlotParams>(
          `UPDATE slot_assignments
           SET status = 'finished',
               updated_at = CASE WHEN status = 'finished' THEN updated_at ELSE @timestamp END
           WHERE quota_name = @quota AND version = @version AND pool = @pool
             AND ordinal = @ordinal AND session_id = @session_id
             AND status IN ('pending', 'finished')`,
        )
        .run(this.slotParams(key, ordinal, sessionId));

      return result.changes === 1;
    });
  }

  markExpired(key: PoolKey, ordinal: number, sessionId: string): boolean {
    return guardStore("markExpired", () => {
      const result = this.db
        .prepare<SlotParams>(
          `UPDATE slot_assignments
           SET status = 'expired',
               updated_at = @timestamp
           WHERE quota_name = @quota AND version = @version AND pool = @pool
             AND ordinal = @ordinal AND session_id = @session_id
             AND status = 'pending'`,
        )
        .run(this.slotParams(key, ordinal, sessionId));

      return result.changes === 1;
    });
  }

  private slotParams(key: PoolKey, ordinal: number, sessionId: string): SlotParams {
    return {
      quota: key.quota,
      version: key.version,
      pool: key.pool,
      ordinal,
      session_id: sessionId,
      timestamp: this.now(),
    };
  }

  private mapRow(row: SlotAssignmentRow): SlotAssignment {
    return {
      quota: row.quota_name,
      version: row.version,
      pool: row.pool,
      ordinal: row.ordinal,
      sessionId: row.session_id,
      status: row.status,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }
}
