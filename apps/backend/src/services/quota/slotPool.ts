import type { Logger } from "pino";
import type { PoolCounts, PoolKey, SlotAssignment } from "../../domain/slot";
import type { SlotStore } from "../../repositories/slotRepository";
import type { SessionLivenessOracle } from "../sessionLiveness";

export interface PoolSnapshot {
  key: PoolKey;
  /** Ordinals with no pending or finished record, lowest first. */
  free: number[];
  counts: PoolCounts;
}

type Occupancy = "pending" | "finished" | "released";

/**
 * Claim and reclaim primitives for one pool of ordinals `0..target-1`.
 * Shared by the session quota (one pool) and the list randomizer (one pool per condition).
 */
export class SlotPool {
  constructor(
    readonly key: PoolKey,
    readonly target: number,
    private readonly store: SlotStore,
    private readonly liveness: SessionLivenessOracle,
    private readonly logger: Logger,
  ) {}

  /**
   * Read the pool and settle pending records whose owners have left.
   */
  inspect(): PoolSnapshot {
    const occupied = new Map<number, "pending" | "finished">();

    for (const record of this.store.readAll(this.key)) {
      if (record.status === "expired" || record.ordinal >= this.target) continue;

      const occupancy = record.status === "pending" ? this.settle(record) : record.status;
      if (occupancy !== "released") {
        occupied.set(record.ordinal, occupancy);
      }
    }

    const free: number[] = [];
    for (let ordinal = 0; ordinal < this.target; ordinal++) {
      if (!occupied.has(ordinal)) free.push(ordinal);
    }

    let pending = 0;
    let finished = 0;
    for (const status of occupied.values()) {
      if (status === "pending") pending++;
      else finished++;
    }

    return {
      key: this.key,
      free,
      counts: { target: this.target, open: free.length, pending, finished },
    };
  }

  /**
   * Insert-if-absent on one ordinal. False means another session holds it.
   */
  claim(ordinal: number, sessionId: string): boolean {
    return this.store.tryClaim(this.key, ordinal, sessionId);
  }

  finish(record: SlotAssignment): boolean {
    return this.store.markFinished(this.key, record.ordinal, record.sessionId);
  }

  private settle(record: SlotAssignment): Occupancy {
    const state = this.liveness.state(record.sessionId);

    if (state === "expired" || state === "aborted") {
      // A failed CAS means another process settled the record first; keep counting it as taken
      if (this.store.markExpired(this.key, record.ordinal, record.sessionId)) {
        this.logger.info(
          { pool: this.key.pool, ordinal: record.ordinal, sessionId: record.sessionId, state },
          "Reclaimed slot from inactive session",
        );
        return "released";
      }
      return "pending";
    }

    if (state === "finished") {
      if (this.finish(record)) {
        this.logger.debug(
          { pool: this.key.pool, ordinal: record.ordinal, sessionId: record.sessionId },
          "Finished slot of completed session",
        );
        return "finished";
      }
      return "pending";
    }

    return "pending";
  }
}
