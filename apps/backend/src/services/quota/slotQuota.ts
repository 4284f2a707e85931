import type { Logger } from "pino";
import { ConditionInconsistencyError, ConfigurationError, SessionNotPermittedError } from "../../domain/errors";
import {
  QUOTA_FULL,
  type AssignResult,
  type ConditionTarget,
  type PoolCounts,
  type QuotaDefinition,
  type QuotaKind,
  type QuotaNamespace,
} from "../../domain/slot";
import type { QuotaDefinitionRepository } from "../../repositories/quotaDefinitionRepository";
import type { SlotStore } from "../../repositories/slotRepository";
import type { SessionLivenessOracle } from "../sessionLiveness";
import { seededRandom, shuffled, type RandomSource } from "./random";
import { SlotPool, type PoolSnapshot } from "./slotPool";

export interface SlotQuotaDeps {
  store: SlotStore;
  liveness: SessionLivenessOracle;
  definitions: QuotaDefinitionRepository;
  logger: Logger;
}

export interface SlotQuotaOptions {
  /** Identifies the quota; several quotas can share one store. */
  name: string;
  /** Experiment revision. Slots of other revisions are never read. */
  version: string;
  /** When false, every revision shares the same slots. Defaults to true. */
  respectVersion?: boolean;
  /** Only these sessions may take part. Unset means everyone. */
  sessionIds?: readonly string[];
  /** Seed for the per-call condition order. Defaults to Math.random. */
  randomSeed?: number | string;
}

export interface QuotaStatus {
  name: string;
  version: string;
  full: boolean;
  allFinished: boolean;
  nSlots: number;
  nOpen: number;
  nPending: number;
  nFinished: number;
  conditions: Record<string, PoolCounts>;
}

const sameConditions = (a: ConditionTarget[], b: ConditionTarget[]): boolean => {
  if (a.length !== b.length) return false;
  const targets = new Map(a.map((condition) => [condition.name, condition.target]));
  return b.every((condition) => targets.get(condition.name) === condition.target);
};

/**
 * Allocates sessions to slots spread over one or more pools.
 *
 * Each call to `assign` visits the pools in a fresh random order, reclaims
 * slots of sessions that expired or aborted, and claims the lowest free ordinal
 * with a single insert-if-absent. A lost claim moves on to the next pool; the
 * ordinal is not retried. No in-process locking is involved: the store's
 * uniqueness constraints decide every race.
 */
export abstract class SlotQuota {
  readonly name: string;
  readonly version: string;
  protected readonly pools: SlotPool[];
  protected readonly logger: Logger;
  private readonly store: SlotStore;
  private readonly allowed: ReadonlySet<string> | null;
  private readonly random: RandomSource;

  protected constructor(
    kind: QuotaKind,
    conditions: ConditionTarget[],
    options: SlotQuotaOptions,
    deps: SlotQuotaDeps,
  ) {
    const name = options.name.trim();
    if (!name) {
      throw new ConfigurationError("Quota name must not be empty");
    }
    if (conditions.length === 0) {
      throw new ConfigurationError(`Quota "${name}" needs at least one condition`);
    }
    for (const condition of conditions) {
      if (!Number.isInteger(condition.target) || condition.target <= 0) {
        throw new ConfigurationError(
          `Quota "${name}": target for "${condition.name}" must be a positive integer, got ${condition.target}`,
        );
      }
    }
    if (options.sessionIds !== undefined && options.sessionIds.length === 0) {
      throw new ConfigurationError(`Quota "${name}": sessionIds must list at least one session`);
    }

    this.name = name;
    this.version = options.respectVersion === false ? "" : options.version;
    this.store = deps.store;
    this.allowed = options.sessionIds ? new Set(options.sessionIds) : null;
    this.random = options.randomSeed !== undefined ? seededRandom(options.randomSeed) : Math.random;
    this.logger = deps.logger.child({ quota: this.name, version: this.version });

    this.assertConsistent(deps.definitions, { kind, conditions });

    this.pools = conditions.map(
      (condition) =>
        new SlotPool(
          { ...this.namespace, pool: condition.name },
          condition.target,
          deps.store,
          deps.liveness,
          this.logger,
        ),
    );
  }

  get namespace(): QuotaNamespace {
    return { quota: this.name, version: this.version };
  }

  get conditions(): string[] {
    return this.pools.map((pool) => pool.key.pool);
  }

  /** Total number of slots over all conditions. */
  get nSlots(): number {
    return this.pools.reduce((sum, pool) => sum + pool.target, 0);
  }

  /**
   * Find or claim a slot for the session.
   *
   * Repeated calls for the same session return the same condition without
   * writing. Returns `{ kind: "full" }` when no pool yields a slot.
   *
   * @throws SessionNotPermittedError when the session is not on the allow-list
   * @throws StoreUnavailableError when the store fails
   */
  assign(sessionId: string): AssignResult {
    if (this.allowed && !this.allowed.has(sessionId)) {
      throw new SessionNotPermittedError(this.name, sessionId);
    }

    const existing = this.ownAssignment(sessionId);
    if (existing) {
      this.logger.debug({ sessionId, condition: existing.condition }, "Session already holds a slot");
      return existing;
    }

    for (const pool of shuffled(this.pools, this.random)) {
      const snapshot = pool.inspect();
      const ordinal = snapshot.free[0];
      if (ordinal === undefined) continue;

      if (pool.claim(ordinal, sessionId)) {
        this.logger.info({ sessionId, condition: pool.key.pool, ordinal }, "Assigned slot");
        return { kind: "assigned", condition: pool.key.pool, ordinal, status: "pending", reused: false };
      }

      // Either another session took the ordinal, or this session was seated by a concurrent request
      const raced = this.ownAssignment(sessionId);
      if (raced) return raced;

      this.logger.debug({ sessionId, condition: pool.key.pool, ordinal }, "Lost slot claim, trying next condition");
    }

    this.logger.info({ sessionId }, "Quota full");
    return QUOTA_FULL;
  }

  /**
   * Mark the session's slot as finished. False when the session holds no slot.
   */
  markFinished(sessionId: string): boolean {
    const record = this.store.findActiveBySession(this.namespace, sessionId);
    if (!record) return false;

    const pool = this.pools.find((candidate) => candidate.key.pool === record.pool);
    if (!pool) return false;

    const finished = pool.finish(record);
    if (finished && record.status === "pending") {
      this.logger.info({ sessionId, condition: record.pool, ordinal: record.ordinal }, "Slot finished");
    }
    return finished;
  }

  /** No condition has a free slot. */
  get full(): boolean {
    return this.inspectAll().every((snapshot) => snapshot.counts.open === 0);
  }

  get nOpen(): number {
    return this.sumCounts("open");
  }

  get nPending(): number {
    return this.sumCounts("pending");
  }

  get nFinished(): number {
    return this.sumCounts("finished");
  }

  get allFinished(): boolean {
    return this.nFinished === this.nSlots;
  }

  /**
   * One consistent pass over all pools. Counts may lag behind concurrent writers.
   */
  status(): QuotaStatus {
    const snapshots = this.inspectAll();
    const conditions: Record<string, PoolCounts> = {};
    let nOpen = 0;
    let nPending = 0;
    let nFinished = 0;
    for (const snapshot of snapshots) {
      conditions[snapshot.key.pool] = snapshot.counts;
      nOpen += snapshot.counts.open;
      nPending += snapshot.counts.pending;
      nFinished += snapshot.counts.finished;
    }

    return {
      name: this.name,
      version: this.version,
      full: nOpen === 0,
      allFinished: nFinished === this.nSlots,
      nSlots: this.nSlots,
      nOpen,
      nPending,
      nFinished,
      conditions,
    };
  }

  private ownAssignment(sessionId: string): Extract<AssignResult, { kind: "assigned" }> | undefined {
    const record = this.store.findActiveBySession(this.namespace, sessionId);
    if (!record || record.status === "expired") return undefined;

    return {
      kind: "assigned",
      condition: record.pool,
      ordinal: record.ordinal,
      status: record.status,
      reused: true,
    };
  }

  private inspectAll(): PoolSnapshot[] {
    return this.pools.map((pool) => pool.inspect());
  }

  private sumCounts(field: "open" | "pending" | "finished"): number {
    return this.inspectAll().reduce((sum, snapshot) => sum + snapshot.counts[field], 0);
  }

  private assertConsistent(definitions: QuotaDefinitionRepository, definition: QuotaDefinition): void {
    const stored = definitions.ensure(this.namespace, definition);
    if (stored.kind !== definition.kind || !sameConditions(stored.conditions, definition.conditions)) {
      throw new ConditionInconsistencyError(
        `Quota "${this.name}" (version "${this.version}") was started with a different condition layout. ` +
          "Increase the experiment version to start a fresh allocation.",
        this.name,
        this.version,
      );
    }
  }
}
