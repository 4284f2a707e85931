/**
 * In-memory wiring shared by the allocator, repository and route tests.
 */

import pino from "pino";
import type Database from "better-sqlite3";
import { openDatabase } from "../db/connection";
import { runMigrations } from "../migrate";
import { ExperimentSessionRepository } from "../repositories/experimentSessionRepository";
import { QuotaDefinitionRepository } from "../repositories/quotaDefinitionRepository";
import { SqliteSlotStore } from "../repositories/slotRepository";
import { ExperimentSessionLiveness } from "../services/sessionLiveness";
import type { SlotQuotaDeps } from "../services/quota/slotQuota";

export const silentLogger = pino({ level: "silent" });

export const T0 = 1_700_000_000_000;

export class ManualClock {
  constructor(public current: number = T0) {}

  now = (): number => this.current;

  advance(ms: number): void {
    this.current += ms;
  }
}

export function createTestDb(): Database.Database {
  const db = openDatabase(":memory:");
  runMigrations(db);
  return db;
}

export function createHarness(clock: ManualClock = new ManualClock()) {
  const db = createTestDb();
  const store = new SqliteSlotStore(db, clock.now);
  const sessions = new ExperimentSessionRepository(db, clock.now);
  const definitions = new QuotaDefinitionRepository(db, clock.now);
  const liveness = new ExperimentSessionLiveness(sessions, clock.now);
  const deps: SlotQuotaDeps = { store, liveness, definitions, logger: silentLogger };

  const startSession = (id: string, timeoutMs = 60_000) => sessions.create({ id, timeout_ms: timeoutMs });

  return { clock, db, store, sessions, definitions, liveness, deps, startSession };
}

export type Harness = ReturnType<typeof createHarness>;
