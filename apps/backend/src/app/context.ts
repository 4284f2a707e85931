/**
 * AppContext: composition root for the slot allocation backend.
 *
 * createContext() opens the database, applies migrations, loads the quota
 * configuration and wires repositories and services. server.ts stays a thin
 * HTTP shell around it.
 */

import pino, { type Logger } from "pino";
import type Database from "better-sqlite3";

import { runtimeConfig, type RuntimeConfig } from "../config";
import { openDatabase } from "../db/connection";
import { runMigrations } from "../migrate";
import { ExperimentSessionRepository } from "../repositories/experimentSessionRepository";
import { QuotaDefinitionRepository } from "../repositories/quotaDefinitionRepository";
import { SqliteSlotStore, type SlotStore } from "../repositories/slotRepository";
import { ExperimentSessionService } from "../services/experimentSessionService";
import { ExperimentSessionLiveness } from "../services/sessionLiveness";
import { QuotaRegistry, loadQuotaConfig, type QuotaEntry } from "../services/quota/quotaRegistry";

export { runtimeConfig };

// -----------------------------------------------------------------------------
// AppContext interface
// -----------------------------------------------------------------------------

export interface AppContext {
  logger: Logger;
  db: Database.Database;
  slotStore: SlotStore;
  sessionRepo: ExperimentSessionRepository;
  quotas: QuotaRegistry;
  sessionService: ExperimentSessionService;
}

export interface ContextOverrides {
  config?: Partial<RuntimeConfig>;
  logger?: Logger;
  db?: Database.Database;
  /** Quota entries to use instead of reading the config file. */
  quotaEntries?: QuotaEntry[];
  now?: () => number;
}

// -----------------------------------------------------------------------------
// Logger factory
// -----------------------------------------------------------------------------

export function createLogger(level: string = runtimeConfig.logLevel): Logger {
  const destination = pino.destination({ sync: process.env.NODE_ENV !== "production" });
  destination.on("error", (err: NodeJS.ErrnoException) => {
    if (err?.code === "EINTR") return;
    console.error("pino destination error", err);
  });
  return pino({ level }, destination);
}

// -----------------------------------------------------------------------------
// Context factory
// -----------------------------------------------------------------------------

export function createContext(overrides: ContextOverrides = {}): AppContext {
  const config = { ...runtimeConfig, ...overrides.config };
  const logger = overrides.logger ?? createLogger(config.logLevel);
  const now = overrides.now ?? Date.now;

  const db = overrides.db ?? openDatabase(config.sqlitePath);
  const migrations = runMigrations(db, logger);
  logger.debug({ applied: migrations.applied.length, skipped: migrations.skipped.length }, "Database ready");

  const slotStore = new SqliteSlotStore(db, now);
  const sessionRepo = new ExperimentSessionRepository(db, now);
  const definitions = new QuotaDefinitionRepository(db, now);
  const liveness = new ExperimentSessionLiveness(sessionRepo, now);

  const entries = overrides.quotaEntries ?? loadQuotaConfig(config.quotaConfigPath);
  const quotas = QuotaRegistry.fromEntries(entries, config.experimentVersion, {
    store: slotStore,
    liveness,
    definitions,
    logger,
  });
  logger.info(
    { version: config.experimentVersion, quotas: quotas.list().map((quota) => quota.name) },
    "Quotas loaded",
  );

  const sessionService = new ExperimentSessionService(
    sessionRepo,
    liveness,
    quotas,
    logger,
    config.sessionTimeoutMs,
  );

  return { logger, db, slotStore, sessionRepo, quotas, sessionService };
}
