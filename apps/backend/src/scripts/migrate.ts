/**
 * Apply pending SQL migrations to the configured database.
 *
 * Run with: npm run migrate --workspace apps/backend
 */

import { createLogger } from "../app/context";
import { openDatabase } from "../db/connection";
import { runMigrations } from "../migrate";

const logger = createLogger();
const db = openDatabase();

try {
  const report = runMigrations(db, logger);
  logger.info({ applied: report.applied, skipped: report.skipped.length }, "Migrations complete");
} finally {
  db.close();
}
