import type Database from "better-sqlite3";
import type { QuotaDefinition, QuotaKind, QuotaNamespace } from "../domain/slot";
import { guardStore } from "./storeGuard";

interface QuotaDefinitionRow {
  kind: QuotaKind;
  definition_json: string;
}

/**
 * The condition layout each quota revision was first started with.
 * Written once per (name, version); later writers read back the stored copy.
 */
export class QuotaDefinitionRepository {
  constructor(
    private readonly db: Database.Database,
    private readonly now: () => number = Date.now,
  ) {}

  /**
   * Insert the definition unless one exists, then return what is stored.
   */
  ensure(namespace: QuotaNamespace, definition: QuotaDefinition): QuotaDefinition {
    return guardStore("ensureDefinition", () => {
      this.db
        .prepare(
          `INSERT INTO quota_definitions (quota_name, version, kind, definition_json, created_at)
           VALUES (@quota, @version, @kind, @definition_json, @created_at)
           ON CONFLICT(quota_name, version) DO NOTHING`,
        )
        .run({
          quota: namespace.quota,
          version: namespace.version,
          kind: definition.kind,
          definition_json: JSON.stringify(definition.conditions),
          created_at: this.now(),
        });

      const row = this.db
        .prepare<{ quota: string; version: string }, QuotaDefinitionRow>(
          `SELECT kind, definition_json FROM quota_definitions
           WHERE quota_name = @quota AND version = @version`,
        )
        .get({ quota: namespace.quota, version: namespace.version });

      if (!row) {
        throw new Error(`Definition for ${namespace.quota}@${namespace.version} vanished after insert`);
      }

      return { kind: row.kind, conditions: parseConditions(row.definition_json) };
    });
  }
}

const parseConditions = (json: string): QuotaDefinition["conditions"] => {
  const parsed: unknown = JSON.parse(json);
  if (!Array.isArray(parsed)) return [];

  const conditions: QuotaDefinition["conditions"] = [];
  for (const entry of parsed) {
    if (
      typeof entry === "object" &&
      entry !== null &&
      "name" in entry &&
      "target" in entry &&
      typeof entry.name === "string" &&
      typeof entry.target === "number"
    ) {
      conditions.push({ name: entry.name, target: entry.target });
    }
  }
  return conditions;
};
