import type Database from "better-sqlite3";
import type { ExperimentSession, ExperimentSessionStatus } from "../domain/experimentSession";
import { guardStore } from "./storeGuard";

interface ExperimentSessionRow {
  id: string;
  status: ExperimentSessionStatus;
  started_at: number;
  last_seen_at: number;
  timeout_ms: number;
  ended_at: number | null;
  abort_reason: string | null;
  assignments_json: string;
  created_at: number;
  updated_at: number;
}

const deserializeAssignments = (value: string): Record<string, string> => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch {
    return {};
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) return {};

  const assignments: Record<string, string> = {};
  for (const [quota, condition] of Object.entries(parsed)) {
    if (typeof condition === "string") assignments[quota] = condition;
  }
  return assignments;
};

export class ExperimentSessionRepository {
  constructor(
    private readonly db: Database.Database,
    private readonly now: () => number = Date.now,
  ) {}

  /**
   * Insert a running session. Undefined when the id is already taken.
   */
  create(session: { id: string; timeout_ms: number }): ExperimentSession | undefined {
    const timestamp = this.now();
    const result = guardStore("createSession", () =>
      this.db
        .prepare(
          `INSERT INTO experiment_sessions (
            id, status, started_at, last_seen_at, timeout_ms, assignments_json, created_at, updated_at
          ) VALUES (@id, 'running', @timestamp, @timestamp, @timeout_ms, '{}', @timestamp, @timestamp)
          ON CONFLICT(id) DO NOTHING`,
        )
        .run({ id: session.id, timeout_ms: session.timeout_ms, timestamp }),
    );
    if (result.changes !== 1) return undefined;

    return {
      id: session.id,
      status: "running",
      started_at: timestamp,
      last_seen_at: timestamp,
      timeout_ms: session.timeout_ms,
      assignments: {},
      created_at: timestamp,
      updated_at: timestamp,
    };
  }

  getById(id: string): ExperimentSession | undefined {
    const row = guardStore("getSession", () =>
      this.db
        .prepare<{ id: string }, ExperimentSessionRow>(`SELECT * FROM experiment_sessions WHERE id = @id`)
        .get({ id }),
    );

    return row ? this.mapRow(row) : undefined;
  }

  /**
   * Record participant activity. Only running sessions are touched.
   */
  touch(id: string): boolean {
    const timestamp = this.now();
    const result = guardStore("touchSession", () =>
      this.db
        .prepare(
          `UPDATE experiment_sessions
           SET last_seen_at = @timestamp,
               updated_at = @timestamp
           WHERE id = @id AND status = 'running'`,
        )
        .run({ id, timestamp }),
    );

    return result.changes === 1;
  }

  finish(id: string): boolean {
    return this.close(id, "finished");
  }

  abort(id: string, reason?: string): boolean {
    return this.close(id, "aborted", reason);
  }

  /**
   * Remember the condition a quota gave this session.
   */
  saveAssignment(id: string, quota: string, condition: string): void {
    const timestamp = this.now();
    guardStore("saveAssignment", () =>
      this.db
        .prepare(
          `UPDATE experiment_sessions
           SET assignments_json = json_set(assignments_json, '$.' || json_quote(@quota), @condition),
               updated_at = @timestamp
           WHERE id = @id`,
        )
        .run({ id, quota, condition, timestamp }),
    );
  }

  private close(id: string, status: Exclude<ExperimentSessionStatus, "running">, reason?: string): boolean {
    const timestamp = this.now();
    const result = guardStore("closeSession", () =>
      this.db
        .prepare(
          `UPDATE experiment_sessions
           SET status = @status,
               ended_at = @timestamp,
               abort_reason = @reason,
               updated_at = @timestamp
           WHERE id = @id AND status = 'running'`,
        )
        .run({ id, status, reason: reason ?? null, timestamp }),
    );

    return result.changes === 1;
  }

  private mapRow(row: ExperimentSessionRow): ExperimentSession {
    return {
      id: row.id,
      status: row.status,
      started_at: row.started_at,
      last_seen_at: row.last_seen_at,
      timeout_ms: row.timeout_ms,
      ended_at: row.ended_at ?? undefined,
      abort_reason: row.abort_reason ?? undefined,
      assignments: deserializeAssignments(row.assignments_json),
      created_at: row.created_at,
      updated_at: row.updated_at,
    };
  }
}
