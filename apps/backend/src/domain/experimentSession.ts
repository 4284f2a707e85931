export type ExperimentSessionStatus = "running" | "finished" | "aborted";

/** Liveness as seen by the slot allocator. */
export type SessionState = "active" | "finished" | "aborted" | "expired";

export interface ExperimentSession {
  id: string;
  status: ExperimentSessionStatus;
  started_at: number;
  last_seen_at: number;
  timeout_ms: number;
  ended_at?: number;
  abort_reason?: string;
  /** Condition per quota name, cached once assigned. */
  assignments: Record<string, string>;
  created_at: number;
  updated_at: number;
}
