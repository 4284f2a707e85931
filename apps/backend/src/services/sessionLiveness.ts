import type { SessionState } from "../domain/experimentSession";
import type { ExperimentSessionRepository } from "../repositories/experimentSessionRepository";

/**
 * Answers whether the owner of a slot is still participating.
 * Implementations must be free of side effects.
 */
export interface SessionLivenessOracle {
  state(sessionId: string): SessionState;
  /** True when the session can no longer complete: timed out or aborted. */
  isExpired(sessionId: string): boolean;
}

/**
 * Liveness derived from the experiment session table.
 *
 * A session that has no record cannot finish either, so it reports "expired"
 * and its pending slot becomes reclaimable.
 */
export class ExperimentSessionLiveness implements SessionLivenessOracle {
  constructor(
    private readonly sessions: ExperimentSessionRepository,
    private readonly now: () => number = Date.now,
  ) {}

  state(sessionId: string): SessionState {
    const session = this.sessions.getById(sessionId);
    if (!session) return "expired";

    if (session.status === "finished") return "finished";
    if (session.status === "aborted") return "aborted";

    const idleMs = this.now() - session.last_seen_at;
    return idleMs > session.timeout_ms ? "expired" : "active";
  }

  isExpired(sessionId: string): boolean {
    const state = this.state(sessionId);
    return state === "expired" || state === "aborted";
  }
}
