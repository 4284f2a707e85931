import { randomUUID } from "node:crypto";
import type { Logger } from "pino";
import type { ExperimentSession, SessionState } from "../domain/experimentSession";
import type { ExperimentSessionRepository } from "../repositories/experimentSessionRepository";
import type { SessionLivenessOracle } from "./sessionLiveness";
import type { QuotaRegistry } from "./quota/quotaRegistry";

export class SessionNotFoundError extends Error {
  constructor(readonly sessionId: string) {
    super(`Experiment session ${sessionId} not found`);
    this.name = "SessionNotFoundError";
  }
}

export class SessionInactiveError extends Error {
  constructor(
    readonly sessionId: string,
    readonly state: SessionState,
  ) {
    super(`Experiment session ${sessionId} is ${state}`);
    this.name = "SessionInactiveError";
  }
}

export class SessionConflictError extends Error {
  constructor(readonly sessionId: string) {
    super(`Experiment session ${sessionId} already exists`);
    this.name = "SessionConflictError";
  }
}

export class QuotaNotFoundError extends Error {
  constructor(readonly quota: string) {
    super(`Quota "${quota}" is not configured`);
    this.name = "QuotaNotFoundError";
  }
}

export interface StartSessionOptions {
  /** Caller-chosen id, e.g. a recruitment platform's participant id. Generated when unset. */
  id?: string;
  timeoutMs?: number;
}

export interface AssignOptions {
  /** Leave the session running when the quota is full. */
  keepSession?: boolean;
}

export type ConditionResult =
  | { full: false; condition: string; ordinal?: number; reused: boolean }
  | { full: true };

/**
 * ExperimentSessionService ties participant sessions to the quotas:
 * - session lifecycle (start, heartbeat, finish, abort)
 * - one allocator call per session and quota; the result is cached on the session
 * - a session turned away by a full quota is aborted with reason "full"
 * - finishing a session finishes its slots in every quota
 */
export class ExperimentSessionService {
  constructor(
    private readonly sessions: ExperimentSessionRepository,
    private readonly liveness: SessionLivenessOracle,
    private readonly quotas: QuotaRegistry,
    private readonly logger: Logger,
    private readonly defaultTimeoutMs: number,
  ) {}

  /**
   * @throws SessionConflictError when a caller-supplied id is already in use
   */
  startSession(options: StartSessionOptions = {}): ExperimentSession {
    const id = options.id ?? randomUUID();
    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;
    const session = this.sessions.create({ id, timeout_ms: timeoutMs });
    if (!session) throw new SessionConflictError(id);

    this.logger.info({ sessionId: session.id, timeoutMs }, "Experiment session started");
    return session;
  }

  getSession(sessionId: string): { session: ExperimentSession; state: SessionState } {
    const session = this.requireSession(sessionId);
    return { session, state: this.liveness.state(sessionId) };
  }

  heartbeat(sessionId: string): ExperimentSession {
    this.requireActive(sessionId);
    this.sessions.touch(sessionId);
    return this.requireSession(sessionId);
  }

  /**
   * Condition for the session in the named quota.
   *
   * The first call consults the allocator; later calls are answered from the
   * session record. Unless `keepSession` is set, a full quota aborts the session.
   */
  assignCondition(sessionId: string, quotaName: string, options: AssignOptions = {}): ConditionResult {
    const quota = this.quotas.get(quotaName);
    if (!quota) throw new QuotaNotFoundError(quotaName);

    const session = this.requireActive(sessionId);
    this.sessions.touch(sessionId);

    const cached = session.assignments[quotaName];
    if (cached !== undefined) {
      return { full: false, condition: cached, reused: true };
    }

    const result = quota.assign(sessionId);
    if (result.kind === "full") {
      const aborted = !options.keepSession && this.sessions.abort(sessionId, "full");
      this.logger.info({ sessionId, quota: quotaName, aborted }, "No slot left for session");
      return { full: true };
    }

    this.sessions.saveAssignment(sessionId, quotaName, result.condition);
    return { full: false, condition: result.condition, ordinal: result.ordinal, reused: result.reused };
  }

  /**
   * Finish the session's slot in one quota.
   */
  finishSlot(sessionId: string, quotaName: string): boolean {
    const quota = this.quotas.get(quotaName);
    if (!quota) throw new QuotaNotFoundError(quotaName);
    this.requireSession(sessionId);
    return quota.markFinished(sessionId);
  }

  /**
   * Complete the session and finish its slots in every quota.
   */
  finishSession(sessionId: string): { session: ExperimentSession; finishedQuotas: string[] } {
    this.requireActive(sessionId);

    // Slots first: once the session is closed nothing else would finish them
    const finishedQuotas = this.quotas
      .list()
      .filter((quota) => quota.markFinished(sessionId))
      .map((quota) => quota.name);

    this.sessions.finish(sessionId);
    this.logger.info({ sessionId, finishedQuotas }, "Experiment session finished");

    return { session: this.requireSession(sessionId), finishedQuotas };
  }

  abortSession(sessionId: string, reason?: string): ExperimentSession {
    this.requireSession(sessionId);
    if (this.sessions.abort(sessionId, reason)) {
      this.logger.info({ sessionId, reason }, "Experiment session aborted");
    }
    return this.requireSession(sessionId);
  }

  private requireSession(sessionId: string): ExperimentSession {
    const session = this.sessions.getById(sessionId);
    if (!session) throw new SessionNotFoundError(sessionId);
    return session;
  }

  private requireActive(sessionId: string): ExperimentSession {
    const session = this.requireSession(sessionId);
    const state = this.liveness.state(sessionId);
    if (state !== "active") throw new SessionInactiveError(sessionId, state);
    return session;
  }
}
