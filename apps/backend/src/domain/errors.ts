/**
 * Error taxonomy for slot allocation.
 *
 * Quota-full and lost claim races are not errors: the first is an
 * `AssignResult` of kind "full", the second never leaves the allocator.
 */

/** Invalid condition, factor or target definition. Raised before any session is served. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/** The stored definition for a quota name/version differs from the one being constructed. */
export class ConditionInconsistencyError extends Error {
  constructor(
    message: string,
    readonly quota: string,
    readonly version: string,
  ) {
    super(message);
    this.name = "ConditionInconsistencyError";
  }
}

/** The database could not complete an operation. Never retried here. */
export class StoreUnavailableError extends Error {
  constructor(
    readonly operation: string,
    cause: unknown,
  ) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Store unavailable during ${operation}: ${detail}`, { cause });
    this.name = "StoreUnavailableError";
  }
}

/** The session is not on the quota's participant allow-list. */
export class SessionNotPermittedError extends Error {
  constructor(
    readonly quota: string,
    readonly sessionId: string,
  ) {
    super(`Session ${sessionId} is not permitted to take part in quota "${quota}"`);
    this.name = "SessionNotPermittedError";
  }
}
