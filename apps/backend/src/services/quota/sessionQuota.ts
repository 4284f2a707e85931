import { SlotQuota, type SlotQuotaDeps, type SlotQuotaOptions } from "./slotQuota";

/** Label of the single pool; returned as the condition of every assignment. */
export const SESSION_POOL = "slot";

export interface SessionQuotaOptions extends SlotQuotaOptions {
  /** Maximum number of participating sessions. */
  target: number;
}

/**
 * Caps the number of participants without conditions.
 *
 * ```ts
 * const quota = new SessionQuota({ name: "participants", version: "1", target: 120 }, deps);
 * if (quota.assign(sessionId).kind === "full") {
 *   // turn the participant away
 * }
 * ```
 */
export class SessionQuota extends SlotQuota {
  constructor(options: SessionQuotaOptions, deps: SlotQuotaDeps) {
    super("session", [{ name: SESSION_POOL, target: options.target }], options, deps);
  }
}
