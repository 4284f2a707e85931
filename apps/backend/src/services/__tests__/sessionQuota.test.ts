import { beforeEach, describe, it, expect } from "vitest";
import {
  ConditionInconsistencyError,
  ConfigurationError,
  SessionNotPermittedError,
  StoreUnavailableError,
} from "../../domain/errors";
import { SESSION_POOL, SessionQuota } from "../quota/sessionQuota";
import { createHarness, type Harness } from "../../test/harness";

describe("SessionQuota", () => {
  let h: Harness;

  beforeEach(() => {
    h = createHarness();
  });

  it("admits sessions up to the target and reports full afterwards", () => {
    const quota = new SessionQuota({ name: "participants", version: "1", target: 2 }, h.deps);
    for (const id of ["s1", "s2", "s3"]) h.startSession(id);

    expect(quota.assign("s1")).toEqual({
      kind: "assigned",
      condition: SESSION_POOL,
      ordinal: 0,
      status: "pending",
      reused: false,
    });
    expect(quota.assign("s2")).toMatchObject({ kind: "assigned", ordinal: 1 });
    expect(quota.assign("s3")).toEqual({ kind: "full" });
    expect(quota.full).toBe(true);
  });

  it("returns the same slot on repeated calls", () => {
    const quota = new SessionQuota({ name: "participants", version: "1", target: 2 }, h.deps);
    h.startSession("s1");

    quota.assign("s1");
    expect(quota.assign("s1")).toEqual({
      kind: "assigned",
      condition: SESSION_POOL,
      ordinal: 0,
      status: "pending",
      reused: true,
    });
    expect(h.store.readAll({ quota: "participants", version: "1", pool: SESSION_POOL })).toHaveLength(1);
  });

  it("counts open, pending and finished slots", () => {
    const quota = new SessionQuota({ name: "participants", version: "1", target: 3 }, h.deps);
    h.startSession("s1");
    h.startSession("s2");

    quota.assign("s1");
    quota.assign("s2");
    expect(quota.markFinished("s1")).toBe(true);

    expect(quota.nOpen).toBe(1);
    expect(quota.nPending).toBe(1);
    expect(quota.nFinished).toBe(1);
    expect(quota.allFinished).toBe(false);
    expect(quota.status()).toEqual({
      name: "participants",
      version: "1",
      full: false,
      allFinished: false,
      nSlots: 3,
      nOpen: 1,
      nPending: 1,
      nFinished: 1,
      conditions: { slot: { target: 3, open: 1, pending: 1, finished: 1 } },
    });
  });

  it("reports a finished slot with its status on later calls", () => {
    const quota = new SessionQuota({ name: "participants", version: "1", target: 1 }, h.deps);
    h.startSession("s1");
    quota.assign("s1");
    quota.markFinished("s1");

    expect(quota.assign("s1")).toMatchObject({ status: "finished", reused: true });
    expect(quota.allFinished).toBe(true);
  });

  it("returns false when finishing a session without a slot", () => {
    const quota = new SessionQuota({ name: "participants", version: "1", target: 1 }, h.deps);
    expect(quota.markFinished("nobody")).toBe(false);
  });

  it("rejects a target that is not a positive integer", () => {
    expect(() => new SessionQuota({ name: "participants", version: "1", target: 0 }, h.deps)).toThrow(
      'Quota "participants": target for "slot" must be a positive integer, got 0',
    );
    expect(() => new SessionQuota({ name: "  ", version: "1", target: 1 }, h.deps)).toThrow(ConfigurationError);
  });

  it("keeps slots of different versions apart", () => {
    const v1 = new SessionQuota({ name: "participants", version: "1", target: 1 }, h.deps);
    h.startSession("s1");
    v1.assign("s1");

    // s1 times out, but only a v1 allocation may reclaim its slot
    h.clock.advance(60_001);
    h.startSession("s2");

    const v2 = new SessionQuota({ name: "participants", version: "2", target: 1 }, h.deps);
    expect(v2.assign("s2")).toMatchObject({ kind: "assigned", ordinal: 0, reused: false });
    expect(h.store.readAll({ quota: "participants", version: "1", pool: SESSION_POOL })).toMatchObject([
      { sessionId: "s1", status: "pending" },
    ]);
  });

  it("shares slots across versions when respectVersion is false", () => {
    const v1 = new SessionQuota(
      { name: "participants", version: "1", target: 1, respectVersion: false },
      h.deps,
    );
    const v2 = new SessionQuota(
      { name: "participants", version: "2", target: 1, respectVersion: false },
      h.deps,
    );
    h.startSession("s1");
    h.startSession("s2");

    expect(v1.version).toBe("");
    expect(v1.assign("s1")).toMatchObject({ kind: "assigned" });
    expect(v2.assign("s2")).toEqual({ kind: "full" });
  });

  it("refuses a different target under an existing name and version", () => {
    new SessionQuota({ name: "participants", version: "1", target: 10 }, h.deps);

    expect(() => new SessionQuota({ name: "participants", version: "1", target: 12 }, h.deps)).toThrow(
      ConditionInconsistencyError,
    );
    expect(() => new SessionQuota({ name: "participants", version: "2", target: 12 }, h.deps)).not.toThrow();
  });

  it("only admits sessions on the allow-list", () => {
    const quota = new SessionQuota(
      { name: "pilot", version: "1", target: 5, sessionIds: ["s1"] },
      h.deps,
    );
    h.startSession("s1");
    h.startSession("s2");

    expect(quota.assign("s1")).toMatchObject({ kind: "assigned" });
    expect(() => quota.assign("s2")).toThrow(
      'Session s2 is not permitted to take part in quota "pilot"',
    );
    expect(() => quota.assign("s2")).toThrow(SessionNotPermittedError);
  });

  it("surfaces store failures instead of reporting full", () => {
    const quota = new SessionQuota({ name: "participants", version: "1", target: 1 }, h.deps);
    h.db.close();

    expect(() => quota.assign("s1")).toThrow(StoreUnavailableError);
    expect(() => new SessionQuota({ name: "other", version: "1", target: 1 }, h.deps)).toThrow(
      StoreUnavailableError,
    );
  });
});
