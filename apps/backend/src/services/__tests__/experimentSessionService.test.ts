import { beforeEach, describe, it, expect } from "vitest";
import { SessionNotPermittedError, StoreUnavailableError } from "../../domain/errors";
import {
  ExperimentSessionService,
  QuotaNotFoundError,
  SessionConflictError,
  SessionInactiveError,
  SessionNotFoundError,
} from "../experimentSessionService";
import { ListRandomizer } from "../quota/listRandomizer";
import { QuotaRegistry } from "../quota/quotaRegistry";
import { SessionQuota } from "../quota/sessionQuota";
import { createHarness, silentLogger, type Harness } from "../../test/harness";

describe("ExperimentSessionService", () => {
  let h: Harness;
  let framing: ListRandomizer;
  let participants: SessionQuota;
  let service: ExperimentSessionService;

  beforeEach(() => {
    h = createHarness();
    framing = ListRandomizer.balanced(["gain", "loss"], 1, { name: "framing", version: "1" }, h.deps);
    participants = new SessionQuota({ name: "participants", version: "1", target: 10 }, h.deps);
    service = new ExperimentSessionService(
      h.sessions,
      h.liveness,
      new QuotaRegistry([framing, participants]),
      silentLogger,
      60_000,
    );
  });

  it("starts running sessions with the default timeout", () => {
    const session = service.startSession();

    expect(session).toMatchObject({ status: "running", timeout_ms: 60_000, assignments: {} });
    expect(service.getSession(session.id).state).toBe("active");
  });

  it("remembers the condition on the session record", () => {
    const { id } = service.startSession();

    const first = service.assignCondition(id, "framing");
    if (first.full) throw new Error("expected a condition");
    expect(first).toMatchObject({ ordinal: 0, reused: false });

    expect(service.assignCondition(id, "framing")).toEqual({
      full: false,
      condition: first.condition,
      reused: true,
    });
    expect(service.getSession(id).session.assignments).toEqual({ framing: first.condition });
  });

  it("reports full once every condition is taken and aborts the turned-away session", () => {
    for (let i = 0; i < 2; i++) {
      expect(service.assignCondition(service.startSession().id, "framing")).toMatchObject({ full: false });
    }

    const { id } = service.startSession();
    expect(service.assignCondition(id, "framing")).toEqual({ full: true });
    expect(service.getSession(id)).toMatchObject({
      state: "aborted",
      session: { status: "aborted", abort_reason: "full" },
    });
  });

  it("keeps the session running on a full quota when asked to", () => {
    service.assignCondition(service.startSession().id, "framing");
    service.assignCondition(service.startSession().id, "framing");

    const { id } = service.startSession();
    expect(service.assignCondition(id, "framing", { keepSession: true })).toEqual({ full: true });
    expect(service.getSession(id).session.status).toBe("running");
    expect(service.assignCondition(id, "participants")).toMatchObject({ full: false, condition: "slot" });
  });

  it("starts sessions under caller-supplied ids", () => {
    const session = service.startSession({ id: "panel-42", timeoutMs: 5000 });

    expect(session).toMatchObject({ id: "panel-42", timeout_ms: 5000 });
    expect(() => service.startSession({ id: "panel-42" })).toThrow(SessionConflictError);
  });

  it("admits allow-listed ids and refuses others", () => {
    const pilot = new SessionQuota({ name: "pilot", version: "1", target: 5, sessionIds: ["p1"] }, h.deps);
    const pilotService = new ExperimentSessionService(
      h.sessions,
      h.liveness,
      new QuotaRegistry([pilot]),
      silentLogger,
      60_000,
    );
    pilotService.startSession({ id: "p1" });
    pilotService.startSession({ id: "p2" });

    expect(pilotService.assignCondition("p1", "pilot")).toEqual({
      full: false,
      condition: "slot",
      ordinal: 0,
      reused: false,
    });
    expect(() => pilotService.assignCondition("p2", "pilot")).toThrow(SessionNotPermittedError);
    expect(pilotService.getSession("p2").session.status).toBe("running");
  });

  it("surfaces session store failures as StoreUnavailableError", () => {
    const { id } = service.startSession();
    h.db.close();

    expect(() => service.assignCondition(id, "framing")).toThrow(StoreUnavailableError);
    expect(() => service.startSession()).toThrow(StoreUnavailableError);
  });

  it("refuses unknown quotas and sessions", () => {
    const { id } = service.startSession();

    expect(() => service.assignCondition(id, "missing")).toThrow(QuotaNotFoundError);
    expect(() => service.assignCondition("ghost", "framing")).toThrow(SessionNotFoundError);
    expect(() => service.heartbeat("ghost")).toThrow(SessionNotFoundError);
  });

  it("refuses assignments to a timed-out session", () => {
    const { id } = service.startSession({ timeoutMs: 1000 });
    h.clock.advance(1001);

    try {
      service.assignCondition(id, "framing");
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(SessionInactiveError);
      if (error instanceof SessionInactiveError) expect(error.state).toBe("expired");
    }
  });

  it("keeps a session alive through heartbeats", () => {
    const { id } = service.startSession({ timeoutMs: 1000 });
    h.clock.advance(900);
    expect(service.heartbeat(id).last_seen_at).toBe(h.clock.current);
    h.clock.advance(900);

    expect(service.getSession(id).state).toBe("active");
  });

  it("finishes the session's slots in every quota", () => {
    const { id } = service.startSession();
    service.assignCondition(id, "framing");
    service.assignCondition(id, "participants");

    const result = service.finishSession(id);

    expect(result.finishedQuotas).toEqual(["framing", "participants"]);
    expect(result.session.status).toBe("finished");
    expect(framing.nFinished).toBe(1);
    expect(participants.nFinished).toBe(1);
    expect(() => service.assignCondition(id, "framing")).toThrow("is finished");
  });

  it("finishes a single quota slot on request", () => {
    const { id } = service.startSession();
    service.assignCondition(id, "participants");

    expect(service.finishSlot(id, "participants")).toBe(true);
    expect(service.finishSlot(id, "framing")).toBe(false);
    expect(participants.status()).toMatchObject({ nFinished: 1, nPending: 0 });
  });

  it("releases the slot of an aborted session to the next participant", () => {
    const first = service.startSession();
    const second = service.startSession();
    const third = service.startSession();
    service.assignCondition(first.id, "framing");
    service.assignCondition(second.id, "framing");

    expect(service.abortSession(first.id, "withdrew").status).toBe("aborted");
    expect(service.getSession(first.id).state).toBe("aborted");
    expect(service.assignCondition(third.id, "framing")).toMatchObject({ full: false, reused: false });
  });
});
