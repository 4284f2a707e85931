import { beforeEach, describe, it, expect } from "vitest";
import { createHarness, type Harness } from "../../test/harness";

describe("ExperimentSessionLiveness", () => {
  let h: Harness;

  beforeEach(() => {
    h = createHarness();
  });

  it("reports a session without a record as expired", () => {
    expect(h.liveness.state("ghost")).toBe("expired");
    expect(h.liveness.isExpired("ghost")).toBe(true);
  });

  it("expires a session once it has been idle longer than its timeout", () => {
    h.startSession("s1", 60_000);

    h.clock.advance(60_000);
    expect(h.liveness.state("s1")).toBe("active");

    h.clock.advance(1);
    expect(h.liveness.state("s1")).toBe("expired");
    expect(h.liveness.isExpired("s1")).toBe(true);
  });

  it("restarts the idle period on activity", () => {
    h.startSession("s1", 60_000);
    h.clock.advance(50_000);
    expect(h.sessions.touch("s1")).toBe(true);
    h.clock.advance(50_000);

    expect(h.liveness.state("s1")).toBe("active");
  });

  it("reports finished sessions as finished, never expired", () => {
    h.startSession("s1", 1000);
    h.sessions.finish("s1");
    h.clock.advance(10_000);

    expect(h.liveness.state("s1")).toBe("finished");
    expect(h.liveness.isExpired("s1")).toBe(false);
  });

  it("treats aborted sessions as expired", () => {
    h.startSession("s1");
    h.sessions.abort("s1", "withdrew consent");

    expect(h.liveness.state("s1")).toBe("aborted");
    expect(h.liveness.isExpired("s1")).toBe(true);
    expect(h.sessions.getById("s1")?.abort_reason).toBe("withdrew consent");
  });

  it("does not touch or close sessions that already ended", () => {
    h.startSession("s1");
    h.sessions.finish("s1");

    expect(h.sessions.touch("s1")).toBe(false);
    expect(h.sessions.abort("s1")).toBe(false);
    expect(h.sessions.getById("s1")?.status).toBe("finished");
  });
});
