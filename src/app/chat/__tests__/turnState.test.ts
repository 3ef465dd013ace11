import { describe, expect, it } from "vitest";

import { canTransition, TurnTracker } from "@app/chat/turnState";

describe("canTransition", () => {
  it("allows the retry loop", () => {
    expect(canTransition("invoking_model", "retrying")).toBe(true);
    expect(canTransition("retrying", "invoking_model")).toBe(true);
  });

  it("does not let extraction fail a turn", () => {
    expect(canTransition("extracting_memory", "failed")).toBe(false);
    expect(canTransition("extracting_memory", "committing")).toBe(true);
  });

  it("treats done and failed as terminal", () => {
    expect(canTransition("done", "idle")).toBe(false);
    expect(canTransition("failed", "composing_context")).toBe(false);
  });
});

describe("TurnTracker", () => {
  it("records the path it took", () => {
    const tracker = new TurnTracker();

    tracker.moveTo("composing_context");
    tracker.moveTo("invoking_model");
    tracker.moveTo("committing");
    tracker.moveTo("done");

    expect(tracker.state).toBe("done");
    expect(tracker.history).toEqual([
      "idle",
      "composing_context",
      "invoking_model",
      "committing",
      "done",
    ]);
  });

  it("rejects illegal moves", () => {
    const tracker = new TurnTracker();

    expect(() => tracker.moveTo("committing")).toThrow(
      "Illegal turn transition idle -> committing"
    );
  });

  it("fails at most once and never after done", () => {
    const failed = new TurnTracker();
    failed.moveTo("composing_context");
    failed.fail();
    failed.fail();

    expect(failed.history).toEqual(["idle", "composing_context", "failed"]);

    const finished = new TurnTracker();
    finished.moveTo("composing_context");
    finished.moveTo("invoking_model");
    finished.moveTo("committing");
    finished.moveTo("done");
    finished.fail();

    expect(finished.state).toBe("done");
  });
});
