import { describe, expect, it } from "vitest";
import { at, makeRecord } from "./__tests__/fixtures.js";
import { AssignIntentTracker, INTENT_WINDOW_MS } from "./assignIntents.js";

const T0 = at(2024, 3, 5, 10);

describe("AssignIntentTracker", () => {
  it("assigns the closest session started in the intent's directory", () => {
    const tracker = new AssignIntentTracker();
    tracker.add({ projectId: "p1", expectedCwd: "/work/app/", t0Ms: T0, hints: {} });

    const matches = tracker.match([
      makeRecord({ id: "late", createdAtMs: T0 + 30_000 }),
      makeRecord({ id: "close", createdAtMs: T0 + 5_000 }),
      makeRecord({ id: "too-early", createdAtMs: T0 - 5_000 }),
      makeRecord({ id: "elsewhere", createdAtMs: T0, workingDirectory: "/work/other" }),
    ]);

    expect(matches).toEqual([{ kind: "assigned", projectId: "p1", sessionId: "close" }]);
    expect(tracker.pending()).toEqual([]);
  });

  it("prefers a session whose model matches the hint", () => {
    const tracker = new AssignIntentTracker();
    tracker.add({ projectId: "p1", expectedCwd: "/work/app", t0Ms: T0, hints: { model: "model-b" } });

    const matches = tracker.match([
      makeRecord({ id: "a", createdAtMs: T0 + 1_000, model: "model-a" }),
      makeRecord({ id: "b", createdAtMs: T0 + 20_000, model: "model-b" }),
    ]);

    expect(matches).toEqual([{ kind: "assigned", projectId: "p1", sessionId: "b" }]);
  });

  it("reports a tie as ambiguous and assigns nothing", () => {
    const tracker = new AssignIntentTracker();
    tracker.add({ projectId: "p1", expectedCwd: "/work/app", t0Ms: T0, hints: {} });

    const matches = tracker.match([
      makeRecord({ id: "x", createdAtMs: T0 + 4_000 }),
      makeRecord({ id: "y", createdAtMs: T0 + 4_000 }),
    ]);

    expect(matches).toEqual([{ kind: "ambiguous", projectId: "p1", sessionIds: ["x", "y"] }]);
    expect(tracker.pending()).toEqual([]);
  });

  it("never gives one session to two intents", () => {
    const tracker = new AssignIntentTracker();
    tracker.add({ projectId: "p1", expectedCwd: "/work/app", t0Ms: T0, hints: {} });
    tracker.add({ projectId: "p2", expectedCwd: "/work/app", t0Ms: T0 + 1_000, hints: {} });

    const matches = tracker.match([makeRecord({ id: "only", createdAtMs: T0 + 500 })]);

    expect(matches).toEqual([{ kind: "assigned", projectId: "p1", sessionId: "only" }]);
    expect(tracker.pending().map((intent) => intent.projectId)).toEqual(["p2"]);
  });

  it("keeps unmatched intents until their window passes", () => {
    const tracker = new AssignIntentTracker();
    tracker.add({ projectId: "p1", expectedCwd: "~/../work", t0Ms: T0, hints: {} });

    expect(tracker.match([])).toEqual([]);
    tracker.prune(T0 + INTENT_WINDOW_MS);
    expect(tracker.pending()).toHaveLength(1);
    tracker.prune(T0 + INTENT_WINDOW_MS + 1);
    expect(tracker.pending()).toEqual([]);
  });
});
