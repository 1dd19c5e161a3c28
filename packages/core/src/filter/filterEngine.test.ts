import { afterEach, describe, expect, it, vi } from "vitest";
import type { SessionRecord } from "@sessiondex/contracts";
import { at, makeRecord } from "../__tests__/fixtures.js";
import type { FilterComputation } from "./compute.js";
import { FilterEngine, type ComputeExecutor } from "./filterEngine.js";
import { buildFilterSnapshot, type FilterSnapshot } from "./snapshot.js";

function snapshotFor(generation: number, sessions: readonly SessionRecord[], selectedPath: string | null = null): FilterSnapshot {
  return buildFilterSnapshot({
    generation,
    sessionsVersion: 1,
    sessions,
    state: {
      selectedPath,
      selectedProjectIds: [],
      selectedDays: [],
      dateDimension: "updated",
      quickSearch: "",
      sortOrder: "most_recent",
      monthStartMs: at(2024, 3, 1, 0),
    },
    projects: [],
    memberships: new Map(),
    canonicalPaths: new Map(),
    dayIndex: new Map(),
    coverage: new Map(),
    nowMs: at(2024, 6, 1),
  });
}

function nextTurn(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

const immediateExecutor: ComputeExecutor = (task, input) => Promise.resolve(task(input));

describe("FilterEngine", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("computes the newest snapshot once and discards the stale in-flight result", async () => {
    const releases: Array<() => void> = [];
    const executor: ComputeExecutor = (task, input) =>
      new Promise((resolve) => {
        releases.push(() => resolve(task(input)));
      });
    const published: FilterComputation[] = [];
    const sessions = [makeRecord({ id: "a" })];
    const engine = new FilterEngine({
      buildSnapshot: (generation) => snapshotFor(generation, sessions),
      publish: (result) => published.push(result),
      debounceMs: 15,
      executor,
    });

    engine.apply();
    engine.apply();
    engine.apply();
    expect(releases).toHaveLength(1);

    releases[0]?.();
    await nextTurn();
    expect(releases).toHaveLength(2);
    releases[1]?.();
    await engine.whenIdle();

    expect(engine.getStats()).toEqual({ runs: 2, published: 1, discardedStale: 1, unchanged: 0 });
    expect(published.map((result) => result.generation)).toEqual([3]);
    expect(published[0]?.visibleSessions.map((record) => record.id)).toEqual(["a"]);
  });

  it("skips publishing an unchanged result and publishes once the sessions change", async () => {
    const published: FilterComputation[] = [];
    let sessions = [makeRecord()];
    const engine = new FilterEngine({
      buildSnapshot: (generation) => snapshotFor(generation, sessions),
      publish: (result) => published.push(result),
      debounceMs: 15,
      executor: immediateExecutor,
    });

    engine.apply();
    await engine.whenIdle();
    engine.apply();
    await engine.whenIdle();
    expect(published).toHaveLength(1);
    expect(engine.getStats().unchanged).toBe(1);

    sessions = [makeRecord({ eventCount: 9 })];
    engine.apply();
    await engine.whenIdle();
    expect(published).toHaveLength(2);
  });

  it("debounces scheduled applies into one snapshot", async () => {
    vi.useFakeTimers();
    const buildSnapshot = vi.fn((generation: number) => snapshotFor(generation, []));
    const engine = new FilterEngine({ buildSnapshot, publish: () => undefined, debounceMs: 15, executor: immediateExecutor });

    engine.schedule();
    await vi.advanceTimersByTimeAsync(10);
    engine.schedule();
    expect(engine.hasPending()).toBe(true);
    await vi.advanceTimersByTimeAsync(15);
    await engine.whenIdle();

    expect(buildSnapshot).toHaveBeenCalledTimes(1);
    expect(engine.currentGeneration()).toBe(1);
    expect(engine.hasPending()).toBe(false);
  });

  it("flushes a pending debounced apply on demand", async () => {
    vi.useFakeTimers();
    const buildSnapshot = vi.fn((generation: number) => snapshotFor(generation, []));
    const engine = new FilterEngine({ buildSnapshot, publish: () => undefined, debounceMs: 15, executor: immediateExecutor });

    engine.flush();
    expect(buildSnapshot).not.toHaveBeenCalled();
    engine.schedule();
    engine.flush();
    expect(buildSnapshot).toHaveBeenCalledTimes(1);
    await engine.whenIdle();
  });

  it("hands newly canonicalized paths back to the owner", async () => {
    const merged: Array<[string, string]> = [];
    const engine = new FilterEngine({
      buildSnapshot: (generation) => snapshotFor(generation, [makeRecord({ workingDirectory: "/work/app/" })], "/work"),
      publish: () => undefined,
      mergeResolvedPaths: (entries) => merged.push(...entries),
      debounceMs: 15,
      executor: immediateExecutor,
    });

    engine.apply();
    await engine.whenIdle();

    expect(merged).toEqual([["/work/app/", "/work/app"]]);
  });

  it("keeps running after a failed computation", async () => {
    let fail = true;
    const executor: ComputeExecutor = (task, input) => {
      if (fail) {
        fail = false;
        return Promise.reject(new Error("worker died"));
      }
      return Promise.resolve(task(input));
    };
    const published: FilterComputation[] = [];
    const engine = new FilterEngine({
      buildSnapshot: (generation) => snapshotFor(generation, [makeRecord()]),
      publish: (result) => published.push(result),
      debounceMs: 15,
      executor,
    });

    engine.apply();
    await engine.whenIdle();
    engine.apply();
    await engine.whenIdle();

    expect(published.map((result) => result.generation)).toEqual([2]);
    expect(engine.getStats().runs).toBe(1);
  });
});
