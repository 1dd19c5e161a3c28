import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { RefreshScope } from "@sessiondex/contracts";
import { at } from "./__tests__/fixtures.js";
import { PRIMARY_CHANNEL, RefreshScheduler, type RefreshJob } from "./refreshScheduler.js";

const timing = { forceDebounceMs: 150, autoDebounceMs: 400, completionCooldownMs: 200 };
const ALL: RefreshScope = { kind: "all" };

interface Deferred {
  promise: Promise<void>;
  resolve: () => void;
}

function deferred(): Deferred {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

describe("RefreshScheduler", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(at(2024, 3, 5));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("collapses an automatic and a forced trigger into one forced execution", async () => {
    const jobs: RefreshJob[] = [];
    const scheduler = new RefreshScheduler({
      timing,
      now: () => Date.now(),
      execute: async (job) => {
        jobs.push(job);
      },
    });

    expect(scheduler.trigger(ALL)).toBe("scheduled");
    await vi.advanceTimersByTimeAsync(50);
    expect(scheduler.trigger(ALL, { force: true })).toBe("coalesced");

    await vi.advanceTimersByTimeAsync(150);
    await scheduler.whenIdle();

    expect(jobs).toHaveLength(1);
    expect(jobs[0]).toMatchObject({ key: "all", force: true, generation: 2, channel: PRIMARY_CHANNEL });
    expect(scheduler.executionCount()).toBe(1);
    expect(scheduler.hasPending()).toBe(false);
  });

  it("drops automatic triggers while executing and queues one forced follow-up", async () => {
    const gates = [deferred(), deferred()];
    const jobs: RefreshJob[] = [];
    const currentChecks: Array<() => boolean> = [];
    const scheduler = new RefreshScheduler({
      timing,
      now: () => Date.now(),
      execute: (job, isCurrent) => {
        jobs.push(job);
        currentChecks.push(isCurrent);
        return gates[jobs.length - 1]?.promise ?? Promise.resolve();
      },
    });

    scheduler.trigger(ALL);
    await vi.advanceTimersByTimeAsync(400);
    expect(jobs).toHaveLength(1);

    expect(scheduler.trigger(ALL)).toBe("dropped_executing");
    expect(scheduler.trigger(ALL, { force: true })).toBe("queued_follow_up");
    expect(scheduler.trigger(ALL, { force: true })).toBe("coalesced");
    expect(currentChecks[0]?.()).toBe(false);

    gates[0]?.resolve();
    await vi.advanceTimersByTimeAsync(0);
    expect(jobs).toHaveLength(1);
    expect(scheduler.hasPending()).toBe(true);

    await vi.advanceTimersByTimeAsync(150);
    expect(jobs.map((job) => [job.force, job.generation])).toEqual([
      [false, 1],
      [true, 3],
    ]);
    expect(currentChecks[1]?.()).toBe(true);

    gates[1]?.resolve();
    await scheduler.whenIdle();
    expect(scheduler.hasPending()).toBe(false);
  });

  it("drops automatic triggers inside the completion cooldown but not forced ones", async () => {
    const execute = vi.fn(async () => undefined);
    const scheduler = new RefreshScheduler({ timing, now: () => Date.now(), execute });

    scheduler.trigger(ALL, { force: true });
    await vi.advanceTimersByTimeAsync(150);
    expect(execute).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(100);
    expect(scheduler.trigger(ALL)).toBe("dropped_cooldown");
    expect(scheduler.trigger(ALL, { force: true })).toBe("scheduled");

    await vi.advanceTimersByTimeAsync(150);
    expect(execute).toHaveBeenCalledTimes(2);

    await vi.advanceTimersByTimeAsync(200);
    expect(scheduler.trigger(ALL)).toBe("scheduled");
  });

  it("runs different scopes in parallel", async () => {
    const gate = deferred();
    const started: string[] = [];
    const scheduler = new RefreshScheduler({
      timing,
      now: () => Date.now(),
      execute: (job) => {
        started.push(job.key);
        return gate.promise;
      },
    });
    const day: RefreshScope = { kind: "day", dayStartMs: at(2024, 3, 5, 0) };
    const month: RefreshScope = { kind: "month", monthStartMs: at(2024, 3, 1, 0) };

    scheduler.trigger(day, { force: true });
    scheduler.trigger(month, { force: true });
    await vi.advanceTimersByTimeAsync(150);

    expect(started).toEqual(["day:2024-03-05", "month:2024-03"]);
    expect(scheduler.executionCount()).toBe(2);

    gate.resolve();
    await scheduler.whenIdle();
    expect(scheduler.hasPending()).toBe(false);
  });

  it("tracks staleness per channel", async () => {
    const checks = new Map<string, () => boolean>();
    const gate = deferred();
    const scheduler = new RefreshScheduler({
      timing,
      now: () => Date.now(),
      execute: (job, isCurrent) => {
        checks.set(job.channel, isCurrent);
        return gate.promise;
      },
    });

    scheduler.trigger(ALL, { force: true });
    await vi.advanceTimersByTimeAsync(150);
    scheduler.trigger({ kind: "month", monthStartMs: at(2024, 2, 1, 0) }, { force: true, channel: "navigation" });
    await vi.advanceTimersByTimeAsync(150);

    expect(checks.get(PRIMARY_CHANNEL)?.()).toBe(true);
    expect(checks.get("navigation")?.()).toBe(true);

    scheduler.trigger({ kind: "month", monthStartMs: at(2024, 1, 1, 0) }, { force: true, channel: "navigation" });
    expect(checks.get("navigation")?.()).toBe(false);
    expect(checks.get(PRIMARY_CHANNEL)?.()).toBe(true);

    scheduler.stop();
    gate.resolve();
    await scheduler.whenIdle();
  });

  it("does not start the cooldown after a failed execution", async () => {
    const scheduler = new RefreshScheduler({
      timing,
      now: () => Date.now(),
      execute: async () => {
        throw new Error("boom");
      },
    });

    scheduler.trigger(ALL, { force: true });
    await vi.advanceTimersByTimeAsync(150);
    await scheduler.whenIdle();
    expect(scheduler.hasPending()).toBe(false);
    expect(scheduler.trigger(ALL)).toBe("scheduled");
  });
});
