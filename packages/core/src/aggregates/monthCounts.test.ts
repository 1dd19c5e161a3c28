import { describe, expect, it } from "vitest";
import { at, makeRecord } from "../__tests__/fixtures.js";
import { dayEntryFor } from "../dayIndex.js";
import { MonthCountsCache, computeMonthCounts } from "./monthCounts.js";

const MARCH = at(2024, 3, 1, 0);

describe("computeMonthCounts", () => {
  const sessions = [
    makeRecord({ id: "a", createdAtMs: at(2024, 3, 2, 9), lastUpdatedAtMs: at(2024, 3, 20, 18) }),
    makeRecord({ id: "b", lastUpdatedAtMs: at(2024, 3, 20, 11) }),
    makeRecord({ id: "c", createdAtMs: at(2024, 4, 2, 9), lastUpdatedAtMs: at(2024, 4, 2, 10) }),
  ];
  const coverage = new Map([["a|2024-03", new Set([3, 5])]]);

  it("counts covered days in the updated dimension with a last-update fallback", () => {
    const counts = computeMonthCounts({ sessions, dayEntry: dayEntryFor, coverage, dimension: "updated", monthStartMs: MARCH });
    expect(counts).toEqual(
      new Map([
        [3, 1],
        [5, 1],
        [20, 1],
      ]),
    );
  });

  it("counts each session once on its creation day in the created dimension", () => {
    const counts = computeMonthCounts({ sessions, dayEntry: dayEntryFor, coverage, dimension: "created", monthStartMs: MARCH });
    expect(counts).toEqual(
      new Map([
        [2, 1],
        [5, 1],
      ]),
    );
  });
});

describe("MonthCountsCache", () => {
  it("reuses an entry only while every key input is unchanged", () => {
    const cache = new MonthCountsCache();
    let computed = 0;
    const compute = (): Map<number, number> => {
      computed += 1;
      return new Map([[1, computed]]);
    };
    const key = { dimension: "updated" as const, monthStartMs: MARCH, sessionsVersion: 1, coverageVersion: 0 };

    const first = cache.countsFor(key, compute);
    expect(cache.countsFor({ ...key, monthStartMs: at(2024, 3, 15) }, compute)).toBe(first);
    cache.countsFor({ ...key, coverageVersion: 1 }, compute);
    cache.countsFor({ ...key, coverageVersion: 1, selection: "p1" }, compute);

    expect(computed).toBe(3);
    expect(cache.getStats()).toEqual({ hits: 1, misses: 3, size: 1 });

    cache.countsFor({ ...key, dimension: "created" }, compute);
    expect(cache.getStats().size).toBe(2);
  });
});
