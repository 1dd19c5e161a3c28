import type { DateDimension, SessionRecord } from "@sessiondex/contracts";
import { monthKey } from "../calendar.js";
import type { SessionDayEntry } from "../dayIndex.js";
import { coverageKey } from "../filter/snapshot.js";

export interface MonthCountsInput {
  sessions: readonly SessionRecord[];
  dayEntry: (record: SessionRecord) => SessionDayEntry;
  coverage: ReadonlyMap<string, ReadonlySet<number>>;
  dimension: DateDimension;
  monthStartMs: number;
}

/**
 * Sessions per day of month. Created counts each session once on its creation day; updated counts
 * every covered day, falling back to the last-update day when no coverage is known.
 */
export function computeMonthCounts(input: MonthCountsInput): Map<number, number> {
  const month = monthKey(input.monthStartMs);
  const counts = new Map<number, number>();
  const bump = (day: number): void => {
    counts.set(day, (counts.get(day) ?? 0) + 1);
  };

  for (const session of input.sessions) {
    const entry = input.dayEntry(session);
    if (input.dimension === "created") {
      if (entry.createdMonthKey === month) bump(entry.createdDay);
      continue;
    }
    const covered = input.coverage.get(coverageKey(session.id, month));
    if (covered && covered.size > 0) {
      for (const day of covered) bump(day);
    } else if (entry.updatedMonthKey === month) {
      bump(entry.updatedDay);
    }
  }
  return counts;
}

export interface MonthCountsKey {
  dimension: DateDimension;
  monthStartMs: number;
  sessionsVersion: number;
  coverageVersion: number;
  /** Extra selection input, such as the project filter, that narrows the counted sessions. */
  selection?: string;
}

function encodeKey(key: MonthCountsKey): string {
  return [key.dimension, monthKey(key.monthStartMs), key.sessionsVersion, key.coverageVersion, key.selection ?? ""].join("|");
}

/** Memoizes month histograms; an entry is reused only when every input in its key is unchanged. */
export class MonthCountsCache {
  private readonly cache = new Map<string, ReadonlyMap<number, number>>();
  private hits = 0;
  private misses = 0;

  countsFor(key: MonthCountsKey, compute: () => Map<number, number>): ReadonlyMap<number, number> {
    const encoded = encodeKey(key);
    const cached = this.cache.get(encoded);
    if (cached) {
      this.hits += 1;
      return cached;
    }
    this.misses += 1;
    const value = compute();
    // versions only grow, older entries can never hit again
    for (const existing of this.cache.keys()) {
      if (existing.startsWith(`${key.dimension}|${monthKey(key.monthStartMs)}|`)) this.cache.delete(existing);
    }
    this.cache.set(encoded, value);
    return value;
  }

  getStats(): { hits: number; misses: number; size: number } {
    return { hits: this.hits, misses: this.misses, size: this.cache.size };
  }
}
