import type { SessionRecord } from "@sessiondex/contracts";
import { dayOfMonth, monthKey, startOfDayMs } from "./calendar.js";

export interface SessionDayEntry {
  createdDayStartMs: number;
  createdMonthKey: string;
  createdDay: number;
  updatedDayStartMs: number;
  updatedMonthKey: string;
  updatedDay: number;
}

export function dayEntryFor(record: SessionRecord): SessionDayEntry {
  const updatedMs = record.lastUpdatedAtMs ?? record.createdAtMs;
  return {
    createdDayStartMs: startOfDayMs(record.createdAtMs),
    createdMonthKey: monthKey(record.createdAtMs),
    createdDay: dayOfMonth(record.createdAtMs),
    updatedDayStartMs: startOfDayMs(updatedMs),
    updatedMonthKey: monthKey(updatedMs),
    updatedDay: dayOfMonth(updatedMs),
  };
}

interface CachedEntry {
  createdAtMs: number;
  lastUpdatedAtMs: number | null;
  entry: SessionDayEntry;
}

/** Memoized calendar placement of each session, recomputed only when its timestamps move. */
export class SessionDayIndex {
  private readonly entries = new Map<string, CachedEntry>();

  entryFor(record: SessionRecord): SessionDayEntry {
    const cached = this.entries.get(record.id);
    if (cached && cached.createdAtMs === record.createdAtMs && cached.lastUpdatedAtMs === record.lastUpdatedAtMs) {
      return cached.entry;
    }
    const entry = dayEntryFor(record);
    this.entries.set(record.id, { createdAtMs: record.createdAtMs, lastUpdatedAtMs: record.lastUpdatedAtMs, entry });
    return entry;
  }

  prune(validIds: ReadonlySet<string>): void {
    for (const id of this.entries.keys()) {
      if (!validIds.has(id)) this.entries.delete(id);
    }
  }

  snapshot(records: readonly SessionRecord[]): ReadonlyMap<string, SessionDayEntry> {
    const out = new Map<string, SessionDayEntry>();
    for (const record of records) out.set(record.id, this.entryFor(record));
    return out;
  }

  get size(): number {
    return this.entries.size;
  }
}
