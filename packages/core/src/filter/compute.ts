import { createHash } from "node:crypto";
import type { DateDimension, SessionDaySection, SessionRecord, SortOrder } from "@sessiondex/contracts";
import { dayTitle, startOfDayMs } from "../calendar.js";
import { dayEntryFor, type SessionDayEntry } from "../dayIndex.js";
import { matchesProjectFilter } from "../projects.js";
import { durationMs, effectiveTitle, referenceDateMs } from "../records.js";
import { canonicalPath, isPathWithin } from "../utils.js";
import { coverageKey, type DayDescriptor, type FilterSnapshot } from "./snapshot.js";

export interface FilterComputation {
  generation: number;
  visibleSessions: SessionRecord[];
  sections: SessionDaySection[];
  /** Working directories canonicalized during this run that the snapshot's cache did not have. */
  resolvedPaths: Array<[string, string]>;
  digest: string;
}

function compareText(a: string, b: string): number {
  return a.localeCompare(b, undefined, { sensitivity: "base" }) || (a < b ? -1 : a > b ? 1 : 0);
}

export function sortSessions(sessions: readonly SessionRecord[], order: SortOrder, dimension: DateDimension): SessionRecord[] {
  const recency = (record: SessionRecord): number => referenceDateMs(record, dimension);
  const byRecency = (a: SessionRecord, b: SessionRecord): number => recency(b) - recency(a);
  const byId = (a: SessionRecord, b: SessionRecord): number => compareText(a.id, b.id);

  const comparators: Record<SortOrder, (a: SessionRecord, b: SessionRecord) => number> = {
    most_recent: (a, b) => byRecency(a, b) || byId(a, b),
    longest_duration: (a, b) => durationMs(b) - durationMs(a) || byRecency(a, b) || byId(a, b),
    most_activity: (a, b) =>
      b.eventCount - a.eventCount || byRecency(a, b) || compareText(effectiveTitle(a), effectiveTitle(b)) || byId(a, b),
    alphabetical: (a, b) => compareText(effectiveTitle(a), effectiveTitle(b)) || byRecency(a, b) || byId(a, b),
    largest_size: (a, b) => (b.fileSizeBytes ?? -1) - (a.fileSizeBytes ?? -1) || byRecency(a, b) || byId(a, b),
  };
  return [...sessions].sort(comparators[order]);
}

export function groupIntoSections(
  sessions: readonly SessionRecord[],
  dimension: DateDimension,
  nowMs: number,
): SessionDaySection[] {
  const byDay = new Map<number, SessionDaySection>();
  for (const session of sessions) {
    const dayStartMs = startOfDayMs(referenceDateMs(session, dimension));
    let section = byDay.get(dayStartMs);
    if (!section) {
      section = { dayStartMs, title: dayTitle(dayStartMs, nowMs), totalDurationMs: 0, totalEvents: 0, sessions: [] };
      byDay.set(dayStartMs, section);
    }
    section.sessions.push(session);
    section.totalDurationMs += durationMs(session);
    section.totalEvents += session.eventCount;
  }
  return Array.from(byDay.values()).sort((a, b) => b.dayStartMs - a.dayStartMs);
}

export function sectionsDigest(sections: readonly SessionDaySection[]): string {
  const hash = createHash("sha1");
  for (const section of sections) {
    hash.update(`#${section.dayStartMs}|${section.title}\n`);
    for (const session of section.sessions) {
      hash.update(
        [
          session.id,
          session.filePath,
          session.workingDirectory,
          session.createdAtMs,
          session.lastUpdatedAtMs ?? "",
          durationMs(session),
          session.eventCount,
          session.userMessageCount,
          session.assistantMessageCount,
          session.toolInvocationCount,
          session.lineCount,
          session.fileSizeBytes ?? "",
          session.parseQuality ?? "",
          effectiveTitle(session),
          session.comment ?? "",
        ].join("\u0000"),
      );
      hash.update("\n");
    }
  }
  return hash.digest("hex");
}

export function matchesDay(
  record: SessionRecord,
  entry: SessionDayEntry,
  descriptors: readonly DayDescriptor[],
  dimension: DateDimension,
  coverage: FilterSnapshot["coverage"],
): boolean {
  return descriptors.some((descriptor) => {
    if (dimension === "created") {
      return entry.createdDayStartMs === descriptor.dayStartMs;
    }
    if (coverage.get(coverageKey(record.id, descriptor.monthKey))?.has(descriptor.day)) {
      return true;
    }
    return entry.updatedDayStartMs === descriptor.dayStartMs;
  });
}

function matchesSearch(record: SessionRecord, needle: string): boolean {
  if (!needle) return true;
  if (effectiveTitle(record).toLowerCase().includes(needle)) return true;
  return (record.comment ?? "").toLowerCase().includes(needle);
}

/** Pure: the same snapshot always yields the same result. */
export function computeFilterResult(snapshot: FilterSnapshot): FilterComputation {
  const resolved = new Map<string, string>();
  const canonicalFor = (raw: string): string => {
    const known = snapshot.canonicalPaths.get(raw) ?? resolved.get(raw);
    if (known !== undefined) return known;
    const value = canonicalPath(raw);
    resolved.set(raw, value);
    return value;
  };

  let candidates: readonly SessionRecord[] = snapshot.sessions;

  const pathFilter = snapshot.pathFilter;
  if (pathFilter !== null) {
    candidates = candidates.filter((record) => isPathWithin(canonicalFor(record.workingDirectory), pathFilter));
  }

  const projectFilter = snapshot.projectFilter;
  if (projectFilter !== null) {
    candidates = candidates.filter((record) => matchesProjectFilter(record, projectFilter));
  }

  if (snapshot.dayDescriptors.length > 0) {
    candidates = candidates.filter((record) =>
      matchesDay(
        record,
        snapshot.dayIndex.get(record.id) ?? dayEntryFor(record),
        snapshot.dayDescriptors,
        snapshot.dateDimension,
        snapshot.coverage,
      ),
    );
  }

  if (snapshot.searchNeedle) {
    candidates = candidates.filter((record) => matchesSearch(record, snapshot.searchNeedle));
  }

  const visibleSessions = sortSessions(candidates, snapshot.sortOrder, snapshot.dateDimension);
  const sections = groupIntoSections(visibleSessions, snapshot.dateDimension, snapshot.nowMs);
  return {
    generation: snapshot.generation,
    visibleSessions,
    sections,
    resolvedPaths: Array.from(resolved.entries()),
    digest: sectionsDigest(sections),
  };
}
