import type { DateDimension, FilterState, Project, SessionRecord, SortOrder } from "@sessiondex/contracts";
import { dayOfMonth, monthKey, startOfDayMs } from "../calendar.js";
import type { SessionDayEntry } from "../dayIndex.js";
import { buildProjectFilter, type ProjectFilter } from "../projects.js";
import { canonicalPath } from "../utils.js";

export interface DayDescriptor {
  dayStartMs: number;
  monthKey: string;
  day: number;
}

/** Every input the filter pipeline reads. Frozen once built. */
export interface FilterSnapshot {
  readonly generation: number;
  readonly sessionsVersion: number;
  readonly sessions: readonly SessionRecord[];
  readonly pathFilter: string | null;
  readonly projectFilter: ProjectFilter | null;
  readonly dayDescriptors: readonly DayDescriptor[];
  readonly dateDimension: DateDimension;
  readonly searchNeedle: string;
  readonly sortOrder: SortOrder;
  readonly canonicalPaths: ReadonlyMap<string, string>;
  readonly dayIndex: ReadonlyMap<string, SessionDayEntry>;
  /** Active days keyed by `sessionId|YYYY-MM`. */
  readonly coverage: ReadonlyMap<string, ReadonlySet<number>>;
  readonly nowMs: number;
}

export interface FilterSnapshotInput {
  generation: number;
  sessionsVersion: number;
  sessions: readonly SessionRecord[];
  state: FilterState;
  projects: readonly Project[];
  memberships: ReadonlyMap<string, string>;
  canonicalPaths: ReadonlyMap<string, string>;
  dayIndex: ReadonlyMap<string, SessionDayEntry>;
  coverage: ReadonlyMap<string, ReadonlySet<number>>;
  nowMs: number;
}

export function coverageKey(sessionId: string, month: string): string {
  return `${sessionId}|${month}`;
}

export function buildDayDescriptors(selectedDays: readonly number[]): DayDescriptor[] {
  const seen = new Set<number>();
  const descriptors: DayDescriptor[] = [];
  for (const raw of selectedDays) {
    const dayStartMs = startOfDayMs(raw);
    if (seen.has(dayStartMs)) continue;
    seen.add(dayStartMs);
    descriptors.push({ dayStartMs, monthKey: monthKey(dayStartMs), day: dayOfMonth(dayStartMs) });
  }
  return descriptors.sort((a, b) => a.dayStartMs - b.dayStartMs);
}

export function buildFilterSnapshot(input: FilterSnapshotInput): FilterSnapshot {
  const { state } = input;
  const selectedPath = state.selectedPath ? canonicalPath(state.selectedPath) : "";
  const snapshot: FilterSnapshot = {
    generation: input.generation,
    sessionsVersion: input.sessionsVersion,
    sessions: Object.freeze([...input.sessions]),
    pathFilter: selectedPath || null,
    projectFilter: buildProjectFilter(state.selectedProjectIds, input.projects, new Map(input.memberships)),
    dayDescriptors: Object.freeze(buildDayDescriptors(state.selectedDays)),
    dateDimension: state.dateDimension,
    searchNeedle: state.quickSearch.trim().toLowerCase(),
    sortOrder: state.sortOrder,
    canonicalPaths: new Map(input.canonicalPaths),
    dayIndex: new Map(input.dayIndex),
    coverage: new Map(input.coverage),
    nowMs: input.nowMs,
  };
  return Object.freeze(snapshot);
}
