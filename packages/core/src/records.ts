import type { DateDimension, DateRange, LoadContext, SessionRecord } from "@sessiondex/contracts";
import { canonicalPath, isPathWithin } from "./utils.js";

/** Creation time for the created dimension, last update (falling back to creation) for updated. */
export function referenceDateMs(record: SessionRecord, dimension: DateDimension): number {
  if (dimension === "created") return record.createdAtMs;
  return record.lastUpdatedAtMs ?? record.createdAtMs;
}

export function durationMs(record: SessionRecord): number {
  if (record.activeDurationMs !== null) return Math.max(0, record.activeDurationMs);
  const end = record.lastUpdatedAtMs ?? record.createdAtMs;
  return Math.max(0, end - record.createdAtMs);
}

export function effectiveTitle(record: SessionRecord): string {
  const custom = record.title?.trim();
  if (custom) return custom;
  const preview = record.preview?.trim();
  if (preview) return preview;
  const tail = record.workingDirectory.replace(/\/+$/g, "").split("/").pop();
  return tail || record.id;
}

export function activityInterval(record: SessionRecord): DateRange {
  const endMs = Math.max(record.createdAtMs, record.lastUpdatedAtMs ?? record.createdAtMs);
  return { startMs: record.createdAtMs, endMs };
}

/** Whether a record falls inside a refresh window. Updated matches any overlap with the activity interval. */
export function recordInRange(record: SessionRecord, range: DateRange | null, dimension: DateDimension): boolean {
  if (!range) return true;
  if (dimension === "created") {
    return record.createdAtMs >= range.startMs && record.createdAtMs < range.endMs;
  }
  const interval = activityInterval(record);
  return interval.startMs < range.endMs && interval.endMs >= range.startMs;
}

export function inProjectDirectories(record: SessionRecord, directories: readonly string[] | null): boolean {
  if (!directories) return true;
  const cwd = canonicalPath(record.workingDirectory);
  return directories.some((directory) => isPathWithin(cwd, canonicalPath(directory)));
}

/** Whether a load with `context` is responsible for `record`. */
export function recordMatchesContext(
  record: SessionRecord,
  context: Pick<LoadContext, "dateRange" | "dateDimension" | "projectDirectories">,
): boolean {
  return (
    recordInRange(record, context.dateRange, context.dateDimension) &&
    inProjectDirectories(record, context.projectDirectories)
  );
}
