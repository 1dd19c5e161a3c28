import type { ParseQuality, SessionOverlay, SessionRecord } from "@sessiondex/contracts";
import { sourceKey } from "./utils.js";

const QUALITY_RANK: Record<ParseQuality, number> = {
  metadata: 0,
  full: 1,
  enriched: 2,
};

export function qualityRank(quality: ParseQuality | undefined): number {
  return quality === undefined ? -1 : QUALITY_RANK[quality];
}

function richness(record: SessionRecord): number {
  return record.userMessageCount + record.assistantMessageCount + record.toolInvocationCount;
}

function recency(record: SessionRecord): number {
  return record.lastUpdatedAtMs ?? record.createdAtMs;
}

function compareText(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/** Key-order independent serialization; equal for records with equal values. */
export function recordSignature(record: SessionRecord): string {
  const entries = Object.entries(record).sort(([a], [b]) => compareText(a, b));
  return JSON.stringify(entries);
}

function compareSize(a: SessionRecord, b: SessionRecord): number {
  return (b.fileSizeBytes ?? -1) - (a.fileSizeBytes ?? -1);
}

/** Two reads of one file: the newer stat first. A record without a stat sorts after one with it. */
function compareStat(a: SessionRecord, b: SessionRecord): number {
  const newer = (b.fileMtimeMs ?? -1) - (a.fileMtimeMs ?? -1);
  if (newer !== 0) return newer;
  return compareSize(a, b);
}

/** Total order used once candidates share quality: recency, size, then identity. */
function compareAcross(a: SessionRecord, b: SessionRecord): number {
  const newer = recency(b) - recency(a);
  if (newer !== 0) return newer;
  const larger = compareSize(a, b);
  if (larger !== 0) return larger;
  return (
    compareText(a.id, b.id) ||
    compareText(sourceKey(a.source), sourceKey(b.source)) ||
    compareText(a.filePath, b.filePath) ||
    compareText(recordSignature(a), recordSignature(b))
  );
}

/** Candidates of equal file size are most likely two parse passes of one file. */
function compareSameSize(a: SessionRecord, b: SessionRecord): number {
  const richer = richness(b) - richness(a);
  if (richer !== 0) return richer;
  const longer = b.lineCount - a.lineCount;
  if (longer !== 0) return longer;
  return compareAcross(a, b);
}

/** An unknown quality ranks with metadata: it loses only to a full or enriched parse. */
function effectiveRank(record: SessionRecord): number {
  return Math.max(qualityRank(record.parseQuality), QUALITY_RANK.metadata);
}

function compareRank(a: SessionRecord, b: SessionRecord): number {
  return effectiveRank(b) - effectiveRank(a);
}

function best(records: Iterable<SessionRecord>, compare: (a: SessionRecord, b: SessionRecord) => number): SessionRecord | undefined {
  let winner: SessionRecord | undefined;
  for (const record of records) {
    if (winner === undefined || compare(record, winner) < 0) winner = record;
  }
  return winner;
}

function groupBy<K>(records: Iterable<SessionRecord>, keyOf: (record: SessionRecord) => K): Map<K, SessionRecord[]> {
  const groups = new Map<K, SessionRecord[]>();
  for (const record of records) {
    const key = keyOf(record);
    const group = groups.get(key);
    if (group) group.push(record);
    else groups.set(key, [record]);
  }
  return groups;
}

/**
 * Picks one record among candidates for the same session id. The result depends only on the set
 * of candidates, never on their order:
 * 1. per file path only the newest stat survives, so a changed file replaces any older parse of it;
 *    reads of one stat keep the best parse
 * 2. the highest parse quality among the survivors
 * 3. per file size, the richer counters, then more lines
 * 4. across sizes, recency, then size, then source key, file path and content
 */
export function selectRecord(candidates: readonly SessionRecord[]): SessionRecord | undefined {
  const perFile: SessionRecord[] = [];
  for (const group of groupBy(candidates, (record) => record.filePath).values()) {
    const newest = best(group, (a, b) => compareStat(a, b) || compareRank(a, b) || compareSameSize(a, b));
    if (newest) perFile.push(newest);
  }

  const topRank = Math.max(...perFile.map(effectiveRank));
  const topQuality = perFile.filter((record) => effectiveRank(record) === topRank);

  // a record without a size never shares a group
  const bySize = groupBy(topQuality, (record) => record.fileSizeBytes ?? record);
  const sizeWinners: SessionRecord[] = [];
  for (const group of bySize.values()) {
    const winner = best(group, compareSameSize);
    if (winner) sizeWinners.push(winner);
  }
  return best(sizeWinners, compareAcross);
}

export function preferRecord(a: SessionRecord, b: SessionRecord): SessionRecord {
  return selectRecord([a, b]) ?? a;
}

export function withoutOverlay(record: SessionRecord): SessionRecord {
  if (record.title === undefined && record.comment === undefined) return record;
  const { title: _title, comment: _comment, ...rest } = record;
  return rest;
}

/**
 * Deduplicates `existing` and `incoming` by id. Pure and order independent; output is sorted by id.
 * Overlay fields are not carried: callers re-apply them with {@link applyOverlays}.
 */
export function mergeRecords(existing: readonly SessionRecord[], incoming: readonly SessionRecord[]): SessionRecord[] {
  const candidates = [...existing, ...incoming].map(withoutOverlay);
  const merged: SessionRecord[] = [];
  for (const group of groupBy(candidates, (record) => record.id).values()) {
    const winner = selectRecord(group);
    if (winner) merged.push(winner);
  }
  return merged.sort((a, b) => compareText(a.id, b.id));
}

export type OverlayLookup = (id: string) => SessionOverlay | undefined;

/**
 * Copies user title/comment onto merged records. The overlay store wins; otherwise the
 * previous committed record's values are kept.
 */
export function applyOverlays(
  records: readonly SessionRecord[],
  overlays: OverlayLookup,
  previousById?: ReadonlyMap<string, SessionRecord>,
): SessionRecord[] {
  return records.map((record) => {
    const overlay = overlays(record.id);
    const previous = previousById?.get(record.id);
    const title = overlay ? overlay.title : previous?.title;
    const comment = overlay ? overlay.comment : previous?.comment;
    if (title === undefined && comment === undefined) return record;
    const next: SessionRecord = { ...withoutOverlay(record) };
    if (title !== undefined) next.title = title;
    if (comment !== undefined) next.comment = comment;
    return next;
  });
}
