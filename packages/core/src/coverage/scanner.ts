import { readFile, stat } from "node:fs/promises";
import type { SessionRecord } from "@sessiondex/contracts";
import { dayOfMonth, monthKey } from "../calendar.js";
import { asErrorMessage } from "../errors.js";
import { childLogger, type Logger } from "../logger.js";
import { canonicalPath, isPathWithin, parseEpochMs } from "../utils.js";

/** Active days per session id for one month. */
export type DayCoverage = Map<string, Set<number>>;

export interface CoverageScanner {
  scan(monthStartMs: number, sessions: readonly SessionRecord[], signal?: AbortSignal): Promise<DayCoverage>;
  /** Drops cached results for a month, optionally only for sessions under `projectPath`. */
  invalidate(monthKey: string, projectPath: string | null): Promise<void>;
  markFileModified(filePath: string): void;
}

export interface StoredCoverage {
  mtimeMs: number;
  days: number[];
}

/** Persistent side of the scanner's cache, keyed by (file, month) and validated by mtime. */
export interface CoverageDiskStore {
  getCoverage(filePath: string, month: string): StoredCoverage | null;
  putCoverage(filePath: string, month: string, cwd: string, entry: StoredCoverage): void;
  deleteCoverage(month: string, cwdPrefix: string | null): number;
  deleteCoverageForFile(filePath: string): number;
}

interface MemoryEntry extends StoredCoverage {
  cwd: string;
}

const TIMESTAMP_PATTERN = /"(?:timestamp|ts|created_at|updated_at)"\s*:\s*("([^"]+)"|\d{10,13})/g;

/** Collects the days within `month` on which any timestamp in `text` falls. */
export function extractActiveDays(text: string, month: string): number[] {
  const days = new Set<number>();
  for (const match of text.matchAll(TIMESTAMP_PATTERN)) {
    const ms = match[2] !== undefined ? parseEpochMs(match[2]) : parseEpochMs(Number(match[1]));
    if (ms === null || monthKey(ms) !== month) continue;
    days.add(dayOfMonth(ms));
  }
  return Array.from(days).sort((a, b) => a - b);
}

export interface FileCoverageScannerStats {
  filesRead: number;
  memoryHits: number;
  diskHits: number;
}

/** Reads session files to find active days, caching per (file, month, mtime) in memory and on disk. */
export class FileCoverageScanner implements CoverageScanner {
  private readonly memory = new Map<string, MemoryEntry>();
  private readonly log: Logger;
  readonly stats: FileCoverageScannerStats = { filesRead: 0, memoryHits: 0, diskHits: 0 };

  constructor(
    private readonly disk: CoverageDiskStore | null = null,
    logger?: Logger,
  ) {
    this.log = logger ?? childLogger("coverage");
  }

  async scan(monthStartMs: number, sessions: readonly SessionRecord[], signal?: AbortSignal): Promise<DayCoverage> {
    const month = monthKey(monthStartMs);
    const out: DayCoverage = new Map();
    for (const session of sessions) {
      if (signal?.aborted) break;
      const days = await this.daysFor(session, month);
      if (days && days.length > 0) out.set(session.id, new Set(days));
    }
    return out;
  }

  async invalidate(month: string, projectPath: string | null): Promise<void> {
    const prefix = projectPath ? canonicalPath(projectPath) : null;
    for (const [key, entry] of this.memory) {
      if (!key.endsWith(`|${month}`)) continue;
      if (prefix === null || isPathWithin(entry.cwd, prefix)) this.memory.delete(key);
    }
    this.disk?.deleteCoverage(month, prefix);
  }

  markFileModified(filePath: string): void {
    for (const key of this.memory.keys()) {
      if (key.startsWith(`${filePath}|`)) this.memory.delete(key);
    }
    this.disk?.deleteCoverageForFile(filePath);
  }

  private async daysFor(session: SessionRecord, month: string): Promise<number[] | null> {
    let mtimeMs: number;
    try {
      mtimeMs = (await stat(session.filePath)).mtimeMs;
    } catch (error) {
      this.log.debug({ filePath: session.filePath, err: asErrorMessage(error) }, "coverage target missing");
      return null;
    }

    const key = `${session.filePath}|${month}`;
    const cached = this.memory.get(key);
    if (cached && cached.mtimeMs === mtimeMs) {
      this.stats.memoryHits += 1;
      return cached.days;
    }

    const cwd = canonicalPath(session.workingDirectory);
    const stored = this.disk?.getCoverage(session.filePath, month) ?? null;
    if (stored && stored.mtimeMs === mtimeMs) {
      this.stats.diskHits += 1;
      this.memory.set(key, { ...stored, cwd });
      return stored.days;
    }

    let text: string;
    try {
      text = await readFile(session.filePath, "utf8");
    } catch (error) {
      this.log.debug({ filePath: session.filePath, err: asErrorMessage(error) }, "coverage target unreadable");
      return null;
    }
    this.stats.filesRead += 1;
    const days = extractActiveDays(text, month);
    const entry: StoredCoverage = { mtimeMs, days };
    this.memory.set(key, { ...entry, cwd });
    this.disk?.putCoverage(session.filePath, month, cwd, entry);
    return days;
  }
}
