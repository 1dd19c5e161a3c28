import type { SessionRecord } from "@sessiondex/contracts";
import { monthKey, monthRange, startOfMonthMs } from "../calendar.js";
import { KeyedDebouncer } from "../debounce.js";
import { asErrorMessage } from "../errors.js";
import { coverageKey } from "../filter/snapshot.js";
import { childLogger, type Logger } from "../logger.js";
import { activityInterval } from "../records.js";
import { canonicalPath, isPathWithin, stableId } from "../utils.js";
import type { CoverageScanner, DayCoverage } from "./scanner.js";

export interface CoverageRequest {
  monthStartMs: number;
  projectPath: string | null;
  force: boolean;
}

export interface CoverageCacheOptions {
  scanner: CoverageScanner;
  /** Current primary store; read when a debounced request fires. */
  sessions: () => readonly SessionRecord[];
  /** Called only when at least one session's day set actually changed. */
  onChange: (month: string, changedIds: readonly string[]) => void;
  debounceMs: number;
  emptyRetryLimit: number;
  logger?: Logger;
}

export interface CoverageCacheStats {
  scans: number;
  skippedUnchanged: number;
  emptyResults: number;
  changes: number;
}

interface InFlightScan {
  promise: Promise<void>;
  controller: AbortController;
}

function coverageRequestKey(month: string, projectPath: string | null): string {
  return `updated|${month}|${projectPath ?? ""}`;
}

/** Sessions whose activity interval overlaps the month, optionally under a working-directory prefix. */
export function sessionsIntersecting(
  sessions: readonly SessionRecord[],
  monthStartMs: number,
  projectPath: string | null,
): SessionRecord[] {
  const range = monthRange(startOfMonthMs(monthStartMs));
  const prefix = projectPath ? canonicalPath(projectPath) : null;
  return sessions.filter((session) => {
    const interval = activityInterval(session);
    if (interval.startMs >= range.endMs || interval.endMs < range.startMs) return false;
    return prefix === null || isPathWithin(canonicalPath(session.workingDirectory), prefix);
  });
}

function targetSignature(targets: readonly SessionRecord[]): string {
  return stableId(
    targets
      .map((target) => `${target.id}:${target.lastUpdatedAtMs ?? target.createdAtMs}:${target.fileSizeBytes ?? ""}`)
      .sort(),
  );
}

function sameDays(a: ReadonlySet<number> | undefined, b: ReadonlySet<number>): boolean {
  if (!a || a.size !== b.size) return false;
  for (const day of b) {
    if (!a.has(day)) return false;
  }
  return true;
}

/**
 * Per-(month, project path) day coverage. Requests are debounced per key, a key has at most one
 * scan in flight and a request arriving meanwhile is re-issued after it. An empty scan counts as
 * "not ready" and is retried instead of being stored.
 */
export class CoverageCache {
  private readonly entries = new Map<string, ReadonlySet<number>>();
  private readonly inFlight = new Map<string, InFlightScan>();
  private readonly pending = new Map<string, CoverageRequest>();
  private readonly emptyRetries = new Map<string, number>();
  private readonly lastSignature = new Map<string, string>();
  private readonly debouncer: KeyedDebouncer<CoverageRequest>;
  private readonly log: Logger;
  private version = 0;
  private readonly stats: CoverageCacheStats = { scans: 0, skippedUnchanged: 0, emptyResults: 0, changes: 0 };

  constructor(private readonly options: CoverageCacheOptions) {
    this.log = options.logger ?? childLogger("coverage");
    this.debouncer = new KeyedDebouncer<CoverageRequest>({
      coalesce: (pending, next) => ({ ...next, force: pending.force || next.force }),
      delayMs: () => this.options.debounceMs,
      onFire: (key, request) => this.launch(key, request),
    });
  }

  request(monthStartMs: number, projectPath: string | null, options: { force?: boolean } = {}): string {
    const force = options.force ?? false;
    const normalizedPath = projectPath ? canonicalPath(projectPath) : null;
    const key = coverageRequestKey(monthKey(monthStartMs), normalizedPath);
    if (force) {
      this.lastSignature.delete(key);
      this.emptyRetries.delete(key);
      this.pending.delete(key);
    }
    this.debouncer.schedule(key, { monthStartMs: startOfMonthMs(monthStartMs), projectPath: normalizedPath, force });
    return key;
  }

  /** Read API: cached day sets for the given sessions in one month. */
  dayCoverage(monthStartMs: number, sessionIds: Iterable<string>): Map<string, ReadonlySet<number>> {
    const month = monthKey(monthStartMs);
    const out = new Map<string, ReadonlySet<number>>();
    for (const id of sessionIds) {
      const days = this.entries.get(coverageKey(id, month));
      if (days) out.set(id, days);
    }
    return out;
  }

  /** All entries keyed by `sessionId|YYYY-MM`. Values are never mutated in place. */
  entriesView(): ReadonlyMap<string, ReadonlySet<number>> {
    return this.entries;
  }

  currentVersion(): number {
    return this.version;
  }

  getStats(): CoverageCacheStats {
    return { ...this.stats };
  }

  hasPending(): boolean {
    return this.debouncer.size > 0 || this.inFlight.size > 0 || this.pending.size > 0;
  }

  prune(validIds: ReadonlySet<string>): number {
    let removed = 0;
    for (const key of this.entries.keys()) {
      const id = key.slice(0, key.lastIndexOf("|"));
      if (!validIds.has(id)) {
        this.entries.delete(key);
        removed += 1;
      }
    }
    if (removed > 0) this.version += 1;
    return removed;
  }

  markFileModified(filePath: string): void {
    this.options.scanner.markFileModified(filePath);
    this.lastSignature.clear();
  }

  async whenIdle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(Array.from(this.inFlight.values(), (scan) => scan.promise));
    }
  }

  stop(): void {
    this.debouncer.cancelAll();
    this.pending.clear();
    for (const scan of this.inFlight.values()) scan.controller.abort();
  }

  private launch(key: string, request: CoverageRequest): void {
    const running = this.inFlight.get(key);
    if (running) {
      const queued = this.pending.get(key);
      this.pending.set(key, { ...request, force: request.force || (queued?.force ?? false) });
      return;
    }
    const controller = new AbortController();
    const promise = this.run(key, request, controller.signal).finally(() => {
      this.inFlight.delete(key);
      const next = this.pending.get(key);
      if (next && !controller.signal.aborted) {
        this.pending.delete(key);
        this.debouncer.schedule(key, next);
      }
    });
    this.inFlight.set(key, { promise, controller });
  }

  private async run(key: string, request: CoverageRequest, signal: AbortSignal): Promise<void> {
    const month = monthKey(request.monthStartMs);
    if (request.force) {
      try {
        await this.options.scanner.invalidate(month, request.projectPath);
      } catch (error) {
        this.log.warn({ key, err: asErrorMessage(error) }, "coverage invalidation failed");
      }
    }

    const targets = sessionsIntersecting(this.options.sessions(), request.monthStartMs, request.projectPath);
    if (targets.length === 0) return;

    const signature = targetSignature(targets);
    if (!request.force && this.lastSignature.get(key) === signature) {
      this.stats.skippedUnchanged += 1;
      return;
    }

    this.stats.scans += 1;
    let data: DayCoverage;
    try {
      data = await this.options.scanner.scan(request.monthStartMs, targets, signal);
    } catch (error) {
      this.log.warn({ key, err: asErrorMessage(error) }, "coverage scan failed");
      data = new Map();
    }
    if (signal.aborted) return;

    if (data.size === 0) {
      this.stats.emptyResults += 1;
      const attempts = this.emptyRetries.get(key) ?? 0;
      if (attempts < this.options.emptyRetryLimit) {
        this.emptyRetries.set(key, attempts + 1);
        if (!this.pending.has(key)) this.pending.set(key, { ...request, force: false });
      }
      return;
    }

    this.emptyRetries.delete(key);
    this.lastSignature.set(key, signature);
    const changed = this.merge(month, targets, data);
    if (changed.length > 0) {
      this.version += 1;
      this.stats.changes += 1;
      this.options.onChange(month, changed);
    }
  }

  private merge(month: string, targets: readonly SessionRecord[], data: DayCoverage): string[] {
    const validIds = new Set(this.options.sessions().map((session) => session.id));
    const changed: string[] = [];
    for (const target of targets) {
      if (!validIds.has(target.id)) continue;
      const key = coverageKey(target.id, month);
      const days = data.get(target.id);
      const existing = this.entries.get(key);
      if (!days || days.size === 0) {
        if (existing) {
          this.entries.delete(key);
          changed.push(target.id);
        }
        continue;
      }
      if (sameDays(existing, days)) continue;
      this.entries.set(key, new Set(days));
      changed.push(target.id);
    }
    return changed;
  }
}
