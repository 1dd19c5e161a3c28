import { EventEmitter } from "node:events";
import { setTimeout as delay } from "node:timers/promises";
import type {
  AggregateState,
  AppConfig,
  CachePolicy,
  FilterState,
  IncrementalHint,
  IndexPerformanceStats,
  LoadContext,
  Project,
  RefreshScope,
  SessionDaySection,
  SessionOverlay,
  SessionRecord,
  StatusMessage,
  StreamEnvelope,
} from "@sessiondex/contracts";
import { computeMonthCounts, MonthCountsCache } from "./aggregates/monthCounts.js";
import { cwdCounts, PathTreeStore } from "./aggregates/pathTree.js";
import { directCounts, ProjectCountsCache, type MembershipView } from "./aggregates/projectCounts.js";
import { AssignIntentTracker, type AssignIntent, type IntentMatch } from "./assignIntents.js";
import { scopeKey, scopeRange, startOfMonthMs } from "./calendar.js";
import { loadConfig } from "./config.js";
import { CoverageCache } from "./coverage/coverageCache.js";
import { FileCoverageScanner, type CoverageDiskStore, type CoverageScanner } from "./coverage/scanner.js";
import { SessionDayIndex } from "./dayIndex.js";
import { EnrichmentQueue, type EnrichmentCandidate } from "./enrichment.js";
import { asErrorMessage } from "./errors.js";
import { matchesDay, type FilterComputation } from "./filter/compute.js";
import { FilterEngine, type ComputeExecutor } from "./filter/filterEngine.js";
import { buildDayDescriptors, buildFilterSnapshot, type FilterSnapshot } from "./filter/snapshot.js";
import { IncrementalHints, subsetQueryForHint } from "./hints.js";
import { childLogger, createLogger, levelFromEnv, type Logger } from "./logger.js";
import { OverlayStore } from "./overlays.js";
import { ProviderPool, type ProviderHealth } from "./providerPool.js";
import { buildProjectFilter, matchesProjectFilter, projectIdFor, projectStructureVersion } from "./projects.js";
import { createDefaultProviders } from "./providers/index.js";
import type { SessionProvider } from "./providers/types.js";
import { SqliteRecordCache, type RecordCache } from "./recordCache.js";
import { applyOverlays, mergeRecords, qualityRank, recordSignature, withoutOverlay } from "./reconciler.js";
import { recordMatchesContext } from "./records.js";
import { PRIMARY_CHANNEL, RefreshScheduler, type RefreshJob, type TriggerOutcome } from "./refreshScheduler.js";
import { canonicalPath, isPathWithin, membershipKey, stableId } from "./utils.js";
import { DirectoryWatcher } from "./watcher.js";

/** Refreshes started by file-system events; kept apart so they never void a user-requested refresh. */
export const WATCH_CHANNEL = "watch";
export const NAVIGATION_CHANNEL = "navigation";

const CACHE_PASSES: readonly CachePolicy[] = ["cacheOnly", "refresh"];
const IDLE_POLL_MS = 5;

export interface SessionIndexOptions {
  config: AppConfig;
  providers: readonly SessionProvider[];
  recordCache?: RecordCache | null;
  coverageStore?: CoverageDiskStore | null;
  overlays?: OverlayStore;
  scanner?: CoverageScanner;
  executor?: ComputeExecutor;
  now?: () => number;
  logger?: Logger;
  /** Start a chokidar watcher over the provider roots in `start()`. */
  watch?: boolean;
  initialFilter?: Partial<FilterState>;
}

export function defaultFilterState(nowMs: number): FilterState {
  return {
    selectedPath: null,
    selectedProjectIds: [],
    selectedDays: [],
    dateDimension: "updated",
    quickSearch: "",
    sortOrder: "most_recent",
    monthStartMs: startOfMonthMs(nowMs),
  };
}

function emptyAggregates(): AggregateState {
  return { pathTree: null, monthCounts: {}, projectCounts: {}, enabledDays: null, sessionCount: 0 };
}

function freezeContext(context: LoadContext): LoadContext {
  return Object.freeze({
    ...context,
    rootPaths: Object.freeze([...context.rootPaths]),
    dateRange: context.dateRange ? Object.freeze({ ...context.dateRange }) : null,
    projectDirectories: context.projectDirectories ? Object.freeze([...context.projectDirectories]) : null,
  });
}

/**
 * Owner of the primary session store and everything derived from it. Providers, scans and filter
 * runs do their work elsewhere and hand results back here; only this class mutates state.
 */
export class SessionIndex extends EventEmitter {
  private readonly config: AppConfig;
  private readonly now: () => number;
  private readonly log: Logger;
  private readonly pool: ProviderPool;
  private readonly scheduler: RefreshScheduler;
  private readonly coverage: CoverageCache;
  private readonly filterEngine: FilterEngine;
  private readonly enrichment: EnrichmentQueue;
  private readonly watcher: DirectoryWatcher;
  private readonly overlays: OverlayStore;
  private readonly recordCache: RecordCache | null;
  private readonly hints = new IncrementalHints();
  private readonly intents = new AssignIntentTracker();
  private readonly dayIndex = new SessionDayIndex();
  private readonly pathTree = new PathTreeStore();
  private readonly monthCounts = new MonthCountsCache();
  private readonly projectCounts = new ProjectCountsCache();
  private readonly canonicalPaths = new Map<string, string>();
  /** Which provider last contributed each record; scopes removals on refresh. */
  private readonly origin = new Map<string, string>();

  private store = new Map<string, SessionRecord>();
  private sessionList: SessionRecord[] | null = null;
  private sessionsVersion = 0;
  private filterState: FilterState;
  private projects: Project[] = [];
  private structureVersion = projectStructureVersion([]);
  private memberships = new Map<string, string>();
  private membershipVersion = 0;
  private sections: SessionDaySection[] = [];
  private visibleCount = 0;
  private aggregates: AggregateState = emptyAggregates();
  private aggregatesDigest = "";
  private status: StatusMessage | null = null;
  private lastFailedScope: RefreshScope | null = null;
  private streamVersion = 0;
  private started = false;
  private readonly perf = { droppedStaleResults: 0, removedSessions: 0, lastRefreshDurationMs: 0, lastRefreshAtMs: 0 };

  constructor(private readonly options: SessionIndexOptions) {
    super();
    this.config = options.config;
    this.now = options.now ?? Date.now;
    this.log = options.logger ?? childLogger("index");
    this.recordCache = options.recordCache ?? null;
    this.overlays = options.overlays ?? OverlayStore.inMemory();
    this.filterState = { ...defaultFilterState(this.now()), ...options.initialFilter };

    this.pool = new ProviderPool(options.providers, {
      cooldownMs: this.config.refresh.providerCooldownMs,
      now: this.now,
      logger: this.log,
    });
    this.scheduler = new RefreshScheduler({
      execute: (job, isCurrent) => this.executeRefresh(job, isCurrent),
      timing: this.config.refresh,
      now: this.now,
      logger: this.log,
    });
    this.coverage = new CoverageCache({
      scanner: options.scanner ?? new FileCoverageScanner(options.coverageStore ?? null, this.log),
      sessions: () => this.sessionsArray(),
      onChange: (month, changedIds) => this.onCoverageChanged(month, changedIds),
      debounceMs: this.config.coverage.debounceMs,
      emptyRetryLimit: this.config.coverage.emptyRetryLimit,
      logger: this.log,
    });
    this.filterEngine = new FilterEngine({
      buildSnapshot: (generation) => this.buildSnapshot(generation),
      publish: (result) => this.publishSections(result),
      mergeResolvedPaths: (entries) => {
        for (const [raw, canonical] of entries) this.canonicalPaths.set(raw, canonical);
      },
      debounceMs: this.config.filter.debounceMs,
      logger: this.log,
      ...(options.executor ? { executor: options.executor } : {}),
    });
    this.enrichment = new EnrichmentQueue({
      enrich: async (providerId, records) => {
        const provider = this.pool.get(providerId);
        return provider ? this.pool.enrich(provider, records) : null;
      },
      commit: (providerId, records) => this.commitEnriched(providerId, records),
      batchSize: this.config.enrichment.batchSize,
      concurrency: this.config.enrichment.concurrency,
      logger: this.log,
    });
    this.watcher = new DirectoryWatcher({
      debounceMs: this.config.refresh.directoryDebounceMs,
      onChange: (root, paths) => this.onDirectoryBurst(root, paths),
      logger: this.log,
    });
  }

  static async fromConfigPath(configPath?: string, options: { watch?: boolean } = {}): Promise<SessionIndex> {
    const config = await loadConfig(configPath);
    const logger = createLogger({ level: levelFromEnv(config.logging.level) });
    const cache = new SqliteRecordCache(config.cache.path);
    const overlays = await OverlayStore.open(config.overlays.path);
    return new SessionIndex({
      config,
      providers: createDefaultProviders(config, cache, logger),
      recordCache: cache,
      coverageStore: cache,
      overlays,
      logger,
      watch: options.watch ?? false,
    });
  }

  getConfig(): AppConfig {
    return this.config;
  }

  // consumer API

  currentVisibleSections(): SessionDaySection[] {
    return this.sections;
  }

  currentAggregates(): AggregateState {
    return this.aggregates;
  }

  currentFilterState(): FilterState {
    return {
      ...this.filterState,
      selectedProjectIds: [...this.filterState.selectedProjectIds],
      selectedDays: [...this.filterState.selectedDays],
    };
  }

  currentStatus(): StatusMessage | null {
    return this.status;
  }

  sessions(): readonly SessionRecord[] {
    return this.sessionsArray();
  }

  getSession(id: string): SessionRecord | undefined {
    return this.store.get(id);
  }

  getProjects(): readonly Project[] {
    return this.projects;
  }

  providerHealth(): ProviderHealth[] {
    return this.pool.healthSnapshot();
  }

  /** Updates the selection; results arrive through the `sections` and `aggregates` events. */
  requestFilterChange(patch: Partial<FilterState>): FilterState {
    const previous = this.filterState;
    const next: FilterState = { ...previous, ...patch };
    next.monthStartMs = startOfMonthMs(next.monthStartMs);
    next.selectedDays = buildDayDescriptors(next.selectedDays).map((descriptor) => descriptor.dayStartMs);
    next.selectedProjectIds = Array.from(new Set(next.selectedProjectIds));
    if (next.selectedPath !== null && !next.selectedPath.trim()) next.selectedPath = null;
    this.filterState = next;

    const monthChanged = next.monthStartMs !== previous.monthStartMs;
    if (monthChanged) {
      this.scheduler.trigger({ kind: "month", monthStartMs: next.monthStartMs }, { channel: NAVIGATION_CHANNEL });
    }
    if (
      next.dateDimension === "updated" &&
      (monthChanged || previous.dateDimension !== "updated" || previous.selectedPath !== next.selectedPath)
    ) {
      this.requestCoverage(false);
    }
    this.refreshAggregates();
    this.filterEngine.schedule();
    return this.currentFilterState();
  }

  requestForceRefresh(scope: RefreshScope = { kind: "all" }): TriggerOutcome {
    const outcome = this.scheduler.trigger(scope, { force: true });
    if (this.filterState.dateDimension === "updated") this.forceRefreshCoverage();
    return outcome;
  }

  forceRefreshCoverage(): void {
    this.requestCoverage(true);
  }

  /** Clears a retryable failure and re-runs the refresh that produced it. */
  retry(): TriggerOutcome {
    const scope = this.lastFailedScope ?? { kind: "all" };
    this.lastFailedScope = null;
    this.setStatus(null);
    return this.requestForceRefresh(scope);
  }

  // mutations

  async setUserOverlay(id: string, overlay: SessionOverlay): Promise<SessionRecord | null> {
    const saved = await this.overlays.set(id, overlay);
    const current = this.store.get(id);
    if (!current) return null;
    const next: SessionRecord = { ...withoutOverlay(current) };
    if (saved?.title !== undefined) next.title = saved.title;
    if (saved?.comment !== undefined) next.comment = saved.comment;
    const store = new Map(this.store);
    store.set(id, next);
    this.replaceStore(store);
    this.afterSessionsChanged();
    return next;
  }

  setProjects(projects: readonly Project[]): void {
    this.projects = projects.map((project) => ({ ...project, sources: [...project.sources] }));
    this.structureVersion = projectStructureVersion(this.projects);
    // known project ids feed membership resolution
    this.membershipVersion += 1;
    this.projectCounts.rebuildTotals(this.store.values(), this.membershipView());
    this.refreshAggregates();
    this.filterEngine.schedule();
  }

  setMemberships(memberships: Readonly<Record<string, string>>): void {
    this.applyMemberships(new Map(Object.entries(memberships)));
  }

  getMemberships(): Record<string, string> {
    return Object.fromEntries(this.memberships);
  }

  setHint(hint: IncrementalHint, expiresAtMs?: number): void {
    const window =
      hint.kind === "agent_day" ? this.config.hints.agentDayWindowMs : this.config.hints.projectDirectoryWindowMs;
    this.hints.setHint(hint, expiresAtMs ?? this.now() + window);
  }

  /** Registers an intent and tries it right away against sessions already in the store. */
  addAssignIntent(intent: AssignIntent): IntentMatch[] {
    this.intents.add(intent);
    return this.resolveIntents(this.unassigned(this.sessionsArray()));
  }

  /**
   * Reconciles a subset against the store without removing anything else, re-applies overlays,
   * resolves assign intents for new sessions and schedules the filter pipeline.
   */
  mergeAndApply(records: readonly SessionRecord[], providerId: string | null = null): number {
    return this.commitBatch(records, [], providerId);
  }

  /** Directory-change entry point: a live hint runs a targeted query, anything else a scoped refresh. */
  async notifyDirectoryChanged(root: string): Promise<"hint" | TriggerOutcome> {
    const hint = this.hints.liveHint(this.now());
    if (hint) {
      const changedRoot = canonicalPath(root);
      const related = this.pool
        .list()
        .filter((provider) =>
          provider.roots.some(
            (providerRoot) =>
              isPathWithin(changedRoot, canonicalPath(providerRoot)) || isPathWithin(canonicalPath(providerRoot), changedRoot),
          ),
        );
      const candidates = related.length > 0 ? related : this.pool.list();
      const query = subsetQueryForHint(hint);
      const results = await Promise.all(
        candidates.map(async (provider) => ({ provider, records: await this.pool.loadSubset(provider, query) })),
      );
      let handled = false;
      for (const { provider, records } of results) {
        if (records === null) continue;
        handled = true;
        this.mergeAndApply(records, provider.id);
      }
      if (handled) {
        this.log.debug({ root, hint: hint.kind }, "directory change served by hint");
        return "hint";
      }
    }
    return this.scheduler.trigger(this.currentScope(), { force: false, channel: WATCH_CHANNEL });
  }

  // lifecycle

  async start(): Promise<void> {
    if (this.started) return;
    this.started = true;
    const roots = Array.from(new Set(this.pool.list().flatMap((provider) => provider.roots)));
    if (this.options.watch) {
      await this.watcher.start(roots);
    } else {
      this.watcher.setRoots(roots);
    }
    this.refreshAggregates();
    this.requestForceRefresh({ kind: "all" });
  }

  async stop(): Promise<void> {
    this.started = false;
    this.scheduler.stop();
    this.coverage.stop();
    this.filterEngine.stop();
    this.enrichment.stop();
    await this.watcher.close();
  }

  /** Stops everything and releases the record cache. */
  async close(): Promise<void> {
    await this.stop();
    await this.scheduler.whenIdle();
    await this.coverage.whenIdle();
    await this.enrichment.whenIdle();
    this.recordCache?.close();
  }

  /** Resolves once no refresh, coverage scan, enrichment batch or filter run is pending or running. */
  async whenIdle(): Promise<void> {
    for (;;) {
      if (this.scheduler.hasPending() || this.coverage.hasPending() || this.enrichment.hasPending()) {
        await delay(IDLE_POLL_MS);
        continue;
      }
      this.filterEngine.flush();
      await this.filterEngine.whenIdle();
      if (
        !this.scheduler.hasPending() &&
        !this.coverage.hasPending() &&
        !this.enrichment.hasPending() &&
        !this.filterEngine.hasPending()
      ) {
        return;
      }
    }
  }

  getPerformanceStats(): IndexPerformanceStats {
    const filterStats = this.filterEngine.getStats();
    return {
      refreshCount: this.scheduler.executionCount(),
      droppedStaleResults: this.perf.droppedStaleResults + filterStats.discardedStale,
      filterRunCount: filterStats.runs,
      filterPublishCount: filterStats.published,
      coverageScanCount: this.coverage.getStats().scans,
      lastRefreshDurationMs: this.perf.lastRefreshDurationMs,
      lastRefreshAtMs: this.perf.lastRefreshAtMs,
      trackedSessions: this.store.size,
      removedSessions: this.perf.removedSessions,
      enrichedSessions: this.enrichment.getStats().enriched,
      enrichmentPending: this.enrichment.pendingCount(),
      watcherRoots: this.watcher.watchedRoots().length,
    };
  }

  // refresh execution

  private async executeRefresh(job: RefreshJob, isCurrent: () => boolean): Promise<void> {
    const startedAt = this.now();
    const dateRange = scopeRange(job.scope);
    const dateDimension = this.filterState.dateDimension;
    const failures: string[] = [];

    await Promise.all(
      this.pool.list().map(async (provider) => {
        for (const cachePolicy of CACHE_PASSES) {
          const context = freezeContext({
            scope: job.scope,
            rootPaths: provider.roots,
            dateDimension,
            dateRange,
            projectDirectories: null,
            cachePolicy,
          });
          const outcome = await this.pool.load(provider, context);
          if (!isCurrent()) {
            this.perf.droppedStaleResults += 1;
            return;
          }
          if (cachePolicy === "refresh" && (outcome.error || outcome.skipped === "unavailable")) {
            failures.push(provider.id);
          }
          if (outcome.result) {
            this.applyProviderResult(provider.id, outcome.result.summaries, context);
          }
        }
      }),
    );

    if (!isCurrent()) return;
    this.perf.lastRefreshAtMs = this.now();
    this.perf.lastRefreshDurationMs = this.perf.lastRefreshAtMs - startedAt;
    if (failures.length > 0) {
      this.lastFailedScope = job.scope;
      this.setStatus({
        level: "warning",
        message: `Could not refresh ${failures.sort().join(", ")}; showing cached sessions`,
        retryable: true,
        atMs: this.now(),
      });
    } else if (this.status?.retryable && job.channel === PRIMARY_CHANNEL) {
      this.setStatus(null);
    }
    this.log.debug({ key: scopeKey(job.scope), sessions: this.store.size, failures }, "refresh applied");
  }

  private applyProviderResult(providerId: string, summaries: readonly SessionRecord[], context: LoadContext): number {
    const removals: string[] = [];
    if (context.cachePolicy === "refresh") {
      const returned = new Set(summaries.map((record) => record.id));
      for (const [id, owner] of this.origin) {
        if (owner !== providerId || returned.has(id)) continue;
        const record = this.store.get(id);
        if (record && recordMatchesContext(record, context)) removals.push(id);
      }
    }
    return this.commitBatch(summaries, removals, providerId);
  }

  /** All-or-nothing: the store is swapped once the whole batch has been reconciled. */
  private commitBatch(incoming: readonly SessionRecord[], removals: readonly string[], providerId: string | null): number {
    const previous = this.store;
    const existing: SessionRecord[] = [];
    const incomingPaths = new Map<string, Set<string>>();
    for (const record of incoming) {
      const current = previous.get(record.id);
      if (current) existing.push(current);
      const paths = incomingPaths.get(record.id) ?? new Set<string>();
      paths.add(record.filePath);
      incomingPaths.set(record.id, paths);
    }
    const merged = applyOverlays(mergeRecords(existing, incoming), (id) => this.overlays.get(id), previous);

    const next = new Map(previous);
    const removed: SessionRecord[] = [];
    const added: SessionRecord[] = [];
    const fresh: SessionRecord[] = [];
    let removedCount = 0;
    for (const id of removals) {
      const record = next.get(id);
      if (!record) continue;
      next.delete(id);
      this.origin.delete(id);
      removed.push(record);
      removedCount += 1;
    }
    for (const record of merged) {
      if (providerId !== null && incomingPaths.get(record.id)?.has(record.filePath)) {
        this.origin.set(record.id, providerId);
      }
      const before = next.get(record.id);
      if (before && recordSignature(before) === recordSignature(record)) continue;
      if (before) removed.push(before);
      else fresh.push(record);
      added.push(record);
      next.set(record.id, record);
    }
    if (added.length === 0 && removed.length === 0) return 0;

    this.replaceStore(next);
    const view = this.membershipView();
    if (!this.projectCounts.applyDelta(removed, added, view)) {
      this.projectCounts.rebuildTotals(next.values(), view);
    }
    if (fresh.length > 0 && this.intents.pending().length > 0) {
      this.resolveIntents(this.unassigned(fresh));
    }
    this.afterSessionsChanged();
    if (this.filterState.dateDimension === "updated") this.requestCoverage(false);
    this.perf.removedSessions += removedCount;
    return added.length + removedCount;
  }

  /** Enriched records only replace sessions still in the store; a removal meanwhile wins. */
  private commitEnriched(providerId: string, records: readonly SessionRecord[]): void {
    const live = records.filter((record) => this.store.has(record.id) && this.origin.get(record.id) === providerId);
    if (live.length === 0) return;
    this.commitBatch(live, [], providerId);
  }

  private replaceStore(next: Map<string, SessionRecord>): void {
    this.store = next;
    this.sessionList = null;
    this.sessionsVersion += 1;
    const ids = new Set(next.keys());
    this.dayIndex.prune(ids);
    this.coverage.prune(ids);
  }

  private afterSessionsChanged(): void {
    this.emit("sessions", { version: this.sessionsVersion, count: this.store.size });
    this.emitStream("sessions_updated", { version: this.sessionsVersion, count: this.store.size });
    this.refreshAggregates();
    this.filterEngine.schedule();
  }

  private sessionsArray(): SessionRecord[] {
    if (!this.sessionList) {
      this.sessionList = Array.from(this.store.values());
    }
    return this.sessionList;
  }

  // projects and intents

  private membershipView(): MembershipView {
    return {
      memberships: this.memberships,
      knownProjectIds: new Set(this.projects.map((project) => project.id)),
      version: this.membershipVersion,
    };
  }

  private applyMemberships(next: Map<string, string>): void {
    this.memberships = next;
    this.membershipVersion += 1;
    this.projectCounts.rebuildTotals(this.store.values(), this.membershipView());
    this.refreshAggregates();
    this.filterEngine.schedule();
  }

  private unassigned(records: readonly SessionRecord[]): SessionRecord[] {
    const view = this.membershipView();
    return records.filter((record) => projectIdFor(record, view.memberships, view.knownProjectIds) === null);
  }

  private resolveIntents(candidates: readonly SessionRecord[]): IntentMatch[] {
    this.intents.prune(this.now());
    const matches = this.intents.match(candidates);
    if (matches.length === 0) return matches;

    const next = new Map(this.memberships);
    let assigned = 0;
    for (const match of matches) {
      if (match.kind === "assigned") {
        const record = this.store.get(match.sessionId);
        if (!record) continue;
        next.set(membershipKey(record.source, record.id), match.projectId);
        assigned += 1;
      } else {
        this.setStatus({
          level: "info",
          message: `${match.sessionIds.length} new sessions could belong to project ${match.projectId}; assign one manually`,
          retryable: false,
          atMs: this.now(),
        });
      }
    }
    if (assigned > 0) this.applyMemberships(next);
    this.emit("intents", matches);
    return matches;
  }

  // filter and aggregates

  private canonical(raw: string): string {
    let value = this.canonicalPaths.get(raw);
    if (value === undefined) {
      value = canonicalPath(raw);
      this.canonicalPaths.set(raw, value);
    }
    return value;
  }

  private buildSnapshot(generation: number): FilterSnapshot {
    const sessions = this.sessionsArray();
    return buildFilterSnapshot({
      generation,
      sessionsVersion: this.sessionsVersion,
      sessions,
      state: this.filterState,
      projects: this.projects,
      memberships: this.memberships,
      canonicalPaths: this.canonicalPaths,
      dayIndex: this.dayIndex.snapshot(sessions),
      coverage: this.coverage.entriesView(),
      nowMs: this.now(),
    });
  }

  private publishSections(result: FilterComputation): void {
    this.sections = result.sections;
    this.visibleCount = result.visibleSessions.length;
    this.requestEnrichment(result.visibleSessions);
    this.emit("sections", { generation: result.generation, sections: result.sections });
    this.emitStream("sections_updated", {
      generation: result.generation,
      sessionCount: this.visibleCount,
      sections: result.sections,
    });
  }

  private requestEnrichment(visible: readonly SessionRecord[]): void {
    if (!this.config.enrichment.enabled) return;
    const enrichedRank = qualityRank("enriched");
    const candidates: EnrichmentCandidate[] = [];
    for (const record of visible) {
      if (qualityRank(record.parseQuality) >= enrichedRank) continue;
      const providerId = this.origin.get(record.id);
      if (providerId !== undefined) candidates.push({ providerId, record });
    }
    if (candidates.length > 0) this.enrichment.request(candidates);
  }

  /** The month being browsed, narrowed to a day when exactly one is selected. */
  private currentScope(): RefreshScope {
    const [day, ...rest] = this.filterState.selectedDays;
    if (day !== undefined && rest.length === 0) return { kind: "day", dayStartMs: day };
    return { kind: "month", monthStartMs: this.filterState.monthStartMs };
  }

  private requestCoverage(force: boolean): void {
    if (!this.config.coverage.enabled) return;
    this.coverage.request(this.filterState.monthStartMs, this.filterState.selectedPath, { force });
  }

  private onCoverageChanged(month: string, changedIds: readonly string[]): void {
    this.log.debug({ month, changed: changedIds.length }, "coverage changed");
    this.refreshAggregates();
    this.filterEngine.schedule();
  }

  private refreshAggregates(): void {
    const sessions = this.sessionsArray();
    const state = this.filterState;
    const coverageEntries = this.coverage.entriesView();
    const coverageVersion = this.coverage.currentVersion();
    const view = this.membershipView();

    const pathTree = this.pathTree.update(cwdCounts(sessions.map((session) => this.canonical(session.workingDirectory))));

    const pathFilter = state.selectedPath ? canonicalPath(state.selectedPath) : null;
    const inPath = (session: SessionRecord): boolean =>
      pathFilter === null || isPathWithin(this.canonical(session.workingDirectory), pathFilter);
    const projectFilter = buildProjectFilter(state.selectedProjectIds, this.projects, this.memberships);
    const selection = [pathFilter ?? "", [...state.selectedProjectIds].sort().join(","), this.membershipVersion].join("|");

    const histogram = this.monthCounts.countsFor(
      {
        dimension: state.dateDimension,
        monthStartMs: state.monthStartMs,
        sessionsVersion: this.sessionsVersion,
        coverageVersion,
        selection,
      },
      () =>
        computeMonthCounts({
          sessions: sessions.filter(
            (session) => inPath(session) && (projectFilter === null || matchesProjectFilter(session, projectFilter)),
          ),
          dayEntry: (record) => this.dayIndex.entryFor(record),
          coverage: coverageEntries,
          dimension: state.dateDimension,
          monthStartMs: state.monthStartMs,
        }),
    );

    const descriptors = buildDayDescriptors(state.selectedDays);
    const visibleKey = {
      dimension: state.dateDimension,
      days: descriptors.map((descriptor) => descriptor.dayStartMs),
      sessionsVersion: this.sessionsVersion,
      membershipVersion: this.membershipVersion,
      coverageVersion,
      selection: pathFilter ?? "",
    };
    const visible = this.projectCounts.visibleCounts(visibleKey, () =>
      directCounts(
        sessions.filter(
          (session) =>
            inPath(session) &&
            (descriptors.length === 0 ||
              matchesDay(session, this.dayIndex.entryFor(session), descriptors, state.dateDimension, coverageEntries)),
        ),
        view,
      ),
    );
    const projectCounts = this.projectCounts.aggregatedCounts(this.projects, visibleKey, visible, this.structureVersion);

    const days = Array.from(histogram.keys()).sort((a, b) => a - b);
    const next: AggregateState = {
      pathTree,
      monthCounts: Object.fromEntries(days.map((day) => [String(day), histogram.get(day) ?? 0])),
      projectCounts,
      enabledDays: state.selectedProjectIds.length > 0 ? days : null,
      sessionCount: sessions.length,
    };
    const digest = stableId([JSON.stringify(next)]);
    if (digest === this.aggregatesDigest) return;
    this.aggregatesDigest = digest;
    this.aggregates = next;
    this.emit("aggregates", next);
    this.emitStream("aggregates_updated", { aggregates: next });
  }

  // status and events

  private setStatus(status: StatusMessage | null): void {
    if (status === null && this.status === null) return;
    this.status = status;
    this.emit("status", status);
    this.emitStream("status", { status });
  }

  private onDirectoryBurst(root: string, paths: readonly string[]): void {
    for (const filePath of paths) this.coverage.markFileModified(filePath);
    this.notifyDirectoryChanged(root).catch((error: unknown) => {
      this.log.error({ root, err: asErrorMessage(error) }, "directory change handling failed");
    });
  }

  private emitStream(type: StreamEnvelope["type"], payload: Record<string, unknown>): void {
    this.streamVersion += 1;
    const envelope: StreamEnvelope = {
      id: String(this.streamVersion),
      type,
      version: this.streamVersion,
      payload,
    };
    this.emit("stream", { envelope });
  }
}
