export type AgentKind = "codex" | "claude" | "gemini";
export type SourceLocality = "local" | "remote";
export type ParseQuality = "metadata" | "full" | "enriched";
export type DateDimension = "created" | "updated";
export type CachePolicy = "cacheOnly" | "refresh";
export type SortOrder = "most_recent" | "longest_duration" | "most_activity" | "alphabetical" | "largest_size";
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export const AGENT_KINDS: readonly AgentKind[] = ["codex", "claude", "gemini"];
export const SORT_ORDERS: readonly SortOrder[] = [
  "most_recent",
  "longest_duration",
  "most_activity",
  "alphabetical",
  "largest_size",
];

/** Synthetic project id that collects sessions without a membership. */
export const UNASSIGNED_PROJECT_ID = "other";

export interface SessionSource {
  kind: AgentKind;
  locality: SourceLocality;
  host?: string;
}

export interface SessionRecord {
  id: string;
  source: SessionSource;
  filePath: string;
  workingDirectory: string;
  createdAtMs: number;
  lastUpdatedAtMs: number | null;
  activeDurationMs: number | null;
  userMessageCount: number;
  assistantMessageCount: number;
  toolInvocationCount: number;
  eventCount: number;
  fileSizeBytes: number | null;
  fileMtimeMs: number | null;
  lineCount: number;
  parseQuality?: ParseQuality;
  model?: string;
  /** First user message, one line. */
  preview?: string;
  /** User overlay; never written by providers. */
  title?: string;
  /** User overlay; never written by providers. */
  comment?: string;
}

export interface SessionOverlay {
  title?: string;
  comment?: string;
}

export type RefreshScope =
  | { kind: "all" }
  | { kind: "day"; dayStartMs: number }
  | { kind: "month"; monthStartMs: number };

export interface DateRange {
  startMs: number;
  endMs: number;
}

export interface LoadContext {
  scope: RefreshScope;
  rootPaths: readonly string[];
  dateDimension: DateDimension;
  dateRange: DateRange | null;
  projectDirectories: readonly string[] | null;
  cachePolicy: CachePolicy;
}

export interface CoverageSnapshot {
  sessionCount: number;
  earliestCreatedAtMs: number | null;
  latestUpdatedAtMs: number | null;
}

export interface ProviderLoadResult {
  summaries: SessionRecord[];
  coverage: CoverageSnapshot | null;
  cacheHit: boolean;
}

export type IncrementalHint =
  | { kind: "agent_day"; agent: AgentKind; dayStartMs: number }
  | { kind: "project_directory"; directory: string };

export type SubsetQuery =
  | { kind: "updated_since"; agent: AgentKind; sinceMs: number }
  | { kind: "project_directory"; directory: string };

export interface Project {
  id: string;
  name: string;
  directory: string | null;
  parentId: string | null;
  /** Agent kinds whose sessions may appear under this project; empty allows all. */
  sources: AgentKind[];
}

export interface FilterState {
  selectedPath: string | null;
  selectedProjectIds: string[];
  selectedDays: number[];
  dateDimension: DateDimension;
  quickSearch: string;
  sortOrder: SortOrder;
  monthStartMs: number;
}

export interface SessionDaySection {
  dayStartMs: number;
  title: string;
  totalDurationMs: number;
  totalEvents: number;
  sessions: SessionRecord[];
}

export interface PathTreeNode {
  path: string;
  name: string;
  count: number;
  children: PathTreeNode[];
}

export interface ProjectCount {
  visible: number;
  total: number;
}

export interface AggregateState {
  pathTree: PathTreeNode | null;
  monthCounts: Record<string, number>;
  projectCounts: Record<string, ProjectCount>;
  enabledDays: number[] | null;
  sessionCount: number;
}

export interface StatusMessage {
  level: "info" | "warning" | "error";
  message: string;
  retryable: boolean;
  atMs: number;
}

export interface IndexPerformanceStats {
  refreshCount: number;
  droppedStaleResults: number;
  filterRunCount: number;
  filterPublishCount: number;
  coverageScanCount: number;
  lastRefreshDurationMs: number;
  lastRefreshAtMs: number;
  trackedSessions: number;
  removedSessions: number;
  enrichedSessions: number;
  /** Sessions waiting for or inside an enrichment batch. */
  enrichmentPending: number;
  watcherRoots: number;
}

export interface StreamEnvelope {
  id: string;
  type: "snapshot" | "sections_updated" | "aggregates_updated" | "sessions_updated" | "status" | "heartbeat";
  version: number;
  payload: Record<string, unknown>;
}

export interface RefreshConfig {
  forceDebounceMs: number;
  autoDebounceMs: number;
  completionCooldownMs: number;
  providerCooldownMs: number;
  directoryDebounceMs: number;
}

export interface CoverageConfig {
  enabled: boolean;
  debounceMs: number;
  emptyRetryLimit: number;
}

export interface FilterConfig {
  debounceMs: number;
}

export interface EnrichmentConfig {
  enabled: boolean;
  /** Sessions per provider call; each finished batch is committed on its own. */
  batchSize: number;
  concurrency: number;
}

export interface HintsConfig {
  agentDayWindowMs: number;
  projectDirectoryWindowMs: number;
}

export interface SourceProfileConfig {
  name: string;
  enabled: boolean;
  kind: AgentKind;
  locality: SourceLocality;
  host?: string;
  roots: string[];
  includeGlobs: string[];
  excludeGlobs: string[];
  maxDepth: number;
}

export interface CacheConfig {
  path: string;
}

export interface OverlaysConfig {
  path: string;
}

export interface LoggingConfig {
  level: LogLevel;
}

export interface AppConfig {
  refresh: RefreshConfig;
  coverage: CoverageConfig;
  filter: FilterConfig;
  enrichment: EnrichmentConfig;
  hints: HintsConfig;
  sources: Record<string, SourceProfileConfig>;
  cache: CacheConfig;
  overlays: OverlaysConfig;
  logging: LoggingConfig;
}
