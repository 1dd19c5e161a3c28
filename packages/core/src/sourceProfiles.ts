import type { AppConfig, SourceProfileConfig } from "@sessiondex/contracts";

export const DEFAULT_SOURCE_PROFILES: Record<string, SourceProfileConfig> = {
  codex_sessions: {
    name: "codex_sessions",
    enabled: true,
    kind: "codex",
    locality: "local",
    roots: ["~/.codex/sessions"],
    includeGlobs: ["**/*.jsonl"],
    excludeGlobs: [],
    maxDepth: 8,
  },
  claude_projects: {
    name: "claude_projects",
    enabled: true,
    kind: "claude",
    locality: "local",
    roots: ["~/.claude/projects"],
    includeGlobs: ["**/*.jsonl"],
    excludeGlobs: ["**/todos/**"],
    maxDepth: 8,
  },
  gemini_tmp: {
    name: "gemini_tmp",
    enabled: true,
    kind: "gemini",
    locality: "local",
    roots: ["~/.gemini/tmp"],
    includeGlobs: ["**/chats/*.jsonl", "**/chats/*.json"],
    excludeGlobs: [],
    maxDepth: 6,
  },
};

export const DEFAULT_CONFIG: AppConfig = {
  refresh: {
    forceDebounceMs: 10,
    autoDebounceMs: 300,
    completionCooldownMs: 200,
    providerCooldownMs: 30_000,
    directoryDebounceMs: 400,
  },
  coverage: {
    enabled: true,
    debounceMs: 150,
    emptyRetryLimit: 1,
  },
  filter: {
    debounceMs: 15,
  },
  enrichment: {
    enabled: true,
    batchSize: 50,
    concurrency: 4,
  },
  hints: {
    agentDayWindowMs: 10_000,
    projectDirectoryWindowMs: 120_000,
  },
  sources: DEFAULT_SOURCE_PROFILES,
  cache: {
    path: "~/.sessiondex/records.sqlite",
  },
  overlays: {
    path: "~/.sessiondex/overlays.json",
  },
  logging: {
    level: "info",
  },
};
