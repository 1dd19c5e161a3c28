import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import TOML, { type JsonMap } from "@iarna/toml";
import {
  AGENT_KINDS,
  type AgentKind,
  type AppConfig,
  type CacheConfig,
  type CoverageConfig,
  type EnrichmentConfig,
  type FilterConfig,
  type HintsConfig,
  type LoggingConfig,
  type OverlaysConfig,
  type RefreshConfig,
  type SourceProfileConfig,
} from "@sessiondex/contracts";
import { isLogLevel } from "./logger.js";
import { DEFAULT_CONFIG, DEFAULT_SOURCE_PROFILES } from "./sourceProfiles.js";
import { asRecord } from "./utils.js";

export const DEFAULT_CONFIG_PATH = path.join(os.homedir(), ".sessiondex", "config.toml");

function isAgentKind(value: unknown): value is AgentKind {
  return typeof value === "string" && AGENT_KINDS.some((kind) => kind === value);
}

function toFiniteNumber(value: unknown): number | null {
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

function positiveIntOrDefault(value: unknown, fallback: number): number {
  const numeric = toFiniteNumber(value);
  if (numeric === null || numeric <= 0) return fallback;
  return Math.round(numeric);
}

function positiveMsOrDefault(value: unknown, fallback: number): number {
  const numeric = toFiniteNumber(value);
  if (numeric === null || numeric <= 0) return fallback;
  return Math.max(1, Math.round(numeric));
}

function nonNegativeIntOrDefault(value: unknown, fallback: number): number {
  const numeric = toFiniteNumber(value);
  if (numeric === null || numeric < 0) return fallback;
  return Math.round(numeric);
}

function booleanOrDefault(value: unknown, fallback: boolean): boolean {
  return typeof value === "boolean" ? value : fallback;
}

function nonEmptyStringOrDefault(value: unknown, fallback: string): string {
  return typeof value === "string" && value.trim() ? value.trim() : fallback;
}

function stringList(value: unknown, fallback: string[]): string[] {
  if (!Array.isArray(value)) return fallback;
  const dedup = new Set<string>();
  for (const entry of value) {
    if (typeof entry !== "string") continue;
    const trimmed = entry.trim();
    if (trimmed) dedup.add(trimmed);
  }
  return Array.from(dedup);
}

function mergeRefresh(input: Record<string, unknown>): RefreshConfig {
  const defaults = DEFAULT_CONFIG.refresh;
  return {
    forceDebounceMs: positiveMsOrDefault(input.forceDebounceMs, defaults.forceDebounceMs),
    autoDebounceMs: positiveMsOrDefault(input.autoDebounceMs, defaults.autoDebounceMs),
    completionCooldownMs: nonNegativeIntOrDefault(input.completionCooldownMs, defaults.completionCooldownMs),
    providerCooldownMs: positiveMsOrDefault(input.providerCooldownMs, defaults.providerCooldownMs),
    directoryDebounceMs: positiveMsOrDefault(input.directoryDebounceMs, defaults.directoryDebounceMs),
  };
}

function mergeCoverage(input: Record<string, unknown>): CoverageConfig {
  const defaults = DEFAULT_CONFIG.coverage;
  return {
    enabled: booleanOrDefault(input.enabled, defaults.enabled),
    debounceMs: positiveMsOrDefault(input.debounceMs, defaults.debounceMs),
    emptyRetryLimit: nonNegativeIntOrDefault(input.emptyRetryLimit, defaults.emptyRetryLimit),
  };
}

function mergeFilter(input: Record<string, unknown>): FilterConfig {
  return {
    debounceMs: positiveMsOrDefault(input.debounceMs, DEFAULT_CONFIG.filter.debounceMs),
  };
}

function mergeEnrichment(input: Record<string, unknown>): EnrichmentConfig {
  const defaults = DEFAULT_CONFIG.enrichment;
  return {
    enabled: booleanOrDefault(input.enabled, defaults.enabled),
    batchSize: positiveIntOrDefault(input.batchSize, defaults.batchSize),
    concurrency: positiveIntOrDefault(input.concurrency, defaults.concurrency),
  };
}

function mergeHints(input: Record<string, unknown>): HintsConfig {
  const defaults = DEFAULT_CONFIG.hints;
  return {
    agentDayWindowMs: positiveMsOrDefault(input.agentDayWindowMs, defaults.agentDayWindowMs),
    projectDirectoryWindowMs: positiveMsOrDefault(input.projectDirectoryWindowMs, defaults.projectDirectoryWindowMs),
  };
}

function mergeProfile(name: string, defaultProfile: SourceProfileConfig, input: Record<string, unknown>): SourceProfileConfig {
  const locality = input.locality === "remote" || input.locality === "local" ? input.locality : defaultProfile.locality;
  const merged: SourceProfileConfig = {
    name: nonEmptyStringOrDefault(input.name, name),
    enabled: booleanOrDefault(input.enabled, defaultProfile.enabled),
    kind: isAgentKind(input.kind) ? input.kind : defaultProfile.kind,
    locality,
    roots: stringList(input.roots, defaultProfile.roots),
    includeGlobs: stringList(input.includeGlobs, defaultProfile.includeGlobs),
    excludeGlobs: stringList(input.excludeGlobs, defaultProfile.excludeGlobs),
    maxDepth: positiveIntOrDefault(input.maxDepth, defaultProfile.maxDepth),
  };
  const host = typeof input.host === "string" && input.host.trim() ? input.host.trim() : defaultProfile.host;
  if (locality === "remote" && host !== undefined) {
    merged.host = host;
  }
  return merged;
}

function mergeSources(input: Record<string, unknown>): Record<string, SourceProfileConfig> {
  const sources: Record<string, SourceProfileConfig> = {};

  for (const [name, defaultProfile] of Object.entries(DEFAULT_SOURCE_PROFILES)) {
    sources[name] = mergeProfile(name, defaultProfile, asRecord(input[name]));
  }

  for (const [name, raw] of Object.entries(input)) {
    if (sources[name]) continue;
    const profile = asRecord(raw);
    // a custom profile is only usable once it names its agent kind
    if (!isAgentKind(profile.kind)) continue;
    sources[name] = mergeProfile(
      name,
      {
        name,
        enabled: true,
        kind: profile.kind,
        locality: "local",
        roots: [],
        includeGlobs: ["**/*.jsonl"],
        excludeGlobs: [],
        maxDepth: 8,
      },
      profile,
    );
  }

  return sources;
}

function mergeCache(input: Record<string, unknown>): CacheConfig {
  return { path: nonEmptyStringOrDefault(input.path, DEFAULT_CONFIG.cache.path) };
}

function mergeOverlays(input: Record<string, unknown>): OverlaysConfig {
  return { path: nonEmptyStringOrDefault(input.path, DEFAULT_CONFIG.overlays.path) };
}

function mergeLogging(input: Record<string, unknown>): LoggingConfig {
  const level = typeof input.level === "string" ? input.level.trim().toLowerCase() : "";
  return { level: isLogLevel(level) ? level : DEFAULT_CONFIG.logging.level };
}

export function mergeConfig(input?: unknown): AppConfig {
  const raw = asRecord(input);
  return {
    refresh: mergeRefresh(asRecord(raw.refresh)),
    coverage: mergeCoverage(asRecord(raw.coverage)),
    filter: mergeFilter(asRecord(raw.filter)),
    enrichment: mergeEnrichment(asRecord(raw.enrichment)),
    hints: mergeHints(asRecord(raw.hints)),
    sources: mergeSources(asRecord(raw.sources)),
    cache: mergeCache(asRecord(raw.cache)),
    overlays: mergeOverlays(asRecord(raw.overlays)),
    logging: mergeLogging(asRecord(raw.logging)),
  };
}

export async function loadConfig(configPath = DEFAULT_CONFIG_PATH): Promise<AppConfig> {
  let raw: string;
  try {
    raw = await readFile(configPath, "utf8");
  } catch {
    return mergeConfig();
  }
  try {
    return mergeConfig(TOML.parse(raw));
  } catch {
    return mergeConfig();
  }
}

function toJsonMap(config: AppConfig): JsonMap {
  const sources: JsonMap = {};
  for (const [name, profile] of Object.entries(config.sources)) {
    const entry: JsonMap = {
      name: profile.name,
      enabled: profile.enabled,
      kind: profile.kind,
      locality: profile.locality,
      roots: profile.roots,
      includeGlobs: profile.includeGlobs,
      excludeGlobs: profile.excludeGlobs,
      maxDepth: profile.maxDepth,
    };
    if (profile.host !== undefined) entry.host = profile.host;
    sources[name] = entry;
  }
  return {
    refresh: { ...config.refresh },
    coverage: { ...config.coverage },
    filter: { ...config.filter },
    enrichment: { ...config.enrichment },
    hints: { ...config.hints },
    sources,
    cache: { ...config.cache },
    overlays: { ...config.overlays },
    logging: { ...config.logging },
  };
}

export async function saveConfig(config: AppConfig, configPath = DEFAULT_CONFIG_PATH): Promise<void> {
  const dir = path.dirname(configPath);
  await mkdir(dir, { recursive: true });
  await writeFile(configPath, TOML.stringify(toJsonMap(config)), "utf8");
}
