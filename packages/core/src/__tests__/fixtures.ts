import { mkdtemp } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { AppConfig, SessionRecord } from "@sessiondex/contracts";
import { mergeConfig } from "../config.js";

/** Local-time epoch ms; month is 1-based. */
export function at(year: number, month: number, day: number, hour = 12, minute = 0): number {
  return new Date(year, month - 1, day, hour, minute).getTime();
}

export function makeRecord(overrides: Partial<SessionRecord> = {}): SessionRecord {
  const id = overrides.id ?? "s1";
  return {
    id,
    source: { kind: "codex", locality: "local" },
    filePath: `/logs/${id}.jsonl`,
    workingDirectory: "/work/app",
    createdAtMs: at(2024, 3, 5, 9),
    lastUpdatedAtMs: at(2024, 3, 5, 10),
    activeDurationMs: null,
    userMessageCount: 1,
    assistantMessageCount: 1,
    toolInvocationCount: 0,
    eventCount: 2,
    fileSizeBytes: 1000,
    fileMtimeMs: at(2024, 3, 5, 10),
    lineCount: 2,
    parseQuality: "full",
    ...overrides,
  };
}

/** Defaults with no source profiles, so nothing reads the real home directory. */
export function testConfig(overrides: Record<string, unknown> = {}): AppConfig {
  const config = mergeConfig(overrides);
  return { ...config, sources: {} };
}

export async function createTempRoot(label = "core"): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), `sessiondex-${label}-`));
}
