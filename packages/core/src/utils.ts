import { createHash } from "node:crypto";
import os from "node:os";
import path from "node:path";
import type { SessionSource } from "@sessiondex/contracts";

export function expandHome(input: string): string {
  if (input === "~") {
    return os.homedir();
  }
  if (input.startsWith("~/")) {
    return path.join(os.homedir(), input.slice(2));
  }
  return input;
}

export function stableId(parts: string[]): string {
  const hash = createHash("sha1");
  for (const part of parts) {
    hash.update(part);
    hash.update("\u0000");
  }
  return hash.digest("hex").slice(0, 24);
}

export function asRecord(value: unknown): Record<string, unknown> {
  if (value && typeof value === "object" && !Array.isArray(value)) {
    return value as Record<string, unknown>;
  }
  return {};
}

export function asString(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }
  if (value === null || value === undefined) {
    return "";
  }
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}

export function nowMs(): number {
  return Date.now();
}

export function parseEpochMs(value: unknown): number | null {
  if (typeof value === "number" && Number.isFinite(value)) {
    if (value > 1_000_000_000_000) {
      return value;
    }
    if (value > 1_000_000_000) {
      return Math.round(value * 1000);
    }
  }
  if (typeof value === "string" && value.trim()) {
    const parsed = Date.parse(value);
    if (!Number.isNaN(parsed)) {
      return parsed;
    }
  }
  return null;
}

/** Expands `~`, resolves `.`/`..` segments and drops trailing separators. */
export function canonicalPath(input: string): string {
  const trimmed = input.trim();
  if (!trimmed) return "";
  const normalized = path.posix.normalize(expandHome(trimmed));
  if (normalized.length > 1 && normalized.endsWith("/")) {
    return normalized.replace(/\/+$/g, "");
  }
  return normalized;
}

/** True when `candidate` equals `prefix` or lives beneath it. Both must already be canonical. */
export function isPathWithin(candidate: string, prefix: string): boolean {
  if (candidate === prefix) return true;
  if (prefix === "/") return candidate.startsWith("/");
  return candidate.startsWith(`${prefix}/`);
}

export function sourceKey(source: SessionSource): string {
  if (source.locality === "remote") {
    return `${source.kind}@${source.host ?? ""}`;
  }
  return source.kind;
}

export function membershipKey(source: SessionSource, sessionId: string): string {
  return `${source.kind}|${sessionId}`;
}

export function asArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}
