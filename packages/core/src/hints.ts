import type { IncrementalHint, SubsetQuery } from "@sessiondex/contracts";
import { canonicalPath } from "./utils.js";

interface StoredHint {
  hint: IncrementalHint;
  expiresAtMs: number;
}

function hintKey(hint: IncrementalHint): string {
  return hint.kind === "agent_day" ? `agent_day:${hint.agent}` : `project_directory:${canonicalPath(hint.directory)}`;
}

/** Short-lived "I know exactly what changed" markers set by callers that just started a session. */
export class IncrementalHints {
  private readonly hints = new Map<string, StoredHint>();

  setHint(hint: IncrementalHint, expiresAtMs: number): void {
    const normalized: IncrementalHint =
      hint.kind === "project_directory" ? { kind: hint.kind, directory: canonicalPath(hint.directory) } : hint;
    this.hints.set(hintKey(normalized), { hint: normalized, expiresAtMs });
  }

  /** Most recently expiring live hint, pruning expired ones. */
  liveHint(nowMs: number): IncrementalHint | null {
    let best: StoredHint | null = null;
    for (const [key, stored] of this.hints) {
      if (stored.expiresAtMs <= nowMs) {
        this.hints.delete(key);
        continue;
      }
      if (!best || stored.expiresAtMs > best.expiresAtMs) best = stored;
    }
    return best?.hint ?? null;
  }

  clear(): void {
    this.hints.clear();
  }
}

export function subsetQueryForHint(hint: IncrementalHint): SubsetQuery {
  if (hint.kind === "agent_day") {
    return { kind: "updated_since", agent: hint.agent, sinceMs: hint.dayStartMs };
  }
  return { kind: "project_directory", directory: hint.directory };
}
