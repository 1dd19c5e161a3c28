import type { SessionRecord } from "@sessiondex/contracts";
import { canonicalPath } from "./utils.js";

export const INTENT_LEAD_MS = 2_000;
export const INTENT_WINDOW_MS = 60_000;

export interface AssignIntent {
  projectId: string;
  expectedCwd: string;
  t0Ms: number;
  hints: { model?: string };
}

export type IntentMatch =
  | { kind: "assigned"; projectId: string; sessionId: string }
  | { kind: "ambiguous"; projectId: string; sessionIds: string[] };

/** Pending "the session I just launched belongs to project P" requests. */
export class AssignIntentTracker {
  private intents: AssignIntent[] = [];

  add(intent: AssignIntent): void {
    this.intents.push({ ...intent, expectedCwd: canonicalPath(intent.expectedCwd) });
  }

  pending(): readonly AssignIntent[] {
    return this.intents;
  }

  prune(nowMs: number): void {
    this.intents = this.intents.filter((intent) => nowMs - intent.t0Ms <= INTENT_WINDOW_MS);
  }

  /**
   * Resolves intents against newly seen records. A record matches when its canonical cwd equals the
   * intent's and it started within [t0 - 2s, t0 + 60s]. The model hint and then time distance decide
   * between several candidates; a tie is reported as ambiguous and left unassigned.
   */
  match(newRecords: readonly SessionRecord[]): IntentMatch[] {
    const matches: IntentMatch[] = [];
    const claimed = new Set<string>();
    const remaining: AssignIntent[] = [];

    for (const intent of this.intents) {
      const scored = newRecords
        .filter((record) => !claimed.has(record.id))
        .filter((record) => canonicalPath(record.workingDirectory) === intent.expectedCwd)
        .filter(
          (record) =>
            record.createdAtMs >= intent.t0Ms - INTENT_LEAD_MS && record.createdAtMs <= intent.t0Ms + INTENT_WINDOW_MS,
        )
        .map((record) => ({
          record,
          score: intent.hints.model !== undefined && record.model === intent.hints.model ? 1 : 0,
          distance: Math.abs(record.createdAtMs - intent.t0Ms),
        }))
        .sort((a, b) => b.score - a.score || a.distance - b.distance);

      const best = scored[0];
      if (!best) {
        remaining.push(intent);
        continue;
      }
      const tied = scored.filter((entry) => entry.score === best.score && entry.distance === best.distance);
      if (tied.length > 1) {
        matches.push({ kind: "ambiguous", projectId: intent.projectId, sessionIds: tied.map((entry) => entry.record.id) });
        continue;
      }
      claimed.add(best.record.id);
      matches.push({ kind: "assigned", projectId: intent.projectId, sessionId: best.record.id });
    }

    this.intents = remaining;
    return matches;
  }
}
