import { UNASSIGNED_PROJECT_ID, type Project, type ProjectCount, type SessionRecord } from "@sessiondex/contracts";
import { childrenByParent, projectIdFor } from "../projects.js";
import { stableId } from "../utils.js";

export interface MembershipView {
  memberships: ReadonlyMap<string, string>;
  knownProjectIds: ReadonlySet<string>;
  version: number;
}

export function directCounts(sessions: Iterable<SessionRecord>, view: MembershipView): Map<string, number> {
  const counts = new Map<string, number>();
  for (const session of sessions) {
    const projectId = projectIdFor(session, view.memberships, view.knownProjectIds) ?? UNASSIGNED_PROJECT_ID;
    counts.set(projectId, (counts.get(projectId) ?? 0) + 1);
  }
  return counts;
}

function countsHash(counts: ReadonlyMap<string, number>): string {
  return stableId(
    Array.from(counts.entries())
      .map(([id, count]) => `${id}=${count}`)
      .sort(),
  );
}

/** Direct counts rolled up so that each project also includes all of its descendants. */
export function rollUp(projects: readonly Project[], direct: ReadonlyMap<string, number>): Map<string, number> {
  const children = childrenByParent(projects);
  const out = new Map<string, number>();
  const visit = (id: string, trail: Set<string>): number => {
    const memo = out.get(id);
    if (memo !== undefined) return memo;
    if (trail.has(id)) return 0;
    trail.add(id);
    let total = direct.get(id) ?? 0;
    for (const child of children.get(id) ?? []) total += visit(child, trail);
    trail.delete(id);
    out.set(id, total);
    return total;
  };
  for (const project of projects) visit(project.id, new Set());
  out.set(UNASSIGNED_PROJECT_ID, direct.get(UNASSIGNED_PROJECT_ID) ?? 0);
  return out;
}

export interface VisibleCountsKey {
  dimension: string;
  days: readonly number[];
  sessionsVersion: number;
  membershipVersion: number;
  coverageVersion: number;
  /** Other narrowing inputs, such as the selected path. */
  selection: string;
}

function encodeVisibleKey(key: VisibleCountsKey): string {
  return [
    key.dimension,
    key.days.join(","),
    key.sessionsVersion,
    key.membershipVersion,
    key.coverageVersion,
    key.selection,
  ].join("|");
}

/**
 * Per-project totals and visible counts. Totals follow record deltas while memberships are unchanged;
 * a membership change rebuilds them. Rolled-up results are memoized by everything they depend on.
 */
export class ProjectCountsCache {
  private totals = new Map<string, number>();
  private totalsMembershipVersion: number | null = null;
  private visibleKey: string | null = null;
  private visible: ReadonlyMap<string, number> = new Map();
  private aggregatedKey: string | null = null;
  private aggregated: Record<string, ProjectCount> = {};
  private rebuilds = 0;

  /** Recomputes totals from scratch. */
  rebuildTotals(sessions: Iterable<SessionRecord>, view: MembershipView): void {
    this.totals = directCounts(sessions, view);
    this.totalsMembershipVersion = view.version;
    this.rebuilds += 1;
  }

  /**
   * Applies removed/added records to the totals. Returns false without touching anything when the
   * membership version moved, in which case the caller must rebuild.
   */
  applyDelta(removed: Iterable<SessionRecord>, added: Iterable<SessionRecord>, view: MembershipView): boolean {
    if (this.totalsMembershipVersion !== view.version) return false;
    for (const [id, count] of directCounts(removed, view)) {
      const next = (this.totals.get(id) ?? 0) - count;
      if (next > 0) this.totals.set(id, next);
      else this.totals.delete(id);
    }
    for (const [id, count] of directCounts(added, view)) {
      this.totals.set(id, (this.totals.get(id) ?? 0) + count);
    }
    return true;
  }

  totalsView(): ReadonlyMap<string, number> {
    return this.totals;
  }

  visibleCounts(key: VisibleCountsKey, compute: () => Map<string, number>): ReadonlyMap<string, number> {
    const encoded = encodeVisibleKey(key);
    if (encoded !== this.visibleKey) {
      this.visible = compute();
      this.visibleKey = encoded;
    }
    return this.visible;
  }

  aggregatedCounts(
    projects: readonly Project[],
    visibleKey: VisibleCountsKey,
    visible: ReadonlyMap<string, number>,
    structureVersion: string,
  ): Record<string, ProjectCount> {
    const encoded = [encodeVisibleKey(visibleKey), countsHash(this.totals), structureVersion].join("|");
    if (encoded === this.aggregatedKey) return this.aggregated;

    const totalRollUp = rollUp(projects, this.totals);
    const visibleRollUp = rollUp(projects, visible);
    const out: Record<string, ProjectCount> = {};
    for (const [id, total] of totalRollUp) {
      out[id] = { visible: visibleRollUp.get(id) ?? 0, total };
    }
    this.aggregated = out;
    this.aggregatedKey = encoded;
    return out;
  }

  getStats(): { rebuilds: number } {
    return { rebuilds: this.rebuilds };
  }
}
