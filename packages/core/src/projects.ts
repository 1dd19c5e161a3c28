import {
  UNASSIGNED_PROJECT_ID,
  type AgentKind,
  type Project,
  type SessionRecord,
} from "@sessiondex/contracts";
import { membershipKey, stableId } from "./utils.js";

export interface ProjectFilter {
  allowedProjectIds: ReadonlySet<string>;
  includeUnassigned: boolean;
  allowedSourcesByProject: ReadonlyMap<string, ReadonlySet<AgentKind>>;
  memberships: ReadonlyMap<string, string>;
  knownProjectIds: ReadonlySet<string>;
}

export function childrenByParent(projects: readonly Project[]): Map<string, string[]> {
  const children = new Map<string, string[]>();
  for (const project of projects) {
    if (project.parentId === null) continue;
    const list = children.get(project.parentId) ?? [];
    list.push(project.id);
    children.set(project.parentId, list);
  }
  return children;
}

/** The given ids plus every transitive descendant. Cycles are tolerated. */
export function collectDescendants(projects: readonly Project[], ids: Iterable<string>): Set<string> {
  const children = childrenByParent(projects);
  const out = new Set<string>();
  const stack = Array.from(ids);
  while (stack.length > 0) {
    const id = stack.pop();
    if (id === undefined || out.has(id)) continue;
    out.add(id);
    for (const child of children.get(id) ?? []) stack.push(child);
  }
  return out;
}

/** Changes whenever parent links or source allow-lists change. */
export function projectStructureVersion(projects: readonly Project[]): string {
  const parts = [...projects]
    .sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0))
    .map((project) => `${project.id}>${project.parentId ?? ""}:${[...project.sources].sort().join(",")}`);
  return stableId(parts);
}

export function buildProjectFilter(
  selectedIds: readonly string[],
  projects: readonly Project[],
  memberships: ReadonlyMap<string, string>,
): ProjectFilter | null {
  if (selectedIds.length === 0) return null;
  const includeUnassigned = selectedIds.includes(UNASSIGNED_PROJECT_ID);
  const explicit = selectedIds.filter((id) => id !== UNASSIGNED_PROJECT_ID);
  const allowedProjectIds = collectDescendants(projects, explicit);
  const allowedSourcesByProject = new Map<string, ReadonlySet<AgentKind>>();
  for (const project of projects) {
    if (allowedProjectIds.has(project.id) && project.sources.length > 0) {
      allowedSourcesByProject.set(project.id, new Set(project.sources));
    }
  }
  const knownProjectIds = new Set(projects.map((project) => project.id));
  return { allowedProjectIds, includeUnassigned, allowedSourcesByProject, memberships, knownProjectIds };
}

/** Membership of a record, or null when it has none or points at a project that no longer exists. */
export function projectIdFor(
  record: SessionRecord,
  memberships: ReadonlyMap<string, string>,
  knownProjectIds: ReadonlySet<string>,
): string | null {
  const projectId = memberships.get(membershipKey(record.source, record.id));
  return projectId !== undefined && knownProjectIds.has(projectId) ? projectId : null;
}

export function matchesProjectFilter(record: SessionRecord, filter: ProjectFilter): boolean {
  const projectId = projectIdFor(record, filter.memberships, filter.knownProjectIds);
  if (projectId === null) return filter.includeUnassigned;
  if (!filter.allowedProjectIds.has(projectId)) return false;
  const allowedSources = filter.allowedSourcesByProject.get(projectId);
  return !allowedSources || allowedSources.has(record.source.kind);
}
