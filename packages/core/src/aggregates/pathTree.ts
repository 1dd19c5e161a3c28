import type { PathTreeNode } from "@sessiondex/contracts";

interface MutableNode {
  path: string;
  name: string;
  own: number;
  count: number;
  children: Map<string, MutableNode>;
}

export function cwdCounts(canonicalDirs: Iterable<string>): Map<string, number> {
  const counts = new Map<string, number>();
  for (const dir of canonicalDirs) {
    if (!dir.startsWith("/")) continue;
    counts.set(dir, (counts.get(dir) ?? 0) + 1);
  }
  return counts;
}

/** Per-directory differences `after - before`, omitting zeroes. */
export function diffCounts(before: ReadonlyMap<string, number>, after: ReadonlyMap<string, number>): Map<string, number> {
  const delta = new Map<string, number>();
  for (const [dir, count] of after) {
    const diff = count - (before.get(dir) ?? 0);
    if (diff !== 0) delta.set(dir, diff);
  }
  for (const [dir, count] of before) {
    if (!after.has(dir)) delta.set(dir, -count);
  }
  return delta;
}

function ancestry(dir: string): string[] {
  const segments = dir.split("/").filter(Boolean);
  const chain = ["/"];
  let current = "";
  for (const segment of segments) {
    current = `${current}/${segment}`;
    chain.push(current);
  }
  return chain;
}

function newNode(path: string): MutableNode {
  const name = path === "/" ? "/" : path.slice(path.lastIndexOf("/") + 1);
  return { path, name, own: 0, count: 0, children: new Map() };
}

function freeze(node: MutableNode): PathTreeNode {
  const children = Array.from(node.children.values())
    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
    .map(freeze);
  return { path: node.path, name: node.name, count: node.count, children };
}

/**
 * Directory tree with session counts per subtree. Count changes that keep the set of nodes
 * intact are applied in place; anything that would add or remove a node needs a rebuild.
 */
export class PathTreeStore {
  private root: MutableNode | null = null;
  private nodes = new Map<string, MutableNode>();
  private counts = new Map<string, number>();
  private published: PathTreeNode | null = null;
  private rebuilds = 0;
  private deltas = 0;

  applySnapshot(counts: ReadonlyMap<string, number>): PathTreeNode | null {
    this.rebuilds += 1;
    this.nodes = new Map();
    this.counts = new Map();
    this.root = null;
    for (const [dir, count] of counts) {
      if (count <= 0) continue;
      this.counts.set(dir, count);
      let parent: MutableNode | null = null;
      for (const nodePath of ancestry(dir)) {
        let node = this.nodes.get(nodePath);
        if (!node) {
          node = newNode(nodePath);
          this.nodes.set(nodePath, node);
          if (parent) parent.children.set(node.name, node);
          else this.root = node;
        }
        node.count += count;
        parent = node;
      }
      if (parent) parent.own += count;
    }
    this.published = this.root ? freeze(this.root) : null;
    return this.published;
  }

  /** Returns null, leaving the tree untouched, when the delta changes the tree's shape. */
  applyDelta(delta: ReadonlyMap<string, number>): PathTreeNode | null {
    const nextCounts = new Map<MutableNode, number>();
    const nextOwn = new Map<MutableNode, number>();
    for (const [dir, diff] of delta) {
      const leaf = this.nodes.get(dir);
      if (!leaf) return null;
      const own = (nextOwn.get(leaf) ?? leaf.own) + diff;
      if (own < 0) return null;
      nextOwn.set(leaf, own);
      for (const nodePath of ancestry(dir)) {
        const node = this.nodes.get(nodePath);
        if (!node) return null;
        nextCounts.set(node, (nextCounts.get(node) ?? node.count) + diff);
      }
    }
    for (const count of nextCounts.values()) {
      if (count <= 0) return null;
    }

    for (const [node, count] of nextCounts) node.count = count;
    for (const [node, own] of nextOwn) node.own = own;
    for (const [dir, diff] of delta) {
      const next = (this.counts.get(dir) ?? 0) + diff;
      if (next > 0) this.counts.set(dir, next);
      else this.counts.delete(dir);
    }
    this.deltas += 1;
    this.published = this.root ? freeze(this.root) : null;
    return this.published;
  }

  /** Moves to `next`, incrementally when possible. */
  update(next: ReadonlyMap<string, number>): PathTreeNode | null {
    const delta = diffCounts(this.counts, next);
    if (delta.size === 0) return this.published;
    return this.applyDelta(delta) ?? this.applySnapshot(next);
  }

  tree(): PathTreeNode | null {
    return this.published;
  }

  currentCounts(): ReadonlyMap<string, number> {
    return this.counts;
  }

  getStats(): { rebuilds: number; deltas: number } {
    return { rebuilds: this.rebuilds, deltas: this.deltas };
  }
}
