import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import type { SessionOverlay } from "@sessiondex/contracts";
import { asRecord, asString, expandHome } from "./utils.js";

function normalizeOverlay(value: unknown): SessionOverlay | null {
  const record = asRecord(value);
  const overlay: SessionOverlay = {};
  const title = typeof record.title === "string" ? record.title.trim() : "";
  const comment = typeof record.comment === "string" ? record.comment.trim() : "";
  if (title) overlay.title = title;
  if (comment) overlay.comment = comment;
  return overlay.title === undefined && overlay.comment === undefined ? null : overlay;
}

/** User-owned titles and comments keyed by session id. `filePath: null` keeps them in memory only. */
export class OverlayStore {
  private readonly overlays = new Map<string, SessionOverlay>();

  private constructor(private readonly filePath: string | null) {}

  static async open(filePath: string | null): Promise<OverlayStore> {
    const store = new OverlayStore(filePath ? path.resolve(expandHome(filePath)) : null);
    await store.reload();
    return store;
  }

  static inMemory(initial: Record<string, SessionOverlay> = {}): OverlayStore {
    const store = new OverlayStore(null);
    for (const [id, overlay] of Object.entries(initial)) {
      const normalized = normalizeOverlay(overlay);
      if (normalized) store.overlays.set(id, normalized);
    }
    return store;
  }

  get(id: string): SessionOverlay | undefined {
    return this.overlays.get(id);
  }

  size(): number {
    return this.overlays.size;
  }

  /** Empty fields clear; an overlay with nothing left is removed. */
  async set(id: string, overlay: SessionOverlay): Promise<SessionOverlay | null> {
    const normalized = normalizeOverlay(overlay);
    if (normalized) {
      this.overlays.set(id, normalized);
    } else {
      this.overlays.delete(id);
    }
    await this.save();
    return normalized;
  }

  async reload(): Promise<void> {
    if (!this.filePath) return;
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf8");
    } catch {
      return;
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      return;
    }
    this.overlays.clear();
    for (const [id, value] of Object.entries(asRecord(parsed))) {
      const normalized = normalizeOverlay(value);
      if (normalized && asString(id)) this.overlays.set(id, normalized);
    }
  }

  private async save(): Promise<void> {
    if (!this.filePath) return;
    const out: Record<string, SessionOverlay> = {};
    for (const [id, overlay] of [...this.overlays.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
      out[id] = overlay;
    }
    await mkdir(path.dirname(this.filePath), { recursive: true });
    await writeFile(this.filePath, `${JSON.stringify(out, null, 2)}\n`, "utf8");
  }
}
