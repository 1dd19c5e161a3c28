import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { DirectoryWatcher } from "./watcher.js";

describe("DirectoryWatcher", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  function watcherWith(changes: Array<[string, readonly string[]]>): DirectoryWatcher {
    const watcher = new DirectoryWatcher({
      debounceMs: 400,
      onChange: (root, paths) => changes.push([root, paths]),
    });
    watcher.setRoots(["/data/sessions", "/data/sessions/codex", "/data/sessions/"]);
    return watcher;
  }

  it("collapses a burst of writes under one root into a single change", () => {
    const changes: Array<[string, readonly string[]]> = [];
    const watcher = watcherWith(changes);

    expect(watcher.notePath("/data/sessions/claude/b.jsonl")).toBe(true);
    vi.advanceTimersByTime(300);
    expect(watcher.notePath("/data/sessions/claude/a.json")).toBe(true);
    watcher.notePath("/data/sessions/claude/b.jsonl");
    vi.advanceTimersByTime(399);
    expect(changes).toEqual([]);

    vi.advanceTimersByTime(1);
    expect(changes).toEqual([["/data/sessions", ["/data/sessions/claude/a.json", "/data/sessions/claude/b.jsonl"]]]);
  });

  it("attributes a path to the deepest watched root", () => {
    const changes: Array<[string, readonly string[]]> = [];
    const watcher = watcherWith(changes);

    watcher.notePath("/data/sessions/codex/2024/03/rollout.jsonl");
    vi.advanceTimersByTime(400);

    expect(changes).toEqual([["/data/sessions/codex", ["/data/sessions/codex/2024/03/rollout.jsonl"]]]);
    expect(watcher.watchedRoots()).toEqual(["/data/sessions", "/data/sessions/codex"]);
  });

  it("ignores other file types and paths outside every root", () => {
    const changes: Array<[string, readonly string[]]> = [];
    const watcher = watcherWith(changes);

    expect(watcher.notePath("/data/sessions/notes.txt")).toBe(false);
    expect(watcher.notePath("/data/sessions-old/a.jsonl")).toBe(false);
    vi.advanceTimersByTime(1_000);
    expect(changes).toEqual([]);
  });

  it("drops pending bursts on close", async () => {
    const changes: Array<[string, readonly string[]]> = [];
    const watcher = watcherWith(changes);

    watcher.notePath("/data/sessions/a.jsonl");
    await watcher.close();
    vi.advanceTimersByTime(1_000);
    expect(changes).toEqual([]);
  });
});
