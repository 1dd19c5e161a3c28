import { mkdtemp } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, expect, it, vi } from "vitest";
import type { SessionRecord } from "@sessiondex/contracts";
import { loadConfig, mergeConfig, SessionIndex } from "@sessiondex/core";
import { buildProgram, filterPatchFrom, renderTree, type CliIo } from "./program.js";

function at(year: number, month: number, day: number, hour = 12): number {
  return new Date(year, month - 1, day, hour).getTime();
}

function buildRecord(id: string, overrides: Partial<SessionRecord> = {}): SessionRecord {
  return {
    id,
    source: { kind: "codex", locality: "local" },
    filePath: `/logs/${id}.jsonl`,
    workingDirectory: "/work/app",
    createdAtMs: at(2024, 3, 5, 9),
    lastUpdatedAtMs: at(2024, 3, 5, 10),
    activeDurationMs: null,
    userMessageCount: 2,
    assistantMessageCount: 2,
    toolInvocationCount: 1,
    eventCount: 5,
    fileSizeBytes: 2048,
    fileMtimeMs: at(2024, 3, 5, 10),
    lineCount: 5,
    parseQuality: "full",
    ...overrides,
  };
}

async function openFixtureIndex(): Promise<SessionIndex> {
  const config = {
    ...mergeConfig({
      refresh: { forceDebounceMs: 1, autoDebounceMs: 5, completionCooldownMs: 0 },
      coverage: { enabled: false },
      filter: { debounceMs: 1 },
    }),
    sources: {},
  };
  const index = new SessionIndex({ config, providers: [], now: () => at(2024, 3, 20) });
  index.mergeAndApply([
    buildRecord("a"),
    buildRecord("b", {
      source: { kind: "claude", locality: "local" },
      workingDirectory: "/work/api",
      createdAtMs: at(2024, 3, 6, 9),
      lastUpdatedAtMs: at(2024, 3, 6, 10),
      fileMtimeMs: at(2024, 3, 6, 10),
    }),
  ]);
  await index.whenIdle();
  return index;
}

function harness(): { io: CliIo; out: string[]; err: string[]; run: (...args: string[]) => Promise<void> } {
  const out: string[] = [];
  const err: string[] = [];
  const io: CliIo = { out: (line) => out.push(line), err: (line) => err.push(line) };
  const run = async (...args: string[]): Promise<void> => {
    const program = buildProgram({ io, openIndex: () => openFixtureIndex() });
    await program.parseAsync(args, { from: "user" });
  };
  return { io, out, err, run };
}

describe("sessiondex cli", () => {
  it("lists sessions grouped by day", async () => {
    const { out, run } = harness();
    await run("list");

    expect(out.indexOf("Mar 6, 2024 (1 sessions, 5 events)")).toBe(0);
    expect(out.indexOf("Mar 5, 2024 (1 sessions, 5 events)")).toBe(4);
    expect(out[5]).toBe("id | agent | updated | events | title");
    expect(out[7]).toBe("a    codex   10:00     5        app");
  });

  it("applies day and path selections and prints JSON", async () => {
    const { out, run } = harness();
    await run("list", "--day", "2024-03-05", "--json");

    const parsed: {
      filter: { selectedDays: number[] };
      sections: Array<{ sessions: Array<{ id: string }> }>;
    } = JSON.parse(out.join("\n"));
    expect(parsed.filter.selectedDays).toEqual([at(2024, 3, 5, 0)]);
    expect(parsed.sections.flatMap((section) => section.sessions.map((session) => session.id))).toEqual(["a"]);

    const second = harness();
    await second.run("list", "--path", "/work/api");
    expect(second.out[0]).toBe("Mar 6, 2024 (1 sessions, 5 events)");
    expect(second.out).toHaveLength(4);
  });

  it("reports when nothing matches", async () => {
    const { out, run } = harness();
    await run("list", "--search", "no-such-session");
    expect(out).toEqual(["No sessions match."]);
  });

  it("rejects malformed option values", async () => {
    const { err, run } = harness();
    await expect(run("list", "--month", "2024-3")).rejects.toMatchObject({ code: "commander.invalidArgument" });
    expect(err.join("\n")).toContain("expected YYYY-MM");

    await expect(run("list", "--sort", "loudest")).rejects.toMatchObject({ code: "commander.invalidArgument" });
  });

  it("prints a month calendar", async () => {
    const { out, run } = harness();
    await run("calendar", "2024-03");
    expect(out).toEqual(["day        | sessions", "-----------+---------", "2024-03-05   1", "2024-03-06   1"]);

    const empty = harness();
    await empty.run("calendar", "2024-02");
    expect(empty.out).toEqual(["No sessions in 2024-02."]);

    await expect(harness().run("calendar", "2024-13")).rejects.toThrow("expected YYYY-MM");
  });

  it("prints the working directory tree", async () => {
    const { out, run } = harness();
    await run("tree");
    expect(out).toEqual(["/ (2)", "  work (2)", "    api (1)", "    app (1)"]);
  });

  it("reads and writes config values", async () => {
    const root = await mkdtemp(path.join(os.tmpdir(), "sessiondex-cli-"));
    const configPath = path.join(root, "config.toml");

    const setter = harness();
    await setter.run("--config", configPath, "config", "set", "refresh.autoDebounceMs", "450");
    expect(setter.out).toEqual(["updated refresh.autoDebounceMs"]);
    expect((await loadConfig(configPath)).refresh.autoDebounceMs).toBe(450);

    const getter = harness();
    await getter.run("--config", configPath, "config", "get", "refresh.autoDebounceMs");
    expect(getter.out).toEqual(["450"]);
  });

  it("passes server options through to serve", async () => {
    const serve = vi.fn(async () => undefined);
    const program = buildProgram({ io: { out: () => undefined, err: () => undefined }, serve });
    await program.parseAsync(["--config", "/tmp/x.toml", "serve", "--port", "9001", "--no-watch"], { from: "user" });
    expect(serve).toHaveBeenCalledWith({ host: "127.0.0.1", port: 9001, configPath: "/tmp/x.toml", watch: false });
  });
});

describe("filterPatchFrom", () => {
  it("maps flags to a filter patch", () => {
    expect(filterPatchFrom({ day: [], project: ["p1"], created: true, search: "auth" })).toEqual({
      selectedDays: [],
      selectedProjectIds: ["p1"],
      dateDimension: "created",
      quickSearch: "auth",
    });
  });
});

describe("renderTree", () => {
  it("indents children by depth", () => {
    expect(
      renderTree({ path: "/", name: "/", count: 1, children: [{ path: "/x", name: "x", count: 1, children: [] }] }),
    ).toEqual(["/ (1)", "  x (1)"]);
  });
});
