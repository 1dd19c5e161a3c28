import { describe, expect, it } from "vitest";
import { at } from "./__tests__/fixtures.js";
import { IncrementalHints, subsetQueryForHint } from "./hints.js";

describe("IncrementalHints", () => {
  it("returns the live hint that expires last and prunes expired ones", () => {
    const hints = new IncrementalHints();
    hints.setHint({ kind: "agent_day", agent: "codex", dayStartMs: at(2024, 3, 5, 0) }, 1_000);
    hints.setHint({ kind: "project_directory", directory: "/work/app/" }, 2_000);

    expect(hints.liveHint(500)).toEqual({ kind: "project_directory", directory: "/work/app" });
    expect(hints.liveHint(1_500)).toEqual({ kind: "project_directory", directory: "/work/app" });
    expect(hints.liveHint(2_000)).toBeNull();
  });

  it("replaces an earlier hint for the same agent", () => {
    const hints = new IncrementalHints();
    hints.setHint({ kind: "agent_day", agent: "claude", dayStartMs: at(2024, 3, 4, 0) }, 5_000);
    hints.setHint({ kind: "agent_day", agent: "claude", dayStartMs: at(2024, 3, 5, 0) }, 1_000);

    expect(hints.liveHint(0)).toEqual({ kind: "agent_day", agent: "claude", dayStartMs: at(2024, 3, 5, 0) });
    hints.clear();
    expect(hints.liveHint(0)).toBeNull();
  });
});

describe("subsetQueryForHint", () => {
  it("maps agent days to updated-since queries and directories to directory queries", () => {
    expect(subsetQueryForHint({ kind: "agent_day", agent: "gemini", dayStartMs: 42 })).toEqual({
      kind: "updated_since",
      agent: "gemini",
      sinceMs: 42,
    });
    expect(subsetQueryForHint({ kind: "project_directory", directory: "/work/app" })).toEqual({
      kind: "project_directory",
      directory: "/work/app",
    });
  });
});
