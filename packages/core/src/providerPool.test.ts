import { describe, expect, it } from "vitest";
import type { LoadContext, ProviderLoadResult, SessionRecord, SubsetQuery } from "@sessiondex/contracts";
import { makeRecord } from "./__tests__/fixtures.js";
import { ProviderUnavailableError } from "./errors.js";
import { ProviderPool } from "./providerPool.js";
import type { SessionProvider } from "./providers/types.js";

const refresh: LoadContext = {
  scope: { kind: "all" },
  rootPaths: [],
  dateDimension: "updated",
  dateRange: null,
  projectDirectories: null,
  cachePolicy: "refresh",
};
const cacheOnly: LoadContext = { ...refresh, cachePolicy: "cacheOnly" };

class StubProvider implements SessionProvider {
  readonly label = "stub";
  readonly source = { kind: "codex", locality: "local" } as const;
  readonly roots: readonly string[] = [];
  calls = 0;

  constructor(
    readonly id: string,
    private readonly behave: (context: LoadContext) => ProviderLoadResult,
  ) {}

  async load(context: LoadContext): Promise<ProviderLoadResult> {
    this.calls += 1;
    return this.behave(context);
  }
}

function ok(records: SessionRecord[]): ProviderLoadResult {
  return { summaries: records, coverage: null, cacheHit: false };
}

describe("ProviderPool", () => {
  it("isolates failures and cools an unavailable provider down", async () => {
    let clock = 1_000;
    const down = new StubProvider("down", () => {
      throw new ProviderUnavailableError("down", "mirror offline");
    });
    const up = new StubProvider("up", () => ok([makeRecord()]));
    const pool = new ProviderPool([down, up], { cooldownMs: 30_000, now: () => clock });

    const failed = await pool.load(down, refresh);
    const succeeded = await pool.load(up, refresh);

    expect(failed.error).toBeInstanceOf(ProviderUnavailableError);
    expect(failed.result).toBeNull();
    expect(succeeded.result?.summaries).toHaveLength(1);

    clock += 10_000;
    expect((await pool.load(down, refresh)).skipped).toBe("unavailable");
    expect(down.calls).toBe(1);
    expect(pool.healthSnapshot()[0]).toEqual({
      providerId: "down",
      unavailableUntilMs: 31_000,
      cacheUnavailableUntilMs: null,
      lastError: "Provider 'down' is unavailable: mirror offline",
    });

    clock += 20_000;
    await pool.load(down, refresh);
    expect(down.calls).toBe(2);
  });

  it("cools down only cache reads after a failed cache-only load", async () => {
    const flaky = new StubProvider("flaky", (context) => {
      if (context.cachePolicy === "cacheOnly") throw new Error("disk I/O error");
      return ok([]);
    });
    const pool = new ProviderPool([flaky], { cooldownMs: 30_000, now: () => 0 });

    expect((await pool.load(flaky, cacheOnly)).error?.message).toBe("disk I/O error");
    expect((await pool.load(flaky, cacheOnly)).skipped).toBe("cache_unavailable");
    const refreshed = await pool.load(flaky, refresh);

    expect(refreshed.skipped).toBeNull();
    expect(refreshed.result?.summaries).toEqual([]);
    expect(pool.healthSnapshot()[0]?.lastError).toBeNull();
  });

  it("answers subset queries only for providers that support them", async () => {
    const plain = new StubProvider("plain", () => ok([]));
    const query: SubsetQuery = { kind: "project_directory", directory: "/work/app" };
    const subset: SessionProvider = {
      id: "subset",
      label: "subset",
      source: { kind: "claude", locality: "local" },
      roots: [],
      load: async () => ok([]),
      loadSubset: async () => {
        throw new Error("boom");
      },
    };
    const pool = new ProviderPool([plain, subset], { cooldownMs: 1_000, now: () => 0 });

    expect(await pool.loadSubset(plain, query)).toBeNull();
    expect(await pool.loadSubset(subset, query)).toEqual([]);
    expect(pool.get("subset")).toBe(subset);
    expect(pool.list()).toHaveLength(2);
  });

  it("enriches through providers that can and skips them while they are cooling down", async () => {
    const plain = new StubProvider("plain", () => ok([]));
    let failing = true;
    const enriching: SessionProvider = {
      id: "rich",
      label: "rich",
      source: { kind: "codex", locality: "local" },
      roots: [],
      load: async () => ok([]),
      enrich: async (records) => {
        if (failing) throw new ProviderUnavailableError("rich", "mirror offline");
        return records.map((record) => ({ ...record, parseQuality: "enriched" }));
      },
    };
    let clock = 0;
    const pool = new ProviderPool([plain, enriching], { cooldownMs: 1_000, now: () => clock });
    const record = makeRecord({ parseQuality: "metadata" });

    expect(await pool.enrich(plain, [record])).toBeNull();
    expect(await pool.enrich(enriching, [record])).toEqual([]);
    expect(pool.healthSnapshot()[1]?.unavailableUntilMs).toBe(1_000);

    failing = false;
    expect(await pool.enrich(enriching, [record])).toEqual([]);
    clock = 1_000;
    expect((await pool.enrich(enriching, [record]))?.map((entry) => entry.parseQuality)).toEqual(["enriched"]);
  });
});
