import { describe, expect, it } from "vitest";
import { at, makeRecord } from "./__tests__/fixtures.js";
import type { SessionRecord } from "@sessiondex/contracts";
import { applyOverlays, mergeRecords, preferRecord, selectRecord } from "./reconciler.js";

function permutations<T>(items: readonly T[]): T[][] {
  if (items.length <= 1) return [[...items]];
  return items.flatMap((item, index) =>
    permutations([...items.slice(0, index), ...items.slice(index + 1)]).map((rest) => [item, ...rest]),
  );
}

describe("mergeRecords", () => {
  it("keeps the fully parsed record with its tool calls over a metadata-only pass of the same file", () => {
    const metadata = makeRecord({ id: "S1", parseQuality: "metadata", toolInvocationCount: 0, fileSizeBytes: 1000 });
    const full = makeRecord({ id: "S1", parseQuality: "full", toolInvocationCount: 5, fileSizeBytes: 1000 });

    const merged = mergeRecords([metadata], [full]);

    expect(merged).toHaveLength(1);
    expect(merged[0]?.parseQuality).toBe("full");
    expect(merged[0]?.toolInvocationCount).toBe(5);
  });

  it("is order independent and idempotent", () => {
    const a = makeRecord({ id: "S1", parseQuality: "metadata", lastUpdatedAtMs: at(2024, 3, 6) });
    const b = makeRecord({ id: "S1", filePath: "/mirror/S1.jsonl", fileSizeBytes: 900, lastUpdatedAtMs: at(2024, 3, 4) });
    const c = makeRecord({ id: "S2" });

    const forward = mergeRecords([a, c], [b]);
    const backward = mergeRecords([b], [c, a]);

    expect(forward).toEqual(backward);
    expect(mergeRecords(forward, [])).toEqual(forward);
    expect(mergeRecords(forward, forward)).toEqual(forward);
  });

  it("picks the same winner for every arrival order and every existing/incoming split", () => {
    const rewritten = makeRecord({ filePath: "/p.jsonl", fileMtimeMs: 2000, fileSizeBytes: 100, parseQuality: "metadata" });
    const olderRead = makeRecord({ filePath: "/p.jsonl", fileMtimeMs: 1000, fileSizeBytes: 100, parseQuality: "full" });
    const mirror = makeRecord({
      filePath: "/q.jsonl",
      fileMtimeMs: 500,
      fileSizeBytes: 200,
      parseQuality: "metadata",
      lastUpdatedAtMs: at(2024, 3, 6, 10),
    });

    const winners = new Set<string>();
    for (const order of permutations([rewritten, olderRead, mirror])) {
      for (let split = 0; split <= order.length; split += 1) {
        const [winner] = mergeRecords(order.slice(0, split), order.slice(split));
        winners.add(`${winner?.filePath}@${winner?.fileMtimeMs}`);
      }
    }

    expect([...winners]).toEqual(["/q.jsonl@500"]);
  });

  it("returns one record per id sorted by id", () => {
    const merged = mergeRecords([makeRecord({ id: "b" }), makeRecord({ id: "a" })], [makeRecord({ id: "b" })]);
    expect(merged.map((record) => record.id)).toEqual(["a", "b"]);
  });

  it("drops overlay fields reported by providers", () => {
    const merged = mergeRecords([], [makeRecord({ title: "from provider", comment: "nope" })]);
    expect(merged[0]?.title).toBeUndefined();
    expect(merged[0]?.comment).toBeUndefined();
  });
});

describe("preferRecord", () => {
  it("lets a newer stat of the same file replace a higher quality parse", () => {
    const older = makeRecord({ parseQuality: "full", fileMtimeMs: 100, fileSizeBytes: 1000 });
    const newer = makeRecord({ parseQuality: "metadata", fileMtimeMs: 200, fileSizeBytes: 1200 });
    expect(preferRecord(older, newer)).toBe(newer);
    expect(preferRecord(newer, older)).toBe(newer);
  });

  it("never lets lower quality win while the file is unchanged", () => {
    const enriched = makeRecord({ parseQuality: "enriched", userMessageCount: 1 });
    const full = makeRecord({ parseQuality: "full", userMessageCount: 40 });
    expect(preferRecord(full, enriched)).toBe(enriched);
  });

  it("treats a missing quality as weaker than a full parse", () => {
    const unknown = makeRecord({ filePath: "/a.jsonl", userMessageCount: 50 });
    delete unknown.parseQuality;
    const full = makeRecord({ filePath: "/b.jsonl", parseQuality: "full" });
    expect(preferRecord(unknown, full)).toBe(full);
  });

  it("falls through to counters when the only known quality is metadata", () => {
    const unknown = makeRecord({ filePath: "/a.jsonl", userMessageCount: 3 });
    delete unknown.parseQuality;
    const metadata = makeRecord({ filePath: "/b.jsonl", parseQuality: "metadata", userMessageCount: 0, assistantMessageCount: 0 });
    expect(preferRecord(metadata, unknown)).toBe(unknown);
  });

  it("prefers richer counters, then more lines, for equal file sizes", () => {
    const lean = makeRecord({ filePath: "/a.jsonl", toolInvocationCount: 1, lineCount: 90 });
    const rich = makeRecord({ filePath: "/b.jsonl", toolInvocationCount: 4, lineCount: 10 });
    expect(preferRecord(lean, rich)).toBe(rich);

    const short = makeRecord({ filePath: "/a.jsonl", lineCount: 3 });
    const long = makeRecord({ filePath: "/b.jsonl", lineCount: 8 });
    expect(preferRecord(short, long)).toBe(long);
  });

  it("prefers recency, then size, when file sizes differ", () => {
    const recent = makeRecord({ filePath: "/a.jsonl", fileSizeBytes: 10, lastUpdatedAtMs: at(2024, 3, 9) });
    const stale = makeRecord({ filePath: "/b.jsonl", fileSizeBytes: 99, lastUpdatedAtMs: at(2024, 3, 8) });
    expect(preferRecord(stale, recent)).toBe(recent);

    const small = makeRecord({ filePath: "/a.jsonl", fileSizeBytes: 10 });
    const large = makeRecord({ filePath: "/b.jsonl", fileSizeBytes: 99 });
    expect(preferRecord(small, large)).toBe(large);
  });

  it("orders otherwise identical records by source and path", () => {
    const local = makeRecord({ filePath: "/b.jsonl" });
    const remote = makeRecord({ filePath: "/a.jsonl", source: { kind: "codex", locality: "remote", host: "box" } });
    expect(preferRecord(local, remote)).toBe(local);
    expect(preferRecord(remote, local)).toBe(local);
  });
});

describe("selectRecord", () => {
  it("collapses each file to its newest stat before comparing files", () => {
    const stale: SessionRecord = makeRecord({ filePath: "/a.jsonl", fileMtimeMs: 100, parseQuality: "enriched" });
    const fresh = makeRecord({ filePath: "/a.jsonl", fileMtimeMs: 300, parseQuality: "metadata" });
    const other = makeRecord({ filePath: "/b.jsonl", fileMtimeMs: 200, parseQuality: "full" });

    expect(selectRecord([stale, fresh, other])).toBe(other);
    expect(selectRecord([other, fresh, stale])).toBe(other);
    expect(selectRecord([stale, fresh])).toBe(fresh);
    expect(selectRecord([])).toBeUndefined();
  });
});

describe("applyOverlays", () => {
  it("takes overlay store values first and previous record values second", () => {
    const previous = new Map([["s2", makeRecord({ id: "s2", title: "kept title" })]]);
    const records = [makeRecord({ id: "s1" }), makeRecord({ id: "s2" }), makeRecord({ id: "s3" })];
    const overlays = new Map([["s1", { comment: "needs review" }]]);

    const result = applyOverlays(records, (id) => overlays.get(id), previous);

    expect(result[0]?.comment).toBe("needs review");
    expect(result[0]?.title).toBeUndefined();
    expect(result[1]?.title).toBe("kept title");
    expect(result[2]).toBe(records[2]);
  });

  it("survives a sequence of provider refreshes", () => {
    let store = applyOverlays(mergeRecords([], [makeRecord({ parseQuality: "metadata" })]), () => ({ title: "mine" }));
    store = applyOverlays(mergeRecords(store, [makeRecord({ parseQuality: "full", toolInvocationCount: 2 })]), () => undefined, new Map(store.map((r) => [r.id, r])));
    store = applyOverlays(mergeRecords(store, [makeRecord({ fileMtimeMs: at(2024, 3, 6), lastUpdatedAtMs: at(2024, 3, 6) })]), () => undefined, new Map(store.map((r) => [r.id, r])));

    expect(store[0]?.title).toBe("mine");
    expect(store[0]?.lastUpdatedAtMs).toBe(at(2024, 3, 6));
  });
});
