import { describe, expect, it } from "vitest";
import { DEFAULT_GROUPING, canGroup, groupRecords, mergeRecords } from "../src/lib/group";
import { box, deleted, inserted } from "./helpers";

describe("canGroup", () => {
  it("accepts gaps up to the thresholds inclusive", () => {
    expect(canGroup(deleted("a", box(0, 0)), deleted("b", box(200, 100)), DEFAULT_GROUPING)).toBe(true);
    expect(canGroup(deleted("a", box(0, 0)), deleted("b", box(0, 101)), DEFAULT_GROUPING)).toBe(false);
    expect(canGroup(deleted("a", box(0, 0)), deleted("b", box(201, 0)), DEFAULT_GROUPING)).toBe(false);
  });

  it("measures the gap in either direction", () => {
    expect(canGroup(deleted("a", box(300, 300)), deleted("b", box(150, 250)), DEFAULT_GROUPING)).toBe(true);
  });

  it("rejects records from different page pairings", () => {
    expect(canGroup(deleted("a", box(0, 0), 1, 1), deleted("b", box(0, 10), 2, 2), DEFAULT_GROUPING)).toBe(false);
    expect(canGroup(inserted("a", box(0, 0), null, 1), inserted("b", box(0, 10), 1, 1), DEFAULT_GROUPING)).toBe(false);
  });

  it("falls back to B boxes when either record lacks an A box", () => {
    expect(canGroup(inserted("a", box(0, 0)), inserted("b", box(0, 50)), DEFAULT_GROUPING)).toBe(true);
    expect(canGroup(inserted("a", box(0, 0)), inserted("b", box(0, 500)), DEFAULT_GROUPING)).toBe(false);
  });

  it("cannot compare a deletion with an insertion", () => {
    expect(canGroup(deleted("a", box(0, 0)), inserted("b", box(0, 0)), DEFAULT_GROUPING)).toBe(false);
  });
});

describe("groupRecords", () => {
  it("returns an empty list unchanged", () => {
    expect(groupRecords([])).toEqual([]);
  });

  it("passes a lone record through as the same object", () => {
    const r = deleted("alone", box(0, 0));
    const [out] = groupRecords([r]);
    expect(out).toBe(r);
  });

  it("compares each record with the last member of the open group", () => {
    const records = [deleted("a", box(0, 0)), deleted("b", box(0, 90)), deleted("c", box(0, 180))];
    const grouped = groupRecords(records);
    expect(grouped).toHaveLength(1);
    expect(grouped[0]?.textA).toBe("a\nb\nc");
  });

  it("starts a new group after a gap", () => {
    const grouped = groupRecords([deleted("a", box(0, 0)), deleted("b", box(0, 50)), deleted("c", box(0, 400))]);
    expect(grouped.map((r) => r.textA)).toEqual(["a\nb", "c"]);
  });

  it("never merges records that are not adjacent in the input", () => {
    const grouped = groupRecords([
      deleted("top", box(0, 0)),
      inserted("middle", box(0, 10)),
      deleted("again", box(0, 20))
    ]);
    expect(grouped.map((r) => r.kind)).toEqual(["deleted", "inserted", "deleted"]);
  });

  it("uses the thresholds it is given", () => {
    const records = [deleted("a", box(0, 0)), deleted("b", box(0, 50))];
    expect(groupRecords(records, { maxYGap: 40, maxXGap: 200 })).toHaveLength(2);
  });
});

describe("mergeRecords", () => {
  it("joins insertions into one inserted record", () => {
    const merged = mergeRecords([inserted("first", box(0, 0)), inserted("second", box(0, 30))]);
    expect(merged).toEqual({
      kind: "inserted",
      operation: "insert",
      pageA: 1,
      pageB: 1,
      textA: null,
      textB: "first\nsecond",
      boxesA: [],
      boxesB: [box(0, 0), box(0, 30)]
    });
  });

  it("joins deletions into one deleted record", () => {
    const merged = mergeRecords([deleted("first", box(0, 0)), deleted("second", box(0, 30))]);
    expect(merged.kind).toBe("deleted");
    expect(merged.textA).toBe("first\nsecond");
    expect(merged.textB).toBeNull();
  });

  it("diffs the merged text when both sides have some", () => {
    const merged = mergeRecords([deleted("Old text", box(0, 0)), inserted("New text", box(5, 0))]);
    if (merged.kind !== "modified") throw new Error("expected a modified record");
    expect(merged.operation).toBe("replace");
    expect(merged.boxesA).toEqual([box(0, 0)]);
    expect(merged.boxesB).toEqual([box(5, 0)]);
    expect(merged.segments.map((s) => s.operation)).toEqual(["replace", "equal"]);
    expect(merged.unifiedDiff).toBe("--- page_1\n+++ page_1\n@@ -1 +1 @@\n-Old text\n+New text");
  });

  it("labels the diff of a one-sided page pairing", () => {
    const merged = mergeRecords([deleted("Old", box(0, 0), 2, null), inserted("New", box(0, 0), 2, null)]);
    if (merged.kind !== "modified") throw new Error("expected a modified record");
    expect(merged.unifiedDiff.split("\n").slice(0, 2)).toEqual(["--- page_2", "+++ page_none"]);
  });

  it("keeps a group of blank deleted lines as a deletion with its boxes", () => {
    const merged = mergeRecords([deleted("", box(0, 0)), deleted("", box(0, 30))]);
    expect(merged).toEqual({
      kind: "deleted",
      operation: "delete",
      pageA: 1,
      pageB: 1,
      textA: "",
      textB: null,
      boxesA: [box(0, 0), box(0, 30)],
      boxesB: []
    });
  });

  it("keeps a group of blank inserted lines as an insertion", () => {
    const merged = mergeRecords([inserted("", box(0, 0)), inserted("", box(0, 30))]);
    expect(merged.kind).toBe("inserted");
    expect(merged.textB).toBe("");
    expect(merged.boxesB).toEqual([box(0, 0), box(0, 30)]);
  });

  it("keeps both sides' boxes when blank lines changed on each side", () => {
    const merged = mergeRecords([deleted("", box(0, 0)), inserted("", box(5, 0))]);
    expect(merged).toEqual({
      kind: "modified",
      operation: "delete",
      pageA: 1,
      pageB: 1,
      textA: "",
      textB: "",
      boxesA: [box(0, 0)],
      boxesB: [box(5, 0)],
      unifiedDiff: "",
      segments: []
    });
  });

  it("rejects an empty group", () => {
    expect(() => mergeRecords([])).toThrow("cannot merge an empty group");
  });
});
