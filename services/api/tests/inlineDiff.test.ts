import { describe, expect, it } from "vitest";
import { diffWords, inferOperation, toRecordOperation } from "../src/lib/inlineDiff";
import type { DiffOperation, DiffSegment } from "../src/lib/types";

function seg(operation: DiffOperation, textA: string | null, textB: string | null): DiffSegment {
  return { operation, textA, textB, startA: 0, endA: textA?.length ?? 0, startB: 0, endB: textB?.length ?? 0 };
}

function rebuild(segments: readonly DiffSegment[], side: "a" | "b"): string {
  return segments.map((s) => (side === "a" ? s.textA : s.textB) ?? "").join("");
}

describe("diffWords", () => {
  it("reports a replaced word after the shared prefix", () => {
    expect(diffWords("Hello this is Michael", "Hello this is Tabatha")).toEqual([
      { operation: "equal", textA: "Hello this is ", textB: "Hello this is ", startA: 0, endA: 14, startB: 0, endB: 14 },
      { operation: "replace", textA: "Michael", textB: "Tabatha", startA: 14, endA: 21, startB: 14, endB: 21 }
    ]);
  });

  it("gives an inserted word an empty span on the old side", () => {
    const segments = diffWords("Hello this is Michael", "Hello this is not Michael");
    expect(segments).toEqual([
      { operation: "equal", textA: "Hello this is ", textB: "Hello this is ", startA: 0, endA: 14, startB: 0, endB: 14 },
      { operation: "insert", textA: null, textB: "not ", startA: 14, endA: 14, startB: 14, endB: 18 },
      { operation: "equal", textA: "Michael", textB: "Michael", startA: 14, endA: 21, startB: 18, endB: 25 }
    ]);
  });

  it("places an insertion into empty text at offset zero", () => {
    expect(diffWords("", "abc")).toEqual([
      { operation: "insert", textA: null, textB: "abc", startA: 0, endA: 0, startB: 0, endB: 3 }
    ]);
  });

  it("returns no segments for two empty strings", () => {
    expect(diffWords("", "")).toEqual([]);
  });

  it("covers both texts contiguously", () => {
    const a = "Vanilla ice cream, two scoops";
    const b = "Chocolate ice cream,  three scoops please";
    const segments = diffWords(a, b);

    expect(rebuild(segments, "a")).toBe(a);
    expect(rebuild(segments, "b")).toBe(b);
    let posA = 0;
    let posB = 0;
    for (const s of segments) {
      expect(s.startA).toBe(posA);
      expect(s.startB).toBe(posB);
      posA = s.endA;
      posB = s.endB;
    }
    expect(posA).toBe(a.length);
    expect(posB).toBe(b.length);
  });

  it("treats a line break and a space as different tokens", () => {
    const segments = diffWords("Line one\nLine two", "Line one Line two");
    expect(segments.map((s) => [s.operation, s.textA, s.textB])).toEqual([
      ["equal", "Line one", "Line one"],
      ["replace", "\n", " "],
      ["equal", "Line two", "Line two"]
    ]);
  });
});

describe("inferOperation", () => {
  it("classifies a pure insertion", () => {
    expect(inferOperation(diffWords("Hello this is Michael", "Hello this is not Michael"))).toBe("insert");
    expect(inferOperation(diffWords("Tips", "Tips / Other Items"))).toBe("insert");
  });

  it("classifies a pure deletion", () => {
    expect(inferOperation(diffWords("Tips / Other Items", "Tips"))).toBe("delete");
  });

  it("classifies a changed word as a replacement", () => {
    expect(inferOperation(diffWords("Vanilla", "Chocolate"))).toBe("replace");
  });

  it("classifies an insertion together with a deletion as a replacement", () => {
    const segments = diffWords("a b c", "b c d");
    expect(segments.map((s) => s.operation)).toEqual(["delete", "equal", "insert"]);
    expect(inferOperation(segments)).toBe("replace");
  });

  it("ignores whitespace swapped for whitespace", () => {
    const segments = diffWords("Line one\nLine two", "Line one Line two extra");
    expect(segments.map((s) => s.operation)).toEqual(["equal", "replace", "equal", "insert"]);
    expect(inferOperation(segments)).toBe("insert");
  });

  it("falls back to replace when nothing countable changed", () => {
    expect(inferOperation(diffWords("Line one\nLine two", "Line one Line two"))).toBe("replace");
    expect(inferOperation(diffWords("same", "same"))).toBe("replace");
    expect(inferOperation([])).toBe("replace");
  });

  it("counts a replace that is only partly whitespace", () => {
    expect(inferOperation([seg("equal", "x", "x"), seg("replace", " ", "y")])).toBe("replace");
    expect(inferOperation([seg("replace", " ", "\t"), seg("delete", "z", null)])).toBe("delete");
  });
});

describe("toRecordOperation", () => {
  it("maps each tag to itself", () => {
    expect(toRecordOperation("insert")).toBe("insert");
    expect(toRecordOperation("delete")).toBe("delete");
    expect(toRecordOperation("replace")).toBe("replace");
  });
});
