import { groupRecords, DEFAULT_GROUPING } from "./group";
import { diffWords, inferOperation } from "./inlineDiff";
import { opcodes } from "./sequence";
import { renderUnifiedDiff } from "./unifiedDiff";
import type { CompareOptions, DeletedRecord, DiffRecord, InsertedRecord, ModifiedRecord, Page, TextLine } from "./types";

export function comparePages(pageA: Page | null, pageB: Page | null, options?: CompareOptions): DiffRecord[] {
  if (!pageA && !pageB) return [];
  // A page present on one side only is reported line by line, ungrouped.
  if (!pageA && pageB) return pageB.lines.map((line) => insertedLine(null, pageB.number, line));
  if (pageA && !pageB) return pageA.lines.map((line) => deletedLine(pageA.number, null, line));
  if (!pageA || !pageB) return [];

  const linesA = pageA.lines;
  const linesB = pageB.lines;
  const records: DiffRecord[] = [];

  for (const { tag, i1, i2, j1, j2 } of opcodes(
    linesA.map((l) => l.text),
    linesB.map((l) => l.text)
  )) {
    if (tag === "equal") continue;

    const paired = tag === "replace" ? Math.min(i2 - i1, j2 - j1) : 0;
    for (let k = 0; k < paired; k++) {
      records.push(pairedLines(pageA, pageB, i1 + k, j1 + k));
    }
    for (let i = i1 + paired; i < i2; i++) {
      records.push(deletedLine(pageA.number, pageB.number, linesA[i]));
    }
    for (let j = j1 + paired; j < j2; j++) {
      records.push(insertedLine(pageA.number, pageB.number, linesB[j]));
    }
  }

  return groupRecords(records, options?.grouping ?? DEFAULT_GROUPING);
}

function insertedLine(pageA: number | null, pageB: number | null, line: TextLine): InsertedRecord {
  return {
    kind: "inserted",
    operation: "insert",
    pageA,
    pageB,
    textA: null,
    textB: line.text,
    boxesA: [],
    boxesB: [line.box]
  };
}

function deletedLine(pageA: number | null, pageB: number | null, line: TextLine): DeletedRecord {
  return {
    kind: "deleted",
    operation: "delete",
    pageA,
    pageB,
    textA: line.text,
    textB: null,
    boxesA: [line.box],
    boxesB: []
  };
}

function pairedLines(pageA: Page, pageB: Page, i: number, j: number): ModifiedRecord {
  const a = pageA.lines[i];
  const b = pageB.lines[j];
  const segments = diffWords(a.text, b.text);
  return {
    kind: "modified",
    operation: inferOperation(segments),
    pageA: pageA.number,
    pageB: pageB.number,
    textA: a.text,
    textB: b.text,
    boxesA: [a.box],
    boxesB: [b.box],
    unifiedDiff: renderUnifiedDiff(a.text, b.text, `page_${pageA.number}_line_${i}`, `page_${pageB.number}_line_${j}`),
    segments
  };
}
