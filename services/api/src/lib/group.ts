import { diffWords, inferOperation } from "./inlineDiff";
import { renderUnifiedDiff } from "./unifiedDiff";
import type { BoundingBox, DiffRecord, GroupingThresholds } from "./types";

export const DEFAULT_GROUPING: GroupingThresholds = { maxYGap: 100, maxXGap: 200 };

type GroupState = { open: null; done: DiffRecord[] } | { open: DiffRecord[]; done: DiffRecord[] };

/**
 * Coalesces consecutive records of the same page pairing whose boxes sit
 * close together. Single pass, greedy; each record is only tested against the
 * last member of the open group.
 */
export function groupRecords(records: readonly DiffRecord[], thresholds: GroupingThresholds = DEFAULT_GROUPING): DiffRecord[] {
  const initial: GroupState = { open: null, done: [] };
  const final = records.reduce<GroupState>((state, record) => {
    if (state.open === null) return { open: [record], done: state.done };
    const last = state.open[state.open.length - 1];
    if (last && canGroup(last, record, thresholds)) return append(state.open, record, state.done);
    return { open: [record], done: flush(state.open, state.done) };
  }, initial);
  return final.open === null ? final.done : flush(final.open, final.done);
}

function append(open: DiffRecord[], record: DiffRecord, done: DiffRecord[]): GroupState {
  return { open: [...open, record], done };
}

function flush(open: DiffRecord[], done: DiffRecord[]): DiffRecord[] {
  const [only] = open;
  if (open.length === 1 && only) return [...done, only];
  return [...done, mergeRecords(open)];
}

export function canGroup(prev: DiffRecord, curr: DiffRecord, thresholds: GroupingThresholds): boolean {
  if (prev.pageA !== curr.pageA || prev.pageB !== curr.pageB) return false;

  let pair: [BoundingBox | undefined, BoundingBox | undefined];
  if (prev.boxesA.length > 0 && curr.boxesA.length > 0) {
    pair = [prev.boxesA[prev.boxesA.length - 1], curr.boxesA[0]];
  } else if (prev.boxesB.length > 0 && curr.boxesB.length > 0) {
    pair = [prev.boxesB[prev.boxesB.length - 1], curr.boxesB[0]];
  } else {
    return false;
  }

  const [p, c] = pair;
  if (!p || !c) return false;
  return Math.abs(c.y - p.y) <= thresholds.maxYGap && Math.abs(c.x - p.x) <= thresholds.maxXGap;
}

/**
 * Builds one record out of a group. Texts are joined line by line and the
 * operation is derived again from the merged text.
 */
export function mergeRecords(members: readonly DiffRecord[]): DiffRecord {
  const first = members[0];
  if (!first) throw new Error("cannot merge an empty group");

  const textsA: string[] = [];
  const textsB: string[] = [];
  const boxesA: BoundingBox[] = [];
  const boxesB: BoundingBox[] = [];
  for (const m of members) {
    if (m.textA) textsA.push(m.textA);
    if (m.textB) textsB.push(m.textB);
    boxesA.push(...m.boxesA);
    boxesB.push(...m.boxesB);
  }
  const textA = textsA.join("\n");
  const textB = textsB.join("\n");
  const { pageA, pageB } = first;

  if (textA && textB) {
    const segments = diffWords(textA, textB);
    return {
      kind: "modified",
      operation: inferOperation(segments),
      pageA,
      pageB,
      textA,
      textB,
      boxesA,
      boxesB,
      unifiedDiff: renderUnifiedDiff(textA, textB, `page_${pageA ?? "none"}`, `page_${pageB ?? "none"}`),
      segments
    };
  }
  if (textA || (!textB && boxesB.length === 0)) {
    return { kind: "deleted", operation: "delete", pageA, pageB, textA, textB: null, boxesA, boxesB: [] };
  }
  if (textB || boxesA.length === 0) {
    return { kind: "inserted", operation: "insert", pageA, pageB, textA: null, textB, boxesA: [], boxesB };
  }
  // Blank lines on both sides: nothing to diff, keep the boxes.
  return {
    kind: "modified",
    operation: first.operation,
    pageA,
    pageB,
    textA,
    textB,
    boxesA,
    boxesB,
    unifiedDiff: "",
    segments: []
  };
}
