import { opcodes } from "./sequence";
import { isBlank, tokenize } from "./text";
import type { DiffSegment, RecordOperation, Token } from "./types";

/**
 * Word-granular diff of two strings. Offsets are resolved from the first and
 * last token of each opcode range, so the segments cover both strings with no
 * gaps or overlaps.
 */
export function diffWords(textA: string, textB: string): DiffSegment[] {
  const tokensA = tokenize(textA);
  const tokensB = tokenize(textB);
  const codes = opcodes(
    tokensA.map((t) => t.text),
    tokensB.map((t) => t.text)
  );

  return codes.map(({ tag, i1, i2, j1, j2 }) => {
    const [startA, endA] = spanOf(tokensA, i1, i2, textA.length);
    const [startB, endB] = spanOf(tokensB, j1, j2, textB.length);
    return {
      operation: tag,
      textA: startA < endA ? textA.slice(startA, endA) : null,
      textB: startB < endB ? textB.slice(startB, endB) : null,
      startA,
      endA,
      startB,
      endB
    };
  });
}

function spanOf(tokens: Token[], lo: number, hi: number, length: number): [number, number] {
  const first = tokens[lo];
  const start = first ? first.start : length;
  const last = hi > lo ? tokens[hi - 1] : undefined;
  return [start, last ? last.end : start];
}

export type InferredTag = "insert" | "delete" | "replace";

export function toRecordOperation(tag: InferredTag): RecordOperation {
  switch (tag) {
    case "insert":
      return "insert";
    case "delete":
      return "delete";
    case "replace":
      return "replace";
  }
}

/**
 * Classifies an edit from its word segments. A replace of whitespace by
 * whitespace (a line break turned into a space) does not count. With no
 * countable change at all the result is still "replace".
 */
export function inferOperation(segments: readonly DiffSegment[]): RecordOperation {
  let sawInsert = false;
  let sawDelete = false;
  let sawReplace = false;
  for (const s of segments) {
    if (s.operation === "insert") sawInsert = true;
    else if (s.operation === "delete") sawDelete = true;
    else if (s.operation === "replace" && !(isBlank(s.textA) && isBlank(s.textB))) sawReplace = true;
  }

  let tag: InferredTag = "replace";
  if (sawReplace || (sawInsert && sawDelete)) tag = "replace";
  else if (sawInsert) tag = "insert";
  else if (sawDelete) tag = "delete";
  return toRecordOperation(tag);
}
