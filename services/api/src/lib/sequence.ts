import type { DiffOperation } from "./types";

export type MatchingBlock = {
  a: number;
  b: number;
  size: number;
};

export type Opcode = {
  tag: DiffOperation;
  i1: number;
  i2: number;
  j1: number;
  j2: number;
};

/**
 * Longest common contiguous run of `a[alo..ahi)` and `b[blo..bhi)`.
 * Ties go to the lowest index in `a`, then the lowest index in `b`.
 */
export function longestMatch<T>(
  a: readonly T[],
  b: readonly T[],
  alo: number,
  ahi: number,
  blo: number,
  bhi: number,
  b2j: Map<T, number[]>
): MatchingBlock {
  let best: MatchingBlock = { a: alo, b: blo, size: 0 };
  // runLen.get(j) = length of the match ending at a[i - 1], b[j]
  let runLen = new Map<number, number>();
  for (let i = alo; i < ahi; i++) {
    const next = new Map<number, number>();
    for (const j of b2j.get(a[i]) ?? []) {
      if (j < blo) continue;
      if (j >= bhi) break;
      const k = (runLen.get(j - 1) ?? 0) + 1;
      next.set(j, k);
      if (k > best.size) best = { a: i - k + 1, b: j - k + 1, size: k };
    }
    runLen = next;
  }
  return best;
}

function indexPositions<T>(b: readonly T[]): Map<T, number[]> {
  const b2j = new Map<T, number[]>();
  b.forEach((x, j) => {
    const list = b2j.get(x);
    if (list) list.push(j);
    else b2j.set(x, [j]);
  });
  return b2j;
}

/**
 * Matched runs in ascending order, adjacent runs collapsed, terminated by a
 * zero-size sentinel at `(a.length, b.length)`.
 */
export function matchingBlocks<T>(a: readonly T[], b: readonly T[]): MatchingBlock[] {
  const b2j = indexPositions(b);
  const found: MatchingBlock[] = [];
  const queue: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];
  while (queue.length > 0) {
    const next = queue.pop();
    if (!next) break;
    const [alo, ahi, blo, bhi] = next;
    const m = longestMatch(a, b, alo, ahi, blo, bhi, b2j);
    if (m.size === 0) continue;
    found.push(m);
    if (alo < m.a && blo < m.b) queue.push([alo, m.a, blo, m.b]);
    if (m.a + m.size < ahi && m.b + m.size < bhi) queue.push([m.a + m.size, ahi, m.b + m.size, bhi]);
  }
  found.sort((x, y) => x.a - y.a || x.b - y.b);

  const out: MatchingBlock[] = [];
  for (const m of found) {
    const last = out[out.length - 1];
    if (last && last.a + last.size === m.a && last.b + last.size === m.b) {
      out[out.length - 1] = { a: last.a, b: last.b, size: last.size + m.size };
    } else {
      out.push(m);
    }
  }
  out.push({ a: a.length, b: b.length, size: 0 });
  return out;
}

/**
 * Edit script turning `a` into `b`. Ranges are half-open and cover both
 * sequences contiguously; no element is ever treated as junk.
 */
export function opcodes<T>(a: readonly T[], b: readonly T[]): Opcode[] {
  const out: Opcode[] = [];
  let i = 0;
  let j = 0;
  for (const m of matchingBlocks(a, b)) {
    const tag: DiffOperation | null =
      i < m.a && j < m.b ? "replace" : i < m.a ? "delete" : j < m.b ? "insert" : null;
    if (tag) out.push({ tag, i1: i, i2: m.a, j1: j, j2: m.b });
    i = m.a + m.size;
    j = m.b + m.size;
    if (m.size > 0) out.push({ tag: "equal", i1: m.a, i2: i, j1: m.b, j2: j });
  }
  return out;
}
