import type { BoundingBox, DiffRecord, Page } from "../src/lib/types";

export function box(x: number, y: number, width = 100, height = 20): BoundingBox {
  return { x, y, width, height };
}

export function page(number: number, lines: Array<[string, BoundingBox]>): Page {
  return {
    number,
    lines: lines.map(([text, b], index) => ({ text, box: b, index })),
    imageWidth: 2550,
    imageHeight: 3300
  };
}

export function inserted(text: string, b: BoundingBox, pageA: number | null = 1, pageB: number | null = 1): DiffRecord {
  return { kind: "inserted", operation: "insert", pageA, pageB, textA: null, textB: text, boxesA: [], boxesB: [b] };
}

export function deleted(text: string, b: BoundingBox, pageA: number | null = 1, pageB: number | null = 1): DiffRecord {
  return { kind: "deleted", operation: "delete", pageA, pageB, textA: text, textB: null, boxesA: [b], boxesB: [] };
}
