import type { BoundingBox, ComparisonReport, DiffRecord, DiffSegment, RecordOperation } from "./types";

export type BoundingBoxJson = { x: number; y: number; width: number; height: number };

export type CharDiffJson = {
  operation: DiffSegment["operation"];
  text_a: string | null;
  text_b: string | null;
  start_a: number;
  end_a: number;
  start_b: number;
  end_b: number;
};

export type DiffItemJson = {
  operation: RecordOperation;
  page_a: number | null;
  page_b: number | null;
  text_a: string | null;
  text_b: string | null;
  bounding_boxes_a: BoundingBoxJson[];
  bounding_boxes_b: BoundingBoxJson[];
  unified_diff?: string;
  char_diffs?: CharDiffJson[];
};

export type DiffResponseJson = {
  pdf_a_path: string;
  pdf_b_path: string;
  total_pages_a: number;
  total_pages_b: number;
  total_differences: number;
  diff_items: DiffItemJson[];
};

export type ReportSummary = Record<RecordOperation, number> & { total: number };

export function toDiffResponse(report: ComparisonReport): DiffResponseJson {
  return {
    pdf_a_path: report.documentA,
    pdf_b_path: report.documentB,
    total_pages_a: report.totalPagesA,
    total_pages_b: report.totalPagesB,
    total_differences: report.records.length,
    diff_items: report.records.map(toDiffItem)
  };
}

export function toDiffItem(record: DiffRecord): DiffItemJson {
  const item: DiffItemJson = {
    operation: record.operation,
    page_a: record.pageA,
    page_b: record.pageB,
    text_a: record.textA,
    text_b: record.textB,
    bounding_boxes_a: record.boxesA.map(boxJson),
    bounding_boxes_b: record.boxesB.map(boxJson)
  };
  if (record.kind !== "modified") return item;
  if (record.unifiedDiff) item.unified_diff = record.unifiedDiff;
  if (record.segments.length > 0) item.char_diffs = record.segments.map(segmentJson);
  return item;
}

function boxJson(b: BoundingBox): BoundingBoxJson {
  return { x: b.x, y: b.y, width: b.width, height: b.height };
}

function segmentJson(s: DiffSegment): CharDiffJson {
  return {
    operation: s.operation,
    text_a: s.textA,
    text_b: s.textB,
    start_a: s.startA,
    end_a: s.endA,
    start_b: s.startB,
    end_b: s.endB
  };
}

export function summarize(report: ComparisonReport): ReportSummary {
  const summary: ReportSummary = { total: report.records.length, insert: 0, delete: 0, replace: 0 };
  for (const r of report.records) summary[r.operation] += 1;
  return summary;
}
