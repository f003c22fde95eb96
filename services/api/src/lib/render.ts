import { escapeHtml } from "./text";
import type { ComparisonReport, DiffRecord, DiffSegment } from "./types";
import { summarize } from "./serialize";

export function renderReportHtml(report: ComparisonReport, title?: string): string {
  const summary = summarize(report);
  const body = report.records.map((record, i) => renderRow(record, i)).join("");

  return `<!doctype html>
<html lang="en">
  <head>
    <meta charset="utf-8" />
    <meta name="viewport" content="width=device-width, initial-scale=1" />
    <title>${escapeHtml(title ?? `${report.documentA} vs ${report.documentB}`)}</title>
    <style>
      body{margin:0;background:#fff;color:#000;}
      .doc-diff{font-family:ui-sans-serif,system-ui,-apple-system,Segoe UI,Roboto,Helvetica,Arial;line-height:1.5;padding:12px;}
      .diff-summary{margin:0 0 12px;color:#444;}
      .diff-grid{display:grid;grid-template-columns:8em 1fr 1fr;border:1px solid #eee;border-radius:8px;overflow:hidden;background:#fff;}
      .diff-row{display:contents;}
      .diff-cell{padding:10px 12px;border-bottom:1px solid #f0f0f0;white-space:pre-wrap;overflow-wrap:anywhere;min-width:0;}
      .diff-cell.meta{color:#666;font-size:.85em;}
      .diff-cell.left{border-right:1px solid #f0f0f0;}
      .diff-cell.empty{background:#fafafa;}
      .diff-row.op-insert .diff-cell.right{background:#f0fff4;border-left:4px solid #22c55e;}
      .diff-row.op-delete .diff-cell.left{background:#fff5f5;border-left:4px solid #ef4444;}
      .diff-row.op-replace .diff-cell.left,.diff-row.op-replace .diff-cell.right{border-left:4px solid #f59e0b;}
      ins{background:#c6f6d5;text-decoration:none;font-weight:700;}
      del{background:#fed7d7;text-decoration:line-through;font-weight:700;}
    </style>
  </head>
  <body>
    <article class="doc-diff">
      <p class="diff-summary">${summary.total} differences: ${summary.insert} inserted, ${summary.delete} deleted, ${summary.replace} replaced. Pages: ${report.totalPagesA} / ${report.totalPagesB}.</p>
      <div class="diff-grid">
        ${body}
      </div>
    </article>
  </body>
</html>`;
}

function renderRow(record: DiffRecord, index: number): string {
  const meta = `<section class="diff-cell meta">#${index + 1} ${record.operation}<br/>p.${record.pageA ?? "-"} / p.${record.pageB ?? "-"}</section>`;
  let left: string;
  let right: string;
  if (record.kind === "modified") {
    left = cell("left", markSegments(record.segments, "a"));
    right = cell("right", markSegments(record.segments, "b"));
  } else if (record.kind === "inserted") {
    left = emptyCell("left");
    right = cell("right", `<ins>${escapeHtml(record.textB)}</ins>`);
  } else {
    left = cell("left", `<del>${escapeHtml(record.textA)}</del>`);
    right = emptyCell("right");
  }
  return `<div class="diff-row op-${record.operation}" data-row="${index}">${meta}${left}${right}</div>`;
}

export function markSegments(segments: readonly DiffSegment[], side: "a" | "b"): string {
  return segments
    .map((s) => {
      const text = side === "a" ? s.textA : s.textB;
      if (text === null) return "";
      const escaped = escapeHtml(text);
      if (s.operation === "equal") return escaped;
      return side === "a" ? `<del>${escaped}</del>` : `<ins>${escaped}</ins>`;
    })
    .join("");
}

function cell(side: "left" | "right", fragment: string): string {
  return `<section class="diff-cell ${side}">${fragment}</section>`;
}

function emptyCell(side: "left" | "right"): string {
  return `<section class="diff-cell ${side} empty"></section>`;
}
