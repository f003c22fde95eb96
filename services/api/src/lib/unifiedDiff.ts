import { structuredPatch } from "diff";

const CONTEXT_LINES = 3;

/**
 * Line-oriented unified diff of a before/after pair, for display only.
 * Returns "" when both sides are the same.
 */
export function renderUnifiedDiff(textA: string, textB: string, labelA = "a", labelB = "b"): string {
  const patch = structuredPatch(labelA, labelB, withFinalNewline(textA), withFinalNewline(textB), undefined, undefined, {
    context: CONTEXT_LINES
  });
  if (patch.hunks.length === 0) return "";

  const out = [`--- ${labelA}`, `+++ ${labelB}`];
  for (const h of patch.hunks) {
    out.push(`@@ -${formatRange(h.oldStart, h.oldLines)} +${formatRange(h.newStart, h.newLines)} @@`);
    out.push(...h.lines);
  }
  return out.join("\n");
}

function withFinalNewline(text: string): string {
  if (!text || text.endsWith("\n")) return text;
  return `${text}\n`;
}

function formatRange(start: number, length: number): string {
  if (length === 1) return String(start);
  if (length === 0) return `${start - 1},0`;
  return `${start},${length}`;
}
