import { comparePages } from "./align";
import type { CompareOptions, ComparisonReport, DiffRecord, Page } from "./types";

/**
 * Compares two documents page by page. Pages are paired by position only:
 * page i of A against page i of B, a missing page counting as absent.
 */
export function compareDocuments(
  pagesA: readonly Page[],
  pagesB: readonly Page[],
  documentA: string,
  documentB: string,
  options?: CompareOptions
): ComparisonReport {
  const records: DiffRecord[] = [];
  const pageCount = Math.max(pagesA.length, pagesB.length);
  for (let index = 0; index < pageCount; index++) {
    records.push(...comparePages(pagesA[index] ?? null, pagesB[index] ?? null, options));
  }
  return {
    documentA,
    documentB,
    totalPagesA: pagesA.length,
    totalPagesB: pagesB.length,
    records
  };
}
