import { compareDocuments } from "./compare";
import { ValidationError } from "./errors";
import { MAX_DPI, MIN_DPI } from "./config";
import type { DocumentIngestor } from "./ingest";
import { createLogger } from "./log";
import type { ComparisonReport, GroupingThresholds } from "./types";

const log = createLogger("pipeline");

export type InputDocument = {
  fileName: string;
  buffer: Buffer;
};

export type PipelineOptions = {
  dpi: number;
  cleanStrayChars: boolean;
  grouping?: GroupingThresholds;
};

export function parseDpi(raw: unknown, fallback: number): number {
  if (raw === undefined || raw === null || raw === "") return fallback;
  const s = String(raw).trim();
  const n = Number(s);
  if (!/^\d+$/.test(s)) throw new ValidationError(`DPI must be an integer, got "${s}"`);
  return checkDpi(n);
}

export function checkDpi(n: number): number {
  if (!Number.isInteger(n)) throw new ValidationError(`DPI must be an integer, got "${n}"`);
  if (n < MIN_DPI || n > MAX_DPI) throw new ValidationError(`DPI must be between ${MIN_DPI} and ${MAX_DPI}`);
  return n;
}

export function checkFileType(ingestor: DocumentIngestor, fileName: string, field: string): void {
  if (!ingestor.accepts(fileName)) {
    throw new ValidationError(
      `Invalid file type for ${field}: ${fileName}. Only ${ingestor.fileTypes.join(", ")} files are allowed.`
    );
  }
}

/** Ingests both documents and compares them; inputs are validated first. */
export async function runComparison(
  ingestor: DocumentIngestor,
  a: InputDocument,
  b: InputDocument,
  options: PipelineOptions
): Promise<ComparisonReport> {
  checkFileType(ingestor, a.fileName, "file_a");
  checkFileType(ingestor, b.fileName, "file_b");
  checkDpi(options.dpi);

  log.info(`Diffing ${a.fileName} vs ${b.fileName} at ${options.dpi} DPI`);
  const ingestOptions = { dpi: options.dpi, cleanStrayChars: options.cleanStrayChars };
  const [pagesA, pagesB] = await Promise.all([
    ingestor.ingest(a.buffer, a.fileName, ingestOptions),
    ingestor.ingest(b.buffer, b.fileName, ingestOptions)
  ]);
  log.debug(`Ingested ${pagesA.length} + ${pagesB.length} pages`);

  const report = compareDocuments(pagesA, pagesB, a.fileName, b.fileName, { grouping: options.grouping });
  log.info(`Diff completed: ${report.records.length} differences found`);
  return report;
}
