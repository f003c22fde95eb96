import path from "node:path";
import { z } from "zod";
import { IngestionError } from "./errors";
import type { BoundingBox, Page, TextLine } from "./types";

const boxSchema = z.object({
  x: z.number().int(),
  y: z.number().int(),
  width: z.number().int().nonnegative(),
  height: z.number().int().nonnegative()
});

const lineSchema = z.object({
  text: z.string(),
  box: boxSchema
});

const pageSchema = z.object({
  number: z.number().int().positive(),
  width: z.number().int().nonnegative().default(0),
  height: z.number().int().nonnegative().default(0),
  lines: z.array(lineSchema)
});

export const layoutSchema = z.object({
  dpi: z.number().int().positive().default(300),
  pages: z.array(pageSchema)
});

export type LayoutFile = z.infer<typeof layoutSchema>;

export type IngestOptions = {
  dpi?: number;
  cleanStrayChars?: boolean;
};

/** Turns an uploaded document into ordered pages of text lines. */
export interface DocumentIngestor {
  readonly fileTypes: readonly string[];
  accepts(fileName: string): boolean;
  ingest(buffer: Buffer, fileName: string, options?: IngestOptions): Promise<Page[]>;
}

/**
 * Reads layout files written by an OCR step: one JSON document listing, per
 * page, the recognized lines in reading order with pixel boxes.
 */
export class LayoutJsonIngestor implements DocumentIngestor {
  readonly fileTypes = [".json"] as const;

  accepts(fileName: string): boolean {
    return this.fileTypes.some((ext) => path.extname(fileName).toLowerCase() === ext);
  }

  async ingest(buffer: Buffer, fileName: string, options?: IngestOptions): Promise<Page[]> {
    let raw: unknown;
    try {
      raw = JSON.parse(buffer.toString("utf8"));
    } catch (e) {
      throw new IngestionError(`${fileName}: not valid JSON (${e instanceof Error ? e.message : String(e)})`, fileName);
    }
    const parsed = layoutSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue ? issue.path.join(".") : "";
      throw new IngestionError(`${fileName}: invalid layout${where ? ` at ${where}` : ""}: ${issue?.message ?? "unknown"}`, fileName);
    }
    return pagesFromLayout(parsed.data, options);
  }
}

export function pagesFromLayout(layout: LayoutFile, options?: IngestOptions): Page[] {
  const scale = options?.dpi ? options.dpi / layout.dpi : 1;
  const clean = options?.cleanStrayChars !== false;
  return [...layout.pages]
    .sort((a, b) => a.number - b.number)
    .map((p) => {
      const lines = p.lines.map((l) => ({ text: l.text, box: scaleBox(l.box, scale) }));
      const kept = clean ? cleanStrayCharacters(lines) : lines;
      return {
        number: p.number,
        lines: kept.map((l, index): TextLine => ({ text: l.text, box: l.box, index })),
        imageWidth: Math.round(p.width * scale),
        imageHeight: Math.round(p.height * scale)
      };
    });
}

function scaleBox(box: BoundingBox, scale: number): BoundingBox {
  if (scale === 1) return box;
  return {
    x: Math.round(box.x * scale),
    y: Math.round(box.y * scale),
    width: Math.round(box.width * scale),
    height: Math.round(box.height * scale)
  };
}

/**
 * Drops lines that are a single stray letter and trims a stray letter hanging
 * off the end of a line ("Vanilla e" becomes "Vanilla").
 */
export function cleanStrayCharacters<T extends { text: string }>(lines: readonly T[]): T[] {
  const out: T[] = [];
  for (const line of lines) {
    const text = line.text.trim();
    if (/^[\p{L}]$/u.test(text)) continue;
    if (/^.+ [a-zA-Z]$/.test(text)) {
      out.push({ ...line, text: text.slice(0, -2) });
      continue;
    }
    out.push(line);
  }
  return out;
}
