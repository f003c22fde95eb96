import crypto from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";

export type CompareArtifacts = {
  compareId: string;
  dir: string;
  jsonPath: string;
  htmlPath: string;
};

const COMPARE_ID_RE = /^cmp_[0-9a-f]{32}$/;

export function newCompareId(): string {
  return `cmp_${crypto.randomUUID().replace(/-/g, "")}`;
}

export function isCompareId(value: string): boolean {
  return COMPARE_ID_RE.test(value);
}

export function artifactPaths(baseDir: string, compareId: string): CompareArtifacts {
  if (!isCompareId(compareId)) throw new Error(`invalid compareId: ${compareId}`);
  const dir = path.join(baseDir, compareId);
  return {
    compareId,
    dir,
    jsonPath: path.join(dir, "compare.json"),
    htmlPath: path.join(dir, "compare.html")
  };
}

export async function ensureArtifacts(baseDir: string, compareId: string): Promise<CompareArtifacts> {
  const artifacts = artifactPaths(baseDir, compareId);
  await fs.mkdir(artifacts.dir, { recursive: true });
  return artifacts;
}

export async function writeText(filePath: string, data: string): Promise<void> {
  const dir = path.dirname(filePath);
  const base = path.basename(filePath);
  const tmpPath = path.join(dir, `.${base}.${process.pid}.${Date.now()}.${Math.random().toString(16).slice(2)}.tmp`);
  await fs.writeFile(tmpPath, data, "utf8");
  await fs.rename(tmpPath, filePath);
}

export async function writeJson(filePath: string, data: unknown): Promise<void> {
  await writeText(filePath, JSON.stringify(data, null, 2));
}

export async function readJson(filePath: string): Promise<unknown> {
  const raw = await fs.readFile(filePath, "utf8");
  return JSON.parse(raw);
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}
