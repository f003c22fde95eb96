import crypto from "node:crypto";
import fs from "node:fs/promises";
import express, { type NextFunction, type Request, type Response } from "express";
import multer from "multer";
import { APP_NAME, APP_VERSION, type AppConfig } from "./lib/config";
import { NotFoundError, ValidationError, toErrorResponse } from "./lib/errors";
import { sha256 } from "./lib/hash";
import { LayoutJsonIngestor, type DocumentIngestor } from "./lib/ingest";
import { createLogger } from "./lib/log";
import { parseDpi, runComparison } from "./lib/pipeline";
import { renderReportHtml } from "./lib/render";
import { toDiffResponse, type DiffResponseJson } from "./lib/serialize";
import { artifactPaths, ensureArtifacts, fileExists, isCompareId, newCompareId, readJson, writeJson, writeText } from "./lib/storage";

const log = createLogger("http");

export type StoredComparison = {
  compareId: string;
  createdAt: string;
  documents: {
    a: { fileName: string; sha256: string };
    b: { fileName: string; sha256: string };
  };
  options: { dpi: number; cleanStrayChars: boolean };
  result: DiffResponseJson;
};

export type AppDeps = {
  config: AppConfig;
  ingestor?: DocumentIngestor;
};

export function createApp({ config, ingestor = new LayoutJsonIngestor() }: AppDeps): express.Express {
  const app = express();
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: config.maxUploadMb * 1024 * 1024 }
  });

  app.disable("x-powered-by");

  app.use((req, res, next) => {
    const requestId = crypto.randomUUID();
    res.locals.requestId = requestId;
    res.header("X-Request-ID", requestId);
    res.header("X-Content-Type-Options", "nosniff");
    res.header("X-Frame-Options", "DENY");
    res.header("Strict-Transport-Security", "max-age=31536000; includeSubDomains");
    next();
  });

  // CORS
  app.use((req, res, next) => {
    const origin = req.header("Origin");
    if (origin && config.corsOrigins.includes(origin)) {
      res.header("Access-Control-Allow-Origin", origin);
      res.header("Access-Control-Allow-Credentials", "true");
      res.header("Access-Control-Allow-Headers", "*");
      res.header("Access-Control-Allow-Methods", "GET,POST,OPTIONS");
      res.header("Access-Control-Expose-Headers", "X-Request-ID, X-Compare-Id");
      res.header("Vary", "Origin");
    }
    if (req.method === "OPTIONS") {
      res.sendStatus(204);
      return;
    }
    next();
  });

  app.get("/", (req, res) => {
    res.json({ name: APP_NAME, version: APP_VERSION, health: "/healthz" });
  });

  app.get("/healthz", (req, res) => {
    res.json({ status: "healthy", version: APP_VERSION });
  });

  app.post(
    "/v1/diff",
    upload.fields([
      { name: "file_a", maxCount: 1 },
      { name: "file_b", maxCount: 1 }
    ]),
    async (req, res, next) => {
      try {
        const fileA = uploadedFile(req.files, "file_a");
        const fileB = uploadedFile(req.files, "file_b");
        if (!fileA || !fileB) throw new ValidationError("file_a and file_b are both required");

        const dpi = parseDpi(formField(req.body, "dpi"), config.defaultDpi);
        const cleanStrayChars = !/^(0|false|no|off)$/i.test(formField(req.body, "clean_stray_chars") ?? "");

        const report = await runComparison(
          ingestor,
          { fileName: fileA.originalname, buffer: fileA.buffer },
          { fileName: fileB.originalname, buffer: fileB.buffer },
          { dpi, cleanStrayChars, grouping: config.grouping }
        );
        const result = toDiffResponse(report);

        const compareId = newCompareId();
        const artifacts = await ensureArtifacts(config.artifactsDir, compareId);
        const stored: StoredComparison = {
          compareId,
          createdAt: new Date().toISOString(),
          documents: {
            a: { fileName: fileA.originalname, sha256: sha256(fileA.buffer) },
            b: { fileName: fileB.originalname, sha256: sha256(fileB.buffer) }
          },
          options: { dpi, cleanStrayChars },
          result
        };
        await writeJson(artifacts.jsonPath, stored);
        await writeText(artifacts.htmlPath, renderReportHtml(report));

        res.header("X-Compare-Id", compareId);
        res.json(result);
      } catch (e) {
        next(e);
      }
    }
  );

  app.get("/v1/diff/:compareId", async (req, res, next) => {
    try {
      const artifacts = storedArtifacts(config.artifactsDir, req.params.compareId);
      if (!(await fileExists(artifacts.jsonPath))) throw new NotFoundError();
      res.json(await readJson(artifacts.jsonPath));
    } catch (e) {
      next(e);
    }
  });

  app.get("/v1/diff/:compareId/html", async (req, res, next) => {
    try {
      const artifacts = storedArtifacts(config.artifactsDir, req.params.compareId);
      if (!(await fileExists(artifacts.htmlPath))) throw new NotFoundError();
      res.type("html").send(await fs.readFile(artifacts.htmlPath, "utf8"));
    } catch (e) {
      next(e);
    }
  });

  app.use((req, res) => {
    res.status(404).json({ error: "not found", detail: null });
  });

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof multer.MulterError) {
      const status = err.code === "LIMIT_FILE_SIZE" ? 413 : 400;
      res.status(status).json({ error: err.message, detail: null });
      return;
    }
    const { status, body } = toErrorResponse(err, config.debug);
    if (status >= 500) log.error(`Unhandled error for request ${String(res.locals.requestId)}`, err);
    else log.warn(`${req.method} ${req.path} -> ${status}: ${body.error}`);
    res.status(status).json(body);
  });

  return app;
}

function storedArtifacts(baseDir: string, compareId: string) {
  if (!isCompareId(compareId)) throw new NotFoundError();
  return artifactPaths(baseDir, compareId);
}

function uploadedFile(files: Request["files"], field: string): Express.Multer.File | undefined {
  if (!files || Array.isArray(files)) return undefined;
  return files[field]?.[0];
}

function formField(body: unknown, name: string): string | undefined {
  if (typeof body !== "object" || body === null) return undefined;
  const value: unknown = Reflect.get(body, name);
  return typeof value === "string" ? value : undefined;
}
