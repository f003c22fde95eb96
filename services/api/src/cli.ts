#!/usr/bin/env node
import fs from "node:fs/promises";
import { parseArgs } from "node:util";
import { loadConfig } from "./lib/config";
import { errorMessage } from "./lib/errors";
import { LayoutJsonIngestor, type DocumentIngestor } from "./lib/ingest";
import { setLogLevel } from "./lib/log";
import { parseDpi, runComparison } from "./lib/pipeline";
import { renderReportHtml } from "./lib/render";
import { summarize, toDiffResponse } from "./lib/serialize";
import { fileExists } from "./lib/storage";

const USAGE = `Usage: ocr-page-diff <layout_a.json> <layout_b.json> [options]

Compare two OCR layout files and print a spatial diff as JSON.

Options:
  -o, --output <file>        write the JSON result to a file instead of stdout
      --html <file>          also write an HTML report
      --dpi <n>              resolution the boxes are reported at (72-600, default 300)
      --no-clean-stray-chars keep single stray letters left by OCR
  -h, --help                 show this help

Examples:
  ocr-page-diff doc_v1.json doc_v2.json
  ocr-page-diff doc_v1.json doc_v2.json --output diff.json
  ocr-page-diff doc_v1.json doc_v2.json --dpi 200`;

export type CliIo = {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
};

const processIo: CliIo = {
  stdout: (text) => process.stdout.write(`${text}\n`),
  stderr: (text) => process.stderr.write(`${text}\n`)
};

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      output: { type: "string", short: "o" },
      html: { type: "string" },
      dpi: { type: "string" },
      "no-clean-stray-chars": { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false }
    }
  });
}

export async function runCli(argv: string[], io: CliIo = processIo, ingestor: DocumentIngestor = new LayoutJsonIngestor()): Promise<number> {
  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (e) {
    io.stderr(`Error: ${errorMessage(e)}\n\n${USAGE}`);
    return 1;
  }

  const { values, positionals } = parsed;
  if (values.help) {
    io.stdout(USAGE);
    return 0;
  }
  const [pathA, pathB] = positionals;
  if (!pathA || !pathB || positionals.length > 2) {
    io.stderr(USAGE);
    return 1;
  }

  try {
    const config = loadConfig();
    setLogLevel(config.logLevel);
    const dpi = parseDpi(values.dpi, config.defaultDpi);

    for (const [label, p] of [["First", pathA], ["Second", pathB]] as const) {
      if (!(await fileExists(p))) {
        io.stderr(`Error: ${label} layout file not found: ${p}`);
        return 1;
      }
    }

    io.stderr(`Comparing ${pathA} and ${pathB}...`);
    const [bufferA, bufferB] = await Promise.all([fs.readFile(pathA), fs.readFile(pathB)]);
    const report = await runComparison(
      ingestor,
      { fileName: pathA, buffer: bufferA },
      { fileName: pathB, buffer: bufferB },
      { dpi, cleanStrayChars: !values["no-clean-stray-chars"], grouping: config.grouping }
    );
    const summary = summarize(report);
    io.stderr(`  Pages: ${report.totalPagesA} vs ${report.totalPagesB}`);
    io.stderr(
      `  Found ${summary.total} differences (${summary.insert} insert, ${summary.delete} delete, ${summary.replace} replace)`
    );

    const json = JSON.stringify(toDiffResponse(report), null, 2);
    if (values.output) {
      await fs.writeFile(values.output, json, "utf8");
      io.stderr(`Results written to ${values.output}`);
    } else {
      io.stdout(json);
    }
    if (values.html) {
      await fs.writeFile(values.html, renderReportHtml(report), "utf8");
      io.stderr(`HTML report written to ${values.html}`);
    }
    return 0;
  } catch (e) {
    io.stderr(`Error: ${errorMessage(e)}`);
    return 1;
  }
}

if (require.main === module) {
  runCli(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (e: unknown) => {
      process.stderr.write(`Error: ${errorMessage(e)}\n`);
      process.exitCode = 1;
    }
  );
}
