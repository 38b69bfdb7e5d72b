#!/usr/bin/env node

import { parseArgs } from "./args.js";
import { runScan, type ScanCommandOptions } from "./commands/scan.js";
import { runCategories } from "./commands/categories.js";

const VERSION = "0.1.0";

function printHelp(): void {
  process.stdout.write(`
\x1b[36mrowscope\x1b[0m: finds query expressions an ORM upgrade will break
\x1b[2mv${VERSION}\x1b[0m

\x1b[1mUSAGE\x1b[0m
  rowscope scan [path]              Scan a directory or file (default: .)
  rowscope categories               List finding categories
  rowscope version                  Print version

\x1b[1mSCAN OPTIONS\x1b[0m
  --extensions <list>          Comma-separated file extensions (default: .py)
  --format <fmt>               Output: table, json, markdown (default: table)
  --output <file>              Write report to file
  --summary-only               Print totals and per-file counts only
  --no-details                 Omit code and argument lines
  --render <mode>              Code rendering: source, structural (default: source)
  --concurrency <n>            Files scanned per batch (default: 8)
  --fail-on <severity>         Exit 1 if findings >= severity (critical, high, medium, low, info)
  --no-color                   Disable ANSI colors

\x1b[1mEXAMPLES\x1b[0m
  rowscope scan .                                     Scan current directory
  rowscope scan app/models.py                         Scan a single file
  rowscope scan . --extensions .py,.pyi               Include stub files
  rowscope scan . --format json --output report.json  JSON report to file
  rowscope scan . --fail-on high                      CI gate on high+ findings

\x1b[1mGLOBAL OPTIONS\x1b[0m
  --verbose                    Set log level to debug
  --quiet                      Suppress info/warn output

\x1b[1mENVIRONMENT\x1b[0m
  ROWSCOPE_LOG_LEVEL                Log level: debug, info, warn, error, silent

`);
}

async function main(): Promise<number> {
  const rawArgs = process.argv.slice(2);

  if (rawArgs.length === 0 || rawArgs.includes("--help") || rawArgs.includes("-h")) {
    printHelp();
    return 0;
  }

  if (rawArgs.includes("--version") || rawArgs.includes("-v")) {
    process.stdout.write(`rowscope v${VERSION}\n`);
    return 0;
  }

  const { command, args, positional } = parseArgs(rawArgs);

  switch (command) {
    case "version":
      process.stdout.write(`rowscope v${VERSION}\n`);
      return 0;

    case "categories":
      runCategories({ noColor: args["no-color"] === "true" });
      return 0;

    case "scan": {
      const scanOpts: ScanCommandOptions = {
        path: positional[0] || ".",
        extensions: args["extensions"],
        format: args["format"] || "table",
        output: args["output"],
        summaryOnly: args["summary-only"] === "true",
        details: args["no-details"] !== "true",
        render: args["render"],
        concurrency: args["concurrency"],
        failOn: args["fail-on"],
        noColor: args["no-color"] === "true" || !process.stdout.isTTY,
      };
      return runScan(scanOpts);
    }

    default:
      process.stderr.write(`Unknown command: ${command}\n`);
      printHelp();
      return 1;
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    process.stderr.write(`[rowscope] Fatal: ${err instanceof Error ? err.message : String(err)}\n`);
    process.exit(1);
  },
);
