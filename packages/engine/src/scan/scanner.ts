/**
 * Scan engine.
 *
 * Pipeline per file: read -> parse -> lower -> visit. Directory scans
 * discover files first, then scan them in bounded batches and assemble the
 * report in discovery order once every batch has finished.
 *
 * Failures never escape as exceptions: they go to the caller's reporter and
 * the affected file (or root) contributes nothing to the report.
 */

import { readFile } from "node:fs/promises";
import { statSync } from "node:fs";

import type { Finding, ScanReport } from "../schemas.js";
import { parsePython } from "../syntax/python-parser.js";
import { visitTree } from "../analysis/visitor.js";
import { DEFAULT_KEYWORDS, type KeywordTable } from "../analysis/heuristics.js";
import type { RenderMode } from "../analysis/renderer.js";
import { logger } from "../logger.js";
import { DEFAULT_EXTENSIONS, discoverSourceFiles } from "./discovery.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ScanError =
  | { kind: "ParseFailure"; path: string; cause: string; line?: number }
  | { kind: "ReadFailure"; path: string; cause: string }
  | { kind: "PathNotFound"; path: string }
  | { kind: "NotADirectory"; path: string };

/** Sink for recoverable scan failures. */
export interface ScanReporter {
  error(err: ScanError): void;
}

export interface ScanOptions {
  /** File extensions to scan. Default: [".py"]. */
  extensions?: Iterable<string>;
  /** Ignore patterns for directory discovery. */
  ignore?: string[];
  /** Files read and scanned per batch. Default: 8. */
  concurrency?: number;
  /** How code and arguments are rendered in findings. Default: "source". */
  render?: RenderMode;
  keywords?: KeywordTable;
  /** Receives parse/read/path failures. Defaults to the engine logger. */
  reporter?: ScanReporter;
}

export const DEFAULT_CONCURRENCY = 8;

// ---------------------------------------------------------------------------
// Reporting
// ---------------------------------------------------------------------------

export function describeScanError(err: ScanError): string {
  switch (err.kind) {
    case "ParseFailure":
      return `Error scanning ${err.path}: ${err.cause}`;
    case "ReadFailure":
      return `Error reading ${err.path}: ${err.cause}`;
    case "PathNotFound":
      return `Directory '${err.path}' does not exist`;
    case "NotADirectory":
      return `'${err.path}' is not a directory`;
  }
}

export const loggingReporter: ScanReporter = {
  error(err) {
    if (err.kind === "ParseFailure" || err.kind === "ReadFailure") {
      logger.warn(describeScanError(err));
    } else {
      logger.error(describeScanError(err));
    }
  },
};

/** Reporter that keeps every error, for callers that act on them later. */
export function createCollectingReporter(): ScanReporter & { errors: ScanError[] } {
  const errors: ScanError[] = [];
  return {
    errors,
    error(err) {
      errors.push(err);
    },
  };
}

// ---------------------------------------------------------------------------
// Single file
// ---------------------------------------------------------------------------

/**
 * Scan already-loaded source. A parse failure is reported and yields no
 * findings.
 */
export function scanSource(source: string, filePath: string, options: ScanOptions = {}): Finding[] {
  const reporter = options.reporter ?? loggingReporter;
  const parsed = parsePython(source);

  if (!parsed.ok) {
    reporter.error({ kind: "ParseFailure", path: filePath, cause: parsed.cause, line: parsed.line });
    return [];
  }

  return visitTree(parsed.tree, {
    keywords: options.keywords ?? DEFAULT_KEYWORDS,
    render: options.render,
  });
}

/**
 * Read and scan one file. Unreadable files and bytes that are not valid
 * UTF-8 are reported as read failures.
 */
export async function scanFile(filePath: string, options: ScanOptions = {}): Promise<Finding[]> {
  const reporter = options.reporter ?? loggingReporter;

  let source: string;
  try {
    source = new TextDecoder("utf-8", { fatal: true }).decode(await readFile(filePath));
  } catch (err: unknown) {
    const cause = err instanceof Error ? err.message : String(err);
    reporter.error({ kind: "ReadFailure", path: filePath, cause });
    return [];
  }

  return scanSource(source, filePath, options);
}

// ---------------------------------------------------------------------------
// Directory
// ---------------------------------------------------------------------------

type RootKind = "directory" | "file" | "missing";

function rootKind(path: string): RootKind {
  let stat;
  try {
    stat = statSync(path, { throwIfNoEntry: false });
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    logger.debug(`[scan] Cannot stat ${path}: ${message}`);
    return "missing";
  }
  if (!stat) return "missing";
  return stat.isDirectory() ? "directory" : "file";
}

/**
 * Recursively scan every file below `root` with a matching extension.
 * Only files with at least one finding appear in the report.
 */
export async function scanDirectory(root: string, options: ScanOptions = {}): Promise<ScanReport> {
  const reporter = options.reporter ?? loggingReporter;
  const report: ScanReport = new Map();

  const kind = rootKind(root);
  if (kind === "missing") {
    reporter.error({ kind: "PathNotFound", path: root });
    return report;
  }
  if (kind === "file") {
    reporter.error({ kind: "NotADirectory", path: root });
    return report;
  }

  const files = discoverSourceFiles(root, {
    extensions: options.extensions ?? DEFAULT_EXTENSIONS,
    ignore: options.ignore,
  });
  logger.debug(`[scan] ${files.length} candidate files under ${root}`);

  const concurrency = Math.max(1, Math.floor(options.concurrency ?? DEFAULT_CONCURRENCY));
  const results: Finding[][] = new Array(files.length);

  for (let i = 0; i < files.length; i += concurrency) {
    const batch = files.slice(i, i + concurrency);
    const batchResults = await Promise.all(batch.map((file) => scanFile(file, options)));
    batchResults.forEach((findings, j) => {
      results[i + j] = findings;
    });
  }

  files.forEach((file, i) => {
    const findings = results[i];
    if (findings && findings.length > 0) report.set(file, findings);
  });

  logger.debug(`[scan] ${report.size} of ${files.length} files with findings`);
  return report;
}

/**
 * Scan a file or a directory. A file yields a report with at most one entry.
 */
export async function scanPath(target: string, options: ScanOptions = {}): Promise<ScanReport> {
  const kind = rootKind(target);
  if (kind !== "file") return scanDirectory(target, options);

  const report: ScanReport = new Map();
  const findings = await scanFile(target, options);
  if (findings.length > 0) report.set(target, findings);
  return report;
}
