import { statSync, writeFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import {
  DEFAULT_CONFIG,
  DEFAULT_KEYWORDS,
  RENDER_MODES,
  SEVERITY_ORDER,
  SeveritySchema,
  describeScanError,
  extendKeywords,
  filterReport,
  getCategoryInfo,
  isRenderMode,
  loadConfig,
  logger,
  scanPath,
  severityRank,
  type RenderMode,
  type RowscopeConfig,
  type ScanError,
  type ScanReport,
  type ScanReporter,
  type Severity,
} from "@rowscope/engine";
import { formatReport, isOutputFormat, VALID_FORMATS } from "../formatter.js";

export interface ScanCommandOptions {
  path: string;
  /** Comma-separated list; overrides `extensions` from the config file. */
  extensions?: string;
  format: string;
  output?: string;
  summaryOnly: boolean;
  details: boolean;
  render?: string;
  concurrency?: string;
  failOn?: string;
  noColor: boolean;
  timestamp?: string;
}

function usageError(message: string): number {
  process.stderr.write(`[rowscope] Error: ${message}\n`);
  return 1;
}

function configDir(target: string): string {
  try {
    return statSync(target).isFile() ? dirname(target) : target;
  } catch {
    // Missing roots are reported by the scan itself
    return target;
  }
}

function parseConcurrency(raw: string): number | null {
  if (!/^\d+$/.test(raw)) return null;
  const n = parseInt(raw, 10);
  return n > 0 ? n : null;
}

/** True when any finding is at or above the given severity. */
export function meetsFailThreshold(report: ScanReport, threshold: Severity): boolean {
  const limit = severityRank(threshold);
  for (const findings of report.values()) {
    if (findings.some((f) => severityRank(getCategoryInfo(f.category).severity) <= limit)) {
      return true;
    }
  }
  return false;
}

/**
 * Run `rowscope scan`. Resolves to the process exit code.
 */
export async function runScan(options: ScanCommandOptions): Promise<number> {
  // ─── Validate flags ──────────────────────────────────────────────
  if (!isOutputFormat(options.format)) {
    return usageError(`invalid format '${options.format}'. Must be one of: ${VALID_FORMATS.join(", ")}`);
  }
  const format = options.format;

  let render: RenderMode | undefined;
  if (options.render !== undefined) {
    if (!isRenderMode(options.render)) {
      return usageError(`invalid render mode '${options.render}'. Must be one of: ${RENDER_MODES.join(", ")}`);
    }
    render = options.render;
  }

  let concurrency: number | undefined;
  if (options.concurrency !== undefined) {
    const parsed = parseConcurrency(options.concurrency);
    if (parsed === null) {
      return usageError(`invalid concurrency '${options.concurrency}'. Must be a positive integer`);
    }
    concurrency = parsed;
  }

  let failOn: Severity | undefined;
  if (options.failOn !== undefined) {
    const parsed = SeveritySchema.safeParse(options.failOn);
    if (!parsed.success) {
      return usageError(`invalid severity '${options.failOn}'. Must be one of: ${SEVERITY_ORDER.join(", ")}`);
    }
    failOn = parsed.data;
  }

  // ─── Merge config ────────────────────────────────────────────────
  const config: RowscopeConfig = loadConfig(configDir(resolve(options.path))) ?? DEFAULT_CONFIG;

  const extensions = options.extensions
    ? options.extensions.split(",").map((s) => s.trim()).filter((s) => s.length > 0)
    : config.extensions;

  const rootErrors: ScanError[] = [];
  const reporter: ScanReporter = {
    error(err) {
      if (err.kind === "PathNotFound" || err.kind === "NotADirectory") {
        rootErrors.push(err);
        logger.error(describeScanError(err));
      } else {
        logger.warn(describeScanError(err));
      }
    },
  };

  logger.info(`Scanning ${options.path} for extensions: ${extensions.join(", ")}`);

  const report = await scanPath(options.path, {
    extensions,
    ignore: config.ignore,
    concurrency: concurrency ?? config.concurrency,
    render: render ?? config.render,
    keywords: extendKeywords(DEFAULT_KEYWORDS, config.keywords),
    reporter,
  });

  if (rootErrors.length > 0) return 1;

  const filtered = filterReport(report, config);

  // ─── Output ──────────────────────────────────────────────────────
  const output = formatReport(filtered, {
    format,
    summaryOnly: options.summaryOnly,
    details: options.details,
    noColor: options.noColor,
    timestamp: options.timestamp,
  });

  if (options.output) {
    try {
      writeFileSync(resolve(options.output), output);
      logger.info(`Report written to ${options.output}`);
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      return usageError(`could not write to ${options.output}: ${message}`);
    }
  } else {
    process.stdout.write(output);
    if (format !== "table") process.stdout.write("\n");
  }

  if (failOn && meetsFailThreshold(filtered, failOn)) return 1;
  return 0;
}
