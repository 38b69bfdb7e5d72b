import type { CategoryInfo, ScanReport, Severity } from "@rowscope/engine";
import { generateMarkdownReport, getAllCategories, getCategoryInfo, severityRank, summarizeReport } from "@rowscope/engine";

// ANSI escape codes
const RESET = "\x1b[0m";
const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const RED = "\x1b[31m";
const GREEN = "\x1b[32m";
const YELLOW = "\x1b[33m";
const BLUE = "\x1b[34m";
const CYAN = "\x1b[36m";
const BG_RED = "\x1b[41m";
const WHITE = "\x1b[37m";

type Paint = (color: string, text: string) => string;

const paint: Paint = (color, text) => `${color}${text}${RESET}`;
const plain: Paint = (_color, text) => text;

function severityColor(severity: Severity): string {
  switch (severity) {
    case "critical": return BG_RED + WHITE;
    case "high": return RED;
    case "medium": return YELLOW;
    case "low": return BLUE;
    case "info": return DIM;
  }
}

function severityBadge(c: Paint, severity: Severity): string {
  const label = severity.toUpperCase().padEnd(8);
  return c(severityColor(severity), ` ${label} `);
}

function plural(n: number, word: string): string {
  return `${n} ${word}${n === 1 ? "" : "s"}`;
}

export type OutputFormat = "table" | "json" | "markdown";

export const VALID_FORMATS: readonly OutputFormat[] = ["table", "json", "markdown"];

export function isOutputFormat(value: string): value is OutputFormat {
  return VALID_FORMATS.some((format) => format === value);
}

export interface FormatOptions {
  format: OutputFormat;
  /** Totals and per-file counts only. */
  summaryOnly?: boolean;
  /** Show code and argument lines for each finding. Default: true. */
  details?: boolean;
  noColor?: boolean;
  /** Timestamp printed in markdown reports. */
  timestamp?: string | Date;
}

export function formatReport(report: ScanReport, options: FormatOptions): string {
  const c = options.noColor ? plain : paint;
  const details = options.details ?? true;

  switch (options.format) {
    case "json":
      return formatJson(report, options.summaryOnly ?? false);
    case "markdown":
      return generateMarkdownReport(report, {
        details: details && !options.summaryOnly,
        timestamp: options.timestamp,
      });
    case "table":
      return options.summaryOnly ? formatSummary(report, c) : formatTable(report, details, c);
  }
}

function formatJson(report: ScanReport, summaryOnly: boolean): string {
  const summary = summarizeReport(report);
  const head = {
    files: summary.fileCount,
    findings: summary.findingCount,
    byCategory: summary.byCategory,
  };
  if (summaryOnly) return JSON.stringify({ summary: head }, null, 2);
  return JSON.stringify({ summary: head, files: Object.fromEntries(report) }, null, 2);
}

function formatSummary(report: ScanReport, c: Paint): string {
  const summary = summarizeReport(report);
  if (summary.findingCount === 0) return "No patterns found\n";

  const lines: string[] = [
    `Found ${plural(summary.findingCount, "pattern")} in ${plural(summary.fileCount, "file")}`,
  ];
  for (const file of summary.files) {
    lines.push(`  ${c(BOLD, file.path)}: ${plural(file.count, "pattern")}`);
  }
  lines.push("");
  return lines.join("\n");
}

function formatTable(report: ScanReport, details: boolean, c: Paint): string {
  const summary = summarizeReport(report);
  const lines: string[] = [];

  lines.push("");
  if (summary.findingCount === 0) {
    lines.push(c(GREEN, "  No problematic patterns found."));
    lines.push("");
    return lines.join("\n");
  }

  lines.push(
    `  Found ${plural(summary.findingCount, "potential issue")} in ${plural(summary.fileCount, "file")}:`,
  );
  lines.push("");

  for (const [file, findings] of report) {
    lines.push(`  ${c(BOLD, file)}`);
    for (const f of findings) {
      const info = getCategoryInfo(f.category);
      lines.push(`  ${severityBadge(c, info.severity)} Line ${f.line}: ${f.category} ${c(DIM, `(${f.comparisonMarker})`)}`);
      if (details) {
        lines.push(`              Code: ${f.renderedCode}`);
        lines.push(`              Arg:  ${f.renderedArg}`);
      }
    }
    lines.push("");
  }

  const seen = getAllCategories()
    .filter((info) => summary.byCategory[info.id] > 0)
    .sort((a, b) => severityRank(a.severity) - severityRank(b.severity));

  lines.push(c(BOLD, "  Summary"));
  for (const info of seen) {
    lines.push(`  ${c(CYAN, info.id.padEnd(24))}${info.suggestion}`);
  }
  lines.push("");
  lines.push(`  ${plural(summary.findingCount, "finding")} total`);
  lines.push("");

  return lines.join("\n");
}

export function formatCategoriesTable(categories: CategoryInfo[], noColor = false): string {
  const c = noColor ? plain : paint;
  const lines: string[] = [];

  const idW = 26;
  const sevW = 10;
  const confW = 12;

  lines.push("");
  lines.push(
    `  ${c(BOLD, "CATEGORY".padEnd(idW))}${c(BOLD, "SEV".padEnd(sevW))}${c(BOLD, "CONFIDENCE".padEnd(confW))}${c(BOLD, "TITLE")}`,
  );
  lines.push(`  ${"─".repeat(idW + sevW + confW + 30)}`);

  for (const info of categories) {
    const sev = c(severityColor(info.severity), info.severity.padEnd(sevW));
    lines.push(`  ${c(DIM, info.id.padEnd(idW))}${sev}${info.confidence.padEnd(confW)}${info.title}`);
  }

  lines.push("");
  lines.push(`  ${categories.length} ${categories.length === 1 ? "category" : "categories"} total`);
  lines.push("");

  return lines.join("\n");
}
