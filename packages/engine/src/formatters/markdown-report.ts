/**
 * Markdown migration report generator.
 *
 * Produces a standalone markdown document suitable for attaching to a
 * migration ticket or pull request.
 */

import type { ScanReport, Severity } from "../schemas.js";
import { getAllCategories, getCategoryInfo, SEVERITY_ORDER } from "../rules/categories.js";
import { summarizeReport } from "./summary.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ReportOptions {
  projectName?: string;
  timestamp?: string | Date;
  /** Include code and argument lines per finding. Default: true. */
  details?: boolean;
}

// ---------------------------------------------------------------------------
// Severity helpers
// ---------------------------------------------------------------------------

const SEVERITY_LABELS: Record<Severity, string> = {
  critical: "Critical",
  high: "High",
  medium: "Medium",
  low: "Low",
  info: "Info",
};

function inlineCode(text: string): string {
  const flat = text.replace(/\s*\n\s*/g, " ");
  return flat.includes("`") ? `\`\` ${flat} \`\`` : `\`${flat}\``;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Generate a complete markdown migration report.
 */
export function generateMarkdownReport(
  report: ScanReport,
  options?: ReportOptions,
): string {
  const project = options?.projectName ?? "Project";
  const ts =
    options?.timestamp instanceof Date
      ? options.timestamp.toISOString()
      : options?.timestamp ?? new Date().toISOString();
  const details = options?.details ?? true;
  const summary = summarizeReport(report);

  const sections: string[] = [];

  sections.push(`# Query Migration Report: ${project}`);
  sections.push("");
  sections.push(`*Generated: ${ts}*`);
  sections.push("");

  // ── Summary ───────────────────────────────────────────────────────────
  sections.push("## Summary");
  sections.push("");
  sections.push(
    `**${summary.findingCount} potential issue${summary.findingCount === 1 ? "" : "s"} in ${summary.fileCount} file${summary.fileCount === 1 ? "" : "s"}**`,
  );
  sections.push("");

  sections.push("| Category | Severity | Count |");
  sections.push("|----------|----------|-------|");
  for (const info of getAllCategories()) {
    sections.push(
      `| ${info.id} | ${SEVERITY_LABELS[info.severity]} | ${summary.byCategory[info.id]} |`,
    );
  }
  sections.push("");

  if (summary.findingCount === 0) {
    sections.push("No problematic patterns found.");
    sections.push("");
  }

  // ── Findings by File ──────────────────────────────────────────────────
  if (summary.findingCount > 0) {
    sections.push("## Findings by File");
    sections.push("");

    for (const [file, findings] of report) {
      sections.push(`### \`${file}\` (${findings.length})`);
      sections.push("");

      for (const f of findings) {
        const info = getCategoryInfo(f.category);
        sections.push(
          `- **Line ${f.line}** [${SEVERITY_LABELS[info.severity]}] \`${f.category}\` (${f.comparisonMarker}): ${info.title}`,
        );
        if (details) {
          sections.push(`  - Code: ${inlineCode(f.renderedCode)}`);
          sections.push(`  - Arg: ${inlineCode(f.renderedArg)}`);
        }
      }
      sections.push("");
    }
  }

  // ── Remediation Guide ─────────────────────────────────────────────────
  const seen = getAllCategories().filter((info) => summary.byCategory[info.id] > 0);
  if (seen.length > 0) {
    sections.push("## Remediation Guide");
    sections.push("");

    const ordered = [...seen].sort(
      (a, b) => SEVERITY_ORDER.indexOf(a.severity) - SEVERITY_ORDER.indexOf(b.severity),
    );
    let idx = 1;
    for (const info of ordered) {
      sections.push(`${idx}. **${info.id}** — ${info.suggestion}`);
      idx++;
    }
    sections.push("");
  }

  sections.push("---");
  sections.push("*Report generated by rowscope*");
  sections.push("");

  return sections.join("\n");
}
