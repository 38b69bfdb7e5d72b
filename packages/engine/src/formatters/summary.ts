/**
 * Report totals shared by the markdown report and the CLI formatter.
 */

import type { Category, ScanReport, Severity } from "../schemas.js";
import { getCategoryInfo } from "../rules/categories.js";

export interface ReportSummary {
  fileCount: number;
  findingCount: number;
  byCategory: Record<Category, number>;
  bySeverity: Record<Severity, number>;
  /** Per-file finding counts in report order. */
  files: Array<{ path: string; count: number }>;
}

export function summarizeReport(report: ScanReport): ReportSummary {
  const byCategory: Record<Category, number> = {
    DirectQueryInClause: 0,
    QueryVariableInClause: 0,
    QueryAttributeInClause: 0,
    SubqueryAlreadyGuarded: 0,
    RowLikeResult: 0,
    PossibleRowVariable: 0,
    PossibleRowAttribute: 0,
  };
  const bySeverity: Record<Severity, number> = { critical: 0, high: 0, medium: 0, low: 0, info: 0 };
  const files: ReportSummary["files"] = [];
  let findingCount = 0;

  for (const [path, findings] of report) {
    files.push({ path, count: findings.length });
    findingCount += findings.length;
    for (const f of findings) {
      byCategory[f.category] += 1;
      bySeverity[getCategoryInfo(f.category).severity] += 1;
    }
  }

  return { fileCount: report.size, findingCount, byCategory, bySeverity, files };
}
