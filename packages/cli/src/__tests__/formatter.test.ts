import { describe, it, expect } from "vitest";
import { generateMarkdownReport, getAllCategories, type Finding, type ScanReport } from "@rowscope/engine";
import { formatCategoriesTable, formatReport, isOutputFormat } from "../formatter.js";

const finding: Finding = {
  line: 10,
  renderedCode: "User.id.in_(q)",
  category: "QueryVariableInClause",
  renderedArg: "q",
  comparisonMarker: "in_or_notin_",
};

const report: ScanReport = new Map([["app/models.py", [finding]]]);

describe("formatReport (table)", () => {
  it("prints findings with details and a summary", () => {
    const out = formatReport(report, { format: "table", noColor: true });
    expect(out.split("\n")).toEqual([
      "",
      "  Found 1 potential issue in 1 file:",
      "",
      "  app/models.py",
      "   MEDIUM    Line 10: QueryVariableInClause (in_or_notin_)",
      "              Code: User.id.in_(q)",
      "              Arg:  q",
      "",
      "  Summary",
      "  QueryVariableInClause   Check whether the variable holds a Query; if so add .scalar_subquery().",
      "",
      "  1 finding total",
      "",
    ]);
  });

  it("omits code and argument lines without details", () => {
    const out = formatReport(report, { format: "table", noColor: true, details: false });
    expect(out).not.toContain("Code:");
    expect(out).toContain("   MEDIUM    Line 10: QueryVariableInClause (in_or_notin_)\n\n");
  });

  it("reports a clean scan", () => {
    expect(formatReport(new Map(), { format: "table", noColor: true })).toBe("\n  No problematic patterns found.\n");
  });

  it("uses ANSI colors unless disabled", () => {
    expect(formatReport(report, { format: "table" })).toContain("\x1b[33m MEDIUM   \x1b[0m");
    expect(formatReport(report, { format: "table", noColor: true })).not.toContain("\x1b[");
  });

  it("prints per-file counts in summary-only mode", () => {
    const two: ScanReport = new Map([
      ["a.py", [finding, { ...finding, line: 12 }]],
      ["b.py", [finding]],
    ]);
    expect(formatReport(two, { format: "table", summaryOnly: true, noColor: true })).toBe(
      "Found 3 patterns in 2 files\n  a.py: 2 patterns\n  b.py: 1 pattern\n",
    );
    expect(formatReport(new Map(), { format: "table", summaryOnly: true })).toBe("No patterns found\n");
  });
});

describe("formatReport (json)", () => {
  it("includes the summary and every finding", () => {
    const parsed: unknown = JSON.parse(formatReport(report, { format: "json" }));
    expect(parsed).toEqual({
      summary: {
        files: 1,
        findings: 1,
        byCategory: {
          DirectQueryInClause: 0,
          QueryVariableInClause: 1,
          QueryAttributeInClause: 0,
          SubqueryAlreadyGuarded: 0,
          RowLikeResult: 0,
          PossibleRowVariable: 0,
          PossibleRowAttribute: 0,
        },
      },
      files: { "app/models.py": [finding] },
    });
  });

  it("drops the findings in summary-only mode", () => {
    const parsed: unknown = JSON.parse(formatReport(report, { format: "json", summaryOnly: true }));
    expect(parsed).not.toHaveProperty("files");
    expect(parsed).toHaveProperty("summary.findings", 1);
  });
});

describe("formatReport (markdown)", () => {
  const timestamp = "2024-01-01T00:00:00.000Z";

  it("delegates to the markdown report", () => {
    expect(formatReport(report, { format: "markdown", timestamp })).toBe(
      generateMarkdownReport(report, { timestamp, details: true }),
    );
  });

  it("drops details in summary-only mode", () => {
    expect(formatReport(report, { format: "markdown", timestamp, summaryOnly: true })).toBe(
      generateMarkdownReport(report, { timestamp, details: false }),
    );
  });
});

describe("isOutputFormat", () => {
  it("accepts the three formats", () => {
    expect(["table", "json", "markdown", "csv"].map(isOutputFormat)).toEqual([true, true, true, false]);
  });
});

describe("formatCategoriesTable", () => {
  it("lists every category with severity and confidence", () => {
    const out = formatCategoriesTable(getAllCategories(), true);
    expect(out).toContain(
      `  ${"DirectQueryInClause".padEnd(26)}${"high".padEnd(10)}${"high".padEnd(12)}Query passed directly to in_()`,
    );
    expect(out).toContain(
      `  ${"PossibleRowVariable".padEnd(26)}${"low".padEnd(10)}${"low".padEnd(12)}Possible Row variable in comparison`,
    );
    expect(out).toContain("  7 categories total");
  });
});
