import { describe, it, expect, afterEach, vi } from "vitest";
import { mkdirSync, writeFileSync, existsSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { loadConfig, filterReport, didYouMean, DEFAULT_CONFIG, type RowscopeConfig } from "../config.js";
import type { Finding, ScanReport } from "../schemas.js";

const TEST_DIR = join(tmpdir(), `rowscope-config-test-${Date.now()}`);

function setupConfig(content: string): void {
  mkdirSync(TEST_DIR, { recursive: true });
  writeFileSync(join(TEST_DIR, ".rowscope.yml"), content);
}

function captureStderr(): () => string[] {
  const stderrSpy = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
  return () => stderrSpy.mock.calls.map((c) => String(c[0]));
}

describe("loadConfig", () => {
  afterEach(() => {
    if (existsSync(TEST_DIR)) {
      rmSync(TEST_DIR, { recursive: true, force: true });
    }
    vi.restoreAllMocks();
  });

  it("returns null when no config file exists", () => {
    mkdirSync(TEST_DIR, { recursive: true });
    expect(loadConfig(TEST_DIR)).toBeNull();
  });

  it("parses valid config", () => {
    setupConfig(`
extensions:
  - .py
  - .pyi
ignore:
  - venv
  - migrations/
disable:
  - PossibleRowVariable
severity_threshold: medium
render: structural
concurrency: 4
keywords:
  QueryVariableInClause:
    - stmt
`);

    expect(loadConfig(TEST_DIR)).toEqual({
      extensions: [".py", ".pyi"],
      ignore: ["venv", "migrations/"],
      disable: ["PossibleRowVariable"],
      severity_threshold: "medium",
      render: "structural",
      concurrency: 4,
      keywords: { QueryVariableInClause: ["stmt"] },
    });
  });

  it("returns defaults for empty YAML", () => {
    setupConfig("");
    expect(loadConfig(TEST_DIR)).toEqual(DEFAULT_CONFIG);
  });

  it("does not share arrays with the defaults", () => {
    setupConfig("");
    const config = loadConfig(TEST_DIR);
    config?.ignore.push("venv");
    expect(DEFAULT_CONFIG.ignore).toEqual([]);
  });

  it("warns on a misspelled category in disable", () => {
    const warnings = captureStderr();
    setupConfig(`
disable:
  - RowLikeResult
  - PossibleRowVarable
`);

    expect(loadConfig(TEST_DIR)?.disable).toEqual(["RowLikeResult"]);
    expect(warnings().some((msg) =>
      msg.includes("PossibleRowVarable") && msg.includes("did you mean 'PossibleRowVariable'"),
    )).toBe(true);
  });

  it("warns on invalid severity", () => {
    const warnings = captureStderr();
    setupConfig("severity_threshold: hgih\n");

    expect(loadConfig(TEST_DIR)?.severity_threshold).toBe("info");
    expect(warnings().some((msg) => msg.includes("hgih") && msg.includes("did you mean 'high'"))).toBe(true);
  });

  it("warns on invalid render mode", () => {
    const warnings = captureStderr();
    setupConfig("render: structual\n");

    expect(loadConfig(TEST_DIR)?.render).toBe("source");
    expect(warnings().some((msg) => msg.includes("did you mean 'structural'"))).toBe(true);
  });

  it("warns on malformed YAML", () => {
    const warnings = captureStderr();
    setupConfig(`
extensions: [
  unclosed bracket
`);

    expect(loadConfig(TEST_DIR)).toEqual(DEFAULT_CONFIG);
    expect(warnings().some((msg) => msg.includes("could not parse"))).toBe(true);
  });

  it("falls back to defaults when a value has the wrong type", () => {
    const warnings = captureStderr();
    setupConfig("concurrency: 0\n");

    expect(loadConfig(TEST_DIR)).toEqual(DEFAULT_CONFIG);
    expect(warnings().some((msg) => msg.includes("config validation error") && msg.includes("concurrency"))).toBe(true);
  });

  it("warns on unknown config keys", () => {
    const warnings = captureStderr();
    setupConfig(`
extension:
  - .py
`);

    loadConfig(TEST_DIR);
    expect(warnings().some((msg) =>
      msg.includes("unknown config key 'extension'") && msg.includes("did you mean 'extensions'"),
    )).toBe(true);
  });

  it("warns on keywords for categories that are not name-based", () => {
    const warnings = captureStderr();
    setupConfig(`
keywords:
  DirectQueryInClause:
    - foo
  PossibleRowAttribute:
    - entry
`);

    expect(loadConfig(TEST_DIR)?.keywords).toEqual({ PossibleRowAttribute: ["entry"] });
    expect(warnings().some((msg) => msg.includes("'DirectQueryInClause' does not take keywords"))).toBe(true);
  });

  it("handles all valid severities", () => {
    for (const sev of ["critical", "high", "medium", "low", "info"]) {
      if (existsSync(TEST_DIR)) {
        rmSync(TEST_DIR, { recursive: true, force: true });
      }
      setupConfig(`severity_threshold: ${sev}`);
      expect(loadConfig(TEST_DIR)?.severity_threshold).toBe(sev);
    }
  });
});

describe("didYouMean", () => {
  it("suggests the closest candidate within three edits", () => {
    expect(didYouMean("ignor", ["ignore", "disable"])).toBe("ignore");
    expect(didYouMean("something", ["ignore", "disable"])).toBeNull();
  });
});

describe("filterReport", () => {
  const finding = (category: Finding["category"], line: number): Finding => ({
    line,
    renderedCode: "code",
    category,
    renderedArg: "arg",
    comparisonMarker: "==",
  });

  const report: ScanReport = new Map([
    ["a.py", [finding("RowLikeResult", 1), finding("PossibleRowVariable", 2)]],
    ["b.py", [finding("PossibleRowAttribute", 5)]],
    ["c.py", [finding("SubqueryAlreadyGuarded", 9)]],
  ]);

  const config = (overrides: Partial<RowscopeConfig>): RowscopeConfig => ({ ...DEFAULT_CONFIG, ...overrides });

  it("filters by disabled categories and drops emptied files", () => {
    const filtered = filterReport(report, config({ disable: ["PossibleRowAttribute"] }));
    expect([...filtered.keys()]).toEqual(["a.py", "c.py"]);
    expect(filtered.get("a.py")).toHaveLength(2);
  });

  it("filters by severity threshold", () => {
    const filtered = filterReport(report, config({ severity_threshold: "medium" }));
    expect([...filtered.entries()].map(([file, fs]) => [file, fs.map((f) => f.category)])).toEqual([
      ["a.py", ["RowLikeResult"]],
    ]);
  });

  it("keeps everything at the info threshold", () => {
    const filtered = filterReport(report, config({}));
    expect([...filtered.keys()]).toEqual(["a.py", "b.py", "c.py"]);
  });
});
