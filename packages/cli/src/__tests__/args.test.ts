import { describe, it, expect, afterEach, vi } from "vitest";
import { parseArgs } from "../args.js";

describe("parseArgs", () => {
  afterEach(() => {
    delete process.env.ROWSCOPE_LOG_LEVEL;
    vi.restoreAllMocks();
  });

  it("parses command as first positional", () => {
    const result = parseArgs(["scan", "."]);
    expect(result.command).toBe("scan");
    expect(result.positional).toEqual(["."]);
  });

  it("parses boolean flags", () => {
    const result = parseArgs(["scan", "--summary-only", "--no-details", "--no-color"]);
    expect(result.args["summary-only"]).toBe("true");
    expect(result.args["no-details"]).toBe("true");
    expect(result.args["no-color"]).toBe("true");
  });

  it("parses key-value flags", () => {
    const result = parseArgs([
      "scan", "--format", "json", "--fail-on", "high",
      "--extensions", ".py,.pyi", "--render", "structural", "--concurrency", "4",
    ]);
    expect(result.args).toEqual({
      format: "json",
      "fail-on": "high",
      extensions: ".py,.pyi",
      render: "structural",
      concurrency: "4",
    });
  });

  it("parses --output with value", () => {
    const result = parseArgs(["scan", "--output", "report.md"]);
    expect(result.args["output"]).toBe("report.md");
  });

  it("parses short flags -h and -v", () => {
    expect(parseArgs(["scan", "-h"]).args["help"]).toBe("true");
    expect(parseArgs(["scan", "-v"]).args["version"]).toBe("true");
  });

  it("handles mixed flags and positionals", () => {
    const result = parseArgs(["scan", "src", "--format", "markdown", "--summary-only"]);
    expect(result.command).toBe("scan");
    expect(result.positional).toEqual(["src"]);
    expect(result.args["format"]).toBe("markdown");
    expect(result.args["summary-only"]).toBe("true");
  });

  it("returns empty command when no args", () => {
    const result = parseArgs([]);
    expect(result.command).toBe("");
    expect(result.positional).toEqual([]);
  });

  it("warns on unknown flags", () => {
    const stderrSpy = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    const result = parseArgs(["scan", "--depth", "3"]);
    expect(result.args["depth"]).toBe("3");
    expect(stderrSpy).toHaveBeenCalledWith("[rowscope] Warning: unknown flag --depth\n");
  });

  it("sets the log level for --verbose and --quiet", () => {
    parseArgs(["scan", "--verbose"]);
    expect(process.env.ROWSCOPE_LOG_LEVEL).toBe("debug");

    parseArgs(["scan", "--quiet"]);
    expect(process.env.ROWSCOPE_LOG_LEVEL).toBe("error");
  });
});
