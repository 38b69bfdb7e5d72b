/**
 * Config loader: reads and validates `.rowscope.yml` configuration files.
 * Shape is checked with Zod; bad values fall back to defaults with a warning.
 */

import { readFileSync, existsSync } from "node:fs";
import { resolve, join } from "node:path";
import yaml from "js-yaml";
import { z } from "zod";

import { CategorySchema, SeveritySchema, type Category, type ScanReport, type Severity } from "./schemas.js";
import { getCategoryInfo, severityRank, SEVERITY_ORDER } from "./rules/categories.js";
import { KEYWORD_CATEGORIES, isKeywordCategory, type KeywordCategory } from "./analysis/heuristics.js";
import { RENDER_MODES, isRenderMode, type RenderMode } from "./analysis/renderer.js";
import { DEFAULT_EXTENSIONS } from "./scan/discovery.js";
import { DEFAULT_CONCURRENCY } from "./scan/scanner.js";
import { logger } from "./logger.js";

/* ------------------------------------------------------------------ */
/*  Types                                                              */
/* ------------------------------------------------------------------ */

export const CONFIG_FILE_NAME = ".rowscope.yml";

export interface RowscopeConfig {
  /** File extensions to scan: [".py"] */
  extensions: string[];
  /** Glob patterns of files/dirs to ignore */
  ignore: string[];
  /** Categories to drop from reports: ["PossibleRowVariable"] */
  disable: Category[];
  /** Minimum category severity to report: "critical", "high", "medium", "low", "info" */
  severity_threshold: Severity;
  /** "source" keeps the exact code text; "structural" renders a short form */
  render: RenderMode;
  /** Files scanned per batch */
  concurrency: number;
  /** Extra name fragments per name-based category */
  keywords: Partial<Record<KeywordCategory, string[]>>;
}

export const DEFAULT_CONFIG: RowscopeConfig = {
  extensions: [...DEFAULT_EXTENSIONS],
  ignore: [],
  disable: [],
  severity_threshold: "info",
  render: "source",
  concurrency: DEFAULT_CONCURRENCY,
  keywords: {},
};

const KNOWN_KEYS = [
  "extensions",
  "ignore",
  "disable",
  "severity_threshold",
  "render",
  "concurrency",
  "keywords",
] as const;

/* ------------------------------------------------------------------ */
/*  Zod schema                                                         */
/* ------------------------------------------------------------------ */

const rowscopeConfigSchema = z.object({
  extensions: z.array(z.string()).optional(),
  ignore: z.array(z.string()).optional(),
  disable: z.array(z.string()).optional(),
  severity_threshold: z.string().optional(),
  render: z.string().optional(),
  concurrency: z.number().int().positive().optional(),
  keywords: z.record(z.array(z.string())).optional(),
}).passthrough();

/* ------------------------------------------------------------------ */
/*  Helpers                                                            */
/* ------------------------------------------------------------------ */

export function didYouMean(input: string, valid: readonly string[]): string | null {
  let best: string | null = null;
  let bestDist = Infinity;

  for (const candidate of valid) {
    const dist = levenshtein(input.toLowerCase(), candidate.toLowerCase());
    if (dist < bestDist && dist <= 3) {
      bestDist = dist;
      best = candidate;
    }
  }

  return best;
}

function levenshtein(a: string, b: string): number {
  const m = a.length;
  const n = b.length;
  const dp: number[][] = Array.from({ length: m + 1 }, () => new Array<number>(n + 1).fill(0));

  for (let i = 0; i <= m; i++) dp[i][0] = i;
  for (let j = 0; j <= n; j++) dp[0][j] = j;

  for (let i = 1; i <= m; i++) {
    for (let j = 1; j <= n; j++) {
      dp[i][j] = a[i - 1] === b[j - 1]
        ? dp[i - 1][j - 1]
        : 1 + Math.min(dp[i - 1][j], dp[i][j - 1], dp[i - 1][j - 1]);
    }
  }

  return dp[m][n];
}

function hint(input: string, valid: readonly string[]): string {
  const suggestion = didYouMean(input, valid);
  return suggestion ? ` — did you mean '${suggestion}'?` : "";
}

function defaults(): RowscopeConfig {
  return {
    ...DEFAULT_CONFIG,
    extensions: [...DEFAULT_CONFIG.extensions],
    ignore: [],
    disable: [],
    keywords: {},
  };
}

/* ------------------------------------------------------------------ */
/*  Loader                                                             */
/* ------------------------------------------------------------------ */

/**
 * Load `.rowscope.yml` from the given directory.
 * Returns the parsed config merged with defaults, or null if no config file exists.
 */
export function loadConfig(dir: string): RowscopeConfig | null {
  const configPath = resolve(join(dir, CONFIG_FILE_NAME));

  if (!existsSync(configPath)) return null;

  let raw: string;
  try {
    raw = readFileSync(configPath, "utf-8");
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    logger.warn(`Warning: could not read ${CONFIG_FILE_NAME} — ${message}. Using defaults.`);
    return defaults();
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(raw);
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    logger.warn(`Warning: could not parse ${CONFIG_FILE_NAME} — ${message}. Using defaults.`);
    return defaults();
  }

  if (!parsed || typeof parsed !== "object") return defaults();

  // Validate shape with Zod
  const result = rowscopeConfigSchema.safeParse(parsed);
  if (!result.success) {
    for (const issue of result.error.issues) {
      logger.warn(`Warning: config validation error — ${issue.path.join(".")}: ${issue.message}`);
    }
    return defaults();
  }

  const data = result.data;

  // Warn about unknown top-level keys
  for (const key of Object.keys(data)) {
    if (!KNOWN_KEYS.some((known) => known === key)) {
      logger.warn(`Warning: unknown config key '${key}'${hint(key, KNOWN_KEYS)}`);
    }
  }

  const config = defaults();

  // extensions
  if (data.extensions) {
    const valid = data.extensions.map((e) => e.trim()).filter((e) => e.length > 0);
    if (valid.length > 0) config.extensions = valid;
  }

  // ignore
  if (data.ignore) {
    config.ignore = data.ignore;
  }

  // disable: validate category names
  if (data.disable) {
    const valid: Category[] = [];
    for (const d of data.disable) {
      const category = CategorySchema.safeParse(d);
      if (category.success) {
        valid.push(category.data);
      } else {
        logger.warn(`Warning: unknown category '${d}' in disable list${hint(d, CategorySchema.options)}`);
      }
    }
    config.disable = valid;
  }

  // severity_threshold
  if (data.severity_threshold !== undefined) {
    const severity = SeveritySchema.safeParse(data.severity_threshold);
    if (severity.success) {
      config.severity_threshold = severity.data;
    } else {
      logger.warn(
        `Warning: invalid severity_threshold '${data.severity_threshold}'${hint(data.severity_threshold, SEVERITY_ORDER)}. Using default '${DEFAULT_CONFIG.severity_threshold}'.`,
      );
    }
  }

  // render
  if (data.render !== undefined) {
    if (isRenderMode(data.render)) {
      config.render = data.render;
    } else {
      logger.warn(
        `Warning: invalid render mode '${data.render}'${hint(data.render, RENDER_MODES)}. Using default '${DEFAULT_CONFIG.render}'.`,
      );
    }
  }

  // concurrency
  if (data.concurrency !== undefined) {
    config.concurrency = data.concurrency;
  }

  // keywords: only name-based categories take extra keywords
  if (data.keywords) {
    for (const [category, words] of Object.entries(data.keywords)) {
      if (isKeywordCategory(category)) {
        config.keywords[category] = words;
      } else {
        logger.warn(`Warning: category '${category}' does not take keywords${hint(category, KEYWORD_CATEGORIES)}`);
      }
    }
  }

  return config;
}

/**
 * Filter a report by config. Removes disabled categories and findings below
 * the severity threshold. Files left without findings are dropped.
 */
export function filterReport(report: ScanReport, config: RowscopeConfig): ScanReport {
  const disabled = new Set(config.disable);
  const thresholdRank = severityRank(config.severity_threshold);
  const filtered: ScanReport = new Map();

  for (const [file, findings] of report) {
    const kept = findings.filter((f) => {
      if (disabled.has(f.category)) return false;
      return severityRank(getCategoryInfo(f.category).severity) <= thresholdRank;
    });
    if (kept.length > 0) filtered.set(file, kept);
  }

  return filtered;
}
