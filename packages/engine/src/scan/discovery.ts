/**
 * File discovery for directory scans.
 *
 * Walks the tree below a root, keeps regular files whose extension is in the
 * requested set, and returns them in walk order with entry names sorted at
 * every level (so `a/b.py` comes before `a-c.py`). Symbolic links are not
 * followed.
 */

import { readdirSync } from "node:fs";
import { extname, join, relative, sep } from "node:path";

import { logger } from "../logger.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface DiscoverOptions {
  /** Extensions to keep, with or without the leading dot. Default: [".py"]. */
  extensions?: Iterable<string>;
  /** Ignore patterns matched against root-relative, `/`-separated paths. */
  ignore?: string[];
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const DEFAULT_EXTENSIONS: readonly string[] = [".py"];

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** `py` and `.py` both mean `.py`. Matching stays case-sensitive. */
export function normalizeExtensions(extensions: Iterable<string>): Set<string> {
  const normalized = new Set<string>();
  for (const raw of extensions) {
    const ext = raw.trim();
    if (!ext) continue;
    normalized.add(ext.startsWith(".") ? ext : `.${ext}`);
  }
  return normalized;
}

// Code-unit order, independent of locale.
function compareNames(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function toPosix(relPath: string): string {
  return sep === "/" ? relPath : relPath.split(sep).join("/");
}

function globToRegExp(pattern: string): RegExp {
  let out = "";
  for (let i = 0; i < pattern.length; i++) {
    const ch = pattern[i];
    if (ch === "*") {
      if (pattern[i + 1] === "*") {
        if (pattern[i + 2] === "/") {
          out += "(?:.*/)?";
          i += 2;
        } else {
          out += ".*";
          i += 1;
        }
      } else {
        out += "[^/]*";
      }
    } else if (ch === "?") {
      out += "[^/]";
    } else {
      out += ch.replace(/[.+^${}()|[\]\\]/g, "\\$&");
    }
  }
  return new RegExp(`^${out}$`);
}

/**
 * Simple glob matcher for ignore patterns.
 * Supports: directory names, file globs like "*_pb2.py", path prefixes like
 * "migrations/", and ** globs like "**\/tests/*.py".
 */
export function matchesIgnore(relPath: string, patterns: string[]): boolean {
  for (const pattern of patterns) {
    // Exact segment match (e.g., "venv", "__pycache__")
    const segments = relPath.split("/");
    if (segments.some((s) => s === pattern)) return true;

    // Suffix glob (e.g., "*_pb2.py")
    if (pattern.startsWith("*") && !pattern.startsWith("**")) {
      if (relPath.endsWith(pattern.slice(1))) return true;
    }

    // Path prefix (e.g., "migrations/")
    const cleanPattern = pattern.replace(/\/$/, "");
    if (relPath.startsWith(cleanPattern + "/") || relPath === cleanPattern) return true;

    if (pattern.includes("**") && globToRegExp(pattern).test(relPath)) return true;
  }
  return false;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Every regular file below `root` with a matching extension, as
 * `join(root, relativePath)`. The caller checks that `root` is a directory.
 */
export function discoverSourceFiles(root: string, opts: DiscoverOptions = {}): string[] {
  const extensions = normalizeExtensions(opts.extensions ?? DEFAULT_EXTENSIONS);
  const ignore = opts.ignore ?? [];
  const files: string[] = [];

  function walk(dir: string): void {
    let entries;
    try {
      entries = readdirSync(dir, { withFileTypes: true });
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      logger.warn(`[discovery] Skipping unreadable directory ${dir}: ${message}`);
      return;
    }

    entries.sort((a, b) => compareNames(a.name, b.name));
    for (const entry of entries) {
      const abs = join(dir, entry.name);
      const rel = toPosix(relative(root, abs));
      if (ignore.length > 0 && matchesIgnore(rel, ignore)) continue;

      if (entry.isDirectory()) {
        walk(abs);
      } else if (entry.isFile() && extensions.has(extname(entry.name))) {
        files.push(abs);
      }
    }
  }

  walk(root);
  return files;
}
