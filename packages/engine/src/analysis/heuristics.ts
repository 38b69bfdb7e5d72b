/**
 * Heuristic tables.
 *
 * Method names that make up query and row chains, and the keyword sets used
 * to flag identifiers that merely look like queries or rows. Classifiers read
 * these tables; adding a keyword never means adding a branch.
 */

import type { Category } from "../schemas.js";
import type { ComparisonOperator } from "../syntax/nodes.js";

// ---------------------------------------------------------------------------
// Method-name sets
// ---------------------------------------------------------------------------

export const MEMBERSHIP_METHODS: ReadonlySet<string> = new Set(["in_", "notin_"]);

export const QUERY_BASE_METHOD = "query";

export const QUERY_CHAIN_METHODS: ReadonlySet<string> = new Set([
  "filter",
  "join",
  "outerjoin",
  "group_by",
  "having",
  "order_by",
]);

export const ROW_RESULT_METHODS: ReadonlySet<string> = new Set([
  "first",
  "one",
  "one_or_none",
  "scalar_one",
  "scalar_one_or_none",
]);

export const ROW_CHAIN_METHODS: ReadonlySet<string> = new Set([
  ...QUERY_CHAIN_METHODS,
  "limit",
]);

export const SUBQUERY_GUARD_METHODS: ReadonlySet<string> = new Set([
  "subquery",
  "scalar_subquery",
  "exists",
  "all",
]);

export const COMPARED_OPERATORS: ReadonlySet<ComparisonOperator> = new Set<ComparisonOperator>([
  "==", "!=", "<", "<=", ">", ">=",
]);

/** Longest receiver chain the chain predicates will follow. */
export const MAX_CHAIN_DEPTH = 256;

// ---------------------------------------------------------------------------
// Keyword table
// ---------------------------------------------------------------------------

export type KeywordCategory = Extract<
  Category,
  "QueryVariableInClause" | "QueryAttributeInClause" | "PossibleRowVariable" | "PossibleRowAttribute"
>;

export const KEYWORD_CATEGORIES: readonly KeywordCategory[] = [
  "QueryVariableInClause",
  "QueryAttributeInClause",
  "PossibleRowVariable",
  "PossibleRowAttribute",
];

export interface KeywordRule {
  /** Lower-cased names that match only when equal. */
  exact: readonly string[];
  /** Lower-cased fragments that match anywhere in the name. */
  substrings: readonly string[];
}

export type KeywordTable = Readonly<Record<KeywordCategory, KeywordRule>>;

const QUERY_KEYWORDS: KeywordRule = {
  exact: ["q"],
  substrings: ["query", "subq", "sub_q"],
};

const ROW_KEYWORDS: KeywordRule = {
  exact: [],
  substrings: ["row", "first", "one", "result", "record", "data"],
};

export const DEFAULT_KEYWORDS: KeywordTable = {
  QueryVariableInClause: QUERY_KEYWORDS,
  QueryAttributeInClause: QUERY_KEYWORDS,
  PossibleRowVariable: ROW_KEYWORDS,
  PossibleRowAttribute: ROW_KEYWORDS,
};

export function isKeywordCategory(value: string): value is KeywordCategory {
  return KEYWORD_CATEGORIES.some((category) => category === value);
}

export function matchesKeywords(name: string, rule: KeywordRule): boolean {
  const lowered = name.toLowerCase();
  return (
    rule.exact.some((word) => word === lowered) ||
    rule.substrings.some((word) => lowered.includes(word))
  );
}

/**
 * Add substrings to a keyword table. Empty entries are ignored and words are
 * lower-cased so they compare against lower-cased names.
 */
export function extendKeywords(
  table: KeywordTable,
  extra: Partial<Record<KeywordCategory, readonly string[]>>,
): KeywordTable {
  const next: Record<KeywordCategory, KeywordRule> = { ...table };
  for (const category of KEYWORD_CATEGORIES) {
    const words = (extra[category] ?? [])
      .map((w) => w.trim().toLowerCase())
      .filter((w) => w.length > 0);
    if (words.length === 0) continue;
    const current = table[category];
    next[category] = {
      exact: current.exact,
      substrings: [...new Set([...current.substrings, ...words])],
    };
  }
  return next;
}
