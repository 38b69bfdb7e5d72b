/**
 * Category registry.
 *
 * Central catalogue of finding categories with the severity, confidence and
 * remediation text the reports show for each.
 */

import { CategorySchema, type Category, type Severity } from "../schemas.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type Confidence = "high" | "medium" | "low";

export interface CategoryInfo {
  id: Category;
  title: string;
  description: string;
  suggestion: string;
  severity: Severity;
  confidence: Confidence;
  /** Which classifier produces the category. */
  source: "membership" | "comparison";
}

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

const CATEGORY_INFO: Record<Category, CategoryInfo> = {
  DirectQueryInClause: {
    id: "DirectQueryInClause",
    title: "Query passed directly to in_()",
    description: "A query chain is used as the argument of in_()/notin_() without a subquery wrapper.",
    suggestion: "Wrap the query with .scalar_subquery() (or .subquery()) before passing it to in_().",
    severity: "high",
    confidence: "high",
    source: "membership",
  },
  QueryVariableInClause: {
    id: "QueryVariableInClause",
    title: "Query-like variable in in_()",
    description: "A variable whose name suggests a query is used as the argument of in_()/notin_().",
    suggestion: "Check whether the variable holds a Query; if so add .scalar_subquery().",
    severity: "medium",
    confidence: "medium",
    source: "membership",
  },
  QueryAttributeInClause: {
    id: "QueryAttributeInClause",
    title: "Query-like attribute in in_()",
    description: "An attribute whose name suggests a query is used as the argument of in_()/notin_().",
    suggestion: "Check whether the attribute holds a Query; if so add .scalar_subquery().",
    severity: "medium",
    confidence: "medium",
    source: "membership",
  },
  SubqueryAlreadyGuarded: {
    id: "SubqueryAlreadyGuarded",
    title: "Subquery already applied",
    description: "The in_()/notin_() argument already goes through .subquery(), .scalar_subquery(), .exists() or .all().",
    suggestion: "Already uses a subquery form; check for deprecation warnings.",
    severity: "info",
    confidence: "high",
    source: "membership",
  },
  RowLikeResult: {
    id: "RowLikeResult",
    title: "Row result in comparison",
    description: "A query chain returning a row (.first(), .one(), ...) is compared against a column.",
    suggestion: "Extract the scalar with .scalar() or row[0] before comparing.",
    severity: "high",
    confidence: "high",
    source: "comparison",
  },
  PossibleRowVariable: {
    id: "PossibleRowVariable",
    title: "Possible Row variable in comparison",
    description: "A variable whose name suggests a row or result is compared against a column.",
    suggestion: "Check whether the variable holds a Row; if so extract the scalar.",
    severity: "low",
    confidence: "low",
    source: "comparison",
  },
  PossibleRowAttribute: {
    id: "PossibleRowAttribute",
    title: "Possible Row attribute in comparison",
    description: "An attribute whose name suggests a row or result is compared against a column.",
    suggestion: "Check whether the attribute holds a Row; if so extract the scalar.",
    severity: "low",
    confidence: "low",
    source: "comparison",
  },
};

export const SEVERITY_ORDER: readonly Severity[] = ["critical", "high", "medium", "low", "info"];

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Returns every category in declaration order.
 */
export function getAllCategories(): CategoryInfo[] {
  return CategorySchema.options.map((id) => CATEGORY_INFO[id]);
}

export function getCategoryInfo(category: Category): CategoryInfo {
  return CATEGORY_INFO[category];
}

/** Rank where 0 is most severe. */
export function severityRank(severity: Severity): number {
  return SEVERITY_ORDER.indexOf(severity);
}
