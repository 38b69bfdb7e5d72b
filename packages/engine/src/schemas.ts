import { z } from "zod";

export const SeveritySchema = z.enum([
  "critical",
  "high",
  "medium",
  "low",
  "info",
]);

export type Severity = z.infer<typeof SeveritySchema>;

export const CategorySchema = z.enum([
  "DirectQueryInClause",
  "QueryVariableInClause",
  "QueryAttributeInClause",
  "SubqueryAlreadyGuarded",
  "RowLikeResult",
  "PossibleRowVariable",
  "PossibleRowAttribute",
]);

export type Category = z.infer<typeof CategorySchema>;

/** Marker recorded for findings produced by the `in_()` / `notin_()` classifier. */
export const MEMBERSHIP_MARKER = "in_or_notin_";

export const FindingSchema = z.object({
  line: z.number().int().min(1),
  renderedCode: z.string(),
  category: CategorySchema,
  renderedArg: z.string(),
  /** `"in_or_notin_"` for membership tests, otherwise the comparison operator. */
  comparisonMarker: z.string(),
});

export type Finding = Readonly<z.infer<typeof FindingSchema>>;

/**
 * File path -> findings in traversal order. Iteration order is discovery
 * order; every entry holds at least one finding.
 */
export type ScanReport = Map<string, Finding[]>;
