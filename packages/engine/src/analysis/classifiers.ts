/**
 * Node classifiers.
 *
 * Two independent protocols: one for the first argument of `in_()` /
 * `notin_()`, one for each right-hand operand of a comparison. Call-chain
 * shapes are the high-confidence matches; identifier names are checked
 * against the keyword table as a low-confidence fallback.
 *
 * Every function here is total: no match is `null`, never an exception.
 */

import type { Category } from "../schemas.js";
import type { CallExpr, SyntaxNode } from "../syntax/nodes.js";
import {
  DEFAULT_KEYWORDS,
  MAX_CHAIN_DEPTH,
  MEMBERSHIP_METHODS,
  QUERY_BASE_METHOD,
  QUERY_CHAIN_METHODS,
  ROW_CHAIN_METHODS,
  ROW_RESULT_METHODS,
  SUBQUERY_GUARD_METHODS,
  matchesKeywords,
  type KeywordTable,
} from "./heuristics.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

interface MethodCall {
  method: string;
  receiver: SyntaxNode;
}

/** `receiver.method(...)` split into its parts, or null for any other shape. */
function methodCall(node: SyntaxNode): MethodCall | null {
  if (node.kind !== "CallExpr" || node.func.kind !== "AttributeAccess") return null;
  return { method: node.func.attr, receiver: node.func.value };
}

// ---------------------------------------------------------------------------
// Chain predicates
// ---------------------------------------------------------------------------

/**
 * `session.query(...)` optionally followed by filter/join/group_by/... calls.
 */
export function isQueryChain(node: SyntaxNode, depth = 0): boolean {
  if (depth > MAX_CHAIN_DEPTH) return false;
  const call = methodCall(node);
  if (!call) return false;
  if (QUERY_CHAIN_METHODS.has(call.method)) return isQueryChain(call.receiver, depth + 1);
  return call.method === QUERY_BASE_METHOD;
}

/**
 * A query chain ending in a row-returning call (`.first()`, `.one()`, ...),
 * possibly refined further, or a bare query chain.
 */
export function isRowChain(node: SyntaxNode, depth = 0): boolean {
  if (depth > MAX_CHAIN_DEPTH) return false;
  const call = methodCall(node);
  if (!call) return false;
  if (ROW_RESULT_METHODS.has(call.method)) return isQueryChain(call.receiver, depth + 1);
  if (ROW_CHAIN_METHODS.has(call.method)) return isRowChain(call.receiver, depth + 1);
  return call.method === QUERY_BASE_METHOD;
}

/**
 * Whether any call along the receiver spine is `.subquery()`,
 * `.scalar_subquery()`, `.exists()` or `.all()`.
 */
export function hasSubqueryGuard(node: SyntaxNode, depth = 0): boolean {
  if (depth > MAX_CHAIN_DEPTH) return false;
  const call = methodCall(node);
  if (!call) return false;
  if (SUBQUERY_GUARD_METHODS.has(call.method)) return true;
  return hasSubqueryGuard(call.receiver, depth + 1);
}

// ---------------------------------------------------------------------------
// Classifier A: argument of in_() / notin_()
// ---------------------------------------------------------------------------

/**
 * First positional argument of a membership test, or null when `call` is not
 * `x.in_(...)` / `x.notin_(...)` with at least one positional argument.
 */
export function membershipArgument(call: CallExpr): SyntaxNode | null {
  if (call.func.kind !== "AttributeAccess") return null;
  if (!MEMBERSHIP_METHODS.has(call.func.attr)) return null;
  return call.args[0] ?? null;
}

export function classifyMembershipArgument(
  arg: SyntaxNode,
  keywords: KeywordTable = DEFAULT_KEYWORDS,
): Category | null {
  switch (arg.kind) {
    case "CallExpr":
      if (isQueryChain(arg)) return "DirectQueryInClause";
      if (hasSubqueryGuard(arg)) return "SubqueryAlreadyGuarded";
      return null;

    case "NameRef":
      return matchesKeywords(arg.id, keywords.QueryVariableInClause)
        ? "QueryVariableInClause"
        : null;

    case "AttributeAccess":
      return matchesKeywords(arg.attr, keywords.QueryAttributeInClause)
        ? "QueryAttributeInClause"
        : null;

    case "CompareExpr":
    case "Literal":
    case "Other":
      return null;
  }
}

// ---------------------------------------------------------------------------
// Classifier B: right-hand operand of a comparison
// ---------------------------------------------------------------------------

export function classifyComparisonOperand(
  comparator: SyntaxNode,
  keywords: KeywordTable = DEFAULT_KEYWORDS,
): Category | null {
  switch (comparator.kind) {
    case "CallExpr":
      return isRowChain(comparator) ? "RowLikeResult" : null;

    case "NameRef":
      return matchesKeywords(comparator.id, keywords.PossibleRowVariable)
        ? "PossibleRowVariable"
        : null;

    case "AttributeAccess":
      return matchesKeywords(comparator.attr, keywords.PossibleRowAttribute)
        ? "PossibleRowAttribute"
        : null;

    case "CompareExpr":
    case "Literal":
    case "Other":
      return null;
  }
}
