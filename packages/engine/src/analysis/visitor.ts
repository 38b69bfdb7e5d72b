/**
 * Tree visitor.
 *
 * Pre-order walk over a whole lowered tree. Membership calls and comparisons
 * are classified where they are met; matching never stops the walk, so
 * patterns nested inside a matched argument are reported on their own.
 */

import { MEMBERSHIP_MARKER, type Finding } from "../schemas.js";
import { childrenOf, type CallExpr, type CompareExpr, type SyntaxNode } from "../syntax/nodes.js";
import {
  classifyComparisonOperand,
  classifyMembershipArgument,
  membershipArgument,
} from "./classifiers.js";
import { COMPARED_OPERATORS, DEFAULT_KEYWORDS, type KeywordTable } from "./heuristics.js";
import { renderNode, type RenderMode } from "./renderer.js";

export interface VisitOptions {
  keywords?: KeywordTable;
  render?: RenderMode;
}

export function visitTree(root: SyntaxNode, options: VisitOptions = {}): Finding[] {
  const keywords = options.keywords ?? DEFAULT_KEYWORDS;
  const mode = options.render ?? "source";
  const findings: Finding[] = [];

  const stack: SyntaxNode[] = [root];
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;

    if (node.kind === "CallExpr") {
      visitCall(node, keywords, mode, findings);
    } else if (node.kind === "CompareExpr") {
      visitCompare(node, keywords, mode, findings);
    }

    const children = childrenOf(node);
    for (let i = children.length - 1; i >= 0; i--) stack.push(children[i]);
  }

  return findings;
}

function visitCall(
  node: CallExpr,
  keywords: KeywordTable,
  mode: RenderMode,
  findings: Finding[],
): void {
  const arg = membershipArgument(node);
  if (!arg) return;

  const category = classifyMembershipArgument(arg, keywords);
  if (!category) return;

  findings.push({
    line: node.line,
    renderedCode: renderNode(node, mode),
    category,
    renderedArg: renderNode(arg, mode),
    comparisonMarker: MEMBERSHIP_MARKER,
  });
}

function visitCompare(
  node: CompareExpr,
  keywords: KeywordTable,
  mode: RenderMode,
  findings: Finding[],
): void {
  node.ops.forEach((op, i) => {
    if (!COMPARED_OPERATORS.has(op)) return;
    const comparator = node.comparators[i];
    if (!comparator) return;

    const category = classifyComparisonOperand(comparator, keywords);
    if (!category) return;

    findings.push({
      line: node.line,
      renderedCode: renderNode(node, mode),
      category,
      renderedArg: renderNode(comparator, mode),
      comparisonMarker: op,
    });
  });
}
