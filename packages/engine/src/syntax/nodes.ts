/**
 * Syntax tree model.
 *
 * The parser lowers a concrete tree-sitter tree into this closed variant so
 * classifiers and the renderer can match exhaustively on `kind` instead of
 * probing node shapes.
 */

export type ComparisonOperator =
  | "=="
  | "!="
  | "<"
  | "<="
  | ">"
  | ">="
  | "in"
  | "not in"
  | "is"
  | "is not";

export const COMPARISON_OPERATORS: ReadonlySet<string> = new Set<ComparisonOperator>([
  "==", "!=", "<", "<=", ">", ">=", "in", "not in", "is", "is not",
]);

export function isComparisonOperator(value: string): value is ComparisonOperator {
  return COMPARISON_OPERATORS.has(value);
}

interface NodeBase {
  /** 1-based line of the node's first character. */
  line: number;
  /** Exact source text, present when the node was lowered from a file. */
  source?: string;
}

export interface NameRef extends NodeBase {
  kind: "NameRef";
  id: string;
}

export interface AttributeAccess extends NodeBase {
  kind: "AttributeAccess";
  value: SyntaxNode;
  attr: string;
}

export interface CallExpr extends NodeBase {
  kind: "CallExpr";
  func: SyntaxNode;
  /** Positional arguments, including `*splat` arguments. */
  args: SyntaxNode[];
  /** Keyword arguments and `**splat` arguments. */
  keywords: SyntaxNode[];
}

export interface CompareExpr extends NodeBase {
  kind: "CompareExpr";
  left: SyntaxNode;
  ops: ComparisonOperator[];
  comparators: SyntaxNode[];
}

export interface Literal extends NodeBase {
  kind: "Literal";
  syntaxType: string;
  value: string;
}

export interface Other extends NodeBase {
  kind: "Other";
  syntaxType: string;
  children: SyntaxNode[];
}

export type SyntaxNode =
  | NameRef
  | AttributeAccess
  | CallExpr
  | CompareExpr
  | Literal
  | Other;

export type SyntaxKind = SyntaxNode["kind"];

/** Children of a node in traversal order. */
export function childrenOf(node: SyntaxNode): SyntaxNode[] {
  switch (node.kind) {
    case "NameRef":
    case "Literal":
      return [];
    case "AttributeAccess":
      return [node.value];
    case "CallExpr":
      return [node.func, ...node.args, ...node.keywords];
    case "CompareExpr":
      return [node.left, ...node.comparators];
    case "Other":
      return node.children;
  }
}
