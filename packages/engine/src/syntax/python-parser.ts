/**
 * Python parser.
 *
 * Parses source with tree-sitter-python and lowers the concrete tree into the
 * SyntaxNode variant. Parentheses are transparent and comments are dropped,
 * so `(session.query(X))` lowers to the same shape as `session.query(X)`.
 */

import Parser from "tree-sitter";
import Python from "tree-sitter-python";

import { logger } from "../logger.js";
import { isComparisonOperator, type ComparisonOperator, type SyntaxNode } from "./nodes.js";

type TreeNode = Parser.SyntaxNode;

// ============================================
// Types
// ============================================

export type ParseOutcome =
  | { ok: true; tree: SyntaxNode }
  | { ok: false; cause: string; line?: number };

// ============================================
// Parser State
// ============================================

/** Cached parser, created on first use. */
let cachedParser: Parser | null = null;

// tree-sitter rejects string input longer than its default buffer.
const MIN_BUFFER_SIZE = 64 * 1024;

// Deepest nesting lowered before a file is rejected. Well above the chain
// bound the classifiers inspect, well below the JS call stack.
const MAX_LOWER_DEPTH = 800;

// Python 2 forms the grammar still accepts.
const LEGACY_TYPES = new Set(["print_statement", "exec_statement", "<>"]);

const LITERAL_TYPES = new Set([
  "integer",
  "float",
  "true",
  "false",
  "none",
  "ellipsis",
]);

/**
 * Get the shared tree-sitter parser configured for Python.
 *
 * @throws Error if the grammar cannot be loaded
 */
export function getPythonParser(): Parser {
  if (!cachedParser) {
    const parser = new Parser();
    parser.setLanguage(Python);
    cachedParser = parser;
    logger.debug("tree-sitter-python parser ready");
  }
  return cachedParser;
}

/**
 * Drop the cached parser so the next parse builds a fresh one.
 */
export function resetPythonParser(): void {
  cachedParser = null;
}

// ============================================
// Public API
// ============================================

/**
 * Parse Python source into a lowered syntax tree.
 *
 * Never throws: syntax errors, Python 2 statements, nesting deeper than
 * the lowering bound and grammar loading problems come back as
 * `{ ok: false }` with a cause.
 */
export function parsePython(source: string): ParseOutcome {
  let root: TreeNode;
  try {
    const parser = getPythonParser();
    const bufferSize = Math.max(MIN_BUFFER_SIZE, source.length * 2 + 1);
    root = parser.parse(source, undefined, { bufferSize }).rootNode;
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    return { ok: false, cause: `parser failure: ${message}` };
  }

  const problem = findSyntaxProblem(root);
  if (problem) {
    const line = problem.startPosition.row + 1;
    return { ok: false, cause: `${describeProblem(problem)} at line ${line}`, line };
  }

  try {
    return { ok: true, tree: lower(root, 0) };
  } catch (err: unknown) {
    if (err instanceof NestingTooDeepError) {
      return { ok: false, cause: `nesting too deep at line ${err.line}`, line: err.line };
    }
    const message = err instanceof Error ? err.message : String(err);
    return { ok: false, cause: `parser failure: ${message}` };
  }
}

// ============================================
// Internal Functions
// ============================================

class NestingTooDeepError extends Error {
  constructor(readonly line: number) {
    super(`nesting deeper than ${MAX_LOWER_DEPTH} levels`);
    this.name = "NestingTooDeepError";
  }
}

/**
 * First ERROR node, zero-width (missing) token or Python 2 form in document
 * order.
 */
function findSyntaxProblem(root: TreeNode): TreeNode | null {
  const stack: TreeNode[] = [root];
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;
    if (node.type === "ERROR" || LEGACY_TYPES.has(node.type)) return node;
    if (node !== root && node.startIndex === node.endIndex) return node;
    const children = node.children;
    for (let i = children.length - 1; i >= 0; i--) stack.push(children[i]);
  }
  return null;
}

function describeProblem(node: TreeNode): string {
  if (node.type === "ERROR") return "invalid syntax";
  if (LEGACY_TYPES.has(node.type)) return `invalid syntax (Python 2 '${node.type}')`;
  return `missing '${node.type}'`;
}

function lineOf(node: TreeNode): number {
  return node.startPosition.row + 1;
}

function expressionChildren(node: TreeNode): TreeNode[] {
  return node.namedChildren.filter((child) => child.type !== "comment");
}

function unwrapParens(node: TreeNode): TreeNode {
  let current = node;
  while (current.type === "parenthesized_expression") {
    const inner = expressionChildren(current)[0];
    if (!inner) break;
    current = inner;
  }
  return current;
}

function hasInterpolation(node: TreeNode): boolean {
  return node.namedChildren.some((child) => child.type === "interpolation");
}

function lower(raw: TreeNode, depth: number): SyntaxNode {
  const node = unwrapParens(raw);
  const line = lineOf(node);
  if (depth > MAX_LOWER_DEPTH) throw new NestingTooDeepError(line);
  const source = node.text;
  const next = depth + 1;

  switch (node.type) {
    case "identifier":
      return { kind: "NameRef", id: source, line, source };

    case "attribute": {
      const object = node.childForFieldName("object");
      const attribute = node.childForFieldName("attribute");
      if (!object || !attribute) break;
      return { kind: "AttributeAccess", value: lower(object, next), attr: attribute.text, line, source };
    }

    case "call": {
      const func = node.childForFieldName("function");
      const argumentsNode = node.childForFieldName("arguments");
      if (!func) break;
      const args: SyntaxNode[] = [];
      const keywords: SyntaxNode[] = [];
      if (argumentsNode?.type === "argument_list") {
        for (const arg of expressionChildren(argumentsNode)) {
          if (arg.type === "keyword_argument" || arg.type === "dictionary_splat") {
            keywords.push(lower(arg, next));
          } else {
            args.push(lower(arg, next));
          }
        }
      } else if (argumentsNode) {
        // f(x for x in xs)
        args.push(lower(argumentsNode, next));
      }
      return { kind: "CallExpr", func: lower(func, next), args, keywords, line, source };
    }

    case "comparison_operator":
      return lowerComparison(node, line, source, next);

    case "string":
      if (!hasInterpolation(node)) {
        return { kind: "Literal", syntaxType: node.type, value: source, line, source };
      }
      break;

    default:
      if (LITERAL_TYPES.has(node.type)) {
        return { kind: "Literal", syntaxType: node.type, value: source, line, source };
      }
  }

  return {
    kind: "Other",
    syntaxType: node.type,
    children: expressionChildren(node).map((child) => lower(child, next)),
    line,
    source,
  };
}

function lowerComparison(node: TreeNode, line: number, source: string, depth: number): SyntaxNode {
  const operands: SyntaxNode[] = [];
  const ops: ComparisonOperator[] = [];

  for (const child of node.children) {
    const token = child.type;
    if (token === "comment") continue;
    if (isComparisonOperator(token)) {
      ops.push(token);
    } else {
      operands.push(lower(child, depth));
    }
  }

  const [left, ...comparators] = operands;
  if (!left || comparators.length !== ops.length) {
    return { kind: "Other", syntaxType: node.type, children: operands, line, source };
  }

  return { kind: "CompareExpr", left, ops, comparators, line, source };
}
