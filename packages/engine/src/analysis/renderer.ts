/**
 * Expression renderer.
 *
 * Turns a syntax node back into readable text for reports. The exact source
 * text is used when the node has it; otherwise a short structural rendering
 * is built from the node's shape. Neither path throws.
 */

import type { SyntaxNode } from "../syntax/nodes.js";

export type RenderMode = "source" | "structural";

export const RENDER_MODES: readonly RenderMode[] = ["source", "structural"];

const MAX_RENDERED_ARGS = 2;
const MAX_RENDER_DEPTH = 64;

export function isRenderMode(value: string): value is RenderMode {
  return RENDER_MODES.some((mode) => mode === value);
}

export function renderNode(node: SyntaxNode, mode: RenderMode = "source"): string {
  if (mode === "source" && node.source !== undefined && node.source.length > 0) {
    return node.source;
  }
  return renderStructural(node);
}

/**
 * Structural rendering. Calls show at most two arguments and comparisons
 * show only their first operator/comparator pair.
 */
export function renderStructural(node: SyntaxNode, depth = 0): string {
  if (depth >= MAX_RENDER_DEPTH) return "...";
  const text = renderShape(node, depth);
  return text.length > 0 ? text : placeholder(node);
}

function placeholder(node: SyntaxNode): string {
  return node.kind === "Other" ? `<${node.syntaxType}>` : `<${node.kind}>`;
}

function renderShape(node: SyntaxNode, depth: number): string {
  const next = depth + 1;

  switch (node.kind) {
    case "NameRef":
      return node.id;

    case "AttributeAccess":
      return `${renderStructural(node.value, next)}.${node.attr}`;

    case "CallExpr": {
      let args = node.args
        .slice(0, MAX_RENDERED_ARGS)
        .map((arg) => renderStructural(arg, next))
        .join(", ");
      if (node.args.length > MAX_RENDERED_ARGS) args += ", ...";
      return `${renderStructural(node.func, next)}(${args})`;
    }

    case "CompareExpr": {
      const left = renderStructural(node.left, next);
      const op = node.ops[0];
      const first = node.comparators[0];
      if (op === undefined || first === undefined) return left;
      return `${left} ${op} ${renderStructural(first, next)}`;
    }

    case "Literal":
    case "Other":
      return placeholder(node);
  }
}
