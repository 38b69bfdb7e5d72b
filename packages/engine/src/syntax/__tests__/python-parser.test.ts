import { describe, it, expect } from "vitest";
import { parsePython, resetPythonParser } from "../python-parser.js";
import { childrenOf, type SyntaxKind, type SyntaxNode } from "../nodes.js";

function parseOk(source: string): SyntaxNode {
  const result = parsePython(source);
  if (!result.ok) throw new Error(`unexpected parse failure: ${result.cause}`);
  return result.tree;
}

function collect(root: SyntaxNode, kind: SyntaxKind): SyntaxNode[] {
  const out: SyntaxNode[] = [];
  const stack = [root];
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;
    if (node.kind === kind) out.push(node);
    const children = childrenOf(node);
    for (let i = children.length - 1; i >= 0; i--) stack.push(children[i]);
  }
  return out;
}

function firstCall(source: string) {
  const call = collect(parseOk(source), "CallExpr")[0];
  if (call?.kind !== "CallExpr") throw new Error("no call found");
  return call;
}

function firstCompare(source: string) {
  const cmp = collect(parseOk(source), "CompareExpr")[0];
  if (cmp?.kind !== "CompareExpr") throw new Error("no comparison found");
  return cmp;
}

describe("parsePython", () => {
  it("lowers the module as an Other node", () => {
    const tree = parseOk("x = 1\n");
    expect(tree.kind).toBe("Other");
    expect(tree.kind === "Other" && tree.syntaxType).toBe("module");
  });

  it("parses an empty file", () => {
    const tree = parseOk("");
    expect(tree.kind === "Other" && tree.children).toEqual([]);
  });

  it("lowers identifiers and attributes", () => {
    const call = firstCall("session.query(User)\n");
    expect(call.func.kind).toBe("AttributeAccess");
    if (call.func.kind !== "AttributeAccess") return;
    expect(call.func.attr).toBe("query");
    expect(call.func.value).toMatchObject({ kind: "NameRef", id: "session" });
    expect(call.args).toHaveLength(1);
    expect(call.args[0]).toMatchObject({ kind: "NameRef", id: "User" });
  });

  it("makes parentheses transparent", () => {
    const call = firstCall("((session.query(User)))\n");
    expect(call.source).toBe("session.query(User)");
    expect(call.func.kind).toBe("AttributeAccess");
  });

  it("keeps keyword arguments out of args", () => {
    const call = firstCall("f(a, b=1, *rest, **extra)\n");
    expect(call.args.map((a) => a.kind === "Other" ? a.syntaxType : a.kind)).toEqual(["NameRef", "list_splat"]);
    expect(call.keywords.map((k) => k.kind === "Other" ? k.syntaxType : k.kind)).toEqual([
      "keyword_argument",
      "dictionary_splat",
    ]);
  });

  it("treats a bare generator argument as one positional argument", () => {
    const call = firstCall("sum(x for x in xs)\n");
    expect(call.args).toHaveLength(1);
    expect(call.args[0]).toMatchObject({ kind: "Other", syntaxType: "generator_expression" });
  });

  it("drops comments between arguments", () => {
    const call = firstCall("f(a,  # first\n  b)\n");
    expect(call.args.map((a) => a.source)).toEqual(["a", "b"]);
  });

  it("lowers chained comparisons with every operator", () => {
    const cmp = firstCompare("a < b <= c\n");
    expect(cmp.left).toMatchObject({ kind: "NameRef", id: "a" });
    expect(cmp.ops).toEqual(["<", "<="]);
    expect(cmp.comparators.map((c) => c.source)).toEqual(["b", "c"]);
  });

  it("lowers two-word operators", () => {
    expect(firstCompare("a not in b\n").ops).toEqual(["not in"]);
    expect(firstCompare("a is not None\n").ops).toEqual(["is not"]);
  });

  it("lowers literals", () => {
    const call = firstCall("f(1, 'x', None)\n");
    expect(call.args.map((a) => a.kind)).toEqual(["Literal", "Literal", "Literal"]);
  });

  it("keeps f-strings with interpolation as Other", () => {
    const call = firstCall('f(f"{name}")\n');
    expect(call.args[0]).toMatchObject({ kind: "Other", syntaxType: "string" });
  });

  it("records 1-based lines", () => {
    const cmp = firstCompare("\n\nuser.id == row\n");
    expect(cmp.line).toBe(3);
  });

  it("records the line where a multi-line call starts", () => {
    const call = firstCall("x = 1\nfoo(\n    a,\n)\n");
    expect(call.line).toBe(2);
  });

  it("keeps the exact source text of each node", () => {
    const call = firstCall("a.in_( q )\n");
    expect(call.source).toBe("a.in_( q )");
  });

  it("reports a syntax error with its line", () => {
    const result = parsePython("x = 1\ndef f(:\n    pass\n");
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.line).toBe(2);
    expect(result.cause).toMatch(/ at line 2$/);
  });

  it("rejects Python 2 statements and the <> operator", () => {
    for (const source of ['print "x"\n', 'exec "x = 1"\n', "a <> b\n"]) {
      const result = parsePython(source);
      expect(result.ok).toBe(false);
      if (result.ok) continue;
      expect(result.line).toBe(1);
      expect(result.cause).toMatch(/^invalid syntax.* at line 1$/);
    }
  });

  it("still accepts print as a function", () => {
    expect(firstCall('print("x")\n').func).toMatchObject({ kind: "NameRef", id: "print" });
  });

  it("reports deep nesting instead of overflowing the stack", () => {
    const chain = parsePython("a.in_(session.query(X)" + ".filter(y)".repeat(3000) + ")\n");
    expect(chain).toEqual({ ok: false, cause: "nesting too deep at line 1", line: 1 });

    const brackets = parsePython("x = " + "[".repeat(5000) + "]".repeat(5000) + "\n");
    expect(brackets.ok).toBe(false);
  });

  it("parses again after the cached parser is reset", () => {
    const before = firstCompare("a == b\n");
    resetPythonParser();
    const after = firstCompare("a == b\n");
    expect(after).toEqual(before);
  });
});
