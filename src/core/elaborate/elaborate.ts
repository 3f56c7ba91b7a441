// src/core/elaborate/elaborate.ts
// Generic tree → sorted expression, resolving names against a sort scope.

import type { Atom, GenericNode, List } from "../reader/node";
import { nodeSpan, nodeToString } from "../reader/node";
import type { SortEnv } from "../sorts/scope";
import { scopeExtend, scopeLookup } from "../sorts/scope";
import type { Sort } from "../sorts/sort";
import type { TraceSink } from "../../ports/trace";
import { MalformedExpressionError } from "../../outcome/errors";
import { BOOL_OPERATORS, expr, exprToString, type ElaboratedExpression } from "./expr";
import { looksNumeric, parseNumeral } from "./numeral";

export type ElaborateOptions = {
  fractionalNumerals?: boolean;
  trace?: TraceSink;
};

export function elaborate(node: GenericNode, env: SortEnv, options: ElaborateOptions = {}): ElaboratedExpression {
  switch (node.tag) {
    case "Atom": return elaborateAtom(node, env, options);
    case "List": return elaborateList(node, env, options);
  }
}

function elaborateAtom(node: Atom, env: SortEnv, options: ElaborateOptions): ElaboratedExpression {
  const text = node.text;

  if (looksNumeric(text)) {
    const numeral = parseNumeral(text, options);
    if (numeral === undefined) {
      throw new MalformedExpressionError("E0103", { text }, nodeSpan(node));
    }
    return expr(numeral, [], "Real");
  }

  if (text === "true" || text === "false") return expr(text, [], "Bool");

  const sort = scopeLookup(env, text);
  if (sort === undefined) {
    throw new MalformedExpressionError("E0101", { name: text }, nodeSpan(node));
  }
  return expr(text, [], sort);
}

function elaborateList(node: List, env: SortEnv, options: ElaborateOptions): ElaboratedExpression {
  const [head, ...rest] = node.items;
  if (!head) {
    throw new MalformedExpressionError("E0001", { detail: "empty list in expression position" }, nodeSpan(node));
  }
  if (head.tag !== "Atom") {
    throw new MalformedExpressionError("E0001", { detail: `operator position holds a list in ${nodeToString(node)}` }, nodeSpan(head));
  }

  if (head.text === "let") return elaborateLet(node, rest, env, options);

  const args = rest.map(arg => elaborate(arg, env, options));
  if (BOOL_OPERATORS.has(head.text)) return expr(head.text, args, "Bool");

  const last = args[args.length - 1];
  if (!last) {
    throw new MalformedExpressionError(
      "E0102",
      { form: head.text, expected: "at least 2", actual: node.items.length },
      nodeSpan(node)
    );
  }
  return expr(head.text, args, last.sort);
}

/**
 * (let ((x1 t1) (x2 t2)) T)  →  let(x1(t1), x2(t2), T)
 * Every ti sees the enclosing scope only; T sees all xi.
 */
function elaborateLet(node: List, parts: GenericNode[], env: SortEnv, options: ElaborateOptions): ElaboratedExpression {
  const [bindings, body] = parts;
  if (parts.length !== 2 || !bindings || !body) {
    throw new MalformedExpressionError("E0102", { form: "let", expected: 3, actual: node.items.length }, nodeSpan(node));
  }
  if (bindings.tag !== "List") {
    throw new MalformedExpressionError("E0001", { detail: `let bindings must be a list, got ${bindings.text}` }, nodeSpan(bindings));
  }

  const args: ElaboratedExpression[] = [];
  const binds: Array<[string, Sort]> = [];
  for (const binding of bindings.items) {
    const [name, value] = binding.tag === "List" ? binding.items : [];
    if (binding.tag !== "List" || binding.items.length !== 2 || !name || !value || name.tag !== "Atom") {
      throw new MalformedExpressionError(
        "E0001",
        { detail: `let binding must be (name value), got ${nodeToString(binding)}` },
        nodeSpan(binding)
      );
    }
    const replacement = elaborate(value, env, options);
    options.trace?.emit({ tag: "E_Binding", name: name.text, value: exprToString(replacement) });
    binds.push([name.text, replacement.sort]);
    args.push(expr(name.text, [replacement], replacement.sort));
  }

  const inner = elaborate(body, scopeExtend(env, binds), options);
  args.push(inner);
  return expr("let", args, inner.sort);
}
