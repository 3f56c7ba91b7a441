// src/core/elaborate/expr.ts
// Sorted expression tree handed to the solver

import type { Sort } from "../sorts/sort";

export type ElaboratedExpression = {
  /** Operator, variable name, numeral text, or bound name of a let binding */
  readonly name: string;
  readonly args: readonly ElaboratedExpression[];
  readonly sort: Sort;
};

export function expr(name: string, args: readonly ElaboratedExpression[], sort: Sort): ElaboratedExpression {
  return { name, args, sort };
}

/** Operators whose result is Bool regardless of their arguments. */
export const BOOL_OPERATORS: ReadonlySet<string> = new Set(["and", "or", "not", "=", "<", ">", "<=", ">=", "=>"]);

export function exprToString(e: ElaboratedExpression): string {
  if (e.args.length === 0) return e.name;
  return `${e.name}(${e.args.map(exprToString).join(", ")})`;
}
