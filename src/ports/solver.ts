import type { ElaboratedExpression } from "../core/elaborate/expr";
import type { Sort } from "../core/sorts/sort";

export type Verdict = "Satisfiable" | "Unsatisfiable" | "Unknown";

export interface CheckOptions {
  /** Ask the back end for a model when the verdict is Satisfiable */
  produceModel?: boolean;
}

export interface CheckResult {
  verdict: Verdict;
  /** Declared name → printed value; never inspected by the driver */
  model?: ReadonlyMap<string, string>;
}

/**
 * Solver port interface.
 * Constraints accumulate; there is no retraction.
 */
export interface SolverPort {
  declareVariable(name: string, sort: Sort): void;

  addAssertion(expression: ElaboratedExpression): void;

  check(options: CheckOptions): Promise<CheckResult>;
}

export function verdictText(verdict: Verdict): "sat" | "unsat" | "unknown" {
  switch (verdict) {
    case "Satisfiable": return "sat";
    case "Unsatisfiable": return "unsat";
    case "Unknown": return "unknown";
  }
}
