/**
 * Z3 Solver Adapter
 *
 * Implements SolverPort on top of the z3-solver WebAssembly build.
 * Elaborated expressions are translated into Z3 terms; `let` is translated
 * by substitution, binding values in the enclosing scope.
 */

import { init } from "z3-solver";
import type { Arith, Bool, Context, Solver } from "z3-solver";
import type { ElaboratedExpression } from "../core/elaborate/expr";
import { looksNumeric } from "../core/elaborate/numeral";
import type { Sort } from "../core/sorts/sort";
import type { SolverConfig } from "../core/config/config";
import type { CheckOptions, CheckResult, SolverPort, Verdict } from "../ports/solver";
import { SolverBackendError } from "../outcome/errors";

type Term =
  | { sort: "Bool"; expr: Bool }
  | { sort: "Real"; expr: Arith };

type TermScope = ReadonlyMap<string, Term>;

type Z3Api = Awaited<ReturnType<typeof init>>;

// One WebAssembly instance per process, shared by every adapter
let api: Promise<Z3Api> | undefined;

function loadZ3(): Promise<Z3Api> {
  api ??= init();
  return api;
}

/** Stop the Z3 worker threads. A later `create` starts a fresh instance. */
export async function releaseZ3(): Promise<void> {
  if (!api) return;
  const { em } = await api;
  api = undefined;
  em.PThread.terminateAllThreads();
}

/** Z3 symbol for a script name; surrounding pipes are quoting, not part of the name. */
export function z3SymbolName(name: string): string {
  return name.length >= 2 && name.startsWith("|") && name.endsWith("|") ? name.slice(1, -1) : name;
}

export class Z3SolverAdapter implements SolverPort {
  private readonly vars = new Map<string, Term>();

  private constructor(
    private readonly ctx: Context,
    private readonly solver: Solver
  ) {}

  static async create(config: Partial<SolverConfig> = {}): Promise<Z3SolverAdapter> {
    const { Context } = await loadZ3();
    const ctx = Context("main");
    const solver = new ctx.Solver();
    if (config.timeoutMs && config.timeoutMs > 0) {
      solver.set("timeout", config.timeoutMs);
    }
    return new Z3SolverAdapter(ctx, solver);
  }

  declareVariable(name: string, sort: Sort): void {
    const symbol = z3SymbolName(name);
    this.vars.set(
      name,
      sort === "Bool"
        ? { sort: "Bool", expr: this.ctx.Bool.const(symbol) }
        : { sort: "Real", expr: this.ctx.Real.const(symbol) }
    );
  }

  addAssertion(expression: ElaboratedExpression): void {
    this.solver.add(this.bool(this.translate(expression, this.vars), "assert"));
  }

  async check(options: CheckOptions): Promise<CheckResult> {
    const result = await this.solver.check();
    const verdict: Verdict = result === "sat" ? "Satisfiable" : result === "unsat" ? "Unsatisfiable" : "Unknown";
    if (verdict !== "Satisfiable" || !options.produceModel) return { verdict };

    const model = this.solver.model();
    const values = new Map<string, string>();
    for (const [name, term] of this.vars) {
      values.set(name, model.eval(term.expr, true).sexpr());
    }
    return { verdict, model: values };
  }

  private translate(e: ElaboratedExpression, scope: TermScope): Term {
    const { ctx } = this;

    if (e.args.length === 0) {
      if (e.name === "true" || e.name === "false") return { sort: "Bool", expr: ctx.Bool.val(e.name === "true") };
      if (looksNumeric(e.name)) return { sort: "Real", expr: ctx.Real.val(e.name) };
      const bound = scope.get(e.name);
      if (!bound) throw new SolverBackendError(`no term for variable ${e.name}`);
      return bound;
    }

    if (e.name === "let") return this.translateLet(e, scope);

    const args = e.args.map(a => this.translate(a, scope));
    switch (e.name) {
      case "and":
        return { sort: "Bool", expr: ctx.And(...args.map(a => this.bool(a, e.name))) };
      case "or":
        return { sort: "Bool", expr: ctx.Or(...args.map(a => this.bool(a, e.name))) };
      case "not":
        return { sort: "Bool", expr: ctx.Not(this.bool(this.only(args, e.name), e.name)) };
      case "=>":
        return { sort: "Bool", expr: this.implies(args.map(a => this.bool(a, e.name))) };
      case "=":
        return { sort: "Bool", expr: this.chain(args, (a, b) => this.eq(a, b)) };
      case "distinct":
        return { sort: "Bool", expr: ctx.Distinct(...args.map(a => a.expr)) };
      case "<":
        return { sort: "Bool", expr: this.chain(args, (a, b) => this.arith(a, e.name).lt(this.arith(b, e.name))) };
      case ">":
        return { sort: "Bool", expr: this.chain(args, (a, b) => this.arith(a, e.name).gt(this.arith(b, e.name))) };
      case "<=":
        return { sort: "Bool", expr: this.chain(args, (a, b) => this.arith(a, e.name).le(this.arith(b, e.name))) };
      case ">=":
        return { sort: "Bool", expr: this.chain(args, (a, b) => this.arith(a, e.name).ge(this.arith(b, e.name))) };
      case "+":
        return { sort: "Real", expr: this.fold(args, e.name, (a, b) => a.add(b)) };
      case "*":
        return { sort: "Real", expr: this.fold(args, e.name, (a, b) => a.mul(b)) };
      case "/":
        return { sort: "Real", expr: this.fold(args, e.name, (a, b) => a.div(b)) };
      case "-":
        return args.length === 1
          ? { sort: "Real", expr: this.arith(this.only(args, e.name), e.name).neg() }
          : { sort: "Real", expr: this.fold(args, e.name, (a, b) => a.sub(b)) };
      case "ite":
        return this.ite(args);
      default:
        throw new SolverBackendError(`unsupported operator ${e.name}`);
    }
  }

  private translateLet(e: ElaboratedExpression, scope: TermScope): Term {
    const body = e.args[e.args.length - 1];
    if (!body) throw new SolverBackendError("let without body");

    const inner = new Map(scope);
    for (const binding of e.args.slice(0, -1)) {
      const value = binding.args[0];
      if (!value) throw new SolverBackendError(`let binding ${binding.name} has no value`);
      inner.set(binding.name, this.translate(value, scope));
    }
    return this.translate(body, inner);
  }

  private ite(args: Term[]): Term {
    const [c, t, f] = args;
    if (args.length !== 3 || !c || !t || !f) throw new SolverBackendError("ite expects 3 arguments");
    const cond = this.bool(c, "ite");
    if (t.sort === "Bool" && f.sort === "Bool") return { sort: "Bool", expr: this.ctx.If(cond, t.expr, f.expr) };
    if (t.sort === "Real" && f.sort === "Real") return { sort: "Real", expr: this.ctx.If(cond, t.expr, f.expr) };
    throw new SolverBackendError("ite branches have different sorts");
  }

  private eq(a: Term, b: Term): Bool {
    if (a.sort === "Bool" && b.sort === "Bool") return a.expr.eq(b.expr);
    if (a.sort === "Real" && b.sort === "Real") return a.expr.eq(b.expr);
    throw new SolverBackendError(`= applied to ${a.sort} and ${b.sort}`);
  }

  private implies(args: Bool[]): Bool {
    const last = args[args.length - 1];
    if (!last) throw new SolverBackendError("=> expects arguments");
    // right associative
    return args.slice(0, -1).reduceRight<Bool>((acc, a) => this.ctx.Implies(a, acc), last);
  }

  /** Pairwise relation over neighbouring arguments, conjoined. */
  private chain(args: Term[], rel: (a: Term, b: Term) => Bool): Bool {
    const parts: Bool[] = [];
    for (let i = 0; i + 1 < args.length; i++) {
      const a = args[i];
      const b = args[i + 1];
      if (a && b) parts.push(rel(a, b));
    }
    return parts.length === 1 && parts[0] ? parts[0] : this.ctx.And(...parts);
  }

  private fold(args: Term[], op: string, f: (a: Arith, b: Arith) => Arith): Arith {
    const [first, ...rest] = args.map(a => this.arith(a, op));
    if (!first) throw new SolverBackendError(`${op} expects arguments`);
    return rest.reduce(f, first);
  }

  private only(args: Term[], op: string): Term {
    const [a] = args;
    if (args.length !== 1 || !a) throw new SolverBackendError(`${op} expects 1 argument, got ${args.length}`);
    return a;
  }

  private bool(t: Term, op: string): Bool {
    if (t.sort !== "Bool") throw new SolverBackendError(`${op} expects Bool, got ${t.sort}`);
    return t.expr;
  }

  private arith(t: Term, op: string): Arith {
    if (t.sort !== "Real") throw new SolverBackendError(`${op} expects Real, got ${t.sort}`);
    return t.expr;
  }
}
