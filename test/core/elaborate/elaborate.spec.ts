// test/core/elaborate/elaborate.spec.ts
// Tests for sort elaboration

import { describe, it, expect } from "vitest";
import { elaborate } from "../../../src/core/elaborate/elaborate";
import { exprToString } from "../../../src/core/elaborate/expr";
import { parseOne } from "../../../src/core/reader/parse";
import { scopeDefine, sortEnvEmpty, type SortEnv } from "../../../src/core/sorts/scope";
import { MalformedExpressionError } from "../../../src/outcome/errors";
import { RecordingTrace } from "../../helpers/recordingSolver";

function env(decls: Record<string, "Real" | "Bool"> = {}): SortEnv {
  let e = sortEnvEmpty();
  for (const [name, sort] of Object.entries(decls)) e = scopeDefine(e, name, sort);
  return e;
}

function elab(src: string, e: SortEnv = env(), fractionalNumerals = false) {
  return elaborate(parseOne(src).node, e, { fractionalNumerals });
}

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (e) {
    if (e instanceof MalformedExpressionError) return e.code;
    throw e;
  }
  return undefined;
}

describe("elaborate atoms", () => {
  it("gives numerals sort Real", () => {
    expect(elab("1")).toEqual({ name: "1", args: [], sort: "Real" });
  });

  it("normalizes a .0 numeral", () => {
    expect(elab("3.0")).toEqual({ name: "3", args: [], sort: "Real" });
  });

  it("reads fractional numerals when enabled", () => {
    expect(elab("0.75", env(), true)).toEqual({ name: "3/4", args: [], sort: "Real" });
  });

  it("reads fractional numerals when the option is left out", () => {
    expect(elaborate(parseOne("0.5").node, env())).toEqual({ name: "1/2", args: [], sort: "Real" });
  });

  it("rejects fractional numerals when disabled", () => {
    expect(codeOf(() => elab("0.75"))).toBe("E0103");
  });

  it("looks variables up in the environment", () => {
    expect(elab("x", env({ x: "Real" }))).toEqual({ name: "x", args: [], sort: "Real" });
    expect(elab("p", env({ p: "Bool" })).sort).toBe("Bool");
  });

  it("treats true and false as Bool literals", () => {
    expect(elab("true")).toEqual({ name: "true", args: [], sort: "Bool" });
  });

  it("fails on an undeclared variable", () => {
    expect(() => elab("x")).toThrow(MalformedExpressionError);
    expect(codeOf(() => elab("x"))).toBe("E0101");
  });

  it("fails on an undeclared variable inside an application", () => {
    expect(codeOf(() => elab("(= x 1)"))).toBe("E0101");
  });
});

describe("elaborate applications", () => {
  it("sorts relational and logical operators as Bool", () => {
    const e = env({ x: "Real", p: "Bool", q: "Bool" });
    for (const op of ["=", "<", ">", "<=", ">="]) {
      expect(elab(`(${op} x 1)`, e).sort).toBe("Bool");
    }
    expect(elab("(and p q)", e).sort).toBe("Bool");
    expect(elab("(or p q)", e).sort).toBe("Bool");
    expect(elab("(not p)", e).sort).toBe("Bool");
    expect(elab("(=> p q)", e).sort).toBe("Bool");
  });

  it("gives other operators the sort of their last argument", () => {
    const e = env({ x: "Real", p: "Bool" });
    expect(elab("(+ x 1)", e).sort).toBe("Real");
    expect(elab("(ite p x 2)", e).sort).toBe("Real");
    expect(elab("(ite p true p)", e).sort).toBe("Bool");
  });

  it("keeps arguments in order", () => {
    const e = elab("(- x (* 2 y) 1.0)", env({ x: "Real", y: "Real" }));
    expect(exprToString(e)).toBe("-(x, *(2, y), 1)");
  });

  it("allows a Bool operator without arguments", () => {
    expect(elab("(and)")).toEqual({ name: "and", args: [], sort: "Bool" });
  });

  it("rejects another operator without arguments", () => {
    expect(codeOf(() => elab("(+)"))).toBe("E0102");
  });

  it("rejects the empty list", () => {
    expect(codeOf(() => elab("()"))).toBe("E0001");
  });

  it("rejects a list in operator position", () => {
    expect(codeOf(() => elab("((f) 1)"))).toBe("E0001");
  });
});

describe("elaborate let", () => {
  it("elaborates a let with no prior declarations", () => {
    const e = elab("(let ((x 1)) (= x 1))");
    expect(e.sort).toBe("Bool");
    expect(e).toEqual({
      name: "let",
      args: [
        { name: "x", args: [{ name: "1", args: [], sort: "Real" }], sort: "Real" },
        {
          name: "=",
          args: [
            { name: "x", args: [], sort: "Real" },
            { name: "1", args: [], sort: "Real" },
          ],
          sort: "Bool",
        },
      ],
      sort: "Bool",
    });
  });

  it("takes the sort of its body", () => {
    expect(elab("(let ((b (> 1 0))) b)").sort).toBe("Bool");
    expect(elab("(let ((b (> 1 0))) 5)").sort).toBe("Real");
  });

  it("does not let sibling bindings see each other", () => {
    expect(codeOf(() => elab("(let ((x 1) (y x)) y)"))).toBe("E0101");
  });

  it("resolves binding values in the enclosing scope", () => {
    // the inner x is Bool, but its value refers to the outer Real x
    const e = elab("(let ((x (> x 0))) (and x true))", env({ x: "Real" }));
    expect(exprToString(e)).toBe("let(x(>(x, 0)), and(x, true))");
    expect(e.args[0]?.sort).toBe("Bool");
  });

  it("does not leak bindings out of the body", () => {
    expect(codeOf(() => elab("(and (let ((z 1)) (= z 1)) (= z 1))"))).toBe("E0101");
  });

  it("lets nested lets see outer bindings", () => {
    const e = elab("(let ((a 1)) (let ((b (+ a 1))) (< a b)))");
    expect(exprToString(e)).toBe("let(a(1), let(b(+(a, 1)), <(a, b)))");
  });

  it("rejects a let with the wrong number of parts", () => {
    expect(codeOf(() => elab("(let ((x 1)))"))).toBe("E0102");
    expect(codeOf(() => elab("(let ((x 1)) x x)"))).toBe("E0102");
  });

  it("rejects malformed bindings", () => {
    expect(codeOf(() => elab("(let (x 1) x)"))).toBe("E0001");
    expect(codeOf(() => elab("(let ((x)) x)"))).toBe("E0001");
    expect(codeOf(() => elab("(let (((x) 1)) 1)"))).toBe("E0001");
    expect(codeOf(() => elab("(let x x)"))).toBe("E0001");
  });

  it("traces each binding", () => {
    const trace = new RecordingTrace();
    elaborate(parseOne("(let ((a 1) (b 2.0)) (< a b))").node, env(), { trace });
    expect(trace.events).toEqual([
      { tag: "E_Binding", name: "a", value: "1" },
      { tag: "E_Binding", name: "b", value: "2" },
    ]);
  });
});
