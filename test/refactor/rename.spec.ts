// test/refactor/rename.spec.ts
// Tests for renaming variables across scripts

import { describe, it, expect } from "vitest";
import { SourceRegistry } from "../../src/refactor/registry";
import {
  applyEdits,
  declaredGlobals,
  findReferences,
  isValidSymbolName,
  renameSymbol,
  resolveSymbolAt,
} from "../../src/refactor/rename";
import { RenameError } from "../../src/outcome/errors";

const A = "(declare-fun x () Real)\n(assert (> x 0))\n";
const B = "(assert (let ((x 1)) (= x 2)))\n(assert (< x 5))\n";

function registry(): SourceRegistry {
  return new SourceRegistry([
    ["a.smt2", A],
    ["b.smt2", B],
  ]);
}

describe("resolveSymbolAt", () => {
  it("resolves a declaration and its uses to the same global", () => {
    const reg = registry();
    expect(resolveSymbolAt(reg, "a.smt2", 13)).toEqual({ kind: "global", name: "x" });
    expect(resolveSymbolAt(reg, "b.smt2", 42)).toEqual({ kind: "global", name: "x" });
  });

  it("resolves a let-bound use to its binding", () => {
    const target = { kind: "local", name: "x", source: "b.smt2", offset: 15 };
    expect(resolveSymbolAt(registry(), "b.smt2", 24)).toEqual(target);
    expect(resolveSymbolAt(registry(), "b.smt2", 15)).toEqual(target);
  });

  it("finds nothing on operators and numerals", () => {
    const reg = registry();
    expect(resolveSymbolAt(reg, "a.smt2", 1)).toBeUndefined();
    expect(resolveSymbolAt(reg, "a.smt2", 33)).toBeUndefined();
    expect(resolveSymbolAt(reg, "a.smt2", 37)).toBeUndefined();
  });
});

describe("findReferences", () => {
  it("lists a global in every source, skipping shadowed uses", () => {
    expect(findReferences(registry(), { kind: "global", name: "x" })).toEqual([
      { source: "a.smt2", start: 13, end: 14 },
      { source: "a.smt2", start: 35, end: 36 },
      { source: "b.smt2", start: 42, end: 43 },
    ]);
  });

  it("lists a local only inside its let", () => {
    expect(findReferences(registry(), { kind: "local", name: "x", source: "b.smt2", offset: 15 })).toEqual([
      { source: "b.smt2", start: 15, end: 16 },
      { source: "b.smt2", start: 24, end: 25 },
    ]);
  });
});

describe("renameSymbol", () => {
  it("renames a global across sources", () => {
    const reg = registry();
    const result = renameSymbol(reg, "a.smt2", 13, "y");

    expect(result.symbol).toEqual({ kind: "global", name: "x" });
    expect(result.changes.get("a.smt2")).toEqual([
      { start: 13, end: 14, newText: "y" },
      { start: 35, end: 36, newText: "y" },
    ]);
    expect(reg.get("a.smt2")).toBe("(declare-fun y () Real)\n(assert (> y 0))\n");
    expect(reg.get("b.smt2")).toBe("(assert (let ((x 1)) (= x 2)))\n(assert (< y 5))\n");
  });

  it("renames a let binding without touching the global", () => {
    const reg = registry();
    renameSymbol(reg, "b.smt2", 24, "k");
    expect(reg.get("b.smt2")).toBe("(assert (let ((k 1)) (= k 2)))\n(assert (< x 5))\n");
    expect(reg.get("a.smt2")).toBe(A);
  });

  it("renames the global inside a binding value that shadows it", () => {
    const reg = new SourceRegistry([["s", "(declare-fun x () Real)\n(assert (let ((x (+ x 1))) (> x 0)))"]]);
    renameSymbol(reg, "s", 13, "z");
    expect(reg.get("s")).toBe("(declare-fun z () Real)\n(assert (let ((x (+ z 1))) (> x 0)))");
  });

  it("leaves comments alone", () => {
    const reg = new SourceRegistry([["s", "(declare-fun x () Real) ; x is positive\n(assert (> x 0))"]]);
    renameSymbol(reg, "s", 13, "w");
    expect(reg.get("s")).toBe("(declare-fun w () Real) ; x is positive\n(assert (> w 0))");
  });

  it("rejects an invalid name", () => {
    expect(() => renameSymbol(registry(), "a.smt2", 13, "1abc")).toThrow(RenameError);
    expect(() => renameSymbol(registry(), "a.smt2", 13, "a b")).toThrow(RenameError);
  });

  it("rejects a name that is already declared", () => {
    const reg = new SourceRegistry([["s", "(declare-fun x () Real)\n(declare-fun y () Real)"]]);
    expect(() => renameSymbol(reg, "s", 13, "y")).toThrow("'y' is already declared");
    expect(reg.get("s")).toBe("(declare-fun x () Real)\n(declare-fun y () Real)");
  });

  it("rejects a global rename that a let binding would capture", () => {
    const text = "(declare-fun x () Real)\n(assert (let ((y 1)) (> x y)))";
    const reg = new SourceRegistry([["s", text]]);
    expect(() => renameSymbol(reg, "s", 13, "y")).toThrow(
      "renaming to 'y' would change what 'x' at offset 48 in s refers to"
    );
    expect(reg.get("s")).toBe(text);
  });

  it("rejects a local rename that would hide a global", () => {
    const text = "(declare-fun x () Real)\n(assert (let ((y 1)) (> x y)))";
    const reg = new SourceRegistry([["s", text]]);
    expect(() => renameSymbol(reg, "s", 39, "x")).toThrow(
      "renaming to 'x' would change what 'x' at offset 48 in s refers to"
    );
    expect(reg.get("s")).toBe(text);
  });

  it("rejects a local rename that would hide an outer binding", () => {
    const reg = new SourceRegistry([["s", "(assert (let ((a 1)) (let ((b 2)) (> a b))))"]]);
    expect(() => renameSymbol(reg, "s", 28, "a")).toThrow(
      "renaming to 'a' would change what 'a' at offset 37 in s refers to"
    );
  });

  it("rejects a rename that would bind a free name", () => {
    const reg = new SourceRegistry([["s", "(declare-fun x () Real)\n(assert (> x w))"]]);
    expect(() => renameSymbol(reg, "s", 13, "w")).toThrow(RenameError);
  });

  it("keeps offsets after a wide character in a comment", () => {
    const text = "; \u{1F600}\n(declare-fun x () Real)\n(assert (> x 0))\n";
    const reg = new SourceRegistry([["s", text]]);
    const at = text.indexOf("x");
    expect(resolveSymbolAt(reg, "s", at)).toEqual({ kind: "global", name: "x" });
    renameSymbol(reg, "s", at, "y");
    expect(reg.get("s")).toBe("; \u{1F600}\n(declare-fun y () Real)\n(assert (> y 0))\n");
  });

  it("rejects an offset with no symbol", () => {
    expect(() => renameSymbol(registry(), "a.smt2", 1, "y")).toThrow("no renameable symbol at offset 1 in a.smt2");
  });

  it("rejects an unknown source", () => {
    expect(() => renameSymbol(registry(), "c.smt2", 0, "y")).toThrow("unknown source c.smt2");
  });
});

describe("applyEdits", () => {
  it("applies edits given in any order", () => {
    expect(
      applyEdits("abcdef", [
        { start: 4, end: 6, newText: "Z" },
        { start: 0, end: 1, newText: "AA" },
      ])
    ).toBe("AAbcdZ");
  });

  it("rejects overlapping edits", () => {
    expect(() =>
      applyEdits("abcdef", [
        { start: 0, end: 3, newText: "x" },
        { start: 2, end: 4, newText: "y" },
      ])
    ).toThrow(RenameError);
  });

  it("rejects edits outside the text", () => {
    expect(() => applyEdits("abc", [{ start: 2, end: 5, newText: "x" }])).toThrow("edit 2..5 is outside the source");
  });
});

describe("helpers", () => {
  it("collects declared globals", () => {
    expect([...declaredGlobals(registry())]).toEqual(["x"]);
  });

  it("validates symbol names", () => {
    expect(isValidSymbolName("y2")).toBe(true);
    expect(isValidSymbolName("|a b|")).toBe(true);
    expect(isValidSymbolName("")).toBe(false);
    expect(isValidSymbolName("7")).toBe(false);
    expect(isValidSymbolName("(x)")).toBe(false);
  });
});
