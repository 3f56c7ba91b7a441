// test/core/reader/parse.spec.ts
// Tests for the parenthesized-form reader

import { describe, it, expect } from "vitest";
import { parseOne, parseAll, skipWhitespace } from "../../../src/core/reader/parse";
import { nodeToString, nodeEq, type GenericNode } from "../../../src/core/reader/node";
import { ParseError } from "../../../src/outcome/errors";

function show(nodes: GenericNode[]): string[] {
  return nodes.map(nodeToString);
}

describe("parseOne", () => {
  it("reads a bare atom up to whitespace", () => {
    const { node, next } = parseOne("foo bar");
    expect(node).toEqual({ tag: "Atom", text: "foo", start: 0, end: 3 });
    expect(next).toBe(3);
  });

  it("stops an atom at parentheses", () => {
    const { node, next } = parseOne("abc(def)");
    expect(nodeToString(node)).toBe("abc");
    expect(next).toBe(3);
  });

  it("reads nested lists with source offsets", () => {
    const { node, next } = parseOne("  (assert (> x 0)) rest");
    expect(next).toBe(18);
    expect(node.tag).toBe("List");
    if (node.tag !== "List") return;
    expect(node.start).toBe(2);
    expect(node.end).toBe(18);
    expect(node.items.map(nodeToString)).toEqual(["assert", "(> x 0)"]);
    const inner = node.items[1];
    expect(inner?.start).toBe(10);
    expect(inner?.end).toBe(17);
  });

  it("normalizes whitespace when printing", () => {
    const { node } = parseOne("(and\n\t(<  x 1)\r\n   b )");
    expect(nodeToString(node)).toBe("(and (< x 1) b)");
  });

  it("accepts the empty list", () => {
    const { node } = parseOne("()");
    expect(node).toEqual({ tag: "List", items: [], start: 0, end: 2 });
  });

  it("keeps pipe-quoted atoms verbatim, including spaces and parentheses", () => {
    const { node, next } = parseOne("|a b (c)| tail");
    expect(nodeToString(node)).toBe("|a b (c)|");
    expect(next).toBe(9);
  });

  it("ends a quoted atom at the first closing pipe", () => {
    const { node } = parseOne("(f |x\\|y|)");
    expect(node.tag).toBe("List");
    if (node.tag !== "List") return;
    expect(node.items.map(nodeToString)).toEqual(["f", "|x\\|", "y|"]);
  });

  it("does not interpret numerals or case", () => {
    const { node } = parseOne("(= X 1.0 007)");
    expect(nodeToString(node)).toBe("(= X 1.0 007)");
  });

  it("silently closes a list left open at end of input", () => {
    const { node, next } = parseOne("(assert (> x 0)");
    expect(nodeToString(node)).toBe("(assert (> x 0))");
    expect(next).toBe(15);
  });

  it("rejects a list left open at end of input in strict mode", () => {
    expect(() => parseOne("(assert (> x 0)", 0, { strictLists: true })).toThrow(ParseError);
  });

  it("returns an empty atom at end of input", () => {
    const { node, next } = parseOne("   ");
    expect(node).toEqual({ tag: "Atom", text: "", start: 3, end: 3 });
    expect(next).toBe(3);
  });

  it("starts from the given offset", () => {
    const src = "(a) (b c)";
    const first = parseOne(src);
    const second = parseOne(src, first.next);
    expect(nodeToString(second.node)).toBe("(b c)");
    expect(second.next).toBe(src.length);
  });
});

describe("parseAll", () => {
  it("reads every top-level form", () => {
    const src = "(set-logic QF_LRA)\n(declare-fun x () Real)\n(check-sat)\n";
    expect(show(parseAll(src))).toEqual(["(set-logic QF_LRA)", "(declare-fun x () Real)", "(check-sat)"]);
  });

  it("re-parses its own canonical output to the same tree", () => {
    const src = "(let ((a 1) (|b c| (+ a 2))) (and (=> p q) (<= a |b c|)))";
    const [first] = parseAll(src);
    expect(first).toBeDefined();
    if (!first) return;
    const [again] = parseAll(nodeToString(first));
    expect(again && nodeEq(first, again)).toBe(true);
  });

  it("is restartable at the boundary the reader returns", () => {
    const src = "(declare-fun x () Real) (assert (> x 0))\n(check-sat) (exit)";
    const whole = show(parseAll(src));

    const { node, next } = parseOne(src);
    const rest = src.slice(next);
    const split = [nodeToString(node), ...show(parseAll(rest))];

    expect(split).toEqual(whole);
  });

  it("skips a stray closing parenthesis at top level", () => {
    expect(show(parseAll("(a) ) (b)"))).toEqual(["(a)", "", "(b)"]);
  });
});

describe("skipWhitespace", () => {
  it("skips spaces, tabs, carriage returns and newlines only", () => {
    expect(skipWhitespace(" \t\r\nx", 0)).toBe(4);
    expect(skipWhitespace("\fx", 0)).toBe(0);
  });
});
