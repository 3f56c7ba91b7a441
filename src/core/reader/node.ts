// src/core/reader/node.ts
// Generic parse tree: an atom (a view of the source text) or a list of nodes

import type { Span } from "./span";

export type Atom = { tag: "Atom"; text: string; start: number; end: number };
export type List = { tag: "List"; items: GenericNode[]; start: number; end: number };

export type GenericNode = Atom | List;

export function atom(text: string, start = 0, end = start + text.length): Atom {
  return { tag: "Atom", text, start, end };
}

export function list(items: GenericNode[], start = 0, end = start): List {
  return { tag: "List", items, start, end };
}

export function nodeSpan(node: GenericNode): Span {
  return { start: node.start, end: node.end };
}

export function nodeToString(node: GenericNode): string {
  switch (node.tag) {
    case "Atom": return node.text;
    case "List": return `(${node.items.map(nodeToString).join(" ")})`;
  }
}

/** The operator atom heading a list, if any. */
export function headAtom(node: List): Atom | undefined {
  const head = node.items[0];
  return head?.tag === "Atom" ? head : undefined;
}

/** Structural equality, ignoring source offsets. */
export function nodeEq(a: GenericNode, b: GenericNode): boolean {
  switch (a.tag) {
    case "Atom": return b.tag === "Atom" && a.text === b.text;
    case "List": {
      if (b.tag !== "List" || a.items.length !== b.items.length) return false;
      for (let i = 0; i < a.items.length; i++) {
        const x = a.items[i];
        const y = b.items[i];
        if (!x || !y || !nodeEq(x, y)) return false;
      }
      return true;
    }
  }
}
