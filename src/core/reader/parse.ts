// src/core/reader/parse.ts
// Recursive-descent reader for parenthesized forms.
// Atoms are returned verbatim; numerals and names are interpreted later.

import type { Atom, GenericNode, List } from "./node";
import { ParseError } from "../../outcome/errors";

export type ReaderOptions = {
  /** Reject a list still open at end of input instead of closing it silently */
  strictLists?: boolean;
};

export type ParseResult = {
  node: GenericNode;
  /** Offset just past the parsed form */
  next: number;
};

export const isWhiteSpace = (c: string | undefined): boolean =>
  c === " " || c === "\t" || c === "\n" || c === "\r";

export function skipWhitespace(src: string, pos: number): number {
  while (pos < src.length && isWhiteSpace(src[pos])) pos++;
  return pos;
}

class Reader {
  pos: number;

  constructor(private readonly src: string, start: number, private readonly options: ReaderOptions) {
    this.pos = start;
  }

  token(): string | undefined {
    return this.src[this.pos];
  }

  parseExpression(): GenericNode {
    this.pos = skipWhitespace(this.src, this.pos);
    if (this.token() !== "(") return this.parseAtom();

    const start = this.pos;
    this.pos++;
    const items: GenericNode[] = [];
    while (this.token() !== undefined && this.token() !== ")") {
      items.push(this.parseExpression());
      this.pos = skipWhitespace(this.src, this.pos);
    }
    if (this.token() === ")") {
      this.pos++;
    } else if (this.options.strictLists) {
      throw new ParseError(start, { start, end: this.pos });
    }
    const node: List = { tag: "List", items, start, end: this.pos };
    return node;
  }

  parseAtom(): Atom {
    const start = this.pos;
    const quoted = this.token() === "|";
    while (this.pos < this.src.length) {
      const c = this.src[this.pos];
      if (quoted && this.pos > start && c === "|") {
        this.pos++;
        break;
      }
      if (!quoted && (isWhiteSpace(c) || c === "(" || c === ")")) break;
      this.pos++;
    }
    return { tag: "Atom", text: this.src.slice(start, this.pos), start, end: this.pos };
  }
}

/**
 * Parse one form starting at `offset`.
 * Returns the node and the offset where the remaining input begins.
 */
export function parseOne(src: string, offset = 0, options: ReaderOptions = {}): ParseResult {
  const reader = new Reader(src, offset, options);
  const node = reader.parseExpression();
  return { node, next: reader.pos };
}

/** Parse every top-level form until only whitespace remains. */
export function parseAll(src: string, options: ReaderOptions = {}): GenericNode[] {
  const out: GenericNode[] = [];
  let pos = skipWhitespace(src, 0);
  while (pos < src.length) {
    const { node, next } = parseOne(src, pos, options);
    out.push(node);
    pos = skipWhitespace(src, next);
    if (next === pos && node.tag === "Atom" && node.text === "") {
      // a stray ')' at top level yields an empty atom without consuming input
      pos++;
    }
  }
  return out;
}
