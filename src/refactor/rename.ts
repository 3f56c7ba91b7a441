// src/refactor/rename.ts
// Rename a declared variable or let-bound name across a set of scripts.
//
// A global is introduced by declare-fun in any registered source and is
// visible in every source. A let name is visible in its body only; its own
// value expressions and those of its siblings resolve in the enclosing scope.

import type { Atom, GenericNode } from "../core/reader/node";
import { headAtom } from "../core/reader/node";
import { parseAll } from "../core/reader/parse";
import { blankComments } from "../core/reader/source";
import type { Span } from "../core/reader/span";
import { spanContains, spansOverlap } from "../core/reader/span";
import type { Scope } from "../core/sorts/scope";
import { scopeEmpty, scopeExtend, scopeLookup } from "../core/sorts/scope";
import { looksNumeric } from "../core/elaborate/numeral";
import { RenameError } from "../outcome/errors";
import { SourceRegistry } from "./registry";

export type SymbolTarget =
  | { kind: "global"; name: string }
  | { kind: "local"; name: string; source: string; offset: number };

export type TextEdit = {
  start: number;
  end: number;
  newText: string;
};

export type RenameResult = {
  symbol: SymbolTarget;
  /** Edits per source name, ordered by offset */
  changes: Map<string, TextEdit[]>;
};

/** Called for every name occurrence; `target` is undefined for a name that resolves to nothing. */
type Visit = (atom: Atom, target: SymbolTarget | undefined) => void;

export function sameTarget(a: SymbolTarget, b: SymbolTarget): boolean {
  if (a.kind === "global") return b.kind === "global" && a.name === b.name;
  return b.kind === "local" && a.source === b.source && a.offset === b.offset;
}

function readSource(registry: SourceRegistry, source: string): GenericNode[] {
  const text = registry.get(source);
  if (text === undefined) throw new RenameError(`unknown source ${source}`);
  return parseAll(blankComments(text));
}

/** Names declared by declare-fun anywhere in the registry. */
export function declaredGlobals(registry: SourceRegistry): Set<string> {
  const names = new Set<string>();
  for (const source of registry.names()) {
    for (const form of readSource(registry, source)) {
      if (form.tag !== "List" || headAtom(form)?.text !== "declare-fun") continue;
      const name = form.items[1];
      if (name?.tag === "Atom") names.add(name.text);
    }
  }
  return names;
}

function walkSource(source: string, forms: GenericNode[], globals: ReadonlySet<string>, visit: Visit): void {
  const walkExpr = (node: GenericNode, scope: Scope<SymbolTarget>): void => {
    if (node.tag === "Atom") {
      const text = node.text;
      if (text === "" || looksNumeric(text)) return;
      const target: SymbolTarget | undefined =
        scopeLookup(scope, text) ?? (globals.has(text) ? { kind: "global", name: text } : undefined);
      visit(node, target);
      return;
    }

    const [head, bindings, body] = node.items;
    if (!head) return;

    if (head.tag === "Atom" && head.text === "let" && node.items.length === 3 && bindings?.tag === "List" && body) {
      const binds: Array<[string, SymbolTarget]> = [];
      for (const binding of bindings.items) {
        const [name, value] = binding.tag === "List" ? binding.items : [];
        if (name?.tag !== "Atom") continue;
        const target: SymbolTarget = { kind: "local", name: name.text, source, offset: name.start };
        visit(name, target);
        if (value) walkExpr(value, scope);
        binds.push([name.text, target]);
      }
      walkExpr(body, scopeExtend(scope, binds));
      return;
    }

    // an operator atom is not a variable reference
    const args = head.tag === "Atom" ? node.items.slice(1) : node.items;
    for (const arg of args) walkExpr(arg, scope);
  };

  for (const form of forms) {
    if (form.tag !== "List") continue;
    const [, first] = form.items;
    switch (headAtom(form)?.text) {
      case "declare-fun":
        if (first?.tag === "Atom") visit(first, { kind: "global", name: first.text });
        break;
      case "assert":
        if (first) walkExpr(first, scopeEmpty());
        break;
      default:
        break;
    }
  }
}

/** The symbol whose declaration or reference covers `offset`, if any. */
export function resolveSymbolAt(registry: SourceRegistry, source: string, offset: number): SymbolTarget | undefined {
  const forms = readSource(registry, source);
  const globals = declaredGlobals(registry);
  let found: SymbolTarget | undefined;
  walkSource(source, forms, globals, (atom, target) => {
    if (!found && target && spanContains(atom, offset)) found = target;
  });
  return found;
}

/** Declaration and reference spans of `target`, by source then offset. */
export function findReferences(registry: SourceRegistry, target: SymbolTarget): Span[] {
  const globals = declaredGlobals(registry);
  const sources = target.kind === "global" ? registry.names() : [target.source];
  const spans: Span[] = [];
  for (const source of sources) {
    const found: Span[] = [];
    walkSource(source, readSource(registry, source), globals, (atom, t) => {
      if (t && sameTarget(t, target)) found.push({ source, start: atom.start, end: atom.end });
    });
    found.sort((a, b) => a.start - b.start);
    spans.push(...found);
  }
  return spans;
}

/** Apply non-overlapping edits in one pass, last edit first. */
export function applyEdits(text: string, edits: readonly TextEdit[]): string {
  const sorted = [...edits].sort((a, b) => a.start - b.start);
  for (let i = 0; i < sorted.length; i++) {
    const cur = sorted[i];
    if (!cur) continue;
    if (cur.start < 0 || cur.end > text.length || cur.start > cur.end) {
      throw new RenameError(`edit ${cur.start}..${cur.end} is outside the source`, { start: cur.start, end: cur.end });
    }
    const prev = sorted[i - 1];
    if (prev && spansOverlap(prev, cur)) {
      throw new RenameError(`edits ${prev.start}..${prev.end} and ${cur.start}..${cur.end} overlap`, { start: cur.start, end: cur.end });
    }
  }

  let out = text;
  for (let i = sorted.length - 1; i >= 0; i--) {
    const e = sorted[i];
    if (e) out = out.slice(0, e.start) + e.newText + out.slice(e.end);
  }
  return out;
}

function shiftOffset(offset: number, edits: readonly TextEdit[]): number {
  let shifted = offset;
  for (const e of edits) {
    if (e.end <= offset) shifted += e.newText.length - (e.end - e.start);
  }
  return shifted;
}

/** What an occurrence should resolve to once `symbol` is called `newName`. */
function renamedTarget(
  t: SymbolTarget | undefined,
  symbol: SymbolTarget,
  newName: string,
  edits: readonly TextEdit[]
): SymbolTarget | undefined {
  if (!t) return undefined;
  const name = sameTarget(t, symbol) ? newName : t.name;
  if (t.kind === "global") return { kind: "global", name };
  return { kind: "local", name, source: t.source, offset: shiftOffset(t.offset, edits) };
}

function resolutions(registry: SourceRegistry, source: string): Array<{ atom: Atom; target: SymbolTarget | undefined }> {
  const out: Array<{ atom: Atom; target: SymbolTarget | undefined }> = [];
  walkSource(source, readSource(registry, source), declaredGlobals(registry), (atom, target) => {
    out.push({ atom, target });
  });
  return out;
}

/**
 * Every name must resolve after the rename to what it resolved to before.
 * Throws when `newName` would be captured by, or would capture, another binding.
 */
function checkCaptures(
  before: SourceRegistry,
  after: SourceRegistry,
  symbol: SymbolTarget,
  newName: string,
  changes: ReadonlyMap<string, TextEdit[]>
): void {
  for (const source of before.names()) {
    const edits = changes.get(source) ?? [];
    const old = resolutions(before, source);
    const now = resolutions(after, source);
    for (let i = 0; i < old.length; i++) {
      const o = old[i];
      const n = now[i];
      if (!o) continue;
      const expected = renamedTarget(o.target, symbol, newName, edits);
      const actual = n?.target;
      const same = expected && actual ? sameTarget(expected, actual) && expected.name === actual.name : expected === actual;
      if (!same) {
        throw new RenameError(
          `renaming to '${newName}' would change what '${o.atom.text}' at offset ${o.atom.start} in ${source} refers to`,
          { source, start: o.atom.start, end: o.atom.end }
        );
      }
    }
  }
}

export function isValidSymbolName(name: string): boolean {
  if (/^\|[^|]*\|$/.test(name)) return true;
  return name.length > 0 && !looksNumeric(name) && !/[\s()|;]/.test(name);
}

/**
 * Rename the symbol at `offset` in `source` to `newName`.
 * Writes the edited texts back into the registry and returns the edits.
 */
export function renameSymbol(registry: SourceRegistry, source: string, offset: number, newName: string): RenameResult {
  if (!isValidSymbolName(newName)) {
    throw new RenameError(`'${newName}' is not a valid symbol name`);
  }

  const symbol = resolveSymbolAt(registry, source, offset);
  if (!symbol) {
    throw new RenameError(`no renameable symbol at offset ${offset} in ${source}`, { source, start: offset, end: offset });
  }
  if (symbol.kind === "global" && newName !== symbol.name && declaredGlobals(registry).has(newName)) {
    throw new RenameError(`'${newName}' is already declared`);
  }

  const changes = new Map<string, TextEdit[]>();
  for (const s of findReferences(registry, symbol)) {
    const key = s.source ?? source;
    const edits = changes.get(key) ?? [];
    edits.push({ start: s.start, end: s.end, newText: newName });
    changes.set(key, edits);
  }

  const after = new SourceRegistry(
    registry.names().map(name => {
      const text = registry.get(name) ?? "";
      const edits = changes.get(name);
      return [name, edits ? applyEdits(text, edits) : text] as const;
    })
  );
  checkCaptures(registry, after, symbol, newName, changes);

  for (const name of changes.keys()) {
    const text = after.get(name);
    if (text !== undefined) registry.set(name, text);
  }

  return { symbol, changes };
}
