// src/core/sorts/scope.ts
// Immutable lexical scopes: a frame of bindings plus a parent pointer.
// Extending never touches the parent, so sibling scopes cannot see each other.

import type { Sort } from "./sort";

export type Scope<V> = {
  readonly parent?: Scope<V>;
  readonly frame: ReadonlyMap<string, V>;
};

export function scopeEmpty<V>(): Scope<V> {
  return { frame: new Map() };
}

export function scopeLookup<V>(scope: Scope<V>, name: string): V | undefined {
  for (let cur: Scope<V> | undefined = scope; cur; cur = cur.parent) {
    const hit = cur.frame.get(name);
    if (hit !== undefined) return hit;
  }
  return undefined;
}

/** New child scope holding `binds`; later duplicates win. */
export function scopeExtend<V>(scope: Scope<V>, binds: Iterable<readonly [string, V]>): Scope<V> {
  const frame = new Map<string, V>();
  for (const [k, v] of binds) frame.set(k, v);
  return { parent: scope, frame };
}

/** Copy of the current frame with one binding added or replaced. */
export function scopeDefine<V>(scope: Scope<V>, name: string, value: V): Scope<V> {
  const frame = new Map(scope.frame);
  frame.set(name, value);
  return scope.parent ? { parent: scope.parent, frame } : { frame };
}

/** Variable name → sort. */
export type SortEnv = Scope<Sort>;

export const sortEnvEmpty = (): SortEnv => scopeEmpty<Sort>();
