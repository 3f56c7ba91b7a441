// src/core/sorts/sort.ts

export type Sort = "Bool" | "Real";

export const SORTS: readonly Sort[] = ["Bool", "Real"];

export function parseSortName(name: string): Sort | undefined {
  return SORTS.find(s => s === name);
}
