// utils/indexTypes.ts

import type { IndexType } from "../model-types.js";

export const indexTypes: readonly IndexType[] = [
  "btree",
  "hash",
  "gist",
  "spgist",
  "gin",
  "brin",
];

/** Case-insensitive; anything unknown (or empty) means "no index". */
export function parseIndexType(input: string): IndexType | null {
  const lower = input.trim().toLowerCase();
  return indexTypes.find((t) => t === lower) ?? null;
}
