// sql/identifiers.ts

import type { Table } from "../table.js";

export function q(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

export function qualifiedName(table: Pick<Table, "searchPath" | "name">): string {
  return `${q(table.searchPath)}.${q(table.name)}`;
}
