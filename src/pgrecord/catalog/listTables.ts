// catalog/listTables.ts

import type { Column, Executor } from "../model-types.js";
import { Table } from "../table.js";
import { pascalCase } from "../utils/naming.js";
import { listColumns, type CatalogOptions } from "./listColumns.js";

export interface ListTablesOptions {
  tableNames?: readonly string[] | undefined;
  /** return false to drop a table from the result */
  filter?: ((table: Table) => boolean) | undefined;
}

/**
 * Parent-before-child approximation: base tables without "_" first, then the
 * other base tables, then views. Not a foreign-key dependency sort.
 */
function sortRank(table: Table): number {
  if (table.isReadOnly()) return 2;
  return table.name.includes("_") ? 1 : 0;
}

export function groupTables(columns: readonly Column[], searchPath: string): Table[] {
  const tables = new Map<string, Table>();

  for (const column of columns) {
    let table = tables.get(column.tableName);
    if (!table) {
      table = new Table(column.tableName, searchPath);
      table.recordName = pascalCase(column.tableName);
      table.description = column.tableDescription;
      table.kind = column.tableKind;
      tables.set(column.tableName, table);
    }
    table.addColumns(column);
  }

  return [...tables.values()];
}

export async function listTables(
  executor: Executor,
  options: CatalogOptions,
  listOptions: ListTablesOptions = {}
): Promise<Table[]> {
  const columns = await listColumns(executor, options, listOptions.tableNames ?? []);
  const filter = listOptions.filter;

  return groupTables(columns, options.searchPath)
    .filter((t) => !filter || filter(t))
    .sort((a, b) => sortRank(a) - sortRank(b));
}
