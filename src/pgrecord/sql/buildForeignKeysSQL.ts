// sql/buildForeignKeysSQL.ts

import type { Table } from "../table.js";
import { q, qualifiedName } from "./identifiers.js";

export function foreignKeyName(tableName: string, columnName: string): string {
  return `${tableName}_${columnName}_fkey`;
}

/** Drop-if-exists then add, per reference column; runs after every table exists. */
export function buildForeignKeysSQL(table: Table): string[] {
  const tableName = qualifiedName(table);
  const statements: string[] = [];

  for (const column of table.foreignKeys()) {
    const constraint = q(foreignKeyName(table.name, column.name));
    const referenced = qualifiedName({
      searchPath: table.searchPath,
      name: column.referenceTable,
    });

    statements.push(
      `ALTER TABLE ${tableName} DROP CONSTRAINT IF EXISTS ${constraint};`
    );

    let add =
      `ALTER TABLE ${tableName} ADD CONSTRAINT ${constraint} ` +
      `FOREIGN KEY (${q(column.name)}) REFERENCES ${referenced} (${q(column.referenceColumn)})`;
    if (column.referenceOnDelete) add += ` ON DELETE ${column.referenceOnDelete}`;
    if (column.deferrable) add += " DEFERRABLE";

    statements.push(`${add};`);
  }

  return statements;
}
