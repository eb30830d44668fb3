// sql/buildCreateTableSQL.ts

import type { Column } from "../model-types.js";
import type { Table } from "../table.js";
import { q, qualifiedName } from "./identifiers.js";

export function buildColumnDefinitionSQL(column: Column): string {
  const parts = [q(column.name)];

  let type = column.type;
  if (column.typeArgument) {
    // array types carry the argument before the brackets: varchar(255)[]
    const brackets = type.indexOf("[");
    type =
      brackets === -1
        ? `${type}(${column.typeArgument})`
        : `${type.slice(0, brackets)}(${column.typeArgument})${type.slice(brackets)}`;
  }
  parts.push(type);

  if (column.identity) {
    parts.push("GENERATED BY DEFAULT AS IDENTITY");
  } else if (column.default) {
    parts.push(`DEFAULT ${column.default}`);
  }

  if (!column.nullable) parts.push("NOT NULL");
  if (column.unique) parts.push("UNIQUE");
  if (column.check) parts.push(`CHECK (${column.check})`);

  return parts.join(" ");
}

/**
 * CREATE TABLE IF NOT EXISTS plus one CREATE INDEX per indexed column,
 * one statement per line. Foreign keys are left to buildForeignKeysSQL.
 */
export function buildCreateTableSQL(table: Table): string {
  const tableName = qualifiedName(table);
  const definitions = table
    .listColumnsWithoutPresenter()
    .map((c) => buildColumnDefinitionSQL(c));

  const primaryKey = table.primaryKey();
  if (primaryKey) {
    definitions.push(`PRIMARY KEY (${q(primaryKey.name)})`);
  }

  for (const [name, columns] of table.uniqueIndexes()) {
    definitions.push(
      `CONSTRAINT ${q(name)} UNIQUE (${columns.map(q).join(", ")})`
    );
  }

  const statements = [
    `CREATE TABLE IF NOT EXISTS ${tableName} (${definitions.join(", ")});`,
  ];

  for (const index of table.indexes()) {
    statements.push(
      `CREATE INDEX IF NOT EXISTS ${q(index.name)} ON ${tableName} USING ${index.type} (${q(index.columnName)});`
    );
  }

  return statements.join("\n");
}
