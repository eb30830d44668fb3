// sql/buildDuplicateSQL.ts

import { QueryBuildError } from "../errors.js";
import type { BuiltQuery } from "../model-types.js";
import type { Table } from "../table.js";
import { q, qualifiedName } from "./identifiers.js";

/**
 * Copies one row into a new one. A self-reference column falls back to the
 * source row's id, so the copy points at its origin when it had no parent.
 */
export function buildDuplicateSQL(table: Table, id: unknown, returning = false): BuiltQuery {
  const primaryKey = table.primaryKey();
  if (!primaryKey) {
    throw new QueryBuildError(table.name, "no primary key found");
  }

  const columns = table.listColumnsForSelectWithoutGenerated();
  if (columns.length === 0) {
    throw new QueryBuildError(table.name, "no columns to duplicate");
  }

  const pk = q(primaryKey.name);
  const targets = columns.map((c) => q(c.name));
  const selects = columns.map((c) =>
    c.referenceTable === table.name && c.referenceColumn === primaryKey.name
      ? `COALESCE(${q(c.name)}, ${pk})`
      : q(c.name)
  );

  const tableName = qualifiedName(table);
  let sql =
    `INSERT INTO ${tableName} (${targets.join(", ")}) ` +
    `SELECT ${selects.join(", ")} FROM ${tableName} WHERE ${pk} = $1`;
  if (returning) sql += ` RETURNING ${pk}`;

  return { sql: `${sql};`, args: [id] };
}
