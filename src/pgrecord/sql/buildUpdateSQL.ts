// sql/buildUpdateSQL.ts

import { isGenerated } from "../column.js";
import { QueryBuildError } from "../errors.js";
import type { BuiltQuery, Column, RecordLike } from "../model-types.js";
import type { Table } from "../table.js";
import { isZero } from "../utils/zero.js";
import { readField } from "./arguments.js";
import { q, qualifiedName } from "./identifiers.js";

function resolveOnlyColumns(table: Table, names: readonly string[]): Column[] {
  return names.map((name) => {
    const column = table.columnByName(name) ?? table.columnByFieldName(name);
    if (!column || column.presenter) {
      throw new QueryBuildError(table.name, `unknown column: ${name}`);
    }
    return column;
  });
}

export interface UpdateOptions {
  /** gen_salt() algorithm for SQL-side password hashing */
  passwordAlgorithm?: string | undefined;
}

/**
 * UPDATE by primary key.
 *
 * Without `onlyColumns` every non-zero, non-generated field is written, so a
 * field can only be reset to its zero value by naming it in `onlyColumns`.
 */
export function buildUpdateSQL(
  table: Table,
  record: RecordLike,
  onlyColumns?: readonly string[] | undefined,
  options: UpdateOptions = {}
): BuiltQuery {
  const primaryKey = table.primaryKey();
  if (!primaryKey) {
    throw new QueryBuildError(table.name, "no primary key found");
  }

  const id = readField(primaryKey, record);
  if (isZero(id)) {
    throw new QueryBuildError(table.name, `no value for primary key "${primaryKey.name}"`);
  }

  const targets =
    onlyColumns && onlyColumns.length > 0
      ? resolveOnlyColumns(table, onlyColumns)
      : table
          .listColumnsWithoutPresenter()
          .filter((c) => !c.primaryKey && !isGenerated(c) && c.field !== undefined)
          .filter((c) => !isZero(readField(c, record)));

  if (targets.length === 0) {
    throw new QueryBuildError(table.name, "no columns to update");
  }

  const assignments: string[] = [];
  const args: unknown[] = [];
  let primaryKeyParam = "";
  const algorithm = options.passwordAlgorithm ?? "bf";

  for (const column of targets) {
    let value = readField(column, record);
    const hashInSQL = column.password && !table.canEncryptPassword();
    if (column.password && typeof value === "string" && table.canEncryptPassword()) {
      value = table.encryptPassword(value);
    }

    args.push(value);
    const param = `$${args.length}`;

    if (column === primaryKey) primaryKeyParam = param;
    assignments.push(
      `${q(column.name)} = ${hashInSQL ? `crypt(${param}, gen_salt('${algorithm}'))` : param}`
    );
  }

  if (!primaryKeyParam) {
    args.push(id);
    primaryKeyParam = `$${args.length}`;
  }

  return {
    sql: `UPDATE ${qualifiedName(table)} SET ${assignments.join(", ")} WHERE ${q(primaryKey.name)} = ${primaryKeyParam};`,
    args,
  };
}
