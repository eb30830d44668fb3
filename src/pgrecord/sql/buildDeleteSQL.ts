// sql/buildDeleteSQL.ts

import { QueryBuildError } from "../errors.js";
import type { BuiltQuery, RecordLike } from "../model-types.js";
import type { Table } from "../table.js";
import { isZero } from "../utils/zero.js";
import { readField } from "./arguments.js";
import { q, qualifiedName } from "./identifiers.js";

/** One DELETE ... = ANY($1) for any number of records. */
export function buildDeleteSQL(table: Table, records: readonly RecordLike[]): BuiltQuery {
  const primaryKey = table.primaryKey();
  if (!primaryKey) {
    throw new QueryBuildError(table.name, "no primary key found");
  }

  if (records.length === 0) {
    throw new QueryBuildError(table.name, "no records to delete");
  }

  const ids = records.map((record) => {
    const id = readField(primaryKey, record);
    if (isZero(id)) {
      throw new QueryBuildError(table.name, `no value for primary key "${primaryKey.name}"`);
    }
    return id;
  });

  return {
    sql: `DELETE FROM ${qualifiedName(table)} WHERE ${q(primaryKey.name)} = ANY($1);`,
    args: [ids],
  };
}
