// sql/buildExistsSQL.ts

import { QueryBuildError } from "../errors.js";
import type { BuiltQuery, RecordLike } from "../model-types.js";
import type { Table } from "../table.js";
import { extractNonZeroArguments } from "./arguments.js";
import { q, qualifiedName } from "./identifiers.js";

export function buildExistsSQL(table: Table, probe: RecordLike): BuiltQuery {
  const args = extractNonZeroArguments(table, probe);
  if (args.length === 0) {
    throw new QueryBuildError(table.name, "no arguments found, maybe missing field annotations?");
  }

  const conditions = args.map((a, i) => `${q(a.column.name)} = $${i + 1}`);

  return {
    sql: `SELECT EXISTS(SELECT 1 FROM ${qualifiedName(table)} WHERE ${conditions.join(" AND ")});`,
    args: args.map((a) => a.value),
  };
}
