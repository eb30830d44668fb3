// sql/buildInsertSQL.ts

import { QueryBuildError } from "../errors.js";
import type { BuiltQuery, Column } from "../model-types.js";
import type { Table } from "../table.js";
import type { Argument } from "./arguments.js";
import { q, qualifiedName } from "./identifiers.js";

export interface InsertOptions {
  /** append RETURNING <primary key> where the statement can return it */
  returning?: boolean | undefined;
  /** unique index group or unique column name the conflict clause must target */
  forceOnConflict?: string | undefined;
  /** update the existing row on conflict */
  upsert?: boolean | undefined;
  /** gen_salt() algorithm for SQL-side password hashing */
  passwordAlgorithm?: string | undefined;
}

interface ConflictClause {
  targets: string[];
  action: string;
}

function doUpdateSet(args: readonly Argument[], targets: readonly string[]): string {
  const assignments = args
    .map((a) => a.column.name)
    .filter((name) => !targets.includes(name))
    .map((name) => `${q(name)} = EXCLUDED.${q(name)}`);

  return assignments.length > 0
    ? `DO UPDATE SET ${assignments.join(", ")}`
    : "DO NOTHING";
}

function resolveForcedTarget(table: Table, target: string): string[] {
  const group = table.uniqueIndexes().get(target);
  if (group) return group;

  const column = table.columnByName(target);
  if (column && (column.unique || column.primaryKey)) return [column.name];

  throw new QueryBuildError(table.name, `can't find unique index with name: ${target}`);
}

function columnsWhere(args: readonly Argument[], predicate: (c: Column) => boolean): string[] {
  return args.filter((a) => predicate(a.column)).map((a) => a.column.name);
}

function resolveConflict(
  table: Table,
  args: readonly Argument[],
  options: InsertOptions
): ConflictClause | null {
  // 1. caller-forced target
  if (options.forceOnConflict) {
    const targets = resolveForcedTarget(table, options.forceOnConflict);
    return { targets, action: doUpdateSet(args, targets) };
  }

  // 2. action declared on the table
  const declared = table.onConflict();
  if (declared) {
    let targets = columnsWhere(args, (c) => c.unique);
    if (targets.length === 0) targets = columnsWhere(args, (c) => c.uniqueIndex !== "");
    if (targets.length === 0 && declared.toUpperCase().includes("DO UPDATE")) {
      throw new QueryBuildError(
        table.name,
        `conflict action "${declared}" needs a unique column among the inserted values`
      );
    }
    return { targets, action: declared };
  }

  // 3. upsert over the unique columns present
  if (options.upsert) {
    let targets = columnsWhere(args, (c) => c.uniqueIndex !== "");
    if (targets.length === 0) targets = columnsWhere(args, (c) => c.unique);
    if (targets.length === 0) targets = columnsWhere(args, (c) => c.primaryKey);
    if (targets.length > 0) return { targets, action: doUpdateSet(args, targets) };
  }

  return null;
}

/**
 * INSERT INTO "schema"."table" (...) VALUES (...) [ON CONFLICT ...] [RETURNING pk];
 */
export function buildInsertSQL(
  table: Table,
  args: readonly Argument[],
  options: InsertOptions = {}
): BuiltQuery {
  if (args.length === 0) {
    throw new QueryBuildError(table.name, "no arguments found, maybe missing field annotations?");
  }

  const columns: string[] = [];
  const placeholders: string[] = [];
  const values: unknown[] = [];
  const algorithm = options.passwordAlgorithm ?? "bf";

  for (const arg of args) {
    if (arg.column.presenter) continue;

    values.push(arg.value);
    columns.push(q(arg.column.name));

    const param = `$${values.length}`;
    placeholders.push(
      arg.column.password && !table.canEncryptPassword()
        ? `crypt(${param}, gen_salt('${algorithm}'))`
        : param
    );
  }

  if (columns.length === 0) {
    throw new QueryBuildError(table.name, "no columns to insert");
  }

  let sql = `INSERT INTO ${qualifiedName(table)} (${columns.join(", ")}) VALUES (${placeholders.join(", ")})`;

  const conflict = resolveConflict(table, args, options);
  let canReturn = true;

  if (conflict) {
    sql +=
      conflict.targets.length > 0
        ? ` ON CONFLICT (${conflict.targets.map(q).join(", ")}) ${conflict.action}`
        : ` ON CONFLICT ${conflict.action}`;
    canReturn = conflict.action.toUpperCase().includes("DO UPDATE");
  }

  const primaryKey = table.primaryKey();
  if (options.returning && primaryKey && canReturn) {
    sql += ` RETURNING ${q(primaryKey.name)}`;
  }

  return { sql: `${sql};`, args: values };
}
