// catalog/listColumns.ts

import { z } from "zod";

import { createColumn } from "../column.js";
import type {
  Column,
  Constraint,
  Executor,
  TableKind,
  Trigger,
  UniqueIndex,
} from "../model-types.js";
import { toForeignKeyAction } from "../utils/annotations.js";
import { hostKindOf, parseDataType } from "../utils/dataTypes.js";
import { parseIndexType } from "../utils/indexTypes.js";
import { logSection } from "../utils/logColors.js";
import {
  parseCheckConstraint,
  parseConstraintType,
  parseForeignKeyConstraint,
  parseSimpleIndex,
  parseUniqueConstraint,
} from "./constraintParsers.js";
import {
  COLUMNS_QUERY,
  CONSTRAINTS_QUERY,
  TRIGGERS_QUERY,
  UNIQUE_INDEXES_QUERY,
} from "./queries.js";
import {
  columnRowSchema,
  constraintRowSchema,
  triggerRowSchema,
  uniqueIndexRowSchema,
  type ConstraintRow,
} from "./rows.js";

export interface CatalogOptions {
  searchPath: string;
  silentLogs?: boolean | undefined;
}

async function queryRows<S extends z.ZodTypeAny>(
  executor: Executor,
  schema: S,
  text: string,
  values: readonly unknown[]
): Promise<z.infer<S>[]> {
  const result = await executor.query(text, values);
  return z.array(schema).parse(result.rows);
}

export function parseTableKind(tableType: string): TableKind {
  switch (tableType.trim().toUpperCase()) {
    case "VIEW":
      return "view";
    case "MATERIALIZED VIEW":
      return "materialized-view";
    default:
      return "base";
  }
}

function withFullStop(description: string | null): string {
  if (!description) return "";
  return description.endsWith(".") ? description : `${description}.`;
}

/* ---------- COLUMNS ---------- */

export async function listColumnsInformationSchema(
  executor: Executor,
  options: CatalogOptions,
  tableNames: readonly string[] = []
): Promise<Column[]> {
  const rows = await queryRows(executor, columnRowSchema, COLUMNS_QUERY, [
    options.searchPath,
    tableNames,
  ]);

  return rows.map((row) => {
    const parsed = parseDataType(row.data_type);
    // unknown catalog types (enums, domains) keep their own name
    const type = parsed.type ?? row.data_type.trim().toLowerCase();

    return createColumn({
      tableName: row.table_name,
      tableDescription: withFullStop(row.table_description),
      tableKind: parseTableKind(row.table_type),
      name: row.column_name,
      ordinalPosition: row.ordinal_position,
      description: withFullStop(row.column_description),
      default: row.column_default ?? "",
      type,
      typeArgument: parsed.argument,
      host: hostKindOf(type),
      nullable: row.is_nullable,
      identity: row.is_identity,
      autoGenerated: row.is_identity || row.is_generated,
    });
  });
}

/* ---------- CONSTRAINTS ---------- */

function buildConstraint(row: ConstraintRow, options: CatalogOptions): Constraint | null {
  const kind = parseConstraintType(row.constraint_type);
  if (!kind) return null;

  const constraint: Constraint = {
    tableName: row.table_name,
    columnName: row.column_name,
    constraintName: row.constraint_name,
    kind,
    indexType: parseIndexType(row.index_type),
  };

  switch (kind) {
    case "u":
      constraint.unique = parseUniqueConstraint(row.constraint_definition);
      break;
    case "c":
      constraint.check = parseCheckConstraint(row.constraint_definition);
      break;
    case "f":
      constraint.foreignKey = parseForeignKeyConstraint(row.constraint_definition);
      break;
    case "i": {
      // multi-column and expression indexes do not map onto a single column
      const index = parseSimpleIndex(row.constraint_definition);
      constraint.columnName = index?.columnName ?? "";
      constraint.indexType = index?.indexType ?? null;
      break;
    }
  }

  const unparsed =
    (kind === "u" && !constraint.unique) ||
    (kind === "c" && !constraint.check) ||
    (kind === "f" && !constraint.foreignKey);

  if (unparsed) {
    logSection(options.silentLogs ?? false, "CATALOG", `${row.table_name}.${row.column_name}`, [
      {
        action: "warn",
        label: `Unparsed ${row.constraint_name}`,
        detail: row.constraint_definition,
      },
    ]);
  }

  return constraint;
}

export async function listConstraints(
  executor: Executor,
  options: CatalogOptions,
  tableNames: readonly string[] = []
): Promise<Constraint[]> {
  const rows = await queryRows(executor, constraintRowSchema, CONSTRAINTS_QUERY, [
    options.searchPath,
    tableNames,
  ]);

  const constraints: Constraint[] = [];
  for (const row of rows) {
    const constraint = buildConstraint(row, options);
    if (constraint) constraints.push(constraint);
  }
  return constraints;
}

/** Merges one catalog constraint into the column it belongs to. */
export function applyConstraint(column: Column, constraint: Constraint): void {
  if (!column.index) column.index = constraint.indexType;

  switch (constraint.kind) {
    case "p":
      column.primaryKey = true;
      break;

    case "u": {
      const columns = constraint.unique?.columns ?? [];
      if (columns.length === 0 || (columns.length === 1 && columns[0] === column.name)) {
        column.unique = true;
      } else {
        column.uniqueIndex = constraint.constraintName;
      }
      break;
    }

    case "c":
      if (constraint.check) column.check = constraint.check.expression;
      break;

    case "f": {
      const fk = constraint.foreignKey;
      if (!fk) break;
      column.referenceTable = fk.referenceTableName;
      column.referenceColumn = fk.referenceColumnName;
      column.referenceOnDelete = toForeignKeyAction(fk.onDelete) ?? "";
      column.deferrable = fk.deferrable;
      break;
    }

    case "i":
      column.index = constraint.indexType;
      break;
  }
}

/* ---------- UNIQUE INDEXES ---------- */

export async function listUniqueIndexes(
  executor: Executor,
  options: CatalogOptions,
  tableNames: readonly string[] = []
): Promise<UniqueIndex[]> {
  const rows = await queryRows(executor, uniqueIndexRowSchema, UNIQUE_INDEXES_QUERY, [
    options.searchPath,
    tableNames,
  ]);

  return rows.map((row) => ({
    tableName: row.table_name,
    indexName: row.index_name,
    columns: row.index_columns,
  }));
}

/* ---------- TRIGGERS ---------- */

export async function listTriggers(
  executor: Executor,
  options: CatalogOptions,
  tableNames: readonly string[] = []
): Promise<Trigger[]> {
  const rows = await queryRows(executor, triggerRowSchema, TRIGGERS_QUERY, [
    options.searchPath,
    tableNames,
  ]);

  return rows.map((row) => ({
    catalog: row.event_object_catalog,
    searchPath: row.event_object_schema,
    name: row.trigger_name,
    manipulation: row.event_manipulation,
    tableName: row.event_object_table,
    actionStatement: row.action_statement,
    actionOrientation: row.action_orientation,
    actionTiming: row.action_timing,
  }));
}

/* ---------- MERGED ---------- */

/**
 * Live columns with their constraints and unique indexes folded in.
 * Columns backed by a primary key or unique constraint lose their index
 * type, the database creates those indexes on its own.
 */
export async function listColumns(
  executor: Executor,
  options: CatalogOptions,
  tableNames: readonly string[] = []
): Promise<Column[]> {
  const columns = await listColumnsInformationSchema(executor, options, tableNames);
  const constraints = await listConstraints(executor, options, tableNames);
  const uniqueIndexes = await listUniqueIndexes(executor, options, tableNames);

  for (const column of columns) {
    for (const constraint of constraints) {
      if (constraint.tableName === column.tableName && constraint.columnName === column.name) {
        applyConstraint(column, constraint);
      }
    }

    const group = uniqueIndexes.find(
      (u) => u.tableName === column.tableName && u.columns.includes(column.name)
    );
    if (group) {
      column.unique = false;
      column.uniqueIndex = group.indexName;
    }

    if (column.primaryKey || column.unique || column.uniqueIndex) {
      column.index = null;
    }
  }

  return columns;
}
