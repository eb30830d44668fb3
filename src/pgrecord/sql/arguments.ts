// sql/arguments.ts

import { isGenerated } from "../column.js";
import type { Column, RecordLike } from "../model-types.js";
import type { Table } from "../table.js";
import { DataTypes } from "../utils/dataTypes.js";
import { isZero } from "../utils/zero.js";

export interface Argument {
  column: Column;
  value: unknown;
}

export interface ExtractOptions {
  /** keep zero values of columns the database cannot fill by itself */
  full?: boolean | undefined;
}

export function readField(column: Column, record: RecordLike): unknown {
  return column.field ? column.field.get(record) : undefined;
}

function toParameter(table: Table, column: Column, value: unknown): unknown {
  if (column.password && typeof value === "string" && table.canEncryptPassword()) {
    return table.encryptPassword(value);
  }

  if (
    (column.type === DataTypes.json || column.type === DataTypes.jsonb) &&
    value !== null &&
    value !== undefined &&
    typeof value !== "string"
  ) {
    return JSON.stringify(value);
  }

  return value;
}

/**
 * Collects (column, value) pairs of a record for INSERT-like statements.
 * Zero values are left out so the database applies defaults and generators.
 */
export function extractArguments(
  table: Table,
  record: RecordLike,
  options: ExtractOptions = {}
): Argument[] {
  const args: Argument[] = [];

  for (const column of table.listColumnsWithoutPresenter()) {
    if (!column.field) continue;

    const value = readField(column, record);
    if (isZero(value)) {
      if (isGenerated(column) || column.default !== "") continue;
      if (!options.full) continue;
    }

    args.push({ column, value: toParameter(table, column, value) });
  }

  return args;
}

/** Every non-zero field of a record, in column order; used by lookups. */
export function extractNonZeroArguments(table: Table, record: RecordLike): Argument[] {
  return table
    .listColumnsWithoutPresenter()
    .filter((column) => column.field !== undefined)
    .map((column) => ({ column, value: readField(column, record) }))
    .filter((arg) => !isZero(arg.value))
    .map((arg) => ({ ...arg, value: toParameter(table, arg.column, arg.value) }));
}
