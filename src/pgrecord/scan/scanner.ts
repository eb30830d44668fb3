// scan/scanner.ts

import { ScanError } from "../errors.js";
import type {
  Column,
  FieldAccessor,
  HostKind,
  QueryResult,
  RecordLike,
} from "../model-types.js";
import type { RecordType } from "../record.js";
import type { Table } from "../table.js";
import { DataTypes } from "../utils/dataTypes.js";

interface BoundStep {
  fieldName: string;
  column: Column;
  field: FieldAccessor<RecordLike>;
}

/** How one returned field is written into a record; chosen once per plan. */
export type DecodeStep =
  | ({ kind: "default" } & BoundStep)
  | ({ kind: "nullable" } & BoundStep)
  | ({ kind: "credential" } & BoundStep)
  | { kind: "discard"; fieldName: string };

export interface ScanPlan {
  table: Table;
  steps: DecodeStep[];
}

const NULL_TOLERANT_TYPES = new Set<string>([
  DataTypes.uuid,
  DataTypes.text,
  DataTypes.varchar,
]);

function selectStep(table: Table, fieldName: string): DecodeStep {
  const column = table.columnByName(fieldName);

  if (!column) {
    if (table.strict) {
      throw new ScanError(
        table.name,
        fieldName,
        `record doesn't have corresponding row field: ${fieldName} (strict check)`
      );
    }
    return { kind: "discard", fieldName };
  }

  const field = column.field;
  if (!field || column.unscannable) return { kind: "discard", fieldName };

  if (column.password && table.canDecryptPassword()) {
    return { kind: "credential", fieldName, column, field };
  }

  if (column.nullable && NULL_TOLERANT_TYPES.has(column.type) && !field.optional) {
    return { kind: "nullable", fieldName, column, field };
  }

  return { kind: "default", fieldName, column, field };
}

export function createScanPlan(table: Table, fieldNames: readonly string[]): ScanPlan {
  return { table, steps: fieldNames.map((name) => selectStep(table, name)) };
}

/* ---------- VALUE CONVERSION ---------- */

function unsupported(table: Table, step: BoundStep, value: unknown, host: HostKind): ScanError {
  return new ScanError(
    table.name,
    step.fieldName,
    `unsupported decode type for ${step.fieldName}: ${typeof value} into ${host}`
  );
}

// pg returns int8 and numeric as strings
function convert(host: HostKind, value: unknown): unknown {
  if (typeof value !== "string") return value;

  switch (host) {
    case "bigint":
      return BigInt(value);
    case "float":
    case "integer": {
      const n = Number(value);
      if (Number.isNaN(n)) throw new TypeError(`not a number: ${value}`);
      return n;
    }
    case "date": {
      const d = new Date(value);
      if (Number.isNaN(d.getTime())) throw new TypeError(`not a date: ${value}`);
      return d;
    }
    default:
      return value;
  }
}

function assignDefault(table: Table, step: BoundStep, record: RecordLike, value: unknown): void {
  const { field, column } = step;

  if (field.decode) {
    field.set(record, field.decode(value));
    return;
  }

  if (value === null || value === undefined) {
    if (!field.optional) {
      throw new ScanError(
        table.name,
        step.fieldName,
        `null value for non-optional field ${field.path.join(".")}`
      );
    }
    field.set(record, null);
    return;
  }

  const host = field.host === "unknown" ? column.host : field.host;
  try {
    field.set(record, convert(host, value));
  } catch (err) {
    if (err instanceof SyntaxError || err instanceof TypeError) {
      throw unsupported(table, step, value, host);
    }
    throw err;
  }
}

export function scanRow<T extends RecordLike>(
  plan: ScanPlan,
  row: Readonly<Record<string, unknown>>,
  record: T
): T {
  const { table } = plan;

  for (const step of plan.steps) {
    const value = row[step.fieldName];

    switch (step.kind) {
      case "discard":
        break;

      case "nullable":
        if (value === null || value === undefined) break;
        assignDefault(table, step, record, value);
        break;

      case "credential": {
        if (value === null || value === undefined) break;
        const text = Buffer.isBuffer(value) ? value.toString("utf8") : value;
        if (typeof text !== "string") {
          throw new ScanError(
            table.name,
            step.fieldName,
            `password column ${step.fieldName} expected a string but got ${typeof text}`
          );
        }
        const plain = table.decryptPassword(text);
        // verify-only hooks return ""
        if (plain !== "") step.field.set(record, plain);
        break;
      }

      case "default":
        assignDefault(table, step, record, value);
        break;
    }
  }

  return record;
}

/** One new record (from the record type factory) per result row. */
export function scanRows<T extends RecordLike>(
  table: Table,
  recordType: RecordType<T>,
  result: QueryResult
): T[] {
  const plan = createScanPlan(table, result.fields);
  return result.rows.map((row) => scanRow(plan, row, recordType.create()));
}
