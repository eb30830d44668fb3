// column.ts

import type { Column } from "./model-types.js";
import { DataTypes, isDataTypeName, isTimeType } from "./utils/dataTypes.js";

export function createColumn(init: Partial<Column> = {}): Column {
  return {
    tableName: "",
    tableDescription: "",
    tableKind: "base",
    name: "",
    type: "",
    typeArgument: "",
    description: "",
    ordinalPosition: 0,
    host: "unknown",
    primaryKey: false,
    identity: false,
    default: "",
    check: "",
    unique: false,
    uniqueIndex: "",
    conflict: "",
    username: false,
    password: false,
    nullable: false,
    referenceTable: "",
    referenceColumn: "",
    referenceOnDelete: "",
    deferrable: false,
    index: null,
    presenter: false,
    autoGenerated: false,
    unscannable: false,
    scanner: false,
    ...init,
  };
}

/* ---------- GENERATED VALUES ---------- */

const UUID_GENERATORS = ["gen_random_uuid()", "uuid_generate_v4()"];
const TIMESTAMP_GENERATORS = ["now()", "clock_timestamp()"];

function defaultIsOneOf(column: Column, candidates: readonly string[]): boolean {
  const d = column.default.trim().toLowerCase();
  return candidates.some((c) => d === c || d.startsWith(`${c}::`));
}

export function isGeneratedPrimaryUUID(column: Column): boolean {
  return (
    column.primaryKey &&
    column.type === DataTypes.uuid &&
    defaultIsOneOf(column, UUID_GENERATORS)
  );
}

export function isGeneratedTimestamp(column: Column): boolean {
  return isTimeType(column.type) && defaultIsOneOf(column, TIMESTAMP_GENERATORS);
}

/** The database fills the value when the insert leaves it out. */
export function isGenerated(column: Column): boolean {
  return (
    column.autoGenerated ||
    column.identity ||
    isGeneratedPrimaryUUID(column) ||
    isGeneratedTimestamp(column)
  );
}

/* ---------- CANONICAL TAG ---------- */

function stripOwnTypeCast(column: Column, expression: string): string {
  const idx = expression.lastIndexOf("::");
  if (idx === -1) return expression;

  return isDataTypeName(column.type, expression.slice(idx + 2))
    ? expression.slice(0, idx)
    : expression;
}

/**
 * Renders a column back to annotation form.
 *
 * Strict mode keeps everything needed to re-parse the column (type argument,
 * conflict action, credential and scanning flags). Non-strict mode keeps only
 * what the catalog can report and is what schema checks compare.
 */
export function renderColumnTag(column: Column, strict: boolean): string {
  const parts = [`name=${column.name}`];

  let type = `type=${column.type}`;
  if (strict && column.typeArgument) type += `(${column.typeArgument})`;
  parts.push(type);

  const kind = column.table?.kind ?? column.tableKind;
  if (kind !== "base") return parts.join(",");

  if (column.primaryKey) parts.push("primary");
  if (column.identity) parts.push("identity");

  if (column.nullable) {
    parts.push("nullable");
  } else if (column.default) {
    const d = strict ? column.default : stripOwnTypeCast(column, column.default);
    parts.push(`default=${d}`);
  }

  if (column.unique) parts.push("unique");

  if (strict) {
    if (column.conflict) parts.push(`conflict=${column.conflict}`);
    if (column.username) parts.push("username");
    if (column.password) parts.push("password");
  }

  if (column.referenceColumn) {
    let ref = `ref=${column.referenceTable}(${column.referenceColumn}`;
    if (column.referenceOnDelete) ref += ` ${column.referenceOnDelete}`;
    if (column.deferrable) ref += " deferrable";
    parts.push(`${ref})`);
  }

  if (column.index) parts.push(`index=${column.index}`);
  if (column.uniqueIndex) parts.push(`unique_index=${column.uniqueIndex}`);
  if (column.check) parts.push(`check=${column.check}`);

  if (strict) {
    if (column.autoGenerated) parts.push("auto");
    if (column.presenter) parts.push("presenter");
    if (column.unscannable) parts.push("unscannable");
  }

  return parts.join(",");
}
