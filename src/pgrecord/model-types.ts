// model-types.ts

import type { DataType } from "./utils/dataTypes.js";
import type { Table } from "./table.js";

/** Host-side representation of a column value */
export type HostKind =
  | "string"
  | "integer"
  | "float"
  | "bigint"
  | "boolean"
  | "date"
  | "duration"
  | "buffer"
  | "json"
  | "string[]"
  | "integer[]"
  | "bigint[]"
  | "string[][]"
  | "integer[][]"
  | "unknown";

export type IndexType = "btree" | "hash" | "gist" | "spgist" | "gin" | "brin";

export type TableKind = "base" | "view" | "materialized-view" | "presenter";

/** Kinds that exist in the database catalog (presenters do not) */
export const databaseTableKinds: readonly TableKind[] = [
  "base",
  "view",
  "materialized-view",
];

export type ForeignKeyAction =
  | "NO ACTION"
  | "CASCADE"
  | "RESTRICT"
  | "SET NULL"
  | "SET DEFAULT";

/** Any non-nullish record value */
export type RecordLike = NonNullable<unknown>;

/**
 * Reads and writes one (possibly nested) field of a record.
 * Built once per record type by RecordType.
 */
export interface FieldAccessor<T> {
  readonly name: string;
  readonly path: readonly string[];
  readonly host: HostKind;
  readonly optional: boolean;
  readonly decode?: ((value: unknown) => unknown) | undefined;
  get(record: T): unknown;
  set(record: T, value: unknown): void;
}

export interface Column {
  table?: Table | undefined;
  tableName: string;
  tableDescription: string;
  tableKind: TableKind;

  name: string;
  type: DataType;
  typeArgument: string;
  description: string;
  ordinalPosition: number;

  field?: FieldAccessor<RecordLike> | undefined;
  host: HostKind;

  primaryKey: boolean;
  identity: boolean;
  default: string;
  check: string;
  unique: boolean;
  uniqueIndex: string;
  conflict: string;
  username: boolean;
  password: boolean;
  nullable: boolean;

  referenceTable: string;
  referenceColumn: string;
  referenceOnDelete: ForeignKeyAction | "";
  deferrable: boolean;

  index: IndexType | null;

  presenter: boolean;
  autoGenerated: boolean;
  unscannable: boolean;
  scanner: boolean;
}

/** Encrypt/decrypt hooks for password-marked columns */
export interface PasswordHandler {
  encrypt?: ((tableName: string, plainPassword: string) => string) | undefined;
  decrypt?: ((tableName: string, encryptedPassword: string) => string) | undefined;
}

/* ---------- CATALOG ENTITIES ---------- */

export type ConstraintKind = "p" | "u" | "c" | "f" | "i";

export interface UniqueConstraint {
  columns: string[];
}

export interface CheckConstraint {
  expression: string;
}

export interface ForeignKeyConstraint {
  columnName: string;
  referenceTableName: string;
  referenceColumnName: string;
  onDelete: string;
  onUpdate: string;
  deferrable: boolean;
}

export interface Constraint {
  tableName: string;
  columnName: string;
  constraintName: string;
  kind: ConstraintKind;
  indexType: IndexType | null;
  unique?: UniqueConstraint | null | undefined;
  check?: CheckConstraint | null | undefined;
  foreignKey?: ForeignKeyConstraint | null | undefined;
}

export interface UniqueIndex {
  tableName: string;
  indexName: string;
  columns: string[];
}

export interface Trigger {
  catalog: string;
  searchPath: string;
  name: string;
  manipulation: string;
  tableName: string;
  actionStatement: string;
  actionOrientation: string;
  actionTiming: string;
}

/* ---------- EXECUTOR ---------- */

export interface QueryResult {
  rows: Record<string, unknown>[];
  fields: string[];
}

/** Runs one statement; pools, transactions and cancellation live behind it */
export interface Executor {
  query(text: string, values?: readonly unknown[]): Promise<QueryResult>;
}

export interface BuiltQuery {
  sql: string;
  args: unknown[];
}
