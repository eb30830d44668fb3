// catalog/constraintParsers.ts

import type {
  CheckConstraint,
  ConstraintKind,
  ForeignKeyConstraint,
  IndexType,
  UniqueConstraint,
} from "../model-types.js";
import { parseIndexType } from "../utils/indexTypes.js";

function unquote(identifier: string): string {
  const trimmed = identifier.trim();
  if (trimmed.length >= 2 && trimmed.startsWith('"') && trimmed.endsWith('"')) {
    return trimmed.slice(1, -1).replace(/""/g, '"');
  }
  return trimmed;
}

function splitColumnList(list: string): string[] {
  return list
    .split(",")
    .map(unquote)
    .filter((c) => c.length > 0);
}

const CONSTRAINT_KINDS: Record<string, ConstraintKind> = {
  p: "p",
  "primary key": "p",
  u: "u",
  unique: "u",
  c: "c",
  check: "c",
  f: "f",
  "foreign key": "f",
  i: "i",
  index: "i",
};

export function parseConstraintType(text: string): ConstraintKind | null {
  return CONSTRAINT_KINDS[text.trim().toLowerCase()] ?? null;
}

/* ---------- INDEXES ---------- */

const SIMPLE_INDEX_PATTERN =
  /^CREATE INDEX (\w+) ON (?:\w+\.)?(\w+) USING (\w+) \((\w+)\)/;

export interface SimpleIndex {
  indexName: string;
  tableName: string;
  indexType: IndexType | null;
  columnName: string;
}

/** `CREATE INDEX name ON schema.table USING method (column)` (pg_indexes.indexdef). */
export function parseSimpleIndex(definition: string): SimpleIndex | null {
  const m = SIMPLE_INDEX_PATTERN.exec(definition.trim());
  if (!m || !m[1] || !m[2] || !m[3] || !m[4]) return null;

  return {
    indexName: m[1],
    tableName: m[2],
    indexType: parseIndexType(m[3]),
    columnName: m[4],
  };
}

const UNIQUE_INDEX_PATTERN =
  /^CREATE UNIQUE INDEX (?<name>\w+) ON (?<schema>\w+)\.(?<table>\w+) USING (?<method>\w+) \((?<columns>.*)\)/;

export interface UniqueIndexDefinition {
  indexName: string;
  schemaName: string;
  tableName: string;
  indexType: IndexType | null;
  columns: string[];
}

export function parseUniqueIndex(definition: string): UniqueIndexDefinition | null {
  const groups = UNIQUE_INDEX_PATTERN.exec(definition.trim())?.groups;
  if (!groups) return null;

  const { name, schema, table, method, columns } = groups;
  if (!name || !schema || !table || !method || columns === undefined) return null;

  return {
    indexName: name,
    schemaName: schema,
    tableName: table,
    indexType: parseIndexType(method),
    columns: splitColumnList(columns),
  };
}

/* ---------- CONSTRAINTS ---------- */

const UNIQUE_PATTERN = /^UNIQUE(?:\s+NULLS\s+NOT\s+DISTINCT)?\s*\((.*)\)$/i;

/** `UNIQUE (a, b)` */
export function parseUniqueConstraint(definition: string): UniqueConstraint | null {
  const m = UNIQUE_PATTERN.exec(definition.trim());
  if (!m || m[1] === undefined) return null;
  return { columns: splitColumnList(m[1]) };
}

const CHECK_PATTERN = /^CHECK\s*\((.*)\)(?:\s+NOT VALID)?$/is;

/** Removes one pair of parentheses when it wraps the whole expression. */
function unwrapParentheses(expression: string): string {
  if (!expression.startsWith("(") || !expression.endsWith(")")) return expression;

  let depth = 0;
  for (let i = 0; i < expression.length; i++) {
    const c = expression.charAt(i);
    if (c === "(") depth++;
    else if (c === ")") depth--;
    // closed before the end: "(a) AND (b)"
    if (depth === 0 && i < expression.length - 1) return expression;
  }

  return expression.slice(1, -1).trim();
}

/** `CHECK ((price > 0))` -> { expression: "price > 0" } */
export function parseCheckConstraint(definition: string): CheckConstraint | null {
  const m = CHECK_PATTERN.exec(definition.trim());
  const body = m?.[1]?.trim();
  if (!body) return null;

  return { expression: unwrapParentheses(body) };
}

const FOREIGN_KEY_PATTERN =
  /^FOREIGN KEY\s*\((\w+)\)\s*REFERENCES\s*(?:\w+\.)?(\w+)\s*\((\w+)\)(.*)$/i;
const ACTION = "(NO ACTION|CASCADE|RESTRICT|SET NULL|SET DEFAULT)";
const ON_DELETE_PATTERN = new RegExp(`ON DELETE ${ACTION}`, "i");
const ON_UPDATE_PATTERN = new RegExp(`ON UPDATE ${ACTION}`, "i");
const DEFERRABLE_PATTERN = /(?<!NOT )\bDEFERRABLE\b/i;

/** `FOREIGN KEY (col) REFERENCES tbl (ref) [ON DELETE x] [ON UPDATE y] [DEFERRABLE]` */
export function parseForeignKeyConstraint(definition: string): ForeignKeyConstraint | null {
  const m = FOREIGN_KEY_PATTERN.exec(definition.trim());
  if (!m || !m[1] || !m[2] || !m[3]) return null;

  const rest = m[4] ?? "";

  return {
    columnName: m[1],
    referenceTableName: m[2],
    referenceColumnName: m[3],
    onDelete: ON_DELETE_PATTERN.exec(rest)?.[1]?.toUpperCase() ?? "",
    onUpdate: ON_UPDATE_PATTERN.exec(rest)?.[1]?.toUpperCase() ?? "",
    deferrable: DEFERRABLE_PATTERN.test(rest),
  };
}
