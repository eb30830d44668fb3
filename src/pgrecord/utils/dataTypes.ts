// utils/dataTypes.ts

import { readFileSync } from "node:fs";
import { z } from "zod";

import type { HostKind } from "../model-types.js";

/** Canonical (first-alias) name of a supported column data type, e.g. "varchar". */
export type DataType = string;

export const hostKinds = [
  "string",
  "integer",
  "float",
  "bigint",
  "boolean",
  "date",
  "duration",
  "buffer",
  "json",
  "string[]",
  "integer[]",
  "bigint[]",
  "string[][]",
  "integer[][]",
  "unknown",
] as const satisfies readonly HostKind[];

const dataTypeEntrySchema = z.object({
  aliases: z.array(z.string().min(1)).min(1),
  host: z.enum(hostKinds),
});

export type DataTypeEntry = z.infer<typeof dataTypeEntrySchema>;

const DATA_TYPES_FILE = new URL("../../../data/data-types.json", import.meta.url);

function loadDataTypes(): DataTypeEntry[] {
  const raw: unknown = JSON.parse(readFileSync(DATA_TYPES_FILE, "utf8"));
  return z.array(dataTypeEntrySchema).parse(raw);
}

const entries = loadDataTypes();

/* ---------- LOOKUP TABLES ---------- */
const byAlias = new Map<string, DataTypeEntry>();
const byName = new Map<DataType, DataTypeEntry>();

for (const entry of entries) {
  byName.set(entry.aliases[0] ?? "", entry);
  for (const alias of entry.aliases) {
    byAlias.set(alias, entry);
  }
}

function canonicalName(entry: DataTypeEntry): DataType {
  return entry.aliases[0] ?? "";
}

export const DataTypes = {
  bigint: "bigint",
  boolean: "boolean",
  bytea: "bytea",
  citext: "citext",
  hstore: "hstore",
  int: "int",
  interval: "interval",
  json: "json",
  jsonb: "jsonb",
  numeric: "numeric",
  text: "text",
  time: "time",
  timetz: "timetz",
  timestamp: "timestamp",
  timestamptz: "timestamptz",
  tsvector: "tsvector",
  uuid: "uuid",
  varchar: "varchar",
} as const satisfies Record<string, DataType>;

export interface ParsedDataType {
  type: DataType | null;
  argument: string;
}

/**
 * Resolves a declared or catalog-reported type name.
 * A trailing "(...)" is split off as the type argument, so "character varying(255)"
 * gives { type: "varchar", argument: "255" }.
 */
export function parseDataType(input: string): ParsedDataType {
  let name = input.trim().toLowerCase();
  let argument = "";

  const open = name.indexOf("(");
  if (open > 0 && name.endsWith(")")) {
    argument = name.slice(open + 1, -1).trim();
    name = name.slice(0, open).trim();
  }

  const entry = byAlias.get(name);
  if (!entry) {
    // "timestamp(6) without time zone" style spellings are aliases of their own
    const whole = byAlias.get(input.trim().toLowerCase());
    if (whole) return { type: canonicalName(whole), argument: "" };
    return { type: null, argument: "" };
  }

  return { type: canonicalName(entry), argument };
}

export function isDataType(name: string): boolean {
  return byName.has(name);
}

export function dataTypeAliases(type: DataType): readonly string[] {
  return byName.get(type)?.aliases ?? [];
}

/** Reports whether `text` names `type` through any of its aliases. */
export function isDataTypeName(type: DataType, text: string): boolean {
  const lower = text.trim().toLowerCase();
  return dataTypeAliases(type).includes(lower);
}

export function isArrayType(type: DataType): boolean {
  return type === "array" || type.endsWith("[]");
}

export function isTimeType(type: DataType): boolean {
  return (
    type === DataTypes.time ||
    type === DataTypes.timetz ||
    type === DataTypes.timestamp ||
    type === DataTypes.timestamptz
  );
}

export function hostKindOf(type: DataType): HostKind {
  return byName.get(type)?.host ?? "unknown";
}

const dataTypeByHost: Record<HostKind, DataType | null> = {
  string: DataTypes.text,
  integer: DataTypes.int,
  float: DataTypes.numeric,
  bigint: DataTypes.bigint,
  boolean: DataTypes.boolean,
  date: DataTypes.timestamp,
  duration: DataTypes.interval,
  buffer: DataTypes.bytea,
  json: DataTypes.jsonb,
  "string[]": "varchar[]",
  "integer[]": "int[]",
  "bigint[]": "bigint[]",
  "string[][]": "text[][]",
  "integer[][]": "int[][]",
  unknown: null,
};

/** Default column type for a field that declares no `type=` option. */
export function dataTypeForHost(host: HostKind): DataType | null {
  return dataTypeByHost[host];
}
