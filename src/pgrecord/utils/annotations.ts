// utils/annotations.ts

import { createColumn } from "../column.js";
import type { PgRecordConfig } from "../config.js";
import { AnnotationError } from "../errors.js";
import type { Column, ForeignKeyAction, RecordLike } from "../model-types.js";
import { tagFor, type RecordField, type RecordMember } from "../record.js";
import {
  DataTypes,
  dataTypeForHost,
  hostKindOf,
  parseDataType,
} from "./dataTypes.js";
import { parseIndexType } from "./indexTypes.js";

export interface AnnotationOption {
  key: string;
  value: string;
  /** written without "=value" */
  bare: boolean;
  raw: string;
}

export const SKIP_ANNOTATION = "-";

/* ---------- TOKENIZER ---------- */

/** Splits on top-level commas; commas inside (...) or '...' belong to the value. */
export function splitAnnotation(raw: string): string[] {
  const tokens: string[] = [];
  let current = "";
  let depth = 0;
  let quoted = false;

  for (const c of raw) {
    if (c === "'") {
      quoted = !quoted;
    } else if (!quoted && c === "(") {
      depth++;
    } else if (!quoted && c === ")" && depth > 0) {
      depth--;
    } else if (!quoted && depth === 0 && c === ",") {
      if (current.trim()) tokens.push(current.trim());
      current = "";
      continue;
    }
    current += c;
  }

  if (current.trim()) tokens.push(current.trim());
  return tokens;
}

export function parseAnnotation(raw: string): AnnotationOption[] {
  return splitAnnotation(raw).map((token) => {
    const eq = token.indexOf("=");
    if (eq === -1) {
      return { key: token.toLowerCase(), value: "", bare: true, raw: token };
    }

    return {
      key: token.slice(0, eq).trim().toLowerCase(),
      value: token.slice(eq + 1).trim(),
      bare: false,
      raw: token,
    };
  });
}

const TRUE_WORDS = new Set(["1", "t", "T", "TRUE", "true", "True"]);
const FALSE_WORDS = new Set(["0", "f", "F", "FALSE", "false", "False"]);

function parseBool(option: AnnotationOption): boolean | null {
  if (option.bare) return true;
  if (TRUE_WORDS.has(option.value)) return true;
  if (FALSE_WORDS.has(option.value)) return false;
  return null;
}

function hasOption(raw: string, key: string, value?: string): boolean {
  return parseAnnotation(raw).some(
    (o) =>
      o.key === key &&
      (value === undefined || o.value.toLowerCase() === value) &&
      (value !== undefined || parseBool(o) === true)
  );
}

/* ---------- REFERENCES ---------- */

const REFERENCE_PATTERN =
  /(\w+)\((\w+)\s*(no action|cascade|restrict|set null|set default)?\s*(\w*)?\)$/i;

const FOREIGN_KEY_ACTIONS: readonly ForeignKeyAction[] = [
  "NO ACTION",
  "CASCADE",
  "RESTRICT",
  "SET NULL",
  "SET DEFAULT",
];

export function toForeignKeyAction(text: string): ForeignKeyAction | null {
  const upper = text.trim().replace(/\s+/g, " ").toUpperCase();
  return FOREIGN_KEY_ACTIONS.find((a) => a === upper) ?? null;
}

export interface ParsedReference {
  table: string;
  column: string;
  onDelete: ForeignKeyAction;
  deferrable: boolean;
}

/**
 * `table(column [on delete action] [deferrable])`.
 * A missing or "self" table points back at `currentTable`.
 */
export function parseReference(value: string, currentTable: string): ParsedReference {
  let text = value.trim();
  const open = text.indexOf("(");

  if (open === -1) {
    text = `${currentTable}(${text})`;
  } else {
    const table = text.slice(0, open).trim();
    if (table === "" || table.toLowerCase() === "self") {
      text = currentTable + text.slice(open);
    }
  }

  const match = REFERENCE_PATTERN.exec(text);
  const table = match?.[1];
  const column = match?.[2];
  if (!match || !table || !column) {
    throw new Error(`invalid reference annotation: ${value}`);
  }

  const onDelete = toForeignKeyAction(match[3] ?? "CASCADE") ?? "CASCADE";

  const deferrableWord = (match[4] ?? "").toUpperCase();
  if (deferrableWord !== "" && deferrableWord !== "DEFERRABLE") {
    throw new Error(
      `invalid reference annotation: ${value}: expected DEFERRABLE but got ${match[4]}`
    );
  }

  const deferrable = deferrableWord === "DEFERRABLE";
  if (deferrable && onDelete === "RESTRICT") {
    throw new Error(
      `invalid reference annotation: ${value}: DEFERRABLE cannot be combined with RESTRICT`
    );
  }

  return { table, column, onDelete, deferrable };
}

/* ---------- FLATTENING ---------- */

export interface TaggedField<T> {
  field: RecordField<T>;
  annotation: string;
}

function isSingleColumnComposite(annotation: string): boolean {
  return (
    hasOption(annotation, "type", "json") || hasOption(annotation, "type", "jsonb")
  );
}

/**
 * Lists the fields that become columns. Embedded records are inlined unless
 * their annotation binds them as json/jsonb; untagged and "-" fields are dropped.
 */
export function collectFields<T>(
  members: readonly RecordMember<T>[],
  tagKey: string
): TaggedField<T>[] {
  const out: TaggedField<T>[] = [];

  for (const member of members) {
    const tag = tagFor(member.tags, tagKey)?.trim();
    // an empty tag counts as no tag
    const annotation = tag === "" ? undefined : tag;
    if (annotation === SKIP_ANNOTATION) continue;

    if (member.kind === "field") {
      if (annotation !== undefined) out.push({ field: member, annotation });
      continue;
    }

    if (annotation !== undefined) {
      if (hasOption(annotation, "presenter")) continue;
      if (isSingleColumnComposite(annotation)) {
        out.push({ field: member.self, annotation });
        continue;
      }
    }

    const nested = collectFields(member.members, tagKey);
    if (nested.length > 0) {
      out.push(...nested);
    } else if (annotation !== undefined) {
      out.push({ field: member.self, annotation });
    }
  }

  return out;
}

/* ---------- COLUMN ---------- */

export function buildColumn<T extends RecordLike>(
  tableName: string,
  field: RecordField<T>,
  annotation: string,
  config: Pick<PgRecordConfig, "columnName">
): Column {
  const column = createColumn({
    tableName,
    name: config.columnName(field.name),
    description: field.description,
    field,
    host: field.host,
  });

  function fail(message: string): never {
    throw new AnnotationError(tableName, field.name, message);
  }

  const bool = (option: AnnotationOption): boolean => {
    const b = parseBool(option);
    if (b === null) {
      return fail(`invalid boolean value for ${option.key}: ${option.value}`);
    }
    return b;
  };

  let uniqueIndexShorthand = false;

  for (const option of parseAnnotation(annotation)) {
    switch (option.key) {
      case "name":
        column.name = option.value;
        break;

      case "type": {
        let typeName = option.value;
        const open = typeName.indexOf("(");
        if (open !== -1) {
          const close = typeName.indexOf(")", open);
          if (close === -1) fail(`missing right parenthesis: ${option.value}`);
          column.typeArgument = typeName.slice(open + 1, close).trim();
          typeName = typeName.slice(0, open) + typeName.slice(close + 1);
        }

        const parsed = parseDataType(typeName);
        if (!parsed.type) fail(`invalid data type: ${option.value}`);
        column.type = parsed.type;
        break;
      }

      case "primary":
      case "pk":
        column.primaryKey = bool(option);
        break;

      case "identity":
        column.identity = bool(option);
        if (column.identity) column.autoGenerated = true;
        break;

      case "default":
        column.default = option.value;
        if (option.value.toLowerCase() === "null") column.nullable = true;
        break;

      case "unique":
        column.unique = bool(option);
        break;

      case "conflict":
        if (option.bare) fail("conflict requires an action, e.g. conflict=DO NOTHING");
        column.conflict = option.value;
        break;

      case "username":
        column.username = bool(option);
        break;

      case "password":
        column.password = bool(option);
        break;

      case "nullable":
      case "null":
        column.nullable = bool(option);
        if (column.nullable) {
          column.default = "null";
        } else if (column.default.toLowerCase() === "null") {
          column.default = "";
        }
        break;

      case "ref":
      case "reference":
      case "references": {
        let ref: ParsedReference;
        try {
          ref = parseReference(option.value, tableName);
        } catch (err) {
          throw new AnnotationError(
            tableName,
            field.name,
            err instanceof Error ? err.message : String(err),
            { cause: err }
          );
        }
        column.referenceTable = ref.table;
        column.referenceColumn = ref.column;
        column.referenceOnDelete = ref.onDelete;
        column.deferrable = ref.deferrable;
        break;
      }

      case "index": {
        if (option.bare) {
          column.index = "btree";
          break;
        }
        const index = parseIndexType(option.value);
        if (!index) fail(`invalid index type: ${option.value}`);
        column.index = index;
        break;
      }

      case "unique_index":
        if (option.bare) uniqueIndexShorthand = true;
        else column.uniqueIndex = option.value;
        break;

      case "check":
        if (option.bare) fail("check requires an expression");
        column.check = option.value;
        break;

      case "auto":
        column.autoGenerated = bool(option);
        break;

      case "presenter":
        column.presenter = bool(option);
        break;

      case "unscannable":
        column.unscannable = bool(option);
        break;

      default:
        if (!option.bare) fail(`unexpected annotation option: ${option.raw}`);
        column.name = option.raw;
    }
  }

  /* ---------- POST-PROCESSING ---------- */
  // a bare unique_index names no group: it only conflicts with unique
  if (column.unique && (column.uniqueIndex || uniqueIndexShorthand)) {
    fail("unique and unique_index cannot be used together");
  }

  if (!column.type && column.password) column.type = DataTypes.text;

  if (!column.type) {
    const fromHost = dataTypeForHost(field.host);
    if (!fromHost) fail(`invalid data type: no type option and no host kind for ${field.name}`);
    column.type = fromHost;
  }

  if (column.host === "unknown") column.host = hostKindOf(column.type);

  if (
    column.primaryKey &&
    !column.nullable &&
    column.type === DataTypes.uuid &&
    column.default === "" &&
    column.referenceColumn === ""
  ) {
    column.default = "gen_random_uuid()";
  }

  if (
    column.type === DataTypes.varchar &&
    column.default !== "" &&
    !column.default.toLowerCase().endsWith("::character varying")
  ) {
    column.default += "::character varying";
  }

  if (column.type === DataTypes.tsvector) column.unscannable = true;
  if (field.decode) column.scanner = true;

  return column;
}
