// table.ts

import { isGenerated } from "./column.js";
import type { PgRecordConfig } from "./config.js";
import { AnnotationError } from "./errors.js";
import type {
  Column,
  IndexType,
  PasswordHandler,
  RecordLike,
  TableKind,
} from "./model-types.js";
import type { RecordType } from "./record.js";
import { buildColumn, collectFields } from "./utils/annotations.js";

export interface IndexDefinition {
  name: string;
  tableName: string;
  columnName: string;
  type: IndexType;
}

export class Table {
  /** 1-based registration order; 0 for introspected tables */
  registeredPosition = 0;
  kind: TableKind = "base";
  /** Identity of the RecordType the table was built from */
  recordType?: object | undefined;
  recordName = "";
  description = "";
  /** Unknown result or catalog columns are errors instead of being ignored */
  strict = false;
  passwordHandler?: PasswordHandler | undefined;

  readonly columns: Column[] = [];

  constructor(
    public name: string,
    public searchPath = "public"
  ) {}

  isReadOnly(): boolean {
    return this.kind !== "base";
  }

  addColumns(...columns: Column[]): void {
    for (const column of columns) {
      column.table = this;
      column.tableName = this.name;
      column.tableKind = this.kind;
      if (!column.tableDescription) column.tableDescription = this.description;
      this.columns.push(column);
    }
  }

  columnByName(name: string): Column | undefined {
    const lower = name.toLowerCase();
    return this.columns.find((c) => c.name.toLowerCase() === lower);
  }

  /** Looks a column up by its bound field, e.g. "meta.title" for embedded fields. */
  columnByFieldName(fieldName: string): Column | undefined {
    return this.columns.find((c) => c.field?.path.join(".") === fieldName);
  }

  primaryKey(): Column | undefined {
    return this.columns.find((c) => c.primaryKey);
  }

  /** Multi-column unique groups, columns in declared order. */
  uniqueIndexes(): Map<string, string[]> {
    const groups = new Map<string, string[]>();
    for (const column of this.columns) {
      if (!column.uniqueIndex) continue;
      const group = groups.get(column.uniqueIndex) ?? [];
      group.push(column.name);
      groups.set(column.uniqueIndex, group);
    }
    return groups;
  }

  indexes(): IndexDefinition[] {
    const out: IndexDefinition[] = [];
    for (const column of this.columns) {
      if (!column.index) continue;

      let name = `${this.name}_${column.name}_idx`;
      if (column.referenceColumn) name = `${this.name}_${column.name}_fkey`;
      else if (column.primaryKey) name = `${this.name}_pkey`;

      out.push({
        name,
        tableName: this.name,
        columnName: column.name,
        type: column.index,
      });
    }
    return out;
  }

  foreignKeys(): Column[] {
    return this.columns.filter((c) => c.referenceTable && c.referenceColumn);
  }

  /** The ON CONFLICT action declared by a column, if any. */
  onConflict(): string {
    return this.columns.find((c) => c.conflict)?.conflict ?? "";
  }

  listColumnsWithoutPresenter(): Column[] {
    return this.columns.filter((c) => !c.presenter);
  }

  /** Columns a row copy can select: no primary key, presenter or generated values. */
  listColumnsForSelectWithoutGenerated(): Column[] {
    return this.columns.filter(
      (c) => !c.primaryKey && !c.presenter && !isGenerated(c)
    );
  }

  listColumnNames(): string[] {
    return this.columns.map((c) => c.name);
  }

  hasPassword(): boolean {
    return this.columns.some((c) => c.password);
  }

  /* ---------- PASSWORDS ---------- */
  canEncryptPassword(): boolean {
    return this.passwordHandler?.encrypt !== undefined;
  }

  canDecryptPassword(): boolean {
    return this.passwordHandler?.decrypt !== undefined;
  }

  encryptPassword(plain: string): string {
    const encrypt = this.passwordHandler?.encrypt;
    return encrypt ? encrypt(this.name, plain) : plain;
  }

  decryptPassword(encrypted: string): string {
    const decrypt = this.passwordHandler?.decrypt;
    return decrypt ? decrypt(this.name, encrypted) : encrypted;
  }
}

/**
 * Builds the table model of a record type from its field annotations.
 * Throws AnnotationError on the first invalid annotation.
 */
export function buildTable<T extends RecordLike>(
  tableName: string,
  recordType: RecordType<T>,
  config: Pick<PgRecordConfig, "searchPath" | "tagKey" | "columnName">
): Table {
  const table = new Table(tableName, config.searchPath);
  table.recordType = recordType;
  table.recordName = recordType.name;
  table.description = recordType.description;

  const fields = collectFields(recordType.members, config.tagKey);
  if (fields.length === 0) {
    throw new AnnotationError(
      tableName,
      recordType.name,
      `no columns found, missing "${config.tagKey}" annotations?`
    );
  }

  let conflictColumn: Column | undefined;

  for (const { field, annotation } of fields) {
    const column = buildColumn(tableName, field, annotation, config);

    if (column.conflict) {
      if (conflictColumn) {
        throw new AnnotationError(
          tableName,
          field.name,
          `conflict action already declared on column "${conflictColumn.name}"`
        );
      }
      conflictColumn = column;
    }

    table.addColumns(column);
  }

  table.columns.forEach((c, i) => {
    c.ordinalPosition = i + 1;
  });

  return table;
}
