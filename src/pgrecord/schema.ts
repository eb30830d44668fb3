// schema.ts

import { resolveConfig, type PgRecordConfig } from "./config.js";
import { RegistryError } from "./errors.js";
import type { PasswordHandler, RecordLike, TableKind } from "./model-types.js";
import type { RecordType } from "./record.js";
import { buildTable, Table } from "./table.js";
import type { DataType } from "./utils/dataTypes.js";

export type TableOption = (table: Table) => void;

export const view: TableOption = (table) => {
  table.kind = "view";
};

export const materializedView: TableOption = (table) => {
  table.kind = "materialized-view";
};

/** A row shape backed by a caller-written SELECT; never created or checked. */
export const presenter: TableOption = (table) => {
  table.kind = "presenter";
};

export const strict: TableOption = (table) => {
  table.strict = true;
};

/** Registry of the tables built from record types. Filled at startup, read afterwards. */
export class Schema {
  readonly config: PgRecordConfig;
  private readonly byRecordType = new Map<object, Table>();
  private passwordHandler: PasswordHandler | undefined;

  constructor(config: Partial<PgRecordConfig> = {}) {
    this.config = resolveConfig(config);
  }

  register<T extends RecordLike>(
    tableName: string,
    recordType: RecordType<T>,
    ...options: TableOption[]
  ): Table {
    if (this.byRecordType.has(recordType)) {
      throw new RegistryError(`record type ${recordType.name} is already registered`);
    }
    if (this.findByTableName(tableName)) {
      throw new RegistryError(`table ${tableName} is already registered`);
    }

    const table = buildTable(tableName, recordType, this.config);
    table.registeredPosition = this.byRecordType.size + 1;
    table.passwordHandler = this.passwordHandler;

    for (const option of options) option(table);
    for (const column of table.columns) column.tableKind = table.kind;

    this.byRecordType.set(recordType, table);
    return table;
  }

  /** Encrypt/decrypt hooks for password columns of every table, present and future. */
  handlePassword(handler: PasswordHandler): this {
    this.passwordHandler = handler;
    for (const table of this.byRecordType.values()) {
      table.passwordHandler = handler;
    }
    return this;
  }

  get<T extends RecordLike>(recordType: RecordType<T>): Table {
    const table = this.byRecordType.get(recordType);
    if (!table) {
      throw new RegistryError(`record type ${recordType.name} is not registered`);
    }
    return table;
  }

  getByTableName(tableName: string): Table {
    const table = this.findByTableName(tableName);
    if (!table) {
      throw new RegistryError(`table ${tableName} is not registered`);
    }
    return table;
  }

  private findByTableName(tableName: string): Table | undefined {
    for (const table of this.byRecordType.values()) {
      if (table.name === tableName) return table;
    }
    return undefined;
  }

  /** Registered tables in registration order, optionally limited to some kinds. */
  tables(...kinds: TableKind[]): Table[] {
    return [...this.byRecordType.values()]
      .filter((t) => kinds.length === 0 || kinds.includes(t.kind))
      .sort((a, b) => a.registeredPosition - b.registeredPosition);
  }

  tableNames(...kinds: TableKind[]): string[] {
    return this.tables(...kinds).map((t) => t.name);
  }

  hasColumnType(...types: DataType[]): boolean {
    return this.tables().some((t) => t.columns.some((c) => types.includes(c.type)));
  }

  hasPassword(): boolean {
    return this.tables().some((t) => t.hasPassword());
  }
}
