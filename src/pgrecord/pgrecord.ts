// pgrecord.ts

import type pg from "pg";

import { checkSchema } from "./catalog/checkSchema.js";
import { listColumns, listTriggers, type CatalogOptions } from "./catalog/listColumns.js";
import { listTables, type ListTablesOptions } from "./catalog/listTables.js";
import type { PgRecordConfig } from "./config.js";
import { PgRecordError, QueryBuildError } from "./errors.js";
import type { Column, Executor, RecordLike, Trigger } from "./model-types.js";
import { createPgExecutor, createPool, getSSLConfig } from "./pg.js";
import type { RecordType } from "./record.js";
import { createScanPlan, scanRow, scanRows } from "./scan/scanner.js";
import type { Schema } from "./schema.js";
import { extractArguments } from "./sql/arguments.js";
import { buildDeleteSQL } from "./sql/buildDeleteSQL.js";
import { buildDuplicateSQL } from "./sql/buildDuplicateSQL.js";
import { buildExistsSQL } from "./sql/buildExistsSQL.js";
import { buildInsertSQL } from "./sql/buildInsertSQL.js";
import { buildSchemaDumpSQL, buildSetTimestampTriggersSQL } from "./sql/buildSchemaDumpSQL.js";
import { buildUpdateSQL } from "./sql/buildUpdateSQL.js";
import { q } from "./sql/identifiers.js";
import type { Table } from "./table.js";
import { logSection } from "./utils/logColors.js";

export interface ConnectOptions {
  allowSSL?: boolean | undefined;
  rejectUnauthorized?: boolean | undefined;
}

export interface InsertRecordOptions {
  /** unique index group or unique column the conflict clause must target */
  forceOnConflict?: string | undefined;
  /** send zero values too, except for columns the database fills itself */
  full?: boolean | undefined;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class PgRecord {
  private triggersInstalled = false;
  private pendingTriggers: Promise<void> | undefined;

  constructor(
    readonly schema: Schema,
    readonly executor: Executor,
    private readonly pool?: pg.Pool | undefined
  ) {}

  /**
   * Opens a pool on the given URL (or DATABASE_URL) and checks that a
   * connection can be made before returning.
   */
  static async connect(
    schema: Schema,
    databaseUrl: string | undefined = schema.config.databaseUrl,
    options: ConnectOptions = {}
  ): Promise<PgRecord> {
    if (!databaseUrl) {
      throw new PgRecordError("no database url given and DATABASE_URL is not set");
    }

    const ssl = getSSLConfig({
      nodeEnv: schema.config.nodeEnv,
      allowSSL: options.allowSSL,
      rejectUnauthorized: options.rejectUnauthorized,
      databaseUrl,
    });

    const pool = createPool(databaseUrl, ssl);
    try {
      const client = await pool.connect();
      client.release();
    } catch (err) {
      await pool.end();
      throw new PgRecordError(`failed to connect: ${errorMessage(err)}`, { cause: err });
    }

    return new PgRecord(schema, createPgExecutor(pool), pool);
  }

  get config(): PgRecordConfig {
    return this.schema.config;
  }

  private get catalogOptions(): CatalogOptions {
    return { searchPath: this.config.searchPath, silentLogs: this.config.silentLogs };
  }

  async close(): Promise<void> {
    await this.pool?.end();
  }

  /** Runs fn against one pooled client between BEGIN and COMMIT. */
  async transaction<T>(fn: (db: PgRecord) => Promise<T>): Promise<T> {
    if (!this.pool) {
      throw new PgRecordError("transactions need a connection opened with PgRecord.connect");
    }

    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");
      const result = await fn(new PgRecord(this.schema, createPgExecutor(client)));
      await client.query("COMMIT");
      return result;
    } catch (err) {
      await client.query("ROLLBACK");
      throw err;
    } finally {
      client.release();
    }
  }

  /* ---------- SCHEMA ---------- */

  async createSchemaDumpSQL(): Promise<string> {
    const triggers = await this.listTriggers(this.schema.tableNames("base"));
    return buildSchemaDumpSQL(this.schema, triggers);
  }

  /** Runs the whole dump as one multi-statement query. */
  async createSchema(): Promise<void> {
    const sql = await this.createSchemaDumpSQL();

    try {
      await this.executor.query(sql);
    } catch (err) {
      logSection(this.config.silentLogs, "SCHEMA", this.config.searchPath, [
        { action: "error", label: "Failed", detail: errorMessage(err) },
      ]);
      throw new PgRecordError(`failed to create schema: ${errorMessage(err)}\n${sql}`, {
        cause: err,
      });
    }

    this.triggersInstalled = true;
    logSection(this.config.silentLogs, "SCHEMA", this.config.searchPath, [
      { action: "success", label: "Created", detail: this.schema.tableNames("base").join(", ") },
    ]);
  }

  async checkSchema(): Promise<void> {
    await checkSchema(this.schema, this.executor);
  }

  async deleteSchema(): Promise<void> {
    await this.executor.query(`DROP SCHEMA IF EXISTS ${q(this.config.searchPath)} CASCADE;`);
    this.triggersInstalled = false;

    logSection(this.config.silentLogs, "SCHEMA", this.config.searchPath, [
      { action: "warn", label: "Dropped" },
    ]);
  }

  /**
   * Installs the updated_at triggers that are missing. Runs once per
   * instance; concurrent callers wait on the same run.
   */
  async ensureSetTimestampTriggers(): Promise<void> {
    if (this.triggersInstalled) return;

    this.pendingTriggers ??= this.installSetTimestampTriggers().finally(() => {
      this.pendingTriggers = undefined;
    });
    await this.pendingTriggers;
  }

  private async installSetTimestampTriggers(): Promise<void> {
    const triggers = await this.listTriggers(this.schema.tableNames("base"));
    const statements = buildSetTimestampTriggersSQL(this.schema, triggers);

    for (const statement of statements) {
      await this.executor.query(statement);
    }
    this.triggersInstalled = true;
  }

  /* ---------- CATALOG ---------- */

  listTables(options: ListTablesOptions = {}): Promise<Table[]> {
    return listTables(this.executor, this.catalogOptions, options);
  }

  listColumns(tableNames: readonly string[] = []): Promise<Column[]> {
    return listColumns(this.executor, this.catalogOptions, tableNames);
  }

  listTriggers(tableNames: readonly string[] = []): Promise<Trigger[]> {
    return listTriggers(this.executor, this.catalogOptions, tableNames);
  }

  /* ---------- WRITES ---------- */

  private async write<T extends RecordLike>(
    recordType: RecordType<T>,
    record: T,
    options: InsertRecordOptions,
    upsert: boolean
  ): Promise<T> {
    const table = this.schema.get(recordType);
    const args = extractArguments(table, record, { full: options.full });
    const { sql, args: values } = buildInsertSQL(table, args, {
      returning: true,
      upsert,
      forceOnConflict: options.forceOnConflict,
      passwordAlgorithm: this.config.passwordAlgorithm,
    });

    const result = await this.executor.query(sql, values);
    const row = result.rows[0];
    if (row) scanRow(createScanPlan(table, result.fields), row, record);

    return record;
  }

  /** Inserts and copies the returned primary key back into the record. */
  insert<T extends RecordLike>(
    recordType: RecordType<T>,
    record: T,
    options: InsertRecordOptions = {}
  ): Promise<T> {
    return this.write(recordType, record, options, false);
  }

  upsert<T extends RecordLike>(
    recordType: RecordType<T>,
    record: T,
    options: InsertRecordOptions = {}
  ): Promise<T> {
    return this.write(recordType, record, options, true);
  }

  async insertMany<T extends RecordLike>(
    recordType: RecordType<T>,
    records: readonly T[],
    options: InsertRecordOptions = {}
  ): Promise<T[]> {
    const inserted: T[] = [];
    for (const record of records) {
      inserted.push(await this.insert(recordType, record, options));
    }
    return inserted;
  }

  async update<T extends RecordLike>(
    recordType: RecordType<T>,
    record: T,
    onlyColumns?: readonly string[]
  ): Promise<void> {
    const { sql, args } = buildUpdateSQL(this.schema.get(recordType), record, onlyColumns, {
      passwordAlgorithm: this.config.passwordAlgorithm,
    });
    await this.executor.query(sql, args);
  }

  async delete<T extends RecordLike>(recordType: RecordType<T>, ...records: T[]): Promise<void> {
    const { sql, args } = buildDeleteSQL(this.schema.get(recordType), records);
    await this.executor.query(sql, args);
  }

  /* ---------- READS ---------- */

  /** True when a row matches every non-zero field of the probe. */
  async exists<T extends RecordLike>(recordType: RecordType<T>, probe: T): Promise<boolean> {
    const { sql, args } = buildExistsSQL(this.schema.get(recordType), probe);
    const result = await this.executor.query(sql, args);
    return result.rows[0]?.["exists"] === true;
  }

  /** Copies a row and returns the new primary key. */
  async duplicate<T extends RecordLike>(recordType: RecordType<T>, id: unknown): Promise<unknown> {
    const table = this.schema.get(recordType);
    const primaryKey = table.primaryKey();
    if (!primaryKey) throw new QueryBuildError(table.name, "no primary key found");

    const { sql, args } = buildDuplicateSQL(table, id, true);
    const result = await this.executor.query(sql, args);
    return result.rows[0]?.[primaryKey.name];
  }

  async query<T extends RecordLike>(
    recordType: RecordType<T>,
    sql: string,
    ...args: unknown[]
  ): Promise<T[]> {
    const result = await this.executor.query(sql, args);
    return scanRows(this.schema.get(recordType), recordType, result);
  }
}
