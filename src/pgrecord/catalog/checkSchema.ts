// catalog/checkSchema.ts

import { renderColumnTag } from "../column.js";
import { ReconciliationError } from "../errors.js";
import type { Executor, TableKind } from "../model-types.js";
import type { Schema } from "../schema.js";
import type { Table } from "../table.js";
import { logSection } from "../utils/logColors.js";
import { listTables } from "./listTables.js";

// materialized views are not listed by information_schema
const CHECKED_KINDS: readonly TableKind[] = ["base", "view"];

/**
 * Compares a registered table with its live counterpart column by column.
 * Descriptions are not compared; a missing one is copied from the other side.
 */
export function reconcileTable(code: Table, live: Table): void {
  if (!code.description) code.description = live.description;
  else if (!live.description) live.description = code.description;

  for (const column of code.columns) {
    if (column.presenter) continue;

    const liveColumn = live.columnByName(column.name);
    if (!liveColumn) {
      throw new ReconciliationError(
        `column "${column.name}" in table "${code.name}" not found in database`,
        code.name,
        column.name
      );
    }

    const liveTag = renderColumnTag(liveColumn, false).toLowerCase();
    const codeTag = renderColumnTag(column, false).toLowerCase();
    if (liveTag !== codeTag) {
      throw new ReconciliationError(
        `column "${column.name}" in table "${code.name}" has wrong field tag: db:\n${liveTag}\nvs code:\n${codeTag}`,
        code.name,
        column.name,
        liveTag,
        codeTag
      );
    }

    if (!column.description) column.description = liveColumn.description;
    else if (!liveColumn.description) liveColumn.description = column.description;
  }

  if (!code.strict) return;

  for (const liveColumn of live.columns) {
    if (!code.columnByName(liveColumn.name)) {
      throw new ReconciliationError(
        `column "${liveColumn.name}" in table "${code.name}" not found in schema`,
        code.name,
        liveColumn.name
      );
    }
  }
}

/** Fails on the first difference between the registered tables and the database. */
export async function checkSchema(schema: Schema, executor: Executor): Promise<void> {
  const { searchPath, silentLogs } = schema.config;
  const tableNames = schema.tableNames(...CHECKED_KINDS);
  if (tableNames.length === 0) return;

  try {
    const live = await listTables(executor, { searchPath, silentLogs }, { tableNames });

    if (live.length !== tableNames.length) {
      const found = new Set(live.map((t) => t.name));
      const missing = tableNames.filter((name) => !found.has(name));
      throw new ReconciliationError(
        `expected ${tableNames.length} tables, got ${live.length} (missing: ${missing.join(", ")})`,
        missing.join(", ")
      );
    }

    for (const liveTable of live) {
      reconcileTable(schema.getByTableName(liveTable.name), liveTable);
    }
  } catch (err) {
    if (err instanceof ReconciliationError) {
      logSection(silentLogs, "SCHEMA CHECK", err.table, [
        { action: "error", label: "Mismatch", detail: err.message },
      ]);
    }
    throw err;
  }

  logSection(silentLogs, "SCHEMA CHECK", searchPath, [
    { action: "success", label: "Matched", detail: tableNames.join(", ") },
  ]);
}
