// sql/buildSchemaDumpSQL.ts

import type { Trigger } from "../model-types.js";
import type { Schema } from "../schema.js";
import { DataTypes } from "../utils/dataTypes.js";
import { buildCreateTableSQL } from "./buildCreateTableSQL.js";
import { buildForeignKeysSQL } from "./buildForeignKeysSQL.js";
import { q, qualifiedName } from "./identifiers.js";

export function buildExtensionsSQL(schema: Schema): string[] {
  const statements: string[] = [];

  if (schema.hasColumnType(DataTypes.uuid) || schema.hasPassword()) {
    statements.push("CREATE EXTENSION IF NOT EXISTS pgcrypto;");
  }
  if (schema.hasColumnType(DataTypes.citext)) {
    statements.push("CREATE EXTENSION IF NOT EXISTS citext;");
  }
  if (schema.hasColumnType(DataTypes.hstore)) {
    statements.push("CREATE EXTENSION IF NOT EXISTS hstore;");
  }

  return statements;
}

/**
 * The updated_at trigger function plus one trigger per base table that has
 * the column and does not have the trigger yet.
 */
export function buildSetTimestampTriggersSQL(
  schema: Schema,
  existing: readonly Trigger[]
): string[] {
  const { updatedAtColumnName, setTimestampTriggerName } = schema.config;
  if (!updatedAtColumnName || !setTimestampTriggerName) return [];

  const functionName = `trigger_${setTimestampTriggerName}`;
  const statements: string[] = [];

  for (const table of schema.tables("base")) {
    const installed = existing.some(
      (t) => t.name === setTimestampTriggerName && t.tableName === table.name
    );
    if (installed) continue;

    const column = table.columnByName(updatedAtColumnName);
    if (
      !column ||
      (column.type !== DataTypes.timestamp && column.type !== DataTypes.timestamptz)
    ) {
      continue;
    }

    if (statements.length === 0) {
      statements.push(
        [
          `CREATE OR REPLACE FUNCTION ${functionName}()`,
          "RETURNS TRIGGER AS $$",
          "BEGIN",
          `  NEW.${q(updatedAtColumnName)} = NOW();`,
          "  RETURN NEW;",
          "END;",
          "$$ LANGUAGE plpgsql;",
        ].join("\n")
      );
    }

    statements.push(
      `CREATE TRIGGER ${q(setTimestampTriggerName)} BEFORE UPDATE ON ${qualifiedName(table)} ` +
        `FOR EACH ROW EXECUTE PROCEDURE ${functionName}();`
    );
  }

  return statements;
}

/**
 * Everything needed to create the registered schema from scratch:
 * schema, extensions, base tables, foreign keys, then timestamp triggers.
 */
export function buildSchemaDumpSQL(schema: Schema, existingTriggers: readonly Trigger[]): string {
  const tables = schema.tables("base");

  const statements = [
    `CREATE SCHEMA IF NOT EXISTS ${q(schema.config.searchPath)};`,
    ...buildExtensionsSQL(schema),
    ...tables.map((t) => buildCreateTableSQL(t)),
    ...tables.flatMap((t) => buildForeignKeysSQL(t)),
    ...buildSetTimestampTriggersSQL(schema, existingTriggers),
  ];

  return statements.join("\n");
}
