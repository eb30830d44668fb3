// testing/catalogRows.ts

import type { ColumnRow, ConstraintRow } from "../catalog/rows.js";

export function columnRow(
  table: string,
  column: string,
  dataType: string,
  overrides: Partial<ColumnRow> = {}
): ColumnRow {
  return {
    table_name: table,
    table_description: null,
    table_type: "BASE TABLE",
    column_name: column,
    ordinal_position: 1,
    column_description: null,
    column_default: null,
    data_type: dataType,
    is_nullable: false,
    is_identity: false,
    is_generated: false,
    ...overrides,
  };
}

export function constraintRow(
  table: string,
  column: string,
  name: string,
  type: string,
  definition: string,
  indexType = ""
): ConstraintRow {
  return {
    table_name: table,
    column_name: column,
    constraint_name: name,
    constraint_type: type,
    constraint_definition: definition,
    index_type: indexType,
  };
}

/** Live rows of the fixture users table, as the catalog reports them. */
export function liveUserColumns(): ColumnRow[] {
  const users = (column: string, dataType: string, overrides: Partial<ColumnRow>): ColumnRow =>
    columnRow("users", column, dataType, { table_description: "Registered users", ...overrides });

  return [
    users("id", "uuid", { ordinal_position: 1, column_default: "gen_random_uuid()" }),
    users("email", "character varying(255)", {
      ordinal_position: 2,
      column_description: "Login email",
    }),
    users("name", "text", { ordinal_position: 3 }),
    users("password", "text", { ordinal_position: 4 }),
    users("created_at", "timestamp with time zone", {
      ordinal_position: 5,
      column_default: "now()",
    }),
    users("updated_at", "timestamp with time zone", {
      ordinal_position: 6,
      column_default: "now()",
    }),
  ];
}

export function liveUserConstraints(): ConstraintRow[] {
  return [
    constraintRow("users", "email", "users_email_key", "u", "UNIQUE (email)", "btree"),
    constraintRow("users", "id", "users_pkey", "p", "PRIMARY KEY (id)", "btree"),
  ];
}
