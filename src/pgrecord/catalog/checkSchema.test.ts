import { describe, expect, test } from "vitest";

import { ReconciliationError } from "../errors.js";
import { RecordType } from "../record.js";
import { strict, view } from "../schema.js";
import { columnRow, liveUserColumns, liveUserConstraints } from "../testing/catalogRows.js";
import { FakeExecutor } from "../testing/fakeExecutor.js";
import { createTestSchema, userType, type User } from "../testing/fixtures.js";
import { checkSchema, reconcileTable } from "./checkSchema.js";
import { listTables } from "./listTables.js";
import { COLUMNS_QUERY, CONSTRAINTS_QUERY } from "./queries.js";

function liveUsers(columns = liveUserColumns()): FakeExecutor {
  return new FakeExecutor()
    .respond(COLUMNS_QUERY, columns)
    .respond(CONSTRAINTS_QUERY, liveUserConstraints());
}

describe("checkSchema", () => {
  test("matching schema back-fills descriptions", async () => {
    const schema = createTestSchema();
    const users = schema.register("users", userType);
    const executor = liveUsers();

    await checkSchema(schema, executor);

    expect(executor.calls[0]?.values).toEqual(["public", ["users"]]);
    expect(users.description).toBe("Registered users.");
    expect(users.columnByName("email")?.description).toBe("Login email.");
  });

  test("different column definitions", async () => {
    const schema = createTestSchema();
    schema.register("users", userType);
    const columns = liveUserColumns().map((row) =>
      row.column_name === "name" ? { ...row, is_nullable: true } : row
    );

    await expect(checkSchema(schema, liveUsers(columns))).rejects.toThrow(
      new ReconciliationError(
        'column "name" in table "users" has wrong field tag: db:\nname=name,type=text,nullable\nvs code:\nname=name,type=text',
        "users"
      )
    );
  });

  test("missing live column", async () => {
    const schema = createTestSchema();
    schema.register("users", userType);
    const columns = liveUserColumns().filter((row) => row.column_name !== "password");

    await expect(checkSchema(schema, liveUsers(columns))).rejects.toThrow(
      'column "password" in table "users" not found in database'
    );
  });

  test("extra live columns only fail strict tables", async () => {
    const columns = [
      ...liveUserColumns(),
      columnRow("users", "legacy", "text", { ordinal_position: 7, is_nullable: true }),
    ];

    const lenient = createTestSchema();
    lenient.register("users", userType);
    await expect(checkSchema(lenient, liveUsers(columns))).resolves.toBeUndefined();

    const strictSchema = createTestSchema();
    strictSchema.register("users", userType, strict);
    await expect(checkSchema(strictSchema, liveUsers(columns))).rejects.toThrow(
      'column "legacy" in table "users" not found in schema'
    );
  });

  test("missing tables", async () => {
    interface ActiveUser {
      id: string;
    }
    const schema = createTestSchema();
    schema.register("users", userType);
    schema.register(
      "active_users",
      new RecordType<ActiveUser>("ActiveUser", () => ({ id: "" })).field("id", "type=uuid"),
      view
    );

    await expect(checkSchema(schema, liveUsers())).rejects.toThrow(
      "expected 2 tables, got 1 (missing: active_users)"
    );
  });

  test("nothing registered", async () => {
    const executor = new FakeExecutor();
    await checkSchema(createTestSchema(), executor);
    expect(executor.calls).toEqual([]);
  });
});

describe("reconcileTable", () => {
  const describedUserType = new RecordType<User>("User", () => userType.create())
    .describe("Application users")
    .field("id", "type=uuid,primary")
    .field("email", "type=varchar(255),unique", { description: "Sign-in address" })
    .field("name", "type=text")
    .field("password", "password")
    .field("createdAt", "type=timestamptz,default=now()")
    .field("updatedAt", "type=timestamptz,default=now()");

  test("code descriptions fill the live side", async () => {
    const code = createTestSchema().register("users", describedUserType);
    const columns = liveUserColumns().map((row) => ({
      ...row,
      table_description: null,
      column_description: null,
    }));
    const [live] = await listTables(
      liveUsers(columns),
      { searchPath: "public", silentLogs: true },
      { tableNames: ["users"] }
    );
    if (!live) throw new Error("no live table");

    expect(() => reconcileTable(code, live)).not.toThrow();
    expect(live.description).toBe("Application users");
    expect(live.columnByName("email")?.description).toBe("Sign-in address");
    expect(live.columnByName("name")?.description).toBe("");
    expect(code.description).toBe("Application users");
  });
});
