import { afterEach, describe, expect, test, vi } from "vitest";

import { renderColumnTag } from "../column.js";
import { columnRow, constraintRow } from "../testing/catalogRows.js";
import { FakeExecutor } from "../testing/fakeExecutor.js";
import { listColumns, listConstraints, listTriggers, parseTableKind } from "./listColumns.js";
import { COLUMNS_QUERY, CONSTRAINTS_QUERY, TRIGGERS_QUERY, UNIQUE_INDEXES_QUERY } from "./queries.js";

const options = { searchPath: "public", silentLogs: true };

afterEach(() => {
  vi.restoreAllMocks();
});

function postsCatalog(): FakeExecutor {
  return new FakeExecutor()
    .respond(COLUMNS_QUERY, [
      columnRow("posts", "id", "uuid", {
        ordinal_position: 1,
        column_default: "gen_random_uuid()",
        table_description: "Blog posts",
      }),
      columnRow("posts", "author_id", "uuid", { ordinal_position: 2 }),
      columnRow("posts", "title", "character varying(200)", {
        ordinal_position: 3,
        column_default: "'untitled'::character varying",
        column_description: "Post title",
      }),
      columnRow("posts", "read_time_minutes", "integer", { ordinal_position: 4 }),
      columnRow("posts", "slug", "character varying(100)", { ordinal_position: 5 }),
      columnRow("posts", "locale", "character varying(8)", { ordinal_position: 6 }),
      columnRow("posts", "status", "post_status", { ordinal_position: 7, is_nullable: true }),
      columnRow("posts", "seq", "bigint", { ordinal_position: 8, is_identity: true }),
    ])
    .respond(CONSTRAINTS_QUERY, [
      constraintRow("posts", "id", "posts_pkey", "p", "PRIMARY KEY (id)", "btree"),
      constraintRow(
        "posts",
        "author_id",
        "posts_author_id_fkey",
        "f",
        "FOREIGN KEY (author_id) REFERENCES users(id) ON DELETE SET NULL ON UPDATE CASCADE DEFERRABLE"
      ),
      constraintRow(
        "posts",
        "read_time_minutes",
        "posts_read_time_minutes_check",
        "c",
        "CHECK ((read_time_minutes > 0))"
      ),
      constraintRow(
        "posts",
        "",
        "posts_title_idx",
        "i",
        "CREATE INDEX posts_title_idx ON public.posts USING hash (title)"
      ),
    ])
    .respond(UNIQUE_INDEXES_QUERY, [
      { table_name: "posts", index_name: "posts_slug_locale", index_columns: ["slug", "locale"] },
    ]);
}

describe("listColumns", () => {
  test("runs the catalog queries in order", async () => {
    const executor = postsCatalog();
    await listColumns(executor, options, ["posts"]);

    expect(executor.calls).toEqual([
      { text: COLUMNS_QUERY, values: ["public", ["posts"]] },
      { text: CONSTRAINTS_QUERY, values: ["public", ["posts"]] },
      { text: UNIQUE_INDEXES_QUERY, values: ["public", ["posts"]] },
    ]);
  });

  test("merges constraints and unique indexes into columns", async () => {
    const columns = await listColumns(postsCatalog(), options);

    expect(columns.map((c) => renderColumnTag(c, false))).toEqual([
      "name=id,type=uuid,primary,default=gen_random_uuid()",
      "name=author_id,type=uuid,ref=users(id SET NULL deferrable)",
      "name=title,type=varchar,default='untitled',index=hash",
      "name=read_time_minutes,type=int,check=read_time_minutes > 0",
      "name=slug,type=varchar,unique_index=posts_slug_locale",
      "name=locale,type=varchar,unique_index=posts_slug_locale",
      "name=status,type=post_status,nullable",
      "name=seq,type=bigint,identity",
    ]);
  });

  test("column details", async () => {
    const [id, , title, , , , status, seq] = await listColumns(postsCatalog(), options);

    expect(id).toMatchObject({ tableDescription: "Blog posts.", index: null, ordinalPosition: 1 });
    expect(title).toMatchObject({
      typeArgument: "200",
      description: "Post title.",
      host: "string",
      tableKind: "base",
    });
    expect(status).toMatchObject({ type: "post_status", host: "unknown" });
    expect(seq).toMatchObject({ identity: true, autoGenerated: true, host: "bigint" });
  });

  test("empty catalog", async () => {
    expect(await listColumns(new FakeExecutor(), options)).toEqual([]);
  });

  test("malformed rows are rejected", async () => {
    const executor = new FakeExecutor().respond(COLUMNS_QUERY, [{ table_name: "posts" }]);
    await expect(listColumns(executor, options)).rejects.toThrow();
  });
});

describe("listConstraints", () => {
  test("unparsed definitions keep a null payload and are logged", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const executor = new FakeExecutor().respond(CONSTRAINTS_QUERY, [
      constraintRow("events", "during", "events_during_excl", "c", "EXCLUDE USING gist (during WITH &&)"),
      constraintRow("events", "kind", "events_kind_x", "x", "whatever"),
    ]);

    const constraints = await listConstraints(executor, { searchPath: "public", silentLogs: false });

    expect(constraints).toEqual([
      {
        tableName: "events",
        columnName: "during",
        constraintName: "events_during_excl",
        kind: "c",
        indexType: null,
        check: null,
      },
    ]);
    expect(log).toHaveBeenCalledTimes(3);
  });
});

test("listTriggers", async () => {
  const executor = new FakeExecutor().respond(TRIGGERS_QUERY, [
    {
      event_object_catalog: "app",
      event_object_schema: "public",
      trigger_name: "set_timestamp",
      event_manipulation: "UPDATE",
      event_object_table: "users",
      action_statement: "EXECUTE FUNCTION trigger_set_timestamp()",
      action_orientation: "ROW",
      action_timing: "BEFORE",
    },
  ]);

  expect(await listTriggers(executor, options)).toEqual([
    {
      catalog: "app",
      searchPath: "public",
      name: "set_timestamp",
      manipulation: "UPDATE",
      tableName: "users",
      actionStatement: "EXECUTE FUNCTION trigger_set_timestamp()",
      actionOrientation: "ROW",
      actionTiming: "BEFORE",
    },
  ]);
  expect(executor.calls[0]?.values).toEqual(["public", []]);
});

test.each([
  ["BASE TABLE", "base"],
  ["VIEW", "view"],
  ["materialized view", "materialized-view"],
  ["FOREIGN", "base"],
])("parseTableKind(%s)", (text, kind) => {
  expect(parseTableKind(text)).toBe(kind);
});
