import { describe, expect, test } from "vitest";

import { resolveConfig } from "./config.js";
import { AnnotationError } from "./errors.js";
import { RecordType } from "./record.js";
import { buildTable } from "./table.js";
import { categoryType, createBlogSchema, postType } from "./testing/fixtures.js";

const config = resolveConfig({}, {});

describe("buildTable", () => {
  test("columns follow field order", () => {
    const table = buildTable("posts", postType, config);
    expect(table.recordName).toBe("Post");
    expect(table.recordType).toBe(postType);
    expect(table.listColumnNames()).toEqual([
      "id",
      "author_id",
      "slug",
      "locale",
      "title",
      "read_time_minutes",
      "source_id",
      "meta",
      "search",
    ]);
    expect(table.columns.map((c) => c.ordinalPosition)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9]);
    expect(table.columns.every((c) => c.table === table && c.tableName === "posts")).toBe(true);
  });

  test("self references resolve to the table itself", () => {
    const table = buildTable("posts", postType, config);
    expect(table.columnByName("source_id")).toMatchObject({
      referenceTable: "posts",
      referenceColumn: "id",
      referenceOnDelete: "CASCADE",
      nullable: true,
    });
  });

  test("no annotated fields", () => {
    interface Empty {
      note: string;
    }
    const emptyType = new RecordType<Empty>("Empty", () => ({ note: "" })).field("note");
    expect(() => buildTable("empties", emptyType, config)).toThrow(
      new AnnotationError("empties", "Empty", 'no columns found, missing "pg" annotations?')
    );
  });

  test("empty annotations bind no column", () => {
    interface Note {
      id: number;
      body: string;
      draft: string;
    }
    const noteType = new RecordType<Note>("Note", () => ({ id: 0, body: "", draft: "" }))
      .field("id", "type=int,primary")
      .field("body", "type=text")
      .field("draft", "  ");
    expect(buildTable("notes", noteType, config).listColumnNames()).toEqual(["id", "body"]);
  });

  test("only one conflict action per table", () => {
    interface Pair {
      a: string;
      b: string;
    }
    const pairType = new RecordType<Pair>("Pair", () => ({ a: "", b: "" }))
      .field("a", "type=text,unique,conflict=DO NOTHING")
      .field("b", "type=text,unique,conflict=DO NOTHING");
    expect(() => buildTable("pairs", pairType, config)).toThrow(
      'pairs.b: conflict action already declared on column "a"'
    );
  });
});

describe("Table", () => {
  const schema = createBlogSchema();
  const posts = schema.getByTableName("posts");
  const categories = schema.getByTableName("categories");

  test("lookups", () => {
    expect(posts.primaryKey()?.name).toBe("id");
    expect(posts.columnByName("READ_TIME_MINUTES")?.name).toBe("read_time_minutes");
    expect(posts.columnByFieldName("readTime")?.name).toBe("read_time_minutes");
    expect(posts.columnByFieldName("nope")).toBeUndefined();
  });

  test("unique index groups keep declared order", () => {
    expect([...posts.uniqueIndexes()]).toEqual([["posts_slug_locale", ["slug", "locale"]]]);
  });

  test("index names", () => {
    expect(posts.indexes()).toEqual([
      { name: "posts_search_idx", tableName: "posts", columnName: "search", type: "gin" },
    ]);
    expect(categories.indexes()).toEqual([
      { name: "categories_parent_id_fkey", tableName: "categories", columnName: "parent_id", type: "btree" },
    ]);
  });

  test("foreign keys", () => {
    expect(posts.foreignKeys().map((c) => c.name)).toEqual(["author_id", "source_id"]);
  });

  test("columns a copy selects", () => {
    expect(categories.listColumnsForSelectWithoutGenerated().map((c) => c.name)).toEqual([
      "parent_id",
      "name",
    ]);
  });

  test("read-only kinds", () => {
    expect(posts.isReadOnly()).toBe(false);
  });

  test("password hooks", () => {
    const users = schema.getByTableName("users");
    expect(users.hasPassword()).toBe(true);
    expect(users.canEncryptPassword()).toBe(false);
    expect(users.encryptPassword("test-secret")).toBe("test-secret");
  });
});

test("categoryType is usable on its own", () => {
  const table = buildTable("categories", categoryType, config);
  expect(table.columnByName("id")).toMatchObject({ identity: true, autoGenerated: true, primaryKey: true });
});
