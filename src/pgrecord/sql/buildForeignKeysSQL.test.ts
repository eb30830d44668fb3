import { expect, test } from "vitest";

import { createBlogSchema } from "../testing/fixtures.js";
import { buildForeignKeysSQL, foreignKeyName } from "./buildForeignKeysSQL.js";

test("foreignKeyName", () => {
  expect(foreignKeyName("posts", "author_id")).toBe("posts_author_id_fkey");
});

test("drop then add per reference column", () => {
  const posts = createBlogSchema().getByTableName("posts");

  expect(buildForeignKeysSQL(posts)).toEqual([
    'ALTER TABLE "public"."posts" DROP CONSTRAINT IF EXISTS "posts_author_id_fkey";',
    'ALTER TABLE "public"."posts" ADD CONSTRAINT "posts_author_id_fkey" ' +
      'FOREIGN KEY ("author_id") REFERENCES "public"."users" ("id") ON DELETE CASCADE DEFERRABLE;',
    'ALTER TABLE "public"."posts" DROP CONSTRAINT IF EXISTS "posts_source_id_fkey";',
    'ALTER TABLE "public"."posts" ADD CONSTRAINT "posts_source_id_fkey" ' +
      'FOREIGN KEY ("source_id") REFERENCES "public"."posts" ("id") ON DELETE CASCADE;',
  ]);
});

test("tables without references", () => {
  expect(buildForeignKeysSQL(createBlogSchema().getByTableName("users"))).toEqual([]);
});
