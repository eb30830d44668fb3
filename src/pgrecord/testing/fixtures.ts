// testing/fixtures.ts

import { RecordType } from "../record.js";
import { Schema } from "../schema.js";

export interface User {
  id: string;
  email: string;
  name: string;
  password: string;
  createdAt: Date;
  updatedAt: Date;
}

export const userType = new RecordType<User>("User", () => ({
  id: "",
  email: "",
  name: "",
  password: "",
  createdAt: new Date(0),
  updatedAt: new Date(0),
}))
  .field("id", "type=uuid,primary")
  .field("email", "type=varchar(255),unique")
  .field("name", "type=text")
  .field("password", "password")
  .field("createdAt", "type=timestamptz,default=now()")
  .field("updatedAt", "type=timestamptz,default=now()");

export interface Category {
  id: number;
  parentID: number | null;
  name: string;
}

export const categoryType = new RecordType<Category>("Category", () => ({
  id: 0,
  parentID: null,
  name: "",
}))
  .field("id", "type=int,primary,identity")
  .field("parentID", "type=int,nullable,ref=(id),index", { optional: true })
  .field("name", "type=text,unique");

export interface Post {
  id: string;
  authorID: string;
  slug: string;
  locale: string;
  title: string;
  readTime: number;
  sourceID: string | null;
  meta: Record<string, unknown>;
  search: string | null;
}

export const postType = new RecordType<Post>("Post", () => ({
  id: "",
  authorID: "",
  slug: "",
  locale: "",
  title: "",
  readTime: 0,
  sourceID: null,
  meta: {},
  search: null,
}))
  .field("id", "type=uuid,primary")
  .field("authorID", "type=uuid,ref=users(id deferrable)")
  .field("slug", "type=varchar(100),unique_index=posts_slug_locale")
  .field("locale", "type=varchar(8),unique_index=posts_slug_locale")
  .field("title", "type=text")
  .field("readTime", "name=read_time_minutes,type=int,check=read_time_minutes > 0")
  .field("sourceID", "type=uuid,nullable,ref=self(id)", { optional: true })
  .field("meta", "type=jsonb,default='{}'")
  .field("search", "type=tsvector,nullable,index=gin", { optional: true });

export function createTestSchema(): Schema {
  return new Schema({ searchPath: "public", tagKey: "pg", silentLogs: true });
}

/** users, categories and posts, registered in that order. */
export function createBlogSchema(): Schema {
  const schema = createTestSchema();
  schema.register("users", userType);
  schema.register("categories", categoryType);
  schema.register("posts", postType);
  return schema;
}
