import { describe, expect, test } from "vitest";

import { ScanError } from "../errors.js";
import { RecordType } from "../record.js";
import { strict } from "../schema.js";
import { createBlogSchema, createTestSchema, userType } from "../testing/fixtures.js";
import { createScanPlan, scanRow, scanRows } from "./scanner.js";

interface Profile {
  id: number;
  bio: string;
  avatar: string | null;
  views: bigint;
  score: number;
  seenAt: Date | null;
  labels: string[];
}

const profileType = new RecordType<Profile>("Profile", () => ({
  id: 0,
  bio: "",
  avatar: null,
  views: 0n,
  score: 0,
  seenAt: null,
  labels: [],
}))
  .field("id", "type=int,primary,identity")
  .field("bio", "type=text,nullable")
  .field("avatar", "type=uuid,nullable", { optional: true })
  .field("views", "type=bigint")
  .field("score", "type=numeric")
  .field("seenAt", "type=timestamptz,nullable", { optional: true })
  .field("labels", "type=text", {
    decode: (value) => (typeof value === "string" && value !== "" ? value.split(",") : []),
  });

function profiles() {
  const schema = createTestSchema();
  return schema.register("profiles", profileType);
}

describe("createScanPlan", () => {
  test("one step per returned field", () => {
    const plan = createScanPlan(profiles(), ["id", "bio", "avatar", "extra"]);
    expect(plan.steps.map((s) => s.kind)).toEqual(["default", "nullable", "default", "discard"]);
  });

  test("unscannable columns are discarded", () => {
    const posts = createBlogSchema().getByTableName("posts");
    expect(createScanPlan(posts, ["search"]).steps.map((s) => s.kind)).toEqual(["discard"]);
  });

  test("strict tables reject unknown fields", () => {
    const table = createTestSchema().register("profiles", profileType, strict);
    expect(() => createScanPlan(table, ["nope"])).toThrow(
      new ScanError("profiles", "nope", "record doesn't have corresponding row field: nope (strict check)")
    );
  });

  test("password columns decrypt only with a hook", () => {
    const schema = createBlogSchema();
    const users = schema.getByTableName("users");
    expect(createScanPlan(users, ["password"]).steps.map((s) => s.kind)).toEqual(["default"]);

    schema.handlePassword({ decrypt: (_t, v) => v });
    expect(createScanPlan(users, ["password"]).steps.map((s) => s.kind)).toEqual(["credential"]);
  });
});

describe("scanRow", () => {
  const fields = ["id", "bio", "avatar", "views", "score", "seen_at", "labels"];

  test("converts driver values", () => {
    const table = profiles();
    const profile = scanRow(
      createScanPlan(table, fields),
      {
        id: 7,
        bio: null,
        avatar: null,
        views: "9007199254740993",
        score: "4.5",
        seen_at: "2024-05-01T10:00:00.000Z",
        labels: "a,b",
      },
      profileType.create()
    );

    expect(profile).toEqual({
      id: 7,
      bio: "",
      avatar: null,
      views: 9007199254740993n,
      score: 4.5,
      seenAt: new Date("2024-05-01T10:00:00.000Z"),
      labels: ["a", "b"],
    });
  });

  test("null into a required field", () => {
    const table = profiles();
    expect(() =>
      scanRow(createScanPlan(table, ["views"]), { views: null }, profileType.create())
    ).toThrow("profiles: null value for non-optional field views");
  });

  test("values the host kind cannot take", () => {
    const table = profiles();
    expect(() =>
      scanRow(createScanPlan(table, ["views"]), { views: "many" }, profileType.create())
    ).toThrow("profiles: unsupported decode type for views: string into bigint");
    expect(() =>
      scanRow(createScanPlan(table, ["score"]), { score: "high" }, profileType.create())
    ).toThrow("profiles: unsupported decode type for score: string into float");
  });

  test("credentials", () => {
    const schema = createBlogSchema().handlePassword({
      decrypt: (_t, v) => (v === "hashed" ? "test-secret" : ""),
    });
    const users = schema.getByTableName("users");
    const plan = createScanPlan(users, ["password"]);

    expect(scanRow(plan, { password: "hashed" }, userType.create()).password).toBe("test-secret");
    expect(scanRow(plan, { password: "other" }, { ...userType.create(), password: "kept" }).password).toBe(
      "kept"
    );
    expect(() => scanRow(plan, { password: 5 }, userType.create())).toThrow(
      "users: password column password expected a string but got number"
    );
  });

  test("credentials skip NULL and decode bytes", () => {
    interface Account {
      id: number;
      secret: string;
    }
    const accountType = new RecordType<Account>("Account", () => ({ id: 0, secret: "" }))
      .field("id", "type=int,primary")
      .field("secret", "password,nullable");
    const schema = createTestSchema().handlePassword({ decrypt: (_t, v) => `plain:${v}` });
    const plan = createScanPlan(schema.register("accounts", accountType), ["id", "secret"]);

    expect(plan.steps.map((s) => s.kind)).toEqual(["default", "credential"]);
    expect(scanRow(plan, { id: 1, secret: null }, { id: 0, secret: "kept" })).toEqual({ id: 1, secret: "kept" });
    expect(scanRow(plan, { id: 2, secret: Buffer.from("hashed") }, accountType.create())).toEqual({
      id: 2,
      secret: "plain:hashed",
    });
  });
});

test("scanRows builds one record per row", () => {
  const table = profiles();
  const records = scanRows(table, profileType, {
    fields: ["id", "score"],
    rows: [
      { id: 1, score: 1.5 },
      { id: 2, score: "2" },
    ],
  });

  expect(records.map((r) => [r.id, r.score])).toEqual([
    [1, 1.5],
    [2, 2],
  ]);
});
