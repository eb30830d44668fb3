import { expect, test } from "vitest";

import { pascalCase, snakeCase } from "./naming.js";

test.each([
  ["name", "name"],
  ["userID", "user_id"],
  ["ID", "id"],
  ["CreatedAt", "created_at"],
  ["ProviderAPIKey", "provider_api_key"],
  ["HTMLBody", "html_body"],
])("snakeCase(%s) = %s", (input, expected) => {
  expect(snakeCase(input)).toBe(expected);
});

test.each([
  ["users", "Users"],
  ["user_id", "UserID"],
  ["blog_posts", "BlogPosts"],
  ["url", "URL"],
  ["api_keys", "APIKeys"],
  ["__drafts", "Drafts"],
])("pascalCase(%s) = %s", (input, expected) => {
  expect(pascalCase(input)).toBe(expected);
});
