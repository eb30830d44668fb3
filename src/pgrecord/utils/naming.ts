// utils/naming.ts

function isUppercase(c: string): boolean {
  return c >= "A" && c <= "Z";
}

/**
 * Field name to column name.
 * Runs of capitals stay together: "userID" -> "user_id", "ProviderAPIKey" -> "provider_api_key".
 */
export function snakeCase(camel: string): string {
  let out = "";
  let prevWasUpper = false;

  for (let i = 0; i < camel.length; i++) {
    const c = camel.charAt(i);

    if (!isUppercase(c)) {
      out += c;
      prevWasUpper = false;
      continue;
    }

    if (out.length > 0 && !prevWasUpper) {
      out += "_";
    } else {
      // last capital of an acronym starts the next word: "APIKey"
      const next = i + 1;
      if (next > 1 && camel.length - 1 > next && !isUppercase(camel.charAt(next))) {
        out += "_";
      }
    }

    out += c.toLowerCase();
    prevWasUpper = true;
  }

  return out;
}

const ACRONYMS = new Set(["id", "api", "url"]);

/** Table or column name to a type-style name: "user_id" -> "UserID". */
export function pascalCase(snake: string): string {
  return snake
    .split("_")
    .filter((part) => part.length > 0)
    .map((part) => {
      const lower = part.toLowerCase();
      if (ACRONYMS.has(lower)) return lower.toUpperCase();
      return part.charAt(0).toUpperCase() + part.slice(1);
    })
    .join("");
}
