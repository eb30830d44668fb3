// utils/zero.ts

interface Zeroer {
  isZero(): boolean;
}

function isZeroer(value: object): value is Zeroer {
  return "isZero" in value && typeof value.isZero === "function";
}

/**
 * The "unset" test used by argument extraction: empty strings, 0, false,
 * empty collections, invalid or epoch dates and objects reporting isZero().
 */
export function isZero(value: unknown): boolean {
  switch (typeof value) {
    case "undefined":
      return true;
    case "string":
      return value.length === 0;
    case "number":
      return value === 0;
    case "bigint":
      return value === 0n;
    case "boolean":
      return !value;
    case "object":
      break;
    default:
      return false;
  }

  if (value === null) return true;
  if (isZeroer(value)) return value.isZero();
  if (value instanceof Date) {
    const time = value.getTime();
    return Number.isNaN(time) || time === 0;
  }
  if (Array.isArray(value)) return value.length === 0;
  if (value instanceof Uint8Array) return value.length === 0;
  if (value instanceof Map || value instanceof Set) return value.size === 0;

  return Object.keys(value).length === 0;
}
