/** The type a raw token was read as. */
export type ValueType = "int" | "float" | "string";

/** A parsed token, tagged with the type it was read as. */
export type TypedValue =
  | { type: "int"; value: number }
  | { type: "float"; value: number }
  | { type: "string"; value: string };

/** The plain value stored for a metadata key. */
export type MetadataValue = number | string;

const INT_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const SPECIAL_FLOATS = new Map<string, number>([
  ["inf", Infinity],
  ["infinity", Infinity],
  ["nan", NaN],
]);

type Attempt = (token: string) => TypedValue | null;

function parseInt10(token: string): TypedValue | null {
  if (!INT_PATTERN.test(token)) return null;
  const value = Number.parseInt(token, 10);
  // Past 2^53 a number drops digits; keep the token as written.
  if (!Number.isSafeInteger(value)) return { type: "string", value: token };
  return { type: "int", value };
}

function parseFloat64(token: string): TypedValue | null {
  if (FLOAT_PATTERN.test(token)) {
    return { type: "float", value: Number.parseFloat(token) };
  }

  const sign = token.startsWith("-") ? -1 : 1;
  const body = token.replace(/^[+-]/, "").toLowerCase();
  const special = SPECIAL_FLOATS.get(body);
  if (special === undefined) return null;
  return { type: "float", value: sign * special };
}

function unquote(token: string): TypedValue {
  if (token.length >= 2 && token.startsWith('"') && token.endsWith('"')) {
    return { type: "string", value: token.slice(1, -1) };
  }
  return { type: "string", value: token };
}

// Tried in order; the string fallback always succeeds.
const ATTEMPTS: Attempt[] = [parseInt10, parseFloat64];

/**
 * Convert a raw token to its best typed value.
 *
 * Integers are tried first, then floating point numbers. Anything else is a
 * string, with one layer of surrounding double quotes removed.
 */
export function castToBest(token: string): TypedValue {
  const trimmed = token.trim();
  for (const attempt of ATTEMPTS) {
    const result = attempt(trimmed);
    if (result !== null) return result;
  }
  return unquote(token);
}
