/**
 * Canonical JSON encoding
 *
 * Produces exactly one byte sequence per logical value: object keys are sorted,
 * no insignificant whitespace is written, and numbers and strings have a single
 * textual form. Baseline files are reviewed in version control, so two runs over
 * the same API must never differ by key order alone.
 */

import { SerializationError } from "./errors.js";

export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

const SHORT_ESCAPES: Record<string, string> = {
  '"': '\\"',
  "\\": "\\\\",
  "\b": "\\b",
  "\f": "\\f",
  "\n": "\\n",
  "\r": "\\r",
  "\t": "\\t",
};

// Control characters, plus surrogates that are not part of a pair
const NEEDS_ESCAPE =
  /["\\\u0000-\u001f]|[\ud800-\udbff](?![\udc00-\udfff])|(?<![\ud800-\udbff])[\udc00-\udfff]/g;

/**
 * Encode a value as canonical JSON text
 */
export function canonicalStringify(value: unknown): string {
  const out: string[] = [];
  write(value, "$", out);
  return out.join("");
}

/**
 * Encode a value as canonical UTF-8 bytes
 */
export function encodeCanonical(value: unknown): Buffer {
  return Buffer.from(canonicalStringify(value), "utf8");
}

export function escapeString(s: string): string {
  return `"${s.replace(NEEDS_ESCAPE, (ch) => SHORT_ESCAPES[ch] ?? unicodeEscape(ch))}"`;
}

function unicodeEscape(ch: string): string {
  return `\\u${ch.charCodeAt(0).toString(16).padStart(4, "0")}`;
}

function formatNumber(n: number, path: string): string {
  if (!Number.isFinite(n)) {
    throw new SerializationError(path, String(n));
  }
  // String(-0) is already "0"
  return String(n);
}

function isPlainObject(value: object): value is Record<string, unknown> {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function describeType(value: unknown): string {
  if (typeof value !== "object" || value === null) return typeof value;
  const name: unknown = value.constructor?.name;
  return typeof name === "string" && name ? name : "object";
}

function write(value: unknown, path: string, out: string[]): void {
  if (value === null) {
    out.push("null");
    return;
  }

  if (typeof value === "string") {
    out.push(escapeString(value));
    return;
  }
  if (typeof value === "number") {
    out.push(formatNumber(value, path));
    return;
  }
  if (typeof value === "boolean") {
    out.push(value ? "true" : "false");
    return;
  }
  if (typeof value !== "object") {
    throw new SerializationError(path, describeType(value));
  }

  if (Array.isArray(value)) {
    out.push("[");
    for (let i = 0; i < value.length; i++) {
      if (i > 0) out.push(",");
      if (!(i in value)) {
        throw new SerializationError(`${path}[${i}]`, "hole");
      }
      write(value[i], `${path}[${i}]`, out);
    }
    out.push("]");
    return;
  }

  if (!isPlainObject(value)) {
    throw new SerializationError(path, describeType(value));
  }

  const keys = Object.keys(value).sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
  out.push("{");
  keys.forEach((key, index) => {
    if (index > 0) out.push(",");
    out.push(escapeString(key), ":");
    write(value[key], `${path}.${key}`, out);
  });
  out.push("}");
}
