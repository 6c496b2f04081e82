import type { JsonValue } from "../contract/types.js";

const isPlainObject = (value: object): boolean => {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
};

function toJsonValue(value: unknown, path: string): JsonValue {
  if (value === null || typeof value === "string" || typeof value === "boolean") {
    return value;
  }
  if (typeof value === "number") {
    if (!Number.isFinite(value)) {
      throw new Error(`Invalid JSON value at ${path}: non-finite number`);
    }
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((entry: unknown, index) => toJsonValue(entry, `${path}[${index}]`));
  }
  if (typeof value === "object") {
    if (!isPlainObject(value)) {
      throw new Error(`Invalid JSON object at ${path}: non-plain object`);
    }
    const record: { [key: string]: JsonValue } = {};
    for (const [key, nested] of Object.entries(value)) {
      record[key] = toJsonValue(nested, `${path}.${key}`);
    }
    return record;
  }
  throw new Error(`Invalid JSON value at ${path}: ${typeof value}`);
}

function encode(value: JsonValue): string {
  if (value === null || typeof value !== "object") {
    return JSON.stringify(value);
  }
  if (Array.isArray(value)) {
    return `[${value.map(encode).join(",")}]`;
  }
  const keys = Object.keys(value).sort();
  return `{${keys.map((key) => `${JSON.stringify(key)}:${encode(value[key])}`).join(",")}}`;
}

/**
 * Deterministic JSON serialization with sorted object keys.
 * Throws on values JSON cannot represent faithfully (undefined, functions,
 * non-finite numbers, class instances).
 */
export function stableStringify(value: unknown): string {
  return encode(toJsonValue(value, "$"));
}

/** Render JSONL with stable serialization, always ending in a newline. */
export function toStableJsonl(values: readonly unknown[]): string {
  return values.map((value) => stableStringify(value)).join("\n") + "\n";
}
