import type { Value, ValueMap } from "./types.ts";

export const EMPTY: Value = null;

/**
 * Empty, `false`, `0` and the strings `"false"` / `"0"` are falsy.
 * Everything else, including `""` and an empty mapping, is truthy.
 */
export function isTruthy(value: Value): boolean {
  if (value === null || value === false || value === 0) return false;
  if (value === "false" || value === "0") return false;
  return true;
}

export function toDisplayString(value: Value): string {
  if (value === null) return "";
  if (value instanceof Map) return JSON.stringify(toPlain(value));
  return String(value);
}

export type PlainValue =
  | string
  | number
  | boolean
  | null
  | { [name: string]: PlainValue };

/** Converts nested mappings into plain objects for JSON output. */
export function toPlain(value: Value): PlainValue {
  if (!(value instanceof Map)) return value;
  return Object.fromEntries(
    Array.from(value, ([name, entry]) => [name, toPlain(entry)] as const),
  );
}

export function cloneValue(value: Value): Value {
  if (!(value instanceof Map)) return value;
  return cloneValues(value);
}

export function cloneValues(values: ValueMap): ValueMap {
  const copy: ValueMap = new Map();
  for (const [name, value] of values) {
    copy.set(name, cloneValue(value));
  }
  return copy;
}

/** Follows a dotted path (`modules.passwords`) into nested mappings. */
export function lookupPath(root: Value, path: string[]): Value {
  let current: Value = root;
  for (const segment of path) {
    if (!(current instanceof Map)) return EMPTY;
    current = current.get(segment) ?? EMPTY;
  }
  return current;
}
