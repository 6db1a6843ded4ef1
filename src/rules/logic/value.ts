/**
 * JSON-shaped data the logic evaluator reads and produces.
 */
export type Value =
  | null
  | boolean
  | number
  | string
  | readonly Value[]
  | ValueRecord;

export interface ValueRecord {
  readonly [key: string]: Value;
}

export function isValueRecord(value: Value): value is ValueRecord {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

export function isValueList(value: Value): value is readonly Value[] {
  return Array.isArray(value);
}

/**
 * Convert arbitrary parsed input to a Value. Undefined members, functions and
 * non-finite numbers are dropped or mapped to null.
 */
export function toValue(input: unknown): Value {
  if (input === null || input === undefined) {
    return null;
  }
  if (typeof input === "boolean" || typeof input === "string") {
    return input;
  }
  if (typeof input === "number") {
    return Number.isFinite(input) ? input : null;
  }
  if (Array.isArray(input)) {
    return input.map((item) => toValue(item));
  }
  if (input instanceof Date) {
    return input.toISOString();
  }
  if (input instanceof Set) {
    return Array.from(input, (item) => toValue(item));
  }
  if (typeof input === "object") {
    const record: Record<string, Value> = {};
    for (const [key, member] of Object.entries(input)) {
      if (member === undefined || typeof member === "function") {
        continue;
      }
      record[key] = toValue(member);
    }
    return record;
  }
  return null;
}

export function valuesEqual(a: Value, b: Value): boolean {
  if (a === b) {
    return true;
  }
  if (isValueList(a) && isValueList(b)) {
    return (
      a.length === b.length &&
      a.every((item, index) => valuesEqual(item, b[index] ?? null))
    );
  }
  if (
    a !== null &&
    b !== null &&
    typeof a === "object" &&
    typeof b === "object" &&
    !isValueList(a) &&
    !isValueList(b)
  ) {
    const aKeys = Object.keys(a);
    const bKeys = Object.keys(b);
    if (aKeys.length !== bKeys.length) {
      return false;
    }
    return aKeys.every(
      (key) => Object.hasOwn(b, key) && valuesEqual(a[key] ?? null, b[key] ?? null),
    );
  }
  return false;
}

/**
 * Empty strings, empty lists, empty records, zero, false and null are falsy.
 */
export function isTruthy(value: Value): boolean {
  if (value === null) {
    return false;
  }
  if (typeof value === "boolean") {
    return value;
  }
  if (typeof value === "number") {
    return value !== 0;
  }
  if (typeof value === "string") {
    return value.length > 0;
  }
  if (isValueList(value)) {
    return value.length > 0;
  }
  return Object.keys(value).length > 0;
}

/**
 * Order-preserving union under structural equality.
 */
export function uniqueValues(values: readonly Value[]): Value[] {
  const unique: Value[] = [];
  for (const value of values) {
    if (!unique.some((existing) => valuesEqual(existing, value))) {
      unique.push(value);
    }
  }
  return unique;
}

export function describeValue(value: Value): string {
  if (value === null) {
    return "null";
  }
  if (isValueList(value)) {
    return "list";
  }
  return typeof value === "object" ? "record" : typeof value;
}
