import { LogicParseError } from "../../errors.js";
import {
  isValueList,
  isValueRecord,
  uniqueValues,
  type Value,
} from "./value.js";

export type PathSegment =
  | { readonly kind: "field"; readonly name: string }
  | { readonly kind: "wildcard" };

export interface PathExpression {
  readonly source: string;
  readonly segments: readonly PathSegment[];
}

const WILDCARD = "*";

/**
 * Parse a dot-separated path once, at rule load time. An empty string is the
 * path to the whole context.
 */
export function parsePath(source: string): PathExpression {
  if (source === "") {
    return { source, segments: [] };
  }

  const segments = source.split(".").map((part, index): PathSegment => {
    if (part === "") {
      throw new LogicParseError(`Empty segment in path "${source}"`);
    }
    if (part === WILDCARD) {
      if (index === 0) {
        throw new LogicParseError(
          `Wildcard must follow a list field in path "${source}"`,
        );
      }
      return { kind: "wildcard" };
    }
    if (part.includes(WILDCARD)) {
      throw new LogicParseError(
        `Wildcard must be a whole segment in path "${source}"`,
      );
    }
    return { kind: "field", name: part };
  });

  return { source, segments };
}

/**
 * Resolve a parsed path. Unknown fields resolve to null. A wildcard projects
 * the rest of the path across every element of the list it follows, drops
 * elements where the projection is null, flattens one level where the
 * projection is itself a list and removes duplicates.
 */
export function resolvePath(context: Value, path: PathExpression): Value {
  return resolveSegments(context, path.segments);
}

function resolveSegments(
  current: Value,
  segments: readonly PathSegment[],
): Value {
  let value = current;
  for (let index = 0; index < segments.length; index += 1) {
    const segment = segments[index];
    if (!segment) {
      break;
    }
    if (segment.kind === "wildcard") {
      return projectWildcard(value, segments.slice(index + 1));
    }
    value = resolveField(value, segment.name);
    if (value === null) {
      return null;
    }
  }
  return value;
}

function resolveField(value: Value, name: string): Value {
  if (isValueRecord(value)) {
    return Object.hasOwn(value, name) ? (value[name] ?? null) : null;
  }
  if (isValueList(value) && /^\d+$/.test(name)) {
    return value[Number(name)] ?? null;
  }
  return null;
}

function projectWildcard(
  value: Value,
  rest: readonly PathSegment[],
): Value {
  if (!isValueList(value)) {
    return null;
  }

  const projected: Value[] = [];
  for (const element of value) {
    const member = resolveSegments(element, rest);
    if (member === null) {
      continue;
    }
    if (isValueList(member)) {
      projected.push(...member);
    } else {
      projected.push(member);
    }
  }
  return uniqueValues(projected);
}
