import { RuleEvaluationError } from "../../errors.js";
import type { Expression } from "./expression.js";
import { resolvePath } from "./path.js";
import {
  describeValue,
  isTruthy,
  isValueList,
  valuesEqual,
  type Value,
} from "./value.js";

export type EvaluationOutcome<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: RuleEvaluationError };

export function ok<T>(value: T): EvaluationOutcome<T> {
  return { ok: true, value };
}

export function failed<T>(message: string): EvaluationOutcome<T> {
  return { ok: false, error: new RuleEvaluationError(message) };
}

/**
 * Evaluate an expression against a normalized context. Type mismatches are
 * returned as failures, never thrown.
 */
export function evaluateExpression(
  expression: Expression,
  context: Value,
): EvaluationOutcome<Value> {
  switch (expression.kind) {
    case "literal":
      return ok(expression.value);
    case "var":
      return ok(resolvePath(context, expression.path));
    case "and":
      return evaluateJunction(expression.operands, context, false);
    case "or":
      return evaluateJunction(expression.operands, context, true);
    case "eq":
      return evaluatePair(expression.left, expression.right, context, (a, b) =>
        ok(valuesEqual(a, b)),
      );
    case "lt":
      return evaluatePair(expression.left, expression.right, context, lessThan);
    case "in":
      return evaluatePair(
        expression.needle,
        expression.haystack,
        context,
        membership,
      );
  }
}

/**
 * Evaluate an expression as a predicate.
 */
export function evaluatePredicate(
  expression: Expression,
  context: Value,
): EvaluationOutcome<boolean> {
  const outcome = evaluateExpression(expression, context);
  return outcome.ok ? ok(isTruthy(outcome.value)) : outcome;
}

// Short-circuits: `and` stops at the first falsy operand, `or` at the first
// truthy one.
function evaluateJunction(
  operands: readonly Expression[],
  context: Value,
  stopWhen: boolean,
): EvaluationOutcome<Value> {
  for (const operand of operands) {
    const outcome = evaluatePredicate(operand, context);
    if (!outcome.ok) {
      return outcome;
    }
    if (outcome.value === stopWhen) {
      return ok(stopWhen);
    }
  }
  return ok(!stopWhen);
}

function evaluatePair(
  left: Expression,
  right: Expression,
  context: Value,
  combine: (a: Value, b: Value) => EvaluationOutcome<Value>,
): EvaluationOutcome<Value> {
  const a = evaluateExpression(left, context);
  if (!a.ok) {
    return a;
  }
  const b = evaluateExpression(right, context);
  if (!b.ok) {
    return b;
  }
  return combine(a.value, b.value);
}

function lessThan(a: Value, b: Value): EvaluationOutcome<Value> {
  if (a === null || b === null) {
    return ok(false);
  }
  if (typeof a !== "number" || typeof b !== "number") {
    return failed(
      `"<" expects numbers, got ${describeValue(a)} and ${describeValue(b)}`,
    );
  }
  return ok(a < b);
}

function membership(needle: Value, haystack: Value): EvaluationOutcome<Value> {
  if (haystack === null) {
    return ok(false);
  }
  if (isValueList(haystack)) {
    return ok(haystack.some((item) => valuesEqual(item, needle)));
  }
  if (typeof haystack === "string") {
    if (typeof needle !== "string") {
      return failed(
        `"in" against a string expects a string needle, got ${describeValue(needle)}`,
      );
    }
    return ok(haystack.includes(needle));
  }
  return failed(`"in" expects a list or string, got ${describeValue(haystack)}`);
}
