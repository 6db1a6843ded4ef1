import { LogicParseError } from "../../errors.js";
import { parsePath, type PathExpression } from "./path.js";
import { toValue, type Value } from "./value.js";

export type Expression =
  | { readonly kind: "and"; readonly operands: readonly Expression[] }
  | { readonly kind: "or"; readonly operands: readonly Expression[] }
  | { readonly kind: "eq"; readonly left: Expression; readonly right: Expression }
  | { readonly kind: "lt"; readonly left: Expression; readonly right: Expression }
  | {
      readonly kind: "in";
      readonly needle: Expression;
      readonly haystack: Expression;
    }
  | { readonly kind: "var"; readonly path: PathExpression }
  | { readonly kind: "literal"; readonly value: Value };

export type Operator = "and" | "or" | "==" | "<" | "in" | "var";

export const OPERATORS: readonly Operator[] = ["and", "or", "==", "<", "in", "var"];

function isOperator(name: string): name is Operator {
  return (OPERATORS as readonly string[]).includes(name);
}

/**
 * Parse a raw logic document (`{"and": [...]}`, `{"var": "a.b"}`, literals)
 * into an expression tree.
 *
 * @throws {LogicParseError} on an unknown operator, wrong arity or a bad path
 */
export function parseLogic(raw: unknown): Expression {
  if (raw === null || typeof raw !== "object") {
    return literal(raw);
  }
  if (Array.isArray(raw)) {
    if (raw.some((item) => isOperatorNode(item))) {
      throw new LogicParseError(
        "Operators are not allowed inside a literal list",
      );
    }
    return literal(raw);
  }

  const keys = Object.keys(raw);
  if (keys.length !== 1) {
    throw new LogicParseError(
      `Logic node must have exactly one operator, found ${keys.length}`,
    );
  }
  const name = keys[0] ?? "";
  if (!isOperator(name)) {
    throw new LogicParseError(`Unknown operator "${name}"`);
  }
  const operand: unknown = Object.values(raw)[0];

  switch (name) {
    case "and":
    case "or":
      return {
        kind: name,
        operands: operandList(name, operand, 1).map((item) => parseLogic(item)),
      };
    case "==": {
      const [left, right] = binaryOperands(name, operand);
      return { kind: "eq", left: parseLogic(left), right: parseLogic(right) };
    }
    case "<": {
      const [left, right] = binaryOperands(name, operand);
      return { kind: "lt", left: parseLogic(left), right: parseLogic(right) };
    }
    case "in": {
      const [needle, haystack] = binaryOperands(name, operand);
      return {
        kind: "in",
        needle: parseLogic(needle),
        haystack: parseLogic(haystack),
      };
    }
    case "var":
      return { kind: "var", path: parsePath(varPath(operand)) };
  }
}

/**
 * Inverse of {@link parseLogic}, used when a catalog is written back.
 */
export function serializeLogic(expression: Expression): Value {
  switch (expression.kind) {
    case "and":
    case "or":
      return {
        [expression.kind]: expression.operands.map((item) => serializeLogic(item)),
      };
    case "eq":
      return {
        "==": [serializeLogic(expression.left), serializeLogic(expression.right)],
      };
    case "lt":
      return {
        "<": [serializeLogic(expression.left), serializeLogic(expression.right)],
      };
    case "in":
      return {
        in: [serializeLogic(expression.needle), serializeLogic(expression.haystack)],
      };
    case "var":
      return { var: expression.path.source };
    case "literal":
      return expression.value;
  }
}

function literal(raw: unknown): Expression {
  if (typeof raw === "number" && !Number.isFinite(raw)) {
    throw new LogicParseError("Literal numbers must be finite");
  }
  if (raw === undefined || typeof raw === "function" || typeof raw === "symbol") {
    throw new LogicParseError(`Unsupported literal of type ${typeof raw}`);
  }
  return { kind: "literal", value: toValue(raw) };
}

function isOperatorNode(item: unknown): boolean {
  if (item === null || typeof item !== "object") {
    return false;
  }
  if (Array.isArray(item)) {
    return item.some((member) => isOperatorNode(member));
  }
  return Object.keys(item).some((key) => isOperator(key));
}

function operandList(name: Operator, operand: unknown, min: number): unknown[] {
  if (!Array.isArray(operand)) {
    throw new LogicParseError(`"${name}" expects a list of operands`);
  }
  if (operand.length < min) {
    throw new LogicParseError(
      `"${name}" expects at least ${min} operand(s), got ${operand.length}`,
    );
  }
  return operand;
}

function binaryOperands(name: Operator, operand: unknown): [unknown, unknown] {
  const list = operandList(name, operand, 2);
  if (list.length !== 2) {
    throw new LogicParseError(
      `"${name}" expects exactly 2 operands, got ${list.length}`,
    );
  }
  return [list[0], list[1]];
}

function varPath(operand: unknown): string {
  if (typeof operand === "string") {
    return operand;
  }
  if (Array.isArray(operand) && operand.length === 1) {
    const [first] = operand;
    if (typeof first === "string") {
      return first;
    }
  }
  throw new LogicParseError('"var" expects a path string');
}
