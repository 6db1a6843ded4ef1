export { parseLogic, serializeLogic, OPERATORS } from "./expression.js";
export type { Expression, Operator } from "./expression.js";
export { parsePath, resolvePath } from "./path.js";
export type { PathExpression, PathSegment } from "./path.js";
export {
  evaluateExpression,
  evaluatePredicate,
  failed,
  ok,
} from "./evaluator.js";
export type { EvaluationOutcome } from "./evaluator.js";
export {
  isTruthy,
  toValue,
  uniqueValues,
  valuesEqual,
} from "./value.js";
export type { Value, ValueRecord } from "./value.js";
