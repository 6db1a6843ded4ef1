export { EvaluationEngine, evaluateRule } from "./evaluation-engine.js";
export type { EvaluationEngineOptions } from "./evaluation-engine.js";
export {
  RulesResultSchema,
  parseRulesResult,
  serializeRulesResult,
} from "./rules-result.js";
export type { RuleEvaluationEntry, RuleStatus, RulesResult } from "./types.js";
