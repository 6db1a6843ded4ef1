import { normalizeEvidence } from "../evidence/normalizer.js";
import type { EvaluationContext, EvidencePack } from "../evidence/types.js";
import type { Logger } from "../logging/logger.js";
import { silentLogger } from "../logging/logger.js";
import type { RuleCatalog } from "../rules/catalog.js";
import {
  evaluatePredicate,
  type EvaluationOutcome,
} from "../rules/logic/evaluator.js";
import { RuleEvaluationError } from "../errors.js";
import type { CompiledRule, Severity } from "../rules/types.js";
import { calculateConfidence } from "../scoring/confidence-calculator.js";
import type { RuleEvaluationEntry, RulesResult } from "./types.js";

export interface EvaluationEngineOptions {
  readonly logger?: Logger;
  readonly now?: () => Date;
}

/**
 * Runs a read-only rule catalog against evidence packs. Holds no state
 * between evaluations, so one engine may serve a whole batch.
 */
export class EvaluationEngine {
  private readonly catalog: RuleCatalog;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(catalog: RuleCatalog, options: EvaluationEngineOptions = {}) {
    this.catalog = catalog;
    this.logger = options.logger ?? silentLogger();
    this.now = options.now ?? (() => new Date());
  }

  evaluate(pack: EvidencePack): RulesResult {
    const context = normalizeEvidence(pack);
    const log: RuleEvaluationEntry[] = [];
    const matchedRules: string[] = [];
    const matchedSeverities: Severity[] = [];
    const missingControls = new Set<string>();

    this.logger.info(
      { featureId: pack.feature_id, rules: this.catalog.size },
      "Evaluating rules",
    );

    for (const compiled of this.catalog.compiledRules()) {
      const { rule } = compiled;
      if (!rule.enabled) {
        log.push({ rule_id: rule.id, status: "disabled" });
        continue;
      }

      const outcome = evaluateRule(compiled, context);
      if (!outcome.ok) {
        this.logger.warn(
          {
            featureId: pack.feature_id,
            ruleId: rule.id,
            reason: outcome.error.message,
          },
          "Rule evaluation failed",
        );
        log.push({
          rule_id: rule.id,
          status: "failed",
          reason: outcome.error.message,
        });
        continue;
      }

      if (!outcome.value) {
        log.push({ rule_id: rule.id, status: "not_matched" });
        continue;
      }

      this.logger.debug(
        { featureId: pack.feature_id, ruleId: rule.id },
        "Rule matched",
      );
      log.push({ rule_id: rule.id, status: "matched" });
      matchedRules.push(rule.id);
      matchedSeverities.push(rule.severity);
      for (const control of rule.requires_controls) {
        missingControls.add(control);
      }
    }

    return {
      feature_id: pack.feature_id,
      requires_geo_logic: matchedRules.length > 0,
      confidence: calculateConfidence(matchedSeverities, this.catalog.size),
      matched_rules: matchedRules,
      missing_controls: Array.from(missingControls),
      evaluation_timestamp: this.now().toISOString(),
      evaluation_log: log,
    };
  }
}

/**
 * Evaluate one compiled rule. Logic that failed to compile, and logic that
 * fails at run time, both come back as a failure outcome.
 */
export function evaluateRule(
  compiled: CompiledRule,
  context: EvaluationContext,
): EvaluationOutcome<boolean> {
  if (!compiled.logic.ok) {
    return {
      ok: false,
      error: new RuleEvaluationError(compiled.logic.error.message),
    };
  }
  return evaluatePredicate(compiled.logic.expression, context);
}
