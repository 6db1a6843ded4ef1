export type RuleStatus = "matched" | "not_matched" | "failed" | "disabled";

export interface RuleEvaluationEntry {
  readonly rule_id: string;
  readonly status: RuleStatus;
  readonly reason?: string;
}

export interface RulesResult {
  readonly feature_id: string;
  readonly requires_geo_logic: boolean;
  readonly confidence: number;
  /** Catalog order. */
  readonly matched_rules: readonly string[];
  /** Union of requires_controls over matched_rules, first-seen order. */
  readonly missing_controls: readonly string[];
  readonly evaluation_timestamp: string;
  readonly evaluation_log: readonly RuleEvaluationEntry[];
}
