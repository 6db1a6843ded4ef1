import type { Severity } from "../rules/types.js";

export type RecordSource = "collaborator" | "fallback" | "error";

export interface FinalRecord {
  readonly feature_id: string;
  readonly requires_geo_logic: boolean;
  readonly reasoning: string;
  readonly related_regulations: readonly string[];
  readonly confidence: number;
  readonly matched_rules: readonly string[];
  readonly missing_controls: readonly string[];
  readonly evidence_refs: readonly string[];
  readonly code_refs: readonly string[];
  readonly runtime_observation: string;
  readonly needs_review: boolean;
  readonly severity: Severity;
  readonly created_at: string;
  readonly source: RecordSource;
}

export const MAX_CODE_REFS = 10;
export const MAX_RELATED_REGULATIONS = 5;
