import { errorMessage } from "../errors.js";
import { Severity } from "../rules/types.js";
import type { FinalRecord } from "./types.js";

/**
 * Record standing in for a feature whose evidence could not be processed.
 */
export function createErrorRecord(
  featureId: string,
  error: unknown,
  createdAt: string = new Date().toISOString(),
): FinalRecord {
  const record: FinalRecord = {
    feature_id: featureId,
    requires_geo_logic: false,
    reasoning: `Processing failed: ${errorMessage(error)}`,
    related_regulations: [],
    confidence: 0,
    matched_rules: [],
    missing_controls: [],
    evidence_refs: [],
    code_refs: [],
    runtime_observation: "",
    needs_review: true,
    severity: Severity.Critical,
    created_at: createdAt,
    source: "error",
  };
  return Object.freeze(record);
}
