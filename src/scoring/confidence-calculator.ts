import type { Severity } from "../rules/types.js";
import type { ConfidenceBand } from "./types.js";
import { SEVERITY_WEIGHTS } from "./weights.js";

/**
 * Sum the severity weights of the matched rules and divide by the number of
 * rules in the whole catalog, disabled and non-matching ones included.
 */
export function calculateConfidence(
  matchedSeverities: readonly Severity[],
  totalRules: number,
): number {
  if (totalRules <= 0) {
    return 0;
  }
  const accumulated = matchedSeverities.reduce(
    (sum, severity) => sum + (SEVERITY_WEIGHTS[severity] ?? 0),
    0,
  );
  return Math.min(Math.max(accumulated / totalRules, 0), 1);
}

export function confidenceBand(confidence: number): ConfidenceBand {
  if (confidence >= 0.9) {
    return "clear";
  }
  if (confidence >= 0.7) {
    return "strong";
  }
  if (confidence >= 0.4) {
    return "gray-area";
  }
  if (confidence >= 0.2) {
    return "weak";
  }
  return "none";
}
