import { Severity } from "../rules/types.js";

export const SEVERITY_WEIGHTS: Readonly<Record<Severity, number>> = {
  [Severity.Low]: 0.1,
  [Severity.Medium]: 0.3,
  [Severity.High]: 0.5,
  [Severity.Critical]: 0.7,
};

/** Below this confidence a record is flagged for human review. */
export const REVIEW_THRESHOLD = 0.7;
