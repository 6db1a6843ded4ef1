export {
  calculateConfidence,
  confidenceBand,
} from "./confidence-calculator.js";
export type { ConfidenceBand } from "./types.js";
export { REVIEW_THRESHOLD, SEVERITY_WEIGHTS } from "./weights.js";
