export type ConfidenceBand = "clear" | "strong" | "gray-area" | "weak" | "none";
