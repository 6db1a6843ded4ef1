import type { FinalRecord } from "../decision/types.js";

export interface ToolInfo {
  readonly name: "geocheck";
  readonly version: string;
}

export interface SeverityCounts {
  critical: number;
  high: number;
  medium: number;
  low: number;
}

export interface BatchSummary {
  readonly total_features: number;
  readonly requires_geo_logic_count: number;
  readonly high_severity_count: number;
  readonly needs_review_count: number;
  readonly error_count: number;
  /** Mean confidence, or null for an empty batch. */
  readonly average_confidence: number | null;
  readonly severity_counts: SeverityCounts;
}

export interface BatchReport {
  readonly tool: ToolInfo;
  readonly generated_at: string;
  readonly dataset?: string;
  readonly summary: BatchSummary;
  readonly records: readonly FinalRecord[];
}

export interface ReportInput {
  readonly toolVersion: string;
  readonly generatedAt: string;
  readonly dataset?: string;
  readonly records: readonly FinalRecord[];
}
