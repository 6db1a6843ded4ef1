import type { FinalRecord } from "../decision/types.js";
import { Severity } from "../rules/types.js";
import type {
  BatchReport,
  BatchSummary,
  ReportInput,
  SeverityCounts,
} from "./types.js";

export function buildBatchReport(input: ReportInput): BatchReport {
  return {
    tool: { name: "geocheck", version: input.toolVersion },
    generated_at: input.generatedAt,
    dataset: input.dataset,
    summary: summarizeRecords(input.records),
    records: input.records,
  };
}

export function summarizeRecords(records: readonly FinalRecord[]): BatchSummary {
  const severityCounts: SeverityCounts = {
    critical: 0,
    high: 0,
    medium: 0,
    low: 0,
  };
  let requiresGeoLogic = 0;
  let needsReview = 0;
  let errors = 0;
  let confidenceSum = 0;

  for (const record of records) {
    switch (record.severity) {
      case Severity.Critical:
        severityCounts.critical += 1;
        break;
      case Severity.High:
        severityCounts.high += 1;
        break;
      case Severity.Medium:
        severityCounts.medium += 1;
        break;
      case Severity.Low:
        severityCounts.low += 1;
        break;
    }
    if (record.requires_geo_logic) {
      requiresGeoLogic += 1;
    }
    if (record.needs_review) {
      needsReview += 1;
    }
    if (record.source === "error") {
      errors += 1;
    }
    confidenceSum += record.confidence;
  }

  return {
    total_features: records.length,
    requires_geo_logic_count: requiresGeoLogic,
    high_severity_count: severityCounts.high + severityCounts.critical,
    needs_review_count: needsReview,
    error_count: errors,
    average_confidence:
      records.length > 0 ? confidenceSum / records.length : null,
    severity_counts: severityCounts,
  };
}
