import type { FinalRecord } from "../decision/types.js";

export const CSV_COLUMNS = [
  "feature_id",
  "requires_geo_logic",
  "reasoning",
  "related_regulations",
  "confidence",
  "matched_rules",
  "missing_controls",
  "evidence_refs",
  "code_refs",
  "runtime_observation",
  "needs_review",
  "severity",
  "created_at",
] as const satisfies readonly (keyof FinalRecord)[];

const LIST_SEPARATOR = "; ";

/**
 * One header row and one row per record, CRLF-terminated.
 */
export function exportCsv(records: readonly FinalRecord[]): string {
  const lines = [CSV_COLUMNS.join(",")];
  for (const record of records) {
    lines.push(CSV_COLUMNS.map((column) => formatCell(record[column])).join(","));
  }
  return `${lines.join("\r\n")}\r\n`;
}

function formatCell(value: FinalRecord[keyof FinalRecord]): string {
  if (Array.isArray(value)) {
    return escapeCsv(value.join(LIST_SEPARATOR));
  }
  return escapeCsv(String(value));
}

export function escapeCsv(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}
