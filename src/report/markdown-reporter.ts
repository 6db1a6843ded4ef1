import type { FinalRecord } from "../decision/types.js";
import { formatPercent, truncateText } from "./report-utils.js";
import type { BatchReport } from "./types.js";

export interface MarkdownRenderOptions {
  readonly showSummary?: boolean;
  readonly showRecords?: boolean;
  readonly maxRecords?: number;
  readonly showReasoning?: boolean;
  readonly reasoningWidth?: number;
}

export function renderMarkdownReport(
  report: BatchReport,
  options: MarkdownRenderOptions = {},
): string {
  const showSummary = options.showSummary ?? true;
  const showRecords = options.showRecords ?? true;
  const showReasoning = options.showReasoning ?? true;
  const reasoningWidth = options.reasoningWidth ?? 120;
  const lines: string[] = [];

  if (showSummary) {
    lines.push(renderHeaderBlock(report));
    lines.push("");
    const counts = report.summary.severity_counts;
    lines.push(
      renderAsciiTable(
        [
          ["Critical", String(counts.critical)],
          ["High", String(counts.high)],
          ["Medium", String(counts.medium)],
          ["Low", String(counts.low)],
        ],
        ["Severity", "Features"],
      ),
    );
  }

  const total = report.records.length;
  if (showRecords && total === 0) {
    lines.push("");
    lines.push("No features processed.");
    return lines.join("\n");
  }
  if (!showRecords) {
    return lines.join("\n");
  }

  const records = applyRecordLimit(report.records, options.maxRecords);
  lines.push("");
  lines.push("### Features");
  lines.push("");
  lines.push(
    renderAsciiTable(
      records.map((record) => [
        record.feature_id,
        record.requires_geo_logic ? "yes" : "no",
        record.severity,
        formatPercent(record.confidence),
        record.needs_review ? "yes" : "no",
        record.matched_rules.length > 0 ? record.matched_rules.join(", ") : "-",
      ]),
      ["Feature", "Geo Logic", "Severity", "Confidence", "Review", "Matched Rules"],
    ),
  );

  if (total > records.length) {
    lines.push("");
    lines.push(
      `Showing ${records.length} of ${total} features. Use --max-records to adjust.`,
    );
  }

  const flagged = records.filter((record) => record.needs_review);
  if (flagged.length > 0) {
    lines.push("");
    lines.push("### Needs Review");
    lines.push("");
    for (const record of flagged) {
      lines.push(renderReviewItem(record, showReasoning, reasoningWidth));
    }
  }

  return lines.join("\n");
}

function renderHeaderBlock(report: BatchReport): string {
  const summary = report.summary;
  const content = [
    "Geocheck Compliance Report",
    `Features: ${summary.total_features}`,
    `Requires Geo Logic: ${summary.requires_geo_logic_count}`,
    `Needs Review: ${summary.needs_review_count}`,
    `Average Confidence: ${
      summary.average_confidence === null
        ? "n/a"
        : formatPercent(summary.average_confidence)
    }`,
  ];
  if (summary.error_count > 0) {
    content.push(`Errors: ${summary.error_count}`);
  }
  if (report.dataset) {
    content.push(`Dataset: ${report.dataset}`);
  }
  return renderAsciiBox(content);
}

function renderReviewItem(
  record: FinalRecord,
  showReasoning: boolean,
  width: number,
): string {
  const head = `- ${record.feature_id} (${record.severity}, ${formatPercent(record.confidence)})`;
  if (!showReasoning) {
    return head;
  }
  return `${head}: ${truncateText(record.reasoning, width)}`;
}

export function renderAsciiBox(content: readonly string[]): string {
  const width = Math.max(...content.map((line) => line.length));
  const top = `+${"-".repeat(width + 2)}+`;
  const body = content.map((line) => {
    const padding = " ".repeat(width - line.length);
    return `| ${line}${padding} |`;
  });
  return [top, ...body, top].join("\n");
}

export function renderAsciiTable(
  rows: readonly string[][],
  headers: readonly string[],
): string {
  const widths = headers.map((header, index) =>
    Math.max(
      header.length,
      ...rows.map((row) => (row[index] ? row[index].length : 0)),
    ),
  );
  const border = `+${widths.map((w) => "-".repeat(w + 2)).join("+")}+`;
  const headerLine = `| ${headers
    .map((header, index) => header.padEnd(widths[index] ?? 0))
    .join(" | ")} |`;
  const body = rows.map(
    (row) =>
      `| ${row
        .map((cell, index) => cell.padEnd(widths[index] ?? 0))
        .join(" | ")} |`,
  );
  return [border, headerLine, border, ...body, border].join("\n");
}

function applyRecordLimit<T>(items: readonly T[], limit?: number): T[] {
  if (!limit || limit <= 0) {
    return [...items];
  }
  return items.slice(0, limit);
}
