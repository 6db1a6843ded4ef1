import { describe, expect, it } from "vitest";
import { createErrorRecord } from "../../src/decision/error-record.js";
import type { FinalRecord } from "../../src/decision/types.js";
import { CSV_COLUMNS, exportCsv } from "../../src/report/csv-exporter.js";
import { buildBatchReport } from "../../src/report/json-reporter.js";
import { renderMarkdownReport } from "../../src/report/markdown-reporter.js";
import { truncateText } from "../../src/report/report-utils.js";
import { Severity } from "../../src/rules/types.js";

const createdAt = "2026-03-01T12:00:00.000Z";

const curfew: FinalRecord = {
  feature_id: "curfew-login",
  requires_geo_logic: true,
  reasoning: 'Minor "curfew", Utah',
  related_regulations: ["Utah Act", "COPPA"],
  confidence: 0.1,
  matched_rules: ["UT_MINORS_CURFEW"],
  missing_controls: ["curfew_enforcement", "age_verification"],
  evidence_refs: ["evidence/curfew-login.json"],
  code_refs: ["src/a.ts:1"],
  runtime_observation: "Persona US, age 16",
  needs_review: true,
  severity: Severity.High,
  created_at: createdAt,
  source: "fallback",
};

const broken = createErrorRecord("broken", new Error("boom"), createdAt);

function report(records: readonly FinalRecord[]) {
  return buildBatchReport({
    toolVersion: "0.1.0",
    generatedAt: createdAt,
    dataset: "features.csv",
    records,
  });
}

describe("csv export", () => {
  it("writes the header and quotes fields per RFC 4180", () => {
    expect(exportCsv([curfew])).toBe(
      [
        CSV_COLUMNS.join(","),
        'curfew-login,true,"Minor ""curfew"", Utah",Utah Act; COPPA,0.1,UT_MINORS_CURFEW,' +
          "curfew_enforcement; age_verification,evidence/curfew-login.json,src/a.ts:1," +
          '"Persona US, age 16",true,high,2026-03-01T12:00:00.000Z',
        "",
      ].join("\r\n"),
    );
  });

  it("uses the fixed column order", () => {
    expect(CSV_COLUMNS.join(",")).toBe(
      "feature_id,requires_geo_logic,reasoning,related_regulations,confidence," +
        "matched_rules,missing_controls,evidence_refs,code_refs," +
        "runtime_observation,needs_review,severity,created_at",
    );
    expect(exportCsv([])).toBe(`${CSV_COLUMNS.join(",")}\r\n`);
  });
});

describe("batch report", () => {
  it("summarizes the records", () => {
    expect(report([curfew, broken]).summary).toEqual({
      total_features: 2,
      requires_geo_logic_count: 1,
      high_severity_count: 2,
      needs_review_count: 2,
      error_count: 1,
      average_confidence: 0.05,
      severity_counts: { critical: 1, high: 1, medium: 0, low: 0 },
    });
    expect(report([]).summary.average_confidence).toBeNull();
  });

  it("renders the markdown report", () => {
    expect(renderMarkdownReport(report([curfew, broken]))).toBe(
      [
        "+----------------------------+",
        "| Geocheck Compliance Report |",
        "| Features: 2                |",
        "| Requires Geo Logic: 1      |",
        "| Needs Review: 2            |",
        "| Average Confidence: 5%     |",
        "| Errors: 1                  |",
        "| Dataset: features.csv      |",
        "+----------------------------+",
        "",
        "+----------+----------+",
        "| Severity | Features |",
        "+----------+----------+",
        "| Critical | 1        |",
        "| High     | 1        |",
        "| Medium   | 0        |",
        "| Low      | 0        |",
        "+----------+----------+",
        "",
        "### Features",
        "",
        "+--------------+-----------+----------+------------+--------+------------------+",
        "| Feature      | Geo Logic | Severity | Confidence | Review | Matched Rules    |",
        "+--------------+-----------+----------+------------+--------+------------------+",
        "| curfew-login | yes       | high     | 10%        | yes    | UT_MINORS_CURFEW |",
        "| broken       | no        | critical | 0%         | yes    | -                |",
        "+--------------+-----------+----------+------------+--------+------------------+",
        "",
        "### Needs Review",
        "",
        '- curfew-login (high, 10%): Minor "curfew", Utah',
        "- broken (critical, 0%): Processing failed: boom",
      ].join("\n"),
    );
  });

  it("limits listed features and notes the cut", () => {
    const lines = renderMarkdownReport(report([curfew, broken]), {
      showSummary: false,
      maxRecords: 1,
      showReasoning: false,
    }).split("\n");
    expect(lines).toContain("Showing 1 of 2 features. Use --max-records to adjust.");
    expect(lines.at(-1)).toBe("- curfew-login (high, 10%)");
  });

  it("says so when nothing was processed", () => {
    const output = renderMarkdownReport(report([]));
    expect(output.split("\n").at(-1)).toBe("No features processed.");
  });

  it("truncates long text", () => {
    expect(truncateText("abcdefghij", 6)).toBe("abc...");
    expect(truncateText("abc", 6)).toBe("abc");
  });
});
