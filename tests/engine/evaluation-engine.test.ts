import { describe, expect, it } from "vitest";
import { EvaluationEngine } from "../../src/engine/evaluation-engine.js";
import { parseEvidencePack } from "../../src/evidence/evidence-loader.js";
import type { EvidencePack, EvidencePackInput } from "../../src/evidence/types.js";
import { RuleCatalog } from "../../src/rules/catalog.js";
import { DEFAULT_RULES } from "../../src/rules/default-rules.js";
import { Severity, type ComplianceRule } from "../../src/rules/types.js";
import {
  calculateConfidence,
  confidenceBand,
} from "../../src/scoring/confidence-calculator.js";

const fixedNow = () => new Date("2026-03-01T12:00:00.000Z");

function pack(input: EvidencePackInput): EvidencePack {
  return parseEvidencePack(input, "test");
}

function engineFor(rules: readonly ComplianceRule[] = DEFAULT_RULES): EvaluationEngine {
  return new EvaluationEngine(new RuleCatalog(rules), { now: fixedNow });
}

function rule(id: string, logic: ComplianceRule["logic"], severity = Severity.High): ComplianceRule {
  return {
    id,
    name: id,
    logic,
    requires_controls: [`${id.toLowerCase()}_control`],
    regulations: [],
    severity,
    enabled: true,
  };
}

const utahMinor: EvidencePackInput = {
  feature_id: "curfew-login",
  signals: {
    static: {
      geo_branching: [{ file: "src/curfew.ts", line: 42, countries: ["UT"] }],
    },
    runtime: {
      persona: { age: 16, country: "US" },
      blocked_actions: ["login"],
    },
  },
};

describe("evaluation engine", () => {
  it("reports nothing for a pack without signals", () => {
    const result = engineFor().evaluate(pack({ feature_id: "empty" }));

    expect(result).toEqual({
      feature_id: "empty",
      requires_geo_logic: false,
      confidence: 0,
      matched_rules: [],
      missing_controls: [],
      evaluation_timestamp: "2026-03-01T12:00:00.000Z",
      evaluation_log: DEFAULT_RULES.map((entry) => ({
        rule_id: entry.id,
        status: "not_matched",
      })),
    });
  });

  it("matches the Utah curfew rule for a minor in a Utah branch", () => {
    const result = engineFor().evaluate(pack(utahMinor));

    expect(result.matched_rules).toEqual(["UT_MINORS_CURFEW"]);
    expect(result.requires_geo_logic).toBe(true);
    expect(result.confidence).toBe(0.1);
    expect(result.missing_controls).toEqual([
      "curfew_enforcement",
      "age_verification",
    ]);
  });

  it("unions controls of several matches in catalog order", () => {
    const result = engineFor().evaluate(
      pack({
        feature_id: "teen-feed",
        signals: {
          static: {
            geo_branching: [
              { file: "a.ts", line: 1, countries: ["US"] },
              { file: "b.ts", line: 2, countries: ["UT", "US"] },
            ],
            pf_controls: true,
            reco_system: true,
          },
          runtime: { persona: { age: 15, country: "US" } },
        },
      }),
    );

    expect(result.matched_rules).toEqual([
      "UT_MINORS_CURFEW",
      "NCMEC_REPORTING",
      "STATE_MINORS_PF_DEFAULT_OFF",
    ]);
    expect(result.confidence).toBeCloseTo(0.3, 10);
    expect(result.missing_controls).toEqual([
      "curfew_enforcement",
      "age_verification",
      "ncmec_report_pipeline",
      "content_moderation",
      "parental_consent",
      "default_privacy_settings",
    ]);
  });

  it("evaluates static-only rules when runtime signals are absent", () => {
    const result = engineFor().evaluate(
      pack({
        feature_id: "uploads",
        signals: { static: { reporting_clients: ["NCMEC"] } },
      }),
    );

    expect(result.matched_rules).toEqual(["NCMEC_REPORTING"]);
    expect(result.confidence).toBeCloseTo(0.14, 10);
  });

  it("evaluates a persona that only records an age", () => {
    const engine = engineFor([
      rule("MINOR", { "<": [{ var: "runtime.persona.age" }, 18] }),
      rule("US_USER", { "==": [{ var: "runtime.persona.country" }, "US"] }),
    ]);
    const result = engine.evaluate(
      pack({ feature_id: "teen-feed", signals: { runtime: { persona: { age: 12 } } } }),
    );

    expect(result.matched_rules).toEqual(["MINOR"]);
    expect(result.evaluation_log).toEqual([
      { rule_id: "MINOR", status: "matched" },
      { rule_id: "US_USER", status: "not_matched" },
    ]);
  });

  it("skips disabled rules but still counts them in the catalog size", () => {
    const catalog = new RuleCatalog(DEFAULT_RULES).withRuleEnabled(
      "UT_MINORS_CURFEW",
      false,
    );
    const engine = new EvaluationEngine(catalog, { now: fixedNow });
    const result = engine.evaluate(pack(utahMinor));

    expect(result.matched_rules).toEqual([]);
    expect(result.requires_geo_logic).toBe(false);
    expect(result.confidence).toBe(0);
    expect(result.evaluation_log[0]).toEqual({
      rule_id: "UT_MINORS_CURFEW",
      status: "disabled",
    });
  });

  it("isolates rules that fail to compile or evaluate", () => {
    const result = engineFor([
      rule("BROKEN", { xor: [true] }),
      rule("MISTYPED", { "<": ["x", 1] }),
      rule("ALWAYS", true),
    ]).evaluate(pack({ feature_id: "isolated" }));

    expect(result.matched_rules).toEqual(["ALWAYS"]);
    expect(result.missing_controls).toEqual(["always_control"]);
    expect(result.confidence).toBeCloseTo(0.5 / 3, 10);
    expect(result.evaluation_log).toEqual([
      {
        rule_id: "BROKEN",
        status: "failed",
        reason: 'Rule BROKEN: Unknown operator "xor"',
      },
      {
        rule_id: "MISTYPED",
        status: "failed",
        reason: '"<" expects numbers, got string and number',
      },
      { rule_id: "ALWAYS", status: "matched" },
    ]);
  });

  it("produces identical results for identical input", () => {
    const engine = engineFor();
    expect(engine.evaluate(pack(utahMinor))).toEqual(
      engine.evaluate(pack(utahMinor)),
    );
  });
});

describe("confidence", () => {
  it("divides summed weights by the catalog size", () => {
    expect(calculateConfidence([Severity.High], 5)).toBe(0.1);
    expect(calculateConfidence([Severity.Low, Severity.Medium], 4)).toBeCloseTo(0.1, 10);
  });

  it("caps at one and treats an empty catalog as zero", () => {
    expect(calculateConfidence([Severity.Critical, Severity.Critical], 1)).toBe(1);
    expect(calculateConfidence([], 0)).toBe(0);
  });

  it("names confidence bands", () => {
    expect([0.95, 0.7, 0.5, 0.2, 0.1].map((value) => confidenceBand(value))).toEqual([
      "clear",
      "strong",
      "gray-area",
      "weak",
      "none",
    ]);
  });
});
