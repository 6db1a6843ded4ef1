import type { RulesResult } from "../engine/types.js";
import {
  codeRef,
  hasRuntimeSignals,
  locatedSignals,
  presentValues,
  runtimeSignals,
  staticSignals,
} from "../evidence/signals.js";
import type { EvidencePack } from "../evidence/types.js";
import { Severity } from "../rules/types.js";
import { REVIEW_THRESHOLD } from "../scoring/weights.js";
import type { RegulationSnippet } from "./snippets.js";
import {
  MAX_CODE_REFS,
  MAX_RELATED_REGULATIONS,
  type FinalRecord,
} from "./types.js";

export const NO_INDICATORS_REASONING =
  "Limited compliance indicators found in evidence";

export interface FallbackInput {
  readonly evidence: EvidencePack;
  readonly rulesResult: RulesResult;
  /** Snippets already filtered to the matched rules. */
  readonly snippets: readonly RegulationSnippet[];
  readonly createdAt: string;
}

/**
 * Deterministic final record built only from in-memory inputs. Never
 * throws and performs no I/O.
 */
export function buildFallbackRecord(input: FallbackInput): FinalRecord {
  const { evidence, rulesResult } = input;
  const record: FinalRecord = {
    feature_id: rulesResult.feature_id,
    requires_geo_logic: rulesResult.requires_geo_logic,
    reasoning: composeReasoning(evidence, rulesResult),
    related_regulations: input.snippets
      .map((snippet) => snippet.title)
      .slice(0, MAX_RELATED_REGULATIONS),
    confidence: rulesResult.confidence,
    matched_rules: [...rulesResult.matched_rules],
    missing_controls: [...rulesResult.missing_controls],
    evidence_refs: [evidenceRef(rulesResult.feature_id)],
    code_refs: collectCodeRefs(evidence),
    runtime_observation: describeRuntime(evidence),
    needs_review: rulesResult.confidence < REVIEW_THRESHOLD,
    severity: rulesResult.requires_geo_logic ? Severity.High : Severity.Medium,
    created_at: input.createdAt,
    source: "fallback",
  };
  return Object.freeze(record);
}

/**
 * One sentence per non-empty signal category, in a fixed order:
 * geo-branching, age checks, data residency, matched rules.
 */
export function composeReasoning(
  evidence: EvidencePack,
  rulesResult: RulesResult,
): string {
  const signals = staticSignals(evidence);
  const parts: string[] = [];

  if (signals.geo_branching.length > 0) {
    const countries = signals.geo_branching
      .map((signal) => signal.countries.join(", "))
      .join(", ");
    parts.push(
      `Geographic branching detected in ${signals.geo_branching.length} location(s) with countries: ${countries}`,
    );
  }

  if (signals.age_checks.length > 0) {
    const libs = Array.from(
      new Set(presentValues(signals.age_checks.map((s) => s.lib))),
    );
    parts.push(
      libs.length > 0
        ? `Age verification systems found using ${libs.join(", ")}`
        : "Age verification systems found",
    );
  }

  if (signals.data_residency.length > 0) {
    const regions = presentValues(
      signals.data_residency.map((signal) => signal.region),
    );
    parts.push(
      regions.length > 0
        ? `Data residency patterns detected for regions: ${regions.join(", ")}`
        : "Data residency patterns detected",
    );
  }

  if (rulesResult.matched_rules.length > 0) {
    parts.push(
      `Compliance rules triggered: ${rulesResult.matched_rules.join(", ")}`,
    );
  }

  return parts.length > 0 ? parts.join(". ") : NO_INDICATORS_REASONING;
}

export function collectCodeRefs(evidence: EvidencePack): string[] {
  return presentValues(locatedSignals(evidence).map((signal) => codeRef(signal)))
    .slice(0, MAX_CODE_REFS);
}

export function describeRuntime(evidence: EvidencePack): string {
  if (!hasRuntimeSignals(evidence)) {
    return "";
  }
  const runtime = runtimeSignals(evidence);
  const parts: string[] = [];
  if (runtime.persona) {
    const age = runtime.persona.age ?? "unknown";
    parts.push(`Persona ${runtime.persona.country ?? "Unknown"}, age ${age}`);
  } else {
    parts.push("Persona unknown");
  }
  if (runtime.blocked_actions.length > 0) {
    parts.push(`blocked actions: ${runtime.blocked_actions.join(", ")}`);
  }
  if (runtime.ui_states.length > 0) {
    parts.push(`UI states: ${runtime.ui_states.join(", ")}`);
  }
  return parts.join("; ");
}

export function evidenceRef(featureId: string): string {
  return `evidence/${featureId}.json`;
}
