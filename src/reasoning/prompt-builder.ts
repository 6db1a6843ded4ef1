import type { RegulationSnippet } from "../decision/snippets.js";
import type { RulesResult } from "../engine/types.js";
import {
  codeRef,
  hasRuntimeSignals,
  runtimeSignals,
  staticSignals,
} from "../evidence/signals.js";
import type { EvidencePack } from "../evidence/types.js";
import { confidenceBand } from "../scoring/confidence-calculator.js";

const SIGNAL_SAMPLE = 3;
const SNIPPET_SAMPLE = 3;
const SNIPPET_CHARS = 200;

export const SYSTEM_INSTRUCTION =
  "You assess whether a software feature needs jurisdiction-specific compliance logic. " +
  "Use only the evidence supplied and cite file:line references. Answer with a single JSON object.";

/**
 * Serialize evidence and the rule outcome into the prompt sent to a
 * reasoning collaborator.
 */
export function buildReasoningPrompt(
  evidence: EvidencePack,
  rulesResult: RulesResult,
  snippets: readonly RegulationSnippet[],
): string {
  const signals = staticSignals(evidence);
  const lines: string[] = [];

  lines.push(`FEATURE: ${evidence.feature_id}`);
  lines.push("");
  lines.push("STATIC EVIDENCE");
  lines.push(`- Geographic branching: ${signals.geo_branching.length} found`);
  for (const signal of signals.geo_branching.slice(0, SIGNAL_SAMPLE)) {
    lines.push(
      `  - ${codeRef(signal) ?? "unknown location"} countries=${signal.countries.join(",")}`,
    );
  }
  lines.push(`- Age checks: ${signals.age_checks.length} found`);
  for (const signal of signals.age_checks.slice(0, SIGNAL_SAMPLE)) {
    lines.push(`  - ${codeRef(signal) ?? "unknown location"} lib=${signal.lib ?? "unknown"}`);
  }
  lines.push(`- Data residency: ${signals.data_residency.length} found`);
  for (const signal of signals.data_residency.slice(0, SIGNAL_SAMPLE)) {
    lines.push(`  - ${codeRef(signal) ?? "unknown location"} region=${signal.region ?? "unknown"}`);
  }
  lines.push(`- Reporting clients: ${formatList(signals.reporting_clients)}`);
  lines.push(`- Recommendation system: ${signals.reco_system}`);
  lines.push(`- Parental controls: ${signals.pf_controls}`);

  if (hasRuntimeSignals(evidence)) {
    const runtime = runtimeSignals(evidence);
    lines.push("");
    lines.push("RUNTIME EVIDENCE");
    if (runtime.persona) {
      lines.push(
        `- Persona: ${runtime.persona.country ?? "Unknown"}, age ${runtime.persona.age ?? "unknown"}`,
      );
    }
    lines.push(`- Blocked actions: ${formatList(runtime.blocked_actions)}`);
    lines.push(`- UI states: ${formatList(runtime.ui_states)}`);
    lines.push(`- Flags resolved: ${runtime.flag_resolutions.length}`);
  }

  lines.push("");
  lines.push("RULE ENGINE");
  lines.push(`- Requires geo logic: ${rulesResult.requires_geo_logic}`);
  lines.push(
    `- Confidence: ${rulesResult.confidence.toFixed(2)} (${confidenceBand(rulesResult.confidence)})`,
  );
  lines.push(`- Matched rules: ${formatList(rulesResult.matched_rules)}`);
  lines.push(`- Missing controls: ${formatList(rulesResult.missing_controls)}`);

  if (snippets.length > 0) {
    lines.push("");
    lines.push("RELEVANT REGULATIONS");
    for (const snippet of snippets.slice(0, SNIPPET_SAMPLE)) {
      lines.push(`- ${snippet.title}: ${snippet.content.slice(0, SNIPPET_CHARS)}`);
    }
  }

  lines.push("");
  lines.push("Respond with JSON using these keys:");
  lines.push(
    '{"reasoning": string, "related_regulations": string[], "confidence": number 0..1, ' +
      '"code_refs": string[], "evidence_refs": string[], "runtime_observation": string, ' +
      '"needs_review": boolean, "severity": "low"|"medium"|"high"|"critical"}',
  );
  lines.push(
    "Confidence bands: 0.9+ clear legal requirement; 0.7-0.89 strong indicators; " +
      "0.4-0.69 gray area needing review; 0.2-0.39 likely business-driven; below 0.2 no evidence.",
  );

  return lines.join("\n");
}

function formatList(values: readonly string[]): string {
  return values.length > 0 ? values.join(", ") : "none";
}
