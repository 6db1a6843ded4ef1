import {
  isValueRecord,
  toValue,
  type Value,
  type ValueRecord,
} from "../rules/logic/value.js";
import {
  allCountries,
  allRegions,
  runtimeSignals,
  staticSignals,
} from "./signals.js";
import type { EvaluationContext, EvidencePack } from "./types.js";

export const UNKNOWN_PERSONA: ValueRecord = Object.freeze({
  age: null,
  country: "Unknown",
  region: null,
});

/**
 * Build the flat evaluation context for a pack. Pure; absent signal groups
 * resolve to their empty defaults.
 */
export function normalizeEvidence(pack: EvidencePack): EvaluationContext {
  const signals = staticSignals(pack);
  const runtime = runtimeSignals(pack);

  const staticContext: ValueRecord = {
    ...asRecord(toValue(signals)),
    all_countries: allCountries(signals),
    all_regions: allRegions(signals),
  };

  const runtimeRecord = asRecord(toValue(runtime));
  const persona = runtimeRecord.persona ?? null;
  const runtimeContext: ValueRecord = {
    ...runtimeRecord,
    persona: isValueRecord(persona) ? persona : UNKNOWN_PERSONA,
  };

  return {
    feature_id: pack.feature_id,
    static: staticContext,
    runtime: runtimeContext,
    metadata: asRecord(toValue(pack.metadata)),
  };
}

function asRecord(value: Value): ValueRecord {
  return isValueRecord(value) ? value : {};
}
