export {
  assertEvidenceFor,
  formatIssue,
  loadEvidencePack,
  parseEvidencePack,
} from "./evidence-loader.js";
export { normalizeEvidence, UNKNOWN_PERSONA } from "./normalizer.js";
export {
  allCountries,
  allRegions,
  codeRef,
  hasRuntimeSignals,
  locatedSignals,
  presentValues,
  runtimeSignals,
  staticSignals,
} from "./signals.js";
export { EvidencePackSchema } from "./schema.js";
export type {
  AgeCheckSignal,
  DataResidencySignal,
  EvaluationContext,
  EvidenceAttachment,
  EvidenceMetadata,
  EvidencePack,
  EvidencePackInput,
  FlagResolution,
  FlagSignal,
  GeoSignal,
  LocatedSignal,
  NetworkTrace,
  Persona,
  RuntimeSignals,
  StaticSignals,
} from "./types.js";
