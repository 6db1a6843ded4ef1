export { DecisionSynthesizer, mergeReasoning } from "./synthesizer.js";
export type {
  DecisionSynthesizerOptions,
  SynthesisInput,
} from "./synthesizer.js";
export {
  buildFallbackRecord,
  collectCodeRefs,
  composeReasoning,
  describeRuntime,
  evidenceRef,
  NO_INDICATORS_REASONING,
} from "./fallback.js";
export type { FallbackInput } from "./fallback.js";
export { createErrorRecord } from "./error-record.js";
export {
  DEFAULT_SNIPPETS,
  keywords,
  relevantSnippets,
} from "./snippets.js";
export type { RegulationSnippet } from "./snippets.js";
export {
  loadRegulationSnippets,
  parseSnippetDocument,
  saveRegulationSnippets,
} from "./snippet-store.js";
export type { LoadSnippetsOptions } from "./snippet-store.js";
export { MAX_CODE_REFS, MAX_RELATED_REGULATIONS } from "./types.js";
export type { FinalRecord, RecordSource } from "./types.js";
