export {
  assertSafeFeatureId,
  ensureEvidenceDir,
  evidencePath,
  finalRecordPath,
  readEvidence,
  readRulesResult,
  resolveArtifactsDir,
  rulesResultPath,
  writeEvidence,
  writeFinalRecord,
  writeRulesResult,
} from "./artifact-store.js";
export { loadRunIndex, writeRunSummary } from "./run-store.js";
export type {
  RunIndex,
  RunIndexEntry,
  RunSummary,
  RunWriteOptions,
} from "./run-store.js";
