import type { FinalRecord } from "../decision/types.js";
import type { EvidenceMetadata, StaticSignals } from "../evidence/types.js";

/**
 * External static scanner. Produces the static signal sub-tree for a
 * repository; the pipeline memoizes it per resolved path.
 */
export interface StaticCollector {
  collect(repoPath: string, featureId: string): Promise<StaticSignals>;
}

export interface CollectedRepository {
  readonly signals: StaticSignals;
  readonly metadata: EvidenceMetadata;
}

export interface PipelineResult {
  readonly total_features: number;
  readonly processed_count: number;
  readonly error_count: number;
  readonly records: readonly FinalRecord[];
}
