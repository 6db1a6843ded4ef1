import { createErrorRecord } from "../decision/error-record.js";
import type { DecisionSynthesizer } from "../decision/synthesizer.js";
import type { FinalRecord } from "../decision/types.js";
import type { EvaluationEngine } from "../engine/evaluation-engine.js";
import { EvidenceNotFoundError, errorMessage } from "../errors.js";
import type { EvidenceMetadata, EvidencePack } from "../evidence/types.js";
import type { Logger } from "../logging/logger.js";
import { silentLogger } from "../logging/logger.js";
import {
  assertSafeFeatureId,
  readEvidence,
  writeEvidence,
  writeFinalRecord,
  writeRulesResult,
} from "../store/artifact-store.js";
import type { DatasetRow } from "./dataset.js";
import { describeRepository } from "./repo-metadata.js";
import { ScanCache } from "./scan-cache.js";
import type {
  CollectedRepository,
  PipelineResult,
  StaticCollector,
} from "./types.js";

export interface PipelineOptions {
  readonly rows: readonly DatasetRow[];
  readonly artifactsDir: string;
  readonly engine: EvaluationEngine;
  readonly synthesizer: DecisionSynthesizer;
  readonly collector?: StaticCollector;
  readonly scanCache?: ScanCache<CollectedRepository>;
  readonly repoMetadata?: (repoPath: string) => Promise<EvidenceMetadata>;
  readonly logger?: Logger;
  readonly now?: () => Date;
}

/**
 * Process every dataset row in order. A row that fails becomes an error
 * record; the batch always runs to the end.
 */
export async function runPipeline(
  options: PipelineOptions,
): Promise<PipelineResult> {
  const logger = options.logger ?? silentLogger();
  const now = options.now ?? (() => new Date());
  const cache = options.scanCache ?? new ScanCache<CollectedRepository>();
  const records: FinalRecord[] = [];
  let errorCount = 0;

  for (const row of options.rows) {
    try {
      logger.info({ featureId: row.feature_id }, "Processing feature");
      records.push(await processFeature(row, options, cache, now));
    } catch (error) {
      errorCount += 1;
      logger.error(
        { featureId: row.feature_id, reason: errorMessage(error) },
        "Failed to process feature",
      );
      records.push(
        createErrorRecord(row.feature_id, error, now().toISOString()),
      );
    }
  }

  const result: PipelineResult = {
    total_features: options.rows.length,
    processed_count: options.rows.length - errorCount,
    error_count: errorCount,
    records,
  };
  logger.info(
    {
      total: result.total_features,
      processed: result.processed_count,
      errors: result.error_count,
    },
    "Pipeline complete",
  );
  return result;
}

async function processFeature(
  row: DatasetRow,
  options: PipelineOptions,
  cache: ScanCache<CollectedRepository>,
  now: () => Date,
): Promise<FinalRecord> {
  const featureId = assertSafeFeatureId(row.feature_id);
  const evidence =
    options.collector && row.repo_path
      ? await collectEvidence(
          featureId,
          row.repo_path,
          options.collector,
          options,
          cache,
          now,
        )
      : await readEvidence(options.artifactsDir, featureId);

  const rulesResult = options.engine.evaluate(evidence);
  await writeRulesResult(options.artifactsDir, rulesResult);

  const record = await options.synthesizer.synthesize({ evidence, rulesResult });
  await writeFinalRecord(options.artifactsDir, record);
  return record;
}

/**
 * Combine the cached static scan of `repoPath` with any runtime signals
 * already stored for the feature, and persist the result as its evidence.
 */
async function collectEvidence(
  featureId: string,
  repoPath: string,
  collector: StaticCollector,
  options: PipelineOptions,
  cache: ScanCache<CollectedRepository>,
  now: () => Date,
): Promise<EvidencePack> {
  const describe = options.repoMetadata ?? describeRepository;
  const collected = await cache.getOrLoad(repoPath, async (resolvedPath) => ({
    signals: await collector.collect(resolvedPath, featureId),
    metadata: await describe(resolvedPath),
  }));

  const existing = await readExistingEvidence(options.artifactsDir, featureId);
  const pack: EvidencePack = {
    feature_id: featureId,
    signals: {
      ...existing?.signals,
      static: collected.signals,
    },
    attachments: existing?.attachments ?? [],
    metadata: {
      ...collected.metadata,
      scan_timestamp: now().toISOString(),
    },
  };
  await writeEvidence(options.artifactsDir, pack);
  return pack;
}

async function readExistingEvidence(
  artifactsDir: string,
  featureId: string,
): Promise<EvidencePack | null> {
  try {
    return await readEvidence(artifactsDir, featureId);
  } catch (error) {
    if (error instanceof EvidenceNotFoundError) {
      return null;
    }
    throw error;
  }
}
