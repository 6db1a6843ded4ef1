import { serializeRulesResult } from "../engine/rules-result.js";
import type { RulesResult } from "../engine/types.js";
import {
  assertEvidenceFor,
  loadEvidencePack,
} from "../evidence/evidence-loader.js";
import type { EvidencePack } from "../evidence/types.js";
import {
  assertSafeFeatureId,
  readEvidence,
  writeRulesResult,
} from "../store/artifact-store.js";
import {
  createEngine,
  loadCatalog,
  resolveSettings,
  type CommonOptions,
} from "./context.js";

export interface EvaluateOptions extends CommonOptions {
  readonly featureId: string;
  readonly evidencePath?: string;
}

export interface EvaluateResult {
  readonly rulesResult: RulesResult;
  readonly outputPath: string;
  readonly output: string;
}

export async function runEvaluateCommand(
  options: EvaluateOptions,
): Promise<EvaluateResult> {
  const settings = resolveSettings(options);
  const featureId = assertSafeFeatureId(options.featureId);
  const evidence = await loadFeatureEvidence(
    settings.artifactsDir,
    featureId,
    options.evidencePath,
  );
  const catalog = await loadCatalog(settings);
  const rulesResult = createEngine(settings, catalog).evaluate(evidence);
  const outputPath = await writeRulesResult(settings.artifactsDir, rulesResult);
  return {
    rulesResult,
    outputPath,
    output: serializeRulesResult(rulesResult).trimEnd(),
  };
}

/**
 * Evidence from an explicit document, or the stored pack for the feature.
 */
export async function loadFeatureEvidence(
  artifactsDir: string,
  featureId: string,
  evidencePath?: string,
): Promise<EvidencePack> {
  if (!evidencePath) {
    return await readEvidence(artifactsDir, featureId);
  }
  return assertEvidenceFor(
    await loadEvidencePack(evidencePath),
    featureId,
    evidencePath,
  );
}
