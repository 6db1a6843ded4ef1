import type { FinalRecord } from "../decision/types.js";
import type { RulesResult } from "../engine/types.js";
import { EvidenceNotFoundError } from "../errors.js";
import type { EvidencePack } from "../evidence/types.js";
import type { ReasoningCollaborator } from "../reasoning/types.js";
import type { RuleCatalog } from "../rules/catalog.js";
import {
  assertSafeFeatureId,
  readRulesResult,
  writeFinalRecord,
  writeRulesResult,
} from "../store/artifact-store.js";
import {
  createEngine,
  createSynthesizer,
  loadCatalog,
  resolveSettings,
  type CommandSettings,
  type CommonOptions,
} from "./context.js";
import { loadFeatureEvidence } from "./evaluate-command.js";

export interface ExplainOptions extends CommonOptions {
  readonly featureId: string;
  readonly evidencePath?: string;
  readonly offline?: boolean;
  readonly collaborator?: ReasoningCollaborator;
}

export interface ExplainResult {
  readonly record: FinalRecord;
  readonly outputPath: string;
  readonly output: string;
}

/**
 * Synthesize the final record for one feature. Uses the stored rules
 * result when there is one and evaluates the evidence otherwise.
 */
export async function runExplainCommand(
  options: ExplainOptions,
): Promise<ExplainResult> {
  const settings = resolveSettings(options);
  const featureId = assertSafeFeatureId(options.featureId);
  const evidence = await loadFeatureEvidence(
    settings.artifactsDir,
    featureId,
    options.evidencePath,
  );
  const catalog = await loadCatalog(settings);
  const rulesResult = await storedOrFreshResult(settings, catalog, evidence);

  const synthesizer = await createSynthesizer(settings, catalog, {
    offline: options.offline,
    collaborator: options.collaborator,
  });
  const record = await synthesizer.synthesize({ evidence, rulesResult });
  const outputPath = await writeFinalRecord(settings.artifactsDir, record);
  return { record, outputPath, output: JSON.stringify(record, null, 2) };
}

async function storedOrFreshResult(
  settings: CommandSettings,
  catalog: RuleCatalog,
  evidence: EvidencePack,
): Promise<RulesResult> {
  try {
    return await readRulesResult(settings.artifactsDir, evidence.feature_id);
  } catch (error) {
    if (!(error instanceof EvidenceNotFoundError)) {
      throw error;
    }
  }
  const rulesResult = createEngine(settings, catalog).evaluate(evidence);
  await writeRulesResult(settings.artifactsDir, rulesResult);
  return rulesResult;
}
