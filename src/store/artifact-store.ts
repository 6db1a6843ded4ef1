import fs from "node:fs/promises";
import path from "node:path";
import type { FinalRecord } from "../decision/types.js";
import { parseRulesResult, serializeRulesResult } from "../engine/rules-result.js";
import type { RulesResult } from "../engine/types.js";
import { EvidenceNotFoundError, isNodeError } from "../errors.js";
import {
  assertEvidenceFor,
  loadEvidencePack,
} from "../evidence/evidence-loader.js";
import type { EvidencePack } from "../evidence/types.js";

const DEFAULT_DIR = "artifacts";
const EVIDENCE_DIR = "evidence";
const FEATURE_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

export function resolveArtifactsDir(customDir?: string): string {
  if (customDir) {
    return path.resolve(assertNoTilde(customDir));
  }
  return path.join(process.cwd(), DEFAULT_DIR);
}

function assertNoTilde(input: string): string {
  if (input.includes("~")) {
    throw new Error("artifacts dir must not include '~'. Use an absolute path.");
  }
  return input;
}

/**
 * Feature ids become file names, so they may not contain separators or
 * start with a dot.
 */
export function assertSafeFeatureId(featureId: string): string {
  if (!FEATURE_ID_PATTERN.test(featureId) || featureId.includes("..")) {
    throw new Error(`Invalid feature id: ${JSON.stringify(featureId)}`);
  }
  return featureId;
}

export function evidencePath(artifactsDir: string, featureId: string): string {
  return path.join(
    artifactsDir,
    EVIDENCE_DIR,
    `${assertSafeFeatureId(featureId)}.json`,
  );
}

export function rulesResultPath(artifactsDir: string, featureId: string): string {
  return path.join(
    artifactsDir,
    EVIDENCE_DIR,
    `${assertSafeFeatureId(featureId)}_rules_result.json`,
  );
}

export function finalRecordPath(artifactsDir: string, featureId: string): string {
  return path.join(
    artifactsDir,
    EVIDENCE_DIR,
    `${assertSafeFeatureId(featureId)}_final_record.json`,
  );
}

export async function ensureEvidenceDir(artifactsDir: string): Promise<void> {
  await fs.mkdir(path.join(artifactsDir, EVIDENCE_DIR), { recursive: true });
}

export async function readEvidence(
  artifactsDir: string,
  featureId: string,
): Promise<EvidencePack> {
  const source = evidencePath(artifactsDir, featureId);
  return assertEvidenceFor(await loadEvidencePack(source), featureId, source);
}

export async function writeEvidence(
  artifactsDir: string,
  pack: EvidencePack,
): Promise<string> {
  await ensureEvidenceDir(artifactsDir);
  const target = evidencePath(artifactsDir, pack.feature_id);
  await fs.writeFile(target, `${JSON.stringify(pack, null, 2)}\n`, "utf8");
  return target;
}

/**
 * Write the rules result beside the evidence document it was computed from.
 */
export async function writeRulesResult(
  artifactsDir: string,
  result: RulesResult,
): Promise<string> {
  await ensureEvidenceDir(artifactsDir);
  const target = rulesResultPath(artifactsDir, result.feature_id);
  await fs.writeFile(target, serializeRulesResult(result), "utf8");
  return target;
}

export async function readRulesResult(
  artifactsDir: string,
  featureId: string,
): Promise<RulesResult> {
  const source = rulesResultPath(artifactsDir, featureId);
  try {
    const raw = await fs.readFile(source, "utf8");
    return parseRulesResult(raw, source);
  } catch (error) {
    if (isNodeError(error, "ENOENT")) {
      throw new EvidenceNotFoundError(source);
    }
    throw error;
  }
}

export async function writeFinalRecord(
  artifactsDir: string,
  record: FinalRecord,
): Promise<string> {
  await ensureEvidenceDir(artifactsDir);
  const target = finalRecordPath(artifactsDir, record.feature_id);
  await fs.writeFile(target, `${JSON.stringify(record, null, 2)}\n`, "utf8");
  return target;
}
