import fs from "node:fs/promises";
import type { ZodIssue } from "zod";
import {
  EvidenceNotFoundError,
  MalformedDocumentError,
  errorMessage,
  isNodeError,
} from "../errors.js";
import { EvidencePackSchema } from "./schema.js";
import type { EvidencePack } from "./types.js";

/**
 * Read and validate the evidence document at `evidencePath`.
 *
 * @throws {EvidenceNotFoundError} when the file does not exist
 * @throws {MalformedDocumentError} when it is not JSON or fails validation
 */
export async function loadEvidencePack(
  evidencePath: string,
): Promise<EvidencePack> {
  let raw: string;
  try {
    raw = await fs.readFile(evidencePath, "utf8");
  } catch (error) {
    if (isNodeError(error, "ENOENT")) {
      throw new EvidenceNotFoundError(evidencePath);
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new MalformedDocumentError(evidencePath, [errorMessage(error)], {
      cause: error,
    });
  }
  return parseEvidencePack(parsed, evidencePath);
}

export function parseEvidencePack(input: unknown, source: string): EvidencePack {
  const result = EvidencePackSchema.safeParse(input);
  if (!result.success) {
    throw new MalformedDocumentError(
      source,
      result.error.issues.map((issue) => formatIssue(issue)),
    );
  }
  return result.data;
}

/**
 * @throws {MalformedDocumentError} when the pack was recorded for another feature
 */
export function assertEvidenceFor(
  pack: EvidencePack,
  featureId: string,
  source: string,
): EvidencePack {
  if (pack.feature_id !== featureId) {
    throw new MalformedDocumentError(source, [
      `Evidence belongs to ${pack.feature_id}, expected ${featureId}`,
    ]);
  }
  return pack;
}

export function formatIssue(issue: ZodIssue): string {
  const location = issue.path.length > 0 ? issue.path.join(".") : "(root)";
  return `${location}: ${issue.message}`;
}
