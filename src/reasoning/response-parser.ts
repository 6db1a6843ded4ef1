import { z } from "zod";
import { CollaboratorError, errorMessage } from "../errors.js";
import { formatIssue } from "../evidence/evidence-loader.js";
import { Severity } from "../rules/types.js";
import type { ReasoningOutput } from "./types.js";

const ReasoningOutputSchema = z.object({
  reasoning: z.string().min(1),
  related_regulations: z.array(z.string()).optional(),
  confidence: z.number().min(0).max(1).optional(),
  severity: z
    .enum([Severity.Low, Severity.Medium, Severity.High, Severity.Critical])
    .optional(),
  needs_review: z.boolean().optional(),
  code_refs: z.array(z.string()).optional(),
  evidence_refs: z.array(z.string()).optional(),
  runtime_observation: z.string().optional(),
});

const FENCE = /^```(?:json)?\s*([\s\S]*?)\s*```$/i;

/**
 * Parse a collaborator response. Markdown code fences around the JSON are
 * tolerated; keys outside the enrichable set are ignored.
 *
 * @throws {CollaboratorError} when the text is not a well-formed response
 */
export function parseReasoningResponse(text: string): ReasoningOutput {
  const trimmed = text.trim();
  const body = FENCE.exec(trimmed)?.[1] ?? trimmed;

  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (error) {
    throw new CollaboratorError(
      `Collaborator response is not JSON: ${errorMessage(error)}`,
      { cause: error },
    );
  }

  const result = ReasoningOutputSchema.safeParse(parsed);
  if (!result.success) {
    throw new CollaboratorError(
      `Collaborator response is invalid: ${result.error.issues
        .map((issue) => formatIssue(issue))
        .join("; ")}`,
    );
  }
  return result.data;
}
