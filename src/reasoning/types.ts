import type { Severity } from "../rules/types.js";

export interface ReasoningRequest {
  readonly featureId: string;
  readonly prompt: string;
}

/**
 * External reasoning service. Returns the raw response text; parsing and
 * fallback are the synthesizer's job.
 */
export interface ReasoningCollaborator {
  readonly name: string;
  analyze(request: ReasoningRequest): Promise<string>;
}

/** Enrichable fields of a final record as returned by a collaborator. */
export interface ReasoningOutput {
  readonly reasoning: string;
  readonly related_regulations?: readonly string[];
  readonly confidence?: number;
  readonly severity?: Severity;
  readonly needs_review?: boolean;
  readonly code_refs?: readonly string[];
  readonly evidence_refs?: readonly string[];
  readonly runtime_observation?: string;
}
