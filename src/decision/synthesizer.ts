import type { RulesResult } from "../engine/types.js";
import { errorMessage } from "../errors.js";
import type { EvidencePack } from "../evidence/types.js";
import type { Logger } from "../logging/logger.js";
import { silentLogger } from "../logging/logger.js";
import { buildReasoningPrompt } from "../reasoning/prompt-builder.js";
import { parseReasoningResponse } from "../reasoning/response-parser.js";
import type {
  ReasoningCollaborator,
  ReasoningOutput,
} from "../reasoning/types.js";
import type { RuleCatalog } from "../rules/catalog.js";
import { buildFallbackRecord } from "./fallback.js";
import { relevantSnippets, type RegulationSnippet } from "./snippets.js";
import {
  MAX_CODE_REFS,
  MAX_RELATED_REGULATIONS,
  type FinalRecord,
} from "./types.js";

export interface SynthesisInput {
  readonly evidence: EvidencePack;
  readonly rulesResult: RulesResult;
}

export interface DecisionSynthesizerOptions {
  readonly catalog?: RuleCatalog;
  readonly snippets?: readonly RegulationSnippet[];
  readonly collaborator?: ReasoningCollaborator;
  readonly logger?: Logger;
  readonly now?: () => Date;
}

/**
 * Turns a rules result into a final record, through the reasoning
 * collaborator when one is configured and the deterministic fallback
 * otherwise or whenever the collaborator fails.
 */
export class DecisionSynthesizer {
  private readonly catalog?: RuleCatalog;
  private readonly snippets: readonly RegulationSnippet[];
  private readonly collaborator?: ReasoningCollaborator;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: DecisionSynthesizerOptions = {}) {
    this.catalog = options.catalog;
    this.snippets = options.snippets ?? [];
    this.collaborator = options.collaborator;
    this.logger = options.logger ?? silentLogger();
    this.now = options.now ?? (() => new Date());
  }

  async synthesize(input: SynthesisInput): Promise<FinalRecord> {
    const { evidence, rulesResult } = input;
    if (evidence.feature_id !== rulesResult.feature_id) {
      throw new Error(
        `Rules result for ${rulesResult.feature_id} does not belong to ${evidence.feature_id}`,
      );
    }

    const snippets = relevantSnippets(
      this.snippets,
      rulesResult.matched_rules,
      this.catalog,
    );
    const fallback = buildFallbackRecord({
      evidence,
      rulesResult,
      snippets,
      createdAt: this.now().toISOString(),
    });

    if (!this.collaborator) {
      return fallback;
    }

    try {
      const text = await this.collaborator.analyze({
        featureId: evidence.feature_id,
        prompt: buildReasoningPrompt(evidence, rulesResult, snippets),
      });
      return mergeReasoning(fallback, parseReasoningResponse(text));
    } catch (error) {
      this.logger.warn(
        {
          featureId: evidence.feature_id,
          collaborator: this.collaborator.name,
          reason: errorMessage(error),
        },
        "Reasoning collaborator failed, using fallback",
      );
      return fallback;
    }
  }
}

/**
 * Adopt the collaborator's enrichable fields over the fallback record.
 * Rule-derived facts always come from the rules result.
 */
export function mergeReasoning(
  fallback: FinalRecord,
  output: ReasoningOutput,
): FinalRecord {
  const record: FinalRecord = {
    ...fallback,
    reasoning: output.reasoning,
    related_regulations: (
      output.related_regulations ?? fallback.related_regulations
    ).slice(0, MAX_RELATED_REGULATIONS),
    confidence: output.confidence ?? fallback.confidence,
    severity: output.severity ?? fallback.severity,
    needs_review: output.needs_review ?? fallback.needs_review,
    code_refs: (output.code_refs ?? fallback.code_refs).slice(0, MAX_CODE_REFS),
    evidence_refs: output.evidence_refs ?? fallback.evidence_refs,
    runtime_observation:
      output.runtime_observation ?? fallback.runtime_observation,
    source: "collaborator",
  };
  return Object.freeze(record);
}
