import { z } from "zod";
import { MalformedDocumentError, errorMessage } from "../errors.js";
import { formatIssue } from "../evidence/evidence-loader.js";
import type { RulesResult } from "./types.js";

export const RulesResultSchema = z.object({
  feature_id: z.string().min(1),
  requires_geo_logic: z.boolean(),
  confidence: z.number().min(0).max(1),
  matched_rules: z.array(z.string()),
  missing_controls: z.array(z.string()),
  evaluation_timestamp: z.string().datetime({ offset: true }),
  evaluation_log: z
    .array(
      z.object({
        rule_id: z.string(),
        status: z.enum(["matched", "not_matched", "failed", "disabled"]),
        reason: z.string().optional(),
      }),
    )
    .default([]),
});

export function serializeRulesResult(result: RulesResult): string {
  return `${JSON.stringify(result, null, 2)}\n`;
}

/**
 * @throws {MalformedDocumentError} when `raw` is not a valid rules result
 */
export function parseRulesResult(raw: string, source: string): RulesResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new MalformedDocumentError(source, [errorMessage(error)], {
      cause: error,
    });
  }
  const result = RulesResultSchema.safeParse(parsed);
  if (!result.success) {
    throw new MalformedDocumentError(
      source,
      result.error.issues.map((issue) => formatIssue(issue)),
    );
  }
  return result.data;
}
