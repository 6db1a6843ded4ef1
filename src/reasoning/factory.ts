import { reasoningApiKey, type AppConfig } from "../config/config.js";
import { GeminiCollaborator } from "./gemini-collaborator.js";
import type { ReasoningCollaborator } from "./types.js";

/**
 * The configured collaborator, or undefined when no API key is set and
 * records come from the deterministic fallback only.
 */
export function createReasoningCollaborator(
  config: AppConfig,
): ReasoningCollaborator | undefined {
  const apiKey = reasoningApiKey(config);
  if (!apiKey) {
    return undefined;
  }
  return new GeminiCollaborator({
    apiKey,
    model: config.GEMINI_MODEL,
    temperature: config.GEMINI_TEMPERATURE,
    timeoutMs: config.REASONING_TIMEOUT_MS,
  });
}
