export { GeminiCollaborator } from "./gemini-collaborator.js";
export type { GeminiCollaboratorOptions } from "./gemini-collaborator.js";
export { buildReasoningPrompt, SYSTEM_INSTRUCTION } from "./prompt-builder.js";
export { parseReasoningResponse } from "./response-parser.js";
export { createReasoningCollaborator } from "./factory.js";
export type {
  ReasoningCollaborator,
  ReasoningOutput,
  ReasoningRequest,
} from "./types.js";
