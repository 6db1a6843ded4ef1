import { GoogleGenAI } from "@google/genai";
import { CollaboratorError, errorMessage } from "../errors.js";
import { SYSTEM_INSTRUCTION } from "./prompt-builder.js";
import type { ReasoningCollaborator, ReasoningRequest } from "./types.js";

export interface GeminiCollaboratorOptions {
  readonly apiKey: string;
  readonly model: string;
  readonly temperature: number;
  readonly timeoutMs: number;
}

const MAX_OUTPUT_TOKENS = 2048;

export class GeminiCollaborator implements ReasoningCollaborator {
  readonly name = "gemini";
  private readonly client: GoogleGenAI;
  private readonly options: GeminiCollaboratorOptions;

  constructor(options: GeminiCollaboratorOptions) {
    this.options = options;
    this.client = new GoogleGenAI({
      apiKey: options.apiKey,
      httpOptions: { timeout: options.timeoutMs },
    });
  }

  async analyze(request: ReasoningRequest): Promise<string> {
    try {
      const response = await this.client.models.generateContent({
        model: this.options.model,
        contents: request.prompt,
        config: {
          systemInstruction: SYSTEM_INSTRUCTION,
          temperature: this.options.temperature,
          maxOutputTokens: MAX_OUTPUT_TOKENS,
          candidateCount: 1,
          responseMimeType: "application/json",
        },
      });
      const text = response.text;
      if (!text) {
        throw new CollaboratorError("Gemini returned an empty response.");
      }
      return text;
    } catch (error) {
      if (error instanceof CollaboratorError) {
        throw error;
      }
      throw new CollaboratorError(
        `Gemini request failed for ${request.featureId}: ${errorMessage(error)}`,
        { cause: error },
      );
    }
  }
}
