import { describe, expect, it } from "vitest";
import { loadConfig } from "../../src/config/config.js";
import { CollaboratorError } from "../../src/errors.js";
import { parseEvidencePack } from "../../src/evidence/evidence-loader.js";
import { createReasoningCollaborator } from "../../src/reasoning/factory.js";
import { buildReasoningPrompt } from "../../src/reasoning/prompt-builder.js";
import { parseReasoningResponse } from "../../src/reasoning/response-parser.js";

describe("reasoning response parser", () => {
  it("accepts bare JSON and fenced JSON", () => {
    const body = JSON.stringify({ reasoning: "ok", code_refs: ["a.ts:1"] });
    expect(parseReasoningResponse(body)).toEqual({
      reasoning: "ok",
      code_refs: ["a.ts:1"],
    });
    expect(parseReasoningResponse(`\n\`\`\`\n${body}\n\`\`\`\n`)).toEqual({
      reasoning: "ok",
      code_refs: ["a.ts:1"],
    });
  });

  it("drops keys outside the enrichable set", () => {
    expect(
      parseReasoningResponse('{"reasoning": "ok", "matched_rules": ["X"]}'),
    ).toEqual({ reasoning: "ok" });
  });

  it("rejects text that is not JSON", () => {
    expect(() => parseReasoningResponse("no json here")).toThrow(
      CollaboratorError,
    );
  });

  it("rejects out-of-range values", () => {
    expect(() =>
      parseReasoningResponse('{"reasoning": "ok", "confidence": 3}'),
    ).toThrow(
      "Collaborator response is invalid: confidence: Number must be less than or equal to 1",
    );
    expect(() => parseReasoningResponse('{"reasoning": ""}')).toThrow(
      "Collaborator response is invalid: reasoning: String must contain at least 1 character(s)",
    );
  });
});

describe("reasoning prompt", () => {
  it("summarizes evidence, rule outcome and snippets", () => {
    const evidence = parseEvidencePack(
      {
        feature_id: "eu-recs",
        signals: {
          static: {
            data_residency: [{ file: "infra/db.ts", line: 3, region: "eu-west" }],
            reco_system: true,
          },
          runtime: { persona: { country: "EU" }, ui_states: ["dsa_notice"] },
        },
      },
      "inline",
    );
    const prompt = buildReasoningPrompt(
      evidence,
      {
        feature_id: "eu-recs",
        requires_geo_logic: true,
        confidence: 0.2,
        matched_rules: ["DSA_TRANSPARENCY"],
        missing_controls: ["transparency_reports"],
        evaluation_timestamp: "2026-03-01T12:00:00.000Z",
        evaluation_log: [],
      },
      [
        {
          regulation_id: "eu_dsa",
          title: "EU DSA",
          content: "Platforms must publish transparency reports.",
        },
      ],
    );
    const lines = prompt.split("\n");

    expect(lines[0]).toBe("FEATURE: eu-recs");
    expect(lines).toContain("  - infra/db.ts:3 region=eu-west");
    expect(lines).toContain("- Recommendation system: true");
    expect(lines).toContain("- Persona: EU, age unknown");
    expect(lines).toContain("- UI states: dsa_notice");
    expect(lines).toContain("- Confidence: 0.20 (weak)");
    expect(lines).toContain("- Missing controls: transparency_reports");
    expect(lines).toContain(
      "- EU DSA: Platforms must publish transparency reports.",
    );
  });
});

describe("collaborator factory", () => {
  it("returns nothing without an API key", () => {
    expect(createReasoningCollaborator(loadConfig({}))).toBeUndefined();
    expect(
      createReasoningCollaborator(loadConfig({ GEMINI_API_KEY: "" })),
    ).toBeUndefined();
  });

  it("creates the Gemini collaborator when a key is configured", () => {
    const collaborator = createReasoningCollaborator(
      loadConfig({ GOOGLE_API_KEY: "test-secret" }),
    );
    expect(collaborator?.name).toBe("gemini");
  });
});
