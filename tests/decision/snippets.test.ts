import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  loadRegulationSnippets,
  parseSnippetDocument,
} from "../../src/decision/snippet-store.js";
import {
  DEFAULT_SNIPPETS,
  keywords,
  relevantSnippets,
} from "../../src/decision/snippets.js";
import { RuleCatalog } from "../../src/rules/catalog.js";
import { DEFAULT_RULES } from "../../src/rules/default-rules.js";

let tempDir: string;

beforeEach(async () => {
  tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "geocheck-snippets-"));
});

afterEach(async () => {
  if (tempDir) {
    await fs.rm(tempDir, { recursive: true, force: true });
  }
});

const catalog = new RuleCatalog(DEFAULT_RULES);

function relevantIds(ruleIds: readonly string[]): string[] {
  return relevantSnippets(DEFAULT_SNIPPETS, ruleIds, catalog).map(
    (snippet) => snippet.regulation_id,
  );
}

describe("snippet relevance", () => {
  it("maps each default rule to its regulation", () => {
    expect(relevantIds(["UT_MINORS_CURFEW"])).toEqual(["utah_social_media_act"]);
    expect(relevantIds(["NCMEC_REPORTING"])).toEqual(["ncmec_reporting"]);
    expect(relevantIds(["DSA_TRANSPARENCY"])).toEqual(["eu_dsa"]);
    expect(relevantIds(["STATE_MINORS_PF_DEFAULT_OFF"])).toEqual(["coppa"]);
    expect(relevantIds(["GDPR_DATA_PROCESSING"])).toEqual(["gdpr"]);
  });

  it("keeps snippet order and lists each snippet once", () => {
    expect(
      relevantIds(["GDPR_DATA_PROCESSING", "UT_MINORS_CURFEW", "NCMEC_REPORTING"]),
    ).toEqual(["utah_social_media_act", "ncmec_reporting", "gdpr"]);
  });

  it("matches on id alone without a catalog", () => {
    expect(
      relevantSnippets(DEFAULT_SNIPPETS, ["GDPR", "UT_MINORS_CURFEW"]).map(
        (snippet) => snippet.regulation_id,
      ),
    ).toEqual(["gdpr"]);
  });

  it("ignores short words", () => {
    expect(keywords("EU Digital Services Act")).toEqual(["digital", "services"]);
  });
});

describe("snippet store", () => {
  it("installs defaults for a missing document", async () => {
    const file = path.join(tempDir, "policy_snippets.json");
    const snippets = await loadRegulationSnippets(file);
    expect(snippets).toEqual(DEFAULT_SNIPPETS);

    const written = JSON.parse(await fs.readFile(file, "utf8")) as {
      version: string;
      snippets: unknown[];
    };
    expect(written.version).toBe("1.0");
    expect(written.snippets).toHaveLength(5);
  });

  it("replaces a malformed document", async () => {
    const file = path.join(tempDir, "policy_snippets.json");
    await fs.writeFile(file, '{"snippets": [{"title": "no id"}]}', "utf8");
    expect(await loadRegulationSnippets(file)).toEqual(DEFAULT_SNIPPETS);
  });

  it("accepts a bare list", () => {
    expect(
      parseSnippetDocument(
        '[{"regulation_id": "local", "title": "Local Law", "content": "text"}]',
        "inline",
      ),
    ).toEqual([{ regulation_id: "local", title: "Local Law", content: "text" }]);
  });
});
