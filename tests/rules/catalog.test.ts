import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { MalformedDocumentError } from "../../src/errors.js";
import { RuleCatalog } from "../../src/rules/catalog.js";
import {
  loadRuleCatalog,
  saveRuleCatalog,
} from "../../src/rules/catalog-store.js";
import { DEFAULT_RULES } from "../../src/rules/default-rules.js";
import { validateCatalogDocument } from "../../src/rules/rule-validator.js";
import { Severity, type ComplianceRule } from "../../src/rules/types.js";

let tempDir: string;

beforeEach(async () => {
  tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "geocheck-catalog-"));
});

afterEach(async () => {
  if (tempDir) {
    await fs.rm(tempDir, { recursive: true, force: true });
  }
});

const defaultIds = [
  "UT_MINORS_CURFEW",
  "NCMEC_REPORTING",
  "DSA_TRANSPARENCY",
  "STATE_MINORS_PF_DEFAULT_OFF",
  "GDPR_DATA_PROCESSING",
];

function makeRule(id: string, overrides: Partial<ComplianceRule> = {}): ComplianceRule {
  return {
    id,
    name: `Rule ${id}`,
    logic: true,
    requires_controls: [],
    regulations: [],
    severity: Severity.Low,
    enabled: true,
    ...overrides,
  };
}

describe("rule catalog bootstrap", () => {
  it("installs and persists defaults when the document is missing", async () => {
    const catalogPath = path.join(tempDir, "rules", "compliance_rules.json");
    const loaded = await loadRuleCatalog(catalogPath);

    expect(loaded.bootstrapped).toBe("missing");
    expect(loaded.persisted).toBe(true);
    expect(loaded.catalog.rules.map((rule) => rule.id)).toEqual(defaultIds);

    const reloaded = await loadRuleCatalog(catalogPath);
    expect(reloaded.bootstrapped).toBeUndefined();
    expect(reloaded.catalog.rules).toEqual(loaded.catalog.rules);
  });

  it("replaces a document without a rules list", async () => {
    const catalogPath = path.join(tempDir, "rules.json");
    await fs.writeFile(catalogPath, "{}", "utf8");

    const loaded = await loadRuleCatalog(catalogPath);
    expect(loaded.bootstrapped).toBe("malformed");
    expect(loaded.catalog.size).toBe(5);

    const persisted = JSON.parse(await fs.readFile(catalogPath, "utf8")) as {
      version: string;
      rules: { id: string }[];
    };
    expect(persisted.version).toBe("1.0");
    expect(persisted.rules.map((rule) => rule.id)).toEqual(defaultIds);

    const reloaded = await loadRuleCatalog(catalogPath);
    expect(reloaded.bootstrapped).toBeUndefined();
    expect(reloaded.catalog.rules).toEqual(loaded.catalog.rules);
  });

  it("keeps custom rules when the document has unknown keys", async () => {
    const catalogPath = path.join(tempDir, "rules.json");
    const document = {
      version: "1.0",
      updated_by: "compliance-team",
      rules: [{ id: "MINE", name: "Mine", logic: true, tags: ["custom"] }],
    };
    await fs.writeFile(catalogPath, JSON.stringify(document), "utf8");

    const loaded = await loadRuleCatalog(catalogPath);
    expect(loaded.bootstrapped).toBeUndefined();
    expect(loaded.catalog.rules.map((rule) => rule.id)).toEqual(["MINE"]);
    expect(JSON.parse(await fs.readFile(catalogPath, "utf8"))).toEqual(document);
  });

  it("uses the defaults in memory when the location cannot be read", async () => {
    const catalogPath = path.join(tempDir, "rules.json");
    await fs.mkdir(catalogPath);

    const loaded = await loadRuleCatalog(catalogPath);
    expect(loaded.bootstrapped).toBe("unreadable");
    expect(loaded.persisted).toBe(false);
    expect(loaded.catalog.rules.map((rule) => rule.id)).toEqual(defaultIds);
    expect((await fs.stat(catalogPath)).isDirectory()).toBe(true);
  });

  it("replaces a document that is not valid JSON", async () => {
    const catalogPath = path.join(tempDir, "rules.json");
    await fs.writeFile(catalogPath, "{ rules: ", "utf8");
    const loaded = await loadRuleCatalog(catalogPath);
    expect(loaded.bootstrapped).toBe("malformed");
    expect(loaded.catalog.size).toBe(5);
  });

  it("accepts an explicitly empty catalog", async () => {
    const catalogPath = path.join(tempDir, "rules.json");
    await fs.writeFile(catalogPath, '{"rules": []}', "utf8");
    const loaded = await loadRuleCatalog(catalogPath);
    expect(loaded.bootstrapped).toBeUndefined();
    expect(loaded.catalog.size).toBe(0);
  });

  it("round-trips YAML documents", async () => {
    const catalogPath = path.join(tempDir, "rules.yaml");
    const catalog = new RuleCatalog([
      makeRule("YAML_RULE", {
        logic: { in: ["US", { var: "static.all_countries" }] },
        requires_controls: ["geo_gate"],
        severity: Severity.High,
      }),
    ]);
    await saveRuleCatalog(catalogPath, catalog);

    const raw = await fs.readFile(catalogPath, "utf8");
    expect(raw.startsWith("version: '1.0'\n")).toBe(true);

    const loaded = await loadRuleCatalog(catalogPath);
    expect(loaded.bootstrapped).toBeUndefined();
    expect(loaded.catalog.rules).toEqual(catalog.rules);
  });
});

describe("catalog document validation", () => {
  it("applies defaults and removes duplicate controls", () => {
    const [rule] = validateCatalogDocument(
      {
        rules: [
          {
            id: "R1",
            name: "First",
            logic: { var: "static.pf_controls" },
            requires_controls: ["a", "b", "a"],
          },
        ],
      },
      "inline",
    );
    expect(rule).toEqual({
      id: "R1",
      name: "First",
      logic: { var: "static.pf_controls" },
      requires_controls: ["a", "b"],
      regulations: [],
      severity: Severity.Medium,
      enabled: true,
    });
  });

  it("collects every problem in one error", () => {
    const warnings: string[] = [];
    try {
      validateCatalogDocument(
        {
          rules: [
            { id: "R1", name: "One", logic: true, severity: "urgent" },
            { id: "R1", name: "Again", logic: true },
            { name: "No id", logic: true, extra: 1 },
          ],
        },
        "catalog.json",
        warnings,
      );
      throw new Error("expected validation to fail");
    } catch (error) {
      expect(error).toBeInstanceOf(MalformedDocumentError);
      if (error instanceof MalformedDocumentError) {
        expect(error.problems).toEqual([
          "rules[0].severity must be one of low, medium, high, critical",
          "rules[2].id must be a non-empty string",
        ]);
      }
    }
    expect(warnings).toEqual(['rules[2] has unknown key "extra"']);
  });

  it("rejects duplicate ids", () => {
    expect(() =>
      validateCatalogDocument(
        {
          rules: [
            { id: "R1", name: "One", logic: true },
            { id: "R1", name: "Again", logic: true },
          ],
        },
        "catalog.json",
      ),
    ).toThrow('Malformed document catalog.json: rules[1].id duplicates "R1"');
  });
});

describe("rule catalog", () => {
  it("disables a rule without changing order", () => {
    const catalog = new RuleCatalog(DEFAULT_RULES);
    const updated = catalog.withRuleEnabled("NCMEC_REPORTING", false);

    expect(updated.rules.map((rule) => rule.id)).toEqual(defaultIds);
    expect(updated.get("NCMEC_REPORTING")?.enabled).toBe(false);
    expect(updated.enabledRules().map((entry) => entry.rule.id)).toEqual([
      "UT_MINORS_CURFEW",
      "DSA_TRANSPARENCY",
      "STATE_MINORS_PF_DEFAULT_OFF",
      "GDPR_DATA_PROCESSING",
    ]);
    expect(catalog.get("NCMEC_REPORTING")?.enabled).toBe(true);
  });

  it("replaces rules in place and appends new ones", () => {
    const catalog = new RuleCatalog([makeRule("A"), makeRule("B")]);
    const replaced = catalog.withRule(makeRule("A", { name: "Renamed" }));
    const appended = replaced.withRule(makeRule("C"));

    expect(appended.rules.map((rule) => `${rule.id}:${rule.name}`)).toEqual([
      "A:Renamed",
      "B:Rule B",
      "C:Rule C",
    ]);
  });

  it("throws on unknown ids and duplicate rules", () => {
    const catalog = new RuleCatalog([makeRule("A")]);
    expect(() => catalog.withRuleEnabled("Z", false)).toThrow("Rule not found: Z");
    expect(() => new RuleCatalog([makeRule("A"), makeRule("A")])).toThrow(
      "Duplicate rule id: A",
    );
  });

  it("keeps a rule whose logic does not compile", () => {
    const catalog = new RuleCatalog([makeRule("BAD", { logic: { xor: [] } })]);
    const [compiled] = catalog.compiledRules();

    expect(catalog.has("BAD")).toBe(true);
    expect(compiled?.logic.ok).toBe(false);
    if (compiled && !compiled.logic.ok) {
      expect(compiled.logic.error.message).toBe(
        'Rule BAD: Unknown operator "xor"',
      );
    }
  });
});
