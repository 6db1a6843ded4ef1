import fs from "node:fs/promises";
import { saveRegulationSnippets } from "../decision/snippet-store.js";
import { DEFAULT_SNIPPETS } from "../decision/snippets.js";
import { isNodeError } from "../errors.js";
import { renderAsciiTable } from "../report/markdown-reporter.js";
import { defaultCatalog, saveRuleCatalog } from "../rules/catalog-store.js";
import type { RuleCatalog } from "../rules/catalog.js";
import { loadCatalog, resolveSettings, type CommonOptions } from "./context.js";

export async function runRulesList(options: CommonOptions): Promise<string> {
  const settings = resolveSettings(options);
  return renderRuleTable(await loadCatalog(settings));
}

export function renderRuleTable(catalog: RuleCatalog): string {
  if (catalog.size === 0) {
    return "No rules configured.";
  }
  return renderAsciiTable(
    catalog.rules.map((rule) => [
      rule.id,
      rule.severity,
      rule.enabled ? "yes" : "no",
      rule.regulations.join(", "),
    ]),
    ["ID", "Severity", "Enabled", "Regulations"],
  );
}

/**
 * Flip a rule's enabled flag and write the catalog back.
 */
export async function runRulesToggle(
  ruleId: string,
  enabled: boolean,
  options: CommonOptions,
): Promise<string> {
  const settings = resolveSettings(options);
  const catalog = await loadCatalog(settings);
  const updated = catalog.withRuleEnabled(ruleId, enabled);
  await saveRuleCatalog(settings.rulesPath, updated);
  settings.logger.info({ ruleId, enabled }, "Rule catalog updated");
  return `Rule ${ruleId} ${enabled ? "enabled" : "disabled"}.`;
}

export interface RulesInitOptions extends CommonOptions {
  readonly force?: boolean;
}

/**
 * Write the default catalog and regulation snippets. Existing documents
 * are left alone unless `force` is set.
 */
export async function runRulesInit(options: RulesInitOptions): Promise<string> {
  const settings = resolveSettings(options);
  const lines: string[] = [];

  if (options.force || !(await fileExists(settings.rulesPath))) {
    await saveRuleCatalog(settings.rulesPath, defaultCatalog());
    lines.push(`Wrote default rules to ${settings.rulesPath}`);
  } else {
    lines.push(`Rules already present at ${settings.rulesPath}`);
  }

  if (options.force || !(await fileExists(settings.snippetsPath))) {
    await saveRegulationSnippets(settings.snippetsPath, DEFAULT_SNIPPETS);
    lines.push(`Wrote default regulation snippets to ${settings.snippetsPath}`);
  } else {
    lines.push(`Regulation snippets already present at ${settings.snippetsPath}`);
  }

  return lines.join("\n");
}

async function fileExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch (error) {
    if (isNodeError(error, "ENOENT")) {
      return false;
    }
    throw error;
  }
}
