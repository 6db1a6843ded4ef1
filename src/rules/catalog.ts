import { LogicParseError } from "../errors.js";
import { parseLogic } from "./logic/expression.js";
import { CATALOG_VERSION } from "./rule-validator.js";
import type {
  CompiledLogic,
  CompiledRule,
  ComplianceRule,
  RuleCatalogDocument,
} from "./types.js";

/**
 * Ordered, read-only set of compliance rules with their logic compiled once.
 * Edits return a new catalog; evaluation order is the document order.
 */
export class RuleCatalog {
  private readonly entries: readonly CompiledRule[];
  private readonly byId: ReadonlyMap<string, CompiledRule>;

  constructor(rules: readonly ComplianceRule[]) {
    const byId = new Map<string, CompiledRule>();
    const entries: CompiledRule[] = [];
    for (const rule of rules) {
      if (byId.has(rule.id)) {
        throw new Error(`Duplicate rule id: ${rule.id}`);
      }
      const entry = compileRule(rule);
      byId.set(rule.id, entry);
      entries.push(entry);
    }
    this.entries = Object.freeze(entries);
    this.byId = byId;
  }

  /** Every rule in the catalog, disabled ones included. */
  get size(): number {
    return this.entries.length;
  }

  get rules(): readonly ComplianceRule[] {
    return this.entries.map((entry) => entry.rule);
  }

  compiledRules(): readonly CompiledRule[] {
    return this.entries;
  }

  enabledRules(): readonly CompiledRule[] {
    return this.entries.filter((entry) => entry.rule.enabled);
  }

  get(id: string): ComplianceRule | undefined {
    return this.byId.get(id)?.rule;
  }

  has(id: string): boolean {
    return this.byId.has(id);
  }

  withRuleEnabled(id: string, enabled: boolean): RuleCatalog {
    const existing = this.get(id);
    if (!existing) {
      throw new Error(`Rule not found: ${id}`);
    }
    return this.withRule({ ...existing, enabled });
  }

  /** Replace the rule with the same id in place, or append a new one. */
  withRule(rule: ComplianceRule): RuleCatalog {
    if (!this.has(rule.id)) {
      return new RuleCatalog([...this.rules, rule]);
    }
    return new RuleCatalog(
      this.rules.map((existing) => (existing.id === rule.id ? rule : existing)),
    );
  }

  toDocument(): RuleCatalogDocument {
    return { version: CATALOG_VERSION, rules: this.rules };
  }
}

export function compileRule(rule: ComplianceRule): CompiledRule {
  return { rule, logic: compileLogic(rule) };
}

function compileLogic(rule: ComplianceRule): CompiledLogic {
  try {
    return { ok: true, expression: parseLogic(rule.logic) };
  } catch (error) {
    if (error instanceof LogicParseError) {
      return {
        ok: false,
        error: new LogicParseError(`Rule ${rule.id}: ${error.message}`),
      };
    }
    throw error;
  }
}
