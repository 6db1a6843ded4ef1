import { MalformedDocumentError } from "../errors.js";
import { toValue } from "./logic/value.js";
import { Severity, type ComplianceRule } from "./types.js";

const SEVERITIES = new Set<string>([
  Severity.Low,
  Severity.Medium,
  Severity.High,
  Severity.Critical,
]);

const DOCUMENT_KEYS = new Set(["version", "rules"]);
const RULE_KEYS = new Set([
  "id",
  "name",
  "logic",
  "requires_controls",
  "regulations",
  "severity",
  "description",
  "enabled",
]);

export const CATALOG_VERSION = "1.0";

export function isSeverity(value: unknown): value is Severity {
  return typeof value === "string" && SEVERITIES.has(value);
}

/**
 * Validate and normalize a parsed catalog document. Rule logic is only
 * checked for presence here; a rule whose logic does not compile stays in
 * the catalog and fails at evaluation time. Unknown keys are dropped and
 * reported through `warnings`.
 */
export function validateCatalogDocument(
  input: unknown,
  source: string,
  warnings: string[] = [],
): ComplianceRule[] {
  const errors: string[] = [];
  const rules = parseCatalog(input, errors, warnings);
  if (errors.length > 0) {
    throw new MalformedDocumentError(source, errors);
  }
  return rules;
}

function parseCatalog(
  input: unknown,
  errors: string[],
  warnings: string[],
): ComplianceRule[] {
  if (!isRecord(input)) {
    errors.push("catalog must be an object");
    return [];
  }
  reportUnknownKeys(input, DOCUMENT_KEYS, "catalog", warnings);

  if (input.version !== undefined && typeof input.version !== "string") {
    errors.push("catalog.version must be a string");
  }
  if (!Array.isArray(input.rules)) {
    errors.push("catalog.rules must be a list");
    return [];
  }

  const rules: ComplianceRule[] = [];
  const seen = new Set<string>();
  input.rules.forEach((entry, index) => {
    const rule = parseRule(entry, `rules[${index}]`, errors, warnings);
    if (!rule) {
      return;
    }
    if (seen.has(rule.id)) {
      errors.push(`rules[${index}].id duplicates "${rule.id}"`);
      return;
    }
    seen.add(rule.id);
    rules.push(rule);
  });
  return rules;
}

function parseRule(
  input: unknown,
  label: string,
  errors: string[],
  warnings: string[],
): ComplianceRule | null {
  if (!isRecord(input)) {
    errors.push(`${label} must be an object`);
    return null;
  }
  reportUnknownKeys(input, RULE_KEYS, label, warnings);
  const before = errors.length;

  const id = input.id;
  if (typeof id !== "string" || id.trim() === "") {
    errors.push(`${label}.id must be a non-empty string`);
  }
  const name = input.name;
  if (typeof name !== "string" || name.trim() === "") {
    errors.push(`${label}.name must be a non-empty string`);
  }
  if (input.logic === undefined) {
    errors.push(`${label}.logic is required`);
  }
  const severity = input.severity ?? Severity.Medium;
  if (!isSeverity(severity)) {
    errors.push(
      `${label}.severity must be one of ${Array.from(SEVERITIES).join(", ")}`,
    );
  }
  const enabled = input.enabled ?? true;
  if (typeof enabled !== "boolean") {
    errors.push(`${label}.enabled must be a boolean`);
  }
  const description = input.description;
  if (
    description !== undefined &&
    description !== null &&
    typeof description !== "string"
  ) {
    errors.push(`${label}.description must be a string`);
  }
  const controls = parseStringList(
    input.requires_controls,
    `${label}.requires_controls`,
    errors,
  );
  const regulations = parseStringList(
    input.regulations,
    `${label}.regulations`,
    errors,
  );

  if (
    errors.length > before ||
    typeof id !== "string" ||
    typeof name !== "string" ||
    !isSeverity(severity) ||
    typeof enabled !== "boolean"
  ) {
    return null;
  }

  return {
    id,
    name,
    logic: toValue(input.logic),
    requires_controls: Array.from(new Set(controls)),
    regulations,
    severity,
    ...(typeof description === "string" ? { description } : {}),
    enabled,
  };
}

function parseStringList(
  input: unknown,
  label: string,
  errors: string[],
): string[] {
  if (input === undefined || input === null) {
    return [];
  }
  if (!Array.isArray(input)) {
    errors.push(`${label} must be a list`);
    return [];
  }
  const values: string[] = [];
  input.forEach((item, index) => {
    if (typeof item !== "string") {
      errors.push(`${label}[${index}] must be a string`);
      return;
    }
    values.push(item);
  });
  return values;
}

function reportUnknownKeys(
  input: Record<string, unknown>,
  allowed: ReadonlySet<string>,
  label: string,
  warnings: string[],
): void {
  for (const key of Object.keys(input)) {
    if (!allowed.has(key)) {
      warnings.push(`${label} has unknown key "${key}"`);
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}
