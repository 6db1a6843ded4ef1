import type { LogicParseError } from "../errors.js";
import type { Expression } from "./logic/expression.js";
import type { Value } from "./logic/value.js";

export const enum Severity {
  Low = "low",
  Medium = "medium",
  High = "high",
  Critical = "critical",
}

export interface ComplianceRule {
  readonly id: string;
  readonly name: string;
  /** Logic document as authored; compiled separately by the catalog. */
  readonly logic: Value;
  readonly requires_controls: readonly string[];
  readonly regulations: readonly string[];
  readonly severity: Severity;
  readonly description?: string;
  readonly enabled: boolean;
}

export type CompiledLogic =
  | { readonly ok: true; readonly expression: Expression }
  | { readonly ok: false; readonly error: LogicParseError };

export interface CompiledRule {
  readonly rule: ComplianceRule;
  readonly logic: CompiledLogic;
}

export interface RuleCatalogDocument {
  readonly version: string;
  readonly rules: readonly ComplianceRule[];
}
