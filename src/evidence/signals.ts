import { RuntimeSignalsSchema, StaticSignalsSchema } from "./schema.js";
import type {
  EvidencePack,
  LocatedSignal,
  RuntimeSignals,
  StaticSignals,
} from "./types.js";

export function staticSignals(pack: EvidencePack): StaticSignals {
  return pack.signals.static ?? StaticSignalsSchema.parse({});
}

export function runtimeSignals(pack: EvidencePack): RuntimeSignals {
  return pack.signals.runtime ?? RuntimeSignalsSchema.parse({});
}

export function hasRuntimeSignals(pack: EvidencePack): boolean {
  return pack.signals.runtime !== undefined;
}

/**
 * Geo-branching, then age-check, then data-residency findings, each in the
 * order the scanner recorded them.
 */
export function locatedSignals(pack: EvidencePack): LocatedSignal[] {
  const signals = staticSignals(pack);
  return [
    ...signals.geo_branching,
    ...signals.age_checks,
    ...signals.data_residency,
  ];
}

/** `file:line`, or just the file when no line was recorded. */
export function codeRef(signal: LocatedSignal): string | null {
  if (!signal.file) {
    return null;
  }
  return signal.line == null ? signal.file : `${signal.file}:${signal.line}`;
}

/** Order-preserving union of every geo-branching country list. */
export function allCountries(signals: StaticSignals): string[] {
  return unique(signals.geo_branching.flatMap((signal) => signal.countries));
}

export function allRegions(signals: StaticSignals): string[] {
  return unique(presentValues(signals.data_residency.map((signal) => signal.region)));
}

export function presentValues(
  values: readonly (string | null | undefined)[],
): string[] {
  return values.filter((value): value is string => value != null && value !== "");
}

function unique(values: readonly string[]): string[] {
  return Array.from(new Set(values));
}
