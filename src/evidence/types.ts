import type { z } from "zod";
import type {
  AgeCheckSignalSchema,
  DataResidencySignalSchema,
  EvidenceAttachmentSchema,
  EvidenceMetadataSchema,
  EvidencePackSchema,
  FlagResolutionSchema,
  FlagSignalSchema,
  GeoSignalSchema,
  NetworkTraceSchema,
  PersonaSchema,
  RuntimeSignalsSchema,
  StaticSignalsSchema,
} from "./schema.js";
import type { ValueRecord } from "../rules/logic/value.js";

export type GeoSignal = z.infer<typeof GeoSignalSchema>;
export type AgeCheckSignal = z.infer<typeof AgeCheckSignalSchema>;
export type DataResidencySignal = z.infer<typeof DataResidencySignalSchema>;
export type FlagSignal = z.infer<typeof FlagSignalSchema>;
export type StaticSignals = z.infer<typeof StaticSignalsSchema>;
export type Persona = z.infer<typeof PersonaSchema>;
export type FlagResolution = z.infer<typeof FlagResolutionSchema>;
export type NetworkTrace = z.infer<typeof NetworkTraceSchema>;
export type RuntimeSignals = z.infer<typeof RuntimeSignalsSchema>;
export type EvidenceAttachment = z.infer<typeof EvidenceAttachmentSchema>;
export type EvidenceMetadata = z.infer<typeof EvidenceMetadataSchema>;

/** Validated evidence document for one feature. */
export type EvidencePack = z.infer<typeof EvidencePackSchema>;

/** Document shape accepted by the schema, before defaults are applied. */
export type EvidencePackInput = z.input<typeof EvidencePackSchema>;

/**
 * Flat evaluation context. `static` always carries `all_countries` and
 * `all_regions`; `runtime.persona` is never absent.
 */
export interface EvaluationContext extends ValueRecord {
  readonly static: ValueRecord;
  readonly runtime: ValueRecord;
  readonly metadata: ValueRecord;
}

/** Static findings that carry a code location, in collection order. */
export type LocatedSignal = GeoSignal | AgeCheckSignal | DataResidencySignal;
