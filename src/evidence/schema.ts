import { z } from "zod";

const LocationSchema = z.object({
  file: z.string().nullish(),
  line: z.number().int().nonnegative().nullish(),
  message: z.string().nullish(),
});

export const GeoSignalSchema = LocationSchema.extend({
  countries: z.array(z.string()).default([]),
}).passthrough();

export const AgeCheckSignalSchema = LocationSchema.extend({
  lib: z.string().nullish(),
  method: z.string().nullish(),
}).passthrough();

export const DataResidencySignalSchema = LocationSchema.extend({
  region: z.string().nullish(),
  service: z.string().nullish(),
}).passthrough();

export const FlagSignalSchema = z.union([
  z.string(),
  z
    .object({
      name: z.string(),
      file: z.string().nullish(),
      line: z.number().int().nonnegative().nullish(),
    })
    .passthrough(),
]);

export const StaticSignalsSchema = z
  .object({
    geo_branching: z.array(GeoSignalSchema).default([]),
    age_checks: z.array(AgeCheckSignalSchema).default([]),
    data_residency: z.array(DataResidencySignalSchema).default([]),
    reporting_clients: z.array(z.string()).default([]),
    reco_system: z.boolean().default(false),
    pf_controls: z.boolean().default(false),
    flags: z.array(FlagSignalSchema).default([]),
    tags: z.array(z.string()).default([]),
  })
  .passthrough();

export const PersonaSchema = z
  .object({
    country: z.string().nullish(),
    age: z.number().int().min(0).max(150).nullish(),
    region: z.string().nullish(),
    language: z.string().nullish(),
  })
  .passthrough();

export const FlagResolutionSchema = z
  .object({
    name: z.string(),
    value: z.union([z.boolean(), z.string(), z.number()]),
    source: z.string().nullish(),
  })
  .passthrough();

export const NetworkTraceSchema = z
  .object({
    host: z.string(),
    region_hint: z.string().nullish(),
    method: z.string().nullish(),
    path: z.string().nullish(),
  })
  .passthrough();

export const RuntimeSignalsSchema = z
  .object({
    persona: PersonaSchema.nullish(),
    blocked_actions: z.array(z.string()).default([]),
    ui_states: z.array(z.string()).default([]),
    flag_resolutions: z.array(FlagResolutionSchema).default([]),
    network: z.array(NetworkTraceSchema).default([]),
    trace_uri: z.string().nullish(),
  })
  .passthrough();

export const EvidenceAttachmentSchema = z.object({
  type: z.string(),
  uri: z.string(),
  description: z.string().nullish(),
});

export const EvidenceMetadataSchema = z
  .object({
    repo: z.string().nullish(),
    commit: z.string().nullish(),
    branch: z.string().nullish(),
    scan_timestamp: z.string().nullish(),
    scanner_version: z.string().nullish(),
  })
  .passthrough();

export const EvidencePackSchema = z.object({
  feature_id: z.string().min(1),
  signals: z
    .object({
      static: StaticSignalsSchema.optional(),
      runtime: RuntimeSignalsSchema.optional(),
    })
    .passthrough()
    .default({}),
  attachments: z.array(EvidenceAttachmentSchema).default([]),
  metadata: EvidenceMetadataSchema.default({}),
});
