export { RuleCatalog, compileRule } from "./catalog.js";
export {
  defaultCatalog,
  loadRuleCatalog,
  saveRuleCatalog,
} from "./catalog-store.js";
export type {
  BootstrapReason,
  LoadCatalogOptions,
  LoadedCatalog,
} from "./catalog-store.js";
export { DEFAULT_RULES } from "./default-rules.js";
export {
  CATALOG_VERSION,
  isSeverity,
  validateCatalogDocument,
} from "./rule-validator.js";
export { Severity } from "./types.js";
export type {
  CompiledLogic,
  CompiledRule,
  ComplianceRule,
  RuleCatalogDocument,
} from "./types.js";
export * from "./logic/index.js";
