export { loadDataset, parseCsv, parseDataset } from "./dataset.js";
export type { DatasetRow } from "./dataset.js";
export { runPipeline } from "./pipeline.js";
export type { PipelineOptions } from "./pipeline.js";
export { describeRepository } from "./repo-metadata.js";
export { ScanCache } from "./scan-cache.js";
export type {
  CollectedRepository,
  PipelineResult,
  StaticCollector,
} from "./types.js";
