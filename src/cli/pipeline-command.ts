import fs from "node:fs/promises";
import path from "node:path";
import { loadDataset } from "../pipeline/dataset.js";
import { runPipeline } from "../pipeline/pipeline.js";
import type { PipelineResult, StaticCollector } from "../pipeline/types.js";
import type { ReasoningCollaborator } from "../reasoning/types.js";
import { exportCsv } from "../report/csv-exporter.js";
import { buildBatchReport } from "../report/json-reporter.js";
import {
  renderMarkdownReport,
  type MarkdownRenderOptions,
} from "../report/markdown-reporter.js";
import { writeRunSummary } from "../store/run-store.js";
import {
  createEngine,
  createSynthesizer,
  loadCatalog,
  resolveSettings,
  type CommonOptions,
} from "./context.js";

export interface PipelineCommandOptions extends CommonOptions {
  readonly dataset: string;
  readonly output?: string;
  readonly report?: string;
  readonly format?: "json" | "md";
  readonly maxRecords?: number;
  readonly offline?: boolean;
  readonly collaborator?: ReasoningCollaborator;
  readonly collector?: StaticCollector;
}

export interface PipelineCommandResult {
  readonly result: PipelineResult;
  readonly output: string;
}

export async function runPipelineCommand(
  options: PipelineCommandOptions,
  toolVersion: string,
): Promise<PipelineCommandResult> {
  const settings = resolveSettings(options);
  const rows = await loadDataset(options.dataset);
  const catalog = await loadCatalog(settings);
  const synthesizer = await createSynthesizer(settings, catalog, {
    offline: options.offline,
    collaborator: options.collaborator,
  });

  const result = await runPipeline({
    rows,
    artifactsDir: settings.artifactsDir,
    engine: createEngine(settings, catalog),
    synthesizer,
    collector: options.collector,
    logger: settings.logger,
    now: settings.now,
  });

  if (options.output) {
    await writeFileEnsuringDir(options.output, exportCsv(result.records));
  }

  const report = buildBatchReport({
    toolVersion,
    generatedAt: settings.now().toISOString(),
    dataset: options.dataset,
    records: result.records,
  });
  const output =
    options.format === "json"
      ? JSON.stringify(report, null, 2)
      : renderMarkdownReport(report, buildMarkdownOptions(options));

  if (options.report) {
    await writeFileEnsuringDir(options.report, `${output}\n`);
  }

  await writeRunSummary(
    settings.artifactsDir,
    {
      dataset: options.dataset,
      total_features: result.total_features,
      processed_count: result.processed_count,
      error_count: result.error_count,
      csv_output: options.output,
      report_output: options.report,
    },
    { now: settings.now() },
  );

  return { result, output };
}

function buildMarkdownOptions(
  options: PipelineCommandOptions,
): MarkdownRenderOptions {
  return { maxRecords: options.maxRecords };
}

async function writeFileEnsuringDir(
  target: string,
  contents: string,
): Promise<void> {
  await fs.mkdir(path.dirname(path.resolve(target)), { recursive: true });
  await fs.writeFile(target, contents, "utf8");
}
