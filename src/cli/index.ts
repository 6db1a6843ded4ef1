#!/usr/bin/env node
import fs from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { Command } from "commander";
import { LOG_LEVELS } from "../config/config.js";
import { errorMessage } from "../errors.js";
import type { LogLevel } from "../logging/logger.js";
import type { CommonOptions } from "./context.js";
import { runEvaluateCommand } from "./evaluate-command.js";
import { runExplainCommand } from "./explain-command.js";
import { runPipelineCommand } from "./pipeline-command.js";
import { runRulesInit, runRulesList, runRulesToggle } from "./rules-command.js";

interface GlobalFlags {
  readonly logLevel?: string;
  readonly rules?: string;
  readonly snippets?: string;
  readonly artifacts?: string;
}

interface FeatureFlags {
  readonly feature: string;
  readonly evidence?: string;
  readonly offline?: boolean;
}

interface PipelineFlags {
  readonly dataset: string;
  readonly output?: string;
  readonly report?: string;
  readonly format: string;
  readonly maxRecords?: string;
  readonly offline?: boolean;
}

const program = new Command();
const toolVersion = await loadVersion();

program
  .name("geocheck")
  .description(
    "Evaluate feature evidence against jurisdiction-specific compliance rules",
  )
  .version(toolVersion)
  .option("--log-level <level>", `Log level (${LOG_LEVELS.join("|")})`)
  .option("--rules <path>", "Rule catalog document (JSON or YAML)")
  .option("--snippets <path>", "Regulation snippets document")
  .option("--artifacts <dir>", "Artifacts directory");

program
  .command("evaluate")
  .description("Evaluate a feature's evidence and write its rules result")
  .requiredOption("--feature <id>", "Feature id")
  .option("--evidence <path>", "Evidence document (default: stored evidence)")
  .action(async (options: FeatureFlags) => {
    try {
      const result = await runEvaluateCommand({
        ...commonOptions(),
        featureId: options.feature,
        evidencePath: options.evidence,
      });
      await writeStdout(result.output + "\n");
    } catch (error) {
      await writeError(error);
      process.exitCode = 1;
    }
  });

program
  .command("explain")
  .description("Produce the final compliance record for a feature")
  .requiredOption("--feature <id>", "Feature id")
  .option("--evidence <path>", "Evidence document (default: stored evidence)")
  .option("--offline", "Skip the reasoning collaborator")
  .action(async (options: FeatureFlags) => {
    try {
      const result = await runExplainCommand({
        ...commonOptions(),
        featureId: options.feature,
        evidencePath: options.evidence,
        offline: Boolean(options.offline),
      });
      await writeStdout(result.output + "\n");
    } catch (error) {
      await writeError(error);
      process.exitCode = 1;
    }
  });

program
  .command("pipeline")
  .description("Process every feature listed in a dataset CSV")
  .requiredOption("--dataset <csv>", "Dataset with a feature_id column")
  .option("--output <csv>", "Write final records as CSV")
  .option("--report <file>", "Write the batch report to a file")
  .option("--format <format>", "Report format (md|json)", "md")
  .option("--max-records <number>", "Limit features listed in the report")
  .option("--offline", "Skip the reasoning collaborator")
  .action(async (options: PipelineFlags) => {
    try {
      const { result, output } = await runPipelineCommand(
        {
          ...commonOptions(),
          dataset: options.dataset,
          output: options.output,
          report: options.report,
          format: parseFormat(options.format),
          maxRecords: options.maxRecords
            ? Number(options.maxRecords)
            : undefined,
          offline: Boolean(options.offline),
        },
        toolVersion,
      );
      if (!options.report) {
        await writeStdout(output + "\n");
      }
      if (result.error_count > 0) {
        process.exitCode = 2;
      }
    } catch (error) {
      await writeError(error);
      process.exitCode = 1;
    }
  });

const rulesCommand = program
  .command("rules")
  .description("Inspect and edit the rule catalog");

rulesCommand
  .command("list")
  .description("List rules in catalog order")
  .action(async () => {
    try {
      await writeStdout((await runRulesList(commonOptions())) + "\n");
    } catch (error) {
      await writeError(error);
      process.exitCode = 1;
    }
  });

rulesCommand
  .command("enable")
  .argument("<id>", "Rule id")
  .action(async (id: string) => {
    try {
      await writeStdout(
        (await runRulesToggle(id, true, commonOptions())) + "\n",
      );
    } catch (error) {
      await writeError(error);
      process.exitCode = 1;
    }
  });

rulesCommand
  .command("disable")
  .argument("<id>", "Rule id")
  .action(async (id: string) => {
    try {
      await writeStdout(
        (await runRulesToggle(id, false, commonOptions())) + "\n",
      );
    } catch (error) {
      await writeError(error);
      process.exitCode = 1;
    }
  });

rulesCommand
  .command("init")
  .description("Write the default rules and regulation snippets")
  .option("--force", "Overwrite existing documents")
  .action(async (options: { force?: boolean }) => {
    try {
      await writeStdout(
        (await runRulesInit({
          ...commonOptions(),
          force: Boolean(options.force),
        })) + "\n",
      );
    } catch (error) {
      await writeError(error);
      process.exitCode = 1;
    }
  });

function commonOptions(): CommonOptions {
  const flags = program.opts<GlobalFlags>();
  return {
    logLevel: flags.logLevel ? parseLogLevel(flags.logLevel) : undefined,
    rulesPath: flags.rules,
    snippetsPath: flags.snippets,
    artifactsDir: flags.artifacts,
  };
}

async function loadVersion(): Promise<string> {
  const dir = path.dirname(fileURLToPath(import.meta.url));
  const rootPath = path.resolve(dir, "..", "..");
  const raw = await fs.readFile(path.join(rootPath, "package.json"), "utf8");
  const json = JSON.parse(raw) as { version?: string };
  return json.version ?? "0.0.0";
}

function parseLogLevel(value: string): LogLevel {
  const level = LOG_LEVELS.find((candidate) => candidate === value);
  if (!level) {
    throw new Error(`Unsupported log level: ${value}`);
  }
  return level;
}

function parseFormat(value: string): "json" | "md" {
  if (value === "json" || value === "md") {
    return value;
  }
  throw new Error(`Unsupported format: ${value}`);
}

async function writeStdout(message: string): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    process.stdout.write(message, (error) => {
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
  });
}

async function writeError(error: unknown): Promise<void> {
  await new Promise<void>((resolve) => {
    process.stderr.write(errorMessage(error) + "\n", () => resolve());
  });
}

const argv = [...process.argv];
const separatorIndex = argv.indexOf("--");
if (separatorIndex !== -1) {
  argv.splice(separatorIndex, 1);
}

await program.parseAsync(argv);
