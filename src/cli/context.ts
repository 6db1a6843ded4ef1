import path from "node:path";
import { loadConfig, type AppConfig } from "../config/config.js";
import { loadRegulationSnippets } from "../decision/snippet-store.js";
import type { RegulationSnippet } from "../decision/snippets.js";
import { DecisionSynthesizer } from "../decision/synthesizer.js";
import { EvaluationEngine } from "../engine/evaluation-engine.js";
import {
  createLogger,
  type LogLevel,
  type Logger,
} from "../logging/logger.js";
import { createReasoningCollaborator } from "../reasoning/factory.js";
import type { ReasoningCollaborator } from "../reasoning/types.js";
import type { RuleCatalog } from "../rules/catalog.js";
import { loadRuleCatalog } from "../rules/catalog-store.js";
import { resolveArtifactsDir } from "../store/artifact-store.js";

/** Options shared by every command; flags win over the environment. */
export interface CommonOptions {
  readonly rulesPath?: string;
  readonly snippetsPath?: string;
  readonly artifactsDir?: string;
  readonly logLevel?: LogLevel;
  readonly env?: Record<string, string | undefined>;
  readonly logger?: Logger;
  readonly now?: () => Date;
}

export interface CommandSettings {
  readonly config: AppConfig;
  readonly logger: Logger;
  readonly rulesPath: string;
  readonly snippetsPath: string;
  readonly artifactsDir: string;
  readonly now: () => Date;
}

export function resolveSettings(options: CommonOptions): CommandSettings {
  const config = loadConfig(options.env ?? process.env);
  const logger =
    options.logger ??
    createLogger({ level: options.logLevel ?? config.LOG_LEVEL });
  return {
    config,
    logger,
    rulesPath: path.resolve(options.rulesPath ?? config.GEOCHECK_RULES_PATH),
    snippetsPath: path.resolve(
      options.snippetsPath ?? config.GEOCHECK_SNIPPETS_PATH,
    ),
    artifactsDir: resolveArtifactsDir(
      options.artifactsDir ?? config.GEOCHECK_ARTIFACTS_DIR,
    ),
    now: options.now ?? (() => new Date()),
  };
}

export async function loadCatalog(
  settings: CommandSettings,
): Promise<RuleCatalog> {
  const { catalog } = await loadRuleCatalog(settings.rulesPath, {
    logger: settings.logger,
  });
  return catalog;
}

export function createEngine(
  settings: CommandSettings,
  catalog: RuleCatalog,
): EvaluationEngine {
  return new EvaluationEngine(catalog, {
    logger: settings.logger,
    now: settings.now,
  });
}

export interface SynthesizerSetup {
  readonly offline?: boolean;
  /** Replaces the configured collaborator. */
  readonly collaborator?: ReasoningCollaborator;
}

export async function createSynthesizer(
  settings: CommandSettings,
  catalog: RuleCatalog,
  setup: SynthesizerSetup = {},
): Promise<DecisionSynthesizer> {
  const snippets: readonly RegulationSnippet[] = await loadRegulationSnippets(
    settings.snippetsPath,
    { logger: settings.logger },
  );
  const collaborator = setup.offline
    ? undefined
    : (setup.collaborator ?? createReasoningCollaborator(settings.config));
  if (!collaborator) {
    settings.logger.debug("No reasoning collaborator, using fallback records");
  }
  return new DecisionSynthesizer({
    catalog,
    snippets,
    collaborator,
    logger: settings.logger,
    now: settings.now,
  });
}
