import fs from "node:fs/promises";
import path from "node:path";
import yaml from "js-yaml";
import { MalformedDocumentError, errorMessage, isNodeError } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import { silentLogger } from "../logging/logger.js";
import { RuleCatalog } from "./catalog.js";
import { DEFAULT_RULES } from "./default-rules.js";
import { validateCatalogDocument } from "./rule-validator.js";

export type BootstrapReason = "missing" | "malformed" | "unreadable";

export interface LoadedCatalog {
  readonly catalog: RuleCatalog;
  /** Set when the defaults were installed instead of reading a document. */
  readonly bootstrapped?: BootstrapReason;
  /** False when bootstrap could not write the defaults back. */
  readonly persisted: boolean;
}

export interface LoadCatalogOptions {
  readonly logger?: Logger;
}

/**
 * Load the catalog at `catalogPath`. A missing or corrupt document is
 * replaced by the default rules, which are written back for later runs.
 * A location that cannot be read yields the defaults in memory only. Never
 * throws; a failed write-back is logged and reported through `persisted`.
 */
export async function loadRuleCatalog(
  catalogPath: string,
  options: LoadCatalogOptions = {},
): Promise<LoadedCatalog> {
  const logger = options.logger ?? silentLogger();

  let raw: string;
  try {
    raw = await fs.readFile(catalogPath, "utf8");
  } catch (error) {
    if (!isNodeError(error, "ENOENT")) {
      logger.error(
        { catalogPath, reason: errorMessage(error) },
        "Rule catalog is unreadable, using defaults in memory",
      );
      return {
        catalog: defaultCatalog(),
        bootstrapped: "unreadable",
        persisted: false,
      };
    }
    logger.info({ catalogPath }, "Rule catalog not found, installing defaults");
    return await bootstrapCatalog(catalogPath, "missing", logger);
  }

  try {
    const warnings: string[] = [];
    const rules = validateCatalogDocument(
      parseDocument(raw, catalogPath),
      catalogPath,
      warnings,
    );
    if (warnings.length > 0) {
      logger.warn({ catalogPath, warnings }, "Ignoring unknown catalog keys");
    }
    const catalog = new RuleCatalog(rules);
    logger.debug(
      { catalogPath, rules: catalog.size },
      "Rule catalog loaded",
    );
    return { catalog, persisted: true };
  } catch (error) {
    logger.warn(
      { catalogPath, reason: errorMessage(error) },
      "Rule catalog is malformed, installing defaults",
    );
    return await bootstrapCatalog(catalogPath, "malformed", logger);
  }
}

export async function saveRuleCatalog(
  catalogPath: string,
  catalog: RuleCatalog,
): Promise<void> {
  await fs.mkdir(path.dirname(catalogPath), { recursive: true });
  await fs.writeFile(
    catalogPath,
    serializeDocument(catalog, catalogPath),
    "utf8",
  );
}

export function defaultCatalog(): RuleCatalog {
  return new RuleCatalog(DEFAULT_RULES);
}

async function bootstrapCatalog(
  catalogPath: string,
  reason: BootstrapReason,
  logger: Logger,
): Promise<LoadedCatalog> {
  const catalog = defaultCatalog();
  try {
    await saveRuleCatalog(catalogPath, catalog);
    logger.info(
      { catalogPath, rules: catalog.size },
      "Default rule catalog persisted",
    );
    return { catalog, bootstrapped: reason, persisted: true };
  } catch (error) {
    logger.error(
      { catalogPath, reason: errorMessage(error) },
      "Failed to persist default rule catalog",
    );
    return { catalog, bootstrapped: reason, persisted: false };
  }
}

function isYamlPath(filePath: string): boolean {
  return /\.ya?ml$/i.test(filePath);
}

function parseDocument(raw: string, source: string): unknown {
  try {
    return isYamlPath(source) ? yaml.load(raw) : JSON.parse(raw);
  } catch (error) {
    throw new MalformedDocumentError(source, [errorMessage(error)], {
      cause: error,
    });
  }
}

function serializeDocument(catalog: RuleCatalog, target: string): string {
  const document = catalog.toDocument();
  if (isYamlPath(target)) {
    return yaml.dump(document, { lineWidth: 120, noRefs: true });
  }
  return `${JSON.stringify(document, null, 2)}\n`;
}
