import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { MalformedDocumentError, errorMessage, isNodeError } from "../errors.js";
import { formatIssue } from "../evidence/evidence-loader.js";
import type { Logger } from "../logging/logger.js";
import { silentLogger } from "../logging/logger.js";
import { DEFAULT_SNIPPETS, type RegulationSnippet } from "./snippets.js";

const SnippetSchema = z.object({
  regulation_id: z.string().min(1),
  title: z.string().min(1),
  content: z.string(),
  source_url: z.string().optional(),
  jurisdiction: z.string().optional(),
});

const SnippetDocumentSchema = z.union([
  z.array(SnippetSchema),
  z.object({
    version: z.string().optional(),
    snippets: z.array(SnippetSchema),
  }),
]);

export interface LoadSnippetsOptions {
  readonly logger?: Logger;
}

/**
 * Load regulation snippets. Accepts a bare list or `{ snippets: [...] }`.
 * A missing or malformed document is replaced by the defaults and written
 * back, the same contract as the rule catalog.
 */
export async function loadRegulationSnippets(
  snippetsPath: string,
  options: LoadSnippetsOptions = {},
): Promise<readonly RegulationSnippet[]> {
  const logger = options.logger ?? silentLogger();
  let raw: string;
  try {
    raw = await fs.readFile(snippetsPath, "utf8");
  } catch (error) {
    if (!isNodeError(error, "ENOENT")) {
      throw error;
    }
    logger.info({ snippetsPath }, "Regulation snippets not found, installing defaults");
    return await bootstrapSnippets(snippetsPath, logger);
  }

  try {
    return parseSnippetDocument(raw, snippetsPath);
  } catch (error) {
    logger.warn(
      { snippetsPath, reason: errorMessage(error) },
      "Regulation snippets are malformed, installing defaults",
    );
    return await bootstrapSnippets(snippetsPath, logger);
  }
}

export function parseSnippetDocument(
  raw: string,
  source: string,
): RegulationSnippet[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new MalformedDocumentError(source, [errorMessage(error)], {
      cause: error,
    });
  }
  const result = SnippetDocumentSchema.safeParse(parsed);
  if (!result.success) {
    throw new MalformedDocumentError(
      source,
      result.error.issues.map((issue) => formatIssue(issue)),
    );
  }
  return Array.isArray(result.data) ? result.data : result.data.snippets;
}

export async function saveRegulationSnippets(
  snippetsPath: string,
  snippets: readonly RegulationSnippet[],
): Promise<void> {
  await fs.mkdir(path.dirname(snippetsPath), { recursive: true });
  await fs.writeFile(
    snippetsPath,
    `${JSON.stringify({ version: "1.0", snippets }, null, 2)}\n`,
    "utf8",
  );
}

async function bootstrapSnippets(
  snippetsPath: string,
  logger: Logger,
): Promise<readonly RegulationSnippet[]> {
  try {
    await saveRegulationSnippets(snippetsPath, DEFAULT_SNIPPETS);
  } catch (error) {
    logger.error(
      { snippetsPath, reason: errorMessage(error) },
      "Failed to persist default regulation snippets",
    );
  }
  return DEFAULT_SNIPPETS;
}
