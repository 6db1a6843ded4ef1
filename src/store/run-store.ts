import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { MalformedDocumentError, errorMessage } from "../errors.js";
import { formatIssue } from "../evidence/evidence-loader.js";

export interface RunSummary {
  readonly dataset: string;
  readonly total_features: number;
  readonly processed_count: number;
  readonly error_count: number;
  readonly csv_output?: string;
  readonly report_output?: string;
}

const RunIndexEntrySchema = z.object({
  id: z.string().min(1),
  created: z.string(),
  summary: z.string(),
  error_count: z.number().int().nonnegative(),
});

const RunIndexSchema = z.object({
  latest: z.string().optional(),
  runs: z.array(RunIndexEntrySchema),
});

export type RunIndexEntry = z.infer<typeof RunIndexEntrySchema>;
export type RunIndex = z.infer<typeof RunIndexSchema>;

export interface RunWriteOptions {
  readonly now?: Date;
}

const RUNS_DIR = "runs";
const INDEX_FILE = "index.json";

/**
 * @throws {MalformedDocumentError} when the index exists but is not a valid run index
 */
export async function loadRunIndex(artifactsDir: string): Promise<RunIndex> {
  const indexPath = path.join(artifactsDir, RUNS_DIR, INDEX_FILE);
  let raw: string;
  try {
    raw = await fs.readFile(indexPath, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return { runs: [] };
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new MalformedDocumentError(indexPath, [errorMessage(error)], {
      cause: error,
    });
  }
  const result = RunIndexSchema.safeParse(parsed);
  if (!result.success) {
    throw new MalformedDocumentError(
      indexPath,
      result.error.issues.map((issue) => formatIssue(issue)),
    );
  }
  return result.data;
}

/**
 * Persist a pipeline summary under `runs/` and record it in the run index,
 * newest first.
 */
export async function writeRunSummary(
  artifactsDir: string,
  summary: RunSummary,
  options: RunWriteOptions = {},
): Promise<RunIndexEntry> {
  const runsDir = path.join(artifactsDir, RUNS_DIR);
  await fs.mkdir(runsDir, { recursive: true });
  const index = await loadRunIndex(artifactsDir);
  const created = formatTimestamp(options.now ?? new Date());
  const id = uniqueId(
    created,
    index.runs.map((run) => run.id),
  );
  const summaryFile = `${id}.json`;
  await fs.writeFile(
    path.join(runsDir, summaryFile),
    JSON.stringify(summary, null, 2),
    "utf8",
  );

  const entry: RunIndexEntry = {
    id,
    created,
    summary: path.posix.join(RUNS_DIR, summaryFile),
    error_count: summary.error_count,
  };
  const runs = [...index.runs, entry].sort(compareRunEntries);
  await fs.writeFile(
    path.join(runsDir, INDEX_FILE),
    JSON.stringify({ latest: runs[0]?.id, runs }, null, 2),
    "utf8",
  );
  return entry;
}

function formatTimestamp(date: Date): string {
  return date
    .toISOString()
    .replace(/\.\d{3}Z$/, "Z")
    .replace(/:/g, "");
}

function uniqueId(base: string, existing: readonly string[]): string {
  if (!existing.includes(base)) {
    return base;
  }
  let counter = 1;
  let candidate = `${base}-${counter}`;
  while (existing.includes(candidate)) {
    counter += 1;
    candidate = `${base}-${counter}`;
  }
  return candidate;
}

function compareRunEntries(a: RunIndexEntry, b: RunIndexEntry): number {
  if (a.created !== b.created) {
    return a.created > b.created ? -1 : 1;
  }
  return a.id.localeCompare(b.id);
}
