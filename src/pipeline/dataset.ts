import fs from "node:fs/promises";
import { EvidenceNotFoundError, MalformedDocumentError, isNodeError } from "../errors.js";

export interface DatasetRow {
  readonly feature_id: string;
  readonly repo_path?: string;
}

export async function loadDataset(datasetPath: string): Promise<DatasetRow[]> {
  let raw: string;
  try {
    raw = await fs.readFile(datasetPath, "utf8");
  } catch (error) {
    if (isNodeError(error, "ENOENT")) {
      throw new EvidenceNotFoundError(datasetPath);
    }
    throw error;
  }
  return parseDataset(raw, datasetPath);
}

/**
 * Parse a CSV dataset with a header row. Only `feature_id` (required) and
 * `repo_path` are read; blank lines are skipped.
 */
export function parseDataset(raw: string, source: string): DatasetRow[] {
  const records = parseCsv(raw).filter((record) =>
    record.some((cell) => cell.trim() !== ""),
  );
  const [header, ...rows] = records;
  if (!header) {
    throw new MalformedDocumentError(source, ["dataset is empty"]);
  }

  const columns = header.map((name) => name.trim());
  const featureColumn = columns.indexOf("feature_id");
  if (featureColumn < 0) {
    throw new MalformedDocumentError(source, [
      "dataset must contain a feature_id column",
    ]);
  }
  const repoColumn = columns.indexOf("repo_path");

  return rows.map((row) => {
    const featureId = (row[featureColumn] ?? "").trim();
    const repoPath = repoColumn >= 0 ? (row[repoColumn] ?? "").trim() : "";
    return repoPath
      ? { feature_id: featureId, repo_path: repoPath }
      : { feature_id: featureId };
  });
}

/**
 * RFC 4180 reader: quoted fields may contain commas, doubled quotes and
 * line breaks.
 */
export function parseCsv(raw: string): string[][] {
  const records: string[][] = [];
  let record: string[] = [];
  let field = "";
  let quoted = false;

  for (let index = 0; index < raw.length; index += 1) {
    const char = raw[index];
    if (quoted) {
      if (char === '"') {
        if (raw[index + 1] === '"') {
          field += '"';
          index += 1;
        } else {
          quoted = false;
        }
      } else {
        field += char;
      }
      continue;
    }

    switch (char) {
      case '"':
        quoted = true;
        break;
      case ",":
        record.push(field);
        field = "";
        break;
      case "\r":
        break;
      case "\n":
        record.push(field);
        records.push(record);
        record = [];
        field = "";
        break;
      default:
        field += char;
        break;
    }
  }

  if (field !== "" || record.length > 0) {
    record.push(field);
    records.push(record);
  }
  return records;
}
