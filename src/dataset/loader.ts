/**
 * FinQA-style dataset loader.
 *
 * Reads a JSON array of report records. Each record carries the narrative
 * text before and after a table, the table itself, and one question under
 * `qa` and/or up to two under `qa_0` / `qa_1`. Records are numbered in file
 * order as entry_0000, entry_0001, ...
 */

import { existsSync, readFileSync } from "node:fs";
import { z } from "zod";
import { logDataset } from "../logging.js";

const QaSchema = z.object({
  question: z.string(),
  answer: z.union([z.string(), z.number().transform(String)]),
});

const RecordSchema = z
  .object({
    id: z.string().optional(),
    pre_text: z.array(z.string()),
    post_text: z.array(z.string()),
    table: z.array(z.array(z.string())),
    qa: QaSchema.optional(),
    qa_0: QaSchema.optional(),
    qa_1: QaSchema.optional(),
  })
  .passthrough();

export type DatasetRecord = z.infer<typeof RecordSchema>;

export interface QaPair {
  question: string;
  answer: string;
}

export interface DatasetEntry {
  entryId: string;
  sourceId: string | null;
  preText: string[];
  postText: string[];
  table: string[][];
  qaPairs: QaPair[];
}

export function entryId(index: number): string {
  return `entry_${String(index).padStart(4, "0")}`;
}

/** Turn validated records into entries, collecting `qa`, `qa_0` and `qa_1`. */
export function toEntries(records: DatasetRecord[]): DatasetEntry[] {
  return records.map((record, idx) => {
    const qaPairs: QaPair[] = [];
    for (const qa of [record.qa, record.qa_0, record.qa_1]) {
      if (qa) qaPairs.push({ question: qa.question, answer: qa.answer });
    }
    return {
      entryId: entryId(idx),
      sourceId: record.id ?? null,
      preText: record.pre_text,
      postText: record.post_text,
      table: record.table,
      qaPairs,
    };
  });
}

/**
 * Validate parsed JSON as a list of records.
 * @throws Error naming the first invalid record's index
 */
export function parseDataset(data: unknown): DatasetEntry[] {
  if (!Array.isArray(data)) {
    throw new Error("Dataset must be a JSON array of records");
  }

  const records: DatasetRecord[] = [];
  data.forEach((item: unknown, idx: number) => {
    const result = RecordSchema.safeParse(item);
    if (!result.success) {
      const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
      throw new Error(`Invalid dataset record at index ${idx}: ${issues}`);
    }
    records.push(result.data);
  });
  return toEntries(records);
}

export interface LoadOptions {
  /** Keep only the first N entries (0 = all) */
  limit?: number;
}

/**
 * Load entries from a dataset file.
 * @throws Error when the file is missing, not JSON, or has an invalid record
 */
export function loadDataset(filePath: string, opts: LoadOptions = {}): DatasetEntry[] {
  if (!existsSync(filePath)) {
    throw new Error(`Data file not found at ${filePath}`);
  }

  let data: unknown;
  try {
    data = JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (e: unknown) {
    throw new Error(`Data file ${filePath} is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
  }

  const entries = parseDataset(data);
  const limited = opts.limit && opts.limit > 0 ? entries.slice(0, opts.limit) : entries;
  const questions = limited.reduce((n, e) => n + e.qaPairs.length, 0);
  logDataset.info({ path: filePath, entries: limited.length, questions }, "Dataset loaded");
  return limited;
}
