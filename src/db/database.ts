import Database, { type Database as DatabaseType } from "better-sqlite3";
import fs from "fs";
import path from "path";
import { config } from "../config.js";
import { logDb } from "../logging.js";
import type { BatchMetrics, ComparisonResult } from "../answers/types.js";
import type { QuestionOutcome, RunReport, StopReason } from "../eval/runner.js";
import { RESULTS_SCHEMA_SQL } from "./schema.js";

export type { DatabaseType };

/**
 * Open (or create) a results database and apply the schema.
 * Pass ":memory:" for a throwaway database.
 */
export function openDatabase(dbPath: string): DatabaseType {
  if (dbPath !== ":memory:") {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }
  const db = new Database(dbPath);

  // WAL mode — prevents event loop blocking during concurrent reads/writes
  if (dbPath !== ":memory:") db.pragma("journal_mode = WAL");
  db.pragma("synchronous = NORMAL");
  db.pragma("foreign_keys = ON");

  db.exec(RESULTS_SCHEMA_SQL);
  return db;
}

let shared: DatabaseType | null = null;

/** The process-wide database at config.results.dbPath, opened on first use. */
export function getDb(): DatabaseType {
  if (!shared) {
    shared = openDatabase(config.results.dbPath);
    logDb.info({ path: config.results.dbPath }, "Results database opened");
  }
  return shared;
}

export function closeDb(): void {
  if (shared) {
    shared.close();
    shared = null;
  }
}

// ── Runs ────────────────────────────────────────────────────────────────

export interface RunRow {
  id: string;
  model: string;
  started_at: string;
  finished_at: string | null;
  total_questions: number;
  processed_questions: number;
  stopped_reason: StopReason | null;
  metrics: BatchMetrics | null;
}

interface RawRunRow {
  id: string;
  model: string;
  started_at: string;
  finished_at: string | null;
  total_questions: number;
  processed_questions: number;
  stopped_reason: StopReason | null;
  metrics: string | null;
}

function toRunRow(row: RawRunRow): RunRow {
  const metrics: BatchMetrics | null = row.metrics ? JSON.parse(row.metrics) : null;
  return { ...row, metrics };
}

export function insertRun(
  db: DatabaseType,
  run: { id: string; model: string; started_at: string; total_questions: number },
): void {
  db.prepare(
    `INSERT INTO runs (id, model, started_at, total_questions) VALUES (@id, @model, @started_at, @total_questions)`,
  ).run(run);
}

export function finishRun(db: DatabaseType, report: RunReport): void {
  db.prepare(
    `UPDATE runs
        SET finished_at = @finished_at,
            processed_questions = @processed_questions,
            stopped_reason = @stopped_reason,
            metrics = @metrics
      WHERE id = @id`,
  ).run({
    id: report.run_id,
    finished_at: report.finished_at,
    processed_questions: report.processed_questions,
    stopped_reason: report.stopped_reason,
    metrics: JSON.stringify(report.metrics),
  });
}

export function getRun(db: DatabaseType, id: string): RunRow | null {
  const row = db.prepare(`SELECT * FROM runs WHERE id = ?`).get(id) as RawRunRow | undefined;
  return row ? toRunRow(row) : null;
}

export function listRuns(db: DatabaseType, limit: number = 20): RunRow[] {
  const rows = db.prepare(`SELECT * FROM runs ORDER BY started_at DESC LIMIT ?`).all(limit) as RawRunRow[];
  return rows.map(toRunRow);
}

// ── Question outcomes ───────────────────────────────────────────────────

interface RawOutcomeRow {
  entry_id: string;
  question_index: number;
  question: string;
  expected: string;
  raw_response: string;
  formula: string | null;
  value: number | null;
  generated: string | null;
  error: string | null;
  comparison: string | null;
  latency_ms: number;
  prompt_hash: string;
}

export function insertOutcome(db: DatabaseType, runId: string, outcome: QuestionOutcome): void {
  db.prepare(
    `INSERT OR REPLACE INTO question_outcomes
       (run_id, entry_id, question_index, question, expected, raw_response, formula, value, generated, error, comparison, latency_ms, prompt_hash)
     VALUES
       (@run_id, @entry_id, @question_index, @question, @expected, @raw_response, @formula, @value, @generated, @error, @comparison, @latency_ms, @prompt_hash)`,
  ).run({
    ...outcome,
    run_id: runId,
    // SQLite has no Infinity/NaN REALs worth keeping
    value: outcome.value !== null && Number.isFinite(outcome.value) ? outcome.value : null,
    comparison: outcome.comparison ? JSON.stringify(outcome.comparison) : null,
  });
}

/** Persist the scored outcomes of a finished run in one transaction. */
export function saveRunOutcomes(db: DatabaseType, report: RunReport): void {
  const tx = db.transaction((outcomes: QuestionOutcome[]) => {
    for (const outcome of outcomes) insertOutcome(db, report.run_id, outcome);
    finishRun(db, report);
  });
  tx(report.outcomes);
}

export function getOutcomesForRun(db: DatabaseType, runId: string): QuestionOutcome[] {
  const rows = db
    .prepare(
      `SELECT entry_id, question_index, question, expected, raw_response, formula, value, generated, error, comparison, latency_ms, prompt_hash
         FROM question_outcomes
        WHERE run_id = ?
        ORDER BY entry_id, question_index`,
    )
    .all(runId) as RawOutcomeRow[];

  return rows.map((row) => {
    const comparison: ComparisonResult | null = row.comparison ? JSON.parse(row.comparison) : null;
    return { ...row, comparison };
  });
}
