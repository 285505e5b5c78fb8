import { config } from "./config.js";
import { loadDataset } from "./dataset/loader.js";
import { RateLimiter } from "./eval/rate-limiter.js";
import { runBenchmark, type RunReport } from "./eval/runner.js";
import { askGemini } from "./eval/models/providers/gemini.js";
import type { AskModel } from "./eval/models/types.js";
import { getDb, insertRun, saveRunOutcomes } from "./db/database.js";
import { saveReport, type SavedReportPaths } from "./report/writer.js";
import { logRunner } from "./logging.js";

export interface BenchJobOptions {
  datasetPath?: string;
  limit?: number;
  resultsDir?: string;
  signal?: AbortSignal;
  ask?: AskModel;
}

export interface BenchJobResult {
  report: RunReport;
  files: SavedReportPaths;
}

/**
 * Full benchmark job: load the dataset, run every question against Gemini
 * under a fresh rate limiter, then persist the run to SQLite and write the
 * report files.
 */
export async function runBenchJob(opts: BenchJobOptions = {}): Promise<BenchJobResult> {
  const datasetPath = opts.datasetPath ?? config.dataset.path;
  const entries = loadDataset(datasetPath, { limit: opts.limit ?? config.dataset.limit });

  const limiter = new RateLimiter({
    requestsPerMinute: config.rateLimit.requestsPerMinute,
    requestsPerDay: config.rateLimit.requestsPerDay,
  });
  const total = entries.reduce((n, e) => n + e.qaPairs.length, 0);
  const quota = limiter.quota();
  if (total > quota.daily_remaining) {
    logRunner.warn({ total, dailyRemaining: quota.daily_remaining }, "Question count exceeds the daily quota; the run will be partial");
  }

  const report = await runBenchmark(entries, {
    ask: opts.ask ?? askGemini,
    limiter,
    model: config.gemini.model,
    signal: opts.signal,
  });

  const db = getDb();
  insertRun(db, {
    id: report.run_id,
    model: report.model,
    started_at: report.started_at,
    total_questions: report.total_questions,
  });
  saveRunOutcomes(db, report);

  const files = saveReport(report, opts.resultsDir ?? config.results.dir);
  return { report, files };
}
