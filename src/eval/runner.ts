import { randomUUID } from "node:crypto";
import type { DatasetEntry } from "../dataset/loader.js";
import type { BatchMetrics, ComparisonResult } from "../answers/types.js";
import { evaluateBatchDetailed } from "../answers/comparator.js";
import { errorMessage } from "../errors.js";
import { logRunner } from "../logging.js";
import { buildQuestionPrompt, hashPrompt } from "./models/prompt.js";
import { processResponse } from "./models/response.js";
import type { AskModel } from "./models/types.js";
import type { RateLimiter } from "./rate-limiter.js";

export type StopReason = "completed" | "aborted" | "quota_exhausted";

export interface QuestionOutcome {
  entry_id: string;
  question_index: number;
  question: string;
  expected: string;
  raw_response: string;
  formula: string | null;
  value: number | null;
  generated: string | null;
  error: string | null;
  comparison: ComparisonResult | null;
  latency_ms: number;
  prompt_hash: string;
}

export interface RunReport {
  run_id: string;
  model: string;
  started_at: string;
  finished_at: string;
  total_questions: number;
  processed_questions: number;
  stopped_reason: StopReason;
  metrics: BatchMetrics;
  outcomes: QuestionOutcome[];
}

export interface RunOptions {
  ask: AskModel;
  limiter: RateLimiter;
  model: string;
  signal?: AbortSignal;
}

/**
 * Ask the model every question in `entries`, evaluate and format each answer,
 * then score the generated answers against the expected ones.
 *
 * A failure on one question (API error, bad JSON, bad formula) is recorded on
 * that question's outcome and the run continues. The run stops early when
 * `signal` aborts or the daily quota runs out; the report then covers what
 * was processed.
 */
export async function runBenchmark(entries: readonly DatasetEntry[], opts: RunOptions): Promise<RunReport> {
  const runId = randomUUID();
  const startedAt = new Date().toISOString();
  const total = entries.reduce((n, e) => n + e.qaPairs.length, 0);
  const outcomes: QuestionOutcome[] = [];
  let stoppedReason: StopReason = "completed";

  logRunner.info({ runId, entries: entries.length, questions: total, model: opts.model }, "Benchmark run starting");

  run: for (const entry of entries) {
    for (const [questionIndex, qa] of entry.qaPairs.entries()) {
      if (opts.signal?.aborted) {
        stoppedReason = "aborted";
        logRunner.warn({ runId, processed: outcomes.length }, "Run interrupted, stopping early");
        break run;
      }
      if (!(await opts.limiter.acquire())) {
        stoppedReason = "quota_exhausted";
        logRunner.warn({ runId, processed: outcomes.length, quota: opts.limiter.quota() }, "Daily request quota reached, stopping");
        break run;
      }

      const prompt = buildQuestionPrompt({
        preText: entry.preText,
        postText: entry.postText,
        table: entry.table,
        question: qa.question,
      });
      const promptHash = hashPrompt(prompt);
      const answer = await opts.ask(prompt, promptHash);

      const outcome: QuestionOutcome = {
        entry_id: entry.entryId,
        question_index: questionIndex,
        question: qa.question,
        expected: qa.answer,
        raw_response: answer.raw_response,
        formula: null,
        value: null,
        generated: null,
        error: answer.error,
        comparison: null,
        latency_ms: answer.latency_ms,
        prompt_hash: promptHash,
      };

      if (answer.error === null) {
        try {
          const processed = processResponse(answer.raw_response);
          outcome.formula = processed.formula;
          outcome.value = processed.value;
          outcome.generated = processed.formatted;
        } catch (e: unknown) {
          outcome.error = errorMessage(e);
          logRunner.warn({ entryId: entry.entryId, questionIndex, err: outcome.error }, "Error processing answer");
        }
      } else {
        logRunner.warn({ entryId: entry.entryId, questionIndex, err: answer.error }, "Model call failed");
      }

      outcomes.push(outcome);
    }
    logRunner.info({ entryId: entry.entryId, processed: outcomes.length, total }, "Entry processed");
  }

  // Only questions that produced an answer are scored
  const scored = outcomes.filter((o) => o.generated !== null);
  const batch = evaluateBatchDetailed(scored.map((o) => [o.generated ?? "", o.expected] as const));
  scored.forEach((o, i) => {
    o.comparison = batch.results[i];
    const err = batch.errors[i];
    if (err !== null) {
      o.error = err;
      logRunner.debug({ entryId: o.entry_id, questionIndex: o.question_index, err }, "Answer comparison failed");
    }
  });

  const report: RunReport = {
    run_id: runId,
    model: opts.model,
    started_at: startedAt,
    finished_at: new Date().toISOString(),
    total_questions: total,
    processed_questions: outcomes.length,
    stopped_reason: stoppedReason,
    metrics: batch.metrics,
    outcomes,
  };

  logRunner.info({ runId, processed: outcomes.length, total, stoppedReason, metrics: batch.metrics }, "Benchmark run finished");
  return report;
}
