import fs from "fs";
import path from "path";
import type { BatchMetrics } from "../answers/types.js";
import type { RunReport } from "../eval/runner.js";
import { logRunner } from "../logging.js";

export interface SavedReportPaths {
  detailed: string;
  accuracies: string;
  summary: string;
}

/** `2026-03-04T05:06:07.890Z` → `20260304_050607` */
export function fileTimestamp(iso: string): string {
  return iso.slice(0, 19).replace(/-/g, "").replace(/:/g, "").replace("T", "_");
}

export function completionPercentage(processed: number, total: number): number {
  return total > 0 ? (processed / total) * 100 : 0;
}

/** One line per metric: rates as percentages, mean SMAPE in SMAPE points. */
export function formatMetrics(metrics: BatchMetrics): string[] {
  const lines: string[] = [];
  for (const [metric, value] of Object.entries(metrics)) {
    if (typeof value !== "number") continue;
    if (metric === "mean_smape") lines.push(`${metric}: ${value.toFixed(2)}%`);
    else lines.push(`${metric}: ${(value * 100).toFixed(2)}%`);
  }
  return lines;
}

export function formatSummary(report: RunReport): string {
  const pct = completionPercentage(report.processed_questions, report.total_questions);
  const failed = report.outcomes.filter((o) => o.generated === null).length;
  const lines = [
    "Evaluation Results",
    "==================",
    "",
    `Run: ${report.run_id}`,
    `Model: ${report.model}`,
    `Processed ${report.processed_questions}/${report.total_questions} questions (${pct.toFixed(1)}% complete, ${report.stopped_reason})`,
    `Unanswered: ${failed}`,
    "",
    ...formatMetrics(report.metrics),
  ];
  return lines.join("\n") + "\n";
}

/**
 * Write the detailed outcomes, the metrics with run metadata, and a
 * plain-text summary into `dir`, each stamped with the run's finish time.
 */
export function saveReport(report: RunReport, dir: string): SavedReportPaths {
  fs.mkdirSync(dir, { recursive: true });
  const ts = fileTimestamp(report.finished_at);

  const paths: SavedReportPaths = {
    detailed: path.join(dir, `detailed_results_${ts}.json`),
    accuracies: path.join(dir, `accuracies_${ts}.json`),
    summary: path.join(dir, `summary_${ts}.txt`),
  };

  fs.writeFileSync(paths.detailed, JSON.stringify(report.outcomes, null, 2));
  fs.writeFileSync(
    paths.accuracies,
    JSON.stringify(
      {
        accuracies: report.metrics,
        metadata: {
          run_id: report.run_id,
          model: report.model,
          processed_questions: report.processed_questions,
          total_questions: report.total_questions,
          completion_percentage: completionPercentage(report.processed_questions, report.total_questions),
          stopped_reason: report.stopped_reason,
          timestamp: ts,
        },
      },
      null,
      2,
    ),
  );
  fs.writeFileSync(paths.summary, formatSummary(report));

  logRunner.info({ dir, ...paths }, "Results saved");
  return paths;
}
