import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { completionPercentage, fileTimestamp, formatMetrics, formatSummary, saveReport } from "../writer.js";
import type { RunReport } from "../../eval/runner.js";

const report: RunReport = {
  run_id: "run-1",
  model: "gemini-test",
  started_at: "2026-03-04T05:00:00.000Z",
  finished_at: "2026-03-04T05:06:07.890Z",
  total_questions: 4,
  processed_questions: 2,
  stopped_reason: "quota_exhausted",
  metrics: { prefix_match_rate: 1, suffix_match_rate: 0.5, decimal_places_match_rate: 0.5, mean_smape: 3.25 },
  outcomes: [
    {
      entry_id: "entry_0000",
      question_index: 0,
      question: "q",
      expected: "6.67%",
      raw_response: "{}",
      formula: "divide(320, 4800)",
      value: 320 / 4800,
      generated: "6.67%",
      error: null,
      comparison: { smape: 0, prefix_match: true, suffix_match: true, decimal_places_match: true },
      latency_ms: 10,
      prompt_hash: "h",
    },
    {
      entry_id: "entry_0000",
      question_index: 1,
      question: "q2",
      expected: "5",
      raw_response: "",
      formula: null,
      value: null,
      generated: null,
      error: "boom",
      comparison: null,
      latency_ms: 5,
      prompt_hash: "h2",
    },
  ],
};

describe("fileTimestamp", () => {
  it("compacts an ISO timestamp", () => {
    expect(fileTimestamp("2026-03-04T05:06:07.890Z")).toBe("20260304_050607");
  });
});

describe("completionPercentage", () => {
  it("is zero for an empty run", () => {
    expect(completionPercentage(0, 0)).toBe(0);
    expect(completionPercentage(1, 4)).toBe(25);
  });
});

describe("formatMetrics", () => {
  it("prints rates as percentages and SMAPE in points", () => {
    expect(formatMetrics(report.metrics)).toEqual([
      "prefix_match_rate: 100.00%",
      "suffix_match_rate: 50.00%",
      "decimal_places_match_rate: 50.00%",
      "mean_smape: 3.25%",
    ]);
  });

  it("prints nothing for empty metrics", () => {
    expect(formatMetrics({})).toEqual([]);
  });
});

describe("formatSummary", () => {
  it("summarizes the run", () => {
    expect(formatSummary(report)).toBe(
      [
        "Evaluation Results",
        "==================",
        "",
        "Run: run-1",
        "Model: gemini-test",
        "Processed 2/4 questions (50.0% complete, quota_exhausted)",
        "Unanswered: 1",
        "",
        "prefix_match_rate: 100.00%",
        "suffix_match_rate: 50.00%",
        "decimal_places_match_rate: 50.00%",
        "mean_smape: 3.25%",
      ].join("\n") + "\n",
    );
  });
});

describe("saveReport", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "report-test-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("writes detailed results, accuracies and summary", () => {
    const out = join(dir, "results");
    const paths = saveReport(report, out);

    expect(paths).toEqual({
      detailed: join(out, "detailed_results_20260304_050607.json"),
      accuracies: join(out, "accuracies_20260304_050607.json"),
      summary: join(out, "summary_20260304_050607.txt"),
    });

    expect(JSON.parse(readFileSync(paths.detailed, "utf-8"))).toEqual(report.outcomes);
    expect(JSON.parse(readFileSync(paths.accuracies, "utf-8"))).toEqual({
      accuracies: report.metrics,
      metadata: {
        run_id: "run-1",
        model: "gemini-test",
        processed_questions: 2,
        total_questions: 4,
        completion_percentage: 50,
        stopped_reason: "quota_exhausted",
        timestamp: "20260304_050607",
      },
    });
    expect(readFileSync(paths.summary, "utf-8")).toBe(formatSummary(report));
  });
});
