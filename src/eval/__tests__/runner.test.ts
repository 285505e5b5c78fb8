import { describe, it, expect, vi, type Mock } from "vitest";
import { runBenchmark } from "../runner.js";
import { RateLimiter, type Clock } from "../rate-limiter.js";
import { buildQuestionPrompt, hashPrompt } from "../models/prompt.js";
import type { AskModel, ModelAnswer } from "../models/types.js";
import type { DatasetEntry } from "../../dataset/loader.js";

const clock: Clock = {
  now: () => Date.UTC(2026, 2, 4, 12, 0, 0),
  sleep: async () => {},
};

function limiter(requestsPerDay = 100): RateLimiter {
  return new RateLimiter({ requestsPerMinute: 100, requestsPerDay, clock });
}

function answer(raw: string, error: string | null = null): ModelAnswer {
  return {
    model_id: "gemini",
    raw_response: raw,
    latency_ms: 12,
    error,
    model_version: "gemini-test",
    prompt_hash: "",
    token_count: 0,
    timestamp: "2026-03-04T12:00:00.000Z",
  };
}

const percentResponse = JSON.stringify({
  formula: "divide(subtract(5120, 4800), 4800)",
  formatting_instructions: { prefix: "", suffix: "%", rounding: 2, multiplier: 100 },
});

const entries: DatasetEntry[] = [
  {
    entryId: "entry_0000",
    sourceId: "ACME/2019/page_12.pdf",
    preText: ["Net revenue grew."],
    postText: [],
    table: [["", "2019", "2018"], ["net revenue", "5120", "4800"]],
    qaPairs: [
      { question: "what was the percentage change in net revenue?", answer: "6.67%" },
      { question: "what was net revenue in 2019?", answer: "$5120" },
    ],
  },
  {
    entryId: "entry_0001",
    sourceId: null,
    preText: [],
    postText: [],
    table: [],
    qaPairs: [{ question: "what was the margin?", answer: "12%" }],
  },
];

function scripted(...answers: ModelAnswer[]): Mock<AskModel> {
  const ask = vi.fn<AskModel>();
  for (const a of answers) ask.mockResolvedValueOnce(a);
  return ask;
}

describe("runBenchmark", () => {
  it("records every question and scores only answered ones", async () => {
    const ask = scripted(answer(percentResponse), answer("", "boom"), answer("not json"));

    const report = await runBenchmark(entries, { ask, limiter: limiter(), model: "gemini-test" });

    expect(report.total_questions).toBe(3);
    expect(report.processed_questions).toBe(3);
    expect(report.stopped_reason).toBe("completed");
    expect(report.model).toBe("gemini-test");

    const [first, second, third] = report.outcomes;
    expect(first).toMatchObject({
      entry_id: "entry_0000",
      question_index: 0,
      expected: "6.67%",
      formula: "divide(subtract(5120, 4800), 4800)",
      generated: "6.67%",
      error: null,
      comparison: { smape: 0, prefix_match: true, suffix_match: true, decimal_places_match: true },
      latency_ms: 12,
    });
    expect(second).toMatchObject({ entry_id: "entry_0000", question_index: 1, generated: null, error: "boom", comparison: null });
    expect(third.entry_id).toBe("entry_0001");
    expect(third.generated).toBeNull();
    expect(third.error).toMatch(/^Invalid JSON format in model response: /);

    expect(report.metrics).toEqual({
      prefix_match_rate: 1,
      suffix_match_rate: 1,
      decimal_places_match_rate: 1,
      mean_smape: 0,
    });
  });

  it("sends each question with its entry's context and prompt hash", async () => {
    const ask = scripted(answer(percentResponse), answer(percentResponse), answer(percentResponse));
    const report = await runBenchmark(entries, { ask, limiter: limiter(), model: "gemini-test" });

    const prompt = buildQuestionPrompt({
      preText: entries[0].preText,
      postText: entries[0].postText,
      table: entries[0].table,
      question: "what was net revenue in 2019?",
    });
    expect(ask).toHaveBeenNthCalledWith(2, prompt, hashPrompt(prompt));
    expect(report.outcomes[1].prompt_hash).toBe(hashPrompt(prompt));
  });

  it("records a comparison error when the expected answer cannot be parsed", async () => {
    const single: DatasetEntry[] = [{ ...entries[1], qaPairs: [{ question: "q", answer: "n/a" }] }];
    const report = await runBenchmark(single, { ask: scripted(answer(percentResponse)), limiter: limiter(), model: "m" });

    expect(report.outcomes[0].generated).toBe("6.67%");
    expect(report.outcomes[0].comparison).toBeNull();
    expect(report.outcomes[0].error).toBe('Error comparing answers: expected answer "n/a" has no parseable number');
    expect(report.metrics).toEqual({ prefix_match_rate: 0, suffix_match_rate: 0, decimal_places_match_rate: 0 });
  });

  it("stops when the signal aborts", async () => {
    const controller = new AbortController();
    const ask = vi.fn<AskModel>(async () => {
      controller.abort();
      return answer(percentResponse);
    });

    const report = await runBenchmark(entries, { ask, limiter: limiter(), model: "m", signal: controller.signal });

    expect(report.stopped_reason).toBe("aborted");
    expect(report.processed_questions).toBe(1);
    expect(ask).toHaveBeenCalledTimes(1);
  });

  it("stops when the daily quota runs out", async () => {
    const ask = scripted(answer(percentResponse), answer(percentResponse), answer(percentResponse));
    const report = await runBenchmark(entries, { ask, limiter: limiter(2), model: "m" });

    expect(report.stopped_reason).toBe("quota_exhausted");
    expect(report.processed_questions).toBe(2);
    expect(report.total_questions).toBe(3);
  });

  it("returns empty metrics for an empty dataset", async () => {
    const report = await runBenchmark([], { ask: vi.fn<AskModel>(), limiter: limiter(), model: "m" });
    expect(report.outcomes).toEqual([]);
    expect(report.metrics).toEqual({});
    expect(report.stopped_reason).toBe("completed");
  });
});
