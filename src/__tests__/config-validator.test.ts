import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { validateConfig } from "../config-validator.js";
import type { BenchConfig } from "../config.js";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

let tempDir: string;
let datasetPath: string;

beforeAll(() => {
  tempDir = mkdtempSync(join(tmpdir(), "validator-test-"));
  datasetPath = join(tempDir, "train.json");
  writeFileSync(datasetPath, "[]");
});

afterAll(() => {
  rmSync(tempDir, { recursive: true, force: true });
});

function makeConfig(overrides: {
  gemini?: Partial<BenchConfig["gemini"]>;
  rateLimit?: Partial<BenchConfig["rateLimit"]>;
  dataset?: Partial<BenchConfig["dataset"]>;
  rest?: Partial<BenchConfig["rest"]>;
} = {}): BenchConfig {
  return {
    gemini: {
      apiKey: "test-key",
      model: "gemini-2.0-flash",
      temperature: 0,
      topP: 0.95,
      topK: 40,
      maxOutputTokens: 8192,
      timeoutMs: 30000,
      retries: 2,
      retryDelayMs: 500,
      ...overrides.gemini,
    },
    rateLimit: { requestsPerMinute: 10, requestsPerDay: 1500, ...overrides.rateLimit },
    dataset: { path: datasetPath, limit: 0, ...overrides.dataset },
    results: { dir: "results", dbPath: ":memory:" },
    rest: { port: 3000, apiKey: "this-is-a-secure-api-key-with-16-chars", ...overrides.rest },
  };
}

describe("validateConfig", () => {
  it("should pass validation for a valid config", () => {
    const result = validateConfig(makeConfig());
    expect(result.errors).toEqual([]);
    expect(result.warnings).toEqual([]);
  });

  it("should return error for invalid REST port (too low)", () => {
    const result = validateConfig(makeConfig({ rest: { port: 0 } }));
    expect(result.errors).toContain("REST port must be between 1 and 65535, got 0");
  });

  it("should return error for invalid REST port (too high)", () => {
    const result = validateConfig(makeConfig({ rest: { port: 65536 } }));
    expect(result.errors).toContain("REST port must be between 1 and 65535, got 65536");
  });

  it("should validate boundary values for ports", () => {
    expect(validateConfig(makeConfig({ rest: { port: 1 } })).errors).toEqual([]);
    expect(validateConfig(makeConfig({ rest: { port: 65535 } })).errors).toEqual([]);
  });

  it("should return warning for short API key", () => {
    const result = validateConfig(makeConfig({ rest: { apiKey: "short" } }));
    expect(result.errors).toEqual([]);
    expect(result.warnings).toContain("REST API key is only 5 characters (recommended: at least 16)");
  });

  it("should not warn when the REST API key is empty", () => {
    expect(validateConfig(makeConfig({ rest: { apiKey: "" } })).warnings).toEqual([]);
  });

  it("should return errors for invalid Gemini settings", () => {
    const result = validateConfig(
      makeConfig({ gemini: { timeoutMs: 0, retries: -1, retryDelayMs: -5, temperature: 2.5, topP: NaN } }),
    );
    expect(result.errors).toEqual([
      "gemini.timeoutMs must be positive, got 0",
      "gemini.retries must be a non-negative integer, got -1",
      "gemini.retryDelayMs must be non-negative, got -5",
      "gemini.temperature must be between 0 and 2, got 2.5",
      "gemini.topP must be between 0 and 1, got NaN",
    ]);
  });

  it("should return error for non-positive rate limits", () => {
    const result = validateConfig(makeConfig({ rateLimit: { requestsPerMinute: 0 } }));
    expect(result.errors).toEqual(["rateLimit.requestsPerMinute must be positive, got 0"]);
  });

  it("should return error when the per-minute limit exceeds the daily limit", () => {
    const result = validateConfig(makeConfig({ rateLimit: { requestsPerMinute: 20, requestsPerDay: 10 } }));
    expect(result.errors).toEqual(["rateLimit.requestsPerMinute (20) must be <= rateLimit.requestsPerDay (10)"]);
  });

  it("should return error for a negative dataset limit", () => {
    const result = validateConfig(makeConfig({ dataset: { limit: -1 } }));
    expect(result.errors).toEqual(["dataset.limit must be a non-negative integer, got -1"]);
  });

  it("should return warning for a missing dataset file", () => {
    const missing = join(tempDir, "missing.json");
    const result = validateConfig(makeConfig({ dataset: { path: missing } }));
    expect(result.warnings).toEqual([`Dataset file does not exist: ${missing}`]);
  });

  it("should warn when no Gemini API key is configured", () => {
    const result = validateConfig(makeConfig({ gemini: { apiKey: "" } }));
    expect(result.errors).toEqual([]);
    expect(result.warnings).toEqual(["No Gemini API key configured (GOOGLE_AI_API_KEY); benchmark runs will fail"]);
  });
});
