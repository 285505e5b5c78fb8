import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";

// Keep a developer's .env out of the defaults
vi.mock("dotenv", () => ({ default: { config: vi.fn() } }));

const ENV_KEYS = [
  "GOOGLE_AI_API_KEY",
  "GEMINI_API_KEY",
  "GOOGLE_API_KEY",
  "GEMINI_MODEL",
  "MODEL_TEMPERATURE",
  "MODEL_TOP_P",
  "MODEL_TOP_K",
  "MODEL_MAX_OUTPUT_TOKENS",
  "MODEL_TIMEOUT_MS",
  "MODEL_RETRIES",
  "MODEL_RETRY_DELAY_MS",
  "RATE_LIMIT_RPM",
  "RATE_LIMIT_RPD",
  "DATASET_PATH",
  "DATASET_LIMIT",
  "RESULTS_DIR",
  "DB_PATH",
  "REST_PORT",
  "REST_API_KEY",
];

const clearEnv = () => {
  for (const key of ENV_KEYS) {
    delete process.env[key];
  }
};

const loadConfig = async () => {
  const module = await import("../config.js");
  return module.config;
};

describe("config", () => {
  beforeEach(() => {
    vi.resetModules();
    vi.unstubAllEnvs();
    clearEnv();
  });

  afterEach(() => {
    vi.resetModules();
    vi.unstubAllEnvs();
    clearEnv();
  });

  it("applies defaults when nothing is set", async () => {
    const cfg = await loadConfig();
    expect(cfg.gemini).toEqual({
      apiKey: "",
      model: "gemini-2.0-flash",
      temperature: 0,
      topP: 0.95,
      topK: 40,
      maxOutputTokens: 8192,
      timeoutMs: 30000,
      retries: 2,
      retryDelayMs: 500,
    });
    expect(cfg.rateLimit).toEqual({ requestsPerMinute: 10, requestsPerDay: 1500 });
    expect(cfg.dataset).toEqual({ path: "data/train.json", limit: 0 });
    expect(cfg.results).toEqual({ dir: "results", dbPath: "data/bench.db" });
    expect(cfg.rest).toEqual({ port: 3000, apiKey: "" });
  });

  it("prefers GOOGLE_AI_API_KEY over the fallback key names", async () => {
    vi.stubEnv("GOOGLE_API_KEY", "fallback-key");
    vi.stubEnv("GOOGLE_AI_API_KEY", "test-key");
    const cfg = await loadConfig();
    expect(cfg.gemini.apiKey).toBe("test-key");
  });

  it("falls back to GEMINI_API_KEY", async () => {
    vi.stubEnv("GEMINI_API_KEY", "gemini-key");
    const cfg = await loadConfig();
    expect(cfg.gemini.apiKey).toBe("gemini-key");
  });

  it("reads numeric overrides", async () => {
    vi.stubEnv("RATE_LIMIT_RPM", "15");
    vi.stubEnv("RATE_LIMIT_RPD", "200");
    vi.stubEnv("MODEL_TEMPERATURE", "0.2");
    vi.stubEnv("DATASET_LIMIT", "5");
    vi.stubEnv("REST_PORT", "8080");
    const cfg = await loadConfig();
    expect(cfg.rateLimit).toEqual({ requestsPerMinute: 15, requestsPerDay: 200 });
    expect(cfg.gemini.temperature).toBe(0.2);
    expect(cfg.dataset.limit).toBe(5);
    expect(cfg.rest.port).toBe(8080);
  });

  it("reads path overrides", async () => {
    vi.stubEnv("DATASET_PATH", "/tmp/finqa.json");
    vi.stubEnv("DB_PATH", ":memory:");
    vi.stubEnv("RESULTS_DIR", "/tmp/results");
    const cfg = await loadConfig();
    expect(cfg.dataset.path).toBe("/tmp/finqa.json");
    expect(cfg.results).toEqual({ dir: "/tmp/results", dbPath: ":memory:" });
  });
});
