import dotenv from "dotenv";

dotenv.config();

export const config = {
  gemini: {
    apiKey: process.env.GOOGLE_AI_API_KEY ?? process.env.GEMINI_API_KEY ?? process.env.GOOGLE_API_KEY ?? "",
    model: process.env.GEMINI_MODEL ?? "gemini-2.0-flash",
    temperature: parseFloat(process.env.MODEL_TEMPERATURE ?? "0"),
    topP: parseFloat(process.env.MODEL_TOP_P ?? "0.95"),
    topK: parseInt(process.env.MODEL_TOP_K ?? "40", 10),
    maxOutputTokens: parseInt(process.env.MODEL_MAX_OUTPUT_TOKENS ?? "8192", 10),
    timeoutMs: parseInt(process.env.MODEL_TIMEOUT_MS ?? "30000", 10),
    retries: parseInt(process.env.MODEL_RETRIES ?? "2", 10),
    retryDelayMs: parseInt(process.env.MODEL_RETRY_DELAY_MS ?? "500", 10),
  },
  rateLimit: {
    /** Free-tier style quota: requests per rolling minute */
    requestsPerMinute: parseInt(process.env.RATE_LIMIT_RPM ?? "10", 10),
    /** Requests per UTC day */
    requestsPerDay: parseInt(process.env.RATE_LIMIT_RPD ?? "1500", 10),
  },
  dataset: {
    path: process.env.DATASET_PATH ?? "data/train.json",
    /** 0 = every entry */
    limit: parseInt(process.env.DATASET_LIMIT ?? "0", 10),
  },
  results: {
    dir: process.env.RESULTS_DIR ?? "results",
    dbPath: process.env.DB_PATH ?? "data/bench.db",
  },
  rest: {
    port: parseInt(process.env.REST_PORT ?? "3000", 10),
    apiKey: process.env.REST_API_KEY ?? "",
  },
};

export type BenchConfig = typeof config;
