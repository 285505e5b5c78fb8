export const RESULTS_SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS runs (
    id TEXT PRIMARY KEY,
    model TEXT NOT NULL,
    started_at TEXT NOT NULL,
    finished_at TEXT,
    total_questions INTEGER NOT NULL,
    processed_questions INTEGER NOT NULL DEFAULT 0,
    stopped_reason TEXT,          -- "completed" | "aborted" | "quota_exhausted"
    metrics TEXT                  -- JSON BatchMetrics
  );

  CREATE TABLE IF NOT EXISTS question_outcomes (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    run_id TEXT NOT NULL REFERENCES runs(id),
    entry_id TEXT NOT NULL,
    question_index INTEGER NOT NULL,
    question TEXT NOT NULL,
    expected TEXT NOT NULL,
    raw_response TEXT NOT NULL,
    formula TEXT,
    value REAL,
    generated TEXT,
    error TEXT,
    comparison TEXT,              -- JSON ComparisonResult
    latency_ms INTEGER NOT NULL,
    prompt_hash TEXT NOT NULL,
    created_at TEXT NOT NULL DEFAULT (datetime('now')),
    UNIQUE(run_id, entry_id, question_index)
  );
  CREATE INDEX IF NOT EXISTS idx_outcomes_run_id ON question_outcomes(run_id);
`;
