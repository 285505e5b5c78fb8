import { existsSync } from "node:fs";
import type { BenchConfig } from "./config.js";

/**
 * Validation result with errors (fatal) and warnings (non-fatal).
 */
export interface ValidationResult {
  errors: string[];
  warnings: string[];
}

/**
 * Validates configuration values.
 *
 * Checks:
 * - REST port is in valid range (1-65535)
 * - REST API key is at least 16 characters (warning if shorter)
 * - gemini.timeoutMs is positive, retries and retry delay are non-negative
 * - gemini.temperature is in 0-2 and topP in 0-1
 * - Rate limits are positive and the per-minute limit does not exceed the daily one
 * - dataset.limit is non-negative
 * - Dataset file exists (warning)
 * - Gemini API key is configured (warning; only benchmark runs need it)
 *
 * @param cfg - Configuration object from config.ts
 * @returns ValidationResult with arrays of error and warning messages
 */
export function validateConfig(cfg: BenchConfig): ValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!isValidPort(cfg.rest.port)) {
    errors.push(`REST port must be between 1 and 65535, got ${cfg.rest.port}`);
  }

  // Warn if API key is too short (non-fatal, but insecure)
  if (cfg.rest.apiKey && cfg.rest.apiKey.length < 16) {
    warnings.push(`REST API key is only ${cfg.rest.apiKey.length} characters (recommended: at least 16)`);
  }

  if (!Number.isInteger(cfg.gemini.timeoutMs) || cfg.gemini.timeoutMs <= 0) {
    errors.push(`gemini.timeoutMs must be positive, got ${cfg.gemini.timeoutMs}`);
  }

  if (!Number.isInteger(cfg.gemini.retries) || cfg.gemini.retries < 0) {
    errors.push(`gemini.retries must be a non-negative integer, got ${cfg.gemini.retries}`);
  }

  if (!Number.isInteger(cfg.gemini.retryDelayMs) || cfg.gemini.retryDelayMs < 0) {
    errors.push(`gemini.retryDelayMs must be non-negative, got ${cfg.gemini.retryDelayMs}`);
  }

  if (isNaN(cfg.gemini.temperature) || cfg.gemini.temperature < 0 || cfg.gemini.temperature > 2) {
    errors.push(`gemini.temperature must be between 0 and 2, got ${cfg.gemini.temperature}`);
  }

  if (isNaN(cfg.gemini.topP) || cfg.gemini.topP < 0 || cfg.gemini.topP > 1) {
    errors.push(`gemini.topP must be between 0 and 1, got ${cfg.gemini.topP}`);
  }

  if (!isPositiveInteger(cfg.rateLimit.requestsPerMinute)) {
    errors.push(`rateLimit.requestsPerMinute must be positive, got ${cfg.rateLimit.requestsPerMinute}`);
  }

  if (!isPositiveInteger(cfg.rateLimit.requestsPerDay)) {
    errors.push(`rateLimit.requestsPerDay must be positive, got ${cfg.rateLimit.requestsPerDay}`);
  }

  if (cfg.rateLimit.requestsPerMinute > cfg.rateLimit.requestsPerDay) {
    errors.push(
      `rateLimit.requestsPerMinute (${cfg.rateLimit.requestsPerMinute}) must be <= rateLimit.requestsPerDay (${cfg.rateLimit.requestsPerDay})`,
    );
  }

  if (!Number.isInteger(cfg.dataset.limit) || cfg.dataset.limit < 0) {
    errors.push(`dataset.limit must be a non-negative integer, got ${cfg.dataset.limit}`);
  }

  if (!existsSync(cfg.dataset.path)) {
    warnings.push(`Dataset file does not exist: ${cfg.dataset.path}`);
  }

  if (!cfg.gemini.apiKey) {
    warnings.push("No Gemini API key configured (GOOGLE_AI_API_KEY); benchmark runs will fail");
  }

  return { errors, warnings };
}

/**
 * Checks if a port number is in the valid range (1-65535).
 */
function isValidPort(port: number): boolean {
  return Number.isInteger(port) && port >= 1 && port <= 65535;
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}
