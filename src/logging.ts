import pino, { type Logger } from "pino";
import path from "path";
import fs from "fs";
import type { Request, Response, NextFunction } from "express";

// Relative to the working directory, like the dataset and database paths
const logsDir = path.resolve(process.env.LOG_DIR ?? "data/logs");

// Under vitest nothing is written: no transport workers, no log files
const isTest = process.env.VITEST !== undefined || process.env.NODE_ENV === "test";

// Rotate log file daily — filename: bench-YYYY-MM-DD.log
function logFilePath(): string {
  const date = new Date().toISOString().slice(0, 10);
  return path.join(logsDir, `bench-${date}.log`);
}

function createLogger(): Logger {
  if (isTest) {
    return pino({ level: "silent", base: { service: "finqa-bench" } });
  }

  // Multi-destination: stderr (human-readable) + file (JSON for parsing)
  const transport = pino.transport({
    targets: [
      {
        target: "pino-pretty",
        options: {
          destination: 2, // stderr — keeps stdout clean for MCP stdio
          colorize: true,
          translateTime: "HH:MM:ss.l",
          ignore: "pid,hostname",
        },
        level: process.env.LOG_LEVEL ?? "info",
      },
      {
        target: "pino/file",
        options: {
          destination: logFilePath(),
          mkdir: true,
        },
        level: "debug", // file gets everything
      },
    ],
  });

  return pino(
    {
      level: "debug", // base level — targets filter individually
      base: { service: "finqa-bench" },
    },
    transport,
  );
}

export const logger = createLogger();

// Typed child loggers for subsystems
export const logModel = logger.child({ subsystem: "model" });
export const logRunner = logger.child({ subsystem: "runner" });
export const logDataset = logger.child({ subsystem: "dataset" });
export const logRest = logger.child({ subsystem: "rest" });
export const logMcp = logger.child({ subsystem: "mcp" });
export const logDb = logger.child({ subsystem: "database" });

// Express request logging middleware
export function requestLogger(req: Request, res: Response, next: NextFunction) {
  const start = Date.now();
  res.on("finish", () => {
    const duration = Date.now() - start;
    logRest.info(
      {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        duration_ms: duration,
      },
      `${req.method} ${req.path} → ${res.statusCode} (${duration}ms)`,
    );
  });
  next();
}

// Clean up old log files (keep last N days)
export function pruneOldLogs(keepDays: number = 30) {
  if (!fs.existsSync(logsDir)) return;
  try {
    const files = fs.readdirSync(logsDir).filter((f) => f.startsWith("bench-") && f.endsWith(".log"));
    const cutoff = new Date();
    cutoff.setDate(cutoff.getDate() - keepDays);
    const cutoffStr = cutoff.toISOString().slice(0, 10);

    for (const file of files) {
      const dateMatch = file.match(/bench-(\d{4}-\d{2}-\d{2})\.log/);
      if (dateMatch && dateMatch[1] < cutoffStr) {
        fs.unlinkSync(path.join(logsDir, file));
        logger.info({ file }, "Pruned old log file");
      }
    }
  } catch (e) {
    logger.warn({ err: e }, "Failed to prune old logs");
  }
}
