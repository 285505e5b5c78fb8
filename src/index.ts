import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { Server } from "node:http";
import { config } from "./config.js";
import { validateConfig } from "./config-validator.js";
import { logger, pruneOldLogs } from "./logging.js";
import { runBenchJob } from "./bench.js";
import { formatSummary } from "./report/writer.js";
import { startRestServer } from "./rest/server.js";
import { createMcpServer } from "./mcp/server.js";
import { closeDb } from "./db/database.js";
import { parseArgs, type CliArgs } from "./cli-args.js";

async function runMode(args: CliArgs): Promise<void> {
  const controller = new AbortController();
  process.once("SIGINT", () => {
    logger.warn("Interrupted; finishing the current question, then saving partial results");
    controller.abort();
  });

  const { report, files } = await runBenchJob({
    datasetPath: args.dataset,
    limit: args.limit,
    signal: controller.signal,
  });

  process.stderr.write("\n" + formatSummary(report));
  logger.info({ summary: files.summary }, "Benchmark complete");
  closeDb();
}

async function main() {
  const args = parseArgs(process.argv.slice(2));
  logger.info({ mode: args.mode }, "FinQA formula bench starting");

  // Validate configuration early
  const validation = validateConfig(config);
  for (const warning of validation.warnings) {
    logger.warn(warning);
  }
  if (validation.errors.length > 0) {
    for (const error of validation.errors) {
      logger.error(error);
    }
    throw new Error("Configuration validation failed. Please fix the errors above.");
  }

  // Prune old log files (keep 30 days)
  pruneOldLogs();

  if (args.mode === "run") {
    await runMode(args);
    return;
  }

  let server: Server | null = null;
  if (args.mode === "rest") {
    server = startRestServer();
  } else {
    const mcpServer = createMcpServer();
    await mcpServer.connect(new StdioServerTransport());
    logger.info("MCP server running on stdio");
  }

  // Graceful shutdown
  const shutdown = () => {
    logger.info("Shutting down...");
    server?.close();
    closeDb();
    process.exit(0);
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((e: unknown) => {
  logger.fatal({ err: e instanceof Error ? e.message : String(e) }, "Fatal startup error");
  process.exitCode = 1;
});
