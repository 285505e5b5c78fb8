import express, { Request, Response, NextFunction } from "express";
import cors from "cors";
import rateLimit from "express-rate-limit";
import { timingSafeEqual } from "node:crypto";
import type { Server } from "node:http";
import { router } from "./routes.js";
import { config } from "../config.js";
import { requestLogger, logRest } from "../logging.js";
import { OPERATION_NAMES } from "../formula/operations.js";

function apiKeyAuth(req: Request, res: Response, next: NextFunction): void {
  const key = config.rest.apiKey;
  if (!key) {
    next();
    return;
  }
  const header = req.headers["x-api-key"];
  const provided =
    (typeof header === "string" ? header : undefined) ??
    req.headers.authorization?.replace(/^Bearer\s+/i, "");
  const providedBuffer = Buffer.from(provided ?? "");
  const keyBuffer = Buffer.from(key);

  if (
    providedBuffer.length === keyBuffer.length &&
    timingSafeEqual(providedBuffer, keyBuffer)
  ) {
    next();
  } else {
    res.status(401).json({ error: "Unauthorized: invalid or missing API key" });
  }
}

// Rate limiter keyed by API key, not IP
const keyGenerator = (req: Request): string => {
  const header = req.headers["x-api-key"];
  return typeof header === "string" ? header : "anonymous";
};

const apiLimiter = rateLimit({
  windowMs: 60_000, // 1 minute
  max: 300,
  standardHeaders: true,
  legacyHeaders: false,
  keyGenerator,
  message: { error: "Rate limit exceeded: 300 requests/minute" },
  validate: { ip: false },
});

const startTime = Date.now();

export function createApp(): express.Express {
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: "2mb" }));

  // Request logging
  app.use(requestLogger);

  // Health check (unauthenticated)
  app.get("/health", (_req, res) => {
    res.json({
      status: "ok",
      uptime_s: Math.round((Date.now() - startTime) / 1000),
      operations: OPERATION_NAMES,
    });
  });

  app.use("/api", apiKeyAuth, apiLimiter, router);

  // Malformed JSON bodies land here
  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    const message = err instanceof Error ? err.message : String(err);
    res.status(400).json({ error: `Invalid request body: ${message}`, type: "ValidationError" });
  });

  return app;
}

export function startRestServer(): Server {
  const app = createApp();
  const server = app.listen(config.rest.port, () => {
    logRest.info({ port: config.rest.port, auth: config.rest.apiKey ? "api-key" : "none" }, "REST server listening");
  });
  return server;
}
