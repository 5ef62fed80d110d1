// apps/api/src/app.ts
import express, { type Express, type NextFunction, type Request, type Response } from "express";
import cors from "cors";
import helmet from "helmet";
import morgan from "morgan";
import rateLimit from "express-rate-limit";
import multer from "multer";

import { loadConfig, type AppConfig } from "@pngslim/config";
import { createLogger } from "@pngslim/log";
import { PngslimError, ValidationError } from "@pngslim/palette";

// Local routes (NodeNext requires .js on local imports)
import { health } from "./routes/health.js";
import { jobs } from "./routes/jobs.js";
import { optimizeRouter } from "./routes/optimize.js";

const log = createLogger("@api/app");

type ErrorBody = { status: number; code: string; message: string; details?: unknown[] };

export function describeError(err: unknown): ErrorBody {
  if (err instanceof ValidationError) {
    return { status: err.statusCode, code: err.code, message: err.message, details: err.details };
  }
  if (err instanceof PngslimError) return { status: err.statusCode, code: err.code, message: err.message };
  if (err instanceof multer.MulterError) {
    return { status: err.code === "LIMIT_FILE_SIZE" ? 413 : 400, code: err.code, message: err.message };
  }
  // body-parser marks its own failures with an HTTP status
  if (err instanceof Error && "status" in err && typeof err.status === "number" && err.status < 500) {
    return { status: err.status, code: "BAD_REQUEST", message: err.message };
  }
  return { status: 500, code: "INTERNAL_ERROR", message: err instanceof Error ? err.message : "Unexpected error" };
}

export function createApp(config: AppConfig = loadConfig()): Express {
  const app = express();

  // Core middleware
  app.use(express.json({ limit: "1mb" }));
  app.use(cors({ origin: config.corsOrigin }));
  app.use(helmet());
  if (process.env.NODE_ENV !== "test") app.use(morgan("dev"));

  // Basic rate limiting (configurable via env)
  app.use(
    rateLimit({
      windowMs: config.rateLimit.windowMs,
      limit: config.rateLimit.max,
      standardHeaders: true,
      legacyHeaders: false,
    })
  );

  // Health/Readiness
  app.use(health);
  app.get("/health", (_req, res) => res.json({ ok: true })); // legacy alias

  // App routes
  app.use(optimizeRouter(config.uploadLimitBytes));
  app.use(jobs);

  // Unified error handler
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const { status, ...body } = describeError(err);
    if (status >= 500) log.error({ err, path: req.path }, "request failed");
    else log.warn({ code: body.code, path: req.path }, body.message);
    res.status(status).json({ ok: false, ...body });
  });

  return app;
}

export type AppType = ReturnType<typeof createApp>;
