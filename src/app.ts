// src/app.ts: Express application bootstrap with request correlation and structured logging

import express, {
  type Express,
  type Request,
  type Response,
  type NextFunction,
} from "express";

import cors from "cors";
import { randomUUID } from "crypto";
import multer from "multer";

import { createHealthRouter } from "./modules/health/health.controller";
import { createReportsRouter } from "./modules/reports/reports.routes";
import { createSubjectsRouter } from "./modules/subjects/subjects.routes";
import type { ReportPipeline } from "./modules/pipeline/reportPipeline.service";
import type { SubjectService } from "./modules/subjects/subjects.service";

import type { AppConfig } from "@/lib/config";
import { withRequestContext } from "@/lib/observability/request-context";
import { log } from "@/lib/observability/logger";
import { DomainError } from "@/lib/errors/domain-error";
import { respondError } from "@/lib/http/respond";

export type AppDeps = {
  config: Pick<
    AppConfig,
    "corsOrigin" | "maxUploadBytes" | "mode" | "nodeEnv"
  >;
  pipeline: ReportPipeline;
  subjects: SubjectService;
};

export function createApp({ config, pipeline, subjects }: AppDeps): Express {
  const app: Express = express();

  // report state changes on every call; never answer 304
  app.set("etag", false);

  ////////////////////////////////////////////////////////////////
  // Core middleware
  ////////////////////////////////////////////////////////////////

  // payloads are measurement lists, not documents
  app.use(express.json({ limit: "1mb" }));

  app.use(
    cors({
      origin: config.corsOrigin,
      credentials: true,
      methods: ["GET", "POST", "PUT", "OPTIONS"],
      allowedHeaders: ["Content-Type", "X-Request-Id"],
      exposedHeaders: ["X-Request-Id", "Content-Disposition"],
    }),
  );

  app.use("/api", (_req, res, next) => {
    res.setHeader("Cache-Control", "no-store");
    next();
  });

  ////////////////////////////////////////////////////////////////
  // Correlation + structured logging middleware
  ////////////////////////////////////////////////////////////////

  app.use((req: Request, res: Response, next: NextFunction) => {
    const requestId = req.header("x-request-id") ?? randomUUID();

    res.setHeader("x-request-id", requestId);

    const start = Date.now();

    void withRequestContext(async () => {
      log("DEBUG", "HTTP_REQUEST_STARTED", {
        method: req.method,
        path: req.originalUrl,
      });

      res.on("finish", () => {
        log("INFO", "HTTP_REQUEST_COMPLETED", {
          method: req.method,
          path: req.originalUrl,
          status: res.statusCode,
          durationMs: Date.now() - start,
        });
      });

      next();
    }, requestId);
  });

  ////////////////////////////////////////////////////////////////
  // Root route
  ////////////////////////////////////////////////////////////////

  app.get("/", (_req: Request, res: Response) => {
    res.status(200).json({
      ok: true,
      service: "labreport-pipeline",
      health: "/api/health",
      routes: ["/api/subjects", "/api/reports", "/api/health"],
    });
  });

  ////////////////////////////////////////////////////////////////
  // Domain routes
  ////////////////////////////////////////////////////////////////

  app.use("/api", createHealthRouter(config));
  app.use("/api/subjects", createSubjectsRouter(subjects));
  app.use(
    "/api/reports",
    createReportsRouter(pipeline, { maxUploadBytes: config.maxUploadBytes }),
  );

  ////////////////////////////////////////////////////////////////
  // 404 fallback
  ////////////////////////////////////////////////////////////////

  app.use((_req: Request, res: Response) => {
    res
      .status(404)
      .json({ ok: false, error: "Route not found", code: "route_not_found" });
  });

  ////////////////////////////////////////////////////////////////
  // Global error handler (must be last)
  ////////////////////////////////////////////////////////////////

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof DomainError) {
      return respondError(res, err);
    }

    if (err instanceof multer.MulterError) {
      const status = err.code === "LIMIT_FILE_SIZE" ? 413 : 422;
      return res.status(status).json({
        ok: false,
        error: err.message,
        code: "validation_error",
        details: { issues: [{ path: err.field ?? "file", message: err.message }] },
      });
    }

    // body-parser marks malformed JSON with a 4xx status
    if (err instanceof SyntaxError && "status" in err && err.status === 400) {
      return res.status(400).json({
        ok: false,
        error: "Malformed JSON body",
        code: "validation_error",
      });
    }

    const error = err instanceof Error ? err : new Error(String(err));

    log("ERROR", "HTTP_REQUEST_FAILED", {
      message: error.message,
      stack: config.nodeEnv === "production" ? undefined : error.stack,
    });

    return res.status(500).json({
      ok: false,
      error: "Internal Server Error",
      code: "internal_error",
    });
  });

  return app;
}
