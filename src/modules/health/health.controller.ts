// src/modules/health/health.controller.ts
// Liveness endpoint. Never throws.

import { Router, type Request, type Response } from "express";
import type { AppConfig } from "@/lib/config";

export function createHealthRouter(config: Pick<AppConfig, "mode" | "nodeEnv">): Router {
  const router: Router = Router();

  router.get("/health", (_req: Request, res: Response) => {
    res.status(200).json({
      ok: true,
      status: "online",
      mode: config.mode,
      env: config.nodeEnv,
      uptime: process.uptime(),
      timestamp: new Date().toISOString(),
    });
  });

  return router;
}
