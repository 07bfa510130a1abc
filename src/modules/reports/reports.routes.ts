// src/modules/reports/reports.routes.ts

import { Router, type Router as ExpressRouter } from "express";
import multer from "multer";
import { handle } from "@/lib/http/respond";
import type { ReportPipeline } from "@/modules/pipeline/reportPipeline.service";
import { createReportsController } from "./reports.controller";

export type ReportsRouterOptions = {
  maxUploadBytes: number;
};

export function createReportsRouter(
  pipeline: ReportPipeline,
  options: ReportsRouterOptions,
): ExpressRouter {
  const router: ExpressRouter = Router();
  const controller = createReportsController(pipeline);

  // bytes stay in memory: only the hash and metadata are persisted
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: options.maxUploadBytes, files: 1 },
  });

  router.post("/", upload.single("file"), handle(controller.submit));
  router.get("/", handle(controller.list));
  router.get("/:id", handle(controller.get));
  router.get("/:id/events", handle(controller.events));

  router.post("/:id/parsed-data", handle(controller.advance));
  router.get("/:id/parsed-data", handle(controller.latestParsedData));
  router.put("/:id/parsed-data", handle(controller.correct));
  router.get("/:id/versions", handle(controller.versions));
  router.get("/:id/versions/:n/edits", handle(controller.edits));

  router.post("/:id/bundles", handle(controller.generateBundle));
  router.get("/:id/bundles/latest", handle(controller.latestBundle));
  router.get("/:id/bundles/latest/download", handle(controller.downloadBundle));

  return router;
}
