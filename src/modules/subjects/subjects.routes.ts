// src/modules/subjects/subjects.routes.ts

import { Router, type Router as ExpressRouter } from "express";
import { handle } from "@/lib/http/respond";
import { createSubjectsController } from "./subjects.controller";
import type { SubjectService } from "./subjects.service";

export function createSubjectsRouter(subjects: SubjectService): ExpressRouter {
  const router: ExpressRouter = Router();
  const controller = createSubjectsController(subjects);

  router.post("/", handle(controller.create));
  router.get("/", handle(controller.list));
  router.get("/:id", handle(controller.get));

  return router;
}
