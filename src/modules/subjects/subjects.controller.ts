// src/modules/subjects/subjects.controller.ts

import type { Request, Response } from "express";
import { parseWith, respondOk, respondResult } from "@/lib/http/respond";
import { CreateSubjectSchema, type SubjectService } from "./subjects.service";

export function createSubjectsController(subjects: SubjectService) {
  return {
    async create(req: Request, res: Response) {
      const input = parseWith(CreateSubjectSchema, req.body);
      if (!input.ok) return respondResult(res, input);

      return respondResult(res, await subjects.createSubject(input.value), 201);
    },

    async list(_req: Request, res: Response) {
      return respondOk(res, await subjects.listSubjects());
    },

    async get(req: Request, res: Response) {
      return respondResult(res, await subjects.getSubject(req.params.id));
    },
  };
}
