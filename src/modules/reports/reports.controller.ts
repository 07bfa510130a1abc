// src/modules/reports/reports.controller.ts
// HTTP adapter over the report pipeline. Validates request shape only; pipeline owns semantics.

import type { Request, Response } from "express";
import { z } from "zod";
import { SYSTEM_CONSTANTS } from "@/constants/system.constants";
import { GENERATION_MODES, type BundleArtifact, type Report } from "@/lib/db/schema";
import {
  parseWith,
  respondError,
  respondOk,
  respondResult,
} from "@/lib/http/respond";
import type { ReportPipeline } from "@/modules/pipeline/reportPipeline.service";
import { statusMetadata } from "./reportLifecycle";
import { REPORT_STATUSES } from "./ReportStatus";
import { PayloadValidationError } from "./report.errors";

const SubmitFieldsSchema = z.object({
  subjectId: z.string().trim().min(1, "subjectId is required"),
});

const ListQuerySchema = z.object({
  subjectId: z.string().uuid().optional(),
  status: z.enum(REPORT_STATUSES).optional(),
});

const AdvanceBodySchema = z.object({
  payload: z.unknown(),
  author: z.string().trim().min(1).max(200).optional(),
});

const CorrectBodySchema = z.object({
  payload: z.unknown(),
  author: z.string().trim().min(1).max(200),
});

const GenerateBodySchema = z.object({
  mode: z.enum(GENERATION_MODES).default("initial"),
});

const VersionParamSchema = z.coerce.number().int().positive();

export function reportView(report: Report) {
  return { ...report, statusMetadata: statusMetadata(report.status) };
}

export function artifactView(artifact: BundleArtifact) {
  const { bundle: _bundle, ...metadata } = artifact;
  return metadata;
}

export function createReportsController(pipeline: ReportPipeline) {
  return {
    async submit(req: Request, res: Response) {
      const fields = parseWith(SubmitFieldsSchema, req.body);
      if (!fields.ok) return respondError(res, fields.error);

      const file = req.file;
      if (!file) {
        return respondError(
          res,
          new PayloadValidationError([
            { path: "file", message: "A report file is required" },
          ]),
        );
      }

      const submitted = await pipeline.submit({
        subjectId: fields.value.subjectId,
        originalFilename: file.originalname,
        mediaType: file.mimetype,
        bytes: file.buffer,
      });
      if (!submitted.ok) return respondError(res, submitted.error);

      return respondOk(res, reportView(submitted.value), 201);
    },

    async list(req: Request, res: Response) {
      const query = parseWith(ListQuerySchema, req.query);
      if (!query.ok) return respondError(res, query.error);

      const reports = await pipeline.listReports(query.value);
      return respondOk(res, reports.map(reportView));
    },

    async get(req: Request, res: Response) {
      const report = await pipeline.getReport(req.params.id);
      if (!report.ok) return respondError(res, report.error);
      return respondOk(res, reportView(report.value));
    },

    async events(req: Request, res: Response) {
      return respondResult(res, await pipeline.listStatusEvents(req.params.id));
    },

    async advance(req: Request, res: Response) {
      const body = parseWith(AdvanceBodySchema, req.body);
      if (!body.ok) return respondError(res, body.error);

      const advanced = await pipeline.advance(
        req.params.id,
        body.value.payload,
        body.value.author ?? SYSTEM_CONSTANTS.SYSTEM_AUTHOR,
      );
      if (!advanced.ok) return respondError(res, advanced.error);

      return respondOk(res, reportView(advanced.value));
    },

    async latestParsedData(req: Request, res: Response) {
      return respondResult(res, await pipeline.latestValidVersion(req.params.id));
    },

    async correct(req: Request, res: Response) {
      const body = parseWith(CorrectBodySchema, req.body);
      if (!body.ok) return respondError(res, body.error);

      const corrected = await pipeline.correct(
        req.params.id,
        body.value.payload,
        body.value.author,
      );
      if (!corrected.ok) return respondError(res, corrected.error);

      const { report, version, edits } = corrected.value;
      return respondOk(res, { report: reportView(report), version, edits });
    },

    async versions(req: Request, res: Response) {
      return respondResult(res, await pipeline.listVersions(req.params.id));
    },

    async edits(req: Request, res: Response) {
      const versionNumber = parseWith(VersionParamSchema, req.params.n);
      if (!versionNumber.ok) return respondError(res, versionNumber.error);

      return respondResult(
        res,
        await pipeline.listEdits(req.params.id, versionNumber.value),
      );
    },

    async generateBundle(req: Request, res: Response) {
      const body = parseWith(GenerateBodySchema, req.body ?? {});
      if (!body.ok) return respondError(res, body.error);

      const artifact = await pipeline.generateBundle(req.params.id, body.value.mode);
      if (!artifact.ok) return respondError(res, artifact.error);

      return respondOk(res, artifactView(artifact.value), 201);
    },

    async latestBundle(req: Request, res: Response) {
      const artifact = await pipeline.latestArtifact(req.params.id);
      if (!artifact.ok) return respondError(res, artifact.error);
      return respondOk(res, artifactView(artifact.value));
    },

    async downloadBundle(req: Request, res: Response) {
      const artifact = await pipeline.latestArtifact(req.params.id);
      if (!artifact.ok) return respondError(res, artifact.error);

      res.setHeader("Content-Type", "application/fhir+json");
      res.setHeader(
        "Content-Disposition",
        `attachment; filename="bundle_${artifact.value.reportId}.json"`,
      );
      return res.status(200).send(JSON.stringify(artifact.value.bundle, null, 2));
    },
  };
}
