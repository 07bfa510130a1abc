// src/modules/pipeline/_test_/reportPipeline.service.test.ts

import { describe, it, expect, beforeEach } from "vitest";
import {
  buildHarness,
  glucosePayload,
  PDF_BYTES,
  seedSubject,
  unwrap,
  unwrapErr,
} from "@/_test_/fixtures";
import type { Result } from "@/lib/errors/result";
import type { SubjectProfile } from "@/lib/db/schema";
import type { LabStoreTx } from "@/lib/store/labStore";
import { MemoryLabStore } from "@/lib/store/memoryLabStore";
import { contentHash } from "@/modules/determinism/determinism";
import {
  DuplicateUploadError,
  PayloadValidationError,
} from "@/modules/reports/report.errors";
import { InProcessReportLock } from "../reportLock";
import { ReportPipeline } from "../reportPipeline.service";

type Harness = ReturnType<typeof buildHarness>;

describe("ReportPipeline", () => {
  let h: Harness;
  let subject: SubjectProfile;

  beforeEach(async () => {
    h = buildHarness();
    subject = await seedSubject(h.subjects);
  });

  function submit(bytes: Uint8Array = PDF_BYTES, subjectId = subject.id) {
    return h.pipeline.submit({
      subjectId,
      originalFilename: "panel.pdf",
      mediaType: "application/pdf",
      bytes,
    });
  }

  async function reviewableReport(value = 95) {
    const report = unwrap(await submit());
    unwrap(await h.pipeline.advance(report.id, glucosePayload(value)));
    return report;
  }

  async function statusOf(reportId: string) {
    return unwrap(await h.pipeline.getReport(reportId)).status;
  }

  ////////////////////////////////////////////////////////////////
  // Intake
  ////////////////////////////////////////////////////////////////

  describe("submit", () => {
    it("accepts new content as an uploaded report", async () => {
      const report = unwrap(await submit());

      expect(report).toMatchObject({
        subjectId: subject.id,
        status: "uploaded",
        contentHash: contentHash(PDF_BYTES),
        byteSize: PDF_BYTES.byteLength,
        duplicateOfReportId: null,
      });

      const events = unwrap(await h.pipeline.listStatusEvents(report.id));
      expect(events.map((e) => [e.fromStatus, e.toStatus])).toEqual([
        [null, "uploaded"],
      ]);
    });

    it("flags the same bytes as a duplicate even for another subject", async () => {
      const other = await seedSubject(h.subjects, "S2");
      const first = unwrap(await submit());

      const error = unwrapErr(await submit(PDF_BYTES, other.id));

      expect(error).toBeInstanceOf(DuplicateUploadError);
      expect(error.status).toBe(409);
      expect(error.details).toMatchObject({
        canonicalReportId: first.id,
        contentHash: first.contentHash,
      });

      const reports = await h.pipeline.listReports({ subjectId: other.id });
      expect(reports).toHaveLength(1);
      expect(reports[0]).toMatchObject({
        id: error.details.duplicateReportId,
        status: "duplicate",
        duplicateOfReportId: first.id,
      });
    });

    it("rejects unknown subjects", async () => {
      const error = unwrapErr(await submit(PDF_BYTES, "not-a-subject"));
      expect(error.code).toBe("subject_not_found");
    });

    it("rejects empty documents and unsupported media types", async () => {
      const error = unwrapErr(
        await h.pipeline.submit({
          subjectId: subject.id,
          originalFilename: "notes.txt",
          mediaType: "text/plain",
          bytes: new Uint8Array(),
        }),
      );

      expect(error).toBeInstanceOf(PayloadValidationError);
      expect(error.details).toEqual({
        issues: [
          {
            path: "mediaType",
            message: "Unsupported media type text/plain; allowed: application/pdf",
          },
          { path: "bytes", message: "Document is empty" },
        ],
      });
    });

    it("accepts a media type with parameters", async () => {
      const report = unwrap(
        await h.pipeline.submit({
          subjectId: subject.id,
          originalFilename: "panel.pdf",
          mediaType: "Application/PDF; charset=binary",
          bytes: PDF_BYTES,
        }),
      );
      expect(report.mediaType).toBe("application/pdf");
    });
  });

  ////////////////////////////////////////////////////////////////
  // Parsing
  ////////////////////////////////////////////////////////////////

  describe("advance", () => {
    it("stores version 1 and waits for review", async () => {
      const report = unwrap(await submit());

      const advanced = unwrap(await h.pipeline.advance(report.id, glucosePayload()));

      expect(advanced.status).toBe("review_pending");
      const versions = unwrap(await h.pipeline.listVersions(report.id));
      expect(versions.map((v) => [v.versionNumber, v.versionKind, v.createdBy])).toEqual([
        [1, "original", "system"],
      ]);

      const events = unwrap(await h.pipeline.listStatusEvents(report.id));
      expect(events.map((e) => e.toStatus)).toEqual([
        "uploaded",
        "parsing",
        "review_pending",
      ]);
    });

    it("fails the report on an invalid payload and stores nothing", async () => {
      const report = unwrap(await submit());
      const payload = glucosePayload();
      payload.measurements[0].numeric_value = undefined;

      const error = unwrapErr(await h.pipeline.advance(report.id, payload));

      expect(error.code).toBe("validation_error");
      expect(error.details).toEqual({
        issues: [
          {
            path: "measurements[0].numeric_value",
            message:
              "numeric_value is required for numeric and operator_numeric types",
          },
        ],
      });

      const failed = unwrap(await h.pipeline.getReport(report.id));
      expect(failed).toMatchObject({
        status: "failed",
        errorCode: "schema_validation_failed",
        errorMessage:
          "Validation failed at measurements[0].numeric_value: numeric_value is required for numeric and operator_numeric types",
      });
      expect(unwrap(await h.pipeline.listVersions(report.id))).toEqual([]);
    });

    it("lets a failed report re-enter parsing without burning a version number", async () => {
      const report = unwrap(await submit());
      unwrapErr(await h.pipeline.advance(report.id, { measurements: [] }));

      const retried = unwrap(await h.pipeline.advance(report.id, glucosePayload()));

      expect(retried).toMatchObject({
        status: "review_pending",
        errorCode: null,
        errorMessage: null,
      });
      const versions = unwrap(await h.pipeline.listVersions(report.id));
      expect(versions.map((v) => v.versionNumber)).toEqual([1]);
    });

    it("refuses to parse a duplicate", async () => {
      unwrap(await submit());
      const dup = unwrapErr(await submit());
      const duplicateId = String(dup.details.duplicateReportId);

      const error = unwrapErr(await h.pipeline.advance(duplicateId, glucosePayload()));

      expect(error.code).toBe("state_transition_error");
      expect(error.message).toBe(
        `Invalid state transition from duplicate to parsing for report ${duplicateId}`,
      );
    });

    it("reports unknown ids as not found", async () => {
      const error = unwrapErr(await h.pipeline.advance("missing", glucosePayload()));
      expect(error.code).toBe("report_not_found");
    });
  });

  ////////////////////////////////////////////////////////////////
  // Correction
  ////////////////////////////////////////////////////////////////

  describe("correct", () => {
    it("appends a corrected version with one edit per changed field", async () => {
      const report = await reviewableReport();

      const correction = unwrap(
        await h.pipeline.correct(report.id, glucosePayload(100), "reviewer@lab"),
      );

      expect(correction.report.status).toBe("review_pending");
      expect(correction.version).toMatchObject({
        versionNumber: 2,
        versionKind: "corrected",
        createdBy: "reviewer@lab",
      });
      expect(
        correction.edits.map((e) => [e.fieldPath, e.oldValue, e.newValue, e.editedBy]),
      ).toEqual([["measurements[0].numeric_value", 95, 100, "reviewer@lab"]]);

      const stored = unwrap(await h.pipeline.listEdits(report.id, 2));
      expect(stored.map((e) => e.id)).toEqual(correction.edits.map((e) => e.id));

      const events = unwrap(await h.pipeline.listStatusEvents(report.id));
      expect(events.slice(-2).map((e) => [e.fromStatus, e.toStatus])).toEqual([
        ["review_pending", "editing"],
        ["editing", "review_pending"],
      ]);
    });

    it("rejects an invalid correction without touching the report", async () => {
      const report = await reviewableReport();

      const error = unwrapErr(
        await h.pipeline.correct(report.id, { measurements: [] }, "reviewer@lab"),
      );

      expect(error.code).toBe("validation_error");
      expect(await statusOf(report.id)).toBe("review_pending");
      expect(unwrap(await h.pipeline.listVersions(report.id))).toHaveLength(1);
    });

    it("refuses corrections before parsing", async () => {
      const report = unwrap(await submit());

      const error = unwrapErr(
        await h.pipeline.correct(report.id, glucosePayload(), "reviewer@lab"),
      );

      expect(error.code).toBe("state_transition_error");
      expect(await statusOf(report.id)).toBe("uploaded");
    });
  });

  ////////////////////////////////////////////////////////////////
  // Bundle generation
  ////////////////////////////////////////////////////////////////

  describe("generateBundle", () => {
    it("stores an artifact built from the latest valid version", async () => {
      const report = await reviewableReport();

      const artifact = unwrap(await h.pipeline.generateBundle(report.id, "initial"));

      expect(artifact).toMatchObject({
        reportId: report.id,
        revision: 1,
        generationMode: "initial",
        supersedesArtifactId: null,
      });
      expect(artifact.contentHash).toMatch(/^[0-9a-f]{64}$/);
      expect(artifact.bundle.entry?.[2]?.fullUrl).toBe(
        "Observation/obs-e761a9be4aa8790f",
      );
      expect(await statusOf(report.id)).toBe("completed");

      const latest = unwrap(await h.pipeline.latestArtifact(report.id));
      expect(latest.id).toBe(artifact.id);
    });

    it("regenerates an identical bundle that supersedes the previous one", async () => {
      const report = await reviewableReport();
      const first = unwrap(await h.pipeline.generateBundle(report.id, "initial"));

      const second = unwrap(
        await h.pipeline.generateBundle(report.id, "regeneration"),
      );

      expect(second).toMatchObject({
        revision: 2,
        generationMode: "regeneration",
        supersedesArtifactId: first.id,
        contentHash: first.contentHash,
      });
      const artifacts = unwrap(await h.pipeline.listArtifacts(report.id));
      expect(artifacts.map((a) => a.id)).toEqual([first.id, second.id]);
    });

    it("produces a different hash after a correction changes a value", async () => {
      const report = await reviewableReport(95);
      const before = unwrap(await h.pipeline.generateBundle(report.id));

      unwrap(await h.pipeline.correct(report.id, glucosePayload(100), "reviewer@lab"));
      const after = unwrap(await h.pipeline.generateBundle(report.id));

      expect(after.contentHash).not.toBe(before.contentHash);
      expect(after.supersedesArtifactId).toBe(before.id);
      expect(after.bundle.entry?.[2]?.fullUrl).toBe("Observation/obs-85c89cc21c0e6bd6");
    });

    it("fails the report when no valid version exists", async () => {
      const report = unwrap(await submit());
      unwrapErr(await h.pipeline.advance(report.id, { measurements: [] }));

      const error = unwrapErr(await h.pipeline.generateBundle(report.id, "initial"));

      expect(error.code).toBe("parsed_data_not_found");
      expect(error.status).toBe(404);
      expect(unwrap(await h.pipeline.getReport(report.id))).toMatchObject({
        status: "failed",
        errorCode: "bundle_generation_failed",
        errorMessage: `No valid parsed data for report ${report.id}`,
      });
      expect(unwrap(await h.pipeline.listArtifacts(report.id))).toEqual([]);
    });

    it("refuses regeneration before a first bundle exists", async () => {
      const report = await reviewableReport();

      const error = unwrapErr(
        await h.pipeline.generateBundle(report.id, "regeneration"),
      );

      expect(error.message).toBe(
        `Invalid state transition from review_pending to regenerating_bundle for report ${report.id}`,
      );
      expect(await statusOf(report.id)).toBe("review_pending");
    });

    it("runs concurrent generations for one report one at a time", async () => {
      const report = await reviewableReport();

      const results = await Promise.all([
        h.pipeline.generateBundle(report.id, "initial"),
        h.pipeline.generateBundle(report.id, "initial"),
      ]);

      expect(results.map((r) => r.ok)).toEqual([true, false]);
      expect(unwrapErr(results[1]).code).toBe("state_transition_error");
      expect(unwrap(await h.pipeline.listArtifacts(report.id))).toHaveLength(1);
      expect(h.lock.activeKeys).toBe(0);
    });

    it("leaves the report failed when persisting the artifact throws", async () => {
      class FlakyArtifactStore extends MemoryLabStore {
        override transaction<T, E>(
          fn: (tx: LabStoreTx) => Promise<Result<T, E>>,
        ): Promise<Result<T, E>> {
          return super.transaction((tx) => {
            const flaky: LabStoreTx = Object.create(tx, {
              insertArtifact: {
                value: async () => {
                  throw new Error("disk full");
                },
              },
            });
            return fn(flaky);
          });
        }
      }

      const store = new FlakyArtifactStore();
      const pipeline = new ReportPipeline({
        store,
        lock: new InProcessReportLock(),
        clock: h.clock,
        allowedMediaTypes: ["application/pdf"],
      });
      const owner = await store.insertSubject({ ...subject });
      const report = unwrap(
        await pipeline.submit({
          subjectId: owner.id,
          originalFilename: "panel.pdf",
          mediaType: "application/pdf",
          bytes: PDF_BYTES,
        }),
      );
      unwrap(await pipeline.advance(report.id, glucosePayload()));

      await expect(pipeline.generateBundle(report.id)).rejects.toThrow("disk full");

      expect(unwrap(await pipeline.getReport(report.id))).toMatchObject({
        status: "failed",
        errorCode: "bundle_generation_failed",
        errorMessage: "disk full",
      });
      expect(unwrap(await pipeline.listArtifacts(report.id))).toEqual([]);
    });
  });

  describe("read models", () => {
    it("reports missing artifacts and versions as not found", async () => {
      const report = unwrap(await submit());

      expect(unwrapErr(await h.pipeline.latestArtifact(report.id)).code).toBe(
        "bundle_not_found",
      );
      expect(unwrapErr(await h.pipeline.latestValidVersion(report.id)).code).toBe(
        "parsed_data_not_found",
      );
      expect(unwrapErr(await h.pipeline.listEdits(report.id, 3)).code).toBe(
        "version_not_found",
      );
    });
  });
});
