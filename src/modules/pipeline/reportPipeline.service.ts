// src/modules/pipeline/reportPipeline.service.ts
// Purpose: Orchestrates one report through intake, parsing, correction and bundle generation.
//
// Every mutating call on a report runs under the report lock, and every
// status change goes through transitionReportStatus. Once a run has moved a
// report into a processing state it always leaves it in a resting one:
// review_pending / completed on success, failed otherwise.

import { SYSTEM_CONSTANTS } from "@/constants/system.constants";
import { systemClock, type Clock } from "@/lib/clock";
import type { DomainError } from "@/lib/errors/domain-error";
import { err, ok, type Result } from "@/lib/errors/result";
import type {
  BundleArtifact,
  EditHistoryEntry,
  GenerationMode,
  Report,
  ReportStatusEvent,
  StructuredVersion,
} from "@/lib/db/schema";
import type { LabStore, ReportFilter } from "@/lib/store/labStore";
import { log } from "@/lib/observability/logger";
import { withReportContext } from "@/lib/observability/request-context";
import { assembleBundle, type LoincTable } from "@/modules/bundles/bundleAssembler";
import type { UnitTable } from "@/modules/determinism/normalization";
import {
  submitDocument,
  type SubmitDocumentInput,
} from "@/modules/reports/dedupGate";
import { validateTransition } from "@/modules/reports/reportLifecycle";
import { ReportStatus } from "@/modules/reports/ReportStatus";
import {
  ArtifactNotFoundError,
  NoValidVersionError,
  PayloadValidationError,
  ReportNotFoundError,
  SubjectNotFoundError,
} from "@/modules/reports/report.errors";
import {
  transitionReportStatus,
  type ReportFailure,
} from "@/modules/reports/transitionReportStatus";
import { diffPayloads } from "@/modules/versions/payloadDiff";
import { validateStructuredPayload } from "@/modules/versions/structuredPayload.schema";
import {
  appendVersion,
  getVersion,
  latestValid,
  recordEdits,
} from "@/modules/versions/versionLedger.service";
import { isUuid, newId } from "@/utils/uuid";
import { ReportBusyError, type ReportLock } from "./reportLock";

export const REPORT_ERROR_CODES = {
  SCHEMA_VALIDATION_FAILED: "schema_validation_failed",
  BUNDLE_GENERATION_FAILED: "bundle_generation_failed",
  INTERNAL_ERROR: "internal_error",
} as const;

export type ReportPipelineDeps = {
  store: LabStore;
  lock: ReportLock;
  allowedMediaTypes: readonly string[];
  clock?: Clock;
  loincTable?: LoincTable;
  unitTable?: UnitTable;
};

export type Correction = {
  report: Report;
  version: StructuredVersion;
  edits: EditHistoryEntry[];
};

type Assembly = {
  version: StructuredVersion;
  bundle: fhir4.Bundle;
  contentHash: string;
};

export class ReportPipeline {
  private readonly store: LabStore;
  private readonly lock: ReportLock;
  private readonly clock: Clock;

  constructor(private readonly deps: ReportPipelineDeps) {
    this.store = deps.store;
    this.lock = deps.lock;
    this.clock = deps.clock ?? systemClock;
  }

  ////////////////////////////////////////////////////////////////
  // Intake
  ////////////////////////////////////////////////////////////////

  async submit(input: SubmitDocumentInput): Promise<Result<Report, DomainError>> {
    try {
      return await submitDocument(
        {
          store: this.store,
          clock: this.clock,
          lock: this.lock,
          allowedMediaTypes: this.deps.allowedMediaTypes,
        },
        input,
      );
    } catch (error) {
      if (error instanceof ReportBusyError) return err(error);
      throw error;
    }
  }

  ////////////////////////////////////////////////////////////////
  // Parsing (uploaded | failed -> parsing -> review_pending | failed)
  ////////////////////////////////////////////////////////////////

  /**
   * Takes the payload produced by extraction. An invalid payload fails the
   * report with `schema_validation_failed` and stores no version.
   */
  advance(
    reportId: string,
    payload: unknown,
    author: string = SYSTEM_CONSTANTS.SYSTEM_AUTHOR,
  ): Promise<Result<Report, DomainError>> {
    return this.exclusive<Report>(reportId, async () => {
      const started = await this.store.transaction((tx) =>
        transitionReportStatus(tx, this.clock, {
          reportId,
          to: ReportStatus.PARSING,
          actor: author,
        }),
      );
      if (!started.ok) return started;

      return this.failOnThrow<Report>(
        reportId,
        author,
        REPORT_ERROR_CODES.INTERNAL_ERROR,
        async () => {
          const validation = validateStructuredPayload(payload, this.clock.now());

          if (!validation.ok) {
            const rejection = new PayloadValidationError(validation.issues);
            const failed = await this.markFailed(reportId, author, {
              code: REPORT_ERROR_CODES.SCHEMA_VALIDATION_FAILED,
              message: rejection.message,
            });
            if (!failed.ok) return failed;

            log("WARN", "PAYLOAD_REJECTED", {
              issues: validation.issues.length,
            });
            return err(rejection);
          }

          return this.store.transaction<Report, DomainError>(async (tx) => {
            const version = await appendVersion(tx, this.clock, {
              reportId,
              payload: validation.payload,
              kind: "original",
              validation: { status: "valid" },
              author,
            });

            const reviewable = await transitionReportStatus(tx, this.clock, {
              reportId,
              to: ReportStatus.REVIEW_PENDING,
              actor: author,
            });
            if (!reviewable.ok) return reviewable;

            log("INFO", "VERSION_APPENDED", {
              versionNumber: version.versionNumber,
              kind: version.versionKind,
              measurements: validation.payload.measurements.length,
            });
            return reviewable;
          });
        },
      );
    });
  }

  ////////////////////////////////////////////////////////////////
  // Correction (-> editing -> review_pending, one transaction)
  ////////////////////////////////////////////////////////////////

  correct(
    reportId: string,
    payload: unknown,
    author: string,
  ): Promise<Result<Correction, DomainError>> {
    return this.exclusive<Correction>(reportId, async () => {
      const report = await this.store.findReportById(reportId);
      if (!report) return err(new ReportNotFoundError(reportId));

      const editing = report.status === ReportStatus.EDITING;
      if (!editing) {
        const allowed = validateTransition(
          report.status,
          ReportStatus.EDITING,
          report.id,
        );
        if (!allowed.ok) return allowed;
      }

      // rejected corrections leave the report untouched
      const validation = validateStructuredPayload(payload, this.clock.now());
      if (!validation.ok) {
        return err(new PayloadValidationError(validation.issues));
      }

      return this.store.transaction<Correction, DomainError>(async (tx) => {
        if (!editing) {
          const opened = await transitionReportStatus(tx, this.clock, {
            reportId,
            to: ReportStatus.EDITING,
            actor: author,
          });
          if (!opened.ok) return opened;
        }

        const base = await latestValid(tx, reportId);
        if (!base) return err(new NoValidVersionError(reportId));

        const version = await appendVersion(tx, this.clock, {
          reportId,
          payload: validation.payload,
          kind: "corrected",
          validation: { status: "valid" },
          author,
        });

        const edits = await recordEdits(tx, this.clock, {
          versionId: version.id,
          changes: diffPayloads(base.payload, version.payload),
          author,
        });

        const closed = await transitionReportStatus(tx, this.clock, {
          reportId,
          to: ReportStatus.REVIEW_PENDING,
          actor: author,
        });
        if (!closed.ok) return closed;

        log("INFO", "VERSION_CORRECTED", {
          baseVersion: base.versionNumber,
          versionNumber: version.versionNumber,
          edits: edits.length,
        });
        return ok({ report: closed.value, version, edits });
      });
    });
  }

  ////////////////////////////////////////////////////////////////
  // Bundle generation (-> generating | regenerating -> completed | failed)
  ////////////////////////////////////////////////////////////////

  generateBundle(
    reportId: string,
    mode: GenerationMode = "initial",
    actor: string = SYSTEM_CONSTANTS.SYSTEM_AUTHOR,
  ): Promise<Result<BundleArtifact, DomainError>> {
    return this.exclusive<BundleArtifact>(reportId, async () => {
      const target =
        mode === "regeneration"
          ? ReportStatus.REGENERATING_BUNDLE
          : ReportStatus.GENERATING_BUNDLE;

      const started = await this.store.transaction((tx) =>
        transitionReportStatus(tx, this.clock, { reportId, to: target, actor }),
      );
      if (!started.ok) return started;
      const report = started.value;

      return this.failOnThrow<BundleArtifact>(
        reportId,
        actor,
        REPORT_ERROR_CODES.BUNDLE_GENERATION_FAILED,
        async () => {
          const assembly = await this.assemble(report);

          if (!assembly.ok) {
            const failed = await this.markFailed(reportId, actor, {
              code: REPORT_ERROR_CODES.BUNDLE_GENERATION_FAILED,
              message: assembly.error.message,
            });
            if (!failed.ok) return failed;

            log("WARN", "BUNDLE_GENERATION_FAILED", {
              code: assembly.error.code,
              message: assembly.error.message,
            });
            return assembly;
          }

          const { version, bundle, contentHash } = assembly.value;

          return this.store.transaction<BundleArtifact, DomainError>(
            async (tx) => {
              const previous = await tx.findLatestArtifact(reportId);

              const artifact = await tx.insertArtifact({
                id: newId(),
                reportId,
                versionId: version.id,
                revision: (previous?.revision ?? 0) + 1,
                bundle,
                contentHash,
                generationMode: mode,
                supersedesArtifactId: previous?.id ?? null,
                generatedAt: this.clock.now(),
              });

              const completed = await transitionReportStatus(tx, this.clock, {
                reportId,
                to: ReportStatus.COMPLETED,
                actor,
              });
              if (!completed.ok) return completed;

              log("INFO", "BUNDLE_GENERATED", {
                mode,
                versionNumber: version.versionNumber,
                revision: artifact.revision,
                contentHash,
                unchanged: previous?.contentHash === contentHash,
              });
              return ok(artifact);
            },
          );
        },
      );
    });
  }

  ////////////////////////////////////////////////////////////////
  // Read models
  ////////////////////////////////////////////////////////////////

  async getReport(reportId: string): Promise<Result<Report, ReportNotFoundError>> {
    const report = isUuid(reportId)
      ? await this.store.findReportById(reportId)
      : null;
    return report ? ok(report) : err(new ReportNotFoundError(reportId));
  }

  listReports(filter: ReportFilter = {}): Promise<Report[]> {
    return this.store.listReports(filter);
  }

  async listStatusEvents(
    reportId: string,
  ): Promise<Result<ReportStatusEvent[], ReportNotFoundError>> {
    const report = await this.getReport(reportId);
    if (!report.ok) return report;
    return ok(await this.store.listStatusEvents(reportId));
  }

  async listVersions(
    reportId: string,
  ): Promise<Result<StructuredVersion[], ReportNotFoundError>> {
    const report = await this.getReport(reportId);
    if (!report.ok) return report;
    return ok(await this.store.listVersions(reportId));
  }

  async latestValidVersion(
    reportId: string,
  ): Promise<Result<StructuredVersion, DomainError>> {
    const report = await this.getReport(reportId);
    if (!report.ok) return report;

    const version = await latestValid(this.store, reportId);
    return version ? ok(version) : err(new NoValidVersionError(reportId));
  }

  async listEdits(
    reportId: string,
    versionNumber: number,
  ): Promise<Result<EditHistoryEntry[], DomainError>> {
    const report = await this.getReport(reportId);
    if (!report.ok) return report;

    const version = await getVersion(this.store, reportId, versionNumber);
    if (!version.ok) return version;

    return ok(await this.store.listEdits(version.value.id));
  }

  async latestArtifact(
    reportId: string,
  ): Promise<Result<BundleArtifact, DomainError>> {
    const report = await this.getReport(reportId);
    if (!report.ok) return report;

    const artifact = await this.store.findLatestArtifact(reportId);
    return artifact ? ok(artifact) : err(new ArtifactNotFoundError(reportId));
  }

  async listArtifacts(
    reportId: string,
  ): Promise<Result<BundleArtifact[], ReportNotFoundError>> {
    const report = await this.getReport(reportId);
    if (!report.ok) return report;
    return ok(await this.store.listArtifacts(reportId));
  }

  ////////////////////////////////////////////////////////////////
  // Internals
  ////////////////////////////////////////////////////////////////

  private async exclusive<T>(
    reportId: string,
    fn: () => Promise<Result<T, DomainError>>,
  ): Promise<Result<T, DomainError>> {
    if (!isUuid(reportId)) return err(new ReportNotFoundError(reportId));

    try {
      return await this.lock.withLock(`report:${reportId}`, () =>
        withReportContext(reportId, fn),
      );
    } catch (error) {
      if (error instanceof ReportBusyError) return err(error);
      throw error;
    }
  }

  /** Leaves the report in failed if `fn` throws, then rethrows. */
  private async failOnThrow<T>(
    reportId: string,
    actor: string,
    code: string,
    fn: () => Promise<Result<T, DomainError>>,
  ): Promise<Result<T, DomainError>> {
    try {
      return await fn();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      log("ERROR", "REPORT_RUN_CRASHED", { code, message });

      try {
        await this.markFailed(reportId, actor, { code, message });
      } catch (markError) {
        log("ERROR", "REPORT_FAIL_MARK_FAILED", {
          message: markError instanceof Error ? markError.message : String(markError),
        });
      }
      throw error;
    }
  }

  private markFailed(reportId: string, actor: string, failure: ReportFailure) {
    return this.store.transaction((tx) =>
      transitionReportStatus(tx, this.clock, {
        reportId,
        to: ReportStatus.FAILED,
        actor,
        error: failure,
      }),
    );
  }

  private async assemble(report: Report): Promise<Result<Assembly, DomainError>> {
    const subject = await this.store.findSubjectById(report.subjectId);
    if (!subject) return err(new SubjectNotFoundError(report.subjectId));

    const version = await latestValid(this.store, report.id);
    if (!version) return err(new NoValidVersionError(report.id));

    const assembled = assembleBundle({
      report,
      subject,
      version,
      loincTable: this.deps.loincTable,
      unitTable: this.deps.unitTable,
    });
    if (!assembled.ok) return assembled;

    return ok({ version, ...assembled.value });
  }
}
