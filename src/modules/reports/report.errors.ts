// src/modules/reports/report.errors.ts
// Canonical error surface for the report pipeline.

import { DomainError } from "@/lib/errors/domain-error";
import type { ReportStatus } from "./ReportStatus";

export type ValidationIssue = {
  path: string;
  message: string;
};

export class IllegalStatusTransitionError extends DomainError {
  constructor(
    public readonly from: ReportStatus,
    public readonly to: ReportStatus,
    public readonly reportId?: string,
  ) {
    super(
      reportId
        ? `Invalid state transition from ${from} to ${to} for report ${reportId}`
        : `Invalid state transition from ${from} to ${to}`,
      409,
      "state_transition_error",
      { from, to, ...(reportId ? { reportId } : {}) },
    );
    this.name = "IllegalStatusTransitionError";
  }
}

export class ConcurrentModificationError extends DomainError {
  constructor(public readonly reportId: string) {
    super(
      `Report ${reportId} was modified concurrently`,
      409,
      "concurrent_modification",
      { reportId },
    );
    this.name = "ConcurrentModificationError";
  }
}

export class ReportNotFoundError extends DomainError {
  constructor(public readonly reportId: string) {
    super(`Report not found: ${reportId}`, 404, "report_not_found", {
      reportId,
    });
    this.name = "ReportNotFoundError";
  }
}

export class SubjectNotFoundError extends DomainError {
  constructor(public readonly subjectId: string) {
    super(`Subject not found: ${subjectId}`, 404, "subject_not_found", {
      subjectId,
    });
    this.name = "SubjectNotFoundError";
  }
}

export class SubjectConflictError extends DomainError {
  constructor(public readonly externalSubjectId: string) {
    super(
      `Subject already exists: ${externalSubjectId}`,
      409,
      "conflict",
      { externalSubjectId },
    );
    this.name = "SubjectConflictError";
  }
}

export class NoValidVersionError extends DomainError {
  constructor(public readonly reportId: string) {
    super(
      `No valid parsed data for report ${reportId}`,
      404,
      "parsed_data_not_found",
      { reportId },
    );
    this.name = "NoValidVersionError";
  }
}

export class ArtifactNotFoundError extends DomainError {
  constructor(public readonly reportId: string) {
    super(`No bundle for report ${reportId}`, 404, "bundle_not_found", {
      reportId,
    });
    this.name = "ArtifactNotFoundError";
  }
}

export class DuplicateUploadError extends DomainError {
  constructor(
    public readonly canonicalReportId: string,
    public readonly contentHash: string,
    public readonly duplicateReportId: string,
  ) {
    super("This file has already been uploaded", 409, "duplicate_upload", {
      canonicalReportId,
      contentHash,
      duplicateReportId,
    });
    this.name = "DuplicateUploadError";
  }
}

export class PayloadValidationError extends DomainError {
  constructor(public readonly issues: readonly ValidationIssue[]) {
    super(
      issues.length === 1
        ? `Validation failed at ${issues[0].path}: ${issues[0].message}`
        : `Validation failed with ${issues.length} issues`,
      422,
      "validation_error",
      { issues },
    );
    this.name = "PayloadValidationError";
  }
}

export class BundleGenerationError extends DomainError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message, 500, "bundle_generation_failed", details);
    this.name = "BundleGenerationError";
  }
}

export class VersionNotFoundError extends DomainError {
  constructor(
    public readonly reportId: string,
    public readonly versionNumber: number,
  ) {
    super(
      `Version ${versionNumber} not found for report ${reportId}`,
      404,
      "version_not_found",
      { reportId, versionNumber },
    );
    this.name = "VersionNotFoundError";
  }
}
