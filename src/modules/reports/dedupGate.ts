// src/modules/reports/dedupGate.ts
// Purpose: Content-addressed intake. First copy of a byte stream becomes the canonical report;
// every later copy is recorded as a duplicate pointing at it and reported back as a conflict.

import { SYSTEM_CONSTANTS } from "@/constants/system.constants";
import type { Clock } from "@/lib/clock";
import { err, ok, type Result } from "@/lib/errors/result";
import type { Report } from "@/lib/db/schema";
import type { LabStore } from "@/lib/store/labStore";
import { UniqueConstraintError } from "@/lib/store/store.errors";
import { log } from "@/lib/observability/logger";
import { contentHash } from "@/modules/determinism/determinism";
import type { ReportLock } from "@/modules/pipeline/reportLock";
import { isUuid, newId } from "@/utils/uuid";
import { appendStatusEvent } from "./transitionReportStatus";
import { ReportStatus } from "./ReportStatus";
import {
  DuplicateUploadError,
  PayloadValidationError,
  SubjectNotFoundError,
  type ValidationIssue,
} from "./report.errors";

export type SubmitDocumentInput = {
  subjectId: string;
  originalFilename: string;
  mediaType: string;
  bytes: Uint8Array;
  actor?: string;
};

export type DedupGateDeps = {
  store: LabStore;
  clock: Clock;
  lock: ReportLock;
  allowedMediaTypes: readonly string[];
};

export type SubmitDocumentError =
  | DuplicateUploadError
  | SubjectNotFoundError
  | PayloadValidationError;

/** "Application/PDF; charset=binary" -> "application/pdf" */
export function baseMediaType(mediaType: string): string {
  return mediaType.split(";")[0].trim().toLowerCase();
}

function checkDocument(
  input: SubmitDocumentInput,
  allowedMediaTypes: readonly string[],
): ValidationIssue[] {
  const issues: ValidationIssue[] = [];

  if (!allowedMediaTypes.includes(baseMediaType(input.mediaType))) {
    issues.push({
      path: "mediaType",
      message: `Unsupported media type ${input.mediaType}; allowed: ${allowedMediaTypes.join(", ")}`,
    });
  }
  if (input.bytes.byteLength === 0) {
    issues.push({ path: "bytes", message: "Document is empty" });
  }
  if (!input.originalFilename.trim()) {
    issues.push({ path: "originalFilename", message: "Filename is required" });
  }

  return issues;
}

/**
 * Dedup keys on the content hash alone: the same file under another
 * subject is still a duplicate. Submissions of one hash are serialized
 * on `hash:<hex>`; the partial unique index backs that up across nodes,
 * and losing that race still ends on the duplicate path.
 */
export async function submitDocument(
  deps: DedupGateDeps,
  input: SubmitDocumentInput,
): Promise<Result<Report, SubmitDocumentError>> {
  const issues = checkDocument(input, deps.allowedMediaTypes);
  if (issues.length > 0) return err(new PayloadValidationError(issues));

  const hash = contentHash(input.bytes);
  const actor = input.actor ?? SYSTEM_CONSTANTS.SYSTEM_AUTHOR;

  const persist = () =>
    deps.store.transaction(async (tx) => {
      const subject = isUuid(input.subjectId)
        ? await tx.findSubjectById(input.subjectId)
        : null;
      if (!subject) return err(new SubjectNotFoundError(input.subjectId));

      const canonical = await tx.findCanonicalReportByHash(hash);
      const now = deps.clock.now();
      const status = canonical ? ReportStatus.DUPLICATE : ReportStatus.UPLOADED;

      const report = await tx.insertReport({
        id: newId(),
        subjectId: subject.id,
        originalFilename: input.originalFilename,
        mediaType: baseMediaType(input.mediaType),
        contentHash: hash,
        byteSize: input.bytes.byteLength,
        status,
        errorCode: null,
        errorMessage: null,
        duplicateOfReportId: canonical?.id ?? null,
        createdAt: now,
        updatedAt: now,
      });

      await appendStatusEvent(tx, {
        reportId: report.id,
        fromStatus: null,
        toStatus: status,
        actor,
        errorCode: null,
        occurredAt: now,
      });

      // the duplicate row must commit, so the conflict is raised after the transaction
      return ok({ report, canonical });
    });

  const outcome = await deps.lock.withLock(`hash:${hash}`, async () => {
    try {
      return await persist();
    } catch (error) {
      // another node committed the canonical row between lookup and insert;
      // the second pass sees it and records this upload as its duplicate
      if (!(error instanceof UniqueConstraintError)) throw error;
      log("WARN", "CANONICAL_INSERT_RACE", { contentHash: hash });
      return persist();
    }
  });

  if (!outcome.ok) return outcome;

  const { report, canonical } = outcome.value;

  if (canonical) {
    log("INFO", "DUPLICATE_UPLOAD", {
      canonicalReportId: canonical.id,
      duplicateReportId: report.id,
      contentHash: hash,
    });
    return err(new DuplicateUploadError(canonical.id, hash, report.id));
  }

  log("INFO", "REPORT_UPLOADED", {
    reportId: report.id,
    subjectId: report.subjectId,
    byteSize: report.byteSize,
  });
  return ok(report);
}
