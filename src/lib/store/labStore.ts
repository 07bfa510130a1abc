// src/lib/store/labStore.ts
// Persistence seam for the pipeline. Entities go in fully formed; ids and timestamps are assigned by callers.

import type { Result } from "@/lib/errors/result";
import type {
  BundleArtifact,
  EditHistoryEntry,
  Report,
  ReportStatusEvent,
  StructuredVersion,
  SubjectProfile,
} from "@/lib/db/schema";
import type { ReportStatus } from "@/modules/reports/ReportStatus";

export type ReportFilter = {
  subjectId?: string;
  status?: ReportStatus;
};

export type ReportStatusPatch = {
  status: ReportStatus;
  errorCode: string | null;
  errorMessage: string | null;
  updatedAt: Date;
};

export type GuardedStatusUpdate = {
  id: string;
  /** Write applies only while the row still holds this status. */
  expectedStatus: ReportStatus;
  patch: ReportStatusPatch;
};

export interface LabStoreTx {
  insertSubject(subject: SubjectProfile): Promise<SubjectProfile>;
  findSubjectById(id: string): Promise<SubjectProfile | null>;
  findSubjectByExternalId(externalId: string): Promise<SubjectProfile | null>;
  listSubjects(): Promise<SubjectProfile[]>;

  insertReport(report: Report): Promise<Report>;
  findReportById(id: string): Promise<Report | null>;
  /** The report holding this hash with no duplicate pointer. */
  findCanonicalReportByHash(contentHash: string): Promise<Report | null>;
  listReports(filter?: ReportFilter): Promise<Report[]>;
  /** null when no row matched the id + expected status guard */
  updateReportStatus(update: GuardedStatusUpdate): Promise<Report | null>;

  insertStatusEvent(event: ReportStatusEvent): Promise<ReportStatusEvent>;
  countStatusEvents(reportId: string): Promise<number>;
  listStatusEvents(reportId: string): Promise<ReportStatusEvent[]>;

  insertVersion(version: StructuredVersion): Promise<StructuredVersion>;
  countVersions(reportId: string): Promise<number>;
  listVersions(reportId: string): Promise<StructuredVersion[]>;
  findVersion(
    reportId: string,
    versionNumber: number,
  ): Promise<StructuredVersion | null>;
  findLatestValidVersion(reportId: string): Promise<StructuredVersion | null>;

  insertEdits(entries: EditHistoryEntry[]): Promise<EditHistoryEntry[]>;
  listEdits(versionId: string): Promise<EditHistoryEntry[]>;

  insertArtifact(artifact: BundleArtifact): Promise<BundleArtifact>;
  findLatestArtifact(reportId: string): Promise<BundleArtifact | null>;
  listArtifacts(reportId: string): Promise<BundleArtifact[]>;
}

export interface LabStore extends LabStoreTx {
  /**
   * Runs `fn` atomically. An Err result rolls every write back and is
   * returned as-is; a thrown error rolls back and propagates.
   */
  transaction<T, E>(
    fn: (tx: LabStoreTx) => Promise<Result<T, E>>,
  ): Promise<Result<T, E>>;
}
