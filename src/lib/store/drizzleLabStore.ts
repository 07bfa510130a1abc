// src/lib/store/drizzleLabStore.ts
// Postgres-backed LabStore (drizzle-orm over node-postgres).

import {
  and,
  asc,
  count,
  desc,
  eq,
  isNull,
  TransactionRollbackError,
  type SQL,
} from "drizzle-orm";
import pg from "pg";
import type { Err, Result } from "@/lib/errors/result";
import type { LabDatabase } from "@/lib/db";
import {
  bundleArtifacts,
  editHistoryEntries,
  reports,
  reportStatusEvents,
  structuredVersions,
  subjects,
  type BundleArtifact,
  type EditHistoryEntry,
  type Report,
  type ReportStatusEvent,
  type StructuredVersion,
  type SubjectProfile,
} from "@/lib/db/schema";
import type {
  GuardedStatusUpdate,
  LabStore,
  LabStoreTx,
  ReportFilter,
} from "./labStore";
import { UniqueConstraintError } from "./store.errors";

const PG_UNIQUE_VIOLATION = "23505";

async function guardUnique<T>(op: () => Promise<T>): Promise<T> {
  try {
    return await op();
  } catch (error) {
    if (
      error instanceof pg.DatabaseError &&
      error.code === PG_UNIQUE_VIOLATION
    ) {
      throw new UniqueConstraintError(error.constraint ?? "unique");
    }
    throw error;
  }
}

class DrizzleLabStoreTx implements LabStoreTx {
  constructor(protected readonly db: LabDatabase) {}

  ////////////////////////////////////////////////////////////////
  // Subjects
  ////////////////////////////////////////////////////////////////

  async insertSubject(subject: SubjectProfile) {
    await guardUnique(() => this.db.insert(subjects).values(subject));
    return subject;
  }

  async findSubjectById(id: string) {
    const [row] = await this.db
      .select()
      .from(subjects)
      .where(eq(subjects.id, id))
      .limit(1);
    return row ?? null;
  }

  async findSubjectByExternalId(externalId: string) {
    const [row] = await this.db
      .select()
      .from(subjects)
      .where(eq(subjects.externalSubjectId, externalId))
      .limit(1);
    return row ?? null;
  }

  listSubjects() {
    return this.db
      .select()
      .from(subjects)
      .orderBy(asc(subjects.createdAt), asc(subjects.externalSubjectId));
  }

  ////////////////////////////////////////////////////////////////
  // Reports
  ////////////////////////////////////////////////////////////////

  async insertReport(report: Report) {
    await guardUnique(() => this.db.insert(reports).values(report));
    return report;
  }

  async findReportById(id: string) {
    const [row] = await this.db
      .select()
      .from(reports)
      .where(eq(reports.id, id))
      .limit(1);
    return row ?? null;
  }

  async findCanonicalReportByHash(contentHash: string) {
    const [row] = await this.db
      .select()
      .from(reports)
      .where(
        and(
          eq(reports.contentHash, contentHash),
          isNull(reports.duplicateOfReportId),
        ),
      )
      .limit(1);
    return row ?? null;
  }

  listReports(filter: ReportFilter = {}) {
    const conditions: SQL[] = [];
    if (filter.subjectId) conditions.push(eq(reports.subjectId, filter.subjectId));
    if (filter.status) conditions.push(eq(reports.status, filter.status));

    return this.db
      .select()
      .from(reports)
      .where(and(...conditions))
      .orderBy(asc(reports.createdAt), asc(reports.id));
  }

  async updateReportStatus({ id, expectedStatus, patch }: GuardedStatusUpdate) {
    const [row] = await this.db
      .update(reports)
      .set(patch)
      .where(and(eq(reports.id, id), eq(reports.status, expectedStatus)))
      .returning();
    return row ?? null;
  }

  ////////////////////////////////////////////////////////////////
  // Status events
  ////////////////////////////////////////////////////////////////

  async insertStatusEvent(event: ReportStatusEvent) {
    await guardUnique(() => this.db.insert(reportStatusEvents).values(event));
    return event;
  }

  async countStatusEvents(reportId: string) {
    const [row] = await this.db
      .select({ value: count() })
      .from(reportStatusEvents)
      .where(eq(reportStatusEvents.reportId, reportId));
    return row?.value ?? 0;
  }

  listStatusEvents(reportId: string) {
    return this.db
      .select()
      .from(reportStatusEvents)
      .where(eq(reportStatusEvents.reportId, reportId))
      .orderBy(asc(reportStatusEvents.sequence));
  }

  ////////////////////////////////////////////////////////////////
  // Versions + edits
  ////////////////////////////////////////////////////////////////

  async insertVersion(version: StructuredVersion) {
    await guardUnique(() => this.db.insert(structuredVersions).values(version));
    return version;
  }

  async countVersions(reportId: string) {
    const [row] = await this.db
      .select({ value: count() })
      .from(structuredVersions)
      .where(eq(structuredVersions.reportId, reportId));
    return row?.value ?? 0;
  }

  listVersions(reportId: string) {
    return this.db
      .select()
      .from(structuredVersions)
      .where(eq(structuredVersions.reportId, reportId))
      .orderBy(asc(structuredVersions.versionNumber));
  }

  async findVersion(reportId: string, versionNumber: number) {
    const [row] = await this.db
      .select()
      .from(structuredVersions)
      .where(
        and(
          eq(structuredVersions.reportId, reportId),
          eq(structuredVersions.versionNumber, versionNumber),
        ),
      )
      .limit(1);
    return row ?? null;
  }

  async findLatestValidVersion(reportId: string) {
    const [row] = await this.db
      .select()
      .from(structuredVersions)
      .where(
        and(
          eq(structuredVersions.reportId, reportId),
          eq(structuredVersions.validationStatus, "valid"),
        ),
      )
      .orderBy(desc(structuredVersions.versionNumber))
      .limit(1);
    return row ?? null;
  }

  async insertEdits(entries: EditHistoryEntry[]) {
    if (entries.length === 0) return [];
    await guardUnique(() => this.db.insert(editHistoryEntries).values(entries));
    return entries;
  }

  listEdits(versionId: string) {
    return this.db
      .select()
      .from(editHistoryEntries)
      .where(eq(editHistoryEntries.versionId, versionId))
      .orderBy(asc(editHistoryEntries.position));
  }

  ////////////////////////////////////////////////////////////////
  // Artifacts
  ////////////////////////////////////////////////////////////////

  async insertArtifact(artifact: BundleArtifact) {
    await guardUnique(() => this.db.insert(bundleArtifacts).values(artifact));
    return artifact;
  }

  async findLatestArtifact(reportId: string) {
    const [row] = await this.db
      .select()
      .from(bundleArtifacts)
      .where(eq(bundleArtifacts.reportId, reportId))
      .orderBy(desc(bundleArtifacts.revision))
      .limit(1);
    return row ?? null;
  }

  listArtifacts(reportId: string) {
    return this.db
      .select()
      .from(bundleArtifacts)
      .where(eq(bundleArtifacts.reportId, reportId))
      .orderBy(asc(bundleArtifacts.revision));
  }
}

export class DrizzleLabStore extends DrizzleLabStoreTx implements LabStore {
  async transaction<T, E>(
    fn: (tx: LabStoreTx) => Promise<Result<T, E>>,
  ): Promise<Result<T, E>> {
    // drizzle only rolls back by throwing; remember the Err to hand it back
    const outcome: { rollback?: Err<E> } = {};

    try {
      return await this.db.transaction(async (tx) => {
        const result = await fn(new DrizzleLabStoreTx(tx));
        if (!result.ok) {
          outcome.rollback = result;
          tx.rollback();
        }
        return result;
      });
    } catch (error) {
      if (error instanceof TransactionRollbackError && outcome.rollback) {
        return outcome.rollback;
      }
      throw error;
    }
  }
}
