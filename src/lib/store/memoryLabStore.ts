// src/lib/store/memoryLabStore.ts
// In-process LabStore for MOCK mode and tests. Mirrors the Postgres unique indexes.

import type { Result } from "@/lib/errors/result";
import type {
  BundleArtifact,
  EditHistoryEntry,
  Report,
  ReportStatusEvent,
  StructuredVersion,
  SubjectProfile,
} from "@/lib/db/schema";
import type {
  GuardedStatusUpdate,
  LabStore,
  LabStoreTx,
  ReportFilter,
} from "./labStore";
import { UniqueConstraintError } from "./store.errors";

type Tables = {
  subjects: Map<string, SubjectProfile>;
  reports: Map<string, Report>;
  statusEvents: Map<string, ReportStatusEvent>;
  versions: Map<string, StructuredVersion>;
  edits: Map<string, EditHistoryEntry>;
  artifacts: Map<string, BundleArtifact>;
};

type Undo = () => void;

function emptyTables(): Tables {
  return {
    subjects: new Map(),
    reports: new Map(),
    statusEvents: new Map(),
    versions: new Map(),
    edits: new Map(),
    artifacts: new Map(),
  };
}

function byNumber<T>(key: (row: T) => number) {
  return (a: T, b: T) => key(a) - key(b);
}

// rows go in and come out as deep copies; payload and bundle columns are nested JSON
function copy<T extends object>(row: T): T {
  return structuredClone(row);
}

class MemoryLabStoreTx implements LabStoreTx {
  constructor(
    protected readonly tables: Tables,
    private readonly journal: Undo[] | null,
  ) {}

  private record(undo: Undo) {
    this.journal?.push(undo);
  }

  private insertRow<T extends { id: string }>(
    table: Map<string, T>,
    row: T,
  ): T {
    table.set(row.id, copy(row));
    this.record(() => table.delete(row.id));
    return copy(row);
  }

  ////////////////////////////////////////////////////////////////
  // Subjects
  ////////////////////////////////////////////////////////////////

  async insertSubject(subject: SubjectProfile) {
    for (const existing of this.tables.subjects.values()) {
      if (existing.externalSubjectId === subject.externalSubjectId) {
        throw new UniqueConstraintError("subjects_external_subject_id_unique");
      }
    }
    return this.insertRow(this.tables.subjects, subject);
  }

  async findSubjectById(id: string) {
    const row = this.tables.subjects.get(id);
    return row ? copy(row) : null;
  }

  async findSubjectByExternalId(externalId: string) {
    for (const row of this.tables.subjects.values()) {
      if (row.externalSubjectId === externalId) return copy(row);
    }
    return null;
  }

  async listSubjects() {
    return [...this.tables.subjects.values()].map(copy);
  }

  ////////////////////////////////////////////////////////////////
  // Reports
  ////////////////////////////////////////////////////////////////

  async insertReport(report: Report) {
    if (
      report.duplicateOfReportId === null &&
      (await this.findCanonicalReportByHash(report.contentHash))
    ) {
      throw new UniqueConstraintError("reports_canonical_content_hash_uq");
    }
    return this.insertRow(this.tables.reports, report);
  }

  async findReportById(id: string) {
    const row = this.tables.reports.get(id);
    return row ? copy(row) : null;
  }

  async findCanonicalReportByHash(contentHash: string) {
    for (const row of this.tables.reports.values()) {
      if (row.contentHash === contentHash && row.duplicateOfReportId === null) {
        return copy(row);
      }
    }
    return null;
  }

  async listReports(filter: ReportFilter = {}) {
    return [...this.tables.reports.values()]
      .filter(
        (r) =>
          (!filter.subjectId || r.subjectId === filter.subjectId) &&
          (!filter.status || r.status === filter.status),
      )
      .map(copy);
  }

  async updateReportStatus({ id, expectedStatus, patch }: GuardedStatusUpdate) {
    const current = this.tables.reports.get(id);
    if (!current || current.status !== expectedStatus) return null;

    const next: Report = { ...current, ...patch };
    this.tables.reports.set(id, next);
    this.record(() => this.tables.reports.set(id, current));
    return copy(next);
  }

  ////////////////////////////////////////////////////////////////
  // Status events
  ////////////////////////////////////////////////////////////////

  async insertStatusEvent(event: ReportStatusEvent) {
    for (const existing of this.tables.statusEvents.values()) {
      if (
        existing.reportId === event.reportId &&
        existing.sequence === event.sequence
      ) {
        throw new UniqueConstraintError("report_status_events_report_sequence_uq");
      }
    }
    return this.insertRow(this.tables.statusEvents, event);
  }

  async countStatusEvents(reportId: string) {
    return (await this.listStatusEvents(reportId)).length;
  }

  async listStatusEvents(reportId: string) {
    return [...this.tables.statusEvents.values()]
      .filter((e) => e.reportId === reportId)
      .sort(byNumber((e) => e.sequence))
      .map(copy);
  }

  ////////////////////////////////////////////////////////////////
  // Versions + edits
  ////////////////////////////////////////////////////////////////

  async insertVersion(version: StructuredVersion) {
    if (await this.findVersion(version.reportId, version.versionNumber)) {
      throw new UniqueConstraintError("structured_versions_report_number_uq");
    }
    return this.insertRow(this.tables.versions, version);
  }

  async countVersions(reportId: string) {
    return (await this.listVersions(reportId)).length;
  }

  async listVersions(reportId: string) {
    return [...this.tables.versions.values()]
      .filter((v) => v.reportId === reportId)
      .sort(byNumber((v) => v.versionNumber))
      .map(copy);
  }

  async findVersion(reportId: string, versionNumber: number) {
    const versions = await this.listVersions(reportId);
    return versions.find((v) => v.versionNumber === versionNumber) ?? null;
  }

  async findLatestValidVersion(reportId: string) {
    const valid = (await this.listVersions(reportId)).filter(
      (v) => v.validationStatus === "valid",
    );
    return valid.at(-1) ?? null;
  }

  async insertEdits(entries: EditHistoryEntry[]) {
    const taken = new Set(
      [...this.tables.edits.values()].map((e) => `${e.versionId}:${e.position}`),
    );
    for (const entry of entries) {
      const key = `${entry.versionId}:${entry.position}`;
      if (taken.has(key)) {
        throw new UniqueConstraintError("edit_history_entries_version_position_uq");
      }
      taken.add(key);
    }
    return entries.map((entry) => this.insertRow(this.tables.edits, entry));
  }

  async listEdits(versionId: string) {
    return [...this.tables.edits.values()]
      .filter((e) => e.versionId === versionId)
      .sort(byNumber((e) => e.position))
      .map(copy);
  }

  ////////////////////////////////////////////////////////////////
  // Artifacts
  ////////////////////////////////////////////////////////////////

  async insertArtifact(artifact: BundleArtifact) {
    const taken = (await this.listArtifacts(artifact.reportId)).some(
      (a) => a.revision === artifact.revision,
    );
    if (taken) {
      throw new UniqueConstraintError("bundle_artifacts_report_revision_uq");
    }
    return this.insertRow(this.tables.artifacts, artifact);
  }

  async findLatestArtifact(reportId: string) {
    return (await this.listArtifacts(reportId)).at(-1) ?? null;
  }

  async listArtifacts(reportId: string) {
    return [...this.tables.artifacts.values()]
      .filter((a) => a.reportId === reportId)
      .sort(byNumber((a) => a.revision))
      .map(copy);
  }
}

export class MemoryLabStore extends MemoryLabStoreTx implements LabStore {
  private queue: Promise<unknown> = Promise.resolve();

  constructor(tables: Tables = emptyTables()) {
    super(tables, null);
  }

  /**
   * Transactions run one at a time. Each keeps an undo journal that is
   * replayed in reverse when `fn` returns an Err or throws.
   */
  transaction<T, E>(
    fn: (tx: LabStoreTx) => Promise<Result<T, E>>,
  ): Promise<Result<T, E>> {
    const run = this.queue.then(() => this.runIsolated(fn));
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async runIsolated<T, E>(
    fn: (tx: LabStoreTx) => Promise<Result<T, E>>,
  ): Promise<Result<T, E>> {
    const journal: Undo[] = [];
    const rollback = () => {
      for (const undo of journal.reverse()) undo();
    };

    try {
      const result = await fn(new MemoryLabStoreTx(this.tables, journal));
      if (!result.ok) rollback();
      return result;
    } catch (error) {
      rollback();
      throw error;
    }
  }
}
