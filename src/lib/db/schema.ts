// src/lib/db/schema.ts
// Postgres tables for subjects, reports and their append-only history.

import { sql } from "drizzle-orm";
import {
  integer,
  jsonb,
  pgTable,
  text,
  timestamp,
  uniqueIndex,
  index,
  uuid,
  type AnyPgColumn,
} from "drizzle-orm/pg-core";
import { REPORT_STATUSES } from "@/modules/reports/ReportStatus";
import type { ValidationIssue } from "@/modules/reports/report.errors";
import type { StructuredPayload } from "@/modules/versions/structuredPayload.schema";
import type { JsonValue } from "@/shared/json/jsonBoundary";

export const SUBJECT_TYPES = ["human", "veterinary"] as const;
export const VERSION_KINDS = ["original", "corrected"] as const;
export const VALIDATION_STATUSES = ["valid", "invalid"] as const;
export const GENERATION_MODES = ["initial", "regeneration"] as const;

export type SubjectType = (typeof SUBJECT_TYPES)[number];
export type VersionKind = (typeof VERSION_KINDS)[number];
export type ValidationStatus = (typeof VALIDATION_STATUSES)[number];
export type GenerationMode = (typeof GENERATION_MODES)[number];

const createdAt = () =>
  timestamp("created_at", { withTimezone: true, mode: "date" }).notNull();

// ============== SUBJECTS ==============
export const subjects = pgTable("subjects", {
  id: uuid("id").primaryKey(),
  externalSubjectId: text("external_subject_id").notNull().unique(),
  displayName: text("display_name").notNull(),
  subjectType: text("subject_type", { enum: SUBJECT_TYPES })
    .notNull()
    .default("human"),
  createdAt: createdAt(),
});

export type SubjectProfile = typeof subjects.$inferSelect;

// ============== REPORTS ==============
export const reports = pgTable(
  "reports",
  {
    id: uuid("id").primaryKey(),
    subjectId: uuid("subject_id")
      .notNull()
      .references(() => subjects.id),
    originalFilename: text("original_filename").notNull(),
    mediaType: text("media_type").notNull(),
    contentHash: text("content_hash").notNull(),
    byteSize: integer("byte_size").notNull(),
    status: text("status", { enum: REPORT_STATUSES }).notNull(),
    errorCode: text("error_code"),
    errorMessage: text("error_message"),
    duplicateOfReportId: uuid("duplicate_of_report_id").references(
      (): AnyPgColumn => reports.id,
    ),
    createdAt: createdAt(),
    updatedAt: timestamp("updated_at", {
      withTimezone: true,
      mode: "date",
    }).notNull(),
  },
  (t) => [
    // one canonical report per content hash
    uniqueIndex("reports_canonical_content_hash_uq")
      .on(t.contentHash)
      .where(sql`${t.duplicateOfReportId} is null`),
    index("reports_subject_id_idx").on(t.subjectId),
    index("reports_status_idx").on(t.status),
  ],
);

export type Report = typeof reports.$inferSelect;

// ============== STATUS EVENTS ==============
export const reportStatusEvents = pgTable(
  "report_status_events",
  {
    id: uuid("id").primaryKey(),
    reportId: uuid("report_id")
      .notNull()
      .references(() => reports.id),
    sequence: integer("sequence").notNull(),
    fromStatus: text("from_status", { enum: REPORT_STATUSES }),
    toStatus: text("to_status", { enum: REPORT_STATUSES }).notNull(),
    actor: text("actor").notNull(),
    errorCode: text("error_code"),
    occurredAt: timestamp("occurred_at", {
      withTimezone: true,
      mode: "date",
    }).notNull(),
  },
  (t) => [
    uniqueIndex("report_status_events_report_sequence_uq").on(
      t.reportId,
      t.sequence,
    ),
  ],
);

export type ReportStatusEvent = typeof reportStatusEvents.$inferSelect;

// ============== STRUCTURED VERSIONS ==============
export const structuredVersions = pgTable(
  "structured_versions",
  {
    id: uuid("id").primaryKey(),
    reportId: uuid("report_id")
      .notNull()
      .references(() => reports.id),
    versionNumber: integer("version_number").notNull(),
    versionKind: text("version_kind", { enum: VERSION_KINDS }).notNull(),
    schemaVersion: text("schema_version").notNull(),
    payload: jsonb("payload").$type<StructuredPayload>().notNull(),
    validationStatus: text("validation_status", {
      enum: VALIDATION_STATUSES,
    }).notNull(),
    validationErrors: jsonb("validation_errors").$type<ValidationIssue[]>(),
    createdBy: text("created_by").notNull(),
    createdAt: createdAt(),
  },
  (t) => [
    uniqueIndex("structured_versions_report_number_uq").on(
      t.reportId,
      t.versionNumber,
    ),
  ],
);

export type StructuredVersion = typeof structuredVersions.$inferSelect;

// ============== EDIT HISTORY ==============
export const editHistoryEntries = pgTable(
  "edit_history_entries",
  {
    id: uuid("id").primaryKey(),
    versionId: uuid("version_id")
      .notNull()
      .references(() => structuredVersions.id),
    position: integer("position").notNull(),
    fieldPath: text("field_path").notNull(),
    oldValue: jsonb("old_value").$type<JsonValue>(),
    newValue: jsonb("new_value").$type<JsonValue>(),
    editedBy: text("edited_by").notNull(),
    editedAt: timestamp("edited_at", {
      withTimezone: true,
      mode: "date",
    }).notNull(),
  },
  (t) => [
    index("edit_history_entries_version_id_idx").on(t.versionId),
    uniqueIndex("edit_history_entries_version_position_uq").on(
      t.versionId,
      t.position,
    ),
  ],
);

export type EditHistoryEntry = typeof editHistoryEntries.$inferSelect;

// ============== BUNDLE ARTIFACTS ==============
export const bundleArtifacts = pgTable(
  "bundle_artifacts",
  {
    id: uuid("id").primaryKey(),
    reportId: uuid("report_id")
      .notNull()
      .references(() => reports.id),
    versionId: uuid("version_id")
      .notNull()
      .references(() => structuredVersions.id),
    revision: integer("revision").notNull(),
    bundle: jsonb("bundle").$type<fhir4.Bundle>().notNull(),
    contentHash: text("content_hash").notNull(),
    generationMode: text("generation_mode", {
      enum: GENERATION_MODES,
    }).notNull(),
    supersedesArtifactId: uuid("supersedes_artifact_id").references(
      (): AnyPgColumn => bundleArtifacts.id,
    ),
    generatedAt: timestamp("generated_at", {
      withTimezone: true,
      mode: "date",
    }).notNull(),
  },
  (t) => [
    uniqueIndex("bundle_artifacts_report_revision_uq").on(
      t.reportId,
      t.revision,
    ),
  ],
);

export type BundleArtifact = typeof bundleArtifacts.$inferSelect;
