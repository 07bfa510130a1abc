// src/modules/reports/ReportStatus.ts
// Purpose: Canonical report status vocabulary shared by the db schema, the state machine and the API.

export const REPORT_STATUSES = [
  "uploaded",
  "parsing",
  "review_pending",
  "editing",
  "generating_bundle",
  "regenerating_bundle",
  "completed",
  "failed",
  "duplicate",
] as const;

export type ReportStatus = (typeof REPORT_STATUSES)[number];

export const ReportStatus = {
  UPLOADED: "uploaded",
  PARSING: "parsing",
  REVIEW_PENDING: "review_pending",
  EDITING: "editing",
  GENERATING_BUNDLE: "generating_bundle",
  REGENERATING_BUNDLE: "regenerating_bundle",
  COMPLETED: "completed",
  FAILED: "failed",
  DUPLICATE: "duplicate",
} as const satisfies Record<string, ReportStatus>;
