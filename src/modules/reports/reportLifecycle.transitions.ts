// src/modules/reports/reportLifecycle.transitions.ts
// Purpose: Closed transition table for report status.

import { ReportStatus } from "./ReportStatus";

/**
 * If it is not declared here, it does not exist.
 *
 * `duplicate` maps to [] and is the only terminal status.
 * `completed` and `failed` stay re-enterable (regeneration, edits, retries).
 */
export const REPORT_STATUS_TRANSITIONS: Record<
  ReportStatus,
  readonly ReportStatus[]
> = {
  [ReportStatus.UPLOADED]: [
    ReportStatus.PARSING,
    ReportStatus.FAILED,
    ReportStatus.DUPLICATE,
  ],

  [ReportStatus.PARSING]: [ReportStatus.REVIEW_PENDING, ReportStatus.FAILED],

  [ReportStatus.REVIEW_PENDING]: [
    ReportStatus.EDITING,
    ReportStatus.GENERATING_BUNDLE,
    ReportStatus.FAILED,
  ],

  [ReportStatus.EDITING]: [
    ReportStatus.REVIEW_PENDING,
    ReportStatus.GENERATING_BUNDLE,
    ReportStatus.FAILED,
  ],

  [ReportStatus.GENERATING_BUNDLE]: [ReportStatus.COMPLETED, ReportStatus.FAILED],

  [ReportStatus.REGENERATING_BUNDLE]: [
    ReportStatus.COMPLETED,
    ReportStatus.FAILED,
  ],

  [ReportStatus.COMPLETED]: [
    ReportStatus.REGENERATING_BUNDLE,
    ReportStatus.EDITING,
  ],

  // explicit retry re-entry points only
  [ReportStatus.FAILED]: [ReportStatus.PARSING, ReportStatus.GENERATING_BUNDLE],

  [ReportStatus.DUPLICATE]: [],
};
