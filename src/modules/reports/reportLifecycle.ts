// src/modules/reports/reportLifecycle.ts
// Purpose: Pure lookups over the transition table. No persistence here.

import { err, ok, type Result } from "@/lib/errors/result";
import { REPORT_STATUS_TRANSITIONS } from "./reportLifecycle.transitions";
import { ReportStatus } from "./ReportStatus";
import { IllegalStatusTransitionError } from "./report.errors";

export function canTransition(from: ReportStatus, to: ReportStatus): boolean {
  return REPORT_STATUS_TRANSITIONS[from].includes(to);
}

/**
 * Succeeds without side effects when the move is legal.
 * Writing the new status is the caller's job, and only after this passes.
 */
export function validateTransition(
  from: ReportStatus,
  to: ReportStatus,
  reportId?: string,
): Result<void, IllegalStatusTransitionError> {
  if (!canTransition(from, to)) {
    return err(new IllegalStatusTransitionError(from, to, reportId));
  }
  return ok(undefined);
}

export function allowedTransitions(status: ReportStatus): ReportStatus[] {
  return [...REPORT_STATUS_TRANSITIONS[status]];
}

export function isTerminalStatus(status: ReportStatus): boolean {
  return REPORT_STATUS_TRANSITIONS[status].length === 0;
}

const PROCESSING: ReadonlySet<ReportStatus> = new Set([
  ReportStatus.PARSING,
  ReportStatus.GENERATING_BUNDLE,
  ReportStatus.REGENERATING_BUNDLE,
]);

const USER_ACTIONABLE: ReadonlySet<ReportStatus> = new Set([
  ReportStatus.REVIEW_PENDING,
  ReportStatus.EDITING,
  ReportStatus.FAILED,
]);

export type ReportStatusMetadata = {
  status: ReportStatus;
  isTerminal: boolean;
  allowedTransitions: ReportStatus[];
  isProcessing: boolean;
  isUserActionable: boolean;
  isSuccess: boolean;
  isError: boolean;
};

export function statusMetadata(status: ReportStatus): ReportStatusMetadata {
  return {
    status,
    isTerminal: isTerminalStatus(status),
    allowedTransitions: allowedTransitions(status),
    isProcessing: PROCESSING.has(status),
    isUserActionable: USER_ACTIONABLE.has(status),
    isSuccess: status === ReportStatus.COMPLETED,
    isError: status === ReportStatus.FAILED,
  };
}
