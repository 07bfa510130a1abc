// src/modules/reports/transitionReportStatus.ts
// The only writer of Report.status. Read, validate, guarded write, audit event.

import type { Clock } from "@/lib/clock";
import { err, ok, type Result } from "@/lib/errors/result";
import type { Report, ReportStatusEvent } from "@/lib/db/schema";
import type { LabStoreTx } from "@/lib/store/labStore";
import { log } from "@/lib/observability/logger";
import { newId } from "@/utils/uuid";
import { validateTransition } from "./reportLifecycle";
import { ReportStatus } from "./ReportStatus";
import {
  ConcurrentModificationError,
  IllegalStatusTransitionError,
  ReportNotFoundError,
} from "./report.errors";

export type ReportFailure = {
  code: string;
  message: string;
};

export type StatusTransitionInput = {
  reportId: string;
  to: ReportStatus;
  actor: string;
  /** Recorded only when `to` is failed. */
  error?: ReportFailure;
};

export type StatusTransitionError =
  | ReportNotFoundError
  | IllegalStatusTransitionError
  | ConcurrentModificationError;

/**
 * Appends the audit row for a status write.
 * `fromStatus` is null for the status a report is created in.
 */
export async function appendStatusEvent(
  tx: LabStoreTx,
  event: Omit<ReportStatusEvent, "id" | "sequence">,
): Promise<ReportStatusEvent> {
  const sequence = (await tx.countStatusEvents(event.reportId)) + 1;
  return tx.insertStatusEvent({ id: newId(), sequence, ...event });
}

export async function transitionReportStatus(
  tx: LabStoreTx,
  clock: Clock,
  input: StatusTransitionInput,
): Promise<Result<Report, StatusTransitionError>> {
  ////////////////////////////////////////////////////////////////
  // 1) Load current status
  ////////////////////////////////////////////////////////////////

  const current = await tx.findReportById(input.reportId);
  if (!current) return err(new ReportNotFoundError(input.reportId));

  ////////////////////////////////////////////////////////////////
  // 2) Closed transition law
  ////////////////////////////////////////////////////////////////

  const allowed = validateTransition(current.status, input.to, current.id);
  if (!allowed.ok) return allowed;

  ////////////////////////////////////////////////////////////////
  // 3) Guarded write (status must still be what we read)
  ////////////////////////////////////////////////////////////////

  const failure = input.to === ReportStatus.FAILED ? input.error : undefined;
  const now = clock.now();

  const updated = await tx.updateReportStatus({
    id: current.id,
    expectedStatus: current.status,
    patch: {
      status: input.to,
      errorCode: failure?.code ?? null,
      errorMessage: failure?.message ?? null,
      updatedAt: now,
    },
  });

  if (!updated) {
    log("WARN", "REPORT_STATUS_CONFLICT", {
      from: current.status,
      to: input.to,
    });
    return err(new ConcurrentModificationError(current.id));
  }

  ////////////////////////////////////////////////////////////////
  // 4) Audit
  ////////////////////////////////////////////////////////////////

  await appendStatusEvent(tx, {
    reportId: current.id,
    fromStatus: current.status,
    toStatus: input.to,
    actor: input.actor,
    errorCode: failure?.code ?? null,
    occurredAt: now,
  });

  log("INFO", "REPORT_STATUS_TRANSITION", {
    from: current.status,
    to: input.to,
    actor: input.actor,
    ...(failure ? { errorCode: failure.code } : {}),
  });

  return ok(updated);
}
