// src/modules/versions/versionLedger.service.ts
// Append-only history of structured payloads and the field edits between them.

import type { Clock } from "@/lib/clock";
import { err, ok, type Result } from "@/lib/errors/result";
import type {
  EditHistoryEntry,
  StructuredVersion,
  VersionKind,
} from "@/lib/db/schema";
import type { LabStoreTx } from "@/lib/store/labStore";
import {
  VersionNotFoundError,
  type ValidationIssue,
} from "@/modules/reports/report.errors";
import type { JsonValue } from "@/shared/json/jsonBoundary";
import { newId } from "@/utils/uuid";
import type { FieldChange } from "./payloadDiff";
import type { StructuredPayload } from "./structuredPayload.schema";

export type VersionValidation =
  | { status: "valid" }
  | { status: "invalid"; issues: ValidationIssue[] };

export type AppendVersionInput = {
  reportId: string;
  payload: StructuredPayload;
  kind: VersionKind;
  validation: VersionValidation;
  author: string;
};

////////////////////////////////////////////////////////////////
// Versions
////////////////////////////////////////////////////////////////

/**
 * Numbers are dense per report: 1 + the count already stored.
 * Callers hold the report lock, and the (report, number) unique index
 * rejects any append that slipped past it.
 */
export async function appendVersion(
  tx: LabStoreTx,
  clock: Clock,
  input: AppendVersionInput,
): Promise<StructuredVersion> {
  const existing = await tx.countVersions(input.reportId);

  return tx.insertVersion({
    id: newId(),
    reportId: input.reportId,
    versionNumber: existing + 1,
    versionKind: input.kind,
    schemaVersion: input.payload.schema_version,
    payload: input.payload,
    validationStatus: input.validation.status,
    validationErrors:
      input.validation.status === "invalid" ? input.validation.issues : null,
    createdBy: input.author,
    createdAt: clock.now(),
  });
}

export function listVersions(
  store: LabStoreTx,
  reportId: string,
): Promise<StructuredVersion[]> {
  return store.listVersions(reportId);
}

export async function getVersion(
  store: LabStoreTx,
  reportId: string,
  versionNumber: number,
): Promise<Result<StructuredVersion, VersionNotFoundError>> {
  const version = await store.findVersion(reportId, versionNumber);
  if (!version) return err(new VersionNotFoundError(reportId, versionNumber));
  return ok(version);
}

export function latestValid(
  store: LabStoreTx,
  reportId: string,
): Promise<StructuredVersion | null> {
  return store.findLatestValidVersion(reportId);
}

////////////////////////////////////////////////////////////////
// Edit history
////////////////////////////////////////////////////////////////

export type RecordEditInput = {
  versionId: string;
  fieldPath: string;
  oldValue: JsonValue;
  newValue: JsonValue;
  author: string;
};

export async function recordEdit(
  tx: LabStoreTx,
  clock: Clock,
  input: RecordEditInput,
): Promise<EditHistoryEntry> {
  const position = (await tx.listEdits(input.versionId)).length;

  const [entry] = await tx.insertEdits([
    {
      id: newId(),
      versionId: input.versionId,
      position,
      fieldPath: input.fieldPath,
      oldValue: input.oldValue,
      newValue: input.newValue,
      editedBy: input.author,
      editedAt: clock.now(),
    },
  ]);
  return entry;
}

/** Stores one entry per change, in diff order, sharing one timestamp. */
export function recordEdits(
  tx: LabStoreTx,
  clock: Clock,
  input: { versionId: string; changes: FieldChange[]; author: string },
): Promise<EditHistoryEntry[]> {
  const editedAt = clock.now();

  return tx.insertEdits(
    input.changes.map((change, position) => ({
      id: newId(),
      versionId: input.versionId,
      position,
      fieldPath: change.fieldPath,
      oldValue: change.oldValue,
      newValue: change.newValue,
      editedBy: input.author,
      editedAt,
    })),
  );
}

export function listEdits(
  store: LabStoreTx,
  versionId: string,
): Promise<EditHistoryEntry[]> {
  return store.listEdits(versionId);
}
