// src/_test_/fixtures.ts
// Shared builders for unit and HTTP tests. Nothing here touches the network.

import type { Clock } from "@/lib/clock";
import type { Result } from "@/lib/errors/result";
import { MemoryLabStore } from "@/lib/store/memoryLabStore";
import { InProcessReportLock } from "@/modules/pipeline/reportLock";
import { ReportPipeline } from "@/modules/pipeline/reportPipeline.service";
import { SubjectService } from "@/modules/subjects/subjects.service";
import type { StructuredPayloadInput } from "@/modules/versions/structuredPayload.schema";

export const FIXED_NOW = new Date("2024-06-01T12:00:00.000Z");

export function fixedClock(at: Date = FIXED_NOW): Clock {
  return { now: () => new Date(at.getTime()) };
}

export function glucosePayload(value = 95): StructuredPayloadInput {
  return {
    schema_version: "1.0",
    subject_identifier: "S1",
    report_date: "2024-01-15T10:00:00Z",
    performing_lab: "Central Lab",
    measurements: [
      {
        original_analyte_name: "Glucose",
        normalized_analyte_code: "GLUCOSE",
        value_type: "numeric",
        numeric_value: value,
        original_unit: "mg/dL",
        normalized_unit: "mg/dL",
        reference_range_text: "70-99",
        collection_datetime: "2024-01-15T08:00:00Z",
      },
    ],
  };
}

export function panelPayload(): StructuredPayloadInput {
  return {
    schema_version: "1.0",
    report_date: "2024-01-15T10:00:00Z",
    measurements: [
      {
        original_analyte_name: "Glucose",
        normalized_analyte_code: "GLUCOSE",
        value_type: "numeric",
        numeric_value: 95,
        original_unit: "mg/dL",
        collection_datetime: "2024-01-15T08:00:00Z",
      },
      {
        original_analyte_name: "HbA1c",
        normalized_analyte_code: "HBA1C",
        value_type: "operator_numeric",
        operator: "<",
        numeric_value: 5.7,
        original_unit: "%",
        collection_datetime: "2024-01-15T08:00:00Z",
      },
      {
        original_analyte_name: "Urine Culture",
        value_type: "qualitative",
        qualitative_value: "Negative",
        collection_datetime: "2024-01-15T08:00:00Z",
        result_datetime: "2024-01-17T09:30:00Z",
      },
    ],
  };
}

export const PDF_BYTES = Buffer.from("%PDF-1.4 sample lab report");

export function buildHarness(clock: Clock = fixedClock()) {
  const store = new MemoryLabStore();
  const lock = new InProcessReportLock();
  const pipeline = new ReportPipeline({
    store,
    lock,
    clock,
    allowedMediaTypes: ["application/pdf"],
  });
  const subjects = new SubjectService(store, clock);
  return { store, lock, clock, pipeline, subjects };
}

export async function seedSubject(
  subjects: SubjectService,
  externalSubjectId = "S1",
) {
  const created = await subjects.createSubject({
    externalSubjectId,
    displayName: "Rex",
    subjectType: "veterinary",
  });
  if (!created.ok) throw created.error;
  return created.value;
}

export function unwrap<T, E>(result: Result<T, E>): T {
  if (!result.ok) throw new Error(`expected ok, got ${String(result.error)}`);
  return result.value;
}

export function unwrapErr<T, E>(result: Result<T, E>): E {
  if (result.ok) throw new Error("expected an error result");
  return result.error;
}
