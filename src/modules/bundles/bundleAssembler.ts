// src/modules/bundles/bundleAssembler.ts
// Purpose: Deterministic FHIR R4 transaction bundle from one validated structured version.
//
// Same subject + report + version in, byte-identical canonical bundle out.
// No clock, no random ids: every id and timestamp is derived from the inputs.

import {
  CODE_SYSTEMS,
  LAB_REPORT_LOINC,
} from "@/constants/system.constants";
import { err, ok, type Result } from "@/lib/errors/result";
import type {
  Report,
  StructuredVersion,
  SubjectProfile,
} from "@/lib/db/schema";
import {
  diagnosticReportId,
  documentReferenceId,
  hexToBase64,
  observationId,
} from "@/modules/determinism/determinism";
import {
  DEFAULT_UNIT_TABLE,
  normalizeAnalyteName,
  normalizeUnit,
  type UnitTable,
} from "@/modules/determinism/normalization";
import { BundleGenerationError } from "@/modules/reports/report.errors";
import type { Measurement } from "@/modules/versions/structuredPayload.schema";
import { sha256Hex, stableStringify } from "@/utils/sha256";
import { UnknownValueKindError } from "./bundle.errors";
import defaultLoincTable from "./loinc-map.json";

export type LoincEntry = { code: string; display: string };
export type LoincTable = Readonly<Record<string, LoincEntry>>;

export const DEFAULT_LOINC_TABLE: LoincTable = defaultLoincTable;

export type AssembleBundleInput = {
  report: Pick<Report, "contentHash" | "mediaType" | "originalFilename">;
  subject: Pick<SubjectProfile, "id" | "externalSubjectId" | "displayName">;
  version: Pick<StructuredVersion, "payload">;
  loincTable?: LoincTable;
  unitTable?: UnitTable;
};

export type AssembledBundle = {
  bundle: fhir4.Bundle;
  contentHash: string;
};

const OBSERVATION_CATEGORY: fhir4.CodeableConcept = {
  coding: [
    {
      system: "http://terminology.hl7.org/CodeSystem/observation-category",
      code: "laboratory",
      display: "Laboratory",
    },
  ],
};

////////////////////////////////////////////////////////////////
// Helpers
////////////////////////////////////////////////////////////////

function canonicalInstant(value: string): string {
  return new Date(value).toISOString();
}

function measurementPath(index: number, field?: string): string {
  return field ? `measurements[${index}].${field}` : `measurements[${index}]`;
}

function lookupLoinc(
  code: string | null | undefined,
  table: LoincTable,
): LoincEntry | undefined {
  if (!code) return undefined;
  const key = normalizeAnalyteName(code);
  return Object.hasOwn(table, key) ? table[key] : undefined;
}

function analyteConcept(
  m: Measurement,
  table: LoincTable,
): fhir4.CodeableConcept {
  const loinc = lookupLoinc(m.normalized_analyte_code, table);

  if (loinc) {
    return {
      coding: [
        { system: CODE_SYSTEMS.LOINC, code: loinc.code, display: loinc.display },
      ],
      text: m.original_analyte_name,
    };
  }

  return {
    coding: [
      {
        system: CODE_SYSTEMS.ANALYTE,
        code: m.normalized_analyte_code ?? m.original_analyte_name,
        display: m.original_analyte_name,
      },
    ],
    text: m.original_analyte_name,
  };
}

function quantity(value: number, unit: string | null): fhir4.Quantity {
  if (!unit) return { value };
  return { value, unit, system: CODE_SYSTEMS.UCUM, code: unit };
}

type ObservationValue = Pick<
  fhir4.Observation,
  "valueQuantity" | "valueString" | "interpretation"
>;

function mapMeasurementValue(
  m: Measurement,
  unit: string | null,
  index: number,
): Result<ObservationValue, BundleGenerationError> {
  switch (m.value_type) {
    case "numeric": {
      if (m.numeric_value === null || m.numeric_value === undefined) {
        return err(
          new BundleGenerationError("Numeric measurement has no value", {
            path: measurementPath(index, "numeric_value"),
          }),
        );
      }
      return ok({ valueQuantity: quantity(m.numeric_value, unit) });
    }

    case "operator_numeric": {
      if (
        m.numeric_value === null ||
        m.numeric_value === undefined ||
        !m.operator
      ) {
        return err(
          new BundleGenerationError(
            "Operator measurement needs both operator and value",
            { path: measurementPath(index) },
          ),
        );
      }
      return ok({
        valueQuantity: {
          ...quantity(m.numeric_value, unit),
          comparator: m.operator,
        },
        interpretation: [
          { text: `${m.operator}${m.numeric_value} ${unit ?? ""}`.trimEnd() },
        ],
      });
    }

    case "qualitative":
      return ok({ valueString: m.qualitative_value ?? "" });

    default: {
      const unknownKind: never = m.value_type;
      return err(
        new UnknownValueKindError(String(unknownKind), measurementPath(index)),
      );
    }
  }
}

////////////////////////////////////////////////////////////////
// Resources
////////////////////////////////////////////////////////////////

function patientResource(
  subject: AssembleBundleInput["subject"],
): fhir4.Patient {
  return {
    resourceType: "Patient",
    id: subject.id,
    identifier: [
      { system: CODE_SYSTEMS.SUBJECT_ID, value: subject.externalSubjectId },
    ],
    name: [{ text: subject.displayName }],
  };
}

function documentReferenceResource(
  id: string,
  report: AssembleBundleInput["report"],
  patientRef: fhir4.Reference,
): fhir4.DocumentReference {
  return {
    resourceType: "DocumentReference",
    id,
    status: "current",
    docStatus: "final",
    identifier: [{ system: CODE_SYSTEMS.FILE_HASH, value: report.contentHash }],
    type: {
      coding: [
        {
          system: CODE_SYSTEMS.LOINC,
          code: LAB_REPORT_LOINC.code,
          display: LAB_REPORT_LOINC.display,
        },
      ],
      text: LAB_REPORT_LOINC.display,
    },
    subject: patientRef,
    content: [
      {
        attachment: {
          contentType: report.mediaType,
          title: report.originalFilename,
          hash: hexToBase64(report.contentHash),
        },
      },
    ],
  };
}

function observationResource(
  m: Measurement,
  index: number,
  ctx: {
    externalSubjectId: string;
    patientRef: fhir4.Reference;
    loincTable: LoincTable;
    unitTable: UnitTable;
  },
): Result<fhir4.Observation, BundleGenerationError> {
  const unit = normalizeUnit(
    [m.normalized_unit, m.original_unit].find((u) => u?.trim()),
    ctx.unitTable,
  );
  const analyte = normalizeAnalyteName(
    m.normalized_analyte_code ?? m.original_analyte_name,
  );
  const collectedAt = canonicalInstant(m.collection_datetime);

  const id = observationId({
    subjectId: ctx.externalSubjectId,
    collectedAt: new Date(collectedAt),
    normalizedAnalyte: analyte,
    value:
      m.value_type === "qualitative"
        ? (m.qualitative_value ?? null)
        : (m.numeric_value ?? null),
    normalizedUnit: unit,
  });
  if (!id.ok) {
    return err(
      new BundleGenerationError(id.error.message, {
        path: measurementPath(index),
      }),
    );
  }

  const value = mapMeasurementValue(m, unit, index);
  if (!value.ok) return value;

  return ok({
    resourceType: "Observation",
    id: id.value,
    status: "final",
    category: [OBSERVATION_CATEGORY],
    code: analyteConcept(m, ctx.loincTable),
    subject: ctx.patientRef,
    effectiveDateTime: collectedAt,
    issued: m.result_datetime ? canonicalInstant(m.result_datetime) : collectedAt,
    ...value.value,
    ...(m.reference_range_text
      ? { referenceRange: [{ text: m.reference_range_text }] }
      : {}),
  });
}

// every resource carries a derived id; PUT to it is an upsert
function putEntry(
  resource: fhir4.FhirResource,
): Result<fhir4.BundleEntry, BundleGenerationError> {
  if (!resource.id) {
    return err(
      new BundleGenerationError(`${resource.resourceType} has no id`),
    );
  }
  const url = `${resource.resourceType}/${resource.id}`;
  return ok({ fullUrl: url, resource, request: { method: "PUT", url } });
}

////////////////////////////////////////////////////////////////
// Assembly
////////////////////////////////////////////////////////////////

/**
 * Entry order is fixed: Patient, DocumentReference, one Observation per
 * measurement in payload order, DiagnosticReport.
 */
export function assembleBundle(
  input: AssembleBundleInput,
): Result<AssembledBundle, BundleGenerationError> {
  const { report, subject, version } = input;
  const payload = version.payload;
  const loincTable = input.loincTable ?? DEFAULT_LOINC_TABLE;
  const unitTable = input.unitTable ?? DEFAULT_UNIT_TABLE;

  const patientRef: fhir4.Reference = { reference: `Patient/${subject.id}` };

  const docId = documentReferenceId(report.contentHash);
  if (!docId.ok) return err(new BundleGenerationError(docId.error.message));

  const observations: fhir4.Observation[] = [];
  for (const [index, m] of payload.measurements.entries()) {
    const observation = observationResource(m, index, {
      externalSubjectId: subject.externalSubjectId,
      patientRef,
      loincTable,
      unitTable,
    });
    if (!observation.ok) return observation;
    observations.push(observation.value);
  }

  const reportAt = payload.report_date
    ? canonicalInstant(payload.report_date)
    : null;
  const diagId = diagnosticReportId({
    subjectId: subject.externalSubjectId,
    reportAt: reportAt ? new Date(reportAt) : null,
    fileHash: report.contentHash,
  });
  if (!diagId.ok) return err(new BundleGenerationError(diagId.error.message));

  const diagnosticReport: fhir4.DiagnosticReport = {
    resourceType: "DiagnosticReport",
    id: diagId.value,
    status: "final",
    code: {
      coding: [
        {
          system: CODE_SYSTEMS.LOINC,
          code: LAB_REPORT_LOINC.code,
          display: LAB_REPORT_LOINC.display,
        },
      ],
      text: LAB_REPORT_LOINC.display,
    },
    subject: patientRef,
    ...(reportAt ? { effectiveDateTime: reportAt } : {}),
    result: observations.map((o) => ({ reference: `Observation/${o.id}` })),
    ...(payload.performing_lab
      ? { performer: [{ display: payload.performing_lab }] }
      : {}),
  };

  const resources: fhir4.FhirResource[] = [
    patientResource(subject),
    documentReferenceResource(docId.value, report, patientRef),
    ...observations,
    diagnosticReport,
  ];

  const entries: fhir4.BundleEntry[] = [];
  for (const resource of resources) {
    const built = putEntry(resource);
    if (!built.ok) return built;
    entries.push(built.value);
  }

  const bundle: fhir4.Bundle = {
    resourceType: "Bundle",
    type: "transaction",
    entry: entries,
  };

  return ok({ bundle, contentHash: bundleContentHash(bundle) });
}

export function bundleContentHash(bundle: fhir4.Bundle): string {
  return sha256Hex(stableStringify(bundle));
}
