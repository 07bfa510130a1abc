// src/constants/system.constants.ts
// Purpose: Identifier, hashing and code-system constants shared across the pipeline.

export const SYSTEM_CONSTANTS = {
  // deterministic id layout: `${prefix}-${sha256(joined).slice(0, ID_HASH_LENGTH)}`
  ID_COMPONENT_SEPARATOR: "|",
  ID_HASH_LENGTH: 16,
  CONTENT_HASH_PREFIX_LENGTH: 16,

  DEFAULT_SCHEMA_VERSION: "1.0",
  SYSTEM_AUTHOR: "system",
} as const;

export const ID_PREFIX = {
  DOCUMENT_REFERENCE: "doc",
  OBSERVATION: "obs",
  DIAGNOSTIC_REPORT: "diag",
} as const;

export const CODE_SYSTEMS = {
  SUBJECT_ID: "urn:lab2fhir:subject-id",
  FILE_HASH: "urn:lab2fhir:file-sha256",
  ANALYTE: "urn:lab2fhir:analyte",
  LOINC: "http://loinc.org",
  UCUM: "http://unitsofmeasure.org",
} as const;

export const LAB_REPORT_LOINC = {
  code: "11502-2",
  display: "Laboratory report",
} as const;
