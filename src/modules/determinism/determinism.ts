// src/modules/determinism/determinism.ts
// Purpose: Pure hashing + deterministic identifier derivation.
// Identical semantic input must yield identical identifiers across runs and processes.

import { sha256Hex } from "@/utils/sha256";
import { err, ok, type Result } from "@/lib/errors/result";
import { ID_PREFIX, SYSTEM_CONSTANTS } from "@/constants/system.constants";
import { NonCanonicalComponentError } from "./determinism.errors";

export type IdComponent = string | number | Date | null | undefined;

////////////////////////////////////////////////////////////////
// Hashing
////////////////////////////////////////////////////////////////

/** SHA-256 of raw document bytes, lowercase hex. */
export function contentHash(bytes: Uint8Array): string {
  return sha256Hex(bytes);
}

export function hexToBase64(hex: string): string {
  return Buffer.from(hex, "hex").toString("base64");
}

////////////////////////////////////////////////////////////////
// Canonicalization
////////////////////////////////////////////////////////////////

/**
 * Strings pass through untouched: callers normalize case and whitespace
 * before deriving ids, so the normalization policy stays visible at the call site.
 */
export function canonicalizeComponent(
  component: IdComponent,
): Result<string, NonCanonicalComponentError> {
  if (component === null || component === undefined) return ok("null");

  if (component instanceof Date) {
    if (Number.isNaN(component.getTime())) {
      return err(new NonCanonicalComponentError("Invalid Date"));
    }
    return ok(component.toISOString());
  }

  if (typeof component === "number") {
    if (!Number.isFinite(component)) {
      return err(new NonCanonicalComponentError(String(component)));
    }
    return ok(String(component));
  }

  return ok(component);
}

////////////////////////////////////////////////////////////////
// Identifier derivation
////////////////////////////////////////////////////////////////

export function deterministicId(
  prefix: string,
  ...components: IdComponent[]
): Result<string, NonCanonicalComponentError> {
  const parts: string[] = [];

  for (const component of components) {
    const canonical = canonicalizeComponent(component);
    if (!canonical.ok) return canonical;
    parts.push(canonical.value);
  }

  const digest = sha256Hex(parts.join(SYSTEM_CONSTANTS.ID_COMPONENT_SEPARATOR));

  return ok(`${prefix}-${digest.slice(0, SYSTEM_CONSTANTS.ID_HASH_LENGTH)}`);
}

export function documentReferenceId(
  fileHash: string,
): Result<string, NonCanonicalComponentError> {
  return deterministicId(ID_PREFIX.DOCUMENT_REFERENCE, fileHash);
}

export function observationId(params: {
  subjectId: string;
  collectedAt: Date;
  normalizedAnalyte: string;
  value: string | number | null;
  normalizedUnit: string | null;
}): Result<string, NonCanonicalComponentError> {
  return deterministicId(
    ID_PREFIX.OBSERVATION,
    params.subjectId,
    params.collectedAt,
    params.normalizedAnalyte,
    params.value,
    params.normalizedUnit,
  );
}

export function diagnosticReportId(params: {
  subjectId: string;
  reportAt: Date | null;
  fileHash: string;
}): Result<string, NonCanonicalComponentError> {
  return deterministicId(
    ID_PREFIX.DIAGNOSTIC_REPORT,
    params.subjectId,
    params.reportAt,
    params.fileHash.slice(0, SYSTEM_CONSTANTS.CONTENT_HASH_PREFIX_LENGTH),
  );
}
