// src/modules/determinism/normalization.ts
// Analyte + unit normalization. Applied identically at extraction and id-derivation time.

import defaultUnitTable from "./unit-map.json";

export type UnitTable = Readonly<Record<string, string>>;

export const DEFAULT_UNIT_TABLE: UnitTable = defaultUnitTable;

export function normalizeAnalyteName(name: string): string {
  return name.toUpperCase().trim().split(/\s+/).filter(Boolean).join(" ");
}

/**
 * Table keys are lower-cased raw units. Unknown units fall back to their
 * lower-cased form; blank input has no unit.
 */
export function normalizeUnit(
  unit: string | null | undefined,
  table: UnitTable = DEFAULT_UNIT_TABLE,
): string | null {
  if (unit === null || unit === undefined) return null;

  const key = unit.trim().toLowerCase();
  if (!key) return null;

  return table[key] ?? key;
}
