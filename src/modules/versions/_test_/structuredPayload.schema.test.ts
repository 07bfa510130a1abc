// src/modules/versions/_test_/structuredPayload.schema.test.ts

import { describe, it, expect } from "vitest";
import { FIXED_NOW, glucosePayload, panelPayload } from "@/_test_/fixtures";
import {
  formatIssuePath,
  validateStructuredPayload,
} from "../structuredPayload.schema";

function issuesOf(raw: unknown) {
  const result = validateStructuredPayload(raw, FIXED_NOW);
  if (result.ok) throw new Error("expected validation to fail");
  return result.issues;
}

function measurement(overrides: Record<string, unknown>) {
  return {
    original_analyte_name: "Glucose",
    value_type: "numeric",
    numeric_value: 95,
    collection_datetime: "2024-01-15T08:00:00Z",
    ...overrides,
  };
}

describe("validateStructuredPayload", () => {
  it("accepts a well-formed panel with all three value kinds", () => {
    const result = validateStructuredPayload(panelPayload(), FIXED_NOW);

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.payload.measurements.map((m) => m.value_type)).toEqual([
        "numeric",
        "operator_numeric",
        "qualitative",
      ]);
    }
  });

  it("defaults schema_version to 1.0", () => {
    const { schema_version: _omit, ...rest } = glucosePayload();
    const result = validateStructuredPayload(rest, FIXED_NOW);

    expect(result.ok && result.payload.schema_version).toBe("1.0");
  });

  it("drops keys the payload does not define", () => {
    const result = validateStructuredPayload(
      { ...glucosePayload(), vendor_note: "x" },
      FIXED_NOW,
    );

    expect(result.ok).toBe(true);
    if (result.ok) expect("vendor_note" in result.payload).toBe(false);
  });

  it("requires at least one measurement", () => {
    expect(issuesOf({ measurements: [] })).toEqual([
      { path: "measurements", message: "At least one measurement is required" },
    ]);
  });

  it("requires numeric_value for numeric measurements", () => {
    const issues = issuesOf({
      measurements: [measurement({ numeric_value: undefined })],
    });

    expect(issues).toEqual([
      {
        path: "measurements[0].numeric_value",
        message:
          "numeric_value is required for numeric and operator_numeric types",
      },
    ]);
  });

  it("requires an operator for operator_numeric measurements", () => {
    const issues = issuesOf({
      measurements: [measurement({ value_type: "operator_numeric" })],
    });

    expect(issues).toEqual([
      {
        path: "measurements[0].operator",
        message: "operator is required for operator_numeric type",
      },
    ]);
  });

  it("rejects an operator on a plain numeric measurement", () => {
    const issues = issuesOf({
      measurements: [measurement({ operator: "<" })],
    });

    expect(issues).toEqual([
      {
        path: "measurements[0].operator",
        message: "operator is only allowed for operator_numeric type",
      },
    ]);
  });

  it("rejects a numeric value on a qualitative measurement", () => {
    const issues = issuesOf({
      measurements: [
        measurement({ value_type: "qualitative", qualitative_value: "Positive" }),
      ],
    });

    expect(issues).toEqual([
      {
        path: "measurements[0].numeric_value",
        message: "numeric_value must be absent for qualitative type",
      },
    ]);
  });

  it("requires qualitative_value for qualitative measurements", () => {
    const issues = issuesOf({
      measurements: [
        measurement({ value_type: "qualitative", numeric_value: undefined }),
      ],
    });

    expect(issues).toEqual([
      {
        path: "measurements[0].qualitative_value",
        message: "qualitative_value is required for qualitative type",
      },
    ]);
  });

  it("rejects qualitative_value on a numeric measurement", () => {
    const issues = issuesOf({
      measurements: [measurement({ qualitative_value: "High" })],
    });

    expect(issues).toEqual([
      {
        path: "measurements[0].qualitative_value",
        message: "qualitative_value is only allowed for qualitative type",
      },
    ]);
  });

  it("rejects non-finite numbers", () => {
    const issues = issuesOf({
      measurements: [measurement({ numeric_value: Infinity })],
    });

    expect(issues.map((i) => i.path)).toContain("measurements[0].numeric_value");
  });

  it("rejects timestamps without an explicit offset", () => {
    const issues = issuesOf({
      measurements: [
        measurement({}),
        measurement({ collection_datetime: "2024-01-15 08:00" }),
      ],
    });

    expect(issues.map((i) => i.path)).toEqual([
      "measurements[1].collection_datetime",
    ]);
  });

  it("rejects collection times after the injected now", () => {
    const issues = issuesOf({
      measurements: [
        measurement({}),
        measurement({ collection_datetime: "2024-06-01T12:00:01Z" }),
      ],
    });

    expect(issues).toEqual([
      {
        path: "measurements[1].collection_datetime",
        message: "collection_datetime cannot be in the future",
      },
    ]);
  });

  it("accepts a collection time equal to now", () => {
    const result = validateStructuredPayload(
      { measurements: [measurement({ collection_datetime: "2024-06-01T12:00:00Z" })] },
      FIXED_NOW,
    );

    expect(result.ok).toBe(true);
  });
});

describe("formatIssuePath", () => {
  it("renders indices in brackets and keys with dots", () => {
    expect(formatIssuePath(["measurements", 2, "numeric_value"])).toBe(
      "measurements[2].numeric_value",
    );
  });

  it("uses $ for the document root", () => {
    expect(formatIssuePath([])).toBe("$");
  });
});
