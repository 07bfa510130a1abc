// src/modules/versions/structuredPayload.schema.ts
// Purpose: Boundary schema for the structured lab payload produced by extraction or by manual correction.

import { z } from "zod";
import { SYSTEM_CONSTANTS } from "@/constants/system.constants";
import type { ValidationIssue } from "@/modules/reports/report.errors";

const Timestamp = z.string().datetime({ offset: true });

export const VALUE_TYPES = ["numeric", "qualitative", "operator_numeric"] as const;
export const COMPARISON_OPERATORS = ["<", "<=", ">", ">="] as const;

export type ValueType = (typeof VALUE_TYPES)[number];
export type ComparisonOperator = (typeof COMPARISON_OPERATORS)[number];

const MeasurementSchema = z
  .object({
    original_analyte_name: z.string().min(1).max(500),
    normalized_analyte_code: z.string().min(1).max(200).nullish(),
    value_type: z.enum(VALUE_TYPES),
    numeric_value: z.number().finite().nullish(),
    operator: z.enum(COMPARISON_OPERATORS).nullish(),
    qualitative_value: z.string().max(500).nullish(),
    original_unit: z.string().max(100).nullish(),
    normalized_unit: z.string().max(100).nullish(),
    reference_range_text: z.string().max(500).nullish(),
    collection_datetime: Timestamp,
    result_datetime: Timestamp.nullish(),
  })
  .superRefine((m, ctx) => {
    const qualitative = m.value_type === "qualitative";
    const hasNumeric = m.numeric_value !== null && m.numeric_value !== undefined;
    const hasOperator = m.operator !== null && m.operator !== undefined;
    const hasQualitative = Boolean(m.qualitative_value);

    if (!qualitative && !hasNumeric) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["numeric_value"],
        message: "numeric_value is required for numeric and operator_numeric types",
      });
    }
    if (qualitative && hasNumeric) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["numeric_value"],
        message: "numeric_value must be absent for qualitative type",
      });
    }

    if (m.value_type === "operator_numeric" && !hasOperator) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["operator"],
        message: "operator is required for operator_numeric type",
      });
    }
    if (m.value_type !== "operator_numeric" && hasOperator) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["operator"],
        message: "operator is only allowed for operator_numeric type",
      });
    }

    if (qualitative && !hasQualitative) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["qualitative_value"],
        message: "qualitative_value is required for qualitative type",
      });
    }
    if (!qualitative && hasQualitative) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["qualitative_value"],
        message: "qualitative_value is only allowed for qualitative type",
      });
    }
  });

export const StructuredPayloadSchema = z.object({
  schema_version: z
    .string()
    .min(1)
    .max(20)
    .default(SYSTEM_CONSTANTS.DEFAULT_SCHEMA_VERSION),
  subject_identifier: z.string().min(1).max(200).nullish(),
  report_date: Timestamp.nullish(),
  ordering_provider: z.string().max(500).nullish(),
  performing_lab: z.string().max(500).nullish(),
  measurements: z
    .array(MeasurementSchema)
    .min(1, "At least one measurement is required"),
});

export type Measurement = z.infer<typeof MeasurementSchema>;
export type StructuredPayload = z.infer<typeof StructuredPayloadSchema>;
export type StructuredPayloadInput = z.input<typeof StructuredPayloadSchema>;

export type PayloadValidation =
  | { ok: true; payload: StructuredPayload }
  | { ok: false; issues: ValidationIssue[] };

/** ["measurements", 2, "numeric_value"] -> "measurements[2].numeric_value" */
export function formatIssuePath(path: ReadonlyArray<string | number>): string {
  let out = "";
  for (const segment of path) {
    if (typeof segment === "number") {
      out += `[${segment}]`;
    } else {
      out += out ? `.${segment}` : segment;
    }
  }
  return out || "$";
}

/**
 * Structural + value-kind validation, then the clock-dependent rule:
 * a collection time may not lie after `now`.
 */
export function validateStructuredPayload(
  raw: unknown,
  now: Date,
): PayloadValidation {
  const parsed = StructuredPayloadSchema.safeParse(raw);

  if (!parsed.success) {
    return {
      ok: false,
      issues: parsed.error.issues.map((issue) => ({
        path: formatIssuePath(issue.path),
        message: issue.message,
      })),
    };
  }

  const issues: ValidationIssue[] = [];

  parsed.data.measurements.forEach((m, index) => {
    if (Date.parse(m.collection_datetime) > now.getTime()) {
      issues.push({
        path: formatIssuePath(["measurements", index, "collection_datetime"]),
        message: "collection_datetime cannot be in the future",
      });
    }
  });

  if (issues.length > 0) {
    return { ok: false, issues };
  }

  return { ok: true, payload: parsed.data };
}
