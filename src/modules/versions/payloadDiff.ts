// src/modules/versions/payloadDiff.ts
// Field-level diff between two JSON documents, addressed by dotted paths.

import {
  isJsonObject,
  toJsonValue,
  type JsonValue,
} from "@/shared/json/jsonBoundary";

export type FieldChange = {
  fieldPath: string;
  oldValue: JsonValue;
  newValue: JsonValue;
};

function childPath(parent: string, key: string): string {
  return parent ? `${parent}.${key}` : key;
}

function equalJson(a: JsonValue, b: JsonValue): boolean {
  return JSON.stringify(a) === JSON.stringify(b);
}

function walk(
  before: JsonValue,
  after: JsonValue,
  path: string,
  out: FieldChange[],
): void {
  if (isJsonObject(before) && isJsonObject(after)) {
    const keys = [...Object.keys(before)];
    for (const key of Object.keys(after)) {
      if (!(key in before)) keys.push(key);
    }
    for (const key of keys) {
      walk(before[key] ?? null, after[key] ?? null, childPath(path, key), out);
    }
    return;
  }

  if (Array.isArray(before) && Array.isArray(after)) {
    const length = Math.max(before.length, after.length);
    for (let i = 0; i < length; i++) {
      walk(before[i] ?? null, after[i] ?? null, `${path}[${i}]`, out);
    }
    return;
  }

  if (!equalJson(before, after)) {
    out.push({ fieldPath: path || "$", oldValue: before, newValue: after });
  }
}

/**
 * One change per differing leaf. Missing members compare as null, so an
 * added or removed array element shows up as a single whole-element change.
 */
export function diffPayloads(before: unknown, after: unknown): FieldChange[] {
  const out: FieldChange[] = [];
  walk(toJsonValue(before), toJsonValue(after), "", out);
  return out;
}
