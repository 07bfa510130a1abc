import crypto from "node:crypto";

export function sha256Hex(input: string | Uint8Array): string {
  return crypto.createHash("sha256").update(input).digest("hex");
}

function byKey([a]: [string, unknown], [b]: [string, unknown]): number {
  if (a < b) return -1;
  return a > b ? 1 : 0;
}

/**
 * Canonical JSON: object keys sorted at every depth, no whitespace,
 * `undefined` members dropped the way JSON.stringify drops them.
 */
export function stableStringify(value: unknown): string {
  if (value === null || typeof value !== "object") {
    return JSON.stringify(value) ?? "null";
  }

  if (Array.isArray(value)) {
    return `[${value.map((v) => stableStringify(v === undefined ? null : v)).join(",")}]`;
  }

  const members: [string, unknown][] = Object.entries(value)
    .filter(([, v]) => v !== undefined)
    .sort(byKey);

  return `{${members
    .map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`)
    .join(",")}}`;
}
