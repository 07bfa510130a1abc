// src/modules/bundles/bundle.errors.ts

import { BundleGenerationError } from "@/modules/reports/report.errors";

export class UnknownValueKindError extends BundleGenerationError {
  constructor(
    public readonly valueType: string,
    public readonly path: string,
  ) {
    super(`Unknown value type ${valueType} at ${path}`, { valueType, path });
    this.name = "UnknownValueKindError";
  }
}
