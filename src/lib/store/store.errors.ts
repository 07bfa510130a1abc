// src/lib/store/store.errors.ts

import { DomainError } from "@/lib/errors/domain-error";

export class UniqueConstraintError extends DomainError {
  constructor(public readonly constraint: string) {
    super(`Unique constraint violated: ${constraint}`, 409, "conflict", {
      constraint,
    });
    this.name = "UniqueConstraintError";
  }
}
