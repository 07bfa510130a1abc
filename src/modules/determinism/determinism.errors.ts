import { DomainError } from "@/lib/errors/domain-error";

export class NonCanonicalComponentError extends DomainError {
  constructor(public readonly component: string) {
    super(
      `Identifier component ${component} has no canonical form`,
      500,
      "non_canonical_id_component",
      { component },
    );
    this.name = "NonCanonicalComponentError";
  }
}
