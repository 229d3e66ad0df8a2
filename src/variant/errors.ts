import type { Diagnostic } from "../outcome/diagnostic";

/**
 * Thrown while a classifier, transition table or raw-value table is being
 * defined. Never thrown by the operations of a well-formed definition.
 */
export class VariantDefinitionError extends Error {
  constructor(
    public readonly definition: string,
    public readonly diagnostics: Diagnostic[]
  ) {
    super(`VariantDefinitionError: ${definition}: ${diagnostics.map(d => d.message).join("; ")}`);
    this.name = "VariantDefinitionError";
  }
}

export interface ValidationResult {
  valid: boolean;
  errors: Diagnostic[];
}
