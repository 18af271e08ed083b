// src/core/validation/types.ts
// Validation capability: code + language -> pass/fail with diagnostics

export interface ValidationReport {
  valid: boolean;
  diagnostics: string[];
}

export interface ValidationCapability {
  validate(code: string, language: string): Promise<ValidationReport>;
}

/**
 * Accepts everything. Used for target languages without a checker.
 */
export class PassThroughValidator implements ValidationCapability {
  async validate(): Promise<ValidationReport> {
    return { valid: true, diagnostics: [] };
  }
}
