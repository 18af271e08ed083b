// src/core/validation/index.ts
// Validator selection by target language

import type { ValidationCapability } from "./types";
import { PassThroughValidator } from "./types";
import { TypeScriptValidator } from "./typescript";

export { type ValidationCapability, type ValidationReport, PassThroughValidator } from "./types";
export { TypeScriptValidator, formatDiagnostic } from "./typescript";

export function createValidator(language: string): ValidationCapability {
  switch (language.toLowerCase()) {
    case "typescript":
    case "ts":
    case "tsx":
      return new TypeScriptValidator();
    default:
      return new PassThroughValidator();
  }
}
