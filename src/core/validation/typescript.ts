// src/core/validation/typescript.ts
// Syntax-level TypeScript validation through the compiler API

import * as ts from "typescript";
import type { ValidationCapability, ValidationReport } from "./types";

const COMPILER_OPTIONS: ts.CompilerOptions = {
  target: ts.ScriptTarget.ES2020,
  module: ts.ModuleKind.ESNext,
  experimentalDecorators: true,
};

const TYPESCRIPT_LANGUAGES = new Set(["typescript", "ts", "tsx"]);

/**
 * Reports syntactic diagnostics of `transpileModule`. Imports are not
 * resolved, so generated code may reference framework packages freely.
 */
export class TypeScriptValidator implements ValidationCapability {
  constructor(private readonly maxDiagnostics: number = 20) {}

  async validate(code: string, language: string): Promise<ValidationReport> {
    const lang = language.toLowerCase();
    if (!TYPESCRIPT_LANGUAGES.has(lang)) {
      return { valid: false, diagnostics: [`TypeScriptValidator cannot check language: ${language}`] };
    }
    if (code.trim() === "") {
      return { valid: false, diagnostics: ["Generated code is empty"] };
    }

    const fileName = lang === "tsx" ? "artifact.tsx" : "artifact.ts";
    const result = ts.transpileModule(code, {
      compilerOptions: { ...COMPILER_OPTIONS, jsx: lang === "tsx" ? ts.JsxEmit.Preserve : undefined },
      fileName,
      reportDiagnostics: true,
    });

    const errors = (result.diagnostics ?? []).filter((d) => d.category === ts.DiagnosticCategory.Error);
    return {
      valid: errors.length === 0,
      diagnostics: errors.slice(0, this.maxDiagnostics).map(formatDiagnostic),
    };
  }
}

export function formatDiagnostic(d: ts.Diagnostic): string {
  const msg = ts.flattenDiagnosticMessageText(d.messageText, "\n");
  const code = `TS${d.code}`;
  if (d.file && typeof d.start === "number") {
    const pos = d.file.getLineAndCharacterOfPosition(d.start);
    return `${d.file.fileName}:${pos.line + 1}:${pos.character + 1} ${code}: ${msg}`;
  }
  return `${code}: ${msg}`;
}
