// src/core/errors.ts
// Error classes for the narrative compiler

export class NarrativeError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = "NarrativeError";
  }
}

/**
 * Malformed narrative text. Fatal for the whole document.
 */
export class NarrativeSyntaxError extends NarrativeError {
  constructor(
    message: string,
    public readonly line: number,
    public readonly text: string
  ) {
    super(`Line ${line}: ${message}: ${JSON.stringify(text)}`, "SYNTAX_ERROR");
    this.name = "NarrativeSyntaxError";
  }
}

export class UnresolvedReferenceError extends NarrativeError {
  constructor(
    public readonly reference: string,
    public readonly source: string,
    public readonly line: number,
    public readonly candidates: string[] = []
  ) {
    super(
      candidates.length > 1
        ? `Ambiguous reference REF:${reference} in ${source} (line ${line}) matches ${candidates.join(", ")}`
        : `Unresolved reference REF:${reference} in ${source} (line ${line})`,
      "UNRESOLVED_REFERENCE"
    );
    this.name = "UnresolvedReferenceError";
  }
}

export class CyclicDependencyError extends NarrativeError {
  constructor(public readonly cycle: string[]) {
    super(`Cyclic dependency: ${cycle.join(" -> ")}`, "CYCLIC_DEPENDENCY");
    this.name = "CyclicDependencyError";
  }
}

/**
 * Transport or service failure of the generation capability.
 * Never cached; eligible for a retry by the caller.
 */
export class GenerationError extends NarrativeError {
  constructor(
    message: string,
    public readonly timedOut: boolean = false,
    public readonly cause?: unknown
  ) {
    super(message, "GENERATION_FAILED");
    this.name = "GenerationError";
  }
}

export class DependencyNotReadyError extends NarrativeError {
  constructor(
    public readonly tokenName: string,
    public readonly missing: string[]
  ) {
    super(`Cannot compile ${tokenName}: dependencies not valid: ${missing.join(", ")}`, "DEPENDENCY_NOT_READY");
    this.name = "DependencyNotReadyError";
  }
}

/**
 * An explicit version label that names an older version of the document.
 */
export class VersionConflictError extends NarrativeError {
  constructor(
    public readonly documentId: string,
    public readonly version: string
  ) {
    super(`Version ${version} of ${documentId} already exists and is not the latest`, "VERSION_CONFLICT");
    this.name = "VersionConflictError";
  }
}

export class ConfigError extends NarrativeError {
  constructor(message: string) {
    super(message, "INVALID_CONFIG");
    this.name = "ConfigError";
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
