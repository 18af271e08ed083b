// test/helpers/fixtures.ts
// Shared stand-ins for the generation and validation capabilities

import type { GenerationCapability, GenerationOutput, GenerationRequest } from "../../src/core/generation/types";
import type { ValidationCapability, ValidationReport } from "../../src/core/validation/types";
import type { CompiledArtifact } from "../../src/core/artifacts/types";
import { sha256Of } from "../../src/core/artifacts/hash";

export const TARGET = { language: "typescript", framework: "angular" };

/**
 * Validator driven by a rule: code -> diagnostics (none means valid).
 */
export class RuleValidator implements ValidationCapability {
  calls = 0;

  constructor(private readonly rule: (code: string) => string[]) {}

  async validate(code: string): Promise<ValidationReport> {
    this.calls++;
    const diagnostics = this.rule(code);
    return { valid: diagnostics.length === 0, diagnostics };
  }
}

/** Rejects code containing the marker `INVALID` */
export function markerValidator(): RuleValidator {
  return new RuleValidator((code) => (code.includes("INVALID") ? ["marker found"] : []));
}

export function fenced(code: string): string {
  return "```ts\n" + code + "\n```";
}

/**
 * Generator answering `export const <token> = 1;` unless `answer` says
 * otherwise. Records every request and the order calls start and finish.
 */
export class RecordingGenerator implements GenerationCapability {
  readonly requests: GenerationRequest[] = [];
  readonly events: string[] = [];
  active = 0;
  maxActive = 0;

  constructor(
    private readonly answer: (request: GenerationRequest, callIndex: number) => string | Promise<string> = (request) =>
      fenced(`export const ${request.context.tokenName} = 1;`),
    private readonly delayMs = 0
  ) {}

  get callCount(): number {
    return this.requests.length;
  }

  callsFor(tokenName: string): GenerationRequest[] {
    return this.requests.filter((r) => r.context.tokenName === tokenName);
  }

  async generate(request: GenerationRequest): Promise<GenerationOutput> {
    const index = this.requests.length;
    this.requests.push(request);
    this.events.push(`start:${request.context.tokenName}`);
    this.active++;
    this.maxActive = Math.max(this.maxActive, this.active);
    try {
      if (this.delayMs > 0) await sleep(this.delayMs);
      const text = await this.answer(request, index);
      return { text, usage: { promptTokens: 10, completionTokens: 5, totalTokens: 15, estimatedCost: 0 } };
    } finally {
      this.active--;
      this.events.push(`end:${request.context.tokenName}`);
    }
  }

  getModel(): string {
    return "recording";
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function makeArtifact(overrides: Partial<CompiledArtifact> = {}): CompiledArtifact {
  const inputHash = overrides.inputHash ?? sha256Of({ test: overrides.tokenId ?? "function:A" });
  const code = overrides.code ?? "export const A = 1;";
  return {
    tokenId: "function:A",
    tokenName: "A",
    tokenKind: "Function",
    code,
    language: "typescript",
    framework: "angular",
    valid: true,
    cacheHit: false,
    inputHash,
    artifactHash: sha256Of({ inputHash, code }),
    attempts: 1,
    diagnostics: [],
    createdAt: "2024-01-01T00:00:00.000Z",
    ...overrides,
  };
}
