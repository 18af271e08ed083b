// src/core/artifacts/types.ts
// Compiled artifact model

import type { Hash } from "./hash";
import type { TokenKind } from "../narrative/types";

export interface TargetSpec {
  language: string;
  framework: string;
}

export interface CompiledArtifact {
  tokenId: string;
  tokenName: string;
  tokenKind: TokenKind;
  code: string;
  language: string;
  framework: string;
  valid: boolean;
  cacheHit: boolean;
  /** Hash of token content + ordered dependency artifact hashes + target */
  inputHash: Hash;
  /** Hash dependents fold into their own input hash */
  artifactHash: Hash;
  attempts: number;
  /** Validator diagnostics of the final attempt (empty when valid) */
  diagnostics: string[];
  createdAt: string;
}

/**
 * Usage information from generation calls
 */
export interface LLMUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
  estimatedCost: number; // in USD
}

export const ZERO_USAGE: LLMUsage = {
  promptTokens: 0,
  completionTokens: 0,
  totalTokens: 0,
  estimatedCost: 0,
};

export function addUsage(a: LLMUsage, b: LLMUsage | undefined): LLMUsage {
  if (!b) return a;
  return {
    promptTokens: a.promptTokens + b.promptTokens,
    completionTokens: a.completionTokens + b.completionTokens,
    totalTokens: a.totalTokens + b.totalTokens,
    estimatedCost: a.estimatedCost + b.estimatedCost,
  };
}
