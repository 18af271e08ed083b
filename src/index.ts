// src/index.ts
// Narrative Compiler - Public API

// ═══════════════════════════════════════════════════════════════════════════════
// ENGINE
// ═══════════════════════════════════════════════════════════════════════════════

export { NarrativeCompiler, createNarrativeCompiler, type NarrativeCompilerOverrides } from "./runtime";

// ═══════════════════════════════════════════════════════════════════════════════
// PARSER & GRAPH
// ═══════════════════════════════════════════════════════════════════════════════

export { parseNarrative, matchHeader, splitLines, DEFAULT_SCENE_NAME } from "./core/narrative/parser";
export {
  type TokenKind,
  type Token,
  type ReferenceLine,
  type ParsedNarrative,
  type NarrativeDocument,
} from "./core/narrative/types";
export { DependencyGraph, buildDependencyGraph } from "./core/graph/dependencyGraph";

// ═══════════════════════════════════════════════════════════════════════════════
// COMPILER
// ═══════════════════════════════════════════════════════════════════════════════

export {
  TokenCompiler,
  computeInputHash,
  type TokenCompilerConfig,
  type DependencyArtifact,
  type CompileTokenOptions,
  type TokenCompilation,
} from "./core/compiler/tokenCompiler";
export {
  SelfRepairLoop,
  type RepairState,
  type RepairTransition,
  type RepairAttempt,
  type RepairOutcome,
  type RepairInput,
  type SelfRepairConfig,
} from "./core/compiler/repair";
export { buildGenerationRequest, buildRepairPrompt, buildSystemPrompt, extractCode, renderUserContent } from "./core/compiler/prompt";

export {
  CodeEvaluator,
  EVALUATION_SYSTEM_PROMPT,
  parseEvaluation,
  renderEvaluationContent,
  type CodeEvaluation,
  type CodeEvaluatorConfig,
} from "./core/evaluation/evaluator";

// ═══════════════════════════════════════════════════════════════════════════════
// ORCHESTRATION
// ═══════════════════════════════════════════════════════════════════════════════

export {
  CompilationOrchestrator,
  TOKEN_STATUSES,
  nextVersion,
  type TokenStatus,
  type TokenReport,
  type CompilationReport,
  type IngestResult,
  type CompileOptions,
  type OrchestratorConfig,
} from "./core/orchestrator/orchestrator";
export { diffTokens, type TokenDiff } from "./core/orchestrator/diff";
export { runDag, type DagTask, type TaskOutcome, type DagScheduleOptions } from "./core/orchestrator/scheduler";

// ═══════════════════════════════════════════════════════════════════════════════
// ARTIFACTS, CACHE & STORE
// ═══════════════════════════════════════════════════════════════════════════════

export { ZERO_USAGE, addUsage, type CompiledArtifact, type TargetSpec, type LLMUsage } from "./core/artifacts/types";
export { InMemoryArtifactCache, type ArtifactCache, type CacheStats } from "./core/artifacts/cache";
export { sha256Of, sha256Text, canonicalJson, hashToHex, generatedFunctionName, type Hash } from "./core/artifacts/hash";
export { SingleflightGroup, type SingleflightStats } from "./core/concurrency/singleflight";
export { InMemoryNarrativeStore, type NarrativeStore, type StoredToken } from "./core/store/narrativeStore";

// ═══════════════════════════════════════════════════════════════════════════════
// CAPABILITIES
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/generation";
export * from "./core/validation";

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG, LOGGING & ERRORS
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/config";
export { createLogger, silentLogger, isLogLevel, LOG_LEVELS, type Logger, type LogLevel, type LogSink } from "./core/log";
export {
  NarrativeError,
  NarrativeSyntaxError,
  UnresolvedReferenceError,
  CyclicDependencyError,
  GenerationError,
  DependencyNotReadyError,
  VersionConflictError,
  ConfigError,
  errorMessage,
} from "./core/errors";
