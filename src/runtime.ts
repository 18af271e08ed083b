// src/runtime.ts
// NarrativeCompiler - wires the engine from a configuration
//
// Usage:
//   import { createNarrativeCompiler, loadConfig } from "narrative-compiler";
//
//   const narrc = createNarrativeCompiler(loadConfig());
//   const report = await narrc.compileText("doc-1", "[Scene: Intro]\n...");
//   console.log(report.counts);

import type { NarrativeConfig } from "./core/config/config";
import type { GenerationCapability } from "./core/generation/types";
import type { ValidationCapability } from "./core/validation/types";
import type { NarrativeStore } from "./core/store/narrativeStore";
import type { ArtifactCache } from "./core/artifacts/cache";
import type { TargetSpec } from "./core/artifacts/types";
import type { Logger, LogSink } from "./core/log";
import type { CompilationReport, CompileOptions, IngestResult } from "./core/orchestrator/orchestrator";
import type { CodeEvaluation } from "./core/evaluation/evaluator";

import { assertValidConfig } from "./core/config/config";
import { createGenerationAdapter } from "./core/generation";
import { createValidator } from "./core/validation";
import { InMemoryNarrativeStore } from "./core/store/narrativeStore";
import { InMemoryArtifactCache } from "./core/artifacts/cache";
import { TokenCompiler } from "./core/compiler/tokenCompiler";
import { CompilationOrchestrator } from "./core/orchestrator/orchestrator";
import { CodeEvaluator } from "./core/evaluation/evaluator";
import { createLogger } from "./core/log";

/**
 * Collaborators that replace the ones built from the configuration
 */
export type NarrativeCompilerOverrides = {
  /** Generation capability (default: adapter for `llm.provider`) */
  generator?: GenerationCapability;
  /** Capability that scores compiled code (default: the generator) */
  evaluator?: GenerationCapability;
  /** Validation capability (default: by `compiler.targetLanguage`) */
  validator?: ValidationCapability;
  store?: NarrativeStore;
  cache?: ArtifactCache;
  /** Logger (default: console at `compiler.logLevel`) */
  log?: Logger;
  /** Sink for the default logger */
  logSink?: LogSink;
};

export class NarrativeCompiler {
  readonly target: TargetSpec;

  constructor(
    readonly config: NarrativeConfig,
    readonly orchestrator: CompilationOrchestrator,
    readonly compiler: TokenCompiler,
    readonly store: NarrativeStore,
    readonly cache: ArtifactCache,
    readonly log: Logger,
    readonly evaluator: CodeEvaluator
  ) {
    this.target = compiler.target;
  }

  ingest(documentId: string, text: string, version?: string): Promise<IngestResult> {
    return this.orchestrator.ingest(documentId, text, version);
  }

  compile(documentId: string, options?: CompileOptions): Promise<CompilationReport> {
    return this.orchestrator.compile(documentId, options);
  }

  compileText(documentId: string, text: string, version?: string, options?: CompileOptions): Promise<CompilationReport> {
    return this.orchestrator.compileText(documentId, text, version, options);
  }

  cancel(documentId: string): void {
    this.orchestrator.cancel(documentId);
  }

  /** Score every valid artifact of a report, keyed by token id */
  async evaluate(report: CompilationReport): Promise<Map<string, CodeEvaluation>> {
    const scores = new Map<string, CodeEvaluation>();
    for (const entry of report.tokens) {
      const { artifact } = entry;
      if (!artifact || !artifact.valid) continue;
      scores.set(entry.tokenId, await this.evaluator.evaluate(artifact, { document: report.documentId, version: report.version }));
    }
    return scores;
  }
}

/**
 * Build the engine from a configuration.
 * @throws ConfigError when the configuration is invalid
 */
export function createNarrativeCompiler(config: NarrativeConfig, overrides: NarrativeCompilerOverrides = {}): NarrativeCompiler {
  assertValidConfig(config, { requireApiKey: overrides.generator === undefined });

  const log = overrides.log ?? createLogger(config.compiler.logLevel, overrides.logSink);
  const store = overrides.store ?? new InMemoryNarrativeStore();
  const cache = overrides.cache ?? new InMemoryArtifactCache(config.compiler.cacheMaxEntries, log);
  const generator = overrides.generator ?? createGenerationAdapter(config.llm);
  const validator = overrides.validator ?? createValidator(config.compiler.targetLanguage);

  const compiler = new TokenCompiler({
    generator,
    validator,
    cache,
    store,
    target: { language: config.compiler.targetLanguage, framework: config.compiler.targetFramework },
    maxAttempts: config.compiler.maxAttempts,
    timeoutMs: config.llm.timeoutMs,
    systemPrompt: config.llm.systemPrompt,
    maxTokens: config.llm.maxTokens,
    temperature: config.llm.temperature,
    log,
  });

  const orchestrator = new CompilationOrchestrator({
    compiler,
    store,
    maxConcurrency: config.compiler.maxConcurrency,
    generationRetries: config.compiler.generationRetries,
    log,
  });

  const evaluator = new CodeEvaluator({ evaluator: overrides.evaluator ?? generator, log });

  log.debug(`narrative compiler ready: ${generator.getModel()} -> ${config.compiler.targetLanguage}/${config.compiler.targetFramework}`);
  return new NarrativeCompiler(config, orchestrator, compiler, store, cache, log, evaluator);
}
