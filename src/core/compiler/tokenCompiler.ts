/**
 * Token Compiler
 *
 * One token plus its compiled dependencies -> one artifact, through the
 * artifact cache, the persistence collaborator and the self-repair loop.
 */

import type { Token } from '../narrative/types';
import type { CompiledArtifact, LLMUsage, TargetSpec } from '../artifacts/types';
import type { ArtifactCache } from '../artifacts/cache';
import type { Hash } from '../artifacts/hash';
import type { NarrativeStore } from '../store/narrativeStore';
import type { GenerationCapability } from '../generation/types';
import type { ValidationCapability } from '../validation/types';
import type { Logger } from '../log';
import type { RepairOutcome } from './repair';
import { ZERO_USAGE } from '../artifacts/types';
import { sha256Of } from '../artifacts/hash';
import { silentLogger } from '../log';
import { DependencyNotReadyError } from '../errors';
import { SelfRepairLoop } from './repair';

export interface TokenCompilerConfig {
  generator: GenerationCapability;
  validator: ValidationCapability;
  cache: ArtifactCache;
  store?: NarrativeStore;
  target: TargetSpec;
  maxAttempts: number;
  timeoutMs?: number;
  systemPrompt?: string;
  maxTokens?: number;
  temperature?: number;
  log?: Logger;
}

/**
 * A direct dependency and its current artifact, if it has one
 */
export interface DependencyArtifact {
  token: Token;
  artifact: CompiledArtifact | undefined;
}

export interface CompileTokenOptions {
  /** Skip the cache and store lookup; the fresh result is still stored */
  bypassCache?: boolean;
}

export interface TokenCompilation {
  artifact: CompiledArtifact;
  /** Present only when this call ran the repair loop itself */
  outcome?: RepairOutcome;
  usage: LLMUsage;
}

/**
 * Cache key of a token compilation. Dependency hashes are folded in by
 * dependency order index, so any upstream change changes the key.
 */
export function computeInputHash(token: Token, dependencies: DependencyArtifact[], target: TargetSpec): Hash {
  const ordered = [...dependencies].sort((a, b) => a.token.orderIndex - b.token.orderIndex);
  return sha256Of({
    kind: token.kind,
    name: token.name,
    contentHash: token.contentHash,
    dependencies: ordered.map((d) => d.artifact?.artifactHash ?? null),
    target: { language: target.language, framework: target.framework },
  });
}

export class TokenCompiler {
  private readonly loop: SelfRepairLoop;
  private readonly log: Logger;

  constructor(private readonly config: TokenCompilerConfig) {
    this.log = config.log ?? silentLogger;
    this.loop = new SelfRepairLoop({
      generator: config.generator,
      validator: config.validator,
      maxAttempts: config.maxAttempts,
      timeoutMs: config.timeoutMs,
      systemPrompt: config.systemPrompt,
      maxTokens: config.maxTokens,
      temperature: config.temperature,
      log: this.log,
    });
  }

  get target(): TargetSpec {
    return this.config.target;
  }

  /**
   * @throws DependencyNotReadyError when a direct dependency has no valid artifact
   * @throws GenerationError when generation fails; nothing is cached then
   */
  async compile(
    token: Token,
    dependencies: DependencyArtifact[],
    options: CompileTokenOptions = {}
  ): Promise<TokenCompilation> {
    const missing = dependencies.filter((d) => !d.artifact || !d.artifact.valid).map((d) => d.token.name);
    if (missing.length > 0) {
      throw new DependencyNotReadyError(token.name, missing);
    }

    const { cache, store, target } = this.config;
    const inputHash = computeInputHash(token, dependencies, target);

    if (!options.bypassCache) {
      const hit = await this.lookup(inputHash);
      if (hit) {
        this.log.debug(`cache hit ${token.name}`);
        return { artifact: { ...hit, tokenId: token.id, cacheHit: true }, usage: ZERO_USAGE };
      }
    }

    const owned: { outcome?: RepairOutcome } = {};
    const { artifact, shared } = await cache.coalesce(inputHash, async () => {
      const run = await this.loop.run({
        tokenId: token.id,
        tokenName: token.name,
        kind: token.kind,
        content: token.content,
        dependencies: [...dependencies]
          .sort((a, b) => a.token.orderIndex - b.token.orderIndex)
          .map((d) => ({ name: d.token.name, kind: d.token.kind, code: d.artifact?.code ?? '' })),
        target,
      });
      owned.outcome = run;

      const fresh: CompiledArtifact = {
        tokenId: token.id,
        tokenName: token.name,
        tokenKind: token.kind,
        code: run.code,
        language: target.language,
        framework: target.framework,
        valid: run.tag === 'valid',
        cacheHit: false,
        inputHash,
        artifactHash: sha256Of({ inputHash, code: run.code }),
        attempts: run.attempts,
        diagnostics: run.diagnostics,
        createdAt: new Date().toISOString(),
      };

      if (options.bypassCache) cache.evict(inputHash);
      cache.set(inputHash, fresh);
      if (store) await store.saveArtifact(fresh);
      return fresh;
    });

    if (shared) {
      return { artifact: { ...artifact, tokenId: token.id, cacheHit: true }, usage: ZERO_USAGE };
    }
    return { artifact, outcome: owned.outcome, usage: owned.outcome?.usage ?? ZERO_USAGE };
  }

  private async lookup(inputHash: Hash): Promise<CompiledArtifact | undefined> {
    const cached = this.config.cache.get(inputHash);
    if (cached) return cached;

    const { store } = this.config;
    if (!store) return undefined;
    const persisted = await store.loadArtifact(inputHash);
    if (!persisted) return undefined;
    this.config.cache.set(inputHash, persisted);
    return persisted;
  }
}
