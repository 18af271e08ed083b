// src/core/orchestrator/orchestrator.ts
// Ingest narrative versions and compile them incrementally

import type { NarrativeDocument, ParsedNarrative, Token, TokenKind } from "../narrative/types";
import type { CompiledArtifact, LLMUsage } from "../artifacts/types";
import type { NarrativeStore } from "../store/narrativeStore";
import type { DependencyArtifact, TokenCompiler } from "../compiler/tokenCompiler";
import { computeInputHash } from "../compiler/tokenCompiler";
import type { TokenDiff } from "./diff";
import type { Logger } from "../log";
import { parseNarrative } from "../narrative/parser";
import { DependencyGraph } from "../graph/dependencyGraph";
import { ZERO_USAGE, addUsage } from "../artifacts/types";
import { GenerationError, VersionConflictError, errorMessage } from "../errors";
import { silentLogger } from "../log";
import { diffTokens } from "./diff";
import { runDag } from "./scheduler";

// ─────────────────────────────────────────────────────────────────
// Report types
// ─────────────────────────────────────────────────────────────────

export type TokenStatus = "compiled" | "repaired" | "cached" | "failed" | "skipped" | "errored" | "cancelled";

export const TOKEN_STATUSES: readonly TokenStatus[] = [
  "compiled",
  "repaired",
  "cached",
  "failed",
  "skipped",
  "errored",
  "cancelled",
];

export interface TokenReport {
  tokenId: string;
  name: string;
  kind: TokenKind;
  status: TokenStatus;
  artifact?: CompiledArtifact;
  /** Repair-loop attempts of this run (0 when nothing was generated) */
  attempts: number;
  diagnostics: string[];
  /** Why the token was skipped or errored */
  error?: string;
  usage: LLMUsage;
}

export interface CompilationReport {
  documentId: string;
  version: string;
  /** One entry per token, in topological order */
  tokens: TokenReport[];
  counts: Record<TokenStatus, number>;
  usage: LLMUsage;
  elapsedMs: number;
  /** A newer ingest of the document, or cancel(), stopped the run's scheduling */
  superseded: boolean;
  cancelled: boolean;
}

export interface IngestResult {
  document: NarrativeDocument;
  parsed: ParsedNarrative;
  graph: DependencyGraph;
  diff: TokenDiff;
  /** changed ∪ added ∪ their transitive dependents */
  dirty: Set<string>;
}

export interface CompileOptions {
  signal?: AbortSignal;
  /** Recompile every token, skipping cache lookups */
  bypassCache?: boolean;
}

export interface OrchestratorConfig {
  compiler: TokenCompiler;
  store: NarrativeStore;
  maxConcurrency: number;
  /** Extra whole-token attempts after a GenerationError */
  generationRetries?: number;
  log?: Logger;
}

type DocumentState = {
  /** Bumped by every ingest and cancel; a run started under another epoch stops scheduling */
  epoch: number;
  latest?: IngestResult;
  /** Tail of the document's ingest queue; ingests of one document never overlap */
  ingesting: Promise<void>;
};

// ─────────────────────────────────────────────────────────────────
// Orchestrator
// ─────────────────────────────────────────────────────────────────

export class CompilationOrchestrator {
  private readonly documents = new Map<string, DocumentState>();
  private readonly log: Logger;

  constructor(private readonly config: OrchestratorConfig) {
    this.log = config.log ?? silentLogger;
  }

  private stateOf(documentId: string): DocumentState {
    let state = this.documents.get(documentId);
    if (!state) {
      state = { epoch: 0, ingesting: Promise.resolve() };
      this.documents.set(documentId, state);
    }
    return state;
  }

  /**
   * Parse and record a new version. Syntax and graph errors are thrown before
   * anything is saved. A compilation of an older version still running stops
   * starting new tokens.
   *
   * Ingests of one document run one at a time, each diffing against the
   * version the previous one recorded.
   *
   * @throws VersionConflictError when `version` names an older stored version
   */
  async ingest(documentId: string, text: string, version?: string): Promise<IngestResult> {
    const parsed = parseNarrative(text);
    const graph = DependencyGraph.build(parsed);

    const state = this.stateOf(documentId);
    const run = state.ingesting.then(() => this.record(documentId, text, version, parsed, graph));
    // The caller of a failed ingest gets its rejection through `run`; the queue moves on
    state.ingesting = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async record(
    documentId: string,
    text: string,
    version: string | undefined,
    parsed: ParsedNarrative,
    graph: DependencyGraph
  ): Promise<IngestResult> {
    const { store } = this.config;

    const history = await store.loadVersions(documentId);
    const previousDoc = history.length > 0 ? history[history.length - 1] : null;
    const labels = new Set(history.map((d) => d.version));
    if (version !== undefined && labels.has(version) && version !== previousDoc?.version) {
      throw new VersionConflictError(documentId, version);
    }
    let label = version ?? nextVersion(previousDoc?.version);
    while (version === undefined && labels.has(label)) {
      label = nextVersion(label);
    }

    const prior = await store.loadTokens(documentId);
    const diff = diffTokens(prior, parsed.tokens);
    const seeds = [...diff.changed, ...diff.added];
    const dirty = new Set([...seeds, ...graph.transitiveDependentsOf(seeds)]);

    const priorById = new Map(prior.map((t) => [t.id, t]));
    const unchanged = new Set(diff.unchanged);
    for (const token of parsed.tokens) {
      const kept = unchanged.has(token.id) ? priorById.get(token.id) : undefined;
      await store.saveToken({
        ...token,
        documentId,
        artifactInputHash: kept?.artifactInputHash ?? null,
        retired: false,
      });
    }
    for (const id of diff.removed) {
      await store.retireToken(documentId, id);
    }

    const document: NarrativeDocument = {
      id: documentId,
      version: label,
      text,
      tokenIds: parsed.tokens.map((t) => t.id),
      createdAt: new Date().toISOString(),
    };
    if (previousDoc && previousDoc.version !== label) {
      await store.saveDocument({ ...previousDoc, supersededBy: label });
    }
    await store.saveDocument(document);

    const state = this.stateOf(documentId);
    state.epoch++;
    const result: IngestResult = { document, parsed, graph, diff, dirty };
    state.latest = result;

    this.log.info(
      `ingested ${documentId}@${label}: +${diff.added.length} ~${diff.changed.length} -${diff.removed.length} =${diff.unchanged.length}, ${dirty.size} dirty`
    );
    return result;
  }

  /**
   * Stop scheduling new tokens for a document's running compilation.
   */
  cancel(documentId: string): void {
    this.stateOf(documentId).epoch++;
  }

  /**
   * Bring every token of the latest version to a final state.
   */
  async compile(documentId: string, options: CompileOptions = {}): Promise<CompilationReport> {
    const started = Date.now();
    const state = this.stateOf(documentId);
    await state.ingesting;
    const ingested = state.latest ?? (await this.restore(documentId));
    const epoch = state.epoch;
    const superseded = (): boolean => state.epoch !== epoch;
    const isCancelled = (): boolean => superseded() || (options.signal?.aborted ?? false);

    const { graph, document, dirty } = ingested;
    const { store } = this.config;
    const order = graph.topologicalOrder();

    // Current terminal artifacts of tokens that may stay clean. An artifact
    // counts only while it was built on its dependencies' current artifacts.
    const stored = new Map((await store.loadTokens(documentId)).map((t) => [t.id, t]));
    const current = new Map<string, CompiledArtifact>();
    if (!options.bypassCache) {
      const { target } = this.config.compiler;
      for (const token of order) {
        const hash = stored.get(token.id)?.artifactInputHash;
        if (!hash || dirty.has(token.id)) continue;
        const artifact = await store.loadArtifact(hash);
        if (!artifact) continue;
        const deps = graph.dependenciesOf(token.id).map((d) => ({ token: d, artifact: current.get(d.id) }));
        if (deps.some((d) => d.artifact === undefined)) continue;
        if (computeInputHash(token, deps, target) !== artifact.inputHash) continue;
        current.set(token.id, artifact);
      }
    }

    const seeds = order.filter((t) => !current.has(t.id)).map((t) => t.id);
    const work = new Set([...seeds, ...graph.transitiveDependentsOf(seeds)]);

    const reports = new Map<string, TokenReport>();
    for (const token of order) {
      const artifact = current.get(token.id);
      if (artifact && !work.has(token.id)) {
        reports.set(token.id, reportFromArtifact(token, { ...artifact, cacheHit: true }, ZERO_USAGE, 0));
      }
    }

    const outcomes = await runDag(
      order
        .filter((t) => work.has(t.id))
        .map((token) => ({
          id: token.id,
          after: graph.dependenciesOf(token.id).map((d) => d.id),
          run: async () => {
            const report = await this.compileToken(token, graph, reports, options, isCancelled);
            reports.set(token.id, report);
            return report;
          },
        })),
      { maxConcurrency: this.config.maxConcurrency, isCancelled }
    );

    for (const [id, outcome] of outcomes) {
      const token = graph.token(id);
      if (outcome.tag === "done") {
        reports.set(id, outcome.value);
      } else if (outcome.tag === "cancelled") {
        reports.set(id, blankReport(token, "cancelled"));
      } else {
        reports.set(id, { ...blankReport(token, "errored"), error: errorMessage(outcome.error) });
      }
    }

    if (!superseded()) {
      for (const token of order) {
        const artifact = reports.get(token.id)?.artifact;
        if (!artifact) continue;
        dirty.delete(token.id);
        const row = stored.get(token.id);
        if (row && row.artifactInputHash !== artifact.inputHash) {
          await store.saveToken({ ...row, artifactInputHash: artifact.inputHash });
        }
      }
    }

    const tokens = order.map((t) => reports.get(t.id) ?? blankReport(t, "cancelled"));
    const counts = emptyCounts();
    let usage = ZERO_USAGE;
    for (const r of tokens) {
      counts[r.status]++;
      usage = addUsage(usage, r.usage);
    }

    const report: CompilationReport = {
      documentId,
      version: document.version,
      tokens,
      counts,
      usage,
      elapsedMs: Date.now() - started,
      superseded: superseded(),
      cancelled: options.signal?.aborted ?? false,
    };
    this.log.info(
      `compiled ${documentId}@${document.version}: ${TOKEN_STATUSES.map((s) => `${s}=${counts[s]}`).join(" ")} in ${report.elapsedMs}ms`
    );
    return report;
  }

  async compileText(
    documentId: string,
    text: string,
    version?: string,
    options: CompileOptions = {}
  ): Promise<CompilationReport> {
    await this.ingest(documentId, text, version);
    return this.compile(documentId, options);
  }

  /**
   * Compile one token whose dependencies are all settled in `reports`.
   */
  private async compileToken(
    token: Token,
    graph: DependencyGraph,
    reports: Map<string, TokenReport>,
    options: CompileOptions,
    isCancelled: () => boolean
  ): Promise<TokenReport> {
    const dependencies: DependencyArtifact[] = graph
      .dependenciesOf(token.id)
      .map((d) => ({ token: d, artifact: reports.get(d.id)?.artifact }));

    const blocked = dependencies.filter((d) => !d.artifact?.valid).map((d) => d.token.name);
    if (blocked.length > 0) {
      this.log.info(`skip ${token.name}: dependencies not valid: ${blocked.join(", ")}`);
      return { ...blankReport(token, "skipped"), error: `Dependencies not valid: ${blocked.join(", ")}` };
    }

    const retries = Math.max(0, this.config.generationRetries ?? 0);
    let usage = ZERO_USAGE;
    for (let attempt = 0; ; attempt++) {
      try {
        const result = await this.config.compiler.compile(token, dependencies, { bypassCache: options.bypassCache });
        usage = addUsage(usage, result.usage);
        const report = reportFromArtifact(token, result.artifact, usage, result.outcome?.attempts ?? 0);
        this.log.info(`${token.name}: ${report.status}`, { attempts: report.attempts });
        return report;
      } catch (e) {
        if (e instanceof GenerationError && attempt < retries && !isCancelled()) {
          this.log.warn(`${token.name}: generation failed, retry ${attempt + 1}/${retries}: ${e.message}`);
          continue;
        }
        this.log.error(`${token.name}: ${errorMessage(e)}`);
        return { ...blankReport(token, "errored"), error: errorMessage(e), usage };
      }
    }
  }

  /**
   * Rebuild the latest ingest of a document from the store, with nothing dirty.
   */
  private async restore(documentId: string): Promise<IngestResult> {
    const document = await this.config.store.loadDocument(documentId);
    if (!document) {
      throw new Error(`Unknown document: ${documentId}`);
    }
    const parsed = parseNarrative(document.text);
    const graph = DependencyGraph.build(parsed);
    const ids = parsed.tokens.map((t) => t.id);
    const result: IngestResult = {
      document,
      parsed,
      graph,
      diff: { added: [], removed: [], changed: [], unchanged: ids },
      dirty: new Set(),
    };
    this.stateOf(documentId).latest = result;
    return result;
  }
}

// ─────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────

function statusOf(artifact: CompiledArtifact): TokenStatus {
  if (artifact.cacheHit) return artifact.valid ? "cached" : "failed";
  if (!artifact.valid) return "failed";
  return artifact.attempts > 1 ? "repaired" : "compiled";
}

function reportFromArtifact(token: Token, artifact: CompiledArtifact, usage: LLMUsage, attempts: number): TokenReport {
  return {
    tokenId: token.id,
    name: token.name,
    kind: token.kind,
    status: statusOf(artifact),
    artifact,
    attempts,
    diagnostics: artifact.diagnostics,
    usage,
  };
}

function blankReport(token: Token, status: TokenStatus): TokenReport {
  return {
    tokenId: token.id,
    name: token.name,
    kind: token.kind,
    status,
    attempts: 0,
    diagnostics: [],
    usage: ZERO_USAGE,
  };
}

function emptyCounts(): Record<TokenStatus, number> {
  return { compiled: 0, repaired: 0, cached: 0, failed: 0, skipped: 0, errored: 0, cancelled: 0 };
}

/** `v1`, `v2`, ... ; a custom label gets `.1`, `.2` appended */
export function nextVersion(previous: string | undefined): string {
  if (previous === undefined) return "v1";
  const m = /^(.*?)(\d+)$/.exec(previous);
  if (m) return `${m[1]}${Number(m[2]) + 1}`;
  return `${previous}.1`;
}
