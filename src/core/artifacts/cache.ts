// src/core/artifacts/cache.ts
// Artifact cache keyed by input hash, with per-key coalescing of compilations

import type { CompiledArtifact } from "./types";
import type { Hash } from "./hash";
import { SingleflightGroup } from "../concurrency/singleflight";
import { silentLogger, type Logger } from "../log";

export type CacheStats = {
  hits: number;
  misses: number;
  evictions: number;
  /** Compilations that joined one already in flight for the same hash */
  coalesced: number;
  size: number;
};

export interface ArtifactCache {
  get(hash: Hash): CompiledArtifact | undefined;
  /** Entries are never mutated; setting an existing key is a no-op. */
  set(hash: Hash, artifact: CompiledArtifact): void;
  /** Drop an entry so a forced recompilation can store its fresh result. */
  evict(hash: Hash): boolean;
  /**
   * Run `compute` unless a computation for `hash` is already in flight, in
   * which case join it. Rejections are shared with joiners and not retained.
   */
  coalesce(hash: Hash, compute: () => Promise<CompiledArtifact>): Promise<{ artifact: CompiledArtifact; shared: boolean }>;
  size(): number;
  stats(): CacheStats;
}

type MemoEntry = {
  artifact: CompiledArtifact;
  lastAccess: number;
};

/**
 * In-memory cache with a least-recently-used size bound.
 */
export class InMemoryArtifactCache implements ArtifactCache {
  private readonly entries = new Map<Hash, MemoEntry>();
  private readonly flights = new SingleflightGroup<CompiledArtifact>("artifact-cache");
  private clock = 0;
  private counters = { hits: 0, misses: 0, evictions: 0 };

  constructor(
    private readonly maxEntries: number = 1000,
    private readonly log: Logger = silentLogger
  ) {}

  get(hash: Hash): CompiledArtifact | undefined {
    const entry = this.entries.get(hash);
    if (!entry) {
      this.counters.misses++;
      return undefined;
    }
    entry.lastAccess = ++this.clock;
    this.counters.hits++;
    return entry.artifact;
  }

  set(hash: Hash, artifact: CompiledArtifact): void {
    if (this.entries.has(hash)) return;

    if (this.entries.size >= this.maxEntries) {
      let oldestKey: Hash | undefined;
      let oldest = Infinity;
      for (const [k, e] of this.entries) {
        if (e.lastAccess < oldest) {
          oldest = e.lastAccess;
          oldestKey = k;
        }
      }
      if (oldestKey !== undefined) {
        this.entries.delete(oldestKey);
        this.counters.evictions++;
      }
    }

    this.entries.set(hash, { artifact, lastAccess: ++this.clock });
  }

  evict(hash: Hash): boolean {
    return this.entries.delete(hash);
  }

  async coalesce(
    hash: Hash,
    compute: () => Promise<CompiledArtifact>
  ): Promise<{ artifact: CompiledArtifact; shared: boolean }> {
    const { promise, shared } = this.flights.do(hash, compute);
    if (shared) {
      this.log.debug(`joined in-flight compilation ${hash.slice(0, 19)}`);
    }
    return { artifact: await promise, shared };
  }

  size(): number {
    return this.entries.size;
  }

  stats(): CacheStats {
    return {
      ...this.counters,
      coalesced: this.flights.stats().hits,
      size: this.entries.size,
    };
  }
}
