// src/core/concurrency/singleflight.ts
// Singleflight: concurrent calls with the same key share one in-flight promise

// ─────────────────────────────────────────────────────────────────
// Singleflight types
// ─────────────────────────────────────────────────────────────────

export type SingleflightKey = string;

export type SingleflightStats = {
  /** Calls that joined an in-flight computation */
  hits: number;
  /** Calls that started a computation */
  misses: number;
  completions: number;
  failures: number;
};

// ─────────────────────────────────────────────────────────────────
// Singleflight group
// ─────────────────────────────────────────────────────────────────

/**
 * A group of deduplicated calls. Entries are removed once settled, so a
 * rejected computation is retried by the next caller rather than replayed.
 */
export class SingleflightGroup<T> {
  private readonly entries = new Map<SingleflightKey, Promise<T>>();
  private readonly counters: SingleflightStats = {
    hits: 0,
    misses: 0,
    completions: 0,
    failures: 0,
  };

  constructor(readonly name?: string) {}

  /**
   * Run `fn` for `key` unless a call for `key` is already in flight, in which
   * case the caller receives that call's result (or rejection).
   */
  do(key: SingleflightKey, fn: () => Promise<T>): { promise: Promise<T>; shared: boolean } {
    const existing = this.entries.get(key);
    if (existing) {
      this.counters.hits++;
      return { promise: existing, shared: true };
    }

    this.counters.misses++;
    const promise = Promise.resolve()
      .then(fn)
      .then(
        (value) => {
          this.counters.completions++;
          this.entries.delete(key);
          return value;
        },
        (err: unknown) => {
          this.counters.failures++;
          this.entries.delete(key);
          throw err;
        }
      );
    this.entries.set(key, promise);
    return { promise, shared: false };
  }

  /**
   * Check if a call is in-flight.
   */
  inFlight(key: SingleflightKey): boolean {
    return this.entries.has(key);
  }

  get inFlightCount(): number {
    return this.entries.size;
  }

  stats(): SingleflightStats {
    return { ...this.counters };
  }
}
