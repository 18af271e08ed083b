// src/core/graph/dependencyGraph.ts
// Dependency graph over tokens: REF resolution, cycle detection, scheduling order

import type { ParsedNarrative, Token } from "../narrative/types";
import { CyclicDependencyError, UnresolvedReferenceError } from "../errors";

// ─────────────────────────────────────────────────────────────────
// Graph structure
// ─────────────────────────────────────────────────────────────────

/**
 * Arena-indexed graph. Node index == token order index; edges are index lists
 * kept sorted so every traversal is deterministic.
 */
export class DependencyGraph {
  private readonly indexById: Map<string, number>;

  private constructor(
    readonly nodes: readonly Token[],
    /** deps[i]: indices token i references */
    private readonly deps: readonly number[][],
    /** users[i]: indices referencing token i */
    private readonly users: readonly number[][]
  ) {
    this.indexById = new Map(nodes.map((t, i) => [t.id, i]));
  }

  /**
   * Resolve every REF line and build the graph.
   *
   * @throws UnresolvedReferenceError for a missing or ambiguous target name
   * @throws CyclicDependencyError with one concrete cycle
   */
  static build(parsed: ParsedNarrative): DependencyGraph {
    const nodes = [...parsed.tokens].sort((a, b) => a.orderIndex - b.orderIndex);
    const indexById = new Map(nodes.map((t, i) => [t.id, i]));

    const byName = new Map<string, number[]>();
    nodes.forEach((t, i) => {
      const list = byName.get(t.name) ?? [];
      list.push(i);
      byName.set(t.name, list);
    });

    const deps: number[][] = nodes.map(() => []);
    const users: number[][] = nodes.map(() => []);

    for (const ref of parsed.references) {
      const source = indexById.get(ref.sourceId);
      if (source === undefined) continue;
      const matches = byName.get(ref.target) ?? [];
      if (matches.length !== 1) {
        throw new UnresolvedReferenceError(
          ref.target,
          nodes[source].name,
          ref.line,
          matches.map((i) => nodes[i].id)
        );
      }
      const target = matches[0];
      if (!deps[source].includes(target)) {
        deps[source].push(target);
        users[target].push(source);
      }
    }

    for (const list of deps) list.sort((a, b) => a - b);
    for (const list of users) list.sort((a, b) => a - b);

    const graph = new DependencyGraph(nodes, deps, users);
    const cycle = graph.findCycle();
    if (cycle) {
      throw new CyclicDependencyError(cycle);
    }
    return graph;
  }

  // ─────────────────────────────────────────────────────────────────
  // Lookup
  // ─────────────────────────────────────────────────────────────────

  get size(): number {
    return this.nodes.length;
  }

  has(id: string): boolean {
    return this.indexById.has(id);
  }

  token(id: string): Token {
    return this.nodes[this.indexOf(id)];
  }

  private indexOf(id: string): number {
    const i = this.indexById.get(id);
    if (i === undefined) {
      throw new Error(`Unknown token: ${id}`);
    }
    return i;
  }

  /** Direct dependencies, in document order. */
  dependenciesOf(id: string): Token[] {
    return this.deps[this.indexOf(id)].map((i) => this.nodes[i]);
  }

  /** Tokens that reference `id` directly, in document order. */
  dependentsOf(id: string): Token[] {
    return this.users[this.indexOf(id)].map((i) => this.nodes[i]);
  }

  /**
   * Every token that must be recompiled when one of `ids` changes
   * (excluding `ids` themselves unless reachable from another seed).
   */
  transitiveDependentsOf(ids: Iterable<string>): Set<string> {
    const seeds = [...ids].map((id) => this.indexOf(id));
    const seen = new Set<number>();
    const stack = [...seeds];
    while (stack.length > 0) {
      const i = stack.pop();
      if (i === undefined) break;
      for (const u of this.users[i]) {
        if (!seen.has(u)) {
          seen.add(u);
          stack.push(u);
        }
      }
    }
    return new Set([...seen].map((i) => this.nodes[i].id));
  }

  // ─────────────────────────────────────────────────────────────────
  // Ordering
  // ─────────────────────────────────────────────────────────────────

  /**
   * Kahn's algorithm; among ready tokens the lowest order index goes first.
   */
  topologicalOrder(): Token[] {
    const remaining = this.deps.map((d) => d.length);
    const ready: number[] = [];
    remaining.forEach((n, i) => {
      if (n === 0) ready.push(i);
    });

    const order: Token[] = [];
    while (ready.length > 0) {
      // ready stays sorted ascending
      const i = ready.shift();
      if (i === undefined) break;
      order.push(this.nodes[i]);
      for (const u of this.users[i]) {
        remaining[u]--;
        if (remaining[u] === 0) insertSorted(ready, u);
      }
    }
    return order;
  }

  /** Topological order restricted to `ids`. */
  orderWithin(ids: Iterable<string>): Token[] {
    const wanted = new Set(ids);
    return this.topologicalOrder().filter((t) => wanted.has(t.id));
  }

  /**
   * Depth-first colouring over dependency edges. Returns the first cycle found
   * as a closed list of names (`[A, B, A]`), or null.
   */
  findCycle(): string[] | null {
    const WHITE = 0;
    const GRAY = 1;
    const BLACK = 2;
    const color = new Array<number>(this.nodes.length).fill(WHITE);
    const path: number[] = [];

    const visit = (i: number): number[] | null => {
      color[i] = GRAY;
      path.push(i);
      for (const d of this.deps[i]) {
        if (color[d] === GRAY) {
          return [...path.slice(path.indexOf(d)), d];
        }
        if (color[d] === WHITE) {
          const found = visit(d);
          if (found) return found;
        }
      }
      path.pop();
      color[i] = BLACK;
      return null;
    };

    for (let i = 0; i < this.nodes.length; i++) {
      if (color[i] === WHITE) {
        const found = visit(i);
        if (found) return found.map((n) => this.nodes[n].name);
      }
    }
    return null;
  }
}

function insertSorted(list: number[], value: number): void {
  let at = list.length;
  while (at > 0 && list[at - 1] > value) at--;
  list.splice(at, 0, value);
}

export function buildDependencyGraph(parsed: ParsedNarrative): DependencyGraph {
  return DependencyGraph.build(parsed);
}
