// src/core/orchestrator/diff.ts
// Token-set diff by identity between two versions of a document

import type { Token } from "../narrative/types";

export type TokenDiff = {
  added: string[];
  removed: string[];
  /** Same identity, different content hash */
  changed: string[];
  unchanged: string[];
};

type Comparable = Pick<Token, "id" | "contentHash" | "orderIndex">;

/**
 * Ids come out in the order of the version they belong to: `removed` by the
 * previous version's order index, the rest by the next version's.
 */
export function diffTokens(previous: readonly Comparable[], next: readonly Comparable[]): TokenDiff {
  const before = new Map(previous.map((t) => [t.id, t]));
  const after = new Set(next.map((t) => t.id));
  const diff: TokenDiff = { added: [], removed: [], changed: [], unchanged: [] };

  for (const t of [...next].sort((a, b) => a.orderIndex - b.orderIndex)) {
    const old = before.get(t.id);
    if (!old) {
      diff.added.push(t.id);
    } else if (old.contentHash !== t.contentHash) {
      diff.changed.push(t.id);
    } else {
      diff.unchanged.push(t.id);
    }
  }

  for (const t of [...previous].sort((a, b) => a.orderIndex - b.orderIndex)) {
    if (!after.has(t.id)) diff.removed.push(t.id);
  }

  return diff;
}
