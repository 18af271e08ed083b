/**
 * Hash Utilities
 *
 * Deterministic hashing for token contents, cache keys and generated names.
 */

import { createHash } from "crypto";

export type Hash = `sha256:${string}`;

/**
 * Raw SHA-256 hex digest of a UTF-8 string
 */
export function sha256Text(s: string): string {
  return createHash("sha256").update(s, "utf8").digest("hex");
}

/**
 * Compute SHA-256 hash of content
 * Returns branded Hash type: `sha256:${hex}`
 */
export function sha256Of(content: unknown): Hash {
  return `sha256:${sha256Text(canonicalJson(content))}`;
}

function isPlainObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/**
 * Canonical JSON serialization for deterministic hashing
 * - Sorts object keys alphabetically
 * - No extra whitespace
 * - Handles undefined by omitting keys
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(value, (_key: string, v: unknown) => {
    if (isPlainObject(v)) {
      const sorted: Record<string, unknown> = {};
      for (const key of Object.keys(v).sort()) {
        if (v[key] !== undefined) {
          sorted[key] = v[key];
        }
      }
      return sorted;
    }
    return v;
  });
}

/**
 * Extract the hex portion from a Hash
 */
export function hashToHex(hash: Hash): string {
  return hash.slice(7);
}

/** Prefix for names generated for unnamed `[Function]` headers. */
export const GENERATED_NAME_PREFIX = "func_";

/**
 * Stable name for an unnamed function: prefix + 12 hex digits over
 * (parent name, order index, content).
 */
export function generatedFunctionName(parentName: string | null, orderIndex: number, content: string): string {
  const digest = sha256Text(canonicalJson([parentName ?? "", orderIndex, content]));
  return `${GENERATED_NAME_PREFIX}${digest.slice(0, 12)}`;
}
