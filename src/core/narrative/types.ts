// src/core/narrative/types.ts
// Token and document model for narrative text

export type TokenKind = "Scene" | "Component" | "Function";

/**
 * One Scene, Component or Function unit of a narrative.
 *
 * `id` is the identity key `kind:name` joined by `/` along the parent chain,
 * so it survives edits that leave kind, name and parents unchanged.
 */
export interface Token {
  id: string;
  kind: TokenKind;
  name: string;
  /** True when the name was generated for an unnamed `[Function]` header */
  generatedName: boolean;
  orderIndex: number;
  content: string;
  contentHash: string;
  /** Reference targets in first-seen order, deduplicated */
  references: string[];
  parentId: string | null;
  /** 1-based line number of the header */
  line: number;
}

/** A `REF:` line as written, before resolution. */
export interface ReferenceLine {
  sourceId: string;
  target: string;
  line: number;
}

export interface ParsedNarrative {
  tokens: Token[];
  references: ReferenceLine[];
}

export interface NarrativeDocument {
  id: string;
  version: string;
  text: string;
  tokenIds: string[];
  supersededBy?: string;
  createdAt: string;
}
