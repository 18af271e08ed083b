// src/core/store/narrativeStore.ts
// Persistence collaborator: documents, tokens and artifacts by identity

import type { NarrativeDocument, Token } from "../narrative/types";
import type { CompiledArtifact } from "../artifacts/types";
import type { Hash } from "../artifacts/hash";

/**
 * A token as persisted for a document: the parsed token plus a pointer to
 * its current artifact and its retirement flag.
 */
export interface StoredToken extends Token {
  documentId: string;
  /** Input hash of the current terminal artifact, if any */
  artifactInputHash: Hash | null;
  retired: boolean;
}

/**
 * Interface for narrative storage
 */
export interface NarrativeStore {
  /** Current (non-retired) tokens of a document, in order index order */
  loadTokens(documentId: string): Promise<StoredToken[]>;

  saveToken(token: StoredToken): Promise<void>;

  /** Soft-retire a token that is no longer in the latest version */
  retireToken(documentId: string, tokenId: string): Promise<void>;

  loadArtifact(inputHash: Hash): Promise<CompiledArtifact | null>;

  /** Upsert by input hash */
  saveArtifact(artifact: CompiledArtifact): Promise<void>;

  /** Latest version of a document */
  loadDocument(documentId: string): Promise<NarrativeDocument | null>;

  /** Every stored version of a document, oldest first */
  loadVersions(documentId: string): Promise<NarrativeDocument[]>;

  saveDocument(document: NarrativeDocument): Promise<void>;
}

/**
 * In-memory store implementation
 */
export class InMemoryNarrativeStore implements NarrativeStore {
  private readonly tokens = new Map<string, Map<string, StoredToken>>();
  private readonly artifacts = new Map<Hash, CompiledArtifact>();
  private readonly documents = new Map<string, NarrativeDocument[]>();

  async loadTokens(documentId: string): Promise<StoredToken[]> {
    const byId = this.tokens.get(documentId);
    if (!byId) return [];
    return [...byId.values()]
      .filter((t) => !t.retired)
      .sort((a, b) => a.orderIndex - b.orderIndex)
      .map((t) => ({ ...t, references: [...t.references] }));
  }

  async saveToken(token: StoredToken): Promise<void> {
    const byId = this.tokens.get(token.documentId) ?? new Map<string, StoredToken>();
    byId.set(token.id, { ...token, references: [...token.references] });
    this.tokens.set(token.documentId, byId);
  }

  async retireToken(documentId: string, tokenId: string): Promise<void> {
    const existing = this.tokens.get(documentId)?.get(tokenId);
    if (existing) {
      existing.retired = true;
    }
  }

  async loadArtifact(inputHash: Hash): Promise<CompiledArtifact | null> {
    return this.artifacts.get(inputHash) ?? null;
  }

  async saveArtifact(artifact: CompiledArtifact): Promise<void> {
    this.artifacts.set(artifact.inputHash, artifact);
  }

  async loadDocument(documentId: string): Promise<NarrativeDocument | null> {
    const versions = this.documents.get(documentId);
    if (!versions || versions.length === 0) return null;
    return versions[versions.length - 1];
  }

  /** Replaces a stored version with the same label in place */
  async saveDocument(document: NarrativeDocument): Promise<void> {
    const versions = this.documents.get(document.id) ?? [];
    const at = versions.findIndex((d) => d.version === document.version);
    if (at >= 0) {
      versions[at] = document;
    } else {
      versions.push(document);
    }
    this.documents.set(document.id, versions);
  }

  async loadVersions(documentId: string): Promise<NarrativeDocument[]> {
    return [...(this.documents.get(documentId) ?? [])];
  }

  /** Includes retired tokens */
  allTokens(documentId: string): StoredToken[] {
    return [...(this.tokens.get(documentId)?.values() ?? [])];
  }

  artifactCount(): number {
    return this.artifacts.size;
  }
}
