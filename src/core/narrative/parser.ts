// src/core/narrative/parser.ts
// Bracket-header narrative parser: text -> ordered token tree + REF lines

import type { ParsedNarrative, ReferenceLine, Token, TokenKind } from "./types";
import { NarrativeSyntaxError } from "../errors";
import { generatedFunctionName, sha256Text } from "../artifacts/hash";

// `[Keyword:Name]` or `[Keyword: Name]`, anything after the bracket captured
const NAMED_HEADER = /^\[(scene|component|function): ?([^\s[\]](?:[^[\]]*[^\s[\]])?)\](.*)$/i;
// `[Function]`
const UNNAMED_HEADER = /^\[(function)\](.*)$/i;

const REF_PREFIX = "REF:";

/** Scene holding text that precedes the first header */
export const DEFAULT_SCENE_NAME = "DefaultScene";

type HeaderMatch = {
  kind: TokenKind;
  name: string | null;
  trailing: string;
};

type PendingToken = {
  kind: TokenKind;
  name: string | null;
  parent: PendingToken | null;
  orderIndex: number;
  line: number;
  content: string[];
  references: Array<{ target: string; line: number }>;
  token?: Token;
};

function toKind(keyword: string): TokenKind {
  switch (keyword.toLowerCase()) {
    case "scene":
      return "Scene";
    case "component":
      return "Component";
    default:
      return "Function";
  }
}

/**
 * Match a line body (no line terminator) against the header pattern.
 * Returns null for lines that are plain content.
 */
export function matchHeader(body: string): HeaderMatch | null {
  const named = NAMED_HEADER.exec(body);
  if (named) {
    return { kind: toKind(named[1]), name: named[2], trailing: named[3] };
  }
  const unnamed = UNNAMED_HEADER.exec(body);
  if (unnamed) {
    return { kind: "Function", name: null, trailing: unnamed[2] };
  }
  return null;
}

/**
 * Split text into lines that keep their `\n` terminator.
 */
export function splitLines(text: string): string[] {
  return text.match(/[^\n]*\n|[^\n]+$/g) ?? [];
}

function stripTerminator(segment: string): string {
  return segment.replace(/\r?\n$/, "").replace(/\r$/, "");
}

function identityKey(kind: TokenKind, name: string, parentId: string | null): string {
  const own = `${kind.toLowerCase()}:${name}`;
  return parentId === null ? own : `${parentId}/${own}`;
}

/**
 * Parse narrative text into tokens (document order) and raw reference lines.
 *
 * Non-blank text before the first header lands in an implicit `DefaultScene`.
 *
 * @throws NarrativeSyntaxError on trailing text after a header, an empty `REF:`
 *   or a duplicate sibling name
 */
export function parseNarrative(text: string): ParsedNarrative {
  const pending: PendingToken[] = [];
  let current: PendingToken | null = null;
  let openScene: PendingToken | null = null;
  let openComponent: PendingToken | null = null;

  const segments = splitLines(text);
  for (let i = 0; i < segments.length; i++) {
    const segment = segments[i];
    const lineNo = i + 1;
    const body = stripTerminator(segment);
    const header = matchHeader(body);

    if (header) {
      if (header.trailing.trim() !== "") {
        throw new NarrativeSyntaxError("unexpected text after header", lineNo, body);
      }
      let parent: PendingToken | null;
      if (header.kind === "Scene") {
        parent = null;
      } else if (header.kind === "Component") {
        parent = openScene;
      } else {
        parent = openComponent;
      }
      const tok: PendingToken = {
        kind: header.kind,
        name: header.name,
        parent,
        orderIndex: pending.length,
        line: lineNo,
        content: [],
        references: [],
      };
      pending.push(tok);
      current = tok;
      if (header.kind === "Scene") {
        openScene = tok;
        openComponent = null;
      } else if (header.kind === "Component") {
        openComponent = tok;
      }
      continue;
    }

    if (current === null) {
      if (body.trim() === "") continue;
      // Text before any header opens the implicit default scene
      const scene: PendingToken = {
        kind: "Scene",
        name: DEFAULT_SCENE_NAME,
        parent: null,
        orderIndex: 0,
        line: lineNo,
        content: [],
        references: [],
      };
      pending.push(scene);
      current = scene;
      openScene = scene;
    }

    current.content.push(segment);
    const trimmed = body.trimStart();
    if (trimmed.startsWith(REF_PREFIX)) {
      const target = trimmed.slice(REF_PREFIX.length).trim();
      if (target === "") {
        throw new NarrativeSyntaxError("empty reference", lineNo, body);
      }
      current.references.push({ target, line: lineNo });
    }
  }

  return finalize(pending);
}

function finalize(pending: PendingToken[]): ParsedNarrative {
  const tokens: Token[] = [];
  const references: ReferenceLine[] = [];
  const siblingNames = new Map<string, Set<string>>();

  // Parents always precede their children, so a single pass resolves ids.
  for (const p of pending) {
    const content = p.content.join("");
    const parentToken = p.parent?.token ?? null;
    const name = p.name ?? generatedFunctionName(parentToken?.name ?? null, p.orderIndex, content);

    const scope = parentToken?.id ?? "";
    const seen = siblingNames.get(scope) ?? new Set<string>();
    if (seen.has(name)) {
      throw new NarrativeSyntaxError(`duplicate ${p.kind} name "${name}" in the same scope`, p.line, headerText(p.kind, p.name));
    }
    seen.add(name);
    siblingNames.set(scope, seen);

    const id = identityKey(p.kind, name, parentToken?.id ?? null);
    const refTargets: string[] = [];
    for (const ref of p.references) {
      references.push({ sourceId: id, target: ref.target, line: ref.line });
      if (!refTargets.includes(ref.target)) refTargets.push(ref.target);
    }

    const token: Token = {
      id,
      kind: p.kind,
      name,
      generatedName: p.name === null,
      orderIndex: p.orderIndex,
      content,
      contentHash: sha256Text(content),
      references: refTargets,
      parentId: parentToken?.id ?? null,
      line: p.line,
    };
    p.token = token;
    tokens.push(token);
  }

  return { tokens, references };
}

function headerText(kind: TokenKind, name: string | null): string {
  return name === null ? `[${kind}]` : `[${kind}:${name}]`;
}
