import type { GenerationContext, GenerationRequest } from '../generation/types';
import type { TargetSpec } from '../artifacts/types';

/**
 * System instructions for a target
 */
export function buildSystemPrompt(target: TargetSpec, override?: string): string {
  if (override) return override;
  return [
    `You are a code generator. Translate the narrative instruction you are given into ${target.language} code for ${target.framework}.`,
    'Code from already compiled dependencies is provided for reference; use its exported names instead of redefining them.',
    'Return ONLY the code, in a single fenced code block, with no explanation.',
  ].join('\n');
}

/**
 * Render the token and a compact summary of its dependency artifacts
 */
export function renderUserContent(context: GenerationContext): string {
  const parts: string[] = [];

  parts.push(`TOKEN: ${context.kind} ${context.tokenName}`);
  parts.push('NARRATIVE:');
  parts.push(context.content.trimEnd());

  if (context.dependencies.length > 0) {
    parts.push('');
    parts.push('DEPENDENCIES:');
    for (const dep of context.dependencies) {
      parts.push(`--- ${dep.kind} ${dep.name} ---`);
      parts.push(dep.code.trimEnd());
    }
  }

  return parts.join('\n');
}

/**
 * Build a repair prompt from the previous attempt's code and diagnostics.
 * This becomes the counterexample that guides the next attempt.
 */
export function buildRepairPrompt(previousCode: string, diagnostics: string[]): string {
  const lines: string[] = [
    'YOUR PREVIOUS CODE FAILED VALIDATION.',
    '',
    'PREVIOUS CODE:',
    previousCode.trimEnd(),
    '',
    'DIAGNOSTICS:',
  ];

  for (const d of diagnostics) {
    lines.push(`  - ${d}`);
  }

  lines.push('');
  lines.push('INSTRUCTIONS:');
  lines.push('1. Fix ALL diagnostics listed above');
  lines.push('2. Keep as much of the previous structure as possible');
  lines.push('3. Return ONLY the corrected code');

  return lines.join('\n');
}

export function buildGenerationRequest(
  context: GenerationContext,
  options: { systemPrompt?: string; maxTokens?: number; temperature?: number } = {}
): GenerationRequest {
  const repairContext =
    context.attempt > 1 && context.previousCode !== undefined
      ? buildRepairPrompt(context.previousCode, context.diagnostics ?? [])
      : undefined;

  return {
    context,
    system: buildSystemPrompt(context.target, options.systemPrompt),
    userContent: renderUserContent(context),
    repairContext,
    maxTokens: options.maxTokens,
    temperature: options.temperature,
  };
}

/**
 * Take the first fenced code block of a response, or the whole trimmed text
 */
export function extractCode(response: string): string {
  const fenced = response.match(/```[\w.+-]*[^\S\n]*\n([\s\S]*?)```/);
  return fenced ? fenced[1].trim() : response.trim();
}
