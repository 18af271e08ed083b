/**
 * Code Evaluator
 *
 * Asks a second model to score a compiled artifact. The reply must be a JSON
 * object `{ "score": 0-10, "feedback": "..." }`; anything else scores 0.
 */

import type { GenerationCapability, GenerationRequest } from '../generation/types';
import type { CompiledArtifact, LLMUsage } from '../artifacts/types';
import type { Logger } from '../log';
import { isRecord } from '../generation/types';
import { ZERO_USAGE } from '../artifacts/types';
import { extractCode } from '../compiler/prompt';
import { errorMessage } from '../errors';
import { silentLogger } from '../log';

export interface CodeEvaluation {
  /** 0-10; 0 also when the reply could not be read or the call failed */
  score: number;
  feedback: string;
  usage: LLMUsage;
}

export interface CodeEvaluatorConfig {
  /** Should be a different model from the one that generated the code */
  evaluator: GenerationCapability;
  maxTokens?: number;
  temperature?: number;
  log?: Logger;
}

export const EVALUATION_SYSTEM_PROMPT = [
  'You are a code evaluation assistant. You MUST respond with ONLY a JSON object in this format:',
  '{"score": <number 0-10>, "feedback": "<brief feedback>"}',
  'Example: {"score": 8.5, "feedback": "Good code structure but missing error handling"}',
  'Analyze the code for correctness, style, and clarity.',
].join('\n');

export function renderEvaluationContent(code: string, extra: Record<string, unknown>): string {
  return [
    'Here is the code to evaluate:',
    code,
    '',
    `Context (if any): ${JSON.stringify(extra, null, 2)}`,
    '',
    'Please respond with a JSON object, e.g.:',
    '{',
    '  "score": 9.1,',
    '  "feedback": "Short summary here."',
    '}',
  ].join('\n');
}

/**
 * Read `{ score, feedback }` from a reply, bare or in a fenced block.
 * @throws Error describing what is wrong with the reply
 */
export function parseEvaluation(text: string): { score: number; feedback: string } {
  const parsed: unknown = JSON.parse(extractCode(text));
  if (!isRecord(parsed)) {
    throw new Error('expected a JSON object');
  }
  const { score, feedback } = parsed;
  if (typeof score !== 'number' || !Number.isFinite(score) || score < 0 || score > 10) {
    throw new Error('score must be a number between 0 and 10');
  }
  if (typeof feedback !== 'string') {
    throw new Error('feedback must be a string');
  }
  return { score, feedback };
}

export class CodeEvaluator {
  private readonly log: Logger;

  constructor(private readonly config: CodeEvaluatorConfig) {
    this.log = config.log ?? silentLogger;
  }

  /**
   * Score one artifact. Never throws: unreadable replies and failed calls
   * come back as score 0 with the reason in `feedback`.
   */
  async evaluate(artifact: CompiledArtifact, extra: Record<string, unknown> = {}): Promise<CodeEvaluation> {
    const request: GenerationRequest = {
      context: {
        tokenId: artifact.tokenId,
        tokenName: artifact.tokenName,
        kind: artifact.tokenKind,
        content: artifact.code,
        dependencies: [],
        target: { language: artifact.language, framework: artifact.framework },
        attempt: 1,
      },
      system: EVALUATION_SYSTEM_PROMPT,
      userContent: renderEvaluationContent(artifact.code, { token: artifact.tokenName, ...extra }),
      maxTokens: this.config.maxTokens ?? 1000,
      temperature: this.config.temperature ?? 0.3,
    };

    let text: string;
    let usage: LLMUsage;
    try {
      const output = await this.config.evaluator.generate(request);
      text = output.text;
      usage = output.usage ?? ZERO_USAGE;
    } catch (e) {
      const feedback = `LLM call failed: ${errorMessage(e)}`;
      this.log.error(`evaluate ${artifact.tokenName}: ${feedback}`);
      return { score: 0, feedback, usage: ZERO_USAGE };
    }

    try {
      return { ...parseEvaluation(text), usage };
    } catch (e) {
      this.log.warn(`evaluate ${artifact.tokenName}: unreadable reply`);
      return { score: 0, feedback: `Parse error: ${errorMessage(e)}. Raw: ${text.slice(0, 100)}`, usage };
    }
  }
}
