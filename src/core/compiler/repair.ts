/**
 * Self-Repair Loop
 *
 * Drives generation and validation for one token as an explicit state machine.
 * Invalid output is retried with the previous code and its diagnostics as
 * corrective context until it validates or the attempt budget runs out.
 */

import type { DependencySummary, GenerationCapability, GenerationContext } from '../generation/types';
import type { ValidationCapability, ValidationReport } from '../validation/types';
import type { LLMUsage, TargetSpec } from '../artifacts/types';
import type { TokenKind } from '../narrative/types';
import type { Logger } from '../log';
import { ZERO_USAGE, addUsage } from '../artifacts/types';
import { silentLogger } from '../log';
import { ConfigError, GenerationError, errorMessage } from '../errors';
import { buildGenerationRequest, extractCode } from './prompt';

export type RepairState = 'Pending' | 'Generating' | 'Validating' | 'Valid' | 'Invalid' | 'Failed';

const TRANSITIONS: Record<RepairState, readonly RepairState[]> = {
  Pending: ['Generating'],
  Generating: ['Validating'],
  Validating: ['Valid', 'Invalid'],
  Invalid: ['Generating', 'Failed'],
  Valid: [],
  Failed: [],
};

export interface RepairTransition {
  from: RepairState;
  to: RepairState;
  attempt: number;
}

export interface RepairAttempt {
  attempt: number;
  code: string;
  valid: boolean;
  diagnostics: string[];
  usage?: LLMUsage;
}

export interface RepairOutcome {
  tag: 'valid' | 'failed';
  code: string;
  attempts: number;
  /** Diagnostics of the last attempt */
  diagnostics: string[];
  trace: RepairTransition[];
  history: RepairAttempt[];
  usage: LLMUsage;
}

/**
 * What the loop needs to know about the token being compiled
 */
export interface RepairInput {
  tokenId: string;
  tokenName: string;
  kind: TokenKind;
  content: string;
  dependencies: DependencySummary[];
  target: TargetSpec;
}

export interface SelfRepairConfig {
  generator: GenerationCapability;
  validator: ValidationCapability;
  maxAttempts: number;

  /** Per-call limit on the generation capability (0 or absent: none) */
  timeoutMs?: number;

  systemPrompt?: string;
  maxTokens?: number;
  temperature?: number;
  log?: Logger;
}

/**
 * Tracks the current state and rejects transitions the machine does not have
 */
class RepairMachine {
  state: RepairState = 'Pending';
  readonly trace: RepairTransition[] = [];

  move(to: RepairState, attempt: number): void {
    if (!TRANSITIONS[this.state].includes(to)) {
      throw new Error(`Illegal repair transition ${this.state} -> ${to}`);
    }
    this.trace.push({ from: this.state, to, attempt });
    this.state = to;
  }
}

export class SelfRepairLoop {
  private readonly log: Logger;

  constructor(private readonly config: SelfRepairConfig) {
    if (!Number.isInteger(config.maxAttempts) || config.maxAttempts < 1) {
      throw new ConfigError(`maxAttempts must be an integer >= 1, got ${config.maxAttempts}`);
    }
    this.log = config.log ?? silentLogger;
  }

  /**
   * Run the loop to a terminal state.
   * @throws GenerationError when the generation capability fails; no retry here.
   */
  async run(input: RepairInput): Promise<RepairOutcome> {
    const { maxAttempts } = this.config;
    const machine = new RepairMachine();
    const history: RepairAttempt[] = [];
    let usage = ZERO_USAGE;
    let previousCode: string | undefined;
    let diagnostics: string[] = [];

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      machine.move('Generating', attempt);

      const context: GenerationContext = {
        ...input,
        attempt,
        previousCode,
        diagnostics: attempt > 1 ? diagnostics : undefined,
      };
      const request = buildGenerationRequest(context, {
        systemPrompt: this.config.systemPrompt,
        maxTokens: this.config.maxTokens,
        temperature: this.config.temperature,
      });

      this.log.debug(`generate ${input.tokenName} attempt ${attempt}/${maxAttempts}`);
      const output = await this.callGenerator(() => this.config.generator.generate(request));
      usage = addUsage(usage, output.usage);
      const code = extractCode(output.text);

      machine.move('Validating', attempt);
      const report = await this.validate(code, input.target.language);
      history.push({ attempt, code, valid: report.valid, diagnostics: report.diagnostics, usage: output.usage });

      if (report.valid) {
        machine.move('Valid', attempt);
        return { tag: 'valid', code, attempts: attempt, diagnostics: [], trace: machine.trace, history, usage };
      }

      machine.move('Invalid', attempt);
      this.log.debug(`${input.tokenName} attempt ${attempt} invalid`, { diagnostics: report.diagnostics });
      previousCode = code;
      diagnostics = report.diagnostics;
    }

    machine.move('Failed', maxAttempts);
    return {
      tag: 'failed',
      code: previousCode ?? '',
      attempts: maxAttempts,
      diagnostics,
      trace: machine.trace,
      history,
      usage,
    };
  }

  private async callGenerator<T>(call: () => Promise<T>): Promise<T> {
    const { timeoutMs } = this.config;
    try {
      if (!timeoutMs || timeoutMs <= 0) return await call();
      return await withTimeout(call(), timeoutMs);
    } catch (e) {
      if (e instanceof GenerationError) throw e;
      throw new GenerationError(`Generation failed: ${errorMessage(e)}`, false, e);
    }
  }

  private async validate(code: string, language: string): Promise<ValidationReport> {
    try {
      return await this.config.validator.validate(code, language);
    } catch (e) {
      return { valid: false, diagnostics: [`Validator error: ${errorMessage(e)}`] };
    }
  }
}

function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new GenerationError(`Generation timed out after ${ms}ms`, true));
    }, ms);
    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (err: unknown) => {
        clearTimeout(timer);
        reject(err);
      }
    );
  });
}
