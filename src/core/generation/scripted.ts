/**
 * Scripted Generation Adapter
 *
 * Returns pre-defined responses in sequence. Used for testing.
 */

import type { GenerationOutput, GenerationRequest } from './types';
import { BaseGenerationAdapter } from './types';
import { GenerationError } from '../errors';

export type ScriptedResponse =
  | string
  | { response: string; delay?: number }
  | { error: string; timedOut?: boolean; delay?: number }
  | ((request: GenerationRequest) => string | Promise<string>);

/**
 * Scripted adapter configuration (for testing)
 */
export interface ScriptedAdapterConfig {
  /** Responses to return in sequence */
  responses: ScriptedResponse[];

  /** Whether to loop responses or throw on exhaustion */
  loop?: boolean;
}

/**
 * Adapter that returns scripted responses for testing
 */
export class ScriptedGenerationAdapter extends BaseGenerationAdapter {
  private responses: ScriptedResponse[];
  private loop: boolean;
  private index = 0;

  /** Every request received, in call order */
  readonly requests: GenerationRequest[] = [];

  constructor(config: ScriptedAdapterConfig) {
    super();
    this.responses = config.responses;
    this.loop = config.loop ?? false;
  }

  async generate(request: GenerationRequest): Promise<GenerationOutput> {
    this.requests.push(request);

    if (this.index >= this.responses.length) {
      if (this.loop && this.responses.length > 0) {
        this.index = 0;
      } else {
        throw new GenerationError('ScriptedGenerationAdapter: No more responses available');
      }
    }

    const item = this.responses[this.index++];
    let response: string;

    if (typeof item === 'function') {
      response = await item(request);
    } else if (typeof item === 'string') {
      response = item;
    } else {
      if (item.delay && item.delay > 0) {
        await new Promise((resolve) => setTimeout(resolve, item.delay));
      }
      if ('error' in item) {
        throw new GenerationError(item.error, item.timedOut ?? false);
      }
      response = item.response;
    }

    // Estimate token counts based on content length
    const promptTokens = Math.ceil(request.userContent.length / 4);
    const completionTokens = Math.ceil(response.length / 4);

    return {
      text: response,
      usage: {
        promptTokens,
        completionTokens,
        totalTokens: promptTokens + completionTokens,
        estimatedCost: this.estimateCost({ promptTokens, completionTokens }, 'scripted'),
      },
    };
  }

  getModel(): string {
    return 'scripted';
  }

  get callCount(): number {
    return this.requests.length;
  }
}
