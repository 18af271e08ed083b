/**
 * Anthropic Generation Adapter
 *
 * Makes real calls to the Anthropic messages API
 */

import type { AnthropicAdapterConfig, GenerationOutput, GenerationRequest } from './types';
import { BaseGenerationAdapter, isRecord, numberField } from './types';
import type { LLMUsage } from '../artifacts/types';

export class AnthropicGenerationAdapter extends BaseGenerationAdapter {
  constructor(private readonly config: AnthropicAdapterConfig) {
    super();
  }

  async generate(request: GenerationRequest): Promise<GenerationOutput> {
    const { apiKey, baseURL, model, maxTokens, temperature, timeout } = this.config;

    const body: Record<string, unknown> = {
      model,
      max_tokens: request.maxTokens ?? maxTokens ?? 2000,
      messages: [{ role: 'user', content: this.formatUserContent(request) }],
    };

    if (request.system) {
      body.system = request.system;
    }

    if ((request.temperature ?? temperature) !== undefined) {
      body.temperature = request.temperature ?? temperature;
    }

    const url = `${baseURL ?? 'https://api.anthropic.com'}/v1/messages`;
    const data = await this.postJson(
      'Anthropic',
      url,
      {
        'x-api-key': apiKey,
        'anthropic-version': '2023-06-01',
      },
      body,
      timeout ?? 60000
    );

    // Extract text from content blocks
    const blocks: unknown[] = Array.isArray(data.content) ? data.content : [];
    const text = blocks
      .map((c) => (isRecord(c) && c.type === 'text' && typeof c.text === 'string' ? c.text : ''))
      .join('');

    return { text, usage: this.readUsage(data) };
  }

  getModel(): string {
    return this.config.model;
  }

  private readUsage(data: Record<string, unknown>): LLMUsage | undefined {
    if (!isRecord(data.usage)) return undefined;
    const promptTokens = numberField(data.usage, 'input_tokens');
    const completionTokens = numberField(data.usage, 'output_tokens');
    return {
      promptTokens,
      completionTokens,
      totalTokens: promptTokens + completionTokens,
      estimatedCost: this.estimateCost({ promptTokens, completionTokens }, this.config.model),
    };
  }
}
