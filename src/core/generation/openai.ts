/**
 * OpenAI Generation Adapter
 *
 * Makes real calls to the OpenAI chat completions API
 */

import type { GenerationOutput, GenerationRequest, OpenAIAdapterConfig } from './types';
import { BaseGenerationAdapter, isRecord, numberField } from './types';
import type { LLMUsage } from '../artifacts/types';

export class OpenAIGenerationAdapter extends BaseGenerationAdapter {
  protected readonly label: string = 'OpenAI';
  protected readonly defaultBaseURL: string = 'https://api.openai.com/v1';

  constructor(protected readonly config: OpenAIAdapterConfig) {
    super();
  }

  async generate(request: GenerationRequest): Promise<GenerationOutput> {
    const { apiKey, baseURL, organization, model, maxTokens, temperature, timeout } = this.config;

    const body = {
      model,
      messages: [
        { role: 'system', content: request.system },
        { role: 'user', content: this.formatUserContent(request) },
      ],
      max_tokens: request.maxTokens ?? maxTokens ?? 2000,
      temperature: request.temperature ?? temperature ?? 0,
    };

    const headers: Record<string, string> = {
      'Authorization': `Bearer ${apiKey}`,
    };

    if (organization) {
      headers['OpenAI-Organization'] = organization;
    }

    const url = `${baseURL ?? this.defaultBaseURL}/chat/completions`;
    const data = await this.postJson(this.label, url, headers, body, timeout ?? 60000);

    return { text: firstChoiceText(data), usage: this.readUsage(data) };
  }

  getModel(): string {
    return this.config.model;
  }

  private readUsage(data: Record<string, unknown>): LLMUsage | undefined {
    if (!isRecord(data.usage)) return undefined;
    const promptTokens = numberField(data.usage, 'prompt_tokens');
    const completionTokens = numberField(data.usage, 'completion_tokens');
    return {
      promptTokens,
      completionTokens,
      totalTokens: numberField(data.usage, 'total_tokens') || promptTokens + completionTokens,
      estimatedCost: this.estimateCost({ promptTokens, completionTokens }, this.config.model),
    };
  }
}

function firstChoiceText(data: Record<string, unknown>): string {
  if (!Array.isArray(data.choices)) return '';
  const choice: unknown = data.choices[0];
  if (!isRecord(choice) || !isRecord(choice.message)) return '';
  const content = choice.message.content;
  return typeof content === 'string' ? content : '';
}
