/**
 * Generation Adapters
 */

import type { LLMConfig } from '../config/config';
import type { GenerationCapability } from './types';
import { ConfigError } from '../errors';
import { OpenAIGenerationAdapter } from './openai';
import { AnthropicGenerationAdapter } from './anthropic';
import { GroqGenerationAdapter } from './groq';

export * from './types';
export { ScriptedGenerationAdapter, type ScriptedResponse, type ScriptedAdapterConfig } from './scripted';
export { OpenAIGenerationAdapter } from './openai';
export { AnthropicGenerationAdapter } from './anthropic';
export { GroqGenerationAdapter } from './groq';

/**
 * Pick the adapter for the configured provider
 */
export function createGenerationAdapter(llm: LLMConfig): GenerationCapability {
  if (!llm.apiKey) {
    throw new ConfigError(`Missing API key for provider: ${llm.provider}`);
  }

  const shared = {
    apiKey: llm.apiKey,
    baseURL: llm.baseUrl,
    model: llm.model,
    maxTokens: llm.maxTokens,
    temperature: llm.temperature,
    timeout: llm.timeoutMs,
  };

  switch (llm.provider) {
    case 'openai':
      return new OpenAIGenerationAdapter(shared);
    case 'anthropic':
      return new AnthropicGenerationAdapter(shared);
    case 'groq':
      return new GroqGenerationAdapter(shared);
  }
}
