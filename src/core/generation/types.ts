/**
 * Generation Capability Interface
 *
 * Common interface for code generation providers used by the token compiler.
 * Adapters handle the actual LLM API calls.
 */

import type { TokenKind } from '../narrative/types';
import type { LLMUsage, TargetSpec } from '../artifacts/types';
import { GenerationError, errorMessage } from '../errors';

/**
 * Compiled dependency handed to a dependent token's prompt
 */
export interface DependencySummary {
  name: string;
  kind: TokenKind;
  code: string;
}

/**
 * Structured input of one generation attempt
 */
export interface GenerationContext {
  tokenId: string;
  tokenName: string;
  kind: TokenKind;
  content: string;
  dependencies: DependencySummary[];
  target: TargetSpec;
  /** 1-based attempt number within the repair loop */
  attempt: number;
  /** Code produced by the previous attempt (attempts 2..N) */
  previousCode?: string;
  /** Validator diagnostics of the previous attempt (attempts 2..N) */
  diagnostics?: string[];
}

/**
 * Request to send to LLM
 */
export interface GenerationRequest {
  context: GenerationContext;

  /** System instructions */
  system: string;

  /** Rendered token content and dependency context */
  userContent: string;

  /** Corrective context from the previous failed attempt */
  repairContext?: string;

  /** Max tokens for response */
  maxTokens?: number;

  /** Temperature (0-1) */
  temperature?: number;
}

export interface GenerationOutput {
  text: string;
  usage?: LLMUsage;
}

/**
 * Interface for generation adapters
 */
export interface GenerationCapability {
  /**
   * Send a generation request
   * @throws on transport or service failure
   */
  generate(request: GenerationRequest): Promise<GenerationOutput>;

  /**
   * Get the model identifier
   */
  getModel(): string;
}

/**
 * Base configuration for all adapters
 */
export interface GenerationAdapterConfig {
  /** Model to use */
  model: string;

  /** Max tokens for response (default: 2000) */
  maxTokens?: number;

  /** Temperature (default: 0) */
  temperature?: number;

  /** Request timeout in ms (default: 60000) */
  timeout?: number;
}

/**
 * OpenAI-compatible configuration (OpenAI, Groq)
 */
export interface OpenAIAdapterConfig extends GenerationAdapterConfig {
  apiKey: string;
  baseURL?: string;
  organization?: string;
}

/**
 * Anthropic-specific configuration
 */
export interface AnthropicAdapterConfig extends GenerationAdapterConfig {
  apiKey: string;
  baseURL?: string;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function numberField(obj: Record<string, unknown>, key: string): number {
  const v = obj[key];
  return typeof v === 'number' ? v : 0;
}

/**
 * Abstract base class for HTTP generation adapters
 */
export abstract class BaseGenerationAdapter implements GenerationCapability {
  abstract generate(request: GenerationRequest): Promise<GenerationOutput>;
  abstract getModel(): string;

  /**
   * Format the user message content
   */
  protected formatUserContent(request: GenerationRequest): string {
    let content = request.userContent;

    if (request.repairContext) {
      content = `${request.repairContext}\n\n---\n\nORIGINAL REQUEST:\n${content}`;
    }

    return content;
  }

  /**
   * POST a JSON body, aborting after `timeoutMs`.
   * Transport failures, non-2xx statuses and timeouts become GenerationError.
   */
  protected async postJson(
    label: string,
    url: string,
    headers: Record<string, string>,
    body: unknown,
    timeoutMs: number
  ): Promise<Record<string, unknown>> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', ...headers },
        body: JSON.stringify(body),
        signal: controller.signal,
      });

      if (!response.ok) {
        const error = await response.text();
        throw new GenerationError(`${label} API error ${response.status}: ${error}`);
      }

      const data: unknown = await response.json();
      if (!isRecord(data)) {
        throw new GenerationError(`${label} API returned a non-object response`);
      }
      return data;
    } catch (e) {
      if (e instanceof GenerationError) throw e;
      if (e instanceof Error && e.name === 'AbortError') {
        throw new GenerationError(`${label} request timed out after ${timeoutMs}ms`, true, e);
      }
      throw new GenerationError(`${label} request failed: ${errorMessage(e)}`, false, e);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Estimate cost based on token usage and model
   */
  protected estimateCost(
    usage: { promptTokens: number; completionTokens: number },
    model: string
  ): number {
    // Rough estimates per 1M tokens
    const pricing: Record<string, { prompt: number; completion: number }> = {
      'gpt-4o': { prompt: 2.5, completion: 10.0 },
      'gpt-4o-mini': { prompt: 0.15, completion: 0.6 },
      'claude-3-5-sonnet-latest': { prompt: 3.0, completion: 15.0 },
      'claude-3-5-haiku-latest': { prompt: 0.8, completion: 4.0 },
      'llama-3.3-70b-versatile': { prompt: 0.59, completion: 0.79 },
      'llama-3.1-8b-instant': { prompt: 0.05, completion: 0.08 },
    };

    const prices = pricing[model] ?? { prompt: 1.0, completion: 3.0 };

    return (
      (usage.promptTokens / 1_000_000) * prices.prompt +
      (usage.completionTokens / 1_000_000) * prices.completion
    );
  }
}
