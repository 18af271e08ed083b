/**
 * Groq Generation Adapter
 *
 * Groq serves an OpenAI-compatible chat completions endpoint.
 */

import { OpenAIGenerationAdapter } from './openai';

export class GroqGenerationAdapter extends OpenAIGenerationAdapter {
  protected readonly label: string = 'Groq';
  protected readonly defaultBaseURL: string = 'https://api.groq.com/openai/v1';
}
