import type { LlmConfig } from '../config/index.js';
import { GeminiClient } from './gemini-client.js';
import { OpenAIClient } from './openai-client.js';

/** Text in, text out. One request per call, no streaming. */
export interface CompletionService {
  readonly name: string;
  complete(prompt: string): Promise<string>;
}

export function createCompletionService(config: LlmConfig): CompletionService {
  switch (config.provider) {
    case 'gemini':
      return new GeminiClient({ apiKey: config.apiKey, model: config.model });
    case 'openai':
      return new OpenAIClient({ apiKey: config.apiKey, model: config.model, baseUrl: config.baseUrl });
  }
}
