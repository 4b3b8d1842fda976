/**
 * OpenAI API Client
 * Chat-completions client for OpenAI and compatible endpoints
 */

import { z } from 'zod';
import type { CompletionService } from './completion.js';

export interface OpenAIConfig {
  apiKey: string;
  model?: string;
  baseUrl?: string;
  temperature?: number;
  maxTokens?: number;
  topP?: number;
}

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() }),
      }),
    )
    .min(1),
});

const ErrorBodySchema = z.object({
  error: z.object({ message: z.string() }),
});

export class OpenAIClient implements CompletionService {
  readonly name = 'openai';
  private config: Required<OpenAIConfig>;

  constructor(config: OpenAIConfig) {
    this.config = {
      model: 'gpt-4o-mini',
      baseUrl: 'https://api.openai.com/v1',
      temperature: 0.2,
      maxTokens: 2048,
      topP: 0.8,
      ...config,
    };
  }

  private get apiUrl(): string {
    return `${this.config.baseUrl}/chat/completions`;
  }

  async complete(prompt: string): Promise<string> {
    const response = await fetch(this.apiUrl, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'Authorization': `Bearer ${this.config.apiKey}`
      },
      body: JSON.stringify({
        model: this.config.model,
        messages: [{ role: 'user', content: prompt }],
        temperature: this.config.temperature,
        max_tokens: this.config.maxTokens,
        top_p: this.config.topP,
      })
    });

    if (!response.ok) {
      throw new Error(await this.describeFailure(response));
    }

    const parsed = ChatCompletionSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error('Malformed response from completion service');
    }

    const content = parsed.data.choices[0]?.message.content;
    if (!content) {
      throw new Error('Completion service returned no content');
    }
    return content;
  }

  private async describeFailure(response: Response): Promise<string> {
    if (response.status === 401) return 'Invalid API key';
    if (response.status === 429) return 'Rate limit exceeded or quota reached';

    const text = await response.text();
    let body: unknown = null;
    try {
      body = JSON.parse(text);
    } catch {
      body = null;
    }
    const parsed = ErrorBodySchema.safeParse(body);
    const detail = parsed.success ? parsed.data.error.message : text || response.statusText;
    return `Completion request failed (${response.status}): ${detail}`;
  }
}
