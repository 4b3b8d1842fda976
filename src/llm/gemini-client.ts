/**
 * Gemini API Client
 * Sends a single prompt to Google's Gemini API and returns the completion text
 */

import { GoogleGenerativeAI, type GenerationConfig, type GenerativeModel } from '@google/generative-ai';
import type { CompletionService } from './completion.js';

export interface GeminiConfig {
  apiKey: string;
  model?: string;
  temperature?: number;
  maxOutputTokens?: number;
  topP?: number;
  topK?: number;
}

export class GeminiClient implements CompletionService {
  readonly name = 'gemini';
  private model: GenerativeModel;
  private generationConfig: GenerationConfig;

  constructor(config: GeminiConfig) {
    const genAI = new GoogleGenerativeAI(config.apiKey);
    this.model = genAI.getGenerativeModel({
      model: config.model || 'gemini-2.5-flash'
    });

    this.generationConfig = {
      temperature: config.temperature ?? 0.2,
      topP: config.topP ?? 0.8,
      topK: config.topK ?? 40,
      maxOutputTokens: config.maxOutputTokens ?? 2048,
    };
  }

  async complete(prompt: string): Promise<string> {
    const result = await this.model.generateContent({
      contents: [{ role: 'user', parts: [{ text: prompt }] }],
      generationConfig: this.generationConfig,
    });

    // text() throws when the candidate was blocked or is missing
    return result.response.text();
  }
}
