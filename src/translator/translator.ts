import { errorMessage, fail, ok, type Result } from '../errors.js';
import type { CompletionService } from '../llm/completion.js';
import { renderSchemaCatalog } from '../schema/catalog.js';
import { llmLogger } from '../utils/logger.js';
import { extractSql } from './extract.js';

export function buildTranslationPrompt(question: string, catalog: string): string {
  return `You are a SQL expert. Given the following database schema:

${catalog}

The database is SQLite. Write a SQL query to: ${question}

Return ONLY the SQL query, nothing else. Do not include any explanations or markdown formatting.`;
}

/**
 * Turns a natural-language question into one SQL statement using a
 * completion service. Every call goes to the service; nothing is cached and
 * failed calls are not retried.
 */
export class Translator {
  constructor(
    private readonly completion: CompletionService,
    readonly catalog: string = renderSchemaCatalog(),
  ) {}

  get provider(): string {
    return this.completion.name;
  }

  buildPrompt(question: string): string {
    return buildTranslationPrompt(question, this.catalog);
  }

  async translate(question: string): Promise<Result<string>> {
    const prompt = this.buildPrompt(question);
    const started = Date.now();

    let response: string;
    try {
      response = await this.completion.complete(prompt);
    } catch (error) {
      const detail = errorMessage(error);
      llmLogger.error('Completion request failed', { provider: this.provider, question, error: detail });
      return fail('translation', `Error generating SQL: ${detail}`, detail);
    }

    const sql = extractSql(response);
    llmLogger.debug('Completion received', {
      provider: this.provider,
      question,
      sql,
      latency: Date.now() - started,
    });

    if (!sql) {
      const detail = 'The completion service returned no SQL statement';
      return fail('translation', `Error generating SQL: ${detail}`, detail);
    }
    return ok(sql);
  }
}
