import { describe, it, expect } from 'vitest';
import { renderSchemaCatalog } from '../src/schema/catalog.js';
import { buildTranslationPrompt, Translator } from '../src/translator/translator.js';
import { FakeCompletion } from './helpers.js';

describe('Translator', () => {
  it('grounds the prompt in the schema catalog', () => {
    const prompt = buildTranslationPrompt('Show the number of policies by type', renderSchemaCatalog());

    expect(prompt.startsWith('You are a SQL expert. Given the following database schema:\n\nThe database has the following tables:')).toBe(true);
    expect(prompt).toContain('Write a SQL query to: Show the number of policies by type');
    expect(prompt.endsWith('Do not include any explanations or markdown formatting.')).toBe(true);
  });

  it('returns the extracted statement', async () => {
    const completion = new FakeCompletion('```sql\nSELECT COUNT(*) FROM agents;\n```');
    const translator = new Translator(completion);

    const result = await translator.translate('How many agents are there?');

    expect(result).toEqual({ ok: true, value: 'SELECT COUNT(*) FROM agents;' });
    expect(translator.provider).toBe('fake');
  });

  it('wraps service errors as translation failures', async () => {
    const translator = new Translator(new FakeCompletion(new Error('quota exceeded')));

    const result = await translator.translate('Anything');

    expect(result).toEqual({
      ok: false,
      failure: { kind: 'translation', message: 'Error generating SQL: quota exceeded', detail: 'quota exceeded' },
    });
  });

  it('fails when nothing can be extracted', async () => {
    const translator = new Translator(new FakeCompletion('   '));

    const result = await translator.translate('Anything');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.failure.detail).toBe('The completion service returned no SQL statement');
  });

  it('calls the service for every question, repeated or not', async () => {
    const completion = new FakeCompletion('SELECT 1');
    const translator = new Translator(completion, 'tiny catalog');

    await translator.translate('Same question');
    await translator.translate('Same question');

    expect(completion.prompts).toHaveLength(2);
    expect(completion.prompts[0]).toContain('tiny catalog');
  });
});
