import type { Config } from './config/index.js';
import type { SeedOptions } from './fixtures/seed.js';
import { createCompletionService, type CompletionService } from './llm/completion.js';
import { QueryAssistant } from './QueryAssistant.js';
import { SqliteStore } from './sqlite/db.js';
import { Translator } from './translator/translator.js';

export interface AssistantOverrides {
  completion?: CompletionService;
  seed?: SeedOptions;
}

/** Wires the store, the completion service and the translator from configuration. */
export function createQueryAssistant(
  config: Pick<Config, 'llm' | 'database'>,
  overrides: AssistantOverrides = {},
): QueryAssistant {
  const completion = overrides.completion ?? createCompletionService(config.llm);
  return new QueryAssistant({
    translator: new Translator(completion),
    store: new SqliteStore(config.database.path),
    seedSize: config.database.seedSize,
    seed: overrides.seed,
  });
}
