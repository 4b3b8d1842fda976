export { loadConfig, loadDatabaseConfig, loadLoggingConfig } from './config/index.js';
export type { Config, DatabaseConfig, LlmConfig, LoggingConfig, ServerConfig } from './config/index.js';
export { createQueryAssistant } from './context.js';
export type { AssistantOverrides } from './context.js';
export { ConfigurationError, fail, ok } from './errors.js';
export type { Failure, FailureKind, Result } from './errors.js';
export { EXAMPLE_QUESTIONS } from './examples.js';
export { QueryExecutor } from './executor/query-executor.js';
export type { ResultSet } from './executor/query-executor.js';
export { ensureDatabase, resetDatabase } from './fixtures/bootstrap.js';
export { createSampleData, POLICY_TYPES } from './fixtures/seed.js';
export type { SeedOptions, SeedSummary } from './fixtures/seed.js';
export { seededRandom } from './fixtures/random.js';
export { createCompletionService } from './llm/completion.js';
export type { CompletionService } from './llm/completion.js';
export { GeminiClient } from './llm/gemini-client.js';
export { OpenAIClient } from './llm/openai-client.js';
export { QueryAssistant } from './QueryAssistant.js';
export type { AssistantTurn } from './QueryAssistant.js';
export { describe } from './report/describe.js';
export type { ColumnStatistics, SummaryStatistics } from './report/describe.js';
export { formatTurn } from './report/present.js';
export { renderSchemaCatalog } from './schema/catalog.js';
export { compareWithCatalog, SchemaIntrospector } from './schema/introspect.js';
export { TABLES } from './schema/tables.js';
export { createApp, startServer } from './server/app.js';
export { SqliteStore } from './sqlite/db.js';
export { extractSql } from './translator/extract.js';
export { Translator } from './translator/translator.js';
