import type { Failure, Result } from './errors.js';
import { EXAMPLE_QUESTIONS } from './examples.js';
import { QueryExecutor, type ResultSet } from './executor/query-executor.js';
import { ensureDatabase, resetDatabase } from './fixtures/bootstrap.js';
import type { SeedOptions, SeedSummary } from './fixtures/seed.js';
import { describe, type SummaryStatistics } from './report/describe.js';
import { compareWithCatalog, SchemaIntrospector, type SchemaInfo } from './schema/introspect.js';
import { formatAssistantSummary, Transcript, TRANSLATION_FAILURE_NOTICE, type Message } from './session/history.js';
import type { SqliteStore } from './sqlite/db.js';
import type { Translator } from './translator/translator.js';
import { queryLogger } from './utils/logger.js';

export interface AnsweredTurn {
  status: 'answered';
  question: string;
  sql: string;
  result: ResultSet;
  statistics: SummaryStatistics | null;
}

export interface FailedTurn {
  status: 'failed';
  question: string;
  /** Present when translation succeeded and execution failed. */
  sql: string | null;
  failure: Failure;
}

export type AssistantTurn = AnsweredTurn | FailedTurn;

export interface QueryAssistantOptions {
  translator: Translator;
  store: SqliteStore;
  seedSize: number;
  seed?: SeedOptions;
  transcript?: Transcript;
}

/**
 * Question → SQL → rows. One question runs the whole pipeline once; the
 * transcript is written after each turn and never fed back into it.
 */
export class QueryAssistant {
  private readonly translator: Translator;
  private readonly executor: QueryExecutor;
  private readonly store: SqliteStore;
  private readonly seedSize: number;
  private readonly seed: SeedOptions;
  private readonly transcript: Transcript;

  constructor(options: QueryAssistantOptions) {
    this.translator = options.translator;
    this.store = options.store;
    this.executor = new QueryExecutor(options.store);
    this.seedSize = options.seedSize;
    this.seed = options.seed ?? {};
    this.transcript = options.transcript ?? new Transcript();
  }

  get provider(): string {
    return this.translator.provider;
  }

  get catalog(): string {
    return this.translator.catalog;
  }

  get examples(): readonly string[] {
    return EXAMPLE_QUESTIONS;
  }

  /** Seeds the store the first time it is used. */
  ensureReady(): Promise<SeedSummary | null> {
    return ensureDatabase(this.store, this.seedSize, this.seed);
  }

  async ask(question: string): Promise<AssistantTurn> {
    const started = Date.now();
    await this.ensureReady();
    this.transcript.append('user', question);

    const translation = await this.translator.translate(question);
    if (!translation.ok) {
      this.transcript.append('assistant', TRANSLATION_FAILURE_NOTICE);
      queryLogger.warn('Question could not be translated', { question, error: translation.failure.detail });
      return { status: 'failed', question, sql: null, failure: translation.failure };
    }

    const sql = translation.value;
    const execution = await this.executor.execute(sql);
    if (!execution.ok) {
      this.transcript.append('assistant', formatAssistantSummary(sql, 0));
      queryLogger.warn('Generated SQL failed', { question, sql, error: execution.failure.detail });
      return { status: 'failed', question, sql, failure: execution.failure };
    }

    const result = execution.value;
    const statistics = describe(result);
    this.transcript.append('assistant', formatAssistantSummary(sql, result.rowCount));
    queryLogger.info('Question answered', {
      question,
      sql,
      rowCount: result.rowCount,
      duration: Date.now() - started,
    });
    return { status: 'answered', question, sql, result, statistics };
  }

  translate(question: string): Promise<Result<string>> {
    return this.translator.translate(question);
  }

  async execute(sql: string): Promise<Result<ResultSet>> {
    await this.ensureReady();
    return this.executor.execute(sql);
  }

  reset(size: number = this.seedSize): Promise<SeedSummary> {
    return resetDatabase(this.store, size, this.seed);
  }

  history(): readonly Message[] {
    return this.transcript.list();
  }

  async schema(): Promise<SchemaInfo> {
    await this.ensureReady();
    return this.store.withConnection((connection) => new SchemaIntrospector(connection).getSchema());
  }

  /** Differences between the live store and the catalog shown to the model. */
  async checkSchema(): Promise<string[]> {
    return compareWithCatalog(await this.schema());
  }
}
