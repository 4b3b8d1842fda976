import { z } from 'zod';
import { ConfigurationError } from '../errors.js';

const blankAsUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

function fromEnv<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess(blankAsUndefined, schema);
}

const databaseSchema = z.object({
  DATABASE_PATH: fromEnv(z.string().trim().default('health_insurance.db')),
  SEED_SIZE: fromEnv(z.coerce.number().int().min(5).default(50)),
});

const loggingSchema = z.object({
  LOG_LEVEL: fromEnv(
    z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  ),
  LOG_DIR: fromEnv(z.string().trim().optional()),
});

const envSchema = databaseSchema
  .merge(loggingSchema)
  .extend({
    LLM_PROVIDER: fromEnv(z.enum(['gemini', 'openai']).default('gemini')),
    GEMINI_API_KEY: fromEnv(z.string().trim().optional()),
    GEMINI_MODEL: fromEnv(z.string().trim().default('gemini-2.5-flash')),
    OPENAI_API_KEY: fromEnv(z.string().trim().optional()),
    OPENAI_MODEL: fromEnv(z.string().trim().default('gpt-4o-mini')),
    OPENAI_BASE_URL: fromEnv(z.string().trim().url().default('https://api.openai.com/v1')),
    PORT: fromEnv(z.coerce.number().int().min(0).max(65535).default(3000)),
    RATE_LIMIT_WINDOW_MS: fromEnv(z.coerce.number().int().positive().default(900_000)),
    RATE_LIMIT_REQUESTS: fromEnv(z.coerce.number().int().positive().default(100)),
  })
  .superRefine((env, ctx) => {
    if (env.LLM_PROVIDER === 'gemini' && !env.GEMINI_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['GEMINI_API_KEY'],
        message: 'GEMINI_API_KEY is required when LLM_PROVIDER is gemini',
      });
    }
    if (env.LLM_PROVIDER === 'openai' && !env.OPENAI_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['OPENAI_API_KEY'],
        message: 'OPENAI_API_KEY is required when LLM_PROVIDER is openai',
      });
    }
  });

export type LlmConfig =
  | { provider: 'gemini'; apiKey: string; model: string }
  | { provider: 'openai'; apiKey: string; model: string; baseUrl: string };

export interface DatabaseConfig {
  path: string;
  seedSize: number;
}

export interface ServerConfig {
  port: number;
  rateLimitWindowMs: number;
  rateLimitRequests: number;
}

export interface LoggingConfig {
  level: string;
  dir?: string;
}

export interface Config {
  llm: LlmConfig;
  database: DatabaseConfig;
  server: ServerConfig;
  logging: LoggingConfig;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const key = issue.path.join('.');
    return key ? `${key}: ${issue.message}` : issue.message;
  });
}

function parse<T extends z.ZodTypeAny>(schema: T, env: NodeJS.ProcessEnv): z.output<T> {
  const parsed = schema.safeParse(env);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new ConfigurationError(`Invalid configuration:\n  ${issues.join('\n  ')}`, issues);
  }
  return parsed.data;
}

/**
 * Builds the application configuration from environment variables.
 * Throws a ConfigurationError when the completion-service credential is missing.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = parse(envSchema, env);

  let llm: LlmConfig;
  if (parsed.LLM_PROVIDER === 'openai') {
    llm = {
      provider: 'openai',
      apiKey: parsed.OPENAI_API_KEY ?? '',
      model: parsed.OPENAI_MODEL,
      baseUrl: parsed.OPENAI_BASE_URL.replace(/\/+$/, ''),
    };
  } else {
    llm = { provider: 'gemini', apiKey: parsed.GEMINI_API_KEY ?? '', model: parsed.GEMINI_MODEL };
  }

  return Object.freeze({
    llm,
    database: { path: parsed.DATABASE_PATH, seedSize: parsed.SEED_SIZE },
    server: {
      port: parsed.PORT,
      rateLimitWindowMs: parsed.RATE_LIMIT_WINDOW_MS,
      rateLimitRequests: parsed.RATE_LIMIT_REQUESTS,
    },
    logging: { level: parsed.LOG_LEVEL, dir: parsed.LOG_DIR },
  });
}

/** Store settings only; used by commands that never call the completion service. */
export function loadDatabaseConfig(env: NodeJS.ProcessEnv = process.env): DatabaseConfig {
  const parsed = parse(databaseSchema, env);
  return { path: parsed.DATABASE_PATH, seedSize: parsed.SEED_SIZE };
}

export function loadLoggingConfig(env: NodeJS.ProcessEnv = process.env): LoggingConfig {
  const parsed = parse(loggingSchema, env);
  return { level: parsed.LOG_LEVEL, dir: parsed.LOG_DIR };
}
