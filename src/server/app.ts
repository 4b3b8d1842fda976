/**
 * Express API Server
 * REST endpoints for asking questions of the insurance database
 */

import express, { Express, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import rateLimit from 'express-rate-limit';
import type { Server } from 'http';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import type { Failure } from '../errors.js';
import type { ResultSet } from '../executor/query-executor.js';
import { MIN_SEED_SIZE } from '../fixtures/seed.js';
import type { QueryAssistant } from '../QueryAssistant.js';
import { toRecords, type SqlValue } from '../sqlite/db.js';
import { apiLogger } from '../utils/logger.js';

export interface AppOptions {
  rateLimitWindowMs: number;
  rateLimitRequests: number;
}

// Request validation schemas
const QuestionRequestSchema = z.object({
  question: z.string().trim().min(1).max(1000),
});

const ExecuteRequestSchema = z.object({
  sql: z.string().trim().min(1),
});

const ResetRequestSchema = z.object({
  size: z.number().int().min(MIN_SEED_SIZE).max(10_000).optional(),
});

const HttpErrorSchema = z.object({ status: z.number().int().min(400).max(499), message: z.string() });

type JsonValue = number | string | null;

function toJsonValue(value: SqlValue): JsonValue {
  return value instanceof Uint8Array ? Buffer.from(value).toString('base64') : value;
}

function serializeResult(result: ResultSet) {
  return {
    columns: result.columns,
    rows: toRecords(result).map((row) =>
      Object.fromEntries(Object.entries(row).map(([key, value]) => [key, toJsonValue(value)])),
    ),
    rowCount: result.rowCount,
    hasResultSet: result.hasResultSet,
    rowsModified: result.rowsModified,
    executionTime: result.executionTime,
  };
}

function failureStatus(failure: Failure): number {
  switch (failure.kind) {
    case 'translation':
      return 502;
    case 'execution':
      return 422;
    case 'configuration':
      return 500;
  }
}

function sendFailure(res: Response, failure: Failure, sql: string | null = null) {
  res.status(failureStatus(failure)).json({
    status: 'failed',
    kind: failure.kind,
    error: failure.message,
    detail: failure.detail,
    sql,
  });
}

export function createApp(assistant: QueryAssistant, options: AppOptions): Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  app.use((req: Request, res: Response, next: NextFunction) => {
    const started = Date.now();
    const requestId = uuidv4();
    res.setHeader('X-Request-Id', requestId);
    res.on('finish', () => {
      apiLogger.http('Request handled', {
        requestId,
        method: req.method,
        path: req.path,
        status: res.statusCode,
        duration: Date.now() - started,
      });
    });
    next();
  });

  // Rate limiting
  app.use(
    '/api/',
    rateLimit({
      windowMs: options.rateLimitWindowMs,
      limit: options.rateLimitRequests,
      standardHeaders: 'draft-7',
      legacyHeaders: false,
      message: { error: 'Too many requests from this IP, please try again later.' },
    }),
  );

  // Health check endpoint
  app.get('/health', (req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      provider: assistant.provider,
    });
  });

  app.get('/api/schema', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const live = await assistant.schema();
      res.json({ catalog: assistant.catalog, tables: live.tables });
    } catch (error) {
      next(error);
    }
  });

  app.get('/api/examples', (req: Request, res: Response) => {
    res.json({ examples: assistant.examples });
  });

  app.get('/api/history', (req: Request, res: Response) => {
    res.json({
      messages: assistant.history().map((m) => ({ role: m.role, content: m.content, at: m.at.toISOString() })),
    });
  });

  // Full pipeline: translate, execute, summarize
  app.post('/api/ask', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { question } = QuestionRequestSchema.parse(req.body);
      const turn = await assistant.ask(question);

      if (turn.status === 'failed') {
        sendFailure(res, turn.failure, turn.sql);
        return;
      }
      res.json({
        status: 'answered',
        question: turn.question,
        sql: turn.sql,
        ...serializeResult(turn.result),
        statistics: turn.statistics,
      });
    } catch (error) {
      next(error);
    }
  });

  app.post('/api/translate', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { question } = QuestionRequestSchema.parse(req.body);
      const translation = await assistant.translate(question);
      if (!translation.ok) {
        sendFailure(res, translation.failure);
        return;
      }
      res.json({ question, sql: translation.value });
    } catch (error) {
      next(error);
    }
  });

  app.post('/api/execute', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { sql } = ExecuteRequestSchema.parse(req.body);
      const execution = await assistant.execute(sql);
      if (!execution.ok) {
        sendFailure(res, execution.failure, sql);
        return;
      }
      res.json({ sql, ...serializeResult(execution.value) });
    } catch (error) {
      next(error);
    }
  });

  app.post('/api/reset', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { size } = ResetRequestSchema.parse(req.body ?? {});
      const summary = await assistant.reset(size);
      res.json({ message: 'Database reset with sample data', summary });
    } catch (error) {
      next(error);
    }
  });

  // Error handling middleware
  app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }

    if (error instanceof z.ZodError) {
      res.status(400).json({
        error: 'Validation error',
        details: error.errors,
      });
      return;
    }

    const httpError = HttpErrorSchema.safeParse(error);
    if (httpError.success) {
      res.status(httpError.data.status).json({ error: httpError.data.message });
      return;
    }

    apiLogger.error('Unhandled request error', {
      path: req.path,
      error: error instanceof Error ? error.message : String(error),
    });
    res.status(500).json({
      error: 'Internal server error',
      message: process.env.NODE_ENV === 'development' && error instanceof Error ? error.message : 'Something went wrong',
    });
  });

  return app;
}

/** Binds the app; resolves once the server is listening. */
export function startServer(app: Express, port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port);
    server.once('listening', () => {
      apiLogger.info('Server listening', { address: server.address() });
      resolve(server);
    });
    server.once('error', reject);
  });
}
