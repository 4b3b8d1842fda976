import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import fs from 'fs-extra';
import type { Server } from 'http';
import path from 'path';
import { z } from 'zod';
import { createQueryAssistant } from '../src/context.js';
import { EXAMPLE_QUESTIONS } from '../src/examples.js';
import { seededRandom } from '../src/fixtures/random.js';
import { createApp, startServer } from '../src/server/app.js';
import { FakeCompletion, FIXED_NOW, makeTempDir } from './helpers.js';

const POLICY_TYPE_NAMES = 'SELECT name FROM policy_types ORDER BY type_id';

const SchemaResponse = z.object({
  catalog: z.string(),
  tables: z.array(z.object({ name: z.string() })),
});

describe('HTTP API', () => {
  let dir: string;
  let server: Server;
  let baseUrl: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    const completion = new FakeCompletion((prompt) => {
      if (prompt.includes('unanswerable')) throw new Error('offline');
      return POLICY_TYPE_NAMES;
    });
    const assistant = createQueryAssistant(
      {
        llm: { provider: 'gemini', apiKey: 'test-secret', model: 'unused' },
        database: { path: path.join(dir, 'api.db'), seedSize: 10 },
      },
      { completion, seed: { random: seededRandom(21), now: FIXED_NOW } },
    );
    const app = createApp(assistant, { rateLimitWindowMs: 60_000, rateLimitRequests: 1000 });
    server = await startServer(app, 0);

    const address = server.address();
    if (!address || typeof address === 'string') throw new Error('Server is not bound to a port');
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
    await fs.remove(dir);
  });

  function post(route: string, body: unknown): Promise<Response> {
    return fetch(`${baseUrl}${route}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });
  }

  it('reports health', async () => {
    const res = await fetch(`${baseUrl}/health`);

    expect(res.status).toBe(200);
    expect(res.headers.get('x-request-id')).toMatch(/^[0-9a-f-]{36}$/);
    expect(await res.json()).toMatchObject({ status: 'healthy', provider: 'fake' });
  });

  it('lists example questions and the schema', async () => {
    const examples = await (await fetch(`${baseUrl}/api/examples`)).json();
    const schema = SchemaResponse.parse(await (await fetch(`${baseUrl}/api/schema`)).json());

    expect(examples).toEqual({ examples: EXAMPLE_QUESTIONS });
    expect(schema.tables.map((t) => t.name).sort()).toEqual([
      'addresses',
      'agents',
      'claims',
      'customers',
      'policies',
      'policy_types',
      'prospects',
    ]);
    expect(schema.catalog).toContain('Relationships:');
  });

  it('answers a question end to end', async () => {
    const res = await post('/api/ask', { question: 'Which policy types exist?' });

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      status: 'answered',
      sql: POLICY_TYPE_NAMES,
      columns: ['name'],
      rows: [{ name: 'Basic Health' }, { name: 'Family Plan' }, { name: 'Senior Care' }, { name: 'Student Health' }],
      rowCount: 4,
      hasResultSet: true,
      statistics: null,
    });

    const history = await (await fetch(`${baseUrl}/api/history`)).json();
    expect(history).toMatchObject({
      messages: [
        { role: 'user', content: 'Which policy types exist?' },
        { role: 'assistant', content: expect.stringContaining('Results: 4 rows returned') },
      ],
    });
  });

  it('validates request bodies', async () => {
    const res = await post('/api/ask', { question: '   ' });

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: 'Validation error' });
  });

  it('rejects malformed JSON', async () => {
    const res = await fetch(`${baseUrl}/api/ask`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"question":',
    });

    expect(res.status).toBe(400);
  });

  it('maps translation failures to 502', async () => {
    const res = await post('/api/translate', { question: 'something unanswerable' });

    expect(res.status).toBe(502);
    expect(await res.json()).toEqual({
      status: 'failed',
      kind: 'translation',
      error: 'Error generating SQL: offline',
      detail: 'offline',
      sql: null,
    });
  });

  it('translates without executing', async () => {
    const res = await post('/api/translate', { question: 'Which policy types exist?' });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ question: 'Which policy types exist?', sql: POLICY_TYPE_NAMES });
  });

  it('maps execution failures to 422', async () => {
    const res = await post('/api/execute', { sql: 'SELECT * FROM nonexistent_table' });

    expect(res.status).toBe(422);
    expect(await res.json()).toMatchObject({
      kind: 'execution',
      sql: 'SELECT * FROM nonexistent_table',
      detail: expect.stringContaining('nonexistent_table'),
    });
  });

  it('resets the store', async () => {
    const rejected = await post('/api/reset', { size: 3 });
    expect(rejected.status).toBe(400);

    const res = await post('/api/reset', { size: 6 });
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ summary: { addresses: 6, agents: 5, customers: 1, prospects: 20 } });
  });
});
