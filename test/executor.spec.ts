import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import fs from 'fs-extra';
import path from 'path';
import { QueryExecutor } from '../src/executor/query-executor.js';
import { ensureDatabase } from '../src/fixtures/bootstrap.js';
import { seededRandom } from '../src/fixtures/random.js';
import { SqliteStore } from '../src/sqlite/db.js';
import { FIXED_NOW, makeTempDir } from './helpers.js';

describe('QueryExecutor', () => {
  let dir: string;
  let store: SqliteStore;
  let executor: QueryExecutor;

  beforeEach(async () => {
    dir = await makeTempDir();
    store = new SqliteStore(path.join(dir, 'executor.db'));
    await ensureDatabase(store, 10, { random: seededRandom(7), now: FIXED_NOW });
    executor = new QueryExecutor(store);
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it('returns rows with their column names', async () => {
    const result = await executor.execute('SELECT COUNT(*) AS total FROM policy_types');

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.columns).toEqual(['total']);
    expect(result.value.rows).toEqual([[4]]);
    expect(result.value.rowCount).toBe(1);
    expect(result.value.hasResultSet).toBe(true);
  });

  it('distinguishes an empty result from a failure', async () => {
    const result = await executor.execute('SELECT * FROM claims WHERE 1=0');

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.rowCount).toBe(0);
    expect(result.value.hasResultSet).toBe(true);
    expect(result.value.columns).toEqual([
      'claim_id',
      'claim_number',
      'policy_id',
      'customer_id',
      'claim_date',
      'description',
      'amount_claimed',
      'amount_paid',
      'status',
    ]);
  });

  it('returns an execution failure for an unknown table', async () => {
    const result = await executor.execute('SELECT * FROM nonexistent_table');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.failure.kind).toBe('execution');
    expect(result.failure.detail).toContain('no such table: nonexistent_table');
    expect(result.failure.message).toBe(`Error executing query: ${result.failure.detail}`);
  });

  it('rejects an empty statement', async () => {
    const result = await executor.execute('   ');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.failure).toEqual({
      kind: 'execution',
      message: 'Error executing query: SQL statement is empty',
      detail: 'SQL statement is empty',
    });
  });

  it('applies writes to the store', async () => {
    const update = await executor.execute("UPDATE policies SET status = 'Cancelled' WHERE policy_id = 1");

    expect(update.ok).toBe(true);
    if (!update.ok) return;
    expect(update.value.hasResultSet).toBe(false);
    expect(update.value.columns).toEqual([]);
    expect(update.value.rowsModified).toBe(1);

    const check = await new QueryExecutor(store).execute('SELECT status FROM policies WHERE policy_id = 1');
    expect(check.ok && check.value.rows).toEqual([['Cancelled']]);
  });

  it('does not rewrite the file for reads', async () => {
    const before = (await fs.stat(store.location)).mtimeMs;
    await new Promise((resolve) => setTimeout(resolve, 20));
    await executor.execute('SELECT * FROM customers');

    expect((await fs.stat(store.location)).mtimeMs).toBe(before);
  });

  it('refuses more than one statement and runs none of them', async () => {
    const result = await executor.execute(
      'DELETE FROM prospects WHERE prospect_id = 1; DELETE FROM prospects WHERE prospect_id = 2',
    );

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.failure.detail).toBe('You can only execute one statement at a time.');

    const remaining = await executor.execute('SELECT COUNT(*) FROM prospects');
    expect(remaining.ok && remaining.value.rows).toEqual([[20]]);
  });

  it('accepts a trailing semicolon and comment', async () => {
    const result = await executor.execute('SELECT COUNT(*) FROM policy_types; -- all of them\n');

    expect(result.ok && result.value.rows).toEqual([[4]]);
  });

  it('keeps every concurrent write', async () => {
    const inserts = [101, 102, 103].map((id) =>
      executor.execute(`INSERT INTO prospects (prospect_id, first_name, source) VALUES (${id}, 'Lead ${id}', 'Web')`),
    );
    const results = await Promise.all(inserts);
    expect(results.every((r) => r.ok)).toBe(true);

    const check = await executor.execute('SELECT prospect_id FROM prospects WHERE prospect_id > 100 ORDER BY prospect_id');
    expect(check.ok && check.value.rows).toEqual([[101], [102], [103]]);
  });

  it('seeds an empty store only once under concurrent callers', async () => {
    const fresh = new SqliteStore(path.join(dir, 'fresh.db'));
    const seeded = await Promise.all([
      ensureDatabase(fresh, 6, { random: seededRandom(8), now: FIXED_NOW }),
      ensureDatabase(fresh, 6, { random: seededRandom(8), now: FIXED_NOW }),
    ]);

    expect(seeded.filter((s) => s !== null)).toHaveLength(1);
    const count = await new QueryExecutor(fresh).execute('SELECT COUNT(*) FROM customers');
    expect(count.ok && count.value.rows).toEqual([[1]]);
  });
});
