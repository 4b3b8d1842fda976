import initSqlJs from 'sql.js';
import { createRequire } from 'module';
import fs from 'fs-extra';
import { databaseLogger } from '../utils/logger.js';

const require = createRequire(import.meta.url);

type SqlJsStatic = Awaited<ReturnType<typeof initSqlJs>>;
type SqlJsDatabase = InstanceType<SqlJsStatic['Database']>;

export type SqlValue = number | string | Uint8Array | null;
export type Row = SqlValue[];

export interface StatementResult {
  columns: string[];
  rows: Row[];
  rowsModified: number;
}

let sqlJs: Promise<SqlJsStatic> | null = null;

function loadSqlJs(): Promise<SqlJsStatic> {
  if (!sqlJs) {
    sqlJs = initSqlJs({
      locateFile: () => require.resolve('sql.js/dist/sql-wasm.wasm'),
    }).catch((error: unknown) => {
      sqlJs = null;
      throw error;
    });
  }
  return sqlJs;
}

export function toRecords(result: Pick<StatementResult, 'columns' | 'rows'>): Record<string, SqlValue>[] {
  return result.rows.map((row) => {
    const record: Record<string, SqlValue> = {};
    result.columns.forEach((column, i) => {
      record[column] = row[i] ?? null;
    });
    return record;
  });
}

/**
 * One open session against the store. Tracks whether anything it ran could
 * have changed the database so the owning store knows to write it back.
 */
export class Connection {
  private dirty = false;

  constructor(private readonly db: SqlJsDatabase) {}

  get isDirty(): boolean {
    return this.dirty;
  }

  /** Prepares a single statement and materialises every row it yields. */
  query(sql: string, params?: SqlValue[]): StatementResult {
    this.assertSingleStatement(sql);
    const before = this.totalChanges();
    const stmt = this.db.prepare(sql);
    try {
      if (params) stmt.bind(params);
      const columns = stmt.getColumnNames();
      const rows: Row[] = [];
      while (stmt.step()) {
        rows.push(stmt.get());
      }
      const rowsModified = this.totalChanges() - before;
      if (columns.length === 0 || rowsModified > 0) this.dirty = true;
      return { columns, rows, rowsModified };
    } finally {
      stmt.free();
    }
  }

  run(sql: string, params?: SqlValue[]): void {
    this.db.run(sql, params);
    this.dirty = true;
  }

  transaction<T>(work: () => T): T {
    this.db.run('BEGIN');
    try {
      const result = work();
      this.db.run('COMMIT');
      return result;
    } catch (error) {
      this.db.run('ROLLBACK');
      throw error;
    }
  }

  export(): Uint8Array {
    return this.db.export();
  }

  /** Trailing whitespace, semicolons and comments are allowed; a second statement is not. */
  private assertSingleStatement(sql: string): void {
    const statements = this.db.iterateStatements(sql);
    if (statements.next().done) return;
    const second = statements.next();
    if (!second.done) {
      second.value.free();
      throw new Error('You can only execute one statement at a time.');
    }
  }

  private totalChanges(): number {
    const [result] = this.db.exec('SELECT total_changes()');
    const value = result?.values[0]?.[0];
    return typeof value === 'number' ? value : 0;
  }
}

/**
 * SQLite database kept in a single file. Every operation opens the file,
 * works on it in memory and writes it back only when it changed.
 */
export class SqliteStore {
  private tail: Promise<unknown> = Promise.resolve();

  constructor(readonly location: string) {}

  exists(): Promise<boolean> {
    return fs.pathExists(this.location);
  }

  /**
   * Runs `work` against a fresh copy of the file. Calls on one store run one
   * at a time, so a write is never overwritten by a stale copy.
   */
  withConnection<T>(work: (connection: Connection) => T | Promise<T>): Promise<T> {
    const run = this.tail.then(() => this.open(work));
    // failures reach the caller through `run`; the queue only waits for it to settle
    this.tail = run.catch(() => undefined);
    return run;
  }

  private async open<T>(work: (connection: Connection) => T | Promise<T>): Promise<T> {
    const SQL = await loadSqlJs();
    const data = (await this.exists()) ? await fs.readFile(this.location) : null;
    const db = new SQL.Database(data);
    const connection = new Connection(db);
    try {
      const result = await work(connection);
      if (connection.isDirty) {
        await fs.outputFile(this.location, connection.export());
        databaseLogger.debug('Database written', { location: this.location });
      }
      return result;
    } finally {
      db.close();
    }
  }
}
