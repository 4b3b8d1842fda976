/**
 * Query Executor
 * Runs one SQL statement against the store and materialises the result.
 *
 * Statements are executed verbatim: there is no allow-list and no read-only
 * guard, so writes and DDL take full effect on the store.
 */

import { errorMessage, fail, ok, type Result } from '../errors.js';
import { SqliteStore, type Row } from '../sqlite/db.js';
import { databaseLogger } from '../utils/logger.js';

export interface ResultSet {
  columns: string[];
  rows: Row[];
  rowCount: number;
  /** False for statements that produce no result set (writes, DDL). */
  hasResultSet: boolean;
  rowsModified: number;
  executionTime: number;
}

export class QueryExecutor {
  constructor(private readonly store: SqliteStore) {}

  async execute(sql: string): Promise<Result<ResultSet>> {
    const started = Date.now();

    if (!sql.trim()) {
      return fail('execution', 'Error executing query: SQL statement is empty', 'SQL statement is empty');
    }

    try {
      const statement = await this.store.withConnection((connection) => connection.query(sql));
      const resultSet: ResultSet = {
        columns: statement.columns,
        rows: statement.rows,
        rowCount: statement.rows.length,
        hasResultSet: statement.columns.length > 0,
        rowsModified: statement.rowsModified,
        executionTime: Date.now() - started,
      };

      databaseLogger.info('Query executed', {
        sql,
        rowCount: resultSet.rowCount,
        rowsModified: resultSet.rowsModified,
        executionTime: resultSet.executionTime,
      });
      return ok(resultSet);
    } catch (error) {
      const detail = errorMessage(error);
      databaseLogger.warn('Query failed', { sql, error: detail, executionTime: Date.now() - started });
      return fail('execution', `Error executing query: ${detail}`, detail);
    }
  }
}
