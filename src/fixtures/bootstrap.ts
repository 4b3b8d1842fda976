import { createSchemaStatements, dropSchemaStatements } from '../schema/ddl.js';
import type { Connection, SqliteStore } from '../sqlite/db.js';
import { databaseLogger } from '../utils/logger.js';
import { createSampleData, type SeedOptions, type SeedSummary } from './seed.js';

export function initSchema(connection: Connection): void {
  for (const statement of createSchemaStatements()) {
    connection.run(statement);
  }
}

export function dropSchema(connection: Connection): void {
  for (const statement of dropSchemaStatements()) {
    connection.run(statement);
  }
}

function hasTables(connection: Connection): boolean {
  const { rows } = connection.query("SELECT COUNT(*) FROM sqlite_master WHERE type = 'table'");
  return Number(rows[0]?.[0] ?? 0) > 0;
}

/**
 * Creates and seeds the store when it has no tables yet. The check and the
 * seeding share one connection. Returns null when the store was already there.
 */
export async function ensureDatabase(
  store: SqliteStore,
  size: number,
  options: SeedOptions = {},
): Promise<SeedSummary | null> {
  return store.withConnection((connection) => {
    if (hasTables(connection)) return null;

    databaseLogger.info('Initializing database with sample data', { location: store.location, size });
    initSchema(connection);
    return createSampleData(connection, size, options);
  });
}

/** Drops every table, recreates the schema and seeds it again. */
export async function resetDatabase(
  store: SqliteStore,
  size: number,
  options: SeedOptions = {},
): Promise<SeedSummary> {
  const summary = await store.withConnection((connection) => {
    dropSchema(connection);
    initSchema(connection);
    return createSampleData(connection, size, options);
  });
  databaseLogger.info('Database reset with sample data', { location: store.location, ...summary });
  return summary;
}
