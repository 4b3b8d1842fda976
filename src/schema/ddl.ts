import { TABLES, type ColumnDefinition, type TableDefinition } from './tables.js';

function columnDefinition(column: ColumnDefinition): string {
  const parts = [column.name, column.type];
  if (column.primaryKey) parts.push('PRIMARY KEY');
  if (column.unique) parts.push('UNIQUE');
  if (column.defaultValue !== undefined) parts.push(`DEFAULT ${column.defaultValue}`);
  if (column.references) parts.push(`REFERENCES ${column.references.table} (${column.references.column})`);
  return parts.join(' ');
}

export function createTableStatement(table: TableDefinition): string {
  const columns = table.columns.map((c) => `  ${columnDefinition(c)}`).join(',\n');
  return `CREATE TABLE IF NOT EXISTS ${table.name} (\n${columns}\n)`;
}

/** Parents before children. */
export function createSchemaStatements(tables: readonly TableDefinition[] = TABLES): string[] {
  return tables.map(createTableStatement);
}

/** Children before parents. */
export function dropSchemaStatements(tables: readonly TableDefinition[] = TABLES): string[] {
  return [...tables].reverse().map((t) => `DROP TABLE IF EXISTS ${t.name}`);
}
