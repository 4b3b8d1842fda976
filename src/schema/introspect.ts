import { toRecords, type Connection } from '../sqlite/db.js';
import { TABLES, type ColumnReference, type TableDefinition } from './tables.js';

export interface LiveColumn {
  name: string;
  type: string;
  pk: boolean;
  references?: ColumnReference;
}

export interface TableInfo {
  name: string;
  columns: LiveColumn[];
}

export interface SchemaInfo {
  tables: TableInfo[];
}

const quoteIdentifier = (name: string) => `"${name.replace(/"/g, '""')}"`;

/** Reads the tables that actually exist in a store. */
export class SchemaIntrospector {
  constructor(private readonly connection: Connection) {}

  getSchema(): SchemaInfo {
    const tableNames = toRecords(
      this.connection.query(
        "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name",
      ),
    ).map((r) => String(r.name));

    return { tables: tableNames.map((name) => this.getTable(name)) };
  }

  private getTable(name: string): TableInfo {
    const foreignKeys = new Map<string, ColumnReference>();
    for (const fk of toRecords(this.connection.query(`PRAGMA foreign_key_list(${quoteIdentifier(name)})`))) {
      foreignKeys.set(String(fk.from), { table: String(fk.table), column: String(fk.to) });
    }

    const columns = toRecords(this.connection.query(`PRAGMA table_info(${quoteIdentifier(name)})`)).map(
      (c): LiveColumn => {
        const column: LiveColumn = { name: String(c.name), type: String(c.type ?? ''), pk: Number(c.pk) > 0 };
        const reference = foreignKeys.get(column.name);
        if (reference) column.references = reference;
        return column;
      },
    );
    return { name, columns };
  }
}

/**
 * Lists every difference between the live schema and the declared tables.
 * An empty list means the catalog shown to the model matches the store.
 */
export function compareWithCatalog(live: SchemaInfo, tables: readonly TableDefinition[] = TABLES): string[] {
  const problems: string[] = [];
  const liveTables = new Map(live.tables.map((t) => [t.name, t]));

  for (const table of tables) {
    const actual = liveTables.get(table.name);
    if (!actual) {
      problems.push(`Missing table ${table.name}`);
      continue;
    }
    liveTables.delete(table.name);

    const actualColumns = new Map(actual.columns.map((c) => [c.name, c]));
    for (const column of table.columns) {
      const found = actualColumns.get(column.name);
      if (!found) {
        problems.push(`Missing column ${table.name}.${column.name}`);
        continue;
      }
      actualColumns.delete(column.name);

      if (found.type.toUpperCase() !== column.type.toUpperCase()) {
        problems.push(`Column ${table.name}.${column.name} has type ${found.type}, expected ${column.type}`);
      }
      if (found.pk !== Boolean(column.primaryKey)) {
        problems.push(`Column ${table.name}.${column.name} primary key mismatch`);
      }
      const expectedRef = column.references ? `${column.references.table}.${column.references.column}` : 'none';
      const actualRef = found.references ? `${found.references.table}.${found.references.column}` : 'none';
      if (expectedRef !== actualRef) {
        problems.push(`Column ${table.name}.${column.name} references ${actualRef}, expected ${expectedRef}`);
      }
    }
    for (const extra of actualColumns.keys()) {
      problems.push(`Unexpected column ${table.name}.${extra}`);
    }
  }

  for (const extra of liveTables.keys()) {
    problems.push(`Unexpected table ${extra}`);
  }
  return problems;
}
