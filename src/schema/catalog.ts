import { relationships, TABLES, type TableDefinition } from './tables.js';

/**
 * Renders the schema as the text block that grounds the translation prompt:
 * one numbered line per table with its columns, then every foreign key.
 */
export function renderSchemaCatalog(tables: readonly TableDefinition[] = TABLES): string {
  const lines: string[] = ['The database has the following tables:', ''];

  tables.forEach((table, index) => {
    const columns = table.columns.map((c) => c.name).join(', ');
    lines.push(`${index + 1}. ${table.name}: Contains ${table.description} (${columns})`);
  });

  const links = relationships(tables);
  if (links.length > 0) {
    lines.push('', 'Relationships:');
    for (const rel of links) {
      lines.push(`- ${rel.from.table}.${rel.from.column} -> ${rel.to.table}.${rel.to.column}`);
    }
  }

  return lines.join('\n');
}
