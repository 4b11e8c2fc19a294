import type { ForeignKeyCandidate } from '../model/ForeignKey.js';
import type { TableMetadata } from '../model/TableMetadata.js';

/** Double-quote an identifier, escaping embedded quotes. */
export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

export function createTableSql(table: TableMetadata, foreignKeys: readonly ForeignKeyCandidate[]): string {
  const columnDefs = table.columns.map((column) => {
    const definition = `${quoteIdentifier(column.name)} ${column.type}`;
    return table.primaryKeyDetected && column.name === table.primaryKey ? `${definition} PRIMARY KEY` : definition;
  });

  const constraints = foreignKeys.map(
    (fk) =>
      `FOREIGN KEY (${quoteIdentifier(fk.column)}) REFERENCES ${quoteIdentifier(fk.referencedTable)}(${quoteIdentifier(fk.referencedColumn)})`,
  );

  return `CREATE TABLE IF NOT EXISTS ${quoteIdentifier(table.tableName)} (${[...columnDefs, ...constraints].join(', ')});`;
}

/** `INSERT OR IGNORE` so rows already present under the same key are skipped, not rejected. */
export function insertSql(table: TableMetadata): string {
  const columns = table.columns.map((c) => quoteIdentifier(c.name)).join(', ');
  const placeholders = table.columns.map(() => '?').join(', ');
  return `INSERT OR IGNORE INTO ${quoteIdentifier(table.tableName)} (${columns}) VALUES (${placeholders})`;
}

export function indexName(table: string, column: string): string {
  return `idx_${table}_${column}`;
}

export function createIndexSql(table: string, column: string): string {
  return `CREATE INDEX IF NOT EXISTS ${quoteIdentifier(indexName(table, column))} ON ${quoteIdentifier(table)} (${quoteIdentifier(column)});`;
}

export function dropTableSql(table: string): string {
  return `DROP TABLE IF EXISTS ${quoteIdentifier(table)};`;
}

/** User tables in name order, SQLite's internal tables excluded. */
export function listTablesSql(): string {
  return "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite\\_%' ESCAPE '\\' ORDER BY name";
}

export function foreignKeyCheckSql(table: string): string {
  return `PRAGMA foreign_key_check(${quoteIdentifier(table)})`;
}
