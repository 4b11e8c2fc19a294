import type { ForeignKeyCandidate } from '../model/ForeignKey.js';
import type { TableMetadata } from '../model/TableMetadata.js';
import { referenceColumn } from '../model/TableMetadata.js';

const FOREIGN_KEY_SUFFIX = '_id';

/** Columns named `<something>_id` (any case) are treated as references to another table. */
export function isForeignKeyLike(column: string): boolean {
  return column.length > FOREIGN_KEY_SUFFIX.length && column.toLowerCase().endsWith(FOREIGN_KEY_SUFFIX);
}

/**
 * Match a foreign-key-like column to a table by name.
 *
 * With `base` being the column name minus `_id`, the first hit among: a table
 * named `base`, `base + 's'`, `base + 'es'`; then the first table (discovery
 * order) whose name is `base` or ends with `base + 's'` or `base`.
 */
export function resolveReferencedTable(column: string, tables: readonly TableMetadata[]): TableMetadata | undefined {
  if (!isForeignKeyLike(column)) return undefined;
  const base = column.slice(0, -FOREIGN_KEY_SUFFIX.length);

  const byName = new Map(tables.map((t) => [t.tableName, t]));
  for (const name of [base, `${base}s`, `${base}es`]) {
    const table = byName.get(name);
    if (table) return table;
  }

  return tables.find((t) => t.tableName === base || t.tableName.endsWith(`${base}s`) || t.tableName.endsWith(base));
}

/**
 * Infer every foreign key across `tables`. A column that would reference
 * itself (a table's own `x_id` key resolving back to that same column) is
 * left out.
 */
export function resolveForeignKeys(
  tables: readonly TableMetadata[],
  resolve: (column: string, tables: readonly TableMetadata[]) => TableMetadata | undefined = resolveReferencedTable,
): ForeignKeyCandidate[] {
  const foreignKeys: ForeignKeyCandidate[] = [];

  for (const table of tables) {
    for (const column of table.columns) {
      if (!isForeignKeyLike(column.name)) continue;

      const target = resolve(column.name, tables);
      if (!target) continue;

      const referencedColumn = referenceColumn(target);
      if (referencedColumn === undefined) continue;
      if (target.tableName === table.tableName && referencedColumn === column.name) continue;

      foreignKeys.push({
        table: table.tableName,
        column: column.name,
        referencedTable: target.tableName,
        referencedColumn,
      });
    }
  }

  return foreignKeys;
}
