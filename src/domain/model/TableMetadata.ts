import type { ColumnMetadata } from './ColumnMetadata.js';
import type { SourceFile } from './SourceFile.js';

/** Everything inferred about one source file before it is loaded. */
export interface TableMetadata {
  readonly tableName: string;
  readonly source: SourceFile;
  readonly columns: readonly ColumnMetadata[];
  /** Sanitized name of the detected primary-key column. */
  readonly primaryKey?: string;
  readonly primaryKeyDetected: boolean;
  /** Set when detection was requested but not attempted (e.g. file over the row ceiling). */
  readonly primaryKeySkipReason?: string;
}

/** Column a foreign key should point at: detected primary key, else `id`, else the first column. */
export function referenceColumn(table: TableMetadata): string | undefined {
  if (table.primaryKeyDetected && table.primaryKey) return table.primaryKey;
  const id = table.columns.find((c) => c.name === 'id');
  if (id) return id.name;
  return table.columns[0]?.name;
}
