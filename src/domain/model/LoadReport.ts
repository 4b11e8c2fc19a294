import type { ForeignKeyCandidate } from './ForeignKey.js';
import type { SourceFile } from './SourceFile.js';

export type TableLoadStatus = 'LOADED' | 'SKIPPED';

export interface TableLoadResult {
  readonly tableName: string;
  readonly status: TableLoadStatus;
  /** Data rows read from the file (after the `maxRows` cap). */
  readonly rowsRead: number;
  /** Rows actually written; `INSERT OR IGNORE` makes this lower than `rowsRead` on re-runs. */
  readonly rowsInserted: number;
  readonly batches: number;
  readonly indexes: readonly string[];
  readonly failedIndexes: readonly { readonly column: string; readonly error: string }[];
  readonly skipReason?: string;
}

/** One row of `PRAGMA foreign_key_check`. */
export interface IntegrityViolation {
  readonly table: string;
  readonly rowId: number | null;
  readonly parent: string;
  readonly foreignKeyId: number;
}

/** A table SQLite could not check, typically a parent key without a unique index. */
export interface IntegrityFailure {
  readonly table: string;
  readonly error: string;
}

export interface IntegrityReport {
  readonly violations: readonly IntegrityViolation[];
  readonly failures: readonly IntegrityFailure[];
}

export interface SkippedFile {
  readonly file: SourceFile;
  readonly reason: string;
}

export interface LoadSummary {
  readonly files: number;
  readonly tablesLoaded: number;
  readonly tablesSkipped: number;
  readonly rowsInserted: number;
  readonly violations: number;
  readonly elapsedMs: number;
}

export interface LoadReport {
  readonly runId: string;
  readonly databasePath: string;
  readonly directory: string;
  readonly tables: readonly TableLoadResult[];
  readonly skippedFiles: readonly SkippedFile[];
  readonly foreignKeys: readonly ForeignKeyCandidate[];
  readonly integrity: IntegrityReport;
  readonly summary: LoadSummary;
}

export function emptyIntegrityReport(): IntegrityReport {
  return { violations: [], failures: [] };
}
