import type { ColumnType } from './ColumnType.js';

export interface ColumnMetadata {
  /** Header cell as it appears in the file, trimmed. */
  readonly originalName: string;
  /** Identifier-safe name used in the database. Unique within its table. */
  readonly name: string;
  readonly type: ColumnType;
  /** Zero-based position in the header row. */
  readonly position: number;
}
