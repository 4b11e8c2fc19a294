import type { ColumnType } from '../model/ColumnType.js';
import type { TableMetadata } from '../model/TableMetadata.js';

/**
 * Replaceable inference heuristics. Each policy is a pure function so a caller
 * can refine one rule without touching the load pipeline.
 */
export interface SchemaPolicies {
  /** Turn a raw file or header name into an identifier-safe name. */
  readonly sanitizeName: (raw: string) => string;
  /** Classify one non-empty sampled value. */
  readonly inferColumnType: (value: string) => ColumnType;
  /**
   * Pick the primary key among columns that survived the uniqueness scan.
   * Receives the candidates' original (trimmed) header names in header order.
   */
  readonly selectPrimaryKey: (candidates: readonly string[]) => string | undefined;
  /**
   * Find the table a foreign-key-like column points at, or `undefined`.
   * Tables are given in discovery order.
   */
  readonly resolveReferencedTable: (column: string, tables: readonly TableMetadata[]) => TableMetadata | undefined;
}
