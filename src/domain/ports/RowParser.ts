import type { DataSource } from './DataSource.js';

/** A parsed row: raw field values in file order, header row included. */
export type Row = readonly string[];

export interface ParserOptions {
  /** Field delimiter. Fixed for a run, never sniffed. */
  readonly delimiter: string;
  /** Character encoding of the source data. */
  readonly encoding: BufferEncoding;
}

/**
 * Port for turning a data source into rows.
 *
 * Implementations must parse across chunk boundaries (a quoted field may span
 * chunks) and must skip blank lines.
 */
export interface RowParser {
  parse(source: DataSource): AsyncIterable<Row>;
}
