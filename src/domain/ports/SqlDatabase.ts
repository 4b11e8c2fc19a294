/** Values accepted as bound statement parameters. */
export type SqlValue = string | number | bigint | null;

export type SqlRow = Readonly<Record<string, unknown>>;

/**
 * Port for the target database. One instance serves a whole run and is used
 * strictly sequentially.
 */
export interface SqlDatabase {
  /** Location of the database, for reporting. */
  readonly location: string;
  /** Execute one or more statements that return nothing. */
  exec(sql: string): void;
  /**
   * Run `sql` once per row inside a single transaction and return the number
   * of rows changed. The transaction commits when the call returns.
   */
  runBatch(sql: string, rows: readonly (readonly SqlValue[])[]): number;
  /** Run a statement that returns rows. */
  query(sql: string): SqlRow[];
  /** Release the connection. Calling it twice is a no-op. */
  close(): void;
}
