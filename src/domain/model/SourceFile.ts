/** A delimited text file found in the input directory. */
export interface SourceFile {
  /** Absolute path of the file. */
  readonly path: string;
  /** File name including its extension. */
  readonly fileName: string;
  /** Sanitized table name, unique within the run. */
  readonly tableName: string;
}
