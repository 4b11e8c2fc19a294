/**
 * Port for reading raw delimited text from any origin.
 *
 * `read()` must be callable more than once: the metadata pass, the primary-key
 * scan and the load pass each stream the file from the start.
 */
export interface DataSource {
  /** Yield data chunks as strings or Buffers for lazy/streaming consumption. */
  read(): AsyncIterable<string | Buffer>;
}
