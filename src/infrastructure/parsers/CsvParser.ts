import { Readable } from 'node:stream';
import { StringDecoder } from 'node:string_decoder';
import Papa from 'papaparse';
import type { DataSource } from '../../domain/ports/DataSource.js';
import type { ParserOptions, Row, RowParser } from '../../domain/ports/RowParser.js';

const BYTE_ORDER_MARK = '\uFEFF';

function isRow(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((field) => typeof field === 'string');
}

/**
 * CSV parser adapter using PapaParse in Node stream mode, so quoted fields and
 * line breaks that straddle chunk boundaries parse correctly. Yields every row,
 * header included, as an array of raw strings; blank lines are skipped.
 */
export class CsvParser implements RowParser {
  private readonly options: ParserOptions;

  constructor(options?: Partial<ParserOptions>) {
    this.options = {
      delimiter: options?.delimiter ?? ',',
      encoding: options?.encoding ?? 'utf-8',
    };
  }

  async *parse(source: DataSource): AsyncIterable<Row> {
    const parser = Papa.parse(Papa.NODE_STREAM_INPUT, {
      header: false,
      delimiter: this.options.delimiter,
      skipEmptyLines: true,
      dynamicTyping: false,
    });
    const input = Readable.from(this.decode(source.read()));
    input.on('error', (error) => parser.destroy(error));
    input.pipe(parser);

    let first = true;
    try {
      for await (const row of parser) {
        if (!isRow(row)) continue;
        if (first) {
          first = false;
          yield this.stripByteOrderMark(row);
          continue;
        }
        yield row;
      }
    } finally {
      input.destroy();
      parser.destroy();
    }
  }

  private async *decode(chunks: AsyncIterable<string | Buffer>): AsyncIterable<string> {
    const decoder = new StringDecoder(this.options.encoding);
    for await (const chunk of chunks) {
      const text = typeof chunk === 'string' ? chunk : decoder.write(chunk);
      if (text.length > 0) yield text;
    }
    const rest = decoder.end();
    if (rest.length > 0) yield rest;
  }

  private stripByteOrderMark(row: string[]): string[] {
    const [first, ...rest] = row;
    if (first === undefined || !first.startsWith(BYTE_ORDER_MARK)) return row;
    return [first.slice(BYTE_ORDER_MARK.length), ...rest];
  }
}
