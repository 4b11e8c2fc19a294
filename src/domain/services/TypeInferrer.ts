import type { Row } from '../ports/RowParser.js';
import { ColumnType, widenColumnType } from '../model/ColumnType.js';
import { isIntegerLiteral, isRealLiteral } from './NumericLiteral.js';

export const DEFAULT_SAMPLE_SIZE = 1000;

/** Classify a single non-empty value as the narrowest type that can hold it. */
export function classifyValue(value: string): ColumnType {
  if (isIntegerLiteral(value)) return ColumnType.INTEGER;
  if (isRealLiteral(value)) return ColumnType.REAL;
  return ColumnType.TEXT;
}

/**
 * Streaming column type inference.
 *
 * Every column starts as INTEGER and is demoted the first time a sampled value
 * does not fit. Demotion is permanent. Empty values are ignored. If no row was
 * observed at all, every column is TEXT.
 */
export class TypeInferrer {
  private readonly types: ColumnType[];
  private observed = 0;

  constructor(
    private readonly columnCount: number,
    private readonly classify: (value: string) => ColumnType = classifyValue,
  ) {
    this.types = Array.from({ length: columnCount }, () => ColumnType.INTEGER);
  }

  get observedRows(): number {
    return this.observed;
  }

  observe(row: Row): void {
    this.observed++;
    const width = Math.min(row.length, this.columnCount);

    for (let i = 0; i < width; i++) {
      const value = row[i];
      const current = this.types[i];
      if (value === undefined || value === '' || current === undefined) continue;
      if (current === ColumnType.TEXT) continue;
      this.types[i] = widenColumnType(current, this.classify(value));
    }
  }

  result(): ColumnType[] {
    if (this.observed === 0) {
      return this.types.map(() => ColumnType.TEXT);
    }
    return [...this.types];
  }
}

export interface InferColumnTypesOptions {
  /** Maximum number of data rows to sample. Default: 1000. */
  readonly sampleSize?: number;
  readonly classify?: (value: string) => ColumnType;
}

/** Sample up to `sampleSize` data rows (header excluded) and infer one type per column. */
export async function inferColumnTypes(
  rows: AsyncIterable<Row>,
  columnCount: number,
  options?: InferColumnTypesOptions,
): Promise<ColumnType[]> {
  const sampleSize = options?.sampleSize ?? DEFAULT_SAMPLE_SIZE;
  const inferrer = new TypeInferrer(columnCount, options?.classify);

  for await (const row of rows) {
    if (inferrer.observedRows >= sampleSize) break;
    inferrer.observe(row);
  }

  return inferrer.result();
}
