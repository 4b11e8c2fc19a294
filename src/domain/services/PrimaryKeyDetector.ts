import type { Row } from '../ports/RowParser.js';

export const DEFAULT_PRIMARY_KEY_ROW_CEILING = 50_000_000;

export interface PrimaryKeyDetection {
  /** Zero-based position of the chosen column. */
  readonly position?: number;
  readonly detected: boolean;
  /** Present when detection was not attempted. */
  readonly skipReason?: string;
}

export interface DetectPrimaryKeyOptions {
  /** Files with more data rows than this are not scanned. Default: 50 000 000. */
  readonly rowCeiling?: number;
  readonly select?: (candidates: readonly string[]) => string | undefined;
}

/** Prefer a column named `id` or ending in `_id`, else the first candidate. */
export function selectPrimaryKey(candidates: readonly string[]): string | undefined {
  const idLike = candidates.find((name) => {
    const lower = name.toLowerCase();
    return lower === 'id' || lower.endsWith('_id');
  });
  return idLike ?? candidates[0];
}

/**
 * Find a column whose values are present and unique in every data row.
 *
 * Two passes over the rows: the first counts them and gives up once the count
 * exceeds the ceiling; the second tracks the values seen per surviving column
 * and drops a column at its first empty or repeated value. The scan stops as
 * soon as no column survives.
 *
 * @param rows - Called once per pass; must yield data rows only.
 * @param columns - Original header names, in header order.
 */
export async function detectPrimaryKey(
  rows: () => AsyncIterable<Row>,
  columns: readonly string[],
  options?: DetectPrimaryKeyOptions,
): Promise<PrimaryKeyDetection> {
  const rowCeiling = options?.rowCeiling ?? DEFAULT_PRIMARY_KEY_ROW_CEILING;
  const select = options?.select ?? selectPrimaryKey;

  let rowCount = 0;
  for await (const _row of rows()) {
    rowCount++;
    if (rowCount > rowCeiling) {
      return {
        detected: false,
        skipReason: `file has more than ${String(rowCeiling)} rows`,
      };
    }
  }

  const candidates = new Map<number, Set<string>>(columns.map((_, i) => [i, new Set<string>()]));

  for await (const row of rows()) {
    for (const [position, seen] of candidates) {
      const value = row[position];
      if (value === undefined || value === '' || seen.has(value)) {
        candidates.delete(position);
        continue;
      }
      seen.add(value);
    }
    if (candidates.size === 0) break;
  }

  const survivors = [...candidates.keys()].sort((a, b) => a - b);
  const chosen = select(survivors.map((position) => columns[position] ?? ''));
  const position = survivors.find((p) => columns[p] === chosen);

  if (position === undefined) {
    return { detected: false };
  }
  return { position, detected: true };
}
