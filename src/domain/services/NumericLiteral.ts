const INTEGER_LITERAL = /^[+-]?\d+$/;
const REAL_LITERAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/** SQLite stores integers as signed 64-bit values. */
const MIN_SQLITE_INTEGER = -(2n ** 63n);
const MAX_SQLITE_INTEGER = 2n ** 63n - 1n;

/** True when `value`, ignoring surrounding whitespace, is a base-10 integer literal. */
export function isIntegerLiteral(value: string): boolean {
  return INTEGER_LITERAL.test(value.trim());
}

/** True for integer, decimal and exponent literals (`3`, `-0.5`, `.5`, `1e6`). */
export function isRealLiteral(value: string): boolean {
  return REAL_LITERAL.test(value.trim());
}

/**
 * Parse an integer literal, keeping precision past 2^53 by returning a bigint.
 * Literals outside the signed 64-bit range do not parse.
 */
export function parseIntegerLiteral(value: string): number | bigint | undefined {
  const trimmed = value.trim();
  if (!INTEGER_LITERAL.test(trimmed)) return undefined;
  const parsed = Number(trimmed);
  if (Number.isSafeInteger(parsed)) return parsed;
  const big = BigInt(trimmed);
  return big < MIN_SQLITE_INTEGER || big > MAX_SQLITE_INTEGER ? undefined : big;
}

export function parseRealLiteral(value: string): number | undefined {
  const trimmed = value.trim();
  if (!REAL_LITERAL.test(trimmed)) return undefined;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : undefined;
}
