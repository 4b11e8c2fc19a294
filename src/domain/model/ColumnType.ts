export const ColumnType = {
  INTEGER: 'INTEGER',
  REAL: 'REAL',
  TEXT: 'TEXT',
} as const;

export type ColumnType = (typeof ColumnType)[keyof typeof ColumnType];

const PRECEDENCE: Record<ColumnType, number> = {
  [ColumnType.INTEGER]: 0,
  [ColumnType.REAL]: 1,
  [ColumnType.TEXT]: 2,
};

/** Return the wider of two column types. Demotion is one-way: INTEGER → REAL → TEXT. */
export function widenColumnType(current: ColumnType, observed: ColumnType): ColumnType {
  return PRECEDENCE[observed] > PRECEDENCE[current] ? observed : current;
}
