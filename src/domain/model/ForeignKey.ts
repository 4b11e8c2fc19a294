/** A foreign key inferred from column naming. Not verified against data until the integrity check. */
export interface ForeignKeyCandidate {
  readonly table: string;
  readonly column: string;
  readonly referencedTable: string;
  readonly referencedColumn: string;
}

export function foreignKeysOf(table: string, foreignKeys: readonly ForeignKeyCandidate[]): ForeignKeyCandidate[] {
  return foreignKeys.filter((fk) => fk.table === table);
}
