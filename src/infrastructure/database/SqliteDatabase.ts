import Database from 'better-sqlite3';
import type { SqlDatabase, SqlRow, SqlValue } from '../../domain/ports/SqlDatabase.js';

export interface SqliteDatabaseOptions {
  /** Pragmas run right after opening. Default: foreign keys off, `synchronous = NORMAL`, WAL journal. */
  readonly pragmas?: readonly string[];
}

/** Foreign keys stay off while loading so tables can be filled in any order. */
export const DEFAULT_PRAGMAS: readonly string[] = ['foreign_keys = OFF', 'synchronous = NORMAL', 'journal_mode = WAL'];

function isSqlRow(value: unknown): value is SqlRow {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** `SqlDatabase` adapter over a synchronous better-sqlite3 connection. */
export class SqliteDatabase implements SqlDatabase {
  readonly location: string;
  private readonly db: Database.Database;
  private readonly statements = new Map<string, Database.Statement>();

  constructor(location: string, options?: SqliteDatabaseOptions) {
    this.location = location;
    this.db = new Database(location);
    for (const pragma of options?.pragmas ?? DEFAULT_PRAGMAS) {
      this.db.pragma(pragma);
    }
  }

  exec(sql: string): void {
    this.db.exec(sql);
  }

  runBatch(sql: string, rows: readonly (readonly SqlValue[])[]): number {
    const statement = this.prepare(sql);
    const insertAll = this.db.transaction((batch: readonly (readonly SqlValue[])[]) => {
      let changes = 0;
      for (const row of batch) {
        changes += statement.run(...row).changes;
      }
      return changes;
    });
    return insertAll(rows);
  }

  query(sql: string): SqlRow[] {
    return this.db.prepare(sql).all().filter(isSqlRow);
  }

  close(): void {
    if (this.db.open) {
      this.statements.clear();
      this.db.close();
    }
  }

  private prepare(sql: string): Database.Statement {
    const cached = this.statements.get(sql);
    if (cached) return cached;
    const statement = this.db.prepare(sql);
    this.statements.set(sql, statement);
    return statement;
  }
}
