import type { SqlDatabase, SqlRow } from '../../domain/ports/SqlDatabase.js';
import type { IntegrityFailure, IntegrityReport, IntegrityViolation } from '../../domain/model/LoadReport.js';
import { foreignKeyCheckSql, listTablesSql } from '../../domain/services/SqlBuilder.js';
import type { LoadContext } from '../LoadContext.js';

function toViolation(row: SqlRow): IntegrityViolation | null {
  const { table, rowid, parent, fkid } = row;
  if (typeof table !== 'string' || typeof parent !== 'string' || typeof fkid !== 'number') return null;
  return {
    table,
    rowId: typeof rowid === 'number' ? rowid : null,
    parent,
    foreignKeyId: fkid,
  };
}

/**
 * Use case: switch foreign-key enforcement on and list every row whose
 * reference has no parent, in every table of the database, including tables
 * left by earlier runs. Violations and tables SQLite refuses to check are
 * reported; nothing is rolled back.
 */
export class CheckIntegrity {
  constructor(
    private readonly ctx: LoadContext,
    private readonly database: SqlDatabase,
  ) {}

  execute(): IntegrityReport {
    this.database.exec('PRAGMA foreign_keys = ON;');
    const tableNames = this.database
      .query(listTablesSql())
      .map((row) => row.name)
      .filter((name): name is string => typeof name === 'string');

    const violations: IntegrityViolation[] = [];
    const failures: IntegrityFailure[] = [];

    for (const table of tableNames) {
      try {
        for (const row of this.database.query(foreignKeyCheckSql(table))) {
          const violation = toViolation(row);
          if (violation) violations.push(violation);
        }
      } catch (error) {
        failures.push({ table, error: error instanceof Error ? error.message : String(error) });
      }
    }

    const report: IntegrityReport = { violations, failures };
    this.ctx.eventBus.emit({
      type: 'integrity:checked',
      runId: this.ctx.runId,
      report,
      timestamp: Date.now(),
    });

    return report;
  }
}
