import type { SqlDatabase } from '../../domain/ports/SqlDatabase.js';
import type { TableMetadata } from '../../domain/model/TableMetadata.js';
import { dropTableSql } from '../../domain/services/SqlBuilder.js';
import type { LoadContext } from '../LoadContext.js';

/** Use case: drop every table the run is about to load. */
export class DropTables {
  constructor(
    private readonly ctx: LoadContext,
    private readonly database: SqlDatabase,
  ) {}

  execute(tables: readonly TableMetadata[]): void {
    const tableNames = tables.map((t) => t.tableName);
    for (const name of tableNames) {
      this.database.exec(dropTableSql(name));
    }

    this.ctx.eventBus.emit({
      type: 'tables:dropped',
      runId: this.ctx.runId,
      tableNames,
      timestamp: Date.now(),
    });
  }
}
