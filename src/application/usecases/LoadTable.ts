import type { SqlDatabase, SqlValue } from '../../domain/ports/SqlDatabase.js';
import type { ForeignKeyCandidate } from '../../domain/model/ForeignKey.js';
import type { TableMetadata } from '../../domain/model/TableMetadata.js';
import type { TableLoadResult } from '../../domain/model/LoadReport.js';
import { foreignKeysOf } from '../../domain/model/ForeignKey.js';
import { BatchSplitter } from '../../domain/services/BatchSplitter.js';
import { coerceRow } from '../../domain/services/ValueCoercer.js';
import { createIndexSql, createTableSql, indexName, insertSql } from '../../domain/services/SqlBuilder.js';
import type { LoadContext } from '../LoadContext.js';

/**
 * Use case: create one table, stream its rows in, then index every column
 * whose name ends in `_id`, a bare `_id` included.
 */
export class LoadTable {
  constructor(
    private readonly ctx: LoadContext,
    private readonly database: SqlDatabase,
  ) {}

  async execute(table: TableMetadata, foreignKeys: readonly ForeignKeyCandidate[]): Promise<TableLoadResult> {
    const { skipLargerThan } = this.ctx.settings;
    if (skipLargerThan !== undefined) {
      const rowCount = await this.ctx.countDataRows(table.source, skipLargerThan);
      if (rowCount > skipLargerThan) {
        return this.skip(table, `file has more than ${String(skipLargerThan)} rows`);
      }
    }

    const createSql = createTableSql(table, foreignKeysOf(table.tableName, foreignKeys));
    this.database.exec(createSql);
    this.ctx.eventBus.emit({
      type: 'table:created',
      runId: this.ctx.runId,
      tableName: table.tableName,
      sql: createSql,
      timestamp: Date.now(),
    });

    const insert = insertSql(table);
    const splitter = new BatchSplitter<SqlValue[]>(this.ctx.settings.batchSize);
    let rowsRead = 0;
    let rowsInserted = 0;
    let batches = 0;

    for await (const batch of splitter.split(this.coercedRows(table))) {
      const insertedCount = this.database.runBatch(insert, batch.items);
      rowsRead += batch.items.length;
      rowsInserted += insertedCount;
      batches++;

      this.ctx.eventBus.emit({
        type: 'batch:inserted',
        runId: this.ctx.runId,
        tableName: table.tableName,
        batchIndex: batch.batchIndex,
        rowCount: batch.items.length,
        insertedCount,
        timestamp: Date.now(),
      });
    }

    const { indexes, failedIndexes } = this.createIndexes(table);

    const result: TableLoadResult = {
      tableName: table.tableName,
      status: 'LOADED',
      rowsRead,
      rowsInserted,
      batches,
      indexes,
      failedIndexes,
    };

    this.ctx.eventBus.emit({
      type: 'table:loaded',
      runId: this.ctx.runId,
      result,
      timestamp: Date.now(),
    });

    return result;
  }

  private async *coercedRows(table: TableMetadata): AsyncIterable<SqlValue[]> {
    const { maxRows } = this.ctx.settings;
    const types = table.columns.map((c) => c.type);
    let count = 0;

    for await (const row of this.ctx.dataRows(table.source)) {
      if (maxRows !== undefined && count >= maxRows) break;
      count++;
      yield coerceRow(row, types);
    }
  }

  private createIndexes(table: TableMetadata): Pick<TableLoadResult, 'indexes' | 'failedIndexes'> {
    const indexes: string[] = [];
    const failedIndexes: { column: string; error: string }[] = [];

    for (const { name: column } of table.columns) {
      if (!column.toLowerCase().endsWith('_id')) continue;
      if (table.primaryKeyDetected && column === table.primaryKey) continue;

      try {
        this.database.exec(createIndexSql(table.tableName, column));
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        failedIndexes.push({ column, error: message });
        this.ctx.eventBus.emit({
          type: 'index:failed',
          runId: this.ctx.runId,
          tableName: table.tableName,
          column,
          error: message,
          timestamp: Date.now(),
        });
        continue;
      }

      const name = indexName(table.tableName, column);
      indexes.push(name);
      this.ctx.eventBus.emit({
        type: 'index:created',
        runId: this.ctx.runId,
        tableName: table.tableName,
        column,
        indexName: name,
        timestamp: Date.now(),
      });
    }

    return { indexes, failedIndexes };
  }

  private skip(table: TableMetadata, reason: string): TableLoadResult {
    this.ctx.eventBus.emit({
      type: 'table:skipped',
      runId: this.ctx.runId,
      tableName: table.tableName,
      reason,
      timestamp: Date.now(),
    });

    return {
      tableName: table.tableName,
      status: 'SKIPPED',
      rowsRead: 0,
      rowsInserted: 0,
      batches: 0,
      indexes: [],
      failedIndexes: [],
      skipReason: reason,
    };
  }
}
