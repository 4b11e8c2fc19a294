import type { SourceFile } from '../../domain/model/SourceFile.js';
import type { ColumnMetadata } from '../../domain/model/ColumnMetadata.js';
import type { TableMetadata } from '../../domain/model/TableMetadata.js';
import type { SkippedFile } from '../../domain/model/LoadReport.js';
import type { HeaderColumn } from '../../domain/services/NameSanitizer.js';
import { headerColumns } from '../../domain/services/NameSanitizer.js';
import { inferColumnTypes } from '../../domain/services/TypeInferrer.js';
import { detectPrimaryKey } from '../../domain/services/PrimaryKeyDetector.js';
import type { LoadContext } from '../LoadContext.js';

export interface InspectionResult {
  readonly tables: readonly TableMetadata[];
  readonly skippedFiles: readonly SkippedFile[];
}

/** Use case: the metadata pass. Reads the header, infers column types and optionally detects a primary key for every file. */
export class InspectTables {
  constructor(private readonly ctx: LoadContext) {}

  async execute(files: readonly SourceFile[]): Promise<InspectionResult> {
    const tables: TableMetadata[] = [];
    const skippedFiles: SkippedFile[] = [];

    for (const file of files) {
      const header = await this.ctx.header(file);
      if (!header || header.length === 0) {
        const reason = 'file is empty or has no header row';
        skippedFiles.push({ file, reason });
        this.ctx.eventBus.emit({
          type: 'file:skipped',
          runId: this.ctx.runId,
          file,
          reason,
          timestamp: Date.now(),
        });
        continue;
      }

      const table = await this.inspect(file, headerColumns(header, this.ctx.policies.sanitizeName));
      tables.push(table);

      if (table.primaryKeySkipReason !== undefined) {
        this.ctx.eventBus.emit({
          type: 'primaryKey:skipped',
          runId: this.ctx.runId,
          tableName: table.tableName,
          reason: table.primaryKeySkipReason,
          timestamp: Date.now(),
        });
      }
      this.ctx.eventBus.emit({
        type: 'table:inspected',
        runId: this.ctx.runId,
        table,
        timestamp: Date.now(),
      });
    }

    return { tables, skippedFiles };
  }

  private async inspect(file: SourceFile, header: readonly HeaderColumn[]): Promise<TableMetadata> {
    const { settings, policies } = this.ctx;

    const types = await inferColumnTypes(this.ctx.dataRows(file), header.length, {
      sampleSize: settings.sampleSize,
      classify: policies.inferColumnType,
    });

    const columns = header.map(
      (column, position): ColumnMetadata => ({
        originalName: column.originalName,
        name: column.name,
        type: types[position] ?? 'TEXT',
        position,
      }),
    );

    const base = { tableName: file.tableName, source: file, columns };
    if (!settings.detectPrimaryKeys) {
      return { ...base, primaryKeyDetected: false };
    }

    const detection = await detectPrimaryKey(
      () => this.ctx.dataRows(file),
      columns.map((c) => c.originalName),
      { rowCeiling: settings.primaryKeyRowCeiling, select: policies.selectPrimaryKey },
    );

    const primaryKey = detection.position === undefined ? undefined : columns[detection.position]?.name;
    if (primaryKey === undefined) {
      return { ...base, primaryKeyDetected: false, primaryKeySkipReason: detection.skipReason };
    }
    return { ...base, primaryKey, primaryKeyDetected: true };
  }
}
