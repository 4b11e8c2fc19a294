import type { LoaderOptions, LoaderSettings } from './config/LoaderConfig.js';
import type { SqlDatabase } from './domain/ports/SqlDatabase.js';
import type { RowParser } from './domain/ports/RowParser.js';
import type { SchemaPolicies } from './domain/ports/SchemaPolicies.js';
import type { EventType, EventPayload } from './domain/events/DomainEvents.js';
import type { ForeignKeyCandidate } from './domain/model/ForeignKey.js';
import type { IntegrityReport, LoadReport, SkippedFile, TableLoadResult } from './domain/model/LoadReport.js';
import type { RunStatus } from './domain/model/RunStatus.js';
import type { SourceFactory } from './application/LoadContext.js';
import type { HandlerErrorCallback } from './application/EventBus.js';
import { parseLoaderConfig } from './config/LoaderConfig.js';
import { emptyIntegrityReport } from './domain/model/LoadReport.js';
import { canTransition } from './domain/model/RunStatus.js';
import { EventBus } from './application/EventBus.js';
import { LoadContext } from './application/LoadContext.js';
import { resolveSchemaPolicies } from './application/SchemaPolicies.js';
import { DiscoverSourceFiles } from './application/usecases/DiscoverSourceFiles.js';
import { InspectTables } from './application/usecases/InspectTables.js';
import { ResolveSchema } from './application/usecases/ResolveSchema.js';
import { DropTables } from './application/usecases/DropTables.js';
import { LoadTable } from './application/usecases/LoadTable.js';
import { CheckIntegrity } from './application/usecases/CheckIntegrity.js';
import { CsvParser } from './infrastructure/parsers/CsvParser.js';
import { FilePathSource } from './infrastructure/sources/FilePathSource.js';
import { SqliteDatabase } from './infrastructure/database/SqliteDatabase.js';

export interface CsvDirectoryLoaderConfig extends LoaderOptions {
  /**
   * Database to load into. When given, the caller owns it and the loader does
   * not close it; otherwise a SQLite file is opened at `databasePath` and
   * closed when the run ends.
   */
  readonly database?: SqlDatabase;
  /** Override any of the inference heuristics. */
  readonly policies?: Partial<SchemaPolicies>;
  /** Row parser. Default: `CsvParser` with the configured delimiter and encoding. */
  readonly parser?: RowParser;
  /** How to open a file. Default: `FilePathSource`. */
  readonly createSource?: SourceFactory;
  /** Called when an event handler throws. Default: a process warning. */
  readonly onHandlerError?: HandlerErrorCallback;
}

const defaultSourceFactory: SourceFactory = (file, settings) =>
  new FilePathSource(file.path, { encoding: settings.encoding });

/**
 * Loads every delimited file of a directory into its own table, inferring
 * column types, primary keys and foreign keys on the way.
 *
 * ```ts
 * const loader = new CsvDirectoryLoader({ directory: './csv', databasePath: './shop.sqlite', detectPrimaryKeys: true });
 * loader.on('table:loaded', (e) => console.log(e.result.tableName));
 * const report = await loader.run();
 * ```
 */
export class CsvDirectoryLoader {
  private readonly settings: LoaderSettings;
  private readonly ctx: LoadContext;
  private readonly database?: SqlDatabase;

  constructor(config: CsvDirectoryLoaderConfig) {
    this.settings = parseLoaderConfig(config);
    this.database = config.database;

    const parser = config.parser ?? new CsvParser({ delimiter: this.settings.delimiter, encoding: this.settings.encoding });
    this.ctx = new LoadContext(
      this.settings,
      resolveSchemaPolicies(config.policies),
      parser,
      config.createSource ?? defaultSourceFactory,
      new EventBus(config.onHandlerError),
    );
  }

  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.eventBus.on(type, handler);
    return this;
  }

  off<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.eventBus.off(type, handler);
    return this;
  }

  getStatus(): RunStatus {
    return this.ctx.status;
  }

  getRunId(): string {
    return this.ctx.runId;
  }

  /** Run the whole pipeline once. Throws `LoaderError` when the directory is missing. */
  async run(): Promise<LoadReport> {
    if (this.ctx.status !== 'CREATED') {
      throw new Error(`Cannot run loader from status '${this.ctx.status}'`);
    }
    this.ctx.startedAt = Date.now();
    this.ctx.eventBus.emit({
      type: 'run:started',
      runId: this.ctx.runId,
      directory: this.settings.directory,
      databasePath: this.databaseLocation(),
      timestamp: Date.now(),
    });

    let opened: SqliteDatabase | undefined;

    try {
      this.ctx.transitionTo('DISCOVERING');
      const files = await new DiscoverSourceFiles(this.ctx).execute();
      if (files.length === 0) {
        return this.complete(0, [], [], [], emptyIntegrityReport());
      }

      this.ctx.transitionTo('INSPECTING');
      const { tables, skippedFiles } = await new InspectTables(this.ctx).execute(files);
      const foreignKeys = new ResolveSchema(this.ctx).execute(tables);

      this.ctx.transitionTo('LOADING');
      let database = this.database;
      if (!database) {
        opened = new SqliteDatabase(this.settings.databasePath);
        database = opened;
      }

      if (this.settings.dropExisting) {
        new DropTables(this.ctx, database).execute(tables);
      }

      const loadTable = new LoadTable(this.ctx, database);
      const results: TableLoadResult[] = [];
      for (const table of tables) {
        results.push(await loadTable.execute(table, foreignKeys));
      }

      this.ctx.transitionTo('CHECKING');
      const integrity = new CheckIntegrity(this.ctx, database).execute();

      return this.complete(files.length, results, skippedFiles, foreignKeys, integrity);
    } catch (error) {
      if (canTransition(this.ctx.status, 'FAILED')) {
        this.ctx.transitionTo('FAILED');
      }
      this.ctx.eventBus.emit({
        type: 'run:failed',
        runId: this.ctx.runId,
        error: error instanceof Error ? error.message : String(error),
        timestamp: Date.now(),
      });
      throw error;
    } finally {
      opened?.close();
    }
  }

  private complete(
    files: number,
    tables: readonly TableLoadResult[],
    skippedFiles: readonly SkippedFile[],
    foreignKeys: readonly ForeignKeyCandidate[],
    integrity: IntegrityReport,
  ): LoadReport {
    this.ctx.transitionTo('COMPLETED');
    const summary = this.ctx.buildSummary(files, tables, integrity.violations.length);

    this.ctx.eventBus.emit({
      type: 'run:completed',
      runId: this.ctx.runId,
      summary,
      timestamp: Date.now(),
    });

    return {
      runId: this.ctx.runId,
      databasePath: this.databaseLocation(),
      directory: this.settings.directory,
      tables,
      skippedFiles,
      foreignKeys,
      integrity,
      summary,
    };
  }

  private databaseLocation(): string {
    return this.database?.location ?? this.settings.databasePath;
  }
}
