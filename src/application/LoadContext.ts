import { randomUUID } from 'node:crypto';
import type { DataSource } from '../domain/ports/DataSource.js';
import type { Row, RowParser } from '../domain/ports/RowParser.js';
import type { SchemaPolicies } from '../domain/ports/SchemaPolicies.js';
import type { SourceFile } from '../domain/model/SourceFile.js';
import type { LoadSummary, TableLoadResult } from '../domain/model/LoadReport.js';
import type { LoaderSettings } from '../config/LoaderConfig.js';
import type { RunStatus } from '../domain/model/RunStatus.js';
import { canTransition } from '../domain/model/RunStatus.js';
import { EventBus } from './EventBus.js';

export type SourceFactory = (file: SourceFile, settings: LoaderSettings) => DataSource;

/**
 * State shared by the use cases of a single run: validated settings, the
 * policies, the parser and the event bus. The database is not held here; it
 * is opened after discovery and handed to the use cases that need it.
 */
export class LoadContext {
  readonly runId: string;
  readonly settings: LoaderSettings;
  readonly policies: SchemaPolicies;
  readonly parser: RowParser;
  readonly eventBus: EventBus;
  private readonly createSource: SourceFactory;

  status: RunStatus = 'CREATED';
  startedAt?: number;

  constructor(settings: LoaderSettings, policies: SchemaPolicies, parser: RowParser, createSource: SourceFactory, eventBus: EventBus) {
    this.runId = randomUUID();
    this.settings = settings;
    this.policies = policies;
    this.parser = parser;
    this.createSource = createSource;
    this.eventBus = eventBus;
  }

  transitionTo(newStatus: RunStatus): void {
    if (!canTransition(this.status, newStatus)) {
      throw new Error(`Invalid state transition: ${this.status} → ${newStatus}`);
    }
    this.status = newStatus;
  }

  /** Every row of the file, header first. */
  rows(file: SourceFile): AsyncIterable<Row> {
    return this.parser.parse(this.createSource(file, this.settings));
  }

  async header(file: SourceFile): Promise<Row | undefined> {
    for await (const row of this.rows(file)) {
      return row;
    }
    return undefined;
  }

  /** Every row after the header. */
  async *dataRows(file: SourceFile): AsyncIterable<Row> {
    let isHeader = true;
    for await (const row of this.rows(file)) {
      if (isHeader) {
        isHeader = false;
        continue;
      }
      yield row;
    }
  }

  /** Count data rows, stopping once the count passes `limit`. */
  async countDataRows(file: SourceFile, limit?: number): Promise<number> {
    let count = 0;
    for await (const _row of this.dataRows(file)) {
      count++;
      if (limit !== undefined && count > limit) break;
    }
    return count;
  }

  elapsedMs(): number {
    return this.startedAt ? Date.now() - this.startedAt : 0;
  }

  buildSummary(files: number, tables: readonly TableLoadResult[], violations: number): LoadSummary {
    return {
      files,
      tablesLoaded: tables.filter((t) => t.status === 'LOADED').length,
      tablesSkipped: tables.filter((t) => t.status === 'SKIPPED').length,
      rowsInserted: tables.reduce((sum, t) => sum + t.rowsInserted, 0),
      violations,
      elapsedMs: this.elapsedMs(),
    };
  }
}
