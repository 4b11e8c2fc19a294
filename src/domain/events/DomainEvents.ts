import type { ForeignKeyCandidate } from '../model/ForeignKey.js';
import type { IntegrityReport, LoadSummary, TableLoadResult } from '../model/LoadReport.js';
import type { SourceFile } from '../model/SourceFile.js';
import type { TableMetadata } from '../model/TableMetadata.js';

/** Emitted when `run()` is called. */
export interface RunStartedEvent {
  readonly type: 'run:started';
  readonly runId: string;
  readonly directory: string;
  readonly databasePath: string;
  readonly timestamp: number;
}

/** Emitted once per input file found in the directory. */
export interface FileDiscoveredEvent {
  readonly type: 'file:discovered';
  readonly runId: string;
  readonly file: SourceFile;
  readonly timestamp: number;
}

/** Emitted when a file has no header row and is left out of the run. */
export interface FileSkippedEvent {
  readonly type: 'file:skipped';
  readonly runId: string;
  readonly file: SourceFile;
  readonly reason: string;
  readonly timestamp: number;
}

/** Emitted after the metadata pass for one file. */
export interface TableInspectedEvent {
  readonly type: 'table:inspected';
  readonly runId: string;
  readonly table: TableMetadata;
  readonly timestamp: number;
}

/** Emitted when primary-key detection was requested but not attempted for a file. */
export interface PrimaryKeySkippedEvent {
  readonly type: 'primaryKey:skipped';
  readonly runId: string;
  readonly tableName: string;
  readonly reason: string;
  readonly timestamp: number;
}

/** Emitted once foreign keys have been inferred across all tables. */
export interface SchemaResolvedEvent {
  readonly type: 'schema:resolved';
  readonly runId: string;
  readonly foreignKeys: readonly ForeignKeyCandidate[];
  readonly timestamp: number;
}

/** Emitted after existing tables were dropped (`dropExisting`). */
export interface TablesDroppedEvent {
  readonly type: 'tables:dropped';
  readonly runId: string;
  readonly tableNames: readonly string[];
  readonly timestamp: number;
}

/** Emitted after the create-if-absent statement for a table ran. */
export interface TableCreatedEvent {
  readonly type: 'table:created';
  readonly runId: string;
  readonly tableName: string;
  readonly sql: string;
  readonly timestamp: number;
}

/** Emitted after each committed batch of inserts. */
export interface BatchInsertedEvent {
  readonly type: 'batch:inserted';
  readonly runId: string;
  readonly tableName: string;
  readonly batchIndex: number;
  readonly rowCount: number;
  readonly insertedCount: number;
  readonly timestamp: number;
}

/** Emitted when every row of a file has been loaded and its indexes created. */
export interface TableLoadedEvent {
  readonly type: 'table:loaded';
  readonly runId: string;
  readonly result: TableLoadResult;
  readonly timestamp: number;
}

/** Emitted when a file is over `skipLargerThan` and nothing was created for it. */
export interface TableSkippedEvent {
  readonly type: 'table:skipped';
  readonly runId: string;
  readonly tableName: string;
  readonly reason: string;
  readonly timestamp: number;
}

export interface IndexCreatedEvent {
  readonly type: 'index:created';
  readonly runId: string;
  readonly tableName: string;
  readonly column: string;
  readonly indexName: string;
  readonly timestamp: number;
}

/** Emitted when creating an index fails. Loading continues. */
export interface IndexFailedEvent {
  readonly type: 'index:failed';
  readonly runId: string;
  readonly tableName: string;
  readonly column: string;
  readonly error: string;
  readonly timestamp: number;
}

/** Emitted after the post-load foreign-key check. */
export interface IntegrityCheckedEvent {
  readonly type: 'integrity:checked';
  readonly runId: string;
  readonly report: IntegrityReport;
  readonly timestamp: number;
}

export interface RunCompletedEvent {
  readonly type: 'run:completed';
  readonly runId: string;
  readonly summary: LoadSummary;
  readonly timestamp: number;
}

/** Emitted when the run stops on an unrecoverable error. The error is rethrown afterwards. */
export interface RunFailedEvent {
  readonly type: 'run:failed';
  readonly runId: string;
  readonly error: string;
  readonly timestamp: number;
}

/** Discriminated union of all domain events. */
export type DomainEvent =
  | RunStartedEvent
  | FileDiscoveredEvent
  | FileSkippedEvent
  | TableInspectedEvent
  | PrimaryKeySkippedEvent
  | SchemaResolvedEvent
  | TablesDroppedEvent
  | TableCreatedEvent
  | BatchInsertedEvent
  | TableLoadedEvent
  | TableSkippedEvent
  | IndexCreatedEvent
  | IndexFailedEvent
  | IntegrityCheckedEvent
  | RunCompletedEvent
  | RunFailedEvent;

/** String literal union of all event type names. */
export type EventType = DomainEvent['type'];

/** Extract the payload type for a specific event type. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;

