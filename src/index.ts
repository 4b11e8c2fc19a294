// Main entry point
export { CsvDirectoryLoader } from './CsvDirectoryLoader.js';
export type { CsvDirectoryLoaderConfig } from './CsvDirectoryLoader.js';

// Configuration
export { loaderConfigSchema, parseLoaderConfig, DEFAULT_BATCH_SIZE, DEFAULT_DATABASE_PATH } from './config/LoaderConfig.js';
export type { LoaderOptions, LoaderSettings } from './config/LoaderConfig.js';
export { LoaderError, isLoaderError } from './errors.js';
export type { LoaderErrorCode } from './errors.js';

// Domain model
export { ColumnType, widenColumnType } from './domain/model/ColumnType.js';
export { RunStatus } from './domain/model/RunStatus.js';
export type { SourceFile } from './domain/model/SourceFile.js';
export type { ColumnMetadata } from './domain/model/ColumnMetadata.js';
export type { TableMetadata } from './domain/model/TableMetadata.js';
export { referenceColumn } from './domain/model/TableMetadata.js';
export type { ForeignKeyCandidate } from './domain/model/ForeignKey.js';
export type {
  LoadReport,
  LoadSummary,
  TableLoadResult,
  TableLoadStatus,
  IntegrityReport,
  IntegrityViolation,
  IntegrityFailure,
  SkippedFile,
} from './domain/model/LoadReport.js';

// Domain services (the default inference policies and their building blocks)
export { sanitizeName, uniqueName, headerColumns } from './domain/services/NameSanitizer.js';
export { classifyValue, inferColumnTypes, TypeInferrer, DEFAULT_SAMPLE_SIZE } from './domain/services/TypeInferrer.js';
export { detectPrimaryKey, selectPrimaryKey, DEFAULT_PRIMARY_KEY_ROW_CEILING } from './domain/services/PrimaryKeyDetector.js';
export type { PrimaryKeyDetection } from './domain/services/PrimaryKeyDetector.js';
export { isForeignKeyLike, resolveReferencedTable, resolveForeignKeys } from './domain/services/ForeignKeyResolver.js';
export { coerceValue, normalizeRow } from './domain/services/ValueCoercer.js';
export { BatchSplitter } from './domain/services/BatchSplitter.js';
export { defaultSchemaPolicies } from './application/SchemaPolicies.js';

// Ports (for custom implementations)
export type { DataSource } from './domain/ports/DataSource.js';
export type { RowParser, Row, ParserOptions } from './domain/ports/RowParser.js';
export type { SqlDatabase, SqlRow, SqlValue } from './domain/ports/SqlDatabase.js';
export type { SchemaPolicies } from './domain/ports/SchemaPolicies.js';
export type { SourceFactory } from './application/LoadContext.js';

// Domain events
export type {
  DomainEvent,
  EventType,
  EventPayload,
  RunStartedEvent,
  FileDiscoveredEvent,
  FileSkippedEvent,
  TableInspectedEvent,
  PrimaryKeySkippedEvent,
  SchemaResolvedEvent,
  TablesDroppedEvent,
  TableCreatedEvent,
  BatchInsertedEvent,
  TableLoadedEvent,
  TableSkippedEvent,
  IndexCreatedEvent,
  IndexFailedEvent,
  IntegrityCheckedEvent,
  RunCompletedEvent,
  RunFailedEvent,
} from './domain/events/DomainEvents.js';
export { EventBus } from './application/EventBus.js';
export type { HandlerErrorCallback } from './application/EventBus.js';

// Infrastructure adapters (built-in)
export { CsvParser } from './infrastructure/parsers/CsvParser.js';
export { FilePathSource } from './infrastructure/sources/FilePathSource.js';
export type { FilePathSourceOptions } from './infrastructure/sources/FilePathSource.js';
export { SqliteDatabase, DEFAULT_PRAGMAS } from './infrastructure/database/SqliteDatabase.js';
export type { SqliteDatabaseOptions } from './infrastructure/database/SqliteDatabase.js';
export { ConsoleReporter } from './cli/ConsoleReporter.js';
