// Main entry point
export { CsvUploader } from './CsvUploader.js';
export type { CsvUploaderConfig, CollectionUploadOptions } from './CsvUploader.js';
export { CollectionSpec } from './application/CollectionSpec.js';
export type { CollectionSpecOptions } from './application/CollectionSpec.js';

// Domain model
export { GeoPoint, isTypedMap, isTypedList, fromJson, toKeyString } from './domain/model/TypedValue.js';
export type { TypedValue, TypedMap } from './domain/model/TypedValue.js';
export { TYPE_TOKENS, isTypeToken } from './domain/model/TypeToken.js';
export type { TypeToken } from './domain/model/TypeToken.js';
export { compileSchema, compileDocumentSchema, referencedFields } from './domain/model/SchemaNode.js';
export type {
  SchemaNode,
  DocumentSchema,
  MapNode,
  ListNode,
  LiteralNode,
  FieldNode,
  KeyedNode,
  NullNode,
} from './domain/model/SchemaNode.js';
export type {
  RawRow,
  TypedRow,
  DocumentFields,
  SkippedRow,
  AssembledDocument,
  AssemblyResult,
} from './domain/model/Document.js';
export type { UploadSummary, PreviewResult } from './domain/model/UploadRun.js';
export { UploadStatus } from './domain/model/UploadStatus.js';
export {
  SchemaFileError,
  InvalidSchemaError,
  MissingIdentifierColumnError,
  SourceReadError,
  DocumentUploadError,
} from './domain/model/Errors.js';

// Domain services (for building custom pipelines)
export { ValueParser } from './domain/services/ValueParser.js';
export { parseColumnHeader } from './domain/services/HeaderParser.js';
export type { ColumnHeader } from './domain/services/HeaderParser.js';
export { isEffectivelyEmpty } from './domain/services/Emptiness.js';
export { SchemaMapper } from './domain/services/SchemaMapper.js';
export { DocumentAssembler, DEFAULT_IDENTIFIER_COLUMN } from './domain/services/DocumentAssembler.js';
export type { DocumentAssemblerOptions } from './domain/services/DocumentAssembler.js';
export { parseTimestamp } from './domain/services/parseTimestamp.js';

// Ports (for custom implementations)
export type { SourceParser, ParserOptions } from './domain/ports/SourceParser.js';
export type { DataSource, SourceMetadata } from './domain/ports/DataSource.js';
export type { DocumentStore } from './domain/ports/DocumentStore.js';
export type { Logger } from './domain/ports/Logger.js';

// Events
export type {
  DomainEvent,
  EventType,
  EventPayload,
  UploadStartedEvent,
  RowSkippedEvent,
  DocumentUploadedEvent,
  DocumentFailedEvent,
  UploadCompletedEvent,
  UploadFailedEvent,
} from './domain/events/DomainEvents.js';

// Infrastructure adapters
export { CsvParser } from './infrastructure/parsers/CsvParser.js';
export { BufferSource } from './infrastructure/sources/BufferSource.js';
export { FilePathSource } from './infrastructure/sources/FilePathSource.js';
export type { FilePathSourceOptions } from './infrastructure/sources/FilePathSource.js';
export { InMemoryDocumentStore } from './infrastructure/stores/InMemoryDocumentStore.js';
export type { RecordedUpload } from './infrastructure/stores/InMemoryDocumentStore.js';
export { FirestoreDocumentStore, toFirestoreData } from './infrastructure/stores/FirestoreDocumentStore.js';
export type { FirestoreConnectionOptions } from './infrastructure/stores/FirestoreDocumentStore.js';
export { loadSchemaFile } from './infrastructure/schema/loadSchemaFile.js';
export type { LoadSchemaFileOptions } from './infrastructure/schema/loadSchemaFile.js';
export { createLogger } from './infrastructure/logging/createLogger.js';
export type { CreateLoggerOptions } from './infrastructure/logging/createLogger.js';
