import type { DocumentSchema } from './domain/model/SchemaNode.js';
import type { PreviewResult, UploadSummary } from './domain/model/UploadRun.js';
import type { UploadStatus } from './domain/model/UploadStatus.js';
import type { DomainEvent, EventPayload, EventType } from './domain/events/DomainEvents.js';
import type { DataSource } from './domain/ports/DataSource.js';
import type { DocumentStore } from './domain/ports/DocumentStore.js';
import type { Logger } from './domain/ports/Logger.js';
import type { SourceParser } from './domain/ports/SourceParser.js';
import { DEFAULT_IDENTIFIER_COLUMN } from './domain/services/DocumentAssembler.js';
import type { CollectionSpec } from './application/CollectionSpec.js';
import { UploadJobContext } from './application/UploadJobContext.js';
import { PreviewDocuments } from './application/usecases/PreviewDocuments.js';
import { UploadDocuments } from './application/usecases/UploadDocuments.js';
import { CsvParser } from './infrastructure/parsers/CsvParser.js';
import { FilePathSource } from './infrastructure/sources/FilePathSource.js';
import { createLogger } from './infrastructure/logging/createLogger.js';

/** Configuration for an upload run. */
export interface CsvUploaderConfig {
  /** Target collection. */
  readonly collection: string;
  /** Where documents are written. */
  readonly store: DocumentStore;
  /** Shapes each document. When omitted, rows are collected in an `items` list. */
  readonly schema?: DocumentSchema | null;
  /** Merge into existing documents instead of replacing them. Default: `true`. */
  readonly merge?: boolean;
  /** Column whose value names the document a row belongs to. Default: `'DocumentId'`. */
  readonly identifierColumn?: string;
  /** Let schema fields read the identifier column. Only used with a schema. Default: `false`. */
  readonly includeIdentifierInRow?: boolean;
  /** Keep uploading after the store rejects a document. Default: `false`. */
  readonly continueOnError?: boolean;
  /** Diagnostic logger. Default: a silent pino logger. */
  readonly logger?: Logger;
}

/** Extra settings for `CsvUploader.forCollection()`. */
export type CollectionUploadOptions = Omit<CsvUploaderConfig, 'collection' | 'store' | 'schema' | 'merge'> & {
  /** Column delimiter. Auto-detected when omitted. */
  readonly delimiter?: string;
};

/**
 * Facade that runs CSV rows through the mapping engine and into a document store:
 * read → parse → group → map → upload.
 *
 * @example
 * ```typescript
 * const uploader = new CsvUploader({ collection: 'orders', store });
 * uploader.from(new BufferSource(csv), new CsvParser());
 * const summary = await uploader.start();
 * ```
 */
export class CsvUploader {
  private readonly ctx: UploadJobContext;

  constructor(config: CsvUploaderConfig) {
    this.ctx = new UploadJobContext({
      collection: config.collection,
      store: config.store,
      schema: config.schema ?? null,
      merge: config.merge ?? true,
      identifierColumn: config.identifierColumn ?? DEFAULT_IDENTIFIER_COLUMN,
      includeIdentifierInRow: config.includeIdentifierInRow ?? false,
      continueOnError: config.continueOnError ?? false,
      logger: config.logger ?? createLogger({ level: 'silent' }),
    });
  }

  /**
   * Build an uploader for a collection spec: its CSV file as source, its
   * schema (loaded once) and its collection name and merge flag.
   *
   * @throws SchemaFileError or InvalidSchemaError when the schema cannot be used.
   */
  static async forCollection(
    spec: CollectionSpec,
    store: DocumentStore,
    options?: CollectionUploadOptions,
  ): Promise<CsvUploader> {
    const { delimiter, ...config }: CollectionUploadOptions = options ?? {};
    const uploader = new CsvUploader({
      ...config,
      collection: spec.name,
      store,
      schema: await spec.getSchema(),
      merge: spec.merge,
    });
    return uploader.from(new FilePathSource(spec.filePath), new CsvParser({ delimiter }));
  }

  /** Set the data source and parser. Returns `this` for chaining. */
  from(source: DataSource, parser: SourceParser): this {
    this.ctx.source = source;
    this.ctx.parser = parser;
    return this;
  }

  /** Subscribe to an upload event. Returns `this` for chaining. */
  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.eventBus.on(type, handler);
    return this;
  }

  /** Subscribe to all events regardless of type. Returns `this` for chaining. */
  onAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.onAny(handler);
    return this;
  }

  /** Unsubscribe a wildcard handler previously registered with `onAny()`. */
  offAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.offAny(handler);
    return this;
  }

  /**
   * Assemble documents without writing them.
   *
   * @param maxDocuments - Return at most this many documents. Default: all.
   */
  async preview(maxDocuments?: number): Promise<PreviewResult> {
    return new PreviewDocuments(this.ctx).execute(maxDocuments);
  }

  /**
   * Assemble every document and write each one to the store, in order.
   *
   * @throws Error if source/parser not configured or the run already started.
   * @throws MissingIdentifierColumnError, SourceReadError or DocumentUploadError on fatal failures.
   */
  async start(): Promise<UploadSummary> {
    return new UploadDocuments(this.ctx).execute();
  }

  /** Current lifecycle status. */
  getStatus(): { status: UploadStatus; startedAt?: number } {
    return { status: this.ctx.status, startedAt: this.ctx.startedAt };
  }

  /** Get the unique run identifier (UUID). */
  getRunId(): string {
    return this.ctx.runId;
  }
}
