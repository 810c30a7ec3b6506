import { randomUUID } from 'node:crypto';
import type { RawRow, AssemblyResult } from '../domain/model/Document.js';
import type { DocumentSchema } from '../domain/model/SchemaNode.js';
import type { UploadStatus } from '../domain/model/UploadStatus.js';
import { canTransition } from '../domain/model/UploadStatus.js';
import type { DataSource } from '../domain/ports/DataSource.js';
import type { DocumentStore } from '../domain/ports/DocumentStore.js';
import type { Logger } from '../domain/ports/Logger.js';
import type { SourceParser } from '../domain/ports/SourceParser.js';
import { DocumentAssembler } from '../domain/services/DocumentAssembler.js';
import { EventBus } from './EventBus.js';

/** Settings a context is created with; all defaults already applied. */
export interface UploadJobSettings {
  readonly collection: string;
  readonly store: DocumentStore;
  readonly schema: DocumentSchema | null;
  readonly merge: boolean;
  readonly identifierColumn: string;
  readonly includeIdentifierInRow: boolean;
  readonly continueOnError: boolean;
  readonly logger: Logger;
}

/**
 * Mutable state shared by the use cases of a single upload run.
 *
 * Internal: not exported from the public API.
 */
export class UploadJobContext {
  readonly settings: UploadJobSettings;
  readonly eventBus: EventBus;
  readonly runId: string;

  source: DataSource | null = null;
  parser: SourceParser | null = null;
  status: UploadStatus = 'CREATED';
  startedAt?: number;

  constructor(settings: UploadJobSettings) {
    this.settings = settings;
    this.eventBus = new EventBus(settings.logger);
    this.runId = randomUUID();
  }

  transitionTo(newStatus: UploadStatus): void {
    if (!canTransition(this.status, newStatus)) {
      throw new Error(`Invalid state transition: ${this.status} → ${newStatus}`);
    }
    this.status = newStatus;
  }

  assertSourceConfigured(): void {
    if (!this.source || !this.parser) {
      throw new Error('Source and parser must be configured. Call .from(source, parser) first.');
    }
  }

  /** Read the whole source and fold its rows into documents. */
  async assemble(): Promise<AssemblyResult> {
    const rows = await this.readRows();
    const assembler = new DocumentAssembler({
      schema: this.settings.schema,
      identifierColumn: this.settings.identifierColumn,
      includeIdentifierInRow: this.settings.includeIdentifierInRow,
      logger: this.settings.logger,
    });
    return assembler.assemble(rows);
  }

  // Grouping needs every row before the first document is complete, so the
  // source is buffered whole rather than parsed chunk by chunk.
  private async readRows(): Promise<Iterable<RawRow>> {
    const source = this.source;
    const parser = this.parser;
    if (!source || !parser) {
      throw new Error('Source and parser must be configured. Call .from(source, parser) first.');
    }

    const chunks: string[] = [];
    for await (const chunk of source.read()) {
      chunks.push(typeof chunk === 'string' ? chunk : chunk.toString('utf-8'));
    }
    return parser.parse(chunks.join(''));
  }
}
