import { DocumentUploadError } from '../../domain/model/Errors.js';
import type { AssembledDocument } from '../../domain/model/Document.js';
import type { UploadSummary } from '../../domain/model/UploadRun.js';
import type { UploadJobContext } from '../UploadJobContext.js';

/**
 * Use case: assemble every document and hand each one to the store.
 *
 * Documents are written one at a time in first-seen order. A rejected write
 * stops the run unless `continueOnError` is set; documents written before the
 * failure stay written.
 */
export class UploadDocuments {
  private uploaded = 0;
  private failed = 0;

  constructor(private readonly ctx: UploadJobContext) {}

  async execute(): Promise<UploadSummary> {
    this.ctx.assertSourceConfigured();
    this.ctx.transitionTo('UPLOADING');
    const startedAt = Date.now();
    this.ctx.startedAt = startedAt;

    const { settings, eventBus, runId } = this.ctx;

    eventBus.emit({
      type: 'upload:started',
      runId,
      collection: settings.collection,
      merge: settings.merge,
      source: this.ctx.source?.metadata() ?? {},
      timestamp: Date.now(),
    });

    try {
      const { documents, rowsRead, skippedRows } = await this.ctx.assemble();

      for (const skipped of skippedRows) {
        eventBus.emit({ type: 'row:skipped', runId, ...skipped, timestamp: Date.now() });
      }

      for (const document of documents) {
        await this.upload(document);
      }

      const summary: UploadSummary = {
        runId,
        collection: settings.collection,
        merge: settings.merge,
        rowsRead,
        rowsSkipped: skippedRows.length,
        documentsUploaded: this.uploaded,
        documentsFailed: this.failed,
        durationMs: Date.now() - startedAt,
      };

      this.ctx.transitionTo('COMPLETED');
      eventBus.emit({ type: 'upload:completed', runId, summary, timestamp: Date.now() });
      return summary;
    } catch (error) {
      this.ctx.transitionTo('FAILED');
      eventBus.emit({
        type: 'upload:failed',
        runId,
        error: error instanceof Error ? error.message : String(error),
        timestamp: Date.now(),
      });
      throw error;
    }
  }

  private async upload(document: AssembledDocument): Promise<void> {
    const { settings, eventBus, runId } = this.ctx;
    const { collection, merge, store, logger } = settings;

    try {
      await store.uploadDocument(collection, document.documentId, document.fields, merge);
    } catch (cause) {
      this.failed++;
      const error =
        cause instanceof DocumentUploadError ? cause : new DocumentUploadError(collection, document.documentId, { cause });

      eventBus.emit({
        type: 'document:failed',
        runId,
        collection,
        documentId: document.documentId,
        error: error.message,
        timestamp: Date.now(),
      });

      if (!settings.continueOnError) throw error;
      logger.error({ documentId: document.documentId }, error.message);
      return;
    }

    this.uploaded++;
    logger.debug({ collection, documentId: document.documentId }, 'Document uploaded');
    eventBus.emit({
      type: 'document:uploaded',
      runId,
      collection,
      documentId: document.documentId,
      rowCount: document.rowCount,
      timestamp: Date.now(),
    });
  }
}
