import type { PreviewResult } from '../../domain/model/UploadRun.js';
import type { UploadJobContext } from '../UploadJobContext.js';

/** Use case: assemble documents from the source without writing them. */
export class PreviewDocuments {
  constructor(private readonly ctx: UploadJobContext) {}

  async execute(maxDocuments?: number): Promise<PreviewResult> {
    this.ctx.assertSourceConfigured();
    this.ctx.transitionTo('PREVIEWED');

    const { documents, rowsRead, skippedRows } = await this.ctx.assemble();

    return {
      documents: maxDocuments === undefined ? documents : documents.slice(0, maxDocuments),
      totalDocuments: documents.length,
      rowsRead,
      skippedRows,
    };
  }
}
