import type { DocumentFields } from '../model/Document.js';

/**
 * Port for the document-oriented store documents are written to.
 *
 * Called once per assembled document. Implementations reject with a
 * `DocumentUploadError` on connectivity or permission problems.
 */
export interface DocumentStore {
  /**
   * Write `fields` as document `documentId` of `collection`.
   *
   * @param merge - `true` merges into an existing document, `false` replaces it.
   */
  uploadDocument(collection: string, documentId: string, fields: DocumentFields, merge: boolean): Promise<void>;
}
