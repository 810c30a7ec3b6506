import type { AssembledDocument, SkippedRow } from './Document.js';

/** Final counters of an upload run. */
export interface UploadSummary {
  readonly runId: string;
  readonly collection: string;
  readonly merge: boolean;
  readonly rowsRead: number;
  readonly rowsSkipped: number;
  readonly documentsUploaded: number;
  readonly documentsFailed: number;
  readonly durationMs: number;
}

/** Documents assembled from the source without writing anything. */
export interface PreviewResult {
  readonly documents: readonly AssembledDocument[];
  /** Documents the full source would produce (may exceed `documents.length`). */
  readonly totalDocuments: number;
  readonly rowsRead: number;
  readonly skippedRows: readonly SkippedRow[];
}
