import type { TypedMap, TypedValue } from './TypedValue.js';

/** One CSV line keyed by the raw column header (type hints included). */
export interface RawRow {
  readonly [header: string]: string;
}

/** A row after header parsing and value typing, keyed by field name. */
export type TypedRow = Readonly<Record<string, TypedValue>>;

/** The nested field map persisted as one document. */
export type DocumentFields = TypedMap;

/** A row that contributed nothing to its document. */
export interface SkippedRow {
  /** Zero-based position of the row in the source (header excluded). */
  readonly rowIndex: number;
  readonly documentId: string | null;
  readonly reason: string;
}

/** The document built for one identifier value. */
export interface AssembledDocument {
  readonly documentId: string;
  readonly fields: DocumentFields;
  /** Number of source rows grouped under this identifier. */
  readonly rowCount: number;
}

/** Output of folding a whole row sequence into documents. */
export interface AssemblyResult {
  /** Documents in first-seen identifier order. */
  readonly documents: readonly AssembledDocument[];
  readonly rowsRead: number;
  readonly skippedRows: readonly SkippedRow[];
}
