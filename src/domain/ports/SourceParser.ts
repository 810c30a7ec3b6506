import type { RawRow } from '../model/Document.js';

/** Configured parser options. */
export interface ParserOptions {
  /** Column delimiter character (e.g. `','`, `';'`, `'\t'`). Auto-detected when omitted. */
  readonly delimiter?: string;
}

/**
 * Port for turning source text into raw rows.
 *
 * Rows must keep the column and row order of the source; the first line names
 * the columns.
 */
export interface SourceParser {
  parse(data: string): Iterable<RawRow>;
}
