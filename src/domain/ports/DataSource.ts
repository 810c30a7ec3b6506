/** Metadata about the data source (optional, for logging and content-type detection). */
export interface SourceMetadata {
  readonly fileName?: string;
  readonly fileSize?: number;
  readonly mimeType?: string;
}

/**
 * Port for reading raw text from any origin (file, buffer).
 *
 * `read()` yields chunks in source order; chunk boundaries carry no meaning and
 * may fall in the middle of a line.
 */
export interface DataSource {
  /** Yield data chunks for lazy consumption. */
  read(): AsyncIterable<string | Buffer>;
  /** Return metadata about the source (file name, size, MIME type). */
  metadata(): SourceMetadata;
}
