import type { DataSource, SourceMetadata } from '../../domain/ports/DataSource.js';
import { detectMimeType } from '../detectMimeType.js';

export const INLINE_SOURCE_NAME = 'inline.csv';

/**
 * CSV rows held in memory, e.g. pasted text or an upload body.
 *
 * Rows are grouped by document identifier across the whole input, so the
 * content is handed over as one chunk. The name only labels the upload in
 * events and logs; the MIME type follows its extension unless given.
 */
export class BufferSource implements DataSource {
  private readonly content: string;
  private readonly meta: SourceMetadata;

  constructor(data: string | Buffer, metadata?: Partial<SourceMetadata>) {
    this.content = typeof data === 'string' ? data : data.toString('utf-8');
    const fileName = metadata?.fileName ?? INLINE_SOURCE_NAME;
    this.meta = {
      fileName,
      fileSize: typeof data === 'string' ? Buffer.byteLength(data) : data.byteLength,
      mimeType: metadata?.mimeType ?? detectMimeType(fileName),
    };
  }

  async *read(): AsyncIterable<string> {
    yield await Promise.resolve(this.content);
  }

  metadata(): SourceMetadata {
    return this.meta;
  }
}
