import { createReadStream } from 'node:fs';
import { basename } from 'node:path';
import type { DataSource, SourceMetadata } from '../../domain/ports/DataSource.js';
import { SourceReadError } from '../../domain/model/Errors.js';
import { detectMimeType } from '../detectMimeType.js';

export interface FilePathSourceOptions {
  /** Encoding for reading the file. Default: 'utf-8'. */
  readonly encoding?: BufferEncoding;
  /** Chunk size in bytes for streaming reads. Default: 65536 (64KB). */
  readonly highWaterMark?: number;
}

/** Data source that streams from a local file path using `createReadStream`. */
export class FilePathSource implements DataSource {
  private readonly filePath: string;
  private readonly encoding: BufferEncoding;
  private readonly highWaterMark: number;

  constructor(filePath: string, options?: FilePathSourceOptions) {
    this.filePath = filePath;
    this.encoding = options?.encoding ?? 'utf-8';
    this.highWaterMark = options?.highWaterMark ?? 65536;
  }

  /** @throws SourceReadError when the file is missing or unreadable. */
  async *read(): AsyncIterable<string> {
    const stream = createReadStream(this.filePath, {
      encoding: this.encoding,
      highWaterMark: this.highWaterMark,
    });

    try {
      for await (const chunk of stream) {
        yield typeof chunk === 'string' ? chunk : String(chunk);
      }
    } catch (error) {
      throw new SourceReadError(this.filePath, { cause: error });
    }
  }

  metadata(): SourceMetadata {
    return {
      fileName: basename(this.filePath),
      mimeType: detectMimeType(this.filePath),
    };
  }
}
