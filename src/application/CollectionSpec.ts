import { basename, extname } from 'node:path';
import type { DocumentSchema } from '../domain/model/SchemaNode.js';
import { loadSchemaFile } from '../infrastructure/schema/loadSchemaFile.js';

/** Options for `CollectionSpec`. */
export interface CollectionSpecOptions {
  /** Path of the CSV file holding the rows. */
  readonly filePath: string;
  /** Merge into existing documents instead of replacing them. Default: `true`. */
  readonly merge?: boolean;
  /** Target collection. Default: the CSV file name without its extension. */
  readonly name?: string;
  /** Schema file. Default: the CSV path with a `.json` extension, used only if it exists. */
  readonly schemaPath?: string;
}

/**
 * What to upload and where: the CSV file, the target collection, the merge
 * behavior and the schema that shapes the documents.
 *
 * The schema is loaded on the first `getSchema()` call and the same promise is
 * returned from then on. A failed load is never retried.
 */
export class CollectionSpec {
  readonly filePath: string;
  readonly merge: boolean;
  private readonly explicitName?: string;
  private readonly explicitSchemaPath?: string;
  private schemaLoad: Promise<DocumentSchema | null> | null = null;

  constructor(options: CollectionSpecOptions) {
    this.filePath = options.filePath;
    this.merge = options.merge ?? true;
    this.explicitName = options.name || undefined;
    this.explicitSchemaPath = options.schemaPath || undefined;
  }

  get name(): string {
    return this.explicitName ?? basename(this.filePath, extname(this.filePath));
  }

  get schemaPath(): string {
    if (this.explicitSchemaPath) return this.explicitSchemaPath;
    const extension = extname(this.filePath);
    return `${extension ? this.filePath.slice(0, -extension.length) : this.filePath}.json`;
  }

  getSchema(): Promise<DocumentSchema | null> {
    this.schemaLoad ??= loadSchemaFile(this.schemaPath, { optional: this.explicitSchemaPath === undefined });
    return this.schemaLoad;
  }
}
