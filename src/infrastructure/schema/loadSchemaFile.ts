import { readFile } from 'node:fs/promises';
import type { DocumentSchema } from '../../domain/model/SchemaNode.js';
import { compileDocumentSchema } from '../../domain/model/SchemaNode.js';
import { SchemaFileError } from '../../domain/model/Errors.js';

/** Options for `loadSchemaFile()`. */
export interface LoadSchemaFileOptions {
  /** When `true`, a missing file resolves to `null` instead of failing. Default: `false`. */
  readonly optional?: boolean;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Read and compile a JSON schema file.
 *
 * @throws SchemaFileError when the file is unreadable, missing (unless optional) or not JSON.
 * @throws InvalidSchemaError when the JSON does not describe a document schema.
 */
export async function loadSchemaFile(path: string, options?: LoadSchemaFileOptions): Promise<DocumentSchema | null> {
  let text: string;
  try {
    text = await readFile(path, { encoding: 'utf-8' });
  } catch (error) {
    if (options?.optional && isMissingFile(error)) return null;
    const reason = error instanceof Error ? error.message : String(error);
    throw new SchemaFileError(path, `Cannot read schema file ${path}: ${reason}`, { cause: error });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new SchemaFileError(path, `Invalid JSON in schema file ${path}: ${reason}`, { cause: error });
  }

  return compileDocumentSchema(raw);
}
