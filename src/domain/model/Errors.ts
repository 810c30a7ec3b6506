/** The schema file exists but cannot be read or is not valid JSON. */
export class SchemaFileError extends Error {
  constructor(
    readonly schemaPath: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'SchemaFileError';
  }
}

/** The schema JSON parsed but describes a tree the mapper cannot use. */
export class InvalidSchemaError extends Error {
  constructor(
    readonly path: string,
    message: string,
  ) {
    super(`${message} (at ${path})`);
    this.name = 'InvalidSchemaError';
  }
}

/** The source has no column whose field name is the identifier column. */
export class MissingIdentifierColumnError extends Error {
  constructor(
    readonly identifierColumn: string,
    readonly columns: readonly string[],
  ) {
    super(`Identifier column '${identifierColumn}' not found in source columns: ${columns.join(', ')}`);
    this.name = 'MissingIdentifierColumnError';
  }
}

/** The row source could not be opened or read. */
export class SourceReadError extends Error {
  constructor(
    readonly location: string,
    options?: { cause?: unknown },
  ) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super(`Cannot read source '${location}'${reason}`, options);
    this.name = 'SourceReadError';
  }
}

/** The document store rejected a write. */
export class DocumentUploadError extends Error {
  constructor(
    readonly collection: string,
    readonly documentId: string,
    options?: { cause?: unknown },
  ) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super(`Failed to upload document '${documentId}' to '${collection}'${reason}`, options);
    this.name = 'DocumentUploadError';
  }
}
