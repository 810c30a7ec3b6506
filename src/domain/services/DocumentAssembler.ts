import type { Logger } from '../ports/Logger.js';
import type {
  AssembledDocument,
  AssemblyResult,
  DocumentFields,
  RawRow,
  SkippedRow,
  TypedRow,
} from '../model/Document.js';
import type { DocumentSchema } from '../model/SchemaNode.js';
import { referencedFields } from '../model/SchemaNode.js';
import type { TypedMap, TypedValue } from '../model/TypedValue.js';
import { isTypedMap, setEntry } from '../model/TypedValue.js';
import { MissingIdentifierColumnError } from '../model/Errors.js';
import type { ColumnHeader } from './HeaderParser.js';
import { parseColumnHeader } from './HeaderParser.js';
import { SchemaMapper } from './SchemaMapper.js';
import { ValueParser } from './ValueParser.js';

export const DEFAULT_IDENTIFIER_COLUMN = 'DocumentId';

/** Options for `DocumentAssembler`. */
export interface DocumentAssemblerOptions {
  /** Document schema. When `null`, every row lands in an `items` list. */
  readonly schema: DocumentSchema | null;
  /** Column whose value groups rows into documents. Default: `'DocumentId'`. */
  readonly identifierColumn?: string;
  /**
   * Keep the identifier column in the typed row so schema fields can read it.
   * Only takes effect when a schema is present. Default: `false`.
   */
  readonly includeIdentifierInRow?: boolean;
  readonly logger: Logger;
}

interface DocumentGroup {
  readonly documentId: string;
  readonly fields: DocumentFields;
  readonly items: TypedValue[];
  rowCount: number;
}

/**
 * Groups raw rows by identifier and folds each group into one document.
 *
 * Groups come out in first-seen order; rows of a group are folded in source
 * order, so with keyed schemas the last row of a key chain wins.
 */
export class DocumentAssembler {
  private readonly schema: DocumentSchema | null;
  private readonly identifierColumn: string;
  private readonly keepIdentifier: boolean;
  private readonly logger: Logger;
  private readonly valueParser: ValueParser;
  private readonly mapper: SchemaMapper;
  private readonly headers = new Map<string, ColumnHeader>();

  constructor(options: DocumentAssemblerOptions) {
    this.schema = options.schema;
    this.identifierColumn = options.identifierColumn ?? DEFAULT_IDENTIFIER_COLUMN;
    this.keepIdentifier = options.schema !== null && (options.includeIdentifierInRow ?? false);
    this.logger = options.logger;
    this.valueParser = new ValueParser(options.logger);
    this.mapper = new SchemaMapper(options.logger);

    if (this.schema && !this.keepIdentifier && referencedFields(this.schema).includes(this.identifierColumn)) {
      this.logger.warn(
        { identifierColumn: this.identifierColumn },
        `Schema references '${this.identifierColumn}' but the identifier is not kept in rows; it will read as null`,
      );
    }
  }

  /**
   * Fold all rows into documents.
   *
   * Rows too short to carry an identifier cell are skipped like rows with an
   * empty identifier.
   *
   * @throws MissingIdentifierColumnError when no row has an identifier column.
   */
  assemble(rows: Iterable<RawRow>): AssemblyResult {
    const rowList = [...rows];
    const groups = new Map<string, DocumentGroup>();
    const skippedRows: SkippedRow[] = [];
    const identifierHeader = rowList.length > 0 ? this.resolveIdentifierHeader(rowList) : '';
    let rowsRead = 0;

    for (const row of rowList) {
      const rowIndex = rowsRead;
      rowsRead++;

      if (!Object.hasOwn(row, identifierHeader)) {
        this.logger.warn({ rowIndex }, `Row ${String(rowIndex)} has no '${this.identifierColumn}' cell, skipping`);
        skippedRows.push({ rowIndex, documentId: null, reason: `missing ${this.identifierColumn}` });
        continue;
      }

      const documentId = row[identifierHeader].trim();
      if (documentId === '') {
        this.logger.warn({ rowIndex }, `Row ${String(rowIndex)} has an empty '${this.identifierColumn}', skipping`);
        skippedRows.push({ rowIndex, documentId: null, reason: `empty ${this.identifierColumn}` });
        continue;
      }

      let group = groups.get(documentId);
      if (!group) {
        group = { documentId, fields: {}, items: [], rowCount: 0 };
        groups.set(documentId, group);
      }
      group.rowCount++;

      const typed = this.toTypedRow(row);
      if (!this.fold(group, typed)) {
        skippedRows.push({ rowIndex, documentId, reason: 'missing key column value' });
      }
    }

    const documents = [...groups.values()].map((group) => this.finish(group));
    return { documents, rowsRead, skippedRows };
  }

  /** Parse every header and cell of a raw row into a typed row. */
  toTypedRow(row: RawRow): TypedRow {
    const typed: TypedMap = {};

    for (const [header, raw] of Object.entries(row)) {
      const { field, hint } = this.parseHeader(header);
      if (field === this.identifierColumn && !this.keepIdentifier) continue;
      setEntry(typed, field, this.valueParser.parse(raw, hint));
    }

    return typed;
  }

  private fold(group: DocumentGroup, row: TypedRow): boolean {
    if (this.schema === null) {
      group.items.push(row);
      return true;
    }

    if (this.schema.kind === 'keyed') {
      return this.mapper.applyKeyed(row, this.schema, group.fields);
    }

    if (group.rowCount === 2) {
      this.logger.warn(
        { documentId: group.documentId },
        `Document '${group.documentId}' has several rows but the schema has no key_column; later rows overwrite earlier fields`,
      );
    }

    const mapped = this.mapper.apply(row, this.schema);
    if (isTypedMap(mapped)) {
      for (const [key, value] of Object.entries(mapped)) setEntry(group.fields, key, value);
    }
    return true;
  }

  private finish(group: DocumentGroup): AssembledDocument {
    const fields: DocumentFields = this.schema === null ? { items: group.items } : group.fields;
    return { documentId: group.documentId, fields, rowCount: group.rowCount };
  }

  private resolveIdentifierHeader(rows: readonly RawRow[]): string {
    const columns = new Set<string>();
    for (const row of rows) {
      for (const header of Object.keys(row)) {
        if (this.parseHeader(header).field === this.identifierColumn) return header;
        columns.add(header);
      }
    }
    throw new MissingIdentifierColumnError(this.identifierColumn, [...columns]);
  }

  private parseHeader(header: string): ColumnHeader {
    let parsed = this.headers.get(header);
    if (!parsed) {
      parsed = parseColumnHeader(header, this.logger);
      this.headers.set(header, parsed);
    }
    return parsed;
  }
}
