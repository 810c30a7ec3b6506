import Papa from 'papaparse';
import type { RawRow } from '../../domain/model/Document.js';
import type { SourceParser, ParserOptions } from '../../domain/ports/SourceParser.js';

const LEADING_BYTE_ORDER_MARK = /^\uFEFF/;

/**
 * CSV parser adapter using PapaParse.
 *
 * The first line names the columns; a leading byte order mark is dropped.
 * Empty lines and rows whose cells are all empty are skipped; cells beyond
 * the header width are dropped. Short rows lack their trailing columns.
 */
export class CsvParser implements SourceParser {
  private readonly options: ParserOptions;

  constructor(options?: Partial<ParserOptions>) {
    this.options = {
      delimiter: options?.delimiter,
    };
  }

  *parse(data: string): Iterable<RawRow> {
    const result = Papa.parse<Record<string, unknown>>(data.replace(LEADING_BYTE_ORDER_MARK, ''), {
      header: true,
      delimiter: this.options.delimiter || undefined,
      skipEmptyLines: true,
      dynamicTyping: false,
    });

    for (const record of result.data) {
      const row: RawRow = Object.fromEntries(
        Object.entries(record).filter((entry): entry is [string, string] => typeof entry[1] === 'string'),
      );
      if (Object.values(row).every((value) => value.trim() === '')) continue;
      yield row;
    }
  }
}
