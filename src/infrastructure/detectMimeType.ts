import { extname } from 'node:path';

const DELIMITED_TEXT_TYPES: Readonly<Record<string, string>> = {
  '.csv': 'text/csv',
  '.tsv': 'text/tab-separated-values',
  '.tab': 'text/tab-separated-values',
};

/** MIME type reported for an upload source, by the extension of its name. */
export function detectMimeType(fileNameOrPath: string): string {
  const extension = extname(fileNameOrPath).toLowerCase();
  return Object.hasOwn(DELIMITED_TEXT_TYPES, extension) ? DELIMITED_TEXT_TYPES[extension] : 'text/plain';
}
