import type { Logger } from '../ports/Logger.js';
import type { TypeToken } from '../model/TypeToken.js';
import { isTypeToken } from '../model/TypeToken.js';

/** A column header split into its field name and optional type hint. */
export interface ColumnHeader {
  readonly field: string;
  readonly hint: TypeToken | null;
}

/**
 * Split `"age:int"` into `{ field: 'age', hint: 'int' }` on the first colon.
 *
 * An empty hint (`"age:"`) or an unrecognized one (`"age:bogus"`, logged) is
 * dropped so the column falls back to auto-detection.
 */
export function parseColumnHeader(header: string, logger: Logger): ColumnHeader {
  const colon = header.indexOf(':');
  if (colon === -1) return { field: header, hint: null };

  const field = header.slice(0, colon).trim();
  const candidate = header.slice(colon + 1).trim().toLowerCase();

  if (candidate === '') return { field, hint: null };

  if (!isTypeToken(candidate)) {
    logger.warn(
      { header, field, hint: candidate },
      `Unknown type hint '${candidate}' in header '${header}', will use auto-detection for field '${field}'`,
    );
    return { field, hint: null };
  }

  return { field, hint: candidate };
}
