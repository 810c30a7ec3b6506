const ISO_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2})(?::(\d{2})(?::(\d{2})(?:[.,](\d{1,9}))?)?)?)?(Z|[+-]\d{2}(?::?\d{2})?)?$/i;

const DASH_PATTERN = /^(\d{4})-(\d{1,2})-(\d{1,2})(?: (\d{1,2}):(\d{1,2}):(\d{1,2}))?$/;
const SLASH_PATTERN = /^(\d{4})\/(\d{1,2})\/(\d{1,2})(?: (\d{1,2}):(\d{1,2}):(\d{1,2}))?$/;

interface DateParts {
  readonly year: number;
  readonly month: number;
  readonly day: number;
  readonly hour: number;
  readonly minute: number;
  readonly second: number;
  readonly millisecond: number;
}

/**
 * Parse an ISO-8601 timestamp (`2024-03-01`, `2024-03-01T10:15:00.250+02:00`, `...Z`).
 *
 * Timestamps without an offset are read as UTC. Returns `undefined` when the
 * text is not a valid ISO-8601 date or date-time.
 */
export function parseIsoTimestamp(text: string): Date | undefined {
  const match = ISO_PATTERN.exec(text);
  if (!match) return undefined;

  // A bare offset with no time part is not ISO-8601.
  if (match[4] === undefined && match[8] !== undefined) return undefined;

  const offsetMinutes = parseOffset(match[8]);
  if (offsetMinutes === undefined) return undefined;

  return buildDate(
    {
      year: Number(match[1]),
      month: Number(match[2]),
      day: Number(match[3]),
      hour: Number(match[4] ?? 0),
      minute: Number(match[5] ?? 0),
      second: Number(match[6] ?? 0),
      millisecond: Number((match[7] ?? '0').padEnd(3, '0').slice(0, 3)),
    },
    offsetMinutes,
  );
}

/**
 * Parse a timestamp for the `timestamp`/`datetime`/`date` type tokens.
 *
 * ISO-8601 first, then `YYYY-M-D[ H:M:S]` and `YYYY/M/D[ H:M:S]`.
 */
export function parseTimestamp(text: string): Date | undefined {
  const iso = parseIsoTimestamp(text);
  if (iso) return iso;

  for (const pattern of [DASH_PATTERN, SLASH_PATTERN]) {
    const match = pattern.exec(text);
    if (!match) continue;
    return buildDate(
      {
        year: Number(match[1]),
        month: Number(match[2]),
        day: Number(match[3]),
        hour: Number(match[4] ?? 0),
        minute: Number(match[5] ?? 0),
        second: Number(match[6] ?? 0),
        millisecond: 0,
      },
      0,
    );
  }

  return undefined;
}

function parseOffset(offset: string | undefined): number | undefined {
  if (offset === undefined || offset.toUpperCase() === 'Z') return 0;

  const sign = offset.startsWith('-') ? -1 : 1;
  const digits = offset.slice(1).replace(':', '');
  const hours = Number(digits.slice(0, 2));
  const minutes = digits.length > 2 ? Number(digits.slice(2, 4)) : 0;
  if (hours > 23 || minutes > 59) return undefined;
  return sign * (hours * 60 + minutes);
}

function buildDate(parts: DateParts, offsetMinutes: number): Date | undefined {
  const { year, month, day, hour, minute, second, millisecond } = parts;
  if (month < 1 || month > 12 || day < 1 || hour > 23 || minute > 59 || second > 59) {
    return undefined;
  }

  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hour, minute, second, millisecond);

  // Rolled over (e.g. February 30th).
  if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return undefined;
  }

  return new Date(date.getTime() - offsetMinutes * 60_000);
}
