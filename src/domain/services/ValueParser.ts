import type { Logger } from '../ports/Logger.js';
import type { TypeToken } from '../model/TypeToken.js';
import { isTypeToken } from '../model/TypeToken.js';
import type { TypedValue } from '../model/TypedValue.js';
import { GeoPoint, fromJson } from '../model/TypedValue.js';
import { parseIsoTimestamp, parseTimestamp } from './parseTimestamp.js';

type Conversion = { readonly ok: true; readonly value: TypedValue } | { readonly ok: false; readonly reason: string };

/** Pure conversion of the content that follows a type token. */
type Converter = (content: string) => Conversion;

const INTEGER_PATTERN = /^[+-]?\d+$/;
const AUTO_INTEGER_PATTERN = /^-?\d+$/;
const DECIMAL_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?$/i;
const SPECIAL_DECIMAL_PATTERN = /^([+-]?)(inf|infinity|nan)$/i;
const BASE64_ALPHABET = /[^A-Za-z0-9+/=]/g;

const TRUE_TOKENS = new Set(['true', '1', 'yes', 'y']);
const AUTO_TRUE = new Set(['true', 'yes', 'y']);
const AUTO_FALSE = new Set(['false', 'no', 'n']);
const AUTO_NULL = new Set(['', 'null', 'none']);

const converted = (value: TypedValue): Conversion => ({ ok: true, value });
/** Integers carry no sign on zero: `-0` reads as `0`. */
const unsignedZero = (value: number): number => (value === 0 ? 0 : value);
const failed = (reason: string): Conversion => ({ ok: false, reason });

/** Parse a decimal the way a float literal reads, including exponents, `inf` and `nan`. */
export function parseDecimal(text: string): number | undefined {
  if (DECIMAL_PATTERN.test(text)) return Number(text);

  const special = SPECIAL_DECIMAL_PATTERN.exec(text);
  if (!special) return undefined;
  if (special[2].toLowerCase() === 'nan') return Number.NaN;
  return special[1] === '-' ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY;
}

const toNull: Converter = () => converted(null);

const toBoolean: Converter = (content) => converted(TRUE_TOKENS.has(content.toLowerCase()));

const toInteger: Converter = (content) => {
  if (!INTEGER_PATTERN.test(content)) return failed('not a base-10 integer');
  const value = Number(content);
  return Number.isSafeInteger(value) ? converted(unsignedZero(value)) : failed('integer out of safe range');
};

const toFloat: Converter = (content) => {
  const value = parseDecimal(content);
  return value === undefined ? failed('not a decimal number') : converted(value);
};

const toTimestamp: Converter = (content) => {
  const value = parseTimestamp(content);
  return value === undefined ? failed('not a recognized date/time format') : converted(value);
};

const toGeoPoint: Converter = (content) => {
  const parts = content.split(',');
  if (parts.length !== 2) return failed("expected 'lat,lng'");

  const [latitude, longitude] = parts.map((part) => parseDecimal(part.trim()));
  if (latitude === undefined || longitude === undefined) return failed('coordinates must be numbers');
  if (!Number.isFinite(latitude) || !Number.isFinite(longitude)) return failed('coordinates must be finite');
  if (Math.abs(latitude) > 90 || Math.abs(longitude) > 180) return failed('coordinates out of range');
  return converted(new GeoPoint(latitude, longitude));
};

const parseJson = (content: string): Conversion => {
  try {
    return converted(fromJson(JSON.parse(content)));
  } catch (error) {
    return failed(error instanceof Error ? error.message : String(error));
  }
};

const toArray: Converter = (content) => {
  const result = parseJson(content);
  if (result.ok && !Array.isArray(result.value)) return failed('JSON value is not an array');
  return result;
};

const toMap: Converter = (content) => {
  const result = parseJson(content);
  if (!result.ok) return result;
  const { value } = result;
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return failed('JSON value is not an object');
  }
  return result;
};

const toBytes: Converter = (content) => {
  const cleaned = content.replace(BASE64_ALPHABET, '');
  if (cleaned.length % 4 !== 0 || /=[^=]/.test(cleaned)) return failed('invalid base64 padding');
  return converted(new Uint8Array(Buffer.from(cleaned, 'base64')));
};

const toText: Converter = (content) => converted(content);

/** Single table shared by value prefixes and header hints. */
const TYPE_CONVERTERS: Readonly<Record<TypeToken, Converter>> = {
  null: toNull,
  none: toNull,
  bool: toBoolean,
  boolean: toBoolean,
  int: toInteger,
  integer: toInteger,
  float: toFloat,
  double: toFloat,
  timestamp: toTimestamp,
  datetime: toTimestamp,
  date: toTimestamp,
  geopoint: toGeoPoint,
  geo: toGeoPoint,
  location: toGeoPoint,
  array: toArray,
  list: toArray,
  map: toMap,
  dict: toMap,
  object: toMap,
  bytes: toBytes,
  ref: toText,
  reference: toText,
  str: toText,
  string: toText,
  text: toText,
};

/** `true` when the value is wrapped in double quotes. */
export function isQuoted(value: string): boolean {
  return value.length >= 2 && value.startsWith('"') && value.endsWith('"');
}

/** Split `"int: 42"` into `{ token: 'int', content: '42' }`. Unknown prefixes yield `null`. */
export function extractTypePrefix(value: string): { readonly token: TypeToken; readonly content: string } | null {
  const colon = value.indexOf(':');
  if (colon === -1) return null;

  const candidate = value.slice(0, colon).trim().toLowerCase();
  if (!isTypeToken(candidate)) return null;
  return { token: candidate, content: value.slice(colon + 1).trim() };
}

/**
 * Infer a type from the value itself: null, boolean, integer, float,
 * ISO-8601 timestamp, then string.
 */
export function autoDetect(value: string): TypedValue {
  const lowered = value.toLowerCase();

  if (AUTO_NULL.has(lowered)) return null;
  if (AUTO_TRUE.has(lowered)) return true;
  if (AUTO_FALSE.has(lowered)) return false;

  if (AUTO_INTEGER_PATTERN.test(value)) {
    const integer = Number(value);
    return Number.isSafeInteger(integer) ? unsignedZero(integer) : value;
  }

  if (lowered.includes('.') || lowered.includes('e')) {
    const decimal = parseDecimal(value);
    if (decimal !== undefined) return decimal;
  }

  if (value.includes('T') || value.split('-').length > 2) {
    const timestamp = parseIsoTimestamp(value);
    if (timestamp) return timestamp;
  }

  return value;
}

/**
 * Turns one raw CSV cell into a typed value.
 *
 * Resolution order: quoted string, value prefix (`int: 5`), header hint
 * (`age:int`), automatic detection. Explicit conversions that fail fall back to
 * the raw string and log a warning.
 *
 * @example
 * ```typescript
 * const parser = new ValueParser(logger);
 * parser.parse('int: 42');     // 42
 * parser.parse('42', 'str');   // '42'
 * parser.parse('"true"');      // 'true'
 * ```
 */
export class ValueParser {
  constructor(private readonly logger: Logger) {}

  parse(raw: TypedValue, hint: string | null = null): TypedValue {
    if (typeof raw !== 'string') return raw;

    const value = raw.trim();
    if (value === '') return '';

    if (isQuoted(value)) return value.slice(1, -1);

    const prefixed = extractTypePrefix(value);
    if (prefixed) return this.convert(prefixed.token, prefixed.content);

    if (hint !== null) {
      const token = hint.trim().toLowerCase();
      if (isTypeToken(token)) return this.convert(token, value);
      this.logger.warn({ hint, value }, `Unknown type hint '${hint}', using auto-detection`);
    }

    return autoDetect(value);
  }

  /** Convert content with an already validated token, falling back to the content itself. */
  convert(token: TypeToken, content: string): TypedValue {
    const result = TYPE_CONVERTERS[token](content);
    if (!result.ok) {
      this.logger.warn(
        { token, value: content, reason: result.reason },
        `Cannot convert '${content}' to ${token}, returning as string`,
      );
      return content;
    }

    if (token === 'ref' || token === 'reference') {
      this.logger.debug({ path: content }, 'Reference kept as a path string');
    }
    return result.value;
  }
}
