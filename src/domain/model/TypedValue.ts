/** A latitude/longitude pair produced by the `geopoint` type token. */
export class GeoPoint {
  constructor(
    readonly latitude: number,
    readonly longitude: number,
  ) {}

  toString(): string {
    return `${String(this.latitude)},${String(this.longitude)}`;
  }
}

/**
 * Any value a CSV cell can turn into once typed.
 *
 * Integers and floats are both `number`; `ref:` paths stay plain strings.
 */
export type TypedValue =
  | null
  | boolean
  | number
  | string
  | Date
  | GeoPoint
  | Uint8Array
  | readonly TypedValue[]
  | TypedMap;

/** A string-keyed map of typed values. Document stores only accept string keys. */
export interface TypedMap {
  [key: string]: TypedValue;
}

/**
 * Store `value` under `key` as an own data property. Plain assignment would
 * hit the `__proto__` setter and drop the entry.
 */
export function setEntry(map: TypedMap, key: string, value: TypedValue): void {
  Object.defineProperty(map, key, { value, enumerable: true, writable: true, configurable: true });
}

/** Own entry of `map`; inherited members such as `__proto__` read as `undefined`. */
export function getEntry(map: TypedMap, key: string): TypedValue | undefined {
  return Object.hasOwn(map, key) ? map[key] : undefined;
}

/** `true` for a plain map, `false` for lists, dates, geo-points, bytes and scalars. */
export function isTypedMap(value: TypedValue | undefined): value is TypedMap {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Date) &&
    !(value instanceof GeoPoint) &&
    !(value instanceof Uint8Array)
  );
}

/** Narrow an untyped JSON value (as returned by `JSON.parse`) to a `TypedValue`. */
export function fromJson(value: unknown): TypedValue {
  if (value === null || typeof value === 'boolean' || typeof value === 'number' || typeof value === 'string') {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown) => fromJson(item));
  }
  if (typeof value === 'object') {
    const map: TypedMap = {};
    for (const [key, item] of Object.entries(value)) {
      setEntry(map, key, fromJson(item));
    }
    return map;
  }
  return null;
}

/** String form of a value used as a map key by keyed nesting. */
export function toKeyString(value: TypedValue): string {
  if (typeof value === 'string') return value;
  if (value instanceof Date) return value.toISOString();
  if (value instanceof GeoPoint) return value.toString();
  if (value instanceof Uint8Array) return Buffer.from(value).toString('base64');
  if (typeof value === 'object' && value !== null) return JSON.stringify(value);
  return String(value);
}

/** `true` for a list of typed values. */
export function isTypedList(value: TypedValue | undefined): value is readonly TypedValue[] {
  return Array.isArray(value);
}
