/** Every type token accepted as a value prefix (`int: 5`) or header hint (`age:int`). Case-insensitive. */
export const TYPE_TOKENS = [
  'null',
  'none',
  'bool',
  'boolean',
  'int',
  'integer',
  'float',
  'double',
  'timestamp',
  'datetime',
  'date',
  'geopoint',
  'geo',
  'location',
  'array',
  'list',
  'map',
  'dict',
  'object',
  'bytes',
  'ref',
  'reference',
  'str',
  'string',
  'text',
] as const;

export type TypeToken = (typeof TYPE_TOKENS)[number];

const TOKEN_SET: ReadonlySet<string> = new Set(TYPE_TOKENS);

/** Check a lowercased, trimmed candidate against the recognized token set. */
export function isTypeToken(candidate: string): candidate is TypeToken {
  return TOKEN_SET.has(candidate);
}
