import { InvalidSchemaError } from './Errors.js';

const LITERAL_PREFIX = 'literal:';
const KEY_COLUMN = 'key_column';
const STRUCTURE = 'structure';

/** `{ target: sub_schema, ... }`: builds a map in declared key order. */
export interface MapNode {
  readonly kind: 'map';
  readonly entries: readonly (readonly [string, SchemaNode])[];
}

/** `[sub_schema, ...]`: builds a list; empty candidates are pruned. */
export interface ListNode {
  readonly kind: 'list';
  readonly items: readonly SchemaNode[];
}

/** `"literal:<value>"`: injects a constant string. */
export interface LiteralNode {
  readonly kind: 'literal';
  readonly value: string;
}

/** `"<field>"`: looks the field up in the typed row. */
export interface FieldNode {
  readonly kind: 'field';
  readonly name: string;
}

/** `{ key_column, structure }`: one grouping level of nested maps keyed by a column's value. */
export interface KeyedNode {
  readonly kind: 'keyed';
  readonly keyColumn: string;
  readonly structure: SchemaNode;
}

/** Any other JSON value (number, boolean, null). Always maps to `null`. */
export interface NullNode {
  readonly kind: 'null';
}

export type SchemaNode = MapNode | ListNode | LiteralNode | FieldNode | KeyedNode | NullNode;

/** Schema node that may sit at the root of a document. */
export type DocumentSchema = MapNode | KeyedNode;

/**
 * Compile a loaded JSON schema into a `SchemaNode` tree.
 *
 * Objects carrying `key_column` become keyed nodes and must also carry
 * `structure`; any other keys next to them are ignored.
 *
 * @throws InvalidSchemaError when a keyed node is incomplete.
 */
export function compileSchema(raw: unknown, path = '$'): SchemaNode {
  if (typeof raw === 'string') {
    return raw.startsWith(LITERAL_PREFIX)
      ? { kind: 'literal', value: raw.slice(LITERAL_PREFIX.length) }
      : { kind: 'field', name: raw };
  }

  if (Array.isArray(raw)) {
    return {
      kind: 'list',
      items: raw.map((item: unknown, index) => compileSchema(item, `${path}[${String(index)}]`)),
    };
  }

  if (typeof raw === 'object' && raw !== null) {
    const record: Record<string, unknown> = { ...raw };

    if (KEY_COLUMN in record) {
      return compileKeyed(record, path);
    }

    return {
      kind: 'map',
      entries: Object.entries(record).map(([key, sub]) => [key, compileSchema(sub, `${path}.${key}`)] as const),
    };
  }

  return { kind: 'null' };
}

function compileKeyed(record: Record<string, unknown>, path: string): KeyedNode {
  const keyColumn = record[KEY_COLUMN];
  if (typeof keyColumn !== 'string' || keyColumn.trim() === '') {
    throw new InvalidSchemaError(`${path}.${KEY_COLUMN}`, `'${KEY_COLUMN}' must be a non-empty string`);
  }
  if (!(STRUCTURE in record)) {
    throw new InvalidSchemaError(path, `'${STRUCTURE}' is required when '${KEY_COLUMN}' is present`);
  }

  return {
    kind: 'keyed',
    keyColumn,
    structure: compileSchema(record[STRUCTURE], `${path}.${STRUCTURE}`),
  };
}

/**
 * Compile a schema that is used as the root of a document.
 *
 * @throws InvalidSchemaError when the root is not an object.
 */
export function compileDocumentSchema(raw: unknown): DocumentSchema {
  const node = compileSchema(raw);
  if (node.kind !== 'map' && node.kind !== 'keyed') {
    throw new InvalidSchemaError('$', 'Schema root must be an object');
  }
  return node;
}

/** Source column names a schema reads, in first-reference order. */
export function referencedFields(node: SchemaNode): string[] {
  const fields = new Set<string>();
  const visit = (current: SchemaNode): void => {
    switch (current.kind) {
      case 'field':
        fields.add(current.name);
        return;
      case 'keyed':
        fields.add(current.keyColumn);
        visit(current.structure);
        return;
      case 'map':
        for (const [, sub] of current.entries) visit(sub);
        return;
      case 'list':
        for (const item of current.items) visit(item);
        return;
      case 'literal':
      case 'null':
        return;
    }
  };
  visit(node);
  return [...fields];
}
