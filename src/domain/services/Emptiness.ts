import type { SchemaNode } from '../model/SchemaNode.js';
import type { TypedValue } from '../model/TypedValue.js';
import { isTypedList, isTypedMap } from '../model/TypedValue.js';

/**
 * Decide whether a list-node candidate carries no data and should be pruned.
 *
 * `null`, `undefined` and blank strings are empty; maps and lists are empty when
 * all their entries are. Map entries whose schema is a `literal:` are skipped,
 * so an injected constant alone never keeps a candidate alive. Numbers
 * (including `0`), `false`, dates, geo-points and bytes are never empty.
 */
export function isEffectivelyEmpty(value: TypedValue | undefined, node: SchemaNode | null): boolean {
  if (value === null || value === undefined) return true;

  if (typeof value === 'string') return value.trim() === '';

  if (isTypedMap(value)) {
    const subSchemas = node?.kind === 'map' ? new Map(node.entries) : null;
    return Object.entries(value).every(([key, entry]) => {
      const sub = subSchemas?.get(key) ?? null;
      if (sub?.kind === 'literal') return true;
      return isEffectivelyEmpty(entry, sub);
    });
  }

  if (isTypedList(value)) {
    const items = node?.kind === 'list' ? node.items : null;
    return value.every((entry, index) => isEffectivelyEmpty(entry, items?.[index] ?? null));
  }

  return false;
}
