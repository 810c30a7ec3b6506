import type { Logger } from '../ports/Logger.js';
import type { TypedRow } from '../model/Document.js';
import type { KeyedNode, SchemaNode } from '../model/SchemaNode.js';
import type { TypedMap, TypedValue } from '../model/TypedValue.js';
import { getEntry, isTypedMap, setEntry, toKeyString } from '../model/TypedValue.js';
import { isEffectivelyEmpty } from './Emptiness.js';

/**
 * Projects a flat typed row onto a schema tree.
 *
 * `apply()` is pure; `applyKeyed()` writes into the caller's accumulator and is
 * the only place a row can be rejected (missing key value).
 */
export class SchemaMapper {
  constructor(private readonly logger: Logger) {}

  apply(row: TypedRow, node: SchemaNode): TypedValue {
    switch (node.kind) {
      case 'map': {
        const result: TypedMap = {};
        for (const [target, sub] of node.entries) {
          setEntry(result, target, this.apply(row, sub));
        }
        return result;
      }
      case 'list': {
        const result: TypedValue[] = [];
        for (const item of node.items) {
          const candidate = this.apply(row, item);
          if (!isEffectivelyEmpty(candidate, item)) result.push(candidate);
        }
        return result;
      }
      case 'literal':
        return node.value;
      case 'field':
        return Object.hasOwn(row, node.name) ? row[node.name] : null;
      case 'keyed': {
        const nested: TypedMap = {};
        this.applyKeyed(row, node, nested);
        return nested;
      }
      case 'null':
        return null;
    }
  }

  /**
   * Fold one row into `target` under the chain of key-column values the node
   * describes. Every key in the chain is resolved before anything is written,
   * so a row with a missing key leaves `target` untouched. At the leaf the
   * mapped structure replaces whatever an earlier row left under the same chain.
   *
   * @returns `false` when a key column is missing or empty and the row was skipped.
   */
  applyKeyed(row: TypedRow, node: KeyedNode, target: TypedMap): boolean {
    const keys: string[] = [];
    let level: SchemaNode = node;

    while (level.kind === 'keyed') {
      const keyValue = Object.hasOwn(row, level.keyColumn) ? row[level.keyColumn] : null;
      if (keyValue === null || (typeof keyValue === 'string' && keyValue.trim() === '')) {
        this.logger.warn(
          { keyColumn: level.keyColumn, depth: keys.length },
          `Key column '${level.keyColumn}' is missing or empty, skipping row`,
        );
        return false;
      }
      keys.push(toKeyString(keyValue));
      level = level.structure;
    }

    const leafKey = keys[keys.length - 1];
    let container = target;
    for (const key of keys.slice(0, -1)) {
      const existing = getEntry(container, key);
      const nested: TypedMap = isTypedMap(existing) ? existing : {};
      setEntry(container, key, nested);
      container = nested;
    }

    setEntry(container, leafKey, this.apply(row, level));
    return true;
  }
}
