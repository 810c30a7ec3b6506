import { describe, it, expect, beforeEach } from 'vitest';
import { SchemaMapper } from '../../../src/domain/services/SchemaMapper.js';
import { compileSchema } from '../../../src/domain/model/SchemaNode.js';
import type { KeyedNode, SchemaNode } from '../../../src/domain/model/SchemaNode.js';
import { GeoPoint } from '../../../src/domain/model/TypedValue.js';
import type { TypedMap } from '../../../src/domain/model/TypedValue.js';
import { RecordingLogger } from '../../helpers/RecordingLogger.js';

function keyed(raw: unknown): KeyedNode {
  const node: SchemaNode = compileSchema(raw);
  if (node.kind !== 'keyed') throw new Error('expected a keyed schema');
  return node;
}

describe('SchemaMapper', () => {
  let logger: RecordingLogger;
  let mapper: SchemaMapper;

  beforeEach(() => {
    logger = new RecordingLogger();
    mapper = new SchemaMapper(logger);
  });

  describe('apply', () => {
    it('should map fields, literals and nested maps', () => {
      const schema = compileSchema({
        name: 'full_name',
        status: 'literal:active',
        address: { city: 'city', zip: 'zip' },
      });

      const result = mapper.apply({ full_name: 'Ada', city: 'London', zip: 12345 }, schema);

      expect(result).toEqual({ name: 'Ada', status: 'active', address: { city: 'London', zip: 12345 } });
    });

    it('should map absent fields to null', () => {
      expect(mapper.apply({}, compileSchema({ a: 'missing' }))).toEqual({ a: null });
    });

    it('should keep typed values as they are', () => {
      const point = new GeoPoint(1, 2);
      expect(mapper.apply({ where: point }, compileSchema('where'))).toBe(point);
    });

    it('should map non-string schema leaves to null', () => {
      expect(mapper.apply({ a: 1 }, compileSchema({ a: 42, b: false }))).toEqual({ a: null, b: null });
    });

    it('should prune empty list candidates and keep order', () => {
      const schema = compileSchema({ tags: ['t1', 't2', 't3'] });
      expect(mapper.apply({ t1: 'a', t2: '', t3: 'c' }, schema)).toEqual({ tags: ['a', 'c'] });
    });

    it('should keep zero and false in lists', () => {
      expect(mapper.apply({ a: 0, b: false }, compileSchema(['a', 'b']))).toEqual([0, false]);
    });

    it('should prune map candidates that only carry literals', () => {
      const schema = compileSchema({
        contacts: [
          { type: 'literal:email', value: 'email' },
          { type: 'literal:phone', value: 'phone' },
        ],
      });

      expect(mapper.apply({ email: 'a@b.test', phone: null }, schema)).toEqual({
        contacts: [{ type: 'email', value: 'a@b.test' }],
      });
    });

    it('should return an empty list when every candidate is empty', () => {
      expect(mapper.apply({}, compileSchema({ items: ['x', 'y'] }))).toEqual({ items: [] });
    });

    it('should expand a nested keyed node into a fresh map', () => {
      const schema = compileSchema({ title: 'title', lines: { key_column: 'sku', structure: { qty: 'qty' } } });
      expect(mapper.apply({ title: 'T', sku: 'A1', qty: 2 }, schema)).toEqual({
        title: 'T',
        lines: { A1: { qty: 2 } },
      });
    });
  });

  describe('applyKeyed', () => {
    it('should nest the structure under the key value', () => {
      const target: TypedMap = {};
      const ok = mapper.applyKeyed({ sku: 'A1', qty: 2 }, keyed({ key_column: 'sku', structure: { qty: 'qty' } }), target);

      expect(ok).toBe(true);
      expect(target).toEqual({ A1: { qty: 2 } });
    });

    it('should accumulate several rows and merge intermediate maps', () => {
      const schema = keyed({
        key_column: 'region',
        structure: { key_column: 'store', structure: { key_column: 'day', structure: { sales: 'sales' } } },
      });
      const target: TypedMap = {};

      mapper.applyKeyed({ region: 'north', store: 's1', day: 'mon', sales: 10 }, schema, target);
      mapper.applyKeyed({ region: 'north', store: 's1', day: 'tue', sales: 12 }, schema, target);
      mapper.applyKeyed({ region: 'north', store: 's2', day: 'mon', sales: 7 }, schema, target);
      mapper.applyKeyed({ region: 'south', store: 's3', day: 'mon', sales: 3 }, schema, target);

      expect(target).toEqual({
        north: {
          s1: { mon: { sales: 10 }, tue: { sales: 12 } },
          s2: { mon: { sales: 7 } },
        },
        south: { s3: { mon: { sales: 3 } } },
      });
    });

    it('should let the last row win for the same key chain', () => {
      const schema = keyed({ key_column: 'k', structure: { v: 'v', w: 'w' } });
      const target: TypedMap = {};

      mapper.applyKeyed({ k: 'a', v: 1, w: 1 }, schema, target);
      mapper.applyKeyed({ k: 'a', v: 2 }, schema, target);

      expect(target).toEqual({ a: { v: 2, w: null } });
    });

    it('should stringify non-string key values', () => {
      const schema = keyed({ key_column: 'n', structure: 'label' });
      const target: TypedMap = {};

      mapper.applyKeyed({ n: 7, label: 'seven' }, schema, target);
      mapper.applyKeyed({ n: true, label: 'yes' }, schema, target);
      mapper.applyKeyed({ n: new Date('2024-01-02T00:00:00Z'), label: 'day' }, schema, target);

      expect(target).toEqual({ '7': 'seven', true: 'yes', '2024-01-02T00:00:00.000Z': 'day' });
    });

    it('should skip a row with a missing or blank key without touching the target', () => {
      const schema = keyed({ key_column: 'a', structure: { key_column: 'b', structure: 'v' } });
      const target: TypedMap = { existing: 1 };

      expect(mapper.applyKeyed({ a: 'x', v: 1 }, schema, target)).toBe(false);
      expect(mapper.applyKeyed({ a: '  ', b: 'y', v: 1 }, schema, target)).toBe(false);
      expect(mapper.applyKeyed({ a: null, b: 'y', v: 1 }, schema, target)).toBe(false);

      expect(target).toEqual({ existing: 1 });
      expect(logger.entries.map((entry) => entry.context)).toEqual([
        { keyColumn: 'b', depth: 1 },
        { keyColumn: 'a', depth: 0 },
        { keyColumn: 'a', depth: 0 },
      ]);
      expect(logger.messages('warn')[0]).toBe("Key column 'b' is missing or empty, skipping row");
    });

    it('should accept zero and false as key values', () => {
      const schema = keyed({ key_column: 'k', structure: 'v' });
      const target: TypedMap = {};

      expect(mapper.applyKeyed({ k: 0, v: 'zero' }, schema, target)).toBe(true);
      expect(mapper.applyKeyed({ k: false, v: 'no' }, schema, target)).toBe(true);
      expect(target).toEqual({ '0': 'zero', false: 'no' });
    });

    it('should replace a non-map value found on the key chain', () => {
      const schema = keyed({ key_column: 'a', structure: { key_column: 'b', structure: 'v' } });
      const target: TypedMap = { x: 'scalar' };

      mapper.applyKeyed({ a: 'x', b: 'y', v: 1 }, schema, target);

      expect(target).toEqual({ x: { y: 1 } });
    });

    it('should nest under a __proto__ key value without touching Object.prototype', () => {
      const schema = keyed({ key_column: 'a', structure: { key_column: 'b', structure: 'v' } });
      const target: TypedMap = {};

      mapper.applyKeyed({ a: '__proto__', b: 'y', v: 1 }, schema, target);
      mapper.applyKeyed({ a: '__proto__', b: 'z', v: 2 }, schema, target);

      expect(Object.keys(target)).toEqual(['__proto__']);
      expect(JSON.stringify(target)).toBe('{"__proto__":{"y":1,"z":2}}');
      expect(Object.hasOwn(Object.prototype, 'y')).toBe(false);
    });
  });
});
