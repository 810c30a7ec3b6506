import { describe, it, expect } from 'vitest';
import { DocumentAssembler } from '../../../src/domain/services/DocumentAssembler.js';
import { compileDocumentSchema } from '../../../src/domain/model/SchemaNode.js';
import { MissingIdentifierColumnError } from '../../../src/domain/model/Errors.js';
import type { RawRow } from '../../../src/domain/model/Document.js';
import { RecordingLogger } from '../../helpers/RecordingLogger.js';

const ORDER_ROWS: RawRow[] = [
  { DocumentId: 'order1', item: 'Apple', 'price:float': '1.50' },
  { DocumentId: 'order1', item: 'Banana', 'price:float': '0.80' },
  { DocumentId: 'order2', item: 'Cherry', 'price:float': '2.00' },
];

describe('DocumentAssembler', () => {
  describe('without a schema', () => {
    it('should collect every typed row of a group under items', () => {
      const assembler = new DocumentAssembler({ schema: null, logger: new RecordingLogger() });

      const result = assembler.assemble(ORDER_ROWS);

      expect(result.rowsRead).toBe(3);
      expect(result.skippedRows).toEqual([]);
      expect(result.documents).toEqual([
        {
          documentId: 'order1',
          rowCount: 2,
          fields: {
            items: [
              { item: 'Apple', price: 1.5 },
              { item: 'Banana', price: 0.8 },
            ],
          },
        },
        { documentId: 'order2', rowCount: 1, fields: { items: [{ item: 'Cherry', price: 2 }] } },
      ]);
    });

    it('should never keep the identifier, even when asked to', () => {
      const assembler = new DocumentAssembler({ schema: null, includeIdentifierInRow: true, logger: new RecordingLogger() });

      const [document] = assembler.assemble([{ DocumentId: 'a', n: '1' }]).documents;

      expect(document?.fields).toEqual({ items: [{ n: 1 }] });
    });
  });

  describe('with a map schema', () => {
    it('should map a single row into the document fields', () => {
      const schema = compileDocumentSchema({ name: 'name', meta: { source: 'literal:csv', age: 'age' } });
      const assembler = new DocumentAssembler({ schema, logger: new RecordingLogger() });

      const result = assembler.assemble([{ DocumentId: 'u1', name: 'Ada', 'age:int': '36' }]);

      expect(result.documents).toEqual([
        { documentId: 'u1', rowCount: 1, fields: { name: 'Ada', meta: { source: 'csv', age: 36 } } },
      ]);
    });

    it('should let later rows overwrite earlier top-level fields and warn once per document', () => {
      const logger = new RecordingLogger();
      const schema = compileDocumentSchema({ name: 'name', extra: { note: 'note' } });
      const assembler = new DocumentAssembler({ schema, logger });

      const result = assembler.assemble([
        { DocumentId: 'u1', name: 'first', note: 'x' },
        { DocumentId: 'u1', name: 'second', note: '' },
        { DocumentId: 'u1', name: 'third', note: 'z' },
      ]);

      expect(result.documents[0]?.fields).toEqual({ name: 'third', extra: { note: 'z' } });
      expect(logger.messages('warn')).toEqual([
        "Document 'u1' has several rows but the schema has no key_column; later rows overwrite earlier fields",
      ]);
    });

    it('should expose the identifier to the schema only when included', () => {
      const schema = compileDocumentSchema({ id: 'DocumentId' });

      const kept = new DocumentAssembler({ schema, includeIdentifierInRow: true, logger: new RecordingLogger() });
      expect(kept.assemble([{ DocumentId: 'x1' }]).documents[0]?.fields).toEqual({ id: 'x1' });

      const logger = new RecordingLogger();
      const dropped = new DocumentAssembler({ schema, logger });
      expect(dropped.assemble([{ DocumentId: 'x1' }]).documents[0]?.fields).toEqual({ id: null });
      expect(logger.messages('warn')).toEqual([
        "Schema references 'DocumentId' but the identifier is not kept in rows; it will read as null",
      ]);
    });

    it('should type the kept identifier like any other cell', () => {
      const schema = compileDocumentSchema({ id: 'DocumentId' });
      const assembler = new DocumentAssembler({ schema, includeIdentifierInRow: true, logger: new RecordingLogger() });

      const [document] = assembler.assemble([{ DocumentId: '42' }]).documents;

      expect(document?.documentId).toBe('42');
      expect(document?.fields).toEqual({ id: 42 });
    });
  });

  describe('with a keyed schema', () => {
    it('should nest several rows of one document by key columns', () => {
      const schema = compileDocumentSchema({
        key_column: 'year',
        structure: { key_column: 'month', structure: { total: 'total', currency: 'literal:EUR' } },
      });
      const assembler = new DocumentAssembler({ schema, logger: new RecordingLogger() });

      const result = assembler.assemble([
        { DocumentId: 'shop', year: '2024', month: 'jan', 'total:float': '10' },
        { DocumentId: 'shop', year: '2024', month: 'feb', 'total:float': '12.5' },
        { DocumentId: 'shop', year: '2023', month: 'dec', 'total:float': '9' },
      ]);

      expect(result.documents).toEqual([
        {
          documentId: 'shop',
          rowCount: 3,
          fields: {
            '2024': { jan: { total: 10, currency: 'EUR' }, feb: { total: 12.5, currency: 'EUR' } },
            '2023': { dec: { total: 9, currency: 'EUR' } },
          },
        },
      ]);
    });

    it('should record rows whose key value is missing as skipped', () => {
      const schema = compileDocumentSchema({ key_column: 'sku', structure: { qty: 'qty' } });
      const assembler = new DocumentAssembler({ schema, logger: new RecordingLogger() });

      const result = assembler.assemble([
        { DocumentId: 'o1', sku: 'A', qty: '1' },
        { DocumentId: 'o1', sku: '', qty: '2' },
      ]);

      expect(result.documents[0]?.fields).toEqual({ A: { qty: 1 } });
      expect(result.documents[0]?.rowCount).toBe(2);
      expect(result.skippedRows).toEqual([{ rowIndex: 1, documentId: 'o1', reason: 'missing key column value' }]);
    });

    it('should keep the nesting of interleaved documents apart', () => {
      const schema = compileDocumentSchema({ key_column: 'sku', structure: { qty: 'qty' } });
      const assembler = new DocumentAssembler({ schema, logger: new RecordingLogger() });

      const result = assembler.assemble([
        { DocumentId: 'd1', sku: 'A', qty: '1' },
        { DocumentId: 'd2', sku: 'B', qty: '2' },
        { DocumentId: 'd1', sku: 'C', qty: '3' },
        { DocumentId: 'd2', sku: 'A', qty: '4' },
      ]);

      expect(result.documents).toEqual([
        { documentId: 'd1', rowCount: 2, fields: { A: { qty: 1 }, C: { qty: 3 } } },
        { documentId: 'd2', rowCount: 2, fields: { B: { qty: 2 }, A: { qty: 4 } } },
      ]);
      expect(result.documents[0]?.fields.A).not.toBe(result.documents[1]?.fields.A);
      expect(result.skippedRows).toEqual([]);
    });

    it('should store a key value named __proto__ as an ordinary entry', () => {
      const schema = compileDocumentSchema({ key_column: 'k', structure: { v: 'v' } });
      const assembler = new DocumentAssembler({ schema, logger: new RecordingLogger() });

      const result = assembler.assemble([
        { DocumentId: 'd1', k: '__proto__', v: '1' },
        { DocumentId: 'd1', k: 'x', v: '2' },
      ]);

      const fields = result.documents[0]?.fields ?? {};
      expect(Object.keys(fields)).toEqual(['__proto__', 'x']);
      expect(JSON.stringify(fields)).toBe('{"__proto__":{"v":1},"x":{"v":2}}');
      expect(Object.getPrototypeOf(fields)).toBe(Object.prototype);
      expect(Object.hasOwn(Object.prototype, 'v')).toBe(false);
    });
  });

  describe('identifier handling', () => {
    it('should find the identifier column behind a type hint', () => {
      const assembler = new DocumentAssembler({ schema: null, logger: new RecordingLogger() });

      const result = assembler.assemble([{ 'DocumentId:str': ' 007 ', v: 'x' }]);

      expect(result.documents).toEqual([{ documentId: '007', rowCount: 1, fields: { items: [{ v: 'x' }] } }]);
    });

    it('should honour a custom identifier column', () => {
      const assembler = new DocumentAssembler({ schema: null, identifierColumn: 'sku', logger: new RecordingLogger() });

      const result = assembler.assemble([{ sku: 'A1', qty: '3' }]);

      expect(result.documents[0]?.documentId).toBe('A1');
      expect(result.documents[0]?.fields).toEqual({ items: [{ qty: 3 }] });
    });

    it('should skip rows with an empty identifier', () => {
      const logger = new RecordingLogger();
      const assembler = new DocumentAssembler({ schema: null, logger });

      const result = assembler.assemble([
        { DocumentId: '  ', v: '1' },
        { DocumentId: 'a', v: '2' },
      ]);

      expect(result.rowsRead).toBe(2);
      expect(result.documents.map((doc) => doc.documentId)).toEqual(['a']);
      expect(result.skippedRows).toEqual([{ rowIndex: 0, documentId: null, reason: 'empty DocumentId' }]);
      expect(logger.messages('warn')).toEqual(["Row 0 has an empty 'DocumentId', skipping"]);
    });

    it('should skip rows too short to carry an identifier cell', () => {
      const logger = new RecordingLogger();
      const assembler = new DocumentAssembler({ schema: null, logger });

      const result = assembler.assemble([
        { item: 'Apple', DocumentId: 'o1' },
        { item: 'Banana' },
        { item: 'Cherry', DocumentId: 'o2' },
      ]);

      expect(result.rowsRead).toBe(3);
      expect(result.documents).toEqual([
        { documentId: 'o1', rowCount: 1, fields: { items: [{ item: 'Apple' }] } },
        { documentId: 'o2', rowCount: 1, fields: { items: [{ item: 'Cherry' }] } },
      ]);
      expect(result.skippedRows).toEqual([{ rowIndex: 1, documentId: null, reason: 'missing DocumentId' }]);
      expect(logger.messages('warn')).toEqual(["Row 1 has no 'DocumentId' cell, skipping"]);
    });

    it('should find the identifier column when the first row is short', () => {
      const assembler = new DocumentAssembler({ schema: null, logger: new RecordingLogger() });

      const result = assembler.assemble([{ item: 'Banana' }, { item: 'Apple', DocumentId: 'o1' }]);

      expect(result.documents.map((doc) => doc.documentId)).toEqual(['o1']);
      expect(result.skippedRows).toEqual([{ rowIndex: 0, documentId: null, reason: 'missing DocumentId' }]);
    });

    it('should throw when the identifier column is absent', () => {
      const assembler = new DocumentAssembler({ schema: null, logger: new RecordingLogger() });

      expect(() => assembler.assemble([{ id: '1', name: 'x' }])).toThrow(MissingIdentifierColumnError);
      expect(() => assembler.assemble([{ id: '1', name: 'x' }])).toThrow(
        "Identifier column 'DocumentId' not found in source columns: id, name",
      );
    });

    it('should keep documents in first-seen order', () => {
      const assembler = new DocumentAssembler({ schema: null, logger: new RecordingLogger() });

      const result = assembler.assemble([
        { DocumentId: 'b', v: '1' },
        { DocumentId: 'a', v: '2' },
        { DocumentId: 'b', v: '3' },
      ]);

      expect(result.documents.map((doc) => [doc.documentId, doc.rowCount])).toEqual([
        ['b', 2],
        ['a', 1],
      ]);
    });
  });

  describe('toTypedRow', () => {
    it('should warn about an unknown header hint only once', () => {
      const logger = new RecordingLogger();
      const assembler = new DocumentAssembler({ schema: null, logger });

      assembler.assemble([
        { DocumentId: 'a', 'n:weird': '1' },
        { DocumentId: 'b', 'n:weird': '2' },
      ]);

      expect(logger.messages('warn')).toEqual([
        "Unknown type hint 'weird' in header 'n:weird', will use auto-detection for field 'n'",
      ]);
    });

    it('should keep a column named __proto__ as an own field', () => {
      const assembler = new DocumentAssembler({ schema: null, logger: new RecordingLogger() });

      const typed = assembler.toTypedRow({ DocumentId: 'a', ['__proto__']: '5' });

      expect(Object.keys(typed)).toEqual(['__proto__']);
      expect(JSON.stringify(typed)).toBe('{"__proto__":5}');
    });

    it('should let a schema read a column named __proto__', () => {
      const schema = compileDocumentSchema({ value: '__proto__' });
      const assembler = new DocumentAssembler({ schema, logger: new RecordingLogger() });

      const result = assembler.assemble([{ DocumentId: 'a', ['__proto__']: '5' }]);

      expect(result.documents[0]?.fields).toEqual({ value: 5 });
    });
  });
});
