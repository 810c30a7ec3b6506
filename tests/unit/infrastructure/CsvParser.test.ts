import { describe, it, expect } from 'vitest';
import { CsvParser } from '../../../src/infrastructure/parsers/CsvParser.js';

describe('CsvParser', () => {
  it('should key each row by the raw header, type hints included', () => {
    const rows = [...new CsvParser().parse('DocumentId,age:int\nu1,36\nu2,41')];

    expect(rows).toEqual([
      { DocumentId: 'u1', 'age:int': '36' },
      { DocumentId: 'u2', 'age:int': '41' },
    ]);
  });

  it('should keep every cell as an untrimmed string', () => {
    const [row] = [...new CsvParser().parse('a,b\n 1 ,true')];

    expect(row).toEqual({ a: ' 1 ', b: 'true' });
  });

  it('should handle quoted cells with delimiters and escaped quotes', () => {
    const [row] = [...new CsvParser().parse('DocumentId,v,w\nd1,"x, y","""42"""')];

    expect(row).toEqual({ DocumentId: 'd1', v: 'x, y', w: '"42"' });
  });

  it('should skip empty lines and rows with only blank cells', () => {
    const rows = [...new CsvParser().parse('a,b\n1,2\n\n , \n3,4\n')];

    expect(rows).toEqual([
      { a: '1', b: '2' },
      { a: '3', b: '4' },
    ]);
  });

  it('should drop cells beyond the header width', () => {
    const [row] = [...new CsvParser().parse('a,b\n1,2,3')];

    expect(row).toEqual({ a: '1', b: '2' });
  });

  it('should use an explicit delimiter', () => {
    const [row] = [...new CsvParser({ delimiter: ';' }).parse('a;b\n1,5;2')];

    expect(row).toEqual({ a: '1,5', b: '2' });
  });

  it('should auto-detect a tab delimiter', () => {
    const [row] = [...new CsvParser().parse('a\tb\n1\t2')];

    expect(row).toEqual({ a: '1', b: '2' });
  });

  it('should drop a leading byte order mark from the first header', () => {
    const [row] = [...new CsvParser().parse('\uFEFFDocumentId,name\nu1,Ada')];

    expect(row).toEqual({ DocumentId: 'u1', name: 'Ada' });
  });

  it('should leave trailing columns out of a short row', () => {
    const rows = [...new CsvParser().parse('item,DocumentId\nApple,o1\nBanana\nCherry,o2')];

    expect(rows).toEqual([{ item: 'Apple', DocumentId: 'o1' }, { item: 'Banana' }, { item: 'Cherry', DocumentId: 'o2' }]);
  });

  it('should yield nothing for a header-only input', () => {
    expect([...new CsvParser().parse('DocumentId,name\n')]).toEqual([]);
  });
});
