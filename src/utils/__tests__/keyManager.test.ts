import { describe, it, expect } from 'vitest';
import {
  buildKeyTuple,
  encodeKeyValue,
  findColumnByKeywords,
  isEmptyKeyValue,
  normalizeKey,
  resolveColumn,
  uniqueColumnName,
} from '../keyManager';
import { SchemaError } from '../errors';

describe('encodeKeyValue', () => {
  it('tags values by type', () => {
    expect(encodeKeyValue('1')).toBe('s:1');
    expect(encodeKeyValue(1)).toBe('n:1');
    expect(encodeKeyValue(true)).toBe('b:true');
    expect(encodeKeyValue(new Date(0))).toBe('d:0');
  });

  it('encodes every empty value the same way', () => {
    expect(encodeKeyValue(null)).toBe('e:');
    expect(encodeKeyValue(undefined)).toBe('e:');
    expect(encodeKeyValue('')).toBe('e:');
    expect(encodeKeyValue(' ')).toBe('s: ');
  });
});

describe('isEmptyKeyValue', () => {
  it('accepts only null, undefined and the empty string', () => {
    expect([null, undefined, '', ' ', 0].map(isEmptyKeyValue)).toEqual([true, true, true, false, false]);
  });
});

describe('buildKeyTuple', () => {
  it('follows the key column order', () => {
    const row = { a: 'x', b: 2 };
    expect(buildKeyTuple(row, ['a', 'b'])).toBe('["s:x","n:2"]');
    expect(buildKeyTuple(row, ['b', 'a'])).toBe('["n:2","s:x"]');
  });

  it('does not let separators inside values collide', () => {
    expect(buildKeyTuple({ a: 'x","s:y', b: null }, ['a', 'b'])).not.toBe(
      buildKeyTuple({ a: 'x', b: 'y' }, ['a', 'b'])
    );
  });
});

describe('normalizeKey', () => {
  it('collapses whitespace and trims', () => {
    expect(normalizeKey('  A\tB\n  C ')).toBe('A B C');
    expect(normalizeKey(null)).toBe('');
    expect(normalizeKey(12)).toBe('12');
  });
});

describe('findColumnByKeywords', () => {
  const columns = ['N°', 'Date de visite', 'HOPITAUX/ CMC', 'Montant'];

  it('matches headers case-insensitively by substring', () => {
    expect(findColumnByKeywords(columns, ['date'])).toBe('Date de visite');
    expect(findColumnByKeywords(columns, ['hospital', 'hopitaux'])).toBe('HOPITAUX/ CMC');
  });

  it('returns the leftmost matching column', () => {
    expect(findColumnByKeywords(['Amount due', 'Amount paid'], ['amount'])).toBe('Amount due');
  });

  it('throws a SchemaError listing the keywords', () => {
    expect(() => findColumnByKeywords(columns, ['city', 'ville'])).toThrow('Column "city | ville" not found');
  });
});

describe('resolveColumn', () => {
  it('prefers an exact match', () => {
    expect(resolveColumn(['date', 'Date'], 'Date', true)).toBe('Date');
  });

  it('requires an exact match unless fuzzy', () => {
    expect(() => resolveColumn(['Date de visite'], 'date')).toThrow(SchemaError);
    expect(resolveColumn(['Date de visite'], 'date', true)).toBe('Date de visite');
  });
});

describe('uniqueColumnName', () => {
  it('keeps a free name and suffixes a taken one', () => {
    expect(uniqueColumnName(['case', 'amount'], 'Group')).toBe('Group');
    expect(uniqueColumnName(['Group', 'amount'], 'Group')).toBe('Group_2');
    expect(uniqueColumnName(['Group', 'Group_2'], 'Group')).toBe('Group_3');
  });
});
