import { describe, it, expect } from 'vitest';
import { flattenGroups, getGroupStats, groupRows } from '../groupingEngine';
import { DerivationError, SchemaError } from '../errors';
import type { RowRecord } from '../../types/data';

describe('groupRows', () => {
  it('reunites non-adjacent rows in first-appearance order', () => {
    const rows = [
      { case: 'X', v: 1 },
      { case: 'Y', v: 2 },
      { case: 'X', v: 3 },
    ];

    const groups = groupRows(rows, 'case');
    expect(groups.map((g) => g.rows)).toEqual([
      [{ case: 'X', v: 1 }, { case: 'X', v: 3 }],
      [{ case: 'Y', v: 2 }],
    ]);
    expect(groups.map((g) => g.key)).toEqual(['X', 'Y']);
  });

  it('returns no groups for no rows', () => {
    expect(groupRows([], 'case')).toEqual([]);
  });

  it('puts everything in one group when all keys match', () => {
    const rows = [{ k: 'a', n: 1 }, { k: 'a', n: 2 }, { k: 'a', n: 3 }];
    const groups = groupRows(rows, 'k');
    expect(groups).toHaveLength(1);
    expect(groups[0].rows).toEqual(rows);
  });

  it('makes singleton groups when every key differs', () => {
    const rows = [{ k: 3 }, { k: 1 }, { k: 2 }];
    expect(groupRows(rows, 'k').map((g) => g.key)).toEqual([3, 1, 2]);
  });

  it('is a partition of its input', () => {
    const rows: RowRecord[] = ['b', 'a', null, 'b', 'c', 'a', '', 'b'].map((k, i) => ({ k, i }));
    const groups = groupRows(rows, 'k');

    const flattened = groups.flatMap((g) => g.rows);
    expect(flattened).toHaveLength(rows.length);
    expect(new Set(flattened).size).toBe(rows.length);
    expect(flattened.map((r) => r.i).sort((a, b) => Number(a) - Number(b))).toEqual([0, 1, 2, 3, 4, 5, 6, 7]);
    expect(groups.map((g) => g.rows.map((r) => r.i))).toEqual([[0, 3, 7], [1, 5], [2, 6], [4]]);
  });

  it('collects empty keys into a single null-keyed group', () => {
    const rows = [{ k: 'a' }, { k: null }, { k: '' }, { k: null }];
    const groups = groupRows(rows, 'k');

    expect(groups.map((g) => g.key)).toEqual(['a', null]);
    expect(groups[1].rows).toEqual([{ k: null }, { k: '' }, { k: null }]);
  });

  it('keeps numbers and numeric text apart', () => {
    const groups = groupRows([{ k: 1 }, { k: '1' }, { k: 1 }], 'k');
    expect(groups.map((g) => g.rows.length)).toEqual([2, 1]);
  });

  it('groups dates by timestamp', () => {
    const rows = [
      { d: new Date(Date.UTC(2024, 2, 1)), n: 1 },
      { d: new Date(Date.UTC(2024, 2, 2)), n: 2 },
      { d: new Date(Date.UTC(2024, 2, 1)), n: 3 },
    ];
    expect(groupRows(rows, 'd').map((g) => g.rows.map((r) => r.n))).toEqual([[1, 3], [2]]);
  });

  it('groups by a derived key', () => {
    const rows = [
      { ref: 'ORD-1/a' },
      { ref: 'ORD-2/a' },
      { ref: 'ORD-1/b' },
    ];
    const groups = groupRows(rows, (row) => String(row.ref).split('/')[0]);

    expect(groups.map((g) => g.key)).toEqual(['ORD-1', 'ORD-2']);
    expect(groups[0].rows).toEqual([{ ref: 'ORD-1/a' }, { ref: 'ORD-1/b' }]);
  });

  it('passes the row index to the derivation', () => {
    const rows = [{ v: 'a' }, { v: 'b' }, { v: 'c' }, { v: 'd' }];
    const groups = groupRows(rows, (_row, index) => index % 2 === 0);
    expect(groups.map((g) => g.key)).toEqual([true, false]);
    expect(groups[0].rows).toEqual([{ v: 'a' }, { v: 'c' }]);
  });

  it('wraps derivation failures with the row index', () => {
    const rows = [{ v: 'a' }, { v: 'b' }, { v: 'boom' }];
    const failure = new Error('bad value');

    let caught: unknown;
    try {
      groupRows(rows, (row) => {
        if (row.v === 'boom') throw failure;
        return row.v;
      });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(DerivationError);
    expect(caught).toMatchObject({
      kind: 'DerivationError',
      rowIndex: 2,
      cause: failure,
      message: 'Group key derivation failed at row 2: bad value',
    });
  });

  it('rejects rows lacking the key column', () => {
    const rows: RowRecord[] = [{ case: 'X' }, { other: 'Y' }];

    expect(() => groupRows(rows, 'case')).toThrow(SchemaError);
    expect(() => groupRows(rows, 'case')).toThrow('Column "case" not found in row 1');
  });

  it('is deterministic', () => {
    const rows = [{ k: 'q' }, { k: 'p' }, { k: 'q' }, { k: 'r' }];
    expect(JSON.stringify(groupRows(rows, 'k'))).toBe(JSON.stringify(groupRows(rows, 'k')));
  });
});

describe('flattenGroups', () => {
  it('appends a 1-based group number to each row', () => {
    const groups = groupRows([{ k: 'x' }, { k: 'y' }, { k: 'x' }], 'k');

    expect(flattenGroups(groups, 'Group')).toEqual([
      { k: 'x', Group: 1 },
      { k: 'x', Group: 1 },
      { k: 'y', Group: 2 },
    ]);
  });

  it('refuses to overwrite an existing column', () => {
    const groups = groupRows([{ Group: 'ORD-7' }, { Group: 'ORD-9' }], 'Group');

    expect(() => flattenGroups(groups, 'Group')).toThrow(
      'Column "Group" already exists; group numbers would overwrite it'
    );
  });
});

describe('getGroupStats', () => {
  it('summarizes group sizes', () => {
    const groups = groupRows([{ k: 1 }, { k: 2 }, { k: 1 }, { k: 3 }, { k: 1 }], 'k');
    expect(getGroupStats(groups)).toEqual({ groups: 3, rows: 5, largestGroup: 3, singletons: 2 });
  });

  it('handles no groups', () => {
    expect(getGroupStats([])).toEqual({ groups: 0, rows: 0, largestGroup: 0, singletons: 0 });
  });
});
