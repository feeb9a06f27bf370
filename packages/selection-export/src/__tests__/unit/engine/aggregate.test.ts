import { describe, expect, it } from 'vitest';
import { aggregate, groupRows, statisticFieldName } from '../../../engine/aggregate.js';

describe('aggregate', () => {
  it('should skip nulls', () => {
    expect(aggregate('SUM', [1, null, 2])).toBe(3);
    expect(aggregate('COUNT', [1, null, 2])).toBe(2);
    expect(aggregate('MEAN', [null, 4, 8])).toBe(6);
  });

  it('should yield null for an all-null group except COUNT', () => {
    expect(aggregate('SUM', [null, null])).toBeNull();
    expect(aggregate('FIRST', [null])).toBeNull();
    expect(aggregate('COUNT', [null, null])).toBe(0);
  });

  it('should use the population standard deviation', () => {
    expect(aggregate('STD', [2, 4, 4, 4, 5, 5, 7, 9])).toBe(2);
  });

  it('should compute range, first and last', () => {
    expect(aggregate('RANGE', [3, 10, 7])).toBe(7);
    expect(aggregate('RANGE', Array.from({ length: 300_000 }, (_, i) => i - 100))).toBe(299_999);
    expect(aggregate('FIRST', [null, 'b', 'a'])).toBe('b');
    expect(aggregate('LAST', ['b', 'a', null])).toBe('a');
  });

  it('should order text ignoring case for MIN and MAX', () => {
    expect(aggregate('MIN', ['beta', 'Alpha', 'gamma'])).toBe('Alpha');
    expect(aggregate('MAX', ['beta', 'Alpha', 'gamma'])).toBe('gamma');
  });
});

describe('groupRows', () => {
  it('should group on exact values and order the groups ascending', () => {
    const groups = groupRows(
      [
        { Type: 'b', N: 1 },
        { Type: 'A', N: 2 },
        { Type: 'b', N: 3 },
      ],
      ['Type']
    );

    expect(groups.map((group) => group.key)).toEqual([['A'], ['b']]);
    expect(groups[1].rows.map((row) => row.N)).toEqual([1, 3]);
  });

  it('should put every row in one group when there are no fields', () => {
    expect(groupRows([{ N: 1 }, { N: 2 }], [])).toHaveLength(1);
  });
});

describe('statisticFieldName', () => {
  it('should prefix the function', () => {
    expect(statisticFieldName({ field: 'Area', fn: 'SUM' })).toBe('SUM_Area');
  });
});
