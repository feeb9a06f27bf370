/**
 * Tests for aggregation planning
 */

import { describe, expect, it } from 'vitest';
import { field } from '../../utils/index.js';
import { OBJECT_ID_DEFINITION } from '../../../engine/backend.js';
import {
  formatStatistics,
  isAggregating,
  parseStatisticsSpec,
  planAggregation,
  planMismatches,
} from '../../../pipeline/aggregation.js';

const FIELDS = [
  OBJECT_ID_DEFINITION,
  field('Type', 'string'),
  field('Status', 'string'),
  field('Hectares', 'double'),
  field('Radius', 'string', 25),
];

describe('parseStatisticsSpec', () => {
  it('should split entries and upper-case the function', () => {
    expect(parseStatisticsSpec('Hectares sum; Status COUNT')).toEqual({
      statistics: [
        { field: 'Hectares', fn: 'SUM' },
        { field: 'Status', fn: 'COUNT' },
      ],
      invalid: [],
    });
  });

  it('should report entries without a known function', () => {
    const parsed = parseStatisticsSpec('A SUM;B MEDIAN;C');

    expect(parsed.statistics).toEqual([{ field: 'A', fn: 'SUM' }]);
    expect(parsed.invalid).toEqual(['B MEDIAN', 'C']);
  });
});

describe('formatStatistics', () => {
  it('should join pairs with semicolons', () => {
    expect(
      formatStatistics([
        { field: 'A', fn: 'SUM' },
        { field: 'B', fn: 'FIRST' },
      ])
    ).toBe('A SUM;B FIRST');
  });
});

describe('planAggregation', () => {
  it('should inject the first group field as a FIRST placeholder when no statistic survives', () => {
    const plan = planAggregation('Type', '', FIELDS);

    expect(plan.groupFields).toEqual(['Type']);
    expect(plan.statistics).toEqual([{ field: 'Type', fn: 'FIRST' }]);
    expect(plan.placeholder).toBe(plan.statistics[0]);
  });

  it('should drop unknown group and statistic fields and report them', () => {
    const plan = planAggregation('type;Unknown', 'Hectares sum;Bogus MEAN;Hectares', FIELDS);

    expect(plan.groupFields).toEqual(['Type']);
    expect(plan.statistics).toEqual([{ field: 'Hectares', fn: 'SUM' }]);
    expect(plan.placeholder).toBeNull();
    expect(plan.missingGroupFields).toEqual(['Unknown']);
    expect(plan.missingStatistics).toEqual(['Hectares', 'Bogus']);
  });

  it('should use the placeholder when every requested statistic is unknown', () => {
    const plan = planAggregation('Status;Type', 'Missing SUM', FIELDS);

    expect(plan.statistics).toEqual([{ field: 'Status', fn: 'FIRST' }]);
    expect(plan.placeholder).toEqual({ field: 'Status', fn: 'FIRST' });
  });

  it('should carry the radius through grouping when requested', () => {
    const plan = planAggregation('Type', 'Hectares SUM', FIELDS, { includeRadius: true });

    expect(plan.statistics).toEqual([
      { field: 'Hectares', fn: 'SUM' },
      { field: 'Radius', fn: 'FIRST' },
    ]);
  });

  it('should not add the radius when it is already a group field', () => {
    const plan = planAggregation('Type;Radius', '', FIELDS, { includeRadius: true });

    expect(plan.statistics).toEqual([{ field: 'Type', fn: 'FIRST' }]);
  });

  it('should not aggregate when nothing is requested', () => {
    const plan = planAggregation('', '', FIELDS, { includeRadius: true });

    expect(isAggregating(plan)).toBe(false);
    expect(plan.statistics).toEqual([]);
  });

  it('should aggregate statistics without group fields', () => {
    const plan = planAggregation(undefined, 'Hectares SUM', FIELDS);

    expect(isAggregating(plan)).toBe(true);
    expect(plan.groupFields).toEqual([]);
    expect(plan.placeholder).toBeNull();
  });
});

describe('planMismatches', () => {
  it('should turn dropped names into schema mismatch records', () => {
    const plan = planAggregation('Owner', 'Depth MAX', FIELDS);

    expect(planMismatches(plan, 'Habitats')).toEqual([
      { category: 'schema-mismatch', context: 'group', dataset: 'Habitats', fields: ['Owner'] },
      { category: 'schema-mismatch', context: 'statistics', dataset: 'Habitats', fields: ['Depth'] },
    ]);
  });

  it('should have no records when everything resolves', () => {
    expect(planMismatches(planAggregation('Type', 'Hectares SUM', FIELDS), 'Habitats')).toEqual([null, null]);
  });
});
