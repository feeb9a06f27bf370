/**
 * Tests for the output column projection
 */

import { describe, it, expect } from 'vitest';
import { field } from '../../utils/index.js';
import { OBJECT_ID_DEFINITION } from '../../../engine/backend.js';
import { isLiteralToken, project, splitSpec } from '../../../pipeline/field-projector.js';

const FIELDS = [
  OBJECT_ID_DEFINITION,
  field('SiteName', 'string'),
  { ...field('HAB_TYPE', 'string'), alias: 'Habitat' },
  field('Area', 'double'),
];

describe('splitSpec', () => {
  it('should trim tokens and drop empty entries', () => {
    expect(splitSpec(' a, b ,,c ', ',')).toEqual(['a', 'b', 'c']);
  });

  it('should return nothing for an empty or missing spec', () => {
    expect(splitSpec('', ';')).toEqual([]);
    expect(splitSpec(undefined, ';')).toEqual([]);
  });
});

describe('project', () => {
  it('should keep request order and drop unknown names', () => {
    const projection = project('Area,Missing,SiteName', FIELDS);

    expect(projection.cleanedSpec).toBe('Area,SiteName');
    expect(projection.missing).toEqual(['Missing']);
    expect(projection.tokens.map((token) => token.kind)).toEqual(['field', 'field']);
  });

  it('should resolve names ignoring case and by alias', () => {
    const projection = project('sitename,Habitat', FIELDS);

    expect(projection.missing).toEqual([]);
    const resolved = projection.tokens.flatMap((token) => (token.kind === 'field' ? [token.field.name] : []));
    expect(resolved).toEqual(['SiteName', 'HAB_TYPE']);
    // Header keeps the requested spelling
    expect(projection.cleanedSpec).toBe('sitename,Habitat');
  });

  it('should pass literal tokens through unvalidated', () => {
    const projection = project('"Search A",Area', FIELDS);

    expect(projection.tokens[0]).toEqual({ kind: 'literal', text: '"Search A"' });
    expect(projection.cleanedSpec).toBe('"Search A",Area');
  });

  it('should accept a spec made only of literals', () => {
    const projection = project('"x","y"', []);

    expect(projection.tokens).toHaveLength(2);
    expect(projection.missing).toEqual([]);
  });

  it('should report every token missing when nothing resolves', () => {
    const projection = project('Foo,Bar', FIELDS);

    expect(projection.tokens).toEqual([]);
    expect(projection.cleanedSpec).toBe('');
    expect(projection.missing).toEqual(['Foo', 'Bar']);
  });
});

describe('isLiteralToken', () => {
  it('should treat only a leading double quote as a literal', () => {
    expect(isLiteralToken('"abc"')).toBe(true);
    expect(isLiteralToken("'abc'")).toBe(false);
    expect(isLiteralToken('abc"')).toBe(false);
  });
});
