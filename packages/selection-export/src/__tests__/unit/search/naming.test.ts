import { describe, expect, it } from 'vitest';
import {
  bufferLayerName,
  keepNumbersAndSpaces,
  replaceSearchStrings,
  searchStringsFor,
  stripIllegals,
  stripPathIllegals,
  subrefOf,
} from '../../../search/naming.js';

describe('searchStringsFor', () => {
  it('should derive the reference forms', () => {
    expect(searchStringsFor('ES/2024/001', 'North: Field', '500m')).toEqual({
      reference: 'ES_2024_001',
      siteName: 'North_ Field',
      shortRef: '_2024_001',
      subref: '001',
      radius: '500m',
    });
  });

  it('should use the configured replacement character', () => {
    const strings = searchStringsFor('AB/12', '', '1km', '-');

    expect(strings.reference).toBe('AB-12');
    expect(strings.shortRef).toBe('-12');
    expect(strings.subref).toBe('12');
  });
});

describe('replaceSearchStrings', () => {
  it('should replace every placeholder ignoring case', () => {
    const strings = searchStringsFor('ES/2024/001', 'Meadow', '500m');

    expect(replaceSearchStrings('%SHORTREF%_%SiteName%_%radius%', strings)).toBe('_2024_001_Meadow_500m');
    expect(replaceSearchStrings('%ref%/%subref%', strings)).toBe('ES_2024_001/001');
  });
});

describe('stripIllegals', () => {
  it('should replace characters not allowed in file names', () => {
    expect(stripIllegals('a/b\\c:d*e?f"g<h>i|j')).toBe('a_b_c_d_e_f_g_h_i_j');
  });
});

describe('stripPathIllegals', () => {
  it('should keep separators and strip each segment', () => {
    expect(stripPathIllegals('/data/out/ES_1 <draft>')).toBe('/data/out/ES_1 _draft_');
  });

  it('should keep a drive prefix', () => {
    expect(stripPathIllegals('C:\\out\\a?b ')).toBe('C:\\out\\a_b');
  });
});

describe('keepNumbersAndSpaces', () => {
  it('should keep digits, spaces and the replacement character', () => {
    expect(keepNumbersAndSpaces('AB_12 C3')).toBe('_12 3');
  });
});

describe('subrefOf', () => {
  it('should return the whole reference when there is no replacement character', () => {
    expect(subrefOf(' 12 34 ')).toBe('12 34');
  });
});

describe('bufferLayerName', () => {
  it('should replace dots', () => {
    expect(bufferLayerName('ES_1_Buffer', '0.5km')).toBe('ES_1_Buffer_0_5km');
  });
});
