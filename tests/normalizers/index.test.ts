import { describe, it, expect } from 'vitest';
import {
  deduplicateRecommendations,
  sortRecommendations,
  groupBySection,
} from '@cisbench/cis-parser';
import { makeRecommendation } from '../fixtures/benchmark.js';

describe('deduplicateRecommendations', () => {
  it('should keep the first occurrence of each control number', () => {
    const recs = [
      makeRecommendation({ num: '1.1', title: 'First' }),
      makeRecommendation({ num: '1.2', title: 'Other' }),
      makeRecommendation({ num: '1.1', title: 'Repeated' }),
    ];

    const unique = deduplicateRecommendations(recs);

    expect(unique.map((r) => r.title)).toEqual(['First', 'Other']);
  });

  it('should return an empty list for no input', () => {
    expect(deduplicateRecommendations([])).toEqual([]);
  });
});

describe('sortRecommendations', () => {
  it('should order control numbers as integer tuples', () => {
    const recs = ['1.10', '1.2', '1.1.3', '2.1', '1.1'].map((num) => makeRecommendation({ num }));

    const sorted = sortRecommendations(recs);

    expect(sorted.map((r) => r.num)).toEqual(['1.1', '1.1.3', '1.2', '1.10', '2.1']);
  });

  it('should not mutate original array', () => {
    const recs = [makeRecommendation({ num: '2.1' }), makeRecommendation({ num: '1.1' })];

    sortRecommendations(recs);
    expect(recs[0]?.num).toBe('2.1');
  });

  it('should throw on a malformed control number', () => {
    const recs = [makeRecommendation({ num: '1.x' }), makeRecommendation({ num: '1.1' })];

    expect(() => sortRecommendations(recs)).toThrow('Invalid control number "1.x"');
  });

  it('should throw on a malformed control number in a single-record list', () => {
    expect(() => sortRecommendations([makeRecommendation({ num: '1.x' })])).toThrow(
      'Invalid control number "1.x": component "x" is not an integer'
    );
  });

  it('should order components beyond the safe integer range', () => {
    const recs = ['1.9007199254740993', '1.9007199254740992'].map((num) => makeRecommendation({ num }));

    expect(sortRecommendations(recs).map((r) => r.num)).toEqual(['1.9007199254740992', '1.9007199254740993']);
  });
});

describe('groupBySection', () => {
  it('should group by top-level section in numeric order', () => {
    const recs = ['10.1', '2.1', '1.1', '1.2', '2.3'].map((num) => makeRecommendation({ num }));

    const sections = groupBySection(recs);

    expect(sections.map((s) => s.number)).toEqual(['1', '2', '10']);
    expect(sections[0]?.recommendations.map((r) => r.num)).toEqual(['1.1', '1.2']);
    expect(sections[1]?.recommendations.map((r) => r.num)).toEqual(['2.1', '2.3']);
    expect(sections[2]?.recommendations.map((r) => r.num)).toEqual(['10.1']);
  });

  it('should keep input order inside a section', () => {
    const recs = ['1.3', '1.1'].map((num) => makeRecommendation({ num }));

    expect(groupBySection(recs)[0]?.recommendations.map((r) => r.num)).toEqual(['1.3', '1.1']);
  });

  it('should return no sections for no input', () => {
    expect(groupBySection([])).toEqual([]);
  });
});
