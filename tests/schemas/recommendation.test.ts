import { describe, it, expect } from 'vitest';
import {
  ControlNumberSchema,
  ExtractorOptionsSchema,
  RecommendationSchema,
  RecommendationStatusSchema,
  SectionNamesSchema,
} from '@cisbench/types';
import { makeRecommendation } from '../fixtures/benchmark.js';

describe('RecommendationSchema', () => {
  it('should validate a valid recommendation', () => {
    const result = RecommendationSchema.safeParse(makeRecommendation());
    expect(result.success).toBe(true);
  });

  it('should reject an empty audit', () => {
    const result = RecommendationSchema.safeParse(makeRecommendation({ audit: '' }));
    expect(result.success).toBe(false);
  });

  it('should reject fields over their limits', () => {
    expect(RecommendationSchema.safeParse(makeRecommendation({ description: 'd'.repeat(1501) })).success).toBe(false);
    expect(RecommendationSchema.safeParse(makeRecommendation({ references: 'r'.repeat(801) })).success).toBe(false);
    expect(RecommendationSchema.safeParse(makeRecommendation({ audit: 'a'.repeat(2500) })).success).toBe(true);
  });
});

describe('ControlNumberSchema', () => {
  it('should accept dotted integers', () => {
    expect(ControlNumberSchema.safeParse('1.1').success).toBe(true);
    expect(ControlNumberSchema.safeParse('5.2.10').success).toBe(true);
  });

  it('should reject a single component or other text', () => {
    expect(ControlNumberSchema.safeParse('1').success).toBe(false);
    expect(ControlNumberSchema.safeParse('1.a').success).toBe(false);
    expect(ControlNumberSchema.safeParse('1.1.').success).toBe(false);
  });
});

describe('RecommendationStatusSchema', () => {
  it('should accept the four status tokens', () => {
    for (const status of ['Automated', 'Manual', 'Scored', 'Not Scored']) {
      expect(RecommendationStatusSchema.safeParse(status).success).toBe(true);
    }
    expect(RecommendationStatusSchema.safeParse('automated').success).toBe(false);
  });
});

describe('ExtractorOptionsSchema', () => {
  it('should fill defaults', () => {
    expect(ExtractorOptionsSchema.parse({})).toEqual({
      metadataPages: 5,
      startPageScanLimit: 30,
      fallbackStartPage: 15,
      contentWindowLength: 3500,
    });
  });

  it('should reject non-positive limits', () => {
    expect(ExtractorOptionsSchema.safeParse({ startPageScanLimit: 0 }).success).toBe(false);
    expect(ExtractorOptionsSchema.safeParse({ fallbackStartPage: -1 }).success).toBe(false);
  });
});

describe('SectionNamesSchema', () => {
  it('should accept integer keys with names', () => {
    expect(SectionNamesSchema.safeParse({ '1': 'Identity', '12': 'Containers' }).success).toBe(true);
  });

  it('should reject other keys', () => {
    expect(SectionNamesSchema.safeParse({ 'one': 'Identity' }).success).toBe(false);
  });
});
