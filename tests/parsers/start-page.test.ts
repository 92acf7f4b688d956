import { describe, it, expect } from 'vitest';
import { findRecommendationsStartPage } from '@cisbench/cis-parser';
import { COVER_PAGE, CRAMFS_PAGE, TERMS_PAGE, TMP_PAGE, createMockPDF } from '../fixtures/benchmark.js';

describe('findRecommendationsStartPage', () => {
  it('should return the first page with a section 1.1 recommendation', () => {
    const pdf = createMockPDF([COVER_PAGE, TERMS_PAGE, CRAMFS_PAGE, TMP_PAGE]);

    expect(findRecommendationsStartPage(pdf, 30, 15)).toEqual({ pageIndex: 2, detected: true });
  });

  it('should accept a three-component first recommendation', () => {
    const pdf = createMockPDF([COVER_PAGE, TMP_PAGE]);

    expect(findRecommendationsStartPage(pdf, 30, 15)).toEqual({ pageIndex: 1, detected: true });
  });

  it('should find the same page whatever the front matter says', () => {
    const plain = createMockPDF([COVER_PAGE, TERMS_PAGE, CRAMFS_PAGE]);
    const other = createMockPDF(['Table of Contents', 'Overview\nIntended audience', CRAMFS_PAGE]);

    expect(findRecommendationsStartPage(plain, 30, 15)).toEqual(findRecommendationsStartPage(other, 30, 15));
  });

  it('should ignore "1.1" that is not at the start of a line', () => {
    const pdf = createMockPDF(['See section 1.1 Filesystem for details', CRAMFS_PAGE]);

    expect(findRecommendationsStartPage(pdf, 30, 15)).toEqual({ pageIndex: 1, detected: true });
  });

  it('should ignore a lowercase word after the number', () => {
    const pdf = createMockPDF(['1.1 is the first recommendation', CRAMFS_PAGE]);

    expect(findRecommendationsStartPage(pdf, 30, 15)).toEqual({ pageIndex: 1, detected: true });
  });

  it('should fall back when no page matches', () => {
    const pdf = createMockPDF([COVER_PAGE, TERMS_PAGE]);

    expect(findRecommendationsStartPage(pdf, 30, 15)).toEqual({ pageIndex: 15, detected: false });
  });

  it('should not scan past the scan limit', () => {
    const pdf = createMockPDF([COVER_PAGE, TERMS_PAGE, CRAMFS_PAGE]);

    expect(findRecommendationsStartPage(pdf, 2, 7)).toEqual({ pageIndex: 7, detected: false });
  });
});
