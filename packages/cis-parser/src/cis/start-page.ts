import type { ExtractedPDF } from '@cisbench/pdf-extract';
import type { StartPageResult } from '@cisbench/types';

/** First recommendation of section 1: "1.1 Title" or "1.1.1 Title" at line start */
const FIRST_RECOMMENDATION_PATTERN = /(?:^|\n)1\.1(?:\.\d+)?\s+[A-Z]/;

/**
 * Locate the page where recommendations begin, skipping front matter.
 * Scans at most `scanLimit` pages; falls back to `fallbackPage` (0-based).
 */
export function findRecommendationsStartPage(
  pdf: ExtractedPDF,
  scanLimit: number,
  fallbackPage: number
): StartPageResult {
  const limit = Math.min(scanLimit, pdf.pages.length);

  for (let pageIndex = 0; pageIndex < limit; pageIndex++) {
    const page = pdf.pages[pageIndex];
    if (page !== undefined && FIRST_RECOMMENDATION_PATTERN.test(page.text)) {
      return { pageIndex, detected: true };
    }
  }

  return { pageIndex: fallbackPage, detected: false };
}
