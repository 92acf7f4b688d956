import type { ExtractedPDF } from '@cisbench/pdf-extract';
import {
  ExtractorOptionsSchema,
  type BenchmarkParseResult,
  type ExtractorOptions,
  type ExtractorOptionsInput,
  type ProgressCallback,
} from '@cisbench/types';
import { detectBenchmarkMetadata } from './metadata.js';
import { findRecommendationsStartPage } from './start-page.js';
import { extractRecommendations } from './recommendation-parser.js';
import { deduplicateRecommendations, sortRecommendations, groupBySection } from '../normalizers/index.js';

export interface ParseBenchmarkOptions extends ExtractorOptionsInput {
  onProgress?: ProgressCallback | undefined;
}

/**
 * Run the full extraction pipeline over an extracted PDF: metadata, start
 * page, header matching, field segmentation, acceptance, deduplication,
 * sorting and section grouping.
 *
 * Unrecognized documents are not an error: the result simply holds fewer
 * (or no) recommendations, with a warning describing what was missing.
 */
export function parseBenchmark(pdf: ExtractedPDF, options: ParseBenchmarkOptions = {}): BenchmarkParseResult {
  const { onProgress, ...tuning } = options;
  const config: ExtractorOptions = ExtractorOptionsSchema.parse(tuning);
  const warnings: string[] = [];

  const metadata = detectBenchmarkMetadata(pdf, config.metadataPages);
  onProgress?.({ type: 'metadata', metadata });
  if (metadata.title === '') {
    warnings.push('Benchmark title not detected');
  }
  if (metadata.version === '') {
    warnings.push('Benchmark version not detected');
  }

  const startPage = findRecommendationsStartPage(pdf, config.startPageScanLimit, config.fallbackStartPage);
  onProgress?.({ type: 'start-page', pageIndex: startPage.pageIndex, detected: startPage.detected });
  if (!startPage.detected) {
    warnings.push(`Recommendations start page not detected, using page ${startPage.pageIndex + 1}`);
  }

  onProgress?.({ type: 'extraction-started', totalPages: pdf.totalPages, startPage: startPage.pageIndex });
  const extraction = extractRecommendations(pdf, startPage.pageIndex, config.contentWindowLength);

  const recommendations = sortRecommendations(deduplicateRecommendations(extraction.recommendations));
  onProgress?.({
    type: 'extraction-complete',
    headersMatched: extraction.headersMatched,
    accepted: extraction.recommendations.length,
    unique: recommendations.length,
  });

  if (extraction.headersMatched === 0) {
    warnings.push('No recommendation headers matched');
  } else if (recommendations.length === 0) {
    warnings.push('No matched recommendation had an audit procedure');
  }

  const sections = groupBySection(recommendations);
  for (const section of sections) {
    onProgress?.({ type: 'section', number: section.number, controls: section.recommendations.length });
  }

  return {
    metadata,
    startPage,
    pagesScanned: Math.max(0, pdf.pages.length - startPage.pageIndex),
    headersMatched: extraction.headersMatched,
    recommendations,
    sections,
    warnings,
  };
}
