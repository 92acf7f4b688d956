import type { ExtractedPDF } from '@cisbench/pdf-extract';
import type { BenchmarkMetadata } from '@cisbench/types';

const METADATA_PATTERNS = {
  title: /CIS\s+(.+?)\s+Benchmark/i,
  version: /v(\d+\.\d+\.\d+)/,
};

/**
 * Detect the benchmark title and version from the first `maxPages` pages.
 * Title and version are detected independently; a later page overrides an
 * earlier one. Undetected values stay empty.
 */
export function detectBenchmarkMetadata(pdf: ExtractedPDF, maxPages: number): BenchmarkMetadata {
  let title = '';
  let version = '';

  for (const page of pdf.pages.slice(0, maxPages)) {
    const titleMatch = METADATA_PATTERNS.title.exec(page.text);
    if (titleMatch?.[1] !== undefined) {
      title = `CIS ${titleMatch[1]} Benchmark`;
    }

    const versionMatch = METADATA_PATTERNS.version.exec(page.text);
    if (versionMatch?.[1] !== undefined) {
      version = `v${versionMatch[1]}`;
    }
  }

  return { title, version };
}
