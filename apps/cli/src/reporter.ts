/* eslint-disable no-console */
import type { ConversionEvent, ProgressCallback } from '@cisbench/types';

/**
 * Human-readable progress line for a conversion event.
 */
export function formatConversionEvent(event: ConversionEvent): string {
  switch (event.type) {
    case 'metadata': {
      const detected = `${event.metadata.title} ${event.metadata.version}`.trim();
      return detected === '' ? 'Detected: no benchmark title or version found' : `Detected: ${detected}`;
    }
    case 'start-page':
      return event.detected
        ? `Recommendations start at page ${event.pageIndex + 1}`
        : `Recommendations start page not found, defaulting to page ${event.pageIndex + 1}`;
    case 'extraction-started':
      return `Extracting recommendations from ${event.totalPages} pages (starting at page ${event.startPage + 1})`;
    case 'extraction-complete':
      return `Matched ${event.headersMatched} headers, ${event.accepted} with audit steps, ${event.unique} unique recommendations`;
    case 'section':
      return `  Section ${event.number}: ${event.controls} controls`;
    case 'sheet-created':
      return event.controls === null
        ? `  Created sheet: ${event.sheetName}`
        : `  Created sheet: ${event.sheetName} (${event.controls} controls)`;
    case 'output-saved':
      return `Saved ${event.outputPath} (${event.sheets} sheets, ${event.controls} controls)`;
  }
}

/**
 * Progress callback printing `[INFO]` lines to stdout, or nothing when quiet.
 */
export function createConsoleReporter(quiet: boolean): ProgressCallback {
  return (event) => {
    if (quiet) return;
    console.log(`[INFO] ${formatConversionEvent(event)}`);
  };
}
