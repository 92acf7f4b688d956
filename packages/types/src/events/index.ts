import type { BenchmarkMetadata } from '../schemas/index.js';

/**
 * Progress events emitted while a benchmark is parsed and rendered.
 * Libraries never print; callers decide how to present these.
 */
export type ConversionEvent =
  | { type: 'metadata'; metadata: BenchmarkMetadata }
  | { type: 'start-page'; pageIndex: number; detected: boolean }
  | { type: 'extraction-started'; totalPages: number; startPage: number }
  | { type: 'extraction-complete'; headersMatched: number; accepted: number; unique: number }
  | { type: 'section'; number: string; controls: number }
  | { type: 'sheet-created'; sheetName: string; controls: number | null }
  | { type: 'output-saved'; outputPath: string; sheets: number; controls: number };

export type ProgressCallback = (event: ConversionEvent) => void;
