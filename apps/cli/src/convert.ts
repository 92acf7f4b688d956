import { mkdir, writeFile } from 'fs/promises';
import { dirname, resolve } from 'path';
import { extractPDF, type ExtractedPDF } from '@cisbench/pdf-extract';
import { parseBenchmark } from '@cisbench/cis-parser';
import { buildAuditWorkbook, exportJson, writeAuditWorkbook } from '@cisbench/output';
import type { BenchmarkParseResult, ProgressCallback, SectionNames } from '@cisbench/types';
import type { OutputFormat } from './options.js';

export interface ConvertOptions {
  outputPath: string;
  format: OutputFormat;
  sectionNames?: SectionNames | undefined;
  generatedAt?: Date | undefined;
  onProgress?: ProgressCallback | undefined;
  /** PDF text source (default: pdfjs-dist extraction from disk) */
  loadPdf?: ((filePath: string) => Promise<ExtractedPDF>) | undefined;
}

export interface ConvertResult {
  result: BenchmarkParseResult;
  outputPath: string;
  /** Sheets written (0 for JSON output) */
  sheets: number;
}

/**
 * PDF → records → workbook (or JSON). Everything is built in memory and the
 * output file is written once at the end, so a failure leaves no partial file.
 */
export async function convertBenchmark(inputPath: string, options: ConvertOptions): Promise<ConvertResult> {
  const loadPdf = options.loadPdf ?? extractPDF;
  const outputPath = resolve(options.outputPath);
  const generatedAt = options.generatedAt ?? new Date();

  const pdf = await loadPdf(inputPath);
  const result = parseBenchmark(pdf, { onProgress: options.onProgress });

  await mkdir(dirname(outputPath), { recursive: true });

  let sheets = 0;
  if (options.format === 'json') {
    const json = exportJson(result, { generatedAt, sectionNames: options.sectionNames });
    await writeFile(outputPath, `${json}\n`, 'utf-8');
  } else {
    const workbook = buildAuditWorkbook(result, {
      generatedAt,
      sectionNames: options.sectionNames,
      onProgress: options.onProgress,
    });
    await writeAuditWorkbook(workbook, outputPath);
    sheets = workbook.worksheets.length;
  }

  options.onProgress?.({
    type: 'output-saved',
    outputPath,
    sheets,
    controls: result.recommendations.length,
  });

  return { result, outputPath, sheets };
}
