/**
 * JSON Exporter Module
 *
 * Serializes a parse result for consumers that want the records rather than
 * a workbook (diffing benchmark versions, feeding other tooling).
 */

import {
  BenchmarkParseResultSchema,
  CONVERTER_VERSION,
  DEFAULT_SECTION_NAMES,
  resolveSectionName,
  type BenchmarkMetadata,
  type BenchmarkParseResult,
  type Recommendation,
  type SectionNames,
} from '@cisbench/types';
import { toSheetName } from './sheet-layout.js';

export interface JsonExportOptions {
  /** Pretty-print with two-space indentation (default: true) */
  pretty?: boolean | undefined;
  generatedAt?: Date | undefined;
  sectionNames?: SectionNames | undefined;
}

export interface JsonSectionSummary {
  number: string;
  name: string;
  sheetName: string;
  controls: number;
}

export interface JsonExport {
  converterVersion: string;
  generatedAt: string;
  metadata: BenchmarkMetadata;
  sections: JsonSectionSummary[];
  recommendations: Recommendation[];
  warnings: string[];
}

/**
 * Validate the parse result and build the exported document.
 */
export function toJsonExport(result: BenchmarkParseResult, options: JsonExportOptions = {}): JsonExport {
  const validated = BenchmarkParseResultSchema.parse(result);
  const sectionNames = options.sectionNames ?? DEFAULT_SECTION_NAMES;

  return {
    converterVersion: CONVERTER_VERSION,
    generatedAt: (options.generatedAt ?? new Date()).toISOString(),
    metadata: validated.metadata,
    sections: validated.sections.map((section) => {
      const name = resolveSectionName(section.number, sectionNames);
      return {
        number: section.number,
        name,
        sheetName: toSheetName(section.number, name),
        controls: section.recommendations.length,
      };
    }),
    recommendations: validated.recommendations,
    warnings: validated.warnings,
  };
}

export function exportJson(result: BenchmarkParseResult, options: JsonExportOptions = {}): string {
  const document = toJsonExport(result, options);
  return options.pretty === false ? JSON.stringify(document) : JSON.stringify(document, null, 2);
}
