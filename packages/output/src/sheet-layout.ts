import { MAX_SHEET_NAME_LENGTH, ROW_HEIGHT, type Recommendation } from '@cisbench/types';

export interface ColumnSpec {
  header: string;
  width: number;
}

export const INDEX_SHEET_NAME = 'Index';

export const INDEX_COLUMNS: readonly ColumnSpec[] = [
  { header: 'Section', width: 10 },
  { header: 'Section Name', width: 32 },
  { header: 'Controls', width: 10 },
  { header: 'Tab Name', width: 32 },
  { header: 'Description', width: 50 },
];

export const SECTION_COLUMNS: readonly ColumnSpec[] = [
  { header: '#', width: 8 },
  { header: 'Control Title', width: 42 },
  { header: 'Level', width: 10 },
  { header: 'Description & Impact', width: 55 },
  { header: 'Audit Steps (CLI & GUI)', width: 60 },
  { header: 'Remediation', width: 55 },
  { header: 'Default Value', width: 35 },
  { header: 'References/Status', width: 40 },
];

/** 1-based column of the Level cell on section sheets */
export const LEVEL_COLUMN = 3;

const INVALID_SHEET_NAME_CHARS = /[*?:\\/[\]]/g;
/** Sheet names cannot start or end with an apostrophe */
const EDGE_APOSTROPHES = /^'+|'+$/g;

/**
 * Sheet name for a section: "<num>. <name>", with characters sheet names
 * cannot hold replaced by '-', cut to the sheet-name length limit, and with
 * apostrophes stripped from both ends. The Index "Tab Name" column and the
 * section sheet both use this value.
 */
export function toSheetName(sectionNumber: string, sectionName: string): string {
  return `${sectionNumber}. ${sectionName}`
    .replace(INVALID_SHEET_NAME_CHARS, '-')
    .slice(0, MAX_SHEET_NAME_LENGTH)
    .replace(EDGE_APOSTROPHES, '');
}

/**
 * Description followed by labelled RATIONALE and IMPACT paragraphs when present.
 */
export function composeDescription(rec: Pick<Recommendation, 'description' | 'rationale' | 'impact'>): string {
  let full = rec.description;
  if (rec.rationale) {
    full += `\n\nRATIONALE:\n${rec.rationale}`;
  }
  if (rec.impact) {
    full += `\n\nIMPACT:\n${rec.impact}`;
  }
  return full;
}

export function composeReferences(rec: Pick<Recommendation, 'references' | 'status'>): string {
  const status = `STATUS: ${rec.status}`;
  return rec.references ? `${rec.references}\n\n${status}` : status;
}

function countLines(text: string): number {
  return text.split('\n').length;
}

/**
 * Row height from the tallest of the composed description, audit and
 * remediation cells, clamped to [MIN, MAX].
 */
export function computeRowHeight(rec: Recommendation): number {
  const maxLines = Math.max(
    countLines(composeDescription(rec)),
    countLines(rec.audit),
    countLines(rec.remediation)
  );
  return Math.min(Math.max(maxLines * ROW_HEIGHT.PER_LINE, ROW_HEIGHT.MIN), ROW_HEIGHT.MAX);
}

/**
 * Cell values of a section-sheet data row, in column order.
 */
export function toRecommendationRow(rec: Recommendation): string[] {
  return [
    rec.num,
    rec.title,
    rec.profile,
    composeDescription(rec),
    rec.audit,
    rec.remediation,
    rec.defaultValue,
    composeReferences(rec),
  ];
}
