/**
 * Audit checklist workbook: one Index sheet plus one sheet per section.
 */
import ExcelJS from 'exceljs';
import type { Font, Workbook, Worksheet } from 'exceljs';
import {
  CONVERTER_VERSION,
  DEFAULT_SECTION_NAMES,
  formatISODate,
  resolveSectionName,
  type BenchmarkMetadata,
  type BenchmarkParseResult,
  type ProgressCallback,
  type RecommendationSection,
  type SectionNames,
} from '@cisbench/types';
import {
  INDEX_COLUMNS,
  INDEX_SHEET_NAME,
  LEVEL_COLUMN,
  SECTION_COLUMNS,
  computeRowHeight,
  toRecommendationRow,
  toSheetName,
  type ColumnSpec,
} from './sheet-layout.js';
import {
  CENTERED,
  CENTERED_WRAP,
  HEADER_FONT,
  INDEX_HEADER_FONT,
  PALETTE,
  THIN_BORDER,
  TOP_WRAP,
  levelFill,
  solidFill,
  titleFont,
} from './styles.js';

export interface WorkbookBuildOptions {
  /** Date shown on the Index sheet and stored as the workbook timestamp (default: now) */
  generatedAt?: Date | undefined;
  sectionNames?: SectionNames | undefined;
  onProgress?: ProgressCallback | undefined;
}

interface BuildContext {
  metadata: BenchmarkMetadata;
  generatedAt: Date;
  sectionNames: SectionNames;
}

/**
 * Build the workbook in memory. Identical input produces identical sheets,
 * rows and cell values; only `generatedAt` varies between runs.
 */
export function buildAuditWorkbook(
  result: Pick<BenchmarkParseResult, 'metadata' | 'sections'>,
  options: WorkbookBuildOptions = {}
): Workbook {
  const context: BuildContext = {
    metadata: result.metadata,
    generatedAt: options.generatedAt ?? new Date(),
    sectionNames: options.sectionNames ?? DEFAULT_SECTION_NAMES,
  };

  const workbook = new ExcelJS.Workbook();
  workbook.creator = `cis-audit ${CONVERTER_VERSION}`;
  workbook.created = context.generatedAt;
  workbook.modified = context.generatedAt;

  createIndexSheet(workbook, result.sections, context);
  options.onProgress?.({ type: 'sheet-created', sheetName: INDEX_SHEET_NAME, controls: null });

  for (const section of result.sections) {
    const sheetName = createSectionSheet(workbook, section, context);
    options.onProgress?.({
      type: 'sheet-created',
      sheetName,
      controls: section.recommendations.length,
    });
  }

  return workbook;
}

/**
 * Write the workbook to `outputPath` in one operation.
 */
export async function writeAuditWorkbook(workbook: Workbook, outputPath: string): Promise<void> {
  await workbook.xlsx.writeFile(outputPath);
}

function createIndexSheet(
  workbook: Workbook,
  sections: RecommendationSection[],
  context: BuildContext
): void {
  const ws = workbook.addWorksheet(INDEX_SHEET_NAME);
  const lastColumn = INDEX_COLUMNS.length;

  mergeRow(ws, 1, lastColumn);
  const title = ws.getCell(1, 1);
  title.value = `${context.metadata.title} ${context.metadata.version}`.trim();
  title.font = titleFont(16);
  title.fill = solidFill(PALETTE.INDEX_TITLE);
  title.alignment = CENTERED;
  ws.getRow(1).height = 40;

  mergeRow(ws, 2, lastColumn);
  const subtitle = ws.getCell(2, 1);
  subtitle.value = `Audit Checklist - Generated on ${formatISODate(context.generatedAt)}`;
  subtitle.font = { size: 11, italic: true };
  subtitle.alignment = { horizontal: 'center' };
  ws.getRow(2).height = 25;

  // Row 3 stays blank
  writeHeaderRow(ws, 4, INDEX_COLUMNS, INDEX_HEADER_FONT);
  setColumnWidths(ws, INDEX_COLUMNS);

  let rowNumber = 5;
  for (const section of sections) {
    const name = resolveSectionName(section.number, context.sectionNames);
    const row = ws.getRow(rowNumber);
    row.values = [
      section.number,
      name,
      section.recommendations.length,
      toSheetName(section.number, name),
      '',
    ];

    for (let col = 1; col <= lastColumn; col++) {
      const cell = row.getCell(col);
      cell.font = { size: 10 };
      cell.alignment = { vertical: 'middle' };
      cell.border = THIN_BORDER;
    }
    row.height = 30;
    rowNumber++;
  }
}

function createSectionSheet(
  workbook: Workbook,
  section: RecommendationSection,
  context: BuildContext
): string {
  const name = resolveSectionName(section.number, context.sectionNames);
  const sheetName = toSheetName(section.number, name);
  const ws = workbook.addWorksheet(sheetName);
  const lastColumn = SECTION_COLUMNS.length;

  mergeRow(ws, 1, lastColumn);
  const title = ws.getCell(1, 1);
  title.value = `${context.metadata.title} - Section ${section.number}: ${name}`;
  title.font = titleFont(14);
  title.fill = solidFill(PALETTE.SECTION_TITLE);
  title.alignment = CENTERED;
  ws.getRow(1).height = 35;

  writeHeaderRow(ws, 2, SECTION_COLUMNS, HEADER_FONT);
  for (let col = 1; col <= lastColumn; col++) {
    const cell = ws.getCell(2, col);
    cell.alignment = CENTERED_WRAP;
    cell.border = THIN_BORDER;
  }
  ws.getRow(2).height = 40;
  setColumnWidths(ws, SECTION_COLUMNS);

  let rowNumber = 3;
  for (const rec of section.recommendations) {
    const row = ws.getRow(rowNumber);
    row.values = toRecommendationRow(rec);

    for (let col = 1; col <= lastColumn; col++) {
      const cell = row.getCell(col);
      cell.font = { size: 9 };
      cell.alignment = TOP_WRAP;
      cell.border = THIN_BORDER;
    }

    const fill = levelFill(rec.profile);
    if (fill !== null) {
      const levelCell = row.getCell(LEVEL_COLUMN);
      levelCell.fill = fill;
      levelCell.font = { size: 9, bold: true };
    }

    row.height = computeRowHeight(rec);
    rowNumber++;
  }

  return sheetName;
}

function writeHeaderRow(
  ws: Worksheet,
  rowNumber: number,
  columns: readonly ColumnSpec[],
  font: Partial<Font>
): void {
  const row = ws.getRow(rowNumber);
  row.values = columns.map((column) => column.header);
  for (let col = 1; col <= columns.length; col++) {
    const cell = row.getCell(col);
    cell.font = font;
    cell.fill = solidFill(PALETTE.HEADER);
    cell.alignment = CENTERED;
  }
}

function mergeRow(ws: Worksheet, rowNumber: number, lastColumn: number): void {
  ws.mergeCells(`A${rowNumber}:${ws.getColumn(lastColumn).letter}${rowNumber}`);
}

function setColumnWidths(ws: Worksheet, columns: readonly ColumnSpec[]): void {
  columns.forEach((column, index) => {
    ws.getColumn(index + 1).width = column.width;
  });
}
