/**
 * Output module - renders parse results as an audit workbook or JSON.
 */

export {
  buildAuditWorkbook,
  writeAuditWorkbook,
  type WorkbookBuildOptions,
} from './workbook-builder.js';

export {
  INDEX_SHEET_NAME,
  INDEX_COLUMNS,
  SECTION_COLUMNS,
  LEVEL_COLUMN,
  toSheetName,
  composeDescription,
  composeReferences,
  computeRowHeight,
  toRecommendationRow,
  type ColumnSpec,
} from './sheet-layout.js';

export { PALETTE, levelFill } from './styles.js';

export {
  toJsonExport,
  exportJson,
  type JsonExport,
  type JsonExportOptions,
  type JsonSectionSummary,
} from './json-exporter.js';
