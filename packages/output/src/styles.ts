/**
 * Workbook palette and cell styles.
 */
import type { Alignment, Borders, Fill, Font } from 'exceljs';

export const PALETTE = {
  INDEX_TITLE: 'FF002060',
  SECTION_TITLE: 'FF00518F',
  HEADER: 'FF4472C4',
  WHITE: 'FFFFFFFF',
  LEVEL_1: 'FFFFC000',
  LEVEL_2: 'FFFFFF00',
} as const;

export function solidFill(argb: string): Fill {
  return { type: 'pattern', pattern: 'solid', fgColor: { argb } };
}

export const THIN_BORDER: Partial<Borders> = {
  top: { style: 'thin' },
  left: { style: 'thin' },
  bottom: { style: 'thin' },
  right: { style: 'thin' },
};

export function titleFont(size: number): Partial<Font> {
  return { size, bold: true, color: { argb: PALETTE.WHITE } };
}

export const HEADER_FONT: Partial<Font> = { size: 10, bold: true, color: { argb: PALETTE.WHITE } };
export const INDEX_HEADER_FONT: Partial<Font> = { size: 11, bold: true, color: { argb: PALETTE.WHITE } };

export const CENTERED: Partial<Alignment> = { horizontal: 'center', vertical: 'middle' };
export const CENTERED_WRAP: Partial<Alignment> = { horizontal: 'center', vertical: 'middle', wrapText: true };
export const TOP_WRAP: Partial<Alignment> = { vertical: 'top', wrapText: true };

/**
 * Highlight for the Level column, or null when the profile is neither
 * Level 1 nor Level 2.
 */
export function levelFill(profile: string): Fill | null {
  if (profile.includes('Level 1')) return solidFill(PALETTE.LEVEL_1);
  if (profile.includes('Level 2')) return solidFill(PALETTE.LEVEL_2);
  return null;
}
