import { extractTextItemsFromBuffer, buildLinesForPage } from './layout-pdfjs.js';
import { readFile } from 'fs/promises';

export interface ExtractedPage {
  pageNumber: number;
  text: string;
  lines: string[];
}

export interface ExtractedPDF {
  pages: ExtractedPage[];
  totalPages: number;
}

/**
 * Read a PDF and return its text page by page, lines joined with '\n'.
 * The whole document is held in memory.
 */
export async function extractPDF(filePath: string): Promise<ExtractedPDF> {
  const dataBuffer = await readFile(filePath);
  return extractPDFFromBuffer(dataBuffer);
}

export async function extractPDFFromBuffer(buffer: Buffer | Uint8Array): Promise<ExtractedPDF> {
  const layoutResult = await extractTextItemsFromBuffer(buffer);

  const pages: ExtractedPage[] = [];
  for (let pageNum = 1; pageNum <= layoutResult.totalPages; pageNum++) {
    const lines = buildLinesForPage(layoutResult.items, pageNum);
    pages.push({
      pageNumber: pageNum,
      text: lines.join('\n'),
      lines,
    });
  }

  return {
    pages,
    totalPages: layoutResult.totalPages,
  };
}

/**
 * Build an ExtractedPDF from already-extracted page texts.
 */
export function pagesFromText(pageTexts: string[]): ExtractedPDF {
  return {
    pages: pageTexts.map((text, index) => ({
      pageNumber: index + 1,
      text,
      lines: text.split('\n').map((line) => line.trim()).filter((line) => line.length > 0),
    })),
    totalPages: pageTexts.length,
  };
}

/**
 * Text between the end of `startMarker` and the start of `endMarker`, trimmed.
 * Runs to the end of `text` when the end marker is absent; null when the start
 * marker is absent.
 */
export function extractTextBetweenMarkers(
  text: string,
  startMarker: RegExp,
  endMarker: RegExp
): string | null {
  const startMatch = startMarker.exec(text);
  if (startMatch === null) return null;

  const startIndex = startMatch.index + startMatch[0].length;
  const remainingText = text.slice(startIndex);

  const endMatch = endMarker.exec(remainingText);
  if (endMatch === null) return remainingText.trim();

  return remainingText.slice(0, endMatch.index).trim();
}
