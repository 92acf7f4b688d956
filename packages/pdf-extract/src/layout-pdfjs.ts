/**
 * Layout-aware PDF extraction using pdfjs-dist.
 *
 * Text items carry positional coordinates, so lines can be rebuilt from their
 * baseline instead of relying on the content-stream order, which for CIS
 * benchmarks interleaves page headers, footers and body text.
 */
/**
 * A text item with positional information extracted from PDF.
 */
export interface TextItem {
  /** The text content */
  str: string;
  /** X coordinate (left edge) in PDF units */
  x: number;
  /** Y coordinate in PDF units (origin bottom-left) */
  y: number;
  width: number;
  height: number;
  /** Page number (1-indexed) */
  page: number;
}

export interface LayoutExtractedPDF {
  items: TextItem[];
  totalPages: number;
}

interface PdfjsTextItemLike {
  str: string;
  transform: unknown[];
  width?: unknown;
  height?: unknown;
}

/** Items within this Y distance share a line */
const Y_TOL = 2.0;
/** Horizontal gap above which a space is inserted between items */
const SPACE_GAP = 1.5;

/**
 * Extract positioned text items from every page of a PDF held in memory.
 */
export async function extractTextItemsFromBuffer(buffer: Buffer | Uint8Array): Promise<LayoutExtractedPDF> {
  // Dynamic import for pdfjs-dist (ESM only)
  const pdfjs = await import('pdfjs-dist/legacy/build/pdf.mjs');

  // pdfjs transfers the buffer to its worker, so hand it a private copy
  const data = new Uint8Array(buffer);

  const loadingTask = pdfjs.getDocument({
    data,
    useSystemFonts: true,
  });

  const pdfDocument = await loadingTask.promise;
  const items: TextItem[] = [];
  const numPages = pdfDocument.numPages;

  try {
    for (let pageNum = 1; pageNum <= numPages; pageNum++) {
      const page = await pdfDocument.getPage(pageNum);
      const textContent = await page.getTextContent();

      for (const item of textContent.items) {
        if (!isTextItem(item)) continue;

        const str = item.str.trim();
        if (str.length === 0) continue;

        // transform = [scaleX, skewX, skewY, scaleY, translateX, translateY]
        const transform = item.transform;
        const x = Number(transform[4]) || 0;
        const y = Number(transform[5]) || 0;

        const width = Number(item.width) || Math.abs(Number(transform[0]) || 1) * str.length * 0.6;
        const height = Number(item.height) || Math.abs(Number(transform[3]) || 12);

        items.push({ str, x, y, width, height, page: pageNum });
      }

      page.cleanup();
    }
  } finally {
    await pdfDocument.destroy();
  }

  return {
    items,
    totalPages: numPages,
  };
}

/**
 * Type guard for pdfjs text items (marked-content entries have no `str`).
 */
function isTextItem(item: unknown): item is PdfjsTextItemLike {
  return (
    typeof item === 'object' &&
    item !== null &&
    'str' in item &&
    typeof item.str === 'string' &&
    'transform' in item &&
    Array.isArray(item.transform)
  );
}

/**
 * Rebuild lines from positioned text items: group by baseline (top to
 * bottom), order each line left to right, and join items with a space where
 * a visible gap separates them.
 */
export function buildLinesFromItems(items: TextItem[]): string[] {
  if (items.length === 0) return [];

  const sorted = [...items].sort((a, b) => (b.y - a.y) || (a.x - b.x));

  const rows: TextItem[][] = [];
  for (const item of sorted) {
    const lastRow = rows[rows.length - 1];
    const rowY = lastRow?.[0]?.y;
    if (lastRow !== undefined && rowY !== undefined && Math.abs(item.y - rowY) <= Y_TOL) {
      lastRow.push(item);
    } else {
      rows.push([item]);
    }
  }

  const lines: string[] = [];
  for (const row of rows) {
    row.sort((a, b) => a.x - b.x);

    let out = '';
    let prevEndX: number | null = null;

    for (const item of row) {
      if (prevEndX !== null && item.x - prevEndX > SPACE_GAP) {
        out += ' ';
      }
      out += item.str;
      prevEndX = item.x + item.width;
    }

    const cleaned = out.replace(/\s+$/g, '');
    if (cleaned) {
      lines.push(cleaned);
    }
  }

  return lines;
}

/**
 * Build lines for one page (1-indexed) from the items of a whole document.
 */
export function buildLinesForPage(items: TextItem[], pageNumber: number): string[] {
  const pageItems = items.filter(item => item.page === pageNumber);
  return buildLinesFromItems(pageItems);
}
