// PDF extraction
export {
  extractPDF,
  extractPDFFromBuffer,
  pagesFromText,
  extractTextBetweenMarkers,
} from './pdf-extractor.js';

export type { ExtractedPage, ExtractedPDF } from './pdf-extractor.js';

// Layout-aware extraction using pdfjs-dist
export {
  extractTextItemsFromBuffer,
  buildLinesFromItems,
  buildLinesForPage,
} from './layout-pdfjs.js';

export type { TextItem } from './layout-pdfjs.js';
