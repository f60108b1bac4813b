export { FileLineSource, InMemoryLineSource } from './line-source.js';
export type { LineSource, FileLineSourceOptions } from './line-source.js';

export { extractPdfLines } from './pdf-extractor.js';
export { extractTextLines, linesFromPages } from './text-extractor.js';

export { extractTextItemsFromBuffer, groupRows, renderRow, buildPageLines } from './layout-pdfjs.js';
export type { TextItem, LayoutExtractedPDF, VisualRow } from './layout-pdfjs.js';
