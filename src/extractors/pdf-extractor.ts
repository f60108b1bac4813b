import { readFile } from 'fs/promises';
import type { RawLine } from '../types/ledger.js';
import { buildPageLines, extractTextItemsFromBuffer } from './layout-pdfjs.js';
import { linesFromPages } from './text-extractor.js';

/**
 * Extract a PDF statement as ordered lines, page by page.
 */
export async function extractPdfLines(filePath: string, statementId: string = filePath): Promise<RawLine[]> {
  const dataBuffer = await readFile(filePath);
  const layout = await extractTextItemsFromBuffer(new Uint8Array(dataBuffer));

  return linesFromPages(statementId, buildPageLines(layout));
}
