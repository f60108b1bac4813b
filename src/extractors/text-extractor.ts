import { readFile } from 'fs/promises';
import type { RawLine } from '../types/ledger.js';

/** Form feed: page separator in extracted text dumps */
const PAGE_BREAK = '\f';

/**
 * Number lines by page and position. Accepts one string per page, or the
 * page's lines already split.
 */
export function linesFromPages(statementId: string, pages: ReadonlyArray<string | readonly string[]>): RawLine[] {
  const lines: RawLine[] = [];

  pages.forEach((page, pageIndex) => {
    const pageLines = typeof page === 'string' ? page.split(/\r?\n/) : page;
    pageLines.forEach((text, lineIndex) => {
      lines.push({ text, page: pageIndex + 1, lineIndex, statementId });
    });
  });

  return lines;
}

/**
 * Read a statement that was already converted to text. Pages are
 * separated by form feeds.
 */
export async function extractTextLines(filePath: string, statementId: string = filePath): Promise<RawLine[]> {
  const content = await readFile(filePath, 'utf-8');
  const normalized = content.endsWith('\n') ? content.slice(0, -1) : content;
  return linesFromPages(statementId, normalized.split(PAGE_BREAK));
}
