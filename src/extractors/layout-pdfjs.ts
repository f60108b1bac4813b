/**
 * Layout-aware PDF text extraction using pdfjs-dist.
 * Rebuilds visual rows from positioned text items so that a statement row
 * (date, description, amount, balance) comes out as one line.
 */

/**
 * A text item with positional information extracted from PDF.
 */
export interface TextItem {
  str: string;
  /** X coordinate (left edge) in PDF units */
  x: number;
  /** Y coordinate in PDF units (origin bottom-left) */
  y: number;
  width: number;
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
  width?: number;
}

/** Items within this Y distance share a row */
const Y_TOLERANCE = 2.0;
/** Gaps wider than this get a space */
const SPACE_GAP = 2.5;
/** Gaps wider than this separate columns */
const COLUMN_GAP = 18;

/**
 * Extract positioned text items from PDF bytes.
 */
export async function extractTextItemsFromBuffer(buffer: Uint8Array): Promise<LayoutExtractedPDF> {
  const pdfjs = await import('pdfjs-dist/legacy/build/pdf.mjs');

  const loadingTask = pdfjs.getDocument({
    data: buffer,
    useSystemFonts: true,
  });

  const pdfDocument = await loadingTask.promise;
  const items: TextItem[] = [];

  try {
    for (let pageNum = 1; pageNum <= pdfDocument.numPages; pageNum++) {
      const page = await pdfDocument.getPage(pageNum);
      const textContent = await page.getTextContent();

      for (const item of textContent.items) {
        if (!isTextItem(item)) continue;

        const str = item.str.trim();
        if (str.length === 0) continue;

        // transform is [scaleX, skewX, skewY, scaleY, translateX, translateY]
        const x = Number(item.transform[4]) || 0;
        const y = Number(item.transform[5]) || 0;
        const width = Number(item.width) || Math.abs(Number(item.transform[0]) || 1) * str.length * 0.6;

        items.push({ str, x, y, width, page: pageNum });
      }
    }

    return { items, totalPages: pdfDocument.numPages };
  } finally {
    await pdfDocument.destroy();
  }
}

function isTextItem(item: object): item is PdfjsTextItemLike {
  return 'str' in item && typeof item.str === 'string' && 'transform' in item && Array.isArray(item.transform);
}

/** Items sharing a baseline on one page */
export interface VisualRow {
  page: number;
  baseline: number;
  cells: TextItem[];
}

/**
 * Bucket positioned items by page, then into rows by baseline. An item joins
 * the row above it when it sits within `Y_TOLERANCE` of that row's mean
 * baseline. Rows come out top to bottom, page by page.
 */
export function groupRows(items: readonly TextItem[]): VisualRow[] {
  const byPage = new Map<number, TextItem[]>();
  for (const item of items) {
    const pageItems = byPage.get(item.page);
    if (pageItems === undefined) {
      byPage.set(item.page, [item]);
    } else {
      pageItems.push(item);
    }
  }

  const rows: VisualRow[] = [];
  for (const page of [...byPage.keys()].sort((a, b) => a - b)) {
    const pageItems = byPage.get(page) ?? [];
    const topDown = [...pageItems].sort((a, b) => b.y - a.y || a.x - b.x);

    let row: VisualRow | null = null;
    for (const item of topDown) {
      if (row !== null && Math.abs(item.y - row.baseline) <= Y_TOLERANCE) {
        row.cells.push(item);
        row.baseline += (item.y - row.baseline) / row.cells.length;
        continue;
      }
      row = { page, baseline: item.y, cells: [item] };
      rows.push(row);
    }
  }

  return rows;
}

function separatorFor(gap: number): string {
  if (gap > COLUMN_GAP) return '\t';
  if (gap > SPACE_GAP) return ' ';
  return '';
}

/**
 * Render a row left to right. Wide gaps become tabs so amount columns stay
 * apart from the description.
 */
export function renderRow(row: VisualRow): string {
  const cells = [...row.cells].sort((a, b) => a.x - b.x);
  const text = cells
    .map((cell, index) => {
      const previous = cells[index - 1];
      return previous === undefined ? cell.str : separatorFor(cell.x - (previous.x + previous.width)) + cell.str;
    })
    .join('');
  return text.trimEnd();
}

/**
 * Lines of every page of an extracted PDF, one array per page. Pages without
 * text come out empty so page numbers stay aligned.
 */
export function buildPageLines(layout: LayoutExtractedPDF): string[][] {
  const pages: string[][] = Array.from({ length: layout.totalPages }, () => []);
  for (const row of groupRows(layout.items)) {
    const line = renderRow(row);
    const target = pages[row.page - 1];
    if (line !== '' && target !== undefined) {
      target.push(line);
    }
  }
  return pages;
}
