import { extname, resolve } from 'path';
import type { RawLine } from '../types/ledger.js';
import { StatementSourceError } from '../errors.js';
import { extractPdfLines } from './pdf-extractor.js';
import { extractTextLines, linesFromPages } from './text-extractor.js';

/**
 * Resolves a statement identifier to its lines in top-to-bottom page order.
 */
export interface LineSource {
  readLines(statementId: string): Promise<RawLine[]>;
}

export interface FileLineSourceOptions {
  /** Directory that relative statement ids are resolved against */
  baseDir?: string;
}

/**
 * Reads statements from disk: `.pdf` through pdfjs-dist, `.txt` as plain text.
 */
export class FileLineSource implements LineSource {
  constructor(private readonly options: FileLineSourceOptions = {}) {}

  async readLines(statementId: string): Promise<RawLine[]> {
    const filePath = resolve(this.options.baseDir ?? '.', statementId);
    const ext = extname(filePath).toLowerCase();

    try {
      switch (ext) {
        case '.pdf':
          return await extractPdfLines(filePath, statementId);
        case '.txt':
          return await extractTextLines(filePath, statementId);
        default:
          throw new StatementSourceError(statementId, `Unsupported statement file type "${ext}": ${statementId}`);
      }
    } catch (error) {
      if (error instanceof StatementSourceError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new StatementSourceError(statementId, `Failed to read statement ${statementId}: ${message}`, {
        cause: error,
      });
    }
  }
}

/**
 * Serves statements held in memory, keyed by statement id.
 */
export class InMemoryLineSource implements LineSource {
  private readonly statements = new Map<string, ReadonlyArray<string | readonly string[]>>();

  constructor(statements: Record<string, ReadonlyArray<string | readonly string[]>> = {}) {
    for (const [statementId, pages] of Object.entries(statements)) {
      this.add(statementId, pages);
    }
  }

  /**
   * Register a statement as a list of pages, each a text block or a list of lines.
   */
  add(statementId: string, pages: ReadonlyArray<string | readonly string[]>): this {
    this.statements.set(statementId, pages);
    return this;
  }

  readLines(statementId: string): Promise<RawLine[]> {
    const pages = this.statements.get(statementId);
    if (pages === undefined) {
      return Promise.reject(new StatementSourceError(statementId, `Unknown statement: ${statementId}`));
    }
    return Promise.resolve(linesFromPages(statementId, pages));
  }
}
