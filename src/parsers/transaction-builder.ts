import { basename } from 'path';
import type { RawLine, RawTransaction } from '../types/ledger.js';
import { compileDatePattern, matchDateToken, splitAmountColumns } from './line-fields.js';
import type { ParserState } from './line-classifier.js';

interface TransactionDraft {
  date: string;
  fragments: string[];
  amount: string;
  balance: string;
  sourceFile: string;
  page: number;
  lineIndex: number;
  lines: string[];
}

type BuilderState =
  | { kind: 'idle' }
  | { kind: 'open'; draft: TransactionDraft };

export interface TransactionBuilderOptions {
  datePattern?: string | RegExp;
}

/**
 * Accumulates one logical transaction from a start line and any number of
 * continuation lines. Holds at most one open draft.
 */
export class TransactionBuilder {
  private current: BuilderState = { kind: 'idle' };
  private readonly datePattern: RegExp;
  private readonly orphanLines: RawLine[] = [];

  constructor(options: TransactionBuilderOptions = {}) {
    this.datePattern = compileDatePattern(options.datePattern);
  }

  get state(): ParserState {
    return this.current.kind;
  }

  /** Continuation lines that arrived with no open draft */
  get orphans(): readonly RawLine[] {
    return this.orphanLines;
  }

  /**
   * Start a new draft from a line that begins with a date.
   * Returns the previously open draft, finalized, if there was one.
   */
  open(line: RawLine): RawTransaction | null {
    const dateMatch = matchDateToken(line.text, this.datePattern);
    if (dateMatch === null) {
      throw new Error(`Cannot open a transaction on a line without a leading date: "${line.text.trim()}"`);
    }

    const finished = this.close();
    const columns = splitAmountColumns(dateMatch.rest);

    // A single amount is the balance column; the row moved no money.
    let amount = '';
    if (columns.amount !== null) {
      amount = columns.amount;
    } else if (columns.balance !== null) {
      amount = '0.00';
    }

    this.current = {
      kind: 'open',
      draft: {
        date: dateMatch.date,
        fragments: columns.description === '' ? [] : [columns.description],
        amount,
        balance: columns.balance ?? '',
        sourceFile: basename(line.statementId),
        page: line.page,
        lineIndex: line.lineIndex,
        lines: [line.text.trim()],
      },
    };

    return finished;
  }

  /**
   * Append a continuation line to the open draft. Its full text joins the
   * description. A draft still missing its amount takes the amount columns
   * from this line; a lone amount only sets the balance.
   * Returns false when no draft is open; the line is kept as an orphan.
   */
  extend(line: RawLine): boolean {
    if (this.current.kind === 'idle') {
      this.orphanLines.push(line);
      return false;
    }

    const { draft } = this.current;
    const text = line.text.trim();
    draft.lines.push(text);

    if (draft.amount === '') {
      const columns = splitAmountColumns(text);
      if (columns.amount !== null) {
        draft.amount = columns.amount;
        draft.balance = columns.balance ?? '';
      } else if (columns.balance !== null) {
        draft.balance = columns.balance;
      }
    }

    if (text !== '') {
      draft.fragments.push(text);
    }
    return true;
  }

  /**
   * Finalize the open draft. Returns null when idle.
   */
  close(): RawTransaction | null {
    if (this.current.kind === 'idle') {
      return null;
    }

    const { draft } = this.current;
    this.current = { kind: 'idle' };

    return {
      date: draft.date,
      description: draft.fragments.join(' '),
      amount: draft.amount,
      balance: draft.balance,
      sourceFile: draft.sourceFile,
      raw: {
        page: draft.page,
        lineIndex: draft.lineIndex,
        originalText: draft.lines.join('\n'),
      },
    };
  }
}
