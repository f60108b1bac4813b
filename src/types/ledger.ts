/**
 * Ledger types shared by every pipeline stage.
 * Values flow RawLine -> RawTransaction -> Transaction -> LedgerRecord.
 */

/** `YYYY-MM-DD` */
export type ISODate = string;
/** `YYYY-MM` */
export type YearMonth = string;

export type Weekday =
  | 'Sunday'
  | 'Monday'
  | 'Tuesday'
  | 'Wednesday'
  | 'Thursday'
  | 'Friday'
  | 'Saturday';

/**
 * One line of extracted statement text, in top-to-bottom page order.
 */
export interface RawLine {
  text: string;
  /** 1-indexed page number */
  page: number;
  /** 0-indexed position within the page */
  lineIndex: number;
  statementId: string;
}

/**
 * A finalized draft. Every value field is still the string cut from the statement.
 */
export interface RawTransaction {
  readonly date: string;
  readonly description: string;
  readonly amount: string;
  readonly balance: string;
  readonly sourceFile: string;
  readonly raw: {
    readonly page: number;
    readonly lineIndex: number;
    readonly originalText: string;
  };
}

export interface Transaction {
  readonly date: ISODate;
  readonly description: string;
  /** Negative for debits, positive for credits */
  readonly amount: number;
  /** Account balance after the transaction; null when the statement value was unreadable */
  readonly balance: number | null;
  readonly category: string;
  readonly month: YearMonth;
  readonly weekday: Weekday;
  readonly sourceFile: string;
  readonly transactionId: string;
}

/**
 * Serialized ledger row. Field names are the downstream compatibility contract.
 */
export interface LedgerRecord {
  date: string;
  description: string;
  amount: number;
  balance: number | null;
  category: string;
  month: string;
  weekday: string;
  source_file: string;
  transaction_id: string;
}

export type DropReason = 'MalformedDate' | 'MalformedAmount';

export type WarningCode = 'OrphanContinuation' | 'EmptyStatement' | 'YearFallback';

export type IssueCode = DropReason | WarningCode;

export interface PipelineIssue {
  code: IssueCode;
  statementId: string;
  message: string;
  page?: number | undefined;
  lineIndex?: number | undefined;
  text?: string | undefined;
}
