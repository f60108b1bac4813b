import type { DropReason, PipelineIssue } from '../types/ledger.js';
import type { DuplicateRecord } from '../normalizers/index.js';
import type { StatementPeriod } from '../normalizers/index.js';

export interface StatementReport {
  statementId: string;
  sourceFile: string;
  year: number;
  yearSource: StatementPeriod['yearSource'];
  lineCount: number;
  skippedLines: number;
  continuationLines: number;
  rawTransactions: number;
  normalizedTransactions: number;
  dropped: Record<DropReason, number>;
  orphanContinuations: number;
  unknownBalances: number;
}

/**
 * A statement that could not be read, or whose source produced no lines.
 */
export interface StatementFailure {
  statementId: string;
  error: string;
  stack: string | undefined;
  timestamp: string;
}

export interface PipelineReport {
  statementsProcessed: number;
  statementsFailed: number;
  emptyStatements: number;
  rawTransactions: number;
  normalizedTransactions: number;
  droppedTransactions: number;
  dropCounts: Record<DropReason, number>;
  /** droppedTransactions / rawTransactions, 0 when nothing was read */
  dropRate: number;
  unknownBalances: number;
  orphanContinuations: number;
  duplicatesRemoved: number;
  ledgerSize: number;
  statements: StatementReport[];
  failures: StatementFailure[];
  duplicates: DuplicateRecord[];
  issues: PipelineIssue[];
}

export function emptyDropCounts(): Record<DropReason, number> {
  return { MalformedDate: 0, MalformedAmount: 0 };
}

export function summarizeReport(
  statements: StatementReport[],
  failures: StatementFailure[],
  issues: PipelineIssue[],
  duplicates: DuplicateRecord[],
  ledgerSize: number
): PipelineReport {
  const dropCounts = emptyDropCounts();
  let rawTransactions = 0;
  let normalizedTransactions = 0;
  let unknownBalances = 0;
  let orphanContinuations = 0;

  for (const statement of statements) {
    rawTransactions += statement.rawTransactions;
    normalizedTransactions += statement.normalizedTransactions;
    unknownBalances += statement.unknownBalances;
    orphanContinuations += statement.orphanContinuations;
    dropCounts.MalformedDate += statement.dropped.MalformedDate;
    dropCounts.MalformedAmount += statement.dropped.MalformedAmount;
  }

  const droppedTransactions = dropCounts.MalformedDate + dropCounts.MalformedAmount;

  return {
    statementsProcessed: statements.length,
    statementsFailed: failures.length,
    emptyStatements: issues.filter((issue) => issue.code === 'EmptyStatement').length,
    rawTransactions,
    normalizedTransactions,
    droppedTransactions,
    dropCounts,
    dropRate: rawTransactions === 0 ? 0 : droppedTransactions / rawTransactions,
    unknownBalances,
    orphanContinuations,
    duplicatesRemoved: duplicates.length,
    ledgerSize,
    statements,
    failures,
    duplicates,
    issues,
  };
}
