import { basename } from 'path';
import type { PipelineIssue, RawLine, Transaction } from '../types/ledger.js';
import type { CategoryRule, IngestionOrder, PipelineConfig, PipelineConfigInput } from '../schemas/index.js';
import { parsePipelineConfig } from '../config/index.js';
import {
  LineClassifier,
  TransactionBuilder,
  createLineClassifier,
  createWalkContext,
  walkStatement,
} from '../parsers/index.js';
import {
  deduplicateTransactions,
  normalizeTransaction,
  resolveStatementPeriod,
  sortLedger,
} from '../normalizers/index.js';
import { createCategorizer, resolveCategoryRules, type Categorizer } from '../categorization/index.js';
import type { LineSource } from '../extractors/index.js';
import { StatementSourceError } from '../errors.js';
import {
  emptyDropCounts,
  summarizeReport,
  type PipelineReport,
  type StatementFailure,
  type StatementReport,
} from './report.js';

export interface PipelineOptions {
  config?: PipelineConfigInput;
  /** Takes precedence over the rules named in the config */
  categoryRules?: readonly CategoryRule[];
  onProgress?: (current: number, total: number, statementId: string) => void;
  onWarning?: (issue: PipelineIssue) => void;
  onError?: (failure: StatementFailure) => void;
}

export interface PipelineResult {
  /** Deduplicated, categorized and frozen */
  ledger: readonly Transaction[];
  report: PipelineReport;
}

/**
 * What every statement in a run shares. None of it holds per-statement state.
 */
export interface StatementContext {
  config: PipelineConfig;
  classifier: LineClassifier;
  categorize: Categorizer;
}

export interface StatementOutcome {
  transactions: Transaction[];
  report: StatementReport;
  issues: PipelineIssue[];
}

export function createStatementContext(
  config: PipelineConfig,
  categoryRules: readonly CategoryRule[] = resolveCategoryRules(config)
): StatementContext {
  return {
    config,
    classifier: createLineClassifier(config),
    categorize: createCategorizer(categoryRules, { uncategorizedLabel: config.uncategorizedLabel }),
  };
}

/**
 * Order statements for ingestion. `filename` sorts by file name (then full
 * id); `given` keeps the caller's order.
 */
export function orderStatements(statementIds: readonly string[], order: IngestionOrder): string[] {
  if (order === 'given') {
    return [...statementIds];
  }
  return [...statementIds].sort(
    (a, b) => basename(a).localeCompare(basename(b)) || a.localeCompare(b)
  );
}

/**
 * Walk, normalize and categorize one statement's lines.
 */
export function processStatement(
  statementId: string,
  lines: readonly RawLine[],
  context: StatementContext
): StatementOutcome {
  const { config, classifier, categorize } = context;
  const builder = new TransactionBuilder({ datePattern: classifier.datePattern });
  const walk = createWalkContext(classifier, builder);

  const period = resolveStatementPeriod(statementId, config.defaultYear);
  const issues: PipelineIssue[] = [];
  const transactions: Transaction[] = [];
  const dropped = emptyDropCounts();
  let unknownBalances = 0;

  if (period.yearSource !== 'filename') {
    issues.push({
      code: 'YearFallback',
      statementId,
      message: `No year in statement name; using ${period.year} (${period.yearSource})`,
    });
  }

  for (const raw of walkStatement(lines, walk)) {
    const result = normalizeTransaction(raw, period);

    if (!result.ok) {
      dropped[result.reason]++;
      issues.push({
        code: result.reason,
        statementId,
        message: result.message,
        page: raw.raw.page,
        lineIndex: raw.raw.lineIndex,
        text: raw.raw.originalText,
      });
      continue;
    }

    if (!result.balanceKnown) {
      unknownBalances++;
    }

    const { category } = categorize(result.transaction.description);
    transactions.push({ ...result.transaction, category });
  }

  for (const orphan of builder.orphans) {
    issues.push({
      code: 'OrphanContinuation',
      statementId,
      message: 'Continuation line with no open transaction',
      page: orphan.page,
      lineIndex: orphan.lineIndex,
      text: orphan.text,
    });
  }

  const hasContent = lines.some((line) => line.text.trim() !== '');
  if (hasContent && walk.stats.transactions === 0) {
    issues.push({
      code: 'EmptyStatement',
      statementId,
      message: `No transactions found in ${walk.stats.lineCount} lines`,
    });
  }

  return {
    transactions,
    issues,
    report: {
      statementId,
      sourceFile: basename(statementId),
      year: period.year,
      yearSource: period.yearSource,
      lineCount: walk.stats.lineCount,
      skippedLines: walk.stats.skippedLines,
      continuationLines: walk.stats.continuationLines,
      rawTransactions: walk.stats.transactions,
      normalizedTransactions: transactions.length,
      dropped,
      orphanContinuations: builder.orphans.length,
      unknownBalances,
    },
  };
}

/**
 * Run the full pipeline over a set of statements.
 *
 * Statements are processed sequentially in ingestion order; their
 * transactions are then deduplicated in one global pass. A statement whose
 * source fails is recorded and skipped (thrown in strict mode).
 */
export async function runPipeline(
  statementIds: readonly string[],
  source: LineSource,
  options: PipelineOptions = {}
): Promise<PipelineResult> {
  const config = parsePipelineConfig(options.config ?? {});
  const context = createStatementContext(config, options.categoryRules ?? resolveCategoryRules(config));
  const ordered = orderStatements(statementIds, config.ingestionOrder);

  const combined: Transaction[] = [];
  const statements: StatementReport[] = [];
  const failures: StatementFailure[] = [];
  const issues: PipelineIssue[] = [];

  for (let i = 0; i < ordered.length; i++) {
    const statementId = ordered[i];
    if (statementId === undefined) continue;

    if (options.onProgress !== undefined) {
      options.onProgress(i + 1, ordered.length, statementId);
    }

    let lines: RawLine[];
    try {
      lines = await source.readLines(statementId);
      if (lines.length === 0) {
        throw new StatementSourceError(statementId, `No lines extracted from ${statementId}`);
      }
    } catch (error) {
      if (config.strict) {
        throw error instanceof StatementSourceError
          ? error
          : new StatementSourceError(statementId, `Failed to read statement ${statementId}`, { cause: error });
      }
      const failure = createStatementFailure(statementId, error);
      failures.push(failure);
      if (options.onError !== undefined) {
        options.onError(failure);
      }
      continue;
    }

    const outcome = processStatement(statementId, lines, context);
    for (const transaction of outcome.transactions) {
      combined.push(transaction);
    }
    statements.push(outcome.report);
    for (const issue of outcome.issues) {
      issues.push(issue);
      if (options.onWarning !== undefined) {
        options.onWarning(issue);
      }
    }
  }

  const deduped = deduplicateTransactions(combined);
  const ordering = config.sort === 'date' ? sortLedger(deduped.transactions) : deduped.transactions;
  const ledger = Object.freeze(ordering.map((txn) => Object.freeze(txn)));

  return {
    ledger,
    report: summarizeReport(statements, failures, issues, deduped.duplicates, ledger.length),
  };
}

function createStatementFailure(statementId: string, error: unknown): StatementFailure {
  return {
    statementId,
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
    timestamp: new Date().toISOString(),
  };
}
