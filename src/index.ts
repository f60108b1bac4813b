// ─── Types ──────────────────────────────────────────────────────────────────
export type {
  ISODate,
  YearMonth,
  Weekday,
  RawLine,
  RawTransaction,
  Transaction,
  LedgerRecord,
  DropReason,
  WarningCode,
  IssueCode,
  PipelineIssue,
} from './types/ledger.js';

export { ConfigError, StatementSourceError } from './errors.js';

// ─── Extractors ─────────────────────────────────────────────────────────────
export {
  FileLineSource,
  InMemoryLineSource,
  extractPdfLines,
  extractTextLines,
  linesFromPages,
  extractTextItemsFromBuffer,
  groupRows,
  renderRow,
  buildPageLines,
} from './extractors/index.js';
export type {
  LineSource,
  FileLineSourceOptions,
  TextItem,
  LayoutExtractedPDF,
  VisualRow,
} from './extractors/index.js';

// ─── Parsers ────────────────────────────────────────────────────────────────
export {
  compileDatePattern,
  matchDateToken,
  findAmounts,
  splitAmountColumns,
  LineClassifier,
  createLineClassifier,
  TransactionBuilder,
  walkStatement,
  createWalkContext,
} from './parsers/index.js';
export type {
  DateMatch,
  AmountMatch,
  AmountColumns,
  LineClass,
  ParserState,
  LineClassifierOptions,
  TransactionBuilderOptions,
  WalkStats,
  WalkContext,
} from './parsers/index.js';

// ─── Normalizers ────────────────────────────────────────────────────────────
export {
  normalizeTransaction,
  resolveStatementPeriod,
  deduplicateTransactions,
  sortLedger,
} from './normalizers/index.js';
export type { NormalizeResult, StatementPeriod, DeduplicationResult, DuplicateRecord } from './normalizers/index.js';

// ─── Categorization ─────────────────────────────────────────────────────────
export {
  compileRules,
  createCategorizer,
  categorizeTransaction,
  getDefaultRulesPath,
  parseCategoryRules,
  loadCategoryRules,
  loadCategoryRulesSync,
  resolveCategoryRules,
} from './categorization/index.js';
export type { CategorizationResult, CompiledRule, Categorizer } from './categorization/index.js';

// ─── Configuration ──────────────────────────────────────────────────────────
export { parsePipelineConfig, loadConfigFile, resolveConfig } from './config/index.js';
export type { ConfigOverrides, Environment } from './config/index.js';

// ─── Schemas ────────────────────────────────────────────────────────────────
export {
  CategoryRuleSchema,
  CategoryRuleListSchema,
  PipelineConfigSchema,
  LedgerRecordSchema,
  LedgerSchema,
} from './schemas/index.js';
export type {
  CategoryRule,
  CategoryRuleInput,
  CategoryRuleType,
  IngestionOrder,
  LedgerSort,
  PipelineConfig,
  PipelineConfigInput,
} from './schemas/index.js';

// ─── Pipeline ───────────────────────────────────────────────────────────────
export {
  runPipeline,
  processStatement,
  orderStatements,
  createStatementContext,
  summarizeReport,
} from './pipeline/index.js';
export type {
  PipelineOptions,
  PipelineResult,
  StatementContext,
  StatementOutcome,
  PipelineReport,
  StatementReport,
  StatementFailure,
} from './pipeline/index.js';

// ─── Output ─────────────────────────────────────────────────────────────────
export {
  toLedgerRecord,
  toLedgerRecords,
  validateLedger,
  validateLedgerOrThrow,
  formatValidationErrors,
} from './output/index.js';
export type { ValidationError, ValidationResult } from './output/index.js';

// ─── Utils ──────────────────────────────────────────────────────────────────
export {
  PIPELINE_VERSION,
  UNCATEGORIZED,
  DEFAULT_DATE_PATTERN,
  DEFAULT_EXCLUSIONS,
  parseUSDate,
  parseAmount,
  computeTransactionId,
  isValidTransactionId,
  scanStatementDirectory,
  validateDirectory,
} from './utils/index.js';
export type { StatementFileInfo, ScanResult } from './utils/index.js';

// ─── Convenience ────────────────────────────────────────────────────────────
export async function parseStatementFiles(
  filePaths: readonly string[],
  options: import('./pipeline/index.js').PipelineOptions = {}
): Promise<import('./pipeline/index.js').PipelineResult> {
  const { FileLineSource } = await import('./extractors/index.js');
  const { runPipeline } = await import('./pipeline/index.js');

  return runPipeline(filePaths, new FileLineSource(), options);
}
