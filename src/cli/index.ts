#!/usr/bin/env node

// Load environment variables from .env file
import 'dotenv/config';

import { Command } from 'commander';
import { writeFile, mkdir } from 'fs/promises';
import { resolve, dirname } from 'path';
import { resolveConfig } from '../config/index.js';
import { FileLineSource } from '../extractors/index.js';
import { runPipeline, type PipelineResult } from '../pipeline/index.js';
import { toLedgerRecords, validateLedgerOrThrow } from '../output/index.js';
import { PIPELINE_VERSION } from '../utils/constants.js';
import { scanStatementDirectory, validateDirectory } from '../utils/directory-scanner.js';

interface CliOptions {
  inputDir?: string;
  out?: string;
  config?: string;
  ingestionOrder?: string;
  defaultYear?: string;
  datePattern?: string;
  rules?: string;
  strict?: boolean;
  verbose: boolean;
  pretty: boolean;
}

const program = new Command();

program
  .name('statement-ledger')
  .description('Build a deduplicated, categorized transaction ledger from bank statements')
  .version(PIPELINE_VERSION)
  .argument('[files...]', 'Statement files (.pdf or extracted .txt)')
  .option('-d, --input-dir <directory>', 'Directory of statement files', process.env['LEDGER_INPUT_DIR'])
  .option('-o, --out <file>', 'Output file path (default: stdout)', process.env['LEDGER_OUTPUT_FILE'])
  .option('-c, --config <file>', 'JSON config file (default: $LEDGER_CONFIG)')
  .option('--ingestion-order <order>', 'Statement order: filename or given')
  .option('--default-year <year>', 'Year for statements whose file name carries none')
  .option('--date-pattern <regex>', 'Pattern that marks the start of a transaction line')
  .option('--rules <file>', 'Category rules JSON file')
  .option('-s, --strict', 'Fail on unreadable statements and validate the ledger')
  .option('-v, --verbose', 'Enable verbose output', false)
  .option('--pretty', 'Pretty-print JSON output', true)
  .option('--no-pretty', 'Disable pretty-printing')
  .action(async (files: string[], options: CliOptions) => {
    try {
      await run(files, options);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[ERROR] ${message}`);
      if (options.verbose && error instanceof Error && error.stack !== undefined) {
        console.error(error.stack);
      }
      process.exit(1);
    }
  });

async function collectStatements(files: string[], options: CliOptions): Promise<string[]> {
  if (options.inputDir === undefined) {
    return files.map((file) => resolve(file));
  }

  const dirPath = resolve(options.inputDir);
  const validation = await validateDirectory(dirPath);
  if (!validation.valid) {
    throw new Error(validation.error ?? `Cannot access directory: ${dirPath}`);
  }

  const scan = await scanStatementDirectory(dirPath);
  if (options.verbose) {
    console.error(`[INFO] Found ${scan.files.length} statement file(s) in ${dirPath}`);
    for (const skip of scan.skipped) {
      console.error(`[INFO] Skipped ${skip.fileName}: ${skip.reason}`);
    }
  }

  return [...files.map((file) => resolve(file)), ...scan.files.map((file) => file.filePath)];
}

async function run(files: string[], options: CliOptions): Promise<void> {
  const statements = await collectStatements(files, options);
  if (statements.length === 0) {
    throw new Error('Either statement files or --input-dir must be specified');
  }

  const config = await resolveConfig({
    configPath: options.config,
    ingestionOrder: options.ingestionOrder,
    defaultYear: options.defaultYear,
    datePattern: options.datePattern,
    categoryRulesFile: options.rules !== undefined ? resolve(options.rules) : undefined,
    strict: options.strict === true ? true : undefined,
  });

  if (options.verbose) {
    console.error(`[INFO] Pipeline version: ${PIPELINE_VERSION}`);
    console.error(`[INFO] Ingestion order: ${config.ingestionOrder}`);
    console.error(`[INFO] Strict mode: ${config.strict ? 'enabled' : 'disabled'}`);
  }

  const result = await runPipeline(statements, new FileLineSource(), {
    config,
    onProgress: (current, total, statementId) => {
      if (options.verbose) {
        console.error(`[INFO] Parsing ${current}/${total}: ${statementId}`);
      }
    },
    onWarning: (issue) => {
      if (options.verbose) {
        const where = issue.page !== undefined ? ` (page ${issue.page}, line ${issue.lineIndex ?? '?'})` : '';
        console.error(`[WARN] ${issue.code} in ${issue.statementId}${where}: ${issue.message}`);
      }
    },
    onError: (failure) => {
      console.error(`[ERROR] Skipped ${failure.statementId}: ${failure.error}`);
    },
  });

  const ledger = toLedgerRecords(result.ledger);
  if (config.strict) {
    validateLedgerOrThrow(ledger);
  }

  printSummary(result);

  const outputContent = JSON.stringify({ ledger, report: result.report }, null, options.pretty ? 2 : undefined);

  if (options.out !== undefined) {
    const outPath = resolve(options.out);
    await mkdir(dirname(outPath), { recursive: true });
    await writeFile(outPath, outputContent, 'utf-8');
    console.error(`[INFO] Output written to: ${outPath}`);
  } else {
    console.log(outputContent);
  }
}

function printSummary(result: PipelineResult): void {
  const { report, ledger } = result;
  const dates = ledger.map((t) => t.date).sort();
  const first = dates[0];
  const last = dates[dates.length - 1];

  console.error('');
  console.error('=== Ledger Summary ===');
  console.error(`Statements processed:   ${report.statementsProcessed}`);
  console.error(`Statements failed:      ${report.statementsFailed}`);
  console.error(`Empty statements:       ${report.emptyStatements}`);
  console.error(`Transactions extracted: ${report.rawTransactions}`);
  console.error(
    `Transactions dropped:   ${report.droppedTransactions} (${(report.dropRate * 100).toFixed(2)}%; ` +
      `date ${report.dropCounts.MalformedDate}, amount ${report.dropCounts.MalformedAmount})`
  );
  console.error(`Unknown balances:       ${report.unknownBalances}`);
  console.error(`Orphan continuations:   ${report.orphanContinuations}`);
  console.error(`Duplicates removed:     ${report.duplicatesRemoved}`);
  console.error(`Ledger entries:         ${report.ledgerSize}`);
  if (first !== undefined && last !== undefined) {
    console.error(`Date range:             ${first} to ${last}`);
  }
  console.error('======================');
}

await program.parseAsync(process.argv);
